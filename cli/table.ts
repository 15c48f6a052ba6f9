/**
 * Table rendering for metric results.
 *
 * One block per metric: the aggregate first, then the breakdown rows in the
 * order the metric produced them.
 */

import type { MetricResult } from "../core/metrics/interface.ts";
import type { RunResult } from "../core/runner.ts";

/**
 * Format a metric value for display. Every metric here is a ratio in [0, 1].
 */
export function formatMetricValue(value: number): string {
	return `${(value * 100).toFixed(1)}%`;
}

/**
 * Lines of one metric's block, without borders.
 */
export function metricRows(result: MetricResult): Array<[string, string]> {
	const rows: Array<[string, string]> = [[result.name, formatMetricValue(result.value)]];
	for (const [key, value] of Object.entries(result.breakdown)) {
		rows.push([`  ${key}`, formatMetricValue(value)]);
	}

	const unobserved = result.details?.unobserved;
	if (Array.isArray(unobserved) && unobserved.length > 0) {
		rows.push([`  (no ground truth: ${unobserved.length})`, "-"]);
	}
	return rows;
}

/**
 * Render the results of a run as a boxed table.
 */
export function renderResultsTable(result: RunResult): string {
	const blocks = result.metrics.map(metricRows);
	const allRows = blocks.flat();
	const nameCol = Math.max(24, ...allRows.map(([name]) => name.length));
	const valueCol = Math.max(8, ...allRows.map(([, value]) => value.length));
	const totalWidth = nameCol + valueCol + 3;

	const lines: string[] = [];
	lines.push("╭" + "─".repeat(totalWidth + 2) + "╮");
	lines.push(
		"│ " +
			`RESULTS  ${result.totalImages} images, ${result.batches} batches`.padEnd(totalWidth) +
			" │",
	);

	for (const block of blocks) {
		lines.push("├" + "─".repeat(totalWidth + 2) + "┤");
		for (const [name, value] of block) {
			lines.push(`│ ${name.padEnd(nameCol)} │ ${value.padStart(valueCol)} │`);
		}
	}

	lines.push("╰" + "─".repeat(totalWidth + 2) + "╯");
	return lines.join("\n");
}
