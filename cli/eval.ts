/**
 * `boxbench eval`: run metrics over dataset files.
 *
 * Usage: boxbench eval --data "preds/*.json" [--config run.yaml] [--metrics map recall]
 */

import type { EvalConfig, MetricConfigInput } from "../core/config.ts";
import { loadEvalConfig } from "../core/config-loader.ts";
import { loadDataset } from "../core/dataset.ts";
import { getDefaultRegistry } from "../core/metrics/index.ts";
import { EvaluationRunner, type ProgressCallback } from "../core/runner.ts";
import {
	toNumberArray,
	toStringArray,
	toStringOption,
	type OptionValue,
} from "./args.ts";
import { renderResultsTable } from "./table.ts";

export interface EvalSettings {
	dataPattern: string;
	metricNames: string[];
	batchSize: number;
	metricConfig: MetricConfigInput;
	json: boolean;
	runId?: string;
}

const DEFAULT_METRICS = ["mean_average_precision", "recall"];

/**
 * Merge a run config file with command-line options; options win.
 * @throws Error when no dataset is named anywhere
 */
export function resolveEvalSettings(
	options: Record<string, OptionValue>,
	fileConfig?: EvalConfig,
): EvalSettings {
	const dataPattern = toStringOption(options.data) ?? fileConfig?.data;
	if (!dataPattern) {
		throw new Error("No dataset specified. Use --data <glob> or set `data` in the config file.");
	}

	const metricConfig: MetricConfigInput = { ...fileConfig?.metric };
	const iouThresholds = toNumberArray(options.iou);
	if (iouThresholds) metricConfig.iouThresholds = iouThresholds;
	const classIds = toNumberArray(options.classes);
	if (classIds) metricConfig.classIds = classIds;
	const maxDetections = toStringOption(options["max-detections"]);
	if (maxDetections !== undefined) metricConfig.maxDetections = Number(maxDetections);

	const batchSizeOption = toStringOption(options["batch-size"]);

	return {
		dataPattern,
		metricNames: toStringArray(options.metrics) ?? fileConfig?.metrics ?? DEFAULT_METRICS,
		batchSize: batchSizeOption !== undefined ? Number(batchSizeOption) : (fileConfig?.batchSize ?? 32),
		metricConfig,
		json: options.json === true,
		runId: toStringOption(options["run-id"]),
	};
}

export async function evalCommand(options: Record<string, OptionValue>): Promise<void> {
	const configPath = toStringOption(options.config);
	const fileConfig = configPath ? await loadEvalConfig(configPath) : undefined;
	const settings = resolveEvalSettings(options, fileConfig);

	// Unknown metric names and bad settings fail here, before any data is read
	const metrics = getDefaultRegistry().createAll(settings.metricNames, settings.metricConfig);
	const images = await loadDataset(settings.dataPattern);

	if (!settings.json) {
		console.log(`
╭─────────────────────────────────────────────────────────────────╮
│                    BOXBENCH EVALUATION                          │
├─────────────────────────────────────────────────────────────────┤
│ Data:     ${settings.dataPattern.padEnd(53)} │
│ Images:   ${String(images.length).padEnd(53)} │
│ Metrics:  ${metrics.map((m) => m.name).join(", ").padEnd(53)} │
│ Started:  ${new Date().toISOString().padEnd(53)} │
╰─────────────────────────────────────────────────────────────────╯
`);
	}

	const onProgress: ProgressCallback = (progress) => {
		const pct = ((progress.current / progress.total) * 100).toFixed(1);
		process.stdout.write(`\r  [EVAL] ${progress.current}/${progress.total} images (${pct}%)`);
	};

	const runner = new EvaluationRunner(settings.json ? undefined : { onProgress });
	const result = runner.run({
		metrics,
		images,
		batchSize: settings.batchSize,
		runId: settings.runId,
	});

	if (settings.json) {
		console.log(JSON.stringify(result, null, 2));
		return;
	}

	// Clear progress line
	console.log("\n");
	console.log(renderResultsTable(result));
	console.log(`\n✅ Run ID: ${result.runId}\n`);
}
