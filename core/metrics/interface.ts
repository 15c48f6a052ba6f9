/**
 * Streaming metric interface for the Metric Registry pattern.
 * A metric is fed batch after batch through `update()` and read through
 * `result()`; `reset()` starts a new evaluation.
 */

import type { BatchRows } from "../boxes/types.ts";
import type { MetricConfigInput } from "../config.ts";

/**
 * Result of a metric calculation.
 */
export interface MetricResult {
	name: string;
	/** Aggregate value in [0, 1]. */
	value: number;
	/** Named per-class, per-area (or suite) values in [0, 1]. */
	breakdown: Record<string, number>;
	details?: Record<string, unknown>;
}

/**
 * A stateful detection metric.
 */
export interface StreamingMetric {
	readonly name: string;

	/**
	 * Fold one batch. All-or-nothing: a rejected batch leaves state untouched.
	 * @param trueBoxes - per image `[x1, y1, x2, y2, class]` rows
	 * @param predBoxes - per image `[x1, y1, x2, y2, class, confidence]` rows
	 */
	update(trueBoxes: BatchRows, predBoxes: BatchRows): void;

	/**
	 * Compute the metric from accumulated state. Idempotent.
	 */
	result(): MetricResult;

	reset(): void;
}

/**
 * Registry entry that builds a metric for a given configuration.
 */
export interface MetricDefinition {
	/**
	 * Primary name of the metric (used for lookup and output).
	 */
	readonly name: string;

	/**
	 * Optional aliases that can also be used to look this metric up.
	 */
	readonly aliases?: readonly string[];

	readonly description?: string;

	create(config?: MetricConfigInput): StreamingMetric;
}
