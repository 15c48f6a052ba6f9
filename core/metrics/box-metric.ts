/**
 * Shared update pipeline of the box metrics.
 *
 * normalize batch → match every image → fold every outcome. Folding starts only
 * after the whole batch matched, so a batch that fails validation changes
 * nothing.
 */

import type { BatchRows, ImageBoxes } from "../boxes/types.ts";
import { normalizeBatch } from "../boxes/batch.ts";
import {
	resolveMetricConfig,
	sameSettings,
	type EvaluationSettings,
	type MetricConfigInput,
} from "../config.ts";
import { ConfigError } from "../errors.ts";
import { evaluateImage } from "../matching/evaluate-image.ts";
import type { MatchCounts, MatchOutcome } from "../matching/greedy-matcher.ts";
import { MatchKeySpace, type MatchKey, type MatchKeyLabel } from "../matching/match-key.ts";
import { StatAccumulator } from "./accumulator.ts";
import type { MetricResult, StreamingMetric } from "./interface.ts";

/**
 * Restricts a summary to one IoU threshold and/or one area range.
 */
export interface SummaryFilter {
	iouThreshold?: number;
	areaRange?: string;
}

export interface CellSelector {
	areaIndex: number;
	thresholdIndex: number;
}

export interface StatEntry extends MatchKeyLabel, MatchCounts {}

const THRESHOLD_TOLERANCE = 1e-9;

export abstract class BoxMetric implements StreamingMetric {
	abstract readonly name: string;
	readonly settings: EvaluationSettings;
	protected readonly keySpace: MatchKeySpace;
	protected readonly counts: StatAccumulator;

	constructor(config: MetricConfigInput = {}) {
		this.settings = resolveMetricConfig(config);
		this.keySpace = new MatchKeySpace(this.settings);
		this.counts = new StatAccumulator(this.keySpace, this.settings.classIds);
	}

	update(trueBoxes: BatchRows, predBoxes: BatchRows): void {
		this.updateImages(normalizeBatch(trueBoxes, predBoxes));
	}

	/**
	 * Fold images that went through `normalizeBatch()` already.
	 */
	updateImages(images: readonly ImageBoxes[]): void {
		const outcomes = images.flatMap((image) =>
			evaluateImage(image, this.settings, this.keySpace),
		);
		for (const { key, outcome } of outcomes) {
			this.fold(key, outcome);
		}
	}

	/**
	 * Accumulated counts, labelled.
	 */
	stats(): StatEntry[] {
		return this.counts.entries().map(({ key, ...counts }) => ({
			...this.keySpace.label(key),
			...counts,
		}));
	}

	reset(): void {
		this.counts.reset();
	}

	/**
	 * Fold the state of another metric built with the same settings, e.g. a
	 * shard evaluated elsewhere.
	 * @throws ConfigError if the settings differ
	 */
	merge(other: this): void {
		this.checkMergeable(other);
		this.counts.merge(other.counts);
	}

	abstract result(): MetricResult;

	/**
	 * @throws ConfigError if `other` was built with different settings
	 */
	protected checkMergeable(other: BoxMetric): void {
		if (!sameSettings(this.settings, other.settings)) {
			throw new ConfigError(`Cannot merge ${this.name} metrics with different settings`);
		}
	}

	protected fold(key: MatchKey, outcome: MatchOutcome): void {
		this.counts.fold(key, outcome);
	}

	/**
	 * Cells matching a filter.
	 * @throws RangeError for a threshold or area label the metric does not have
	 */
	protected selectCells(filter: SummaryFilter = {}): CellSelector[] {
		const { areaRanges, iouThresholds } = this.settings;

		const areaIndices =
			filter.areaRange === undefined
				? areaRanges.map((_, i) => i)
				: [areaRanges.findIndex((range) => range.label === filter.areaRange)];
		if (areaIndices.includes(-1)) {
			throw new RangeError(
				`${this.name}: no area range "${filter.areaRange}". Available: ${areaRanges.map((r) => r.label).join(", ")}`,
			);
		}

		const target = filter.iouThreshold;
		const thresholdIndices =
			target === undefined
				? iouThresholds.map((_, i) => i)
				: [iouThresholds.findIndex((t) => Math.abs(t - target) < THRESHOLD_TOLERANCE)];
		if (thresholdIndices.includes(-1)) {
			throw new RangeError(
				`${this.name}: no IoU threshold ${target}. Available: ${iouThresholds.join(", ")}`,
			);
		}

		return areaIndices.flatMap((areaIndex) =>
			thresholdIndices.map((thresholdIndex) => ({ areaIndex, thresholdIndex })),
		);
	}

	/**
	 * Settings echoed into result details.
	 */
	protected describeSettings(): Record<string, unknown> {
		return {
			iouThresholds: [...this.settings.iouThresholds],
			areaRanges: this.settings.areaRanges.map((range) => range.label),
			maxDetections: this.settings.maxDetections,
		};
	}
}

export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((a, b) => a + b, 0) / values.length;
}
