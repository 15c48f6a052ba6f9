/**
 * Mean average precision (COCO 101-point interpolation).
 *
 * Unlike recall, AP needs the ranked decisions themselves, so every update
 * also stores each prediction's (score, matched) pair per key. The eligible
 * ground-truth count of a key is TP + FN from the shared accumulator.
 */

import type { MetricConfigInput } from "../../config.ts";
import type { MatchOutcome } from "../../matching/greedy-matcher.ts";
import { classAreaName, type MatchKey } from "../../matching/match-key.ts";
import {
	COCO_RECALL_POINTS,
	interpolatedAveragePrecision,
	type PrecisionRecallCurve,
} from "../average-precision.ts";
import { BoxMetric, mean, type SummaryFilter } from "../box-metric.ts";
import type { MetricResult } from "../interface.ts";
import { PrecisionRecallStore } from "../pr-store.ts";

/** classId -> AP per cell, undefined where no ground truth was seen */
type AveragePrecisionTable = Map<number, (number | undefined)[]>;

export class MeanAveragePrecisionMetric extends BoxMetric {
	readonly name = "mean_average_precision";
	protected readonly samples: PrecisionRecallStore;
	private cachedTable: AveragePrecisionTable | null = null;

	constructor(config: MetricConfigInput = {}) {
		super(config);
		this.samples = new PrecisionRecallStore(this.keySpace);
	}

	result(): MetricResult {
		const table = this.averagePrecisionTable();
		const breakdown: Record<string, number> = {};
		const unobserved: string[] = [];

		for (const [classId, cells] of table) {
			this.settings.areaRanges.forEach((range, areaIndex) => {
				const name = classAreaName(classId, range.label);
				const values: number[] = [];
				for (let thresholdIndex = 0; thresholdIndex < this.keySpace.thresholdCount; thresholdIndex++) {
					const ap = cells[this.keySpace.cellIndex(areaIndex, thresholdIndex)];
					if (ap !== undefined) values.push(ap);
				}

				if (values.length === 0) {
					unobserved.push(name);
				} else {
					breakdown[name] = mean(values);
				}
			});
		}

		return {
			name: this.name,
			value: this.summarize(),
			breakdown,
			details: {
				...this.describeSettings(),
				recallPoints: COCO_RECALL_POINTS,
				unobserved,
			},
		};
	}

	/**
	 * Mean AP over the selected cells of every class with ground truth;
	 * 0 when there is none.
	 */
	summarize(filter: SummaryFilter = {}): number {
		const table = this.averagePrecisionTable();
		const values: number[] = [];

		for (const { areaIndex, thresholdIndex } of this.selectCells(filter)) {
			const cellIndex = this.keySpace.cellIndex(areaIndex, thresholdIndex);
			for (const cells of table.values()) {
				const ap = cells[cellIndex];
				if (ap !== undefined) values.push(ap);
			}
		}

		return mean(values);
	}

	/**
	 * AP of one key; undefined when the key has seen no ground truth.
	 */
	averagePrecision(key: MatchKey): number | undefined {
		const { truePositives, falseNegatives } = this.counts.get(key);
		const groundTruth = truePositives + falseNegatives;
		return interpolatedAveragePrecision(this.precisionRecallCurve(key), groundTruth);
	}

	precisionRecallCurve(key: MatchKey): PrecisionRecallCurve {
		const { truePositives, falseNegatives } = this.counts.get(key);
		return this.samples.curve(key, truePositives + falseNegatives);
	}

	override reset(): void {
		super.reset();
		this.samples.reset();
		this.cachedTable = null;
	}

	/**
	 * Samples go in before counts, so the ground-truth totals never run ahead of
	 * the samples they describe.
	 */
	override merge(other: this): void {
		this.checkMergeable(other);
		this.cachedTable = null;
		this.samples.merge(other.samples);
		this.counts.merge(other.counts);
	}

	protected override fold(key: MatchKey, outcome: MatchOutcome): void {
		super.fold(key, outcome);
		this.samples.record(key, outcome.decisions);
		this.cachedTable = null;
	}

	private averagePrecisionTable(): AveragePrecisionTable {
		if (this.cachedTable) return this.cachedTable;

		const table: AveragePrecisionTable = new Map();
		for (const classId of this.counts.classIds()) {
			table.set(
				classId,
				this.keySpace.keysFor(classId).map((key) => this.averagePrecision(key)),
			);
		}
		this.cachedTable = table;
		return table;
	}
}
