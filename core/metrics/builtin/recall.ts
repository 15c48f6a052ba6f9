/**
 * Box recall: the fraction of ground-truth boxes claimed by a prediction.
 */

import { BoxMetric, mean, type SummaryFilter } from "../box-metric.ts";
import type { MetricResult } from "../interface.ts";
import { classAreaName } from "../../matching/match-key.ts";

/**
 * Recall per class and area range, averaged over IoU thresholds.
 *
 * A class/area pair with no ground truth yet reports 0 and is listed under
 * `details.unobserved`. The aggregate pools every class: for each
 * (area range, threshold) cell it takes ΣTP / Σ(TP + FN), then averages the
 * cells that saw ground truth.
 */
export class RecallMetric extends BoxMetric {
	readonly name = "recall";

	result(): MetricResult {
		const breakdown: Record<string, number> = {};
		const unobserved: string[] = [];

		for (const classId of this.counts.classIds()) {
			this.settings.areaRanges.forEach((range, areaIndex) => {
				const name = classAreaName(classId, range.label);
				const recalls: number[] = [];
				for (let thresholdIndex = 0; thresholdIndex < this.keySpace.thresholdCount; thresholdIndex++) {
					const { truePositives, falseNegatives } = this.counts.get({
						classId,
						areaIndex,
						thresholdIndex,
					});
					const groundTruth = truePositives + falseNegatives;
					if (groundTruth > 0) recalls.push(truePositives / groundTruth);
				}

				if (recalls.length === 0) {
					unobserved.push(name);
					breakdown[name] = 0;
				} else {
					breakdown[name] = mean(recalls);
				}
			});
		}

		return {
			name: this.name,
			value: this.summarize(),
			breakdown,
			details: { ...this.describeSettings(), unobserved },
		};
	}

	/**
	 * Pooled recall over the selected cells; 0 when none saw ground truth.
	 */
	summarize(filter: SummaryFilter = {}): number {
		const classIds = this.counts.classIds();
		const recalls: number[] = [];

		for (const { areaIndex, thresholdIndex } of this.selectCells(filter)) {
			let truePositives = 0;
			let groundTruth = 0;
			for (const classId of classIds) {
				const counts = this.counts.get({ classId, areaIndex, thresholdIndex });
				truePositives += counts.truePositives;
				groundTruth += counts.truePositives + counts.falseNegatives;
			}
			if (groundTruth > 0) recalls.push(truePositives / groundTruth);
		}

		return mean(recalls);
	}
}
