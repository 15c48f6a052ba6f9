/**
 * COCO summary metrics in one streaming pass.
 *
 * Keys follow the usual COCO naming:
 * - MaP, MaP@[IoU=50], MaP@[IoU=75] (IoU 0.50:0.05:0.95, 100 detections)
 * - MaP@[area=small|medium|large]
 * - Recall@[max_detections=1|10|100]
 * - Recall@[area=small|medium|large]
 */

import type { BatchRows } from "../../boxes/types.ts";
import { normalizeBatch } from "../../boxes/batch.ts";
import { MAX_AREA, type MetricConfigInput } from "../../config.ts";
import type { MetricResult, StreamingMetric } from "../interface.ts";
import { MeanAveragePrecisionMetric } from "./mean-average-precision.ts";
import { RecallMetric } from "./recall.ts";

export const COCO_IOU_THRESHOLDS: readonly number[] = Array.from(
	{ length: 10 },
	(_, i) => (50 + 5 * i) / 100,
);

const COCO_ALL_AREAS = { label: "all", min: 0, max: MAX_AREA };

export const COCO_AREA_RANGES = [
	COCO_ALL_AREAS,
	{ label: "small", min: 0, max: 32 ** 2 },
	{ label: "medium", min: 32 ** 2, max: 96 ** 2 },
	{ label: "large", min: 96 ** 2, max: MAX_AREA },
];

export const COCO_MAX_DETECTIONS = [1, 10, 100] as const;

/**
 * Options the suite takes from a metric config. Thresholds, area ranges and
 * detection limits are fixed by the COCO protocol.
 */
export type CocoMetricsConfig = Pick<MetricConfigInput, "boxFormat" | "classIds">;

export class BoxCocoMetrics implements StreamingMetric {
	readonly name = "coco";
	private readonly averagePrecision: MeanAveragePrecisionMetric;
	private readonly recallAt100: RecallMetric;
	private readonly recallAt: Map<number, RecallMetric>;

	constructor(config: CocoMetricsConfig = {}) {
		const base = {
			boxFormat: config.boxFormat,
			classIds: config.classIds,
			iouThresholds: [...COCO_IOU_THRESHOLDS],
		};

		this.averagePrecision = new MeanAveragePrecisionMetric({
			...base,
			areaRanges: COCO_AREA_RANGES,
			maxDetections: 100,
		});
		this.recallAt100 = new RecallMetric({
			...base,
			areaRanges: COCO_AREA_RANGES,
			maxDetections: 100,
		});
		this.recallAt = new Map(
			COCO_MAX_DETECTIONS.filter((limit) => limit !== 100).map((limit): [number, RecallMetric] => [
				limit,
				new RecallMetric({
					...base,
					areaRanges: [COCO_ALL_AREAS],
					maxDetections: limit,
				}),
			]),
		);
	}

	update(trueBoxes: BatchRows, predBoxes: BatchRows): void {
		const images = normalizeBatch(trueBoxes, predBoxes);
		for (const metric of this.metrics()) {
			metric.updateImages(images);
		}
	}

	result(): MetricResult {
		const map = this.averagePrecision;
		const breakdown: Record<string, number> = {
			MaP: map.summarize({ areaRange: "all" }),
			"MaP@[IoU=50]": map.summarize({ areaRange: "all", iouThreshold: 0.5 }),
			"MaP@[IoU=75]": map.summarize({ areaRange: "all", iouThreshold: 0.75 }),
			"MaP@[area=small]": map.summarize({ areaRange: "small" }),
			"MaP@[area=medium]": map.summarize({ areaRange: "medium" }),
			"MaP@[area=large]": map.summarize({ areaRange: "large" }),
		};

		for (const limit of COCO_MAX_DETECTIONS) {
			const metric = this.recallAt.get(limit) ?? this.recallAt100;
			breakdown[`Recall@[max_detections=${limit}]`] = metric.summarize({ areaRange: "all" });
		}
		for (const area of ["small", "medium", "large"]) {
			breakdown[`Recall@[area=${area}]`] = this.recallAt100.summarize({ areaRange: area });
		}

		return {
			name: this.name,
			value: breakdown.MaP ?? 0,
			breakdown,
			details: {
				iouThresholds: [...COCO_IOU_THRESHOLDS],
				areaRanges: COCO_AREA_RANGES.map((range) => range.label),
				maxDetections: [...COCO_MAX_DETECTIONS],
			},
		};
	}

	reset(): void {
		for (const metric of this.metrics()) {
			metric.reset();
		}
	}

	/**
	 * Fold the state of another suite.
	 */
	merge(other: BoxCocoMetrics): void {
		this.averagePrecision.merge(other.averagePrecision);
		this.recallAt100.merge(other.recallAt100);
		for (const [limit, metric] of this.recallAt) {
			const source = other.recallAt.get(limit);
			if (source) metric.merge(source);
		}
	}

	private metrics(): Array<MeanAveragePrecisionMetric | RecallMetric> {
		return [this.averagePrecision, this.recallAt100, ...this.recallAt.values()];
	}
}
