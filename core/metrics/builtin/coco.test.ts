/**
 * Unit tests for the COCO summary suite.
 *
 * Key test cases:
 * 1. Perfect predictions score 1 on every key
 * 2. Detection limits and area buckets split as COCO defines them
 * 3. MaP averages the ten IoU thresholds 0.50:0.05:0.95
 */

import { describe, expect, it } from "vitest";
import { BoxCocoMetrics, COCO_IOU_THRESHOLDS } from "./coco.ts";
import type { BatchRows } from "../../boxes/types.ts";

const COCO_KEYS = [
	"MaP",
	"MaP@[IoU=50]",
	"MaP@[IoU=75]",
	"MaP@[area=small]",
	"MaP@[area=medium]",
	"MaP@[area=large]",
	"Recall@[max_detections=1]",
	"Recall@[max_detections=10]",
	"Recall@[max_detections=100]",
	"Recall@[area=small]",
	"Recall@[area=medium]",
	"Recall@[area=large]",
];

function withConfidence(batch: BatchRows, confidence: number): BatchRows {
	return batch.map((image) => image.map((row) => [...row, confidence]));
}

describe("COCO_IOU_THRESHOLDS", () => {
	it("spans 0.50 to 0.95 in steps of 0.05", () => {
		expect(COCO_IOU_THRESHOLDS).toEqual([0.5, 0.55, 0.6, 0.65, 0.7, 0.75, 0.8, 0.85, 0.9, 0.95]);
	});
});

describe("BoxCocoMetrics", () => {
	it("scores 1 everywhere for perfect predictions", () => {
		// Areas 100 (small), 1600 (medium) and 40000 (large)
		const gt: BatchRows = [
			[
				[0, 0, 10, 10, 0],
				[20, 20, 60, 60, 1],
				[0, 0, 200, 200, 2],
			],
		];
		const metric = new BoxCocoMetrics();
		metric.update(gt, withConfidence(gt, 0.9));
		const result = metric.result();

		expect(result.name).toBe("coco");
		expect(result.value).toBe(1);
		expect(Object.keys(result.breakdown)).toEqual(COCO_KEYS);
		for (const key of COCO_KEYS) {
			expect(result.breakdown[key]).toBe(1);
		}
	});

	it("limits recall by detections per image and splits areas", () => {
		const gt: BatchRows = [
			[
				[0, 0, 10, 10, 0],
				[20, 20, 30, 30, 0],
			],
		];
		const pred: BatchRows = [
			[
				[0, 0, 10, 10, 0, 0.9],
				[20, 20, 30, 30, 0, 0.8],
			],
		];
		const metric = new BoxCocoMetrics();
		metric.update(gt, pred);

		expect(metric.result().breakdown).toEqual({
			MaP: 1,
			"MaP@[IoU=50]": 1,
			"MaP@[IoU=75]": 1,
			"MaP@[area=small]": 1,
			"MaP@[area=medium]": 0,
			"MaP@[area=large]": 0,
			"Recall@[max_detections=1]": 0.5,
			"Recall@[max_detections=10]": 1,
			"Recall@[max_detections=100]": 1,
			"Recall@[area=small]": 1,
			"Recall@[area=medium]": 0,
			"Recall@[area=large]": 0,
		});
	});

	it("averages the IoU thresholds in MaP", () => {
		// IoU 0.6 passes 0.50, 0.55 and 0.60 only
		const metric = new BoxCocoMetrics();
		metric.update([[[0, 0, 10, 10, 0]]], [[[0, 0, 10, 6, 0, 0.8]]]);
		const { breakdown, value } = metric.result();

		expect(value).toBeCloseTo(0.3, 12);
		expect(breakdown["MaP@[IoU=50]"]).toBe(1);
		expect(breakdown["MaP@[IoU=75]"]).toBe(0);
	});

	it("merges shards and resets", () => {
		const gt: BatchRows = [[[0, 0, 10, 10, 0]], [[0, 0, 40, 40, 1]]];
		const pred: BatchRows = [[[0, 0, 10, 8, 0, 0.7]], [[0, 0, 40, 30, 1, 0.6]]];

		const left = new BoxCocoMetrics();
		left.update([gt[0] ?? []], [pred[0] ?? []]);
		const right = new BoxCocoMetrics();
		right.update([gt[1] ?? []], [pred[1] ?? []]);
		left.merge(right);

		const whole = new BoxCocoMetrics();
		whole.update(gt, pred);
		expect(left.result()).toEqual(whole.result());

		left.reset();
		expect(Object.values(left.result().breakdown).every((value) => value === 0)).toBe(true);
	});
});
