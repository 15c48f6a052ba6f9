/**
 * Unit tests for precision–recall curves and interpolated AP.
 *
 * Key test cases:
 * 1. Perfect ranking → AP 1
 * 2. Envelope: a later, better precision lifts earlier recall points
 * 3. Recall points never reached contribute 0
 * 4. No ground truth → undefined (excluded, not zero)
 */

import { describe, expect, it } from "vitest";
import {
	COCO_RECALL_POINTS,
	interpolatedAveragePrecision,
	precisionRecallCurve,
} from "./average-precision.ts";

describe("precisionRecallCurve", () => {
	it("accumulates along the ranked decisions", () => {
		const curve = precisionRecallCurve([1, 0.9, 0.9], [true, false, false], 2);
		expect(curve.scores).toEqual([1, 0.9, 0.9]);
		expect(curve.precision[0]).toBe(1);
		expect(curve.precision[1]).toBe(0.5);
		expect(curve.precision[2]).toBeCloseTo(1 / 3, 12);
		expect(curve.recall).toEqual([0.5, 0.5, 0.5]);
	});

	it("is empty without decisions", () => {
		expect(precisionRecallCurve([], [], 3)).toEqual({ scores: [], precision: [], recall: [] });
	});
});

describe("interpolatedAveragePrecision", () => {
	it("uses 101 recall points by default", () => {
		expect(COCO_RECALL_POINTS).toBe(101);
	});

	it("is 1 for a perfect ranking", () => {
		const curve = precisionRecallCurve([0.9, 0.8], [true, true], 2);
		expect(interpolatedAveragePrecision(curve, 2)).toBe(1);
	});

	it("counts only recall points up to the recall reached", () => {
		// Recall stops at 0.5: points 0.00..0.50 (51 of them) score precision 1
		const curve = precisionRecallCurve([1, 0.9, 0.9], [true, false, false], 2);
		expect(interpolatedAveragePrecision(curve, 2)).toBeCloseTo(51 / 101, 12);
	});

	it("takes the best precision at any higher recall", () => {
		// precision [0, 0.5], recall [0, 1] → envelope 0.5 everywhere
		const curve = precisionRecallCurve([0.9, 0.8], [false, true], 1);
		expect(interpolatedAveragePrecision(curve, 1)).toBe(0.5);
	});

	it("supports a coarser recall grid", () => {
		// precision [1, 0.5, 2/3], recall [0.25, 0.25, 0.5] on 0, 0.1, ..., 1:
		// three points at 1, three at 2/3, five at 0
		const curve = precisionRecallCurve([0.9, 0.8, 0.7], [true, false, true], 4);
		expect(interpolatedAveragePrecision(curve, 4, 11)).toBeCloseTo(5 / 11, 12);
	});

	it("is 0 when nothing was predicted for existing ground truth", () => {
		expect(interpolatedAveragePrecision(precisionRecallCurve([], [], 3), 3)).toBe(0);
	});

	it("is undefined without ground truth", () => {
		const curve = precisionRecallCurve([0.9], [false], 0);
		expect(interpolatedAveragePrecision(curve, 0)).toBeUndefined();
	});

	it("rejects a recall grid with fewer than two points", () => {
		const curve = precisionRecallCurve([0.9], [true], 1);
		expect(() => interpolatedAveragePrecision(curve, 1, 1)).toThrow(RangeError);
	});
});
