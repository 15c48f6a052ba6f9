/**
 * Unit tests for greedy matching.
 *
 * Key test cases:
 * 1. Confidence ordering with index tie-break and the max-detections cut
 * 2. Max-IoU choice among unclaimed ground truth, lowest index on ties
 * 3. Area eligibility on both axes
 * 4. Empty sides: no ground truth / no predictions
 */

import { describe, expect, it } from "vitest";
import { greedyMatch, matchRanked, rankPredictions, type MatchInput } from "./greedy-matcher.ts";

function input(overrides: Partial<MatchInput> & Pick<MatchInput, "iou" | "scores">): MatchInput {
	const groundTruthCount = overrides.iou.length;
	return {
		groundTruthEligible: new Array<boolean>(groundTruthCount).fill(true),
		predictionEligible: overrides.scores.map(() => true),
		iouThreshold: 0.5,
		maxDetections: 100,
		...overrides,
	};
}

describe("rankPredictions", () => {
	const scores = [0.5, 0.9, 0.5, 0.7];
	const all = [true, true, true, true];

	it("orders by confidence, ties by index", () => {
		expect(rankPredictions(scores, all, 100)).toEqual([1, 3, 0, 2]);
	});

	it("cuts to max detections after sorting", () => {
		expect(rankPredictions(scores, all, 2)).toEqual([1, 3]);
	});

	it("skips ineligible predictions before the cut", () => {
		expect(rankPredictions(scores, [true, false, true, true], 2)).toEqual([3, 0]);
	});
});

describe("greedyMatch", () => {
	it("lets the most confident prediction claim first", () => {
		const outcome = greedyMatch(input({ iou: [[0.9, 0.6]], scores: [0.8, 0.9] }));

		expect(outcome).toEqual({
			truePositives: 1,
			falsePositives: 1,
			falseNegatives: 0,
			groundTruthCount: 1,
			decisions: [
				{ predictionIndex: 1, score: 0.9, matched: true, groundTruthIndex: 0, iou: 0.6 },
				{ predictionIndex: 0, score: 0.8, matched: false, groundTruthIndex: -1, iou: 0 },
			],
		});
	});

	it("records a false positive and a false negative below the threshold", () => {
		const outcome = greedyMatch(input({ iou: [[0.25]], scores: [0.9] }));
		expect(outcome.truePositives).toBe(0);
		expect(outcome.falsePositives).toBe(1);
		expect(outcome.falseNegatives).toBe(1);
		expect(outcome.decisions[0]?.iou).toBe(0.25);
	});

	it("counts an IoU equal to the threshold as a match", () => {
		expect(greedyMatch(input({ iou: [[0.5]], scores: [0.9] })).truePositives).toBe(1);
	});

	it("breaks equal IoU ties toward the lowest ground-truth index", () => {
		const outcome = greedyMatch(input({ iou: [[0.7], [0.7]], scores: [0.9] }));
		expect(outcome.decisions[0]?.groundTruthIndex).toBe(0);
		expect(outcome.falseNegatives).toBe(1);
	});

	it("is greedy rather than optimal", () => {
		// First prediction takes gt 0 (0.6 > 0.55); the second is then left with gt 1 at 0.1
		const outcome = greedyMatch(
			input({
				iou: [
					[0.6, 0.7],
					[0.55, 0.1],
				],
				scores: [0.9, 0.8],
			}),
		);
		expect(outcome.truePositives).toBe(1);
		expect(outcome.falsePositives).toBe(1);
		expect(outcome.falseNegatives).toBe(1);
	});

	it("removes ineligible ground truth from the pool entirely", () => {
		const outcome = greedyMatch(
			input({
				iou: [[0.9], [0.8]],
				scores: [0.9],
				groundTruthEligible: [false, true],
			}),
		);
		expect(outcome.decisions[0]?.groundTruthIndex).toBe(1);
		expect(outcome.groundTruthCount).toBe(1);
		expect(outcome.falseNegatives).toBe(0);
	});

	it("ignores ineligible predictions", () => {
		const outcome = greedyMatch(
			input({ iou: [[1]], scores: [0.9], predictionEligible: [false] }),
		);
		expect(outcome.decisions).toEqual([]);
		expect(outcome.falsePositives).toBe(0);
		expect(outcome.falseNegatives).toBe(1);
	});

	it("marks every prediction a false positive without ground truth", () => {
		const outcome = greedyMatch(input({ iou: [], scores: [0.3, 0.4, 0.2] }));
		expect(outcome.falsePositives).toBe(3);
		expect(outcome.truePositives).toBe(0);
		expect(outcome.falseNegatives).toBe(0);

		const capped = greedyMatch(input({ iou: [], scores: [0.3, 0.4, 0.2], maxDetections: 2 }));
		expect(capped.falsePositives).toBe(2);
		expect(capped.decisions.map((d) => d.predictionIndex)).toEqual([1, 0]);
	});

	it("marks every eligible ground truth a false negative without predictions", () => {
		const outcome = greedyMatch(input({ iou: [[], [], []], scores: [] }));
		expect(outcome).toEqual({
			truePositives: 0,
			falsePositives: 0,
			falseNegatives: 3,
			groundTruthCount: 3,
			decisions: [],
		});
	});
});

describe("matchRanked", () => {
	it("reuses one ranking across thresholds", () => {
		const iou = [[0.6]];
		const ranked = rankPredictions([0.9], [true], 100);

		expect(matchRanked(iou, [true], ranked, [0.9], 0.5).truePositives).toBe(1);
		expect(matchRanked(iou, [true], ranked, [0.9], 0.75).truePositives).toBe(0);
	});
});
