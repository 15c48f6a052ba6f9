/**
 * COCO-style greedy assignment of predictions to ground truth.
 *
 * Works on one image, one class, one area bucket and one IoU threshold.
 * Predictions are visited by confidence (descending, ties by index); each one
 * claims the unclaimed eligible ground-truth box it overlaps most, if that
 * overlap reaches the threshold. Equal IoU goes to the lowest ground-truth index.
 */

export interface MatchCounts {
	truePositives: number;
	falsePositives: number;
	falseNegatives: number;
}

/**
 * Outcome for one ranked prediction.
 */
export interface MatchDecision {
	predictionIndex: number;
	score: number;
	matched: boolean;
	/** Claimed ground-truth index, or -1 for a false positive. */
	groundTruthIndex: number;
	/** Best IoU found among unclaimed ground truth (0 when none remained). */
	iou: number;
}

export interface MatchOutcome extends MatchCounts {
	/** Eligible ground-truth boxes in the bucket (TP + FN). */
	groundTruthCount: number;
	/** In ranked order. */
	decisions: MatchDecision[];
}

export interface MatchInput {
	/** Rows are ground truth, columns are predictions, both of one class. */
	iou: readonly (readonly number[])[];
	groundTruthEligible: readonly boolean[];
	predictionEligible: readonly boolean[];
	scores: readonly number[];
	iouThreshold: number;
	maxDetections: number;
}

/**
 * Eligible prediction indices by confidence descending, ties by index
 * ascending, cut to `maxDetections`.
 */
export function rankPredictions(
	scores: readonly number[],
	eligible: readonly boolean[],
	maxDetections: number,
): number[] {
	const candidates: number[] = [];
	scores.forEach((_, index) => {
		if (eligible[index]) candidates.push(index);
	});

	candidates.sort((a, b) => (scores[b] ?? 0) - (scores[a] ?? 0) || a - b);
	return candidates.slice(0, maxDetections);
}

/**
 * Match an already ranked prediction list.
 * Ranking does not depend on the threshold, so callers evaluating several
 * thresholds rank once and call this per threshold.
 */
export function matchRanked(
	iou: readonly (readonly number[])[],
	groundTruthEligible: readonly boolean[],
	ranked: readonly number[],
	scores: readonly number[],
	iouThreshold: number,
): MatchOutcome {
	const claimed = groundTruthEligible.map(() => false);
	const groundTruthCount = groundTruthEligible.filter(Boolean).length;
	const decisions: MatchDecision[] = [];
	let truePositives = 0;
	let falsePositives = 0;

	for (const predictionIndex of ranked) {
		let best = -1;
		let bestIoU = 0;
		for (let g = 0; g < groundTruthEligible.length; g++) {
			if (!groundTruthEligible[g] || claimed[g]) continue;
			const overlap = iou[g]?.[predictionIndex] ?? 0;
			// Strictly greater keeps the lowest index on ties
			if (best === -1 || overlap > bestIoU) {
				best = g;
				bestIoU = overlap;
			}
		}

		const score = scores[predictionIndex] ?? 0;
		if (best !== -1 && bestIoU >= iouThreshold) {
			claimed[best] = true;
			truePositives++;
			decisions.push({ predictionIndex, score, matched: true, groundTruthIndex: best, iou: bestIoU });
		} else {
			falsePositives++;
			decisions.push({ predictionIndex, score, matched: false, groundTruthIndex: -1, iou: bestIoU });
		}
	}

	return {
		truePositives,
		falsePositives,
		falseNegatives: groundTruthCount - truePositives,
		groundTruthCount,
		decisions,
	};
}

/**
 * Rank and match in one call.
 */
export function greedyMatch(input: MatchInput): MatchOutcome {
	const ranked = rankPredictions(input.scores, input.predictionEligible, input.maxDetections);
	return matchRanked(
		input.iou,
		input.groundTruthEligible,
		ranked,
		input.scores,
		input.iouThreshold,
	);
}
