/**
 * Precision–recall curves and COCO 101-point interpolated average precision.
 */

/** Recall points 0, 0.01, ..., 1. */
export const COCO_RECALL_POINTS = 101;

export interface PrecisionRecallCurve {
	/** Scores in curve order (descending). */
	scores: number[];
	precision: number[];
	recall: number[];
}

/**
 * Cumulative precision and recall along decisions already sorted by
 * descending confidence.
 */
export function precisionRecallCurve(
	scores: readonly number[],
	matched: readonly boolean[],
	groundTruthCount: number,
): PrecisionRecallCurve {
	const precision: number[] = [];
	const recall: number[] = [];
	let truePositives = 0;
	let falsePositives = 0;

	for (const hit of matched) {
		if (hit) truePositives++;
		else falsePositives++;
		precision.push(truePositives / (truePositives + falsePositives));
		recall.push(groundTruthCount > 0 ? truePositives / groundTruthCount : 0);
	}

	return { scores: [...scores], precision, recall };
}

/**
 * Interpolated AP: at each recall point r take the best precision reached at
 * any recall >= r (0 when r is never reached), then average.
 *
 * @returns undefined when there is no ground truth to recall
 */
export function interpolatedAveragePrecision(
	curve: PrecisionRecallCurve,
	groundTruthCount: number,
	recallPoints = COCO_RECALL_POINTS,
): number | undefined {
	if (groundTruthCount === 0) {
		return undefined;
	}
	if (!Number.isInteger(recallPoints) || recallPoints < 2) {
		throw new RangeError(`recallPoints must be an integer >= 2, got ${recallPoints}`);
	}

	// Monotone envelope, right to left
	const envelope = [...curve.precision];
	for (let i = envelope.length - 1; i > 0; i--) {
		envelope[i - 1] = Math.max(envelope[i - 1] ?? 0, envelope[i] ?? 0);
	}

	const steps = recallPoints - 1;
	let sum = 0;
	let cursor = 0;
	for (let k = 0; k <= steps; k++) {
		const target = k / steps;
		// Recall never decreases along the curve
		while (cursor < curve.recall.length && (curve.recall[cursor] ?? 0) < target) {
			cursor++;
		}
		if (cursor < envelope.length) {
			sum += envelope[cursor] ?? 0;
		}
	}

	return sum / recallPoints;
}
