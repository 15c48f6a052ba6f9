/**
 * Run geometry, area filtering and greedy matching for every key of one image.
 */

import type { ImageBoxes } from "../boxes/types.ts";
import { iouMatrix } from "../boxes/geometry.ts";
import { areaEligibility } from "./area-filter.ts";
import { matchRanked, rankPredictions, type MatchOutcome } from "./greedy-matcher.ts";
import type { MatchKey, MatchKeySpace } from "./match-key.ts";
import type { EvaluationSettings } from "../config.ts";

export interface KeyedOutcome {
	key: MatchKey;
	outcome: MatchOutcome;
}

/**
 * Classes of an image that take part in evaluation, ascending.
 */
function classesOf(image: ImageBoxes, keySpace: MatchKeySpace): number[] {
	const classIds = new Set<number>();
	for (const box of image.groundTruth) classIds.add(box.classId);
	for (const box of image.predictions) classIds.add(box.classId);
	return Array.from(classIds)
		.filter((classId) => keySpace.tracks(classId))
		.sort((a, b) => a - b);
}

/**
 * Match one image. Classes with no boxes in the image produce no outcomes.
 * Pure: nothing is folded here.
 */
export function evaluateImage(
	image: ImageBoxes,
	settings: EvaluationSettings,
	keySpace: MatchKeySpace,
): KeyedOutcome[] {
	const outcomes: KeyedOutcome[] = [];

	for (const classId of classesOf(image, keySpace)) {
		const groundTruth = image.groundTruth.filter((box) => box.classId === classId);
		const predictions = image.predictions.filter((box) => box.classId === classId);
		const iou = iouMatrix(groundTruth, predictions);
		const scores = predictions.map((box) => box.score);

		settings.areaRanges.forEach((range, areaIndex) => {
			const groundTruthEligible = areaEligibility(groundTruth, range);
			const predictionEligible = areaEligibility(predictions, range);
			const ranked = rankPredictions(scores, predictionEligible, settings.maxDetections);

			settings.iouThresholds.forEach((iouThreshold, thresholdIndex) => {
				outcomes.push({
					key: { classId, areaIndex, thresholdIndex },
					outcome: matchRanked(iou, groundTruthEligible, ranked, scores, iouThreshold),
				});
			});
		});
	}

	return outcomes;
}
