/**
 * Box geometry: areas and Intersection over Union.
 *
 * - IoU = 1.0: boxes coincide
 * - IoU = 0.0: no overlap, or either box has zero area
 */

import type { Box, ImageRows } from "./types.ts";
import { validBoxes } from "./batch.ts";

/**
 * Area of an xyxy box.
 */
export function boxArea(box: Box): number {
	return Math.max(0, box.x2 - box.x1) * Math.max(0, box.y2 - box.y1);
}

/**
 * Compute IoU between two boxes.
 */
export function intersectionOverUnion(a: Box, b: Box): number {
	const areaA = boxArea(a);
	const areaB = boxArea(b);
	if (areaA <= 0 || areaB <= 0) {
		return 0;
	}

	const width = Math.min(a.x2, b.x2) - Math.max(a.x1, b.x1);
	const height = Math.min(a.y2, b.y2) - Math.max(a.y1, b.y1);
	if (width <= 0 || height <= 0) {
		return 0; // No overlap
	}

	const intersection = width * height;
	return intersection / (areaA + areaB - intersection);
}

/**
 * Dense IoU matrix: one row per ground-truth box, one column per prediction.
 */
export function iouMatrix(
	groundTruth: readonly Box[],
	predictions: readonly Box[],
): number[][] {
	return groundTruth.map((gt) =>
		predictions.map((pred) => intersectionOverUnion(gt, pred)),
	);
}

/**
 * IoU matrix over raw rows of one image. Padding rows are dropped first and
 * never show up as rows or columns. `imageIndex` only labels validation errors.
 */
export function pairwiseIoU(
	groundTruthRows: ImageRows,
	predictionRows: ImageRows,
	imageIndex?: number,
): number[][] {
	const { groundTruth, predictions } = validBoxes(groundTruthRows, predictionRows, imageIndex);
	return iouMatrix(groundTruth, predictions);
}
