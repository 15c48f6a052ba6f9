/**
 * Batch normalization: the one place that knows about padding.
 *
 * Everything downstream (geometry, matching, accumulation) sees only valid
 * boxes. A jagged batch and the same batch padded to a fixed length with
 * PADDING_VALUE rows normalize to identical `ImageBoxes`.
 */

import { ValidationError } from "../errors.ts";
import {
	GROUND_TRUTH_ROW_LENGTH,
	PADDING_VALUE,
	PREDICTION_ROW_LENGTH,
	type BatchRows,
	type BoxRow,
	type GroundTruthBox,
	type ImageBoxes,
	type ImageRows,
	type PredictedBox,
} from "./types.ts";

/**
 * A row is padding when its four coordinates and its class all hold PADDING_VALUE.
 */
export function isPaddingRow(row: BoxRow): boolean {
	if (row.length < GROUND_TRUTH_ROW_LENGTH) return false;
	for (let i = 0; i < GROUND_TRUTH_ROW_LENGTH; i++) {
		if (row[i] !== PADDING_VALUE) return false;
	}
	return true;
}

interface ParsedCorners {
	x1: number;
	y1: number;
	x2: number;
	y2: number;
	classId: number;
}

function parseCorners(
	row: BoxRow,
	expectedLength: number,
	kind: string,
	imageIndex: number | undefined,
	boxIndex: number,
): ParsedCorners {
	if (row.length !== expectedLength) {
		throw new ValidationError(
			`Malformed ${kind} box: expected ${expectedLength} values, got ${row.length}`,
			imageIndex,
			boxIndex,
		);
	}

	const [x1 = NaN, y1 = NaN, x2 = NaN, y2 = NaN, classId = NaN] = row;
	if (![x1, y1, x2, y2].every(Number.isFinite)) {
		throw new ValidationError(
			`Malformed ${kind} box: coordinates must be finite numbers`,
			imageIndex,
			boxIndex,
		);
	}
	if (x2 < x1 || y2 < y1) {
		throw new ValidationError(
			`Malformed ${kind} box: expected x2 >= x1 and y2 >= y1, got [${x1}, ${y1}, ${x2}, ${y2}]`,
			imageIndex,
			boxIndex,
		);
	}
	if (!Number.isInteger(classId) || classId < 0) {
		throw new ValidationError(
			`Malformed ${kind} box: class id must be a non-negative integer, got ${classId}`,
			imageIndex,
			boxIndex,
		);
	}

	return { x1, y1, x2, y2, classId };
}

/**
 * Validate the rows of one image and return its valid boxes, padding dropped.
 * Box indices count valid rows only, so padding never shifts them.
 *
 * @throws ValidationError on the first malformed row, naming `imageIndex`
 * when given
 */
export function validBoxes(
	groundTruthRows: ImageRows,
	predictionRows: ImageRows,
	imageIndex?: number,
): ImageBoxes {
	const groundTruth: GroundTruthBox[] = [];
	groundTruthRows.forEach((row, rowIndex) => {
		if (isPaddingRow(row)) return;
		const corners = parseCorners(
			row,
			GROUND_TRUTH_ROW_LENGTH,
			"ground-truth",
			imageIndex,
			rowIndex,
		);
		groundTruth.push({ ...corners, index: groundTruth.length });
	});

	const predictions: PredictedBox[] = [];
	predictionRows.forEach((row, rowIndex) => {
		if (isPaddingRow(row)) return;
		const corners = parseCorners(
			row,
			PREDICTION_ROW_LENGTH,
			"predicted",
			imageIndex,
			rowIndex,
		);
		const score = row[GROUND_TRUTH_ROW_LENGTH] ?? NaN;
		if (!(score >= 0 && score <= 1)) {
			throw new ValidationError(
				`Confidence must be within [0, 1], got ${score}`,
				imageIndex,
				rowIndex,
			);
		}
		predictions.push({ ...corners, score, index: predictions.length });
	});

	return { groundTruth, predictions };
}

/**
 * Validate a whole batch before any of it is used.
 *
 * @throws ValidationError on mismatched batch lengths or any malformed row
 */
export function normalizeBatch(
	trueBoxes: BatchRows,
	predBoxes: BatchRows,
): ImageBoxes[] {
	if (trueBoxes.length !== predBoxes.length) {
		throw new ValidationError(
			`Batch size mismatch: ${trueBoxes.length} ground-truth images vs ${predBoxes.length} prediction images`,
		);
	}

	return trueBoxes.map((groundTruthRows, imageIndex) =>
		validBoxes(groundTruthRows, predBoxes[imageIndex] ?? [], imageIndex),
	);
}
