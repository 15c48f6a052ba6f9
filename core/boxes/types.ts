/**
 * Box and batch types.
 *
 * Raw input arrives as numeric rows (`[x1, y1, x2, y2, class]` for ground truth,
 * `[x1, y1, x2, y2, class, confidence]` for predictions) grouped per image.
 * `normalizeBatch()` turns those rows into the structured types below.
 */

/** One raw box row. */
export type BoxRow = readonly number[];

/** Rows of one image, jagged or padded with the sentinel value. */
export type ImageRows = readonly BoxRow[];

/** batch → image → row */
export type BatchRows = readonly ImageRows[];

/** Value marking a padding row when it fills all four coordinates and the class. */
export const PADDING_VALUE = -1;

export const GROUND_TRUTH_ROW_LENGTH = 5;
export const PREDICTION_ROW_LENGTH = 6;

/**
 * Axis-aligned box in the canonical corner (xyxy) format.
 */
export interface Box {
	x1: number;
	y1: number;
	x2: number;
	y2: number;
}

export interface GroundTruthBox extends Box {
	classId: number;
	/** Row index within the image after padding is dropped. */
	index: number;
}

export interface PredictedBox extends Box {
	classId: number;
	/** Confidence in [0, 1]. */
	score: number;
	/** Row index within the image after padding is dropped. */
	index: number;
}

/**
 * Valid boxes of one image.
 */
export interface ImageBoxes {
	groundTruth: GroundTruthBox[];
	predictions: PredictedBox[];
}
