/**
 * Area-range buckets ("small", "medium", "large", ...).
 */

import type { Box } from "../boxes/types.ts";
import { boxArea } from "../boxes/geometry.ts";

export interface AreaRange {
	label: string;
	min: number;
	max: number;
	/** Closed at the top unless set to false. */
	maxInclusive: boolean;
}

/**
 * min <= area <= max, or min <= area < max for a half-open range.
 */
export function isInAreaRange(box: Box, range: AreaRange): boolean {
	const area = boxArea(box);
	if (area < range.min) return false;
	return range.maxInclusive ? area <= range.max : area < range.max;
}

/**
 * Eligibility mask of `boxes` for one area range.
 */
export function areaEligibility(boxes: readonly Box[], range: AreaRange): boolean[] {
	return boxes.map((box) => isInAreaRange(box, range));
}
