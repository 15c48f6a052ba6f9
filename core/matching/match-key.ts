/**
 * MatchKey space: the (class, area range, IoU threshold) cells statistics are
 * kept for.
 *
 * Area ranges and thresholds are fixed per metric, so each class owns a block
 * of `areaRanges.length * iouThresholds.length` cells addressed by
 * `areaIndex * thresholdCount + thresholdIndex`.
 */

import type { EvaluationSettings } from "../config.ts";

export interface MatchKey {
	classId: number;
	areaIndex: number;
	thresholdIndex: number;
}

/**
 * Human-readable form of a key, resolved against the settings.
 */
export interface MatchKeyLabel {
	classId: number;
	areaRange: string;
	iouThreshold: number;
}

export class MatchKeySpace {
	readonly thresholdCount: number;
	readonly areaCount: number;

	constructor(private readonly settings: EvaluationSettings) {
		this.thresholdCount = settings.iouThresholds.length;
		this.areaCount = settings.areaRanges.length;
	}

	/** Cells per class block. */
	get cellsPerClass(): number {
		return this.areaCount * this.thresholdCount;
	}

	/** Whether the class set is fixed at construction. */
	get hasFixedClasses(): boolean {
		return this.settings.classIds.length > 0;
	}

	/**
	 * Whether boxes of `classId` take part in evaluation.
	 */
	tracks(classId: number): boolean {
		return !this.hasFixedClasses || this.settings.classIds.includes(classId);
	}

	cellIndex(areaIndex: number, thresholdIndex: number): number {
		return areaIndex * this.thresholdCount + thresholdIndex;
	}

	/**
	 * Every key of one class, area-major.
	 */
	keysFor(classId: number): MatchKey[] {
		const keys: MatchKey[] = [];
		for (let areaIndex = 0; areaIndex < this.areaCount; areaIndex++) {
			for (let thresholdIndex = 0; thresholdIndex < this.thresholdCount; thresholdIndex++) {
				keys.push({ classId, areaIndex, thresholdIndex });
			}
		}
		return keys;
	}

	label(key: MatchKey): MatchKeyLabel {
		return {
			classId: key.classId,
			areaRange: this.settings.areaRanges[key.areaIndex]?.label ?? `area_${key.areaIndex}`,
			iouThreshold: this.settings.iouThresholds[key.thresholdIndex] ?? NaN,
		};
	}
}

/**
 * Breakdown name for a class within an area range, e.g. `class_3/small`.
 */
export function classAreaName(classId: number, areaLabel: string): string {
	return `class_${classId}/${areaLabel}`;
}
