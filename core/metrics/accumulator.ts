/**
 * Running TP/FP/FN counts per MatchKey.
 *
 * Counts only grow; `reset()` is the single way back to zero. Folding is plain
 * addition, so folds and merges commute: partial accumulators built from
 * different shards combine to the same totals in any order.
 */

import type { MatchCounts } from "../matching/greedy-matcher.ts";
import type { MatchKey, MatchKeySpace } from "../matching/match-key.ts";

interface ClassBlock {
	truePositives: number[];
	falsePositives: number[];
	falseNegatives: number[];
}

export interface AccumulatedEntry extends MatchCounts {
	key: MatchKey;
}

function checkCount(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
	}
}

export class StatAccumulator {
	private blocks = new Map<number, ClassBlock>();

	constructor(
		private readonly keySpace: MatchKeySpace,
		private readonly fixedClassIds: readonly number[] = [],
	) {
		this.allocateFixed();
	}

	/**
	 * Add counts into the cell of `key`.
	 * @throws RangeError if a count is negative or fractional
	 */
	fold(key: MatchKey, counts: MatchCounts): void {
		checkCount("truePositives", counts.truePositives);
		checkCount("falsePositives", counts.falsePositives);
		checkCount("falseNegatives", counts.falseNegatives);

		const block = this.blockFor(key.classId);
		const cell = this.keySpace.cellIndex(key.areaIndex, key.thresholdIndex);
		block.truePositives[cell] = (block.truePositives[cell] ?? 0) + counts.truePositives;
		block.falsePositives[cell] = (block.falsePositives[cell] ?? 0) + counts.falsePositives;
		block.falseNegatives[cell] = (block.falseNegatives[cell] ?? 0) + counts.falseNegatives;
	}

	/**
	 * Counts of one cell; zeros for a class never seen.
	 */
	get(key: MatchKey): MatchCounts {
		const block = this.blocks.get(key.classId);
		const cell = this.keySpace.cellIndex(key.areaIndex, key.thresholdIndex);
		return {
			truePositives: block?.truePositives[cell] ?? 0,
			falsePositives: block?.falsePositives[cell] ?? 0,
			falseNegatives: block?.falseNegatives[cell] ?? 0,
		};
	}

	/**
	 * Classes holding a block, ascending.
	 */
	classIds(): number[] {
		return Array.from(this.blocks.keys()).sort((a, b) => a - b);
	}

	entries(): AccumulatedEntry[] {
		return this.classIds().flatMap((classId) =>
			this.keySpace.keysFor(classId).map((key) => ({ key, ...this.get(key) })),
		);
	}

	/**
	 * Add every cell of `other` into this accumulator.
	 */
	merge(other: StatAccumulator): void {
		for (const entry of other.entries()) {
			this.fold(entry.key, entry);
		}
	}

	/**
	 * Zero every count. Discovered classes are forgotten; configured ones stay.
	 */
	reset(): void {
		this.blocks.clear();
		this.allocateFixed();
	}

	private allocateFixed(): void {
		for (const classId of this.fixedClassIds) {
			this.blockFor(classId);
		}
	}

	private blockFor(classId: number): ClassBlock {
		let block = this.blocks.get(classId);
		if (!block) {
			const size = this.keySpace.cellsPerClass;
			block = {
				truePositives: new Array<number>(size).fill(0),
				falsePositives: new Array<number>(size).fill(0),
				falseNegatives: new Array<number>(size).fill(0),
			};
			this.blocks.set(classId, block);
		}
		return block;
	}
}
