/**
 * Per-key prediction samples kept for precision–recall reconstruction.
 *
 * Every ranked prediction of every processed image is stored as a
 * (score, matched) pair in arrival order. Sorting happens on read with a stable
 * sort, so equal scores keep image order.
 */

import type { MatchDecision } from "../matching/greedy-matcher.ts";
import type { MatchKey, MatchKeySpace } from "../matching/match-key.ts";
import { precisionRecallCurve, type PrecisionRecallCurve } from "./average-precision.ts";

interface SampleCell {
	scores: number[];
	matched: boolean[];
}

export class PrecisionRecallStore {
	private cells = new Map<number, SampleCell[]>();

	constructor(private readonly keySpace: MatchKeySpace) {}

	record(key: MatchKey, decisions: readonly MatchDecision[]): void {
		if (decisions.length === 0) return;
		const cell = this.cellFor(key);
		for (const decision of decisions) {
			cell.scores.push(decision.score);
			cell.matched.push(decision.matched);
		}
	}

	/** Number of stored samples for `key`. */
	sampleCount(key: MatchKey): number {
		return this.peek(key)?.scores.length ?? 0;
	}

	/**
	 * Curve over every sample of `key`, sorted by descending score.
	 */
	curve(key: MatchKey, groundTruthCount: number): PrecisionRecallCurve {
		const cell = this.peek(key);
		if (!cell) {
			return precisionRecallCurve([], [], groundTruthCount);
		}

		const order = cell.scores.map((_, index) => index);
		order.sort((a, b) => (cell.scores[b] ?? 0) - (cell.scores[a] ?? 0));

		return precisionRecallCurve(
			order.map((index) => cell.scores[index] ?? 0),
			order.map((index) => cell.matched[index] ?? false),
			groundTruthCount,
		);
	}

	/**
	 * Append every sample of `other` after this store's own.
	 */
	merge(other: PrecisionRecallStore): void {
		for (const [classId, cells] of other.cells) {
			cells.forEach((source, cellIndex) => {
				if (source.scores.length === 0) return;
				const target = this.cellAt(classId, cellIndex);
				// No spread: a cell can exceed the engine argument limit
				for (const score of source.scores) target.scores.push(score);
				for (const matched of source.matched) target.matched.push(matched);
			});
		}
	}

	reset(): void {
		this.cells.clear();
	}

	private peek(key: MatchKey): SampleCell | undefined {
		const index = this.keySpace.cellIndex(key.areaIndex, key.thresholdIndex);
		return this.cells.get(key.classId)?.[index];
	}

	private cellFor(key: MatchKey): SampleCell {
		return this.cellAt(key.classId, this.keySpace.cellIndex(key.areaIndex, key.thresholdIndex));
	}

	private cellAt(classId: number, cellIndex: number): SampleCell {
		let cells = this.cells.get(classId);
		if (!cells) {
			cells = Array.from({ length: this.keySpace.cellsPerClass }, () => ({
				scores: [],
				matched: [],
			}));
			this.cells.set(classId, cells);
		}
		const cell = cells[cellIndex];
		if (!cell) {
			throw new RangeError(`Cell ${cellIndex} is outside the key space`);
		}
		return cell;
	}
}
