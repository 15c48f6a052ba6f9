/**
 * Evaluation runner: streams dataset images through metrics in batches.
 */

import type { DatasetImage } from "./dataset.ts";
import { ValidationError } from "./errors.ts";
import type { MetricResult, StreamingMetric } from "./metrics/interface.ts";

export interface RunOptions {
	metrics: StreamingMetric[];
	images: readonly DatasetImage[];
	/** Images per update() call (default: 32) */
	batchSize?: number;
	runId?: string;
}

export interface RunResult {
	runId: string;
	startedAt: string;
	completedAt: string;
	totalImages: number;
	batches: number;
	metrics: MetricResult[];
}

export type ProgressCallback = (progress: {
	current: number;
	total: number;
	batch: number;
}) => void;

export class EvaluationRunner {
	private onProgress?: ProgressCallback;

	constructor(options?: { onProgress?: ProgressCallback }) {
		this.onProgress = options?.onProgress;
	}

	/**
	 * Feed every image to every metric, then read the results.
	 * @throws ValidationError naming the dataset image id of a rejected batch
	 */
	run(options: RunOptions): RunResult {
		const runId = options.runId ?? this.generateRunId();
		const batchSize = options.batchSize ?? 32;
		if (!Number.isInteger(batchSize) || batchSize < 1) {
			throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
		}

		const startedAt = new Date().toISOString();
		const total = options.images.length;
		let batches = 0;

		for (let offset = 0; offset < total; offset += batchSize) {
			const batch = options.images.slice(offset, offset + batchSize);
			const trueBoxes = batch.map((image) => image.groundTruth);
			const predBoxes = batch.map((image) => image.predictions);

			for (const metric of options.metrics) {
				try {
					metric.update(trueBoxes, predBoxes);
				} catch (error) {
					throw this.locate(error, batch, offset);
				}
			}

			batches++;
			this.onProgress?.({
				current: Math.min(offset + batchSize, total),
				total,
				batch: batches,
			});
		}

		return {
			runId,
			startedAt,
			completedAt: new Date().toISOString(),
			totalImages: total,
			batches,
			metrics: options.metrics.map((metric) => metric.result()),
		};
	}

	/**
	 * Re-point a batch-relative ValidationError at the dataset image.
	 */
	private locate(error: unknown, batch: readonly DatasetImage[], offset: number): unknown {
		if (!(error instanceof ValidationError) || error.imageIndex === undefined) {
			return error;
		}
		const image = batch[error.imageIndex];
		return new ValidationError(
			`Image "${image?.id ?? "?"}": ${error.reason}`,
			offset + error.imageIndex,
			error.boxIndex,
		);
	}

	private generateRunId(): string {
		const date = new Date();
		const datePart = date.toISOString().slice(0, 10).replace(/-/g, "");
		const timePart = date.toISOString().slice(11, 19).replace(/:/g, "");
		const randomPart = Math.random().toString(36).substring(2, 6);
		return `run-${datePart}-${timePart}-${randomPart}`;
	}
}
