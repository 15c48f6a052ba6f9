import { describe, expect, it } from "vitest";
import { EvaluationRunner } from "./runner.ts";
import type { DatasetImage } from "./dataset.ts";
import { ValidationError } from "./errors.ts";
import { RecallMetric } from "./metrics/builtin/recall.ts";
import { MeanAveragePrecisionMetric } from "./metrics/builtin/mean-average-precision.ts";

const images: DatasetImage[] = [
	{
		id: "a",
		groundTruth: [
			[0, 0, 10, 10, 1],
			[11, 12, 30, 30, 2],
		],
		predictions: [[5, 5, 10, 10, 1, 0.9]],
	},
	{
		id: "b",
		groundTruth: [[0, 0, 10, 10, 1]],
		predictions: [
			[0, 0, 10, 10, 1, 1.0],
			[5, 5, 10, 10, 1, 0.9],
		],
	},
	{ id: "c", groundTruth: [], predictions: [] },
];

describe("EvaluationRunner", () => {
	it("streams batches through every metric", () => {
		const progress: number[] = [];
		const runner = new EvaluationRunner({ onProgress: ({ current }) => progress.push(current) });

		const result = runner.run({
			metrics: [new RecallMetric(), new MeanAveragePrecisionMetric()],
			images,
			batchSize: 2,
			runId: "run-test",
		});

		expect(result.runId).toBe("run-test");
		expect(result.totalImages).toBe(3);
		expect(result.batches).toBe(2);
		expect(progress).toEqual([2, 3]);
		expect(result.metrics.map((m) => m.name)).toEqual(["recall", "mean_average_precision"]);
		expect(result.metrics[0]?.value).toBeCloseTo(1 / 3, 12);
		expect(result.metrics[1]?.value).toBeCloseTo(51 / 202, 12);
	});

	it("gives the same result for any batch size", () => {
		const runner = new EvaluationRunner();
		const byOne = runner.run({ metrics: [new MeanAveragePrecisionMetric()], images, batchSize: 1 });
		const byAll = runner.run({ metrics: [new MeanAveragePrecisionMetric()], images, batchSize: 32 });

		expect(byOne.batches).toBe(3);
		expect(byAll.batches).toBe(1);
		expect(byOne.metrics).toEqual(byAll.metrics);
	});

	it("generates a run id when none is given", () => {
		const result = new EvaluationRunner().run({ metrics: [], images: [] });
		expect(result.runId).toMatch(/^run-\d{8}-\d{6}-[a-z0-9]+$/);
		expect(result.batches).toBe(0);
	});

	it("rejects a batch size below 1", () => {
		expect(() => new EvaluationRunner().run({ metrics: [], images, batchSize: 0 })).toThrow(RangeError);
	});

	it("names the dataset image of a rejected box", () => {
		const broken: DatasetImage[] = [
			...images,
			{ id: "bad", groundTruth: [], predictions: [[0, 0, 1, 1, 0, 2]] },
		];

		let caught: unknown;
		try {
			new EvaluationRunner().run({ metrics: [new RecallMetric()], images: broken, batchSize: 2 });
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(ValidationError);
		if (caught instanceof ValidationError) {
			expect(caught.imageIndex).toBe(3);
			expect(caught.message).toBe(
				'Image "bad": Confidence must be within [0, 1], got 2 (image 3, box 0)',
			);
		}
	});
});
