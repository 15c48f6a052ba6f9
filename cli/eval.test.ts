import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { evalCommand, resolveEvalSettings } from "./eval.ts";
import { EvalConfigSchema } from "../core/config.ts";
import { RegistryNotFoundError } from "../core/registry/index.ts";

describe("resolveEvalSettings", () => {
	it("uses defaults around the dataset option", () => {
		expect(resolveEvalSettings({ data: "val.json" })).toEqual({
			dataPattern: "val.json",
			metricNames: ["mean_average_precision", "recall"],
			batchSize: 32,
			metricConfig: {},
			json: false,
			runId: undefined,
		});
	});

	it("lets options override the config file", () => {
		const fileConfig = EvalConfigSchema.parse({
			data: "from-file/*.json",
			metrics: ["coco"],
			batchSize: 4,
			metric: { classIds: [1], iouThresholds: [0.5] },
		});

		const settings = resolveEvalSettings(
			{ iou: ["0.5", "0.75"], "max-detections": "10", "batch-size": "8", json: true },
			fileConfig,
		);

		expect(settings.dataPattern).toBe("from-file/*.json");
		expect(settings.metricNames).toEqual(["coco"]);
		expect(settings.batchSize).toBe(8);
		expect(settings.json).toBe(true);
		expect(settings.metricConfig.classIds).toEqual([1]);
		expect(settings.metricConfig.iouThresholds).toEqual([0.5, 0.75]);
		expect(settings.metricConfig.maxDetections).toBe(10);
	});

	it("requires a dataset", () => {
		expect(() => resolveEvalSettings({})).toThrow("No dataset specified");
	});
});

describe("evalCommand", () => {
	let dir: string | undefined;

	afterEach(async () => {
		vi.restoreAllMocks();
		if (dir) await rm(dir, { recursive: true, force: true });
		dir = undefined;
	});

	it("prints the run result as JSON", async () => {
		dir = await mkdtemp(join(tmpdir(), "boxbench-eval-"));
		const data = join(dir, "val.json");
		await writeFile(
			data,
			JSON.stringify({
				images: [
					{ id: "a", groundTruth: [[0, 0, 10, 10, 1]], predictions: [[0, 0, 10, 10, 1, 0.9]] },
					{ id: "b", groundTruth: [[0, 0, 10, 10, 2]], predictions: [] },
				],
			}),
		);
		const log = vi.spyOn(console, "log").mockImplementation(() => {});

		await evalCommand({ data, metrics: "recall", json: true, "run-id": "run-json" });

		expect(log).toHaveBeenCalledTimes(1);
		const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
		expect(printed).toMatchObject({
			runId: "run-json",
			totalImages: 2,
			batches: 1,
			metrics: [{ name: "recall", value: 0.5, breakdown: { "class_1/all": 1, "class_2/all": 0 } }],
		});
	});

	it("rejects unknown metrics before reading data", async () => {
		await expect(
			evalCommand({ data: "/nonexistent/*.json", metrics: "nope", json: true }),
		).rejects.toThrow(RegistryNotFoundError);
	});
});
