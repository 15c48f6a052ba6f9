/**
 * Configuration schemas for boxbench.
 * Defines Zod schemas for metric construction and for YAML run configs.
 */

import { z } from "zod";
import { ConfigError, configErrorFromZod } from "./errors.ts";
import type { AreaRange } from "./matching/area-filter.ts";

// ============================================================================
// Metric Configuration Schema
// ============================================================================

/**
 * Box format tags understood by the wider tooling. Only the canonical corner
 * format is evaluated; the rest must be converted before `update()`.
 */
export const BOX_FORMATS = [
	"xyxy",
	"rel_xyxy",
	"xywh",
	"rel_xywh",
	"center_xywh",
	"center_yxhw",
	"yxyx",
	"rel_yxyx",
] as const;

export type BoxFormat = (typeof BOX_FORMATS)[number];

export const CANONICAL_BOX_FORMAT = "xyxy" satisfies BoxFormat;

/** Upper bound COCO uses for "any area". */
export const MAX_AREA = 1e10;

export const DEFAULT_MAX_DETECTIONS = 100;

const AreaRangeSchema = z
	.object({
		label: z.string().min(1).optional(),
		min: z.number().min(0),
		max: z.number(),
		maxInclusive: z.boolean().default(true),
	})
	.refine((range) => range.min <= range.max, {
		message: "area range min must not exceed max",
	});

export const MetricConfigSchema = z.object({
	boxFormat: z.enum(BOX_FORMATS).default(CANONICAL_BOX_FORMAT),
	classIds: z.array(z.number().int().nonnegative()).default([]),
	areaRanges: z
		.array(AreaRangeSchema)
		.min(1, "at least one area range is required")
		.default([{ label: "all", min: 0, max: MAX_AREA }]),
	iouThresholds: z
		.array(z.number().min(0).max(1))
		.min(1, "at least one IoU threshold is required")
		.default([0.5]),
	maxDetections: z.number().int().positive().default(DEFAULT_MAX_DETECTIONS),
});

export type MetricConfigInput = z.input<typeof MetricConfigSchema>;

/**
 * Fully resolved, immutable settings a metric runs with.
 */
export interface EvaluationSettings {
	readonly boxFormat: typeof CANONICAL_BOX_FORMAT;
	/** Empty means every class seen in the data. */
	readonly classIds: readonly number[];
	readonly areaRanges: readonly AreaRange[];
	readonly iouThresholds: readonly number[];
	readonly maxDetections: number;
}

/**
 * Validate a metric configuration and resolve its defaults.
 * @throws ConfigError on any invalid setting
 */
export function resolveMetricConfig(input: MetricConfigInput = {}): EvaluationSettings {
	const parsed = MetricConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw configErrorFromZod(parsed.error, "metric config");
	}
	const config = parsed.data;

	if (config.boxFormat !== CANONICAL_BOX_FORMAT) {
		throw new ConfigError(
			`Box format "${config.boxFormat}" is not evaluated directly; convert boxes to "${CANONICAL_BOX_FORMAT}" first`,
		);
	}

	const areaRanges: AreaRange[] = config.areaRanges.map((range) => ({
		label: range.label ?? `${range.min}-${range.max}`,
		min: range.min,
		max: range.max,
		maxInclusive: range.maxInclusive,
	}));
	const labels = new Set<string>();
	for (const range of areaRanges) {
		if (labels.has(range.label)) {
			throw new ConfigError(`Duplicate area range label "${range.label}"`);
		}
		labels.add(range.label);
	}

	if (new Set(config.iouThresholds).size !== config.iouThresholds.length) {
		throw new ConfigError(
			`Duplicate IoU thresholds in [${config.iouThresholds.join(", ")}]`,
		);
	}

	return {
		boxFormat: CANONICAL_BOX_FORMAT,
		classIds: Array.from(new Set(config.classIds)),
		areaRanges,
		iouThresholds: [...config.iouThresholds],
		maxDetections: config.maxDetections,
	};
}

/**
 * Whether two resolved settings describe the same key space and matching rules.
 */
export function sameSettings(a: EvaluationSettings, b: EvaluationSettings): boolean {
	const sameList = (x: readonly number[], y: readonly number[]) =>
		x.length === y.length && x.every((value, i) => value === y[i]);

	return (
		a.maxDetections === b.maxDetections &&
		sameList(a.classIds, b.classIds) &&
		sameList(a.iouThresholds, b.iouThresholds) &&
		a.areaRanges.length === b.areaRanges.length &&
		a.areaRanges.every((range, i) => {
			const other = b.areaRanges[i];
			return (
				other !== undefined &&
				range.label === other.label &&
				range.min === other.min &&
				range.max === other.max &&
				range.maxInclusive === other.maxInclusive
			);
		})
	);
}

// ============================================================================
// Run Configuration Schema (CLI)
// ============================================================================

export const EvalConfigSchema = z.object({
	name: z.string().optional(),
	description: z.string().optional(),
	// Glob of dataset files; the CLI --data option overrides it
	data: z.string().optional(),
	metrics: z.array(z.string()).min(1).default(["mean_average_precision", "recall"]),
	batchSize: z.number().int().positive().default(32),
	metric: MetricConfigSchema.default({}),
});

export type EvalConfig = z.infer<typeof EvalConfigSchema>;
