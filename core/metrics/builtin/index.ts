/**
 * Built-in metric definitions, registered by default in the global registry.
 *
 * - recall                  TP / (TP + FN) per class and area range
 * - mean_average_precision  101-point interpolated AP, averaged
 * - coco                    the standard COCO summary values
 */

export * from "./recall.ts";
export * from "./mean-average-precision.ts";
export * from "./coco.ts";

import type { MetricDefinition } from "../interface.ts";
import { BoxCocoMetrics } from "./coco.ts";
import { MeanAveragePrecisionMetric } from "./mean-average-precision.ts";
import { RecallMetric } from "./recall.ts";

export function getBuiltinMetrics(): MetricDefinition[] {
	return [
		{
			name: "recall",
			aliases: ["box_recall"],
			description: "Recall per class and area range, averaged over IoU thresholds",
			create: (config) => new RecallMetric(config),
		},
		{
			name: "mean_average_precision",
			aliases: ["map", "mAP"],
			description: "Mean of 101-point interpolated AP over classes, area ranges and IoU thresholds",
			create: (config) => new MeanAveragePrecisionMetric(config),
		},
		{
			name: "coco",
			aliases: ["box_coco_metrics"],
			description: "COCO summary: MaP at IoU 0.50:0.95, 0.50, 0.75, by area, and recall by detection limit",
			// The suite fixes thresholds, areas and limits itself
			create: (config) =>
				new BoxCocoMetrics({ boxFormat: config?.boxFormat, classIds: config?.classIds }),
		},
	];
}
