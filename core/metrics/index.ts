/**
 * Metrics module - exports registry, interfaces, and built-in metrics.
 *
 * Metric definitions are registered once; each run creates fresh metric
 * instances from them.
 */

export * from "./interface.ts";
export * from "./registry.ts";
export * from "./accumulator.ts";
export * from "./average-precision.ts";
export * from "./pr-store.ts";
export * from "./box-metric.ts";
export * from "./builtin/index.ts";

import { MetricRegistry } from "./registry.ts";
import { getBuiltinMetrics } from "./builtin/index.ts";
import type { MetricConfigInput } from "../config.ts";
import type { StreamingMetric } from "./interface.ts";

let _defaultRegistry: MetricRegistry | null = null;

/**
 * Default registry with every built-in metric. Singleton.
 */
export function getDefaultRegistry(): MetricRegistry {
	if (!_defaultRegistry) {
		_defaultRegistry = createRegistry();
	}
	return _defaultRegistry;
}

/**
 * New registry with the built-in metrics, for callers that register their own.
 */
export function createRegistry(): MetricRegistry {
	const registry = new MetricRegistry();
	for (const definition of getBuiltinMetrics()) {
		registry.register(definition);
	}
	return registry;
}

/**
 * Create metrics from the default registry.
 */
export function createMetrics(
	metricNames: readonly string[] = ["mean_average_precision"],
	config?: MetricConfigInput,
): StreamingMetric[] {
	return getDefaultRegistry().createAll(metricNames, config);
}

export function getAvailableMetrics(): string[] {
	return getDefaultRegistry().listMetricNames();
}
