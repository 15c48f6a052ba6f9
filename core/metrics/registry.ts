/**
 * Metric Registry - central registry of metric definitions.
 * Definitions are looked up by name or alias and instantiated per run.
 */

import type { MetricConfigInput } from "../config.ts";
import type { MetricDefinition, StreamingMetric } from "./interface.ts";
import { BaseRegistry, RegistryNotFoundError } from "../registry/index.ts";

export class MetricRegistry extends BaseRegistry<MetricDefinition> {
	constructor() {
		super({ name: "MetricRegistry", throwOnConflict: true });
	}

	/**
	 * @throws RegistryConflictError if the name or any alias is taken
	 */
	register(definition: MetricDefinition): void {
		this.registerItem(definition.name, definition, definition.aliases);
	}

	/**
	 * Instantiate one metric.
	 * @throws RegistryNotFoundError if the metric is not registered
	 */
	create(nameOrAlias: string, config?: MetricConfigInput): StreamingMetric {
		return this.getOrThrow(nameOrAlias).create(config);
	}

	/**
	 * Instantiate several metrics sharing one configuration. A metric asked for
	 * by name and by alias is created once.
	 * @throws RegistryNotFoundError before creating anything if a name is unknown
	 */
	createAll(metricNames: readonly string[], config?: MetricConfigInput): StreamingMetric[] {
		this.validateMetrics(metricNames);

		const primaryNames = Array.from(
			new Set(metricNames.map((name) => this.resolveAlias(name))),
		);
		return primaryNames.map((name) => this.create(name, config));
	}

	/**
	 * @throws RegistryNotFoundError for the first unknown name
	 */
	validateMetrics(metricNames: readonly string[]): void {
		for (const name of metricNames) {
			if (!this.has(name)) {
				throw new RegistryNotFoundError(name, this.registryName, this.keys());
			}
		}
	}

	/**
	 * Primary metric names (no aliases).
	 */
	listMetricNames(): string[] {
		return this.keys();
	}
}
