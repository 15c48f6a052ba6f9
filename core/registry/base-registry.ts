/**
 * BaseRegistry - keyed lookup with aliases for pluggable components.
 *
 * Used by: MetricRegistry
 *
 * @example
 * ```typescript
 * class DefinitionRegistry extends BaseRegistry<MetricDefinition> {
 *   register(definition: MetricDefinition): void {
 *     this.registerItem(definition.name, definition, definition.aliases);
 *   }
 * }
 * ```
 */

/**
 * Error thrown when a requested item is not found in the registry.
 */
export class RegistryNotFoundError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super(`${registryName}: "${key}" not found. ${available}`);
		this.name = "RegistryNotFoundError";
	}
}

/**
 * Error thrown when a key or alias is taken already.
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly conflictType: "key" | "alias",
	) {
		const type = conflictType === "key" ? "Key" : "Alias";
		super(`${registryName}: ${type} "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

export interface RegistryOptions {
	/** Name used in error messages */
	name: string;
	/** Throw on duplicate registration instead of skipping it (default: true) */
	throwOnConflict?: boolean;
}

/**
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected items = new Map<string, T>();
	protected aliasMap = new Map<string, string>(); // alias -> primary key
	protected readonly registryName: string;
	protected readonly throwOnConflict: boolean;

	constructor(options: RegistryOptions) {
		this.registryName = options.name;
		this.throwOnConflict = options.throwOnConflict ?? true;
	}

	/**
	 * Register an item under a key and optional aliases. Nothing is registered
	 * if any of them conflicts.
	 *
	 * @throws RegistryConflictError when throwOnConflict is set
	 */
	protected registerItem(key: string, item: T, aliases: readonly string[] = []): void {
		const names = [key, ...aliases];
		const taken = names.find((name) => this.has(name));
		if (taken !== undefined) {
			if (this.throwOnConflict) {
				throw new RegistryConflictError(
					taken,
					this.registryName,
					taken === key ? "key" : "alias",
				);
			}
			return;
		}

		this.items.set(key, item);
		for (const alias of aliases) {
			this.aliasMap.set(alias, key);
		}
	}

	/**
	 * Get an item by key or alias.
	 */
	get(keyOrAlias: string): T | undefined {
		return this.items.get(this.resolveAlias(keyOrAlias));
	}

	/**
	 * @throws RegistryNotFoundError if nothing is registered under `keyOrAlias`
	 */
	getOrThrow(keyOrAlias: string): T {
		const item = this.get(keyOrAlias);
		if (item === undefined) {
			throw new RegistryNotFoundError(keyOrAlias, this.registryName, this.keys());
		}
		return item;
	}

	has(keyOrAlias: string): boolean {
		return this.items.has(keyOrAlias) || this.aliasMap.has(keyOrAlias);
	}

	list(): T[] {
		return Array.from(this.items.values());
	}

	/**
	 * Primary keys, sorted alphabetically.
	 */
	keys(): string[] {
		return Array.from(this.items.keys()).sort();
	}

	/**
	 * Aliases, sorted alphabetically.
	 */
	aliases(): string[] {
		return Array.from(this.aliasMap.keys()).sort();
	}

	get size(): number {
		return this.items.size;
	}

	/**
	 * Primary key of an alias; anything else comes back unchanged.
	 */
	resolveAlias(keyOrAlias: string): string {
		return this.aliasMap.get(keyOrAlias) ?? keyOrAlias;
	}
}
