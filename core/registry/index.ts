/**
 * Registry module - keyed lookup with aliases.
 */

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
	type RegistryOptions,
} from "./base-registry.ts";
