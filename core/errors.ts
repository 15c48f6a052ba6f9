/**
 * Error types shared by the evaluation pipeline.
 */

import type { ZodError } from "zod";

/**
 * Thrown when an `update()` batch breaks the input contract.
 * No state is folded for a batch that raises this.
 */
export class ValidationError extends Error {
	constructor(
		public readonly reason: string,
		public readonly imageIndex?: number,
		public readonly boxIndex?: number,
	) {
		const location = [
			imageIndex === undefined ? undefined : `image ${imageIndex}`,
			boxIndex === undefined ? undefined : `box ${boxIndex}`,
		].filter((part): part is string => part !== undefined);
		const where = location.length > 0 ? ` (${location.join(", ")})` : "";
		super(`${reason}${where}`);
		this.name = "ValidationError";
	}
}

/**
 * Thrown at construction time when a metric configuration is unusable.
 */
export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(issues.length > 0 ? `${message}:\n${issues.join("\n")}` : message);
		this.name = "ConfigError";
	}
}

/**
 * Format Zod validation issues one per line.
 */
export function formatZodIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
}

/**
 * Wrap a ZodError into a ConfigError naming its source.
 */
export function configErrorFromZod(error: ZodError, source: string): ConfigError {
	return new ConfigError(`Validation failed for ${source}`, formatZodIssues(error));
}
