/**
 * Loads YAML run configs.
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { EvalConfigSchema, type EvalConfig } from "./config.ts";
import { configErrorFromZod } from "./errors.ts";

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax; unset variables without a
 * default are left as written.
 */
export function interpolateEnvVars(
	value: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	return value.replace(
		/\$\{(\w+)(?::-([^}]*))?\}/g,
		(match: string, name: string, defaultValue?: string) => {
			const envVal = env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}
			return defaultValue ?? match;
		},
	);
}

/**
 * Recursively interpolate environment variables in parsed YAML.
 */
function interpolateEnvVarsInObject(obj: unknown, env: NodeJS.ProcessEnv): unknown {
	if (typeof obj === "string") {
		return interpolateEnvVars(obj, env);
	}
	if (Array.isArray(obj)) {
		return obj.map((item) => interpolateEnvVarsInObject(item, env));
	}
	if (obj !== null && typeof obj === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(obj)) {
			result[key] = interpolateEnvVarsInObject(value, env);
		}
		return result;
	}
	return obj;
}

/**
 * Parse YAML text into a validated run config.
 * @throws ConfigError listing every schema issue
 */
export function parseEvalConfig(
	content: string,
	source = "config",
	env: NodeJS.ProcessEnv = process.env,
): EvalConfig {
	const raw: unknown = parse(content) ?? {};
	const parsed = EvalConfigSchema.safeParse(interpolateEnvVarsInObject(raw, env));
	if (!parsed.success) {
		throw configErrorFromZod(parsed.error, source);
	}
	return parsed.data;
}

export async function loadEvalConfig(filePath: string): Promise<EvalConfig> {
	const content = await readFile(filePath, "utf8");
	return parseEvalConfig(content, filePath);
}
