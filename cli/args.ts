/**
 * Command-line argument parsing.
 */

export type OptionValue = string | string[] | boolean;

export interface ParsedArgs {
	command: string;
	args: string[];
	options: Record<string, OptionValue>;
}

/**
 * A value is an option name when it starts with "-" and is not a number,
 * so `--classes -1` style typos still read as values.
 */
function isOptionName(arg: string): boolean {
	return arg.startsWith("-") && Number.isNaN(Number(arg));
}

/**
 * Parse `argv` (as given by process.argv) into command, positional args and
 * options. Options followed by several values collect them into an array;
 * options followed by none are boolean flags.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const args = argv.slice(2);
	const command = args[0] ?? "help";
	const restArgs: string[] = [];
	const options: Record<string, OptionValue> = {};

	for (let i = 1; i < args.length; i++) {
		const arg = args[i];
		if (!arg) continue;

		if (isOptionName(arg)) {
			const key = arg.replace(/^--?/, "");
			const values: string[] = [];
			let next = args[i + 1];
			while (next !== undefined && !isOptionName(next)) {
				values.push(next);
				i++;
				next = args[i + 1];
			}
			options[key] = values.length === 0 ? true : values.length === 1 ? (values[0] ?? true) : values;
		} else {
			restArgs.push(arg);
		}
	}

	return { command, args: restArgs, options };
}

/**
 * Option value as a list of strings. Splits comma-separated values
 * (e.g., "a,b,c" → ["a", "b", "c"]); flags give undefined.
 */
export function toStringArray(value: OptionValue | undefined): string[] | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	const values = Array.isArray(value) ? value : [value];
	return values.flatMap((v) => v.split(",").map((s) => s.trim())).filter(Boolean);
}

/**
 * Option value as a list of numbers. Unparseable entries stay NaN for the
 * config schema to reject.
 */
export function toNumberArray(value: OptionValue | undefined): number[] | undefined {
	return toStringArray(value)?.map(Number);
}

/**
 * Single string option; the last one wins when repeated.
 */
export function toStringOption(value: OptionValue | undefined): string | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	return Array.isArray(value) ? value[value.length - 1] : value;
}
