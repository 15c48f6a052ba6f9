#!/usr/bin/env tsx
/**
 * boxbench CLI entry point.
 * Provides commands for listing, describing, and running detection metrics.
 */

import { getDefaultRegistry } from "../core/metrics/index.ts";
import { parseArgs } from "./args.ts";
import { evalCommand } from "./eval.ts";

function printHelp(): void {
	console.log(`
╭─────────────────────────────────────────────────────────────────╮
│                           BOXBENCH                              │
│        Streaming COCO-style evaluation of box detections        │
╰─────────────────────────────────────────────────────────────────╯

Usage:
  boxbench <command> [options]

Commands:
  list              List available metrics
  describe <name>   Describe a metric
  eval              Run metrics over dataset files
  help              Show this help message

Eval options:
  --data <glob>            Dataset JSON files (or \`data\` in the config file)
  --config <file.yaml>     Run config (metrics, batchSize, metric settings)
  --metrics <names...>     Metrics to compute (default: mean_average_precision recall)
  --iou <thresholds...>    IoU thresholds, e.g. --iou 0.5 0.75
  --classes <ids...>       Class ids to evaluate (default: all classes seen)
  --max-detections <n>     Predictions kept per image and class (default: 100)
  --batch-size <n>         Images per update (default: 32)
  --run-id <id>            Run id to report
  --json                   Print the run result as JSON

Examples:
  boxbench list
  boxbench describe map
  boxbench eval --data "predictions/*.json" --metrics coco
  boxbench eval --data val.json --iou 0.5 0.75 --classes 1 2 3
  boxbench eval --config configs/val.yaml --json
`);
}

/**
 * List command - list registered metrics.
 */
function listCommand(): void {
	const registry = getDefaultRegistry();
	console.log("\nMetrics:\n");
	for (const definition of registry.list()) {
		const aliases = definition.aliases?.length ? ` (${definition.aliases.join(", ")})` : "";
		console.log(`  ${definition.name}${aliases}`);
		if (definition.description) {
			console.log(`      ${definition.description}`);
		}
	}
	console.log("");
}

function describeCommand(name: string): void {
	const definition = getDefaultRegistry().getOrThrow(name);
	console.log(`
Name:        ${definition.name}
Aliases:     ${definition.aliases?.join(", ") || "-"}
Description: ${definition.description ?? "-"}
`);
}

/**
 * Main CLI entry point.
 */
async function main(): Promise<void> {
	const parsed = parseArgs(process.argv);

	switch (parsed.command) {
		case "help":
		case "--help":
		case "-h":
			printHelp();
			break;

		case "list":
			listCommand();
			break;

		case "describe":
			if (!parsed.args[0]) {
				console.error("\n❌ Please specify a metric name.\n");
				process.exit(1);
			}
			describeCommand(parsed.args[0]);
			break;

		case "eval":
			await evalCommand(parsed.options);
			break;

		default:
			console.error(`\n❌ Unknown command: ${parsed.command}\n`);
			printHelp();
			process.exit(1);
	}
}

main().catch((error: unknown) => {
	console.error("❌ Error:", error instanceof Error ? error.message : error);
	process.exit(1);
});
