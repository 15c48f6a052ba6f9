/**
 * Dataset files for the CLI: ground truth and predictions per image, in JSON.
 *
 * ```json
 * { "images": [{ "id": "img-1", "groundTruth": [[0, 0, 10, 10, 1]], "predictions": [[0, 0, 10, 10, 1, 0.9]] }] }
 * ```
 *
 * Rows are checked for shape only here; box semantics are validated by the
 * metrics on update.
 */

import { readFile } from "node:fs/promises";
import { glob } from "glob";
import { z } from "zod";
import { ConfigError, configErrorFromZod } from "./errors.ts";

const RowSchema = z.array(z.number());

const DatasetImageSchema = z.object({
	id: z.union([z.string(), z.number()]).transform(String),
	groundTruth: z.array(RowSchema).default([]),
	predictions: z.array(RowSchema).default([]),
});

export const DatasetSchema = z.object({
	images: z.array(DatasetImageSchema),
});

export type DatasetImage = z.infer<typeof DatasetImageSchema>;

/**
 * Parse one dataset file's JSON text.
 * @throws ConfigError naming `source` when the text is not JSON or does not
 * match the dataset schema
 */
export function parseDataset(content: string, source = "dataset"): DatasetImage[] {
	let document: unknown;
	try {
		document = JSON.parse(content);
	} catch (error) {
		throw new ConfigError(`Invalid JSON in ${source}`, [
			`  - ${error instanceof Error ? error.message : String(error)}`,
		]);
	}

	const parsed = DatasetSchema.safeParse(document);
	if (!parsed.success) {
		throw configErrorFromZod(parsed.error, source);
	}
	return parsed.data.images;
}

/**
 * Load every dataset file matching `pattern`, in path order.
 * Images whose id was already loaded are skipped with a warning.
 */
export async function loadDataset(pattern: string): Promise<DatasetImage[]> {
	const files = (await glob(pattern, { nodir: true })).sort();
	if (files.length === 0) {
		throw new Error(`No dataset files match ${pattern}`);
	}

	const images: DatasetImage[] = [];
	const seen = new Set<string>();
	for (const file of files) {
		const content = await readFile(file, "utf8");
		for (const image of parseDataset(content, file)) {
			if (seen.has(image.id)) {
				console.warn(`⚠️  Duplicate image id "${image.id}" in ${file}, skipping`);
				continue;
			}
			seen.add(image.id);
			images.push(image);
		}
	}
	return images;
}
