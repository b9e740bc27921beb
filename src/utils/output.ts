import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { InputFileError, errorMessage } from "../errors.js";
import { formatFileStamp } from "./dates.js";

export const OUTPUT_PREFIX = "output_";
export const MERGED_PREFIX = "merged_outputs_";

export type OutputTarget = {
	directory: string;
	/** `--custom_name`; a timestamp is used when absent */
	customName?: string;
	now?: Date;
};

/** `<directory>/output_<customName | MMDDYYYY_HHMMSS_ffffff>`, without extension. */
export function outputBasePath(target: OutputTarget): string {
	const suffix = target.customName || formatFileStamp(target.now ?? new Date());
	return path.join(target.directory, `${OUTPUT_PREFIX}${suffix}`);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
	await mkdir(path.dirname(filePath), { recursive: true });
	await writeFile(filePath, `${JSON.stringify(data, null, 4)}\n`, "utf8");
}

export type MergeResult = {
	mergedPath: string;
	sources: string[];
	keys: number;
};

/**
 * Merges every `output_*.json` object in `directory` into one file. Files are
 * taken in name order, so a key present in several files keeps the last value.
 */
export async function mergeJsonOutputs(directory: string, now = new Date()): Promise<MergeResult> {
	const entries = await readdir(directory);
	const sources = entries
		.filter((name) => name.startsWith(OUTPUT_PREFIX) && name.endsWith(".json"))
		.sort();

	const merged = new Map<string, unknown>();
	for (const name of sources) {
		const filePath = path.join(directory, name);
		let parsed: unknown;
		try {
			parsed = JSON.parse(await readFile(filePath, "utf8"));
		} catch (error) {
			throw new InputFileError(filePath, `Cannot read JSON output: ${errorMessage(error)}`, {
				cause: error,
			});
		}
		if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
			throw new InputFileError(filePath, "Output file does not contain a JSON object");
		}
		for (const [key, value] of Object.entries(parsed)) {
			merged.set(key, value);
		}
	}

	const mergedPath = path.join(directory, `${MERGED_PREFIX}${formatFileStamp(now)}.json`);
	await writeJsonFile(mergedPath, Object.fromEntries(merged));
	return { mergedPath, sources, keys: merged.size };
}
