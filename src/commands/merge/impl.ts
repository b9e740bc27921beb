import { existsSync } from "node:fs";
import { loadConfig } from "../../config.js";
import type { LocalContext } from "../../context.js";
import { InputFileError, WatchlogError } from "../../errors.js";
import { attachLogFiles, log } from "../../ui/logger.js";
import { type MergeResult, mergeJsonOutputs } from "../../utils/output.js";

interface MergeCommandFlags {
	config?: string;
}

export async function runMerge(outputsDir: string, now = new Date()): Promise<MergeResult> {
	if (!existsSync(outputsDir)) {
		throw new InputFileError(outputsDir, "Outputs directory does not exist");
	}
	const result = await mergeJsonOutputs(outputsDir, now);
	if (result.sources.length === 0) {
		log.warn("No output files to merge", { directory: outputsDir });
	}
	log.info(`Merged ${result.sources.length} files (${result.keys} keys) into ${result.mergedPath}`);
	return result;
}

export async function merge(this: LocalContext, flags: MergeCommandFlags): Promise<void> {
	try {
		const config = await loadConfig(flags.config);
		attachLogFiles(config.directories.logs);
		await runMerge(config.directories.outputs);
	} catch (error) {
		if (error instanceof WatchlogError) {
			log.error(error.message);
			this.process.exitCode = error.exitCode;
			return;
		}
		throw error;
	}
}
