import { mkdir } from "node:fs/promises";
import path from "node:path";
import { type Config, loadConfig, requireApiKey } from "../../config.js";
import type { LocalContext } from "../../context.js";
import { WatchlogError } from "../../errors.js";
import { findDuplicates } from "../../processors/duplicates.js";
import { convertToJson } from "../../processors/json.js";
import { extractLinks } from "../../processors/links.js";
import { extractRoutines } from "../../processors/routines.js";
import { orderTags } from "../../processors/tags.js";
import { attachLogFiles, formatDuration, log } from "../../ui/logger.js";
import { statusBar } from "../../ui/status-bar.js";
import { outputBasePath, writeJsonFile } from "../../utils/output.js";
import { openWorkbook } from "../../workbook/index.js";
import { SheetTable } from "../../workbook/table.js";
import { createYoutubeCatalog } from "../../youtube/fetch.js";
import type { VideoCatalog } from "../../youtube/types.js";
import { type Mode, type ProcessFlags, type ProcessPlan, planProcess } from "./args.js";

type Writer = { write(chunk: string): unknown };

export interface ProcessDeps {
	config?: Config;
	catalog?: VideoCatalog;
	stdout?: Writer;
	now?: Date;
	/** Plan already checked by the caller */
	plan?: ProcessPlan;
}

export type ProcessOutcome = {
	mode: Mode;
	result: unknown;
	/** Modified workbook copy, for links and tags */
	workbookPath?: string;
	/** JSON result file, with --output */
	jsonPath?: string;
};

const PRINTED_MODES: ReadonlySet<Mode> = new Set(["json", "duplicates", "routines"]);
/** Modes whose result is a record map that `merge` can combine. */
const JSON_MODES: ReadonlySet<Mode> = new Set(["links", "json", "duplicates", "routines"]);

export function resolveInputPath(file: string, inputsDir: string): string {
	return path.isAbsolute(file) ? file : path.join(inputsDir, file);
}

export async function runProcess(
	flags: ProcessFlags,
	deps: ProcessDeps = {},
): Promise<ProcessOutcome> {
	const plan = deps.plan ?? planProcess(flags);
	const config = deps.config ?? (await loadConfig(flags.config));
	const run = buildRunner(plan, config, deps);

	const filePath = resolveInputPath(flags.file, config.directories.inputs);
	const workbook = await openWorkbook(filePath);
	const table = new SheetTable(workbook.sheet(flags.sheet), {
		keyColumn: config.sheet.keyColumn,
		placeholder: config.sheet.placeholder,
	});
	log.info(`Processing '${flags.sheet}' in ${path.basename(filePath)}`, { mode: plan.mode });

	const startedAt = Date.now();
	const result = await run(table);
	log.info(`Finished ${plan.mode} in ${formatDuration(Date.now() - startedAt)}`);

	const outcome: ProcessOutcome = { mode: plan.mode, result };
	const basePath = outputBasePath({
		directory: config.directories.outputs,
		customName: flags.custom_name,
		now: deps.now,
	});

	if (plan.mode === "links" || plan.mode === "tags") {
		outcome.workbookPath = `${basePath}.${workbook.format}`;
		await mkdir(config.directories.outputs, { recursive: true });
		await workbook.save(outcome.workbookPath);
		log.info(`Saved workbook to ${outcome.workbookPath}`);
	}

	if (flags.output && !JSON_MODES.has(plan.mode)) {
		log.warn(`--output has no effect with --${plan.mode}`);
	} else if (flags.output) {
		outcome.jsonPath = `${basePath}.json`;
		await writeJsonFile(outcome.jsonPath, result);
		log.info(`Wrote ${outcome.jsonPath}`);
	} else if (PRINTED_MODES.has(plan.mode)) {
		const stdout: Writer = deps.stdout ?? process.stdout;
		stdout.write(`${JSON.stringify(result, null, 4)}\n`);
	}

	return outcome;
}

type Runner = (table: SheetTable) => Promise<unknown> | unknown;

/** Resolves everything a mode needs besides the sheet, so config errors surface first. */
function buildRunner(plan: ProcessPlan, config: Config, deps: ProcessDeps): Runner {
	switch (plan.mode) {
		case "links": {
			const { window, chunk } = plan;
			const catalog =
				deps.catalog ??
				createYoutubeCatalog({
					apiKey: requireApiKey(config),
					endpoint: config.youtube.endpoint,
				});
			return async (table) => {
				const { links, failures, lookups } = await extractLinks(table, {
					catalog,
					window,
					chunk,
					idPattern: new RegExp(config.links.idPattern),
					missingMarker: config.links.missingMarker,
					progress: statusBar,
				});
				if (failures.length > 0) {
					log.warn(`${failures.length} of ${lookups} lookups failed`);
				}
				return links;
			};
		}
		case "tags":
			return (table) => orderTags(table, config.tags);
		case "json":
			return (table) => convertToJson(table);
		case "duplicates":
			return (table) => findDuplicates(table);
		case "routines": {
			const startRow = plan.start;
			return (table) =>
				extractRoutines(table, {
					startRow,
					colors: config.routines.colors,
					fallbackCategory: config.routines.fallbackCategory,
				});
		}
	}
}

export async function processSheet(this: LocalContext, flags: ProcessFlags): Promise<void> {
	try {
		// Usage errors come before the config file is read.
		const plan = planProcess(flags);
		const config = await loadConfig(flags.config);
		attachLogFiles(config.directories.logs);
		await runProcess(flags, { config, plan, stdout: this.process.stdout });
	} catch (error) {
		if (error instanceof WatchlogError) {
			log.error(error.message);
			this.process.exitCode = error.exitCode;
			return;
		}
		throw error;
	}
}
