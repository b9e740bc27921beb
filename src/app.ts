#!/usr/bin/env node
import { buildApplication, buildRouteMap, run } from "@stricli/core";
import { mergeCommand } from "./commands/merge/command.js";
import { processCommand } from "./commands/process/command.js";
import { buildContext } from "./context.js";

const routes = buildRouteMap({
	routes: {
		process: processCommand,
		merge: mergeCommand,
	},
	defaultCommand: "process",
	docs: {
		brief: "Fill watch-log spreadsheets with video metadata and summarize them.",
	},
});

export const app = buildApplication(routes, {
	name: "watchlog",
	versionInfo: {
		currentVersion: "0.1.0",
	},
});

await run(app, process.argv.slice(2), buildContext(process));
