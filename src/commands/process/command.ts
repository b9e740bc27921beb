import { buildCommand } from "@stricli/core";

export function parseRow(input: string): number {
	const value = Number(input);
	if (!/^\d+$/.test(input.trim()) || !Number.isSafeInteger(value) || value < 1) {
		throw new SyntaxError(`Expected a positive integer, got '${input}'`);
	}
	return value;
}

export const processCommand = buildCommand({
	loader: async () => {
		const { processSheet } = await import("./impl.js");
		return processSheet;
	},
	parameters: {
		flags: {
			file: {
				kind: "parsed",
				parse: String,
				brief: "Spreadsheet to read (.xlsx or .ods), relative to the inputs directory",
			},
			sheet: {
				kind: "parsed",
				parse: String,
				brief: "Worksheet name",
			},
			links: {
				kind: "boolean",
				optional: true,
				brief: "Fetch video metadata for unprocessed links",
			},
			routines: {
				kind: "boolean",
				optional: true,
				brief: "Sum durations per day and colour category",
			},
			tags: {
				kind: "boolean",
				optional: true,
				brief: "Sort the tag columns of every row",
			},
			json: {
				kind: "boolean",
				optional: true,
				brief: "Convert the sheet to a JSON object keyed by link",
			},
			duplicates: {
				kind: "boolean",
				optional: true,
				brief: "Report keys that occur more than once",
			},
			start: {
				kind: "parsed",
				parse: parseRow,
				optional: true,
				brief: "First row to process",
			},
			end: {
				kind: "parsed",
				parse: parseRow,
				optional: true,
				brief: "Last row to process (inclusive)",
			},
			chunk: {
				kind: "parsed",
				parse: parseRow,
				optional: true,
				brief: "Maximum number of links to look up",
			},
			auto: {
				kind: "boolean",
				optional: true,
				brief: "Start at the first unprocessed link",
			},
			output: {
				kind: "boolean",
				optional: true,
				brief: "Write the result to a JSON file in the outputs directory",
			},
			custom_name: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Name used instead of a timestamp for output files",
			},
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Path to a YAML config file (default: ./watchlog.yaml)",
			},
		},
	},
	docs: {
		brief: "Run one mode over a worksheet",
		fullDescription:
			"Reads a worksheet and runs exactly one mode on it. --links and --tags save a modified copy of the workbook to the outputs directory; --json, --duplicates and --routines print their result, or write it to a file with --output.",
	},
});

