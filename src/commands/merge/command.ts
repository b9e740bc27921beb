import { buildCommand } from "@stricli/core";

export const mergeCommand = buildCommand({
	loader: async () => {
		const { merge } = await import("./impl.js");
		return merge;
	},
	parameters: {
		flags: {
			config: {
				kind: "parsed",
				parse: String,
				optional: true,
				brief: "Path to a YAML config file (default: ./watchlog.yaml)",
			},
		},
	},
	docs: {
		brief: "Merge JSON results in the outputs directory",
		fullDescription:
			"Combines every output_*.json file in the outputs directory into one merged_outputs_<timestamp>.json. Files are read in name order and later keys replace earlier ones.",
	},
});
