import { UsageError } from "../../errors.js";
import type { LinkWindow } from "../../processors/links.js";

export const MODES = ["links", "routines", "tags", "json", "duplicates"] as const;
export type Mode = (typeof MODES)[number];

export interface ProcessFlags {
	file: string;
	sheet: string;
	start?: number;
	end?: number;
	chunk?: number;
	auto?: boolean;
	output?: boolean;
	custom_name?: string;
	config?: string;
	links?: boolean;
	routines?: boolean;
	tags?: boolean;
	json?: boolean;
	duplicates?: boolean;
}

export type ProcessPlan =
	| { mode: "links"; window: LinkWindow; chunk?: number }
	| { mode: "routines"; start: number }
	| { mode: "tags" }
	| { mode: "json" }
	| { mode: "duplicates" };

function usedRangeFlags(flags: ProcessFlags): string[] {
	const used: string[] = [];
	if (flags.start !== undefined) used.push("--start");
	if (flags.end !== undefined) used.push("--end");
	if (flags.chunk !== undefined) used.push("--chunk");
	if (flags.auto) used.push("--auto");
	return used;
}

function rejectRangeFlags(mode: Mode, flags: ProcessFlags, allowed: string[] = []): void {
	const rejected = usedRangeFlags(flags).filter((flag) => !allowed.includes(flag));
	if (rejected.length > 0) {
		throw new UsageError(`--${mode} does not accept ${rejected.join(", ")}`);
	}
}

/**
 * Checks the flag combination and turns it into a plan. Nothing here touches
 * the filesystem.
 * @throws UsageError
 */
export function planProcess(flags: ProcessFlags): ProcessPlan {
	const modes = MODES.filter((mode) => flags[mode] === true);
	const [mode] = modes;
	if (mode === undefined || modes.length > 1) {
		throw new UsageError(
			`Exactly one of ${MODES.map((m) => `--${m}`).join(", ")} is required${
				modes.length > 1 ? ` (got ${modes.map((m) => `--${m}`).join(", ")})` : ""
			}`,
		);
	}

	if (flags.end !== undefined) {
		if (flags.start === undefined) throw new UsageError("--end requires --start");
		if (flags.end <= flags.start) throw new UsageError("--end must be greater than --start");
	}

	if (flags.custom_name !== undefined) {
		const name = flags.custom_name;
		if (name === "" || name.includes("/") || name.includes("\\")) {
			throw new UsageError("--custom_name must be a plain file name");
		}
	}

	switch (mode) {
		case "links":
			return planLinks(flags);
		case "routines":
			rejectRangeFlags(mode, flags, ["--start"]);
			if (flags.start === undefined) throw new UsageError("--routines requires --start");
			return { mode, start: flags.start };
		case "duplicates":
			rejectRangeFlags(mode, flags);
			if (!flags.output) throw new UsageError("--duplicates requires --output");
			return { mode };
		case "tags":
		case "json":
			rejectRangeFlags(mode, flags);
			return { mode };
	}
}

function planLinks(flags: ProcessFlags): ProcessPlan {
	const { start, end, chunk, auto } = flags;
	if (auto) {
		if (start !== undefined || end !== undefined) {
			throw new UsageError("--auto cannot be combined with --start or --end");
		}
		return { mode: "links", window: { kind: "auto" }, chunk };
	}
	if (start === undefined) {
		throw new UsageError("--links requires --auto or --start");
	}
	if (end !== undefined && chunk !== undefined) {
		throw new UsageError("--links takes either --end or --chunk after --start, not both");
	}
	if (end === undefined && chunk === undefined) {
		throw new UsageError("--links with --start requires --end or --chunk");
	}
	return { mode: "links", window: { kind: "range", start, end }, chunk };
}
