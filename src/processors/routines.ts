import { RecordError } from "../errors.js";
import { log } from "../ui/logger.js";
import { formatDayKey } from "../utils/dates.js";
import { type SheetTable, isEmptyCell } from "../workbook/table.js";
import type { CellValue } from "../workbook/types.js";

/** Day key (DD-MM-YYYY) to category to summed minutes. */
export type RoutineTotals = Record<string, Record<string, number>>;

export type RoutineOptions = {
	startRow: number;
	/** ARGB fill to category name */
	colors: Record<string, string>;
	fallbackCategory: string;
};

function dayKey(value: CellValue): string {
	return value instanceof Date ? formatDayKey(value) : String(value).trim();
}

function minutesOf(value: CellValue, row: number): number {
	if (typeof value === "number") return value;
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		if (Number.isFinite(parsed)) return parsed;
	}
	throw new RecordError(`Duration '${String(value)}' is not a number`, row);
}

/**
 * Sums durations per day and per category, reading each row's category
 * from the fill color of its duration cell.
 */
export function extractRoutines(table: SheetTable, options: RoutineOptions): RoutineTotals {
	const dateColumn = table.requireColumn("Date");
	const durationColumn = table.requireColumn("Duration");
	const totals: RoutineTotals = {};
	const unmapped = new Set<string>();

	for (let row = options.startRow; ; row++) {
		const date = table.value(row, dateColumn);
		if (isEmptyCell(date)) break;

		const duration = table.value(row, durationColumn);
		if (table.isPlaceholder(duration)) continue;
		const minutes = minutesOf(duration, row);

		const fill = table.sheet.getFill(row, durationColumn);
		const mapped = fill !== undefined ? options.colors[fill] : undefined;
		if (mapped === undefined && fill !== undefined) unmapped.add(fill);
		const category = mapped ?? options.fallbackCategory;

		const day = (totals[dayKey(date)] ??= {});
		day[category] = (day[category] ?? 0) + minutes;
	}

	for (const day of Object.values(totals)) {
		for (const [category, minutes] of Object.entries(day)) {
			day[category] = Math.round(minutes * 100) / 100;
		}
	}

	if (unmapped.size > 0) {
		log.warn(`Fills without a category counted as '${options.fallbackCategory}'`, {
			fills: [...unmapped].join(", "),
		});
	}
	return totals;
}
