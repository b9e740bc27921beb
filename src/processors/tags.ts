import { RecordError } from "../errors.js";
import { log } from "../ui/logger.js";
import { FIRST_DATA_ROW, type SheetTable, isEmptyCell } from "../workbook/table.js";
import type { CellValue } from "../workbook/types.js";

export type TagOrderOptions = {
	/** Substring identifying tag columns in the header row */
	headerMatch: string;
	/** Tags that sort ahead of all others, in this order */
	priority: string[];
};

export type TagsResult = {
	tagColumns: number[];
	rowsVisited: number;
	rowsChanged: number;
};

function tagText(value: CellValue): string {
	return value instanceof Date ? value.toISOString() : String(value);
}

export function compareTags(priority: string[]): (a: CellValue, b: CellValue) => number {
	const rank = new Map(priority.map((tag, index) => [tag, index]));
	return (a, b) => {
		const left = tagText(a);
		const right = tagText(b);
		const leftRank = rank.get(left);
		const rightRank = rank.get(right);
		if (leftRank !== undefined && rightRank !== undefined) return leftRank - rightRank;
		if (leftRank !== undefined) return -1;
		if (rightRank !== undefined) return 1;
		if (left === right) return 0;
		return left < right ? -1 : 1;
	};
}

/**
 * Sorts a row's tags and pads the remaining slots with the placeholder, so
 * the result is as wide as the input.
 */
export function orderTagValues(
	values: CellValue[],
	placeholder: string,
	priority: string[],
): CellValue[] {
	const tags = values.filter((value) => value !== placeholder && !isEmptyCell(value));
	tags.sort(compareTags(priority));
	return values.map((_, index) => tags[index] ?? placeholder);
}

/** Rewrites every tag row in sorted order, touching only cells that move. */
export function orderTags(table: SheetTable, options: TagOrderOptions): TagsResult {
	const tagColumns = table.columnsMatching(options.headerMatch);
	const [firstTagColumn] = tagColumns;
	if (firstTagColumn === undefined) {
		throw new RecordError(
			`No columns with '${options.headerMatch}' in their header in sheet '${table.sheet.name}'`,
		);
	}

	const result: TagsResult = { tagColumns, rowsVisited: 0, rowsChanged: 0 };
	for (let row = FIRST_DATA_ROW; !isEmptyCell(table.value(row, firstTagColumn)); row++) {
		result.rowsVisited++;
		const current = tagColumns.map((column) => table.value(row, column));
		const ordered = orderTagValues(current, table.options.placeholder, options.priority);

		let changed = false;
		tagColumns.forEach((column, index) => {
			const value = ordered[index] ?? null;
			if (value !== current[index]) {
				table.sheet.setValue(row, column, value);
				changed = true;
			}
		});
		if (changed) result.rowsChanged++;
	}

	log.info(`Ordered tags in ${result.rowsChanged} of ${result.rowsVisited} rows`);
	return result;
}
