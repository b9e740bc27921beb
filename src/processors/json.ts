import { log } from "../ui/logger.js";
import { formatShortDate } from "../utils/dates.js";
import type { SheetTable } from "../workbook/table.js";
import type { CellValue } from "../workbook/types.js";

export type JsonCell = string | number | boolean | null;
export type JsonRecords = Record<string, Record<string, JsonCell>>;

export const DATE_COLUMN = "Date";

function toJsonCell(header: string, value: CellValue): JsonCell {
	if (value instanceof Date) {
		return header === DATE_COLUMN ? formatShortDate(value) : value.toISOString();
	}
	return value;
}

function keyText(value: CellValue): string {
	return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Maps each record's key to the rest of its row. When a key repeats, the
 * later row wins.
 */
export function convertToJson(table: SheetTable): JsonRecords {
	const keyHeader = table.headers[table.keyColumn - 1];
	const records: JsonRecords = {};

	for (const record of table.records()) {
		const key = keyText(record.key);
		if (key in records) {
			log.warn(`Duplicate key on row ${record.row} replaces an earlier row`, { key });
		}
		const fields: Record<string, JsonCell> = {};
		for (const [header, value] of Object.entries(record.values)) {
			if (header === keyHeader) continue;
			fields[header] = toJsonCell(header, value);
		}
		records[key] = fields;
	}

	return records;
}
