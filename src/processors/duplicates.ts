import { log } from "../ui/logger.js";
import type { SheetTable } from "../workbook/table.js";

/** Key to the 0-based record indices it appears at, for keys seen more than once. */
export type DuplicateReport = Record<string, number[]>;

export function findDuplicates(table: SheetTable): DuplicateReport {
	const seen = new Map<string, number[]>();
	for (const record of table.records()) {
		const key = record.key instanceof Date ? record.key.toISOString() : String(record.key);
		const indices = seen.get(key);
		if (indices) {
			indices.push(record.index);
		} else {
			seen.set(key, [record.index]);
		}
	}

	const report: DuplicateReport = {};
	for (const [key, indices] of seen) {
		if (indices.length > 1) report[key] = indices;
	}
	log.info(`Found ${Object.keys(report).length} duplicated keys`);
	return report;
}
