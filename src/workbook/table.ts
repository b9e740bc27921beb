import { RecordError } from "../errors.js";
import type { CellValue, Sheet } from "./types.js";

export const HEADER_ROW = 1;
export const FIRST_DATA_ROW = 2;

export type TableOptions = {
	/** 1-based column holding each record's key (the link) */
	keyColumn: number;
	placeholder: string;
};

export type SheetRecord = {
	/** 1-based sheet row */
	row: number;
	/** 0-based position among the records */
	index: number;
	key: CellValue;
	values: Record<string, CellValue>;
};

export function isEmptyCell(value: CellValue): value is null | "" {
	return value === null || value === "";
}

/**
 * Header-addressed view of a sheet: row 1 holds the column names, records
 * start on row 2 and run until the key column has an empty cell.
 */
export class SheetTable {
	readonly headers: string[];
	private dataEndRow: number | undefined;

	constructor(
		readonly sheet: Sheet,
		readonly options: TableOptions,
	) {
		this.headers = [];
		for (let column = 1; ; column++) {
			const value = sheet.getValue(HEADER_ROW, column);
			if (isEmptyCell(value)) break;
			this.headers.push(String(value).trim());
		}
	}

	get keyColumn(): number {
		return this.options.keyColumn;
	}

	column(name: string): number | undefined {
		const index = this.headers.indexOf(name);
		return index === -1 ? undefined : index + 1;
	}

	requireColumn(name: string): number {
		const column = this.column(name);
		if (column === undefined) {
			throw new RecordError(`Column '${name}' not found in sheet '${this.sheet.name}'`);
		}
		return column;
	}

	/** 1-based columns whose header contains `fragment`. */
	columnsMatching(fragment: string): number[] {
		return this.headers.flatMap((header, index) =>
			header.includes(fragment) ? [index + 1] : [],
		);
	}

	value(row: number, column: number): CellValue {
		return this.sheet.getValue(row, column);
	}

	key(row: number): CellValue {
		return this.sheet.getValue(row, this.keyColumn);
	}

	isPlaceholder(value: CellValue): boolean {
		return value === this.options.placeholder;
	}

	/** First row after the records, i.e. the exclusive end of the data. */
	dataEnd(): number {
		if (this.dataEndRow === undefined) {
			let row = FIRST_DATA_ROW;
			while (!isEmptyCell(this.key(row))) row++;
			this.dataEndRow = row;
		}
		return this.dataEndRow;
	}

	*records(): Generator<SheetRecord> {
		const end = this.dataEnd();
		for (let row = FIRST_DATA_ROW; row < end; row++) {
			yield this.record(row);
		}
	}

	record(row: number): SheetRecord {
		const values: Record<string, CellValue> = {};
		this.headers.forEach((header, index) => {
			values[header] = this.sheet.getValue(row, index + 1);
		});
		return { row, index: row - FIRST_DATA_ROW, key: this.key(row), values };
	}
}
