import type { CellValue, Sheet } from "../workbook/types.js";

const cellKey = (row: number, column: number) => `${row}:${column}`;

/** Sheet backed by a map, for exercising processors without a file. */
export class MemorySheet implements Sheet {
	readonly writes: Array<{ row: number; column: number; value: CellValue }> = [];
	private readonly cells = new Map<string, CellValue>();
	private readonly fills = new Map<string, string>();

	/** `rows[0]` is sheet row 1. */
	constructor(
		readonly name: string,
		rows: CellValue[][] = [],
	) {
		rows.forEach((values, rowIndex) => {
			values.forEach((value, columnIndex) => {
				if (value !== null) this.cells.set(cellKey(rowIndex + 1, columnIndex + 1), value);
			});
		});
	}

	getValue(row: number, column: number): CellValue {
		return this.cells.get(cellKey(row, column)) ?? null;
	}

	setValue(row: number, column: number, value: CellValue): void {
		this.writes.push({ row, column, value });
		this.cells.set(cellKey(row, column), value);
	}

	getFill(row: number, column: number): string | undefined {
		return this.fills.get(cellKey(row, column));
	}

	setFill(row: number, column: number, argb: string): this {
		this.fills.set(cellKey(row, column), argb);
		return this;
	}

	row(row: number, width: number): CellValue[] {
		return Array.from({ length: width }, (_, index) => this.getValue(row, index + 1));
	}
}
