export type CellValue = string | number | boolean | Date | null;

export type WorkbookFormat = "xlsx" | "ods";

/**
 * One worksheet addressed by 1-based row and column numbers, the way
 * spreadsheet applications number them.
 */
export interface Sheet {
	readonly name: string;
	getValue(row: number, column: number): CellValue;
	setValue(row: number, column: number, value: CellValue): void;
	/** Background fill as ARGB hex (`FFFF0000`), if the cell has a solid one. */
	getFill(row: number, column: number): string | undefined;
}

export interface Workbook {
	readonly format: WorkbookFormat;
	readonly filePath: string;
	sheetNames(): string[];
	/** @throws SheetNotFoundError */
	sheet(name: string): Sheet;
	/** Writes the workbook, including any cell edits, to `filePath`. */
	save(filePath: string): Promise<void>;
}
