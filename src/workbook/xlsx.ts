import ExcelJS from "exceljs";
import type {
	CellValue as ExcelCellValue,
	Workbook as ExcelWorkbook,
	Fill,
	Worksheet,
} from "exceljs";
import { InputFileError, SheetNotFoundError, errorMessage } from "../errors.js";
import type { CellValue, Sheet, Workbook } from "./types.js";

export class XlsxSheet implements Sheet {
	constructor(private readonly worksheet: Worksheet) {}

	get name(): string {
		return this.worksheet.name;
	}

	getValue(row: number, column: number): CellValue {
		return normalizeValue(this.worksheet.getCell(row, column).value);
	}

	setValue(row: number, column: number, value: CellValue): void {
		// Assigning the value keeps the cell's style.
		this.worksheet.getCell(row, column).value = value;
	}

	getFill(row: number, column: number): string | undefined {
		const fill: Fill | undefined = this.worksheet.getCell(row, column).fill;
		if (fill?.type !== "pattern" || fill.pattern === "none") return undefined;
		return fill.fgColor?.argb?.toUpperCase();
	}
}

export class XlsxWorkbook implements Workbook {
	readonly format = "xlsx" as const;

	private constructor(
		readonly filePath: string,
		private readonly workbook: ExcelWorkbook,
	) {}

	static async open(filePath: string): Promise<XlsxWorkbook> {
		const workbook = new ExcelJS.Workbook();
		try {
			await workbook.xlsx.readFile(filePath);
		} catch (error) {
			throw new InputFileError(
				filePath,
				`Cannot read XLSX workbook: ${errorMessage(error)}`,
				{ cause: error },
			);
		}
		return new XlsxWorkbook(filePath, workbook);
	}

	sheetNames(): string[] {
		return this.workbook.worksheets.map((worksheet) => worksheet.name);
	}

	sheet(name: string): Sheet {
		const worksheet = this.workbook.getWorksheet(name);
		if (!worksheet) {
			throw new SheetNotFoundError(name, this.sheetNames());
		}
		return new XlsxSheet(worksheet);
	}

	async save(filePath: string): Promise<void> {
		await this.workbook.xlsx.writeFile(filePath);
	}
}

function normalizeValue(value: ExcelCellValue | undefined): CellValue {
	if (value === null || value === undefined) return null;
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		value instanceof Date
	) {
		return value;
	}
	if ("richText" in value) {
		return value.richText.map((run) => run.text).join("");
	}
	if ("hyperlink" in value) {
		return typeof value.text === "string" ? value.text : value.hyperlink;
	}
	if ("formula" in value || "sharedFormula" in value) {
		const result = value.result;
		if (result === undefined || (typeof result === "object" && !(result instanceof Date))) {
			return null;
		}
		return result;
	}
	// CellErrorValue (#N/A, #REF!, ...)
	return null;
}
