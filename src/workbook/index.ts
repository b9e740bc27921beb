import { access } from "node:fs/promises";
import path from "node:path";
import { InputFileError } from "../errors.js";
import { OdsWorkbook } from "./ods.js";
import type { Workbook, WorkbookFormat } from "./types.js";
import { XlsxWorkbook } from "./xlsx.js";

export type { CellValue, Sheet, Workbook, WorkbookFormat } from "./types.js";

const openers: Record<WorkbookFormat, (filePath: string) => Promise<Workbook>> = {
	xlsx: (filePath) => XlsxWorkbook.open(filePath),
	ods: (filePath) => OdsWorkbook.open(filePath),
};

export const SUPPORTED_FORMATS: WorkbookFormat[] = ["xlsx", "ods"];

export function detectFormat(filePath: string): WorkbookFormat | undefined {
	const extension = path.extname(filePath).slice(1).toLowerCase();
	return SUPPORTED_FORMATS.find((format) => format === extension);
}

/**
 * Opens a spreadsheet with the adapter that matches its extension.
 * @throws InputFileError when the file is missing, unsupported or malformed
 */
export async function openWorkbook(filePath: string): Promise<Workbook> {
	const format = detectFormat(filePath);
	if (!format) {
		throw new InputFileError(
			filePath,
			`Unsupported format '${path.extname(filePath) || "(none)"}', expected one of: ${SUPPORTED_FORMATS.map((f) => `.${f}`).join(", ")}`,
		);
	}

	try {
		await access(filePath);
	} catch (error) {
		throw new InputFileError(filePath, "File does not exist or is not readable", {
			cause: error,
		});
	}

	return openers[format](filePath);
}
