import { readFile, writeFile } from "node:fs/promises";
import { type CheerioAPI, load } from "cheerio";
import { type AnyNode, type Element, hasChildren, isTag, isText } from "domhandler";
import JSZip from "jszip";
import { InputFileError, SheetNotFoundError, errorMessage } from "../errors.js";
import type { CellValue, Sheet, Workbook } from "./types.js";

const TAG = {
	table: "table:table",
	row: "table:table-row",
	cell: "table:table-cell",
	coveredCell: "table:covered-table-cell",
	column: "table:table-column",
	paragraph: "text:p",
	heading: "text:h",
	style: "style:style",
	cellProperties: "style:table-cell-properties",
} as const;

const ROWS_REPEATED = "table:number-rows-repeated";
const COLUMNS_REPEATED = "table:number-columns-repeated";

const ROW_GROUPS = new Set([
	"table:table-header-rows",
	"table:table-rows",
	"table:table-row-group",
]);
const COLUMN_GROUPS = new Set([
	"table:table-header-columns",
	"table:table-columns",
	"table:table-column-group",
]);

const VALUE_ATTRIBUTES = [
	"office:value-type",
	"office:value",
	"office:date-value",
	"office:time-value",
	"office:boolean-value",
	"office:string-value",
	"office:currency",
	"calcext:value-type",
	"table:formula",
];

type StyleInfo = { background?: string; parent?: string };

type Run = { element: Element; repeat: number };
type RowRun = Run & { cells?: Runs<Run> };

/**
 * Consecutive elements that each stand for `repeat` logical rows or columns.
 * Lookups are by 1-based logical index; `isolate` splits a run so the index
 * gets an element of its own.
 */
class Runs<T extends Run> {
	private starts: number[] = [];
	private total = 0;

	constructor(
		private readonly $: CheerioAPI,
		private readonly runs: T[],
		private readonly repeatAttribute: string,
		private readonly create: (element: Element, repeat: number) => T,
	) {
		this.reindex();
	}

	get length(): number {
		return this.total;
	}

	locate(index: number): T | undefined {
		const position = this.find(index);
		return position ? this.runs[position.runIndex] : undefined;
	}

	isolate(index: number): T | undefined {
		const position = this.find(index);
		if (!position) return undefined;

		const { runIndex, offset } = position;
		const run = this.runs[runIndex];
		if (!run || run.repeat === 1) return run;

		const before = offset;
		const after = run.repeat - offset - 1;
		const replacement: T[] = [];

		if (before > 0) {
			const clone = this.cloneWithRepeat(run.element, before);
			this.$(clone).insertBefore(run.element);
			replacement.push(this.create(clone, before));
		}

		setRepeat(run.element, this.repeatAttribute, 1);
		run.repeat = 1;
		replacement.push(run);

		if (after > 0) {
			const clone = this.cloneWithRepeat(run.element, after);
			this.$(clone).insertAfter(run.element);
			replacement.push(this.create(clone, after));
		}

		this.runs.splice(runIndex, 1, ...replacement);
		this.reindex();
		return run;
	}

	/** Appends an empty run so that `index` exists. */
	extendTo(index: number, parent: Element, makeEmpty: (repeat: number) => Element) {
		const missing = index - this.total;
		if (missing <= 0) return;
		const element = makeEmpty(missing);
		this.$(parent).append(element);
		this.runs.push(this.create(element, missing));
		this.reindex();
	}

	private find(index: number): { runIndex: number; offset: number } | undefined {
		if (index < 1 || index > this.total) return undefined;
		let low = 0;
		let high = this.starts.length - 1;
		while (low < high) {
			const mid = (low + high + 1) >> 1;
			if ((this.starts[mid] ?? 0) <= index) {
				low = mid;
			} else {
				high = mid - 1;
			}
		}
		return { runIndex: low, offset: index - (this.starts[low] ?? 1) };
	}

	private cloneWithRepeat(element: Element, repeat: number): Element {
		const clone = this.$(element).clone()[0];
		if (!clone) throw new Error("Failed to clone spreadsheet element");
		setRepeat(clone, this.repeatAttribute, repeat);
		return clone;
	}

	private reindex() {
		this.starts = [];
		let next = 1;
		for (const run of this.runs) {
			this.starts.push(next);
			next += run.repeat;
		}
		this.total = next - 1;
	}
}

export class OdsSheet implements Sheet {
	private readonly rows: Runs<RowRun>;
	private readonly columns: Runs<Run>;

	constructor(
		private readonly $: CheerioAPI,
		private readonly table: Element,
		private readonly styles: Map<string, StyleInfo>,
	) {
		this.rows = new Runs<RowRun>(
			$,
			collect(table, TAG.row, ROW_GROUPS).map((element) => ({
				element,
				repeat: repeatOf(element, ROWS_REPEATED),
			})),
			ROWS_REPEATED,
			(element, repeat) => ({ element, repeat }),
		);
		this.columns = new Runs<Run>(
			$,
			collect(table, TAG.column, COLUMN_GROUPS).map((element) => ({
				element,
				repeat: repeatOf(element, COLUMNS_REPEATED),
			})),
			COLUMNS_REPEATED,
			(element, repeat) => ({ element, repeat }),
		);
	}

	get name(): string {
		return this.table.attribs["table:name"] ?? "";
	}

	getValue(row: number, column: number): CellValue {
		const cell = this.locateCell(row, column);
		return cell ? readCell(cell) : null;
	}

	setValue(row: number, column: number, value: CellValue): void {
		this.rows.extendTo(row, this.table, (repeat) =>
			this.createElement(TAG.row, { [ROWS_REPEATED]: repeat }, [
				this.createElement(TAG.cell),
			]),
		);
		const rowRun = this.rows.isolate(row);
		if (!rowRun) throw new Error(`Row ${row} is outside sheet '${this.name}'`);

		const cells = this.cellsOf(rowRun);
		cells.extendTo(column, rowRun.element, (repeat) =>
			this.createElement(TAG.cell, { [COLUMNS_REPEATED]: repeat }),
		);
		const cellRun = cells.isolate(column);
		if (!cellRun) throw new Error(`Column ${column} is outside sheet '${this.name}'`);

		this.writeCell(cellRun.element, value);
	}

	getFill(row: number, column: number): string | undefined {
		const cell = this.locateCell(row, column);
		const styleName =
			cell?.attribs["table:style-name"] ??
			this.columns.locate(column)?.element.attribs["table:default-cell-style-name"];
		if (!styleName) return undefined;
		const background = resolveBackground(this.styles, styleName);
		return background ? toArgb(background) : undefined;
	}

	private locateCell(row: number, column: number): Element | undefined {
		const rowRun = this.rows.locate(row);
		if (!rowRun) return undefined;
		return this.cellsOf(rowRun).locate(column)?.element;
	}

	private cellsOf(rowRun: RowRun): Runs<Run> {
		if (!rowRun.cells) {
			const elements = rowRun.element.children.filter(
				(child): child is Element =>
					isTag(child) && (child.name === TAG.cell || child.name === TAG.coveredCell),
			);
			rowRun.cells = new Runs<Run>(
				this.$,
				elements.map((element) => ({
					element,
					repeat: repeatOf(element, COLUMNS_REPEATED),
				})),
				COLUMNS_REPEATED,
				(element, repeat) => ({ element, repeat }),
			);
		}
		return rowRun.cells;
	}

	private writeCell(element: Element, value: CellValue) {
		const $cell = this.$(element);
		for (const attribute of VALUE_ATTRIBUTES) {
			$cell.removeAttr(attribute);
		}
		$cell.empty();
		if (value === null) return;

		let text: string;
		if (typeof value === "number") {
			$cell.attr("office:value-type", "float").attr("office:value", String(value));
			text = String(value);
		} else if (typeof value === "boolean") {
			$cell
				.attr("office:value-type", "boolean")
				.attr("office:boolean-value", String(value));
			text = value ? "TRUE" : "FALSE";
		} else if (value instanceof Date) {
			const iso = value.toISOString().slice(0, 19);
			$cell.attr("office:value-type", "date").attr("office:date-value", iso);
			text = iso.endsWith("T00:00:00") ? iso.slice(0, 10) : iso.replace("T", " ");
		} else {
			$cell.attr("office:value-type", "string");
			text = value;
		}

		for (const line of text.split("\n")) {
			$cell.append(this.$(`<${TAG.paragraph}/>`).text(line));
		}
	}

	private createElement(
		name: string,
		attributes: Record<string, number> = {},
		children: Element[] = [],
	): Element {
		const $element = this.$(`<${name}/>`);
		for (const [attribute, repeat] of Object.entries(attributes)) {
			if (repeat > 1) $element.attr(attribute, String(repeat));
		}
		for (const child of children) {
			$element.append(child);
		}
		const element = $element[0];
		if (!element || !isTag(element)) throw new Error(`Failed to create <${name}>`);
		return element;
	}
}

export class OdsWorkbook implements Workbook {
	readonly format = "ods" as const;
	private readonly tables: Element[];
	private readonly styles: Map<string, StyleInfo>;
	private readonly sheets = new Map<string, OdsSheet>();

	private constructor(
		readonly filePath: string,
		private readonly zip: JSZip,
		private readonly content: CheerioAPI,
		styles: CheerioAPI | undefined,
	) {
		this.tables = findAll(content.root()[0], TAG.table);
		this.styles = new Map();
		if (styles) collectStyles(styles.root()[0], this.styles);
		// Automatic styles in content.xml win over same-named ones in styles.xml.
		collectStyles(content.root()[0], this.styles);
	}

	static async open(filePath: string): Promise<OdsWorkbook> {
		let zip: JSZip;
		try {
			zip = await JSZip.loadAsync(await readFile(filePath));
		} catch (error) {
			throw new InputFileError(
				filePath,
				`Cannot read ODS workbook: ${errorMessage(error)}`,
				{ cause: error },
			);
		}

		const contentFile = zip.file("content.xml");
		if (!contentFile) {
			throw new InputFileError(filePath, "Malformed ODS workbook: content.xml is missing");
		}
		const content = load(await contentFile.async("string"), { xml: true });
		const stylesFile = zip.file("styles.xml");
		const styles = stylesFile
			? load(await stylesFile.async("string"), { xml: true })
			: undefined;

		return new OdsWorkbook(filePath, zip, content, styles);
	}

	sheetNames(): string[] {
		return this.tables.map((table) => table.attribs["table:name"] ?? "");
	}

	sheet(name: string): Sheet {
		const cached = this.sheets.get(name);
		if (cached) return cached;

		const table = this.tables.find((candidate) => candidate.attribs["table:name"] === name);
		if (!table) {
			throw new SheetNotFoundError(name, this.sheetNames());
		}
		const sheet = new OdsSheet(this.content, table, this.styles);
		this.sheets.set(name, sheet);
		return sheet;
	}

	async save(filePath: string): Promise<void> {
		this.zip.file("content.xml", this.content.xml());
		// The mimetype entry must stay first and uncompressed.
		const mimetype = this.zip.file("mimetype");
		if (mimetype) {
			this.zip.file("mimetype", await mimetype.async("string"), {
				compression: "STORE",
			});
		}
		const buffer = await this.zip.generateAsync({
			type: "nodebuffer",
			compression: "DEFLATE",
		});
		await writeFile(filePath, buffer);
	}
}

function readCell(element: Element): CellValue {
	const type = element.attribs["office:value-type"];
	switch (type) {
		case "float":
		case "percentage":
		case "currency": {
			const value = Number(element.attribs["office:value"]);
			if (Number.isFinite(value)) return value;
			break;
		}
		case "date": {
			const value = parseDateValue(element.attribs["office:date-value"]);
			if (value) return value;
			break;
		}
		case "boolean":
			return element.attribs["office:boolean-value"] === "true";
	}

	const text = element.children
		.filter(
			(child): child is Element =>
				isTag(child) && (child.name === TAG.paragraph || child.name === TAG.heading),
		)
		.map((paragraph) => textOf(paragraph))
		.join("\n");
	return text === "" ? null : text;
}

function textOf(node: AnyNode): string {
	if (isText(node)) return node.data;
	if (!isTag(node)) return "";
	switch (node.name) {
		case "text:s":
			return " ".repeat(repeatOf(node, "text:c"));
		case "text:tab":
			return "\t";
		case "text:line-break":
			return "\n";
		default:
			return node.children.map((child) => textOf(child)).join("");
	}
}

/** Dates without an offset are read as UTC, matching the XLSX adapter. */
function parseDateValue(raw: string | undefined): Date | undefined {
	if (!raw) return undefined;
	let iso = raw;
	if (/^\d{4}-\d{2}-\d{2}$/.test(raw)) {
		iso = `${raw}T00:00:00Z`;
	} else if (!/(?:Z|[+-]\d{2}:\d{2})$/.test(raw)) {
		iso = `${raw}Z`;
	}
	const date = new Date(iso);
	return Number.isNaN(date.getTime()) ? undefined : date;
}

function repeatOf(element: Element, attribute: string): number {
	const value = Number.parseInt(element.attribs[attribute] ?? "1", 10);
	return Number.isFinite(value) && value > 1 ? value : 1;
}

function setRepeat(element: Element, attribute: string, repeat: number) {
	if (repeat > 1) {
		element.attribs[attribute] = String(repeat);
	} else {
		delete element.attribs[attribute];
	}
}

/** Direct children named `name`, looking through grouping elements. */
function collect(parent: Element, name: string, groups: Set<string>): Element[] {
	const found: Element[] = [];
	for (const child of parent.children) {
		if (!isTag(child)) continue;
		if (child.name === name) {
			found.push(child);
		} else if (groups.has(child.name)) {
			found.push(...collect(child, name, groups));
		}
	}
	return found;
}

function findAll(node: AnyNode | undefined, name: string, found: Element[] = []): Element[] {
	if (!node) return found;
	if (isTag(node) && node.name === name) {
		found.push(node);
		return found;
	}
	if (hasChildren(node)) {
		for (const child of node.children) {
			findAll(child, name, found);
		}
	}
	return found;
}

function collectStyles(root: AnyNode | undefined, styles: Map<string, StyleInfo>) {
	for (const style of findAll(root, TAG.style)) {
		const name = style.attribs["style:name"];
		if (!name || style.attribs["style:family"] !== "table-cell") continue;
		const properties = style.children.find(
			(child): child is Element => isTag(child) && child.name === TAG.cellProperties,
		);
		styles.set(name, {
			background: properties?.attribs["fo:background-color"],
			parent: style.attribs["style:parent-style-name"],
		});
	}
}

function resolveBackground(
	styles: Map<string, StyleInfo>,
	name: string,
	depth = 0,
): string | undefined {
	const style = styles.get(name);
	if (!style || depth > 10) return undefined;
	if (style.background !== undefined) return style.background;
	return style.parent ? resolveBackground(styles, style.parent, depth + 1) : undefined;
}

/** `#ff0000` → `FFFF0000`; `transparent` and other keywords → undefined. */
export function toArgb(color: string): string | undefined {
	const match = /^#([0-9a-fA-F]{6})$/.exec(color.trim());
	return match?.[1] ? `FF${match[1].toUpperCase()}` : undefined;
}
