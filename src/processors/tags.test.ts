import { describe, expect, it } from "vitest";
import { RecordError } from "../errors.js";
import { MemorySheet } from "../testing/memory-sheet.js";
import { SheetTable } from "../workbook/table.js";
import { orderTagValues, orderTags } from "./tags.js";

function buildTable() {
	const sheet = new MemorySheet("Log", [
		["Date", "Link", "Tag 1", "Tag 2", "Tag 3"],
		["mon", "l1", "rock", ".", "ambient"],
		["tue", "l2", "b", "a", null],
		["wed", "l3", "jazz", ".", "."],
		["thu", "l4", null, "ignored", "."],
		["fri", "l5", "z", "y", "x"],
	]);
	return { sheet, table: new SheetTable(sheet, { keyColumn: 2, placeholder: "." }) };
}

describe("orderTagValues", () => {
	it("sorts by code point and pads with the placeholder", () => {
		expect(orderTagValues(["alpha", ".", "Zed"], ".", [])).toEqual(["Zed", "alpha", "."]);
	});

	it("puts priority tags first, in priority order", () => {
		expect(orderTagValues(["a", "news", "b", "music"], ".", ["music", "news"])).toEqual([
			"music",
			"news",
			"a",
			"b",
		]);
	});

	it("compares numbers by their text", () => {
		expect(orderTagValues([9, 10], ".", [])).toEqual([10, 9]);
	});
});

describe("orderTags", () => {
	it("rewrites rows until the first tag cell is empty", () => {
		const { sheet, table } = buildTable();

		const result = orderTags(table, { headerMatch: "Tag", priority: ["rock"] });

		expect(result).toEqual({ tagColumns: [3, 4, 5], rowsVisited: 3, rowsChanged: 2 });
		expect(sheet.row(2, 5)).toEqual(["mon", "l1", "rock", "ambient", "."]);
		expect(sheet.row(3, 5)).toEqual(["tue", "l2", "a", "b", "."]);
		expect(sheet.row(4, 5)).toEqual(["wed", "l3", "jazz", ".", "."]);
		expect(sheet.row(6, 5)).toEqual(["fri", "l5", "z", "y", "x"]);
	});

	it("is idempotent", () => {
		const { sheet, table } = buildTable();
		orderTags(table, { headerMatch: "Tag", priority: [] });
		const afterFirst = [2, 3, 4].map((row) => sheet.row(row, 5));
		const writes = sheet.writes.length;

		const second = orderTags(table, { headerMatch: "Tag", priority: [] });

		expect(second.rowsChanged).toBe(0);
		expect(sheet.writes).toHaveLength(writes);
		expect([2, 3, 4].map((row) => sheet.row(row, 5))).toEqual(afterFirst);
	});

	it("fails when no header matches", () => {
		const { table } = buildTable();
		expect(() => orderTags(table, { headerMatch: "Label", priority: [] })).toThrow(RecordError);
	});
});
