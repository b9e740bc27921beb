import { describe, expect, it } from "vitest";
import { DEFAULT_ID_PATTERN } from "../config.js";
import { LookupError, RecordError } from "../errors.js";
import { MemorySheet } from "../testing/memory-sheet.js";
import { SheetTable } from "../workbook/table.js";
import type { CellValue } from "../workbook/types.js";
import type { VideoCatalog, VideoMetadata } from "../youtube/types.js";
import { type ExtractLinksOptions, type ProgressReporter, extractLinks, toLinkInfo } from "./links.js";

const HEADERS = ["Date", "Link", "Title", "Duration", "Published", "Author", "Exist"];
const OPEN: CellValue[] = [".", ".", ".", ".", "."];

function buildTable(rows: CellValue[][]) {
	const sheet = new MemorySheet("Log", [HEADERS, ...rows]);
	return { sheet, table: new SheetTable(sheet, { keyColumn: 2, placeholder: "." }) };
}

function video(videoId: string, overrides: Partial<VideoMetadata> = {}): VideoMetadata {
	return {
		videoId,
		title: `Video ${videoId}`,
		durationMinutes: 12.35,
		publishedAt: new Date("2023-01-02T03:04:05Z"),
		channel: "Test Channel",
		...overrides,
	};
}

class FakeCatalog implements VideoCatalog {
	readonly calls: string[] = [];

	constructor(private readonly responses: Record<string, VideoMetadata | null | Error> = {}) {}

	async lookup(videoId: string): Promise<VideoMetadata | null> {
		this.calls.push(videoId);
		const response = this.responses[videoId];
		if (response instanceof Error) throw response;
		return response === undefined ? video(videoId) : response;
	}
}

function options(catalog: VideoCatalog, overrides: Partial<ExtractLinksOptions> = {}): ExtractLinksOptions {
	return {
		catalog,
		window: { kind: "auto" },
		idPattern: new RegExp(DEFAULT_ID_PATTERN),
		missingMarker: "non-existent",
		...overrides,
	};
}

const ROWS: CellValue[][] = [
	["mon", "https://youtu.be/aaaaaaaaaaa", ...OPEN],
	["mon", "https://www.youtube.com/watch?v=bbbbbbbbbbb", "Seen", 3, "00:00:00 01-01-2020", "Someone", "."],
	["tue", "https://youtu.be/ccccccccccc", ...OPEN],
	["tue", "not a link", ...OPEN],
	["wed", "https://www.youtube.com/shorts/ddddddddddd", ...OPEN],
];

describe("extractLinks", () => {
	it("fills placeholder cells for unprocessed links in an inclusive range", async () => {
		const { sheet, table } = buildTable(ROWS);
		const catalog = new FakeCatalog();

		const result = await extractLinks(table, options(catalog, { window: { kind: "range", start: 2, end: 4 } }));

		expect(catalog.calls).toEqual(["aaaaaaaaaaa", "ccccccccccc"]);
		expect(result.window).toEqual({ start: 2, end: 5 });
		expect(sheet.row(2, 7)).toEqual([
			"mon",
			"https://youtu.be/aaaaaaaaaaa",
			"Video aaaaaaaaaaa",
			12.35,
			"03:04:05 02-01-2023",
			"Test Channel",
			".",
		]);
		expect(sheet.row(3, 7)).toEqual(ROWS[1]);
		expect(Object.keys(result.links)).toEqual([
			"https://youtu.be/aaaaaaaaaaa",
			"https://youtu.be/ccccccccccc",
		]);
		expect(result.links["https://youtu.be/ccccccccccc"]).toEqual({
			Title: "Video ccccccccccc",
			Duration: 12.35,
			Published: "03:04:05 02-01-2023",
			Author: "Test Channel",
			Exist: null,
		});
	});

	it("sends at most chunk lookups", async () => {
		const { table } = buildTable(ROWS);
		const catalog = new FakeCatalog();

		const result = await extractLinks(table, options(catalog, { chunk: 2 }));

		expect(catalog.calls).toEqual(["aaaaaaaaaaa", "ccccccccccc"]);
		expect(result.lookups).toBe(2);
	});

	it("starts from the given row and runs to the data end", async () => {
		const { table } = buildTable(ROWS);
		const catalog = new FakeCatalog();

		const result = await extractLinks(
			table,
			options(catalog, { window: { kind: "range", start: 3 }, chunk: 5 }),
		);

		expect(catalog.calls).toEqual(["ccccccccccc", "ddddddddddd"]);
		expect(result.window).toEqual({ start: 3, end: 7 });
	});

	it("auto mode starts at the first unprocessed link", async () => {
		const { table } = buildTable([
			["mon", "https://youtu.be/bbbbbbbbbbb", "Seen", 3, "x", "Someone", "."],
			["tue", "https://youtu.be/ccccccccccc", ...OPEN],
		]);
		const catalog = new FakeCatalog();

		const result = await extractLinks(table, options(catalog));

		expect(result.window).toEqual({ start: 3, end: 4 });
		expect(catalog.calls).toEqual(["ccccccccccc"]);
	});

	it("does nothing when no link is unprocessed", async () => {
		const { sheet, table } = buildTable([
			["mon", "https://youtu.be/bbbbbbbbbbb", "Seen", 3, "x", "Someone", "."],
		]);
		const catalog = new FakeCatalog();

		const result = await extractLinks(table, options(catalog));

		expect(result).toEqual({ links: {}, failures: [], lookups: 0, window: null });
		expect(catalog.calls).toEqual([]);
		expect(sheet.writes).toEqual([]);
	});

	it("marks videos the catalog does not know", async () => {
		const { sheet, table } = buildTable([["mon", "https://youtu.be/aaaaaaaaaaa", ...OPEN]]);
		const catalog = new FakeCatalog({ aaaaaaaaaaa: null });

		await extractLinks(table, options(catalog));

		expect(sheet.row(2, 7)).toEqual([
			"mon",
			"https://youtu.be/aaaaaaaaaaa",
			".",
			".",
			".",
			".",
			"non-existent",
		]);
	});

	it("records failed lookups and keeps going", async () => {
		const { sheet, table } = buildTable(ROWS);
		const catalog = new FakeCatalog({
			aaaaaaaaaaa: new LookupError("aaaaaaaaaaa", "YouTube API error: 403 Forbidden"),
		});
		const events: string[] = [];
		const progress: ProgressReporter = {
			start: (label, total) => events.push(`start ${label} ${total}`),
			advance: (outcome) => events.push(outcome ?? "ok"),
			stop: () => events.push("stop"),
		};

		const result = await extractLinks(table, options(catalog, { progress }));

		expect(result.failures).toEqual([
			{
				row: 2,
				link: "https://youtu.be/aaaaaaaaaaa",
				videoId: "aaaaaaaaaaa",
				reason: "YouTube API error: 403 Forbidden",
			},
		]);
		expect(sheet.getValue(2, 3)).toBe(".");
		expect(sheet.getValue(4, 3)).toBe("Video ccccccccccc");
		expect(events).toEqual(["start Fetching video details 3", "failed", "ok", "ok", "stop"]);
	});

	it("only overwrites cells that hold the placeholder", async () => {
		const { sheet, table } = buildTable([
			["mon", "https://youtu.be/aaaaaaaaaaa", "My own title", ".", ".", ".", "."],
		]);

		await extractLinks(table, options(new FakeCatalog()));

		expect(sheet.getValue(2, 3)).toBe("My own title");
		expect(sheet.getValue(2, 4)).toBe(12.35);
	});

	it("works without a Title column", async () => {
		const sheet = new MemorySheet("Log", [
			["Date", "Link", "Duration", "Published", "Author", "Exist"],
			["mon", "https://youtu.be/aaaaaaaaaaa", ".", ".", ".", "."],
		]);
		const table = new SheetTable(sheet, { keyColumn: 2, placeholder: "." });

		await extractLinks(table, options(new FakeCatalog()));

		expect(sheet.row(2, 6)).toEqual([
			"mon",
			"https://youtu.be/aaaaaaaaaaa",
			12.35,
			"03:04:05 02-01-2023",
			"Test Channel",
			".",
		]);
	});

	it("rejects sheets without the metadata columns", async () => {
		const sheet = new MemorySheet("Log", [["Date", "Link", "Duration"]]);
		const table = new SheetTable(sheet, { keyColumn: 2, placeholder: "." });

		await expect(extractLinks(table, options(new FakeCatalog()))).rejects.toBeInstanceOf(RecordError);
	});
});

describe("toLinkInfo", () => {
	it("treats a zero duration as missing", () => {
		expect(toLinkInfo(video("aaaaaaaaaaa", { durationMinutes: 0 }), "gone").Exist).toBe("gone");
	});

	it("leaves Exist empty for complete metadata", () => {
		expect(toLinkInfo(video("aaaaaaaaaaa"), "gone").Exist).toBeNull();
	});
});
