import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { InputFileError } from "../errors.js";
import { detectFormat, openWorkbook } from "./index.js";

describe("openWorkbook", () => {
	it("detects formats by extension", () => {
		expect(detectFormat("log.XLSX")).toBe("xlsx");
		expect(detectFormat("dir/log.ods")).toBe("ods");
		expect(detectFormat("log.xls")).toBeUndefined();
	});

	it("rejects unsupported formats before reading", async () => {
		await expect(openWorkbook("log.xls")).rejects.toThrow(
			new InputFileError("log.xls", "Unsupported format '.xls', expected one of: .xlsx, .ods"),
		);
	});

	it("rejects missing files", async () => {
		const dir = await mkdtemp(path.join(tmpdir(), "watchlog-open-"));
		try {
			await expect(openWorkbook(path.join(dir, "missing.ods"))).rejects.toBeInstanceOf(
				InputFileError,
			);
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});
});
