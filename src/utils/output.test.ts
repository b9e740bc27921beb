import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InputFileError } from "../errors.js";
import { mergeJsonOutputs, outputBasePath, writeJsonFile } from "./output.js";

const now = new Date(2024, 0, 5, 9, 8, 7, 123);

describe("outputBasePath", () => {
	it("uses the custom name when given", () => {
		expect(outputBasePath({ directory: "outputs", customName: "march" })).toBe(
			path.join("outputs", "output_march"),
		);
	});

	it("falls back to a timestamp", () => {
		expect(outputBasePath({ directory: "outputs", now })).toBe(
			path.join("outputs", "output_01052024_090807_123000"),
		);
	});
});

describe("JSON outputs", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "watchlog-output-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("writes JSON with four-space indentation", async () => {
		const file = path.join(dir, "nested", "out.json");
		await writeJsonFile(file, { a: [1] });

		expect(await readFile(file, "utf8")).toBe('{\n    "a": [\n        1\n    ]\n}\n');
	});

	it("merges output files in name order", async () => {
		await writeJsonFile(path.join(dir, "output_b.json"), { x: 2, y: 2 });
		await writeJsonFile(path.join(dir, "output_a.json"), { x: 1, z: 1 });
		await writeFile(path.join(dir, "notes.json"), '{"ignored": true}');

		const result = await mergeJsonOutputs(dir, now);

		expect(result).toEqual({
			mergedPath: path.join(dir, "merged_outputs_01052024_090807_123000.json"),
			sources: ["output_a.json", "output_b.json"],
			keys: 3,
		});
		expect(JSON.parse(await readFile(result.mergedPath, "utf8"))).toEqual({ x: 2, y: 2, z: 1 });
	});

	it("copies a __proto__ key as a plain entry", async () => {
		await writeFile(path.join(dir, "output_a.json"), '{"__proto__": {"x": 1}, "a": 2}');

		const result = await mergeJsonOutputs(dir, now);
		const raw = await readFile(result.mergedPath, "utf8");

		expect(result.keys).toBe(2);
		expect(raw).toBe('{\n    "__proto__": {\n        "x": 1\n    },\n    "a": 2\n}\n');
	});

	it("rejects output files that are not objects", async () => {
		await writeFile(path.join(dir, "output_list.json"), "[1, 2]");

		await expect(mergeJsonOutputs(dir, now)).rejects.toBeInstanceOf(InputFileError);
	});
});
