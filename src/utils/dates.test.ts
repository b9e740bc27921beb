import { describe, expect, it } from "vitest";
import { formatDayKey, formatFileStamp, formatShortDate, formatTimestamp } from "./dates.js";

describe("date formats", () => {
	const date = new Date("2021-06-01T04:05:06.789Z");

	it("formats UTC dates", () => {
		expect(formatDayKey(date)).toBe("01-06-2021");
		expect(formatShortDate(date)).toBe("01/06/21");
		expect(formatTimestamp(date)).toBe("04:05:06 01-06-2021");
	});

	it("formats file stamps in local time with microseconds", () => {
		expect(formatFileStamp(new Date(2024, 0, 5, 9, 8, 7, 123))).toBe("01052024_090807_123000");
		expect(formatFileStamp(new Date(2024, 10, 25, 23, 59, 1, 4))).toBe("11252024_235901_004000");
	});
});
