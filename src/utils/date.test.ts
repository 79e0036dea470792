import { describe, it, expect } from "vitest";
import { fromOADate, serialToDate } from "./date.js";

describe("fromOADate", () => {
	it("should map 0 to the 1899-12-30 epoch", () => {
		expect(fromOADate(0).toISOString()).toBe("1899-12-30T00:00:00.000Z");
	});

	it("should treat the fraction as time of day", () => {
		expect(fromOADate(2.5).toISOString()).toBe("1900-01-01T12:00:00.000Z");
	});

	it("should count negative days backwards with a forward time part", () => {
		expect(fromOADate(-1.25).toISOString()).toBe("1899-12-29T06:00:00.000Z");
	});

	it("should round to the millisecond", () => {
		// one third of a day is 28800000 ms exactly after rounding
		expect(fromOADate(1 / 3).getTime() - fromOADate(0).getTime()).toBe(28_800_000);
	});
});

describe("serialToDate", () => {
	it("should convert 41640 to 2014-01-01", () => {
		expect(serialToDate(41640).toISOString()).toBe("2014-01-01T00:00:00.000Z");
	});

	it("should map serial 1 to 1900-01-01", () => {
		expect(serialToDate(1).toISOString()).toBe("1900-01-01T00:00:00.000Z");
	});

	it("should map serial 59 to 1900-02-28", () => {
		expect(serialToDate(59).toISOString()).toBe("1900-02-28T00:00:00.000Z");
	});

	it("should map serial 61 to 1900-03-01", () => {
		expect(serialToDate(61).toISOString()).toBe("1900-03-01T00:00:00.000Z");
	});

	it("should keep the time part", () => {
		expect(serialToDate(41640.75).toISOString()).toBe("2014-01-01T18:00:00.000Z");
	});

	it("should handle the 1904 date system", () => {
		expect(serialToDate(0, true).toISOString()).toBe("1904-01-01T00:00:00.000Z");
		expect(serialToDate(40178, true).toISOString()).toBe("2014-01-01T00:00:00.000Z");
	});
});
