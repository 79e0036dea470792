import { describe, it, expect } from "vitest";
import { decodeRk } from "./rk.js";

describe("decodeRk", () => {
	it("should decode integers", () => {
		expect(decodeRk((5 << 2) | 0x02)).toBe(5);
		expect(decodeRk(0x02)).toBe(0);
	});

	it("should decode negative integers", () => {
		expect(decodeRk(((-3 << 2) | 0x02) >>> 0)).toBe(-3);
	});

	it("should divide integers by 100 when flagged", () => {
		expect(decodeRk((1234 << 2) | 0x03)).toBe(12.34);
	});

	it("should decode the high bits of a double", () => {
		// 1.5 is 0x3FF8000000000000
		expect(decodeRk(0x3ff80000)).toBe(1.5);
		expect(decodeRk(0xc0000000)).toBe(-2);
	});

	it("should divide doubles by 100 when flagged", () => {
		expect(decodeRk(0x3ff80001)).toBe(0.015);
	});
});
