import { describe, it, expect } from "vitest";
import { SharedStringsBuilder } from "./shared-strings.js";

function header(total: number, unique: number): number[] {
	return [total, 0, 0, 0, unique, 0, 0, 0];
}

function compressed(text: string): number[] {
	return [text.length, 0, 0, ...[...text].map((c) => c.charCodeAt(0))];
}

function build(...segments: number[][]): readonly string[] {
	const builder = new SharedStringsBuilder();
	const [first, ...rest] = segments;
	builder.begin(Uint8Array.from(first));
	for (const segment of rest) {
		builder.continue(Uint8Array.from(segment));
	}
	return builder.build();
}

describe("SharedStringsBuilder", () => {
	it("should decode compressed and UTF-16 strings", () => {
		const strings = build([...header(2, 2), ...compressed("ab"), 1, 0, 1, 0xac, 0x20]);
		expect(strings).toEqual(["ab", "€"]);
	});

	it("should honor the flags byte at the start of a continuation", () => {
		// "cdef": "cd" compressed, then "ef" as UTF-16 after a CONTINUE
		const strings = build(
			[...header(2, 2), ...compressed("ab"), 4, 0, 0, 0x63, 0x64],
			[0x01, 0x65, 0x00, 0x66, 0x00],
		);
		expect(strings).toEqual(["ab", "cdef"]);
	});

	it("should read string headers split across records", () => {
		const strings = build([...header(1, 1), 3], [0, 0, 0x78, 0x79, 0x7a]);
		expect(strings).toEqual(["xyz"]);
	});

	it("should skip rich-text runs", () => {
		const rich = [1, 0, 0x08, 1, 0, 0x67, 1, 2, 3, 4];
		const strings = build([...header(2, 2), ...rich.slice(0, 8)], [...rich.slice(8), ...compressed("h")]);
		expect(strings).toEqual(["g", "h"]);
	});

	it("should stop when the data runs out", () => {
		expect(build([...header(3, 3), ...compressed("x")])).toEqual(["x"]);
	});

	it("should return a frozen table", () => {
		expect(Object.isFrozen(build([...header(1, 1), ...compressed("a")]))).toBe(true);
		expect(new SharedStringsBuilder().build()).toEqual([]);
	});

	it("should take CONTINUE payloads only while a table is open", () => {
		const builder = new SharedStringsBuilder();
		expect(builder.continue(Uint8Array.of(1))).toBe(false);
		builder.begin(Uint8Array.from([...header(1, 1), 2, 0, 0, 0x6f]));
		expect(builder.continue(Uint8Array.of(0, 0x6b))).toBe(true);
		builder.end();
		expect(builder.continue(Uint8Array.of(0, 0x21))).toBe(false);
		expect(builder.build()).toEqual(["ok"]);
	});
});
