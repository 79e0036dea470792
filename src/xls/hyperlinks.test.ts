import { describe, it, expect } from "vitest";
import { HyperlinkIndex } from "./hyperlinks.js";

function link(firstRow: number, lastRow: number, firstCol: number, lastCol: number, url: string | undefined) {
	return { firstRow, lastRow, firstCol, lastCol, url };
}

describe("HyperlinkIndex", () => {
	it("should find single-cell links", () => {
		const index = new HyperlinkIndex();
		index.add(link(2, 2, 3, 3, "https://example.com/"));
		expect(index.lookup(2, 3)).toBe("https://example.com/");
		expect(index.lookup(3, 2)).toBeUndefined();
	});

	it("should find links covering a range, bounds included", () => {
		const index = new HyperlinkIndex();
		index.add(link(1, 4, 0, 2, "Sheet2!A1"));
		expect(index.lookup(1, 0)).toBe("Sheet2!A1");
		expect(index.lookup(4, 2)).toBe("Sheet2!A1");
		expect(index.lookup(5, 2)).toBeUndefined();
		expect(index.lookup(4, 3)).toBeUndefined();
	});

	it("should prefer a single-cell link over a range", () => {
		const index = new HyperlinkIndex();
		index.add(link(0, 9, 0, 9, "range"));
		index.add(link(5, 5, 5, 5, "cell"));
		expect(index.lookup(5, 5)).toBe("cell");
		expect(index.lookup(5, 6)).toBe("range");
	});

	it("should keep the first of two links on one cell", () => {
		const index = new HyperlinkIndex();
		index.add(link(0, 0, 0, 0, "first"));
		index.add(link(0, 0, 0, 0, "second"));
		expect(index.lookup(0, 0)).toBe("first");
		expect(index.size).toBe(1);
	});

	it("should ignore links without a target", () => {
		const index = new HyperlinkIndex();
		index.add(link(0, 0, 0, 0, undefined));
		expect(index.size).toBe(0);
		expect(index.lookup(0, 0)).toBeUndefined();
	});
});
