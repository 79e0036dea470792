import type { HyperlinkData } from "../biff/hyperlink.js";

interface HyperlinkRange {
	firstRow: number;
	lastRow: number;
	firstCol: number;
	lastCol: number;
	url: string;
}

function cellKey(row: number, col: number): string {
	return `${row}:${col}`;
}

/**
 * Hyperlink targets of one worksheet, by cell.
 *
 * Built while the worksheet globals are read, then only queried. Single-cell
 * links are kept in a map and take precedence over links covering a range,
 * which are matched by scanning. Among overlapping links of the same kind
 * the one read first wins.
 */
export class HyperlinkIndex {
	private readonly cells = new Map<string, string>();
	private readonly ranges: HyperlinkRange[] = [];

	get size(): number {
		return this.cells.size + this.ranges.length;
	}

	add(link: HyperlinkData): void {
		const { url, firstRow, lastRow, firstCol, lastCol } = link;
		if (url === undefined) {
			return;
		}
		if (firstRow === lastRow && firstCol === lastCol) {
			const key = cellKey(firstRow, firstCol);
			if (!this.cells.has(key)) {
				this.cells.set(key, url);
			}
			return;
		}
		this.ranges.push({ firstRow, lastRow, firstCol, lastCol, url });
	}

	lookup(row: number, col: number): string | undefined {
		const single = this.cells.get(cellKey(row, col));
		if (single !== undefined) {
			return single;
		}
		for (const r of this.ranges) {
			if (row >= r.firstRow && row <= r.lastRow && col >= r.firstCol && col <= r.lastCol) {
				return r.url;
			}
		}
		return undefined;
	}
}
