import type { CellValue, TableRow } from "../types.js";
import type { CellRecord, FormulaCellRecord } from "../biff/records.js";
import type { BiffStream } from "../biff/stream.js";
import type { HyperlinkIndex } from "./hyperlinks.js";
import type { DateReclassifier, ReclassifiedValue } from "./dates.js";

/** What the cell decoder reads besides the cell record itself */
export interface CellDecodeContext {
	stream: BiffStream;
	sharedStrings: readonly string[];
	hyperlinks: HyperlinkIndex;
	/** Undefined when numbers are never reclassified as dates */
	dates: DateReclassifier | undefined;
}

function fromNumber(value: ReclassifiedValue): CellValue {
	if (value instanceof Date) {
		return { t: "d", v: value };
	}
	if (typeof value === "string") {
		return { t: "s", v: value };
	}
	return { t: "n", v: value };
}

/**
 * Cached string result of a formula: the STRING record that follows it,
 * possibly after the formula's SHRFMLA, ARRAY or TABLE record.
 */
function formulaString(rec: FormulaCellRecord, stream: BiffStream): string | undefined {
	let next = stream.readAt(rec.offset + rec.size);
	while (next && next.kind === "formula-trailer") {
		next = stream.readAt(next.offset + next.size);
	}
	return next && next.kind === "string" ? next.value : undefined;
}

/**
 * Writes decoded cell values into a row buffer.
 *
 * Columns outside the buffer are dropped. A value written to a column twice
 * keeps the later write.
 */
export class CellDecoder {
	constructor(private readonly ctx: CellDecodeContext) {}

	private put(buffer: TableRow, row: number, col: number, value: CellValue): void {
		if (col < 0 || col >= buffer.length) {
			return;
		}
		const target = this.ctx.hyperlinks.lookup(row, col);
		if (target !== undefined) {
			value.l = { Target: target };
		}
		buffer[col] = value;
	}

	private putNumber(buffer: TableRow, row: number, col: number, value: number, xf: number): void {
		const { dates } = this.ctx;
		this.put(buffer, row, col, dates ? fromNumber(dates.reclassify(value, xf)) : { t: "n", v: value });
	}

	private formulaValue(rec: FormulaCellRecord): CellValue | undefined {
		const { result } = rec;
		switch (result.type) {
			case "boolean":
				return { t: "b", v: result.value };
			case "empty-string":
				return { t: "s", v: "" };
			case "string": {
				const text = formulaString(rec, this.ctx.stream);
				return text === undefined ? undefined : { t: "s", v: text };
			}
			default:
				return undefined;
		}
	}

	/**
	 * Decode one cell record into `buffer`.
	 *
	 * Blanks, error values and shared-string indexes past the end of the
	 * table leave the column empty.
	 */
	decode(rec: CellRecord, buffer: TableRow): void {
		switch (rec.kind) {
			case "blank":
			case "mulblank":
				return;
			case "boolerr":
				if (!rec.isError) {
					this.put(buffer, rec.row, rec.col, { t: "b", v: rec.value !== 0 });
				}
				return;
			case "integer":
			case "number":
			case "rk":
				this.putNumber(buffer, rec.row, rec.col, rec.value, rec.xf);
				return;
			case "label":
				this.put(buffer, rec.row, rec.col, { t: "s", v: rec.value });
				return;
			case "labelsst": {
				const text = this.ctx.sharedStrings[rec.sstIndex];
				if (text !== undefined) {
					this.put(buffer, rec.row, rec.col, { t: "s", v: text });
				}
				return;
			}
			case "mulrk":
				rec.values.forEach((cell, i) => {
					this.putNumber(buffer, rec.row, rec.col + i, cell.value, cell.xf);
				});
				return;
			case "formula": {
				if (rec.result.type === "number") {
					this.putNumber(buffer, rec.row, rec.col, rec.result.value, rec.xf);
					return;
				}
				const value = this.formulaValue(rec);
				if (value) {
					this.put(buffer, rec.row, rec.col, value);
				}
				return;
			}
		}
	}
}
