import type { XfRecord } from "../biff/records.js";
import { readU16 } from "../biff/bytes.js";
import { builtinFormatKind, patternFormatKind, type FormatKind } from "../ssf/table.js";
import { serialToDate } from "../utils/date.js";

/** A numeric cell value after date reclassification */
export type ReclassifiedValue = number | Date | string;

/** Strict decimal number syntax accepted by {@link DateReclassifier.reclassifyText} */
const NUMERIC_TEXT = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Resolve the number-format code of an extended format.
 *
 * BIFF2 stores the code in the low six bits of byte 2. BIFF3 and BIFF4 keep
 * it in byte 1; BIFF5 and BIFF8 as a u16 at offset 2. Those three layouts
 * also carry a "number format used" attribute flag; when it is clear the
 * cell has no number format of its own.
 *
 * @returns The format code, or undefined if the flag is clear
 */
export function xfFormatCode(xf: XfRecord): number | undefined {
	const { data } = xf;
	switch (xf.layout) {
		case "v2":
			return data[2] & 0x3f;
		case "v3":
			return data[3] & 0x04 ? data[1] : undefined;
		case "v4":
			return data[5] & 0x04 ? data[1] : undefined;
		case "v5":
			return data[7] & 0x04 ? readU16(data, 2) : undefined;
		case "v8":
			return data[9] & 0x04 ? readU16(data, 2) : undefined;
	}
}

/**
 * Decides whether a number read from a cell is really a date, using the
 * cell's extended format and the workbook's number formats.
 */
export class DateReclassifier {
	constructor(
		private readonly xfs: readonly XfRecord[],
		private readonly formats: ReadonlyMap<number, string>,
		private readonly date1904: boolean,
	) {}

	/**
	 * Classify the number format behind an extended-format index.
	 *
	 * An index past the end of the XF table is taken as the format code
	 * itself. Codes that are neither builtin nor defined by the workbook are
	 * numbers.
	 */
	formatKind(xfIndex: number): FormatKind {
		let code: number | undefined;
		if (xfIndex < this.xfs.length) {
			code = xfFormatCode(this.xfs[xfIndex]);
			if (code === undefined) {
				return "number";
			}
		} else {
			code = xfIndex;
		}
		const builtin = builtinFormatKind(code);
		if (builtin) {
			return builtin;
		}
		const pattern = this.formats.get(code);
		return pattern === undefined ? "number" : patternFormatKind(pattern);
	}

	/**
	 * Apply the cell's number format to a numeric value.
	 *
	 * @returns A Date for date/time formats, the decimal string for the text
	 *   format, the number itself otherwise
	 */
	reclassify(value: number, xfIndex: number): ReclassifiedValue {
		switch (this.formatKind(xfIndex)) {
			case "date":
				return serialToDate(value, this.date1904);
			case "text":
				return String(value);
			default:
				return value;
		}
	}

	/**
	 * {@link reclassify} for a value that was already turned into text.
	 * Text that is not a plain decimal number comes back unchanged.
	 */
	reclassifyText(text: string, xfIndex: number): ReclassifiedValue {
		if (!NUMERIC_TEXT.test(text)) {
			return text;
		}
		const value = Number(text);
		return Number.isFinite(value) ? this.reclassify(value, xfIndex) : text;
	}
}
