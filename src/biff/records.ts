import { RecordType, BIFF8_VERSION } from "./record-types.js";
import { readF64, readU16, readU32 } from "./bytes.js";
import { readBiffString, readByteString, readUnicodeString } from "./strings.js";
import { decodeRk } from "./rk.js";
import { decodeHyperlink, type HyperlinkData } from "./hyperlink.js";
import type { ByteDecoder } from "../utils/buffer.js";

/** A record as it sits in the stream, before decoding */
export interface RawRecord {
	id: number;
	/** Stream offset of the 4-byte header */
	offset: number;
	/** Encoded size: header plus payload as read (a truncated payload counts as read) */
	size: number;
	/** Payload bytes */
	data: Uint8Array;
}

/** What a decoder needs to know beyond the record bytes */
export interface DecodeContext {
	/** BIFF version of the workbook: 2, 3, 4, 5 or 8 */
	biff: number;
	/** Decoder for BIFF2-BIFF5 byte strings */
	decoder: ByteDecoder;
}

interface RecordBase {
	id: number;
	offset: number;
	size: number;
}

export interface BofRecord extends RecordBase {
	kind: "bof";
	/** Raw version field */
	version: number;
	/** BIFF version derived from the record id and version field */
	biff: number;
	/** Substream type (see `SubstreamType`) */
	substream: number;
}

export interface EofRecord extends RecordBase {
	kind: "eof";
}

export interface ContinueRecord extends RecordBase {
	kind: "continue";
	data: Uint8Array;
}

export interface BoundSheetRecord extends RecordBase {
	kind: "boundsheet";
	/** Stream offset of the sheet's BOF */
	position: number;
	/** 0 visible, 1 hidden, 2 very hidden */
	visibility: number;
	/** Sheet type (see `SheetKind`) */
	sheetType: number;
	name: string;
}

export interface CodepageRecord extends RecordBase {
	kind: "codepage";
	codepage: number;
}

export interface DateModeRecord extends RecordBase {
	kind: "datemode";
	date1904: boolean;
}

export interface FilePassRecord extends RecordBase {
	kind: "filepass";
}

export interface FontRecord extends RecordBase {
	kind: "font";
	data: Uint8Array;
}

export interface FormatRecord extends RecordBase {
	kind: "format";
	/** Format code; undefined for BIFF2/3 records, which are numbered by position */
	index: number | undefined;
	pattern: string;
}

/** Byte layout of an extended-format record */
export type XfLayout = "v2" | "v3" | "v4" | "v5" | "v8";

export interface XfRecord extends RecordBase {
	kind: "xf";
	layout: XfLayout;
	data: Uint8Array;
}

export interface SstRecord extends RecordBase {
	kind: "sst";
	data: Uint8Array;
}

export interface IndexRecord extends RecordBase {
	kind: "index";
	firstExistingRow: number;
	/** Last existing row + 1 */
	lastExistingRow: number;
	/** Stream offsets of the DBCELL records, one per block of rows */
	blockAddresses: number[];
}

export interface UncalcedRecord extends RecordBase {
	kind: "uncalced";
}

export interface DimensionsRecord extends RecordBase {
	kind: "dimensions";
	firstRow: number;
	/** Last used row + 1 */
	lastRow: number;
	firstCol: number;
	/** Last used column + 1 */
	lastCol: number;
}

export interface RowRecord extends RecordBase {
	kind: "row";
	rowIndex: number;
	firstDefinedCol: number;
	/** Last defined column + 1 */
	lastDefinedCol: number;
}

export interface DbCellRecord extends RecordBase {
	kind: "dbcell";
	/** Stream offset of the first ROW record of the block */
	rowAddress: number;
}

export interface HyperlinkRecord extends RecordBase {
	kind: "hyperlink";
	link: HyperlinkData;
}

export interface StringRecord extends RecordBase {
	kind: "string";
	value: string;
}

/** SHAREDFMLA, ARRAY and TABLE: formula data that may sit between a FORMULA and its STRING */
export interface FormulaTrailerRecord extends RecordBase {
	kind: "formula-trailer";
}

export interface OtherRecord extends RecordBase {
	kind: "other";
}

interface CellBase extends RecordBase {
	row: number;
	col: number;
	/** Extended-format index */
	xf: number;
}

export interface BlankCellRecord extends CellBase {
	kind: "blank";
}

export interface MulBlankCellRecord extends CellBase {
	kind: "mulblank";
	lastCol: number;
}

export interface BoolErrCellRecord extends CellBase {
	kind: "boolerr";
	value: number;
	isError: boolean;
}

export interface IntegerCellRecord extends CellBase {
	kind: "integer";
	value: number;
}

export interface NumberCellRecord extends CellBase {
	kind: "number";
	value: number;
}

export interface LabelCellRecord extends CellBase {
	kind: "label";
	value: string;
}

export interface LabelSstCellRecord extends CellBase {
	kind: "labelsst";
	sstIndex: number;
}

export interface RkCellRecord extends CellBase {
	kind: "rk";
	value: number;
}

export interface MulRkCellRecord extends CellBase {
	kind: "mulrk";
	/** One entry per column from `col` on */
	values: { xf: number; value: number }[];
	lastCol: number;
}

/** Cached result of a formula cell */
export type FormulaResult =
	| { type: "number"; value: number }
	| { type: "string" }
	| { type: "empty-string" }
	| { type: "boolean"; value: boolean }
	| { type: "error"; code: number };

export interface FormulaCellRecord extends CellBase {
	kind: "formula";
	result: FormulaResult;
}

/** Records that address a single cell (or a run of cells in one row) */
export type CellRecord =
	| BlankCellRecord
	| MulBlankCellRecord
	| BoolErrCellRecord
	| IntegerCellRecord
	| NumberCellRecord
	| LabelCellRecord
	| LabelSstCellRecord
	| RkCellRecord
	| MulRkCellRecord
	| FormulaCellRecord;

/** Every record kind this reader distinguishes */
export type BiffRecord =
	| BofRecord
	| EofRecord
	| ContinueRecord
	| BoundSheetRecord
	| CodepageRecord
	| DateModeRecord
	| FilePassRecord
	| FontRecord
	| FormatRecord
	| XfRecord
	| SstRecord
	| IndexRecord
	| UncalcedRecord
	| DimensionsRecord
	| RowRecord
	| DbCellRecord
	| HyperlinkRecord
	| StringRecord
	| FormulaTrailerRecord
	| OtherRecord
	| CellRecord;

const CELL_KINDS: ReadonlySet<BiffRecord["kind"]> = new Set([
	"blank",
	"mulblank",
	"boolerr",
	"integer",
	"number",
	"label",
	"labelsst",
	"rk",
	"mulrk",
	"formula",
]);

export function isCellRecord(rec: BiffRecord): rec is CellRecord {
	return CELL_KINDS.has(rec.kind);
}

function biffOfBof(id: number, version: number): number {
	switch (id) {
		case RecordType.BOF_V2:
			return 2;
		case RecordType.BOF_V3:
			return 3;
		case RecordType.BOF_V4:
			return 4;
		default:
			return version >= BIFF8_VERSION ? 8 : 5;
	}
}

/**
 * Row, column and XF index of a cell record. BIFF2 cells store three
 * attribute bytes instead of a 16-bit XF index, so their value starts one
 * byte later.
 */
function cellHeader(raw: RawRecord, biff2: boolean): { row: number; col: number; xf: number; valueAt: number } {
	const { data } = raw;
	return {
		row: readU16(data, 0),
		col: readU16(data, 2),
		xf: biff2 ? data[4] & 0x3f : readU16(data, 4),
		valueAt: biff2 ? 7 : 6,
	};
}

function base(raw: RawRecord): RecordBase {
	return { id: raw.id, offset: raw.offset, size: raw.size };
}

function other(raw: RawRecord): OtherRecord {
	return { ...base(raw), kind: "other" };
}

function decodeFormulaResult(data: Uint8Array, at: number): FormulaResult {
	if (readU16(data, at + 6) !== 0xffff) {
		return { type: "number", value: readF64(data, at) };
	}
	switch (data[at]) {
		case 0:
			return { type: "string" };
		case 1:
			return { type: "boolean", value: data[at + 2] !== 0 };
		case 2:
			return { type: "error", code: data[at + 2] };
		case 3:
			return { type: "empty-string" };
		default:
			return { type: "error", code: -1 };
	}
}

function decodeCell(raw: RawRecord, ctx: DecodeContext): BiffRecord {
	const { data } = raw;
	const biff2 =
		raw.id === RecordType.BLANK_OLD ||
		raw.id === RecordType.INTEGER_OLD ||
		raw.id === RecordType.NUMBER_OLD ||
		raw.id === RecordType.LABEL_OLD ||
		raw.id === RecordType.BOOLERR_OLD ||
		(raw.id === RecordType.FORMULA && ctx.biff === 2);
	const header = cellHeader(raw, biff2);
	const at = header.valueAt;
	const cell = { ...base(raw), row: header.row, col: header.col, xf: header.xf };

	switch (raw.id) {
		case RecordType.BLANK:
		case RecordType.BLANK_OLD:
			return { ...cell, kind: "blank" };
		case RecordType.MULBLANK:
			return { ...cell, kind: "mulblank", lastCol: readU16(data, data.length - 2) };
		case RecordType.BOOLERR:
		case RecordType.BOOLERR_OLD:
			if (data.length < at + 2) {
				return other(raw);
			}
			return { ...cell, kind: "boolerr", value: data[at], isError: data[at + 1] !== 0 };
		case RecordType.INTEGER:
		case RecordType.INTEGER_OLD:
			if (data.length < at + 2) {
				return other(raw);
			}
			return { ...cell, kind: "integer", value: readU16(data, at) };
		case RecordType.NUMBER:
		case RecordType.NUMBER_OLD:
			if (data.length < at + 8) {
				return other(raw);
			}
			return { ...cell, kind: "number", value: readF64(data, at) };
		case RecordType.LABEL:
		case RecordType.RSTRING:
			return { ...cell, kind: "label", value: readBiffString(data, at, ctx.biff, 2, ctx.decoder).value };
		case RecordType.LABEL_OLD:
			return { ...cell, kind: "label", value: readByteString(data, at, 1, ctx.decoder).value };
		case RecordType.LABELSST:
			if (data.length < at + 4) {
				return other(raw);
			}
			return { ...cell, kind: "labelsst", sstIndex: readU32(data, at) };
		case RecordType.RK:
			if (data.length < at + 4) {
				return other(raw);
			}
			return { ...cell, kind: "rk", value: decodeRk(readU32(data, at)) };
		case RecordType.MULRK: {
			// rw, colFirst, n * (ixfe, rk), colLast
			const count = Math.max(0, Math.floor((data.length - 6) / 6));
			const values: { xf: number; value: number }[] = [];
			for (let i = 0; i < count; ++i) {
				const p = 4 + i * 6;
				values.push({ xf: readU16(data, p), value: decodeRk(readU32(data, p + 2)) });
			}
			const lastCol = data.length >= 6 ? readU16(data, data.length - 2) : header.col;
			return { ...cell, xf: values.length > 0 ? values[0].xf : 0, kind: "mulrk", values, lastCol };
		}
		default:
			// FORMULA, FORMULA_V3, FORMULA_V4
			if (data.length < at + 8) {
				return other(raw);
			}
			return { ...cell, kind: "formula", result: decodeFormulaResult(data, at) };
	}
}

/** Minimum payload length of each record kind below which it is treated as unrecognized */
const MIN_LENGTH: Record<number, number> = {
	[RecordType.BOF]: 4,
	[RecordType.BOF_V2]: 4,
	[RecordType.BOF_V3]: 4,
	[RecordType.BOF_V4]: 4,
	[RecordType.BOUNDSHEET]: 6,
	[RecordType.CODEPAGE]: 2,
	[RecordType.DATEMODE]: 2,
	[RecordType.FORMAT]: 2,
	[RecordType.DIMENSIONS]: 8,
	[RecordType.ROW]: 6,
	[RecordType.DBCELL]: 4,
	[RecordType.HLINK]: 8,
	[RecordType.BLANK]: 6,
	[RecordType.BLANK_OLD]: 7,
	[RecordType.MULBLANK]: 6,
	[RecordType.INTEGER]: 6,
	[RecordType.INTEGER_OLD]: 7,
	[RecordType.NUMBER]: 6,
	[RecordType.NUMBER_OLD]: 7,
	[RecordType.LABEL]: 6,
	[RecordType.LABEL_OLD]: 7,
	[RecordType.RSTRING]: 6,
	[RecordType.LABELSST]: 6,
	[RecordType.BOOLERR]: 6,
	[RecordType.BOOLERR_OLD]: 7,
	[RecordType.RK]: 6,
	[RecordType.MULRK]: 4,
	[RecordType.FORMULA]: 6,
	[RecordType.FORMULA_V3]: 6,
	[RecordType.FORMULA_V4]: 6,
};

/**
 * Decode one raw record into its variant.
 *
 * Unknown ids, and known records too short to hold their fixed fields, come
 * back as `kind: "other"`.
 */
export function decodeRecord(raw: RawRecord, ctx: DecodeContext): BiffRecord {
	const { data } = raw;
	const min = MIN_LENGTH[raw.id];
	if (min !== undefined && data.length < min) {
		return other(raw);
	}

	switch (raw.id) {
		case RecordType.BOF:
		case RecordType.BOF_V2:
		case RecordType.BOF_V3:
		case RecordType.BOF_V4: {
			const version = readU16(data, 0);
			return {
				...base(raw),
				kind: "bof",
				version,
				biff: biffOfBof(raw.id, version),
				substream: readU16(data, 2),
			};
		}
		case RecordType.EOF:
			return { ...base(raw), kind: "eof" };
		case RecordType.CONTINUE:
			return { ...base(raw), kind: "continue", data };
		case RecordType.BOUNDSHEET:
			return {
				...base(raw),
				kind: "boundsheet",
				position: readU32(data, 0),
				visibility: data[4] & 0x03,
				sheetType: data[5],
				name: readBiffString(data, 6, ctx.biff, 1, ctx.decoder).value,
			};
		case RecordType.CODEPAGE:
			return { ...base(raw), kind: "codepage", codepage: readU16(data, 0) };
		case RecordType.DATEMODE:
			return { ...base(raw), kind: "datemode", date1904: readU16(data, 0) === 1 };
		case RecordType.FILEPASS:
			return { ...base(raw), kind: "filepass" };
		case RecordType.FONT:
		case RecordType.FONT_V34:
			return { ...base(raw), kind: "font", data };
		case RecordType.FORMAT: {
			const pattern =
				ctx.biff >= 8 ? readUnicodeString(data, 2, 2).value : readByteString(data, 2, 1, ctx.decoder).value;
			return { ...base(raw), kind: "format", index: readU16(data, 0), pattern };
		}
		case RecordType.FORMAT_V23:
			return { ...base(raw), kind: "format", index: undefined, pattern: readByteString(data, 0, 1, ctx.decoder).value };
		case RecordType.XF:
			return { ...base(raw), kind: "xf", layout: ctx.biff >= 8 ? "v8" : "v5", data };
		case RecordType.XF_V2:
			return { ...base(raw), kind: "xf", layout: "v2", data };
		case RecordType.XF_V3:
			return { ...base(raw), kind: "xf", layout: "v3", data };
		case RecordType.XF_V4:
			return { ...base(raw), kind: "xf", layout: "v4", data };
		case RecordType.SST:
			return { ...base(raw), kind: "sst", data };
		case RecordType.INDEX:
			return decodeIndex(raw, ctx);
		case RecordType.UNCALCED:
			return { ...base(raw), kind: "uncalced" };
		case RecordType.DIMENSIONS:
			if (ctx.biff >= 8) {
				if (data.length < 12) {
					return other(raw);
				}
				return {
					...base(raw),
					kind: "dimensions",
					firstRow: readU32(data, 0),
					lastRow: readU32(data, 4),
					firstCol: readU16(data, 8),
					lastCol: readU16(data, 10),
				};
			}
			return {
				...base(raw),
				kind: "dimensions",
				firstRow: readU16(data, 0),
				lastRow: readU16(data, 2),
				firstCol: readU16(data, 4),
				lastCol: readU16(data, 6),
			};
		case RecordType.ROW:
			return {
				...base(raw),
				kind: "row",
				rowIndex: readU16(data, 0),
				firstDefinedCol: readU16(data, 2),
				lastDefinedCol: readU16(data, 4),
			};
		case RecordType.DBCELL:
			return { ...base(raw), kind: "dbcell", rowAddress: raw.offset - readU32(data, 0) };
		case RecordType.HLINK:
			return { ...base(raw), kind: "hyperlink", link: decodeHyperlink(data) };
		case RecordType.STRING:
			return { ...base(raw), kind: "string", value: readBiffString(data, 0, ctx.biff, 2, ctx.decoder).value };
		case RecordType.STRING_OLD:
			return { ...base(raw), kind: "string", value: readByteString(data, 0, 1, ctx.decoder).value };
		case RecordType.SHAREDFMLA:
		case RecordType.ARRAY:
		case RecordType.TABLE:
			return { ...base(raw), kind: "formula-trailer" };
		case RecordType.BLANK:
		case RecordType.BLANK_OLD:
		case RecordType.MULBLANK:
		case RecordType.BOOLERR:
		case RecordType.BOOLERR_OLD:
		case RecordType.INTEGER:
		case RecordType.INTEGER_OLD:
		case RecordType.NUMBER:
		case RecordType.NUMBER_OLD:
		case RecordType.LABEL:
		case RecordType.LABEL_OLD:
		case RecordType.RSTRING:
		case RecordType.LABELSST:
		case RecordType.RK:
		case RecordType.MULRK:
		case RecordType.FORMULA:
		case RecordType.FORMULA_V3:
		case RecordType.FORMULA_V4:
			return decodeCell(raw, ctx);
		default:
			return other(raw);
	}
}

/**
 * INDEX layouts: BIFF8 stores 32-bit row bounds and starts the DBCELL
 * offsets at byte 16; BIFF5 uses 16-bit row bounds and starts them at 12.
 * Earlier versions have no DBCELL records, so their INDEX is not decoded.
 */
function decodeIndex(raw: RawRecord, ctx: DecodeContext): BiffRecord {
	const { data } = raw;
	if (ctx.biff < 5) {
		return other(raw);
	}
	const v8 = ctx.biff >= 8;
	const listAt = v8 ? 16 : 12;
	if (data.length < listAt) {
		return other(raw);
	}
	const blockAddresses: number[] = [];
	for (let p = listAt; p + 4 <= data.length; p += 4) {
		blockAddresses.push(readU32(data, p));
	}
	return {
		...base(raw),
		kind: "index",
		firstExistingRow: v8 ? readU32(data, 4) : readU16(data, 4),
		lastExistingRow: v8 ? readU32(data, 8) : readU16(data, 6),
		blockAddresses,
	};
}
