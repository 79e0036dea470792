import type { Logger } from "pino";

/**
 * Truncation tolerance, fixed when the reader is constructed.
 *
 * - "strict": a record whose declared size runs past the end of the stream is a fatal error
 * - "loose": such a record is cut to the bytes that remain (reports produced by some
 *   server-side exporters end this way)
 */
export type ReadMode = "strict" | "loose";

/** Options for reading a legacy workbook */
export interface ReadOptions {
	/** Truncation tolerance (default: "strict") */
	mode?: ReadMode;
	/** If false, numbers are never reclassified as dates through their number format (default: true) */
	cellDates?: boolean;
	/** Restrict extraction to specific worksheets by index (among worksheets) or name */
	sheets?: number | string | Array<number | string>;
	/** Maximum number of rows to read per sheet (0 = all rows) */
	sheetRows?: number;
	/** Logger for diagnostics; defaults to a silent pino logger */
	logger?: Logger;
}

/**
 * Cell data type codes.
 * - "b": Boolean
 * - "n": Number
 * - "s": String
 * - "d": Date
 */
export type CellDataType = "b" | "n" | "s" | "d";

/** Hyperlink target attached to a cell */
export interface Hyperlink {
	/** URL, file path or in-workbook location */
	Target: string;
}

interface CellBase {
	/** Hyperlink covering this cell */
	l?: Hyperlink;
}

export interface BooleanCell extends CellBase {
	t: "b";
	v: boolean;
}

export interface NumberCell extends CellBase {
	t: "n";
	v: number;
}

export interface StringCell extends CellBase {
	t: "s";
	v: string;
}

export interface DateCell extends CellBase {
	t: "d";
	v: Date;
}

/** Decoded value of one cell */
export type CellValue = BooleanCell | NumberCell | StringCell | DateCell;

/** One row of a table, indexed by column; absent cells are null */
export type TableRow = (CellValue | null)[];

/** Extraction result for one worksheet */
export interface DataTable {
	/** Worksheet name */
	name: string;
	/** Column names: the zero-based column index as a string */
	columns: string[];
	/** Rows in sheet order, each `columns.length` long */
	rows: TableRow[];
}

/** Uniform value type of a column, as reported by {@link inferColumnTypes} */
export type ColumnType = "boolean" | "number" | "string" | "date" | "mixed" | "empty";
