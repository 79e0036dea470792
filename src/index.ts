// Reader for legacy binary spreadsheets (.xls)
// Public API

// Types
export type {
	ReadMode,
	ReadOptions,
	CellDataType,
	CellValue,
	BooleanCell,
	NumberCell,
	StringCell,
	DateCell,
	Hyperlink,
	TableRow,
	DataTable,
	ColumnType,
} from "./types.js";

// Read
export { readXls, readXlsFile, type XlsInput } from "./read.js";
export { XlsReader } from "./xls/reader.js";
export type { WorkbookGlobals, Worksheet, SheetVisibility } from "./xls/workbook.js";
export { BufferSource, FileSource, type ByteSource } from "./source.js";

// Errors
export {
	XlsError,
	WorkbookStructureError,
	TruncatedRecordError,
	StructuralInconsistencyError,
	type XlsErrorCode,
} from "./errors.js";

// Logging
export { createLogger, type CreateLoggerOptions, type Logger } from "./logger.js";

// Table helpers
export {
	tableToRows,
	tableToObjects,
	inferColumnTypes,
	type PlainValue,
	type TableToRowsOptions,
	type TableToObjectsOptions,
} from "./api/table.js";

// Dates and number formats
export { serialToDate, fromOADate } from "./utils/date.js";
export { isDateFormat } from "./ssf/format.js";
export { BUILTIN_FORMATS } from "./ssf/table.js";

// Version
export const version = "0.1.0";
