import type { Logger } from "../logger.js";
import type { BiffStream } from "../biff/stream.js";
import type { BiffRecord, DimensionsRecord, EofRecord, IndexRecord, RowRecord } from "../biff/records.js";
import { SubstreamType } from "../biff/record-types.js";
import type { Worksheet } from "./workbook.js";
import { HyperlinkIndex } from "./hyperlinks.js";

/** Column count assumed when a worksheet has no DIMENSIONS record */
export const DEFAULT_MAX_COL = 256;

/** Row count assumed when a worksheet has neither DIMENSIONS nor INDEX */
export const DEFAULT_MAX_ROW = 65536;

/** Everything the traversal needs to know about one worksheet */
export interface WorksheetLayout {
	sheet: Worksheet;
	/** Exclusive upper bound of row indexes */
	maxRow: number;
	/** Exclusive upper bound of column indexes */
	maxCol: number;
	/** Row-block index, when the worksheet has one */
	index: IndexRecord | undefined;
	/** First ROW record of the worksheet */
	firstRow: RowRecord;
	hyperlinks: HyperlinkIndex;
}

export interface WorksheetLoadOptions {
	/** Cap on the number of rows (0 = no cap) */
	sheetRows: number;
}

function isEnd(rec: BiffRecord | undefined): rec is EofRecord | undefined {
	return rec === undefined || rec.kind === "eof";
}

function collectHyperlinks(stream: BiffStream, from: number): HyperlinkIndex {
	const links = new HyperlinkIndex();
	let seen = false;
	stream.seek(from);
	for (let rec = stream.read(); !isEnd(rec); rec = stream.read()) {
		if (rec.kind === "hyperlink") {
			links.add(rec.link);
			seen = true;
		} else if (seen) {
			break;
		}
	}
	return links;
}

function resolveExtents(
	dims: DimensionsRecord | undefined,
	index: IndexRecord | undefined,
	firstRow: RowRecord | undefined,
): { maxRow: number; maxCol: number } {
	if (dims) {
		const maxCol = dims.lastCol > 0 ? dims.lastCol : (firstRow?.lastDefinedCol ?? 0);
		return { maxRow: dims.lastRow, maxCol };
	}
	return { maxRow: index ? index.lastExistingRow : DEFAULT_MAX_ROW, maxCol: DEFAULT_MAX_COL };
}

/**
 * Read the header records of a worksheet substream.
 *
 * @returns The worksheet's layout, or undefined if the sheet has no rows to
 *   read (no worksheet BOF at its offset, an empty row index, or no ROW
 *   record at all)
 * @throws {TruncatedRecordError} In strict mode, on a truncated record
 */
export function loadWorksheetGlobals(
	stream: BiffStream,
	sheet: Worksheet,
	options: WorksheetLoadOptions,
	logger: Logger,
): WorksheetLayout | undefined {
	stream.seek(sheet.position);
	const bof = stream.read();
	if (!bof || bof.kind !== "bof" || bof.substream !== SubstreamType.Worksheet) {
		logger.debug({ sheet: sheet.name, offset: sheet.position }, "no worksheet BOF, skipping sheet");
		return undefined;
	}

	let rec = stream.read();
	if (rec?.kind === "uncalced") {
		rec = stream.read();
	}
	let index: IndexRecord | undefined;
	if (rec?.kind === "index") {
		index = rec;
		rec = stream.read();
	}

	let dims: DimensionsRecord | undefined;
	let firstRow: RowRecord | undefined;
	for (; !isEnd(rec); rec = stream.read()) {
		if (rec.kind === "row") {
			firstRow = rec;
			break;
		}
		if (rec.kind === "dimensions" && !dims) {
			dims = rec;
		}
	}

	let { maxRow, maxCol } = resolveExtents(dims, index, firstRow);
	if (options.sheetRows > 0) {
		maxRow = Math.min(maxRow, options.sheetRows);
	}

	if (index && index.lastExistingRow <= index.firstExistingRow) {
		logger.debug(
			{ sheet: sheet.name, firstRow: index.firstExistingRow, lastRow: index.lastExistingRow },
			"empty row index, skipping sheet",
		);
		return undefined;
	}
	if (!firstRow) {
		logger.debug({ sheet: sheet.name }, "no ROW record, skipping sheet");
		return undefined;
	}

	const hyperlinks = collectHyperlinks(stream, firstRow.offset + firstRow.size);
	return Object.freeze({ sheet, maxRow, maxCol, index, firstRow, hyperlinks });
}
