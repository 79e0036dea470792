import type { Logger } from "../logger.js";
import type { BiffStream } from "../biff/stream.js";
import type { XfRecord } from "../biff/records.js";
import { SheetKind, SubstreamType } from "../biff/record-types.js";
import { WorkbookStructureError } from "../errors.js";
import { DEFAULT_ENCODING, codepageDecoder } from "../utils/buffer.js";
import { SharedStringsBuilder } from "./shared-strings.js";

/** Sheet visibility as stored in BOUNDSHEET */
export type SheetVisibility = "visible" | "hidden" | "veryHidden";

const VISIBILITY: readonly SheetVisibility[] = ["visible", "hidden", "veryHidden"];

/** A worksheet listed in the workbook globals */
export interface Worksheet {
	name: string;
	/** Position among the workbook's worksheets */
	index: number;
	/** Stream offset of the worksheet's BOF record */
	position: number;
	visibility: SheetVisibility;
}

/** Workbook-wide state, read once and never modified afterwards */
export interface WorkbookGlobals {
	/** BIFF version: 2, 3, 4, 5 or 8 */
	biff: number;
	sheets: readonly Worksheet[];
	sharedStrings: readonly string[];
	/** Extended formats; a cell's XF index addresses this list */
	xfs: readonly XfRecord[];
	/** FONT record payloads in stream order */
	fonts: readonly Uint8Array[];
	/** Workbook-defined number formats by format code */
	formats: ReadonlyMap<number, string>;
	/** Encoding of BIFF2-BIFF5 byte strings */
	encoding: string;
	/** Serial dates count from 1904-01-01 instead of 1900-01-01 */
	date1904: boolean;
}

/**
 * Read the workbook globals substream at the start of the record stream.
 *
 * Updates the stream's decode context with the BIFF version from the BOF
 * record and the text encoding from CODEPAGE, so worksheet records decode
 * with them too.
 *
 * @throws {WorkbookStructureError} If the stream does not start with a
 *   workbook-globals BOF, or the workbook is encrypted
 * @throws {TruncatedRecordError} In strict mode, on a truncated record
 */
export function loadWorkbookGlobals(stream: BiffStream, logger: Logger): WorkbookGlobals {
	stream.seek(0);
	const bof = stream.read();
	if (!bof || bof.kind !== "bof" || bof.substream !== SubstreamType.WorkbookGlobals) {
		throw new WorkbookStructureError("Stream does not start with a workbook globals BOF", "WORKBOOK_GLOBALS_INVALID");
	}
	const biff = bof.biff;
	stream.context = { ...stream.context, biff };

	const sheets: Worksheet[] = [];
	const xfs: XfRecord[] = [];
	const fonts: Uint8Array[] = [];
	const formats = new Map<number, string>();
	const sst = new SharedStringsBuilder();
	let encoding = DEFAULT_ENCODING;
	let date1904 = false;
	let unnumberedFormats = 0;

	for (let rec = stream.read(); rec && rec.kind !== "eof"; rec = stream.read()) {
		if (rec.kind !== "continue") {
			sst.end();
		}
		switch (rec.kind) {
			case "boundsheet":
				if (rec.sheetType === SheetKind.Worksheet) {
					sheets.push({
						name: rec.name,
						index: sheets.length,
						position: rec.position,
						visibility: VISIBILITY[rec.visibility] ?? "visible",
					});
				}
				break;
			case "codepage": {
				const decoder = codepageDecoder(rec.codepage);
				if (decoder) {
					encoding = decoder.encoding;
					stream.context = { ...stream.context, decoder };
				} else {
					logger.warn({ codepage: rec.codepage, encoding }, "unsupported codepage, keeping default encoding");
				}
				break;
			}
			case "datemode":
				date1904 = rec.date1904;
				break;
			case "filepass":
				throw new WorkbookStructureError("Workbook is encrypted", "WORKBOOK_ENCRYPTED");
			case "font":
				fonts.push(rec.data);
				break;
			case "xf":
				xfs.push(rec);
				break;
			case "format":
				formats.set(rec.index ?? unnumberedFormats++, rec.pattern);
				break;
			case "sst":
				sst.begin(rec.data);
				break;
			case "continue":
				sst.continue(rec.data);
				break;
			default:
				break;
		}
	}

	const globals: WorkbookGlobals = {
		biff,
		sheets: Object.freeze(sheets),
		sharedStrings: sst.build(),
		xfs: Object.freeze(xfs),
		fonts: Object.freeze(fonts),
		formats,
		encoding,
		date1904,
	};
	logger.debug(
		{ biff, sheets: sheets.length, sharedStrings: globals.sharedStrings.length, encoding },
		"workbook globals loaded",
	);
	return Object.freeze(globals);
}
