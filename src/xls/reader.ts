import type { DataTable, ReadMode, ReadOptions } from "../types.js";
import { defaultLogger, type Logger } from "../logger.js";
import type { ByteSource } from "../source.js";
import { BiffStream } from "../biff/stream.js";
import { openWorkbookStream } from "../cfb/container.js";
import { StructuralInconsistencyError, WorkbookStructureError } from "../errors.js";
import { defaultDecoder } from "../utils/buffer.js";
import { CellDecoder } from "./cells.js";
import { DateReclassifier } from "./dates.js";
import { WorksheetTraversal } from "./traversal.js";
import { loadWorkbookGlobals, type WorkbookGlobals, type Worksheet } from "./workbook.js";
import { loadWorksheetGlobals } from "./worksheet.js";

interface OpenWorkbook {
	stream: BiffStream;
	globals: WorkbookGlobals;
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/**
 * Reader for legacy binary workbooks (BIFF2-BIFF8 inside an OLE2 compound file).
 *
 * ```ts
 * const reader = new XlsReader({ mode: "loose" });
 * reader.open(new FileSource("report.xls"));
 * const tables = reader.produceAll();
 * reader.close();
 * ```
 *
 * A reader is used once. A workbook whose container or globals cannot be
 * read makes the reader invalid: `open` still returns, and `produceAll`
 * returns null from then on. In strict mode a truncated record also
 * invalidates the reader; the {@link TruncatedRecordError} is thrown by the
 * call that met it and later calls return null.
 */
export class XlsReader {
	readonly readMode: ReadMode;
	/** Recoverable structural problems met while reading */
	readonly warnings: StructuralInconsistencyError[] = [];

	private readonly options: ReadOptions;
	private readonly logger: Logger;
	private source: ByteSource | undefined;
	private workbook: OpenWorkbook | undefined;
	private tables: DataTable[] | undefined;
	private error: Error | undefined;
	private closed = false;

	constructor(options: ReadOptions = {}) {
		this.options = options;
		this.readMode = options.mode ?? "strict";
		this.logger = options.logger ?? defaultLogger;
	}

	/** False once reading failed */
	get isValid(): boolean {
		return this.error === undefined;
	}

	/** The failure that invalidated the reader */
	get failure(): Error | undefined {
		return this.error;
	}

	get exceptionMessage(): string | undefined {
		return this.error?.message;
	}

	/**
	 * Workbook-wide metadata read by {@link open}: worksheets, encoding,
	 * formats and fonts. Undefined before `open` and once the reader is invalid.
	 */
	get globals(): WorkbookGlobals | undefined {
		return this.workbook?.globals;
	}

	/** Names of the workbook's worksheets, in document order */
	get sheetNames(): string[] {
		return this.workbook ? this.workbook.globals.sheets.map((s) => s.name) : [];
	}

	/**
	 * Take ownership of a byte source and read the workbook globals.
	 *
	 * @throws {TruncatedRecordError} In strict mode, if a globals record is truncated
	 */
	open(source: ByteSource): void {
		if (this.source || this.workbook || this.closed || this.error) {
			source.close();
			throw new Error("XlsReader.open() can only be called once");
		}
		this.source = source;
		try {
			const bytes = openWorkbookStream(source.readAll());
			const stream = new BiffStream(bytes, this.readMode, { biff: 8, decoder: defaultDecoder() }, this.logger);
			const globals = loadWorkbookGlobals(stream, this.logger);
			this.workbook = { stream, globals };
		} catch (err) {
			this.fail(err);
			if (!(err instanceof WorkbookStructureError)) {
				throw err;
			}
		}
	}

	/**
	 * Read every selected worksheet that has at least one row.
	 *
	 * The byte source is released when this returns or throws. Later calls
	 * return the same list.
	 *
	 * @returns The tables in document order, or null if the reader is invalid
	 * @throws {TruncatedRecordError} In strict mode, on a truncated record
	 */
	produceAll(): DataTable[] | null {
		if (this.tables) {
			return this.tables;
		}
		const { workbook } = this;
		if (!workbook || this.error || this.closed) {
			return null;
		}
		try {
			const tables: DataTable[] = [];
			for (const sheet of workbook.globals.sheets) {
				if (!this.isSelected(sheet)) {
					continue;
				}
				const table = this.readSheet(workbook, sheet);
				if (table) {
					tables.push(table);
				}
			}
			this.tables = tables;
			return tables;
		} catch (err) {
			this.fail(err);
			throw err;
		} finally {
			this.release();
		}
	}

	/** Release the byte source. Safe to call at any time, any number of times. */
	close(): void {
		this.closed = true;
		this.release();
	}

	private isSelected(sheet: Worksheet): boolean {
		const { sheets } = this.options;
		if (sheets === undefined) {
			return true;
		}
		const wanted = Array.isArray(sheets) ? sheets : [sheets];
		return wanted.some((w) => (typeof w === "number" ? w === sheet.index : w === sheet.name));
	}

	private readSheet(workbook: OpenWorkbook, sheet: Worksheet): DataTable | undefined {
		const { stream, globals } = workbook;
		const layout = loadWorksheetGlobals(stream, sheet, { sheetRows: this.options.sheetRows ?? 0 }, this.logger);
		if (!layout) {
			return undefined;
		}
		const cells = new CellDecoder({
			stream,
			sharedStrings: globals.sharedStrings,
			hyperlinks: layout.hyperlinks,
			dates:
				this.options.cellDates === false
					? undefined
					: new DateReclassifier(globals.xfs, globals.formats, globals.date1904),
		});
		const rows = new WorksheetTraversal({
			stream,
			layout,
			cells,
			logger: this.logger,
			warn: (error) => this.warnings.push(error),
		}).run();
		if (rows.length === 0) {
			this.logger.debug({ sheet: sheet.name }, "worksheet has no rows");
			return undefined;
		}
		const columns = Array.from({ length: layout.maxCol }, (_, i) => String(i));
		return { name: sheet.name, columns, rows };
	}

	private fail(err: unknown): void {
		this.error = toError(err);
		this.workbook = undefined;
		this.logger.error({ err: this.error }, "workbook could not be read");
		this.release();
	}

	private release(): void {
		const { source } = this;
		if (source) {
			this.source = undefined;
			source.close();
		}
	}
}
