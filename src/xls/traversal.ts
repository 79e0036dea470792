import type { Logger } from "../logger.js";
import type { TableRow } from "../types.js";
import type { BiffStream } from "../biff/stream.js";
import { isCellRecord, type CellRecord, type RowRecord } from "../biff/records.js";
import { StructuralInconsistencyError } from "../errors.js";
import type { CellDecoder } from "./cells.js";
import type { WorksheetLayout } from "./worksheet.js";

interface StateBase {
	/** Index of the row being assembled; rows before it are emitted */
	depth: number;
	/** Stream offset of the next record to read */
	cellOffset: number;
}

/** Traversal driven by the INDEX record's DBCELL addresses */
export interface IndexedState extends StateBase {
	mode: "indexed";
	blockAddresses: readonly number[];
	/** Position in `blockAddresses` of the block being read */
	blockCursor: number;
}

/** Traversal that walks ROW records one after another */
export interface SequentialState extends StateBase {
	mode: "sequential";
	/** The last ROW record the traversal moved to */
	currentRow: RowRecord;
}

/** Cursor of one worksheet traversal */
export type TraversalState = IndexedState | SequentialState;

/** Why the per-row loop stopped */
type RowEnd = "next-row" | "end-of-block" | "end-of-sheet";

/** Where a row block's cell records start, if anywhere */
type BlockStart = { kind: "cells"; offset: number } | { kind: "end" } | { kind: "no-dbcell" };

export interface TraversalContext {
	stream: BiffStream;
	layout: WorksheetLayout;
	cells: CellDecoder;
	logger: Logger;
	/** Receives recoverable structural problems */
	warn(error: StructuralInconsistencyError): void;
}

/**
 * Reads the rows of one worksheet.
 *
 * Worksheets with an INDEX record are read block by block from its DBCELL
 * addresses; the others by scanning from ROW record to ROW record. Both
 * emit the same dense sequence of rows starting at row 0: rows without
 * cells between populated rows come out empty, and nothing is emitted past
 * the last populated row or past `maxRow`.
 */
export class WorksheetTraversal {
	private readonly rows: TableRow[] = [];

	constructor(private readonly ctx: TraversalContext) {}

	/**
	 * @throws {TruncatedRecordError} In strict mode, on a truncated record
	 */
	run(): TableRow[] {
		const { layout } = this.ctx;
		if (layout.index && layout.index.blockAddresses.length > 0) {
			const state: IndexedState = {
				mode: "indexed",
				depth: 0,
				cellOffset: 0,
				blockAddresses: layout.index.blockAddresses,
				blockCursor: 0,
			};
			this.runIndexed(state);
		} else {
			this.runSequential(this.sequentialState());
		}
		return this.rows;
	}

	private sequentialState(): SequentialState {
		const { firstRow } = this.ctx.layout;
		return { mode: "sequential", depth: 0, cellOffset: firstRow.offset, currentRow: firstRow };
	}

	private newRow(): TableRow {
		return new Array<TableRow[number]>(this.ctx.layout.maxCol).fill(null);
	}

	/**
	 * Assemble the row at `state.depth` from the records at `state.cellOffset`.
	 *
	 * A cell of a later row ends the row and is left for the next call; cells
	 * of earlier rows are skipped. When the block or sheet ends before any
	 * cell of the row, no row is emitted.
	 */
	private readRow(state: TraversalState): RowEnd {
		const { stream, cells } = this.ctx;
		const buffer = this.newRow();
		let end: RowEnd = "end-of-sheet";
		let populated = false;
		for (;;) {
			const rec = stream.readAt(state.cellOffset);
			if (!rec) {
				break;
			}
			state.cellOffset = rec.offset + rec.size;
			if (rec.kind === "dbcell") {
				end = "end-of-block";
				break;
			}
			if (rec.kind === "eof") {
				break;
			}
			if (!isCellRecord(rec) || rec.row < state.depth) {
				continue;
			}
			if (rec.row > state.depth) {
				state.cellOffset = rec.offset;
				end = "next-row";
				break;
			}
			cells.decode(rec, buffer);
			populated = true;
		}
		if (!populated && end !== "next-row") {
			return end;
		}
		this.rows.push(buffer);
		state.depth++;
		return end;
	}

	/**
	 * Find where the cells of the block whose DBCELL is at `address` start:
	 * just past the run of ROW records the DBCELL points back to.
	 */
	private locateBlock(address: number): BlockStart {
		const { stream } = this.ctx;
		let rec = stream.readAt(address);
		while (rec && rec.kind !== "dbcell" && rec.kind !== "eof") {
			rec = stream.readAt(rec.offset + rec.size);
		}
		if (!rec || rec.kind === "eof") {
			return { kind: "no-dbcell" };
		}
		let row = stream.readAt(rec.rowAddress);
		if (!row || row.kind !== "row") {
			return { kind: "end" };
		}
		while (row && row.kind === "row") {
			row = stream.readAt(row.offset + row.size);
		}
		return { kind: "cells", offset: row ? row.offset : stream.size };
	}

	private runIndexed(state: IndexedState): void {
		const { layout, logger } = this.ctx;
		for (; state.blockCursor < state.blockAddresses.length; state.blockCursor++) {
			if (state.depth >= layout.maxRow) {
				return;
			}
			const address = state.blockAddresses[state.blockCursor];
			const start = this.locateBlock(address);
			if (start.kind === "end") {
				return;
			}
			if (start.kind === "no-dbcell") {
				const error = new StructuralInconsistencyError(layout.sheet.name, address);
				logger.warn({ sheet: layout.sheet.name, offset: address, block: state.blockCursor }, error.message);
				this.ctx.warn(error);
				if (state.blockCursor === 0) {
					this.runSequential(this.sequentialState());
				}
				return;
			}
			state.cellOffset = start.offset;
			let end: RowEnd = "next-row";
			while (end === "next-row" && state.depth < layout.maxRow) {
				end = this.readRow(state);
			}
			if (end === "end-of-sheet") {
				return;
			}
		}
	}

	/** Next ROW record after the current one that is not behind the traversal */
	private nextRowRecord(state: SequentialState): RowRecord | undefined {
		const { stream } = this.ctx;
		const { currentRow } = state;
		let rec = stream.readAt(currentRow.offset + currentRow.size);
		while (rec && rec.kind !== "eof") {
			if (rec.kind === "row" && rec.rowIndex > currentRow.rowIndex && rec.rowIndex >= state.depth) {
				return rec;
			}
			rec = stream.readAt(rec.offset + rec.size);
		}
		return undefined;
	}

	/** First cell record at or after `from` whose row is `rowIndex` or later */
	private firstCellFrom(from: number, rowIndex: number): CellRecord | undefined {
		const { stream } = this.ctx;
		let rec = stream.readAt(from);
		while (rec && rec.kind !== "eof") {
			if (isCellRecord(rec) && rec.row >= rowIndex) {
				return rec;
			}
			rec = stream.readAt(rec.offset + rec.size);
		}
		return undefined;
	}

	private runSequential(state: SequentialState): void {
		const { maxRow } = this.ctx.layout;
		let target: RowRecord | undefined = state.currentRow;
		while (target && state.depth < maxRow) {
			const cell = this.firstCellFrom(target.offset, target.rowIndex);
			if (!cell) {
				return;
			}
			state.currentRow = target;
			state.cellOffset = cell.offset;
			let end: RowEnd = "next-row";
			// the per-row loop emits the empty rows before the cell's row
			while (state.depth <= cell.row && state.depth < maxRow && end !== "end-of-sheet") {
				end = this.readRow(state);
			}
			if (end === "end-of-sheet") {
				return;
			}
			target = this.nextRowRecord(state);
		}
	}
}
