import type { Logger } from "../logger.js";
import type { ReadMode } from "../types.js";
import { TruncatedRecordError } from "../errors.js";
import { readU16 } from "./bytes.js";
import { decodeRecord, type BiffRecord, type DecodeContext, type RawRecord } from "./records.js";

const HEADER_SIZE = 4;

/** Outcome of reading one raw record */
export type RawReadResult =
	| { ok: true; raw: RawRecord }
	| { ok: false; error: TruncatedRecordError };

/**
 * Seekable cursor over a BIFF record stream.
 *
 * Records are decoded with the stream's {@link DecodeContext}; the globals
 * loader swaps the context once the BIFF version and codepage are known.
 */
export class BiffStream {
	private cursor = 0;

	constructor(
		private readonly data: Uint8Array,
		readonly mode: ReadMode,
		public context: DecodeContext,
		private readonly logger: Logger,
	) {}

	get position(): number {
		return this.cursor;
	}

	get size(): number {
		return this.data.length;
	}

	seek(offset: number): void {
		this.cursor = Math.max(0, Math.min(offset, this.data.length));
	}

	/**
	 * Read the raw record whose header starts at `offset`.
	 *
	 * Returns `undefined` at end of stream. A record whose declared size runs
	 * past the end is cut to the remaining bytes in loose mode and reported as
	 * a {@link TruncatedRecordError} in strict mode. A partial header counts
	 * as end of stream in loose mode.
	 */
	tryReadRawAt(offset: number): RawReadResult | undefined {
		const remaining = this.data.length - offset;
		if (remaining <= 0) {
			return undefined;
		}
		if (remaining < HEADER_SIZE) {
			if (this.mode === "loose") {
				this.logger.debug({ offset, remaining }, "partial record header at end of stream");
				return undefined;
			}
			return { ok: false, error: new TruncatedRecordError(offset, HEADER_SIZE, remaining) };
		}

		const id = readU16(this.data, offset);
		const declared = readU16(this.data, offset + 2);
		const start = offset + HEADER_SIZE;
		const available = this.data.length - start;
		if (declared <= available) {
			const raw = { id, offset, size: HEADER_SIZE + declared, data: this.data.subarray(start, start + declared) };
			return { ok: true, raw };
		}
		if (this.mode === "strict") {
			return { ok: false, error: new TruncatedRecordError(offset, declared, available) };
		}
		this.logger.debug({ offset, id, declared, available }, "truncated record");
		const raw = { id, offset, size: HEADER_SIZE + available, data: this.data.subarray(start) };
		return { ok: true, raw };
	}

	/**
	 * Decode the record at `offset` without moving the cursor.
	 *
	 * @throws {TruncatedRecordError} In strict mode, when the record is truncated
	 */
	readAt(offset: number): BiffRecord | undefined {
		const result = this.tryReadRawAt(offset);
		if (!result) {
			return undefined;
		}
		if (!result.ok) {
			throw result.error;
		}
		return decodeRecord(result.raw, this.context);
	}

	/**
	 * Decode the record at the cursor and advance past it.
	 *
	 * @throws {TruncatedRecordError} In strict mode, when the record is truncated
	 */
	read(): BiffRecord | undefined {
		const record = this.readAt(this.cursor);
		if (record) {
			this.cursor = record.offset + record.size;
		}
		return record;
	}
}
