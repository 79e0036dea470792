import type { DataTable, ReadOptions } from "./types.js";
import { BufferSource, FileSource, isByteSource, type ByteSource } from "./source.js";
import { XlsReader } from "./xls/reader.js";

/** Inputs accepted by {@link readXls} */
export type XlsInput = Uint8Array | ArrayBuffer | ByteSource;

/**
 * Wrap any supported input in a byte source.
 *
 * Node.js Buffers are Uint8Arrays and are used in place.
 */
function toByteSource(data: XlsInput): ByteSource {
	if (data instanceof Uint8Array) {
		return new BufferSource(data);
	}
	if (data instanceof ArrayBuffer) {
		return new BufferSource(new Uint8Array(data));
	}
	if (isByteSource(data)) {
		return data;
	}
	throw new TypeError("Unsupported data type for readXls()");
}

function extract(source: ByteSource, options: ReadOptions): DataTable[] {
	const reader = new XlsReader(options);
	try {
		reader.open(source);
		const tables = reader.produceAll();
		if (!tables) {
			throw reader.failure ?? new Error("Workbook could not be read");
		}
		return tables;
	} finally {
		reader.close();
	}
}

/**
 * Read every worksheet of a legacy binary workbook held in memory.
 *
 * @param data - File contents as Uint8Array, ArrayBuffer, Node Buffer, or a {@link ByteSource}
 * @param options - Read options
 * @returns One table per worksheet with at least one row, in document order
 * @throws {WorkbookStructureError} If the container or the workbook globals are unusable
 * @throws {TruncatedRecordError} In strict mode, if a record is truncated
 */
export function readXls(data: XlsInput, options: ReadOptions = {}): DataTable[] {
	return extract(toByteSource(data), options);
}

/**
 * Read every worksheet of a legacy binary workbook file.
 *
 * @param path - Path to the .xls file
 * @param options - Read options
 */
export function readXlsFile(path: string, options: ReadOptions = {}): DataTable[] {
	return extract(new FileSource(path), options);
}
