/** Machine-readable error codes carried by every {@link XlsError} */
export type XlsErrorCode =
	| "INVALID_CONTAINER"
	| "WORKBOOK_STREAM_NOT_FOUND"
	| "WORKBOOK_NOT_STREAM"
	| "WORKBOOK_GLOBALS_INVALID"
	| "WORKBOOK_ENCRYPTED"
	| "TRUNCATED_RECORD"
	| "INDEX_WITHOUT_DBCELL";

/** Base class for errors raised while reading a legacy workbook */
export class XlsError extends Error {
	readonly code: XlsErrorCode;

	constructor(message: string, code: XlsErrorCode, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "XlsError";
		this.code = code;
	}
}

/**
 * The container or the workbook globals are unusable.
 *
 * Raised for a missing or non-stream "Workbook" entry, an unreadable OLE2
 * header, a first record that is not a workbook-globals BOF, or an encrypted
 * workbook. The reader becomes invalid when it sees one.
 */
export class WorkbookStructureError extends XlsError {
	constructor(message: string, code: XlsErrorCode, options?: { cause?: unknown }) {
		super(message, code, options);
		this.name = "WorkbookStructureError";
	}
}

/** A record's declared size runs past the end of the stream (strict mode only) */
export class TruncatedRecordError extends XlsError {
	/** Stream offset of the record header */
	readonly offset: number;
	/** Payload size declared in the header */
	readonly declaredSize: number;
	/** Payload bytes actually left in the stream */
	readonly availableSize: number;

	constructor(offset: number, declaredSize: number, availableSize: number) {
		super(
			`Record at offset ${offset} declares ${declaredSize} bytes but only ${availableSize} remain`,
			"TRUNCATED_RECORD",
		);
		this.name = "TruncatedRecordError";
		this.offset = offset;
		this.declaredSize = declaredSize;
		this.availableSize = availableSize;
	}
}

/**
 * A worksheet has an INDEX record but no DBCELL record can be found at one of
 * its block addresses. Reported as a warning; see the traversal engine.
 */
export class StructuralInconsistencyError extends XlsError {
	readonly sheet: string;
	readonly address: number;

	constructor(sheet: string, address: number) {
		super(`Badly formed binary file: sheet "${sheet}" has INDEX but no DBCELL at ${address}`, "INDEX_WITHOUT_DBCELL");
		this.name = "StructuralInconsistencyError";
		this.sheet = sheet;
		this.address = address;
	}
}
