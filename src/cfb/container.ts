import CFB from "cfb";
import type { CFB$Container, CFB$Entry } from "cfb";
import { WorkbookStructureError } from "../errors.js";

/** Directory entry type of a stream in a compound file */
const ENTRY_STREAM = 2;

/** Stream names holding the BIFF record sequence, newest producers first */
const WORKBOOK_STREAM_NAMES = ["Workbook", "Book"] as const;

function parseContainer(bytes: Uint8Array): CFB$Container {
	try {
		return CFB.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength), { type: "buffer" });
	} catch (err) {
		throw new WorkbookStructureError("Not an OLE2 compound file", "INVALID_CONTAINER", { cause: err });
	}
}

function findWorkbookEntry(container: CFB$Container): CFB$Entry | undefined {
	for (const name of WORKBOOK_STREAM_NAMES) {
		const entry = CFB.find(container, name);
		if (entry) {
			return entry;
		}
	}
	return undefined;
}

/**
 * Open an OLE2 compound file and return the bytes of its workbook stream
 * ("Workbook", or "Book" for BIFF5 producers).
 *
 * @throws {WorkbookStructureError} If the container is unreadable, or the stream is missing or not a stream
 */
export function openWorkbookStream(bytes: Uint8Array): Uint8Array {
	const container = parseContainer(bytes);
	const entry = findWorkbookEntry(container);
	if (!entry) {
		throw new WorkbookStructureError("No Workbook or Book stream in compound file", "WORKBOOK_STREAM_NOT_FOUND");
	}
	if (entry.type !== ENTRY_STREAM) {
		throw new WorkbookStructureError(`"${entry.name}" is not a stream`, "WORKBOOK_NOT_STREAM");
	}
	const { content } = entry;
	return content instanceof Uint8Array ? content : Uint8Array.from(content);
}
