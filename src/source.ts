import { closeSync, fstatSync, openSync, readSync } from "node:fs";

/**
 * Random-access bytes backing a reader.
 *
 * `close()` releases whatever the source holds and may be called any
 * number of times.
 */
export interface ByteSource {
	/** Read the whole source */
	readAll(): Uint8Array;
	close(): void;
}

/** Bytes already in memory */
export class BufferSource implements ByteSource {
	private data: Uint8Array | undefined;

	constructor(data: Uint8Array) {
		this.data = data;
	}

	readAll(): Uint8Array {
		if (!this.data) {
			throw new Error("Byte source is closed");
		}
		return this.data;
	}

	close(): void {
		this.data = undefined;
	}
}

/** A file, opened when the source is created and closed once */
export class FileSource implements ByteSource {
	private fd: number | undefined;

	constructor(readonly path: string) {
		this.fd = openSync(path, "r");
	}

	readAll(): Uint8Array {
		const { fd } = this;
		if (fd === undefined) {
			throw new Error(`Byte source ${this.path} is closed`);
		}
		const size = fstatSync(fd).size;
		const out = new Uint8Array(size);
		let filled = 0;
		while (filled < size) {
			const n = readSync(fd, out, filled, size - filled, filled);
			if (n === 0) {
				break;
			}
			filled += n;
		}
		return filled === size ? out : out.subarray(0, filled);
	}

	close(): void {
		if (this.fd !== undefined) {
			const { fd } = this;
			this.fd = undefined;
			closeSync(fd);
		}
	}
}

export function isByteSource(value: unknown): value is ByteSource {
	return (
		typeof value === "object" &&
		value !== null &&
		"readAll" in value &&
		typeof value.readAll === "function" &&
		"close" in value &&
		typeof value.close === "function"
	);
}
