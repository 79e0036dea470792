import { readU16, readU32 } from "./bytes.js";
import { decodeUnicode, type ByteDecoder } from "../utils/buffer.js";

/** A decoded string and the offset just past its last byte */
export interface StringRead {
	value: string;
	end: number;
}

/** BIFF8 string option flags */
const FLAG_HIGH_BYTE = 0x01;
const FLAG_EXT = 0x04;
const FLAG_RICH = 0x08;

function readLength(data: Uint8Array, offset: number, lengthSize: 1 | 2): number {
	if (offset + lengthSize > data.length) {
		return 0;
	}
	return lengthSize === 1 ? data[offset] : readU16(data, offset);
}

/**
 * Read a BIFF2-BIFF5 byte string: a length prefix followed by bytes in the
 * workbook's codepage. Bytes missing from a truncated record are dropped.
 */
export function readByteString(
	data: Uint8Array,
	offset: number,
	lengthSize: 1 | 2,
	decoder: ByteDecoder,
): StringRead {
	const cch = readLength(data, offset, lengthSize);
	const start = offset + lengthSize;
	const end = Math.min(start + cch, data.length);
	return { value: decoder.decode(data.subarray(start, end)), end };
}

/**
 * Read a BIFF8 XLUnicodeString.
 *
 * Layout: length (1 or 2 bytes), option flags, optional rich-text run count
 * (u16), optional extended data size (u32), character data, run data,
 * extended data. The returned `end` skips the trailing run and extended data.
 */
export function readUnicodeString(data: Uint8Array, offset: number, lengthSize: 1 | 2): StringRead {
	const cch = readLength(data, offset, lengthSize);
	let pos = offset + lengthSize;
	const flags = pos < data.length ? data[pos] : 0;
	pos++;
	let runs = 0;
	let extSize = 0;
	if (flags & FLAG_RICH) {
		runs = readU16(data, pos);
		pos += 2;
	}
	if (flags & FLAG_EXT) {
		extSize = readU32(data, pos);
		pos += 4;
	}
	const highByte = (flags & FLAG_HIGH_BYTE) !== 0;
	let byteLength = highByte ? cch * 2 : cch;
	if (pos + byteLength > data.length) {
		byteLength = Math.max(0, data.length - pos);
		if (highByte) {
			byteLength -= byteLength % 2;
		}
	}
	const value = decodeUnicode(data.subarray(pos, pos + byteLength), highByte);
	return { value, end: pos + byteLength + runs * 4 + extSize };
}

/**
 * Read a string in the layout of the given BIFF version.
 *
 * @param biff - BIFF version (2-8)
 * @param lengthSize - Size of the length prefix in bytes
 * @param decoder - Decoder for pre-BIFF8 byte strings
 */
export function readBiffString(
	data: Uint8Array,
	offset: number,
	biff: number,
	lengthSize: 1 | 2,
	decoder: ByteDecoder,
): StringRead {
	return biff >= 8 ? readUnicodeString(data, offset, lengthSize) : readByteString(data, offset, lengthSize, decoder);
}
