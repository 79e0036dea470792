import iconv from "iconv-lite";

/**
 * Codepage numbers (as stored in the CODEPAGE record) mapped to iconv-lite encoding names.
 *
 * 1200 is UTF-16LE, which BIFF8 always declares; its strings carry their own
 * compression flag, so the decoder only matters for BIFF2-BIFF5 byte strings.
 */
const CODEPAGE_LABELS: Record<number, string> = {
	367: "ascii",
	866: "ibm866",
	874: "windows-874",
	932: "shift_jis",
	936: "gbk",
	949: "euc-kr",
	950: "big5",
	1200: "utf-16le",
	1250: "windows-1250",
	1251: "windows-1251",
	1252: "windows-1252",
	1253: "windows-1253",
	1254: "windows-1254",
	1255: "windows-1255",
	1256: "windows-1256",
	1257: "windows-1257",
	1258: "windows-1258",
	10000: "macintosh",
	10007: "maccyrillic",
	20866: "koi8-r",
	21866: "koi8-u",
	28591: "iso-8859-1",
	28592: "iso-8859-2",
	28595: "iso-8859-5",
	28597: "iso-8859-7",
	65001: "utf-8",
	// BIFF2/BIFF3 write these for "Apple Roman" and "ANSI Latin I"
	32768: "macintosh",
	32769: "windows-1252",
};

/** Encoding used for byte strings until a CODEPAGE record says otherwise */
export const DEFAULT_ENCODING = "windows-1252";

/** Decodes the single- and multi-byte strings of BIFF2-BIFF5 records */
export interface ByteDecoder {
	readonly encoding: string;
	decode(data: Uint8Array): string;
}

function toBuffer(data: Uint8Array): Buffer {
	return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function iconvDecoder(encoding: string): ByteDecoder {
	return { encoding, decode: (data) => iconv.decode(toBuffer(data), encoding) };
}

/**
 * Resolve a codepage number to a decoder.
 *
 * @returns A decoder, or undefined if the codepage is unknown (obfuscated
 *   workbooks write garbage codepages)
 */
export function codepageDecoder(codepage: number): ByteDecoder | undefined {
	const label = CODEPAGE_LABELS[codepage];
	if (label === undefined || !iconv.encodingExists(label)) {
		return undefined;
	}
	return iconvDecoder(label);
}

/** Decoder for {@link DEFAULT_ENCODING} */
export function defaultDecoder(): ByteDecoder {
	return iconvDecoder(DEFAULT_ENCODING);
}

const utf16le = new TextDecoder("utf-16le");

/**
 * Decode BIFF8 character data.
 *
 * BIFF8 strings are UTF-16LE, optionally "compressed" to one byte per
 * character when every high byte is zero, which makes them Latin-1.
 */
export function decodeUnicode(data: Uint8Array, highByte: boolean): string {
	return highByte ? utf16le.decode(data) : iconv.decode(toBuffer(data), "latin1");
}
