import { readU16, readU32 } from "./bytes.js";
import { decodeUnicode } from "../utils/buffer.js";

/** Cell range and resolved target of an HLINK record */
export interface HyperlinkData {
	firstRow: number;
	lastRow: number;
	firstCol: number;
	lastCol: number;
	/** Target URL; undefined when the record carries no usable target */
	url: string | undefined;
}

const HAS_MONIKER = 0x0001;
const HAS_LOCATION = 0x0008;
const HAS_DISPLAY_NAME = 0x0010;
const HAS_FRAME_NAME = 0x0080;
const MONIKER_SAVED_AS_STRING = 0x0100;

const URL_MONIKER_CLSID = "e0c9ea79f9bace118c8200aa004ba90b";
const FILE_MONIKER_CLSID = "0303000000000000c000000000000046";

/** Sequential little-endian reader that stops (and flags) at the end of the payload */
class Cursor {
	pos: number;
	overrun = false;

	constructor(
		private readonly data: Uint8Array,
		start: number,
	) {
		this.pos = start;
	}

	private take(n: number): number {
		const at = this.pos;
		if (at + n > this.data.length) {
			this.overrun = true;
			this.pos = this.data.length;
			return -1;
		}
		this.pos += n;
		return at;
	}

	u16(): number {
		const at = this.take(2);
		return at < 0 ? 0 : readU16(this.data, at);
	}

	u32(): number {
		const at = this.take(4);
		return at < 0 ? 0 : readU32(this.data, at);
	}

	bytes(n: number): Uint8Array {
		const at = this.take(n);
		return at < 0 ? new Uint8Array(0) : this.data.subarray(at, at + n);
	}
}

function hex(bytes: Uint8Array): string {
	return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}

function stripNul(s: string): string {
	const nul = s.indexOf("\u0000");
	return nul < 0 ? s : s.slice(0, nul);
}

/** HyperlinkString: character count (including the terminating NUL) then UTF-16LE */
function readHyperlinkString(cur: Cursor): string {
	const cch = cur.u32();
	return stripNul(decodeUnicode(cur.bytes(cch * 2), true));
}

function readMoniker(cur: Cursor): string | undefined {
	const clsid = hex(cur.bytes(16));
	if (clsid === URL_MONIKER_CLSID) {
		const length = cur.u32();
		return stripNul(decodeUnicode(cur.bytes(length), true));
	}
	if (clsid === FILE_MONIKER_CLSID) {
		const upLevels = cur.u16();
		const ansiLength = cur.u32();
		let path = stripNul(decodeUnicode(cur.bytes(ansiLength), false));
		// endServer, versionNumber, 16 reserved bytes, 4 reserved bytes
		cur.bytes(24);
		const unicodeSize = cur.u32();
		if (unicodeSize > 0) {
			const unicodeBytes = cur.u32();
			cur.u16();
			path = decodeUnicode(cur.bytes(unicodeBytes), true);
		}
		return "../".repeat(upLevels) + path;
	}
	return undefined;
}

/**
 * Decode an HLINK record payload.
 *
 * The target is the moniker (URL or file path), with the location string
 * appended after "#" when both are present; a link to a place inside the
 * workbook has only the location.
 */
export function decodeHyperlink(data: Uint8Array): HyperlinkData {
	const cur = new Cursor(data, 0);
	const firstRow = cur.u16();
	const lastRow = cur.u16();
	const firstCol = cur.u16();
	const lastCol = cur.u16();
	// hlinkClsid, streamVersion
	cur.bytes(20);
	const flags = cur.u32();

	if (flags & HAS_DISPLAY_NAME) {
		readHyperlinkString(cur);
	}
	if (flags & HAS_FRAME_NAME) {
		readHyperlinkString(cur);
	}
	let target: string | undefined;
	if (flags & HAS_MONIKER) {
		target = flags & MONIKER_SAVED_AS_STRING ? readHyperlinkString(cur) : readMoniker(cur);
	}
	let location: string | undefined;
	if (flags & HAS_LOCATION) {
		location = readHyperlinkString(cur);
	}

	let url: string | undefined;
	if (!cur.overrun) {
		if (target && location) {
			url = `${target}#${location}`;
		} else {
			url = target || location || undefined;
		}
	}
	return { firstRow, lastRow, firstCol, lastCol, url };
}
