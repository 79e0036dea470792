import { decodeUnicode } from "../utils/buffer.js";

const FLAG_HIGH_BYTE = 0x01;
const FLAG_EXT = 0x04;
const FLAG_RICH = 0x08;

/**
 * Byte cursor over the SST payload and its CONTINUE payloads.
 *
 * Fixed-size fields and trailing run/extended data flow across record
 * boundaries as if the payloads were concatenated. Character data does
 * not: each continuation of a string's characters starts with a fresh
 * option-flags byte that says whether the rest is compressed.
 */
class SegmentCursor {
	private segment = 0;
	private pos = 0;

	constructor(private readonly segments: readonly Uint8Array[]) {}

	private get current(): Uint8Array | undefined {
		return this.segments[this.segment];
	}

	/** Move past exhausted segments; false at the end of the data */
	private settle(): boolean {
		let seg = this.current;
		while (seg && this.pos >= seg.length) {
			this.segment++;
			this.pos = 0;
			seg = this.current;
		}
		return seg !== undefined;
	}

	get done(): boolean {
		return !this.settle();
	}

	byte(): number {
		if (!this.settle()) {
			return 0;
		}
		const seg = this.current;
		return seg ? seg[this.pos++] : 0;
	}

	u16(): number {
		return this.byte() | (this.byte() << 8);
	}

	u32(): number {
		return (this.u16() | (this.u16() << 16)) >>> 0;
	}

	skip(n: number): void {
		let left = n;
		while (left > 0 && this.settle()) {
			const seg = this.current;
			if (!seg) {
				return;
			}
			const step = Math.min(left, seg.length - this.pos);
			this.pos += step;
			left -= step;
		}
	}

	/** Read `cch` characters, honoring a flags byte at the start of every continuation */
	chars(cch: number, highByteAtStart: boolean): string {
		let highByte = highByteAtStart;
		let remaining = cch;
		const parts: string[] = [];
		while (remaining > 0) {
			const seg = this.current;
			if (!seg) {
				break;
			}
			if (this.pos >= seg.length) {
				this.segment++;
				this.pos = 0;
				const next = this.current;
				if (!next || next.length === 0) {
					continue;
				}
				highByte = (next[this.pos++] & FLAG_HIGH_BYTE) !== 0;
				continue;
			}
			const width = highByte ? 2 : 1;
			const take = Math.min(remaining, Math.floor((seg.length - this.pos) / width));
			if (take === 0) {
				// half a character at the end of a record
				this.pos = seg.length;
				continue;
			}
			parts.push(decodeUnicode(seg.subarray(this.pos, this.pos + take * width), highByte));
			this.pos += take * width;
			remaining -= take;
		}
		return parts.join("");
	}
}

/**
 * Accumulates the shared-string table while the workbook globals are parsed.
 *
 * An SST record starts a new table; CONTINUE records extend the active one
 * until any other record ends it. The strings are materialized in one go once
 * the globals are complete.
 */
export class SharedStringsBuilder {
	private segments: Uint8Array[] = [];
	private active = false;

	/** Start a new table from an SST payload */
	begin(data: Uint8Array): void {
		this.segments = [data];
		this.active = true;
	}

	/**
	 * Offer a CONTINUE payload.
	 *
	 * @returns true if a table was being accumulated and took the payload
	 */
	continue(data: Uint8Array): boolean {
		if (!this.active) {
			return false;
		}
		this.segments.push(data);
		return true;
	}

	/** Stop accepting CONTINUE payloads */
	end(): void {
		this.active = false;
	}

	/**
	 * Decode every string of the table.
	 *
	 * Stops early, keeping what was decoded, if the data runs out before the
	 * declared unique-string count is reached.
	 */
	build(): readonly string[] {
		this.active = false;
		if (this.segments.length === 0) {
			return Object.freeze([]);
		}
		const cur = new SegmentCursor(this.segments);
		cur.u32(); // total references
		const unique = cur.u32();
		const strings: string[] = [];
		while (strings.length < unique && !cur.done) {
			const cch = cur.u16();
			const flags = cur.byte();
			const runs = flags & FLAG_RICH ? cur.u16() : 0;
			const extSize = flags & FLAG_EXT ? cur.u32() : 0;
			strings.push(cur.chars(cch, (flags & FLAG_HIGH_BYTE) !== 0));
			cur.skip(runs * 4 + extSize);
		}
		return Object.freeze(strings);
	}
}
