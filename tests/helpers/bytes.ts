/** Little-endian writers for building records in tests */

/** Write an unsigned 16-bit little-endian integer to a buffer */
export function writeU16(buf: Uint8Array, off: number, val: number): void {
	buf[off] = val & 0xff;
	buf[off + 1] = (val >> 8) & 0xff;
}

/** Write an unsigned 32-bit little-endian integer to a buffer */
export function writeU32(buf: Uint8Array, off: number, val: number): void {
	buf[off] = val & 0xff;
	buf[off + 1] = (val >> 8) & 0xff;
	buf[off + 2] = (val >> 16) & 0xff;
	buf[off + 3] = (val >> 24) & 0xff;
}

/** Write an IEEE 754 double (little-endian) to a buffer */
export function writeF64(buf: Uint8Array, off: number, val: number): void {
	new DataView(buf.buffer, buf.byteOffset + off, 8).setFloat64(0, val, true);
}
