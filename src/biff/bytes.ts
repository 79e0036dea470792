/** Read an unsigned 16-bit little-endian integer from a buffer */
export function readU16(buf: Uint8Array, off: number): number {
	return buf[off] | (buf[off + 1] << 8);
}

/** Read an unsigned 32-bit little-endian integer from a buffer */
export function readU32(buf: Uint8Array, off: number): number {
	return (buf[off] | (buf[off + 1] << 8) | (buf[off + 2] << 16) | (buf[off + 3] << 24)) >>> 0;
}

/** Read an IEEE 754 double (little-endian) from a buffer */
export function readF64(buf: Uint8Array, off: number): number {
	return new DataView(buf.buffer, buf.byteOffset + off, 8).getFloat64(0, true);
}
