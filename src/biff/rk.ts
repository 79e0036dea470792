/**
 * Decode an RK number.
 *
 * Bit 0 set: the value was multiplied by 100. Bit 1 set: bits 2-31 hold a
 * signed 30-bit integer; clear: they are the top 30 bits of an IEEE double
 * whose remaining 34 bits are zero.
 */
export function decodeRk(rk: number): number {
	let value: number;
	if (rk & 0x02) {
		value = rk >> 2;
	} else {
		const view = new DataView(new ArrayBuffer(8));
		view.setUint32(0, 0, true);
		view.setUint32(4, (rk & 0xfffffffc) >>> 0, true);
		value = view.getFloat64(0, true);
	}
	return rk & 0x01 ? value / 100 : value;
}
