const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** OLE automation epoch: 1899-12-30T00:00:00Z */
const OA_EPOCH = Date.UTC(1899, 11, 30);

/** Days between the 1900 and 1904 date systems' day zero */
const DATE1904_OFFSET = 1462;

/**
 * Convert an OLE automation date (days since 1899-12-30, fractional part
 * as time of day) to a UTC Date.
 *
 * For negative values the integer part counts days backwards while the
 * fraction still counts time forwards, so -1.25 is 1899-12-29 06:00.
 * The result is rounded to the millisecond.
 */
export function fromOADate(value: number): Date {
	const days = Math.trunc(value);
	const time = Math.abs(value - days);
	return new Date(OA_EPOCH + Math.round((days + time) * MS_PER_DAY));
}

/**
 * Convert a spreadsheet serial date number to a UTC Date.
 *
 * Serial numbers in the 1900 date system count 1900-02-29 (serial 60),
 * a day that never existed; serials below 61 are therefore one day behind
 * the OLE automation calendar and get shifted. The 1904 date system starts
 * 1462 days later and has no phantom day.
 *
 * @param serial - Serial date number
 * @param date1904 - If true, use the 1904 date system
 */
export function serialToDate(serial: number, date1904 = false): Date {
	if (date1904) {
		return fromOADate(serial + DATE1904_OFFSET);
	}
	return fromOADate(serial < 61 ? serial + 1 : serial);
}
