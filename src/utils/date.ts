/** Milliseconds per day */
const DAY_MS = 24 * 60 * 60 * 1000;

/** Day zero of serial dates from March 1900 on: 1899-12-30T00:00:00Z */
const EPOCH_1900 = Date.UTC(1899, 11, 30, 0, 0, 0);

/** Days between 1899-12-30 and 1904-01-01 */
const EPOCH_1904_OFFSET = 1462;

/**
 * Convert a JavaScript Date to an Excel serial date number.
 *
 * The 1900 date system counts the fictitious 1900-02-29 as serial 60, so
 * dates before March 1900 are one day lower than their distance from
 * 1899-12-30. The 1904 system counts plain days from 1904-01-01.
 *
 * @param v - JavaScript Date to convert, read as UTC
 * @param date1904 - Use the 1904 date system
 * @returns Excel serial date number, fractional for times of day
 */
export function dateToSerialNumber(v: Date, date1904?: boolean): number {
	const days = (v.getTime() - EPOCH_1900) / DAY_MS;
	if (date1904) {
		return days - EPOCH_1904_OFFSET;
	}
	return days < 61 ? days - 1 : days;
}
