/*
 * Number-format pattern classification.
 *
 * A pattern can hold up to four ";"-separated sections, each mixing literal
 * text, date/time placeholders (y, m, d, h, s), number placeholders (0, #, ?)
 * and bracketed directives ([Red], [$-409], [h]). Only the date/time question
 * is answered here; values are never rendered.
 */

/** Whether `s` spells "General" (any case) starting at `i` */
function isGeneralAt(s: string, i: number): boolean {
	return s.substring(i, i + 7).toLowerCase() === "general";
}

/** Elapsed-time directives such as [h], [mm] or [ss] */
const ELAPSED_TIME = /\[[HhMmSsชนท]*\]/;

const NUMBER_TOKEN_CHARS = "0#?.,E+-%";

/**
 * Determine whether a number-format pattern displays a date or time.
 *
 * Walks the pattern, skipping quoted literals, escaped and padding
 * characters, number placeholders and color/condition blocks, and returns
 * true at the first date/time token. Locale-specific separators between
 * tokens play no part.
 *
 * @param fmt - Number-format pattern, e.g. "yyyy-mm-dd" or "#,##0.00"
 * @returns true if the pattern contains a date or time token
 */
export function isDateFormat(fmt: string): boolean {
	let i = 0;
	while (i < fmt.length) {
		const c = fmt.charAt(i);
		switch (c) {
			case "G":
			case "g":
				if (isGeneralAt(fmt, i)) {
					i += 7;
					break;
				}
				// "g" on its own is an era placeholder
				return true;
			case '"':
				// quoted literal
				i = fmt.indexOf('"', i + 1);
				if (i < 0) {
					return false;
				}
				++i;
				break;
			case "\\":
			case "_":
				i += 2;
				break;
			// B1/B2 select the Gregorian or Hijri calendar, b is the Buddhist year
			case "B":
			case "b":
			case "M":
			case "D":
			case "Y":
			case "H":
			case "S":
			case "E":
			case "m":
			case "d":
			case "y":
			case "h":
			case "s":
			case "e":
				return true;
			case "A":
			case "a":
			case "上": {
				const ampm = fmt.substring(i, i + 5).toUpperCase();
				if (fmt.substring(i, i + 3).toUpperCase() === "A/P" || ampm === "AM/PM" || ampm === "上午/下午") {
					return true;
				}
				++i;
				break;
			}
			case "[": {
				const close = fmt.indexOf("]", i);
				const block = close < 0 ? fmt.substring(i) : fmt.substring(i, close + 1);
				if (ELAPSED_TIME.test(block)) {
					return true;
				}
				i = close < 0 ? fmt.length : close + 1;
				break;
			}
			case ".":
			case "0":
			case "#":
				++i;
				while (i < fmt.length) {
					const n = fmt.charAt(i);
					if (NUMBER_TOKEN_CHARS.includes(n)) {
						++i;
					} else if (n === "\\" && fmt.charAt(i + 1) === "-" && "0#".includes(fmt.charAt(i + 2))) {
						i += 2;
					} else {
						break;
					}
				}
				break;
			case "*":
				// fill character
				i += 2;
				break;
			default:
				++i;
				break;
		}
	}
	return false;
}
