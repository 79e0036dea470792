import { isDateFormat } from "./format.js";

/** How a number format presents a cell value */
export type FormatKind = "number" | "date" | "text";

/**
 * Builtin number formats that legacy workbooks reference by code without
 * writing a FORMAT record. Codes 23-36 and 50 upward are locale-dependent
 * and are resolved through the workbook's own FORMAT records instead.
 */
export const BUILTIN_FORMATS: Readonly<Record<number, string>> = {
	0: "General",
	1: "0",
	2: "0.00",
	3: "#,##0",
	4: "#,##0.00",
	5: '"$"#,##0_);\\("$"#,##0\\)',
	6: '"$"#,##0_);[Red]\\("$"#,##0\\)',
	7: '"$"#,##0.00_);\\("$"#,##0.00\\)',
	8: '"$"#,##0.00_);[Red]\\("$"#,##0.00\\)',
	9: "0%",
	10: "0.00%",
	11: "0.00E+00",
	12: "# ?/?",
	13: "# ??/??",
	14: "m/d/yy",
	15: "d-mmm-yy",
	16: "d-mmm",
	17: "mmm-yy",
	18: "h:mm AM/PM",
	19: "h:mm:ss AM/PM",
	20: "h:mm",
	21: "h:mm:ss",
	22: "m/d/yy h:mm",
	37: "#,##0 ;(#,##0)",
	38: "#,##0 ;[Red](#,##0)",
	39: "#,##0.00;(#,##0.00)",
	40: "#,##0.00;[Red](#,##0.00)",
	41: '_(* #,##0_);_(* \\(#,##0\\);_(* "-"_);_(@_)',
	42: '_("$"* #,##0_);_("$"* \\(#,##0\\);_("$"* "-"_);_(@_)',
	43: '_(* #,##0.00_);_(* \\(#,##0.00\\);_(* "-"??_);_(@_)',
	44: '_("$"* #,##0.00_);_("$"* \\(#,##0.00\\);_("$"* "-"??_);_(@_)',
	45: "mm:ss",
	46: "[h]:mm:ss",
	47: "mmss.0",
	48: "##0.0E+0",
	49: "@",
};

/** Format code of the builtin text format ("@") */
export const TEXT_FORMAT_CODE = 49;

/**
 * Classify a builtin format code.
 *
 * @returns The format's kind, or undefined if the code is not builtin
 */
export function builtinFormatKind(code: number): FormatKind | undefined {
	if (code === TEXT_FORMAT_CODE) {
		return "text";
	}
	if ((code >= 14 && code <= 22) || (code >= 45 && code <= 47)) {
		return "date";
	}
	if ((code >= 0 && code <= 13) || (code >= 37 && code <= 44) || code === 48) {
		return "number";
	}
	return undefined;
}

/**
 * Classify a custom format pattern.
 */
export function patternFormatKind(pattern: string): FormatKind {
	return isDateFormat(pattern) ? "date" : "number";
}
