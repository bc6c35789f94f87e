/** Pattern of number format 0 */
export const GENERAL_FORMAT = "General";

/**
 * Built-in number formats of a US-English installation.
 *
 * From BIFF5 on these are not written to the file; Excel fills them in from
 * the regional settings. Ids 0-163 are reserved for them.
 *
 * @returns Map of format id to pattern
 */
export function initFormatTable(): Record<number, string> {
	const t: Record<number, string> = {};
	t[0] = GENERAL_FORMAT;
	t[1] = "0";
	t[2] = "0.00";
	t[3] = "#,##0";
	t[4] = "#,##0.00";
	t[5] = '"$"#,##0_);\\("$"#,##0\\)';
	t[6] = '"$"#,##0_);[Red]\\("$"#,##0\\)';
	t[7] = '"$"#,##0.00_);\\("$"#,##0.00\\)';
	t[8] = '"$"#,##0.00_);[Red]\\("$"#,##0.00\\)';
	t[9] = "0%";
	t[10] = "0.00%";
	t[11] = "0.00E+00";
	t[12] = "# ?/?";
	t[13] = "# ??/??";
	t[14] = "m/d/yy";
	t[15] = "d-mmm-yy";
	t[16] = "d-mmm";
	t[17] = "mmm-yy";
	t[18] = "h:mm AM/PM";
	t[19] = "h:mm:ss AM/PM";
	t[20] = "h:mm";
	t[21] = "h:mm:ss";
	t[22] = "m/d/yy h:mm";
	t[37] = "#,##0 ;(#,##0)";
	t[38] = "#,##0 ;[Red](#,##0)";
	t[39] = "#,##0.00;(#,##0.00)";
	t[40] = "#,##0.00;[Red](#,##0.00)";
	// Accounting formats: "_" pads by the width of the next character
	t[41] = '_(* #,##0_);_(* \\(#,##0\\);_(* "-"_);_(@_)';
	t[42] = '_("$"* #,##0_);_("$"* \\(#,##0\\);_("$"* "-"_);_(@_)';
	t[43] = '_(* #,##0.00_);_(* \\(#,##0.00\\);_(* "-"??_);_(@_)';
	t[44] = '_("$"* #,##0.00_);_("$"* \\(#,##0.00\\);_("$"* "-"??_);_(@_)';
	t[45] = "mm:ss";
	t[46] = "[h]:mm:ss";
	t[47] = "mmss.0";
	t[48] = "##0.0E+0";
	t[49] = "@";
	return t;
}

/** True for the pattern that means "no formatting" */
export function isGeneralFormat(pattern: string | undefined): boolean {
	return pattern === undefined || pattern.toLowerCase() === GENERAL_FORMAT.toLowerCase();
}

/**
 * Reverse lookup of the built-in table: pattern to id.
 *
 * The General pattern is left out so that a declared format using it is
 * never mistaken for a custom pattern that needs registering.
 */
export function builtinFormatIds(): Map<string, number> {
	const ids = new Map<string, number>();
	for (const [id, pattern] of Object.entries(initFormatTable())) {
		if (!isGeneralFormat(pattern) && !ids.has(pattern)) {
			ids.set(pattern, Number(id));
		}
	}
	return ids;
}
