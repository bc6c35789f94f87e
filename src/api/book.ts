import type {
	CellFormat,
	CellInput,
	ChangeKey,
	SheetVisibility,
	Workbook,
	Worksheet,
	WrittenWorkbook,
} from "../types.js";
import { validateSheetName } from "../biff/workbook.js";
import { DEFAULT_FONT } from "../biff/styles.js";

/** Create a new blank workbook, optionally with a first sheet */
export function createWorkbook(ws?: Worksheet, wsname?: string): Workbook {
	const wb: Workbook = { worksheets: [], formats: [], defaultFormat: { font: { ...DEFAULT_FONT } } };
	if (ws) {
		appendSheet(wb, ws, wsname || ws.name || "Sheet1");
	}
	return wb;
}

/** Create a new worksheet; the name is settled when it is appended */
export function createSheet(rows: CellInput[][] = [], name = ""): Worksheet {
	return { name, rows };
}

/**
 * Add a worksheet to the end of a workbook.
 *
 * Detaches any stored source, since the stored file has no room for the sheet.
 */
export function appendSheet(wb: Workbook, ws: Worksheet, name?: string, roll?: boolean): string {
	const names = wb.worksheets.map((sheet) => sheet.name);
	let candidate = name || ws.name || undefined;
	let i = 1;
	if (!candidate) {
		for (; i <= 0xffff; ++i, candidate = undefined) {
			if (!names.includes((candidate = "Sheet" + i))) {
				break;
			}
		}
	}
	if (!candidate || names.length >= 0xffff) {
		throw new Error("Too many worksheets");
	}
	if (roll && names.includes(candidate) && candidate.length < 32) {
		const m = candidate.match(/\d+$/);
		i = (m && +m[0]) || 0;
		const root = (m && candidate.slice(0, m.index)) || candidate;
		for (++i; i <= 0xffff; ++i) {
			if (!names.includes((candidate = root + i))) {
				break;
			}
		}
	}
	validateSheetName(candidate);
	if (names.includes(candidate)) {
		throw new Error("Worksheet with name |" + candidate + "| already exists!");
	}

	ws.name = candidate;
	wb.worksheets.push(ws);
	// A stored file cannot take a new sheet; the next write builds from scratch
	wb.source = undefined;
	wb.changes = undefined;
	return candidate;
}

/** Find sheet index for given name or validate index */
export function getSheetIndex(wb: Workbook, sh: number | string): number {
	if (typeof sh === "number") {
		if (sh >= 0 && wb.worksheets.length > sh) {
			return sh;
		}
		throw new Error("Cannot find sheet # " + sh);
	}
	const idx = wb.worksheets.findIndex((ws) => ws.name === sh);
	if (idx > -1) {
		return idx;
	}
	throw new Error("Cannot find sheet name |" + sh + "|");
}

/**
 * Record that a region of the stored file is out of date.
 *
 * Does nothing for a workbook without a stored source, which is always
 * written in full.
 */
export function markChanged(wb: Workbook, key: ChangeKey): void {
	if (!wb.source) {
		return;
	}
	if (!wb.changes) {
		wb.changes = [];
	}
	const id = JSON.stringify(key);
	if (!wb.changes.some((change) => JSON.stringify(change) === id)) {
		wb.changes.push(key);
	}
}

/** Set sheet visibility */
export function setSheetVisibility(wb: Workbook, sh: number | string, vis: SheetVisibility): void {
	const idx = getSheetIndex(wb, sh);
	switch (vis) {
		case "visible":
		case "hidden":
		case "veryHidden":
			break;
		default:
			throw new Error("Bad sheet visibility setting " + String(vis));
	}
	wb.worksheets[idx].visibility = vis;
	markChanged(wb, { type: "sst-boundsheets" });
}

/**
 * Set one cell of a sheet, growing the rows as needed.
 *
 * @param r - Zero-based row
 * @param c - Zero-based column
 */
export function setCell(wb: Workbook, sh: number | string, r: number, c: number, input: CellInput): void {
	const idx = getSheetIndex(wb, sh);
	const rows = wb.worksheets[idx].rows;
	while (rows.length <= r) {
		rows.push([]);
	}
	rows[r][c] = input;
	markChanged(wb, { type: "worksheet", index: idx });
}

/**
 * Declare a cell format so it gets its own XF record. Cells may use a
 * format without declaring it, but then they fall back to XF 0.
 *
 * @returns The declared format, for use in cells
 */
export function addFormat(wb: Workbook, format: CellFormat): CellFormat {
	wb.formats.push(format);
	markChanged(wb, { type: "global", record: "fonts" });
	markChanged(wb, { type: "global", record: "numberFormats" });
	markChanged(wb, { type: "global", record: "xfs" });
	return format;
}

/**
 * Remember a written file as the workbook's stored source, so the next write
 * only renders what changed afterwards.
 */
export function attachSource(wb: Workbook, written: WrittenWorkbook): Workbook {
	wb.source = written.source;
	wb.changes = [];
	return wb;
}
