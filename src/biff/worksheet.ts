import type { Cell, CellFormat, CellInput, CellValue, Extent, Worksheet } from "../types.js";
import {
	createByteWriter,
	readBytes,
	seekReader,
	writeF64,
	writerBytes,
	writeU16,
	writeU32,
	type ByteReader,
	type ByteWriter,
} from "../utils/buffer.js";
import { dateToSerialNumber } from "../utils/date.js";
import type { WriterContext } from "./context.js";
import { OPCODE } from "./internals.js";
import { writeRecord } from "./record.js";
import type { SstUpdateMode } from "./sst.js";
import { DEFAULT_XF_INDEX, xfIndex } from "./styles.js";
import { writeBof, writeEof } from "./globals.js";

/** Last row index a sheet can address */
export const MAX_ROW = 0xffff;

/** Last column index a sheet can address */
export const MAX_COL = 0xff;

/** Default row height in twips */
const DEFAULT_ROW_HEIGHT = 0x00ff;

/** ROW option flags: bit 8 is always set */
const ROW_OPTIONS = 0x00000100;

/** WINDOW2: gridlines, headers, zero values, automatic grid color, outline symbols */
const WINDOW2_OPTIONS = 0x00b6;

/** WINDOW2: sheet is selected and displayed */
const WINDOW2_ACTIVE = 0x0600;

function isCell(input: CellInput): input is Cell {
	return typeof input === "object" && input !== null && !(input instanceof Date);
}

/** Split a row entry into value and format */
function unpack(input: CellInput): { value: CellValue | undefined; format?: CellFormat } {
	if (isCell(input)) {
		return { value: input.value, format: input.format };
	}
	return { value: input };
}

/** True when a row entry produces a cell record: a value, or a format on an empty cell */
function occupies(input: CellInput): boolean {
	const { value, format } = unpack(input);
	return (value !== undefined && value !== null) || format !== undefined;
}

/**
 * One worksheet substream.
 *
 * Cell strings are written as references into the workbook's shared string
 * table, so a sheet can only be rendered once the table is final.
 */
export interface SheetWriter {
	worksheet: Worksheet;
	/** Position in tab order */
	index: number;
	/** The rendered substream */
	body: Uint8Array;
	/** Set when {@link renderSheetChanges} produced new bytes instead of reusing the stored ones */
	rerendered: boolean;
}

export function createSheetWriter(worksheet: Worksheet, index: number): SheetWriter {
	return { worksheet, index, body: new Uint8Array(0), rerendered: false };
}

/** String values of the sheet's cells in row-major order, repeats included */
export function sheetStrings(sheet: SheetWriter): string[] {
	const out: string[] = [];
	for (const row of sheet.worksheet.rows) {
		if (!row) {
			continue;
		}
		for (const input of row) {
			const { value } = unpack(input);
			if (typeof value === "string") {
				out.push(value);
			}
		}
	}
	return out;
}

function sheetHasStrings(sheet: SheetWriter): boolean {
	return sheetStrings(sheet).some((str) => str !== "");
}

/**
 * Render the whole substream from the worksheet model.
 * @throws Error when an occupied cell lies beyond the last row or column
 */
export function renderSheet(ctx: WriterContext, sheet: SheetWriter): void {
	const out = createByteWriter(4096);
	const rows = sheet.worksheet.rows;
	writeBof(out, "worksheet");
	writeDimensions(out, rows);
	rows.forEach((row, r) => writeRow(ctx, sheet, out, r, row));
	writeWindow2(out, sheet.index);
	writeEof(out);
	sheet.body = writerBytes(out);
}

/**
 * Bring the substream up to date against a stored copy.
 *
 * A sheet that changed, or that holds strings while the string table is
 * rebuilt, is rendered again; any other sheet keeps its stored bytes.
 *
 * @param reader - Cursor over the stored Workbook stream
 * @param extent - Where the stored substream lives
 * @param mode - How the string table is being updated
 * @param changed - The sheet was modified
 */
export function renderSheetChanges(
	ctx: WriterContext,
	sheet: SheetWriter,
	reader: ByteReader,
	extent: Extent,
	mode: SstUpdateMode,
	changed: boolean,
): void {
	if (changed || (mode === "complete" && sheetHasStrings(sheet))) {
		renderSheet(ctx, sheet);
		sheet.rerendered = true;
		return;
	}
	seekReader(reader, extent.offset);
	sheet.body = readBytes(reader, extent.length);
	sheet.rerendered = false;
}

function writeDimensions(out: ByteWriter, rows: CellInput[][]): void {
	let firstRow = -1;
	let lastRow = -1;
	let firstCol = -1;
	let lastCol = -1;
	rows.forEach((row, r) => {
		row.forEach((input, c) => {
			if (!occupies(input)) {
				return;
			}
			if (firstRow < 0) {
				firstRow = r;
			}
			lastRow = r;
			firstCol = firstCol < 0 ? c : Math.min(firstCol, c);
			lastCol = Math.max(lastCol, c);
		});
	});
	// Last row and column are stored one past the end
	const data = new Uint8Array(14);
	if (firstRow >= 0) {
		writeU32(data, 0, firstRow);
		writeU32(data, 4, lastRow + 1);
		writeU16(data, 8, firstCol);
		writeU16(data, 10, lastCol + 1);
	}
	writeRecord(out, OPCODE.DIMENSIONS, data);
}

function writeRow(ctx: WriterContext, sheet: SheetWriter, out: ByteWriter, r: number, row: CellInput[]): void {
	let first = -1;
	let last = -1;
	row.forEach((input, c) => {
		if (occupies(input)) {
			if (first < 0) {
				first = c;
			}
			last = c;
		}
	});
	if (first < 0) {
		return;
	}
	if (r > MAX_ROW) {
		throw new Error("Row " + r + " of sheet |" + sheet.worksheet.name + "| is past the last row " + MAX_ROW);
	}
	if (last > MAX_COL) {
		throw new Error(
			"Column " + last + " of sheet |" + sheet.worksheet.name + "| is past the last column " + MAX_COL,
		);
	}
	const data = new Uint8Array(16);
	writeU16(data, 0, r);
	writeU16(data, 2, first);
	writeU16(data, 4, last + 1);
	writeU16(data, 6, DEFAULT_ROW_HEIGHT);
	writeU32(data, 12, ROW_OPTIONS);
	writeRecord(out, OPCODE.ROW, data);
	row.forEach((input, c) => writeCell(ctx, out, r, c, input));
}

function writeCell(ctx: WriterContext, out: ByteWriter, r: number, c: number, input: CellInput): void {
	if (!occupies(input)) {
		return;
	}
	const { value, format } = unpack(input);
	const cell = new Uint8Array(6);
	writeU16(cell, 0, r);
	writeU16(cell, 2, c);
	writeU16(cell, 4, format ? xfIndex(ctx.styles, format) : DEFAULT_XF_INDEX);
	if (typeof value === "string" && value !== "") {
		const idx = ctx.sst.get(value);
		if (idx === undefined) {
			throw new Error("String is missing from the shared string table: " + JSON.stringify(value));
		}
		const data = new Uint8Array(4);
		writeU32(data, 0, idx);
		writeRecord(out, OPCODE.LABELSST, cell, data);
	} else if (typeof value === "number" || value instanceof Date) {
		const data = new Uint8Array(8);
		writeF64(data, 0, typeof value === "number" ? value : dateToSerialNumber(value, ctx.options.date1904));
		writeRecord(out, OPCODE.NUMBER, cell, data);
	} else if (typeof value === "boolean") {
		writeRecord(out, OPCODE.BOOLERR, cell, new Uint8Array([value ? 1 : 0, 0]));
	} else {
		writeRecord(out, OPCODE.BLANK, cell);
	}
}

function writeWindow2(out: ByteWriter, index: number): void {
	const data = new Uint8Array(18);
	writeU16(data, 0, index === 0 ? WINDOW2_OPTIONS | WINDOW2_ACTIVE : WINDOW2_OPTIONS);
	// first visible row and column stay 0
	writeU16(data, 6, 0x40); // grid line color: automatic
	// magnifications stay 0: default zoom
	writeRecord(out, OPCODE.WINDOW2, data);
}
