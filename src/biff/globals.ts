import type { GlobalRecordName } from "../types.js";
import { packU16, writeU16, writeU32, type ByteWriter } from "../utils/buffer.js";
import type { WriterContext } from "./context.js";
import {
	BIFF_VERSION,
	BOF_TYPES,
	BUILD_ID,
	BUILD_YEAR,
	codepageFor,
	OPCODE,
	RECORD_HEADER_SIZE,
	VISIBILITY_CODES,
	type BofType,
} from "./internals.js";
import { writePlaceholder, writeRecord } from "./record.js";
import { unicodeString } from "./unicode.js";
import { writeFonts, writeNumberFormats, writeXfs } from "./styles.js";
import type { SheetWriter } from "./worksheet.js";

/** Fixed part of a BOUNDSHEET payload: offset, visibility, sheet type */
const BOUNDSHEET_FIXED_SIZE = 6;

/** BOF: starts the globals substream and every sheet substream */
export function writeBof(out: ByteWriter, type: BofType): void {
	const data = new Uint8Array(16);
	writeU16(data, 0, BIFF_VERSION);
	writeU16(data, 2, BOF_TYPES[type]);
	writeU16(data, 4, BUILD_ID);
	writeU16(data, 6, BUILD_YEAR);
	writeU32(data, 8, 0x0000); // file history flags
	writeU32(data, 12, 0x0006); // lowest Excel version that can read every record
	writeRecord(out, OPCODE.BOF, data);
}

export function writeEof(out: ByteWriter): void {
	writeRecord(out, OPCODE.EOF);
}

/** CODEPAGE for the given encoding name */
export function writeCodepage(out: ByteWriter, encoding: string): void {
	writePlaceholder(out, OPCODE.CODEPAGE, codepageFor(encoding));
}

/** DSF: 0 = only the BIFF8 Workbook stream is present */
export function writeDsf(out: ByteWriter): void {
	writePlaceholder(out, OPCODE.DSF, 0x0000);
}

/** TABID: sheet ids in tab order */
export function writeTabid(out: ByteWriter, sheetCount: number): void {
	const ids: number[] = [];
	for (let i = 1; i <= Math.max(1, sheetCount); ++i) {
		ids.push(i);
	}
	writeRecord(out, OPCODE.TABID, packU16(...ids));
}

export function writeWindow1(out: ByteWriter): void {
	const data = packU16(
		0x0000, // horizontal position (twips)
		0x0000, // vertical position (twips)
		0x4000, // width (twips)
		0x2000, // height (twips)
		0x0038, // scroll bars and tab bar visible
		0x0000, // active sheet
		0x0000, // first visible tab
		0x0001, // selected sheets
		0x00e5, // tab bar width, 1/1000 of window width
	);
	writeRecord(out, OPCODE.WINDOW1, data);
}

/** DATEMODE: 0 = dates count from 1899-12-31, 1 = from 1904-01-01 */
export function writeDatemode(out: ByteWriter, date1904: boolean): void {
	writePlaceholder(out, OPCODE.DATEMODE, date1904 ? 1 : 0);
}

/** STYLE: the built-in Normal style, pointing at XF 0 */
export function writeStyle(out: ByteWriter): void {
	// built-in style, XF index 0; Normal; outline level unused
	writeRecord(out, OPCODE.STYLE, new Uint8Array([0x00, 0x80, 0x00, 0xff]));
}

/**
 * Absolute stream offset of every sheet's BOF.
 *
 * Runs in two phases: the BOUNDSHEET records come before the sheets, so
 * their combined size is added first, then sheet sizes accumulate in order.
 *
 * @param sheets - Sheets in tab order, already rendered
 * @param base - Stream size before the sheets, not counting BOUNDSHEET records
 */
export function sheetOffsets(sheets: readonly SheetWriter[], base: number): number[] {
	let offset = base;
	for (const sheet of sheets) {
		offset += boundsheetSize(sheet);
	}
	return accumulateOffsets(sheets, offset);
}

/** Offsets of consecutive sheets starting at `first` */
export function accumulateOffsets(sheets: readonly SheetWriter[], first: number): number[] {
	const offsets: number[] = [];
	let offset = first;
	for (const sheet of sheets) {
		offsets.push(offset);
		offset += sheet.body.length;
	}
	return offsets;
}

/** BOUNDSHEET records, one per sheet */
export function writeBoundsheets(out: ByteWriter, sheets: readonly SheetWriter[], offsets: readonly number[]): void {
	sheets.forEach((sheet, i) => {
		const data = new Uint8Array(BOUNDSHEET_FIXED_SIZE);
		writeU32(data, 0, offsets[i]);
		data[4] = VISIBILITY_CODES[sheet.worksheet.visibility ?? "visible"];
		// data[5] = 0: worksheet
		writeRecord(out, OPCODE.BOUNDSHEET, data, unicodeString(sheet.worksheet.name, 1));
	});
}

/** Bytes taken by a sheet's BOUNDSHEET record */
export function boundsheetSize(sheet: SheetWriter): number {
	return RECORD_HEADER_SIZE + BOUNDSHEET_FIXED_SIZE + unicodeString(sheet.worksheet.name, 1).length;
}

/** Total size of the BOUNDSHEET records */
export function boundsheetsSize(sheets: readonly SheetWriter[]): number {
	return sheets.reduce((sum, sheet) => sum + boundsheetSize(sheet), 0);
}

/** Write one global record, or record block, by name */
export function writeGlobalRecord(ctx: WriterContext, out: ByteWriter, record: GlobalRecordName): void {
	switch (record) {
		case "bof":
			return writeBof(out, "globals");
		case "codepage":
			return writeCodepage(out, ctx.options.encoding);
		case "dsf":
			return writeDsf(out);
		case "tabid":
			return writeTabid(out, ctx.sheets.length);
		case "protect":
			return writePlaceholder(out, OPCODE.PROTECT);
		case "password":
			return writePlaceholder(out, OPCODE.PASSWORD);
		case "window1":
			return writeWindow1(out);
		case "datemode":
			return writeDatemode(out, ctx.options.date1904);
		case "precision":
			// 1 = calculate with full precision, not displayed values
			return writePlaceholder(out, OPCODE.PRECISION, 0x0001);
		case "refreshall":
			return writePlaceholder(out, OPCODE.REFRESHALL);
		case "bookbool":
			return writePlaceholder(out, OPCODE.BOOKBOOL);
		case "fonts":
			return writeFonts(ctx.styles, out);
		case "numberFormats":
			return writeNumberFormats(ctx.styles, out);
		case "xfs":
			return writeXfs(ctx.styles, out);
		case "style":
			return writeStyle(out);
		case "eof":
			return writeEof(out);
		default: {
			const unreachable: never = record;
			throw new Error("Unknown global record " + String(unreachable));
		}
	}
}
