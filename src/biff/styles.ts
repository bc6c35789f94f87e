import type { Border, CellFormat, Font, Workbook } from "../types.js";
import { packU16, writeU16, writeU32, type ByteWriter } from "../utils/buffer.js";
import { builtinFormatIds, isGeneralFormat } from "../ssf/table.js";
import {
	BORDER_STYLE_CODES,
	COLOR_CODES,
	ESCAPEMENT_CODES,
	FIRST_CUSTOM_FORMAT_ID,
	FONT_CHARSET_CODES,
	FONT_FAMILY_CODES,
	FONT_WEIGHTS,
	HORIZONTAL_ALIGN_CODES,
	OPCODE,
	TWIPS,
	UNDERLINE_CODES,
	VERTICAL_ALIGN_CODES,
} from "./internals.js";
import { writeRecord } from "./record.js";
import { unicodeString } from "./unicode.js";

/** Font used when neither a format nor the workbook default names one */
export const DEFAULT_FONT: Font = { name: "Arial", size: 10, family: "swiss" };

/** Number of style XFs that precede the default cell XF */
export const STYLE_XF_COUNT = 15;

/** Index of the default cell format */
export const DEFAULT_XF_INDEX = 15;

/** Parent index written into style XFs */
const NO_PARENT = 0xfff;

/** One entry of the XF table */
export interface XfEntry {
	format: CellFormat;
	/** Style XFs describe cell styles; cell XFs are what cells refer to */
	type: "style" | "cell";
	key: string;
}

/** Clamp a font weight keyword or number into [100, 1000] */
export function fontWeight(weight: Font["weight"]): number {
	const value = typeof weight === "string" ? FONT_WEIGHTS[weight] : (weight ?? FONT_WEIGHTS.normal);
	return Math.max(100, Math.min(1000, value));
}

/** Structural key of a font; equal fonts share a table entry */
function fontKey(font: Font): string {
	return JSON.stringify([
		font.name,
		font.size,
		fontWeight(font.weight),
		!!font.italic,
		font.underline ?? "none",
		!!font.strikeout,
		!!font.outline,
		!!font.shadow,
		font.color ?? "text",
		font.escapement ?? "none",
		font.family ?? "none",
		font.charset ?? "iso-latin-1",
	]);
}

function borderKey(border: Border | undefined): [string, string] {
	return border ? [border.style, border.color ?? "black"] : ["none", "black"];
}

/** Structural key of a cell format, font included */
function formatKey(format: CellFormat, defaultFont: Font): string {
	return JSON.stringify([
		fontKey(format.font ?? defaultFont),
		isGeneralFormat(format.numberFormat) ? "General" : format.numberFormat,
		format.horizontalAlign ?? "default",
		format.verticalAlign ?? "bottom",
		!!format.textWrap,
		format.rotation ?? 0,
		format.indent ?? 0,
		!!format.shrink,
		borderKey(format.left),
		borderKey(format.right),
		borderKey(format.top),
		borderKey(format.bottom),
		format.pattern ?? 0,
		format.patternFgColor ?? "border",
		format.patternBgColor ?? "patternBg",
		format.locked ?? true,
		!!format.hidden,
	]);
}

/** 7-bit palette index as stored in XF color fields */
function xfColor(color: Border["color"], fallback: number): number {
	return (color ? COLOR_CODES[color] : fallback) & 0x7f;
}

/** Rotation in degrees to its XF encoding: 0-90 upwards, 91-180 downwards, 255 stacked */
function encodeRotation(rotation: number | undefined): number {
	if (rotation === undefined || rotation === 0) {
		return 0;
	}
	if (rotation === 255) {
		return 255;
	}
	const clamped = Math.max(-90, Math.min(90, Math.round(rotation)));
	return clamped >= 0 ? clamped : 90 - clamped;
}

/**
 * Font, number-format and XF tables of one workbook.
 *
 * Built once per write: the XF list is fixed at creation, fonts and custom
 * number formats are collected from it in first-seen order.
 */
export interface StyleTables {
	xfs: XfEntry[];
	defaultFont: Font;
	/** Font key to table position */
	fonts: Map<string, number>;
	fontList: Font[];
	/** Pattern to id, built-in patterns included */
	numberFormats: Map<string, number>;
	/** User-defined number formats as [id, pattern] pairs */
	customFormats: Array<[number, string]>;
	/** First XF a cell format may resolve to */
	searchFrom: number;
}

function pushXf(tables: StyleTables, format: CellFormat, type: XfEntry["type"]): void {
	tables.xfs.push({ format, type, key: formatKey(format, tables.defaultFont) });
}

/**
 * @param existingDocument - The declared formats already include the built-in XFs of a stored file
 */
export function createStyleTables(workbook: Workbook, existingDocument = false): StyleTables {
	const tables: StyleTables = {
		xfs: [],
		defaultFont: workbook.defaultFormat.font ?? DEFAULT_FONT,
		fonts: new Map(),
		fontList: [],
		numberFormats: builtinFormatIds(),
		customFormats: [],
		searchFrom: existingDocument ? 0 : DEFAULT_XF_INDEX,
	};
	// XF 15 is the default cell format; 0-14 are style XFs that all use
	// the workbook's default style.
	if (!existingDocument) {
		for (let i = 0; i < STYLE_XF_COUNT; ++i) {
			pushXf(tables, workbook.defaultFormat, "style");
		}
		pushXf(tables, workbook.defaultFormat, "cell");
	}
	for (const format of workbook.formats) {
		pushXf(tables, format, "cell");
	}

	for (const xf of tables.xfs) {
		const font = xf.format.font ?? tables.defaultFont;
		const key = fontKey(font);
		if (!tables.fonts.has(key)) {
			tables.fonts.set(key, tables.fontList.length);
			tables.fontList.push(font);
		}
	}

	let next = FIRST_CUSTOM_FORMAT_ID;
	for (const xf of tables.xfs) {
		const pattern = xf.format.numberFormat;
		if (pattern === undefined || isGeneralFormat(pattern) || tables.numberFormats.has(pattern)) {
			continue;
		}
		tables.numberFormats.set(pattern, next);
		tables.customFormats.push([next, pattern]);
		++next;
	}
	return tables;
}

/**
 * Index a FONT record is referenced by. The first four fonts use their
 * table position; after that the on-disk index skips one slot (index 4
 * is never used by readers).
 */
export function fontIndex(tables: StyleTables, font: Font | undefined): number {
	const idx = tables.fonts.get(fontKey(font ?? tables.defaultFont)) ?? 0;
	return idx > 3 ? idx + 1 : idx;
}

/** Id of a number format pattern; General and unknown patterns resolve to 0 */
export function numberFormatIndex(tables: StyleTables, pattern: string | undefined): number {
	if (pattern === undefined || isGeneralFormat(pattern)) {
		return 0;
	}
	return tables.numberFormats.get(pattern) ?? 0;
}

/**
 * XF index of a format by structural equality, 0 when the workbook does not
 * declare it.
 *
 * A fresh table starts the search at the default cell XF: the style XFs
 * before it share the default format's key but cells must reference cell
 * XFs, so the default format resolves to 15 rather than 0.
 */
export function xfIndex(tables: StyleTables, format: CellFormat): number {
	const key = formatKey(format, tables.defaultFont);
	for (let i = tables.searchFrom; i < tables.xfs.length; ++i) {
		if (tables.xfs[i].key === key) {
			return i;
		}
	}
	return 0;
}

/** FONT records, one per distinct font */
export function writeFonts(tables: StyleTables, out: ByteWriter): void {
	for (const font of tables.fontList) {
		writeFont(out, font);
	}
}

/** FORMAT records for the user-defined number formats */
export function writeNumberFormats(tables: StyleTables, out: ByteWriter): void {
	for (const [id, pattern] of tables.customFormats) {
		// Pattern is a unicode string with a 16-bit length
		writeRecord(out, OPCODE.FORMAT, packU16(id), unicodeString(pattern, 2));
	}
}

/** XF records in table order */
export function writeXfs(tables: StyleTables, out: ByteWriter): void {
	for (const xf of tables.xfs) {
		writeXf(tables, out, xf);
	}
}

function writeXf(tables: StyleTables, out: ByteWriter, xf: XfEntry): void {
	const fmt = xf.format;
	const isStyle = xf.type === "style";
	const data = new Uint8Array(20);
	writeU16(data, 0, fontIndex(tables, fmt.font));
	writeU16(data, 2, numberFormatIndex(tables, fmt.numberFormat));

	let protection = 0;
	if (fmt.locked ?? true) {
		protection |= 0x0001;
	}
	if (fmt.hidden) {
		protection |= 0x0002;
	}
	if (isStyle) {
		protection |= 0x0004 | (NO_PARENT << 4);
	}
	writeU16(data, 4, protection);

	let align = HORIZONTAL_ALIGN_CODES[fmt.horizontalAlign ?? "default"];
	if (fmt.textWrap) {
		align |= 0x08;
	}
	align |= VERTICAL_ALIGN_CODES[fmt.verticalAlign ?? "bottom"] << 4;
	data[6] = align;
	data[7] = encodeRotation(fmt.rotation);
	data[8] = (Math.max(0, Math.min(15, fmt.indent ?? 0)) & 0x0f) | (fmt.shrink ? 0x10 : 0);
	// Attribute groups a cell XF sets on its own: number format, font,
	// alignment, border, area and protection.
	data[9] = isStyle ? 0x00 : 0xfc;

	const [left, right, top, bottom] = [fmt.left, fmt.right, fmt.top, fmt.bottom];
	const black = COLOR_CODES.black;
	let border1 = BORDER_STYLE_CODES[left?.style ?? "none"];
	border1 |= BORDER_STYLE_CODES[right?.style ?? "none"] << 4;
	border1 |= BORDER_STYLE_CODES[top?.style ?? "none"] << 8;
	border1 |= BORDER_STYLE_CODES[bottom?.style ?? "none"] << 12;
	border1 |= (left ? xfColor(left.color, black) : 0) << 16;
	border1 |= (right ? xfColor(right.color, black) : 0) << 23;
	writeU32(data, 10, border1 >>> 0);

	let border2 = top ? xfColor(top.color, black) : 0;
	border2 |= (bottom ? xfColor(bottom.color, black) : 0) << 7;
	border2 |= ((fmt.pattern ?? 0) & 0x3f) << 26;
	writeU32(data, 14, border2 >>> 0);

	const fg = xfColor(fmt.patternFgColor, COLOR_CODES.border);
	const bg = xfColor(fmt.patternBgColor, COLOR_CODES.patternBg);
	writeU16(data, 18, fg | (bg << 7));

	writeRecord(out, OPCODE.XF, data);
}

/** Write one FONT record */
export function writeFont(out: ByteWriter, font: Font): void {
	const weight = fontWeight(font.weight);
	const underline = UNDERLINE_CODES[font.underline ?? "none"];
	let options = 0;
	if (weight > 600) {
		options |= 0x0001;
	}
	if (font.italic) {
		options |= 0x0002;
	}
	if (underline > 0) {
		options |= 0x0004;
	}
	if (font.strikeout) {
		options |= 0x0008;
	}
	if (font.outline) {
		options |= 0x0010;
	}
	if (font.shadow) {
		options |= 0x0020;
	}
	const data = new Uint8Array(14);
	writeU16(data, 0, Math.round(font.size * TWIPS));
	writeU16(data, 2, options);
	writeU16(data, 4, COLOR_CODES[font.color ?? "text"]);
	writeU16(data, 6, weight);
	writeU16(data, 8, ESCAPEMENT_CODES[font.escapement ?? "none"]);
	data[10] = underline;
	data[11] = FONT_FAMILY_CODES[font.family ?? "none"];
	data[12] = FONT_CHARSET_CODES[font.charset ?? "iso-latin-1"];
	// data[13] is reserved
	// Font name: unicode string with an 8-bit length
	writeRecord(out, OPCODE.FONT, data, unicodeString(font.name, 1));
}
