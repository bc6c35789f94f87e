import type {
	BorderStyle,
	ColorName,
	Escapement,
	FontCharset,
	FontFamily,
	GlobalRecordName,
	HorizontalAlign,
	SheetVisibility,
	Underline,
	VerticalAlign,
} from "../types.js";

/** BIFF8 record identifiers */
export const OPCODE = {
	BOF: 0x0809,
	EOF: 0x000a,
	CONTINUE: 0x003c,
	CODEPAGE: 0x0042,
	DSF: 0x0161,
	TABID: 0x013d,
	PROTECT: 0x0012,
	PASSWORD: 0x0013,
	WINDOW1: 0x003d,
	DATEMODE: 0x0022,
	PRECISION: 0x000e,
	REFRESHALL: 0x01b7,
	BOOKBOOL: 0x00da,
	FONT: 0x0031,
	FORMAT: 0x041e,
	XF: 0x00e0,
	STYLE: 0x0293,
	BOUNDSHEET: 0x0085,
	SST: 0x00fc,
	EXTSST: 0x00ff,
	DIMENSIONS: 0x0200,
	ROW: 0x0208,
	BLANK: 0x0201,
	NUMBER: 0x0203,
	BOOLERR: 0x0205,
	LABELSST: 0x00fd,
	WINDOW2: 0x023e,
} as const;

/** Largest payload a single record may carry */
export const RECORD_SIZE_LIMIT = 8224;

/** Bytes taken by a record's opcode and length fields */
export const RECORD_HEADER_SIZE = 4;

/** BIFF version tag written into every BOF */
export const BIFF_VERSION = 0x0600;
export const BUILD_ID = 3515;
export const BUILD_YEAR = 1996;

/** Substream types announced by a BOF record */
export const BOF_TYPES = {
	globals: 0x0005,
	visualBasic: 0x0006,
	worksheet: 0x0010,
	chart: 0x0020,
	macroSheet: 0x0040,
	workspace: 0x0100,
} as const;

export type BofType = keyof typeof BOF_TYPES;

/** Number of strings covered by one EXTSST bucket */
export const EXTSST_BUCKET_SIZE = 8;

/** First id available to user-defined number formats */
export const FIRST_CUSTOM_FORMAT_ID = 0xa4;

/** Font height unit: 1/20 of a point */
export const TWIPS = 20;

/** Default BIFF8 palette indices */
export const COLOR_CODES: Record<ColorName, number> = {
	builtinBlack: 0x00,
	builtinWhite: 0x01,
	builtinRed: 0x02,
	builtinGreen: 0x03,
	builtinBlue: 0x04,
	builtinYellow: 0x05,
	builtinMagenta: 0x06,
	builtinCyan: 0x07,
	black: 0x08,
	white: 0x09,
	red: 0x0a,
	lime: 0x0b,
	blue: 0x0c,
	yellow: 0x0d,
	magenta: 0x0e,
	cyan: 0x0f,
	brown: 0x10,
	green: 0x11,
	navy: 0x12,
	olive: 0x13,
	purple: 0x14,
	teal: 0x15,
	silver: 0x16,
	gray: 0x17,
	orange: 0x34,
	border: 0x40,
	patternBg: 0x41,
	dialogBg: 0x43,
	chartText: 0x4d,
	chartBg: 0x4e,
	chartBorder: 0x4f,
	tooltipBg: 0x50,
	tooltipText: 0x51,
	text: 0x7fff,
};

export const FONT_WEIGHTS = {
	normal: 400,
	bold: 700,
} as const;

export const ESCAPEMENT_CODES: Record<Escapement, number> = {
	none: 0x0000,
	superscript: 0x0001,
	subscript: 0x0002,
};

export const UNDERLINE_CODES: Record<Underline, number> = {
	none: 0x00,
	single: 0x01,
	double: 0x02,
	singleAccounting: 0x21,
	doubleAccounting: 0x22,
};

export const FONT_FAMILY_CODES: Record<FontFamily, number> = {
	none: 0x00,
	roman: 0x01,
	swiss: 0x02,
	modern: 0x03,
	script: 0x04,
	decorative: 0x05,
};

export const FONT_CHARSET_CODES: Record<FontCharset, number> = {
	"iso-latin-1": 0x00,
	default: 0x01,
	symbol: 0x02,
	"apple-roman": 0x4d,
	"shift-jis": 0x80,
	"korean-hangul": 0x81,
	"korean-johab": 0x82,
	"chinese-simplified": 0x86,
	"chinese-traditional": 0x88,
	greek: 0xa1,
	turkish: 0xa2,
	vietnamese: 0xa3,
	hebrew: 0xb1,
	arabic: 0xb2,
	baltic: 0xba,
	cyrillic: 0xcc,
	thai: 0xde,
	"iso-latin-2": 0xee,
	"oem-latin-1": 0xff,
};

export const HORIZONTAL_ALIGN_CODES: Record<HorizontalAlign, number> = {
	default: 0,
	left: 1,
	center: 2,
	right: 3,
	fill: 4,
	justify: 5,
	centerAcross: 6,
	distributed: 7,
};

export const VERTICAL_ALIGN_CODES: Record<VerticalAlign, number> = {
	top: 0,
	middle: 1,
	bottom: 2,
	justify: 3,
	distributed: 4,
};

export const BORDER_STYLE_CODES: Record<BorderStyle, number> = {
	none: 0x00,
	thin: 0x01,
	medium: 0x02,
	dashed: 0x03,
	dotted: 0x04,
	thick: 0x05,
	double: 0x06,
	hair: 0x07,
	mediumDashed: 0x08,
	thinDashDotted: 0x09,
	mediumDashDotted: 0x0a,
	thinDashDotDotted: 0x0b,
	mediumDashDotDotted: 0x0c,
	slantedMediumDashDotted: 0x0d,
};

export const VISIBILITY_CODES: Record<SheetVisibility, number> = {
	visible: 0x00,
	hidden: 0x01,
	veryHidden: 0x02,
};

/**
 * Windows code pages by encoding name. The CODEPAGE record stores the
 * number; 1200 means the strings themselves are UTF-16.
 */
export const CODEPAGES: Record<string, number> = {
	ASCII: 367,
	IBM437: 437,
	IBM720: 720,
	IBM737: 737,
	IBM775: 775,
	IBM850: 850,
	IBM852: 852,
	IBM855: 855,
	IBM857: 857,
	IBM00858: 858,
	IBM860: 860,
	IBM861: 861,
	IBM862: 862,
	IBM863: 863,
	IBM864: 864,
	IBM865: 865,
	IBM866: 866,
	IBM869: 869,
	"WINDOWS-874": 874,
	"WINDOWS-932": 932,
	"WINDOWS-936": 936,
	"WINDOWS-949": 949,
	"WINDOWS-950": 950,
	"UTF-16LE": 1200,
	"WINDOWS-1250": 1250,
	"WINDOWS-1251": 1251,
	"WINDOWS-1252": 1252,
	"WINDOWS-1253": 1253,
	"WINDOWS-1254": 1254,
	"WINDOWS-1255": 1255,
	"WINDOWS-1256": 1256,
	"WINDOWS-1257": 1257,
	"WINDOWS-1258": 1258,
	JOHAB: 1361,
	MACROMAN: 10000,
};

/** Encoding used when neither the workbook nor the options name one */
export const DEFAULT_ENCODING = "UTF-16LE";

/**
 * Resolve an encoding name to its code page.
 * @throws Error naming the encoding when it has no code page
 */
export function codepageFor(encoding: string): number {
	const cp = CODEPAGES[encoding.toUpperCase()];
	if (cp === undefined) {
		throw new Error("Invalid or unknown codepage '" + encoding + "'");
	}
	return cp;
}

/** Global records in the order a fresh build writes them */
export const GLOBAL_RECORD_ORDER: readonly GlobalRecordName[] = [
	"bof",
	"codepage",
	"dsf",
	"tabid",
	"protect",
	"password",
	"window1",
	"datemode",
	"precision",
	"refreshall",
	"bookbool",
	"fonts",
	"numberFormats",
	"xfs",
	"style",
];
