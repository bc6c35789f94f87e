/** Named colors of the default BIFF8 palette */
export type ColorName =
	| "builtinBlack"
	| "builtinWhite"
	| "builtinRed"
	| "builtinGreen"
	| "builtinBlue"
	| "builtinYellow"
	| "builtinMagenta"
	| "builtinCyan"
	| "black"
	| "white"
	| "red"
	| "lime"
	| "blue"
	| "yellow"
	| "magenta"
	| "cyan"
	| "brown"
	| "green"
	| "navy"
	| "olive"
	| "purple"
	| "teal"
	| "silver"
	| "gray"
	| "orange"
	| "border"
	| "patternBg"
	| "dialogBg"
	| "chartText"
	| "chartBg"
	| "chartBorder"
	| "tooltipBg"
	| "tooltipText"
	| "text";

/** Font weight: a keyword or a numeric weight (100-1000) */
export type FontWeight = "normal" | "bold" | number;

export type Underline = "none" | "single" | "double" | "singleAccounting" | "doubleAccounting";

export type Escapement = "none" | "superscript" | "subscript";

export type FontFamily = "none" | "roman" | "swiss" | "modern" | "script" | "decorative";

/** Character set of a font (Windows charset identifiers) */
export type FontCharset =
	| "iso-latin-1"
	| "default"
	| "symbol"
	| "apple-roman"
	| "shift-jis"
	| "korean-hangul"
	| "korean-johab"
	| "chinese-simplified"
	| "chinese-traditional"
	| "greek"
	| "turkish"
	| "vietnamese"
	| "hebrew"
	| "arabic"
	| "baltic"
	| "cyrillic"
	| "thai"
	| "iso-latin-2"
	| "oem-latin-1";

/** A font as used by cell formats */
export interface Font {
	/** Font face name, e.g. "Arial" */
	name: string;
	/** Size in points */
	size: number;
	weight?: FontWeight;
	italic?: boolean;
	underline?: Underline;
	strikeout?: boolean;
	outline?: boolean;
	shadow?: boolean;
	color?: ColorName;
	escapement?: Escapement;
	family?: FontFamily;
	charset?: FontCharset;
}

export type HorizontalAlign =
	| "default"
	| "left"
	| "center"
	| "right"
	| "fill"
	| "justify"
	| "centerAcross"
	| "distributed";

export type VerticalAlign = "top" | "middle" | "bottom" | "justify" | "distributed";

export type BorderStyle =
	| "none"
	| "thin"
	| "medium"
	| "dashed"
	| "dotted"
	| "thick"
	| "double"
	| "hair"
	| "mediumDashed"
	| "thinDashDotted"
	| "mediumDashDotted"
	| "thinDashDotDotted"
	| "mediumDashDotDotted"
	| "slantedMediumDashDotted";

/** One side of a cell border */
export interface Border {
	style: BorderStyle;
	color?: ColorName;
}

/** A cell format (XF): font, number format and display attributes */
export interface CellFormat {
	font?: Font;
	/** Number format pattern such as "0.00%" (default "General") */
	numberFormat?: string;
	horizontalAlign?: HorizontalAlign;
	verticalAlign?: VerticalAlign;
	textWrap?: boolean;
	/** Text rotation in degrees (-90..90), or 255 for stacked text */
	rotation?: number;
	indent?: number;
	shrink?: boolean;
	left?: Border;
	right?: Border;
	top?: Border;
	bottom?: Border;
	/** Fill pattern, 0 = none, 1 = solid, 2-18 = the built-in patterns */
	pattern?: number;
	patternFgColor?: ColorName;
	patternBgColor?: ColorName;
	locked?: boolean;
	hidden?: boolean;
}

/** Raw value held by a cell */
export type CellValue = string | number | boolean | Date | null;

/** A cell with an explicit format */
export interface Cell {
	value: CellValue;
	format?: CellFormat;
}

/** What may appear at a position in a row: a bare value, a formatted cell, or a gap */
export type CellInput = CellValue | Cell | undefined;

export type SheetVisibility = "visible" | "hidden" | "veryHidden";

/** A worksheet: a name and its rows of cells */
export interface Worksheet {
	name: string;
	rows: CellInput[][];
	visibility?: SheetVisibility;
}

/** Byte range of a region inside the Workbook stream */
export interface Extent {
	offset: number;
	length: number;
}

/** Global records (or record blocks) that can be re-rendered on their own */
export type GlobalRecordName =
	| "bof"
	| "codepage"
	| "dsf"
	| "tabid"
	| "protect"
	| "password"
	| "window1"
	| "datemode"
	| "precision"
	| "refreshall"
	| "bookbool"
	| "fonts"
	| "numberFormats"
	| "xfs"
	| "style"
	| "eof";

/** Where every replaceable region of a Workbook stream lives */
export interface StreamLayout {
	globals: Partial<Record<GlobalRecordName, Extent>>;
	/** All BOUNDSHEET records */
	boundsheets: Extent;
	/** SST and EXTSST records, absent when the stream has no string table */
	sst?: Extent;
	/** Worksheet substreams by sheet index */
	worksheets: Extent[];
}

/** A previously written file together with what is known about its Workbook stream */
export interface StoredSource {
	/** Compound-file container bytes */
	data: Uint8Array;
	layout: StreamLayout;
	/** Distinct strings of the stored SST, in index order */
	strings: string[];
	/** True when `Workbook.formats` already lists every XF of the stored file, built-in ones included */
	formatsComplete?: boolean;
}

/** A region of a stored file that has to be rewritten */
export type ChangeKey =
	| { type: "worksheet"; index: number }
	| { type: "global"; record: GlobalRecordName }
	| { type: "sst-boundsheets" };

/** The spreadsheet model consumed by the writer */
export interface Workbook {
	worksheets: Worksheet[];
	/** Explicitly declared cell formats, in declaration order */
	formats: CellFormat[];
	/** Base style every default XF refers to */
	defaultFormat: CellFormat;
	/** Text encoding name recorded in the CODEPAGE record (default "UTF-16LE") */
	encoding?: string;
	/** Use the 1904 date system */
	date1904?: boolean;
	/** Present when the workbook was loaded from, or last written to, a file */
	source?: StoredSource;
	/** Regions modified since `source` was produced */
	changes?: ChangeKey[];
}

/** Options for writing workbook files */
export interface WriteOptions {
	/** Output data type: "array" for Uint8Array (default), "buffer" for Node Buffer, "base64" for a base64 string */
	type?: "array" | "buffer" | "base64";
	/** Overrides `Workbook.encoding` */
	encoding?: string;
	/** Overrides `Workbook.date1904` */
	date1904?: boolean;
	/** Skip workbook validation */
	unsafe?: boolean;
}

/** Result of a write: the container bytes and what a later patch needs to know about them */
export interface WrittenWorkbook {
	data: Uint8Array;
	source: StoredSource;
}
