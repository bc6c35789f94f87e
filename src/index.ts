// Binary XLS (BIFF8) workbook writer
// Public API

// Types
export type {
	Workbook,
	Worksheet,
	Cell,
	CellValue,
	CellInput,
	CellFormat,
	Font,
	Border,
	ColorName,
	FontWeight,
	Underline,
	Escapement,
	FontFamily,
	FontCharset,
	HorizontalAlign,
	VerticalAlign,
	BorderStyle,
	SheetVisibility,
	ChangeKey,
	GlobalRecordName,
	Extent,
	StreamLayout,
	StoredSource,
	WriteOptions,
	WrittenWorkbook,
} from "./types.js";

// Write
export { write, writeFile } from "./write.js";
export { writeWorkbook, validateWorkbook, validateSheetName } from "./biff/workbook.js";

// Utilities - workbook/sheet manipulation
export {
	createWorkbook,
	appendSheet,
	createSheet,
	getSheetIndex,
	setSheetVisibility,
	setCell,
	addFormat,
	markChanged,
	attachSource,
} from "./api/book.js";

// Container
export { containerRead, containerReadStream, containerWrite, WORKBOOK_STREAM } from "./container/index.js";

// Version
export const version = "1.0.0-alpha.0";
