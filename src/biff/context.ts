import type { Workbook, WriteOptions } from "../types.js";
import { codepageFor, DEFAULT_ENCODING } from "./internals.js";
import { buildSstIndex } from "./sst.js";
import { createStyleTables, type StyleTables } from "./styles.js";
import { createSheetWriter, type SheetWriter } from "./worksheet.js";

/** Write settings after defaults and workbook values are applied */
export interface ResolvedOptions {
	encoding: string;
	date1904: boolean;
}

/**
 * Merge write options over the workbook's own settings.
 * @throws Error if the encoding has no code page
 */
export function resolveOptions(wb: Workbook, opts?: WriteOptions): ResolvedOptions {
	const encoding = opts?.encoding ?? wb.encoding ?? DEFAULT_ENCODING;
	codepageFor(encoding);
	return { encoding, date1904: opts?.date1904 ?? wb.date1904 ?? false };
}

/**
 * State of one write call: worksheet wrappers, style tables and the shared
 * string lookup. Never shared between calls.
 */
export interface WriterContext {
	workbook: Workbook;
	options: ResolvedOptions;
	styles: StyleTables;
	sheets: SheetWriter[];
	/** Shared string lookup every sheet resolves strings through */
	sst: Map<string, number>;
}

export function createWriterContext(
	workbook: Workbook,
	options: ResolvedOptions,
	existingDocument = false,
): WriterContext {
	return {
		workbook,
		options,
		styles: createStyleTables(workbook, existingDocument),
		sheets: workbook.worksheets.map((ws, idx) => createSheetWriter(ws, idx)),
		sst: new Map(),
	};
}

/** Replace the shared string lookup */
export function installSst(ctx: WriterContext, strings: readonly string[]): void {
	ctx.sst = buildSstIndex(strings);
}

/** Drop every table and worksheet wrapper */
function disposeWriterContext(ctx: WriterContext): void {
	ctx.sst.clear();
	ctx.sheets.length = 0;
}

/**
 * Run `fn` with a fresh context that is disposed however `fn` exits.
 */
export function withWriterContext<T>(
	workbook: Workbook,
	options: ResolvedOptions,
	existingDocument: boolean,
	fn: (ctx: WriterContext) => T,
): T {
	const ctx = createWriterContext(workbook, options, existingDocument);
	try {
		return fn(ctx);
	} finally {
		disposeWriterContext(ctx);
	}
}
