import type { Extent, StreamLayout } from "../types.js";
import { createByteWriter, putBytes, writerBytes } from "../utils/buffer.js";
import { installSst, type WriterContext } from "./context.js";
import { boundsheetsSize, sheetOffsets, writeBoundsheets, writeEof, writeGlobalRecord } from "./globals.js";
import { GLOBAL_RECORD_ORDER } from "./internals.js";
import { collectStrings, writeSst } from "./sst.js";
import { renderSheet, sheetStrings } from "./worksheet.js";

/** A rendered Workbook stream and where its regions live */
export interface RenderedStream {
	stream: Uint8Array;
	layout: StreamLayout;
	/** Distinct strings of the written SST in index order */
	strings: string[];
}

/**
 * Render a complete Workbook stream from the model.
 *
 * Layout: globals, BOUNDSHEET records, SST + EXTSST, EOF, then every sheet
 * substream in order. The string table is final before any sheet renders,
 * since cells embed table indices.
 */
export function writeFromScratch(ctx: WriterContext): RenderedStream {
	const sheets = ctx.sheets;
	const layout: StreamLayout = { globals: {}, boundsheets: { offset: 0, length: 0 }, worksheets: [] };

	// BOF … STYLE
	const globals = createByteWriter(8192);
	for (const record of GLOBAL_RECORD_ORDER) {
		const start = globals.pos;
		writeGlobalRecord(ctx, globals, record);
		layout.globals[record] = { offset: start, length: globals.pos - start };
	}

	// SST, EXTSST, EOF
	const { total, distinct } = collectStrings(sheets.map(sheetStrings));
	installSst(ctx, distinct);
	const bsSize = boundsheetsSize(sheets);
	const sstStart = globals.pos + bsSize;
	const post = createByteWriter(8192);
	writeSst(post, sstStart, total, distinct);
	const sst: Extent = { offset: sstStart, length: post.pos };
	const eofStart = sstStart + post.pos;
	writeEof(post);
	layout.globals.eof = { offset: eofStart, length: sstStart + post.pos - eofStart };

	for (const sheet of sheets) {
		renderSheet(ctx, sheet);
	}
	const offsets = sheetOffsets(sheets, globals.pos + post.pos);

	const out = createByteWriter(globals.pos + bsSize + post.pos + offsets.length * 1024);
	putBytes(out, writerBytes(globals));
	layout.boundsheets = { offset: out.pos, length: bsSize };
	writeBoundsheets(out, sheets, offsets);
	putBytes(out, writerBytes(post));
	layout.sst = sst;
	sheets.forEach((sheet, i) => {
		layout.worksheets.push({ offset: offsets[i], length: sheet.body.length });
		putBytes(out, sheet.body);
	});

	return { stream: writerBytes(out), layout, strings: distinct };
}
