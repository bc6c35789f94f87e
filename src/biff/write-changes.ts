import type { ChangeKey, Extent, GlobalRecordName, StoredSource, StreamLayout } from "../types.js";
import {
	createByteWriter,
	putBytes,
	readBytes,
	seekReader,
	writerBytes,
	type ByteReader,
	type ByteWriter,
} from "../utils/buffer.js";
import { containerRead } from "../container/index.js";
import { installSst, type WriterContext } from "./context.js";
import { accumulateOffsets, boundsheetsSize, writeBoundsheets, writeGlobalRecord } from "./globals.js";
import { GLOBAL_RECORD_ORDER } from "./internals.js";
import { planSstUpdate, writeSst, type SstPlan } from "./sst.js";
import type { RenderedStream } from "./write-fresh.js";
import { renderSheetChanges, sheetStrings } from "./worksheet.js";

/** A stored region and the bytes that replaced it */
interface Substitution {
	from: Extent;
	to: Extent;
}

interface Region {
	key: ChangeKey;
	extent: Extent;
}

/** Identity of a change key, for de-duplication */
function changeId(key: ChangeKey): string {
	switch (key.type) {
		case "worksheet":
			return "worksheet:" + key.index;
		case "global":
			return "global:" + key.record;
		case "sst-boundsheets":
			return "sst-boundsheets";
	}
}

/**
 * Stored extent a change key rewrites. For `sst-boundsheets` that is the
 * BOUNDSHEET block; the SST that follows is handled with it.
 */
function resolveExtent(layout: StreamLayout, key: ChangeKey): Extent {
	let extent: Extent | undefined;
	switch (key.type) {
		case "worksheet":
			extent = layout.worksheets[key.index];
			break;
		case "global":
			extent = layout.globals[key.record];
			break;
		case "sst-boundsheets":
			extent = layout.boundsheets;
			break;
	}
	if (!extent) {
		throw new Error("No stored position for change " + changeId(key));
	}
	return extent;
}

/** Move an extent of the stored stream to where it ends up in the new one */
function remapExtent(extent: Extent, substitutions: readonly Substitution[]): Extent {
	let delta = 0;
	for (const { from, to } of substitutions) {
		if (from.offset === extent.offset && from.length === extent.length) {
			return { ...to };
		}
		if (from.offset + from.length <= extent.offset) {
			delta += to.length - from.length;
		}
	}
	return { offset: extent.offset + delta, length: extent.length };
}

function remapLayout(layout: StreamLayout, substitutions: readonly Substitution[]): StreamLayout {
	const globals: StreamLayout["globals"] = {};
	const names: GlobalRecordName[] = [...GLOBAL_RECORD_ORDER, "eof"];
	for (const name of names) {
		const extent = layout.globals[name];
		if (extent) {
			globals[name] = remapExtent(extent, substitutions);
		}
	}
	return {
		globals,
		boundsheets: remapExtent(layout.boundsheets, substitutions),
		sst: layout.sst ? remapExtent(layout.sst, substitutions) : undefined,
		worksheets: layout.worksheets.map((extent) => remapExtent(extent, substitutions)),
	};
}

/** Where copying resumes after the BOUNDSHEET records and SST, and the new SST */
interface SstAndBoundsheets {
	resume: number;
	sst?: Extent;
}

/**
 * Write new BOUNDSHEET records and a new SST in place of the stored ones,
 * copying whatever lies between them. A stream without a string table gets
 * one right after the BOUNDSHEET records once some cell holds a string.
 *
 * The first sheet moves by everything that changed size before it: the
 * output written so far, the BOUNDSHEET block and the SST. Later sheets
 * follow at their new sizes.
 */
function writeSstAndBoundsheets(
	ctx: WriterContext,
	out: ByteWriter,
	reader: ByteReader,
	layout: StreamLayout,
	plan: SstPlan,
	substitutions: Substitution[],
): SstAndBoundsheets {
	const bs = layout.boundsheets;
	const bsEnd = bs.offset + bs.length;
	const bsSize = boundsheetsSize(ctx.sheets);
	const firstSheet = Math.min(...layout.worksheets.map((extent) => extent.offset));

	const sst: Extent = layout.sst ?? { offset: bsEnd, length: 0 };
	if (sst.offset < bsEnd) {
		throw new Error("Stored SST at " + sst.offset + " precedes the BOUNDSHEET records");
	}
	seekReader(reader, bsEnd);
	const gap = readBytes(reader, sst.offset - bsEnd);
	let sstBytes: Uint8Array = new Uint8Array(0);
	if (layout.sst || plan.distinct.length > 0) {
		const buffer = createByteWriter(sst.length + 1024);
		writeSst(buffer, out.pos + bsSize + gap.length, plan.total, plan.distinct);
		sstBytes = writerBytes(buffer);
	}
	const shift = out.pos - bs.offset + (bsSize - bs.length) + (sstBytes.length - sst.length);

	const bsStart = out.pos;
	writeBoundsheets(out, ctx.sheets, accumulateOffsets(ctx.sheets, firstSheet + shift));
	substitutions.push({ from: bs, to: { offset: bsStart, length: out.pos - bsStart } });
	putBytes(out, gap);
	const written: Extent = { offset: out.pos, length: sstBytes.length };
	substitutions.push({ from: sst, to: written });
	putBytes(out, sstBytes);
	return { resume: sst.offset + sst.length, sst: sstBytes.length > 0 ? written : undefined };
}

/**
 * Patch a stored Workbook stream: copy every untouched byte verbatim and
 * substitute freshly rendered bytes for the changed regions.
 *
 * Sheets that are re-rendered count as changed. Whenever any other region
 * changes or the string table grows or is rebuilt, the BOUNDSHEET records
 * and SST are rewritten as well, since sheet offsets may move.
 *
 * The layout and change keys must describe `source`; they are not checked
 * against the stream beyond resolving each key to an extent.
 */
export function writeChanges(ctx: WriterContext, source: StoredSource, changes: readonly ChangeKey[]): RenderedStream {
	const layout = source.layout;
	if (layout.worksheets.length > ctx.sheets.length) {
		throw new Error("Stored source has " + layout.worksheets.length + " worksheets, workbook has " + ctx.sheets.length);
	}
	const reader = containerRead(source.data);
	const plan = planSstUpdate(source.strings, ctx.sheets.map(sheetStrings));
	installSst(ctx, plan.distinct);

	const changedSheets = new Set<number>();
	for (const key of changes) {
		if (key.type === "worksheet") {
			changedSheets.add(key.index);
		}
	}
	for (const sheet of ctx.sheets) {
		const extent = layout.worksheets[sheet.index];
		if (!extent) {
			throw new Error("No stored position for worksheet " + sheet.index);
		}
		renderSheetChanges(ctx, sheet, reader, extent, plan.mode, changedSheets.has(sheet.index));
	}

	const keys = new Map<string, ChangeKey>();
	const addKey = (key: ChangeKey): void => {
		keys.set(changeId(key), key);
	};
	changes.forEach(addKey);
	for (const sheet of ctx.sheets) {
		if (sheet.rerendered) {
			addKey({ type: "worksheet", index: sheet.index });
		}
	}
	// Any re-rendered region ahead of the sheets may move them
	const moved = [...keys.values()].some((key) => key.type !== "sst-boundsheets");
	if (moved || plan.mode === "complete" || plan.distinct.length !== source.strings.length) {
		addKey({ type: "sst-boundsheets" });
	}

	const regions: Region[] = [...keys.values()]
		.map((key) => ({ key, extent: resolveExtent(layout, key) }))
		// An empty region sits before the region starting where it does
		.sort((a, b) => a.extent.offset - b.extent.offset || a.extent.length - b.extent.length);

	const out = createByteWriter(reader.data.length + 4096);
	const substitutions: Substitution[] = [];
	let insertedSst: Extent | undefined;
	let lastpos = 0;
	for (const { key, extent } of regions) {
		seekReader(reader, lastpos);
		putBytes(out, readBytes(reader, extent.offset - lastpos));
		const start = out.pos;
		switch (key.type) {
			case "worksheet":
				putBytes(out, ctx.sheets[key.index].body);
				substitutions.push({ from: extent, to: { offset: start, length: out.pos - start } });
				lastpos = extent.offset + extent.length;
				break;
			case "global":
				writeGlobalRecord(ctx, out, key.record);
				substitutions.push({ from: extent, to: { offset: start, length: out.pos - start } });
				lastpos = extent.offset + extent.length;
				break;
			case "sst-boundsheets": {
				const written = writeSstAndBoundsheets(ctx, out, reader, layout, plan, substitutions);
				lastpos = written.resume;
				if (!layout.sst) {
					insertedSst = written.sst;
				}
				break;
			}
			default: {
				const unreachable: never = key;
				throw new Error("Unknown change " + JSON.stringify(unreachable));
			}
		}
	}
	seekReader(reader, lastpos);
	putBytes(out, readBytes(reader));

	const remapped = remapLayout(layout, substitutions);
	if (insertedSst) {
		remapped.sst = insertedSst;
	}
	return { stream: writerBytes(out), layout: remapped, strings: plan.distinct };
}
