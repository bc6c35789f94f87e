import { writeU16, writeU32, type ByteWriter } from "../utils/buffer.js";
import { EXTSST_BUCKET_SIZE, OPCODE } from "./internals.js";
import { addString, createStringRecordWriter, finishStrings, writeLongRecord, type StringPosition } from "./record.js";
import { encodeUnicodeString } from "./unicode.js";

/**
 * How a stored string table is brought up to date.
 *
 * - `partial`: every stored string is still referenced; new strings are
 *   appended and existing indices stay valid.
 * - `complete`: some stored string is gone; the table is rebuilt and every
 *   index may change.
 */
export type SstUpdateMode = "partial" | "complete";

/** Strings referenced by a set of worksheets */
export interface StringCollection {
	/** Number of non-empty string references, duplicates counted */
	total: number;
	/** Distinct non-empty strings in first-seen order */
	distinct: string[];
}

export interface SstPlan extends StringCollection {
	mode: SstUpdateMode;
}

/**
 * Merge the string references of several worksheets.
 *
 * @param references - Each worksheet's string values in cell order
 */
export function collectStrings(references: ReadonlyArray<readonly string[]>): StringCollection {
	let total = 0;
	const seen = new Set<string>();
	for (const strings of references) {
		for (const str of strings) {
			// Empty strings are written as BLANK cells
			if (str !== "") {
				++total;
				seen.add(str);
			}
		}
	}
	return { total, distinct: [...seen] };
}

/**
 * Decide between a partial and a complete update of a stored table.
 *
 * @param stored - Distinct strings of the stored table in index order
 * @param references - Current string references of every worksheet
 * @returns The plan; `distinct` is the new table in index order
 */
export function planSstUpdate(stored: readonly string[], references: ReadonlyArray<readonly string[]>): SstPlan {
	const { total, distinct } = collectStrings(references);
	const current = new Set(distinct);
	if (stored.every((str) => current.has(str))) {
		const known = new Set(stored);
		const additions = distinct.filter((str) => !known.has(str));
		return { mode: "partial", total, distinct: [...stored, ...additions] };
	}
	return { mode: "complete", total, distinct };
}

/** Map each string to its position in the table */
export function buildSstIndex(strings: readonly string[]): Map<string, number> {
	const index = new Map<string, number>();
	strings.forEach((str, i) => index.set(str, i));
	return index;
}

/**
 * Write the SST record (with CONTINUE records as needed) followed by EXTSST.
 *
 * @param out - Destination buffer
 * @param streamOffset - Absolute stream position of `out`'s first byte
 * @param total - Number of string references in the workbook
 * @param strings - Distinct strings in index order
 */
export function writeSst(out: ByteWriter, streamOffset: number, total: number, strings: readonly string[]): void {
	const header = new Uint8Array(8);
	writeU32(header, 0, total);
	writeU32(header, 4, strings.length);
	const writer = createStringRecordWriter(out, OPCODE.SST, streamOffset, header);
	const buckets: StringPosition[] = [];
	strings.forEach((str, idx) => {
		const position = addString(writer, encodeUnicodeString(str, 2));
		if (idx % EXTSST_BUCKET_SIZE === 0) {
			buckets.push(position);
		}
	});
	finishStrings(writer);
	writeExtsst(out, buckets);
}

/** EXTSST: one entry per bucket pointing at the bucket's first string */
export function writeExtsst(out: ByteWriter, buckets: readonly StringPosition[]): void {
	const data = new Uint8Array(2 + buckets.length * 8);
	writeU16(data, 0, EXTSST_BUCKET_SIZE);
	buckets.forEach(({ absolute, inRecord }, i) => {
		writeU32(data, 2 + i * 8, absolute);
		writeU16(data, 6 + i * 8, inRecord);
	});
	writeLongRecord(out, OPCODE.EXTSST, data);
}
