import { readU16 } from "../utils/buffer.js";

/** One record found in a Workbook stream */
export interface ScannedRecord {
	opcode: number;
	/** Stream offset of the record header */
	offset: number;
	data: Uint8Array;
}

/** Split a stream (or part of it) into records */
export function scanRecords(stream: Uint8Array, start = 0, end = stream.length): ScannedRecord[] {
	const records: ScannedRecord[] = [];
	let pos = start;
	while (pos + 4 <= end) {
		const opcode = readU16(stream, pos);
		const length = readU16(stream, pos + 2);
		records.push({ opcode, offset: pos, data: stream.slice(pos + 4, pos + 4 + length) });
		pos += 4 + length;
	}
	if (pos !== end) {
		throw new Error("Truncated record at " + pos);
	}
	return records;
}

/** Opcodes of a record list, in order */
export function opcodes(records: readonly ScannedRecord[]): number[] {
	return records.map((record) => record.opcode);
}

/** Records with the given opcode */
export function recordsOf(records: readonly ScannedRecord[], opcode: number): ScannedRecord[] {
	return records.filter((record) => record.opcode === opcode);
}
