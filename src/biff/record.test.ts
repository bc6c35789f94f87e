import { describe, it, expect } from "vitest";
import { concatBytes, createByteWriter, readU16, writerBytes } from "../utils/buffer.js";
import { scanRecords, opcodes } from "../__fixtures__/records.js";
import { OPCODE, RECORD_SIZE_LIMIT } from "./internals.js";
import {
	addString,
	createStringRecordWriter,
	finishStrings,
	writeLongRecord,
	writePlaceholder,
	writeRecord,
} from "./record.js";
import { encodeUnicodeString } from "./unicode.js";

describe("writeRecord", () => {
	it("should frame a small payload", () => {
		const out = createByteWriter();
		const rest = writeRecord(out, 0x0042, new Uint8Array([1, 2]), new Uint8Array([3]));
		expect(Array.from(writerBytes(out))).toEqual([0x42, 0x00, 0x03, 0x00, 1, 2, 3]);
		expect(rest.length).toBe(0);
	});

	it("should write an empty record", () => {
		const out = createByteWriter();
		writeRecord(out, OPCODE.EOF);
		expect(Array.from(writerBytes(out))).toEqual([0x0a, 0x00, 0x00, 0x00]);
	});

	it("should return what does not fit", () => {
		const out = createByteWriter();
		const payload = new Uint8Array(RECORD_SIZE_LIMIT + 1);
		payload[RECORD_SIZE_LIMIT] = 7;
		const rest = writeRecord(out, 0x00fc, payload);
		expect(out.pos).toBe(4 + RECORD_SIZE_LIMIT);
		expect(readU16(writerBytes(out), 2)).toBe(RECORD_SIZE_LIMIT);
		expect(Array.from(rest)).toEqual([7]);
	});
});

describe("writeLongRecord", () => {
	it("should write ceil(n / 8224) records", () => {
		const out = createByteWriter();
		expect(writeLongRecord(out, 0x00ff, new Uint8Array(20000))).toBe(3);
		const records = scanRecords(writerBytes(out));
		expect(opcodes(records)).toEqual([0x00ff, OPCODE.CONTINUE, OPCODE.CONTINUE]);
		expect(records.map((r) => r.data.length)).toEqual([8224, 8224, 3552]);
	});

	it("should split the payload without losing bytes", () => {
		const payload = new Uint8Array(17000).map((_, i) => i % 253);
		const out = createByteWriter();
		writeLongRecord(out, 0x00ff, payload);
		const records = scanRecords(writerBytes(out));
		expect(concatBytes(records.map((r) => r.data))).toEqual(payload);
	});

	it("should write one record for an empty payload", () => {
		const out = createByteWriter();
		expect(writeLongRecord(out, 0x00ff, new Uint8Array(0))).toBe(1);
		expect(out.pos).toBe(4);
	});

	it("should not add a continuation for an exact fit", () => {
		const out = createByteWriter();
		expect(writeLongRecord(out, 0x00ff, new Uint8Array(RECORD_SIZE_LIMIT))).toBe(1);
	});
});

describe("writePlaceholder", () => {
	it("should write a single 16-bit value", () => {
		const out = createByteWriter();
		writePlaceholder(out, OPCODE.PROTECT);
		writePlaceholder(out, OPCODE.PRECISION, 1);
		expect(Array.from(writerBytes(out))).toEqual([0x12, 0, 2, 0, 0, 0, 0x0e, 0, 2, 0, 1, 0]);
	});
});

describe("string records", () => {
	it("should place strings after the prefix", () => {
		const out = createByteWriter();
		const writer = createStringRecordWriter(out, OPCODE.SST, 100, new Uint8Array(8));
		const first = addString(writer, encodeUnicodeString("A", 2));
		const second = addString(writer, encodeUnicodeString("BC", 2));
		finishStrings(writer);
		expect(first).toEqual({ absolute: 112, inRecord: 12 });
		expect(second).toEqual({ absolute: 116, inRecord: 16 });
		const records = scanRecords(writerBytes(out));
		expect(opcodes(records)).toEqual([OPCODE.SST]);
		expect(records[0].data.length).toBe(8 + 4 + 5);
	});

	it("should emit one empty record when nothing was added", () => {
		const out = createByteWriter();
		finishStrings(createStringRecordWriter(out, OPCODE.SST));
		expect(Array.from(writerBytes(out))).toEqual([0xfc, 0x00, 0x00, 0x00]);
	});

	it("should split a compressed string with an option byte", () => {
		const out = createByteWriter();
		const writer = createStringRecordWriter(out, OPCODE.SST);
		const position = addString(writer, encodeUnicodeString("a".repeat(9000), 2));
		finishStrings(writer);
		expect(position).toEqual({ absolute: 4, inRecord: 4 });
		const records = scanRecords(writerBytes(out));
		expect(opcodes(records)).toEqual([OPCODE.SST, OPCODE.CONTINUE]);
		expect(records[0].data.length).toBe(RECORD_SIZE_LIMIT);
		// 9000 - (8224 - 3) characters remain, after the option byte
		expect(records[1].data.length).toBe(1 + 779);
		expect(records[1].data[0]).toBe(0);
		expect(records[1].data[1]).toBe(0x61);
	});

	it("should split a wide string on a character boundary and compress the rest", () => {
		const out = createByteWriter();
		const writer = createStringRecordWriter(out, OPCODE.SST);
		addString(writer, encodeUnicodeString("Ω" + "a".repeat(4200), 2));
		finishStrings(writer);
		const records = scanRecords(writerBytes(out));
		expect(opcodes(records)).toEqual([OPCODE.SST, OPCODE.CONTINUE]);
		// 3 header bytes + 4110 two-byte characters
		expect(records[0].data.length).toBe(8223);
		expect(Array.from(records[0].data.subarray(3, 5))).toEqual([0xa9, 0x03]);
		expect(records[1].data.length).toBe(1 + 91);
		expect(records[1].data[0]).toBe(0);
		expect(records[1].data[1]).toBe(0x61);
	});

	it("should keep a wide remainder wide", () => {
		const out = createByteWriter();
		const writer = createStringRecordWriter(out, OPCODE.SST);
		addString(writer, encodeUnicodeString("Ω".repeat(4200), 2));
		finishStrings(writer);
		const records = scanRecords(writerBytes(out));
		expect(records[1].data.length).toBe(1 + 90 * 2);
		expect(records[1].data[0]).toBe(1);
		expect(Array.from(records[1].data.subarray(1, 3))).toEqual([0xa9, 0x03]);
	});

	it("should move a string whose header does not fit to the next record", () => {
		const out = createByteWriter();
		const writer = createStringRecordWriter(out, OPCODE.SST, 100);
		addString(writer, encodeUnicodeString("a".repeat(8218), 2));
		const position = addString(writer, encodeUnicodeString("b", 2));
		finishStrings(writer);
		const records = scanRecords(writerBytes(out));
		expect(records[0].data.length).toBe(8221);
		expect(Array.from(records[1].data)).toEqual([1, 0, 0, 0x62]);
		expect(position).toEqual({ absolute: 100 + 8225 + 4, inRecord: 4 });
	});
});
