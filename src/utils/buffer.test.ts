import { describe, it, expect } from "vitest";
import {
	concatBytes,
	createByteReader,
	createByteWriter,
	packU16,
	putBytes,
	putU8,
	readBytes,
	readU16,
	readU32,
	seekReader,
	writeF64,
	writeU32,
	writerBytes,
} from "./buffer.js";

describe("ByteWriter", () => {
	it("should append bytes in order", () => {
		const out = createByteWriter();
		putU8(out, 0x1ff);
		putBytes(out, packU16(0x0102));
		expect(Array.from(writerBytes(out))).toEqual([0xff, 0x02, 0x01]);
	});

	it("should grow past its initial size", () => {
		const out = createByteWriter(16);
		for (let i = 0; i < 100; ++i) {
			putBytes(out, packU16(i));
		}
		const bytes = writerBytes(out);
		expect(out.pos).toBe(200);
		expect(bytes.length).toBe(200);
		expect(readU16(bytes, 198)).toBe(99);
	});

	it("should report the position as bytes written", () => {
		const out = createByteWriter();
		expect(out.pos).toBe(0);
		putBytes(out, new Uint8Array(5));
		expect(out.pos).toBe(5);
	});
});

describe("ByteReader", () => {
	it("should read sequentially and after seeking", () => {
		const reader = createByteReader(new Uint8Array([1, 2, 3, 4, 5]));
		expect(Array.from(readBytes(reader, 2))).toEqual([1, 2]);
		expect(reader.pos).toBe(2);
		seekReader(reader, 1);
		expect(Array.from(readBytes(reader))).toEqual([2, 3, 4, 5]);
		expect(reader.pos).toBe(5);
	});

	it("should stop at the end of the data", () => {
		const reader = createByteReader(new Uint8Array([1, 2]));
		expect(Array.from(readBytes(reader, 10))).toEqual([1, 2]);
	});

	it("should reject seeks outside the data", () => {
		const reader = createByteReader(new Uint8Array(4));
		expect(() => seekReader(reader, 10)).toThrow("Cannot seek to 10 in stream of 4 bytes");
		expect(() => seekReader(reader, -1)).toThrow("Cannot seek to -1");
	});
});

describe("helpers", () => {
	it("should pack 16-bit values", () => {
		expect(Array.from(packU16(1, 0x0203))).toEqual([1, 0, 3, 2]);
	});

	it("should read 32-bit values unsigned", () => {
		const buf = new Uint8Array(4);
		writeU32(buf, 0, 0xffffffff);
		expect(readU32(buf, 0)).toBe(0xffffffff);
	});

	it("should write doubles little-endian", () => {
		const buf = new Uint8Array(10);
		writeF64(buf, 2, 1);
		expect(Array.from(buf)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0xf0, 0x3f]);
	});

	it("should concatenate byte arrays", () => {
		const out = concatBytes([new Uint8Array([1]), new Uint8Array(0), new Uint8Array([2, 3])]);
		expect(Array.from(out)).toEqual([1, 2, 3]);
	});
});
