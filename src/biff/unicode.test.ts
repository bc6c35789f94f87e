import { describe, it, expect } from "vitest";
import { compressUnicodeString, encodeUnicodeString, unicodeString } from "./unicode.js";

describe("encodeUnicodeString", () => {
	it("should compress strings whose characters fit in one byte", () => {
		const encoded = encodeUnicodeString("abc");
		expect(Array.from(encoded.header)).toEqual([3, 0]);
		expect(Array.from(encoded.payload)).toEqual([0x61, 0x62, 0x63]);
		expect(encoded.wide).toBe(0);
	});

	it("should keep Latin-1 characters compressed", () => {
		expect(Array.from(encodeUnicodeString("é").payload)).toEqual([0xe9]);
	});

	it("should write wide strings as UTF-16LE", () => {
		const encoded = encodeUnicodeString("aΩ");
		expect(Array.from(encoded.header)).toEqual([2, 1]);
		expect(Array.from(encoded.payload)).toEqual([0x61, 0x00, 0xa9, 0x03]);
		expect(encoded.wide).toBe(1);
	});

	it("should use a 16-bit length prefix on request", () => {
		expect(Array.from(encodeUnicodeString("ab", 2).header)).toEqual([2, 0, 0]);
		expect(Array.from(encodeUnicodeString("x".repeat(300), 2).header)).toEqual([0x2c, 0x01, 0]);
	});

	it("should encode the empty string", () => {
		expect(Array.from(unicodeString("", 1))).toEqual([0, 0]);
	});

	it("should reject strings longer than the length prefix", () => {
		expect(() => encodeUnicodeString("x".repeat(256))).toThrow("String too long for a 8-bit length: 256 characters");
		expect(() => encodeUnicodeString("x".repeat(0x10000), 2)).toThrow("String too long for a 16-bit length");
		expect(encodeUnicodeString("x".repeat(256), 2).payload.length).toBe(256);
	});
});

describe("unicodeString", () => {
	it("should join header and payload", () => {
		expect(Array.from(unicodeString("hi", 2))).toEqual([2, 0, 0, 0x68, 0x69]);
	});
});

describe("compressUnicodeString", () => {
	it("should narrow when every high byte is zero", () => {
		const { data, wide } = compressUnicodeString(new Uint8Array([0x41, 0, 0x42, 0]));
		expect(Array.from(data)).toEqual([0x41, 0x42]);
		expect(wide).toBe(0);
	});

	it("should leave wide characters alone", () => {
		const input = new Uint8Array([0x41, 0, 0xa9, 0x03]);
		const { data, wide } = compressUnicodeString(input);
		expect(data).toBe(input);
		expect(wide).toBe(1);
	});

	it("should leave odd-length input alone", () => {
		expect(compressUnicodeString(new Uint8Array([0x41, 0, 0x42])).wide).toBe(1);
	});
});
