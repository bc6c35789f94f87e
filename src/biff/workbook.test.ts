import { describe, it, expect } from "vitest";
import type { Workbook } from "../types.js";
import { readU16 } from "../utils/buffer.js";
import { containerReadStream } from "../container/index.js";
import { DEFAULT_FONT } from "./styles.js";
import { validateSheetName, validateWorkbook, writeWorkbook } from "./workbook.js";

function workbook(...names: string[]): Workbook {
	return {
		worksheets: names.map((name) => ({ name, rows: [["x"]] })),
		formats: [],
		defaultFormat: { font: DEFAULT_FONT },
	};
}

describe("validateSheetName", () => {
	it("should accept ordinary names", () => {
		expect(validateSheetName("Sales 2024")).toBe(true);
		expect(validateSheetName("x".repeat(31))).toBe(true);
	});

	it("should reject invalid names", () => {
		expect(() => validateSheetName("")).toThrow("Sheet name cannot be blank");
		expect(() => validateSheetName("x".repeat(32))).toThrow("Sheet name cannot exceed 31 chars");
		expect(() => validateSheetName("'quoted")).toThrow("Sheet name cannot start or end with apostrophe");
		expect(() => validateSheetName("History")).toThrow("Sheet name cannot be 'History'");
		expect(() => validateSheetName("a/b")).toThrow("Sheet name cannot contain : \\ / ? * [ ]");
	});

	it("should return false in safe mode", () => {
		expect(validateSheetName("a[1]", true)).toBe(false);
	});
});

describe("validateWorkbook", () => {
	it("should reject an empty workbook", () => {
		expect(() => validateWorkbook(workbook())).toThrow("Workbook is empty");
	});

	it("should reject duplicate names regardless of case", () => {
		expect(() => validateWorkbook(workbook("Data", "data"))).toThrow("Duplicate Sheet Name: data");
	});
});

describe("writeWorkbook", () => {
	it("should wrap the Workbook stream in a compound file", () => {
		const written = writeWorkbook(workbook("One"));
		const stream = containerReadStream(written.data);
		expect(readU16(stream, 0)).toBe(0x0809);
		const last = written.source.layout.worksheets[0];
		expect(stream.length).toBe(last.offset + last.length);
		expect(written.source.strings).toEqual(["x"]);
		expect(written.source.formatsComplete).toBe(false);
	});

	it("should validate before writing", () => {
		expect(() => writeWorkbook(workbook("a:b"))).toThrow("Sheet name cannot contain");
		expect(() => writeWorkbook(workbook("a:b"), { unsafe: true })).not.toThrow();
	});

	it("should reject an unknown encoding", () => {
		expect(() => writeWorkbook(workbook("One"), { encoding: "klingon" })).toThrow(
			"Invalid or unknown codepage 'klingon'",
		);
	});

	it("should return a stored source without changes as it is", () => {
		const wb = workbook("One");
		const first = writeWorkbook(wb);
		wb.source = first.source;
		const second = writeWorkbook(wb);
		expect(second.data).toBe(first.data);
		expect(second.source).toBe(first.source);
	});

	it("should build from scratch when the stored source has fewer sheets", () => {
		const wb = workbook("One");
		wb.source = writeWorkbook(wb).source;
		wb.changes = [];
		wb.worksheets.push({ name: "Two", rows: [[2]] });
		const written = writeWorkbook(wb);
		expect(written.source.layout.worksheets).toHaveLength(2);
		const expected = writeWorkbook({ ...wb, source: undefined, changes: undefined });
		expect(containerReadStream(written.data)).toEqual(containerReadStream(expected.data));
	});

	it("should keep the formatsComplete flag of the stored source", () => {
		const wb = workbook("One");
		const first = writeWorkbook(wb);
		wb.formats = [{}, {}, {}, {}, {}, {}, {}, {}, {}, {}, {}, {}, {}, {}, {}, {}];
		wb.source = { ...first.source, formatsComplete: true };
		wb.changes = [{ type: "worksheet", index: 0 }];
		const second = writeWorkbook(wb);
		expect(second.source.formatsComplete).toBe(true);
		expect(containerReadStream(second.data)).toEqual(containerReadStream(first.data));
	});
});
