import { describe, it, expect } from "vitest";
import type { Workbook } from "../types.js";
import { installSst, resolveOptions, withWriterContext, type WriterContext } from "./context.js";
import { codepageFor } from "./internals.js";
import { DEFAULT_FONT } from "./styles.js";

function workbook(extra: Partial<Workbook> = {}): Workbook {
	return { worksheets: [{ name: "A", rows: [["x"]] }], formats: [], defaultFormat: { font: DEFAULT_FONT }, ...extra };
}

describe("resolveOptions", () => {
	it("should default to UTF-16 and the 1900 date system", () => {
		expect(resolveOptions(workbook())).toEqual({ encoding: "UTF-16LE", date1904: false });
	});

	it("should prefer options over workbook settings", () => {
		const wb = workbook({ encoding: "macroman", date1904: true });
		expect(resolveOptions(wb)).toEqual({ encoding: "macroman", date1904: true });
		expect(resolveOptions(wb, { encoding: "windows-1250", date1904: false })).toEqual({
			encoding: "windows-1250",
			date1904: false,
		});
	});

	it("should reject encodings without a code page", () => {
		expect(() => resolveOptions(workbook({ encoding: "EBCDIC" }))).toThrow("Invalid or unknown codepage 'EBCDIC'");
	});
});

describe("codepageFor", () => {
	it("should ignore case", () => {
		expect(codepageFor("utf-16le")).toBe(1200);
		expect(codepageFor("MacRoman")).toBe(10000);
	});
});

describe("withWriterContext", () => {
	it("should dispose the context after the callback", () => {
		const wb = workbook();
		let seen = 0;
		const ctx = withWriterContext(wb, resolveOptions(wb), false, (c) => {
			installSst(c, ["x"]);
			seen = c.sheets.length;
			return c;
		});
		expect(seen).toBe(1);
		expect(ctx.sheets).toHaveLength(0);
		expect(ctx.sst.get("x")).toBeUndefined();
	});

	it("should dispose the context when the callback throws", () => {
		const wb = workbook();
		const captured: WriterContext[] = [];
		expect(() =>
			withWriterContext(wb, resolveOptions(wb), false, (c) => {
				captured.push(c);
				throw new Error("boom");
			}),
		).toThrow("boom");
		expect(captured[0].sheets).toHaveLength(0);
	});

	it("should keep contexts of separate calls apart", () => {
		const a = workbook();
		const b = workbook({ worksheets: [] });
		withWriterContext(a, resolveOptions(a), false, (ctxA) => {
			withWriterContext(b, resolveOptions(b), false, (ctxB) => {
				installSst(ctxB, ["y"]);
				expect(ctxB.sheets).toHaveLength(0);
			});
			expect(ctxA.sheets).toHaveLength(1);
			expect(ctxA.sst.get("y")).toBeUndefined();
		});
	});
});
