import type { Workbook, WriteOptions, WrittenWorkbook } from "../types.js";
import { containerWrite } from "../container/index.js";
import { putBytes } from "../utils/buffer.js";
import { resolveOptions, withWriterContext } from "./context.js";
import { writeChanges } from "./write-changes.js";
import { writeFromScratch } from "./write-fresh.js";

/** Characters forbidden in sheet names */
const badchars = ":][*?/\\".split("");

/** Longest sheet name a BOUNDSHEET record may carry */
const MAX_SHEET_NAME_LENGTH = 31;

/**
 * Validate a sheet name against Excel naming rules.
 *
 * @param n - Sheet name to validate
 * @param safe - If true, return false on invalid names instead of throwing
 * @returns true if valid
 * @throws Error describing the validation failure (unless safe=true)
 */
export function validateSheetName(n: string, safe?: boolean): boolean {
	try {
		if (n === "") {
			throw new Error("Sheet name cannot be blank");
		}
		if (n.length > MAX_SHEET_NAME_LENGTH) {
			throw new Error("Sheet name cannot exceed 31 chars");
		}
		// 0x27 = apostrophe (')
		if (n.charCodeAt(0) === 0x27 || n.charCodeAt(n.length - 1) === 0x27) {
			throw new Error("Sheet name cannot start or end with apostrophe (')");
		}
		if (n.toLowerCase() === "history") {
			throw new Error("Sheet name cannot be 'History'");
		}
		for (const c of badchars) {
			if (n.includes(c)) {
				throw new Error("Sheet name cannot contain : \\ / ? * [ ]");
			}
		}
	} catch (e) {
		if (safe) {
			return false;
		}
		throw e;
	}
	return true;
}

/**
 * Validate that a Workbook can be written: at least one sheet, every name
 * valid, no name used twice (case-insensitively, as Excel compares them).
 *
 * @throws Error on the first problem found
 */
export function validateWorkbook(wb: Workbook): void {
	if (!wb.worksheets.length) {
		throw new Error("Workbook is empty");
	}
	const seen = new Set<string>();
	for (const ws of wb.worksheets) {
		validateSheetName(ws.name);
		const key = ws.name.toLowerCase();
		if (seen.has(key)) {
			throw new Error("Duplicate Sheet Name: " + ws.name);
		}
		seen.add(key);
	}
}

/**
 * Serialize a Workbook into a compound-file container.
 *
 * Without a stored source the Workbook stream is built from scratch, and so
 * it is when the source holds a different number of sheets than the model.
 * With a source and pending changes only the changed regions are rendered
 * and the rest of the stored stream is copied. A source without changes is
 * returned as it is.
 *
 * The returned source describes the new bytes and can be attached to the
 * workbook for the next incremental write.
 */
export function writeWorkbook(wb: Workbook, opts?: WriteOptions): WrittenWorkbook {
	if (!opts?.unsafe) {
		validateWorkbook(wb);
	}
	const options = resolveOptions(wb, opts);
	// A source with a different set of sheets cannot be patched
	const source = wb.source?.layout.worksheets.length === wb.worksheets.length ? wb.source : undefined;
	const changes = wb.changes ?? [];
	if (source && changes.length === 0) {
		return { data: source.data, source };
	}
	const formatsComplete = source?.formatsComplete ?? false;
	return withWriterContext(wb, options, formatsComplete, (ctx) => {
		const rendered = source ? writeChanges(ctx, source, changes) : writeFromScratch(ctx);
		const data = containerWrite((out) => {
			putBytes(out, rendered.stream);
		});
		return {
			data,
			source: { data, layout: rendered.layout, strings: rendered.strings, formatsComplete },
		};
	});
}
