import type { Workbook, WriteOptions } from "./types.js";
import { writeWorkbook } from "./biff/workbook.js";
import { base64encode } from "./utils/base64.js";
import * as fs from "node:fs";

/**
 * Write a Workbook to an in-memory representation (binary XLS format).
 *
 * @param wb - Workbook to serialize
 * @param opts - Write options controlling output format and behavior
 * @returns Uint8Array (default/"array"), base64 string, or Buffer depending on opts.type
 */
export function write(wb: Workbook, opts: WriteOptions & { type: "base64" }): string;
export function write(wb: Workbook, opts: WriteOptions & { type: "buffer" }): Buffer;
export function write(wb: Workbook, opts?: WriteOptions & { type?: "array" }): Uint8Array;
export function write(wb: Workbook, opts?: WriteOptions): Uint8Array | Buffer | string;
export function write(wb: Workbook, opts?: WriteOptions): Uint8Array | Buffer | string {
	const { data } = writeWorkbook(wb, opts);
	switch (opts?.type) {
		case "base64":
			return base64encode(data);
		case "buffer":
			return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
		case "array":
		default:
			return data;
	}
}

/**
 * Write a Workbook to a file on the local filesystem.
 *
 * @param wb - Workbook to serialize
 * @param filename - Output file path
 * @param opts - Write options; `type` is ignored
 */
export function writeFile(wb: Workbook, filename: string, opts?: WriteOptions): void {
	const data = write(wb, { ...opts, type: "buffer" });
	fs.writeFileSync(filename, data);
}
