import {
	concatBytes,
	createByteWriter,
	packU16,
	putBytes,
	putU8,
	writeU16,
	writerBytes,
	type ByteWriter,
} from "../utils/buffer.js";
import { OPCODE, RECORD_HEADER_SIZE, RECORD_SIZE_LIMIT } from "./internals.js";
import { compressUnicodeString, type EncodedString, type WidthFlag } from "./unicode.js";

/**
 * Write one record: opcode, payload length, then at most
 * {@link RECORD_SIZE_LIMIT} bytes of the concatenated parts.
 *
 * @returns The part of the payload that did not fit (empty when all of it was written)
 */
export function writeRecord(out: ByteWriter, opcode: number, ...parts: Uint8Array[]): Uint8Array {
	const data = parts.length === 1 ? parts[0] : concatBytes(parts);
	const limited = data.subarray(0, RECORD_SIZE_LIMIT);
	const header = new Uint8Array(RECORD_HEADER_SIZE);
	writeU16(header, 0, opcode);
	writeU16(header, 2, limited.length);
	putBytes(out, header);
	putBytes(out, limited);
	return data.slice(limited.length);
}

/**
 * Write a payload of any size as a record followed by as many CONTINUE
 * records as it takes.
 *
 * @returns Number of records written
 */
export function writeLongRecord(out: ByteWriter, opcode: number, payload: Uint8Array): number {
	let op = opcode;
	let rest = payload;
	let count = 0;
	do {
		rest = writeRecord(out, op, rest);
		op = OPCODE.CONTINUE;
		++count;
	} while (rest.length > 0);
	return count;
}

/** Write a record carrying a single 16-bit value, for records this writer never configures */
export function writePlaceholder(out: ByteWriter, opcode: number, value = 0x0000): void {
	writeRecord(out, opcode, packU16(value));
}

/** Where a string landed: absolute stream offset and offset inside its record (header included) */
export interface StringPosition {
	absolute: number;
	inRecord: number;
}

/**
 * A record whose payload is a list of unicode strings, split into CONTINUE
 * records as needed.
 *
 * A split between two strings needs nothing extra. A split inside a string
 * happens on a character boundary and the continuation starts with an option
 * byte that carries only the width flag. A wide remainder that fits in one
 * byte per character continues compressed.
 */
export interface StringRecordWriter {
	/** Destination buffer */
	out: ByteWriter;
	/** Opcode of the next record emitted; CONTINUE after the first */
	opcode: number;
	/** Absolute stream position of `out`'s first byte */
	streamOffset: number;
	/** Payload of the record being filled */
	record: ByteWriter;
	written: boolean;
}

/**
 * @param prefix - Fixed fields that open the first record
 */
export function createStringRecordWriter(
	out: ByteWriter,
	opcode: number,
	streamOffset = 0,
	prefix?: Uint8Array,
): StringRecordWriter {
	const record = createByteWriter();
	if (prefix) {
		putBytes(record, prefix);
	}
	return { out, opcode, streamOffset, record, written: false };
}

/** Append a string and report where it starts */
export function addString(writer: StringRecordWriter, encoded: EncodedString): StringPosition {
	const firstChar = encoded.payload.length > 0 ? (encoded.wide ? 2 : 1) : 0;
	if (writer.record.pos + encoded.header.length + firstChar > RECORD_SIZE_LIMIT) {
		flushStrings(writer);
	}
	const inRecord = RECORD_HEADER_SIZE + writer.record.pos;
	const position: StringPosition = { absolute: writer.streamOffset + writer.out.pos + inRecord, inRecord };
	putBytes(writer.record, encoded.header);

	let payload = encoded.payload;
	let wide: WidthFlag = encoded.wide;
	for (;;) {
		const space = RECORD_SIZE_LIMIT - writer.record.pos;
		if (payload.length <= space) {
			putBytes(writer.record, payload);
			break;
		}
		const take = wide ? space - (space % 2) : space;
		putBytes(writer.record, payload.subarray(0, take));
		payload = payload.subarray(take);
		flushStrings(writer);
		if (wide) {
			const compressed = compressUnicodeString(payload);
			payload = compressed.data;
			wide = compressed.wide;
		}
		putU8(writer.record, wide);
	}
	return position;
}

/** Emit whatever is buffered; later records are CONTINUE records */
function flushStrings(writer: StringRecordWriter): void {
	writeRecord(writer.out, writer.opcode, writerBytes(writer.record));
	writer.opcode = OPCODE.CONTINUE;
	writer.record = createByteWriter();
	writer.written = true;
}

/** Emit the last record. A writer that received nothing still emits one (possibly empty) record. */
export function finishStrings(writer: StringRecordWriter): void {
	if (writer.record.pos > 0 || !writer.written) {
		flushStrings(writer);
	}
}
