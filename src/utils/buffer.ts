/** Read an unsigned 16-bit little-endian integer from a buffer */
export function readU16(buf: Uint8Array, off: number): number {
	return buf[off] | (buf[off + 1] << 8);
}

/** Read an unsigned 32-bit little-endian integer from a buffer */
export function readU32(buf: Uint8Array, off: number): number {
	return (buf[off] | (buf[off + 1] << 8) | (buf[off + 2] << 16) | (buf[off + 3] << 24)) >>> 0;
}

/** Write an unsigned 16-bit little-endian integer to a buffer */
export function writeU16(buf: Uint8Array, off: number, val: number): void {
	buf[off] = val & 0xff;
	buf[off + 1] = (val >> 8) & 0xff;
}

/** Write an unsigned 32-bit little-endian integer to a buffer */
export function writeU32(buf: Uint8Array, off: number, val: number): void {
	buf[off] = val & 0xff;
	buf[off + 1] = (val >> 8) & 0xff;
	buf[off + 2] = (val >> 16) & 0xff;
	buf[off + 3] = (val >> 24) & 0xff;
}

/** Concatenate byte arrays into one new array */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
	let total = 0;
	for (const part of parts) {
		total += part.length;
	}
	const result = new Uint8Array(total);
	let offset = 0;
	for (const part of parts) {
		result.set(part, offset);
		offset += part.length;
	}
	return result;
}

/** Write a little-endian IEEE 754 double to a buffer */
export function writeF64(buf: Uint8Array, off: number, val: number): void {
	new DataView(buf.buffer, buf.byteOffset, buf.byteLength).setFloat64(off, val, true);
}

/**
 * Growable byte buffer with an append-only cursor.
 *
 * Every record writer appends to one of these instead of returning loose
 * fragments; `pos` is the number of bytes written so far, which is also the
 * stream position of the next byte.
 */
export interface ByteWriter {
	/** Backing store; only the first `pos` bytes are meaningful */
	buf: Uint8Array;
	pos: number;
}

export function createByteWriter(initialSize = 1024): ByteWriter {
	return { buf: new Uint8Array(Math.max(16, initialSize)), pos: 0 };
}

/** Make room for at least `n` more bytes, doubling the backing store */
function reserve(out: ByteWriter, n: number): void {
	const needed = out.pos + n;
	if (needed <= out.buf.length) {
		return;
	}
	let size = out.buf.length * 2;
	while (size < needed) {
		size *= 2;
	}
	const next = new Uint8Array(size);
	next.set(out.buf.subarray(0, out.pos));
	out.buf = next;
}

/** Append raw bytes */
export function putBytes(out: ByteWriter, data: Uint8Array): void {
	reserve(out, data.length);
	out.buf.set(data, out.pos);
	out.pos += data.length;
}

export function putU8(out: ByteWriter, val: number): void {
	reserve(out, 1);
	out.buf[out.pos++] = val & 0xff;
}

/** Copy of the bytes written so far */
export function writerBytes(out: ByteWriter): Uint8Array {
	return out.buf.slice(0, out.pos);
}

/**
 * Sequential reader over a byte array with a single repositionable cursor.
 * Reads past the end return whatever is left.
 */
export interface ByteReader {
	data: Uint8Array;
	pos: number;
}

export function createByteReader(data: Uint8Array): ByteReader {
	return { data, pos: 0 };
}

export function seekReader(reader: ByteReader, pos: number): void {
	if (pos < 0 || pos > reader.data.length) {
		throw new Error("Cannot seek to " + pos + " in stream of " + reader.data.length + " bytes");
	}
	reader.pos = pos;
}

/** Read `length` bytes, or everything up to the end when omitted */
export function readBytes(reader: ByteReader, length?: number): Uint8Array {
	const end = length === undefined ? reader.data.length : Math.min(reader.data.length, reader.pos + length);
	const out = reader.data.slice(reader.pos, end);
	reader.pos = end;
	return out;
}

/** Build a small payload of 16-bit little-endian values */
export function packU16(...values: number[]): Uint8Array {
	const out = new Uint8Array(values.length * 2);
	values.forEach((v, i) => writeU16(out, i * 2, v));
	return out;
}
