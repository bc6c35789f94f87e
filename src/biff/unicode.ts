import { concatBytes, writeU16 } from "../utils/buffer.js";

/** Character width flag of an encoded string: 1 when characters are stored as 16-bit code units */
export type WidthFlag = 0 | 1;

/** Length-prefix width in bytes */
export type LengthBytes = 1 | 2;

/** A unicode string split into its header and character payload */
export interface EncodedString {
	/** Length prefix followed by the option byte */
	header: Uint8Array;
	/** Characters, one byte each when compressed, UTF-16LE when wide */
	payload: Uint8Array;
	wide: WidthFlag;
}

/** True when some code unit cannot be stored in a single byte */
function needsWideEncoding(text: string): boolean {
	for (let i = 0; i < text.length; ++i) {
		if (text.charCodeAt(i) > 0xff) {
			return true;
		}
	}
	return false;
}

function encodeCompressed(text: string): Uint8Array {
	const out = new Uint8Array(text.length);
	for (let i = 0; i < text.length; ++i) {
		out[i] = text.charCodeAt(i);
	}
	return out;
}

function encodeWide(text: string): Uint8Array {
	const out = new Uint8Array(text.length * 2);
	for (let i = 0; i < text.length; ++i) {
		writeU16(out, i * 2, text.charCodeAt(i));
	}
	return out;
}

/**
 * Encode a string the way BIFF8 stores unicode strings.
 *
 * The length prefix counts UTF-16 code units. Strings whose code units all
 * fit in one byte are written compressed.
 *
 * @param text - String to encode
 * @param lengthBytes - 1 for an 8-bit length prefix, 2 for a 16-bit one
 * @throws Error if the string is longer than the prefix can express
 */
export function encodeUnicodeString(text: string, lengthBytes: LengthBytes = 1): EncodedString {
	const max = lengthBytes === 1 ? 0xff : 0xffff;
	if (text.length > max) {
		throw new Error("String too long for a " + lengthBytes * 8 + "-bit length: " + text.length + " characters");
	}
	const wide: WidthFlag = needsWideEncoding(text) ? 1 : 0;
	const header = new Uint8Array(lengthBytes + 1);
	if (lengthBytes === 1) {
		header[0] = text.length;
	} else {
		writeU16(header, 0, text.length);
	}
	header[lengthBytes] = wide;
	return { header, payload: wide ? encodeWide(text) : encodeCompressed(text), wide };
}

/** Header and payload of {@link encodeUnicodeString} as one byte array */
export function unicodeString(text: string, lengthBytes: LengthBytes = 1): Uint8Array {
	const { header, payload } = encodeUnicodeString(text, lengthBytes);
	return concatBytes([header, payload]);
}

/**
 * Narrow a run of UTF-16LE characters to one byte each when every high byte
 * is zero. Returns the input untouched otherwise.
 */
export function compressUnicodeString(data: Uint8Array): { data: Uint8Array; wide: WidthFlag } {
	if (data.length % 2 !== 0) {
		return { data, wide: 1 };
	}
	const compressed = new Uint8Array(data.length / 2);
	for (let i = 0; i < compressed.length; ++i) {
		if (data[i * 2 + 1] !== 0) {
			return { data, wide: 1 };
		}
		compressed[i] = data[i * 2];
	}
	return { data: compressed, wide: 0 };
}
