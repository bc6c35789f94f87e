import CFB from "cfb";
import {
	createByteReader,
	createByteWriter,
	writerBytes,
	type ByteReader,
	type ByteWriter,
} from "../utils/buffer.js";

/** Stream that holds the BIFF8 workbook records */
export const WORKBOOK_STREAM = "Workbook";

/**
 * Create a compound-file container holding one stream.
 *
 * `build` receives a sequential writer for the stream; whatever it writes
 * becomes the stream content once it returns.
 *
 * @param build - Writes the stream content
 * @param streamName - Name of the stream inside the container
 * @returns Raw container bytes
 */
export function containerWrite(build: (writer: ByteWriter) => void, streamName = WORKBOOK_STREAM): Uint8Array {
	const writer = createByteWriter(64 * 1024);
	build(writer);
	const cfb = CFB.utils.cfb_new();
	CFB.utils.cfb_add(cfb, "/" + streamName, writerBytes(writer));
	const out: unknown = CFB.write(cfb, { type: "buffer" });
	if (!(out instanceof Uint8Array)) {
		throw new Error("Compound file writer returned " + typeof out);
	}
	return new Uint8Array(out);
}

/**
 * Extract one stream from a compound-file container.
 *
 * @param data - Raw container bytes
 * @param streamName - Name of the stream to extract
 * @returns The stream content
 * @throws Error if the container has no such stream
 */
export function containerReadStream(data: Uint8Array, streamName = WORKBOOK_STREAM): Uint8Array {
	const cfb = CFB.read(Buffer.from(data.buffer, data.byteOffset, data.byteLength), { type: "buffer" });
	const entry = CFB.find(cfb, streamName);
	if (!entry || !entry.content) {
		throw new Error("Cannot find " + streamName + " stream");
	}
	const content = entry.content instanceof Uint8Array ? entry.content : Uint8Array.from(entry.content);
	return content.slice(0, entry.size);
}

/** Open a stream of a container for sequential, seekable reading */
export function containerRead(data: Uint8Array, streamName = WORKBOOK_STREAM): ByteReader {
	return createByteReader(containerReadStream(data, streamName));
}
