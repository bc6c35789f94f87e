/**
 * Encode a Uint8Array to a base64 string.
 *
 * Converts each byte to a character and uses the built-in btoa() for encoding.
 *
 * @param data - Byte array to encode
 * @returns Base64-encoded string
 */
export function base64encode(data: Uint8Array): string {
	let binaryStr = "";
	for (let i = 0; i < data.length; i++) {
		binaryStr += String.fromCharCode(data[i]);
	}
	return btoa(binaryStr);
}
