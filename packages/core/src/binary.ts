/**
 * Unsigned integer widths used by OBD2 payload fields.
 * - "u8" = unsigned 8-bit integer (0-255)
 * - "u16" = unsigned 16-bit integer (0-65535)
 * - "u32" = unsigned 32-bit integer (0-4294967295)
 */
export type UnsignedType = "u8" | "u16" | "u32";

/**
 * Map a byte width to its unsigned scalar type
 *
 * @param width - Field width in bytes
 * @throws Error if no unsigned type has that width
 *
 * @example
 * unsignedTypeForWidth(2); // "u16"
 */
export function unsignedTypeForWidth(width: number): UnsignedType {
	switch (width) {
		case 1:
			return "u8";
		case 2:
			return "u16";
		case 4:
			return "u32";
		default:
			throw new Error(`Unsupported field width: ${width} bytes`);
	}
}

/**
 * Get the byte size of an unsigned type
 *
 * @example
 * sizeOf("u16"); // 2
 */
export function sizeOf(dtype: UnsignedType): number {
	switch (dtype) {
		case "u8":
			return 1;
		case "u16":
			return 2;
		case "u32":
			return 4;
	}
}

/**
 * Largest value an unsigned type can hold
 *
 * @example
 * maxUnsigned("u16"); // 65535
 */
export function maxUnsigned(dtype: UnsignedType): number {
	switch (dtype) {
		case "u8":
			return 0xff;
		case "u16":
			return 0xffff;
		case "u32":
			return 0xffffffff;
	}
}

/**
 * Decode a big-endian unsigned integer from a buffer at the given offset
 *
 * OBD2 payloads are always big-endian (byte A is most significant).
 *
 * @param buffer - The buffer to read from
 * @param offset - Byte offset in the buffer
 * @param dtype - The unsigned type to decode
 * @returns The raw unsigned value
 * @throws Error if offset is negative or the field runs past the buffer
 *
 * @example
 * const buffer = new Uint8Array([0x0f, 0xa0]);
 * decodeUnsigned(buffer, 0, "u16"); // 4000
 */
export function decodeUnsigned(
	buffer: Uint8Array,
	offset: number,
	dtype: UnsignedType,
): number {
	if (offset < 0) {
		throw new Error(`Offset cannot be negative: ${offset}`);
	}

	const size = sizeOf(dtype);
	if (offset + size > buffer.length) {
		throw new Error(
			`Offset ${offset} out of bounds for ${dtype} in buffer of length ${buffer.length}`,
		);
	}

	const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

	switch (dtype) {
		case "u8":
			return view.getUint8(offset);
		case "u16":
			return view.getUint16(offset, false);
		case "u32":
			return view.getUint32(offset, false);
		default: {
			const _exhaustive: never = dtype;
			throw new Error(`Unknown unsigned type: ${_exhaustive}`);
		}
	}
}

/**
 * Encode a value as a big-endian unsigned integer
 *
 * Values are rounded and clamped to the valid range for the type.
 *
 * @param value - The numeric value to encode
 * @param dtype - The unsigned type to encode to
 * @returns Encoded bytes
 *
 * @example
 * encodeUnsigned(4000, "u16"); // Uint8Array([0x0f, 0xa0])
 */
export function encodeUnsigned(value: number, dtype: UnsignedType): Uint8Array {
	const size = sizeOf(dtype);
	const buffer = new ArrayBuffer(size);
	const view = new DataView(buffer);
	const clamped = Math.max(0, Math.min(maxUnsigned(dtype), Math.round(value)));

	switch (dtype) {
		case "u8":
			view.setUint8(0, clamped);
			break;
		case "u16":
			view.setUint16(0, clamped, false);
			break;
		case "u32":
			view.setUint32(0, clamped, false);
			break;
	}

	return new Uint8Array(buffer);
}

/**
 * Format bytes as space-separated upper-case hex pairs
 *
 * @example
 * toHexString(new Uint8Array([0x41, 0x0c, 0x0f, 0xa0])); // "41 0C 0F A0"
 */
export function toHexString(bytes: ArrayLike<number>): string {
	return Array.from(bytes, (b) =>
		b.toString(16).toUpperCase().padStart(2, "0"),
	).join(" ");
}

/**
 * Parse a hex string into bytes
 *
 * Accepts pairs separated by whitespace, commas or nothing, with optional
 * `0x` prefixes: "41 0C", "410C", "0x41,0x0c".
 *
 * @throws Error if the string contains non-hex characters or an odd digit count
 */
export function parseHexString(text: string): Uint8Array {
	const digits = text.replace(/0x/gi, "").replace(/[\s,]+/g, "");

	if (!/^[0-9a-f]*$/i.test(digits)) {
		throw new Error(`Invalid hex string: "${text}"`);
	}
	if (digits.length % 2 !== 0) {
		throw new Error(`Hex string has an odd number of digits: "${text}"`);
	}

	const bytes = new Uint8Array(digits.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}
