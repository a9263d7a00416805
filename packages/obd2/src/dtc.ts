/**
 * Diagnostic Trouble Code payloads (Mode 03).
 *
 * Each DTC packs into two bytes:
 *
 *   byte 1: [system:2][digit1:2][digit2:4]
 *   byte 2: [digit3:4][digit4:4]
 *
 * A Mode 03 payload over CAN starts with the number of DTCs that follow.
 *
 * @module obd2/dtc
 */

import { DTC_SYSTEMS, validateDtc } from "./validators.js";

function hexDigit(value: number): string {
	return value.toString(16).toUpperCase();
}

/**
 * Encode one DTC into its two payload bytes.
 *
 * @throws InvalidDtcError if the code fails {@link validateDtc}
 *
 * @example
 * encodeDtc("P0101"); // [0x01, 0x01]
 * encodeDtc("U3FFF"); // [0xff, 0xff]
 */
export function encodeDtc(code: string): [number, number] {
	validateDtc(code);
	const upper = code.toUpperCase();
	const system = DTC_SYSTEMS.findIndex((s) => s === upper[0]);
	const digits = upper
		.slice(1)
		.split("")
		.map((d) => Number.parseInt(d, 16));
	const [d1 = 0, d2 = 0, d3 = 0, d4 = 0] = digits;

	return [(system << 6) | (d1 << 4) | d2, (d3 << 4) | d4];
}

/**
 * Decode the two bytes of one DTC.
 *
 * @param bytes - Buffer holding the DTC
 * @param offset - Offset of the first DTC byte
 * @throws Error if fewer than two bytes are available
 *
 * @example
 * decodeDtc([0x01, 0x01]); // "P0101"
 */
export function decodeDtc(bytes: ArrayLike<number>, offset = 0): string {
	const high = bytes[offset];
	const low = bytes[offset + 1];
	if (high === undefined || low === undefined) {
		throw new Error(
			`DTC at offset ${offset} needs 2 bytes, buffer has ${bytes.length}`,
		);
	}

	const system = DTC_SYSTEMS[(high >> 6) & 0x03] ?? "P";
	return `${system}${hexDigit((high >> 4) & 0x03)}${hexDigit(high & 0x0f)}${hexDigit(low >> 4)}${hexDigit(low & 0x0f)}`;
}

/**
 * Encode a list of DTCs as a Mode 03 payload: count byte, then two bytes
 * per code.
 *
 * @throws InvalidDtcError on the first invalid code
 * @throws Error if there are more than 255 codes
 *
 * @example
 * encodeDtcList(["P0101", "C0300"]); // Uint8Array([0x02, 0x01, 0x01, 0x43, 0x00])
 */
export function encodeDtcList(codes: readonly string[]): Uint8Array {
	if (codes.length > 0xff) {
		throw new Error(`Too many DTCs: ${codes.length} (max 255)`);
	}

	const out = new Uint8Array(1 + codes.length * 2);
	out[0] = codes.length;
	codes.forEach((code, i) => {
		out.set(encodeDtc(code), 1 + i * 2);
	});
	return out;
}

/**
 * Decode a Mode 03 payload (count byte, then DTC pairs).
 *
 * @throws Error if the payload is shorter than its count byte claims
 */
export function decodeDtcList(payload: ArrayLike<number>): string[] {
	const count = payload[0];
	if (count === undefined) {
		throw new Error("Empty DTC payload");
	}
	if (payload.length < 1 + count * 2) {
		throw new Error(
			`DTC payload claims ${count} codes but has ${payload.length} bytes`,
		);
	}

	const codes: string[] = [];
	for (let i = 0; i < count; i++) {
		codes.push(decodeDtc(payload, 1 + i * 2));
	}
	return codes;
}

/**
 * Normalize a user-entered DTC ("p0101 ") to its canonical form ("P0101").
 *
 * @throws InvalidDtcError if the trimmed code is invalid
 */
export function normalizeDtc(code: string): string {
	const trimmed = code.trim().toUpperCase();
	validateDtc(trimmed);
	return trimmed;
}
