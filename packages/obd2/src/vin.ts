import { InvalidVinError } from "./errors.js";
import { VIN_LENGTH, validateVin } from "./validators.js";

/** Mode 09 PID 02 payloads start with the number of data items (always 1) */
const VIN_ITEM_COUNT = 0x01;

/**
 * Encode a VIN as a Mode 09 PID 02 payload: item count, then 17 ASCII bytes.
 *
 * @throws InvalidVinError if the VIN is not 17 characters or is not ASCII
 *
 * @example
 * encodeVin("1HGCM82633A004352")[0]; // 0x01
 */
export function encodeVin(vin: string): Uint8Array {
	validateVin(vin);

	const out = new Uint8Array(1 + VIN_LENGTH);
	out[0] = VIN_ITEM_COUNT;
	for (let i = 0; i < VIN_LENGTH; i++) {
		const code = vin.charCodeAt(i);
		if (code > 0x7f) {
			throw new InvalidVinError(vin);
		}
		out[1 + i] = code;
	}
	return out;
}

/**
 * Decode a Mode 09 PID 02 payload. Accepts the payload with or without the
 * leading item count; zero padding between the count and the VIN is dropped.
 *
 * @throws InvalidVinError if the decoded text is not 17 characters
 */
export function decodeVin(payload: ArrayLike<number>): string {
	let bytes = Array.from(payload);
	if (bytes.length > VIN_LENGTH && bytes[0] === VIN_ITEM_COUNT) {
		bytes = bytes.slice(1);
	}
	while (bytes.length > VIN_LENGTH && bytes[0] === 0x00) {
		bytes = bytes.slice(1);
	}

	const vin = String.fromCharCode(...bytes);
	validateVin(vin);
	return vin;
}
