/**
 * Request/response payloads and CAN header identifiers.
 *
 * A Mode 01 request is `01 <PID>`; the positive response is
 * `41 <PID> <data...>`. VIN (Mode 09) and DTC (Mode 03) follow the same
 * mode + 0x40 convention.
 *
 * Framing below that (CAN ID, byte count, padding) belongs to the transport.
 *
 * @module obd2/messages
 */

import { toHexString } from "@pid-registry/core";
import { encodeDtcList } from "./dtc.js";
import { InvalidCanIdError } from "./errors.js";
import {
	findByPid,
	lookup,
	lookupPid,
	OBD_MODE,
	type ParameterValue,
	type PidParameter,
	POSITIVE_RESPONSE_OFFSET,
	pidByte,
} from "./parameters.js";
import { decodeValue, encodeValue } from "./scaling.js";
import { type CanIdWidth, isCanIdWidth } from "./validators.js";
import { encodeVin } from "./vin.js";

export interface CanHeaders {
	/** Functional request ID sent by the tester */
	readonly request: readonly number[];
	/** Response ID of the ECU */
	readonly response: readonly number[];
}

const CAN_HEADERS: Readonly<Record<CanIdWidth, CanHeaders>> = Object.freeze({
	11: { request: [0x07, 0xdf], response: [0x07, 0xe8] },
	29: { request: [0x98, 0xdb, 0x33, 0xf1], response: [0x98, 0xda, 0xf1, 0x33] },
});

/**
 * Header IDs for an 11-bit or 29-bit CAN bus.
 *
 * @throws InvalidCanIdError unless the width is 11 or 29
 */
export function canHeaders(width: number): CanHeaders {
	if (!isCanIdWidth(width)) {
		throw new InvalidCanIdError(width);
	}
	return CAN_HEADERS[width];
}

/**
 * Build the request for a parameter: `01 <PID>` for Mode 01 codes,
 * `09 02` for VIN and `03` for DTC.
 *
 * @example
 * encodeRequest("RPM"); // Uint8Array([0x01, 0x0c])
 * encodeRequest("VIN"); // Uint8Array([0x09, 0x02])
 */
export function encodeRequest(code: string): Uint8Array {
	const parameter = lookup(code);
	if (parameter.type !== "special") {
		return new Uint8Array([parameter.mode, pidByte(parameter)]);
	}
	return parameter.pid !== undefined
		? new Uint8Array([parameter.mode, Number.parseInt(parameter.pid, 16)])
		: new Uint8Array([parameter.mode]);
}

function positiveResponse(
	header: readonly number[],
	payload: Uint8Array,
): Uint8Array {
	const out = new Uint8Array(header.length + payload.length);
	out.set(header, 0);
	out.set(payload, header.length);
	return out;
}

/**
 * Build the Mode 09 PID 02 response carrying a VIN.
 *
 * @throws InvalidVinError if the VIN is not 17 ASCII characters
 */
export function encodeVinResponse(vin: string): Uint8Array {
	return positiveResponse(
		[OBD_MODE.VEHICLE_INFO + POSITIVE_RESPONSE_OFFSET, 0x02],
		encodeVin(vin),
	);
}

/**
 * Build the Mode 03 response carrying stored DTCs.
 *
 * @throws InvalidDtcError on the first invalid code
 *
 * @example
 * encodeDtcResponse(["P0101"]); // Uint8Array([0x43, 0x01, 0x01, 0x01])
 */
export function encodeDtcResponse(codes: readonly string[]): Uint8Array {
	return positiveResponse(
		[OBD_MODE.STORED_DTCS + POSITIVE_RESPONSE_OFFSET],
		encodeDtcList(codes),
	);
}

/**
 * Build the positive Mode 01 response carrying a physical value.
 *
 * @example
 * encodeResponse("ECT", 0); // Uint8Array([0x41, 0x05, 0x28])
 */
export function encodeResponse(
	code: string,
	value: ParameterValue | readonly number[],
): Uint8Array {
	const parameter = lookupPid(code);
	return positiveResponse(
		[OBD_MODE.CURRENT_DATA + POSITIVE_RESPONSE_OFFSET, pidByte(parameter)],
		encodeValue(parameter.code, value),
	);
}

export interface DecodedResponse {
	parameter: PidParameter;
	value: ParameterValue;
}

/**
 * Decode a positive Mode 01 response.
 *
 * @throws Error if the response is too short or not a Mode 01 response
 * @throws InvalidParameterError if the PID is not in the registry
 *
 * @example
 * decodeResponse([0x41, 0x0c, 0x0f, 0xa0]).value; // 1000
 */
export function decodeResponse(response: ArrayLike<number>): DecodedResponse {
	const bytes = Uint8Array.from(response);
	const mode = bytes[0];
	const pid = bytes[1];

	if (mode === undefined || pid === undefined) {
		throw new Error(`Response too short: ${bytes.length} bytes`);
	}
	if (mode !== OBD_MODE.CURRENT_DATA + POSITIVE_RESPONSE_OFFSET) {
		throw new Error(`Not a Mode 01 response: ${toHexString(bytes)}`);
	}

	const parameter = findByPid(pid);
	return {
		parameter,
		value: decodeValue(parameter.code, bytes.subarray(2)),
	};
}
