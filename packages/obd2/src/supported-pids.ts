/**
 * Supported-PID bitmasks (Mode 01 PIDs 00, 20, 40, ...).
 *
 * Each request returns a 4-byte mask over the 32 PIDs that follow the
 * request code. Bit 31 (MSB of byte A) is PID base+1, bit 0 (LSB of byte D)
 * is PID base+0x20, which doubles as "the next group is supported".
 *
 * @module obd2/supported-pids
 */

import { decodeUnsigned, encodeUnsigned } from "@pid-registry/core";
import { InvalidPidGroupError } from "./errors.js";
import {
	lookup,
	type PidParameterCode,
	parameterForPid,
	pidByte,
} from "./parameters.js";

export const SUPPORTED_PID_REQUESTS = [
	"00",
	"20",
	"40",
	"60",
	"80",
	"A0",
] as const;

export type SupportedPidRequest = (typeof SUPPORTED_PID_REQUESTS)[number];

/** PIDs covered by one supported-PID request */
const GROUP_SPAN = 0x20;

export interface SupportedPidGroup {
	readonly request: SupportedPidRequest;
	/** Request PID as a number */
	readonly base: number;
	readonly firstPid: number;
	readonly lastPid: number;
	/** Width of the bitmask in the response, in bytes */
	readonly maskBytes: 4;
}

function group(request: SupportedPidRequest): SupportedPidGroup {
	const base = Number.parseInt(request, 16);
	return {
		request,
		base,
		firstPid: base + 1,
		lastPid: base + GROUP_SPAN,
		maskBytes: 4,
	};
}

export const SUPPORTED_PID_GROUPS: Readonly<
	Record<SupportedPidRequest, SupportedPidGroup>
> = Object.freeze({
	"00": group("00"),
	"20": group("20"),
	"40": group("40"),
	"60": group("60"),
	"80": group("80"),
	A0: group("A0"),
});

function isSupportedPidRequest(code: string): code is SupportedPidRequest {
	return SUPPORTED_PID_REQUESTS.some((r) => r === code);
}

/**
 * Look up the group for a supported-PID request code.
 *
 * @param requestCode - "20", "0x20" or 0x20
 * @throws InvalidPidGroupError for anything but 00, 20, 40, 60, 80, A0
 *
 * @example
 * supportedPidGroup("20").maskBytes; // 4
 */
export function supportedPidGroup(
	requestCode: string | number,
): SupportedPidGroup {
	const normalized =
		typeof requestCode === "number"
			? requestCode.toString(16).toUpperCase().padStart(2, "0")
			: requestCode.trim().replace(/^0x/i, "").toUpperCase().padStart(2, "0");

	if (!isSupportedPidRequest(normalized)) {
		throw new InvalidPidGroupError(String(requestCode));
	}
	return SUPPORTED_PID_GROUPS[normalized];
}

/**
 * Find the group whose mask carries a PID, if any.
 */
export function groupForPid(pid: number): SupportedPidGroup | undefined {
	return SUPPORTED_PID_REQUESTS.map((r) => SUPPORTED_PID_GROUPS[r]).find(
		(g) => pid >= g.firstPid && pid <= g.lastPid,
	);
}

function pidBit(group: SupportedPidGroup, pid: number): number {
	return (1 << (group.lastPid - pid)) >>> 0;
}

/**
 * Build the supported-PID masks a simulated ECU should answer with.
 *
 * Every group is present in the result. Groups below the highest group in
 * use also flag their last PID, so a tester walking 00, 20, 40, ... keeps
 * going until it reaches the parameters.
 *
 * VIN and DTC are accepted and ignored; they are not Mode 01 PIDs.
 *
 * @param codes - Parameter codes, case-insensitive
 * @throws InvalidParameterError for unknown codes
 *
 * @example
 * buildSupportedPidMasks(["RPM", "VSS"]).get("00"); // 0x00180000
 */
export function buildSupportedPidMasks(
	codes: readonly string[],
): Map<SupportedPidRequest, number> {
	const masks = new Map<SupportedPidRequest, number>(
		SUPPORTED_PID_REQUESTS.map((r) => [r, 0]),
	);
	let highest = -1;

	for (const code of codes) {
		const parameter = lookup(code);
		if (parameter.type === "special") continue;

		const pid = pidByte(parameter);
		const group = groupForPid(pid);
		if (group === undefined) continue;

		masks.set(
			group.request,
			((masks.get(group.request) ?? 0) | pidBit(group, pid)) >>> 0,
		);
		highest = Math.max(highest, SUPPORTED_PID_REQUESTS.indexOf(group.request));
	}

	for (let i = 0; i < highest; i++) {
		const request = SUPPORTED_PID_REQUESTS[i];
		if (request === undefined) continue;
		masks.set(request, ((masks.get(request) ?? 0) | 1) >>> 0);
	}

	return masks;
}

/**
 * Encode a 32-bit mask as the 4 response bytes A-D.
 *
 * @example
 * encodeSupportedPidMask(0x80000001); // Uint8Array([0x80, 0x00, 0x00, 0x01])
 */
export function encodeSupportedPidMask(mask: number): Uint8Array {
	return encodeUnsigned(mask >>> 0, "u32");
}

/**
 * List the PIDs flagged in a supported-PID response.
 *
 * @param requestCode - The request the mask answers
 * @param mask - The 32-bit mask, or the 4 response bytes A-D
 * @returns PIDs in ascending order
 * @throws InvalidPidGroupError for an unknown request code
 *
 * @example
 * decodeSupportedPids("00", 0x00180000); // [0x0c, 0x0d]
 */
export function decodeSupportedPids(
	requestCode: string | number,
	mask: number | ArrayLike<number>,
): number[] {
	const group = supportedPidGroup(requestCode);
	const value =
		typeof mask === "number"
			? mask >>> 0
			: decodeUnsigned(Uint8Array.from(mask), 0, "u32");

	const pids: number[] = [];
	for (let pid = group.firstPid; pid <= group.lastPid; pid++) {
		if ((value & pidBit(group, pid)) !== 0) {
			pids.push(pid);
		}
	}
	return pids;
}

/**
 * Registry codes flagged in a supported-PID response. PIDs the registry does
 * not know are left out.
 */
export function decodeSupportedParameters(
	requestCode: string | number,
	mask: number | ArrayLike<number>,
): PidParameterCode[] {
	return decodeSupportedPids(requestCode, mask).flatMap((pid) => {
		const parameter = parameterForPid(pid);
		return parameter !== undefined ? [parameter.code] : [];
	});
}
