import {
	InvalidCanIdError,
	InvalidDtcError,
	InvalidVinError,
} from "./errors.js";

export const VIN_LENGTH = 17;
export const DTC_LENGTH = 5;

/** CAN identifier widths, in bits */
export const CAN_ID_WIDTHS = [11, 29] as const;
export type CanIdWidth = (typeof CAN_ID_WIDTHS)[number];

/** DTC system letters, in the order of their two-bit encoding */
export const DTC_SYSTEMS = ["P", "C", "B", "U"] as const;
export type DtcSystem = (typeof DTC_SYSTEMS)[number];

// System letter, a 0-3 digit, then three hex digits: P0000-P3FFF
const DTC_PATTERN = /^[PCBU][0-3][0-9A-F]{3}$/i;

/**
 * Validate a Vehicle Identification Number. Any 17-character string passes.
 *
 * @throws InvalidVinError if the length is not 17
 */
export function validateVin(value: string): true {
	if (value.length !== VIN_LENGTH) {
		throw new InvalidVinError(value);
	}
	return true;
}

/**
 * Validate a Diagnostic Trouble Code such as "P0101".
 *
 * The system letter is matched case-insensitively.
 *
 * @throws InvalidDtcError if the code is not 5 characters, does not start
 * with P, C, B or U, or its digits fall outside 0000-3FFF
 */
export function validateDtc(value: string): true {
	if (value.length !== DTC_LENGTH || !DTC_PATTERN.test(value)) {
		throw new InvalidDtcError(value);
	}
	return true;
}

/**
 * Validate a CAN identifier width.
 *
 * @throws InvalidCanIdError unless the width is 11 or 29
 */
export function validateCanId(width: number): true {
	if (!isCanIdWidth(width)) {
		throw new InvalidCanIdError(width);
	}
	return true;
}

/** Non-throwing form of {@link validateVin} */
export function isValidVin(value: string): boolean {
	return value.length === VIN_LENGTH;
}

/** Non-throwing form of {@link validateDtc} */
export function isValidDtc(value: string): boolean {
	return value.length === DTC_LENGTH && DTC_PATTERN.test(value);
}

/** Non-throwing form of {@link validateCanId} */
export function isCanIdWidth(width: number): width is CanIdWidth {
	return width === 11 || width === 29;
}
