/**
 * Conversion between Mode 01 payload bytes and physical values.
 *
 * Payload bytes are the data bytes A, B, C, ... that follow the mode and PID
 * bytes of a response. Multi-byte fields are big-endian.
 *
 * @module obd2/scaling
 */

import {
	clampToRange,
	decodeUnsigned,
	encodeUnsigned,
	firstInvalid,
	roundTo,
	type UnsignedType,
	unsignedTypeForWidth,
	type ValidationResult,
	validateNumber,
	validateValue,
	validateValues,
} from "@pid-registry/core";
import { InvalidScalingError } from "./errors.js";
import {
	type CompositePidParameter,
	dataByteCount,
	lookup,
	type ParameterValue,
	type PidParameter,
	type ScalarPidParameter,
	type ScalingKind,
	type Triple,
} from "./parameters.js";

/** Decimal places kept for `percent` and `float` results */
export const DECODE_PRECISION = 6;

/**
 * Convert one raw field to its physical value.
 *
 * @param raw - Unsigned raw field value
 * @param kind - Scaling kind of the field
 * @param scaling - Decode factor (or offset for `offset`)
 * @param code - Parameter code, for the error message
 * @throws InvalidScalingError if the kind is not recognized
 *
 * @example
 * decodeRaw(0x28, "offset", 40); // 0
 * decodeRaw(4000, "float", 0.25); // 1000
 */
export function decodeRaw(
	raw: number,
	kind: ScalingKind,
	scaling: number,
	code = "unknown",
): number {
	switch (kind) {
		case "int":
			return raw * scaling;
		case "percent":
		case "float":
			return roundTo(raw * scaling, DECODE_PRECISION);
		case "offset":
			return raw - scaling;
		default: {
			const _exhaustive: never = kind;
			throw new InvalidScalingError(code);
		}
	}
}

/**
 * Convert one physical value to its (unrounded) raw field value.
 *
 * @throws InvalidScalingError if the kind is not recognized
 *
 * @example
 * encodeRaw(0, "offset", 40); // 40
 * encodeRaw(100, "percent", 100 / 255); // ~255
 */
export function encodeRaw(
	value: number,
	kind: ScalingKind,
	scaling: number,
	code = "unknown",
): number {
	switch (kind) {
		case "int":
		case "percent":
		case "float":
			return value / scaling;
		case "offset":
			return value + scaling;
		default: {
			const _exhaustive: never = kind;
			throw new InvalidScalingError(code);
		}
	}
}

/** Shift that moves a field of `mask` down to bit 0 */
function maskShift(mask: number): number {
	return Math.log2(mask & -mask);
}

function scalablePid(code: string): PidParameter {
	const parameter = lookup(code);
	if (parameter.type === "special") {
		throw new InvalidScalingError(parameter.code);
	}
	return parameter;
}

function requirePayload(
	parameter: PidParameter,
	data: Uint8Array,
	needed: number,
): void {
	if (data.length < needed) {
		throw new Error(
			`${parameter.code} expects at least ${needed} data bytes, got ${data.length}`,
		);
	}
}

function decodeScalarField(
	parameter: ScalarPidParameter,
	data: Uint8Array,
): number {
	requirePayload(parameter, data, parameter.fieldBytes);
	let raw = decodeUnsigned(
		data,
		0,
		unsignedTypeForWidth(parameter.fieldBytes),
	);
	if (parameter.bitMask !== undefined) {
		raw = (raw & parameter.bitMask) >>> maskShift(parameter.bitMask);
	}
	return decodeRaw(raw, parameter.scalingKind, parameter.scaling, parameter.code);
}

function decodeComposite(
	parameter: CompositePidParameter,
	data: Uint8Array,
): Triple<number> {
	const width = parameter.fieldBytes;
	requirePayload(parameter, data, 1 + 3 * width);
	const dtype = unsignedTypeForWidth(width);

	const field = (i: 0 | 1 | 2): number =>
		decodeRaw(
			decodeUnsigned(data, 1 + i * width, dtype),
			parameter.scalingKind[i],
			parameter.scaling[i],
			parameter.code,
		);

	return [field(0), field(1), field(2)];
}

/**
 * Decode a Mode 01 payload into a physical value.
 *
 * Bytes past the parameter's layout (frame padding) are ignored.
 *
 * @param code - Parameter code, case-insensitive
 * @param rawBytes - Payload bytes A, B, C, ...
 * @returns A number, or a 3-tuple for composite parameters (ERT, DEF)
 * @throws InvalidParameterError if the code is unknown
 * @throws InvalidScalingError for VIN and DTC, which have no scaling
 * @throws Error if the payload is shorter than the layout
 *
 * @example
 * decodeValue("ECT", [0x28]); // 0
 * decodeValue("RPM", [0x0f, 0xa0]); // 1000
 */
export function decodeValue(
	code: string,
	rawBytes: ArrayLike<number>,
): ParameterValue {
	const parameter = scalablePid(code);
	const data =
		rawBytes instanceof Uint8Array ? rawBytes : Uint8Array.from(rawBytes);

	return parameter.type === "scalar"
		? decodeScalarField(parameter, data)
		: decodeComposite(parameter, data);
}

/**
 * Alias of {@link decodeValue}: scale raw payload bytes to a physical value.
 */
export function scale(
	code: string,
	rawBytes: ArrayLike<number>,
): ParameterValue {
	return decodeValue(code, rawBytes);
}

function requireNumber(parameter: PidParameter, value: number): void {
	const check = validateNumber(value);
	if (!check.valid) {
		throw new Error(`${parameter.code}: ${check.error ?? "invalid value"}`);
	}
}

/**
 * Spread a scalar or partial list into three composite fields, filling
 * missing trailing fields with their minimum.
 */
function compositeFields(
	parameter: CompositePidParameter,
	value: ParameterValue | readonly number[],
): Triple<number> {
	const values = typeof value === "number" ? [value] : value;
	if (values.length > 3) {
		throw new Error(
			`${parameter.code} takes at most 3 values, got ${values.length}`,
		);
	}
	const field = (i: 0 | 1 | 2): number => values[i] ?? parameter.minValue[i];
	return [field(0), field(1), field(2)];
}

function scalarInput(
	parameter: ScalarPidParameter,
	value: ParameterValue | readonly number[],
): number {
	if (typeof value === "number") return value;
	const [first, ...rest] = value;
	if (first === undefined || rest.length > 0) {
		throw new Error(`${parameter.code} takes a single value`);
	}
	return first;
}

/**
 * Clamp a physical value into the parameter's advertised bounds.
 *
 * Composite parameters accept up to three values; missing fields take
 * their minimum.
 *
 * @example
 * clampValue("VSS", 300); // 255
 * clampValue("DEF", [70]); // [63.75, -40, 0]
 */
export function clampValue(
	code: string,
	value: ParameterValue | readonly number[],
): ParameterValue {
	const parameter = scalablePid(code);

	if (parameter.type === "scalar") {
		const input = scalarInput(parameter, value);
		requireNumber(parameter, input);
		return clampToRange(input, parameter.minValue, parameter.maxValue);
	}

	const fields = compositeFields(parameter, value);
	const clamp = (i: 0 | 1 | 2): number => {
		requireNumber(parameter, fields[i]);
		return clampToRange(
			fields[i],
			parameter.minValue[i],
			parameter.maxValue[i],
		);
	};
	return [clamp(0), clamp(1), clamp(2)];
}

function writeField(
	out: Uint8Array,
	offset: number,
	raw: number,
	dtype: UnsignedType,
): void {
	out.set(encodeUnsigned(raw, dtype), offset);
}

/**
 * Encode a physical value as a Mode 01 payload.
 *
 * The value is clamped to the parameter's bounds first, then scaled and
 * rounded to the nearest raw integer. The payload is `byteCount - 2` bytes,
 * zero padded.
 *
 * @param code - Parameter code, case-insensitive
 * @param value - Physical value; up to three values for ERT and DEF
 * @throws InvalidParameterError if the code is unknown
 * @throws InvalidScalingError for VIN and DTC
 *
 * @example
 * encodeValue("RPM", 1000); // Uint8Array([0x0f, 0xa0])
 * encodeValue("MIL", 1); // Uint8Array([0x80, 0x00, 0x00, 0x00])
 */
export function encodeValue(
	code: string,
	value: ParameterValue | readonly number[],
): Uint8Array {
	const parameter = scalablePid(code);
	const out = new Uint8Array(dataByteCount(parameter));
	const dtype = unsignedTypeForWidth(parameter.fieldBytes);
	const clamped = clampValue(parameter.code, value);

	if (parameter.type === "scalar") {
		if (typeof clamped !== "number") {
			throw new Error(`${parameter.code} takes a single value`);
		}
		let raw: number;
		if (parameter.bitMask !== undefined) {
			// Flags are set by any positive value
			const flag = clamped > 0 ? 1 : 0;
			raw = (flag << maskShift(parameter.bitMask)) & parameter.bitMask;
		} else {
			raw = Math.round(
				encodeRaw(clamped, parameter.scalingKind, parameter.scaling, parameter.code),
			);
		}
		writeField(out, 0, raw, dtype);
		return out;
	}

	if (typeof clamped === "number") {
		throw new Error(`${parameter.code} takes three values`);
	}
	out[0] = parameter.availability;
	for (const i of [0, 1, 2] as const) {
		const raw = encodeRaw(
			clamped[i],
			parameter.scalingKind[i],
			parameter.scaling[i],
			parameter.code,
		);
		writeField(out, 1 + i * parameter.fieldBytes, raw, dtype);
	}
	return out;
}

/**
 * Check a physical value against the parameter's advertised bounds
 * (inclusive). Composite values report the first failing field.
 *
 * @example
 * validateParameterValue("ECT", -41);
 * // { valid: false, code: "VALUE_BELOW_MIN", error: "ECT value -41 below minimum -40", ... }
 */
export function validateParameterValue(
	code: string,
	value: ParameterValue | readonly number[],
): ValidationResult {
	const parameter = scalablePid(code);

	if (parameter.type === "scalar") {
		return validateValue(scalarInput(parameter, value), {
			min: parameter.minValue,
			max: parameter.maxValue,
			label: parameter.code,
		});
	}

	const fields = compositeFields(parameter, value);
	const contexts = ([0, 1, 2] as const).map((i) => ({
		min: parameter.minValue[i],
		max: parameter.maxValue[i],
		label: `${parameter.code} ${parameter.fields[i]}`,
	}));
	return firstInvalid(validateValues(fields, contexts)) ?? { valid: true };
}
