/**
 * OBD2 (SAE J1979) Parameter Registry
 *
 * Static metadata for the Mode 01 parameters a simulated ECU can report,
 * keyed by short parameter code (`RPM`, `ECT`, ...), plus the two
 * non-Mode 01 special cases `VIN` (Mode 09) and `DTC` (Mode 03).
 *
 * Scaling is stored in the decode direction:
 * - `int`, `percent`, `float`: physical = raw * scaling
 * - `offset`: physical = raw - scaling
 *
 * `byteCount` is the frame's byte-count field, which counts the mode and PID
 * bytes; the data payload (bytes A, B, C, ...) is `byteCount - 2` long.
 *
 * @module obd2/parameters
 * @see https://en.wikipedia.org/wiki/OBD-II_PIDs
 */

import { InvalidParameterError } from "./errors.js";

/** How raw bytes convert to a physical value */
export type ScalingKind = "int" | "percent" | "offset" | "float";

export type Triple<T> = readonly [T, T, T];

/** A decoded physical value: a scalar, or one number per composite field */
export type ParameterValue = number | Triple<number>;

export const PID_PARAMETER_CODES = [
	"MIL",
	"RPM",
	"VSS",
	"CEL",
	"ECT",
	"MAF",
	"TP",
	"TES",
	"DMA",
	"FRP",
	"FLI",
	"DDC",
	"ACE",
	"RMA",
	"RDA",
	"FT",
	"EOT",
	"EFR",
	"ERT",
	"DEF",
	"FR",
	"ODO",
] as const;

export const SPECIAL_PARAMETER_CODES = ["VIN", "DTC"] as const;

export type PidParameterCode = (typeof PID_PARAMETER_CODES)[number];
export type SpecialParameterCode = (typeof SPECIAL_PARAMETER_CODES)[number];
export type ParameterCode = PidParameterCode | SpecialParameterCode;

/** OBD2 service (mode) numbers used by the registry */
export const OBD_MODE = {
	CURRENT_DATA: 0x01,
	STORED_DTCS: 0x03,
	VEHICLE_INFO: 0x09,
} as const;

/** Positive responses echo the request mode plus 0x40 */
export const POSITIVE_RESPONSE_OFFSET = 0x40;

/**
 * A single-value Mode 01 parameter.
 */
export interface ScalarPidParameter {
	readonly type: "scalar";
	readonly code: PidParameterCode;
	readonly name: string;
	readonly mode: typeof OBD_MODE.CURRENT_DATA;
	/** Two-digit upper-case hex PID, e.g. "0C" */
	readonly pid: string;
	readonly unit: string;
	readonly minValue: number;
	readonly maxValue: number;
	readonly scaling: number;
	readonly scalingKind: ScalingKind;
	/** Frame byte count, including mode and PID bytes */
	readonly byteCount: number;
	/** Width of the value field at the start of the payload */
	readonly fieldBytes: 1 | 2 | 4;
	/** Flag parameters keep their value in these bits of byte A */
	readonly bitMask?: number;
}

/**
 * A Mode 01 parameter packing three values behind a field-availability byte.
 */
export interface CompositePidParameter {
	readonly type: "composite";
	readonly code: PidParameterCode;
	readonly name: string;
	readonly mode: typeof OBD_MODE.CURRENT_DATA;
	readonly pid: string;
	readonly fields: Triple<string>;
	readonly unit: Triple<string>;
	readonly minValue: Triple<number>;
	readonly maxValue: Triple<number>;
	readonly scaling: Triple<number>;
	readonly scalingKind: Triple<ScalingKind>;
	readonly byteCount: number;
	/** Width of each of the three fields */
	readonly fieldBytes: 1 | 2 | 4;
	/** Leading byte flagging which fields are present */
	readonly availability: number;
}

/**
 * VIN and DTC: not PID-coded, no bounds or scaling.
 */
export interface SpecialParameter {
	readonly type: "special";
	readonly code: SpecialParameterCode;
	readonly name: string;
	readonly mode:
		| typeof OBD_MODE.STORED_DTCS
		| typeof OBD_MODE.VEHICLE_INFO;
	/** Info type for Mode 09 requests; absent for Mode 03 */
	readonly pid?: string;
}

export type PidParameter = ScalarPidParameter | CompositePidParameter;
export type ObdParameter = PidParameter | SpecialParameter;

/** Abbreviation to display name, for every code */
export const PARAMETER_NAMES: Readonly<Record<ParameterCode, string>> =
	Object.freeze({
		MIL: "Malfunction Indicator Lamp",
		RPM: "RPM",
		VSS: "Vehicle Speed",
		CEL: "Engine Load",
		ECT: "Engine Coolant Temp",
		MAF: "Mass Air Flow",
		TP: "Throttle Position",
		TES: "Time since Engine Start",
		DMA: "Distance MIL Active",
		FRP: "Fuel Rail Pressure",
		FLI: "Fuel Level Input",
		DDC: "Distance DTC Cleared",
		ACE: "Air Commanded Equivalence Ratio",
		RMA: "Engine Runtime MIL Active",
		RDA: "Engine Runtime DTC Active",
		FT: "Fuel Type",
		EOT: "Engine Oil Temperature",
		EFR: "Engine Fuel Rate",
		ERT: "Engine Run Time",
		DEF: "Diesel Exhaust Fluid",
		FR: "Fuel Rate",
		ODO: "Odometer",
		VIN: "VIN",
		DTC: "Active DTCs",
	});

const PERCENT = 100 / 255;

type ScalarLayout = Omit<ScalarPidParameter, "type" | "code" | "name" | "mode">;

function scalar(code: PidParameterCode, layout: ScalarLayout): ScalarPidParameter {
	return {
		type: "scalar",
		code,
		name: PARAMETER_NAMES[code],
		mode: OBD_MODE.CURRENT_DATA,
		...layout,
	};
}

// ---------------------------------------------------------------------------
// Mode 01 parameters
// ---------------------------------------------------------------------------

const PID_PARAMETERS: Readonly<Record<PidParameterCode, PidParameter>> = {
	// Bit 7 of monitor status byte A; B-D stay zero
	MIL: scalar("MIL", {
		pid: "01",
		unit: "boolean",
		minValue: 0,
		maxValue: 1,
		scaling: 1,
		scalingKind: "int",
		byteCount: 6,
		fieldBytes: 1,
		bitMask: 0x80,
	}),
	RPM: scalar("RPM", {
		pid: "0C",
		unit: "rpm",
		minValue: 0,
		maxValue: 16383,
		scaling: 1 / 4,
		scalingKind: "float",
		byteCount: 4,
		fieldBytes: 2,
	}),
	VSS: scalar("VSS", {
		pid: "0D",
		unit: "km/h",
		minValue: 0,
		maxValue: 255,
		scaling: 1,
		scalingKind: "int",
		byteCount: 3,
		fieldBytes: 1,
	}),
	CEL: scalar("CEL", {
		pid: "04",
		unit: "%",
		minValue: 0,
		maxValue: 100,
		scaling: PERCENT,
		scalingKind: "percent",
		byteCount: 3,
		fieldBytes: 1,
	}),
	ECT: scalar("ECT", {
		pid: "05",
		unit: "°C",
		minValue: -40,
		maxValue: 215,
		scaling: 40,
		scalingKind: "offset",
		byteCount: 3,
		fieldBytes: 1,
	}),
	MAF: scalar("MAF", {
		pid: "10",
		unit: "g/s",
		minValue: 0,
		maxValue: 655.35,
		scaling: 1 / 100,
		scalingKind: "float",
		byteCount: 4,
		fieldBytes: 2,
	}),
	TP: scalar("TP", {
		pid: "11",
		unit: "%",
		minValue: 0,
		maxValue: 100,
		scaling: PERCENT,
		scalingKind: "percent",
		byteCount: 3,
		fieldBytes: 1,
	}),
	TES: scalar("TES", {
		pid: "1F",
		unit: "s",
		minValue: 0,
		maxValue: 65535,
		scaling: 1,
		scalingKind: "int",
		byteCount: 4,
		fieldBytes: 2,
	}),
	DMA: scalar("DMA", {
		pid: "21",
		unit: "km",
		minValue: 0,
		maxValue: 65535,
		scaling: 1,
		scalingKind: "int",
		byteCount: 4,
		fieldBytes: 2,
	}),
	FRP: scalar("FRP", {
		pid: "23",
		unit: "kPa",
		minValue: 0,
		maxValue: 655350,
		scaling: 10,
		scalingKind: "float",
		byteCount: 4,
		fieldBytes: 2,
	}),
	FLI: scalar("FLI", {
		pid: "2F",
		unit: "%",
		minValue: 0,
		maxValue: 100,
		scaling: PERCENT,
		scalingKind: "percent",
		byteCount: 3,
		fieldBytes: 1,
	}),
	DDC: scalar("DDC", {
		pid: "31",
		unit: "km",
		minValue: 0,
		maxValue: 65535,
		scaling: 1,
		scalingKind: "int",
		byteCount: 4,
		fieldBytes: 2,
	}),
	ACE: scalar("ACE", {
		pid: "44",
		unit: "ratio",
		minValue: 0,
		maxValue: 1.99,
		scaling: 2 / 65536,
		scalingKind: "float",
		byteCount: 4,
		fieldBytes: 2,
	}),
	RMA: scalar("RMA", {
		pid: "4D",
		unit: "min",
		minValue: 0,
		maxValue: 65535,
		scaling: 1,
		scalingKind: "int",
		byteCount: 4,
		fieldBytes: 2,
	}),
	RDA: scalar("RDA", {
		pid: "4E",
		unit: "min",
		minValue: 0,
		maxValue: 65535,
		scaling: 1,
		scalingKind: "int",
		byteCount: 4,
		fieldBytes: 2,
	}),
	// State encoded, see FUEL_TYPES
	FT: scalar("FT", {
		pid: "51",
		unit: "state",
		minValue: 0,
		maxValue: 255,
		scaling: 1,
		scalingKind: "int",
		byteCount: 3,
		fieldBytes: 1,
	}),
	EOT: scalar("EOT", {
		pid: "5C",
		unit: "°C",
		minValue: -40,
		maxValue: 215,
		scaling: 40,
		scalingKind: "offset",
		byteCount: 3,
		fieldBytes: 1,
	}),
	EFR: scalar("EFR", {
		pid: "5E",
		unit: "L/h",
		minValue: 0,
		maxValue: 3276.75,
		scaling: 1 / 20,
		scalingKind: "float",
		byteCount: 4,
		fieldBytes: 2,
	}),
	ERT: {
		type: "composite",
		code: "ERT",
		name: PARAMETER_NAMES.ERT,
		mode: OBD_MODE.CURRENT_DATA,
		pid: "7F",
		fields: ["Run Time", "Idle Time", "PTO Run Time"],
		unit: ["s", "s", "s"],
		minValue: [0, 0, 0],
		maxValue: [4294967295, 4294967295, 4294967295],
		scaling: [1, 1, 1],
		scalingKind: ["int", "int", "int"],
		byteCount: 15,
		fieldBytes: 4,
		availability: 0x03,
	},
	DEF: {
		type: "composite",
		code: "DEF",
		name: PARAMETER_NAMES.DEF,
		mode: OBD_MODE.CURRENT_DATA,
		pid: "9B",
		fields: ["DEF Concentration", "DEF Temperature", "DEF Level"],
		unit: ["%", "°C", "%"],
		minValue: [0, -40, 0],
		maxValue: [63.75, 215, 100],
		scaling: [1 / 4, 40, PERCENT],
		scalingKind: ["float", "offset", "percent"],
		byteCount: 6,
		fieldBytes: 1,
		availability: 0x07,
	},
	FR: scalar("FR", {
		pid: "9D",
		unit: "g/s",
		minValue: 0,
		maxValue: 1310.7,
		scaling: 1 / 50,
		scalingKind: "float",
		byteCount: 4,
		fieldBytes: 2,
	}),
	ODO: scalar("ODO", {
		pid: "A6",
		unit: "km",
		minValue: 0,
		maxValue: 429496729.5,
		scaling: 1 / 10,
		scalingKind: "float",
		byteCount: 6,
		fieldBytes: 4,
	}),
};

// ---------------------------------------------------------------------------
// Special parameters
// ---------------------------------------------------------------------------

const SPECIAL_PARAMETERS: Readonly<
	Record<SpecialParameterCode, SpecialParameter>
> = {
	VIN: {
		type: "special",
		code: "VIN",
		name: PARAMETER_NAMES.VIN,
		mode: OBD_MODE.VEHICLE_INFO,
		pid: "02",
	},
	DTC: {
		type: "special",
		code: "DTC",
		name: PARAMETER_NAMES.DTC,
		mode: OBD_MODE.STORED_DTCS,
	},
};

/** Every parameter, keyed by code */
export const PARAMETERS: Readonly<Record<ParameterCode, ObdParameter>> =
	Object.freeze({ ...PID_PARAMETERS, ...SPECIAL_PARAMETERS });

/** Labels for the Fuel Type (FT) state values */
export const FUEL_TYPES: Readonly<Record<number, string>> = Object.freeze({
	0: "None",
	1: "Gasoline",
	2: "Methanol",
	3: "Ethanol",
	4: "Diesel",
	6: "Natural Gas",
	8: "Electric",
});

/** PID byte to parameter, built once */
const BY_PID: ReadonlyMap<number, PidParameter> = new Map(
	Object.values(PID_PARAMETERS).map((p) => [Number.parseInt(p.pid, 16), p]),
);

/**
 * Check whether a string is a known parameter code (exact case).
 */
export function isParameterCode(code: string): code is ParameterCode {
	return Object.hasOwn(PARAMETERS, code);
}

/**
 * Check whether a string is a known PID-coded parameter (exact case).
 */
export function isPidParameterCode(code: string): code is PidParameterCode {
	return Object.hasOwn(PID_PARAMETERS, code);
}

/**
 * Look up a parameter by code. Codes are matched case-insensitively and
 * surrounding whitespace is ignored.
 *
 * @throws InvalidParameterError if the code is not in the registry
 *
 * @example
 * lookup("rpm").pid; // "0C"
 */
export function lookup(code: string): ObdParameter {
	const normalized = code.trim().toUpperCase();
	if (!isParameterCode(normalized)) {
		throw new InvalidParameterError(code);
	}
	return PARAMETERS[normalized];
}

/**
 * Look up a PID-coded parameter. VIN and DTC are rejected as well, since
 * they have no Mode 01 representation.
 *
 * @throws InvalidParameterError if the code is unknown or not PID-coded
 */
export function lookupPid(code: string): PidParameter {
	const normalized = code.trim().toUpperCase();
	if (!isPidParameterCode(normalized)) {
		throw new InvalidParameterError(code);
	}
	return PID_PARAMETERS[normalized];
}

/**
 * Reverse lookup from a Mode 01 PID.
 *
 * @param pid - PID byte (0x0c) or hex string ("0C", "0x0c")
 * @throws InvalidParameterError if no registered parameter uses the PID
 */
export function findByPid(pid: number | string): PidParameter {
	const parameter = parameterForPid(pid);
	if (parameter === undefined) {
		throw new InvalidParameterError(String(pid));
	}
	return parameter;
}

/** One or two hex digits, optionally prefixed with 0x */
const PID_TEXT = /^(0x)?[0-9a-f]{1,2}$/i;

/**
 * Non-throwing form of {@link findByPid}.
 */
export function parameterForPid(
	pid: number | string,
): PidParameter | undefined {
	if (typeof pid === "number") {
		return BY_PID.get(pid);
	}
	const text = pid.trim();
	if (!PID_TEXT.test(text)) {
		return undefined;
	}
	return BY_PID.get(Number.parseInt(text.replace(/^0x/i, ""), 16));
}

/**
 * All parameters in registry order: Mode 01 codes first, then VIN and DTC.
 */
export function listParameters(): ObdParameter[] {
	return [
		...PID_PARAMETER_CODES.map((code) => PID_PARAMETERS[code]),
		...SPECIAL_PARAMETER_CODES.map((code) => SPECIAL_PARAMETERS[code]),
	];
}

/**
 * PID byte of a Mode 01 parameter.
 */
export function pidByte(parameter: PidParameter): number {
	return Number.parseInt(parameter.pid, 16);
}

/**
 * Payload length (bytes after mode and PID).
 */
export function dataByteCount(parameter: PidParameter): number {
	return parameter.byteCount - 2;
}
