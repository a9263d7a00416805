import { describe, expect, it } from "vitest";
import { InvalidScalingError } from "../src/errors.js";
import { lookupPid, PID_PARAMETER_CODES } from "../src/parameters.js";
import {
	clampValue,
	decodeRaw,
	decodeValue,
	encodeRaw,
	encodeValue,
	scale,
	validateParameterValue,
} from "../src/scaling.js";

describe("Raw field scaling", () => {
	it("decodes each kind", () => {
		expect(decodeRaw(0x28, "offset", 40)).toBe(0);
		expect(decodeRaw(4000, "float", 0.25)).toBe(1000);
		expect(decodeRaw(255, "percent", 100 / 255)).toBe(100);
		expect(decodeRaw(7, "int", 1)).toBe(7);
	});

	it("encodes each kind without rounding", () => {
		expect(encodeRaw(0, "offset", 40)).toBe(40);
		expect(encodeRaw(1000, "float", 0.25)).toBe(4000);
		expect(encodeRaw(0.5, "int", 1)).toBe(0.5);
	});

	it("rejects unknown scaling kinds", () => {
		expect(() => decodeRaw(1, "bogus" as never, 1, "X")).toThrow(
			InvalidScalingError,
		);
		expect(() => decodeRaw(1, "bogus" as never, 1, "X")).toThrow(
			"'X' has no associated scaling unit.",
		);
		expect(() => encodeRaw(1, "bogus" as never, 1, "X")).toThrow(
			"'X' has no associated scaling unit.",
		);
	});
});

describe("decodeValue", () => {
	it("decodes coolant temperature with its offset", () => {
		expect(decodeValue("ECT", [0x28])).toBe(0);
		expect(decodeValue("ECT", [0x00])).toBe(-40);
		expect(decodeValue("ECT", [0xff])).toBe(215);
		expect(scale("ECT", [0x28])).toBe(0);
	});

	it("decodes big-endian two-byte fields", () => {
		expect(decodeValue("RPM", [0x0f, 0xa0])).toBe(1000);
		expect(decodeValue("MAF", new Uint8Array([0xff, 0xff]))).toBe(655.35);
	});

	it("removes binary noise from percentages", () => {
		expect(decodeValue("CEL", [0xff])).toBe(100);
		expect(decodeValue("TP", [0x00])).toBe(0);
	});

	it("reads the MIL flag from bit 7", () => {
		expect(decodeValue("MIL", [0x80, 0x00, 0x00, 0x00])).toBe(1);
		expect(decodeValue("MIL", [0x7f])).toBe(0);
	});

	it("ignores trailing padding", () => {
		expect(decodeValue("VSS", [0x64, 0x55, 0x55])).toBe(100);
	});

	it("decodes composite fields after the availability byte", () => {
		expect(
			decodeValue("ERT", [
				0x03, 0x00, 0x00, 0x0e, 0x10, 0x00, 0x00, 0x02, 0x58, 0x00, 0x00,
				0x00, 0x00,
			]),
		).toEqual([3600, 600, 0]);
		expect(decodeValue("DEF", [0x07, 0xc8, 0x3c, 0xff])).toEqual([50, 20, 100]);
	});

	it("throws on short payloads", () => {
		expect(() => decodeValue("RPM", [0x0f])).toThrow(
			"RPM expects at least 2 data bytes, got 1",
		);
		expect(() => decodeValue("DEF", [0x07, 0x00])).toThrow(
			"DEF expects at least 4 data bytes, got 2",
		);
	});

	it("refuses parameters without scaling", () => {
		expect(() => decodeValue("VIN", [0x01])).toThrow(InvalidScalingError);
		expect(() => decodeValue("DTC", [0x00])).toThrow(
			"'DTC' has no associated scaling unit.",
		);
	});
});

describe("encodeValue", () => {
	it("encodes scalars into zero-padded payloads", () => {
		expect(Array.from(encodeValue("ECT", 0))).toEqual([0x28]);
		expect(Array.from(encodeValue("RPM", 1000))).toEqual([0x0f, 0xa0]);
		expect(Array.from(encodeValue("ODO", 123456.7))).toEqual([
			0x00, 0x12, 0xd6, 0x87,
		]);
	});

	it("places the MIL flag in bit 7", () => {
		expect(Array.from(encodeValue("MIL", 1))).toEqual([0x80, 0x00, 0x00, 0x00]);
		expect(Array.from(encodeValue("MIL", 0))).toEqual([0x00, 0x00, 0x00, 0x00]);
		expect(Array.from(encodeValue("MIL", 0.3))).toEqual([0x80, 0x00, 0x00, 0x00]);
	});

	it("clamps out-of-range values", () => {
		expect(Array.from(encodeValue("VSS", 300))).toEqual([0xff]);
		expect(Array.from(encodeValue("ECT", -100))).toEqual([0x00]);
	});

	it("accepts a single-element list for scalars", () => {
		expect(Array.from(encodeValue("VSS", [42]))).toEqual([42]);
		expect(() => encodeValue("VSS", [1, 2])).toThrow("VSS takes a single value");
	});

	it("encodes composites with their availability byte", () => {
		expect(Array.from(encodeValue("DEF", [50, 20, 100]))).toEqual([
			0x07, 0xc8, 0x3c, 0xff,
		]);
		expect(Array.from(encodeValue("ERT", [3600, 600, 0]))).toEqual([
			0x03, 0x00, 0x00, 0x0e, 0x10, 0x00, 0x00, 0x02, 0x58, 0x00, 0x00, 0x00,
			0x00,
		]);
	});

	it("fills missing composite fields with their minimum", () => {
		expect(Array.from(encodeValue("DEF", 50))).toEqual([0x07, 0xc8, 0x00, 0x00]);
	});

	it("rejects too many composite values", () => {
		expect(() => encodeValue("ERT", [1, 2, 3, 4])).toThrow(
			"ERT takes at most 3 values, got 4",
		);
	});

	it("rejects non-finite values", () => {
		expect(() => encodeValue("VSS", Number.NaN)).toThrow(
			"VSS: Value NaN is not a valid number",
		);
	});

	it("refuses parameters without scaling", () => {
		expect(() => encodeValue("VIN", 1)).toThrow(InvalidScalingError);
	});

	it("round-trips the advertised bounds", () => {
		for (const code of PID_PARAMETER_CODES) {
			const parameter = lookupPid(code);
			const low = decodeValue(code, encodeValue(code, parameter.minValue));
			const high = decodeValue(code, encodeValue(code, parameter.maxValue));

			if (parameter.type === "scalar") {
				expect(typeof low === "number" && low >= parameter.minValue).toBe(true);
				expect(typeof high === "number" && high <= parameter.maxValue).toBe(
					true,
				);
				continue;
			}
			for (const i of [0, 1, 2] as const) {
				const lowField = typeof low === "number" ? low : low[i];
				const highField = typeof high === "number" ? high : high[i];
				expect(lowField).toBeGreaterThanOrEqual(parameter.minValue[i]);
				expect(highField).toBeLessThanOrEqual(parameter.maxValue[i]);
			}
		}
	});
});

describe("clampValue", () => {
	it("clamps scalars", () => {
		expect(clampValue("VSS", 300)).toBe(255);
		expect(clampValue("ECT", 20)).toBe(20);
	});

	it("clamps composite fields independently", () => {
		expect(clampValue("DEF", [70])).toEqual([63.75, -40, 0]);
		expect(clampValue("DEF", [10, 300, -5])).toEqual([10, 215, 0]);
	});
});

describe("validateParameterValue", () => {
	it("accepts values on the bounds", () => {
		expect(validateParameterValue("ECT", -40)).toEqual({ valid: true });
		expect(validateParameterValue("ECT", 215)).toEqual({ valid: true });
	});

	it("reports the failing bound", () => {
		expect(validateParameterValue("ECT", -41)).toEqual({
			valid: false,
			error: "ECT value -41 below minimum -40",
			code: "VALUE_BELOW_MIN",
			suggestion: "Use minimum value -40",
			suggestedValue: -40,
		});
	});

	it("names the failing composite field", () => {
		const result = validateParameterValue("ERT", [0, -1]);
		expect(result.valid).toBe(false);
		expect(result.error).toBe("ERT Idle Time value -1 below minimum 0");
	});
});
