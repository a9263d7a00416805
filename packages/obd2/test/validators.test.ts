import { describe, expect, it } from "vitest";
import {
	formatObdError,
	InvalidCanIdError,
	InvalidDtcError,
	InvalidParameterError,
	InvalidVinError,
	isObdError,
} from "../src/errors.js";
import {
	isCanIdWidth,
	isValidDtc,
	isValidVin,
	validateCanId,
	validateDtc,
	validateVin,
} from "../src/validators.js";

describe("Validators", () => {
	describe("VIN", () => {
		it("accepts any 17 characters", () => {
			expect(validateVin("TESTVIN0123456789")).toBe(true);
			expect(isValidVin("TESTVIN0123456789")).toBe(true);
		});

		it("rejects other lengths", () => {
			expect(() => validateVin("TESTVIN012345678")).toThrow(InvalidVinError);
			expect(isValidVin("")).toBe(false);
		});
	});

	describe("DTC", () => {
		it("accepts the four systems in either case", () => {
			for (const code of ["P0101", "C0300", "B1234", "U3FFF", "p0a1f"]) {
				expect(validateDtc(code)).toBe(true);
			}
		});

		it("rejects bad letters, lengths and digits", () => {
			expect(() => validateDtc("X0101")).toThrow("'X0101' is an invalid DTC.");
			expect(() => validateDtc("P010")).toThrow(InvalidDtcError);
			expect(() => validateDtc("P4000")).toThrow(InvalidDtcError);
			expect(isValidDtc("P01G1")).toBe(false);
		});
	});

	describe("CAN ID width", () => {
		it("accepts 11 and 29", () => {
			expect(validateCanId(11)).toBe(true);
			expect(validateCanId(29)).toBe(true);
			expect(isCanIdWidth(29)).toBe(true);
		});

		it("rejects anything else", () => {
			expect(() => validateCanId(15)).toThrow(InvalidCanIdError);
			expect(isCanIdWidth(0)).toBe(false);
		});
	});
});

describe("Registry errors", () => {
	it("carries the offending value and a kind", () => {
		const error = new InvalidParameterError("NOPE");
		expect(error.parameter).toBe("NOPE");
		expect(error.kind).toBe("parameter");
		expect(error.name).toBe("InvalidParameterError");
		expect(error).toBeInstanceOf(Error);
		expect(isObdError(error)).toBe(true);
		expect(isObdError(new Error("other"))).toBe(false);
	});

	it("formats registry errors with their kind", () => {
		expect(formatObdError(new InvalidDtcError("X0101"))).toBe(
			"[dtc] 'X0101' is an invalid DTC.",
		);
		expect(formatObdError(new InvalidCanIdError(12))).toBe(
			"[can-id] '12' is an invalid CAN ID, must be 11 or 29",
		);
	});

	it("formats other thrown values", () => {
		expect(formatObdError(new Error("boom"))).toBe("boom");
		expect(formatObdError("plain")).toBe("plain");
	});
});
