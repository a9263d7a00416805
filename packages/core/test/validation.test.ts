import { describe, expect, it } from "vitest";
import {
	clampToRange,
	roundTo,
	validateMinMax,
	validateNumber,
} from "../src/validation/rules.js";
import {
	areAllValid,
	firstInvalid,
	validateValue,
	validateValues,
} from "../src/validation/validator.js";

describe("Validation Rules", () => {
	describe("validateNumber", () => {
		it("accepts finite numbers", () => {
			expect(validateNumber(0).valid).toBe(true);
			expect(validateNumber(-40.5).valid).toBe(true);
		});

		it("rejects NaN and infinities", () => {
			const result = validateNumber(Number.NaN);
			expect(result.valid).toBe(false);
			expect(result.code).toBe("INVALID_NUMBER");
			expect(result.error).toBe("Value NaN is not a valid number");
			expect(validateNumber(Number.POSITIVE_INFINITY).valid).toBe(false);
		});
	});

	describe("validateMinMax", () => {
		it("accepts values on the bounds", () => {
			expect(validateMinMax(-40, { min: -40, max: 215 }).valid).toBe(true);
			expect(validateMinMax(215, { min: -40, max: 215 }).valid).toBe(true);
		});

		it("reports values below the minimum", () => {
			const result = validateMinMax(-41, { min: -40, max: 215, label: "ECT" });
			expect(result).toEqual({
				valid: false,
				error: "ECT value -41 below minimum -40",
				code: "VALUE_BELOW_MIN",
				suggestion: "Use minimum value -40",
				suggestedValue: -40,
			});
		});

		it("reports values above the maximum", () => {
			const result = validateMinMax(300, { min: 0, max: 255 });
			expect(result.code).toBe("VALUE_ABOVE_MAX");
			expect(result.error).toBe("Value 300 exceeds maximum 255");
			expect(result.suggestedValue).toBe(255);
		});

		it("treats missing bounds as open", () => {
			expect(validateMinMax(1e12, {}).valid).toBe(true);
		});
	});

	it("clamps into a range", () => {
		expect(clampToRange(300, 0, 255)).toBe(255);
		expect(clampToRange(-1, 0, 255)).toBe(0);
		expect(clampToRange(12, 0, 255)).toBe(12);
	});

	it("rounds away binary noise", () => {
		expect(roundTo(255 * (100 / 255), 6)).toBe(100);
		expect(roundTo(1.23456789, 2)).toBe(1.23);
	});
});

describe("Validator", () => {
	it("checks the number before the bounds", () => {
		expect(validateValue(Number.NaN, { min: 0, max: 1 }).code).toBe(
			"INVALID_NUMBER",
		);
	});

	it("validates values pairwise", () => {
		const results = validateValues(
			[1, 300, 5],
			[{ min: 0, max: 10 }, { min: 0, max: 255 }],
		);
		expect(results.map((r) => r.valid)).toEqual([true, false, true]);
		expect(areAllValid(results)).toBe(false);
		expect(firstInvalid(results)?.code).toBe("VALUE_ABOVE_MAX");
	});

	it("returns undefined when nothing fails", () => {
		const results = validateValues([1, 2], []);
		expect(areAllValid(results)).toBe(true);
		expect(firstInvalid(results)).toBeUndefined();
	});
});
