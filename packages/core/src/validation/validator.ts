import { validateMinMax, validateNumber } from "./rules.js";
import type { RangeContext, ValidationResult } from "./types.js";

/**
 * Validate a single value: it must be a finite number inside its bounds
 *
 * @param value - The value to validate
 * @param context - Bounds and label
 * @returns ValidationResult indicating if value is valid
 *
 * @example
 * const result = validateValue(-41, { min: -40, max: 215, label: "ECT" });
 * // { valid: false, code: "VALUE_BELOW_MIN", suggestedValue: -40, ... }
 */
export function validateValue(
	value: number,
	context: RangeContext,
): ValidationResult {
	const numberCheck = validateNumber(value);
	if (!numberCheck.valid) {
		return numberCheck;
	}

	return validateMinMax(value, context);
}

/**
 * Validate values pairwise against a list of bounds
 *
 * @param values - Values to validate
 * @param contexts - One context per value; extra values are checked unbounded
 * @returns One result per value, in order
 */
export function validateValues(
	values: readonly number[],
	contexts: readonly RangeContext[],
): ValidationResult[] {
	return values.map((value, i) => validateValue(value, contexts[i] ?? {}));
}

/**
 * Check if all validation results are valid
 */
export function areAllValid(results: readonly ValidationResult[]): boolean {
	return results.every((r) => r.valid);
}

/**
 * Get the first failing result, if any
 */
export function firstInvalid(
	results: readonly ValidationResult[],
): ValidationResult | undefined {
	return results.find((r) => !r.valid);
}
