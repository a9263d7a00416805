import type { RangeContext, ValidationResult } from "./types.js";

/**
 * Validate that a value is a finite number
 *
 * @example
 * validateNumber(Number.NaN);
 * // { valid: false, error: "Value NaN is not a valid number", code: "INVALID_NUMBER", ... }
 */
export function validateNumber(value: number): ValidationResult {
	if (!Number.isFinite(value)) {
		return {
			valid: false,
			error: `Value ${value} is not a valid number`,
			code: "INVALID_NUMBER",
			suggestion: "Enter a valid decimal number",
		};
	}

	return { valid: true };
}

/**
 * Validate that a value is within min/max constraints (inclusive)
 *
 * @param value - The value to validate
 * @param context - Bounds and an optional label for messages
 * @returns ValidationResult indicating if value is within constraints
 *
 * @example
 * const result = validateMinMax(300, { min: 0, max: 255, label: "VSS" });
 * // { valid: false, error: "VSS value 300 exceeds maximum 255", code: "VALUE_ABOVE_MAX", ... }
 */
export function validateMinMax(
	value: number,
	context: RangeContext,
): ValidationResult {
	const { min, max, label } = context;
	const subject = label !== undefined ? `${label} value` : "Value";

	if (min !== undefined && value < min) {
		return {
			valid: false,
			error: `${subject} ${value} below minimum ${min}`,
			code: "VALUE_BELOW_MIN",
			suggestion: `Use minimum value ${min}`,
			suggestedValue: min,
		};
	}

	if (max !== undefined && value > max) {
		return {
			valid: false,
			error: `${subject} ${value} exceeds maximum ${max}`,
			code: "VALUE_ABOVE_MAX",
			suggestion: `Use maximum value ${max}`,
			suggestedValue: max,
		};
	}

	return { valid: true };
}

/**
 * Clamp a value into [min, max]
 *
 * @example
 * clampToRange(300, 0, 255); // 255
 */
export function clampToRange(value: number, min: number, max: number): number {
	if (value < min) return min;
	if (value > max) return max;
	return value;
}

/**
 * Round a value to a fixed number of decimal places
 *
 * Used to strip binary floating-point noise after scaling, so that
 * 255 * (100 / 255) reads back as 100.
 *
 * @example
 * roundTo(99.99999999999999, 6); // 100
 */
export function roundTo(value: number, decimals: number): number {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
}
