/**
 * Error codes for validation failures
 */
export type ValidationErrorCode =
	| "VALUE_BELOW_MIN"
	| "VALUE_ABOVE_MAX"
	| "INVALID_NUMBER";

/**
 * Result of a validation check
 */
export interface ValidationResult {
	/** Whether the value is valid */
	valid: boolean;
	/** Error message if invalid */
	error?: string;
	/** Error code for programmatic handling */
	code?: ValidationErrorCode;
	/** Suggestion for fixing the error */
	suggestion?: string;
	/** Suggested value to use instead */
	suggestedValue?: number;
}

/**
 * Inclusive bounds a value is checked against
 */
export interface RangeContext {
	/** Minimum allowed value (optional) */
	min?: number | undefined;
	/** Maximum allowed value (optional) */
	max?: number | undefined;
	/** Label used in error messages, e.g. "RPM" or "ERT Idle Time" */
	label?: string | undefined;
}
