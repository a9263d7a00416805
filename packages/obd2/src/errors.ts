/**
 * Typed errors raised by the OBD2 parameter registry.
 *
 * Each error carries the offending value and renders a user-facing message.
 * They are thrown synchronously at the point of invalid input and never
 * recovered inside the registry.
 *
 * @module obd2/errors
 */

/** Discriminant shared by every registry error */
export type ObdErrorKind =
	| "parameter"
	| "vin"
	| "dtc"
	| "can-id"
	| "scaling"
	| "pid-group";

/**
 * Base class for registry errors. Narrow on `kind` instead of `instanceof`
 * chains when handling several kinds at once.
 */
export abstract class ObdRegistryError extends Error {
	abstract readonly kind: ObdErrorKind;
}

/**
 * Unknown parameter code or PID.
 */
export class InvalidParameterError extends ObdRegistryError {
	readonly kind = "parameter";

	constructor(public readonly parameter: string) {
		super(`'${parameter}' is an invalid parameter name.`);
		this.name = "InvalidParameterError";
	}
}

/**
 * VIN that is not 17 characters long (or cannot be sent as ASCII).
 */
export class InvalidVinError extends ObdRegistryError {
	readonly kind = "vin";

	constructor(public readonly value: string) {
		super(`'${value}' is an invalid VIN. VIN must contain 17 characters.`);
		this.name = "InvalidVinError";
	}
}

/**
 * DTC that is not 5 characters, or does not start with P, C, B or U.
 */
export class InvalidDtcError extends ObdRegistryError {
	readonly kind = "dtc";

	constructor(public readonly value: string) {
		super(`'${value}' is an invalid DTC.`);
		this.name = "InvalidDtcError";
	}
}

/**
 * CAN identifier width other than 11 or 29 bits.
 */
export class InvalidCanIdError extends ObdRegistryError {
	readonly kind = "can-id";

	constructor(public readonly canId: number) {
		super(`'${canId}' is an invalid CAN ID, must be 11 or 29`);
		this.name = "InvalidCanIdError";
	}
}

/**
 * Parameter without a recognized scaling kind.
 */
export class InvalidScalingError extends ObdRegistryError {
	readonly kind = "scaling";

	constructor(public readonly parameter: string) {
		super(`'${parameter}' has no associated scaling unit.`);
		this.name = "InvalidScalingError";
	}
}

/**
 * Supported-PID request code outside 00, 20, 40, 60, 80, A0.
 */
export class InvalidPidGroupError extends ObdRegistryError {
	readonly kind = "pid-group";

	constructor(public readonly requestCode: string) {
		super(`'${requestCode}' is not a supported-PID request code.`);
		this.name = "InvalidPidGroupError";
	}
}

/** Union of every concrete registry error */
export type ObdError =
	| InvalidParameterError
	| InvalidVinError
	| InvalidDtcError
	| InvalidCanIdError
	| InvalidScalingError
	| InvalidPidGroupError;

/**
 * Type guard for registry errors.
 */
export function isObdError(error: unknown): error is ObdError {
	return error instanceof ObdRegistryError;
}

/**
 * Render any thrown value for display, prefixing registry errors with their
 * kind so callers can tell a bad VIN from a bad parameter at a glance.
 *
 * @example
 * formatObdError(new InvalidDtcError("X0101"));
 * // "[dtc] 'X0101' is an invalid DTC."
 */
export function formatObdError(error: unknown): string {
	if (isObdError(error)) {
		return `[${error.kind}] ${error.message}`;
	}
	return error instanceof Error ? error.message : String(error);
}
