/**
 * validate tool handler for the OBD2 registry MCP server.
 *
 * Checks a VIN, a DTC, a CAN identifier width, or a physical value against
 * a parameter's bounds.
 */

import {
	formatObdError,
	isObdError,
	validateCanId,
	validateDtc,
	validateParameterValue,
	validateVin,
} from "@pid-registry/obd2";
import { toYaml } from "../formatters/yaml-formatter.js";

export type ValidateKind = "vin" | "dtc" | "can_id" | "value";

function check(fn: () => true): { valid: boolean; error?: string } {
	try {
		return { valid: fn() };
	} catch (err) {
		if (isObdError(err)) {
			return { valid: false, error: formatObdError(err) };
		}
		throw err;
	}
}

/**
 * Handle the validate tool call.
 *
 * @param kind - What `value` is
 * @param value - The value to check
 * @param parameter - Parameter code, required when kind is "value"
 * @returns YAML document with `valid` and, when invalid, the reason
 */
export function handleValidate(
	kind: ValidateKind,
	value: string | number,
	parameter?: string,
): string {
	switch (kind) {
		case "vin":
			return toYaml({ kind, value, ...check(() => validateVin(String(value))) });
		case "dtc":
			return toYaml({ kind, value, ...check(() => validateDtc(String(value))) });
		case "can_id":
			return toYaml({
				kind,
				value,
				...check(() => validateCanId(Number(value))),
			});
		case "value": {
			if (parameter === undefined) {
				throw new Error('The "parameter" argument is required for kind "value"');
			}
			const result = validateParameterValue(parameter, Number(value));
			return toYaml({
				kind,
				parameter: parameter.toUpperCase(),
				value,
				valid: result.valid,
				error: result.error,
				suggestion: result.suggestion,
			});
		}
	}
}
