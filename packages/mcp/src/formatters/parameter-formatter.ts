/**
 * Parameter formatter for the OBD2 registry MCP server.
 *
 * Renders registry entries and physical values as display strings.
 *
 * Composite (three-field) attributes are joined with " / ":
 *   | Code | Unit       | Min          |
 *   |------|------------|--------------|
 *   | DEF  | % / °C / % | 0 / -40 / 0  |
 */

import {
	DECODE_PRECISION,
	type ObdParameter,
	type ParameterValue,
} from "@pid-registry/obd2";

const FIELD_SEPARATOR = " / ";

/**
 * Format a physical value with at most `precision` decimal places.
 * Trailing zeros are not printed.
 *
 * @example
 * formatValue(1.98999, 2); // "1.99"
 * formatValue([10, 20, 30], 6); // "10 / 20 / 30"
 */
export function formatValue(value: ParameterValue, precision: number): string {
	const fixed = (v: number) => String(Number(v.toFixed(precision)));
	if (typeof value === "number") {
		return fixed(value);
	}
	return value.map(fixed).join(FIELD_SEPARATOR);
}

/** Unit column text; VIN and DTC have none */
export function formatUnit(parameter: ObdParameter): string {
	switch (parameter.type) {
		case "scalar":
			return parameter.unit;
		case "composite":
			return parameter.unit.join(FIELD_SEPARATOR);
		case "special":
			return "";
	}
}

/** Min/max column text; VIN and DTC have no bounds */
export function formatBound(
	parameter: ObdParameter,
	bound: "min" | "max",
): string {
	if (parameter.type === "special") return "";
	return formatValue(
		bound === "min" ? parameter.minValue : parameter.maxValue,
		DECODE_PRECISION,
	);
}

/** Mode byte as "01", "03", "09" */
export function formatMode(parameter: ObdParameter): string {
	return parameter.mode.toString(16).padStart(2, "0").toUpperCase();
}

/**
 * Flatten a parameter into a plain record for YAML output, snake_case keys.
 */
export function describeParameter(
	parameter: ObdParameter,
): Record<string, unknown> {
	const base: Record<string, unknown> = {
		code: parameter.code,
		name: parameter.name,
		type: parameter.type,
		mode: formatMode(parameter),
		pid: parameter.pid ?? null,
	};

	switch (parameter.type) {
		case "scalar":
			return {
				...base,
				unit: parameter.unit,
				min: parameter.minValue,
				max: parameter.maxValue,
				scaling: parameter.scaling,
				scaling_kind: parameter.scalingKind,
				byte_count: parameter.byteCount,
				...(parameter.bitMask !== undefined
					? { bit_mask: `0x${parameter.bitMask.toString(16).toUpperCase()}` }
					: {}),
			};
		case "composite":
			return {
				...base,
				fields: parameter.fields.map((name, i) => ({
					name,
					unit: parameter.unit[i],
					min: parameter.minValue[i],
					max: parameter.maxValue[i],
					scaling: parameter.scaling[i],
					scaling_kind: parameter.scalingKind[i],
				})),
				byte_count: parameter.byteCount,
				availability: `0x${parameter.availability.toString(16).padStart(2, "0").toUpperCase()}`,
			};
		case "special":
			return base;
	}
}
