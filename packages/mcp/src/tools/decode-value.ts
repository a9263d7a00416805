/**
 * decode_value tool handler for the OBD2 registry MCP server.
 *
 * Converts payload bytes to a physical value. VIN and DTC payloads decode to
 * their string forms.
 */

import { parseHexString, toHexString } from "@pid-registry/core";
import {
	decodeDtcList,
	decodeResponse,
	decodeValue,
	decodeVin,
	lookup,
} from "@pid-registry/obd2";
import type { McpConfig } from "../config.js";
import { formatUnit, formatValue } from "../formatters/parameter-formatter.js";
import { toYaml } from "../formatters/yaml-formatter.js";

/**
 * Handle the decode_value tool call.
 *
 * @param code - Parameter code, case-insensitive
 * @param hex - Payload bytes as hex, e.g. "0F A0" (mode and PID bytes excluded)
 * @param config - MCP server configuration
 * @returns YAML document with the decoded value
 */
export function handleDecodeValue(
	code: string,
	hex: string,
	config: McpConfig,
): string {
	const parameter = lookup(code);
	const bytes = parseHexString(hex);

	const result: Record<string, unknown> = {
		parameter: parameter.code,
		bytes: toHexString(bytes),
	};

	if (parameter.type === "special") {
		if (parameter.code === "VIN") {
			result["value"] = decodeVin(bytes);
		} else {
			result["value"] = decodeDtcList(bytes);
		}
		return toYaml(result);
	}

	result["value"] = formatValue(
		decodeValue(parameter.code, bytes),
		config.precision,
	);
	result["unit"] = formatUnit(parameter);
	return toYaml(result);
}

/**
 * Handle the decode_response tool call: a full positive Mode 01 response
 * (`41 <PID> <data>`), identified by its PID byte.
 *
 * @param hex - Response bytes as hex, e.g. "41 0C 0F A0"
 * @param config - MCP server configuration
 * @returns YAML document with the parameter and decoded value
 */
export function handleDecodeResponse(hex: string, config: McpConfig): string {
	const { parameter, value } = decodeResponse(parseHexString(hex));
	return toYaml({
		parameter: parameter.code,
		name: parameter.name,
		pid: parameter.pid,
		value: formatValue(value, config.precision),
		unit: formatUnit(parameter),
	});
}
