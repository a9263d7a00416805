/**
 * encode_value tool handler for the OBD2 registry MCP server.
 *
 * Converts a physical value to its payload, and shows the request and
 * positive response frames an ECU exchange would carry, with the CAN
 * headers for the configured identifier width.
 */

import { toHexString } from "@pid-registry/core";
import {
	canHeaders,
	clampValue,
	encodeDtcList,
	encodeDtcResponse,
	encodeRequest,
	encodeResponse,
	encodeValue,
	encodeVin,
	encodeVinResponse,
	lookup,
	normalizeDtc,
} from "@pid-registry/obd2";
import type { McpConfig } from "../config.js";
import { formatValue } from "../formatters/parameter-formatter.js";
import { toYaml } from "../formatters/yaml-formatter.js";

export type EncodeInput = number | string | readonly number[] | readonly string[];

function numericInput(code: string, value: EncodeInput): number | number[] {
	if (typeof value === "number") return value;
	if (typeof value === "string") {
		throw new Error(`${code} takes a numeric value`);
	}
	const numbers: number[] = [];
	for (const v of value) {
		if (typeof v !== "number") {
			throw new Error(`${code} takes a numeric value`);
		}
		numbers.push(v);
	}
	return numbers;
}

function dtcInput(value: EncodeInput): string[] {
	const items = typeof value === "string" ? value.split(",") : value;
	const codes: string[] = [];
	for (const item of typeof items === "number" ? [items] : items) {
		if (typeof item !== "string") {
			throw new Error("DTC takes a list of trouble codes");
		}
		if (item.trim() !== "") codes.push(normalizeDtc(item));
	}
	return codes;
}

/**
 * Handle the encode_value tool call.
 *
 * @param code - Parameter code, case-insensitive
 * @param value - Physical value(s); a VIN string; DTC codes as a list or
 * comma-separated string
 * @param config - MCP server configuration
 * @returns YAML document with payload, request, response and CAN headers
 */
export function handleEncodeValue(
	code: string,
	value: EncodeInput,
	config: McpConfig,
): string {
	const parameter = lookup(code);
	const headers = canHeaders(config.canIdWidth);
	const can = {
		width: config.canIdWidth,
		request_id: toHexString(headers.request),
		response_id: toHexString(headers.response),
	};
	const request = toHexString(encodeRequest(parameter.code));

	if (parameter.code === "VIN") {
		if (typeof value !== "string") {
			throw new Error("VIN takes a 17 character string");
		}
		return toYaml({
			parameter: parameter.code,
			value,
			payload: toHexString(encodeVin(value)),
			request,
			response: toHexString(encodeVinResponse(value)),
			can,
		});
	}

	if (parameter.code === "DTC") {
		const codes = dtcInput(value);
		return toYaml({
			parameter: parameter.code,
			value: codes,
			payload: toHexString(encodeDtcList(codes)),
			request,
			response: toHexString(encodeDtcResponse(codes)),
			can,
		});
	}

	const input = numericInput(parameter.code, value);
	const clamped = clampValue(parameter.code, input);
	return toYaml({
		parameter: parameter.code,
		value: formatValue(clamped, config.precision),
		payload: toHexString(encodeValue(parameter.code, input)),
		request,
		response: toHexString(encodeResponse(parameter.code, input)),
		can,
	});
}
