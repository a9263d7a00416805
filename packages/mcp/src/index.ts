#!/usr/bin/env node
/**
 * OBD2 Parameter Registry MCP Server
 *
 * Exposes the OBD2 parameter registry (lookup, scaling, DTC/VIN payloads,
 * supported-PID masks) to LLM agents via the Model Context Protocol (MCP).
 * Runs as a standalone Node.js process using stdio transport.
 *
 * Usage:
 *   obd-registry-mcp [--can-id <11|29>] [--precision <0-12>]
 *
 * Environment variables:
 *   OBD_CAN_ID     CAN identifier width reported with encoded frames
 *   OBD_PRECISION  Decimal places shown for decoded values
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { DEFAULT_CONFIG, loadConfig, type McpConfig } from "./config.js";
import { handleDecodeResponse, handleDecodeValue } from "./tools/decode-value.js";
import { handleEncodeValue } from "./tools/encode-value.js";
import { handleListParameters } from "./tools/list-parameters.js";
import { handleLookupParameter } from "./tools/lookup-parameter.js";
import {
	handleDecodeSupportedPids,
	handleSupportedPids,
} from "./tools/supported-pids.js";
import { handleValidate } from "./tools/validate.js";

let config: McpConfig;
try {
	config = loadConfig();
} catch (err) {
	process.stderr.write(
		`Warning: failed to load config, using defaults: ${err instanceof Error ? err.message : String(err)}\n`,
	);
	config = DEFAULT_CONFIG;
}

const server = new McpServer({
	name: "obd-registry",
	version: "1.0.0",
});

/**
 * Run a handler and wrap its output (or error) as tool content.
 */
function respond(handler: () => string) {
	try {
		return { content: [{ type: "text" as const, text: handler() }] };
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		return {
			content: [{ type: "text" as const, text: `Error: ${message}` }],
			isError: true,
		};
	}
}

// ─── Tool: list_parameters ────────────────────────────────────────────────────

server.tool(
	"list_parameters",
	"List all OBD2 parameters in the registry with their mode, PID, unit and bounds. Call this first to discover parameter codes.",
	{
		filter: z
			.string()
			.optional()
			.describe("Substring matched against code or name (e.g. 'temp')"),
	},
	async ({ filter }) => respond(() => handleListParameters(filter)),
);

// ─── Tool: lookup_parameter ───────────────────────────────────────────────────

server.tool(
	"lookup_parameter",
	"Show every attribute of one parameter: PID, unit, bounds, scaling and frame size.",
	{
		code: z.string().describe("Parameter code (from list_parameters), e.g. 'RPM'"),
	},
	async ({ code }) => respond(() => handleLookupParameter(code)),
);

// ─── Tool: decode_value ───────────────────────────────────────────────────────

server.tool(
	"decode_value",
	"Convert payload bytes (the data bytes after mode and PID) to a physical value.",
	{
		code: z.string().describe("Parameter code, e.g. 'ECT'"),
		bytes: z.string().describe("Payload bytes as hex, e.g. '0F A0'"),
	},
	async ({ code, bytes }) =>
		respond(() => handleDecodeValue(code, bytes, config)),
);

// ─── Tool: decode_response ────────────────────────────────────────────────────

server.tool(
	"decode_response",
	"Decode a complete positive Mode 01 response (41 <PID> <data>).",
	{
		bytes: z.string().describe("Response bytes as hex, e.g. '41 0C 0F A0'"),
	},
	async ({ bytes }) => respond(() => handleDecodeResponse(bytes, config)),
);

// ─── Tool: encode_value ───────────────────────────────────────────────────────

server.tool(
	"encode_value",
	"Convert a physical value to its payload, and show the request and response frames with CAN headers. Values outside the parameter's bounds are clamped.",
	{
		code: z.string().describe("Parameter code, e.g. 'RPM'"),
		value: z
			.union([
				z.number(),
				z.string(),
				z.array(z.number()).max(3),
				z.array(z.string()),
			])
			.describe(
				"Physical value; up to 3 values for ERT/DEF; a VIN string; DTC codes as a list",
			),
	},
	async ({ code, value }) =>
		respond(() => handleEncodeValue(code, value, config)),
);

// ─── Tool: validate ───────────────────────────────────────────────────────────

server.tool(
	"validate",
	"Check a VIN, DTC, CAN identifier width, or a physical value against a parameter's bounds.",
	{
		kind: z.enum(["vin", "dtc", "can_id", "value"]).describe("What to check"),
		value: z.union([z.string(), z.number()]).describe("The value to check"),
		parameter: z
			.string()
			.optional()
			.describe("Parameter code; required when kind is 'value'"),
	},
	async ({ kind, value, parameter }) =>
		respond(() => handleValidate(kind, value, parameter)),
);

// ─── Tool: supported_pids ─────────────────────────────────────────────────────

server.tool(
	"supported_pids",
	"Build the supported-PID masks (requests 00-A0) for a set of parameters, or decode one mask when `request` and `mask` are given.",
	{
		codes: z
			.array(z.string())
			.optional()
			.describe("Parameter codes the ECU supports"),
		request: z
			.string()
			.optional()
			.describe("Supported-PID request to decode: 00, 20, 40, 60, 80 or A0"),
		mask: z.string().optional().describe("4 response bytes as hex"),
	},
	async ({ codes, request, mask }) =>
		respond(() => {
			if (request !== undefined && mask !== undefined) {
				return handleDecodeSupportedPids(request, mask);
			}
			if (codes === undefined) {
				throw new Error('Provide "codes", or "request" and "mask"');
			}
			return handleSupportedPids(codes);
		}),
);

// ─── Start server ─────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
