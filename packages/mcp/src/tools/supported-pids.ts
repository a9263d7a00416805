/**
 * supported_pids tool handler for the OBD2 registry MCP server.
 *
 * Builds the supported-PID responses (PIDs 00, 20, ... A0) an ECU serving
 * the given parameters would answer with, or decodes one such response.
 */

import { parseHexString, toHexString } from "@pid-registry/core";
import {
	buildSupportedPidMasks,
	decodeSupportedParameters,
	decodeSupportedPids,
	encodeSupportedPidMask,
	supportedPidGroup,
} from "@pid-registry/obd2";
import { buildMarkdownTable } from "../formatters/markdown.js";
import { toYaml, toYamlFrontmatter } from "../formatters/yaml-formatter.js";

function hexByte(value: number): string {
	return value.toString(16).padStart(2, "0").toUpperCase();
}

/**
 * Handle the supported_pids tool call for a set of parameter codes.
 *
 * @param codes - Parameter codes, case-insensitive
 * @returns YAML frontmatter + markdown table of the six masks
 */
export function handleSupportedPids(codes: readonly string[]): string {
	const masks = buildSupportedPidMasks(codes);

	const frontmatter = toYamlFrontmatter({
		parameters: codes.map((c) => c.trim().toUpperCase()),
	});

	const rows = [...masks].map(([request, mask]) => {
		const group = supportedPidGroup(request);
		return [
			request,
			`${hexByte(group.firstPid)}-${hexByte(group.lastPid)}`,
			toHexString(encodeSupportedPidMask(mask)),
			decodeSupportedPids(request, mask).map(hexByte).join(" "),
		];
	});

	const table = buildMarkdownTable(["Request", "Range", "Mask", "PIDs"], rows);
	return `${frontmatter}\n${table}`;
}

/**
 * Decode a supported-PID response mask.
 *
 * @param request - Request PID ("00", "20", ...)
 * @param hex - The 4 response bytes A-D as hex
 * @returns YAML document with flagged PIDs and the registry codes among them
 */
export function handleDecodeSupportedPids(
	request: string,
	hex: string,
): string {
	const bytes = parseHexString(hex);
	if (bytes.length !== 4) {
		throw new Error(`Supported-PID mask must be 4 bytes, got ${bytes.length}`);
	}
	const group = supportedPidGroup(request);
	return toYaml({
		request: group.request,
		pids: decodeSupportedPids(group.request, bytes).map(hexByte),
		parameters: decodeSupportedParameters(group.request, bytes),
	});
}
