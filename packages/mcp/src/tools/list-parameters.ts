/**
 * list_parameters tool handler for the OBD2 registry MCP server.
 *
 * Lists every registered parameter.
 * Returns YAML frontmatter with counts + markdown table of all parameters.
 */

import { listParameters, type ObdParameter } from "@pid-registry/obd2";
import { buildMarkdownTable } from "../formatters/markdown.js";
import {
	formatBound,
	formatMode,
	formatUnit,
} from "../formatters/parameter-formatter.js";
import { toYamlFrontmatter } from "../formatters/yaml-formatter.js";

/**
 * Handle the list_parameters tool call.
 *
 * @param filter - Case-insensitive substring matched against code and name
 * @returns Formatted output string
 */
export function handleListParameters(filter?: string): string {
	const needle = filter?.trim().toLowerCase();
	const parameters = listParameters().filter(
		(p: ObdParameter) =>
			needle === undefined ||
			needle === "" ||
			p.code.toLowerCase().includes(needle) ||
			p.name.toLowerCase().includes(needle),
	);

	const frontmatter = toYamlFrontmatter({
		parameter_count: parameters.length,
		...(needle ? { filter: needle } : {}),
	});

	const headers = ["Code", "Name", "Mode", "PID", "Unit", "Min", "Max"];
	const rows = parameters.map((p) => [
		p.code,
		p.name,
		formatMode(p),
		p.pid ?? "",
		formatUnit(p),
		formatBound(p, "min"),
		formatBound(p, "max"),
	]);

	const table = buildMarkdownTable(headers, rows, [
		"left",
		"left",
		"left",
		"left",
		"left",
		"right",
		"right",
	]);

	return `${frontmatter}\n${table}`;
}
