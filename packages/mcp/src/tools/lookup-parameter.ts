/**
 * lookup_parameter tool handler for the OBD2 registry MCP server.
 *
 * Returns the full registry entry for one parameter code.
 */

import { lookup } from "@pid-registry/obd2";
import { describeParameter } from "../formatters/parameter-formatter.js";
import { toYaml } from "../formatters/yaml-formatter.js";

/**
 * Handle the lookup_parameter tool call.
 *
 * @param code - Parameter code, case-insensitive
 * @returns YAML document with the parameter's attributes
 * @throws InvalidParameterError if the code is unknown
 */
export function handleLookupParameter(code: string): string {
	return toYaml(describeParameter(lookup(code)));
}
