/**
 * YAML formatter for the OBD2 registry MCP server.
 *
 * Tool results are YAML documents, or YAML frontmatter ahead of a markdown
 * table. Uses js-yaml for serialization.
 */

import yaml from "js-yaml";

/**
 * Serialize a result object as a YAML document. Keys keep insertion order;
 * `undefined` fields are dropped.
 */
export function toYaml(data: Record<string, unknown>): string {
	return yaml.dump(data, {
		indent: 2,
		lineWidth: 120,
		noRefs: true,
		sortKeys: false,
		skipInvalid: true,
		flowLevel: 2,
	});
}

/**
 * Wrap a result object in YAML frontmatter delimiters.
 *
 * @returns YAML frontmatter block (---\n...\n---\n)
 */
export function toYamlFrontmatter(data: Record<string, unknown>): string {
	return `---\n${toYaml(data)}---\n`;
}
