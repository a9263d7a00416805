/**
 * Shared markdown formatting utilities for the OBD2 registry MCP server.
 */

export type ColumnAlign = "left" | "right";

/**
 * Build a markdown table from headers and rows.
 *
 * Column widths are the longest of the header and its cells. Right-aligned
 * columns (numbers) get a `---:` separator and left padding.
 *
 * @param headers - Column header strings
 * @param rows - Data rows (each row is an array of cell strings)
 * @param align - Per-column alignment; missing entries are left-aligned
 * @returns Formatted markdown table string
 *
 * @example
 * buildMarkdownTable(["Code", "Max"], [["VSS", "255"]], ["left", "right"]);
 * // | Code | Max |
 * // | ---- | --: |
 * // | VSS  | 255 |
 */
export function buildMarkdownTable(
	headers: readonly string[],
	rows: readonly (readonly string[])[],
	align: readonly ColumnAlign[] = [],
): string {
	const colWidths = headers.map((h) => Math.max(h.length, 3));
	for (const row of rows) {
		for (let i = 0; i < row.length; i++) {
			const cell = row[i] ?? "";
			if (cell.length > (colWidths[i] ?? 0)) {
				colWidths[i] = cell.length;
			}
		}
	}

	const pad = (s: string, i: number) => {
		const w = colWidths[i] ?? s.length;
		return align[i] === "right" ? s.padStart(w) : s.padEnd(w);
	};
	const sep = (w: number, i: number) =>
		align[i] === "right" ? `${"-".repeat(w - 1)}:` : "-".repeat(w);

	const headerRow = `| ${headers.map((h, i) => pad(h, i)).join(" | ")} |`;
	const sepRow = `| ${colWidths.map((w, i) => sep(w, i)).join(" | ")} |`;
	const dataRows = rows.map(
		(row) => `| ${row.map((cell, i) => pad(cell, i)).join(" | ")} |`,
	);

	return [headerRow, sepRow, ...dataRows].join("\n");
}
