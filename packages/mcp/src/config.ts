/**
 * Configuration for the OBD2 registry MCP server.
 *
 * Reads configuration from:
 * 1. CLI arguments (--can-id, --precision)
 * 2. Environment variables (OBD_CAN_ID, OBD_PRECISION)
 * 3. Workspace settings (.vscode/settings.json), optional
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
	type CanIdWidth,
	InvalidCanIdError,
	isCanIdWidth,
} from "@pid-registry/obd2";
import { z } from "zod";

export interface McpConfig {
	/** CAN identifier width used when reporting header IDs */
	canIdWidth: CanIdWidth;
	/** Decimal places shown for decoded values */
	precision: number;
}

export const DEFAULT_CONFIG: McpConfig = {
	canIdWidth: 11,
	precision: 6,
};

const precisionSchema = z.coerce.number().int().min(0).max(12);
const canIdSchema = z.coerce.number().int();

const settingsSchema = z
	.object({
		"obdRegistry.canId": z.number().int().optional(),
		"obdRegistry.precision": z.number().int().optional(),
	})
	.passthrough();

type WorkspaceSettings = z.infer<typeof settingsSchema>;

/**
 * Parse CLI arguments for MCP server configuration.
 *
 * @param argv - Process arguments (default: process.argv)
 * @returns Raw CLI values, unvalidated
 */
export function parseCliArgs(argv: readonly string[] = process.argv): {
	canId: string | undefined;
	precision: string | undefined;
} {
	let canId: string | undefined;
	let precision: string | undefined;

	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (!arg) continue;

		if (arg === "--can-id" && i + 1 < argv.length) {
			canId = argv[i + 1];
			i++;
		} else if (arg.startsWith("--can-id=")) {
			canId = arg.slice("--can-id=".length);
		} else if (arg === "--precision" && i + 1 < argv.length) {
			precision = argv[i + 1];
			i++;
		} else if (arg.startsWith("--precision=")) {
			precision = arg.slice("--precision=".length);
		}
	}

	return { canId, precision };
}

/**
 * Try to read workspace settings from .vscode/settings.json.
 *
 * A missing file yields no settings; a malformed one is an error.
 *
 * @param workspaceDir - Directory to search for .vscode/settings.json
 */
export function readWorkspaceSettings(workspaceDir: string): WorkspaceSettings {
	const settingsPath = path.join(workspaceDir, ".vscode", "settings.json");
	if (!fs.existsSync(settingsPath)) {
		return {};
	}

	const raw = fs.readFileSync(settingsPath, "utf8");
	const parsed = settingsSchema.safeParse(JSON.parse(raw));
	if (!parsed.success) {
		throw new Error(
			`Invalid settings in ${settingsPath}: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
		);
	}
	return parsed.data;
}

function resolveCanId(value: string | number): CanIdWidth {
	const parsed = canIdSchema.safeParse(value);
	if (!parsed.success) {
		throw new Error(`Invalid CAN ID width: "${value}"`);
	}
	const width = parsed.data;
	if (!isCanIdWidth(width)) {
		throw new InvalidCanIdError(width);
	}
	return width;
}

function resolvePrecision(value: string | number): number {
	const parsed = precisionSchema.safeParse(value);
	if (!parsed.success) {
		throw new Error(`Invalid precision: "${value}" (expected 0-12)`);
	}
	return parsed.data;
}

/**
 * Load MCP server configuration from all sources.
 *
 * Priority: CLI args > env vars > workspace settings > defaults
 *
 * @throws InvalidCanIdError if the CAN ID width is not 11 or 29
 * @throws Error if a value cannot be parsed
 */
export function loadConfig(
	argv: readonly string[] = process.argv,
	env: NodeJS.ProcessEnv = process.env,
	workspaceDir: string = process.cwd(),
): McpConfig {
	const cli = parseCliArgs(argv);
	const settings = readWorkspaceSettings(workspaceDir);

	const canId =
		cli.canId ?? env["OBD_CAN_ID"] ?? settings["obdRegistry.canId"];
	const precision =
		cli.precision ?? env["OBD_PRECISION"] ?? settings["obdRegistry.precision"];

	return {
		canIdWidth:
			canId !== undefined ? resolveCanId(canId) : DEFAULT_CONFIG.canIdWidth,
		precision:
			precision !== undefined
				? resolvePrecision(precision)
				: DEFAULT_CONFIG.precision,
	};
}
