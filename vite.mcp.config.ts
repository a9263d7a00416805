import { builtinModules } from "node:module";
import { defineConfig } from "vitest/config";

// Bundles the MCP server into a single self-contained .mjs file. It runs as
// a plain Node.js stdio process, so Node built-ins stay external.
export default defineConfig({
	build: {
		target: "node20",
		lib: {
			entry: "packages/mcp/src/index.ts",
			formats: ["es"],
			fileName: "server",
		},
		outDir: "packages/mcp/dist",
		emptyOutDir: true,
		sourcemap: true,
		rollupOptions: {
			external: [...builtinModules, ...builtinModules.map((m) => `node:${m}`)],
			output: {
				entryFileNames: "server.mjs",
			},
		},
	},
});
