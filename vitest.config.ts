import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "node",
		environment: "node",
		include: ["./packages/*/test/**/*.{test,spec}.ts"],
		exclude: ["node_modules/**", "**/dist/**"],
		coverage: {
			reporter: ["text"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/*.d.ts"],
		},
	},
});
