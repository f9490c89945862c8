import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL("./packages/frate", import.meta.url)),
		},
	},
	test: {
		coverage: {
			exclude: ["**/node_modules/**", "**/dist/**", "**/*.test.ts", "**/tests/helpers/**"],
			provider: "v8",
			reporter: ["text", "json", "html"],
		},
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["packages/**/*.test.ts"],
	},
})
