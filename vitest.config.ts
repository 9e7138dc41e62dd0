import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.spec.ts", "src/**/*.spec.ts", "cli/src/**/*.spec.ts"],
		watch: false,
	},
})
