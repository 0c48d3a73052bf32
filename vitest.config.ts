import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		coverage: {
			reporter: ["text"],
			include: ["packages/**/src/**/*.ts"],
			exclude: ["**/*.d.ts"],
		},
		include: ["./packages/**/test/**/*.{test,spec}.ts"],
		exclude: ["node_modules/**", "dist/**"],
	},
});
