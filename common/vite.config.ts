import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			all: true,
			exclude: ["**/*.mock.ts", "**/index.ts", "src/types/OrgChart.ts", "src/tenant/**"],
			include: ["src/**/*.ts"],
			reporter: ["html", "json", "lcov", "text"],
		},
		pool: "threads",
		restoreMocks: true,
	},
});
