import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		setupFiles: ["./src/test/setup.ts"],
		coverage: {
			all: true,
			exclude: ["**/*.mock.ts", "src/index.ts", "src/util/ModelDef.ts", "src/util/Sequelize.ts"],
			include: ["src/**"],
			reporter: ["html", "json", "lcov", "text"],
			thresholds: {
				lines: 97,
				statements: 97,
				branches: 97,
				functions: 97,
			},
		},
		env: {
			LOG_TRANSPORTS: "console",
			DISABLE_LOGGING: "true",
		},
		pool: "threads",
		restoreMocks: true,
	},
});
