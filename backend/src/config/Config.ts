import { createEnv } from "@t3-oss/env-core";
import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	// transform to boolean
	.transform(s => s === "true")
	.default("false");

const configSchema = {
	server: {
		// Storage backend: "memory" keeps everything in process, "postgres" uses Sequelize
		SEQUELIZE: z.enum(["memory", "postgres"]).default("memory"),
		POSTGRES_DATABASE: z.string().default(""),
		POSTGRES_HOST: z.string().default("localhost"),
		POSTGRES_LOGGING: BooleanSchema,
		POSTGRES_NO_PORT: BooleanSchema,
		POSTGRES_PASSWORD: z.string().default(""),
		POSTGRES_POOL_MAX: z.coerce.number().default(5),
		POSTGRES_PORT: z.coerce.number().default(5432),
		POSTGRES_QUERY: z.string().default(""),
		POSTGRES_SCHEME: z.enum(["postgres", "postgresql"]).default("postgres"),
		POSTGRES_SSL: BooleanSchema,
		POSTGRES_USERNAME: z.string().default(""),
		// Database connection retry configuration
		DB_CONNECT_MAX_RETRIES: z.coerce.number().default(5),
		DB_CONNECT_RETRY_BASE_DELAY_MS: z.coerce.number().default(2000),
		DB_CONNECT_RETRY_MAX_DELAY_MS: z.coerce.number().default(30000),
		// Create missing tables on startup
		DB_SYNC_MODELS: BooleanSchema,
		LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
		// Upper bound on departments accepted in one org-chart payload
		ORG_SYNC_MAX_DEPARTMENTS: z.coerce.number().int().positive().default(1000),
		// Default orphan handling when the payload does not choose one
		ORG_SYNC_ORPHAN_POLICY: z.enum(["reject", "reparent"]).default("reject"),
		// An in_progress sync log older than this is marked failed when the next run starts
		ORG_SYNC_STALE_AFTER_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
		// Let DepartmentAccessScope rows widen the role-level visibility
		ACCESS_SCOPE_OVERRIDES_ENABLED: BooleanSchema,
	},
	/**
	 * By default, this library will feed the environment variables directly to
	 * the Zod validator. With this option an empty value (e.g. `PORT=` in a
	 * ".env" file) is treated as unset, so defaults still apply.
	 */
	emptyStringAsUndefined: true,
};

export type OrgScopeConfig = ReturnType<typeof loadConfig>;

/**
 * Builds a configuration object from the given environment. The result is passed
 * explicitly to `createOrgScope`; nothing is cached at module level.
 *
 * @param runtimeEnv the variables to read, `process.env` when omitted
 */
export function loadConfig(runtimeEnv: Record<string, string | undefined> = process.env) {
	return createEnv({ ...configSchema, runtimeEnv });
}

/**
 * Loads `.env` and `.env.local` from the working directory into `process.env`.
 * Values already present in the environment win.
 */
export function loadEnvFiles(): void {
	dotenvConfig({ path: ".env.local", quiet: true });
	dotenvConfig({ path: ".env", quiet: true });
}
