import type { OrgScopeConfig } from "../config/Config";
import { getLog } from "./Logger";
import { withRetry } from "./Retry";
import { Sequelize } from "sequelize";

const log = getLog(import.meta);

type PostgresConfig = Pick<
	OrgScopeConfig,
	| "POSTGRES_SCHEME"
	| "POSTGRES_DATABASE"
	| "POSTGRES_USERNAME"
	| "POSTGRES_PASSWORD"
	| "POSTGRES_HOST"
	| "POSTGRES_PORT"
	| "POSTGRES_NO_PORT"
	| "POSTGRES_QUERY"
>;

function getErrorCode(error: unknown): string | undefined {
	if (typeof error !== "object" || error === null || !("parent" in error)) {
		return;
	}
	const { parent } = error;
	if (typeof parent === "object" && parent !== null && "code" in parent && typeof parent.code === "string") {
		return parent.code;
	}
	return;
}

function formatConnectionError(error: unknown, host: string, port: number): Error {
	const originalMessage = error instanceof Error ? error.message : String(error);
	const message =
		getErrorCode(error) === "ECONNREFUSED"
			? `PostgreSQL connection refused at ${host}:${port}; start PostgreSQL or set SEQUELIZE=memory`
			: `Failed to connect to PostgreSQL at ${host}:${port}: ${originalMessage}`;
	return new Error(message, { cause: error });
}

export function getPostgresConnectionUri(config: PostgresConfig): string {
	const username = encodeURIComponent(config.POSTGRES_USERNAME);
	const password = encodeURIComponent(config.POSTGRES_PASSWORD);
	const portPart = config.POSTGRES_NO_PORT ? "" : `:${config.POSTGRES_PORT}`;
	const queryPart = config.POSTGRES_QUERY ? `?${config.POSTGRES_QUERY}` : "";
	return `${config.POSTGRES_SCHEME}://${username}:${password}@${config.POSTGRES_HOST}${portPart}/${config.POSTGRES_DATABASE}${queryPart}`;
}

/**
 * Determines if a database connection error is transient and worth retrying:
 * refused, reset or timed-out connections and DNS hiccups.
 */
export function isRetryableConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const errorCode = getErrorCode(error);
	if (
		errorCode === "ECONNREFUSED" ||
		errorCode === "ECONNRESET" ||
		errorCode === "ECONNABORTED" ||
		errorCode === "ENOTFOUND" ||
		errorCode === "EAI_AGAIN" ||
		errorCode === "ETIMEDOUT"
	) {
		return true;
	}
	const message = error.message.toLowerCase();
	return message.includes("timeout") || message.includes("could not translate host name");
}

/**
 * Opens a PostgreSQL connection and verifies it, retrying transient failures
 * with exponential backoff.
 */
export async function createPostgresSequelize(config: OrgScopeConfig): Promise<Sequelize> {
	const sequelize = new Sequelize(getPostgresConnectionUri(config), {
		dialect: "postgres",
		dialectOptions: config.POSTGRES_SSL ? { ssl: { rejectUnauthorized: false } } : {},
		logging: config.POSTGRES_LOGGING ? (sql: string) => log.debug(sql) : false,
		pool: { max: config.POSTGRES_POOL_MAX },
		define: { underscored: true },
	});

	try {
		await withRetry(() => sequelize.authenticate(), {
			maxRetries: config.DB_CONNECT_MAX_RETRIES,
			baseDelayMs: config.DB_CONNECT_RETRY_BASE_DELAY_MS,
			maxDelayMs: config.DB_CONNECT_RETRY_MAX_DELAY_MS,
			isRetryable: isRetryableConnectionError,
			label: "DB connect",
		});
		log.info("PostgreSQL connection established to %s:%d", config.POSTGRES_HOST, config.POSTGRES_PORT);
	} catch (error) {
		await sequelize.close();
		throw formatConnectionError(error, config.POSTGRES_HOST, config.POSTGRES_PORT);
	}

	return sequelize;
}
