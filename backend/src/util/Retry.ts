/**
 * Exponential backoff with jitter for transient failures, used when opening the
 * PostgreSQL connection.
 */

import { getLog } from "./Logger";

const log = getLog(import.meta);

export interface RetryOptions {
	/** Total attempts including the first one (default: 3) */
	maxRetries?: number;
	/** Delay before the second attempt (default: 1000) */
	baseDelayMs?: number;
	/** Cap on any single delay (default: 30000) */
	maxDelayMs?: number;
	/** Add up to 100% random jitter to each delay (default: true) */
	jitter?: boolean;
	/** Errors for which this returns false are rethrown immediately. All errors retry when omitted. */
	isRetryable?: (error: unknown) => boolean;
	/** Name used in log messages, e.g. "DB connect" */
	label?: string;
	/** Waits between attempts; tests replace it */
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay before retry `attemptNumber` (1-based), without jitter.
 */
export function calculateBackoffDelay(attemptNumber: number, baseDelayMs: number, maxDelayMs: number): number {
	return Math.min(baseDelayMs * 2 ** (attemptNumber - 1), maxDelayMs);
}

/** Random value in [0, delayMs). */
export function addJitter(delayMs: number): number {
	return Math.floor(delayMs * Math.random());
}

function defaultSleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs `operation` until it resolves, the error is not retryable, or the attempts
 * are used up. The last error is rethrown unchanged.
 *
 * ```typescript
 * await withRetry(() => sequelize.authenticate(), {
 *   label: "DB connect",
 *   maxRetries: 5,
 *   isRetryable: isRetryableConnectionError,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const {
		maxRetries = 3,
		baseDelayMs = 1000,
		maxDelayMs = 30000,
		jitter = true,
		isRetryable,
		label = "operation",
		sleep = defaultSleep,
	} = options;

	let attempt = 1;
	for (;;) {
		try {
			return await operation();
		} catch (error) {
			if ((isRetryable && !isRetryable(error)) || attempt >= maxRetries) {
				throw error;
			}

			const baseDelay = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs);
			const delayMs = jitter ? baseDelay + addJitter(baseDelay) : baseDelay;
			const errorMessage = error instanceof Error ? error.message : String(error);
			log.warn(
				{ attempt, maxRetries, delayMs, error: errorMessage },
				"Retrying %s after error (attempt %d/%d, retry in %dms)",
				label,
				attempt,
				maxRetries,
				delayMs,
			);

			await sleep(delayMs);
			attempt++;
		}
	}
}
