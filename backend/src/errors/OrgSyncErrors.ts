/**
 * Machine-readable reasons an org-chart sync can fail. Stored in the sync log's
 * `errorDetails.code`.
 */
export type OrgSyncErrorCode =
	| "INVALID_PAYLOAD"
	| "ORGANIZATION_NOT_FOUND"
	| "DUPLICATE_DEPARTMENT_ID"
	| "DUPLICATE_ROLE_ID"
	| "DUPLICATE_CODE"
	| "TOO_MANY_DEPARTMENTS"
	| "ORPHAN_DEPARTMENT"
	| "CIRCULAR_REFERENCE"
	| "UNKNOWN_DEPARTMENT_REFERENCE"
	| "UNKNOWN_ROLE_REFERENCE"
	| "DUPLICATE_ASSIGNMENT"
	| "CLOSURE_MISMATCH"
	| "SYNC_IN_PROGRESS";

/**
 * Base class of every error the org-chart sync raises on purpose. Anything else
 * reaching the caller is an unexpected failure (typically the database).
 */
export class OrgSyncError extends Error {
	readonly code: OrgSyncErrorCode;
	readonly details: Record<string, unknown>;

	constructor(code: OrgSyncErrorCode, message: string, details: Record<string, unknown> = {}) {
		super(message);
		this.name = "OrgSyncError";
		this.code = code;
		this.details = details;
	}
}

/** The payload cannot be applied as sent. Raised before anything is written. */
export class OrgChartValidationError extends OrgSyncError {
	constructor(code: OrgSyncErrorCode, message: string, details: Record<string, unknown> = {}) {
		super(code, message, details);
		this.name = "OrgChartValidationError";
	}
}

/** The derived closure rows disagree with the department parent pointers. Indicates a bug, not bad input. */
export class ConsistencyViolationError extends OrgSyncError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("CLOSURE_MISMATCH", message, details);
		this.name = "ConsistencyViolationError";
	}
}

export class SyncInProgressError extends OrgSyncError {
	constructor(organizationId: string) {
		super("SYNC_IN_PROGRESS", `An org chart sync is already running for organization ${organizationId}`, {
			organizationId,
		});
		this.name = "SyncInProgressError";
	}
}

/**
 * Text stored as the sync log's error message: the message of a known sync
 * error, or a prefixed one for anything unexpected. Never a stack trace.
 */
export function describeSyncFailure(error: unknown): string {
	if (error instanceof OrgSyncError) {
		return error.message;
	}
	const message = error instanceof Error ? error.message : String(error);
	return `Unexpected error during org chart sync: ${message}`;
}

export function syncFailureDetails(error: unknown): Record<string, unknown> {
	if (error instanceof OrgSyncError) {
		return { code: error.code, ...error.details };
	}
	return { code: "UNEXPECTED", errorType: error instanceof Error ? error.name : typeof error };
}
