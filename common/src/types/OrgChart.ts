/**
 * Org-chart payload accepted from an upstream provider, in its parsed form
 * (defaults applied). Every `id` here is the provider's stable identifier, not a
 * database key.
 */

export type SyncType = "full" | "incremental";

/**
 * What to do with a department whose parent cannot be resolved:
 * - "reject": fail the run
 * - "reparent": attach it to `SyncOptions.orphanParentId`, or make it a root
 */
export type OrphanPolicy = "reject" | "reparent";

export interface DepartmentInput {
	id: string;
	name: string;
	code: string | null;
	parentId: string | null;
	displayOrder: number;
	description: string | null;
	isActive: boolean;
}

export interface RoleInput {
	id: string;
	name: string;
	level: number;
	description: string | null;
}

/** One department assignment of one employee. An employee may appear once per department. */
export interface EmployeeInput {
	id: string;
	name: string;
	email: string | null;
	departmentId: string;
	roleId: string | null;
	isPrimary: boolean;
	roleInDept: string | null;
	/** ISO date (YYYY-MM-DD) */
	startDate: string | null;
}

export interface AccessScopeInput {
	departmentId: string;
	canViewChildDepartments: boolean;
	canViewSiblingDepartments: boolean;
	canViewParentDepartments: boolean;
	/** `null` means unlimited */
	maxDepth: number | null;
	overrideConfidentialAccess: boolean;
	overrideRestrictedAccess: boolean;
}

export interface SyncOptions {
	dryRun: boolean;
	/** Falls back to the service default when absent */
	orphanPolicy: OrphanPolicy | null;
	orphanParentId: string | null;
}

export interface OrgChartSyncRequest {
	source: string;
	syncType: SyncType;
	departments: Array<DepartmentInput>;
	roles: Array<RoleInput>;
	employees: Array<EmployeeInput>;
	accessScopes: Array<AccessScopeInput>;
	options: SyncOptions;
}

export interface SyncSummary {
	departmentsAdded: number;
	departmentsUpdated: number;
	departmentsDeleted: number;
	usersAdded: number;
	usersUpdated: number;
	usersDeleted: number;
	rolesAdded: number;
	rolesUpdated: number;
}

export type SyncStatus = "pending" | "in_progress" | "success" | "failed";

export interface OrgChartSyncResponse {
	status: "success";
	syncId: string;
	dryRun: boolean;
	summary: SyncSummary;
	durationMs: number;
	syncedAt: Date;
}

export function emptySyncSummary(): SyncSummary {
	return {
		departmentsAdded: 0,
		departmentsUpdated: 0,
		departmentsDeleted: 0,
		usersAdded: 0,
		usersUpdated: 0,
		usersDeleted: 0,
		rolesAdded: 0,
		rolesUpdated: 0,
	};
}
