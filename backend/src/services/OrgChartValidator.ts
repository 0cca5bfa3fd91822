import { OrgChartValidationError } from "../errors/OrgSyncErrors";
import { findCycle } from "../hierarchy/DepartmentGraph";
import type { OrgSnapshot } from "./OrgSnapshot";
import type { DepartmentInput, OrgChartSyncRequest, OrphanPolicy } from "orgscope-common";

export interface OrgChartValidationSettings {
	maxDepartments: number;
	orphanPolicy: OrphanPolicy;
}

export interface ValidatedOrgChart {
	/** Payload departments with every parent reference resolvable */
	readonly departments: Array<DepartmentInput>;
	/** External ids of orphans that were re-parented */
	readonly reparented: Array<string>;
}

function duplicatesOf(values: Iterable<string>): Array<string> {
	const seen = new Set<string>();
	const duplicates = new Set<string>();
	for (const value of values) {
		if (seen.has(value)) {
			duplicates.add(value);
		}
		seen.add(value);
	}
	return [...duplicates];
}

/**
 * Checks a parsed payload against the persisted organization before anything is
 * written. Department references resolve against the payload, plus the persisted
 * departments for an incremental sync. Throws `OrgChartValidationError` on the
 * first problem found.
 */
export function validateOrgChart(
	request: OrgChartSyncRequest,
	snapshot: OrgSnapshot,
	settings: OrgChartValidationSettings,
): ValidatedOrgChart {
	if (!snapshot.organization) {
		throw new OrgChartValidationError(
			"ORGANIZATION_NOT_FOUND",
			`Organization ${snapshot.organizationId} does not exist`,
			{ organizationId: snapshot.organizationId },
		);
	}

	const { departments } = request;
	if (departments.length > settings.maxDepartments) {
		throw new OrgChartValidationError(
			"TOO_MANY_DEPARTMENTS",
			`Department count ${departments.length} exceeds the limit of ${settings.maxDepartments}`,
			{ count: departments.length, limit: settings.maxDepartments },
		);
	}

	const duplicateDepartmentIds = duplicatesOf(departments.map(d => d.id));
	if (duplicateDepartmentIds.length > 0) {
		throw new OrgChartValidationError(
			"DUPLICATE_DEPARTMENT_ID",
			`Duplicate department ids: ${duplicateDepartmentIds.join(", ")}`,
			{ duplicateIds: duplicateDepartmentIds },
		);
	}

	const duplicateRoleIds = duplicatesOf(request.roles.map(r => r.id));
	if (duplicateRoleIds.length > 0) {
		throw new OrgChartValidationError("DUPLICATE_ROLE_ID", `Duplicate role ids: ${duplicateRoleIds.join(", ")}`, {
			duplicateIds: duplicateRoleIds,
		});
	}

	const incremental = request.syncType === "incremental";
	const payloadIds = new Set(departments.map(d => d.id));
	// Persisted departments the run leaves untouched (incremental only)
	const retained = incremental ? snapshot.departments.filter(d => !payloadIds.has(d.externalId)) : [];

	const codes = [
		...departments.flatMap(d => (d.code === null ? [] : [d.code])),
		...retained.flatMap(d => (d.isActive && d.code !== null ? [d.code] : [])),
	];
	const duplicateCodes = duplicatesOf(codes);
	if (duplicateCodes.length > 0) {
		throw new OrgChartValidationError("DUPLICATE_CODE", `Duplicate department codes: ${duplicateCodes.join(", ")}`, {
			duplicateCodes,
		});
	}

	const knownDepartmentIds = new Set([...payloadIds, ...retained.map(d => d.externalId)]);
	const resolved = resolveOrphans(request, knownDepartmentIds, settings.orphanPolicy);

	const externalIdOf = new Map(snapshot.departments.map(d => [d.id, d.externalId]));
	const parents = new Map<string, string | null>();
	for (const department of retained) {
		const parentId = department.parentId === null ? undefined : externalIdOf.get(department.parentId);
		parents.set(department.externalId, parentId ?? null);
	}
	for (const department of resolved.departments) {
		parents.set(department.id, department.parentId);
	}
	const cycle = findCycle(parents);
	if (cycle) {
		throw new OrgChartValidationError("CIRCULAR_REFERENCE", `Circular department reference: ${cycle.join(" -> ")}`, {
			cycle,
		});
	}

	const knownRoleIds = new Set([...request.roles.map(r => r.id), ...snapshot.roles.map(r => r.externalId)]);
	validateEmployees(request, knownDepartmentIds, knownRoleIds);
	validateAccessScopes(request, knownDepartmentIds);

	return resolved;
}

function resolveOrphans(
	request: OrgChartSyncRequest,
	knownDepartmentIds: ReadonlySet<string>,
	orphanPolicy: OrphanPolicy,
): ValidatedOrgChart {
	const orphans = request.departments.filter(d => d.parentId !== null && !knownDepartmentIds.has(d.parentId));
	if (orphans.length === 0) {
		return { departments: request.departments, reparented: [] };
	}
	const orphanIds = orphans.map(d => d.id);
	if (orphanPolicy === "reject") {
		throw new OrgChartValidationError(
			"ORPHAN_DEPARTMENT",
			`Departments with an unresolvable parent: ${orphanIds.join(", ")}`,
			{ orphanDepartments: orphanIds },
		);
	}

	const { orphanParentId } = request.options;
	if (orphanParentId !== null && !knownDepartmentIds.has(orphanParentId)) {
		throw new OrgChartValidationError(
			"UNKNOWN_DEPARTMENT_REFERENCE",
			`Orphan parent department ${orphanParentId} does not exist`,
			{ orphanParentId },
		);
	}
	const reparented = new Set(orphanIds);
	return {
		departments: request.departments.map(d => (reparented.has(d.id) ? { ...d, parentId: orphanParentId } : d)),
		reparented: orphanIds,
	};
}

function validateEmployees(
	request: OrgChartSyncRequest,
	knownDepartmentIds: ReadonlySet<string>,
	knownRoleIds: ReadonlySet<string>,
): void {
	const unknownDepartments = request.employees.filter(e => !knownDepartmentIds.has(e.departmentId));
	if (unknownDepartments.length > 0) {
		throw new OrgChartValidationError(
			"UNKNOWN_DEPARTMENT_REFERENCE",
			`Employees assigned to unknown departments: ${unknownDepartments.map(e => `${e.id}@${e.departmentId}`).join(", ")}`,
			{ references: unknownDepartments.map(e => ({ employeeId: e.id, departmentId: e.departmentId })) },
		);
	}

	const unknownRoles = request.employees.filter(e => e.roleId !== null && !knownRoleIds.has(e.roleId));
	if (unknownRoles.length > 0) {
		throw new OrgChartValidationError(
			"UNKNOWN_ROLE_REFERENCE",
			`Employees referencing unknown roles: ${unknownRoles.map(e => `${e.id}:${e.roleId}`).join(", ")}`,
			{ references: unknownRoles.map(e => ({ employeeId: e.id, roleId: e.roleId })) },
		);
	}

	const duplicateAssignments = duplicatesOf(request.employees.map(e => `${e.id}@${e.departmentId}`));
	if (duplicateAssignments.length > 0) {
		throw new OrgChartValidationError(
			"DUPLICATE_ASSIGNMENT",
			`Employees assigned to the same department twice: ${duplicateAssignments.join(", ")}`,
			{ assignments: duplicateAssignments },
		);
	}
}

function validateAccessScopes(request: OrgChartSyncRequest, knownDepartmentIds: ReadonlySet<string>): void {
	const scopedIds = request.accessScopes.map(s => s.departmentId);
	const unknown = scopedIds.filter(id => !knownDepartmentIds.has(id));
	if (unknown.length > 0) {
		throw new OrgChartValidationError(
			"UNKNOWN_DEPARTMENT_REFERENCE",
			`Access scopes for unknown departments: ${unknown.join(", ")}`,
			{ departmentIds: unknown },
		);
	}
	const duplicates = duplicatesOf(scopedIds);
	if (duplicates.length > 0) {
		throw new OrgChartValidationError(
			"DUPLICATE_DEPARTMENT_ID",
			`Access scope declared more than once for departments: ${duplicates.join(", ")}`,
			{ duplicateIds: duplicates },
		);
	}
}
