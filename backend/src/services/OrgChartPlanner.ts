import { computePlacements, type ParentMap, topologicalSort } from "../hierarchy/DepartmentGraph";
import { ConsistencyViolationError } from "../errors/OrgSyncErrors";
import type { Department, NewDepartment, UpdateDepartment } from "../model/Department";
import type { DepartmentAccessScope, NewDepartmentAccessScope } from "../model/DepartmentAccessScope";
import type { NewOrgUser, OrgUser, UpdateOrgUser } from "../model/OrgUser";
import type { NewRole, Role, UpdateRole } from "../model/Role";
import type { NewUserDepartment, UpdateUserDepartment, UserDepartment } from "../model/UserDepartment";
import type { OrgSnapshot } from "./OrgSnapshot";
import type { ValidatedOrgChart } from "./OrgChartValidator";
import { emptySyncSummary, type EmployeeInput, type OrgChartSyncRequest, type SyncSummary } from "orgscope-common";

export type DepartmentWrite =
	| { readonly kind: "create"; readonly department: NewDepartment }
	| { readonly kind: "update"; readonly id: string; readonly changes: UpdateDepartment };

export type RoleWrite =
	| { readonly kind: "create"; readonly role: NewRole }
	| { readonly kind: "update"; readonly id: string; readonly changes: UpdateRole };

export type UserWrite =
	| { readonly kind: "create"; readonly user: NewOrgUser }
	| { readonly kind: "update"; readonly id: string; readonly changes: UpdateOrgUser };

export interface AssignmentWrites {
	readonly create: Array<NewUserDepartment>;
	readonly update: Array<{ readonly id: string; readonly changes: UpdateUserDepartment }>;
	/** Ids of active assignments to end */
	readonly end: Array<string>;
}

/** Every write a sync run performs, computed without touching the database. */
export interface OrgChartPlan {
	/** Parents before children */
	readonly departmentWrites: Array<DepartmentWrite>;
	readonly roleWrites: Array<RoleWrite>;
	readonly userWrites: Array<UserWrite>;
	readonly assignmentWrites: AssignmentWrites;
	readonly accessScopeWrites: Array<NewDepartmentAccessScope>;
	/** Final parent pointer of every department of the organization, by database id */
	readonly parents: ParentMap;
	readonly summary: SyncSummary;
}

export interface PlannerDeps {
	generateId: () => string;
}

type Changes<T, K extends keyof T> = { -readonly [P in K]?: T[P] };

function sameValue(a: unknown, b: unknown): boolean {
	if (a instanceof Date && b instanceof Date) {
		return a.getTime() === b.getTime();
	}
	return a === b;
}

function changedFields<T, K extends keyof T>(current: T, desired: Pick<T, K>, keys: ReadonlyArray<K>): Changes<T, K> {
	const changes: Changes<T, K> = {};
	for (const key of keys) {
		if (!sameValue(current[key], desired[key])) {
			changes[key] = desired[key];
		}
	}
	return changes;
}

function hasChanges(changes: object): boolean {
	return Object.keys(changes).length > 0;
}

const DEPARTMENT_FIELDS = [
	"name",
	"code",
	"parentId",
	"level",
	"path",
	"displayOrder",
	"description",
	"isActive",
] as const;
const ROLE_FIELDS = ["name", "level", "description"] as const;
const USER_FIELDS = ["name", "email", "isActive"] as const;
const ASSIGNMENT_FIELDS = ["roleId", "isPrimary", "roleInDept", "startedAt"] as const;
const ACCESS_SCOPE_FIELDS = [
	"canViewChildDepartments",
	"canViewSiblingDepartments",
	"canViewParentDepartments",
	"maxDepth",
	"overrideConfidentialAccess",
	"overrideRestrictedAccess",
] as const;

type DepartmentField = (typeof DEPARTMENT_FIELDS)[number];
type RoleField = (typeof ROLE_FIELDS)[number];
type UserField = (typeof USER_FIELDS)[number];
type AssignmentField = (typeof ASSIGNMENT_FIELDS)[number];
type AccessScopeField = (typeof ACCESS_SCOPE_FIELDS)[number];

/**
 * Reconciles a validated payload with the persisted organization. Rows are
 * matched by external id; only rows whose values actually change are written
 * and counted, so planning the same payload against its own result is empty.
 *
 * A full sync deactivates active departments and users missing from the payload
 * and ends the absent users' assignments. Both sync types replace the assignment
 * set of every employee the payload names.
 */
export function planOrgChartSync(
	request: OrgChartSyncRequest,
	validated: ValidatedOrgChart,
	snapshot: OrgSnapshot,
	deps: PlannerDeps,
): OrgChartPlan {
	const organizationId = snapshot.organizationId;
	const full = request.syncType === "full";
	const summary = emptySyncSummary();

	const departmentIdOf = new Map(snapshot.departments.map(d => [d.externalId, d.id]));
	for (const department of validated.departments) {
		if (!departmentIdOf.has(department.id)) {
			departmentIdOf.set(department.id, deps.generateId());
		}
	}
	function resolveDepartmentId(externalId: string): string {
		const id = departmentIdOf.get(externalId);
		if (id === undefined) {
			throw new ConsistencyViolationError(`Department ${externalId} was not resolved`, { externalId });
		}
		return id;
	}

	// Desired state of every department before placement
	const payloadIds = new Set(validated.departments.map(d => d.id));
	const desired = new Map<string, Omit<NewDepartment, "level" | "path">>();
	for (const department of snapshot.departments) {
		if (!payloadIds.has(department.externalId)) {
			const { level: _level, path: _path, createdAt: _createdAt, updatedAt: _updatedAt, ...kept } = department;
			desired.set(department.id, { ...kept, isActive: full ? false : department.isActive });
		}
	}
	for (const department of validated.departments) {
		const id = resolveDepartmentId(department.id);
		desired.set(id, {
			id,
			organizationId,
			externalId: department.id,
			name: department.name,
			code: department.code,
			parentId: department.parentId === null ? null : resolveDepartmentId(department.parentId),
			displayOrder: department.displayOrder,
			description: department.description,
			isActive: department.isActive,
		});
	}

	const parents = new Map([...desired.values()].map(d => [d.id, d.parentId]));
	const segments = new Map([...desired.values()].map(d => [d.id, d.code ?? d.externalId]));
	const placements = computePlacements(parents, segments);
	const order = topologicalSort(parents);
	if (!order) {
		throw new ConsistencyViolationError("Department tree contains a cycle");
	}

	const persistedById = new Map(snapshot.departments.map(d => [d.id, d]));
	const departmentWrites: Array<DepartmentWrite> = [];
	for (const id of order) {
		const target = desired.get(id);
		const placement = placements.get(id);
		if (!target || !placement) {
			throw new ConsistencyViolationError(`Department ${id} has no placement`, { departmentId: id });
		}
		const department: NewDepartment = { ...target, level: placement.level, path: placement.path };
		const current = persistedById.get(id);
		if (!current) {
			departmentWrites.push({ kind: "create", department });
			summary.departmentsAdded++;
			continue;
		}
		const changes = changedFields<Department, DepartmentField>(current, department, DEPARTMENT_FIELDS);
		if (!hasChanges(changes)) {
			continue;
		}
		departmentWrites.push({ kind: "update", id, changes });
		if (current.isActive && !department.isActive && !payloadIds.has(current.externalId)) {
			summary.departmentsDeleted++;
		} else {
			summary.departmentsUpdated++;
		}
	}

	const roleIdOf = new Map(snapshot.roles.map(r => [r.externalId, r.id]));
	const persistedRoles = new Map(snapshot.roles.map(r => [r.externalId, r]));
	const roleWrites: Array<RoleWrite> = [];
	for (const role of request.roles) {
		const current = persistedRoles.get(role.id);
		const values = { name: role.name, level: role.level, description: role.description };
		if (!current) {
			const id = deps.generateId();
			roleIdOf.set(role.id, id);
			roleWrites.push({ kind: "create", role: { id, organizationId, externalId: role.id, ...values } });
			summary.rolesAdded++;
			continue;
		}
		const changes = changedFields<Role, RoleField>(current, values, ROLE_FIELDS);
		if (hasChanges(changes)) {
			roleWrites.push({ kind: "update", id: current.id, changes });
			summary.rolesUpdated++;
		}
	}

	const employees = new Map<string, Array<EmployeeInput>>();
	for (const employee of request.employees) {
		const rows = employees.get(employee.id);
		if (rows) {
			rows.push(employee);
		} else {
			employees.set(employee.id, [employee]);
		}
	}

	const activeAssignments = new Map<string, Array<UserDepartment>>();
	for (const assignment of snapshot.assignments) {
		const rows = activeAssignments.get(assignment.userId);
		if (rows) {
			rows.push(assignment);
		} else {
			activeAssignments.set(assignment.userId, [assignment]);
		}
	}

	const persistedUsers = new Map(snapshot.users.map(u => [u.externalId, u]));
	const userWrites: Array<UserWrite> = [];
	const assignmentWrites: AssignmentWrites = { create: [], update: [], end: [] };

	for (const [externalId, rows] of employees) {
		const [first] = rows;
		const values = { name: first.name, email: first.email, isActive: true };
		const current = persistedUsers.get(externalId);
		const userId = current?.id ?? deps.generateId();
		let changed = false;
		if (!current) {
			userWrites.push({ kind: "create", user: { id: userId, organizationId, externalId, ...values } });
		} else {
			const changes = changedFields<OrgUser, UserField>(current, values, USER_FIELDS);
			if (hasChanges(changes)) {
				userWrites.push({ kind: "update", id: userId, changes });
				changed = true;
			}
		}

		const existing = new Map((activeAssignments.get(userId) ?? []).map(a => [a.departmentId, a]));
		for (const row of rows) {
			const departmentId = resolveDepartmentId(row.departmentId);
			const assignment = {
				roleId: row.roleId === null ? null : (roleIdOf.get(row.roleId) ?? null),
				isPrimary: row.isPrimary,
				roleInDept: row.roleInDept,
				startedAt: row.startDate === null ? null : new Date(row.startDate),
			};
			const active = existing.get(departmentId);
			existing.delete(departmentId);
			if (!active) {
				assignmentWrites.create.push({ id: deps.generateId(), userId, departmentId, ...assignment });
				changed = true;
				continue;
			}
			const changes = changedFields<UserDepartment, AssignmentField>(active, assignment, ASSIGNMENT_FIELDS);
			if (hasChanges(changes)) {
				assignmentWrites.update.push({ id: active.id, changes });
				changed = true;
			}
		}
		for (const stale of existing.values()) {
			assignmentWrites.end.push(stale.id);
			changed = true;
		}

		if (!current) {
			summary.usersAdded++;
		} else if (changed) {
			summary.usersUpdated++;
		}
	}

	if (full) {
		for (const user of snapshot.users) {
			if (employees.has(user.externalId)) {
				continue;
			}
			const stale = activeAssignments.get(user.id) ?? [];
			assignmentWrites.end.push(...stale.map(a => a.id));
			if (user.isActive) {
				userWrites.push({ kind: "update", id: user.id, changes: { isActive: false } });
				summary.usersDeleted++;
			}
		}
	}

	const persistedScopes = new Map(snapshot.accessScopes.map(s => [s.departmentId, s]));
	const accessScopeWrites: Array<NewDepartmentAccessScope> = [];
	for (const scope of request.accessScopes) {
		const { departmentId: externalId, ...flags } = scope;
		const departmentId = resolveDepartmentId(externalId);
		const current = persistedScopes.get(departmentId);
		const changes = current
			? changedFields<DepartmentAccessScope, AccessScopeField>(current, flags, ACCESS_SCOPE_FIELDS)
			: flags;
		if (hasChanges(changes)) {
			accessScopeWrites.push({ departmentId, organizationId, ...flags });
		}
	}

	return { departmentWrites, roleWrites, userWrites, assignmentWrites, accessScopeWrites, parents, summary };
}
