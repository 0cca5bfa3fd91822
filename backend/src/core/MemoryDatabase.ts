import type { DepartmentAccessScopeDao } from "../dao/DepartmentAccessScopeDao";
import type { DepartmentDao } from "../dao/DepartmentDao";
import type { DepartmentHierarchyDao } from "../dao/DepartmentHierarchyDao";
import type { OrgChartSyncLogDao } from "../dao/OrgChartSyncLogDao";
import type { OrganizationDao } from "../dao/OrganizationDao";
import type { OrgUserDao } from "../dao/OrgUserDao";
import type { RoleDao } from "../dao/RoleDao";
import type { UserDepartmentDao } from "../dao/UserDepartmentDao";
import type { ClosureRow } from "../hierarchy/DepartmentGraph";
import type { Department } from "../model/Department";
import type { DepartmentAccessScope } from "../model/DepartmentAccessScope";
import type { DepartmentHierarchy } from "../model/DepartmentHierarchy";
import type { OrgChartSyncLog } from "../model/OrgChartSyncLog";
import type { OrgUser } from "../model/OrgUser";
import type { Role } from "../model/Role";
import type { UserDepartment } from "../model/UserDepartment";
import { getLog } from "../util/Logger";
import type { Database, OrgDaos } from "./Database";
import type { Organization } from "orgscope-common";

const log = getLog(import.meta);

interface OrgTables {
	organizations: Map<string, Organization>;
	departments: Map<string, Department>;
	hierarchy: Array<DepartmentHierarchy>;
	accessScopes: Map<string, DepartmentAccessScope>;
	roles: Map<string, Role>;
	users: Map<string, OrgUser>;
	userDepartments: Map<string, UserDepartment>;
}

export interface MemoryDatabaseOptions {
	/** Clock for createdAt/updatedAt */
	now?: () => Date;
}

function emptyTables(): OrgTables {
	return {
		organizations: new Map(),
		departments: new Map(),
		hierarchy: [],
		accessScopes: new Map(),
		roles: new Map(),
		users: new Map(),
		userDepartments: new Map(),
	};
}

function uniqueViolation(table: string, value: string): Error {
	return new Error(`duplicate key value violates unique constraint on ${table}: ${value}`);
}

function foreignKeyViolation(table: string, column: string, value: string): Error {
	return new Error(`insert or update on table ${table} violates foreign key constraint: ${column}=${value}`);
}

/**
 * In-process implementation of `Database` with the same constraints the
 * PostgreSQL schema enforces (unique external ids, foreign keys). A transaction
 * works on a copy of the organization tables and replaces them only when its
 * callback resolves; transactions run one at a time.
 */
export function createMemoryDatabase(options: MemoryDatabaseOptions = {}): Database {
	const now = options.now ?? (() => new Date());
	let tables = emptyTables();
	const syncLogs = new Map<string, OrgChartSyncLog>();
	let queue: Promise<void> = Promise.resolve();

	log.info("Using in-memory database");

	return {
		...createMemoryOrgDaos(() => tables, now),
		orgChartSyncLogDao: createMemorySyncLogDao(syncLogs, now),
		transaction,
		close,
	};

	function transaction<T>(organizationId: string, fn: (daos: OrgDaos) => Promise<T>): Promise<T> {
		const run = queue.then(async () => {
			const draft = structuredClone(tables);
			const result = await fn(createMemoryOrgDaos(() => draft, now));
			tables = draft;
			log.debug("Committed transaction for organization %s", organizationId);
			return result;
		});
		// The next transaction waits for this one whatever its outcome; the caller sees the rejection through `run`
		queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	async function close(): Promise<void> {
		tables = emptyTables();
		syncLogs.clear();
	}
}

function createMemoryOrgDaos(getTables: () => OrgTables, now: () => Date): OrgDaos {
	function departmentInOrganization(organizationId: string, departmentId: string): Department | undefined {
		const department = getTables().departments.get(departmentId);
		return department?.organizationId === organizationId ? department : undefined;
	}

	const organizationDao: OrganizationDao = {
		findById(id) {
			return Promise.resolve(getTables().organizations.get(id));
		},
		create(organization) {
			const { organizations } = getTables();
			if (organizations.has(organization.id)) {
				return Promise.reject(uniqueViolation("organizations", organization.id));
			}
			const created: Organization = { ...organization, createdAt: now(), updatedAt: now() };
			organizations.set(created.id, created);
			return Promise.resolve(created);
		},
	};

	const departmentDao: DepartmentDao = {
		listByOrganization(organizationId) {
			const departments = [...getTables().departments.values()]
				.filter(d => d.organizationId === organizationId)
				.sort((a, b) => a.level - b.level || a.displayOrder - b.displayOrder || a.name.localeCompare(b.name));
			return Promise.resolve(departments);
		},
		listActiveIds(organizationId) {
			return Promise.resolve(
				[...getTables().departments.values()]
					.filter(d => d.organizationId === organizationId && d.isActive)
					.map(d => d.id),
			);
		},
		findById(organizationId, id) {
			return Promise.resolve(departmentInOrganization(organizationId, id));
		},
		listActiveChildIds(organizationId, parentId) {
			return Promise.resolve(
				[...getTables().departments.values()]
					.filter(d => d.organizationId === organizationId && d.parentId === parentId && d.isActive)
					.map(d => d.id),
			);
		},
		create(department) {
			const { departments } = getTables();
			if (departments.has(department.id)) {
				return Promise.reject(uniqueViolation("departments", department.id));
			}
			for (const existing of departments.values()) {
				if (existing.organizationId === department.organizationId && existing.externalId === department.externalId) {
					return Promise.reject(uniqueViolation("departments", department.externalId));
				}
			}
			if (department.parentId !== null && !departments.has(department.parentId)) {
				return Promise.reject(foreignKeyViolation("departments", "parent_id", department.parentId));
			}
			const created: Department = { ...department, createdAt: now(), updatedAt: now() };
			departments.set(created.id, created);
			return Promise.resolve(created);
		},
		update(organizationId, id, updates) {
			const existing = departmentInOrganization(organizationId, id);
			if (!existing) {
				return Promise.resolve(false);
			}
			if (updates.parentId && !getTables().departments.has(updates.parentId)) {
				return Promise.reject(foreignKeyViolation("departments", "parent_id", updates.parentId));
			}
			getTables().departments.set(id, { ...existing, ...updates, updatedAt: now() });
			return Promise.resolve(true);
		},
	};

	function listRelated(
		organizationId: string,
		ids: Array<string>,
		from: "ancestor" | "descendant",
		maxDepth: number | undefined,
	): Promise<Array<string>> {
		const wanted = new Set(ids);
		const related = new Set<string>();
		for (const row of getTables().hierarchy) {
			const source = from === "ancestor" ? row.ancestorDepartmentId : row.descendantDepartmentId;
			const target = from === "ancestor" ? row.descendantDepartmentId : row.ancestorDepartmentId;
			if (
				row.organizationId === organizationId &&
				wanted.has(source) &&
				row.depth > 0 &&
				(maxDepth === undefined || row.depth <= maxDepth) &&
				departmentInOrganization(organizationId, target)?.isActive
			) {
				related.add(target);
			}
		}
		return Promise.resolve([...related]);
	}

	const departmentHierarchyDao: DepartmentHierarchyDao = {
		listDescendantIds(organizationId, ancestorIds, maxDepth) {
			return listRelated(organizationId, ancestorIds, "ancestor", maxDepth);
		},
		listAncestorIds(organizationId, descendantIds, maxDepth) {
			return listRelated(organizationId, descendantIds, "descendant", maxDepth);
		},
		listByOrganization(organizationId) {
			return Promise.resolve(
				getTables()
					.hierarchy.filter(row => row.organizationId === organizationId)
					.map(({ ancestorDepartmentId, descendantDepartmentId, depth }): ClosureRow => ({
						ancestorDepartmentId,
						descendantDepartmentId,
						depth,
					})),
			);
		},
		replaceForOrganization(organizationId, rows) {
			const current = getTables();
			for (const row of rows) {
				if (!departmentInOrganization(organizationId, row.ancestorDepartmentId)) {
					return Promise.reject(
						foreignKeyViolation("department_hierarchy", "ancestor_department_id", row.ancestorDepartmentId),
					);
				}
				if (!departmentInOrganization(organizationId, row.descendantDepartmentId)) {
					return Promise.reject(
						foreignKeyViolation("department_hierarchy", "descendant_department_id", row.descendantDepartmentId),
					);
				}
			}
			current.hierarchy = [
				...current.hierarchy.filter(row => row.organizationId !== organizationId),
				...rows.map(row => ({ ...row, organizationId })),
			];
			return Promise.resolve();
		},
	};

	const departmentAccessScopeDao: DepartmentAccessScopeDao = {
		listByOrganization(organizationId) {
			return Promise.resolve(
				[...getTables().accessScopes.values()].filter(s => s.organizationId === organizationId),
			);
		},
		findByDepartmentIds(organizationId, departmentIds) {
			const wanted = new Set(departmentIds);
			return Promise.resolve(
				[...getTables().accessScopes.values()].filter(
					s => s.organizationId === organizationId && wanted.has(s.departmentId),
				),
			);
		},
		upsert(scope) {
			if (!departmentInOrganization(scope.organizationId, scope.departmentId)) {
				return Promise.reject(foreignKeyViolation("department_access_scopes", "department_id", scope.departmentId));
			}
			const { accessScopes } = getTables();
			const existing = accessScopes.get(scope.departmentId);
			accessScopes.set(scope.departmentId, {
				...scope,
				createdAt: existing?.createdAt ?? now(),
				updatedAt: now(),
			});
			return Promise.resolve();
		},
	};

	const roleDao: RoleDao = {
		listByOrganization(organizationId) {
			return Promise.resolve(
				[...getTables().roles.values()]
					.filter(r => r.organizationId === organizationId)
					.sort((a, b) => b.level - a.level || a.name.localeCompare(b.name)),
			);
		},
		create(role) {
			const { roles } = getTables();
			for (const existing of roles.values()) {
				if (existing.id === role.id) {
					return Promise.reject(uniqueViolation("roles", role.id));
				}
				if (existing.organizationId === role.organizationId && existing.externalId === role.externalId) {
					return Promise.reject(uniqueViolation("roles", role.externalId));
				}
			}
			const created: Role = { ...role, createdAt: now(), updatedAt: now() };
			roles.set(created.id, created);
			return Promise.resolve(created);
		},
		update(organizationId, id, updates) {
			const { roles } = getTables();
			const existing = roles.get(id);
			if (existing?.organizationId !== organizationId) {
				return Promise.resolve(false);
			}
			roles.set(id, { ...existing, ...updates, updatedAt: now() });
			return Promise.resolve(true);
		},
	};

	const orgUserDao: OrgUserDao = {
		listByOrganization(organizationId) {
			return Promise.resolve(
				[...getTables().users.values()]
					.filter(u => u.organizationId === organizationId)
					.sort((a, b) => a.name.localeCompare(b.name)),
			);
		},
		create(user) {
			const { users } = getTables();
			for (const existing of users.values()) {
				if (existing.id === user.id) {
					return Promise.reject(uniqueViolation("org_users", user.id));
				}
				if (existing.organizationId === user.organizationId && existing.externalId === user.externalId) {
					return Promise.reject(uniqueViolation("org_users", user.externalId));
				}
			}
			const created: OrgUser = { ...user, createdAt: now(), updatedAt: now() };
			users.set(created.id, created);
			return Promise.resolve(created);
		},
		update(organizationId, id, updates) {
			const { users } = getTables();
			const existing = users.get(id);
			if (existing?.organizationId !== organizationId) {
				return Promise.resolve(false);
			}
			users.set(id, { ...existing, ...updates, updatedAt: now() });
			return Promise.resolve(true);
		},
	};

	function activeAssignmentsIn(organizationId: string): Array<UserDepartment> {
		return [...getTables().userDepartments.values()].filter(
			a => a.endedAt === null && departmentInOrganization(organizationId, a.departmentId),
		);
	}

	const userDepartmentDao: UserDepartmentDao = {
		getMaxRoleLevel(organizationId, userId) {
			const { roles } = getTables();
			let maxLevel: number | undefined;
			for (const assignment of activeAssignmentsIn(organizationId)) {
				const role = assignment.roleId === null ? undefined : roles.get(assignment.roleId);
				if (assignment.userId === userId && role?.organizationId === organizationId) {
					maxLevel = maxLevel === undefined ? role.level : Math.max(maxLevel, role.level);
				}
			}
			return Promise.resolve(maxLevel);
		},
		listActiveDepartmentIds(organizationId, userId) {
			const departmentIds = activeAssignmentsIn(organizationId)
				.filter(a => a.userId === userId && departmentInOrganization(organizationId, a.departmentId)?.isActive)
				.map(a => a.departmentId);
			return Promise.resolve([...new Set(departmentIds)]);
		},
		listActiveByOrganization(organizationId) {
			return Promise.resolve(activeAssignmentsIn(organizationId));
		},
		create(assignment) {
			const { userDepartments, users, departments, roles } = getTables();
			if (userDepartments.has(assignment.id)) {
				return Promise.reject(uniqueViolation("user_departments", assignment.id));
			}
			if (!users.has(assignment.userId)) {
				return Promise.reject(foreignKeyViolation("user_departments", "user_id", assignment.userId));
			}
			if (!departments.has(assignment.departmentId)) {
				return Promise.reject(foreignKeyViolation("user_departments", "department_id", assignment.departmentId));
			}
			if (assignment.roleId !== null && !roles.has(assignment.roleId)) {
				return Promise.reject(foreignKeyViolation("user_departments", "role_id", assignment.roleId));
			}
			const created: UserDepartment = { ...assignment, endedAt: null, createdAt: now(), updatedAt: now() };
			userDepartments.set(created.id, created);
			return Promise.resolve(created);
		},
		update(organizationId, id, updates) {
			const { userDepartments } = getTables();
			const existing = userDepartments.get(id);
			if (!existing || !departmentInOrganization(organizationId, existing.departmentId)) {
				return Promise.resolve(false);
			}
			userDepartments.set(id, { ...existing, ...updates, updatedAt: now() });
			return Promise.resolve(true);
		},
		end(organizationId, ids, endedAt) {
			const { userDepartments } = getTables();
			let count = 0;
			for (const id of ids) {
				const existing = userDepartments.get(id);
				if (existing && existing.endedAt === null && departmentInOrganization(organizationId, existing.departmentId)) {
					userDepartments.set(id, { ...existing, endedAt, updatedAt: now() });
					count++;
				}
			}
			return Promise.resolve(count);
		},
	};

	return {
		organizationDao,
		departmentDao,
		departmentHierarchyDao,
		departmentAccessScopeDao,
		roleDao,
		orgUserDao,
		userDepartmentDao,
	};
}

function createMemorySyncLogDao(syncLogs: Map<string, OrgChartSyncLog>, now: () => Date): OrgChartSyncLogDao {
	function find(organizationId: string, syncId: string): OrgChartSyncLog | undefined {
		const syncLog = syncLogs.get(syncId);
		return syncLog?.organizationId === organizationId ? syncLog : undefined;
	}

	return {
		create(syncLog) {
			if (syncLogs.has(syncLog.syncId)) {
				return Promise.reject(uniqueViolation("org_chart_sync_logs", syncLog.syncId));
			}
			const created: OrgChartSyncLog = {
				...syncLog,
				completedAt: null,
				durationMs: null,
				departmentsAdded: 0,
				departmentsUpdated: 0,
				departmentsDeleted: 0,
				usersAdded: 0,
				usersUpdated: 0,
				usersDeleted: 0,
				rolesAdded: 0,
				rolesUpdated: 0,
				errorMessage: null,
				errorDetails: null,
				createdAt: now(),
				updatedAt: now(),
			};
			syncLogs.set(created.syncId, created);
			return Promise.resolve(created);
		},
		update(organizationId, syncId, updates) {
			const existing = find(organizationId, syncId);
			if (!existing) {
				return Promise.resolve(false);
			}
			syncLogs.set(syncId, { ...existing, ...updates, updatedAt: now() });
			return Promise.resolve(true);
		},
		findBySyncId(organizationId, syncId) {
			return Promise.resolve(find(organizationId, syncId));
		},
		listRecent(organizationId, limit) {
			return Promise.resolve(
				[...syncLogs.values()]
					.filter(l => l.organizationId === organizationId)
					.sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
					.slice(0, limit),
			);
		},
		failStale(organizationId, startedBefore, errorMessage, completedAt) {
			let count = 0;
			for (const existing of syncLogs.values()) {
				if (
					existing.organizationId === organizationId &&
					(existing.status === "pending" || existing.status === "in_progress") &&
					existing.startedAt < startedBefore
				) {
					syncLogs.set(existing.syncId, { ...existing, status: "failed", errorMessage, completedAt, updatedAt: now() });
					count++;
				}
			}
			return Promise.resolve(count);
		},
	};
}
