import type { OrgDaos } from "../core/Database";
import type { DepartmentAccessScope } from "../model/DepartmentAccessScope";
import { getLog } from "../util/Logger";
import { DEFAULT_ROLE_LEVEL, FULL_VISIBILITY_ROLE_LEVEL, ROLE_LEVEL } from "orgscope-common";

const log = getLog(import.meta);

export type AccessControlDaos = Pick<
	OrgDaos,
	"userDepartmentDao" | "departmentDao" | "departmentHierarchyDao" | "departmentAccessScopeDao"
>;

export interface AccessControlOptions {
	/** Let department access scopes widen the role-level result */
	accessScopeOverrides: boolean;
}

/**
 * Resolves which departments of an organization a user may see. Read-only.
 *
 * Missing data (no role, no assignment, unknown department) narrows what the
 * user sees and never raises; database errors propagate to the caller.
 */
export class AccessControlService {
	private readonly daos: AccessControlDaos;
	private readonly options: AccessControlOptions;

	constructor(daos: AccessControlDaos, options: AccessControlOptions = { accessScopeOverrides: false }) {
		this.daos = daos;
		this.options = options;
	}

	/**
	 * Highest role level over the user's active assignments in the organization,
	 * or general staff (2) when none resolves.
	 */
	async getUserRoleLevel(userId: string, organizationId: string): Promise<number> {
		const level = await this.daos.userDepartmentDao.getMaxRoleLevel(organizationId, userId);
		return level ?? DEFAULT_ROLE_LEVEL;
	}

	/**
	 * Ids of the active departments the user may see:
	 * - admin and above: every active department
	 * - no active assignment: nothing
	 * - otherwise their own departments, plus all descendants for managers and
	 *   direct children for team leads
	 *
	 * The result has no defined order.
	 */
	async computeAccessibleDepartments(userId: string, organizationId: string): Promise<Set<string>> {
		const level = await this.getUserRoleLevel(userId, organizationId);
		if (level >= FULL_VISIBILITY_ROLE_LEVEL) {
			return new Set(await this.daos.departmentDao.listActiveIds(organizationId));
		}

		const ownIds = await this.daos.userDepartmentDao.listActiveDepartmentIds(organizationId, userId);
		if (ownIds.length === 0) {
			log.debug("User %s has no active department in organization %s", userId, organizationId);
			return new Set();
		}

		const accessible = new Set(ownIds);
		if (level >= ROLE_LEVEL.MANAGER) {
			addAll(accessible, await this.daos.departmentHierarchyDao.listDescendantIds(organizationId, ownIds));
		} else if (level === ROLE_LEVEL.TEAM_LEAD) {
			addAll(accessible, await this.daos.departmentHierarchyDao.listDescendantIds(organizationId, ownIds, 1));
		}

		if (this.options.accessScopeOverrides) {
			const scopes = await this.daos.departmentAccessScopeDao.findByDepartmentIds(organizationId, ownIds);
			for (const scope of scopes) {
				addAll(accessible, await this.listScopeGrants(organizationId, scope));
			}
		}

		log.debug("User %s (level %d) can access %d departments", userId, level, accessible.size);
		return accessible;
	}

	/** Pass `accessible` when checking many departments for the same user. */
	async canAccessDepartment(
		userId: string,
		departmentId: string,
		organizationId: string,
		accessible?: ReadonlySet<string>,
	): Promise<boolean> {
		const departments = accessible ?? (await this.computeAccessibleDepartments(userId, organizationId));
		return departments.has(departmentId);
	}

	/** Tasks without a department are visible to every member of the organization. */
	canAccessTask(userId: string, taskDepartmentId: string | null | undefined, organizationId: string): Promise<boolean> {
		if (taskDepartmentId === null || taskDepartmentId === undefined) {
			return Promise.resolve(true);
		}
		return this.canAccessDepartment(userId, taskDepartmentId, organizationId);
	}

	/**
	 * Keeps the items the user may see: those without a department and those in
	 * an accessible one. The accessible set is computed once.
	 */
	async filterByAccessibleDepartments<T>(
		userId: string,
		organizationId: string,
		items: ReadonlyArray<T>,
		getDepartmentId: (item: T) => string | null | undefined,
	): Promise<Array<T>> {
		if (items.length === 0) {
			return [];
		}
		const accessible = await this.computeAccessibleDepartments(userId, organizationId);
		return items.filter(item => {
			const departmentId = getDepartmentId(item);
			return departmentId === null || departmentId === undefined || accessible.has(departmentId);
		});
	}

	private async listScopeGrants(organizationId: string, scope: DepartmentAccessScope): Promise<Array<string>> {
		const hierarchy = this.daos.departmentHierarchyDao;
		const maxDepth = scope.maxDepth ?? undefined;
		const granted: Array<string> = [];
		if (scope.canViewChildDepartments) {
			granted.push(...(await hierarchy.listDescendantIds(organizationId, [scope.departmentId], maxDepth)));
		}
		if (scope.canViewParentDepartments) {
			granted.push(...(await hierarchy.listAncestorIds(organizationId, [scope.departmentId], maxDepth)));
		}
		if (scope.canViewSiblingDepartments) {
			// The parent may be inactive; only the siblings returned must be active
			const department = await this.daos.departmentDao.findById(organizationId, scope.departmentId);
			if (department) {
				granted.push(...(await this.daos.departmentDao.listActiveChildIds(organizationId, department.parentId)));
			}
		}
		return granted;
	}
}

function addAll(target: Set<string>, ids: Iterable<string>): void {
	for (const id of ids) {
		target.add(id);
	}
}
