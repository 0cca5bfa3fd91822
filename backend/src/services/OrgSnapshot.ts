import type { OrgDaos } from "../core/Database";
import type { Department } from "../model/Department";
import type { DepartmentAccessScope } from "../model/DepartmentAccessScope";
import type { OrgUser } from "../model/OrgUser";
import type { Role } from "../model/Role";
import type { UserDepartment } from "../model/UserDepartment";
import type { Organization } from "orgscope-common";

/** Persisted state of one organization as the sync sees it at the start of its transaction. */
export interface OrgSnapshot {
	readonly organizationId: string;
	readonly organization: Organization | undefined;
	/** Active and inactive */
	readonly departments: Array<Department>;
	readonly roles: Array<Role>;
	/** Active and inactive */
	readonly users: Array<OrgUser>;
	/** Active assignments only */
	readonly assignments: Array<UserDepartment>;
	readonly accessScopes: Array<DepartmentAccessScope>;
}

export async function loadOrgSnapshot(daos: OrgDaos, organizationId: string): Promise<OrgSnapshot> {
	const [organization, departments, roles, users, assignments, accessScopes] = await Promise.all([
		daos.organizationDao.findById(organizationId),
		daos.departmentDao.listByOrganization(organizationId),
		daos.roleDao.listByOrganization(organizationId),
		daos.orgUserDao.listByOrganization(organizationId),
		daos.userDepartmentDao.listActiveByOrganization(organizationId),
		daos.departmentAccessScopeDao.listByOrganization(organizationId),
	]);
	return { organizationId, organization, departments, roles, users, assignments, accessScopes };
}
