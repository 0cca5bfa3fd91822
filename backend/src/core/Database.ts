/**
 * Database - DAO factory and transaction boundary.
 *
 * Organization data (departments, closure rows, access scopes, roles, users and
 * assignments) is written only by the org-chart sync, and only through
 * `transaction()`. Everything else reads through the DAOs directly.
 *
 * @module Database
 */

import { createDepartmentAccessScopeDao, type DepartmentAccessScopeDao } from "../dao/DepartmentAccessScopeDao";
import { createDepartmentDao, type DepartmentDao } from "../dao/DepartmentDao";
import { createDepartmentHierarchyDao, type DepartmentHierarchyDao } from "../dao/DepartmentHierarchyDao";
import { createOrgChartSyncLogDao, type OrgChartSyncLogDao } from "../dao/OrgChartSyncLogDao";
import { createOrganizationDao, type OrganizationDao } from "../dao/OrganizationDao";
import { createOrgUserDao, type OrgUserDao } from "../dao/OrgUserDao";
import { createRoleDao, type RoleDao } from "../dao/RoleDao";
import { createUserDepartmentDao, type UserDepartmentDao } from "../dao/UserDepartmentDao";
import { defineDepartments } from "../model/Department";
import { defineDepartmentAccessScopes } from "../model/DepartmentAccessScope";
import { defineDepartmentHierarchy } from "../model/DepartmentHierarchy";
import { defineOrganizations } from "../model/Organization";
import { defineOrgChartSyncLogs } from "../model/OrgChartSyncLog";
import { defineOrgUsers } from "../model/OrgUser";
import { defineRoles } from "../model/Role";
import { defineUserDepartments } from "../model/UserDepartment";
import { getLog } from "../util/Logger";
import { QueryTypes, type Sequelize, type Transaction } from "sequelize";

const log = getLog(import.meta);

/** DAOs over organization data. Inside `Database.transaction` they are bound to that transaction. */
export interface OrgDaos {
	readonly organizationDao: OrganizationDao;
	readonly departmentDao: DepartmentDao;
	readonly departmentHierarchyDao: DepartmentHierarchyDao;
	readonly departmentAccessScopeDao: DepartmentAccessScopeDao;
	readonly roleDao: RoleDao;
	readonly orgUserDao: OrgUserDao;
	readonly userDepartmentDao: UserDepartmentDao;
}

export interface Database extends OrgDaos {
	/** Sync logs are written outside the sync transaction so a failed run stays recorded */
	readonly orgChartSyncLogDao: OrgChartSyncLogDao;

	/**
	 * Runs `fn` in one transaction holding the organization's sync lock. Writes
	 * become visible only if `fn` resolves; a rejection rolls everything back.
	 */
	transaction<T>(organizationId: string, fn: (daos: OrgDaos) => Promise<T>): Promise<T>;

	/** Releases connections */
	close(): Promise<void>;
}

export interface CreateDatabaseOptions {
	/** Create missing tables with sequelize.sync() */
	syncModels?: boolean;
}

/** Key of the transaction-scoped advisory lock that serializes syncs of one organization. */
export function getSyncLockKey(organizationId: string): string {
	return `org-sync:${organizationId}`;
}

function createOrgDaos(sequelize: Sequelize, transaction?: Transaction): OrgDaos {
	return {
		organizationDao: createOrganizationDao(sequelize, transaction),
		departmentDao: createDepartmentDao(sequelize, transaction),
		departmentHierarchyDao: createDepartmentHierarchyDao(sequelize, transaction),
		departmentAccessScopeDao: createDepartmentAccessScopeDao(sequelize, transaction),
		roleDao: createRoleDao(sequelize, transaction),
		orgUserDao: createOrgUserDao(sequelize, transaction),
		userDepartmentDao: createUserDepartmentDao(sequelize, transaction),
	};
}

export async function createDatabase(sequelize: Sequelize, options: CreateDatabaseOptions = {}): Promise<Database> {
	// Sequelize sync() creates tables in definition order, so parents come first
	defineOrganizations(sequelize);
	defineDepartments(sequelize); // self-reference through parent_id
	defineDepartmentHierarchy(sequelize); // references departments
	defineDepartmentAccessScopes(sequelize); // references departments
	defineRoles(sequelize);
	defineOrgUsers(sequelize);
	defineUserDepartments(sequelize); // references org_users, departments, roles
	defineOrgChartSyncLogs(sequelize);

	if (options.syncModels) {
		for (const modelName of Object.keys(sequelize.models)) {
			await sequelize.models[modelName].sync();
			log.info("Synced model: %s", modelName);
		}
	}

	return {
		...createOrgDaos(sequelize),
		orgChartSyncLogDao: createOrgChartSyncLogDao(sequelize),
		transaction,
		close,
	};

	function transaction<T>(organizationId: string, fn: (daos: OrgDaos) => Promise<T>): Promise<T> {
		return sequelize.transaction(async t => {
			// Released on commit or rollback
			await sequelize.query("SELECT pg_advisory_xact_lock(hashtext(:lockKey))", {
				replacements: { lockKey: getSyncLockKey(organizationId) },
				type: QueryTypes.SELECT,
				transaction: t,
			});
			log.debug("Acquired sync lock for organization %s", organizationId);
			return fn(createOrgDaos(sequelize, t));
		});
	}

	async function close(): Promise<void> {
		await sequelize.close();
	}
}
