import {
	type DepartmentAccessScope,
	defineDepartmentAccessScopes,
	type NewDepartmentAccessScope,
} from "../model/DepartmentAccessScope";
import { Op, type Sequelize, type Transaction } from "sequelize";

export interface DepartmentAccessScopeDao {
	/** All access scopes of an organization */
	listByOrganization(organizationId: string): Promise<Array<DepartmentAccessScope>>;

	/** Access scopes of the given departments; departments without one are skipped */
	findByDepartmentIds(organizationId: string, departmentIds: Array<string>): Promise<Array<DepartmentAccessScope>>;

	/** Insert or replace the scope of one department */
	upsert(scope: NewDepartmentAccessScope): Promise<void>;
}

export function createDepartmentAccessScopeDao(
	sequelize: Sequelize,
	transaction?: Transaction,
): DepartmentAccessScopeDao {
	const Scopes = defineDepartmentAccessScopes(sequelize);

	return {
		listByOrganization,
		findByDepartmentIds,
		upsert,
	};

	async function listByOrganization(organizationId: string): Promise<Array<DepartmentAccessScope>> {
		const scopes = await Scopes.findAll({ where: { organizationId }, transaction });
		return scopes.map(s => s.get({ plain: true }));
	}

	async function findByDepartmentIds(
		organizationId: string,
		departmentIds: Array<string>,
	): Promise<Array<DepartmentAccessScope>> {
		if (departmentIds.length === 0) {
			return [];
		}
		const scopes = await Scopes.findAll({
			where: { organizationId, departmentId: { [Op.in]: departmentIds } },
			transaction,
		});
		return scopes.map(s => s.get({ plain: true }));
	}

	async function upsert(scope: NewDepartmentAccessScope): Promise<void> {
		await Scopes.upsert(scope as DepartmentAccessScope, { transaction });
	}
}
