import { defineRoles, type NewRole, type Role, type UpdateRole } from "../model/Role";
import type { Sequelize, Transaction } from "sequelize";

export interface RoleDao {
	/** All roles of an organization, highest level first */
	listByOrganization(organizationId: string): Promise<Array<Role>>;

	/** Create a role with a caller-assigned id */
	create(role: NewRole): Promise<Role>;

	/** Update a role; false when it does not exist in the organization */
	update(organizationId: string, id: string, updates: UpdateRole): Promise<boolean>;
}

export function createRoleDao(sequelize: Sequelize, transaction?: Transaction): RoleDao {
	const Roles = defineRoles(sequelize);

	return {
		listByOrganization,
		create,
		update,
	};

	async function listByOrganization(organizationId: string): Promise<Array<Role>> {
		const roles = await Roles.findAll({
			where: { organizationId },
			order: [
				["level", "DESC"],
				["name", "ASC"],
			],
			transaction,
		});
		return roles.map(r => r.get({ plain: true }));
	}

	async function create(role: NewRole): Promise<Role> {
		const created = await Roles.create(role as Role, { transaction });
		return created.get({ plain: true });
	}

	async function update(organizationId: string, id: string, updates: UpdateRole): Promise<boolean> {
		const [count] = await Roles.update(updates, { where: { id, organizationId }, transaction });
		return count > 0;
	}
}
