import { defineOrgUsers, type NewOrgUser, type OrgUser, type UpdateOrgUser } from "../model/OrgUser";
import type { Sequelize, Transaction } from "sequelize";

export interface OrgUserDao {
	/** All users of an organization, active or not */
	listByOrganization(organizationId: string): Promise<Array<OrgUser>>;

	/** Create a user with a caller-assigned id */
	create(user: NewOrgUser): Promise<OrgUser>;

	/** Update a user; false when it does not exist in the organization */
	update(organizationId: string, id: string, updates: UpdateOrgUser): Promise<boolean>;
}

export function createOrgUserDao(sequelize: Sequelize, transaction?: Transaction): OrgUserDao {
	const OrgUsers = defineOrgUsers(sequelize);

	return {
		listByOrganization,
		create,
		update,
	};

	async function listByOrganization(organizationId: string): Promise<Array<OrgUser>> {
		const users = await OrgUsers.findAll({ where: { organizationId }, order: [["name", "ASC"]], transaction });
		return users.map(u => u.get({ plain: true }));
	}

	async function create(user: NewOrgUser): Promise<OrgUser> {
		const created = await OrgUsers.create(user as OrgUser, { transaction });
		return created.get({ plain: true });
	}

	async function update(organizationId: string, id: string, updates: UpdateOrgUser): Promise<boolean> {
		const [count] = await OrgUsers.update(updates, { where: { id, organizationId }, transaction });
		return count > 0;
	}
}
