import { defineOrganizations } from "../model/Organization";
import type { NewOrganization, Organization } from "orgscope-common";
import type { Sequelize, Transaction } from "sequelize";

export interface OrganizationDao {
	/** Find an organization by id */
	findById(id: string): Promise<Organization | undefined>;

	/** Create an organization */
	create(organization: NewOrganization): Promise<Organization>;
}

export function createOrganizationDao(sequelize: Sequelize, transaction?: Transaction): OrganizationDao {
	const Organizations = defineOrganizations(sequelize);

	return {
		findById,
		create,
	};

	async function findById(id: string): Promise<Organization | undefined> {
		const organization = await Organizations.findByPk(id, { transaction });
		return organization ? organization.get({ plain: true }) : undefined;
	}

	async function create(organization: NewOrganization): Promise<Organization> {
		const created = await Organizations.create(organization as Organization, { transaction });
		return created.get({ plain: true });
	}
}
