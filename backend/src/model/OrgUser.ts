import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/** Employee known to an organization through the org-chart feed. */
export interface OrgUser {
	readonly id: string;
	readonly organizationId: string;
	readonly externalId: string;
	readonly name: string;
	readonly email: string | null;
	readonly isActive: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewOrgUser = Omit<OrgUser, "createdAt" | "updatedAt">;

export type UpdateOrgUser = Partial<Pick<OrgUser, "name" | "email" | "isActive">>;

export function defineOrgUsers(sequelize: Sequelize): ModelDef<OrgUser> {
	const existing = sequelize.models?.org_user;
	if (existing) {
		return existing as ModelDef<OrgUser>;
	}
	return sequelize.define("org_user", schema, {
		timestamps: true,
		underscored: true,
		tableName: "org_users",
		indexes: [{ name: "org_users_org_external_id_key", unique: true, fields: ["organization_id", "external_id"] }],
	});
}

const schema = {
	id: {
		type: DataTypes.UUID,
		primaryKey: true,
	},
	organizationId: {
		type: DataTypes.UUID,
		allowNull: false,
		references: {
			model: "organizations",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	externalId: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	name: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	email: {
		type: DataTypes.STRING(255),
		allowNull: true,
	},
	isActive: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: true,
	},
};
