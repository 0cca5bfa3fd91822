import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Per-organization role. `level` (1-6) decides how far down the department tree
 * a member sees; see `ROLE_LEVEL` in orgscope-common.
 */
export interface Role {
	readonly id: string;
	readonly organizationId: string;
	readonly externalId: string;
	readonly name: string;
	readonly level: number;
	readonly description: string | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewRole = Omit<Role, "createdAt" | "updatedAt">;

export type UpdateRole = Partial<Pick<Role, "name" | "level" | "description">>;

export function defineRoles(sequelize: Sequelize): ModelDef<Role> {
	const existing = sequelize.models?.role;
	if (existing) {
		return existing as ModelDef<Role>;
	}
	return sequelize.define("role", schema, {
		timestamps: true,
		underscored: true,
		tableName: "roles",
		indexes: [{ name: "roles_org_external_id_key", unique: true, fields: ["organization_id", "external_id"] }],
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
		type: DataTypes.STRING(100),
		allowNull: false,
	},
	level: {
		type: DataTypes.INTEGER,
		allowNull: false,
		validate: { min: 1, max: 6 },
	},
	description: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
};
