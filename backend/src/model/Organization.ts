import type { ModelDef } from "../util/ModelDef";
import type { Organization } from "orgscope-common";
import { DataTypes, type Sequelize } from "sequelize";

export function defineOrganizations(sequelize: Sequelize): ModelDef<Organization> {
	const existing = sequelize.models?.organization;
	if (existing) {
		return existing as ModelDef<Organization>;
	}
	return sequelize.define("organization", schema, {
		timestamps: true,
		underscored: true,
		tableName: "organizations",
	});
}

const schema = {
	id: {
		type: DataTypes.UUID,
		primaryKey: true,
	},
	name: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	code: {
		type: DataTypes.STRING(50),
		allowNull: true,
		unique: "organizations_code_key",
	},
	plan: {
		type: DataTypes.STRING(20),
		allowNull: false,
		defaultValue: "free",
	},
	isActive: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: true,
	},
};
