import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Per-department exceptions to the role-level visibility rules. Only consulted
 * when ACCESS_SCOPE_OVERRIDES_ENABLED is set, and then only to widen access.
 */
export interface DepartmentAccessScope {
	readonly departmentId: string;
	readonly organizationId: string;
	readonly canViewChildDepartments: boolean;
	readonly canViewSiblingDepartments: boolean;
	readonly canViewParentDepartments: boolean;
	/** How many levels the child/parent grants reach; `null` is unlimited */
	readonly maxDepth: number | null;
	readonly overrideConfidentialAccess: boolean;
	readonly overrideRestrictedAccess: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewDepartmentAccessScope = Omit<DepartmentAccessScope, "createdAt" | "updatedAt">;

export function defineDepartmentAccessScopes(sequelize: Sequelize): ModelDef<DepartmentAccessScope> {
	const existing = sequelize.models?.department_access_scope;
	if (existing) {
		return existing as ModelDef<DepartmentAccessScope>;
	}
	return sequelize.define("department_access_scope", schema, {
		timestamps: true,
		underscored: true,
		tableName: "department_access_scopes",
	});
}

const schema = {
	departmentId: {
		type: DataTypes.UUID,
		primaryKey: true,
		references: {
			model: "departments",
			key: "id",
		},
		onDelete: "CASCADE",
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
	canViewChildDepartments: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
	canViewSiblingDepartments: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
	canViewParentDepartments: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
	maxDepth: {
		type: DataTypes.INTEGER,
		allowNull: true,
	},
	overrideConfidentialAccess: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
	overrideRestrictedAccess: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
};
