import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Node of an organization's department tree. `parentId` is the source of truth
 * for the tree; `level`, `path` and the closure rows are derived from it.
 */
export interface Department {
	readonly id: string;
	readonly organizationId: string;
	/** Stable identifier assigned by the upstream org-chart provider */
	readonly externalId: string;
	readonly name: string;
	readonly code: string | null;
	readonly parentId: string | null;
	/** Depth in the tree, roots are 1 */
	readonly level: number;
	/** Sanitized code segments from the root down, joined with "." */
	readonly path: string;
	readonly displayOrder: number;
	readonly description: string | null;
	/** Departments dropped from the upstream feed are deactivated, never deleted */
	readonly isActive: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

/** Ids are assigned by the caller so children can reference parents created in the same run. */
export type NewDepartment = Omit<Department, "createdAt" | "updatedAt">;

export type UpdateDepartment = Partial<
	Pick<Department, "name" | "code" | "parentId" | "level" | "path" | "displayOrder" | "description" | "isActive">
>;

export function defineDepartments(sequelize: Sequelize): ModelDef<Department> {
	const existing = sequelize.models?.department;
	if (existing) {
		return existing as ModelDef<Department>;
	}
	return sequelize.define("department", schema, {
		timestamps: true,
		underscored: true,
		tableName: "departments",
		indexes: [
			{ name: "departments_org_external_id_key", unique: true, fields: ["organization_id", "external_id"] },
			{ name: "idx_departments_org_parent", fields: ["organization_id", "parent_id"] },
		],
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
	code: {
		type: DataTypes.STRING(100),
		allowNull: true,
	},
	parentId: {
		type: DataTypes.UUID,
		allowNull: true,
		references: {
			model: "departments",
			key: "id",
		},
		onDelete: "SET NULL",
	},
	level: {
		type: DataTypes.INTEGER,
		allowNull: false,
		defaultValue: 1,
	},
	path: {
		type: DataTypes.TEXT,
		allowNull: false,
	},
	displayOrder: {
		type: DataTypes.INTEGER,
		allowNull: false,
		defaultValue: 0,
	},
	description: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
	isActive: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: true,
	},
};
