import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * One (ancestor, descendant) pair of the closure table. Every department has a
 * self row at depth 0. Rows are rebuilt by the org-chart sync and never edited
 * by hand.
 */
export interface DepartmentHierarchy {
	readonly organizationId: string;
	readonly ancestorDepartmentId: string;
	readonly descendantDepartmentId: string;
	readonly depth: number;
}

export function defineDepartmentHierarchy(sequelize: Sequelize): ModelDef<DepartmentHierarchy> {
	const existing = sequelize.models?.department_hierarchy;
	if (existing) {
		return existing as ModelDef<DepartmentHierarchy>;
	}
	return sequelize.define("department_hierarchy", schema, {
		timestamps: false,
		underscored: true,
		tableName: "department_hierarchy",
		indexes: [
			{ name: "idx_department_hierarchy_ancestor", fields: ["organization_id", "ancestor_department_id", "depth"] },
			{
				name: "idx_department_hierarchy_descendant",
				fields: ["organization_id", "descendant_department_id", "depth"],
			},
		],
	});
}

const schema = {
	organizationId: {
		type: DataTypes.UUID,
		allowNull: false,
		references: {
			model: "organizations",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	ancestorDepartmentId: {
		type: DataTypes.UUID,
		primaryKey: true,
		references: {
			model: "departments",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	descendantDepartmentId: {
		type: DataTypes.UUID,
		primaryKey: true,
		references: {
			model: "departments",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	depth: {
		type: DataTypes.INTEGER,
		allowNull: false,
	},
};
