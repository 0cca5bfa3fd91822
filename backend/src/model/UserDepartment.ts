import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Assignment of a user to a department. Ending an assignment sets `endedAt`;
 * rows are kept as history.
 */
export interface UserDepartment {
	readonly id: string;
	readonly userId: string;
	readonly departmentId: string;
	readonly roleId: string | null;
	readonly isPrimary: boolean;
	readonly roleInDept: string | null;
	readonly startedAt: Date | null;
	/** `null` while the assignment is active */
	readonly endedAt: Date | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewUserDepartment = Omit<UserDepartment, "endedAt" | "createdAt" | "updatedAt">;

export type UpdateUserDepartment = Partial<Pick<UserDepartment, "roleId" | "isPrimary" | "roleInDept" | "startedAt">>;

export function defineUserDepartments(sequelize: Sequelize): ModelDef<UserDepartment> {
	const existing = sequelize.models?.user_department;
	if (existing) {
		return existing as ModelDef<UserDepartment>;
	}
	return sequelize.define("user_department", schema, {
		timestamps: true,
		underscored: true,
		tableName: "user_departments",
		indexes: [
			{ name: "idx_user_departments_user_active", fields: ["user_id", "ended_at"] },
			{ name: "idx_user_departments_department", fields: ["department_id"] },
		],
	});
}

const schema = {
	id: {
		type: DataTypes.UUID,
		primaryKey: true,
	},
	userId: {
		type: DataTypes.UUID,
		allowNull: false,
		references: {
			model: "org_users",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	departmentId: {
		type: DataTypes.UUID,
		allowNull: false,
		references: {
			model: "departments",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	roleId: {
		type: DataTypes.UUID,
		allowNull: true,
		references: {
			model: "roles",
			key: "id",
		},
		onDelete: "SET NULL",
	},
	isPrimary: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
	roleInDept: {
		type: DataTypes.STRING(255),
		allowNull: true,
	},
	startedAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
	endedAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
};
