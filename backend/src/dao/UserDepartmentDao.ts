import {
	defineUserDepartments,
	type NewUserDepartment,
	type UpdateUserDepartment,
	type UserDepartment,
} from "../model/UserDepartment";
import { Op, QueryTypes, type Sequelize, type Transaction } from "sequelize";

export interface UserDepartmentDao {
	/**
	 * Highest role level over the user's active assignments in the organization,
	 * `undefined` when no assignment resolves to a role.
	 */
	getMaxRoleLevel(organizationId: string, userId: string): Promise<number | undefined>;

	/** Active departments the user is actively assigned to */
	listActiveDepartmentIds(organizationId: string, userId: string): Promise<Array<string>>;

	/** Every active assignment in the organization */
	listActiveByOrganization(organizationId: string): Promise<Array<UserDepartment>>;

	/** Create an active assignment with a caller-assigned id */
	create(assignment: NewUserDepartment): Promise<UserDepartment>;

	/** Update an assignment; false when it does not exist in the organization */
	update(organizationId: string, id: string, updates: UpdateUserDepartment): Promise<boolean>;

	/** End the given active assignments; returns how many were ended */
	end(organizationId: string, ids: Array<string>, endedAt: Date): Promise<number>;
}

export function createUserDepartmentDao(sequelize: Sequelize, transaction?: Transaction): UserDepartmentDao {
	const UserDepartments = defineUserDepartments(sequelize);

	return {
		getMaxRoleLevel,
		listActiveDepartmentIds,
		listActiveByOrganization,
		create,
		update,
		end,
	};

	/** Assignments carry no organization id; they belong to it through their department. */
	function inOrganization(organizationId: string) {
		return {
			[Op.in]: sequelize.literal(
				`(SELECT id FROM departments WHERE organization_id = ${sequelize.escape(organizationId)})`,
			),
		};
	}

	async function getMaxRoleLevel(organizationId: string, userId: string): Promise<number | undefined> {
		const rows = await sequelize.query<{ maxLevel: number | null }>(
			`SELECT MAX(r.level) AS "maxLevel"
			 FROM user_departments ud
			 INNER JOIN departments d ON d.id = ud.department_id
			 INNER JOIN roles r ON r.id = ud.role_id
			 WHERE ud.user_id = :userId
			   AND ud.ended_at IS NULL
			   AND d.organization_id = :organizationId
			   AND r.organization_id = :organizationId`,
			{ replacements: { organizationId, userId }, type: QueryTypes.SELECT, transaction },
		);
		const maxLevel = rows[0]?.maxLevel;
		return maxLevel === null || maxLevel === undefined ? undefined : Number(maxLevel);
	}

	async function listActiveDepartmentIds(organizationId: string, userId: string): Promise<Array<string>> {
		const rows = await sequelize.query<{ departmentId: string }>(
			`SELECT DISTINCT ud.department_id AS "departmentId"
			 FROM user_departments ud
			 INNER JOIN departments d ON d.id = ud.department_id
			 WHERE ud.user_id = :userId
			   AND ud.ended_at IS NULL
			   AND d.organization_id = :organizationId
			   AND d.is_active = true`,
			{ replacements: { organizationId, userId }, type: QueryTypes.SELECT, transaction },
		);
		return rows.map(r => r.departmentId);
	}

	async function listActiveByOrganization(organizationId: string): Promise<Array<UserDepartment>> {
		const assignments = await UserDepartments.findAll({
			where: { departmentId: inOrganization(organizationId), endedAt: null },
			order: [["createdAt", "ASC"]],
			transaction,
		});
		return assignments.map(a => a.get({ plain: true }));
	}

	async function create(assignment: NewUserDepartment): Promise<UserDepartment> {
		const values: NewUserDepartment & Pick<UserDepartment, "endedAt"> = { ...assignment, endedAt: null };
		const created = await UserDepartments.create(values as UserDepartment, { transaction });
		return created.get({ plain: true });
	}

	async function update(organizationId: string, id: string, updates: UpdateUserDepartment): Promise<boolean> {
		const [count] = await UserDepartments.update(updates, {
			where: { id, departmentId: inOrganization(organizationId) },
			transaction,
		});
		return count > 0;
	}

	async function end(organizationId: string, ids: Array<string>, endedAt: Date): Promise<number> {
		if (ids.length === 0) {
			return 0;
		}
		const [count] = await UserDepartments.update(
			{ endedAt },
			{
				where: { id: { [Op.in]: ids }, departmentId: inOrganization(organizationId), endedAt: null },
				transaction,
			},
		);
		return count;
	}
}
