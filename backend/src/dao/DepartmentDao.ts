import { defineDepartments, type Department, type NewDepartment, type UpdateDepartment } from "../model/Department";
import type { Sequelize, Transaction } from "sequelize";

export interface DepartmentDao {
	/** All departments of an organization, active or not, shallowest first */
	listByOrganization(organizationId: string): Promise<Array<Department>>;

	/** Ids of the organization's active departments */
	listActiveIds(organizationId: string): Promise<Array<string>>;

	/** A department of the organization, active or not */
	findById(organizationId: string, id: string): Promise<Department | undefined>;

	/** Ids of the active departments directly under `parentId`; `null` lists the roots */
	listActiveChildIds(organizationId: string, parentId: string | null): Promise<Array<string>>;

	/** Create a department with a caller-assigned id */
	create(department: NewDepartment): Promise<Department>;

	/** Update a department; false when it does not exist in the organization */
	update(organizationId: string, id: string, updates: UpdateDepartment): Promise<boolean>;
}

export function createDepartmentDao(sequelize: Sequelize, transaction?: Transaction): DepartmentDao {
	const Departments = defineDepartments(sequelize);

	return {
		listByOrganization,
		listActiveIds,
		findById,
		listActiveChildIds,
		create,
		update,
	};

	async function listByOrganization(organizationId: string): Promise<Array<Department>> {
		const departments = await Departments.findAll({
			where: { organizationId },
			order: [
				["level", "ASC"],
				["displayOrder", "ASC"],
				["name", "ASC"],
			],
			transaction,
		});
		return departments.map(d => d.get({ plain: true }));
	}

	async function listActiveIds(organizationId: string): Promise<Array<string>> {
		const departments = await Departments.findAll({
			attributes: ["id"],
			where: { organizationId, isActive: true },
			transaction,
		});
		return departments.map(d => d.get("id"));
	}

	async function findById(organizationId: string, id: string): Promise<Department | undefined> {
		const department = await Departments.findOne({ where: { id, organizationId }, transaction });
		return department ? department.get({ plain: true }) : undefined;
	}

	async function listActiveChildIds(organizationId: string, parentId: string | null): Promise<Array<string>> {
		const departments = await Departments.findAll({
			attributes: ["id"],
			where: { organizationId, parentId, isActive: true },
			transaction,
		});
		return departments.map(d => d.get("id"));
	}

	async function create(department: NewDepartment): Promise<Department> {
		const created = await Departments.create(department as Department, { transaction });
		return created.get({ plain: true });
	}

	async function update(organizationId: string, id: string, updates: UpdateDepartment): Promise<boolean> {
		const [count] = await Departments.update(updates, { where: { id, organizationId }, transaction });
		return count > 0;
	}
}
