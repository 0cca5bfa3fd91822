import type { ClosureRow } from "../hierarchy/DepartmentGraph";
import { defineDepartmentHierarchy } from "../model/DepartmentHierarchy";
import { QueryTypes, type Sequelize, type Transaction } from "sequelize";

export interface DepartmentHierarchyDao {
	/**
	 * Active strict descendants (depth > 0) of any of the given departments,
	 * optionally limited to `maxDepth` levels below them. One closure-table query.
	 */
	listDescendantIds(organizationId: string, ancestorIds: Array<string>, maxDepth?: number): Promise<Array<string>>;

	/** Active strict ancestors of any of the given departments, optionally limited to `maxDepth` levels up */
	listAncestorIds(organizationId: string, descendantIds: Array<string>, maxDepth?: number): Promise<Array<string>>;

	/** Every closure row of the organization */
	listByOrganization(organizationId: string): Promise<Array<ClosureRow>>;

	/** Replace all closure rows of the organization */
	replaceForOrganization(organizationId: string, rows: Array<ClosureRow>): Promise<void>;
}

export function createDepartmentHierarchyDao(sequelize: Sequelize, transaction?: Transaction): DepartmentHierarchyDao {
	const Hierarchy = defineDepartmentHierarchy(sequelize);

	return {
		listDescendantIds,
		listAncestorIds,
		listByOrganization,
		replaceForOrganization,
	};

	async function listRelated(
		organizationId: string,
		ids: Array<string>,
		from: "ancestor" | "descendant",
		maxDepth: number | undefined,
	): Promise<Array<string>> {
		if (ids.length === 0) {
			return [];
		}
		const to = from === "ancestor" ? "descendant" : "ancestor";
		const depthLimit = maxDepth === undefined ? "" : "AND h.depth <= :maxDepth";
		const rows = await sequelize.query<{ departmentId: string }>(
			`SELECT DISTINCT h.${to}_department_id AS "departmentId"
			 FROM department_hierarchy h
			 INNER JOIN departments d ON d.id = h.${to}_department_id
			 WHERE h.organization_id = :organizationId
			   AND h.${from}_department_id IN (:ids)
			   AND h.depth > 0 ${depthLimit}
			   AND d.organization_id = :organizationId
			   AND d.is_active = true`,
			{
				replacements: maxDepth === undefined ? { organizationId, ids } : { organizationId, ids, maxDepth },
				type: QueryTypes.SELECT,
				transaction,
			},
		);
		return rows.map(r => r.departmentId);
	}

	function listDescendantIds(
		organizationId: string,
		ancestorIds: Array<string>,
		maxDepth?: number,
	): Promise<Array<string>> {
		return listRelated(organizationId, ancestorIds, "ancestor", maxDepth);
	}

	function listAncestorIds(
		organizationId: string,
		descendantIds: Array<string>,
		maxDepth?: number,
	): Promise<Array<string>> {
		return listRelated(organizationId, descendantIds, "descendant", maxDepth);
	}

	async function listByOrganization(organizationId: string): Promise<Array<ClosureRow>> {
		const rows = await Hierarchy.findAll({
			attributes: ["ancestorDepartmentId", "descendantDepartmentId", "depth"],
			where: { organizationId },
			transaction,
		});
		return rows.map(r => {
			const { ancestorDepartmentId, descendantDepartmentId, depth } = r.get({ plain: true });
			return { ancestorDepartmentId, descendantDepartmentId, depth };
		});
	}

	async function replaceForOrganization(organizationId: string, rows: Array<ClosureRow>): Promise<void> {
		await Hierarchy.destroy({ where: { organizationId }, transaction });
		if (rows.length > 0) {
			await Hierarchy.bulkCreate(
				rows.map(row => ({ ...row, organizationId })),
				{ transaction },
			);
		}
	}
}
