import type { DepartmentAccessScope } from "../model/DepartmentAccessScope";
import type { ModelDef } from "../util/ModelDef";
import { createDepartmentAccessScopeDao, type DepartmentAccessScopeDao } from "./DepartmentAccessScopeDao";
import { Op, type Sequelize } from "sequelize";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("DepartmentAccessScopeDao", () => {
	let mockScopes: ModelDef<DepartmentAccessScope>;
	let scopeDao: DepartmentAccessScopeDao;

	beforeEach(() => {
		mockScopes = {
			findAll: vi.fn(),
			upsert: vi.fn(),
		} as unknown as ModelDef<DepartmentAccessScope>;

		const mockSequelize = {
			define: vi.fn(() => mockScopes),
			models: {},
		} as unknown as Sequelize;

		scopeDao = createDepartmentAccessScopeDao(mockSequelize);
	});

	it("finds scopes of the given departments", async () => {
		vi.mocked(mockScopes.findAll).mockResolvedValue([] as never);

		await scopeDao.findByDepartmentIds("org-1", ["d-1", "d-2"]);

		expect(mockScopes.findAll).toHaveBeenCalledWith({
			where: { organizationId: "org-1", departmentId: { [Op.in]: ["d-1", "d-2"] } },
			transaction: undefined,
		});
	});

	it("skips the query without departments", async () => {
		expect(await scopeDao.findByDepartmentIds("org-1", [])).toEqual([]);
		expect(mockScopes.findAll).not.toHaveBeenCalled();
	});

	it("upserts a scope", async () => {
		const scope = {
			departmentId: "d-1",
			organizationId: "org-1",
			canViewChildDepartments: true,
			canViewSiblingDepartments: false,
			canViewParentDepartments: false,
			maxDepth: 2,
			overrideConfidentialAccess: false,
			overrideRestrictedAccess: false,
		};

		await scopeDao.upsert(scope);

		expect(mockScopes.upsert).toHaveBeenCalledWith(scope, { transaction: undefined });
	});
});
