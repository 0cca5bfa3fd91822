import { mockDepartment } from "../model/Department.mock";
import type { Department } from "../model/Department";
import type { ModelDef } from "../util/ModelDef";
import { createDepartmentDao, type DepartmentDao } from "./DepartmentDao";
import type { Sequelize, Transaction } from "sequelize";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("DepartmentDao", () => {
	let mockDepartments: ModelDef<Department>;
	let mockSequelize: Sequelize;
	let departmentDao: DepartmentDao;
	const transaction = { id: "tx-1" } as unknown as Transaction;

	beforeEach(() => {
		mockDepartments = {
			findAll: vi.fn(),
			findOne: vi.fn(),
			create: vi.fn(),
			update: vi.fn(),
		} as unknown as ModelDef<Department>;

		mockSequelize = {
			define: vi.fn(() => mockDepartments),
			models: {},
		} as unknown as Sequelize;

		departmentDao = createDepartmentDao(mockSequelize, transaction);
	});

	it("lists an organization's departments shallowest first within the transaction", async () => {
		const sales = mockDepartment();
		vi.mocked(mockDepartments.findAll).mockResolvedValue([{ get: vi.fn().mockReturnValue(sales) }] as never);

		const result = await departmentDao.listByOrganization("org-1");

		expect(result).toEqual([sales]);
		expect(mockDepartments.findAll).toHaveBeenCalledWith({
			where: { organizationId: "org-1" },
			order: [
				["level", "ASC"],
				["displayOrder", "ASC"],
				["name", "ASC"],
			],
			transaction,
		});
	});

	it("lists active department ids only", async () => {
		vi.mocked(mockDepartments.findAll).mockResolvedValue([
			{ get: vi.fn().mockReturnValue("d-1") },
			{ get: vi.fn().mockReturnValue("d-2") },
		] as never);

		const result = await departmentDao.listActiveIds("org-1");

		expect(result).toEqual(["d-1", "d-2"]);
		expect(mockDepartments.findAll).toHaveBeenCalledWith({
			attributes: ["id"],
			where: { organizationId: "org-1", isActive: true },
			transaction,
		});
	});

	it("finds a department by id within the organization", async () => {
		const sales = mockDepartment({ id: "d-1", isActive: false });
		vi.mocked(mockDepartments.findOne).mockResolvedValueOnce({ get: vi.fn().mockReturnValue(sales) } as never);
		vi.mocked(mockDepartments.findOne).mockResolvedValueOnce(null);

		expect(await departmentDao.findById("org-1", "d-1")).toEqual(sales);
		expect(await departmentDao.findById("org-1", "missing")).toBeUndefined();
		expect(mockDepartments.findOne).toHaveBeenCalledWith({ where: { id: "d-1", organizationId: "org-1" }, transaction });
	});

	it("lists active children of a parent or the active roots", async () => {
		vi.mocked(mockDepartments.findAll).mockResolvedValue([{ get: vi.fn().mockReturnValue("d-2") }] as never);

		expect(await departmentDao.listActiveChildIds("org-1", "d-1")).toEqual(["d-2"]);
		await departmentDao.listActiveChildIds("org-1", null);

		expect(mockDepartments.findAll).toHaveBeenNthCalledWith(1, {
			attributes: ["id"],
			where: { organizationId: "org-1", parentId: "d-1", isActive: true },
			transaction,
		});
		expect(mockDepartments.findAll).toHaveBeenNthCalledWith(2, {
			attributes: ["id"],
			where: { organizationId: "org-1", parentId: null, isActive: true },
			transaction,
		});
	});

	it("creates a department with the caller's id", async () => {
		const department = mockDepartment({ id: "d-9" });
		vi.mocked(mockDepartments.create).mockResolvedValue({ get: vi.fn().mockReturnValue(department) } as never);

		const { createdAt: _createdAt, updatedAt: _updatedAt, ...newDepartment } = department;
		const result = await departmentDao.create(newDepartment);

		expect(result.id).toBe("d-9");
		expect(mockDepartments.create).toHaveBeenCalledWith(newDepartment, { transaction });
	});

	it("scopes updates to the organization", async () => {
		vi.mocked(mockDepartments.update).mockResolvedValue([1] as never);

		const updated = await departmentDao.update("org-1", "d-1", { isActive: false });

		expect(updated).toBe(true);
		expect(mockDepartments.update).toHaveBeenCalledWith(
			{ isActive: false },
			{ where: { id: "d-1", organizationId: "org-1" }, transaction },
		);
	});

	it("returns false when nothing was updated", async () => {
		vi.mocked(mockDepartments.update).mockResolvedValue([0] as never);

		expect(await departmentDao.update("org-2", "d-1", { name: "Other" })).toBe(false);
	});
});
