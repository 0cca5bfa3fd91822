import { mockUserDepartment } from "../model/UserDepartment.mock";
import type { UserDepartment } from "../model/UserDepartment";
import type { ModelDef } from "../util/ModelDef";
import { createUserDepartmentDao, type UserDepartmentDao } from "./UserDepartmentDao";
import { Op, QueryTypes, type Sequelize } from "sequelize";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("UserDepartmentDao", () => {
	let mockUserDepartments: ModelDef<UserDepartment>;
	let mockSequelize: Sequelize;
	let userDepartmentDao: UserDepartmentDao;
	const orgDepartments = { val: "(SELECT id FROM departments WHERE organization_id = 'org-1')" };

	beforeEach(() => {
		mockUserDepartments = {
			findAll: vi.fn(),
			create: vi.fn(),
			update: vi.fn(),
		} as unknown as ModelDef<UserDepartment>;

		mockSequelize = {
			define: vi.fn(() => mockUserDepartments),
			query: vi.fn(),
			escape: vi.fn((value: string) => `'${value}'`),
			literal: vi.fn((sql: string) => ({ val: sql })),
			models: {},
		} as unknown as Sequelize;

		userDepartmentDao = createUserDepartmentDao(mockSequelize);
	});

	describe("getMaxRoleLevel", () => {
		it("returns the highest level over active assignments", async () => {
			vi.mocked(mockSequelize.query).mockResolvedValue([{ maxLevel: 4 }] as never);

			const level = await userDepartmentDao.getMaxRoleLevel("org-1", "user-1");

			expect(level).toBe(4);
			const [sql, options] = vi.mocked(mockSequelize.query).mock.calls[0];
			expect(sql).toContain("MAX(r.level)");
			expect(sql).toContain("ud.ended_at IS NULL");
			expect(sql).toContain("d.organization_id = :organizationId");
			expect(sql).toContain("r.organization_id = :organizationId");
			expect(options).toEqual({
				replacements: { organizationId: "org-1", userId: "user-1" },
				type: QueryTypes.SELECT,
				transaction: undefined,
			});
		});

		it("returns undefined when no role resolves", async () => {
			vi.mocked(mockSequelize.query).mockResolvedValue([{ maxLevel: null }] as never);

			expect(await userDepartmentDao.getMaxRoleLevel("org-1", "nobody")).toBeUndefined();
		});

		it("propagates database errors", async () => {
			vi.mocked(mockSequelize.query).mockRejectedValue(new Error("connection terminated"));

			await expect(userDepartmentDao.getMaxRoleLevel("org-1", "user-1")).rejects.toThrow("connection terminated");
		});
	});

	it("lists active departments of active assignments", async () => {
		vi.mocked(mockSequelize.query).mockResolvedValue([{ departmentId: "sales" }] as never);

		expect(await userDepartmentDao.listActiveDepartmentIds("org-1", "user-1")).toEqual(["sales"]);
		const [sql] = vi.mocked(mockSequelize.query).mock.calls[0];
		expect(sql).toContain("d.is_active = true");
		expect(sql).toContain("ud.ended_at IS NULL");
	});

	it("lists active assignments through the organization's departments", async () => {
		const assignment = mockUserDepartment();
		vi.mocked(mockUserDepartments.findAll).mockResolvedValue([{ get: vi.fn().mockReturnValue(assignment) }] as never);

		expect(await userDepartmentDao.listActiveByOrganization("org-1")).toEqual([assignment]);
		expect(mockUserDepartments.findAll).toHaveBeenCalledWith({
			where: { departmentId: { [Op.in]: orgDepartments }, endedAt: null },
			order: [["createdAt", "ASC"]],
			transaction: undefined,
		});
	});

	it("creates assignments as active", async () => {
		const assignment = mockUserDepartment();
		vi.mocked(mockUserDepartments.create).mockResolvedValue({ get: vi.fn().mockReturnValue(assignment) } as never);
		const { endedAt: _endedAt, createdAt: _createdAt, updatedAt: _updatedAt, ...newAssignment } = assignment;

		await userDepartmentDao.create(newAssignment);

		expect(mockUserDepartments.create).toHaveBeenCalledWith(
			{ ...newAssignment, endedAt: null },
			{ transaction: undefined },
		);
	});

	it("updates an assignment inside the organization", async () => {
		vi.mocked(mockUserDepartments.update).mockResolvedValue([1] as never);

		expect(await userDepartmentDao.update("org-1", "ud-1", { isPrimary: false })).toBe(true);
		expect(mockUserDepartments.update).toHaveBeenCalledWith(
			{ isPrimary: false },
			{ where: { id: "ud-1", departmentId: { [Op.in]: orgDepartments } }, transaction: undefined },
		);
	});

	describe("end", () => {
		it("sets endedAt on still-active assignments", async () => {
			const endedAt = new Date("2026-03-01T00:00:00Z");
			vi.mocked(mockUserDepartments.update).mockResolvedValue([2] as never);

			const count = await userDepartmentDao.end("org-1", ["ud-1", "ud-2"], endedAt);

			expect(count).toBe(2);
			expect(mockUserDepartments.update).toHaveBeenCalledWith(
				{ endedAt },
				{
					where: { id: { [Op.in]: ["ud-1", "ud-2"] }, departmentId: { [Op.in]: orgDepartments }, endedAt: null },
					transaction: undefined,
				},
			);
		});

		it("does nothing for an empty id list", async () => {
			expect(await userDepartmentDao.end("org-1", [], new Date())).toBe(0);
			expect(mockUserDepartments.update).not.toHaveBeenCalled();
		});
	});
});
