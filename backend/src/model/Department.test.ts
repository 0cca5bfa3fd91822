import { defineDepartments } from "./Department";
import { DataTypes, type Sequelize } from "sequelize";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("Department", () => {
	let mockSequelize: Sequelize;

	beforeEach(() => {
		mockSequelize = {
			define: vi.fn().mockReturnValue({}),
			models: {},
		} as unknown as Sequelize;
	});

	it("should define departments with a unique external id per organization", () => {
		defineDepartments(mockSequelize);

		expect(mockSequelize.define).toHaveBeenCalledWith(
			"department",
			expect.any(Object),
			expect.objectContaining({
				tableName: "departments",
				underscored: true,
				indexes: expect.arrayContaining([
					{ name: "departments_org_external_id_key", unique: true, fields: ["organization_id", "external_id"] },
				]),
			}),
		);
	});

	it("should keep the parent link nullable and detach children on delete", () => {
		defineDepartments(mockSequelize);

		const schema = vi.mocked(mockSequelize.define).mock.calls[0][1] as Record<string, unknown>;
		expect(schema.parentId).toEqual({
			type: DataTypes.UUID,
			allowNull: true,
			references: { model: "departments", key: "id" },
			onDelete: "SET NULL",
		});
	});

	it("should return the existing model when already defined", () => {
		const existing = { name: "department" };
		mockSequelize = { define: vi.fn(), models: { department: existing } } as unknown as Sequelize;

		expect(defineDepartments(mockSequelize)).toBe(existing);
		expect(mockSequelize.define).not.toHaveBeenCalled();
	});
});
