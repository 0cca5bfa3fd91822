import type { Department } from "./Department";

export function mockDepartment(partial?: Partial<Department>): Department {
	return {
		id: "00000000-0000-4000-8000-000000000001",
		organizationId: "00000000-0000-4000-8000-00000000000a",
		externalId: "dept-1",
		name: "Sales",
		code: "SALES",
		parentId: null,
		level: 1,
		path: "sales",
		displayOrder: 0,
		description: null,
		isActive: true,
		createdAt: new Date(0),
		updatedAt: new Date(0),
		...partial,
	};
}
