import type { UserDepartment } from "./UserDepartment";

export function mockUserDepartment(partial?: Partial<UserDepartment>): UserDepartment {
	return {
		id: "00000000-0000-4000-8000-000000000301",
		userId: "00000000-0000-4000-8000-000000000201",
		departmentId: "00000000-0000-4000-8000-000000000001",
		roleId: "00000000-0000-4000-8000-000000000101",
		isPrimary: true,
		roleInDept: null,
		startedAt: null,
		endedAt: null,
		createdAt: new Date(0),
		updatedAt: new Date(0),
		...partial,
	};
}
