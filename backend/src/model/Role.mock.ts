import type { Role } from "./Role";

export function mockRole(partial?: Partial<Role>): Role {
	return {
		id: "00000000-0000-4000-8000-000000000101",
		organizationId: "00000000-0000-4000-8000-00000000000a",
		externalId: "role-staff",
		name: "Staff",
		level: 2,
		description: null,
		createdAt: new Date(0),
		updatedAt: new Date(0),
		...partial,
	};
}
