import type { OrgUser } from "./OrgUser";

export function mockOrgUser(partial?: Partial<OrgUser>): OrgUser {
	return {
		id: "00000000-0000-4000-8000-000000000201",
		organizationId: "00000000-0000-4000-8000-00000000000a",
		externalId: "emp-1",
		name: "Test User",
		email: "user@example.com",
		isActive: true,
		createdAt: new Date(0),
		updatedAt: new Date(0),
		...partial,
	};
}
