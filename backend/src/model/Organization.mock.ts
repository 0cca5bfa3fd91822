import type { Organization } from "orgscope-common";

export function mockOrganization(partial?: Partial<Organization>): Organization {
	return {
		id: "00000000-0000-4000-8000-00000000000a",
		name: "Test Organization",
		code: "test-org",
		plan: "standard",
		isActive: true,
		createdAt: new Date(0),
		updatedAt: new Date(0),
		...partial,
	};
}
