/** Pricing plan of an organization */
export type OrganizationPlan = "free" | "standard" | "enterprise";

/** Tenant root. Every other entity belongs to exactly one organization. */
export interface Organization {
	readonly id: string;
	readonly name: string;
	readonly code: string | null;
	readonly plan: OrganizationPlan;
	readonly isActive: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewOrganization = Omit<Organization, "createdAt" | "updatedAt">;
