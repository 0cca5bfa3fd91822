import { OrgChartValidationError } from "../errors/OrgSyncErrors";
import { MAX_ROLE_LEVEL, MIN_ROLE_LEVEL, type OrgChartSyncRequest } from "orgscope-common";
import { z } from "zod";

const ExternalIdSchema = z.string().trim().min(1).max(100);
const OptionalTextSchema = z.string().nullable().default(null);

function isCalendarDate(value: string): boolean {
	const date = new Date(`${value}T00:00:00Z`);
	return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export const DepartmentInputSchema = z.object({
	id: ExternalIdSchema,
	name: z.string().trim().min(1).max(200),
	code: z.string().trim().min(1).max(50).nullable().default(null),
	parentId: ExternalIdSchema.nullable().default(null),
	displayOrder: z.number().int().default(0),
	description: OptionalTextSchema,
	isActive: z.boolean().default(true),
});

export const RoleInputSchema = z.object({
	id: ExternalIdSchema,
	name: z.string().trim().min(1).max(100),
	level: z.number().int().min(MIN_ROLE_LEVEL).max(MAX_ROLE_LEVEL),
	description: OptionalTextSchema,
});

export const EmployeeInputSchema = z.object({
	id: ExternalIdSchema,
	name: z.string().trim().min(1).max(200),
	email: z.string().email().nullable().default(null),
	departmentId: ExternalIdSchema,
	roleId: ExternalIdSchema.nullable().default(null),
	isPrimary: z.boolean().default(true),
	roleInDept: OptionalTextSchema,
	startDate: z
		.string()
		.regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
		.refine(isCalendarDate, "Not a calendar date")
		.nullable()
		.default(null),
});

export const AccessScopeInputSchema = z.object({
	departmentId: ExternalIdSchema,
	canViewChildDepartments: z.boolean().default(true),
	canViewSiblingDepartments: z.boolean().default(false),
	canViewParentDepartments: z.boolean().default(false),
	maxDepth: z.number().int().min(1).nullable().default(null),
	overrideConfidentialAccess: z.boolean().default(false),
	overrideRestrictedAccess: z.boolean().default(false),
});

export const SyncOptionsSchema = z.object({
	dryRun: z.boolean().default(false),
	orphanPolicy: z.enum(["reject", "reparent"]).nullable().default(null),
	orphanParentId: ExternalIdSchema.nullable().default(null),
});

export const OrgChartSyncRequestSchema = z.object({
	source: z.string().trim().min(1).max(50).default("api"),
	syncType: z.enum(["full", "incremental"]).default("full"),
	departments: z.array(DepartmentInputSchema),
	roles: z.array(RoleInputSchema).default([]),
	employees: z.array(EmployeeInputSchema).default([]),
	accessScopes: z.array(AccessScopeInputSchema).default([]),
	options: SyncOptionsSchema.default({}),
});

/**
 * Validates the shape of an org-chart payload and applies defaults. Graph-level
 * problems (cycles, orphans, unknown references) are checked later against the
 * persisted organization.
 */
export function parseOrgChartSyncRequest(payload: unknown): OrgChartSyncRequest {
	const result = OrgChartSyncRequestSchema.safeParse(payload);
	if (!result.success) {
		const issues = result.error.issues.map(issue => ({ path: issue.path.join("."), message: issue.message }));
		const first = issues[0];
		throw new OrgChartValidationError(
			"INVALID_PAYLOAD",
			`Invalid org chart payload: ${first.path || "(root)"}: ${first.message}`,
			{ issues },
		);
	}
	return result.data;
}
