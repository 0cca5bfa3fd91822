/**
 * Role levels. The numeric value fixes how much of the department tree a role
 * sees by default; the mapping is a convention, not configuration.
 */
export const ROLE_LEVEL = {
	/** Own department only, restricted */
	CONTRACTOR: 1,
	/** Own department only */
	STAFF: 2,
	/** Own department and its direct children */
	TEAM_LEAD: 3,
	/** Own department and every descendant */
	MANAGER: 4,
	/** Entire organization except top-secret */
	ADMIN: 5,
	/** Entire organization, unrestricted */
	EXECUTIVE: 6,
} as const;

export type RoleLevel = (typeof ROLE_LEVEL)[keyof typeof ROLE_LEVEL];

export const MIN_ROLE_LEVEL = ROLE_LEVEL.CONTRACTOR;
export const MAX_ROLE_LEVEL = ROLE_LEVEL.EXECUTIVE;

/** Level assumed for a user whose memberships resolve to no role. */
export const DEFAULT_ROLE_LEVEL = ROLE_LEVEL.STAFF;

/** Lowest level that sees every active department of the organization. */
export const FULL_VISIBILITY_ROLE_LEVEL = ROLE_LEVEL.ADMIN;

export const ROLE_LEVEL_LABELS: Record<RoleLevel, string> = {
	1: "contractor",
	2: "general staff",
	3: "team lead",
	4: "manager/director",
	5: "admin/back-office",
	6: "executive/CFO",
};

export function isRoleLevel(value: number): value is RoleLevel {
	return Number.isInteger(value) && value >= MIN_ROLE_LEVEL && value <= MAX_ROLE_LEVEL;
}
