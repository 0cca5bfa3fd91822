import { DEFAULT_ROLE_LEVEL, FULL_VISIBILITY_ROLE_LEVEL, isRoleLevel, ROLE_LEVEL, ROLE_LEVEL_LABELS } from "./RoleLevel";
import { describe, expect, it } from "vitest";

describe("RoleLevel", () => {
	it("accepts integers from 1 to 6", () => {
		expect([1, 2, 3, 4, 5, 6].every(isRoleLevel)).toBe(true);
	});

	it("rejects out-of-range and fractional levels", () => {
		expect(isRoleLevel(0)).toBe(false);
		expect(isRoleLevel(7)).toBe(false);
		expect(isRoleLevel(3.5)).toBe(false);
	});

	it("defaults to general staff and opens the whole organization from admin up", () => {
		expect(DEFAULT_ROLE_LEVEL).toBe(2);
		expect(FULL_VISIBILITY_ROLE_LEVEL).toBe(ROLE_LEVEL.ADMIN);
		expect(ROLE_LEVEL_LABELS[DEFAULT_ROLE_LEVEL]).toBe("general staff");
	});
});
