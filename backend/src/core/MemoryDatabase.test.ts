import { mockDepartment } from "../model/Department.mock";
import { mockOrgChartSyncLog } from "../model/OrgChartSyncLog.mock";
import { mockOrgUser } from "../model/OrgUser.mock";
import { mockRole } from "../model/Role.mock";
import { mockUserDepartment } from "../model/UserDepartment.mock";
import type { Database } from "./Database";
import { createMemoryDatabase } from "./MemoryDatabase";
import { beforeEach, describe, expect, it } from "vitest";

const ORG = "00000000-0000-4000-8000-00000000000a";
const OTHER_ORG = "00000000-0000-4000-8000-00000000000b";

function strip<T extends { createdAt: Date; updatedAt: Date }>(row: T): Omit<T, "createdAt" | "updatedAt"> {
	const { createdAt: _createdAt, updatedAt: _updatedAt, ...rest } = row;
	return rest;
}

describe("MemoryDatabase", () => {
	let database: Database;
	const clock = new Date("2026-01-01T00:00:00Z");

	beforeEach(async () => {
		database = createMemoryDatabase({ now: () => clock });
		for (const id of [ORG, OTHER_ORG]) {
			await database.organizationDao.create({ id, name: id, code: null, plan: "standard", isActive: true });
		}
	});

	async function seedTree(): Promise<void> {
		await database.departmentDao.create(strip(mockDepartment({ id: "sales", externalId: "sales" })));
		await database.departmentDao.create(strip(mockDepartment({ id: "east", externalId: "east", parentId: "sales" })));
		await database.departmentDao.create(
			strip(mockDepartment({ id: "north", externalId: "north", parentId: "east", isActive: false })),
		);
		await database.departmentHierarchyDao.replaceForOrganization(ORG, [
			{ ancestorDepartmentId: "sales", descendantDepartmentId: "sales", depth: 0 },
			{ ancestorDepartmentId: "east", descendantDepartmentId: "east", depth: 0 },
			{ ancestorDepartmentId: "sales", descendantDepartmentId: "east", depth: 1 },
			{ ancestorDepartmentId: "north", descendantDepartmentId: "north", depth: 0 },
			{ ancestorDepartmentId: "east", descendantDepartmentId: "north", depth: 1 },
			{ ancestorDepartmentId: "sales", descendantDepartmentId: "north", depth: 2 },
		]);
	}

	it("stamps created rows with the injected clock", async () => {
		const organization = await database.organizationDao.findById(ORG);

		expect(organization?.createdAt).toEqual(clock);
	});

	describe("departments", () => {
		it("rejects a second department with the same external id in one organization", async () => {
			await database.departmentDao.create(strip(mockDepartment({ id: "d1", externalId: "sales" })));

			await expect(
				database.departmentDao.create(strip(mockDepartment({ id: "d2", externalId: "sales" }))),
			).rejects.toThrow("duplicate key value");
			await expect(
				database.departmentDao.create(
					strip(mockDepartment({ id: "d3", externalId: "sales", organizationId: OTHER_ORG })),
				),
			).resolves.toMatchObject({ id: "d3" });
		});

		it("rejects a child inserted before its parent", async () => {
			await expect(
				database.departmentDao.create(strip(mockDepartment({ id: "child", parentId: "not-yet" }))),
			).rejects.toThrow("parent_id=not-yet");
		});

		it("updates only departments of the given organization", async () => {
			await database.departmentDao.create(strip(mockDepartment({ id: "d1" })));

			expect(await database.departmentDao.update(OTHER_ORG, "d1", { name: "Moved" })).toBe(false);
			expect(await database.departmentDao.update(ORG, "d1", { name: "Renamed" })).toBe(true);
			expect((await database.departmentDao.listByOrganization(ORG))[0].name).toBe("Renamed");
		});

		it("lists shallowest first", async () => {
			await seedTree();

			const ids = (await database.departmentDao.listByOrganization(ORG)).map(d => d.id);

			expect(ids).toEqual(["sales", "east", "north"]);
			expect(await database.departmentDao.listActiveIds(ORG)).toEqual(["sales", "east"]);
		});
	});

	describe("hierarchy", () => {
		it("returns active strict descendants within the depth limit", async () => {
			await seedTree();
			await database.departmentDao.update(ORG, "north", { isActive: true });

			expect(await database.departmentHierarchyDao.listDescendantIds(ORG, ["sales"])).toEqual(["east", "north"]);
			expect(await database.departmentHierarchyDao.listDescendantIds(ORG, ["sales"], 1)).toEqual(["east"]);
			expect(await database.departmentHierarchyDao.listAncestorIds(ORG, ["north"], 1)).toEqual(["east"]);
		});

		it("skips inactive departments and other organizations", async () => {
			await seedTree();

			expect(await database.departmentHierarchyDao.listDescendantIds(ORG, ["sales"])).toEqual(["east"]);
			expect(await database.departmentHierarchyDao.listDescendantIds(OTHER_ORG, ["sales"])).toEqual([]);
		});

		it("refuses closure rows for departments outside the organization", async () => {
			await seedTree();

			await expect(
				database.departmentHierarchyDao.replaceForOrganization(OTHER_ORG, [
					{ ancestorDepartmentId: "sales", descendantDepartmentId: "sales", depth: 0 },
				]),
			).rejects.toThrow("ancestor_department_id=sales");
		});
	});

	describe("assignments", () => {
		beforeEach(async () => {
			await seedTree();
			await database.roleDao.create(strip(mockRole({ id: "lead", level: 3 })));
			await database.roleDao.create(strip(mockRole({ id: "manager", externalId: "role-manager", level: 4 })));
			await database.orgUserDao.create(strip(mockOrgUser({ id: "u1" })));
		});

		it("resolves the highest role level over active assignments", async () => {
			const { endedAt: _endedAt, ...lead } = strip(
				mockUserDepartment({ id: "a1", userId: "u1", departmentId: "sales", roleId: "lead" }),
			);
			const { endedAt: _ended, ...manager } = strip(
				mockUserDepartment({ id: "a2", userId: "u1", departmentId: "east", roleId: "manager" }),
			);
			await database.userDepartmentDao.create(lead);
			await database.userDepartmentDao.create(manager);

			expect(await database.userDepartmentDao.getMaxRoleLevel(ORG, "u1")).toBe(4);

			expect(await database.userDepartmentDao.end(ORG, ["a2"], clock)).toBe(1);
			expect(await database.userDepartmentDao.getMaxRoleLevel(ORG, "u1")).toBe(3);
			expect(await database.userDepartmentDao.getMaxRoleLevel(OTHER_ORG, "u1")).toBeUndefined();
		});

		it("lists only active departments of active assignments", async () => {
			const { endedAt: _endedAt, ...inactiveDept } = strip(
				mockUserDepartment({ id: "a1", userId: "u1", departmentId: "north", roleId: null }),
			);
			await database.userDepartmentDao.create(inactiveDept);

			expect(await database.userDepartmentDao.listActiveDepartmentIds(ORG, "u1")).toEqual([]);
			expect(await database.userDepartmentDao.listActiveByOrganization(ORG)).toHaveLength(1);
		});

		it("enforces the user foreign key", async () => {
			const { endedAt: _endedAt, ...assignment } = strip(mockUserDepartment({ id: "a1", userId: "ghost" }));

			await expect(database.userDepartmentDao.create(assignment)).rejects.toThrow("user_id=ghost");
		});
	});

	describe("transaction", () => {
		it("commits the draft when the callback resolves", async () => {
			await database.transaction(ORG, async daos => {
				await daos.departmentDao.create(strip(mockDepartment({ id: "d1" })));
				expect(await database.departmentDao.listActiveIds(ORG)).toEqual([]);
			});

			expect(await database.departmentDao.listActiveIds(ORG)).toEqual(["d1"]);
		});

		it("discards every write when the callback rejects", async () => {
			await database.departmentDao.create(strip(mockDepartment({ id: "d1" })));

			await expect(
				database.transaction(ORG, async daos => {
					await daos.departmentDao.update(ORG, "d1", { name: "Changed" });
					await daos.departmentDao.create(strip(mockDepartment({ id: "d2", externalId: "dept-2" })));
					throw new Error("apply failed");
				}),
			).rejects.toThrow("apply failed");

			const departments = await database.departmentDao.listByOrganization(ORG);
			expect(departments.map(d => [d.id, d.name])).toEqual([["d1", "Sales"]]);
		});

		it("runs transactions one at a time", async () => {
			const order: Array<string> = [];
			let release: () => void = () => undefined;
			const gate = new Promise<void>(resolve => {
				release = resolve;
			});

			const first = database.transaction(ORG, async () => {
				order.push("first:start");
				await gate;
				order.push("first:end");
			});
			const second = database.transaction(ORG, () => {
				order.push("second");
				return Promise.resolve();
			});
			await Promise.resolve();
			release();
			await Promise.all([first, second]);

			expect(order).toEqual(["first:start", "first:end", "second"]);
		});

		it("keeps running after a failed transaction", async () => {
			await expect(database.transaction(ORG, () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");

			await expect(database.transaction(ORG, () => Promise.resolve("ok"))).resolves.toBe("ok");
		});
	});

	describe("sync logs", () => {
		function newLog(syncId: string, startedAt: Date, status: "pending" | "in_progress" | "success") {
			const { id, organizationId, syncType, source, triggeredBy, dryRun } = mockOrgChartSyncLog();
			return { id, syncId, organizationId, syncType, source, status, triggeredBy, dryRun, startedAt };
		}

		it("lists recent runs newest first and fails stale ones", async () => {
			await database.orgChartSyncLogDao.create(newLog("SYNC-old", new Date("2025-12-31T00:00:00Z"), "in_progress"));
			await database.orgChartSyncLogDao.create(newLog("SYNC-done", new Date("2025-12-30T00:00:00Z"), "success"));
			await database.orgChartSyncLogDao.create(newLog("SYNC-new", new Date("2026-01-01T00:00:00Z"), "pending"));

			const failed = await database.orgChartSyncLogDao.failStale(
				ORG,
				new Date("2025-12-31T12:00:00Z"),
				"Timed out",
				clock,
			);

			expect(failed).toBe(1);
			const recent = await database.orgChartSyncLogDao.listRecent(ORG, 2);
			expect(recent.map(l => [l.syncId, l.status])).toEqual([
				["SYNC-new", "pending"],
				["SYNC-old", "failed"],
			]);
			expect(recent[1]).toMatchObject({ errorMessage: "Timed out", completedAt: clock });
		});

		it("hides runs of other organizations", async () => {
			await database.orgChartSyncLogDao.create(newLog("SYNC-1", clock, "pending"));

			expect(await database.orgChartSyncLogDao.findBySyncId(OTHER_ORG, "SYNC-1")).toBeUndefined();
			expect(await database.orgChartSyncLogDao.update(OTHER_ORG, "SYNC-1", { status: "success" })).toBe(false);
		});
	});
});
