import { ConsistencyViolationError } from "../errors/OrgSyncErrors";
import {
	buildClosure,
	computePlacements,
	diffClosure,
	findCycle,
	parentMapOf,
	sanitizePathSegment,
	topologicalSort,
} from "./DepartmentGraph";
import { describe, expect, it } from "vitest";

function tree(entries: Array<[string, string | null]>): Map<string, string | null> {
	return new Map(entries);
}

describe("DepartmentGraph", () => {
	describe("findCycle", () => {
		it("returns undefined for a forest", () => {
			expect(findCycle(tree([["sales", null], ["east", "sales"], ["north", "east"], ["hr", null]]))).toBeUndefined();
		});

		it("reports a direct two-node cycle as a closed walk", () => {
			expect(findCycle(tree([["a", "b"], ["b", "a"]]))).toEqual(["a", "b", "a"]);
		});

		it("reports a department that is its own parent", () => {
			expect(findCycle(tree([["a", "a"]]))).toEqual(["a", "a"]);
		});

		it("finds a cycle reached through an acyclic tail", () => {
			expect(findCycle(tree([["tail", "x"], ["x", "y"], ["y", "z"], ["z", "x"]]))).toEqual(["x", "y", "z", "x"]);
		});

		it("ignores parents outside the map", () => {
			expect(findCycle(tree([["a", "missing"]]))).toBeUndefined();
		});
	});

	describe("topologicalSort", () => {
		it("orders parents before children and keeps sibling order", () => {
			const parents = tree([
				["north", "east"],
				["east", "sales"],
				["west", "sales"],
				["sales", null],
			]);

			expect(topologicalSort(parents)).toEqual(["sales", "east", "west", "north"]);
		});

		it("treats an unknown parent as a root", () => {
			expect(topologicalSort(tree([["a", "elsewhere"], ["b", "a"]]))).toEqual(["a", "b"]);
		});

		it("returns undefined when the graph is cyclic", () => {
			expect(topologicalSort(tree([["root", null], ["a", "b"], ["b", "a"]]))).toBeUndefined();
		});
	});

	describe("computePlacements", () => {
		it("derives levels and dotted paths from the parent chain", () => {
			const parents = tree([["sales", null], ["east", "sales"], ["north", "east"]]);
			const segments = new Map([
				["sales", "SALES"],
				["east", "Sales-East"],
				["north", "SE North"],
			]);

			const placements = computePlacements(parents, segments);

			expect(placements.get("sales")).toEqual({ level: 1, path: "sales" });
			expect(placements.get("east")).toEqual({ level: 2, path: "sales.sales_east" });
			expect(placements.get("north")).toEqual({ level: 3, path: "sales.sales_east.se_north" });
		});

		it("throws a consistency violation for a cyclic tree", () => {
			expect(() => computePlacements(tree([["a", "b"], ["b", "a"]]), new Map())).toThrow(ConsistencyViolationError);
		});
	});

	it("sanitizes path segments", () => {
		expect(sanitizePathSegment("  R&D / Labs ")).toBe("r_d_labs");
	});

	describe("buildClosure", () => {
		it("emits a self row and one row per ancestor", () => {
			const closure = buildClosure(tree([["sales", null], ["east", "sales"], ["north", "east"]]));

			expect(closure).toEqual([
				{ ancestorDepartmentId: "sales", descendantDepartmentId: "sales", depth: 0 },
				{ ancestorDepartmentId: "east", descendantDepartmentId: "east", depth: 0 },
				{ ancestorDepartmentId: "sales", descendantDepartmentId: "east", depth: 1 },
				{ ancestorDepartmentId: "north", descendantDepartmentId: "north", depth: 0 },
				{ ancestorDepartmentId: "east", descendantDepartmentId: "north", depth: 1 },
				{ ancestorDepartmentId: "sales", descendantDepartmentId: "north", depth: 2 },
			]);
		});

		it("agrees with the parent chain for every row", () => {
			const parents = parentMapOf([
				{ id: "hq", parentId: null },
				{ id: "ops", parentId: "hq" },
				{ id: "it", parentId: "ops" },
				{ id: "helpdesk", parentId: "it" },
				{ id: "finance", parentId: "hq" },
			]);

			for (const row of buildClosure(parents)) {
				let current: string | null = row.descendantDepartmentId;
				for (let step = 0; step < row.depth; step++) {
					current = current === null ? null : (parents.get(current) ?? null);
				}
				expect(current).toBe(row.ancestorDepartmentId);
				expect(row.depth === 0 || row.ancestorDepartmentId !== row.descendantDepartmentId).toBe(true);
			}
		});

		it("rejects a parent chain that does not terminate", () => {
			expect(() => buildClosure(tree([["a", "b"], ["b", "a"]]))).toThrow("does not terminate");
		});

		it("rejects an ancestor outside the organization", () => {
			expect(() => buildClosure(tree([["a", "ghost"]]))).toThrow(ConsistencyViolationError);
		});
	});

	describe("diffClosure", () => {
		it("reports missing and unexpected rows", () => {
			const expected = buildClosure(tree([["a", null], ["b", "a"]]));
			const actual = [
				{ ancestorDepartmentId: "a", descendantDepartmentId: "a", depth: 0 },
				{ ancestorDepartmentId: "b", descendantDepartmentId: "b", depth: 0 },
				{ ancestorDepartmentId: "a", descendantDepartmentId: "b", depth: 2 },
			];

			expect(diffClosure(expected, actual)).toEqual({
				missing: [{ ancestorDepartmentId: "a", descendantDepartmentId: "b", depth: 1 }],
				unexpected: [{ ancestorDepartmentId: "a", descendantDepartmentId: "b", depth: 2 }],
			});
		});
	});
});
