/**
 * Graph algorithms over a department tree given as `id -> parentId`. All
 * functions are pure; ids not present as keys are treated as outside the tree.
 */

import { ConsistencyViolationError } from "../errors/OrgSyncErrors";

export type ParentMap = ReadonlyMap<string, string | null>;

export interface ClosureRow {
	readonly ancestorDepartmentId: string;
	readonly descendantDepartmentId: string;
	readonly depth: number;
}

export interface DepartmentPlacement {
	/** Roots are 1 */
	readonly level: number;
	readonly path: string;
}

export interface ClosureDiff {
	readonly missing: Array<ClosureRow>;
	readonly unexpected: Array<ClosureRow>;
}

export function parentMapOf(departments: ReadonlyArray<{ id: string; parentId: string | null }>): Map<string, string | null> {
	return new Map(departments.map(department => [department.id, department.parentId]));
}

/**
 * Finds a cycle by walking parent links with three-colour marking. Returns the
 * cycle as a closed walk (first id repeated at the end), or `undefined`.
 */
export function findCycle(parents: ParentMap): Array<string> | undefined {
	const state = new Map<string, "visiting" | "done">();
	for (const start of parents.keys()) {
		if (state.has(start)) {
			continue;
		}
		const trail: Array<string> = [];
		let current = parents.has(start) ? start : null;
		while (current !== null) {
			const seen = state.get(current);
			if (seen === "done") {
				break;
			}
			if (seen === "visiting") {
				return [...trail.slice(trail.indexOf(current)), current];
			}
			state.set(current, "visiting");
			trail.push(current);
			const parentId = parents.get(current) ?? null;
			current = parentId !== null && parents.has(parentId) ? parentId : null;
		}
		for (const id of trail) {
			state.set(id, "done");
		}
	}
	return;
}

/**
 * Kahn's algorithm: every parent comes before its children. Roots keep their
 * input order, and so do siblings. Returns `undefined` when the graph has a cycle.
 */
export function topologicalSort(parents: ParentMap): Array<string> | undefined {
	const children = new Map<string, Array<string>>();
	const queue: Array<string> = [];
	for (const [id, parentId] of parents) {
		if (parentId !== null && parents.has(parentId)) {
			const siblings = children.get(parentId);
			if (siblings) {
				siblings.push(id);
			} else {
				children.set(parentId, [id]);
			}
		} else {
			queue.push(id);
		}
	}

	const order: Array<string> = [];
	for (let i = 0; i < queue.length; i++) {
		const id = queue[i];
		order.push(id);
		queue.push(...(children.get(id) ?? []));
	}
	return order.length === parents.size ? order : undefined;
}

export function sanitizePathSegment(value: string): string {
	return value.trim().toLowerCase().replace(/[^a-z0-9]+/g, "_");
}

/**
 * Level and materialized path of every department. `segments` supplies the raw
 * path segment of each id (its code, or its external id when it has none).
 */
export function computePlacements(
	parents: ParentMap,
	segments: ReadonlyMap<string, string>,
): Map<string, DepartmentPlacement> {
	const order = topologicalSort(parents);
	if (!order) {
		throw new ConsistencyViolationError("Department tree contains a cycle", { cycle: findCycle(parents) });
	}
	const placements = new Map<string, DepartmentPlacement>();
	for (const id of order) {
		const segment = sanitizePathSegment(segments.get(id) ?? id);
		const parentId = parents.get(id) ?? null;
		const parent = parentId === null ? undefined : placements.get(parentId);
		placements.set(
			id,
			parent ? { level: parent.level + 1, path: `${parent.path}.${segment}` } : { level: 1, path: segment },
		);
	}
	return placements;
}

/**
 * Closure rows of the whole tree: a self row at depth 0 for every department and
 * one row per ancestor at increasing depth.
 */
export function buildClosure(parents: ParentMap): Array<ClosureRow> {
	const rows: Array<ClosureRow> = [];
	for (const id of parents.keys()) {
		rows.push({ ancestorDepartmentId: id, descendantDepartmentId: id, depth: 0 });
		let depth = 1;
		let ancestorId = parents.get(id) ?? null;
		while (ancestorId !== null) {
			if (!parents.has(ancestorId)) {
				throw new ConsistencyViolationError(`Department ${id} has an ancestor outside the organization`, {
					departmentId: id,
					ancestorId,
				});
			}
			if (depth > parents.size) {
				throw new ConsistencyViolationError(`Parent chain of department ${id} does not terminate`, {
					departmentId: id,
				});
			}
			rows.push({ ancestorDepartmentId: ancestorId, descendantDepartmentId: id, depth });
			ancestorId = parents.get(ancestorId) ?? null;
			depth++;
		}
	}
	return rows;
}

function closureKey(row: ClosureRow): string {
	return `${row.ancestorDepartmentId}|${row.descendantDepartmentId}|${row.depth}`;
}

export function diffClosure(expected: ReadonlyArray<ClosureRow>, actual: ReadonlyArray<ClosureRow>): ClosureDiff {
	const expectedKeys = new Set(expected.map(closureKey));
	const actualKeys = new Set(actual.map(closureKey));
	return {
		missing: expected.filter(row => !actualKeys.has(closureKey(row))),
		unexpected: actual.filter(row => !expectedKeys.has(closureKey(row))),
	};
}
