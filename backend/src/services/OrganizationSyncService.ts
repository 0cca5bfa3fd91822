import type { Database, OrgDaos } from "../core/Database";
import {
	ConsistencyViolationError,
	describeSyncFailure,
	OrgSyncError,
	syncFailureDetails,
} from "../errors/OrgSyncErrors";
import { buildClosure, diffClosure, parentMapOf } from "../hierarchy/DepartmentGraph";
import type { OrgChartSyncLog } from "../model/OrgChartSyncLog";
import { parseOrgChartSyncRequest } from "../schemas/OrgChartSchemas";
import { getLog } from "../util/Logger";
import { type OrgChartPlan, planOrgChartSync } from "./OrgChartPlanner";
import { validateOrgChart } from "./OrgChartValidator";
import { loadOrgSnapshot } from "./OrgSnapshot";
import { SyncGuard } from "./SyncGuard";
import { randomUUID } from "node:crypto";
import type { OrgChartSyncRequest, OrgChartSyncResponse, OrphanPolicy, SyncSummary } from "orgscope-common";

const log = getLog(import.meta);

export interface OrganizationSyncSettings {
	/** Upper bound on departments in one payload */
	maxDepartments: number;
	/** Used when the payload does not choose one */
	orphanPolicy: OrphanPolicy;
	/** Runs left pending or in progress for longer than this are marked failed before a new run starts */
	staleAfterMs: number;
}

export interface OrganizationSyncDeps {
	now: () => Date;
	generateId: () => string;
}

const defaultDeps: OrganizationSyncDeps = {
	now: () => new Date(),
	generateId: randomUUID,
};

/** "SYNC-20260102030405-1a2b3c" from the start time and a random id */
export function formatSyncId(startedAt: Date, randomId: string): string {
	const timestamp = startedAt.toISOString().replace(/\D/g, "").slice(0, 14);
	const suffix = randomId.replace(/-/g, "").slice(0, 6);
	return `SYNC-${timestamp}-${suffix}`;
}

/**
 * Reconciles an organization's departments, roles, users and assignments with an
 * upstream org chart. Each run is one transaction: either everything in the
 * payload is applied and the closure table rebuilt, or nothing changes. Every run
 * that gets past payload parsing leaves an `OrgChartSyncLog` row.
 */
export class OrganizationSyncService {
	private readonly database: Database;
	private readonly settings: OrganizationSyncSettings;
	private readonly deps: OrganizationSyncDeps;
	private readonly guard = new SyncGuard();

	constructor(database: Database, settings: OrganizationSyncSettings, deps: OrganizationSyncDeps = defaultDeps) {
		this.database = database;
		this.settings = settings;
		this.deps = deps;
	}

	/**
	 * Validates and applies an org-chart payload.
	 *
	 * @throws OrgChartValidationError when the payload is malformed or inconsistent
	 * with the organization; nothing is written
	 * @throws SyncInProgressError when a run for the organization is already active
	 * @throws ConsistencyViolationError when the rebuilt closure table disagrees
	 * with the department tree; the transaction is rolled back
	 */
	async syncOrgChart(organizationId: string, payload: unknown, triggeredBy?: string): Promise<OrgChartSyncResponse> {
		const request = parseOrgChartSyncRequest(payload);
		return await this.guard.run(organizationId, () => this.runSync(organizationId, request, triggeredBy ?? null));
	}

	getSyncLog(organizationId: string, syncId: string): Promise<OrgChartSyncLog | undefined> {
		return this.database.orgChartSyncLogDao.findBySyncId(organizationId, syncId);
	}

	listSyncLogs(organizationId: string, limit = 20): Promise<Array<OrgChartSyncLog>> {
		return this.database.orgChartSyncLogDao.listRecent(organizationId, limit);
	}

	private async runSync(
		organizationId: string,
		request: OrgChartSyncRequest,
		triggeredBy: string | null,
	): Promise<OrgChartSyncResponse> {
		const syncLogDao = this.database.orgChartSyncLogDao;
		const startedAt = this.deps.now();

		const staleCount = await syncLogDao.failStale(
			organizationId,
			new Date(startedAt.getTime() - this.settings.staleAfterMs),
			`Sync did not finish within ${this.settings.staleAfterMs} ms`,
			startedAt,
		);
		if (staleCount > 0) {
			log.warn("Marked %d stale org chart sync(s) of organization %s as failed", staleCount, organizationId);
		}

		const syncId = formatSyncId(startedAt, this.deps.generateId());
		const dryRun = request.options.dryRun;
		await syncLogDao.create({
			id: this.deps.generateId(),
			syncId,
			organizationId,
			syncType: request.syncType,
			source: request.source,
			status: "pending",
			triggeredBy,
			dryRun,
			startedAt,
		});
		await syncLogDao.update(organizationId, syncId, { status: "in_progress" });
		log.info(
			"Starting %s org chart sync %s for organization %s (%d departments, dryRun=%s)",
			request.syncType,
			syncId,
			organizationId,
			request.departments.length,
			dryRun,
		);

		let summary: SyncSummary;
		try {
			summary = await this.database.transaction(organizationId, daos =>
				this.reconcile(daos, organizationId, request),
			);
		} catch (error) {
			await this.recordFailure(organizationId, syncId, startedAt, error);
			throw error;
		}

		const completedAt = this.deps.now();
		const durationMs = completedAt.getTime() - startedAt.getTime();
		await syncLogDao.update(organizationId, syncId, {
			status: "success",
			completedAt,
			durationMs,
			...summary,
		});
		log.info("Org chart sync %s succeeded in %d ms: %o", syncId, durationMs, summary);

		return { status: "success", syncId, dryRun, summary, durationMs, syncedAt: completedAt };
	}

	private async reconcile(daos: OrgDaos, organizationId: string, request: OrgChartSyncRequest): Promise<SyncSummary> {
		const snapshot = await loadOrgSnapshot(daos, organizationId);
		const validated = validateOrgChart(request, snapshot, {
			maxDepartments: this.settings.maxDepartments,
			orphanPolicy: request.options.orphanPolicy ?? this.settings.orphanPolicy,
		});
		if (validated.reparented.length > 0) {
			log.warn("Re-parented orphan departments: %s", validated.reparented.join(", "));
		}

		const plan = planOrgChartSync(request, validated, snapshot, { generateId: this.deps.generateId });
		if (request.options.dryRun) {
			return plan.summary;
		}

		await this.applyPlan(daos, organizationId, plan);
		await this.rebuildClosure(daos, organizationId, plan);
		return plan.summary;
	}

	private async applyPlan(daos: OrgDaos, organizationId: string, plan: OrgChartPlan): Promise<void> {
		for (const write of plan.departmentWrites) {
			if (write.kind === "create") {
				await daos.departmentDao.create(write.department);
			} else {
				await daos.departmentDao.update(organizationId, write.id, write.changes);
			}
		}
		for (const write of plan.roleWrites) {
			if (write.kind === "create") {
				await daos.roleDao.create(write.role);
			} else {
				await daos.roleDao.update(organizationId, write.id, write.changes);
			}
		}
		for (const write of plan.userWrites) {
			if (write.kind === "create") {
				await daos.orgUserDao.create(write.user);
			} else {
				await daos.orgUserDao.update(organizationId, write.id, write.changes);
			}
		}

		const { assignmentWrites } = plan;
		if (assignmentWrites.end.length > 0) {
			await daos.userDepartmentDao.end(organizationId, assignmentWrites.end, this.deps.now());
		}
		for (const { id, changes } of assignmentWrites.update) {
			await daos.userDepartmentDao.update(organizationId, id, changes);
		}
		for (const assignment of assignmentWrites.create) {
			await daos.userDepartmentDao.create(assignment);
		}

		for (const scope of plan.accessScopeWrites) {
			await daos.departmentAccessScopeDao.upsert(scope);
		}
	}

	/**
	 * Replaces the organization's closure rows and checks what was stored against
	 * the persisted parent pointers, which are the source of truth.
	 */
	private async rebuildClosure(daos: OrgDaos, organizationId: string, plan: OrgChartPlan): Promise<void> {
		const rows = buildClosure(plan.parents);
		await daos.departmentHierarchyDao.replaceForOrganization(organizationId, rows);

		const persisted = parentMapOf(await daos.departmentDao.listByOrganization(organizationId));
		const stored = await daos.departmentHierarchyDao.listByOrganization(organizationId);
		const diff = diffClosure(buildClosure(persisted), stored);
		if (diff.missing.length > 0 || diff.unexpected.length > 0) {
			throw new ConsistencyViolationError(
				`Closure table of organization ${organizationId} disagrees with the department tree`,
				{ missing: diff.missing.length, unexpected: diff.unexpected.length },
			);
		}
		log.debug("Rebuilt %d closure rows for organization %s", rows.length, organizationId);
	}

	private async recordFailure(organizationId: string, syncId: string, startedAt: Date, error: unknown): Promise<void> {
		const completedAt = this.deps.now();
		const errorMessage = describeSyncFailure(error);
		if (error instanceof OrgSyncError) {
			log.warn("Org chart sync %s failed: %s", syncId, errorMessage);
		} else {
			log.error(error, "Org chart sync %s failed unexpectedly", syncId);
		}
		try {
			await this.database.orgChartSyncLogDao.update(organizationId, syncId, {
				status: "failed",
				completedAt,
				durationMs: completedAt.getTime() - startedAt.getTime(),
				errorMessage,
				errorDetails: syncFailureDetails(error),
			});
		} catch (logError) {
			log.error(logError, "Could not record failure of org chart sync %s", syncId);
		}
	}
}
