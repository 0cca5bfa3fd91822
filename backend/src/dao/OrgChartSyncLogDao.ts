import {
	defineOrgChartSyncLogs,
	type NewOrgChartSyncLog,
	type OrgChartSyncLog,
	type UpdateOrgChartSyncLog,
} from "../model/OrgChartSyncLog";
import { Op, type Sequelize, type Transaction } from "sequelize";

export interface OrgChartSyncLogDao {
	/** Record the start of a sync run */
	create(log: NewOrgChartSyncLog): Promise<OrgChartSyncLog>;

	/** Update a run's status, counters or error */
	update(organizationId: string, syncId: string, updates: UpdateOrgChartSyncLog): Promise<boolean>;

	/** Find one run of the organization */
	findBySyncId(organizationId: string, syncId: string): Promise<OrgChartSyncLog | undefined>;

	/** Most recent runs first */
	listRecent(organizationId: string, limit: number): Promise<Array<OrgChartSyncLog>>;

	/**
	 * Mark runs still pending or in progress that started before `startedBefore`
	 * as failed at `completedAt`. Returns how many were marked.
	 */
	failStale(organizationId: string, startedBefore: Date, errorMessage: string, completedAt: Date): Promise<number>;
}

export function createOrgChartSyncLogDao(sequelize: Sequelize, transaction?: Transaction): OrgChartSyncLogDao {
	const SyncLogs = defineOrgChartSyncLogs(sequelize);

	return {
		create,
		update,
		findBySyncId,
		listRecent,
		failStale,
	};

	async function create(log: NewOrgChartSyncLog): Promise<OrgChartSyncLog> {
		const created = await SyncLogs.create(log as OrgChartSyncLog, { transaction });
		return created.get({ plain: true });
	}

	async function update(organizationId: string, syncId: string, updates: UpdateOrgChartSyncLog): Promise<boolean> {
		const [count] = await SyncLogs.update(updates, { where: { organizationId, syncId }, transaction });
		return count > 0;
	}

	async function findBySyncId(organizationId: string, syncId: string): Promise<OrgChartSyncLog | undefined> {
		const log = await SyncLogs.findOne({ where: { organizationId, syncId }, transaction });
		return log ? log.get({ plain: true }) : undefined;
	}

	async function listRecent(organizationId: string, limit: number): Promise<Array<OrgChartSyncLog>> {
		const logs = await SyncLogs.findAll({
			where: { organizationId },
			order: [["startedAt", "DESC"]],
			limit,
			transaction,
		});
		return logs.map(l => l.get({ plain: true }));
	}

	async function failStale(
		organizationId: string,
		startedBefore: Date,
		errorMessage: string,
		completedAt: Date,
	): Promise<number> {
		const [count] = await SyncLogs.update(
			{ status: "failed", errorMessage, completedAt },
			{
				where: {
					organizationId,
					status: { [Op.in]: ["pending", "in_progress"] },
					startedAt: { [Op.lt]: startedBefore },
				},
				transaction,
			},
		);
		return count;
	}
}
