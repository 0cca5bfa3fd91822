import type { ModelDef } from "../util/ModelDef";
import type { SyncStatus, SyncType } from "orgscope-common";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Audit record of one org-chart sync run. Created when the run starts and
 * finalized once; never changed afterwards.
 */
export interface OrgChartSyncLog {
	readonly id: string;
	/** "SYNC-<yyyyMMddHHmmss>-<6 hex>" */
	readonly syncId: string;
	readonly organizationId: string;
	readonly syncType: SyncType;
	readonly source: string;
	readonly status: SyncStatus;
	readonly triggeredBy: string | null;
	readonly dryRun: boolean;
	readonly startedAt: Date;
	readonly completedAt: Date | null;
	readonly durationMs: number | null;
	readonly departmentsAdded: number;
	readonly departmentsUpdated: number;
	readonly departmentsDeleted: number;
	readonly usersAdded: number;
	readonly usersUpdated: number;
	readonly usersDeleted: number;
	readonly rolesAdded: number;
	readonly rolesUpdated: number;
	readonly errorMessage: string | null;
	readonly errorDetails: Record<string, unknown> | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewOrgChartSyncLog = Pick<
	OrgChartSyncLog,
	"id" | "syncId" | "organizationId" | "syncType" | "source" | "status" | "triggeredBy" | "dryRun" | "startedAt"
>;

export type UpdateOrgChartSyncLog = Partial<
	Omit<
		OrgChartSyncLog,
		"id" | "syncId" | "organizationId" | "syncType" | "source" | "triggeredBy" | "dryRun" | "createdAt" | "updatedAt"
	>
>;

export function defineOrgChartSyncLogs(sequelize: Sequelize): ModelDef<OrgChartSyncLog> {
	const existing = sequelize.models?.org_chart_sync_log;
	if (existing) {
		return existing as ModelDef<OrgChartSyncLog>;
	}
	return sequelize.define("org_chart_sync_log", schema, {
		timestamps: true,
		underscored: true,
		tableName: "org_chart_sync_logs",
		indexes: [{ name: "idx_org_chart_sync_logs_org_started", fields: ["organization_id", "started_at"] }],
	});
}

function counter() {
	return {
		type: DataTypes.INTEGER,
		allowNull: false,
		defaultValue: 0,
	};
}

const schema = {
	id: {
		type: DataTypes.UUID,
		primaryKey: true,
	},
	syncId: {
		type: DataTypes.STRING(50),
		allowNull: false,
		unique: "org_chart_sync_logs_sync_id_key",
	},
	organizationId: {
		type: DataTypes.UUID,
		allowNull: false,
		references: {
			model: "organizations",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	syncType: {
		type: DataTypes.STRING(20),
		allowNull: false,
	},
	source: {
		type: DataTypes.STRING(100),
		allowNull: false,
	},
	status: {
		type: DataTypes.STRING(20),
		allowNull: false,
		defaultValue: "pending",
	},
	triggeredBy: {
		type: DataTypes.STRING(255),
		allowNull: true,
	},
	dryRun: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
	startedAt: {
		type: DataTypes.DATE,
		allowNull: false,
	},
	completedAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
	durationMs: {
		type: DataTypes.INTEGER,
		allowNull: true,
	},
	departmentsAdded: counter(),
	departmentsUpdated: counter(),
	departmentsDeleted: counter(),
	usersAdded: counter(),
	usersUpdated: counter(),
	usersDeleted: counter(),
	rolesAdded: counter(),
	rolesUpdated: counter(),
	errorMessage: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
	errorDetails: {
		type: DataTypes.JSONB,
		allowNull: true,
	},
};
