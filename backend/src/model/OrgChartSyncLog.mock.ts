import type { OrgChartSyncLog } from "./OrgChartSyncLog";

export function mockOrgChartSyncLog(partial?: Partial<OrgChartSyncLog>): OrgChartSyncLog {
	return {
		id: "00000000-0000-4000-8000-000000000401",
		syncId: "SYNC-20260101000000-abcdef",
		organizationId: "00000000-0000-4000-8000-00000000000a",
		syncType: "full",
		source: "test",
		status: "in_progress",
		triggeredBy: null,
		dryRun: false,
		startedAt: new Date(0),
		completedAt: null,
		durationMs: null,
		departmentsAdded: 0,
		departmentsUpdated: 0,
		departmentsDeleted: 0,
		usersAdded: 0,
		usersUpdated: 0,
		usersDeleted: 0,
		rolesAdded: 0,
		rolesUpdated: 0,
		errorMessage: null,
		errorDetails: null,
		createdAt: new Date(0),
		updatedAt: new Date(0),
		...partial,
	};
}
