import { SyncInProgressError } from "../errors/OrgSyncErrors";

/**
 * Single-flight guard for org-chart syncs within this process. A second run for
 * an organization that is already syncing fails immediately instead of queueing
 * behind the database lock.
 */
export class SyncGuard {
	private readonly running = new Set<string>();

	isRunning(organizationId: string): boolean {
		return this.running.has(organizationId);
	}

	async run<T>(organizationId: string, fn: () => Promise<T>): Promise<T> {
		if (this.running.has(organizationId)) {
			throw new SyncInProgressError(organizationId);
		}
		this.running.add(organizationId);
		try {
			return await fn();
		} finally {
			this.running.delete(organizationId);
		}
	}
}
