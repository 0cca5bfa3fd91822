import { SyncInProgressError } from "../errors/OrgSyncErrors";
import { SyncGuard } from "./SyncGuard";
import { describe, expect, it } from "vitest";

describe("SyncGuard", () => {
	it("rejects a second run for the same organization while the first is running", async () => {
		const guard = new SyncGuard();
		let release: () => void = () => undefined;
		const first = guard.run(
			"org-1",
			() =>
				new Promise<string>(resolve => {
					release = () => resolve("first");
				}),
		);

		await expect(guard.run("org-1", () => Promise.resolve("second"))).rejects.toBeInstanceOf(SyncInProgressError);
		await expect(guard.run("org-2", () => Promise.resolve("other org"))).resolves.toBe("other org");

		release();
		await expect(first).resolves.toBe("first");
		expect(guard.isRunning("org-1")).toBe(false);
	});

	it("releases the organization when the run fails", async () => {
		const guard = new SyncGuard();

		await expect(guard.run("org-1", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");

		expect(guard.isRunning("org-1")).toBe(false);
		await expect(guard.run("org-1", () => Promise.resolve(1))).resolves.toBe(1);
	});
});
