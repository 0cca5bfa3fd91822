import { createLog, type Logger } from "orgscope-common";

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `getLog(import.meta)` near the top of the file (after imports).
 *
 * Per-module levels come from LOG_LEVEL_OVERRIDES, e.g. `OrganizationSyncService:debug`.
 *
 * @param module the module meta or module name
 */
export function getLog(module: string | ImportMeta): Logger {
	return createLog(module);
}
