import { loadConfig, loadEnvFiles, type OrgScopeConfig } from "./config/Config";
import { createDatabase, type Database } from "./core/Database";
import { createMemoryDatabase } from "./core/MemoryDatabase";
import { AccessControlService } from "./services/AccessControlService";
import { OrganizationSyncService } from "./services/OrganizationSyncService";
import { getLog } from "./util/Logger";
import { createPostgresSequelize } from "./util/Sequelize";

const log = getLog(import.meta);

export interface OrgScope {
	readonly database: Database;
	readonly accessControlService: AccessControlService;
	readonly organizationSyncService: OrganizationSyncService;
	/** Closes the database; the services must not be used afterwards */
	close(): Promise<void>;
}

async function openDatabase(config: OrgScopeConfig): Promise<Database> {
	if (config.SEQUELIZE === "memory") {
		log.info("Using in-memory organization store");
		return createMemoryDatabase();
	}
	const sequelize = await createPostgresSequelize(config);
	return createDatabase(sequelize, { syncModels: config.DB_SYNC_MODELS });
}

/**
 * Opens the configured store and builds the services over it. Without `config`,
 * `.env.local` and `.env` are loaded into `process.env` and the configuration
 * is read from there.
 */
export async function createOrgScope(config?: OrgScopeConfig): Promise<OrgScope> {
	if (!config) {
		loadEnvFiles();
		return createOrgScope(loadConfig());
	}
	const database = await openDatabase(config);

	const accessControlService = new AccessControlService(database, {
		accessScopeOverrides: config.ACCESS_SCOPE_OVERRIDES_ENABLED,
	});
	const organizationSyncService = new OrganizationSyncService(database, {
		maxDepartments: config.ORG_SYNC_MAX_DEPARTMENTS,
		orphanPolicy: config.ORG_SYNC_ORPHAN_POLICY,
		staleAfterMs: config.ORG_SYNC_STALE_AFTER_MS,
	});
	log.info(
		{ store: config.SEQUELIZE, accessScopeOverrides: config.ACCESS_SCOPE_OVERRIDES_ENABLED },
		"Organization services ready",
	);

	return {
		database,
		accessControlService,
		organizationSyncService,
		close: async () => {
			await database.close();
			log.info("Organization store closed");
		},
	};
}
