import { logger } from "../logging/logger.js";
import type { DbClient } from "../db/index.js";
import { ConfigGuard } from "./config-guard.js";
import { DB_CONFIG_GUARDS } from "./config/db-config.js";
import { ENGINE_CONFIG_GUARDS } from "./config/engine-config.js";

/**
 * Fail-closed configuration check; exits the process on any violation.
 */
export function enforceConfiguration(): void {
    ConfigGuard.enforce([...DB_CONFIG_GUARDS, ...ENGINE_CONFIG_GUARDS]);
}

/**
 * Startup checks that need the database: every runtime role must be reachable.
 */
export async function bootstrap(serviceName: string, db: DbClient): Promise<void> {
    logger.info({ serviceName }, "Bootstrapping service");

    await db.probeRoles();

    logger.info({ serviceName }, "Startup checks passed");
}
