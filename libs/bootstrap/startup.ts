import { logger } from "../logging/logger.js";
import { ConfigGuard, type Env } from "./config-guard.js";
import { RESTORE_CONFIG_GUARDS, loadRestoreConfig, type RestoreConfig } from "./config/restore-config.js";

export async function bootstrap(serviceName: string, env: Env = process.env): Promise<RestoreConfig> {
    logger.info({ serviceName }, "Bootstrapping service");

    ConfigGuard.enforce(RESTORE_CONFIG_GUARDS, env);
    const config = loadRestoreConfig(env);

    logger.info({ serviceName, databaseName: config.databaseName }, "Startup checks passed");
    return config;
}
