#!/usr/bin/env node
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { mssqlConnector } from "../../../libs/db/sqlserver.js";
import { BackupFetcher } from "../../../libs/storage/backupFetcher.js";
import { RestoreOrchestrator } from "../../../libs/restore/orchestrator.js";
import { handleTargetReady, settingsFromConfig } from "../../../libs/restore/bringUp.js";
import { RestorePhase } from "../../../libs/restore/phases.js";

/**
 * Runs one bring-up for the configured database. Process start is the
 * target-ready trigger, so launch it once SQL Server is accepting connections
 * (for example from a container post-start hook).
 */
async function main() {
    const config = await bootstrap("restore-agent");

    const controller = new AbortController();
    for (const sig of ["SIGINT", "SIGTERM"] as const) {
        process.once(sig, () => {
            logger.warn({ signal: sig }, "Cancellation requested");
            controller.abort();
        });
    }

    const outcome = await handleTargetReady(
        {
            databaseName: config.databaseName,
            connectionString: async () => config.connectionString,
            signal: controller.signal
        },
        settingsFromConfig(config),
        {
            fetcher: new BackupFetcher(),
            orchestrator: new RestoreOrchestrator({ connector: mssqlConnector })
        }
    );

    logger.info({
        state: outcome.state,
        restored: outcome.restored,
        databaseState: outcome.databaseState,
        phases: outcome.phases,
        warnings: outcome.warnings
    }, "Restore agent finished");

    if (outcome.state === RestorePhase.Failed) {
        process.exitCode = 1;
    }
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
