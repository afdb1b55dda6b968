import crypto from 'crypto';
import path from 'node:path';
import { getRunLogger, type Logger } from '../logging/logger.js';
import { ErrorSanitizer, RestoreError } from '../errors/sanitizer.js';
import type { RestoreConfig } from '../bootstrap/config/restore-config.js';
import { parseConnectionString } from '../db/connectionString.js';
import { toSqlIdentifier } from '../db/identifier.js';
import { cachePathFor, parseBackupSource, type BackupSource } from '../storage/backupSource.js';
import type { BackupFetcher, DownloadProgress } from '../storage/backupFetcher.js';
import { defaultSleep, type Sleep } from './lockRetry.js';
import type { RestoreOrchestrator } from './orchestrator.js';
import { RestorePhase } from './phases.js';
import type { RestoreOutcome, RestorePlan } from './restoreTypes.js';

/**
 * Raised by the environment once the target database resource reports ready.
 */
export interface TargetReadyEvent {
    readonly databaseName: string;
    /** Materializes the admin connection string; may fail or yield nothing. */
    connectionString(signal?: AbortSignal): Promise<string | undefined>;
    readonly signal?: AbortSignal;
}

export interface BringUpSettings {
    readonly source: BackupSource;
    /** Local cache file the engine sees as plan.backupPath. */
    readonly cachePath: string;
    readonly plan: RestorePlan;
    /** Grace period for the engine to finish its own startup. */
    readonly warmupMs: number;
}

export interface BringUpDeps {
    readonly fetcher: BackupFetcher;
    readonly orchestrator: RestoreOrchestrator;
    readonly sleep?: Sleep;
    readonly logger?: Logger;
    readonly onProgress?: (progress: DownloadProgress) => void;
}

export function settingsFromConfig(config: RestoreConfig): BringUpSettings {
    const source = parseBackupSource(config.sourceUrl, config.signingKey);
    return {
        source,
        cachePath: cachePathFor(source, config.cacheDir),
        plan: {
            backupPath: path.posix.join(config.backupMountDir, config.backupFileName),
            dataDir: config.dataDir,
            ownerLogin: config.ownerLogin
        },
        warmupMs: config.warmupMs
    };
}

async function resolveConnectionString(event: TargetReadyEvent): Promise<string> {
    let connectionString: string | undefined;
    try {
        connectionString = await event.connectionString(event.signal);
    } catch (err) {
        throw ErrorSanitizer.sanitize(err, 'TargetReady:ConnectionString', 'ConnectionStringUnavailable');
    }
    if (connectionString === undefined || connectionString.trim() === '') {
        throw new RestoreError('ConnectionStringUnavailable', `Could not get connection string for database ${event.databaseName}`);
    }
    return connectionString;
}

/**
 * Reacts to a target-ready event: make sure the backup is cached locally, wait
 * out the engine warm-up, then run the orchestrator.
 *
 * Never rejects. Every failure is logged and returned as a Failed outcome so
 * nothing propagates back into the event source.
 */
export async function handleTargetReady(
    event: TargetReadyEvent,
    settings: BringUpSettings,
    deps: BringUpDeps
): Promise<RestoreOutcome> {
    const runId = crypto.randomUUID();
    const logger = deps.logger ?? getRunLogger(event.databaseName, runId);
    const sleep = deps.sleep ?? defaultSleep;
    const { signal } = event;

    try {
        const databaseName = toSqlIdentifier(event.databaseName);

        const cached = await deps.fetcher.ensureLocal(settings.source, settings.cachePath, {
            logger,
            signal,
            onProgress: deps.onProgress
        });
        if (!cached.exists) {
            throw new RestoreError('DownloadFailed', 'Backup file is not available locally; restore not attempted', {
                cachePath: settings.cachePath
            });
        }

        const connectionEndpoint = parseConnectionString(await resolveConnectionString(event));

        logger.info({ warmupMs: settings.warmupMs }, 'Waiting for SQL Server to finish starting');
        await sleep(settings.warmupMs, signal);

        return await deps.orchestrator.run(
            { databaseName, connectionEndpoint },
            settings.plan,
            { logger, signal }
        );
    } catch (err) {
        const error = ErrorSanitizer.sanitize(err, 'TargetReady', 'RestoreStatementFailed');
        logger.error({ runId, incidentId: error.incidentId, kind: error.kind }, 'Database bring-up aborted');
        return {
            state: RestorePhase.Failed,
            restored: false,
            phases: [],
            warnings: [],
            error
        };
    }
}
