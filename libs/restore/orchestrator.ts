import type { Logger } from '../logging/logger.js';
import { ErrorSanitizer, redactSecrets } from '../errors/sanitizer.js';
import { withCatalog } from '../db/connectionString.js';
import { bracket, type SqlIdentifier } from '../db/identifier.js';
import { DatabaseProbe, DatabaseState, type ProbeResult } from '../db/probe.js';
import type { SqlConnector, SqlSession } from '../db/sqlserver.js';
import { buildRestoreStatement, readBackupManifest, relocateFiles } from './manifest.js';
import { DROP_RETRY_POLICY, withLockRetry, type LockRetryPolicy, type Sleep } from './lockRetry.js';
import { PhaseTracker, RestorePhase } from './phases.js';
import type { RestoreOutcome, RestorePlan, RestoreTarget, RunContext } from './restoreTypes.js';

/** Restore size varies widely; the statement gets far more than the default. */
export const RESTORE_STATEMENT_TIMEOUT_MS = 5 * 60 * 1000;

export interface RestoreOrchestratorDeps {
    readonly connector: SqlConnector;
    readonly probe?: DatabaseProbe;
    readonly sleep?: Sleep;
    readonly dropRetry?: LockRetryPolicy;
    readonly restoreTimeoutMs?: number;
}

function messageOf(err: unknown): string {
    return redactSecrets(err instanceof Error ? err.message : String(err));
}

async function closeSession(session: SqlSession, logger: Logger): Promise<void> {
    try {
        await session.close();
    } catch (err) {
        logger.warn({ database: session.database, error: messageOf(err) }, 'Failed to close database session');
    }
}

/**
 * Drives one restore run against one target:
 * Probing -> [Reclaiming -> [Dropping]] -> Restoring -> Finalizing -> Done.
 *
 * A populated target is never touched. Every failure ends the run in Failed
 * and is returned, not thrown; a later run re-probes from scratch.
 */
export class RestoreOrchestrator {
    private readonly connector: SqlConnector;
    private readonly probe: DatabaseProbe;
    private readonly sleep?: Sleep;
    private readonly dropRetry: LockRetryPolicy;
    private readonly restoreTimeoutMs: number;

    constructor(deps: RestoreOrchestratorDeps) {
        this.connector = deps.connector;
        this.probe = deps.probe ?? new DatabaseProbe();
        this.sleep = deps.sleep;
        this.dropRetry = deps.dropRetry ?? DROP_RETRY_POLICY;
        this.restoreTimeoutMs = deps.restoreTimeoutMs ?? RESTORE_STATEMENT_TIMEOUT_MS;
    }

    async run(target: RestoreTarget, plan: RestorePlan, context: RunContext): Promise<RestoreOutcome> {
        const { logger, signal } = context;
        const databaseName = target.databaseName;
        const tracker = new PhaseTracker();
        const warnings: string[] = [];
        let probed: ProbeResult | undefined;
        let restored = false;
        let master: SqlSession | undefined;

        const outcome = (state: RestorePhase.Done | RestorePhase.Failed, error?: RestoreOutcome['error']): RestoreOutcome => ({
            state,
            restored,
            phases: tracker.path,
            databaseState: probed?.state,
            tableCount: probed?.tableCount,
            warnings,
            error
        });

        try {
            logger.info({ databaseName }, 'Starting database restore');
            master = await this.connector.open(withCatalog(target.connectionEndpoint, 'master'), signal);
            logger.info('Connected to SQL Server, checking if database exists');

            probed = await this.probe.classify(master, databaseName, context);

            if (probed.state !== DatabaseState.Absent) {
                tracker.transition(RestorePhase.Reclaiming);
            }

            switch (probed.state) {
                case DatabaseState.PresentPopulated:
                    logger.info({ databaseName, tableCount: probed.tableCount }, 'Database already has tables, skipping restore');
                    tracker.transition(RestorePhase.Done);
                    return outcome(RestorePhase.Done);

                case DatabaseState.PresentEmpty:
                    logger.info({ databaseName }, 'Database exists but is empty, will restore from backup');
                    tracker.transition(RestorePhase.Dropping);
                    await this.dropDatabase(master, databaseName, context);
                    break;

                case DatabaseState.Absent:
                    logger.info({ databaseName }, 'Database does not exist, will restore from backup');
                    break;
            }

            tracker.transition(RestorePhase.Restoring);
            await this.restore(master, databaseName, plan, context);
            restored = true;

            tracker.transition(RestorePhase.Finalizing);
            await this.finalize(master, target, plan, context, warnings);

            tracker.transition(RestorePhase.Done);
            logger.info({ databaseName, warnings: warnings.length }, 'Database fully initialized');
            return outcome(RestorePhase.Done);
        } catch (err) {
            const error = ErrorSanitizer.sanitize(err, `RestoreOrchestrator:${tracker.current}`, 'RestoreStatementFailed');
            tracker.fail();
            logger.error({ databaseName, incidentId: error.incidentId, kind: error.kind }, 'Error restoring database');
            return outcome(RestorePhase.Failed, error);
        } finally {
            if (master) await closeSession(master, logger);
        }
    }

    private async dropDatabase(master: SqlSession, databaseName: SqlIdentifier, context: RunContext): Promise<void> {
        const statement = `ALTER DATABASE ${bracket(databaseName)} SET SINGLE_USER WITH ROLLBACK IMMEDIATE;
DROP DATABASE ${bracket(databaseName)};`;

        await withLockRetry(
            async () => master.execute(statement, { signal: context.signal }),
            this.dropRetry,
            { logger: context.logger, signal: context.signal, sleep: this.sleep, label: `Drop database ${databaseName}` }
        );
        context.logger.info({ databaseName }, 'Dropped empty database');
    }

    private async restore(master: SqlSession, databaseName: SqlIdentifier, plan: RestorePlan, context: RunContext): Promise<void> {
        const { logger, signal } = context;
        logger.info({ backupPath: plan.backupPath }, 'Restoring database from backup');

        const entries = await readBackupManifest(master, plan.backupPath, signal);
        logger.info({ count: entries.length }, 'Found files in backup');

        const files = relocateFiles(databaseName, entries, plan.dataDir);
        const statement = buildRestoreStatement(databaseName, plan.backupPath, files);

        logger.info({ files: files.map(f => f.physicalPath) }, 'Executing RESTORE command');
        await master.execute(statement, { timeoutMs: this.restoreTimeoutMs, signal });
        logger.info({ databaseName }, 'Database restored');
    }

    /**
     * Marks the database TRUSTWORTHY and hands ownership to the admin login.
     * Neither step fails the run; each failure becomes a warning on the outcome.
     */
    private async finalize(
        master: SqlSession,
        target: RestoreTarget,
        plan: RestorePlan,
        context: RunContext,
        warnings: string[]
    ): Promise<void> {
        const { logger, signal } = context;
        const databaseName = target.databaseName;

        try {
            logger.info({ databaseName }, 'Setting TRUSTWORTHY ON');
            await master.execute(`ALTER DATABASE ${bracket(databaseName)} SET TRUSTWORTHY ON;`, { signal });
        } catch (err) {
            signal?.throwIfAborted();
            const message = `Could not set TRUSTWORTHY ON: ${messageOf(err)}`;
            logger.warn({ databaseName }, message);
            warnings.push(message);
        }

        let owned: SqlSession | undefined;
        try {
            owned = await this.connector.open(withCatalog(target.connectionEndpoint, databaseName), signal);
            await owned.execute('EXEC sp_changedbowner @loginame = @owner;', {
                params: { owner: plan.ownerLogin },
                signal
            });
            logger.info({ databaseName, owner: plan.ownerLogin }, 'Database owner reassigned');
        } catch (err) {
            signal?.throwIfAborted();
            const message = `Could not reassign database owner to ${plan.ownerLogin}: ${messageOf(err)}`;
            logger.warn({ databaseName }, message);
            warnings.push(message);
        } finally {
            if (owned) await closeSession(owned, logger);
        }
    }
}
