import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import { createValidator } from '../validation/zod-middleware.js';
import { bracket, type SqlIdentifier } from './identifier.js';
import type { SqlSession } from './sqlserver.js';

export enum DatabaseState {
    Absent = 'Absent',
    PresentEmpty = 'PresentEmpty',
    PresentPopulated = 'PresentPopulated'
}

export interface ProbeResult {
    readonly state: DatabaseState;
    /** User tables found; zero when the database is absent. */
    readonly tableCount: number;
}

export interface ProbeContext {
    readonly logger: Logger;
    readonly signal?: AbortSignal;
}

/** An unreadable count fails the probe; it never reads as zero. */
const CountRowSchema = z.object({
    count: z.number().int().nonnegative()
});

const validateCountRow = createValidator(CountRowSchema, 'RestoreStatementFailed');

async function scalarCount(
    session: SqlSession,
    text: string,
    contextLabel: string,
    context: ProbeContext,
    params?: Record<string, string>
): Promise<number> {
    const rows = await session.query(text, { params, signal: context.signal });
    return validateCountRow(rows[0], contextLabel).count;
}

/**
 * Classifies a target database by inspecting the engine catalog.
 *
 * Runs against a session on `master`. When the database exists this forcibly
 * reclaims it first, disconnecting every other session: only call it on a
 * target this process owns.
 */
export class DatabaseProbe {
    async exists(session: SqlSession, databaseName: SqlIdentifier, context: ProbeContext): Promise<boolean> {
        const count = await scalarCount(
            session,
            'SELECT COUNT(*) AS count FROM sys.databases WHERE name = @name',
            'DatabaseProbe:Exists',
            context,
            { name: databaseName }
        );
        return count > 0;
    }

    /**
     * Kills other sessions on the database and puts it back to MULTI_USER,
     * rolling back their open transactions. Best-effort: returns false on failure.
     */
    async reclaim(session: SqlSession, databaseName: SqlIdentifier, context: ProbeContext): Promise<boolean> {
        try {
            await session.execute(
                `DECLARE @kill nvarchar(max) = N'';
SELECT @kill = @kill + N'KILL ' + CONVERT(nvarchar(10), session_id) + N';'
FROM sys.dm_exec_sessions
WHERE database_id = DB_ID(@name)
  AND session_id <> @@SPID;
EXEC sp_executesql @kill;
ALTER DATABASE ${bracket(databaseName)} SET MULTI_USER WITH ROLLBACK IMMEDIATE;`,
                { params: { name: databaseName }, signal: context.signal }
            );
            context.logger.info({ databaseName }, 'Killed other sessions and set database to multi-user mode');
            return true;
        } catch (err) {
            context.signal?.throwIfAborted();
            context.logger.warn({ databaseName, error: err instanceof Error ? err.message : String(err) }, 'Could not reset database to multi-user mode');
            return false;
        }
    }

    async countUserTables(session: SqlSession, databaseName: SqlIdentifier, context: ProbeContext): Promise<number> {
        return scalarCount(
            session,
            `SELECT COUNT(*) AS count FROM ${bracket(databaseName)}.sys.tables WHERE is_ms_shipped = 0`,
            'DatabaseProbe:CountUserTables',
            context
        );
    }

    async classify(session: SqlSession, databaseName: SqlIdentifier, context: ProbeContext): Promise<ProbeResult> {
        if (!(await this.exists(session, databaseName, context))) {
            return { state: DatabaseState.Absent, tableCount: 0 };
        }

        await this.reclaim(session, databaseName, context);

        const tableCount = await this.countUserTables(session, databaseName, context);
        return {
            state: tableCount === 0 ? DatabaseState.PresentEmpty : DatabaseState.PresentPopulated,
            tableCount
        };
    }
}
