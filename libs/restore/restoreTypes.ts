import type { Logger } from '../logging/logger.js';
import type { RestoreError } from '../errors/sanitizer.js';
import type { ConnectionEndpoint } from '../db/connectionString.js';
import type { SqlIdentifier } from '../db/identifier.js';
import type { DatabaseState } from '../db/probe.js';
import type { RestorePhase } from './phases.js';

/**
 * The database one run restores into. Resolved once per trigger.
 */
export interface RestoreTarget {
    readonly databaseName: SqlIdentifier;
    readonly connectionEndpoint: ConnectionEndpoint;
}

/**
 * Where the engine finds the artifact and puts the restored files.
 * Paths are as seen from inside the engine.
 */
export interface RestorePlan {
    readonly backupPath: string;
    readonly dataDir: string;
    /** Login that becomes database owner after restore. */
    readonly ownerLogin: string;
}

export interface RunContext {
    readonly logger: Logger;
    readonly signal?: AbortSignal;
}

export interface RestoreOutcome {
    readonly state: RestorePhase.Done | RestorePhase.Failed;
    /** True only when a RESTORE statement completed in this run. */
    readonly restored: boolean;
    readonly phases: readonly RestorePhase[];
    readonly databaseState?: DatabaseState;
    readonly tableCount?: number;
    /** Non-fatal finalization problems; present on an otherwise successful run. */
    readonly warnings: readonly string[];
    readonly error?: RestoreError;
}
