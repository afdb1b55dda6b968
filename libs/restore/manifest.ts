import path from 'node:path';
import { z } from 'zod';
import { createValidator } from '../validation/zod-middleware.js';
import { bracket, nvarcharLiteral, type SqlIdentifier } from '../db/identifier.js';
import type { SqlSession } from '../db/sqlserver.js';

export type StreamKind = 'Data' | 'Log';

/** One physical file recorded inside a backup set. */
export interface BackupManifestEntry {
    readonly logicalName: string;
    readonly streamKind: StreamKind;
}

/**
 * Subset of the RESTORE FILELISTONLY result set we rely on.
 * Type is D (data), L (log), F (full-text catalog) or S (filestream).
 */
const FileListRowSchema = z.object({
    LogicalName: z.string().min(1),
    Type: z.string().min(1)
});

const validateFileListRow = createValidator(FileListRowSchema, 'RestoreStatementFailed');

export function toManifestEntry(row: unknown): BackupManifestEntry {
    const parsed = validateFileListRow(row, 'BackupManifest:FileListRow');
    return {
        logicalName: parsed.LogicalName,
        streamKind: parsed.Type.trim().toUpperCase() === 'L' ? 'Log' : 'Data'
    };
}

export async function readBackupManifest(
    session: SqlSession,
    backupPath: string,
    signal?: AbortSignal
): Promise<BackupManifestEntry[]> {
    const rows = await session.query(`RESTORE FILELISTONLY FROM DISK = ${nvarcharLiteral(backupPath)}`, { signal });
    return rows.map(toManifestEntry);
}

export function physicalFileName(databaseName: SqlIdentifier, ordinal: number, streamKind: StreamKind): string {
    return `${databaseName}_${ordinal}${streamKind === 'Log' ? '_log.ldf' : '.mdf'}`;
}

export interface RelocatedFile extends BackupManifestEntry {
    readonly physicalPath: string;
}

/** Destination of every manifest entry, ordinal by manifest order. */
export function relocateFiles(
    databaseName: SqlIdentifier,
    entries: readonly BackupManifestEntry[],
    dataDir: string
): RelocatedFile[] {
    return entries.map((entry, index) => ({
        ...entry,
        physicalPath: path.posix.join(dataDir, physicalFileName(databaseName, index, entry.streamKind))
    }));
}

/**
 * A single RESTORE statement carrying every MOVE clause. The engine applies it
 * atomically; splitting the moves across statements would lose that.
 */
export function buildRestoreStatement(
    databaseName: SqlIdentifier,
    backupPath: string,
    files: readonly RelocatedFile[]
): string {
    if (files.length === 0) {
        throw new Error('Backup manifest lists no files');
    }
    const moves = files
        .map(file => `MOVE ${nvarcharLiteral(file.logicalName)} TO ${nvarcharLiteral(file.physicalPath)}`)
        .join(',\n     ');

    return `RESTORE DATABASE ${bracket(databaseName)}
FROM DISK = ${nvarcharLiteral(backupPath)}
WITH ${moves},
     REPLACE, RECOVERY`;
}
