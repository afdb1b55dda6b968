import { z } from 'zod';
import type { Env, GuardRule } from '../config-guard.js';
import { validate } from '../../validation/zod-middleware.js';

/**
 * Presence rules checked before anything touches the network or the engine.
 * The signing key is optional here: it is only needed on a cache miss.
 */
export const RESTORE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'RESTORE_DATABASE_NAME' },
    { type: 'required', name: 'RESTORE_BACKUP_FILE_NAME' },
    { type: 'required', name: 'RESTORE_SOURCE_URL' },
    { type: 'required', name: 'RESTORE_CONNECTION_STRING', sensitive: true },

    {
        type: 'forbidIf',
        name: 'PLAINTEXT_SHARED_KEY',
        when: (env) => env.NODE_ENV === 'production' && (env.RESTORE_SOURCE_URL ?? '').toLowerCase().startsWith('http://'),
        message: 'SharedKey requests must use https in production'
    }
];

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = (fallback: string) =>
    z.preprocess(blankToUndefined, z.string().default(fallback));

export const RestoreConfigSchema = z.object({
    RESTORE_DATABASE_NAME: z.string().trim().min(1),
    RESTORE_BACKUP_FILE_NAME: z.string().trim().min(1),
    RESTORE_SOURCE_URL: z.string().trim().url(),
    RESTORE_SIGNING_KEY: z.preprocess(blankToUndefined, z.string().optional()),
    RESTORE_CONNECTION_STRING: z.string().min(1),
    RESTORE_CACHE_DIR: optionalString('./sqldata'),
    RESTORE_BACKUP_MOUNT_DIR: optionalString('/var/opt/mssql/backup'),
    RESTORE_DATA_DIR: optionalString('/var/opt/mssql/data'),
    RESTORE_OWNER_LOGIN: optionalString('sa'),
    RESTORE_WARMUP_MS: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(5000))
}).transform(raw => ({
    databaseName: raw.RESTORE_DATABASE_NAME,
    backupFileName: raw.RESTORE_BACKUP_FILE_NAME,
    sourceUrl: raw.RESTORE_SOURCE_URL,
    signingKey: raw.RESTORE_SIGNING_KEY,
    connectionString: raw.RESTORE_CONNECTION_STRING,
    cacheDir: raw.RESTORE_CACHE_DIR,
    backupMountDir: raw.RESTORE_BACKUP_MOUNT_DIR,
    dataDir: raw.RESTORE_DATA_DIR,
    ownerLogin: raw.RESTORE_OWNER_LOGIN,
    warmupMs: raw.RESTORE_WARMUP_MS
}));

export type RestoreConfig = z.output<typeof RestoreConfigSchema>;

export function loadRestoreConfig(env: Env = process.env): RestoreConfig {
    return validate(RestoreConfigSchema, env, 'RestoreConfig', 'ConfigurationInvalid');
}
