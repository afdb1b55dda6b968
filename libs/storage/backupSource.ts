import path from 'node:path';
import { RestoreError } from '../errors/sanitizer.js';

/**
 * A backup artifact on an Azure File Share, derived from its URL.
 */
export interface BackupSource {
    readonly sourceUrl: string;
    readonly accountIdentifier: string;
    readonly shareName: string;
    /** Path below the share, as it appears in the URL (still percent-encoded). */
    readonly relativePath: string;
    readonly signingKey?: string;
}

const UNSAFE_FILE_NAME = /[/\\]|\.\./;

/**
 * Decoded last segment of the share path. It becomes a local file name, so it
 * may not name a directory or step out of one.
 */
function decodeFileName(relativePath: string): string {
    const encoded = path.posix.basename(relativePath);
    let fileName: string;
    try {
        fileName = decodeURIComponent(encoded);
    } catch (err) {
        throw new RestoreError('InvalidSource', 'Backup file name is not valid percent-encoding', { encoded }, { cause: err });
    }
    if (fileName.trim() === '' || fileName === '.' || UNSAFE_FILE_NAME.test(fileName)) {
        throw new RestoreError('InvalidSource', 'Backup file name must be a plain file name', { encoded });
    }
    return fileName;
}

export function parseBackupSource(sourceUrl: string, signingKey?: string): BackupSource {
    let url: URL;
    try {
        url = new URL(sourceUrl);
    } catch (err) {
        throw new RestoreError('InvalidSource', `Backup source is not a valid URL`, { sourceUrl }, { cause: err });
    }

    const accountIdentifier = url.hostname.split('.')[0] ?? '';
    const [shareName, ...fileSegments] = url.pathname.replace(/^\/+/, '').split('/');

    if (accountIdentifier === '' || !shareName || fileSegments.length === 0 || fileSegments.some(s => s === '')) {
        throw new RestoreError(
            'InvalidSource',
            'Backup source URL must name an account, a share and a file',
            { host: url.hostname, pathname: url.pathname }
        );
    }

    const relativePath = fileSegments.join('/');
    decodeFileName(relativePath);

    return {
        sourceUrl,
        accountIdentifier,
        shareName,
        relativePath,
        signingKey: signingKey === undefined || signingKey.trim() === '' ? undefined : signingKey
    };
}

export function canonicalResource(source: BackupSource): string {
    return `/${source.accountIdentifier}/${source.shareName}/${source.relativePath}`;
}

/** File name of the artifact, used to name the local cache entry. */
export function sourceFileName(source: BackupSource): string {
    return decodeFileName(source.relativePath);
}

export function cachePathFor(source: BackupSource, cacheDir: string): string {
    return path.join(cacheDir, sourceFileName(source));
}
