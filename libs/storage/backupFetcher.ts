import crypto from 'crypto';
import { mkdir, open, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '../logging/logger.js';
import { ErrorSanitizer, RestoreError } from '../errors/sanitizer.js';
import { canonicalResource, sourceFileName, type BackupSource } from './backupSource.js';
import { FILE_SERVICE_VERSION, authorizationHeader, signRequest } from './requestSigner.js';

const BYTES_PER_MB = 1024 * 1024;

export interface LocalCacheEntry {
    readonly localPath: string;
    /** When true the file is complete: it only ever appears through an atomic rename. */
    readonly exists: boolean;
    readonly sizeBytes?: number;
}

export interface DownloadProgress {
    readonly bytesTransferred: number;
    readonly totalBytes: number;
    readonly percent: number;
}

export interface FetchContext {
    readonly logger: Logger;
    readonly signal?: AbortSignal;
    readonly onProgress?: (progress: DownloadProgress) => void;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface BackupFetcherOptions {
    fetchImpl?: FetchFn;
    now?: () => Date;
    protocolVersion?: string;
}

function toMegabytes(bytes: number): string {
    return (bytes / BYTES_PER_MB).toFixed(2);
}

function parseContentLength(response: Response): number | undefined {
    const header = response.headers.get('content-length');
    if (header === null) return undefined;
    const value = Number(header);
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
}

/** The part of a file handle a chunk is written through. */
export interface ChunkSink {
    write(buffer: Uint8Array, offset: number, length: number): Promise<{ bytesWritten: number }>;
}

/**
 * Writes the whole chunk, continuing after partial writes. A write that makes
 * no progress is an error, so a short file is never renamed into place.
 */
export async function writeFully(sink: ChunkSink, chunk: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < chunk.byteLength) {
        const { bytesWritten } = await sink.write(chunk, offset, chunk.byteLength - offset);
        if (bytesWritten <= 0) {
            throw new Error(`Short write to backup cache file: ${offset} of ${chunk.byteLength} bytes`);
        }
        offset += bytesWritten;
    }
}

async function statIfExists(localPath: string): Promise<number | undefined> {
    try {
        const info = await stat(localPath);
        return info.isFile() ? info.size : undefined;
    } catch (err) {
        if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return undefined;
        throw err;
    }
}

/**
 * Materializes a backup artifact from the file share into a local cache path.
 * The cache path is the idempotence marker: once it exists no request is made.
 */
export class BackupFetcher {
    private readonly fetchImpl: FetchFn;
    private readonly now: () => Date;
    private readonly protocolVersion: string;

    constructor(options: BackupFetcherOptions = {}) {
        this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
        this.now = options.now ?? (() => new Date());
        this.protocolVersion = options.protocolVersion ?? FILE_SERVICE_VERSION;
    }

    async ensureLocal(source: BackupSource, destPath: string, context: FetchContext): Promise<LocalCacheEntry> {
        const { logger } = context;
        const fileName = sourceFileName(source);

        const existingSize = await statIfExists(destPath);
        if (existingSize !== undefined) {
            logger.info({ fileName, localPath: destPath }, 'Backup already cached locally');
            return { localPath: destPath, exists: true, sizeBytes: existingSize };
        }

        if (source.signingKey === undefined) {
            throw new RestoreError(
                'MissingCredential',
                'Storage account key is required to download the backup',
                { fileName, localPath: destPath }
            );
        }

        const dateHeaderValue = this.now().toUTCString();
        const signature = signRequest({
            method: 'GET',
            canonicalResource: canonicalResource(source),
            dateHeaderValue,
            protocolVersion: this.protocolVersion,
            signingKey: source.signingKey
        });

        logger.info({ fileName }, 'Downloading backup from file share');

        let response: Response;
        try {
            response = await this.fetchImpl(source.sourceUrl, {
                method: 'GET',
                headers: {
                    'x-ms-date': dateHeaderValue,
                    'x-ms-version': this.protocolVersion,
                    Authorization: authorizationHeader(source.accountIdentifier, signature)
                },
                signal: context.signal
            });
        } catch (err) {
            throw ErrorSanitizer.sanitize(err, 'BackupFetcher:Request', 'DownloadFailed');
        }

        if (!response.ok) {
            const body = await response.text().catch((err: unknown) => `<unreadable body: ${String(err)}>`);
            logger.error({ fileName, status: response.status, body }, 'Backup download rejected');
            return { localPath: destPath, exists: false };
        }

        const sizeBytes = await this.streamToFile(response, destPath, context);

        logger.info({ fileName, localPath: destPath, sizeMb: toMegabytes(sizeBytes) }, 'Backup downloaded');
        return { localPath: destPath, exists: true, sizeBytes };
    }

    /**
     * Streams the body into a sibling temp file, then renames it into place.
     * A failed or cancelled download never leaves a file at destPath.
     */
    private async streamToFile(response: Response, destPath: string, context: FetchContext): Promise<number> {
        const { logger, signal } = context;
        const totalBytes = parseContentLength(response);
        if (totalBytes !== undefined) {
            logger.info({ sizeMb: toMegabytes(totalBytes) }, 'Backup size');
        }

        if (!response.body) {
            throw new RestoreError('DownloadFailed', 'Backup download returned no body', { status: response.status });
        }
        const reader = response.body.getReader();
        const partialPath = `${destPath}.${crypto.randomUUID()}.partial`;

        let bytesTransferred = 0;
        let lastReportedPercent = 0;

        try {
            await mkdir(path.dirname(destPath), { recursive: true });
            const handle = await open(partialPath, 'wx');
            try {
                for (;;) {
                    signal?.throwIfAborted();
                    const { done, value } = await reader.read();
                    if (done) break;

                    await writeFully(handle, value);
                    bytesTransferred += value.byteLength;

                    if (totalBytes !== undefined) {
                        const percent = Math.floor((bytesTransferred * 100) / totalBytes);
                        if (percent >= lastReportedPercent + 1) {
                            lastReportedPercent = percent;
                            const progress = { bytesTransferred, totalBytes, percent };
                            logger.info({
                                percent,
                                transferredMb: toMegabytes(bytesTransferred),
                                totalMb: toMegabytes(totalBytes)
                            }, 'Download progress');
                            context.onProgress?.(progress);
                        }
                    }
                }
                await handle.sync();
            } finally {
                await handle.close();
            }

            await rename(partialPath, destPath);
            return bytesTransferred;
        } catch (err) {
            await reader.cancel(err).catch((cancelErr: unknown) => {
                logger.debug({ error: cancelErr instanceof Error ? cancelErr.message : String(cancelErr) }, 'Response stream already closed');
            });
            await rm(partialPath, { force: true }).catch((rmErr: unknown) => {
                logger.warn({ partialPath, error: rmErr instanceof Error ? rmErr.message : String(rmErr) }, 'Could not remove partial download');
            });
            logger.error({ bytesTransferred, error: err instanceof Error ? err.message : String(err) }, 'Backup download interrupted');
            throw ErrorSanitizer.sanitize(err, 'BackupFetcher:Stream', 'DownloadFailed');
        }
    }
}
