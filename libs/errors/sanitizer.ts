import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Failure taxonomy for one bring-up run.
 * Every fatal condition surfaces as exactly one of these kinds.
 */
export type RestoreErrorKind =
    | 'MissingCredential'            // Signing key absent while a download is required
    | 'InvalidCredential'            // Signing key present but not usable as an HMAC key
    | 'InvalidSource'                // Source URL does not name an account, share and file
    | 'InvalidIdentifier'            // Database name outside the identifier allow-list
    | 'DownloadFailed'               // Non-success status or stream fault
    | 'LockContention'               // Target still in use after every drop attempt
    | 'RestoreStatementFailed'       // Any other engine error during drop/restore/finalize
    | 'ConnectionStringUnavailable'  // Target could not materialize its connection string
    | 'ConfigurationInvalid';        // Environment failed schema validation

/**
 * Error with an incident ID for log correlation.
 * The full internal details are logged once, at construction.
 */
export class RestoreError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly engineErrorNumber?: number;
    public override cause?: unknown;

    constructor(
        public readonly kind: RestoreErrorKind,
        message: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; engineErrorNumber?: number }
    ) {
        super(message);
        this.name = 'RestoreError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.engineErrorNumber = options?.engineErrorNumber;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            kind: this.kind,
            contextLabel: this.contextLabel,
            engineErrorNumber: this.engineErrorNumber,
            internalDetails
        }, message);
    }
}

export function isRestoreError(err: unknown, kind?: RestoreErrorKind): err is RestoreError {
    return err instanceof RestoreError && (kind === undefined || err.kind === kind);
}

/**
 * Strips credentials that drivers and HTTP stacks like to echo back.
 */
export function redactSecrets(message: string): string {
    return message
        .replace(/password\s*[=:]\s*[^;\s]+/gi, 'password=[REDACTED]')
        .replace(/pwd\s*[=:]\s*[^;\s]+/gi, 'pwd=[REDACTED]')
        .replace(/SharedKey\s+[^:\s]+:\S+/g, 'SharedKey [REDACTED]')
        .replace(/(account)?key\s*[=:]\s*\S+/gi, 'key=[REDACTED]')
        .replace(/sig=[^&\s]+/gi, 'sig=[REDACTED]')
        .substring(0, 1000);
}

function readEngineErrorNumber(err: object): number | undefined {
    return 'number' in err && typeof err.number === 'number' ? err.number : undefined;
}

export const ErrorSanitizer = {
    /**
     * Wraps any thrown value into a RestoreError of the given kind.
     * Existing RestoreErrors pass through unchanged.
     */
    sanitize: (err: unknown, contextLabel: string, kind: RestoreErrorKind = 'RestoreStatementFailed'): RestoreError => {
        if (err instanceof RestoreError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let engineErrorNumber: number | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            engineErrorNumber = readEngineErrorNumber(err);
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object') {
            if ('message' in err && typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            engineErrorNumber = readEngineErrorNumber(err);
        } else {
            originalErrorMessage = String(err);
        }

        const safeMessage = redactSecrets(originalErrorMessage ?? 'Unknown error');

        return new RestoreError(
            kind,
            `${contextLabel}: ${safeMessage}`,
            { originalError: safeMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel, engineErrorNumber }
        );
    }
};
