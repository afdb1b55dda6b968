import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { isLockContentionError } from '../db/errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, { signal });
};

export interface LockRetryPolicy {
    /** Total attempts, including the first. */
    readonly maxAttempts: number;
    /** Fixed gap between attempts; no growth, no jitter. */
    readonly delayMs: number;
}

export const DROP_RETRY_POLICY: LockRetryPolicy = Object.freeze({ maxAttempts: 3, delayMs: 2000 });

export interface LockRetryContext {
    readonly logger: Logger;
    readonly signal?: AbortSignal;
    readonly sleep?: Sleep;
    readonly label: string;
}

/**
 * Runs an exclusive operation, retrying only while the engine reports the
 * object in use. Any other error is wrapped as RestoreStatementFailed at once;
 * running out of attempts surfaces as LockContention.
 */
export async function withLockRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: LockRetryPolicy,
    context: LockRetryContext
): Promise<T> {
    const sleep = context.sleep ?? defaultSleep;

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (err) {
            context.signal?.throwIfAborted();

            if (!isLockContentionError(err)) {
                throw ErrorSanitizer.sanitize(err, context.label, 'RestoreStatementFailed');
            }
            if (attempt >= policy.maxAttempts) {
                throw ErrorSanitizer.sanitize(err, `${context.label}: still in use after ${attempt} attempts`, 'LockContention');
            }

            context.logger.warn({ attempt, maxAttempts: policy.maxAttempts, delayMs: policy.delayMs }, `${context.label}: database in use, waiting before retry`);
            await sleep(policy.delayMs, context.signal);
        }
    }
}
