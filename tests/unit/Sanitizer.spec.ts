/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping, kind assignment and credential redaction.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ErrorSanitizer, RestoreError, isRestoreError, redactSecrets } from '../../libs/errors/sanitizer.js';

describe('ErrorSanitizer', () => {
    it('should create RestoreError with incidentId and kind', () => {
        const error = new RestoreError('DownloadFailed', 'Test error', { status: 404 });

        assert.ok(error.incidentId, 'Should have incidentId');
        assert.ok(error.incidentId.length > 0, 'incidentId should not be empty');
        assert.strictEqual(error.message, 'Test error');
        assert.strictEqual(error.kind, 'DownloadFailed');
        assert.strictEqual(error.name, 'RestoreError');
    });

    it('should sanitize raw errors into RestoreError with the context label', () => {
        const rawError = new Error('Login failed: Server=db;User ID=sa;Password=test-password;');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'db-op');

        assert.ok(sanitized instanceof RestoreError, 'Should be RestoreError');
        assert.strictEqual(sanitized.kind, 'RestoreStatementFailed');
        assert.strictEqual(sanitized.contextLabel, 'db-op');
        assert.strictEqual(sanitized.message, 'db-op: Login failed: Server=db;User ID=sa;password=[REDACTED];');
        assert.strictEqual(sanitized.cause, rawError);
    });

    it('should keep the engine error number of a driver error', () => {
        const driverError = Object.assign(new Error('Database is in use'), { number: 3702 });
        const sanitized = ErrorSanitizer.sanitize(driverError, 'drop', 'LockContention');

        assert.strictEqual(sanitized.kind, 'LockContention');
        assert.strictEqual(sanitized.engineErrorNumber, 3702);
    });

    it('should wrap non-Error values', () => {
        assert.strictEqual(ErrorSanitizer.sanitize('plain failure', 'ctx').message, 'ctx: plain failure');
        assert.strictEqual(ErrorSanitizer.sanitize(undefined, 'ctx').message, 'ctx: undefined');
        assert.strictEqual(ErrorSanitizer.sanitize({ message: 'shaped', number: 18456 }, 'ctx').engineErrorNumber, 18456);
    });

    it('should pass through existing RestoreError unchanged', () => {
        const original = new RestoreError('InvalidSource', 'Original');
        const result = ErrorSanitizer.sanitize(original, 'test-context', 'DownloadFailed');

        assert.strictEqual(result, original, 'Should return same instance');
        assert.strictEqual(result.kind, 'InvalidSource');
    });

    it('should narrow by kind', () => {
        const error = new RestoreError('MissingCredential', 'No key');

        assert.strictEqual(isRestoreError(error), true);
        assert.strictEqual(isRestoreError(error, 'MissingCredential'), true);
        assert.strictEqual(isRestoreError(error, 'InvalidCredential'), false);
        assert.strictEqual(isRestoreError(new Error('No key')), false);
    });
});

describe('redactSecrets', () => {
    it('should strip SharedKey authorization values', () => {
        assert.strictEqual(
            redactSecrets('rejected Authorization: SharedKey devstore:abc123+/= header'),
            'rejected Authorization: SharedKey [REDACTED] header'
        );
    });

    it('should strip account keys and SAS signatures', () => {
        assert.strictEqual(redactSecrets('AccountKey=dGVzdA==;EndpointSuffix=x'), 'key=[REDACTED]');
        assert.strictEqual(redactSecrets('https://h/f?sv=1&sig=abc%2B&se=2'), 'https://h/f?sv=1&sig=[REDACTED]&se=2');
    });

    it('should cap the message length', () => {
        assert.strictEqual(redactSecrets('x'.repeat(5000)).length, 1000);
    });
});
