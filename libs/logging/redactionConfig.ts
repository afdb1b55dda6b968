/**
 * Centralized Redaction Configuration
 * Keys that must never reach the log sink in clear text.
 */
export const REDACT_KEYS = [
    // Storage credentials (Root and Nested)
    'signingKey', '*.signingKey',
    'accountKey', '*.accountKey',
    'authorization', '*.authorization',
    'headers.Authorization', '*.headers.Authorization',
    'signature', '*.signature',

    // Database credentials (Root and Nested)
    'password', '*.password',
    'connectionString', '*.connectionString',

    // Generic secrets
    'secret', '*.secret',
    'token', '*.token'
];

export const REDACT_CENSOR = '[REDACTED]';
