import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { RestoreError, type RestoreErrorKind } from '../errors/sanitizer.js';

/**
 * Parses untrusted input against a schema.
 * Throws a RestoreError of the given kind on failure; only issue paths are logged, never values.
 */
export function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    data: unknown,
    context: string,
    kind: RestoreErrorKind = 'ConfigurationInvalid'
): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new RestoreError(kind, `Validation failed in ${context}: ${JSON.stringify(errorDetails)}`, { errors: errorDetails });
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>, kind?: RestoreErrorKind) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel, kind);
};
