import { RestoreError } from '../errors/sanitizer.js';

declare const sqlIdentifierBrand: unique symbol;

/**
 * A database name that is safe to place inside `[...]` in statement text.
 * Only obtainable through {@link toSqlIdentifier}.
 */
export type SqlIdentifier = string & { readonly [sqlIdentifierBrand]: true };

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]{0,127}$/;

export function isSqlIdentifier(value: string): value is SqlIdentifier {
    return IDENTIFIER_PATTERN.test(value);
}

export function toSqlIdentifier(value: string): SqlIdentifier {
    if (!isSqlIdentifier(value)) {
        throw new RestoreError(
            'InvalidIdentifier',
            `Database name must match ${IDENTIFIER_PATTERN.source}`,
            { length: value.length }
        );
    }
    return value;
}

export function bracket(identifier: SqlIdentifier): string {
    return `[${identifier}]`;
}

/** Unicode string literal with embedded quotes doubled. */
export function nvarcharLiteral(value: string): string {
    return `N'${value.replace(/'/g, "''")}'`;
}
