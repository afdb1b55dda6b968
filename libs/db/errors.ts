/** Cannot drop database because it is currently in use. */
export const DATABASE_IN_USE = 3702;

function ownNumber(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('number' in error && typeof error.number === 'number') return error.number;
    if ('engineErrorNumber' in error && typeof error.engineErrorNumber === 'number') return error.engineErrorNumber;
    return undefined;
}

/**
 * Engine error numbers carried by a driver error, including the errors the
 * engine raised earlier in the same batch.
 */
export function sqlErrorNumbers(error: unknown): number[] {
    const numbers: number[] = [];
    const own = ownNumber(error);
    if (own !== undefined) numbers.push(own);

    if (typeof error === 'object' && error !== null && 'precedingErrors' in error && Array.isArray(error.precedingErrors)) {
        for (const preceding of error.precedingErrors) {
            const n = ownNumber(preceding);
            if (n !== undefined) numbers.push(n);
        }
    }
    return numbers;
}

export function isLockContentionError(error: unknown): boolean {
    return sqlErrorNumbers(error).includes(DATABASE_IN_USE);
}
