import { RestoreError } from '../errors/sanitizer.js';

/**
 * Parsed form of an ADO-style SQL Server connection string.
 */
export interface ConnectionEndpoint {
    readonly server: string;
    readonly port?: number;
    readonly user?: string;
    readonly password?: string;
    readonly database?: string;
    readonly encrypt: boolean;
    readonly trustServerCertificate: boolean;
    readonly connectTimeoutMs?: number;
}

const SERVER_KEYS = new Set(['server', 'data source', 'address', 'addr', 'network address']);
const USER_KEYS = new Set(['user id', 'uid', 'user']);
const PASSWORD_KEYS = new Set(['password', 'pwd']);
const DATABASE_KEYS = new Set(['database', 'initial catalog']);
const TIMEOUT_KEYS = new Set(['connect timeout', 'connection timeout', 'timeout']);

/**
 * Splits `Key=Value;...` honouring quoted values ('...', "..." or {...}).
 * Keys are lower-cased and trimmed.
 */
export function tokenizeConnectionString(input: string): Map<string, string> {
    const pairs = new Map<string, string>();
    let i = 0;

    while (i < input.length) {
        const eq = input.indexOf('=', i);
        if (eq === -1) {
            if (input.slice(i).trim() !== '') {
                throw new RestoreError('ConnectionStringUnavailable', 'Connection string has a key without a value');
            }
            break;
        }
        const key = input.slice(i, eq).replace(/^[\s;]+/, '').trim().toLowerCase();
        i = eq + 1;
        while (i < input.length && input[i] === ' ') i++;

        let value: string;
        const opener = input[i];
        const closer = opener === '{' ? '}' : opener;
        if (opener === '"' || opener === "'" || opener === '{') {
            let end = i + 1;
            let collected = '';
            for (;;) {
                const next = input.indexOf(closer, end);
                if (next === -1) {
                    throw new RestoreError('ConnectionStringUnavailable', `Unterminated quoted value for '${key}'`);
                }
                collected += input.slice(end, next);
                // A doubled closer is an escaped literal closer.
                if (input[next + 1] === closer) {
                    collected += closer;
                    end = next + 2;
                    continue;
                }
                end = next + 1;
                break;
            }
            value = collected;
            const semi = input.indexOf(';', end);
            i = semi === -1 ? input.length : semi + 1;
        } else {
            const semi = input.indexOf(';', i);
            value = (semi === -1 ? input.slice(i) : input.slice(i, semi)).trim();
            i = semi === -1 ? input.length : semi + 1;
        }

        if (key !== '') pairs.set(key, value);
    }
    return pairs;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    const normalized = value.trim().toLowerCase();
    if (['true', 'yes', '1', 'mandatory', 'strict'].includes(normalized)) return true;
    if (['false', 'no', '0', 'optional'].includes(normalized)) return false;
    return fallback;
}

function pick(pairs: Map<string, string>, keys: Set<string>): string | undefined {
    for (const [key, value] of pairs) {
        if (keys.has(key)) return value;
    }
    return undefined;
}

export function parseConnectionString(input: string): ConnectionEndpoint {
    const pairs = tokenizeConnectionString(input);

    const rawServer = pick(pairs, SERVER_KEYS);
    if (!rawServer) {
        throw new RestoreError('ConnectionStringUnavailable', 'Connection string does not name a server');
    }

    // Server=tcp:host,port  or  Server=host\instance
    const withoutProtocol = rawServer.replace(/^tcp:/i, '');
    const [host, portText] = withoutProtocol.split(',', 2);
    let port: number | undefined;
    if (portText !== undefined) {
        port = Number(portText.trim());
        if (!Number.isInteger(port) || port <= 0 || port > 65535) {
            throw new RestoreError('ConnectionStringUnavailable', `Invalid port '${portText.trim()}' in connection string`);
        }
    }

    const timeoutText = pick(pairs, TIMEOUT_KEYS);
    const timeoutSeconds = timeoutText === undefined ? undefined : Number(timeoutText);

    return {
        server: host.trim(),
        port,
        user: pick(pairs, USER_KEYS),
        password: pick(pairs, PASSWORD_KEYS),
        database: pick(pairs, DATABASE_KEYS),
        encrypt: parseBoolean(pairs.get('encrypt'), true),
        trustServerCertificate: parseBoolean(pairs.get('trustservercertificate'), false),
        connectTimeoutMs: timeoutSeconds !== undefined && Number.isFinite(timeoutSeconds) && timeoutSeconds > 0
            ? timeoutSeconds * 1000
            : undefined
    };
}

/** The same endpoint, pointed at another catalog. */
export function withCatalog(endpoint: ConnectionEndpoint, database: string): ConnectionEndpoint {
    return { ...endpoint, database };
}
