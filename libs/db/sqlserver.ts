import sql from 'mssql';
import type { config as MssqlConfig, ConnectionPool as MssqlPool } from 'mssql';
import type { ConnectionEndpoint } from './connectionString.js';

const { ConnectionPool } = sql;

/** Applied to every statement that does not ask for more. */
export const DEFAULT_STATEMENT_TIMEOUT_MS = 30_000;

export type SqlParams = Readonly<Record<string, string | number>>;

/** One result row keyed by column name; callers validate the shape they need. */
export type SqlRow = Readonly<Record<string, unknown>>;

export interface StatementOptions {
    /** Bound as `@name` inputs. */
    readonly params?: SqlParams;
    readonly timeoutMs?: number;
    readonly signal?: AbortSignal;
}

/**
 * One open connection to one catalog. Statements run one at a time, each in
 * its own implicit transaction; driver errors are thrown unchanged so callers
 * can read the engine error number.
 */
export interface SqlSession {
    readonly database: string;
    query(text: string, options?: StatementOptions): Promise<SqlRow[]>;
    execute(text: string, options?: StatementOptions): Promise<void>;
    close(): Promise<void>;
}

export interface SqlConnector {
    open(endpoint: ConnectionEndpoint, signal?: AbortSignal): Promise<SqlSession>;
}

export class StatementTimeoutError extends Error {
    constructor(public readonly timeoutMs: number, options?: { cause?: unknown }) {
        super(`Statement did not complete within ${timeoutMs} ms`, options);
        this.name = 'StatementTimeoutError';
    }
}

export function toMssqlConfig(endpoint: ConnectionEndpoint): MssqlConfig {
    const [server, instanceName] = endpoint.server.split('\\', 2);
    return {
        server,
        port: endpoint.port,
        user: endpoint.user,
        password: endpoint.password,
        database: endpoint.database,
        connectionTimeout: endpoint.connectTimeoutMs ?? 15_000,
        // Timeouts are enforced per statement through Request.cancel().
        requestTimeout: 0,
        pool: { max: 1, min: 0, idleTimeoutMillis: 30_000 },
        options: {
            encrypt: endpoint.encrypt,
            trustServerCertificate: endpoint.trustServerCertificate,
            ...(instanceName ? { instanceName } : {})
        }
    };
}

class MssqlSession implements SqlSession {
    constructor(private readonly pool: MssqlPool, public readonly database: string) { }

    async query(text: string, options: StatementOptions = {}): Promise<SqlRow[]> {
        const { params = {}, timeoutMs = DEFAULT_STATEMENT_TIMEOUT_MS, signal } = options;
        signal?.throwIfAborted();

        const request = this.pool.request();
        for (const [name, value] of Object.entries(params)) {
            request.input(name, value);
        }

        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            request.cancel();
        }, timeoutMs);
        const onAbort = () => request.cancel();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const result = await request.query<Record<string, unknown>>(text);
            return Array.from(result.recordset ?? []);
        } catch (err) {
            if (timedOut) throw new StatementTimeoutError(timeoutMs, { cause: err });
            signal?.throwIfAborted();
            throw err;
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    async execute(text: string, options?: StatementOptions): Promise<void> {
        await this.query(text, options);
    }

    async close(): Promise<void> {
        await this.pool.close();
    }
}

/**
 * Opens single-connection pools through the mssql driver.
 */
export const mssqlConnector: SqlConnector = {
    async open(endpoint: ConnectionEndpoint, signal?: AbortSignal): Promise<SqlSession> {
        signal?.throwIfAborted();
        const pool = new ConnectionPool(toMssqlConfig(endpoint));
        await pool.connect();
        return new MssqlSession(pool, endpoint.database ?? 'master');
    }
};
