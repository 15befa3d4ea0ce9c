import pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import type { DatabaseConfig } from '../config/coreConfig.js';
import { PROTECTED_ENVIRONMENTS } from '../config/configGuard.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { ConfigurationError } from '../errors/coreErrors.js';
import { logger } from '../logging/logger.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

/**
 * Untyped row access. Stores that depend on this validate every row they
 * read; a Database satisfies it.
 */
export type RowQuery = {
    query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
};

export type RowStore = RowQuery & {
    transaction<T>(callback: (tx: RowQuery) => Promise<T>): Promise<T>;
};

/**
 * Pooled PostgreSQL access used by the audit store and the IAM identity
 * source.
 */
export interface Database extends Queryable {
    /**
     * Fail-safe transaction wrapper. Rolls back on any error and rethrows it
     * sanitized; nested transactions are rejected.
     */
    transaction<T>(callback: (tx: TxClient) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function releaseClient(client: pg.PoolClient, forceDestroy: boolean, context: string): void {
    try {
        if (forceDestroy) {
            client.release(new Error(`[DB] Forcing client destroy after ${context}`));
        } else {
            client.release();
        }
    } catch (error) {
        logger.error({ error }, `[DB] Failed to release client during ${context}`);
    }
}

async function runTransaction<T>(
    client: pg.PoolClient,
    callback: (tx: TxClient) => Promise<T>
): Promise<{ result: T } | { error: unknown; tainted: boolean }> {
    const store = transactionContext.getStore();
    if (store?.inTx) {
        throw new Error('Nested transaction detected: transaction cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        let commitAttempted = false;
        try {
            await client.query('BEGIN');

            const txClient: TxClient = {
                query: <R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
                    client.query<R>(text, params)
            };

            const result = await callback(txClient);
            commitAttempted = true;
            await client.query('COMMIT');
            return { result };
        } catch (error) {
            let rollbackFailed = false;
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                rollbackFailed = true;
                logger.error({ error: rollbackError }, '[DB] Failed to rollback transaction');
            }
            // A client whose commit or rollback failed is not returned to the pool.
            return { error, tainted: commitAttempted || rollbackFailed };
        }
    });
}

export function createDatabase(config: DatabaseConfig, environment: string): Database {
    const isProtectedEnv = PROTECTED_ENVIRONMENTS.has(environment);
    if (isProtectedEnv && !config.caCert) {
        throw new ConfigurationError(['DB_CA_CERT is required in production/staging']);
    }

    const pool = new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.caCert ? { rejectUnauthorized: true, ca: config.caCert } : false
    });

    pool.on('error', error => {
        logger.error({ error }, '[DB] Idle client error');
    });

    return {
        query: async <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) => {
            try {
                return await pool.query<T>(text, params);
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryFailure');
            }
        },

        transaction: async <T>(callback: (tx: TxClient) => Promise<T>): Promise<T> => {
            const client = await pool.connect();
            let forceDestroy = false;
            try {
                const outcome = await runTransaction(client, callback);
                if ('result' in outcome) return outcome.result;
                forceDestroy = outcome.tainted;
                throw ErrorSanitizer.sanitize(outcome.error, 'DatabaseLayer:TransactionFailed');
            } finally {
                releaseClient(client, forceDestroy, 'transaction');
            }
        },

        close: async () => {
            await pool.end();
        }
    };
}
