import type pg from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { assertDbRole, DB_ROLES, type DbRole } from './roles.js';

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export type TxClient = Queryable;

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

function quoteIdentifier(identifier: string): string {
    const escaped = identifier.replace(/"/g, '""');
    return `"${escaped}"`;
}

async function verifyRole(client: pg.PoolClient, role: DbRole): Promise<void> {
    const roleCheck = await client.query<{ current_user: string }>('SELECT current_user');
    const currentUser = roleCheck.rows[0]?.current_user;
    if (currentUser !== role) {
        throw new Error(`CRITICAL: Role enforcement failure. Target: ${role}, Actual: ${currentUser}`);
    }
}

async function resetRole(client: pg.PoolClient, context: string): Promise<boolean> {
    try {
        await client.query('RESET ROLE');
        return true;
    } catch (error) {
        logger.warn({ error }, `[DB] Failed to reset role during ${context}`);
        return false;
    }
}

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
    role: DbRole,
    callback: (tx: TxClient) => Promise<T>
): Promise<{ result: T } | { error: unknown; taint: boolean }> {
    if (transactionContext.getStore()?.inTx) {
        throw new Error('Nested transaction detected: transactionAsRole cannot be invoked within an active transaction.');
    }

    return transactionContext.run({ inTx: true }, async () => {
        let commitAttempted = false;
        try {
            await client.query('BEGIN');
            await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
            await verifyRole(client, role);

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
            return { error, taint: commitAttempted || rollbackFailed };
        }
    });
}

/**
 * Role-scoped database access over a pg pool.
 * Every call SETs ROLE for its own connection; no role leaks between callers.
 */
export function createDb(pool: pg.Pool) {
    return {
        queryAsRole: async <T extends pg.QueryResultRow = pg.QueryResultRow>(
            role: DbRole,
            text: string,
            params?: unknown[]
        ): Promise<pg.QueryResult<T>> => {
            const validatedRole = assertDbRole(role);
            const client = await pool.connect();
            try {
                await client.query(`SET ROLE ${quoteIdentifier(validatedRole)}`);
                await verifyRole(client, validatedRole);
                return await client.query<T>(text, params);
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryAsRoleFailure');
            } finally {
                const resetOk = await resetRole(client, 'queryAsRole');
                releaseClient(client, !resetOk, 'queryAsRole');
            }
        },

        /**
         * Fail-Safe Transaction Wrapper: commits on success, rolls back on any error.
         * Errors thrown by the callback reach the caller unchanged when they are domain errors.
         */
        transactionAsRole: async <T>(role: DbRole, callback: (client: TxClient) => Promise<T>): Promise<T> => {
            const validatedRole = assertDbRole(role);
            const client = await pool.connect();
            let forceDestroy = false;
            try {
                const outcome = await runTransaction(client, validatedRole, callback);
                if ('result' in outcome) {
                    return outcome.result;
                }
                forceDestroy = outcome.taint;
                throw ErrorSanitizer.sanitize(outcome.error, 'DatabaseLayer:TransactionFailed');
            } finally {
                const resetOk = await resetRole(client, 'transactionAsRole');
                releaseClient(client, forceDestroy || !resetOk, 'transactionAsRole');
            }
        },

        /**
         * Boot-time probe to ensure DB_USER can SET ROLE into each required role.
         */
        probeRoles: async (): Promise<void> => {
            const client = await pool.connect();
            try {
                for (const role of DB_ROLES) {
                    await client.query('BEGIN');
                    try {
                        await client.query(`SET LOCAL ROLE ${quoteIdentifier(role)}`);
                        await verifyRole(client, role);
                        await client.query('ROLLBACK');
                    } catch (error) {
                        try {
                            await client.query('ROLLBACK');
                        } catch (rollbackError) {
                            logger.error({ error: rollbackError }, '[DB] Failed to rollback role probe');
                        }
                        throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:ProbeRolesFailure');
                    }
                }
            } finally {
                releaseClient(client, false, 'probeRoles');
            }
        }
    };
}

export type DbClient = ReturnType<typeof createDb>;

export type { DbRole };
