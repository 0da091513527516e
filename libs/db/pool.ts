import pg from 'pg';
import type { DbConnectionConfig } from '../bootstrap/config/db-config.js';

const { Pool } = pg;

/**
 * PostgreSQL pool. Callers enforce DB_CONFIG_GUARDS before building the config.
 */
export function createPool(config: DbConnectionConfig): pg.Pool {
    return new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.max,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.ssl ? { rejectUnauthorized: true } : false
    });
}
