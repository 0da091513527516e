import type { GuardRule } from '../config-guard.js';

/**
 * DB Configuration Guards
 * Connection parameters have no inline defaults.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD' },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: () => process.env.NODE_ENV !== 'production' || process.env.DB_SSL !== 'false',
        message: 'DB_SSL=false is forbidden in production',
    }
];

export interface DbConnectionConfig {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    max: number;
    ssl: boolean;
}

/**
 * Read connection settings after DB_CONFIG_GUARDS has passed.
 */
export function readDbConnectionConfig(env: NodeJS.ProcessEnv = process.env): DbConnectionConfig {
    const poolMax = env.DB_POOL_MAX ? parseInt(env.DB_POOL_MAX, 10) : 20;
    return {
        host: env.DB_HOST ?? '',
        port: parseInt(env.DB_PORT ?? '5432', 10),
        user: env.DB_USER ?? '',
        password: env.DB_PASSWORD ?? '',
        database: env.DB_NAME ?? '',
        max: Number.isFinite(poolMax) ? poolMax : 20,
        ssl: env.DB_SSL === 'true' || env.NODE_ENV === 'production'
    };
}
