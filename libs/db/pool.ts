import pg from 'pg';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';

const { Pool } = pg;

/**
 * Connection settings for the Outcome Log database, read from the environment
 * after the fail-closed guards have passed.
 */
export interface DatabaseSettings {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly max: number;
    readonly ssl: false | { rejectUnauthorized: true; ca: string | undefined };
}

export function readDatabaseSettings(env: NodeJS.ProcessEnv = process.env): DatabaseSettings {
    const isProtectedEnv = env.NODE_ENV === 'production' || env.NODE_ENV === 'staging';
    const poolMax = env.DB_POOL_MAX ? Number.parseInt(env.DB_POOL_MAX, 10) : 10;
    const useTls = isProtectedEnv || env.DB_SSL_QUERY === 'true';

    return {
        host: env.DB_HOST ?? '',
        port: Number.parseInt(env.DB_PORT ?? '', 10),
        user: env.DB_USER ?? '',
        password: env.DB_PASSWORD ?? '',
        database: env.DB_NAME ?? '',
        max: Number.isFinite(poolMax) && poolMax > 0 ? poolMax : 10,
        ssl: useTls ? { rejectUnauthorized: true, ca: env.DB_CA_CERT } : false
    };
}

/**
 * Creates the pooled PostgreSQL connection used by the Outcome Log.
 * Exits the process when the database guards fail.
 */
export function createPool(env: NodeJS.ProcessEnv = process.env): pg.Pool {
    ConfigGuard.enforce(DB_CONFIG_GUARDS, env);

    const settings = readDatabaseSettings(env);
    return new Pool({
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database,
        max: settings.max,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: settings.ssl
    });
}
