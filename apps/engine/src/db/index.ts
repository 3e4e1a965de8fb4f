/**
 * Postgres connection management for relational persistence mode.
 */
import { Pool } from 'pg';
import { EngineConfig } from '../config';

const TAG = '[db]';

/**
 * Postgres connection pool:
 * - max: DB_POOL_MAX connections (default 20)
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(config: Pick<EngineConfig, 'databaseUrl' | 'dbPoolMax'>): Pool {
    const pool = new Pool({
        connectionString: config.databaseUrl,
        max: config.dbPoolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    // Idle-client errors are logged only; failing queries surface as PersistenceError.
    pool.on('error', (err) => {
        console.error(`${TAG} unexpected error on idle client`, err);
    });

    return pool;
}
