import { Pool } from 'pg';
import { newDb } from 'pg-mem';
import { migrate } from '../../src/db/schema';

/**
 * In-process Postgres. Each call gets its own empty database, so tests
 * never see each other's rows and need no server.
 */
export function createTestPool(): Pool {
    const db = newDb();
    const adapter = db.adapters.createPg();
    return new adapter.Pool();
}

export async function createMigratedPool(): Promise<Pool> {
    const pool = createTestPool();
    await migrate(pool);
    return pool;
}

export async function countRows(pool: Pool, table: string): Promise<number> {
    const res = await pool.query<{ id: string }>(`SELECT id FROM ${table}`);
    return res.rows.length;
}
