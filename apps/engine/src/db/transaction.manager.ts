import { Pool, PoolClient } from 'pg';

/**
 * Runs multi-statement writes atomically with automatic rollback on errors.
 * Used by the relational artifact backend so a root row and its items are
 * written or removed together.
 */
export class TransactionManager {
    constructor(private pool: Pool) { }

    /**
     * Executes a callback within a database transaction.
     * Automatically commits on success, rolls back on error.
     *
     * @throws Re-throws any error from the callback after rollback
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('DELETE FROM qc_issues WHERE artifact_id = $1', [id]);
     *   await client.query('DELETE FROM qc_results WHERE id = $1', [id]);
     * });
     */
    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
