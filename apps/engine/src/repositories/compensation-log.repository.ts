import { Pool } from 'pg';
import { v7 as uuid } from 'uuid';
import { CompensationLogEntity } from '../db/compensation_log.entity';
import { NewCompensationLog } from '../persistence/run-store';

export class CompensationLogRepository {
    constructor(private readonly pool: Pool) { }

    async insert(log: NewCompensationLog): Promise<CompensationLogEntity> {
        const res = await this.pool.query<CompensationLogEntity>(
            `INSERT INTO compensation_logs (id, run_id, step_name, compensated_at, rows_affected)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING *`,
            [uuid(), log.run_id, log.step_name, log.compensated_at, log.rows_affected],
        );
        return res.rows[0];
    }

    async findByRunId(runId: string): Promise<CompensationLogEntity[]> {
        const res = await this.pool.query<CompensationLogEntity>(
            'SELECT * FROM compensation_logs WHERE run_id = $1 ORDER BY compensated_at ASC, id ASC',
            [runId],
        );
        return res.rows;
    }
}
