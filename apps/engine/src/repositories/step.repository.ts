import { Pool } from 'pg';
import { StepRecordEntity, stepStatus } from '../db/step_record.entity';

export class StepRepository {
    constructor(private readonly pool: Pool) { }

    async createOrFind(runId: string, stepName: string, sequenceIndex: number, inputRef: string | null): Promise<StepRecordEntity> {
        // Single upsert keyed on (run_id, step_name)
        const res = await this.pool.query<StepRecordEntity>(
            `INSERT INTO step_records (run_id, step_name, sequence_index, status, input_ref, rows_written, attempt)
             VALUES ($1, $2, $3, $4, $5, 0, 0)
             ON CONFLICT (run_id, step_name) DO NOTHING
             RETURNING *`,
            [runId, stepName, sequenceIndex, stepStatus.PENDING, inputRef],
        );

        if (res.rows[0]) return res.rows[0];

        const existing = await this.findByRunAndName(runId, stepName);
        if (existing) return existing;
        throw new Error(`Step (${runId}, ${stepName}) vanished after conflict`);
    }

    async findByRunAndName(runId: string, stepName: string): Promise<StepRecordEntity | null> {
        // Composite primary key guarantees at most one row
        const res = await this.pool.query<StepRecordEntity>(
            'SELECT * FROM step_records WHERE run_id = $1 AND step_name = $2',
            [runId, stepName],
        );
        return res.rows[0] || null;
    }

    async findByRunId(runId: string): Promise<StepRecordEntity[]> {
        const res = await this.pool.query<StepRecordEntity>(
            'SELECT * FROM step_records WHERE run_id = $1 ORDER BY sequence_index ASC',
            [runId],
        );
        return res.rows;
    }

    async updateExecuting(runId: string, stepName: string, attempt: number, startedAt: Date): Promise<void> {
        await this.pool.query(
            'UPDATE step_records SET status = $1, attempt = $2, started_at = $3 WHERE run_id = $4 AND step_name = $5',
            [stepStatus.EXECUTING, attempt, startedAt, runId, stepName],
        );
    }

    async updateCompleted(runId: string, stepName: string, outputRef: string, rowsWritten: number, completedAt: Date): Promise<void> {
        await this.pool.query(
            `UPDATE step_records
             SET status = $1, output_ref = $2, rows_written = $3, error = NULL, completed_at = $4
             WHERE run_id = $5 AND step_name = $6`,
            [stepStatus.COMPLETED, outputRef, rowsWritten, completedAt, runId, stepName],
        );
    }

    async updateFailed(runId: string, stepName: string, error: string, outputRef: string | null, rowsWritten: number): Promise<void> {
        await this.pool.query(
            `UPDATE step_records
             SET status = $1, error = $2, output_ref = $3, rows_written = $4
             WHERE run_id = $5 AND step_name = $6`,
            [stepStatus.FAILED, error, outputRef, rowsWritten, runId, stepName],
        );
    }

    async updateStatus(runId: string, stepName: string, status: stepStatus, error?: string): Promise<void> {
        if (error === undefined) {
            await this.pool.query(
                'UPDATE step_records SET status = $1 WHERE run_id = $2 AND step_name = $3',
                [status, runId, stepName],
            );
            return;
        }
        await this.pool.query(
            'UPDATE step_records SET status = $1, error = $2 WHERE run_id = $3 AND step_name = $4',
            [status, error, runId, stepName],
        );
    }
}
