import { Pool } from 'pg';
import { WorkflowRunEntity, runStatus } from '../db/workflow_run.entity';
import { NewRun } from '../persistence/run-store';

export class RunRepository {
    constructor(private readonly pool: Pool) { }

    async create(run: NewRun): Promise<WorkflowRunEntity> {
        const res = await this.pool.query<WorkflowRunEntity>(
            `INSERT INTO workflow_runs (run_id, workflow_name, status, input, started_at)
             VALUES ($1, $2, $3, $4, $5)
             RETURNING *`,
            [run.run_id, run.workflow_name, runStatus.RUNNING, run.input, run.started_at],
        );
        return res.rows[0];
    }

    async findById(runId: string): Promise<WorkflowRunEntity | null> {
        const res = await this.pool.query<WorkflowRunEntity>('SELECT * FROM workflow_runs WHERE run_id = $1', [runId]);
        return res.rows[0] || null;
    }

    async updateStatus(runId: string, status: runStatus): Promise<void> {
        await this.pool.query('UPDATE workflow_runs SET status = $1 WHERE run_id = $2', [status, runId]);
    }

    async finish(runId: string, status: runStatus, error: string | null, completedAt: Date): Promise<void> {
        await this.pool.query(
            'UPDATE workflow_runs SET status = $1, error = $2, completed_at = $3 WHERE run_id = $4',
            [status, error, completedAt, runId],
        );
    }
}
