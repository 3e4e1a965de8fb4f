import { v7 as uuid } from 'uuid';
import { WorkflowRunEntity, runStatus } from '../db/workflow_run.entity';
import { StepRecordEntity, stepStatus } from '../db/step_record.entity';
import { CompensationLogEntity } from '../db/compensation_log.entity';
import { NewCompensationLog, NewRun, RunStore } from './run-store';
import { RunNotFoundError } from './errors';

const stepKey = (runId: string, stepName: string) => `${runId}\u0000${stepName}`;

/**
 * Process-local ledger. Rows are copied on the way in and out so callers
 * cannot mutate stored state, matching what a database round trip gives.
 */
export class InMemoryRunStore implements RunStore {
    private runs = new Map<string, WorkflowRunEntity>();
    private steps = new Map<string, StepRecordEntity>();
    private compensations: CompensationLogEntity[] = [];

    async createRun(run: NewRun): Promise<WorkflowRunEntity> {
        const row: WorkflowRunEntity = {
            ...run,
            status: runStatus.RUNNING,
            error: null,
            completed_at: null,
        };
        this.runs.set(run.run_id, row);
        return { ...row };
    }

    async findRun(runId: string): Promise<WorkflowRunEntity | null> {
        const row = this.runs.get(runId);
        return row ? { ...row } : null;
    }

    async updateRunStatus(runId: string, status: runStatus): Promise<void> {
        this.run(runId).status = status;
    }

    async finishRun(runId: string, status: runStatus, error: string | null, completedAt: Date): Promise<void> {
        const row = this.run(runId);
        row.status = status;
        row.error = error;
        row.completed_at = completedAt;
    }

    async createOrFindStep(runId: string, stepName: string, sequenceIndex: number, inputRef: string | null): Promise<StepRecordEntity> {
        const key = stepKey(runId, stepName);
        const existing = this.steps.get(key);
        if (existing) return { ...existing };

        const row: StepRecordEntity = {
            run_id: runId,
            step_name: stepName,
            sequence_index: sequenceIndex,
            status: stepStatus.PENDING,
            input_ref: inputRef,
            output_ref: null,
            rows_written: 0,
            attempt: 0,
            error: null,
            started_at: null,
            completed_at: null,
        };
        this.steps.set(key, row);
        return { ...row };
    }

    async findStep(runId: string, stepName: string): Promise<StepRecordEntity | null> {
        const row = this.steps.get(stepKey(runId, stepName));
        return row ? { ...row } : null;
    }

    async listSteps(runId: string): Promise<StepRecordEntity[]> {
        return Array.from(this.steps.values())
            .filter(row => row.run_id === runId)
            .sort((a, b) => a.sequence_index - b.sequence_index)
            .map(row => ({ ...row }));
    }

    async markExecuting(runId: string, stepName: string, attempt: number, startedAt: Date): Promise<void> {
        Object.assign(this.step(runId, stepName), { status: stepStatus.EXECUTING, attempt, started_at: startedAt });
    }

    async markCompleted(runId: string, stepName: string, outputRef: string, rowsWritten: number, completedAt: Date): Promise<void> {
        Object.assign(this.step(runId, stepName), {
            status: stepStatus.COMPLETED,
            output_ref: outputRef,
            rows_written: rowsWritten,
            error: null,
            completed_at: completedAt,
        });
    }

    async markFailed(runId: string, stepName: string, error: string, outputRef: string | null, rowsWritten: number): Promise<void> {
        Object.assign(this.step(runId, stepName), {
            status: stepStatus.FAILED,
            error,
            output_ref: outputRef,
            rows_written: rowsWritten,
        });
    }

    async markCompensating(runId: string, stepName: string): Promise<void> {
        this.step(runId, stepName).status = stepStatus.COMPENSATING;
    }

    async markCompensated(runId: string, stepName: string): Promise<void> {
        this.step(runId, stepName).status = stepStatus.COMPENSATED;
    }

    async markCompensationFailed(runId: string, stepName: string, error: string): Promise<void> {
        Object.assign(this.step(runId, stepName), { status: stepStatus.FAILED, error });
    }

    async insertCompensationLog(log: NewCompensationLog): Promise<CompensationLogEntity> {
        const row: CompensationLogEntity = { id: uuid(), ...log };
        this.compensations.push(row);
        return { ...row };
    }

    async listCompensationLogs(runId: string): Promise<CompensationLogEntity[]> {
        return this.compensations
            .filter(row => row.run_id === runId)
            .map(row => ({ ...row }));
    }

    private run(runId: string): WorkflowRunEntity {
        const row = this.runs.get(runId);
        if (!row) throw new RunNotFoundError(runId);
        return row;
    }

    private step(runId: string, stepName: string): StepRecordEntity {
        const row = this.steps.get(stepKey(runId, stepName));
        if (!row) throw new Error(`Step (${runId}, ${stepName}) has no record`);
        return row;
    }
}
