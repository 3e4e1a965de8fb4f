import { WorkflowRunEntity, runStatus } from '../db/workflow_run.entity';
import { StepRecordEntity } from '../db/step_record.entity';
import { CompensationLogEntity } from '../db/compensation_log.entity';

export interface NewRun {
    run_id: string;
    workflow_name: string;
    input: string | null;
    started_at: Date;
}

export type NewCompensationLog = Omit<CompensationLogEntity, 'id'>;

/**
 * Run ledger: WorkflowRun, StepRecord and CompensationLog rows.
 * Implemented in memory and on Postgres; both must behave identically.
 */
export interface RunStore {
    createRun(run: NewRun): Promise<WorkflowRunEntity>;
    findRun(runId: string): Promise<WorkflowRunEntity | null>;
    updateRunStatus(runId: string, status: runStatus): Promise<void>;
    finishRun(runId: string, status: runStatus, error: string | null, completedAt: Date): Promise<void>;

    /** Insert-if-absent on (run_id, step_name); returns the existing row on conflict. */
    createOrFindStep(runId: string, stepName: string, sequenceIndex: number, inputRef: string | null): Promise<StepRecordEntity>;
    findStep(runId: string, stepName: string): Promise<StepRecordEntity | null>;
    /** Ordered by sequence_index. */
    listSteps(runId: string): Promise<StepRecordEntity[]>;
    markExecuting(runId: string, stepName: string, attempt: number, startedAt: Date): Promise<void>;
    markCompleted(runId: string, stepName: string, outputRef: string, rowsWritten: number, completedAt: Date): Promise<void>;
    markFailed(runId: string, stepName: string, error: string, outputRef: string | null, rowsWritten: number): Promise<void>;
    markCompensating(runId: string, stepName: string): Promise<void>;
    markCompensated(runId: string, stepName: string): Promise<void>;
    markCompensationFailed(runId: string, stepName: string, error: string): Promise<void>;

    insertCompensationLog(log: NewCompensationLog): Promise<CompensationLogEntity>;
    listCompensationLogs(runId: string): Promise<CompensationLogEntity[]>;
}
