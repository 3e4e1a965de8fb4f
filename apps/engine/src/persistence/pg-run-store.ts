import { Pool } from 'pg';
import { WorkflowRunEntity, runStatus } from '../db/workflow_run.entity';
import { StepRecordEntity, stepStatus } from '../db/step_record.entity';
import { CompensationLogEntity } from '../db/compensation_log.entity';
import { RunRepository } from '../repositories/run.repository';
import { StepRepository } from '../repositories/step.repository';
import { CompensationLogRepository } from '../repositories/compensation-log.repository';
import { NewCompensationLog, NewRun, RunStore } from './run-store';
import { guarded } from './errors';

/** Durable ledger. Rows stay after the run ends, for audit and polling. */
export class PgRunStore implements RunStore {
    private runRepo: RunRepository;
    private stepRepo: StepRepository;
    private compensationRepo: CompensationLogRepository;

    constructor(pool: Pool) {
        this.runRepo = new RunRepository(pool);
        this.stepRepo = new StepRepository(pool);
        this.compensationRepo = new CompensationLogRepository(pool);
    }

    createRun(run: NewRun): Promise<WorkflowRunEntity> {
        return guarded('create run', () => this.runRepo.create(run));
    }

    findRun(runId: string): Promise<WorkflowRunEntity | null> {
        return guarded('find run', () => this.runRepo.findById(runId));
    }

    updateRunStatus(runId: string, status: runStatus): Promise<void> {
        return guarded('update run status', () => this.runRepo.updateStatus(runId, status));
    }

    finishRun(runId: string, status: runStatus, error: string | null, completedAt: Date): Promise<void> {
        return guarded('finish run', () => this.runRepo.finish(runId, status, error, completedAt));
    }

    createOrFindStep(runId: string, stepName: string, sequenceIndex: number, inputRef: string | null): Promise<StepRecordEntity> {
        return guarded('create step record', () => this.stepRepo.createOrFind(runId, stepName, sequenceIndex, inputRef));
    }

    findStep(runId: string, stepName: string): Promise<StepRecordEntity | null> {
        return guarded('find step record', () => this.stepRepo.findByRunAndName(runId, stepName));
    }

    listSteps(runId: string): Promise<StepRecordEntity[]> {
        return guarded('list step records', () => this.stepRepo.findByRunId(runId));
    }

    markExecuting(runId: string, stepName: string, attempt: number, startedAt: Date): Promise<void> {
        return guarded('mark step executing', () => this.stepRepo.updateExecuting(runId, stepName, attempt, startedAt));
    }

    markCompleted(runId: string, stepName: string, outputRef: string, rowsWritten: number, completedAt: Date): Promise<void> {
        return guarded('mark step completed', () => this.stepRepo.updateCompleted(runId, stepName, outputRef, rowsWritten, completedAt));
    }

    markFailed(runId: string, stepName: string, error: string, outputRef: string | null, rowsWritten: number): Promise<void> {
        return guarded('mark step failed', () => this.stepRepo.updateFailed(runId, stepName, error, outputRef, rowsWritten));
    }

    markCompensating(runId: string, stepName: string): Promise<void> {
        return guarded('mark step compensating', () => this.stepRepo.updateStatus(runId, stepName, stepStatus.COMPENSATING));
    }

    markCompensated(runId: string, stepName: string): Promise<void> {
        return guarded('mark step compensated', () => this.stepRepo.updateStatus(runId, stepName, stepStatus.COMPENSATED));
    }

    markCompensationFailed(runId: string, stepName: string, error: string): Promise<void> {
        return guarded('mark compensation failed', () => this.stepRepo.updateStatus(runId, stepName, stepStatus.FAILED, error));
    }

    insertCompensationLog(log: NewCompensationLog): Promise<CompensationLogEntity> {
        return guarded('insert compensation log', () => this.compensationRepo.insert(log));
    }

    listCompensationLogs(runId: string): Promise<CompensationLogEntity[]> {
        return guarded('list compensation logs', () => this.compensationRepo.findByRunId(runId));
    }
}
