import { v7 as uuid } from 'uuid';
import {
    ArtifactRef,
    CompensationError,
    CompensationOutcome,
    StepContext,
    StepDefinition,
    StepInput,
    StepOutcome,
    TerminalStepError,
    WorkflowDefinition,
    WorkflowResult,
    classifyError,
    describeError,
    deserialize,
    errored,
    formatArtifactRef,
    parseArtifactRef,
    serialize,
} from '@pipewright/sdk';
import { CoordinatorConfig } from '../config';
import { TERMINAL_RUN_STATUSES, WorkflowRunEntity, runStatus } from '../db/workflow_run.entity';
import { StepRecordEntity, stepStatus } from '../db/step_record.entity';
import { EventBus, StepEvent } from '../events/event-bus';
import { ArtifactReader } from '../persistence/artifact-storage';
import { RunStore } from '../persistence/run-store';
import { PersistenceError, ResumeRefusedError, RunNotFoundError, StorageUnavailableError } from '../persistence/errors';
import { backOffFor } from '../utils/backoff';
import { sleep, withTimeout } from '../utils/timing';

const TAG = '[saga]';

export interface SagaCoordinatorDeps {
    runs: RunStore;
    artifacts: ArtifactReader;
    events: EventBus;
    config: CoordinatorConfig;
}

interface RunScope {
    definition: WorkflowDefinition;
    runId: string;
    initialInput: unknown;
}

interface StepProgress {
    step: StepDefinition;
    index: number;
    ref: ArtifactRef;
}

interface StepFailure {
    step: StepDefinition;
    index: number;
    reason: string;
    // Rows the failing step itself persisted (a rejected QC result); cleaned up first
    ownRef: ArtifactRef | null;
}

/**
 * Drives one workflow run forward step by step and, on the first terminal
 * failure, compensates every completed step in reverse completion order.
 *
 * Not a singleton: construct one per runtime with its ledger and bus. A
 * coordinator keeps no per-run state between calls, so concurrent
 * runWorkflow() calls are independent.
 */
export class SagaCoordinator {
    private readonly runs: RunStore;
    private readonly artifacts: ArtifactReader;
    private readonly events: EventBus;
    private readonly config: CoordinatorConfig;

    constructor(deps: SagaCoordinatorDeps) {
        this.runs = deps.runs;
        this.artifacts = deps.artifacts;
        this.events = deps.events;
        this.config = deps.config;
    }

    async runWorkflow(definition: WorkflowDefinition, initialInput: unknown): Promise<WorkflowResult> {
        const runId = uuid();
        let input: string | null = null;
        let refusal: TerminalStepError | null = null;
        try {
            input = serialize(initialInput) || null;
        } catch (err) {
            refusal = new TerminalStepError(`Initial input rejected: ${describeError(err)}`, { cause: err });
        }

        await this.ledger('create run', () => this.runs.createRun({
            run_id: runId,
            workflow_name: definition.name,
            input,
            started_at: new Date(),
        }));
        console.log(`${TAG} run ${runId} (${definition.name}): started, ${definition.steps.length} steps`);

        const scope: RunScope = { definition, runId, initialInput };
        if (refusal) return this.refuseInput(scope, refusal);
        return this.drive(scope);
    }

    /**
     * Re-drives a run a previous process left RUNNING or COMPENSATING.
     * COMPLETED steps are reused from the ledger, never executed again.
     * A run that already reached a terminal status is reported as-is.
     */
    async resumeRun(definition: WorkflowDefinition, runId: string): Promise<WorkflowResult> {
        const run = await this.getRunStatus(runId);
        if (run.workflow_name !== definition.name) {
            throw new ResumeRefusedError(runId, `it belongs to workflow "${run.workflow_name}", not "${definition.name}"`);
        }
        const records = await this.getStepRecords(runId);
        if (TERMINAL_RUN_STATUSES.includes(run.status)) {
            return this.resultFrom(run, records);
        }

        const scope: RunScope = { definition, runId, initialInput: deserialize(run.input) };
        if (run.status === runStatus.COMPENSATING) {
            console.log(`${TAG} run ${runId}: resuming compensation`);
            const failure = this.failureFrom(scope, records);
            if (!failure) {
                throw new ResumeRefusedError(runId, 'it is COMPENSATING but no step record is FAILED');
            }
            return this.compensate(scope, this.progressFrom(scope, records), failure, records);
        }

        console.log(`${TAG} run ${runId}: resuming forward execution`);
        return this.drive(scope);
    }

    async getRunStatus(runId: string): Promise<WorkflowRunEntity> {
        const run = await this.runs.findRun(runId);
        if (!run) throw new RunNotFoundError(runId);
        return run;
    }

    async getStepRecords(runId: string): Promise<StepRecordEntity[]> {
        return this.runs.listSteps(runId);
    }

    private async drive(scope: RunScope): Promise<WorkflowResult> {
        const { definition, runId } = scope;
        const completed: StepProgress[] = [];
        let input: StepInput = null;

        for (const [index, step] of definition.steps.entries()) {
            const inputRef = input ? formatArtifactRef(input) : null;
            const record = await this.ledger(`create step ${step.name}`,
                () => this.runs.createOrFindStep(runId, step.name, index, inputRef));

            if (record.status === stepStatus.COMPLETED && record.output_ref) {
                const ref = parseArtifactRef(record.output_ref);
                completed.push({ step, index, ref });
                console.log(`${TAG} run ${runId} step ${step.name}: already completed, reusing ${record.output_ref}`);
                this.events.publish('step.completed', {
                    ...this.stepEvent(scope, step, index),
                    outputRef: record.output_ref,
                    rowsWritten: record.rows_written,
                    metadata: {},
                    reused: true,
                });
                input = ref;
                continue;
            }

            if (record.status === stepStatus.FAILED) {
                // A previous process recorded the failure but died before compensating
                const failure: StepFailure = {
                    step,
                    index,
                    reason: record.error ?? 'unknown failure',
                    ownRef: record.output_ref ? parseArtifactRef(record.output_ref) : null,
                };
                return this.compensate(scope, completed, failure, await this.getStepRecords(runId));
            }

            const outcome = await this.executeStep(scope, step, index, input);

            if (outcome.status === 'COMPLETED') {
                const outputRef = formatArtifactRef(outcome.outputRef);
                await this.ledger(`complete step ${step.name}`,
                    () => this.runs.markCompleted(runId, step.name, outputRef, outcome.rowsWritten, new Date()));
                completed.push({ step, index, ref: outcome.outputRef });
                console.log(`${TAG} run ${runId} step ${step.name}: completed (${outcome.rowsWritten} rows)`);
                this.events.publish('step.completed', {
                    ...this.stepEvent(scope, step, index),
                    outputRef,
                    rowsWritten: outcome.rowsWritten,
                    metadata: outcome.metadata,
                    reused: false,
                });
                input = outcome.outputRef;
                continue;
            }

            const failure = await this.recordFailure(scope, step, index, outcome);
            return this.compensate(scope, completed, failure, []);
        }

        await this.ledger('finish run', () => this.runs.finishRun(runId, runStatus.SUCCEEDED, null, new Date()));
        const completedSteps = completed.map(p => p.step.name);
        console.log(`${TAG} run ${runId}: SUCCEEDED`);
        this.events.publish('run.terminal', {
            runId,
            workflowName: definition.name,
            status: runStatus.SUCCEEDED,
            completedSteps,
            compensatedSteps: [],
        });

        return {
            success: true,
            runId,
            completedSteps,
            compensatedSteps: [],
            failedStep: null,
            failedCompensations: [],
        };
    }

    /**
     * Runs execute() until it completes, rejects, or fails terminally.
     * Recoverable errors (timeouts included) are retried with backoff and
     * become terminal once the step's attempts are spent.
     */
    private async executeStep(scope: RunScope, step: StepDefinition, index: number, input: StepInput): Promise<StepOutcome> {
        const maxAttempts = step.maxAttempts ?? this.config.stepRetry.maxAttempts;
        const timeoutMs = step.timeoutMs ?? this.config.stepTimeoutMs;

        for (let attempt = 1; ; attempt++) {
            await this.ledger(`start step ${step.name}`,
                () => this.runs.markExecuting(scope.runId, step.name, attempt, new Date()));
            this.events.publish('step.started', { ...this.stepEvent(scope, step, index), attempt });

            let outcome: StepOutcome;
            try {
                outcome = await withTimeout(
                    signal => step.port.execute(this.context(scope, step, index, attempt, signal), input),
                    timeoutMs,
                    step.name,
                );
            } catch (err) {
                outcome = errored(classifyError(err, step.name));
            }

            if (outcome.status !== 'ERRORED' || !outcome.error.recoverable) return outcome;

            if (attempt >= maxAttempts) {
                return errored(new TerminalStepError(
                    `Step "${step.name}" failed after ${attempt} attempts: ${outcome.error.message}`,
                    { stepName: step.name, cause: outcome.error },
                ));
            }

            const delayMs = backOffFor(this.config.stepRetry, attempt);
            console.warn(`${TAG} run ${scope.runId} step ${step.name}: attempt ${attempt} failed, retrying in ${delayMs}ms: ${describeError(outcome.error)}`);
            this.events.publish('step.retrying', {
                ...this.stepEvent(scope, step, index),
                attempt,
                delayMs,
                error: describeError(outcome.error),
            });
            await sleep(delayMs);
        }
    }

    /** Fails the first step without running it: the initial input cannot be stored. */
    private async refuseInput(scope: RunScope, error: TerminalStepError): Promise<WorkflowResult> {
        const [first] = scope.definition.steps;
        await this.ledger(`create step ${first.name}`, () => this.runs.createOrFindStep(scope.runId, first.name, 0, null));
        const failure = await this.recordFailure(scope, first, 0, errored(error));
        return this.compensate(scope, [], failure, []);
    }

    private async recordFailure(
        scope: RunScope,
        step: StepDefinition,
        index: number,
        outcome: Exclude<StepOutcome, { status: 'COMPLETED' }>,
    ): Promise<StepFailure> {
        const rejected = outcome.status === 'REJECTED';
        const reason = rejected ? outcome.reason : describeError(outcome.error);
        let ownRef = rejected ? outcome.outputRef : null;
        let rowsWritten = rejected ? outcome.rowsWritten : 0;

        if (!ownRef) {
            // An attempt that timed out may still have saved before it noticed
            const stray = await this.ledger(`find ${step.name} artifact`,
                () => this.artifacts.findByStep(scope.runId, step.name));
            if (stray) {
                console.warn(`${TAG} run ${scope.runId} step ${step.name}: failed with ${formatArtifactRef(stray.ref)} saved, cleaning it up`);
                ownRef = stray.ref;
                rowsWritten = stray.rows;
            }
        }

        await this.ledger(`fail step ${step.name}`, () => this.runs.markFailed(
            scope.runId, step.name, reason, ownRef ? formatArtifactRef(ownRef) : null, rowsWritten,
        ));

        if (rejected) {
            console.warn(`${TAG} run ${scope.runId} step ${step.name}: rejected: ${reason}`);
        } else {
            console.error(`${TAG} run ${scope.runId} step ${step.name}: failed:`, outcome.error);
        }
        this.events.publish('step.failed', {
            ...this.stepEvent(scope, step, index),
            kind: rejected ? 'rejected' : 'errored',
            reason,
        });

        return { step, index, reason, ownRef };
    }

    /**
     * Best-effort LIFO rollback. A compensate() that fails is logged, left
     * FAILED in the ledger and reported; the remaining steps still run.
     * `records` is the ledger as read on resume, empty on a first pass.
     */
    private async compensate(
        scope: RunScope,
        completed: StepProgress[],
        failure: StepFailure,
        records: StepRecordEntity[],
    ): Promise<WorkflowResult> {
        const { definition, runId } = scope;
        await this.ledger('mark run compensating', () => this.runs.updateRunStatus(runId, runStatus.COMPENSATING));
        console.log(`${TAG} run ${runId}: compensating ${completed.length} steps after "${failure.step.name}" failed`);

        const alreadyCompensated = new Set(
            records.filter(r => r.status === stepStatus.COMPENSATED).map(r => r.step_name),
        );
        const recordOf = (name: string) => records.find(r => r.step_name === name);
        const failedCompensations: string[] = [];
        let attempted = 0;

        if (failure.ownRef && !(await this.hasCompensationLog(runId, failure.step.name))) {
            attempted++;
            const ownRecord = recordOf(failure.step.name);
            const ok = ownRecord && !(await this.stillExists(failure.ownRef))
                ? await this.settleCompensated(scope, failure.step, failure.index, ownRecord.rows_written, false)
                : await this.compensateOne(scope, failure.step, failure.index, failure.ownRef, false);
            if (!ok) failedCompensations.push(failure.step.name);
        }

        const compensatedSteps: string[] = [];
        for (const progress of [...completed].reverse()) {
            compensatedSteps.push(progress.step.name);
            if (alreadyCompensated.has(progress.step.name)) continue;
            attempted++;
            const record = recordOf(progress.step.name);
            // A crash between delete and ledger update leaves COMPENSATING with the rows already gone
            const ok = record?.status === stepStatus.COMPENSATING && !(await this.stillExists(progress.ref))
                ? await this.settleCompensated(scope, progress.step, progress.index, record.rows_written, true)
                : await this.compensateOne(scope, progress.step, progress.index, progress.ref, true);
            if (!ok) failedCompensations.push(progress.step.name);
        }

        // Nothing to undo, or something left behind: the run ends FAILED
        const undone = attempted + alreadyCompensated.size > 0;
        const status = undone && failedCompensations.length === 0 ? runStatus.COMPENSATED : runStatus.FAILED;
        const error = `${failure.step.name}: ${failure.reason}`;
        await this.ledger('finish run', () => this.runs.finishRun(runId, status, error, new Date()));

        const completedSteps = completed.map(p => p.step.name);
        if (failedCompensations.length > 0) {
            console.error(`${TAG} run ${runId}: ${status}, compensation failed for: ${failedCompensations.join(', ')}`);
        } else {
            console.log(`${TAG} run ${runId}: ${status} (${compensatedSteps.length} steps compensated)`);
        }
        this.events.publish('run.terminal', {
            runId,
            workflowName: definition.name,
            status,
            completedSteps,
            compensatedSteps,
        });

        return {
            success: false,
            runId,
            completedSteps,
            compensatedSteps,
            failedStep: failure.step.name,
            failedCompensations,
        };
    }

    /**
     * Compensates one step and writes its CompensationLog. `trackStatus` is
     * false for the failing step's own clean-up: its record stays FAILED.
     */
    private async compensateOne(
        scope: RunScope,
        step: StepDefinition,
        index: number,
        ref: ArtifactRef,
        trackStatus: boolean,
    ): Promise<boolean> {
        const { runId } = scope;
        if (trackStatus) {
            await this.ledger(`mark ${step.name} compensating`, () => this.runs.markCompensating(runId, step.name));
        }

        let outcome: CompensationOutcome;
        try {
            outcome = await this.invokeCompensate(scope, step, index, ref);
        } catch (err) {
            const failure = new CompensationError(step.name, err);
            console.error(`${TAG} run ${runId} step ${step.name}: ${failure.message}`, err);
            if (trackStatus) {
                await this.ledger(`mark ${step.name} compensation failed`,
                    () => this.runs.markCompensationFailed(runId, step.name, describeError(failure)));
            }
            this.events.publish('step.compensation_failed', {
                ...this.stepEvent(scope, step, index),
                error: describeError(err),
            });
            return false;
        }

        if (trackStatus) {
            await this.ledger(`mark ${step.name} compensated`, () => this.runs.markCompensated(runId, step.name));
        }
        await this.ledger(`log ${step.name} compensation`, () => this.runs.insertCompensationLog({
            run_id: runId,
            step_name: step.name,
            compensated_at: new Date(),
            rows_affected: outcome.rowsRemoved,
        }));
        console.log(`${TAG} run ${runId} step ${step.name}: compensated (${outcome.rowsRemoved} rows removed)`);
        this.events.publish('step.compensated', {
            ...this.stepEvent(scope, step, index),
            rowsRemoved: outcome.rowsRemoved,
        });
        return true;
    }

    /**
     * Records a compensation an earlier process already carried out: the
     * artifact is gone, so the log takes the rows the step wrote.
     */
    private async settleCompensated(
        scope: RunScope,
        step: StepDefinition,
        index: number,
        rowsWritten: number,
        trackStatus: boolean,
    ): Promise<boolean> {
        const { runId } = scope;
        if (trackStatus) {
            await this.ledger(`mark ${step.name} compensated`, () => this.runs.markCompensated(runId, step.name));
        }
        if (!(await this.hasCompensationLog(runId, step.name))) {
            await this.ledger(`log ${step.name} compensation`, () => this.runs.insertCompensationLog({
                run_id: runId,
                step_name: step.name,
                compensated_at: new Date(),
                rows_affected: rowsWritten,
            }));
        }
        console.log(`${TAG} run ${runId} step ${step.name}: already compensated before the restart (${rowsWritten} rows)`);
        this.events.publish('step.compensated', {
            ...this.stepEvent(scope, step, index),
            rowsRemoved: rowsWritten,
        });
        return true;
    }

    private stillExists(ref: ArtifactRef): Promise<boolean> {
        return this.ledger(`check ${formatArtifactRef(ref)}`, () => this.artifacts.exists(ref));
    }

    private async invokeCompensate(scope: RunScope, step: StepDefinition, index: number, ref: ArtifactRef): Promise<CompensationOutcome> {
        const maxAttempts = step.maxAttempts ?? this.config.stepRetry.maxAttempts;
        const timeoutMs = step.timeoutMs ?? this.config.stepTimeoutMs;

        for (let attempt = 1; ; attempt++) {
            try {
                return await withTimeout(
                    signal => step.port.compensate(this.context(scope, step, index, attempt, signal), ref),
                    timeoutMs,
                    step.name,
                );
            } catch (err) {
                const error = classifyError(err, step.name);
                if (!error.recoverable || attempt >= maxAttempts) throw error;
                const delayMs = backOffFor(this.config.stepRetry, attempt);
                console.warn(`${TAG} run ${scope.runId} step ${step.name}: compensate attempt ${attempt} failed, retrying in ${delayMs}ms: ${describeError(error)}`);
                await sleep(delayMs);
            }
        }
    }

    /**
     * Ledger writes retry PersistenceError with the storage policy. When the
     * ledger stays down there is nowhere to record the outcome, so the run
     * is abandoned with StorageUnavailableError.
     */
    private async ledger<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        const policy = this.config.storageRetry;
        for (let attempt = 1; ; attempt++) {
            try {
                return await fn();
            } catch (err) {
                if (!(err instanceof PersistenceError)) throw err;
                if (attempt >= policy.maxAttempts) {
                    console.error(`${TAG} ledger "${operation}" failed after ${attempt} attempts:`, err);
                    throw new StorageUnavailableError(operation, attempt, err);
                }
                const delayMs = backOffFor(policy, attempt);
                console.warn(`${TAG} ledger "${operation}" failed, retrying in ${delayMs}ms: ${err.message}`);
                await sleep(delayMs);
            }
        }
    }

    private async hasCompensationLog(runId: string, stepName: string): Promise<boolean> {
        const logs = await this.ledger('read compensation logs', () => this.runs.listCompensationLogs(runId));
        return logs.some(log => log.step_name === stepName);
    }

    private context(scope: RunScope, step: StepDefinition, index: number, attempt: number, signal: AbortSignal): StepContext {
        return {
            runId: scope.runId,
            workflowName: scope.definition.name,
            stepName: step.name,
            sequenceIndex: index,
            attempt,
            initialInput: scope.initialInput,
            signal,
            fetch: ref => this.artifacts.fetch(ref),
        };
    }

    private stepEvent(scope: RunScope, step: StepDefinition, index: number): StepEvent {
        return {
            runId: scope.runId,
            workflowName: scope.definition.name,
            stepName: step.name,
            sequenceIndex: index,
        };
    }

    // Steps whose forward execution finished, in the order they completed
    private progressFrom(scope: RunScope, records: StepRecordEntity[]): StepProgress[] {
        const progress: StepProgress[] = [];
        for (const [index, step] of scope.definition.steps.entries()) {
            const record = records.find(r => r.step_name === step.name);
            if (!record || !record.completed_at || !record.output_ref) continue;
            progress.push({ step, index, ref: parseArtifactRef(record.output_ref) });
        }
        return progress;
    }

    private failureFrom(scope: RunScope, records: StepRecordEntity[]): StepFailure | null {
        for (const [index, step] of scope.definition.steps.entries()) {
            const record = records.find(r => r.step_name === step.name);
            if (!record || record.status !== stepStatus.FAILED || record.completed_at) continue;
            return {
                step,
                index,
                reason: record.error ?? 'unknown failure',
                ownRef: record.output_ref ? parseArtifactRef(record.output_ref) : null,
            };
        }
        return null;
    }

    private resultFrom(run: WorkflowRunEntity, records: StepRecordEntity[]): WorkflowResult {
        const forward = records.filter(r => r.completed_at !== null);
        const completedSteps = forward.map(r => r.step_name);
        if (run.status === runStatus.SUCCEEDED) {
            return { success: true, runId: run.run_id, completedSteps, compensatedSteps: [], failedStep: null, failedCompensations: [] };
        }
        const failed = records.find(r => r.status === stepStatus.FAILED && r.completed_at === null);
        return {
            success: false,
            runId: run.run_id,
            completedSteps,
            compensatedSteps: [...completedSteps].reverse(),
            failedStep: failed ? failed.step_name : null,
            failedCompensations: forward.filter(r => r.status === stepStatus.FAILED).map(r => r.step_name),
        };
    }
}
