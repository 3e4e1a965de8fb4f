import { StepContext, WorkflowResult, completed, parseArtifactRef } from '@pipewright/sdk';
import { Runtime } from '../../src/runtime';
import { EventRecorder } from '../../src/events/audit-log';
import { runStatus } from '../../src/db/workflow_run.entity';
import { stepStatus } from '../../src/db/step_record.entity';
import { MODES, silenceLogs } from '../helpers/config';
import { createTestRuntime, liveSteps } from '../helpers/runtime';
import {
    EXPECTED_ROWS,
    collaborators,
    flaky,
    rejectingEvaluator,
    sampleRequest,
    throwingPackager,
} from '../helpers/collaborators';
import { DeliveryPackager, createLocalCollaborators } from '../../src/modules';
import { sleep } from '../../src/utils/timing';

const ALL_STEPS = ['intake', 'strategy', 'production', 'qc', 'delivery'];

function contextFor(runtime: Runtime, runId: string, stepName: string, sequenceIndex: number): StepContext {
    const reader = runtime.persistence.artifacts.reader();
    return {
        runId,
        workflowName: runtime.pipeline.name,
        stepName,
        sequenceIndex,
        attempt: 1,
        initialInput: sampleRequest,
        signal: new AbortController().signal,
        fetch: ref => reader.fetch(ref),
    };
}

describe.each(MODES)('content pipeline (%s)', (mode) => {
    beforeEach(() => silenceLogs());
    afterEach(() => jest.restoreAllMocks());

    async function run(runtime: Runtime): Promise<WorkflowResult> {
        return runtime.coordinator.runWorkflow(runtime.pipeline, sampleRequest);
    }

    it('Scenario A: delivers when every step succeeds', async () => {
        const runtime = await createTestRuntime(mode, collaborators());

        const result = await run(runtime);

        expect(result).toEqual({
            success: true,
            runId: result.runId,
            completedSteps: ALL_STEPS,
            compensatedSteps: [],
            failedStep: null,
            failedCompensations: [],
        });
        expect((await runtime.coordinator.getRunStatus(result.runId)).status).toBe(runStatus.SUCCEEDED);
        expect(await liveSteps(runtime, result.runId)).toEqual([...ALL_STEPS].sort());

        const records = await runtime.coordinator.getStepRecords(result.runId);
        expect(records.map(r => [r.step_name, r.status, r.rows_written])).toEqual(
            ALL_STEPS.map(step => [step, stepStatus.COMPLETED, EXPECTED_ROWS[step]]),
        );
        expect(await runtime.integrity.check(result.runId)).toEqual([]);
        await runtime.close();
    });

    it('follows the QC result back to the draft when delivering', async () => {
        const runtime = await createTestRuntime(mode, collaborators());
        const result = await run(runtime);
        const records = await runtime.coordinator.getStepRecords(result.runId);
        const production = records.find(r => r.step_name === 'production');
        const delivery = records.find(r => r.step_name === 'delivery');

        const envelope = await runtime.persistence.artifacts.reader().fetch(parseArtifactRef(delivery?.output_ref ?? ''));

        expect(envelope.payload).toMatchObject({ draftRef: production?.output_ref, qcScore: 100, fileCount: 3 });
        expect(envelope.items[0]).toMatchObject({ name: 'draft.md', mediaType: 'text/markdown' });
    });

    it('Scenario B: compensates everything when delivery fails', async () => {
        const runtime = await createTestRuntime(mode, collaborators({ packager: throwingPackager }));
        const recorder = new EventRecorder(runtime.events);

        const result = await run(runtime);

        expect(result).toEqual({
            success: false,
            runId: result.runId,
            completedSteps: ['intake', 'strategy', 'production', 'qc'],
            compensatedSteps: ['qc', 'production', 'strategy', 'intake'],
            failedStep: 'delivery',
            failedCompensations: [],
        });
        expect(await liveSteps(runtime, result.runId)).toEqual([]);

        const status = await runtime.coordinator.getRunStatus(result.runId);
        expect(status.status).toBe(runStatus.COMPENSATED);
        expect(status.error).toBe('delivery: TerminalStepError: Export target rejected the package');

        const logs = await runtime.persistence.runs.listCompensationLogs(result.runId);
        expect(logs.map(l => [l.step_name, l.rows_affected])).toEqual([
            ['qc', 1], ['production', 3], ['strategy', 3], ['intake', 3],
        ]);
        expect(recorder.channels().filter(c => c === 'step.compensated')).toHaveLength(4);
        expect(await runtime.integrity.check(result.runId)).toEqual([]);
    });

    it('Scenario C: a failing QC verdict compensates QC and every prior step', async () => {
        const runtime = await createTestRuntime(mode, collaborators({ evaluator: rejectingEvaluator }));
        const recorder = new EventRecorder(runtime.events);

        const result = await run(runtime);

        expect(result).toEqual({
            success: false,
            runId: result.runId,
            completedSteps: ['intake', 'strategy', 'production'],
            compensatedSteps: ['production', 'strategy', 'intake'],
            failedStep: 'qc',
            failedCompensations: [],
        });
        expect(await liveSteps(runtime, result.runId)).toEqual([]);

        const qc = await runtime.persistence.runs.findStep(result.runId, 'qc');
        expect(qc).toMatchObject({ status: stepStatus.FAILED, rows_written: 2, error: 'QC verdict: fail (score 40): Off-brand tone' });

        const logs = await runtime.persistence.runs.listCompensationLogs(result.runId);
        expect(logs.map(l => [l.step_name, l.rows_affected])).toEqual([
            ['qc', 2], ['production', 3], ['strategy', 3], ['intake', 3],
        ]);

        const failed = recorder.events.find(e => e.channel === 'step.failed');
        expect(failed?.payload).toMatchObject({ stepName: 'qc', kind: 'rejected' });
        expect(recorder.events.some(e => 'stepName' in e.payload && e.payload.stepName === 'delivery')).toBe(false);
        expect(await runtime.integrity.check(result.runId)).toEqual([]);
    });

    it('Scenario D: a second compensate removes nothing and does not throw', async () => {
        const runtime = await createTestRuntime(mode, collaborators());
        const result = await run(runtime);
        const record = await runtime.persistence.runs.findStep(result.runId, 'intake');
        const ref = parseArtifactRef(record?.output_ref ?? '');
        const ctx = contextFor(runtime, result.runId, 'intake', 0);

        expect(await runtime.ports.intake.compensate(ctx, ref)).toEqual({ rowsRemoved: 3 });
        expect(await runtime.ports.intake.compensate(ctx, ref)).toEqual({ rowsRemoved: 0 });
    });

    it('returns the cached ref when a step executes twice for the same run', async () => {
        const runtime = await createTestRuntime(mode, collaborators());
        const result = await run(runtime);
        const record = await runtime.persistence.runs.findStep(result.runId, 'intake');

        const again = await runtime.ports.intake.execute(contextFor(runtime, result.runId, 'intake', 0), null);

        expect(again).toEqual(completed(parseArtifactRef(record?.output_ref ?? ''), 3));
        expect(await liveSteps(runtime, result.runId)).toEqual([...ALL_STEPS].sort());
    });

    it('fails at intake, with nothing to undo, on an invalid request', async () => {
        const runtime = await createTestRuntime(mode, collaborators());

        const result = await runtime.coordinator.runWorkflow(runtime.pipeline, { clientName: 'Acme' });

        expect(result).toMatchObject({ success: false, failedStep: 'intake', completedSteps: [], compensatedSteps: [] });
        expect((await runtime.coordinator.getRunStatus(result.runId)).status).toBe(runStatus.FAILED);
        expect(await liveSteps(runtime, result.runId)).toEqual([]);
    });

    it('leaves nothing behind when a timed-out delivery finishes late', async () => {
        const local = createLocalCollaborators();
        const slowPackager: DeliveryPackager = {
            // Ignores the abort signal and returns after the coordinator has given up
            async package(draft, signal) {
                await sleep(120);
                return local.packager.package(draft, signal);
            },
        };
        const runtime = await createTestRuntime(mode, collaborators({ packager: slowPackager }), {
            stepOptions: { delivery: { timeoutMs: 30, maxAttempts: 1 } },
        });

        const result = await run(runtime);
        await sleep(150);

        expect(result).toMatchObject({
            success: false,
            failedStep: 'delivery',
            compensatedSteps: ['qc', 'production', 'strategy', 'intake'],
            failedCompensations: [],
        });
        expect(await liveSteps(runtime, result.runId)).toEqual([]);
        expect(await runtime.integrity.check(result.runId)).toEqual([]);
    });

    it('retries a collaborator that reports a transient failure', async () => {
        const generator = flaky(2, createLocalCollaborators().generator.generate);
        const runtime = await createTestRuntime(mode, collaborators({ generator: { generate: generator.fn } }));

        const result = await run(runtime);

        expect(result.success).toBe(true);
        expect(generator.calls()).toBe(3);
        expect((await runtime.persistence.runs.findStep(result.runId, 'strategy'))?.attempt).toBe(3);
    });
});
