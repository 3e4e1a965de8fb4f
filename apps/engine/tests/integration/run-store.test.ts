import { InMemoryRunStore } from '../../src/persistence/memory-run-store';
import { PgRunStore } from '../../src/persistence/pg-run-store';
import { RunStore } from '../../src/persistence/run-store';
import { RunNotFoundError } from '../../src/persistence/errors';
import { runStatus } from '../../src/db/workflow_run.entity';
import { stepStatus } from '../../src/db/step_record.entity';
import { createMigratedPool } from '../helpers/db';
import { silenceLogs } from '../helpers/config';

const stores: Array<{ name: string; create(): Promise<RunStore> }> = [
    { name: 'memory', create: async () => new InMemoryRunStore() },
    { name: 'relational', create: async () => new PgRunStore(await createMigratedPool()) },
];

describe.each(stores)('RunStore ($name)', ({ create }) => {
    let store: RunStore;
    const startedAt = new Date('2026-01-05T10:00:00.000Z');

    beforeEach(async () => {
        silenceLogs();
        store = await create();
        await store.createRun({ run_id: 'run-1', workflow_name: 'client-to-delivery', input: '{"json":{}}', started_at: startedAt });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('creates runs as RUNNING', async () => {
        expect(await store.findRun('run-1')).toEqual({
            run_id: 'run-1',
            workflow_name: 'client-to-delivery',
            status: runStatus.RUNNING,
            input: '{"json":{}}',
            error: null,
            started_at: startedAt,
            completed_at: null,
        });
        expect(await store.findRun('run-2')).toBeNull();
    });

    it('records the terminal status', async () => {
        const finishedAt = new Date('2026-01-05T10:05:00.000Z');
        await store.updateRunStatus('run-1', runStatus.COMPENSATING);
        await store.finishRun('run-1', runStatus.COMPENSATED, 'qc: rejected', finishedAt);

        expect(await store.findRun('run-1')).toMatchObject({
            status: runStatus.COMPENSATED,
            error: 'qc: rejected',
            completed_at: finishedAt,
        });
    });

    it('keeps one step record per (run, step)', async () => {
        const first = await store.createOrFindStep('run-1', 'intake', 0, null);
        await store.markExecuting('run-1', 'intake', 1, startedAt);
        const second = await store.createOrFindStep('run-1', 'intake', 0, null);

        expect(first).toMatchObject({ status: stepStatus.PENDING, attempt: 0, rows_written: 0, output_ref: null });
        expect(second).toMatchObject({ status: stepStatus.EXECUTING, attempt: 1, started_at: startedAt });
        expect(await store.listSteps('run-1')).toHaveLength(1);
    });

    it('lists steps in sequence order', async () => {
        await store.createOrFindStep('run-1', 'strategy', 1, 'intake:a');
        await store.createOrFindStep('run-1', 'intake', 0, null);

        expect((await store.listSteps('run-1')).map(s => s.step_name)).toEqual(['intake', 'strategy']);
    });

    it('walks a step through completion and compensation', async () => {
        const completedAt = new Date('2026-01-05T10:01:00.000Z');
        await store.createOrFindStep('run-1', 'intake', 0, null);
        await store.markCompleted('run-1', 'intake', 'intake:a', 3, completedAt);
        await store.markCompensating('run-1', 'intake');
        expect((await store.findStep('run-1', 'intake'))?.status).toBe(stepStatus.COMPENSATING);

        await store.markCompensated('run-1', 'intake');

        expect(await store.findStep('run-1', 'intake')).toMatchObject({
            status: stepStatus.COMPENSATED,
            output_ref: 'intake:a',
            rows_written: 3,
            completed_at: completedAt,
        });
    });

    it('keeps the ref and rows of a failed step', async () => {
        await store.createOrFindStep('run-1', 'qc', 3, 'production:a');
        await store.markFailed('run-1', 'qc', 'QC verdict: fail', 'qc:b', 2);

        expect(await store.findStep('run-1', 'qc')).toMatchObject({
            status: stepStatus.FAILED,
            error: 'QC verdict: fail',
            output_ref: 'qc:b',
            rows_written: 2,
            completed_at: null,
        });
    });

    it('records a failed compensation on the step', async () => {
        await store.createOrFindStep('run-1', 'intake', 0, null);
        await store.markCompleted('run-1', 'intake', 'intake:a', 3, new Date());
        await store.markCompensationFailed('run-1', 'intake', 'CompensationError: boom');

        expect(await store.findStep('run-1', 'intake')).toMatchObject({ status: stepStatus.FAILED, error: 'CompensationError: boom' });
    });

    it('appends compensation logs per run', async () => {
        const log = await store.insertCompensationLog({ run_id: 'run-1', step_name: 'intake', compensated_at: startedAt, rows_affected: 3 });

        expect(log.id).toEqual(expect.any(String));
        expect(await store.listCompensationLogs('run-1')).toEqual([log]);
        expect(await store.listCompensationLogs('run-2')).toEqual([]);
    });
});

describe('InMemoryRunStore', () => {
    it('rejects updates to an unknown run', async () => {
        await expect(new InMemoryRunStore().updateRunStatus('nope', runStatus.FAILED)).rejects.toThrow(RunNotFoundError);
    });

    it('hands out copies', async () => {
        const store = new InMemoryRunStore();
        const run = await store.createRun({ run_id: 'r', workflow_name: 'w', input: null, started_at: new Date() });
        run.status = runStatus.FAILED;

        expect((await store.findRun('r'))?.status).toBe(runStatus.RUNNING);
    });
});
