/**
 * Lifecycle states for a workflow run.
 * RUNNING → SUCCEEDED, or RUNNING → COMPENSATING → COMPENSATED/FAILED
 */
export enum runStatus {
    RUNNING = 'RUNNING',
    COMPENSATING = 'COMPENSATING',
    SUCCEEDED = 'SUCCEEDED',
    FAILED = 'FAILED',
    COMPENSATED = 'COMPENSATED'
}

export const TERMINAL_RUN_STATUSES: readonly runStatus[] = [
    runStatus.SUCCEEDED,
    runStatus.FAILED,
    runStatus.COMPENSATED,
];

/**
 * One invocation of a workflow definition. Mutated only by the coordinator.
 */
export type WorkflowRunEntity = {
    run_id: string;
    workflow_name: string;
    status: runStatus;
    input: string | null;  // superjson-encoded initial input, needed to resume
    error: string | null;
    started_at: Date;
    completed_at: Date | null;
};
