/**
 * Lifecycle states for individual steps within a run.
 */
export enum stepStatus {
    PENDING = 'PENDING',
    EXECUTING = 'EXECUTING',
    COMPLETED = 'COMPLETED',
    FAILED = 'FAILED',
    COMPENSATING = 'COMPENSATING',
    COMPENSATED = 'COMPENSATED'
}

/**
 * Ledger row for one (run, step). Keyed by (run_id, step_name), which is
 * also the idempotency key for the step's execute().
 */
export type StepRecordEntity = {
    run_id: string;
    step_name: string;
    sequence_index: number;
    status: stepStatus;
    input_ref: string | null;
    output_ref: string | null;
    rows_written: number;
    attempt: number;
    error: string | null;
    started_at: Date | null;
    completed_at: Date | null;  // set only when forward execution completed
};
