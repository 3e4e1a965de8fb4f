/**
 * Written after each successful compensate(). rows_affected must match
 * the step's rows_written.
 */
export type CompensationLogEntity = {
    id: string;
    run_id: string;
    step_name: string;
    compensated_at: Date;
    rows_affected: number;
};
