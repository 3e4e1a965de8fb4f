export interface StepErrorOptions {
    stepName?: string;
    cause?: unknown;
}

export abstract class StepError extends Error {
    abstract readonly recoverable: boolean;
    readonly stepName: string | undefined;
    readonly cause: unknown;

    constructor(message: string, options: StepErrorOptions = {}) {
        super(message);
        this.stepName = options.stepName;
        this.cause = options.cause;
    }
}

/** Transient failure (timeout, rate limit, storage hiccup). Retried with backoff. */
export class RecoverableStepError extends StepError {
    readonly recoverable = true;

    constructor(message: string, options?: StepErrorOptions) {
        super(message, options);
        this.name = 'RecoverableStepError';
    }
}

/** Business or validation rejection. Compensation starts immediately. */
export class TerminalStepError extends StepError {
    readonly recoverable = false;

    constructor(message: string, options?: StepErrorOptions) {
        super(message, options);
        this.name = 'TerminalStepError';
    }
}

export class StepTimeoutError extends RecoverableStepError {
    constructor(public readonly timeoutMs: number, options?: StepErrorOptions) {
        super(`Step timed out after ${timeoutMs}ms`, options);
        this.name = 'StepTimeoutError';
    }
}

export class CompensationError extends Error {
    constructor(
        public readonly stepName: string,
        public readonly cause: unknown,
    ) {
        super(`Compensation of "${stepName}" failed: ${describeError(cause)}`);
        this.name = 'CompensationError';
    }
}

export type ConsistencyViolationKind =
    | 'missing-artifact'
    | 'orphaned-artifact'
    | 'untracked-artifact'
    | 'compensation-mismatch';

/**
 * Integrity finding. Reported by the integrity checker, never thrown mid-workflow.
 */
export class ConsistencyViolation extends Error {
    constructor(
        public readonly kind: ConsistencyViolationKind,
        public readonly runId: string,
        public readonly stepName: string,
        detail: string,
    ) {
        super(`[${kind}] run ${runId} step ${stepName}: ${detail}`);
        this.name = 'ConsistencyViolation';
    }
}

export class WorkflowDefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'WorkflowDefinitionError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}

/**
 * Maps anything thrown by a port into the step error taxonomy.
 * Unclassified errors are terminal: retrying an unknown failure is not safe.
 */
export function classifyError(err: unknown, stepName?: string): StepError {
    if (err instanceof StepError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new TerminalStepError(message, { stepName, cause: err });
}
