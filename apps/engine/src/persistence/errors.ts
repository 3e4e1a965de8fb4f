import { ArtifactRef, RecoverableStepError, StepErrorOptions, TerminalStepError, formatArtifactRef } from '@pipewright/sdk';

/** A storage call failed. Transient by assumption; retried like any recoverable step error. */
export class PersistenceError extends RecoverableStepError {
    constructor(message: string, options?: StepErrorOptions) {
        super(message, options);
        this.name = 'PersistenceError';
    }
}

export class ArtifactNotFoundError extends TerminalStepError {
    constructor(public readonly ref: ArtifactRef) {
        super(`Artifact ${formatArtifactRef(ref)} not found`);
        this.name = 'ArtifactNotFoundError';
    }
}

/** Raised when code tries to write into, or claim, a namespace it does not own. */
export class NamespaceViolationError extends TerminalStepError {
    constructor(message: string) {
        super(message);
        this.name = 'NamespaceViolationError';
    }
}

export class RunNotFoundError extends Error {
    constructor(public readonly runId: string) {
        super(`Workflow run ${runId} not found`);
        this.name = 'RunNotFoundError';
    }
}

/** resumeRun was handed a run it cannot continue: another workflow's, or a ledger that contradicts itself. */
export class ResumeRefusedError extends Error {
    constructor(public readonly runId: string, reason: string) {
        super(`Cannot resume run ${runId}: ${reason}`);
        this.name = 'ResumeRefusedError';
    }
}

/**
 * The run ledger stayed unreachable after every retry. The only error
 * runWorkflow lets escape: without the ledger no audit record can be written.
 */
export class StorageUnavailableError extends Error {
    constructor(
        public readonly operation: string,
        public readonly attempts: number,
        public readonly cause: unknown,
    ) {
        super(`Run ledger unavailable during "${operation}" after ${attempts} attempts`);
        this.name = 'StorageUnavailableError';
    }
}

/** Wraps driver errors so the coordinator's retry policy recognises them. */
export async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (err) {
        if (err instanceof RecoverableStepError || err instanceof TerminalStepError) throw err;
        throw new PersistenceError(`${operation} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
}
