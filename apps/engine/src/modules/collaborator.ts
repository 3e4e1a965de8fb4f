import { RecoverableStepError, StepError, TerminalStepError } from '@pipewright/sdk';

export type FailureKind = 'recoverable' | 'terminal';

/**
 * What an external collaborator hands back. Collaborators classify their own
 * failures; adapters only translate the classification.
 */
export type CollaboratorResult<T> =
    | { ok: true; value: T }
    | { ok: false; kind: FailureKind; reason: string };

export function succeed<T>(value: T): CollaboratorResult<T> {
    return { ok: true, value };
}

export function fail(kind: FailureKind, reason: string): CollaboratorResult<never> {
    return { ok: false, kind, reason };
}

export function toStepError(kind: FailureKind, reason: string, stepName: string): StepError {
    return kind === 'recoverable'
        ? new RecoverableStepError(reason, { stepName })
        : new TerminalStepError(reason, { stepName });
}

export function unwrap<T>(result: CollaboratorResult<T>, stepName: string): T {
    if (result.ok) return result.value;
    throw toStepError(result.kind, result.reason, stepName);
}
