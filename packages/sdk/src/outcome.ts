import { ArtifactRef, StepMetadata, StepOutcome } from './types';
import { StepError } from './errors';

export function completed(outputRef: ArtifactRef, rowsWritten: number, metadata: StepMetadata = {}): StepOutcome {
    return { status: 'COMPLETED', outputRef, rowsWritten, metadata };
}

export function rejected(
    reason: string,
    outputRef: ArtifactRef | null = null,
    rowsWritten = 0,
    metadata: StepMetadata = {},
): StepOutcome {
    return { status: 'REJECTED', outputRef, rowsWritten, reason, metadata };
}

export function errored(error: StepError): Extract<StepOutcome, { status: 'ERRORED' }> {
    return { status: 'ERRORED', error };
}
