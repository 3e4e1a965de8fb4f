import type { StepError } from './errors';

/**
 * Opaque, immutable pointer to an artifact owned by one module.
 * Downstream steps hold only this, never the producing module's types.
 */
export interface ArtifactRef {
    readonly namespace: string;
    readonly id: string;
}

/** Upstream artifact as seen through the read-only fetch accessor. */
export interface ArtifactEnvelope {
    ref: ArtifactRef;
    runId: string;
    stepName: string;
    payload: unknown;
    items: unknown[];
    createdAt: Date;
}

export interface StepContext {
    runId: string;
    workflowName: string;
    stepName: string;
    sequenceIndex: number;
    attempt: number;
    initialInput: unknown;
    // Fires when the per-step timeout elapses
    signal: AbortSignal;
    fetch(ref: ArtifactRef): Promise<ArtifactEnvelope>;
}

/** The first step receives null and reads ctx.initialInput. */
export type StepInput = ArtifactRef | null;

export type StepMetadata = Record<string, unknown>;

export type StepOutcome =
    | {
        status: 'COMPLETED';
        outputRef: ArtifactRef;
        rowsWritten: number;
        metadata: StepMetadata;
    }
    | {
        status: 'REJECTED';
        outputRef: ArtifactRef | null;
        rowsWritten: number;
        reason: string;
        metadata: StepMetadata;
    }
    | {
        status: 'ERRORED';
        error: StepError;
    };

export interface CompensationOutcome {
    rowsRemoved: number;
}

export interface StepPort {
    execute(ctx: StepContext, input: StepInput): Promise<StepOutcome>;
    compensate(ctx: StepContext, outputRef: ArtifactRef): Promise<CompensationOutcome>;
}

export interface StepOptions {
    timeoutMs?: number;
    maxAttempts?: number;
}

export interface StepDefinition extends StepOptions {
    name: string;
    port: StepPort;
}

export interface WorkflowDefinition {
    readonly name: string;
    readonly steps: readonly StepDefinition[];
}

export interface WorkflowResult {
    success: boolean;
    runId: string;
    completedSteps: string[];
    compensatedSteps: string[];
    failedStep: string | null;
    failedCompensations: string[];
}
