import { z } from 'zod';
import { v7 as uuid } from 'uuid';
import { ArtifactRef, TerminalStepError, createArtifactRef, formatArtifactRef } from '@pipewright/sdk';
import { ArtifactBackend, RawArtifact, rowCount } from './artifact-backend';
import { ArtifactNotFoundError, NamespaceViolationError } from './errors';

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ArtifactDraft<P, I> {
    runId: string;
    stepName: string;
    payload: P;
    items: I[];
}

export interface StoredArtifact<P, I> extends ArtifactDraft<P, I> {
    ref: ArtifactRef;
    createdAt: Date;
}

export interface SaveResult {
    ref: ArtifactRef;
    rowsWritten: number;
    // false when (runId, stepName) already had a live artifact and nothing was written
    created: boolean;
}

export interface DeleteResult {
    deleted: boolean;
    rowsRemoved: number;
}

/**
 * A module's only way to write storage. Bound to one namespace: refs from
 * any other namespace are refused before the backend sees them.
 */
export class PersistenceGateway<P, I> {
    constructor(
        private readonly backend: ArtifactBackend,
        private readonly payloadSchema: Schema<P>,
        private readonly itemSchema: Schema<I>,
    ) { }

    get namespace(): string {
        return this.backend.schema.namespace;
    }

    /** Idempotent on (runId, stepName): a second save returns the first ref. */
    async save(draft: ArtifactDraft<P, I>): Promise<SaveResult> {
        const existing = await this.backend.findByStep(draft.runId, draft.stepName);
        if (existing) {
            return { ref: this.refFor(existing.id), rowsWritten: rowCount(existing), created: false };
        }

        const payload = this.payloadSchema.safeParse(draft.payload);
        const items = z.array(this.itemSchema).safeParse(draft.items);
        if (!payload.success) throw this.invalid(draft.stepName, payload.error);
        if (!items.success) throw this.invalid(draft.stepName, items.error);

        const id = uuid();
        const rowsWritten = await this.backend.insert({
            id,
            run_id: draft.runId,
            step_name: draft.stepName,
            payload: payload.data,
            items: items.data,
            created_at: new Date(),
        });
        return { ref: this.refFor(id), rowsWritten, created: true };
    }

    async load(ref: ArtifactRef): Promise<StoredArtifact<P, I>> {
        this.assertOwned(ref, 'load');
        const raw = await this.backend.findById(ref.id);
        if (!raw) throw new ArtifactNotFoundError(ref);
        return this.decode(raw);
    }

    async findByStep(runId: string, stepName: string): Promise<StoredArtifact<P, I> | null> {
        const raw = await this.backend.findByStep(runId, stepName);
        return raw ? this.decode(raw) : null;
    }

    async listByRun(runId: string): Promise<ArtifactRef[]> {
        const rows = await this.backend.listByRun(runId);
        return rows.map(row => this.refFor(row.id));
    }

    async delete(ref: ArtifactRef): Promise<DeleteResult> {
        this.assertOwned(ref, 'delete');
        const rowsRemoved = await this.backend.remove(ref.id);
        return { deleted: rowsRemoved > 0, rowsRemoved };
    }

    private refFor(id: string): ArtifactRef {
        return createArtifactRef(this.namespace, id);
    }

    private assertOwned(ref: ArtifactRef, operation: string): void {
        if (ref.namespace !== this.namespace) {
            throw new NamespaceViolationError(
                `Gateway "${this.namespace}" refused to ${operation} ${formatArtifactRef(ref)}`,
            );
        }
    }

    private invalid(stepName: string, error: z.ZodError): TerminalStepError {
        const issue = error.issues[0];
        const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return new TerminalStepError(
            `Refusing to save invalid ${this.namespace} artifact: ${where} ${issue ? issue.message : 'does not match schema'}`,
            { stepName },
        );
    }

    private decode(raw: RawArtifact): StoredArtifact<P, I> {
        const ref = this.refFor(raw.id);
        const payload = this.payloadSchema.safeParse(raw.payload);
        const items = z.array(this.itemSchema).safeParse(raw.items);
        if (!payload.success || !items.success) {
            throw new TerminalStepError(`Stored artifact ${formatArtifactRef(ref)} does not match its schema`);
        }
        return {
            ref,
            runId: raw.run_id,
            stepName: raw.step_name,
            payload: payload.data,
            items: items.data,
            createdAt: raw.created_at,
        };
    }
}
