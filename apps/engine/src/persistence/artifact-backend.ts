import { ModuleSchema } from './module-schema';

/** Untyped storage row as kept by a backend; the gateway validates it on the way out. */
export interface RawArtifact {
    id: string;
    run_id: string;
    step_name: string;
    payload: unknown;
    items: unknown[];
    created_at: Date;
}

/**
 * One module's storage partition. All reads see live artifacts only:
 * removed or tombstoned artifacts do not exist as far as callers can tell.
 */
export interface ArtifactBackend {
    readonly schema: ModuleSchema;
    init(): Promise<void>;
    /** Returns the number of rows written (root + items). */
    insert(artifact: RawArtifact): Promise<number>;
    findById(id: string): Promise<RawArtifact | null>;
    findByStep(runId: string, stepName: string): Promise<RawArtifact | null>;
    listByRun(runId: string): Promise<RawArtifact[]>;
    /** Returns the number of rows removed or tombstoned; 0 when nothing was live. */
    remove(id: string): Promise<number>;
}

export const rowCount = (artifact: Pick<RawArtifact, 'items'>) => 1 + artifact.items.length;
