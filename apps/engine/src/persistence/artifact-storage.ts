import { ArtifactEnvelope, ArtifactRef, createArtifactRef } from '@pipewright/sdk';
import { ArtifactBackend, rowCount } from './artifact-backend';
import { ModuleSchema } from './module-schema';
import { PersistenceGateway, Schema } from './gateway';
import { ArtifactNotFoundError, NamespaceViolationError } from './errors';

export type BackendFactory = (schema: ModuleSchema) => ArtifactBackend;

/** Cross-namespace, read-only access handed to steps as ctx.fetch. */
export interface ArtifactReader {
    fetch(ref: ArtifactRef): Promise<ArtifactEnvelope>;
    exists(ref: ArtifactRef): Promise<boolean>;
    /** The live artifact a step saved in this run, in whichever namespace holds it. */
    findByStep(runId: string, stepName: string): Promise<LiveArtifact | null>;
}

export interface LiveArtifact {
    ref: ArtifactRef;
    stepName: string;
    rows: number;
}

/**
 * Owns every module partition of one persistence mode. Each namespace can
 * be claimed once; the claimant gets the only writable gateway for it.
 */
export class ArtifactStorage {
    private backends = new Map<string, ArtifactBackend>();
    private tables = new Map<string, string>();

    constructor(private readonly createBackend: BackendFactory) { }

    claim<P, I>(schema: ModuleSchema, payloadSchema: Schema<P>, itemSchema: Schema<I>): PersistenceGateway<P, I> {
        if (this.backends.has(schema.namespace)) {
            throw new NamespaceViolationError(`Namespace "${schema.namespace}" is already claimed`);
        }
        for (const table of [schema.artifactTable, schema.itemTable]) {
            const owner = this.tables.get(table);
            if (owner) {
                throw new NamespaceViolationError(`Table "${table}" already belongs to namespace "${owner}"`);
            }
        }

        const backend = this.createBackend(schema);
        this.backends.set(schema.namespace, backend);
        this.tables.set(schema.artifactTable, schema.namespace);
        this.tables.set(schema.itemTable, schema.namespace);
        return new PersistenceGateway(backend, payloadSchema, itemSchema);
    }

    namespaces(): string[] {
        return Array.from(this.backends.keys());
    }

    async prepare(): Promise<void> {
        for (const backend of this.backends.values()) {
            await backend.init();
        }
    }

    reader(): ArtifactReader {
        return {
            fetch: async (ref) => {
                const raw = await this.backendFor(ref).findById(ref.id);
                if (!raw) throw new ArtifactNotFoundError(ref);
                return {
                    ref,
                    runId: raw.run_id,
                    stepName: raw.step_name,
                    payload: raw.payload,
                    items: raw.items,
                    createdAt: raw.created_at,
                };
            },
            exists: async (ref) => (await this.backendFor(ref).findById(ref.id)) !== null,
            findByStep: async (runId, stepName) => {
                for (const [namespace, backend] of this.backends) {
                    const raw = await backend.findByStep(runId, stepName);
                    if (raw) return { ref: createArtifactRef(namespace, raw.id), stepName, rows: rowCount(raw) };
                }
                return null;
            },
        };
    }

    /** Every artifact of the run that currently exists, across all namespaces. */
    async listLive(runId: string): Promise<LiveArtifact[]> {
        const live: LiveArtifact[] = [];
        for (const [namespace, backend] of this.backends) {
            for (const raw of await backend.listByRun(runId)) {
                live.push({ ref: createArtifactRef(namespace, raw.id), stepName: raw.step_name, rows: rowCount(raw) });
            }
        }
        return live;
    }

    private backendFor(ref: ArtifactRef): ArtifactBackend {
        const backend = this.backends.get(ref.namespace);
        if (!backend) throw new ArtifactNotFoundError(ref);
        return backend;
    }
}
