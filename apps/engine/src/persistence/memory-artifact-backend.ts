import { deserialize, serialize } from '@pipewright/sdk';
import { ArtifactBackend, RawArtifact, rowCount } from './artifact-backend';
import { ModuleSchema } from './module-schema';

// Stored encoded, as the relational backend stores them, so both refuse the same payloads
type EncodedArtifact = Omit<RawArtifact, 'payload' | 'items'> & {
    payload: string;
    items: string[];
};

/** Map-backed partition; remove() drops the entry outright. */
export class InMemoryArtifactBackend implements ArtifactBackend {
    private artifacts = new Map<string, EncodedArtifact>();

    constructor(readonly schema: ModuleSchema) { }

    async init(): Promise<void> { }

    async insert(artifact: RawArtifact): Promise<number> {
        if (this.artifacts.has(artifact.id)) {
            throw new Error(`${this.schema.artifactTable} already holds ${artifact.id}`);
        }
        this.artifacts.set(artifact.id, {
            id: artifact.id,
            run_id: artifact.run_id,
            step_name: artifact.step_name,
            payload: serialize(artifact.payload),
            items: artifact.items.map(item => serialize(item)),
            created_at: new Date(artifact.created_at),
        });
        return rowCount(artifact);
    }

    async findById(id: string): Promise<RawArtifact | null> {
        const artifact = this.artifacts.get(id);
        return artifact ? this.decode(artifact) : null;
    }

    async findByStep(runId: string, stepName: string): Promise<RawArtifact | null> {
        for (const artifact of this.artifacts.values()) {
            if (artifact.run_id === runId && artifact.step_name === stepName) {
                return this.decode(artifact);
            }
        }
        return null;
    }

    async listByRun(runId: string): Promise<RawArtifact[]> {
        return Array.from(this.artifacts.values())
            .filter(artifact => artifact.run_id === runId)
            .map(artifact => this.decode(artifact));
    }

    async remove(id: string): Promise<number> {
        const artifact = this.artifacts.get(id);
        if (!artifact) return 0;
        this.artifacts.delete(id);
        return rowCount(artifact);
    }

    private decode(artifact: EncodedArtifact): RawArtifact {
        return {
            id: artifact.id,
            run_id: artifact.run_id,
            step_name: artifact.step_name,
            payload: deserialize(artifact.payload),
            items: artifact.items.map(item => deserialize(item)),
            created_at: new Date(artifact.created_at),
        };
    }
}
