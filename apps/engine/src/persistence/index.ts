import { Pool } from 'pg';
import { ArtifactDeleteMode, PersistenceMode } from '../config';
import { ArtifactStorage } from './artifact-storage';
import { InMemoryArtifactBackend } from './memory-artifact-backend';
import { InMemoryRunStore } from './memory-run-store';
import { PgArtifactBackend } from './pg-artifact-backend';
import { PgRunStore } from './pg-run-store';
import { RunStore } from './run-store';

export interface Persistence {
    mode: PersistenceMode;
    runs: RunStore;
    artifacts: ArtifactStorage;
}

export function createMemoryPersistence(): Persistence {
    return {
        mode: 'memory',
        runs: new InMemoryRunStore(),
        artifacts: new ArtifactStorage(schema => new InMemoryArtifactBackend(schema)),
    };
}

/** Expects the core schema to exist; see migrate(). Module tables are created by artifacts.prepare(). */
export function createRelationalPersistence(pool: Pool, deleteMode: ArtifactDeleteMode = 'hard'): Persistence {
    return {
        mode: 'relational',
        runs: new PgRunStore(pool),
        artifacts: new ArtifactStorage(schema => new PgArtifactBackend(pool, schema, deleteMode)),
    };
}

export { ArtifactStorage } from './artifact-storage';
export type { ArtifactReader, LiveArtifact, BackendFactory } from './artifact-storage';
export { PersistenceGateway } from './gateway';
export type { ArtifactDraft, StoredArtifact, SaveResult, DeleteResult, Schema } from './gateway';
export type { ArtifactBackend, RawArtifact } from './artifact-backend';
export { InMemoryArtifactBackend } from './memory-artifact-backend';
export { PgArtifactBackend } from './pg-artifact-backend';
export { InMemoryRunStore } from './memory-run-store';
export { PgRunStore } from './pg-run-store';
export type { RunStore, NewRun, NewCompensationLog } from './run-store';
export { defineModuleSchema } from './module-schema';
export type { ModuleSchema } from './module-schema';
export * from './errors';
