import { Pool } from 'pg';
import { WorkflowDefinition } from '@pipewright/sdk';
import { EngineConfig } from './config';
import { createPool } from './db';
import { migrate } from './db/schema';
import { EventBus } from './events/event-bus';
import { Collaborators, PipelinePorts, createModuleAdapters } from './modules';
import { Persistence, createMemoryPersistence, createRelationalPersistence } from './persistence';
import { SagaCoordinator } from './services/saga-coordinator';
import { IntegrityChecker } from './services/integrity-checker';
import { PipelineStepOptions, contentPipeline } from './workflows';

const TAG = '[runtime]';

export interface RuntimeOptions {
    // Relational mode: use this pool instead of opening one from DATABASE_URL
    pool?: Pool;
    events?: EventBus;
    stepOptions?: PipelineStepOptions;
}

export interface Runtime {
    coordinator: SagaCoordinator;
    persistence: Persistence;
    events: EventBus;
    integrity: IntegrityChecker;
    ports: PipelinePorts;
    pipeline: WorkflowDefinition;
    close(): Promise<void>;
}

/**
 * Wires one independent engine: ledger, module storage, adapters, bus and
 * coordinator. Nothing is shared between two runtimes.
 */
export async function createRuntime(
    config: EngineConfig,
    collaborators: Collaborators,
    options: RuntimeOptions = {},
): Promise<Runtime> {
    let pool: Pool | null = null;
    let ownsPool = false;
    let persistence: Persistence;

    if (config.persistenceMode === 'relational') {
        pool = options.pool ?? createPool(config);
        ownsPool = !options.pool;
        await migrate(pool);
        persistence = createRelationalPersistence(pool, config.artifactDeleteMode);
    } else {
        persistence = createMemoryPersistence();
    }

    const ports = createModuleAdapters(persistence.artifacts, collaborators);
    await persistence.artifacts.prepare();

    const events = options.events ?? new EventBus();
    const coordinator = new SagaCoordinator({
        runs: persistence.runs,
        artifacts: persistence.artifacts.reader(),
        events,
        config,
    });
    console.log(`${TAG} ready (${persistence.mode} persistence, namespaces: ${persistence.artifacts.namespaces().join(', ')})`);

    return {
        coordinator,
        persistence,
        events,
        integrity: new IntegrityChecker(persistence.runs, persistence.artifacts),
        ports,
        pipeline: contentPipeline(ports, options.stepOptions),
        close: async () => {
            if (pool && ownsPool) await pool.end();
        },
    };
}
