import 'dotenv/config';

export type PersistenceMode = 'memory' | 'relational';
export type ArtifactDeleteMode = 'hard' | 'tombstone';

export interface RetryPolicy {
    maxAttempts: number;
    initialIntervalMs: number;
    backoffMultiplier: number;
    maxIntervalMs: number;
}

export interface CoordinatorConfig {
    stepTimeoutMs: number;
    stepRetry: RetryPolicy;
    storageRetry: RetryPolicy;
}

export interface EngineConfig extends CoordinatorConfig {
    persistenceMode: PersistenceMode;
    databaseUrl: string | undefined;
    dbPoolMax: number;
    artifactDeleteMode: ArtifactDeleteMode;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

type Env = Record<string, string | undefined>;

function intFrom(env: Env, key: string, fallback: number, min = 1): number {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;
    const value = parseInt(raw, 10);
    if (Number.isNaN(value) || value < min) {
        throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;
    const match = allowed.find(value => value === raw);
    if (!match) {
        throw new ConfigError(`${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
    }
    return match;
}

export function loadConfig(env: Env = process.env): EngineConfig {
    const persistenceMode = oneOf(env, 'PERSISTENCE_MODE', ['memory', 'relational'] as const, 'memory');
    const databaseUrl = env.DATABASE_URL || undefined;
    if (persistenceMode === 'relational' && !databaseUrl) {
        throw new ConfigError('DATABASE_URL is required when PERSISTENCE_MODE=relational');
    }

    const initialIntervalMs = intFrom(env, 'BACKOFF_INITIAL_MS', 1000);
    const backoffMultiplier = intFrom(env, 'BACKOFF_MULTIPLIER', 4);
    const maxIntervalMs = intFrom(env, 'BACKOFF_MAX_MS', 60000);

    return {
        persistenceMode,
        databaseUrl,
        dbPoolMax: intFrom(env, 'DB_POOL_MAX', 20),
        artifactDeleteMode: oneOf(env, 'ARTIFACT_DELETE_MODE', ['hard', 'tombstone'] as const, 'hard'),
        stepTimeoutMs: intFrom(env, 'STEP_TIMEOUT_MS', 30000),
        stepRetry: {
            maxAttempts: intFrom(env, 'STEP_MAX_ATTEMPTS', 3),
            initialIntervalMs,
            backoffMultiplier,
            maxIntervalMs,
        },
        storageRetry: {
            maxAttempts: intFrom(env, 'STORAGE_MAX_ATTEMPTS', 3),
            initialIntervalMs,
            backoffMultiplier,
            maxIntervalMs,
        },
    };
}
