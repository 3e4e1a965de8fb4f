import { ConfigError, loadConfig } from '../../src/config';

describe('loadConfig', () => {
    it('falls back to defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.persistenceMode).toBe('memory');
        expect(config.artifactDeleteMode).toBe('hard');
        expect(config.dbPoolMax).toBe(20);
        expect(config.stepTimeoutMs).toBe(30000);
        expect(config.stepRetry).toEqual({ maxAttempts: 3, initialIntervalMs: 1000, backoffMultiplier: 4, maxIntervalMs: 60000 });
        expect(config.storageRetry.maxAttempts).toBe(3);
    });

    it('reads overrides', () => {
        const config = loadConfig({
            PERSISTENCE_MODE: 'relational',
            DATABASE_URL: 'postgres://localhost/pipewright',
            ARTIFACT_DELETE_MODE: 'tombstone',
            STEP_MAX_ATTEMPTS: '5',
            STORAGE_MAX_ATTEMPTS: '2',
            BACKOFF_INITIAL_MS: '10',
        });

        expect(config.persistenceMode).toBe('relational');
        expect(config.databaseUrl).toBe('postgres://localhost/pipewright');
        expect(config.artifactDeleteMode).toBe('tombstone');
        expect(config.stepRetry.maxAttempts).toBe(5);
        expect(config.stepRetry.initialIntervalMs).toBe(10);
        expect(config.storageRetry).toMatchObject({ maxAttempts: 2, initialIntervalMs: 10 });
    });

    it('requires DATABASE_URL in relational mode', () => {
        expect(() => loadConfig({ PERSISTENCE_MODE: 'relational' }))
            .toThrow(new ConfigError('DATABASE_URL is required when PERSISTENCE_MODE=relational'));
    });

    it('rejects unknown modes and bad integers', () => {
        expect(() => loadConfig({ PERSISTENCE_MODE: 'redis' }))
            .toThrow('PERSISTENCE_MODE must be one of memory, relational, got "redis"');
        expect(() => loadConfig({ STEP_TIMEOUT_MS: 'soon' }))
            .toThrow('STEP_TIMEOUT_MS must be an integer >= 1, got "soon"');
        expect(() => loadConfig({ STEP_MAX_ATTEMPTS: '0' })).toThrow(ConfigError);
    });
});
