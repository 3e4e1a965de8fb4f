import { Pool } from 'pg';
import { ModuleSchema } from '../persistence/module-schema';

const TAG = '[db]';

// Run ledger. Module artifact tables are created by each PgArtifactBackend.init().
const CORE_SCHEMA = [
    `CREATE TABLE IF NOT EXISTS workflow_runs (
        run_id TEXT PRIMARY KEY,
        workflow_name TEXT NOT NULL,
        status TEXT NOT NULL,
        input TEXT,
        error TEXT,
        started_at TIMESTAMPTZ NOT NULL,
        completed_at TIMESTAMPTZ
    )`,
    `CREATE TABLE IF NOT EXISTS step_records (
        run_id TEXT NOT NULL,
        step_name TEXT NOT NULL,
        sequence_index INTEGER NOT NULL,
        status TEXT NOT NULL,
        input_ref TEXT,
        output_ref TEXT,
        rows_written INTEGER NOT NULL DEFAULT 0,
        attempt INTEGER NOT NULL DEFAULT 0,
        error TEXT,
        started_at TIMESTAMPTZ,
        completed_at TIMESTAMPTZ,
        PRIMARY KEY (run_id, step_name)
    )`,
    `CREATE TABLE IF NOT EXISTS compensation_logs (
        id TEXT PRIMARY KEY,
        run_id TEXT NOT NULL,
        step_name TEXT NOT NULL,
        compensated_at TIMESTAMPTZ NOT NULL,
        rows_affected INTEGER NOT NULL
    )`,
];

/**
 * Artifact tables for one module. No foreign key points at another
 * module's tables; item rows reference their root by id only.
 */
export function moduleTableStatements(schema: ModuleSchema): string[] {
    return [
        `CREATE TABLE IF NOT EXISTS ${schema.artifactTable} (
            id TEXT PRIMARY KEY,
            run_id TEXT NOT NULL,
            step_name TEXT NOT NULL,
            payload TEXT NOT NULL,
            created_at TIMESTAMPTZ NOT NULL,
            deleted_at TIMESTAMPTZ
        )`,
        `CREATE TABLE IF NOT EXISTS ${schema.itemTable} (
            id TEXT PRIMARY KEY,
            artifact_id TEXT NOT NULL,
            item_index INTEGER NOT NULL,
            payload TEXT NOT NULL,
            created_at TIMESTAMPTZ NOT NULL,
            deleted_at TIMESTAMPTZ
        )`,
    ];
}

export async function migrate(pool: Pool): Promise<void> {
    for (const statement of CORE_SCHEMA) {
        await pool.query(statement);
    }
    console.log(`${TAG} core schema ready`);
}
