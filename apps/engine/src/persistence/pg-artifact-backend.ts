import { Pool, PoolClient } from 'pg';
import { deserialize, serialize } from '@pipewright/sdk';
import { TransactionManager } from '../db/transaction.manager';
import { moduleTableStatements } from '../db/schema';
import { ArtifactDeleteMode } from '../config';
import { ArtifactBackend, RawArtifact } from './artifact-backend';
import { ModuleSchema } from './module-schema';
import { guarded } from './errors';

const TAG = '[gateway]';

type ArtifactRow = {
    id: string;
    run_id: string;
    step_name: string;
    payload: string;
    created_at: Date;
};

type ItemRow = {
    id: string;
    payload: string;
};

/**
 * Relational partition: a root table and an item table, both prefixed with
 * the module's namespace. remove() issues a real DELETE, or an explicit
 * tombstone when the operator selects ARTIFACT_DELETE_MODE=tombstone;
 * either way it touches only this module's two tables.
 */
export class PgArtifactBackend implements ArtifactBackend {
    private readonly tx: TransactionManager;

    constructor(
        private readonly pool: Pool,
        readonly schema: ModuleSchema,
        private readonly deleteMode: ArtifactDeleteMode = 'hard',
    ) {
        this.tx = new TransactionManager(pool);
    }

    async init(): Promise<void> {
        await guarded(`create ${this.schema.namespace} tables`, async () => {
            for (const statement of moduleTableStatements(this.schema)) {
                await this.pool.query(statement);
            }
        });
    }

    insert(artifact: RawArtifact): Promise<number> {
        const { artifactTable, itemTable } = this.schema;
        const payload = serialize(artifact.payload);
        const items = artifact.items.map(item => serialize(item));

        return guarded(`insert into ${artifactTable}`, () => this.tx.run(async (client) => {
            await client.query(
                `INSERT INTO ${artifactTable} (id, run_id, step_name, payload, created_at)
                 VALUES ($1, $2, $3, $4, $5)`,
                [artifact.id, artifact.run_id, artifact.step_name, payload, artifact.created_at],
            );
            for (const [index, item] of items.entries()) {
                await client.query(
                    `INSERT INTO ${itemTable} (id, artifact_id, item_index, payload, created_at)
                     VALUES ($1, $2, $3, $4, $5)`,
                    [`${artifact.id}:${index}`, artifact.id, index, item, artifact.created_at],
                );
            }
            return 1 + items.length;
        }));
    }

    findById(id: string): Promise<RawArtifact | null> {
        return guarded(`read ${this.schema.artifactTable}`, async () => {
            const res = await this.pool.query<ArtifactRow>(
                `SELECT id, run_id, step_name, payload, created_at FROM ${this.schema.artifactTable}
                 WHERE id = $1 AND deleted_at IS NULL`,
                [id],
            );
            return res.rows[0] ? this.hydrate(res.rows[0]) : null;
        });
    }

    findByStep(runId: string, stepName: string): Promise<RawArtifact | null> {
        return guarded(`read ${this.schema.artifactTable}`, async () => {
            const res = await this.pool.query<ArtifactRow>(
                `SELECT id, run_id, step_name, payload, created_at FROM ${this.schema.artifactTable}
                 WHERE run_id = $1 AND step_name = $2 AND deleted_at IS NULL`,
                [runId, stepName],
            );
            return res.rows[0] ? this.hydrate(res.rows[0]) : null;
        });
    }

    listByRun(runId: string): Promise<RawArtifact[]> {
        return guarded(`list ${this.schema.artifactTable}`, async () => {
            const res = await this.pool.query<ArtifactRow>(
                `SELECT id, run_id, step_name, payload, created_at FROM ${this.schema.artifactTable}
                 WHERE run_id = $1 AND deleted_at IS NULL
                 ORDER BY created_at ASC, id ASC`,
                [runId],
            );
            const artifacts: RawArtifact[] = [];
            for (const row of res.rows) {
                artifacts.push(await this.hydrate(row));
            }
            return artifacts;
        });
    }

    remove(id: string): Promise<number> {
        return guarded(`delete from ${this.schema.artifactTable}`, () => this.tx.run(async (client) => {
            // Items first, then the root they hang off
            const items = await this.removeRows(client, this.schema.itemTable, 'artifact_id', id);
            const roots = await this.removeRows(client, this.schema.artifactTable, 'id', id);
            if (roots === 0) return 0;
            console.log(`${TAG} ${this.deleteMode === 'hard' ? 'deleted' : 'tombstoned'} ${this.schema.namespace}:${id} (${roots + items} rows)`);
            return roots + items;
        }));
    }

    private async removeRows(client: PoolClient, table: string, column: 'id' | 'artifact_id', id: string): Promise<number> {
        if (this.deleteMode === 'hard') {
            const res = await client.query<{ id: string }>(
                `DELETE FROM ${table} WHERE ${column} = $1 AND deleted_at IS NULL RETURNING id`,
                [id],
            );
            return res.rows.length;
        }
        const res = await client.query<{ id: string }>(
            `UPDATE ${table} SET deleted_at = $1 WHERE ${column} = $2 AND deleted_at IS NULL RETURNING id`,
            [new Date(), id],
        );
        return res.rows.length;
    }

    private async hydrate(row: ArtifactRow): Promise<RawArtifact> {
        const res = await this.pool.query<ItemRow>(
            `SELECT id, payload FROM ${this.schema.itemTable}
             WHERE artifact_id = $1 AND deleted_at IS NULL
             ORDER BY item_index ASC`,
            [row.id],
        );
        return {
            id: row.id,
            run_id: row.run_id,
            step_name: row.step_name,
            payload: deserialize(row.payload),
            items: res.rows.map(item => deserialize(item.payload)),
            created_at: row.created_at,
        };
    }
}
