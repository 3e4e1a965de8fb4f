import { isValidNamespace } from '@pipewright/sdk';
import { NamespaceViolationError } from './errors';

const TABLE_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Storage partition owned by exactly one module: a root table for the
 * artifact and an item table for the rows it owns exclusively.
 */
export interface ModuleSchema {
    readonly namespace: string;
    readonly artifactTable: string;
    readonly itemTable: string;
}

export function defineModuleSchema(namespace: string, artifactTable: string, itemTable: string): ModuleSchema {
    if (!isValidNamespace(namespace)) {
        throw new NamespaceViolationError(`Invalid namespace "${namespace}"`);
    }
    for (const table of [artifactTable, itemTable]) {
        // Table names are interpolated into SQL, so they are checked here once.
        if (!TABLE_PATTERN.test(table)) {
            throw new NamespaceViolationError(`Invalid table name "${table}"`);
        }
        if (!table.startsWith(`${namespace}_`)) {
            throw new NamespaceViolationError(`Table "${table}" is outside namespace "${namespace}"`);
        }
    }
    if (artifactTable === itemTable) {
        throw new NamespaceViolationError(`Namespace "${namespace}" needs distinct artifact and item tables`);
    }
    return Object.freeze({ namespace, artifactTable, itemTable });
}
