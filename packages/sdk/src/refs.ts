import { ArtifactRef } from './types';

const NAMESPACE_PATTERN = /^[a-z][a-z0-9_]*$/;

export class InvalidArtifactRefError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArtifactRefError';
    }
}

export function isValidNamespace(namespace: string): boolean {
    return NAMESPACE_PATTERN.test(namespace);
}

export function createArtifactRef(namespace: string, id: string): ArtifactRef {
    if (!isValidNamespace(namespace)) {
        throw new InvalidArtifactRefError(`Invalid namespace "${namespace}"`);
    }
    if (!id) {
        throw new InvalidArtifactRefError('Artifact id cannot be empty');
    }
    return Object.freeze({ namespace, id });
}

// Wire form used in step_records.output_ref and in logical foreign keys: "<namespace>:<id>"
export function formatArtifactRef(ref: ArtifactRef): string {
    return `${ref.namespace}:${ref.id}`;
}

export function parseArtifactRef(value: string): ArtifactRef {
    const sep = value.indexOf(':');
    if (sep <= 0 || sep === value.length - 1) {
        throw new InvalidArtifactRefError(`Malformed artifact ref "${value}"`);
    }
    return createArtifactRef(value.slice(0, sep), value.slice(sep + 1));
}

export function sameRef(a: ArtifactRef, b: ArtifactRef): boolean {
    return a.namespace === b.namespace && a.id === b.id;
}
