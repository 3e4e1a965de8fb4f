import { z } from 'zod';
import { createArtifactRef } from '@pipewright/sdk';
import { ArtifactStorage } from '../../src/persistence/artifact-storage';
import { InMemoryArtifactBackend } from '../../src/persistence/memory-artifact-backend';
import { defineModuleSchema } from '../../src/persistence/module-schema';
import { ArtifactNotFoundError, NamespaceViolationError } from '../../src/persistence/errors';

const NoteSchema = z.object({ text: z.string() });
const TagSchema = z.object({ tag: z.string() });

describe('defineModuleSchema', () => {
    it('accepts tables prefixed with the namespace', () => {
        expect(defineModuleSchema('notes', 'notes_roots', 'notes_tags')).toEqual({
            namespace: 'notes',
            artifactTable: 'notes_roots',
            itemTable: 'notes_tags',
        });
    });

    it('refuses tables outside the namespace', () => {
        expect(() => defineModuleSchema('notes', 'qc_results', 'notes_tags'))
            .toThrow('Table "qc_results" is outside namespace "notes"');
    });

    it('refuses unsafe names and shared tables', () => {
        expect(() => defineModuleSchema('Notes', 'Notes_a', 'Notes_b')).toThrow('Invalid namespace "Notes"');
        expect(() => defineModuleSchema('notes', 'notes_a; DROP TABLE x', 'notes_b')).toThrow(NamespaceViolationError);
        expect(() => defineModuleSchema('notes', 'notes_a', 'notes_a'))
            .toThrow('Namespace "notes" needs distinct artifact and item tables');
    });
});

describe('ArtifactStorage', () => {
    let storage: ArtifactStorage;

    beforeEach(() => {
        storage = new ArtifactStorage(schema => new InMemoryArtifactBackend(schema));
    });

    it('hands each namespace to one owner only', () => {
        storage.claim(defineModuleSchema('notes', 'notes_roots', 'notes_tags'), NoteSchema, TagSchema);

        expect(() => storage.claim(defineModuleSchema('notes', 'notes_other', 'notes_more'), NoteSchema, TagSchema))
            .toThrow('Namespace "notes" is already claimed');
        expect(storage.namespaces()).toEqual(['notes']);
    });

    it('refuses a gateway a ref from another namespace', async () => {
        const notes = storage.claim(defineModuleSchema('notes', 'notes_roots', 'notes_tags'), NoteSchema, TagSchema);
        const memos = storage.claim(defineModuleSchema('memos', 'memos_roots', 'memos_tags'), NoteSchema, TagSchema);
        const saved = await memos.save({ runId: 'r1', stepName: 'memo', payload: { text: 'hi' }, items: [] });

        await expect(notes.delete(saved.ref)).rejects.toThrow(NamespaceViolationError);
        await expect(notes.load(saved.ref)).rejects.toThrow(`Gateway "notes" refused to load memos:${saved.ref.id}`);
        expect((await memos.load(saved.ref)).payload).toEqual({ text: 'hi' });
    });

    it('gives read-only access across namespaces', async () => {
        const notes = storage.claim(defineModuleSchema('notes', 'notes_roots', 'notes_tags'), NoteSchema, TagSchema);
        const saved = await notes.save({ runId: 'r1', stepName: 'write', payload: { text: 'hello' }, items: [{ tag: 'a' }] });
        const reader = storage.reader();

        const envelope = await reader.fetch(saved.ref);

        expect(envelope).toMatchObject({ ref: saved.ref, runId: 'r1', stepName: 'write', payload: { text: 'hello' }, items: [{ tag: 'a' }] });
        expect(await reader.exists(saved.ref)).toBe(true);
        expect(await reader.findByStep('r1', 'write')).toEqual({ ref: saved.ref, stepName: 'write', rows: 2 });
        expect(await reader.findByStep('r1', 'other')).toBeNull();
        await expect(reader.fetch(createArtifactRef('unknown', 'x'))).rejects.toThrow(ArtifactNotFoundError);
    });

    it('lists live artifacts with their row counts', async () => {
        const notes = storage.claim(defineModuleSchema('notes', 'notes_roots', 'notes_tags'), NoteSchema, TagSchema);
        const kept = await notes.save({ runId: 'r1', stepName: 'a', payload: { text: 'x' }, items: [{ tag: '1' }, { tag: '2' }] });
        const dropped = await notes.save({ runId: 'r1', stepName: 'b', payload: { text: 'y' }, items: [] });
        await notes.save({ runId: 'r2', stepName: 'a', payload: { text: 'z' }, items: [] });
        await notes.delete(dropped.ref);

        expect(await storage.listLive('r1')).toEqual([{ ref: kept.ref, stepName: 'a', rows: 3 }]);
    });
});
