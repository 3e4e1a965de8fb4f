import { InvalidArtifactRefError, createArtifactRef, formatArtifactRef, parseArtifactRef, sameRef } from '../src';

describe('artifact refs', () => {
    test('should format as namespace:id', () => {
        expect(formatArtifactRef(createArtifactRef('qc', '0192-ab'))).toBe('qc:0192-ab');
    });

    test('should parse at the first colon', () => {
        expect(parseArtifactRef('production:abc:0')).toEqual({ namespace: 'production', id: 'abc:0' });
    });

    test('should be immutable', () => {
        expect(Object.isFrozen(createArtifactRef('intake', '1'))).toBe(true);
    });

    test('should reject malformed refs', () => {
        expect(() => parseArtifactRef('no-separator')).toThrow('Malformed artifact ref "no-separator"');
        expect(() => parseArtifactRef(':id')).toThrow(InvalidArtifactRefError);
        expect(() => parseArtifactRef('qc:')).toThrow(InvalidArtifactRefError);
        expect(() => createArtifactRef('Bad-NS', '1')).toThrow('Invalid namespace "Bad-NS"');
        expect(() => createArtifactRef('qc', '')).toThrow('Artifact id cannot be empty');
    });

    test('should compare by value', () => {
        expect(sameRef(createArtifactRef('qc', '1'), parseArtifactRef('qc:1'))).toBe(true);
        expect(sameRef(createArtifactRef('qc', '1'), createArtifactRef('qc', '2'))).toBe(false);
    });
});
