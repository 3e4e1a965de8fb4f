import { serialize, deserialize, SerializationError } from '../src/utils/serialization';

describe('Serialization Utils', () => {
    test('should serialize and deserialize primitives', () => {
        expect(deserialize(serialize(123))).toBe(123);
        expect(deserialize(serialize('hello'))).toBe('hello');
        expect(deserialize(serialize(true))).toBe(true);
        expect(deserialize(serialize(null))).toBe(null);
    });

    test('should keep dates, maps and sets inside artifact payloads', () => {
        const deliveredAt = new Date('2026-04-01T12:00:00.000Z');
        const payload = {
            deliveredAt,
            channels: new Set(['email', 'instagram']),
            scores: new Map([['tone', 80]]),
        };

        const output = deserialize(serialize(payload));

        expect(output).toEqual(payload);
        expect(output).toMatchObject({ deliveredAt: expect.any(Date) });
    });

    test('should enforce 1MB size limit', () => {
        const largeString = 'a'.repeat(1024 * 1024 + 1); // > 1MB
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/Payload size exceeds maximum limit/);
    });

    test('should accept a custom size limit', () => {
        expect(() => serialize('a'.repeat(100), 50)).toThrow('Payload size exceeds maximum limit of 0.00MB');
    });

    test('should handle undefined', () => {
        expect(serialize(undefined)).toBe('');
        expect(deserialize('')).toBeUndefined();
        expect(deserialize(null)).toBeUndefined();
    });

    test('should reject malformed input', () => {
        expect(() => deserialize('{not json')).toThrow(SerializationError);
    });
});
