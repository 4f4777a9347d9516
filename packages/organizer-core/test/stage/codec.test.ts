/**
 * Tests for schema-versioned JSON codecs.
 */

import { describe, it, expect } from 'vitest';
import { check, createJsonCodec } from '../../src/stage/codec';
import { CacheCorruptionError } from '../../src/errors';

interface Point {
    x: number;
    label: string;
}

const pointCodec = createJsonCodec<Point>(2, data => {
    const obj = check.object(data, 'point');
    return { x: check.number(obj.x, 'x'), label: check.string(obj.label, 'label') };
});

describe('createJsonCodec', () => {
    it('should wrap data in a versioned envelope', () => {
        expect(pointCodec.encode({ x: 1, label: 'a' })).toBe('{"schemaVersion":2,"data":{"x":1,"label":"a"}}');
    });

    it('should decode what it encodes', () => {
        expect(pointCodec.decode(pointCodec.encode({ x: 3, label: 'b' }))).toEqual({ x: 3, label: 'b' });
    });

    it('should reject another schema version', () => {
        expect(() => pointCodec.decode('{"schemaVersion":1,"data":{"x":1,"label":"a"}}'))
            .toThrow('Payload schema version 1 does not match 2');
    });

    it('should reject malformed JSON and missing envelopes', () => {
        expect(() => pointCodec.decode('{"schemaVer')).toThrow(CacheCorruptionError);
        expect(() => pointCodec.decode('{"x":1}')).toThrow('Payload is missing its schema envelope');
    });

    it('should report the failing field', () => {
        expect(() => pointCodec.decode('{"schemaVersion":2,"data":{"x":"1","label":"a"}}'))
            .toThrow('Payload failed validation: "x" must be a number');
    });
});

describe('check helpers', () => {
    it('should validate string arrays element by element', () => {
        expect(check.stringArray(['a', 'b'], 'tags')).toEqual(['a', 'b']);
        expect(() => check.stringArray(['a', 2], 'tags')).toThrow('"tags[1]" must be a string');
    });

    it('should validate record values', () => {
        expect(check.stringRecord({ a: true }, 'flags', check.boolean)).toEqual({ a: true });
        expect(() => check.stringRecord({ a: 1 }, 'flags', check.boolean)).toThrow('"flags.a" must be a boolean');
    });

    it('should accept undefined optional strings', () => {
        expect(check.optionalString(undefined, 'note')).toBeUndefined();
        expect(() => check.optionalString(3, 'note')).toThrow('"note" must be a string');
    });
});
