/**
 * Tests for JSON extraction from AI responses.
 */

import { describe, it, expect } from 'vitest';
import { extractJSON, parseJSONObject } from '../../src/utils/ai-response-parser';

describe('extractJSON', () => {
    it('should return bare JSON unchanged', () => {
        expect(extractJSON('{"a":1}')).toBe('{"a":1}');
    });

    it('should read fenced code blocks', () => {
        expect(extractJSON('Here you go:\n```json\n{"a": [1, 2]}\n```\nDone.')).toBe('{"a": [1, 2]}');
    });

    it('should find JSON surrounded by prose', () => {
        expect(extractJSON('Sure! {"name": "x"} Hope that helps.')).toBe('{"name": "x"}');
    });

    it('should prefer a top-level array when it opens first', () => {
        expect(extractJSON('[{"a":1},{"a":2}]')).toBe('[{"a":1},{"a":2}]');
    });

    it('should fall back to the last parseable object', () => {
        expect(extractJSON('{bad} then {"ok": true}')).toBe('{"ok": true}');
    });

    it('should return null when nothing parses', () => {
        expect(extractJSON('no json here')).toBeNull();
        expect(extractJSON('')).toBeNull();
    });
});

describe('parseJSONObject', () => {
    it('should parse an object', () => {
        expect(parseJSONObject('```\n{"tags": ["a"]}\n```')).toEqual({ tags: ['a'] });
    });

    it('should unwrap a single-element array', () => {
        expect(parseJSONObject('[{"x": 1}]')).toEqual({ x: 1 });
    });

    it('should reject responses without an object', () => {
        expect(() => parseJSONObject('nothing')).toThrow('No JSON found in AI response');
        expect(() => parseJSONObject('[1, 2]')).toThrow('AI response JSON is not an object');
    });
});
