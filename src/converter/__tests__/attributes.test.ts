/**
 * Tests for attribute blocks and the label registry
 */

import { describe, it, expect } from 'vitest';
import { parseAttributes, option } from '../attributes';
import { LabelRegistry, parseLabelId } from '../labelRegistry';

describe('parseAttributes', () => {
    it('reads ids, classes and options', () => {
        const block = parseAttributes('#fig:cat width="0.5" tex_position=t .wide');
        expect(block).toEqual({
            id: 'fig:cat',
            classes: ['wide'],
            options: { width: '0.5', tex_position: 't' },
        });
    });

    it('accepts comma separators and single quotes', () => {
        const block = parseAttributes("#table:a, rotate='90'");
        expect(block?.id).toBe('table:a');
        expect(block?.options.rotate).toBe('90');
    });

    it('returns an empty block for empty text', () => {
        expect(parseAttributes('  ')).toEqual({ classes: [], options: {} });
    });

    it('rejects an unclosed quote', () => {
        expect(parseAttributes('width="0.5')).toBeUndefined();
    });

    it('rejects stray text', () => {
        expect(parseAttributes('just words')).toBeUndefined();
    });

    it('returns the first option that is set', () => {
        const block = parseAttributes('angle=45');
        expect(block && option(block, 'rotate', 'angle')).toBe('45');
    });
});

describe('parseLabelId', () => {
    it('splits a namespaced id', () => {
        expect(parseLabelId('fig:a')).toEqual({ namespace: 'fig', key: 'a' });
    });

    it('rejects unknown namespaces and empty keys', () => {
        expect(parseLabelId('foo:a')).toBeUndefined();
        expect(parseLabelId('fig:')).toBeUndefined();
        expect(parseLabelId('plain')).toBeUndefined();
    });
});

describe('LabelRegistry', () => {
    it('resolves declared labels', () => {
        const registry = new LabelRegistry();
        registry.declare('fig', 'a');
        expect(registry.resolve('fig', 'a')?.target).toBe('fig:a');
        expect(registry.has('table', 'a')).toBe(false);
    });

    it('reports the replaced label on redeclaration', () => {
        const registry = new LabelRegistry();
        expect(registry.declare('eq', 'x').previous).toBeUndefined();
        expect(registry.declare('eq', 'x').previous?.target).toBe('eq:x');
        expect(registry.size).toBe(1);
    });
});
