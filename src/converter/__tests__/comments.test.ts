/**
 * Tests for HTML comments
 */

import { describe, it, expect } from 'vitest';
import { convertMarkdown } from '../pipeline';
import { dropComments } from '../comments';
import { createBuildContext, createDocumentContext } from '../context';

describe('comments', () => {
    it('turns an HTML comment into a LaTeX comment without formatting it', () => {
        expect(convertMarkdown('Text <!-- hidden *note* --> more').latex).toBe('Text % hidden *note*\nmore');
    });

    it('comments every line of a multi-line comment', () => {
        expect(convertMarkdown('<!--\nline one\nline two\n-->').latex).toBe('% line one\n% line two');
    });

    it('does not escape comment text', () => {
        expect(convertMarkdown('<!-- 50% of a_b -->').latex).toBe('% 50% of a_b');
    });
});

describe('dropComments', () => {
    const context = (source: string) => createDocumentContext(source, createBuildContext());

    it('removes comment tokens and the space around them', () => {
        const ctx = context('');
        const text = ctx.protector.protect('a <!-- x --> b');
        expect(dropComments(text, ctx)).toBe('a b');
    });

    it('keeps other protected spans', () => {
        const ctx = context('');
        const text = ctx.protector.protect('`code` <!-- x -->');
        expect(ctx.protector.restore(dropComments(text, ctx))).toBe('`code`');
    });

    it('leaves text without comments unchanged', () => {
        const ctx = context('');
        expect(dropComments(' padded ', ctx)).toBe(' padded ');
    });
});
