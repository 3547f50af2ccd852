/**
 * Numbered equations
 *
 * Display math followed by `{#eq:key}` becomes an `equation` environment
 * carrying the label. Runs on the protected text, so the math itself is a
 * placeholder token here.
 */

import { parseAttributes } from './attributes';
import { declareLabel } from './context';
import { parseLabelId } from './labelRegistry';
import { warn } from './warnings';
import type { DocumentContext } from './types';

const LABELLED_MATH = /(\uE000M\d+\uE001)[ \t]*\{([^{}\n]*)\}/g;

export function convertEquations(text: string, ctx: DocumentContext): string {
    return text.replace(LABELLED_MATH, (match: string, token: string, inner: string) => {
        const span = ctx.protector.get(token);
        if (!span || span.kind !== 'display-math') return match;

        const block = parseAttributes(inner);
        if (!block) {
            warn(ctx, 'recoverable', 'malformed-attributes', 'Equation attribute block could not be parsed',
                span.original + match.slice(token.length), 'Write the label as {#eq:key}');
            return match;
        }
        if (!block.id) return match;

        const parsed = parseLabelId(block.id);
        const key = parsed?.namespace === 'eq' ? parsed.key : block.id;
        const label = declareLabel(ctx, 'eq', key, `{${inner}}`);
        const body = span.original.slice(2, -2).trim();
        return ctx.protector.protectRaw(`\\begin{equation}\n${body}\n\\label{${label.target}}\n\\end{equation}`);
    });
}
