/**
 * Cross-reference converter
 *
 * `@fig:key` style references become `\ref`/`\eqref` commands whether or
 * not the label has been declared. Every use is recorded and resolved
 * against the label registry once the whole build has been converted.
 */

import { locate } from './warnings';
import type { DocumentContext, LabelNamespace } from './types';

/** Prefixes handled here rather than by the citation converter */
export const REFERENCE_PREFIXES = ['fig', 'sfig', 'table', 'tbl', 'stable', 'eq', 'snote', 'sec'];

const NAMESPACE_ALIASES: Record<string, LabelNamespace> = {
    fig: 'fig',
    sfig: 'sfig',
    table: 'table',
    tbl: 'table',
    stable: 'stable',
    eq: 'eq',
    snote: 'snote',
    sec: 'sec',
};

const REFERENCE_KEY = String.raw`[A-Za-z0-9_-]+(?:[.:][A-Za-z0-9_-]+)*`;

const BRACED_REFERENCE = new RegExp(String.raw`\{@(${REFERENCE_PREFIXES.join('|')}):(${REFERENCE_KEY})\}`, 'g');

const REFERENCE = new RegExp(String.raw`(?<![\w\\])@(${REFERENCE_PREFIXES.join('|')}):(${REFERENCE_KEY})`, 'g');

export function convertCrossReferences(text: string, ctx: DocumentContext): string {
    const replace = (match: string, prefix: string, key: string): string => {
        const namespace = NAMESPACE_ALIASES[prefix];
        const target = `${namespace}:${key}`;
        ctx.build.references.push({ namespace, key, target, location: locate(ctx, match) });
        return `\\${referenceCommand(namespace, ctx)}{${target}}`;
    };

    return text.replace(BRACED_REFERENCE, replace).replace(REFERENCE, replace);
}

function referenceCommand(namespace: LabelNamespace, ctx: DocumentContext): string {
    if (namespace === 'eq') return 'eqref';
    if (namespace === 'snote') return ctx.build.options.noteReferenceCommand;
    return 'ref';
}
