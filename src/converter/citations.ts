/**
 * Citation converter
 *
 * `[@a;@b]` and `[@a, @b]` become `\cite{a,b}`, a lone `@key` becomes
 * `\cite{key}`. Cross-reference prefixes (`@fig:` and friends) are left
 * for the cross-reference stage, and an `@` after a word character is
 * part of an e-mail address.
 */

import { PASSIVE_SEGMENTS, withShielded } from './textUtils';
import { REFERENCE_PREFIXES } from './crossReferences';
import type { DocumentContext } from './types';

/** A citation key: word characters, `-`, and interior `.` or `:` */
export const CITATION_KEY = String.raw`[A-Za-z0-9_](?:[A-Za-z0-9_-]|[.:](?=[A-Za-z0-9_]))*`;

const CITATION_GROUP = /\[(\s*@[^\[\]\n]*)\]/g;

const GROUP_ITEM = new RegExp(String.raw`^\s*@(${CITATION_KEY})\s*$`);

const SINGLE_CITATION = new RegExp(String.raw`(?<![\w.@\\])@(${CITATION_KEY})`, 'g');

function isReferenceKey(key: string): boolean {
    const colon = key.indexOf(':');
    return colon > 0 && REFERENCE_PREFIXES.includes(key.slice(0, colon));
}

export function convertCitations(text: string, ctx: DocumentContext): string {
    const cite = (keys: string[]): string => {
        for (const key of keys) {
            ctx.build.citations.add(key);
        }
        return `\\cite{${keys.join(',')}}`;
    };

    return withShielded(text, PASSIVE_SEGMENTS, shielded => {
        let result = shielded.replace(CITATION_GROUP, (match: string, inner: string) => {
            const keys: string[] = [];
            for (const item of inner.split(/[;,]/)) {
                const parsed = GROUP_ITEM.exec(item);
                if (!parsed || isReferenceKey(parsed[1])) return match;
                keys.push(parsed[1]);
            }
            return cite(keys);
        });

        result = result.replace(SINGLE_CITATION, (match: string, key: string) => {
            if (isReferenceKey(key)) return match;
            return cite([key]);
        });
        return result;
    });
}
