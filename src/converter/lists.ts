/**
 * List converter
 *
 * Runs of `- `, `* ` or `+ ` items become `itemize`, runs of `1. ` items
 * become `enumerate`. A blank line, a dedent or a line at the list's own
 * indentation that is not an item ends the list. Deeper-indented items
 * open a nested list; deeper-indented text continues the current item.
 */

import { indentWidth, isBlank } from './textUtils';

const LIST_ITEM = /^([ \t]*)([-*+]|\d{1,9}[.)])[ \t]+(.*)$/;

type ListKind = 'itemize' | 'enumerate';

interface ParsedList {
    lines: string[];
    next: number;
}

function itemKind(marker: string): ListKind {
    return /^\d/.test(marker) ? 'enumerate' : 'itemize';
}

export function convertLists(text: string): string {
    const lines = text.split('\n');
    const out: string[] = [];
    let i = 0;

    while (i < lines.length) {
        const match = LIST_ITEM.exec(lines[i]);
        if (!match) {
            out.push(lines[i]);
            i++;
            continue;
        }
        const parsed = parseList(lines, i, indentWidth(lines[i]), 0);
        out.push(...parsed.lines);
        i = parsed.next;
    }

    return out.join('\n');
}

function parseList(lines: string[], start: number, indent: number, depth: number): ParsedList {
    const first = LIST_ITEM.exec(lines[start]);
    const kind = itemKind(first ? first[2] : '-');
    const pad = '  '.repeat(depth);
    const items: string[][] = [];
    let i = start;

    while (i < lines.length) {
        const line = lines[i];
        if (isBlank(line)) break;

        const match = LIST_ITEM.exec(line);
        const width = indentWidth(line);

        if (match && width === indent) {
            if (itemKind(match[2]) !== kind) break;
            items.push([`${pad}  \\item ${match[3].trim()}`]);
            i++;
        } else if (match && width > indent && items.length > 0) {
            const nested = parseList(lines, i, width, depth + 1);
            items[items.length - 1].push(...nested.lines);
            i = nested.next;
        } else if (!match && width > indent && items.length > 0) {
            const current = items[items.length - 1];
            if (current.length > 1) {
                current.push(`${pad}  ${line.trim()}`);
            } else {
                current[0] += ` ${line.trim()}`;
            }
            i++;
        } else {
            break;
        }
    }

    return {
        lines: [`${pad}\\begin{${kind}}`, ...items.flat(), `${pad}\\end{${kind}}`],
        next: i,
    };
}
