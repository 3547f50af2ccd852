/**
 * HTML comments to LaTeX comments
 *
 * Comments were hidden by the protector; here their tokens are replaced
 * by `%` lines. Text that followed a comment on the same line moves to the
 * next line so the `%` does not swallow it.
 */

import { TOKEN_PATTERN, commentBody } from './protector';
import type { DocumentContext } from './types';

const TOKEN_WITH_FOLLOWER = new RegExp(String.raw`(${TOKEN_PATTERN.source})[ \t]*(?=(\S?))`, 'g');

const TOKEN_WITH_SPACE = new RegExp(String.raw`[ \t]*(${TOKEN_PATTERN.source})[ \t]*`, 'g');

export function renderComment(original: string): string {
    const lines = commentBody(original).trim().split('\n');
    return lines.map(line => `% ${line.trim()}`.trimEnd()).join('\n');
}

export function convertComments(text: string, ctx: DocumentContext): string {
    return text.replace(
        TOKEN_WITH_FOLLOWER,
        (match: string, token: string, _letter: string, _index: string, next: string) => {
            const span = ctx.protector.get(token);
            if (!span || span.kind !== 'comment') return match;
            const comment = renderComment(span.original);
            return next ? `${comment}\n` : comment;
        }
    );
}

/**
 * Remove comments from a caption or table cell. Both end up inside one
 * line of a float, where a `%` would swallow the closing brace or the
 * rest of the row.
 */
export function dropComments(text: string, ctx: DocumentContext): string {
    let dropped = false;
    const result = text.replace(TOKEN_WITH_SPACE, (match: string, token: string) => {
        const span = ctx.protector.get(token);
        if (!span || span.kind !== 'comment') return match;
        dropped = true;
        return ' ';
    });
    return dropped ? result.trim() : result;
}
