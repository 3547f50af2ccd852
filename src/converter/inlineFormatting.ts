/**
 * Inline formatting: bold, italic, subscript and superscript
 *
 * Matching is leftmost-outermost. Bold claims its span first and the
 * captured text is formatted again, so `**bold *and italic***` becomes
 * `\textbf{bold \textit{and italic}}`.
 */

import { PASSIVE_SEGMENTS, withShielded } from './textUtils';

/** Span content may wrap lines but not cross a blank line */
const SPAN = String.raw`(?:[^\n]|\n(?![ \t]*\n))`;

const BOLD = new RegExp(String.raw`(?<!\\)\*\*(?=\S)(${SPAN}*?\S)\*\*(?!\*)`, 'g');

const ITALIC = new RegExp(String.raw`(?<![*\\\w])\*(?![\s*])(${SPAN}*?[^\s\\])\*(?![*\w])`, 'g');

const SUBSCRIPT = /(?<![~\\])~(?![\s~])([^~\s]+?)~(?!~)/g;

const SUPERSCRIPT = /(?<![\^\\])\^(?![\s^])([^^\s]+?)\^(?!\^)/g;

/**
 * Convert inline emphasis in `text`, leaving link destinations, URLs and
 * reference command arguments alone
 */
export function convertInlineFormatting(text: string): string {
    return withShielded(text, PASSIVE_SEGMENTS, formatSpans);
}

function formatSpans(text: string): string {
    let result = text.replace(BOLD, (_match: string, inner: string) => `\\textbf{${formatSpans(inner)}}`);
    result = result.replace(ITALIC, (_match: string, inner: string) => `\\textit{${formatSpans(inner)}}`);
    result = result.replace(SUBSCRIPT, (_match: string, inner: string) => `\\textsubscript{${inner}}`);
    result = result.replace(SUPERSCRIPT, (_match: string, inner: string) => `\\textsuperscript{${inner}}`);
    return result;
}
