/**
 * Helpers shared by the element converters
 */

const SHIELD_OPEN = '\uE002';
const SHIELD_CLOSE = '\uE003';
const SHIELD_PATTERN = /\uE002(\d+)\uE003/g;

/**
 * Text a converter must not touch even though it is not a protected span:
 * link destinations, bare URLs and the arguments of reference commands
 * emitted by earlier stages, including a configured note reference command.
 */
export const PASSIVE_SEGMENTS = new RegExp(
    [
        String.raw`\]\([^()\s]*(?:\([^()\s]*\)[^()\s]*)*\)`,
        String.raw`\bhttps?:\/\/[^\s<>{}\]]*[^\s<>{}\].,;:!?)]`,
        String.raw`\\(?:label|ref|eqref|cite|url|href|includegraphics)(?:\[[^\]]*\])?\{[^{}]*\}`,
        String.raw`\\[A-Za-z]+\{(?:fig|sfig|table|stable|eq|snote|sec):[^{}]*\}`,
    ].join('|'),
    'g'
);

/**
 * Run `transform` with every match of `pattern` swapped out for a
 * local placeholder, then swap the matches back.
 */
export function withShielded(text: string, pattern: RegExp, transform: (text: string) => string): string {
    const saved: string[] = [];
    const shielded = text.replace(pattern, match => {
        saved.push(match);
        return `${SHIELD_OPEN}${saved.length - 1}${SHIELD_CLOSE}`;
    });
    if (saved.length === 0) return transform(text);

    const transformed = transform(shielded);
    return transformed.replace(SHIELD_PATTERN, (placeholder: string, index: string) => saved[Number(index)] ?? placeholder);
}

export function isBlank(line: string): boolean {
    return line.trim() === '';
}

/**
 * Leading whitespace width with tabs counted as four spaces
 */
export function indentWidth(line: string): number {
    const lead = /^[ \t]*/.exec(line);
    if (!lead) return 0;
    let width = 0;
    for (const ch of lead[0]) {
        width += ch === '\t' ? 4 : 1;
    }
    return width;
}

/**
 * String.replace with the full match array handed to the callback
 */
export function replaceMatches(text: string, pattern: RegExp, replace: (match: RegExpExecArray) => string): string {
    const regex = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
    let result = '';
    let last = 0;
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
        result += text.slice(last, match.index) + replace(match);
        last = match.index + match[0].length;
        if (match[0].length === 0) {
            regex.lastIndex++;
        }
    }
    return result + text.slice(last);
}
