/**
 * Content Protector
 *
 * Hides code, math, HTML comments and raw LaTeX behind opaque placeholder
 * tokens so the element converters cannot see or rewrite them, then puts
 * them back once every converter has run.
 *
 * Tokens are built from Unicode private-use characters, which never occur
 * in Markdown syntax or in LaTeX control sequences:
 *
 *     U+E000 <category letter> <index> U+E001
 */

import { ProtectorCollisionError } from '../utils/errors';
import type { ProtectedCategory, ProtectedSpan, SpanKind } from './types';

export const TOKEN_OPEN = '\uE000';
export const TOKEN_CLOSE = '\uE001';

const CATEGORY_LETTER: Record<ProtectedCategory, string> = {
    code: 'C',
    math: 'M',
    raw: 'R',
};

/** Matches any placeholder token */
export const TOKEN_PATTERN = /\uE000([CMR])(\d+)\uE001/g;

/** Fenced code opener: up to three spaces, a backtick or tilde run, info string */
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE = /^ {0,3}(`{3,}|~{3,})\s*$/;

/** Single-line inline code; the closing run must match the opening run */
const INLINE_CODE = /(?<![`\\])(`+)(?!`)([^\n]*?[^`\n])\1(?!`)/g;

const HTML_COMMENT = /<!--[\s\S]*?-->/g;

const DISPLAY_MATH = /(?<!\\)\$\$[\s\S]+?(?<!\\)\$\$/g;

/**
 * Inline math: the opening `$` is not followed by whitespace, the closing
 * `$` is not preceded by whitespace nor followed by a digit, and `\$` is
 * never a delimiter.
 */
const INLINE_MATH = /(?<![\\$])\$(?![\s$])((?:\\.|[^$\n\\])+?)(?<![\s\\])\$(?!\d)/g;

/** Raw LaTeX environment starting at the beginning of a line */
const RAW_LATEX_ENV = /^\\begin\{([A-Za-z]+\*?)\}[\s\S]*?^\\end\{\1\}/gm;

/**
 * Something the scan noticed but could not protect cleanly
 */
export interface ProtectorIssue {
    kind: 'unterminated-fence';
    /** 1-based line of the opener */
    line: number;
    snippet: string;
}

export type SpanRenderer = (span: ProtectedSpan) => string;

/** Renderers keyed by span kind; kinds without one restore their original text */
export type SpanRenderers = Partial<Record<SpanKind, SpanRenderer>>;

/**
 * One protector per document. It owns every span hidden during that
 * document's conversion.
 */
export class ContentProtector {
    private spans: Map<string, ProtectedSpan> = new Map();
    private categoryOrder: ProtectedCategory[] = [];
    private counter: number = 0;
    private issues: ProtectorIssue[] = [];

    /**
     * Hide every protected construct in `text`.
     * Passes run one after another over the already-tokenized text, so the
     * content of an earlier span is never rescanned by a later one.
     *
     * @throws ProtectorCollisionError when the text already contains a
     * reserved placeholder character (U+E000 to U+E003) that this
     * protector did not issue
     */
    protect(text: string): string {
        this.assertNoForeignTokens(text);

        let result = this.protectFences(text);
        result = this.protectPattern(result, INLINE_CODE, 'code', 'inline-code');
        result = this.protectPattern(result, HTML_COMMENT, 'raw', 'comment');
        result = this.protectPattern(result, DISPLAY_MATH, 'math', 'display-math');
        result = this.protectPattern(result, INLINE_MATH, 'math', 'inline-math');
        result = this.protectPattern(result, RAW_LATEX_ENV, 'raw', 'raw-latex');
        return result;
    }

    /**
     * Register one span and return its token
     */
    protectSpan(original: string, category: ProtectedCategory, kind: SpanKind, language?: string): string {
        const token = `${TOKEN_OPEN}${CATEGORY_LETTER[category]}${this.counter++}${TOKEN_CLOSE}`;
        const span: ProtectedSpan = { token, original, category, kind };
        if (language) {
            span.language = language;
        }
        this.spans.set(token, span);
        if (!this.categoryOrder.includes(category)) {
            this.categoryOrder.push(category);
        }
        return token;
    }

    /**
     * Shield LaTeX a converter produced from the stages that follow
     */
    protectRaw(latex: string): string {
        return this.protectSpan(latex, 'raw', 'generated');
    }

    get(token: string): ProtectedSpan | undefined {
        return this.spans.get(token);
    }

    /**
     * Spans of the given kind, in protection order
     */
    spansOfKind(kind: SpanKind): ProtectedSpan[] {
        return [...this.spans.values()].filter(span => span.kind === kind);
    }

    /**
     * Issues found since the last call
     */
    takeIssues(): ProtectorIssue[] {
        const issues = this.issues;
        this.issues = [];
        return issues;
    }

    get size(): number {
        return this.spans.size;
    }

    /**
     * Replace tokens with their spans, category by category in the reverse
     * order the categories were first protected. A restored span may itself
     * contain tokens (a figure environment wrapping caption math), so passes
     * repeat until nothing known is left. Unknown tokens are left in place.
     */
    restore(text: string, renderers: SpanRenderers = {}): string {
        let result = text;
        const order = [...this.categoryOrder].reverse();

        for (let depth = 0; depth < 16; depth++) {
            let replaced = false;
            for (const category of order) {
                const letter = CATEGORY_LETTER[category];
                result = result.replace(TOKEN_PATTERN, (token: string, tokenLetter: string) => {
                    if (tokenLetter !== letter) return token;
                    const span = this.spans.get(token);
                    if (!span) return token;
                    replaced = true;
                    const render = renderers[span.kind];
                    return render ? render(span) : span.original;
                });
            }
            if (!replaced) break;
        }
        return result;
    }

    /**
     * True when `text` still holds a token issued by this protector
     */
    hasTokens(text: string): boolean {
        for (const match of text.matchAll(TOKEN_PATTERN)) {
            if (this.spans.has(match[0])) return true;
        }
        return false;
    }

    // =========================================================================
    // Scanning passes
    // =========================================================================

    private assertNoForeignTokens(text: string): void {
        const stripped = text.replace(TOKEN_PATTERN, token => (this.spans.has(token) ? '' : token));
        const offset = stripped.search(/[\uE000-\uE003]/);
        if (offset >= 0) {
            throw new ProtectorCollisionError(offset);
        }
    }

    private protectPattern(text: string, pattern: RegExp, category: ProtectedCategory, kind: SpanKind): string {
        return text.replace(pattern, match => this.protectSpan(match, category, kind));
    }

    /**
     * Fenced code blocks are found line by line: an opener runs to the first
     * closing fence of the same character that is at least as long. An
     * opener without a closer protects only its own line.
     */
    private protectFences(text: string): string {
        const lines = text.split('\n');
        const out: string[] = [];
        let i = 0;

        while (i < lines.length) {
            const opener = FENCE_OPEN.exec(lines[i]);
            if (!opener || (opener[1][0] === '`' && opener[2].includes('`'))) {
                out.push(lines[i]);
                i++;
                continue;
            }

            const fence = opener[1];
            const info = opener[2].trim();
            let close = -1;
            for (let j = i + 1; j < lines.length; j++) {
                const closer = FENCE_CLOSE.exec(lines[j]);
                if (closer && closer[1][0] === fence[0] && closer[1].length >= fence.length) {
                    close = j;
                    break;
                }
            }

            if (close < 0) {
                this.issues.push({ kind: 'unterminated-fence', line: i + 1, snippet: lines[i] });
                out.push(this.protectSpan(lines[i], 'code', 'unterminated-fence'));
                i++;
                continue;
            }

            const original = lines.slice(i, close + 1).join('\n');
            if (info === '{=latex}') {
                out.push(this.protectSpan(original, 'raw', 'latex-fence'));
            } else {
                const language = info.replace(/^\{?\.?/, '').split(/[\s}]/)[0];
                out.push(this.protectSpan(original, 'code', 'fenced-code', language));
            }
            i = close + 1;
        }

        return out.join('\n');
    }
}

// =============================================================================
// Span content helpers used by the restore renderers
// =============================================================================

/**
 * Body of a fenced block without its fence lines
 */
export function fenceBody(original: string): string {
    const lines = original.split('\n');
    return lines.slice(1, -1).join('\n');
}

/**
 * Content of an inline code span; one padding space on each side is dropped
 * when both are present
 */
export function inlineCodeBody(original: string): string {
    const run = /^`+/.exec(original);
    const width = run ? run[0].length : 1;
    const inner = original.slice(width, original.length - width);
    if (inner.length > 2 && inner.startsWith(' ') && inner.endsWith(' ')) {
        return inner.slice(1, -1);
    }
    return inner;
}

/**
 * Comment text between `<!--` and `-->`
 */
export function commentBody(original: string): string {
    return original.replace(/^<!--/, '').replace(/-->$/, '');
}
