/**
 * Shared escape utilities for LaTeX output and text normalization
 */

/**
 * Normalize line endings to Unix-style (LF only)
 * Converts CRLF (\r\n) and standalone CR (\r) to LF (\n)
 */
export function normalizeLineEndings(str: string): string {
    return str.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Escape special LaTeX characters
 * @param str - String to escape
 * @returns Escaped string safe for LaTeX
 */
export function escapeLatex(str: string): string {
    // Use a placeholder for backslashes first to avoid double escaping
    const BACKSLASH_PLACEHOLDER = '\x00BACKSLASH\x00';
    return str
        .replace(/\\/g, BACKSLASH_PLACEHOLDER)
        .replace(/[&%$#_{}]/g, '\\$&')
        .replace(/\^/g, '\\textasciicircum{}')
        .replace(/~/g, '\\textasciitilde{}')
        .replace(new RegExp(BACKSLASH_PLACEHOLDER, 'g'), '\\textbackslash{}');
}

/**
 * Escape the characters that break running text in a LaTeX body
 * (`& % _ # $`) while leaving commands, braces and already-escaped
 * characters alone.
 */
export function escapeLatexText(str: string): string {
    return str.replace(/(?<!\\)[&%_#$]/g, '\\$&');
}

/**
 * Escape characters that are special inside \url and \href arguments
 */
export function escapeUrl(url: string): string {
    return url.replace(/(?<!\\)([#%])/g, '\\$1');
}

/**
 * Build a label slug: lower-case, punctuation dropped,
 * runs of whitespace or hyphens joined with underscores
 */
export function slugify(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\w\s-]/g, '')
        .trim()
        .replace(/[\s-]+/g, '_');
}
