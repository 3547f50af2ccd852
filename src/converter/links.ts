/**
 * Link converter
 *
 * `[text](url)` becomes `\href{url}{text}`, or `\url{url}` when the text is
 * the URL itself. Bare and angle-bracketed `http(s)://` addresses become
 * `\url{...}`. Emitted URLs are protected so no later stage rewrites them.
 */

import { escapeUrl } from '../utils/escapeUtils';
import type { DocumentContext } from './types';

const LINK = /(?<!!)\[((?:[^\[\]\n]|\[[^\[\]\n]*\])*)\]\(([^()\s]*(?:\([^()\s]*\)[^()\s]*)*)(?:\s+"[^"]*")?\)/g;

const ANGLE_URL = /<(https?:\/\/[^\s<>]+)>/g;

const BARE_URL = /(?<![\w/{])https?:\/\/[^\s<>{}\]]*[^\s<>{}\].,;:!?)]/g;

export function convertLinks(text: string, ctx: DocumentContext): string {
    const protectUrl = (url: string): string => ctx.protector.protectRaw(escapeUrl(url));

    let result = text.replace(LINK, (_match: string, label: string, url: string) => {
        const linkText = label.trim();
        if (linkText === url || linkText === '') {
            return `\\url{${protectUrl(url)}}`;
        }
        return `\\href{${protectUrl(url)}}{${linkText}}`;
    });

    result = result.replace(ANGLE_URL, (_match: string, url: string) => `\\url{${protectUrl(url)}}`);
    result = result.replace(BARE_URL, url => `\\url{${protectUrl(url)}}`);
    return result;
}
