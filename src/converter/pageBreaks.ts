/**
 * Page breaks: `<newpage>` and `<clearpage>`
 */

const PAGE_BREAK = /<(newpage|clearpage)\s*\/?>/gi;

export function convertPageBreaks(text: string): string {
    return text.replace(PAGE_BREAK, (_match: string, command: string) => `\\${command.toLowerCase()}`);
}
