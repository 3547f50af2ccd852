/**
 * Warning collection for one build
 */

import { converterLogger } from '../utils/logger';
import type {
    ConversionWarning,
    DocumentContext,
    SourceLocation,
    WarningCategory,
    WarningSeverity,
} from './types';

const log = converterLogger.child('Warnings');

export class WarningCollector {
    private items: ConversionWarning[] = [];

    add(warning: ConversionWarning): void {
        this.items.push(warning);
        const where = warning.location?.line !== undefined ? ` (line ${warning.location.line})` : '';
        log.debug(`${warning.category}: ${warning.message}${where}`);
    }

    list(): ConversionWarning[] {
        return [...this.items];
    }

    get size(): number {
        return this.items.length;
    }
}

/**
 * Locate a snippet in the document source. Snippets that span
 * protected tokens will not be found; the line is then omitted.
 */
export function locate(ctx: DocumentContext, snippet: string): SourceLocation {
    const excerpt = snippet.length > 80 ? `${snippet.slice(0, 77)}...` : snippet;
    const firstLine = snippet.split('\n')[0];
    const index = firstLine ? ctx.source.indexOf(firstLine) : -1;
    const location: SourceLocation = { snippet: excerpt };
    if (index >= 0) {
        location.line = ctx.source.slice(0, index).split('\n').length + ctx.lineOffset;
    }
    if (ctx.documentName) {
        location.document = ctx.documentName;
    }
    return location;
}

/**
 * Record a warning against the text that caused it
 */
export function warn(
    ctx: DocumentContext,
    severity: WarningSeverity,
    category: WarningCategory,
    message: string,
    snippet: string,
    suggestion?: string
): void {
    const warning: ConversionWarning = {
        severity,
        category,
        message,
        location: locate(ctx, snippet),
    };
    if (suggestion) {
        warning.suggestion = suggestion;
    }
    ctx.build.warnings.add(warning);
}

/**
 * One-line rendering used by the CLI
 */
export function formatWarning(warning: ConversionWarning): string {
    const loc = warning.location;
    const where = loc
        ? `${loc.document ?? ''}${loc.line !== undefined ? `:${loc.line}` : ''}`
        : '';
    const prefix = where ? `${where}: ` : '';
    const hint = warning.suggestion ? ` (${warning.suggestion})` : '';
    return `${prefix}${warning.severity} [${warning.category}] ${warning.message}${hint}`;
}
