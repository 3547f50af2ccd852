/**
 * Build and document contexts
 */

import { ContentProtector } from './protector';
import { LabelRegistry } from './labelRegistry';
import { WarningCollector, warn } from './warnings';
import { DEFAULT_CONVERSION_OPTIONS } from './types';
import type {
    BuildContext,
    ConversionOptions,
    ConvertDocumentOptions,
    DocumentContext,
    Label,
    LabelNamespace,
} from './types';

/**
 * Fresh state for one build. Nothing here is shared between builds.
 */
export function createBuildContext(options: Partial<ConversionOptions> = {}): BuildContext {
    return {
        options: { ...DEFAULT_CONVERSION_OPTIONS, ...options },
        labels: new LabelRegistry(),
        warnings: new WarningCollector(),
        references: [],
        citations: new Set(),
    };
}

export function createDocumentContext(
    source: string,
    build: BuildContext,
    options: ConvertDocumentOptions = {}
): DocumentContext {
    const ctx: DocumentContext = {
        build,
        source,
        protector: new ContentProtector(),
        supplementary: options.supplementary ?? false,
        lineOffset: (options.firstLine ?? 1) - 1,
        headingShift: options.headingShift ?? 0,
    };
    if (options.documentName) {
        ctx.documentName = options.documentName;
    }
    return ctx;
}

/**
 * Declare a label, reporting a redeclaration. Last write wins.
 */
export function declareLabel(
    ctx: DocumentContext,
    namespace: LabelNamespace,
    key: string,
    snippet: string
): Label {
    const { label, previous } = ctx.build.labels.declare(namespace, key);
    if (previous) {
        warn(
            ctx,
            'recoverable',
            'duplicate-label',
            `Label '${label.target}' is declared more than once; the last declaration wins`,
            snippet,
            'Give each figure, table, equation and note a distinct id'
        );
    }
    return label;
}
