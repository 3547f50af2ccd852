/**
 * Type definitions for the Markdown-to-LaTeX conversion pipeline
 */

import type { ContentProtector } from './protector';
import type { LabelRegistry } from './labelRegistry';
import type { WarningCollector } from './warnings';

// =============================================================================
// Protected spans
// =============================================================================

/**
 * Category of a protected span. Restoration walks categories in the
 * reverse order they were protected.
 */
export type ProtectedCategory = 'code' | 'math' | 'raw';

/**
 * What produced a protected span; selects the renderer used at restore time
 */
export type SpanKind =
    | 'fenced-code'
    | 'unterminated-fence'
    | 'inline-code'
    | 'latex-fence'
    | 'comment'
    | 'display-math'
    | 'inline-math'
    | 'raw-latex'
    | 'generated';

export interface ProtectedSpan {
    /** Placeholder that stands in for the span in the working text */
    token: string;
    /** The exact source text the token replaced */
    original: string;
    category: ProtectedCategory;
    kind: SpanKind;
    /** Language tag of a fenced code block */
    language?: string;
}

// =============================================================================
// Labels and references
// =============================================================================

/**
 * Label namespaces. `sec` covers headings; the rest are float and note labels.
 */
export type LabelNamespace = 'fig' | 'sfig' | 'table' | 'stable' | 'eq' | 'snote' | 'sec';

export const LABEL_NAMESPACES: readonly LabelNamespace[] = ['fig', 'sfig', 'table', 'stable', 'eq', 'snote', 'sec'];

export interface Label {
    namespace: LabelNamespace;
    key: string;
    /** LaTeX label string, `namespace:key` */
    target: string;
}

/**
 * A cross-reference seen in the text, resolved after the whole build
 */
export interface ReferenceUse {
    namespace: LabelNamespace;
    key: string;
    target: string;
    location?: SourceLocation;
}

// =============================================================================
// Attributes
// =============================================================================

/**
 * Parsed `{#id .class key="value"}` block
 */
export interface AttributeBlock {
    id?: string;
    classes: string[];
    options: Record<string, string>;
}

// =============================================================================
// Elements
// =============================================================================

export interface FigureElement {
    /** Path as written in the Markdown */
    source: string;
    /** Path emitted in \includegraphics */
    path: string;
    caption: string;
    attributes: AttributeBlock;
    label?: Label;
}

export type ColumnAlignment = 'l' | 'c' | 'r';

export interface TableElement {
    header: string[];
    alignments: ColumnAlignment[];
    rows: string[][];
    caption: string;
    attributes: AttributeBlock;
    /** `Table*` caption: spans both columns */
    wide: boolean;
    label?: Label;
}

// =============================================================================
// Warnings
// =============================================================================

export type WarningSeverity = 'recoverable' | 'advisory';

export type WarningCategory =
    | 'unterminated-code-fence'
    | 'malformed-attributes'
    | 'malformed-table'
    | 'table-column-mismatch'
    | 'duplicate-label'
    | 'unresolved-reference'
    | 'missing-caption'
    | 'missing-figure'
    | 'note-numbering'
    | 'figure-generation';

export interface SourceLocation {
    /** 1-based line in the source document, when it can be found */
    line?: number;
    /** Short excerpt of the offending text */
    snippet: string;
    /** Document the issue was found in */
    document?: string;
}

export interface ConversionWarning {
    severity: WarningSeverity;
    category: WarningCategory;
    message: string;
    location?: SourceLocation;
    suggestion?: string;
}

// =============================================================================
// Options and contexts
// =============================================================================

export interface ConversionOptions {
    /** Directory prefix written in the Markdown for figures */
    figureSourceDir: string;
    /** Directory figures are referenced from in the LaTeX output */
    figureOutputDir: string;
    /** Image format generated figure scripts produce */
    figureFormat: string;
    /** Render fenced code with minted instead of verbatim */
    minted: boolean;
    /** Command used for `@snote:` references */
    noteReferenceCommand: string;
    /**
     * Existence check for emitted figure paths; when supplied, a missing
     * file yields an advisory warning (the reference is still emitted)
     */
    assetExists?: (figurePath: string) => boolean;
}

export const DEFAULT_CONVERSION_OPTIONS: ConversionOptions = {
    figureSourceDir: 'FIGURES',
    figureOutputDir: 'Figures',
    figureFormat: 'png',
    minted: false,
    noteReferenceCommand: 'ref',
};

/**
 * Per-build state. Created fresh for every build and passed explicitly,
 * so concurrent builds never share registries or counters.
 */
export interface BuildContext {
    options: ConversionOptions;
    labels: LabelRegistry;
    warnings: WarningCollector;
    references: ReferenceUse[];
    /** Cited keys in first-use order */
    citations: Set<string>;
}

/**
 * Per-document state threaded through the stages
 */
export interface DocumentContext {
    build: BuildContext;
    /** Immutable input, used to locate warnings */
    source: string;
    /** Name used in warning locations, e.g. `01_MAIN.md` */
    documentName?: string;
    protector: ContentProtector;
    supplementary: boolean;
    /** Added to source line numbers, for documents cut from a larger file */
    lineOffset: number;
    /** Heading levels to promote, so `##` can open a \section */
    headingShift: number;
}

export interface ConvertDocumentOptions {
    supplementary?: boolean;
    documentName?: string;
    /** Line of the enclosing file the document starts on (default 1) */
    firstLine?: number;
    headingShift?: number;
}

export interface ConversionResult {
    latex: string;
    warnings: ConversionWarning[];
    labels: Label[];
    citations: string[];
}
