/**
 * Conversion pipeline
 *
 * An explicit, ordered stage table. Every stage takes the working text
 * and the document context and returns the new working text; running a
 * stage on its own output changes nothing. PROTECT is first and RESTORE
 * last, so every converter in between sees code and math as tokens.
 */

import { createBuildContext, createDocumentContext } from './context';
import { fenceBody, inlineCodeBody } from './protector';
import type { SpanRenderers } from './protector';
import { convertHeaders } from './headers';
import { convertEquations } from './equations';
import { convertFigures } from './figures';
import { convertTables } from './tables';
import { convertInlineFormatting } from './inlineFormatting';
import { convertLists } from './lists';
import { convertLinks } from './links';
import { convertCitations } from './citations';
import { convertCrossReferences } from './crossReferences';
import { convertSpecialCharacters } from './specialCharacters';
import { convertPageBreaks } from './pageBreaks';
import { convertComments, renderComment } from './comments';
import { locate } from './warnings';
import { converterLogger } from '../utils/logger';
import { escapeLatex, normalizeLineEndings } from '../utils/escapeUtils';
import type {
    BuildContext,
    ConversionOptions,
    ConversionResult,
    ConversionWarning,
    ConvertDocumentOptions,
    DocumentContext,
} from './types';

const log = converterLogger.child('Pipeline');

export type StageName =
    | 'PROTECT'
    | 'HEADERS'
    | 'EQUATIONS'
    | 'FIGURES'
    | 'TABLES'
    | 'INLINE_FORMATTING'
    | 'LISTS'
    | 'LINKS'
    | 'CITATIONS'
    | 'CROSS_REFS'
    | 'ESCAPING'
    | 'PAGE_BREAKS'
    | 'COMMENTS'
    | 'RESTORE';

export interface Stage {
    name: StageName;
    /** What the stage assumes about its input */
    precondition: string;
    /** What the stage guarantees about its output */
    postcondition: string;
    run: (text: string, ctx: DocumentContext) => string;
}

// =============================================================================
// Restore renderers
// =============================================================================

function restoreRenderers(ctx: DocumentContext): SpanRenderers {
    const { minted } = ctx.build.options;
    return {
        'fenced-code': span => {
            const body = fenceBody(span.original);
            if (minted) {
                return `\\begin{minted}{${span.language || 'text'}}\n${body}\n\\end{minted}`;
            }
            return `\\begin{verbatim}\n${body}\n\\end{verbatim}`;
        },
        'inline-code': span => `\\texttt{${escapeLatex(inlineCodeBody(span.original))}}`,
        'latex-fence': span => fenceBody(span.original),
        'unterminated-fence': span => `% ${span.original}`,
        'comment': span => renderComment(span.original),
    };
}

// =============================================================================
// Stage table
// =============================================================================

export const STAGES: readonly Stage[] = [
    {
        name: 'PROTECT',
        precondition: 'Markdown source with LF line endings',
        postcondition: 'code, comments, math and raw LaTeX replaced by placeholder tokens',
        run: (text, ctx) => {
            const protectedText = ctx.protector.protect(text);
            for (const issue of ctx.protector.takeIssues()) {
                ctx.build.warnings.add({
                    severity: 'recoverable',
                    category: 'unterminated-code-fence',
                    message: 'Code fence is never closed; only the opening line was protected',
                    location: { ...locate(ctx, issue.snippet), line: issue.line + ctx.lineOffset },
                    suggestion: 'Close the block with a matching fence line',
                });
            }
            return protectedText;
        },
    },
    {
        name: 'HEADERS',
        precondition: 'protected text',
        postcondition: 'ATX headings are sectioning commands; heading labels declared',
        run: convertHeaders,
    },
    {
        name: 'EQUATIONS',
        precondition: 'display math is tokenized',
        postcondition: 'labelled display math is a protected equation environment',
        run: convertEquations,
    },
    {
        name: 'FIGURES',
        precondition: 'headings converted, so a figure never starts with #',
        postcondition: 'every image is a protected figure float; figure labels declared',
        run: convertFigures,
    },
    {
        name: 'TABLES',
        precondition: 'code is tokenized, so pipes inside code never split cells',
        postcondition: 'every pipe table is a protected table float; table labels declared',
        run: convertTables,
    },
    {
        name: 'INLINE_FORMATTING',
        precondition: 'floats protected; list markers still Markdown',
        postcondition: 'emphasis, subscript and superscript are LaTeX commands',
        run: text => convertInlineFormatting(text),
    },
    {
        name: 'LISTS',
        precondition: 'emphasis converted, so a leading * is a list marker',
        postcondition: 'item runs are itemize or enumerate environments',
        run: text => convertLists(text),
    },
    {
        name: 'LINKS',
        precondition: 'image syntax already consumed by FIGURES',
        postcondition: 'links and URLs are \\href/\\url commands with protected arguments',
        run: convertLinks,
    },
    {
        name: 'CITATIONS',
        precondition: 'URLs protected, so an @ inside one never cites',
        postcondition: 'citation keys are \\cite commands and recorded',
        run: convertCitations,
    },
    {
        name: 'CROSS_REFS',
        precondition: 'citations converted; only namespaced @ references remain',
        postcondition: 'references are \\ref/\\eqref commands and recorded',
        run: convertCrossReferences,
    },
    {
        name: 'ESCAPING',
        precondition: 'every Markdown construct that uses & % _ # $ has been converted or protected',
        postcondition: 'those characters in running text are escaped; label, citation and URL arguments untouched',
        run: text => convertSpecialCharacters(text),
    },
    {
        name: 'PAGE_BREAKS',
        precondition: 'protected text',
        postcondition: '<newpage> and <clearpage> are LaTeX commands',
        run: text => convertPageBreaks(text),
    },
    {
        name: 'COMMENTS',
        precondition: 'comments are tokenized',
        postcondition: 'comment tokens are % lines',
        run: convertComments,
    },
    {
        name: 'RESTORE',
        precondition: 'all converters have run',
        postcondition: 'no placeholder token remains; code rendered verbatim, math as written',
        run: (text, ctx) => ctx.protector.restore(text, restoreRenderers(ctx)),
    },
];

/**
 * Run one stage by name. Used by tests to check stages in isolation.
 */
export function runStage(name: StageName, text: string, ctx: DocumentContext): string {
    const stage = STAGES.find(s => s.name === name);
    if (!stage) {
        throw new Error(`Unknown stage: ${name}`);
    }
    return stage.run(text, ctx);
}

/**
 * Convert one Markdown document to a LaTeX body fragment. Labels,
 * citations and reference uses land in the build context; call
 * finalizeBuild once every document of the build has been converted.
 */
export function convertDocument(markdown: string, build: BuildContext, options: ConvertDocumentOptions = {}): string {
    const ctx = createDocumentContext(normalizeLineEndings(markdown), build, options);
    let text = ctx.source;

    for (const stage of STAGES) {
        text = stage.run(text, ctx);
    }

    log.debug('Converted document', {
        document: options.documentName ?? '<inline>',
        spans: ctx.protector.size,
        warnings: build.warnings.size,
    });
    return text;
}

const finalizedBuilds = new WeakSet<BuildContext>();

/**
 * Check every recorded reference against the declared labels. An
 * unresolved reference keeps its \ref command and adds one warning per use.
 */
export function finalizeBuild(build: BuildContext): ConversionWarning[] {
    if (!finalizedBuilds.has(build)) {
        finalizedBuilds.add(build);
        for (const use of build.references) {
            if (build.labels.has(use.namespace, use.key)) continue;
            const warning: ConversionWarning = {
                severity: 'recoverable',
                category: 'unresolved-reference',
                message: `Reference to undeclared label '${use.target}'`,
                suggestion: `Declare {#${use.target}} on the figure, table, equation or heading`,
            };
            if (use.location) {
                warning.location = use.location;
            }
            build.warnings.add(warning);
        }
    }
    return build.warnings.list();
}

export type ConvertMarkdownOptions = Partial<ConversionOptions> & ConvertDocumentOptions;

/**
 * Convert a single Markdown string in a build of its own
 */
export function convertMarkdown(markdown: string, options: ConvertMarkdownOptions = {}): ConversionResult {
    const { supplementary, documentName, firstLine, headingShift, ...conversion } = options;
    const build = createBuildContext(conversion);
    const documentOptions: ConvertDocumentOptions = {};
    if (supplementary !== undefined) documentOptions.supplementary = supplementary;
    if (documentName !== undefined) documentOptions.documentName = documentName;
    if (firstLine !== undefined) documentOptions.firstLine = firstLine;
    if (headingShift !== undefined) documentOptions.headingShift = headingShift;

    const latex = convertDocument(markdown, build, documentOptions);
    const warnings = finalizeBuild(build);
    return {
        latex,
        warnings,
        labels: build.labels.all(),
        citations: [...build.citations],
    };
}
