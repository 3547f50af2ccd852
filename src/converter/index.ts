/**
 * Markdown-to-LaTeX conversion
 */

export { convertMarkdown, convertDocument, finalizeBuild, runStage, STAGES } from './pipeline';
export type { Stage, StageName, ConvertMarkdownOptions } from './pipeline';
export { createBuildContext, createDocumentContext } from './context';
export { ContentProtector } from './protector';
export { LabelRegistry, parseLabelId } from './labelRegistry';
export { WarningCollector, formatWarning } from './warnings';
export { DEFAULT_CONVERSION_OPTIONS } from './types';
export type {
    BuildContext,
    ConversionOptions,
    ConversionResult,
    ConversionWarning,
    ConvertDocumentOptions,
    DocumentContext,
    Label,
    LabelNamespace,
    ProtectedSpan,
    WarningCategory,
    WarningSeverity,
} from './types';
