/**
 * texloom - Markdown manuscripts to LaTeX
 */

export * from './converter';
export * from './manuscript';
export { loadSettings, defaultSettings, findConfig, parseSettingsFile, mergeSettings } from './cli/settings';
export type { TexloomSettings, FigureSettings, LatexSettings, BuildSettings } from './cli/settings';
export {
    CompilationError,
    MetadataError,
    MissingInputError,
    ProtectorCollisionError,
    SettingsError,
    StrictModeError,
} from './utils/errors';
export { TimeoutError } from './utils/resilience';
export { LogLevel, initializeLogging, createLogger } from './utils/logger';
