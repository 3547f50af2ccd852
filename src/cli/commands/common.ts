/**
 * Helpers shared by the CLI commands
 */

import { loadSettings } from '../settings';
import type { TexloomSettings } from '../settings';
import { booleanFlag, stringFlag } from '../args';
import type { ParsedArgs } from '../args';
import { formatWarning } from '../../converter';
import type { ConversionWarning } from '../../converter';
import { LogLevel, initializeLogging, parseLogLevel } from '../../utils/logger';

/**
 * Load settings for `dir` and configure logging from them and the
 * --log-level, --verbose, --quiet and --log-dir flags
 */
export function prepareSettings(dir: string, args: ParsedArgs): TexloomSettings {
    const settings = loadSettings(dir);

    const levelFlag = stringFlag(args, 'log-level');
    let level = settings.logLevel;
    if (levelFlag) {
        level = parseLogLevel(levelFlag);
    } else if (booleanFlag(args, 'verbose')) {
        level = LogLevel.DEBUG;
    } else if (booleanFlag(args, 'quiet')) {
        level = LogLevel.ERROR;
    }

    const logDir = stringFlag(args, 'log-dir');
    initializeLogging(logDir ? { level, logDir } : { level });
    return { ...settings, logLevel: level };
}

/**
 * Warnings go to stderr so converted LaTeX on stdout stays clean
 */
export function printWarnings(warnings: ConversionWarning[]): void {
    for (const warning of warnings) {
        console.error(formatWarning(warning));
    }
}

export function usage(text: string): number {
    console.error(`Usage: ${text}`);
    return 1;
}
