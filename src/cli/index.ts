#!/usr/bin/env node
/**
 * texloom CLI - build scientific manuscripts written in Markdown
 *
 * Usage:
 *   texloom build <dir> [--figures] [--no-compile] [--strict] [--output <dir>]
 *   texloom convert <file.md> [--supplementary] [--output <file>]
 *   texloom figures <dir>
 *   texloom validate <dir>
 */

import { parseArgs } from './args';
import type { ParsedArgs } from './args';
import { buildCommand } from './commands/build';
import { convertCommand } from './commands/convert';
import { figuresCommand } from './commands/figures';
import { validateCommand } from './commands/validate';
import { errorMessage } from '../utils/errors';
import { cliLogger } from '../utils/logger';

export function printHelp(): void {
    console.log(`
texloom - Markdown manuscripts to LaTeX and PDF

USAGE:
    texloom <command> [options]

COMMANDS:
    build <dir>             Convert a manuscript directory and compile it
    convert <file.md>       Convert one Markdown file to a LaTeX fragment
    figures <dir>           Run the figure scripts in FIGURES/
    validate <dir>          Check citations, math and references
    help                    Show this help message

A manuscript directory holds 00_CONFIG.yml, 01_MAIN.md, an optional
02_SUPPLEMENTARY_INFO.md, the bibliography and a FIGURES/ directory.

EXAMPLES:
    texloom build paper --figures
    texloom build paper --no-compile --output build
    texloom convert notes.md --output notes.tex
    texloom validate paper

OPTIONS:
    --figures               Run figure scripts before building
    --no-compile            Write the .tex file only
    --strict                Fail on any recoverable warning
    --output <path>         Output directory (build, figures) or file (convert)
    --supplementary         Convert as supplementary information
    --minted                Render code blocks with minted
    --log-level <level>     debug, info, warn, error or silent
    --log-dir <dir>         Also write rotating log files to <dir>
    --verbose, --quiet      Shorthand for debug and error log levels
`);
}

/**
 * Run one command and return the process exit code
 */
export async function run(args: ParsedArgs): Promise<number> {
    if (args.flags.help || args.flags.h) {
        printHelp();
        return 0;
    }

    try {
        switch (args.command) {
            case 'build':
                return await buildCommand(args);
            case 'convert':
                return await convertCommand(args);
            case 'figures':
                return await figuresCommand(args);
            case 'validate':
                return await validateCommand(args);
            case 'help':
                printHelp();
                return 0;
            default:
                console.error(`Unknown command: ${args.command}`);
                printHelp();
                return 1;
        }
    } catch (error) {
        cliLogger.debug('Command failed', { command: args.command, error: errorMessage(error) });
        console.error('Error:', errorMessage(error));
        return 1;
    }
}

if (require.main === module) {
    run(parseArgs(process.argv.slice(2))).then(
        code => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error('Error:', errorMessage(error));
            process.exitCode = 1;
        }
    );
}
