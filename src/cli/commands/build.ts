/**
 * Build command - manuscript directory to .tex and PDF
 */

import * as path from 'path';
import { buildManuscript } from '../../manuscript';
import type { BuildOptions } from '../../manuscript';
import { booleanFlag, stringFlag } from '../args';
import type { ParsedArgs } from '../args';
import { prepareSettings, printWarnings, usage } from './common';

export async function buildCommand(args: ParsedArgs): Promise<number> {
    const dir = args.args[0];
    if (!dir) {
        return usage('texloom build <dir> [--figures] [--no-compile] [--strict] [--output <dir>]');
    }

    const settings = prepareSettings(dir, args);
    const options: BuildOptions = {
        figures: booleanFlag(args, 'figures'),
        compile: !booleanFlag(args, 'no-compile'),
    };
    if (booleanFlag(args, 'strict')) {
        options.strict = true;
    }
    const output = stringFlag(args, 'output');
    if (output) {
        options.outputDir = path.resolve(output);
    }

    const result = await buildManuscript(dir, options, settings);
    printWarnings(result.warnings);

    console.log(`LaTeX: ${result.texPath}`);
    if (result.pdfPath) {
        console.log(`PDF:   ${result.pdfPath}`);
    }
    return 0;
}
