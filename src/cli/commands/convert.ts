/**
 * Convert command - one Markdown file to a LaTeX fragment
 */

import * as fs from 'fs';
import * as path from 'path';
import { convertMarkdown } from '../../converter';
import { conversionOptionsFor } from '../../manuscript';
import { MissingInputError, StrictModeError } from '../../utils/errors';
import { booleanFlag, stringFlag } from '../args';
import type { ParsedArgs } from '../args';
import { prepareSettings, printWarnings, usage } from './common';

export async function convertCommand(args: ParsedArgs): Promise<number> {
    const inputFile = args.args[0];
    if (!inputFile) {
        return usage('texloom convert <file.md> [--supplementary] [--minted] [--strict] [--output <file>]');
    }

    const inputPath = path.resolve(inputFile);
    if (!fs.existsSync(inputPath)) {
        throw new MissingInputError(inputPath);
    }

    const settings = prepareSettings(path.dirname(inputPath), args);
    const options = conversionOptionsFor(settings);
    if (booleanFlag(args, 'minted')) {
        options.minted = true;
    }

    const result = convertMarkdown(fs.readFileSync(inputPath, 'utf-8'), {
        ...options,
        supplementary: booleanFlag(args, 'supplementary'),
        documentName: path.basename(inputPath),
    });
    printWarnings(result.warnings);

    const recoverable = result.warnings.filter(w => w.severity === 'recoverable').length;
    if ((booleanFlag(args, 'strict') || settings.build.strict) && recoverable > 0) {
        throw new StrictModeError(recoverable);
    }

    const outputPath = stringFlag(args, 'output');
    if (outputPath) {
        fs.writeFileSync(path.resolve(outputPath), `${result.latex}\n`, 'utf-8');
        console.error(`Wrote ${outputPath}`);
    } else {
        console.log(result.latex);
    }
    return 0;
}
