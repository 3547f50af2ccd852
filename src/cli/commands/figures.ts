/**
 * Figures command - run the figure scripts of a manuscript
 */

import * as path from 'path';
import { generateFigures } from '../../manuscript';
import { stringFlag } from '../args';
import type { ParsedArgs } from '../args';
import { prepareSettings, usage } from './common';

export async function figuresCommand(args: ParsedArgs): Promise<number> {
    const dir = args.args[0];
    if (!dir) {
        return usage('texloom figures <dir> [--output <dir>]');
    }

    const settings = prepareSettings(dir, args);
    const manuscriptDir = path.resolve(dir);
    const outputRoot = path.resolve(manuscriptDir, stringFlag(args, 'output') ?? settings.build.outputDir);

    const results = await generateFigures({ manuscriptDir, outputRoot, settings: settings.figures });
    if (results.length === 0) {
        console.log(`No figures found in ${path.join(dir, settings.figures.sourceDir)}`);
        return 0;
    }

    let failures = 0;
    for (const result of results) {
        const ok = result.status === 'generated' || result.status === 'copied';
        if (!ok) failures++;
        console.log(`${ok ? 'ok  ' : 'FAIL'} ${result.relative} (${result.status})${result.message ? `: ${result.message}` : ''}`);
    }
    console.log(`\n${results.length - failures} of ${results.length} figures ready`);
    return failures > 0 ? 1 : 0;
}
