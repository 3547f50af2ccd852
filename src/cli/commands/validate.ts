/**
 * Validate command - check a manuscript without building it
 */

import { validateManuscript } from '../../manuscript';
import type { ParsedArgs } from '../args';
import { prepareSettings, printWarnings, usage } from './common';

export async function validateCommand(args: ParsedArgs): Promise<number> {
    const dir = args.args[0];
    if (!dir) {
        return usage('texloom validate <dir>');
    }

    const settings = prepareSettings(dir, args);
    const report = await validateManuscript(dir, settings);

    printWarnings(report.warnings);
    for (const error of report.errors) {
        console.error(`error: ${error}`);
    }

    const { stats } = report;
    const rows: [string, number][] = [
        ['Citations', stats.citations],
        ['Bibliography entries', stats.bibliographyEntries],
        ['Labels', stats.labels],
        ['Math spans', stats.mathSpans],
        ['Supplementary notes', stats.supplementaryNotes],
    ];
    for (const [name, value] of rows) {
        console.log(`${`${name}:`.padEnd(22)}${value}`);
    }
    console.log(`\n${report.errors.length} error(s), ${report.warnings.length} warning(s)`);

    return report.errors.length > 0 ? 1 : 0;
}
