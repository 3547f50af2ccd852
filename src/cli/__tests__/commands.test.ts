/**
 * Tests for the CLI commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseArgs } from '../args';
import { convertCommand } from '../commands/convert';
import { validateCommand } from '../commands/validate';
import { figuresCommand } from '../commands/figures';
import { buildCommand } from '../commands/build';
import { MissingInputError, StrictModeError } from '../../utils/errors';

describe('CLI commands', () => {
    let tempDir: string;
    let log: MockInstance<typeof console.log>;
    let error: MockInstance<typeof console.error>;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'texloom-cli-'));
        log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    describe('convert', () => {
        it('should write the converted file', async () => {
            const input = path.join(tempDir, 'notes.md');
            const output = path.join(tempDir, 'notes.tex');
            fs.writeFileSync(input, '# Title\n\nSome **bold** text.\n');

            const code = await convertCommand(parseArgs(['convert', input, '--output', output, '--quiet']));

            expect(code).toBe(0);
            const latex = fs.readFileSync(output, 'utf-8');
            expect(latex).toContain('\\section{Title}\n');
            expect(latex).toContain('Some \\textbf{bold} text.');
            expect(latex.endsWith('\n')).toBe(true);
            expect(error).toHaveBeenCalledWith(`Wrote ${output}`);
            expect(log).not.toHaveBeenCalled();
        });

        it('should print to stdout without --output', async () => {
            const input = path.join(tempDir, 'notes.md');
            fs.writeFileSync(input, 'Plain text.');

            await convertCommand(parseArgs(['convert', input, '--quiet']));

            expect(log).toHaveBeenCalledWith('Plain text.');
        });

        it('should fail in strict mode on warnings', async () => {
            const input = path.join(tempDir, 'notes.md');
            fs.writeFileSync(input, 'See @fig:none.\n');

            await expect(convertCommand(parseArgs(['convert', input, '--strict', '--quiet'])))
                .rejects.toThrow(StrictModeError);
            expect(error).toHaveBeenCalledTimes(1);
        });

        it('should report a missing input file', async () => {
            await expect(convertCommand(parseArgs(['convert', path.join(tempDir, 'none.md')])))
                .rejects.toThrow(MissingInputError);
        });

        it('should print usage without a file', async () => {
            expect(await convertCommand(parseArgs(['convert']))).toBe(1);
            expect(error).toHaveBeenCalledWith(
                'Usage: texloom convert <file.md> [--supplementary] [--minted] [--strict] [--output <file>]'
            );
        });
    });

    describe('validate', () => {
        it('should exit non-zero on errors and print statistics', async () => {
            fs.writeFileSync(path.join(tempDir, '00_CONFIG.yml'), 'title: T\nbibliography: refs\n');
            fs.writeFileSync(path.join(tempDir, 'refs.bib'), '@article{a, title = {A}}\n');
            fs.writeFileSync(path.join(tempDir, '01_MAIN.md'), 'Cite @b.\n');

            const code = await validateCommand(parseArgs(['validate', tempDir, '--quiet']));

            expect(code).toBe(1);
            expect(error).toHaveBeenCalledWith("error: Citation key 'b' is not in refs.bib");
            expect(log).toHaveBeenCalledWith('Citations:            1');
            expect(log).toHaveBeenCalledWith('Bibliography entries: 1');
            expect(log).toHaveBeenLastCalledWith('\n1 error(s), 0 warning(s)');
        });
    });

    describe('figures', () => {
        it('should say when there is nothing to do', async () => {
            const code = await figuresCommand(parseArgs(['figures', tempDir, '--quiet']));

            expect(code).toBe(0);
            expect(log).toHaveBeenCalledWith(`No figures found in ${path.join(tempDir, 'FIGURES')}`);
        });

        it('should list copied images', async () => {
            fs.mkdirSync(path.join(tempDir, 'FIGURES'));
            fs.writeFileSync(path.join(tempDir, 'FIGURES', 'photo.png'), 'png-bytes');

            const code = await figuresCommand(parseArgs(['figures', tempDir, '--quiet']));

            expect(code).toBe(0);
            expect(log).toHaveBeenCalledWith('ok   photo.png (copied)');
            expect(log).toHaveBeenLastCalledWith('\n1 of 1 figures ready');
        });
    });

    describe('build', () => {
        it('should write the .tex file without compiling', async () => {
            fs.writeFileSync(path.join(tempDir, '00_CONFIG.yml'), 'title: T\n');
            fs.writeFileSync(path.join(tempDir, '01_MAIN.md'), '## Abstract\nShort.\n');
            const texPath = path.join(tempDir, 'output', `${path.basename(tempDir)}.tex`);

            const code = await buildCommand(parseArgs(['build', tempDir, '--no-compile', '--quiet']));

            expect(code).toBe(0);
            expect(fs.existsSync(texPath)).toBe(true);
            expect(log).toHaveBeenCalledWith(`LaTeX: ${texPath}`);
            expect(log).toHaveBeenCalledTimes(1);
        });

        it('should print usage without a directory', async () => {
            expect(await buildCommand(parseArgs(['build']))).toBe(1);
        });
    });
});
