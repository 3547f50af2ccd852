/**
 * Integration tests for manuscript builds
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as os from 'os';

vi.mock('../processRunner', () => ({
  runCommand: vi.fn(),
}));

import { runCommand } from '../processRunner';
import { buildManuscript } from '../builder';
import { defaultSettings } from '../../cli/settings';
import { MissingInputError, StrictModeError } from '../../utils/errors';
import { LogLevel, initializeLogging } from '../../utils/logger';

const mockedRun = vi.mocked(runCommand);

const MAIN = [
  '## Abstract',
  'A short abstract.',
  '',
  '## Introduction',
  'See @fig:photo.',
  '',
  '![A photo](FIGURES/photo.png){#fig:photo}',
  '',
  '## Methods',
  'We cite @known.',
  '',
].join('\n');

beforeAll(() => {
  initializeLogging({ level: LogLevel.SILENT });
});

describe('buildManuscript', () => {
  let tempDir: string;
  let outputRoot: string;
  let texPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'build-test-'));
    outputRoot = path.join(tempDir, 'output');
    texPath = path.join(outputRoot, `${path.basename(tempDir)}.tex`);

    await fs.writeFile(path.join(tempDir, '00_CONFIG.yml'), 'title: Thin films\nbibliography: refs\nauthors:\n  - Jane Doe\n');
    await fs.writeFile(path.join(tempDir, 'refs.bib'), '@article{known, title = {K}}\n');
    await fs.writeFile(path.join(tempDir, '01_MAIN.md'), MAIN);
    await fs.mkdir(path.join(tempDir, 'FIGURES'));
    await fs.writeFile(path.join(tempDir, 'FIGURES', 'photo.png'), 'png-bytes');

    mockedRun.mockReset();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write the assembled .tex file', async () => {
    const settings = defaultSettings();
    const result = await buildManuscript(tempDir, { compile: false }, settings);

    expect(result.texPath).toBe(texPath);
    expect(result.pdfPath).toBeUndefined();
    expect(result.warnings).toEqual([]);
    expect(result.figures).toEqual([{ relative: 'photo.png', status: 'copied' }]);

    const tex = await fs.readFile(texPath, 'utf-8');
    expect(tex).toContain('\\title{Thin films}\n');
    expect(tex).toContain('\\author{Jane Doe}\n');
    expect(tex).toContain('\\begin{abstract}\nA short abstract.\n\\end{abstract}\n');
    expect(tex).toContain('\\section{Introduction}\nSee \\ref{fig:photo}.\n');
    expect(tex).toContain('\\includegraphics{Figures/photo.png}\n\\caption{A photo}\n\\label{fig:photo}\n\\end{figure}');
    expect(tex).toContain('\\section*{Methods}\nWe cite \\cite{known}.\n');
    expect(tex).toContain('\\bibliography{refs}\n');

    expect(existsSync(path.join(outputRoot, 'refs.bib'))).toBe(true);
    expect(existsSync(path.join(outputRoot, 'Figures', 'photo.png'))).toBe(true);
    expect(mockedRun).not.toHaveBeenCalled();
  });

  it('should compile the .tex file by default', async () => {
    mockedRun.mockImplementation(async (command, args, options) => {
      if (command === 'pdflatex') {
        const texFile = args[args.length - 1];
        await fs.writeFile(path.join(options.cwd, texFile.replace(/\.tex$/, '.pdf')), 'pdf');
      }
      return { stdout: '', stderr: '', exitCode: 0 };
    });

    const result = await buildManuscript(tempDir, {}, defaultSettings());

    expect(result.pdfPath).toBe(path.join(outputRoot, `${path.basename(tempDir)}.pdf`));
    expect(mockedRun.mock.calls.map(call => call[0])).toEqual(['pdflatex', 'bibtex', 'pdflatex', 'pdflatex']);
    expect(mockedRun.mock.calls[0][2].cwd).toBe(outputRoot);
  });

  it('should turn figure failures into warnings', async () => {
    await fs.writeFile(path.join(tempDir, 'FIGURES', 'plot.py'), 'raise SystemExit(1)');
    mockedRun.mockResolvedValue({ stdout: '', stderr: '', exitCode: 1 });

    const result = await buildManuscript(tempDir, { compile: false, figures: true }, defaultSettings());

    expect(result.warnings).toEqual([
      {
        severity: 'recoverable',
        category: 'figure-generation',
        message: 'python3 exited with code 1',
        location: { snippet: 'plot.py', document: 'FIGURES' },
      },
    ]);
  });

  it('should fail in strict mode when a warning is raised', async () => {
    await fs.writeFile(path.join(tempDir, '01_MAIN.md'), 'See @fig:none.\n');

    await expect(buildManuscript(tempDir, { compile: false, strict: true }, defaultSettings()))
      .rejects.toThrow(StrictModeError);
    expect(existsSync(texPath)).toBe(false);
  });

  it('should honour an output directory override', async () => {
    const result = await buildManuscript(tempDir, { compile: false, outputDir: 'build' }, defaultSettings());

    expect(result.texPath).toBe(path.join(tempDir, 'build', `${path.basename(tempDir)}.tex`));
  });

  it('should throw MissingInputError without a main text', async () => {
    await fs.rm(path.join(tempDir, '01_MAIN.md'));

    await expect(buildManuscript(tempDir, { compile: false }, defaultSettings())).rejects.toThrow(MissingInputError);
  });
});
