/**
 * Unit tests for the LaTeX compile driver
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
import { compileManuscript, extractLatexErrors } from '../latexCompiler';
import { CompilationError, MissingInputError } from '../../utils/errors';
import { TimeoutError } from '../../utils/resilience';
import { LogLevel, initializeLogging } from '../../utils/logger';

const mockedRun = vi.mocked(runCommand);

const ENGINE_ARGS = ['-interaction=nonstopmode', '-halt-on-error', 'paper.tex'];

beforeAll(() => {
  initializeLogging({ level: LogLevel.SILENT });
});

describe('extractLatexErrors', () => {
  it('should keep ! lines and Error: lines', () => {
    const output = [
      'This is pdfTeX',
      '! Undefined control sequence.',
      'l.12 \\foo',
      'Package babel Error: Unknown option',
      '! Emergency stop.',
    ].join('\n');

    expect(extractLatexErrors(output)).toEqual([
      '! Undefined control sequence.',
      'Package babel Error: Unknown option',
      '! Emergency stop.',
    ]);
    expect(extractLatexErrors(output, 1)).toEqual(['! Undefined control sequence.']);
  });
});

describe('compileManuscript', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'compile-test-'));
    await fs.writeFile(path.join(tempDir, 'paper.tex'), '\\documentclass{article}');

    mockedRun.mockReset();
    mockedRun.mockImplementation(async (command, _args, options) => {
      if (command === 'pdflatex') {
        await fs.writeFile(path.join(options.cwd, 'paper.pdf'), 'pdf');
        await fs.writeFile(path.join(options.cwd, 'paper.aux'), 'aux');
        await fs.writeFile(path.join(options.cwd, 'paper.log'), 'log');
      }
      return { stdout: `${command} ok`, stderr: '', exitCode: 0 };
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should run the engine, bibtex and the engine twice more', async () => {
    const result = await compileManuscript({ workingDir: tempDir, texFile: 'paper.tex' });

    expect(mockedRun.mock.calls.map(call => [call[0], call[1]])).toEqual([
      ['pdflatex', ENGINE_ARGS],
      ['bibtex', ['paper']],
      ['pdflatex', ENGINE_ARGS],
      ['pdflatex', ENGINE_ARGS],
    ]);
    expect(mockedRun.mock.calls[0][2]).toEqual({ cwd: tempDir, timeoutMs: 120000, operationName: 'pdflatex paper.tex' });
    expect(result.pdfPath).toBe(path.join(tempDir, 'paper.pdf'));
    expect(result.warnings).toEqual([]);
    expect(result.log).toContain('=== bibtex ===\nbibtex ok\n');
  });

  it('should remove auxiliary files unless asked not to', async () => {
    await compileManuscript({ workingDir: tempDir, texFile: 'paper.tex' });
    expect(existsSync(path.join(tempDir, 'paper.aux'))).toBe(false);
    expect(existsSync(path.join(tempDir, 'paper.log'))).toBe(false);
    expect(existsSync(path.join(tempDir, 'paper.pdf'))).toBe(true);

    await compileManuscript({ workingDir: tempDir, texFile: 'paper.tex', cleanAuxFiles: false });
    expect(existsSync(path.join(tempDir, 'paper.aux'))).toBe(true);
  });

  it('should pass -shell-escape when asked', async () => {
    await compileManuscript({ workingDir: tempDir, texFile: 'paper.tex', shellEscape: true, compiler: 'xelatex' });

    expect(mockedRun.mock.calls[0][0]).toBe('xelatex');
    expect(mockedRun.mock.calls[0][1]).toEqual(['-interaction=nonstopmode', '-halt-on-error', '-shell-escape', 'paper.tex']);
  });

  it('should turn bibtex failures into warnings', async () => {
    mockedRun.mockImplementation(async (command, _args, options) => {
      if (command === 'bibtex') {
        return { stdout: "I couldn't open database file refs.bib\n", stderr: '', exitCode: 2 };
      }
      await fs.writeFile(path.join(options.cwd, 'paper.pdf'), 'pdf');
      return { stdout: '', stderr: '', exitCode: 0 };
    });

    const result = await compileManuscript({ workingDir: tempDir, texFile: 'paper.tex' });
    expect(result.warnings).toEqual(["I couldn't open database file refs.bib"]);
  });

  it('should throw CompilationError when the final pass fails', async () => {
    mockedRun.mockImplementation(async command => {
      if (command === 'pdflatex') {
        return { stdout: 'This is pdfTeX\n! Undefined control sequence.\nl.3 \\foo', stderr: '', exitCode: 1 };
      }
      return { stdout: '', stderr: '', exitCode: 0 };
    });

    const error = await compileManuscript({ workingDir: tempDir, texFile: 'paper.tex' }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CompilationError);
    if (error instanceof CompilationError) {
      expect(error.errors).toEqual(['! Undefined control sequence.']);
    }
  });

  it('should throw CompilationError when no PDF appears', async () => {
    mockedRun.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 });

    const error = await compileManuscript({ workingDir: tempDir, texFile: 'paper.tex' }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CompilationError);
    if (error instanceof CompilationError) {
      expect(error.errors).toEqual(['PDF file was not generated']);
    }
  });

  it('should throw MissingInputError for a missing .tex file', async () => {
    await expect(compileManuscript({ workingDir: tempDir, texFile: 'other.tex' })).rejects.toThrow(MissingInputError);
    expect(mockedRun).not.toHaveBeenCalled();
  });

  it('should propagate timeouts', async () => {
    mockedRun.mockRejectedValue(new TimeoutError('pdflatex paper.tex', 120000));

    await expect(compileManuscript({ workingDir: tempDir, texFile: 'paper.tex' })).rejects.toThrow(TimeoutError);
  });
});
