/**
 * LaTeX Compiler for generated manuscripts
 *
 * Runs the LaTeX engine, bibtex, and two more engine passes so that
 * citations and cross-references resolve.
 */

import * as path from 'path';
import * as fs from 'fs/promises';
import { runCommand } from './processRunner';
import { TimeoutError } from '../utils/resilience';
import { CompilationError, MissingInputError } from '../utils/errors';
import { manuscriptLogger } from '../utils/logger';
import type { CompileOptions, CompileResult, PassResult } from './types';

const log = manuscriptLogger.child('Compiler');

const AUX_EXTENSIONS = [
  '.aux', '.log', '.out', '.spl', '.toc', '.lof', '.lot',
  '.bbl', '.blg', '.fls', '.fdb_latexmk', '.synctex.gz',
];

/**
 * Check if a file exists
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Error lines from engine output: `!` lines and anything mentioning Error
 */
export function extractLatexErrors(output: string, limit: number = 5): string[] {
  return output
    .split('\n')
    .filter(line => line.startsWith('!') || line.includes('Error:'))
    .slice(0, limit);
}

/**
 * Run one engine pass
 */
async function runEngine(compiler: string, args: string[], cwd: string, timeout: number): Promise<PassResult> {
  const texFile = args[args.length - 1];
  try {
    const result = await runCommand(
      compiler,
      args,
      { cwd, timeoutMs: timeout, operationName: `${compiler} ${texFile}` }
    );

    const errors: string[] = [];
    if (result.exitCode !== 0) {
      const errorLines = extractLatexErrors(result.stdout);
      errors.push(...(errorLines.length > 0 ? errorLines : [`${compiler} exited with code ${result.exitCode}`]));
    }

    return { success: result.exitCode === 0, log: result.stdout + result.stderr, errors };
  } catch (err) {
    if (err instanceof TimeoutError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, log: '', errors: [`Failed to run ${compiler}: ${message}`] };
  }
}

/**
 * Run bibtex to generate the .bbl file
 */
async function runBibCommand(command: string, basename: string, cwd: string, timeout: number): Promise<PassResult> {
  try {
    const result = await runCommand(command, [basename], { cwd, timeoutMs: timeout, operationName: `${command} ${basename}` });

    const errors: string[] = [];
    if (result.exitCode !== 0) {
      const allOutput = result.stdout + result.stderr;
      const errorLines = allOutput
        .split('\n')
        .filter(line =>
          line.toLowerCase().includes('error') ||
          line.includes('I couldn\'t') ||
          line.includes('I found no')
        );
      errors.push(...(errorLines.length > 0 ? errorLines.slice(0, 5) : [`${command} exited with code ${result.exitCode}`]));
    }

    return { success: result.exitCode === 0, log: result.stdout + result.stderr, errors };
  } catch (err) {
    if (err instanceof TimeoutError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, log: '', errors: [`Failed to run ${command}: ${message}`] };
  }
}

/**
 * Compile a generated .tex file to PDF
 *
 * Runs:
 * 1. the engine (writes .aux with citation keys)
 * 2. bibtex (writes .bbl); failures here are warnings
 * 3. the engine twice (resolves citations and references)
 *
 * @throws MissingInputError if the .tex file does not exist
 * @throws CompilationError if the final pass fails or no PDF appears
 * @throws TimeoutError if any tool exceeds the timeout
 */
export async function compileManuscript(options: CompileOptions): Promise<CompileResult> {
  const {
    workingDir,
    texFile,
    timeout = 120000,
    compiler = 'pdflatex',
    bibtexCommand = 'bibtex',
    cleanAuxFiles = true,
    shellEscape = false,
  } = options;

  const texPath = path.join(workingDir, texFile);
  if (!(await fileExists(texPath))) {
    throw new MissingInputError(texPath, 'LaTeX file');
  }

  const basename = texFile.replace(/\.tex$/i, '');
  const engineArgs = [
    '-interaction=nonstopmode',
    '-halt-on-error',
    ...(shellEscape ? ['-shell-escape'] : []),
    texFile,
  ];
  const warnings: string[] = [];
  let output = '';

  log.info('Compiling manuscript', { texFile, compiler });

  const first = await runEngine(compiler, engineArgs, workingDir, timeout);
  output += `=== ${compiler} pass 1 ===\n${first.log}\n`;

  const bib = await runBibCommand(bibtexCommand, basename, workingDir, timeout);
  output += `=== ${bibtexCommand} ===\n${bib.log}\n`;
  if (!bib.success) {
    warnings.push(...bib.errors);
  }

  await runEngine(compiler, engineArgs, workingDir, timeout);
  const final = await runEngine(compiler, engineArgs, workingDir, timeout);
  output += `=== ${compiler} final pass ===\n${final.log}\n`;

  if (!final.success) {
    throw new CompilationError(texFile, final.errors, output);
  }

  const pdfPath = path.join(workingDir, `${basename}.pdf`);
  if (!(await fileExists(pdfPath))) {
    throw new CompilationError(texFile, ['PDF file was not generated'], output);
  }

  if (cleanAuxFiles) {
    await Promise.all(
      AUX_EXTENSIONS.map(ext => fs.rm(path.join(workingDir, `${basename}${ext}`), { force: true }))
    );
  }

  for (const warning of warnings) {
    log.warn(warning);
  }
  return { pdfPath, log: output, warnings };
}
