/**
 * Figure generation
 *
 * Runs the Python, R and Mermaid sources in the figure directory so each
 * leaves `<outputDir>/<base>/<base>.<format>` behind, the path the
 * converter emits for a script reference. Static images are copied
 * alongside.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { runCommand } from './processRunner';
import { shouldExclude } from '../cli/settings';
import type { FigureSettings } from '../cli/settings';
import { TimeoutError, mapWithConcurrency } from '../utils/resilience';
import { errorMessage } from '../utils/errors';
import { manuscriptLogger } from '../utils/logger';
import type { FigureJob, FigureKind, FigureResult } from './types';

const log = manuscriptLogger.child('Figures');

const SCRIPT_KINDS: Record<string, FigureKind> = {
  '.py': 'python',
  '.r': 'r',
  '.mmd': 'mermaid',
};

const STATIC_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.pdf', '.eps', '.svg'];

export interface FigureGeneratorOptions {
  /** Directory holding the manuscript sources */
  manuscriptDir: string;
  /** Build output directory; the figure output directory is created inside it */
  outputRoot: string;
  settings: FigureSettings;
}

export interface FigureInventory {
  jobs: FigureJob[];
  /** Static images, relative to the figure source directory */
  statics: string[];
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Every file below `dir`, relative to it
 */
async function walk(dir: string, prefix: string = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(dir, prefix), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const relative = path.join(prefix, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(dir, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files;
}

/**
 * Find figure scripts and static images. A missing figure directory
 * yields nothing.
 */
export async function discoverFigures(options: FigureGeneratorOptions): Promise<FigureInventory> {
  const { manuscriptDir, outputRoot, settings } = options;
  const sourceDir = path.join(manuscriptDir, settings.sourceDir);
  if (!(await fileExists(sourceDir))) {
    log.debug('No figure directory', { sourceDir });
    return { jobs: [], statics: [] };
  }

  const jobs: FigureJob[] = [];
  const statics: string[] = [];

  for (const file of await walk(sourceDir)) {
    const relative = toPosix(file);
    if (shouldExclude(relative, settings.exclude)) continue;

    const ext = path.extname(file).toLowerCase();
    const kind = SCRIPT_KINDS[ext];
    if (kind) {
      const base = path.basename(file, path.extname(file));
      const outputDir = path.join(outputRoot, settings.outputDir, path.dirname(file), base);
      jobs.push({
        kind,
        source: path.join(sourceDir, file),
        relative,
        outputDir,
        expectedOutput: path.join(outputDir, `${base}.${settings.format}`),
      });
    } else if (STATIC_EXTENSIONS.includes(ext)) {
      statics.push(relative);
    }
  }

  return { jobs, statics };
}

/**
 * Command line for one figure source
 */
export function figureCommand(job: FigureJob, settings: FigureSettings): { command: string; args: string[] } {
  switch (job.kind) {
    case 'python':
      return { command: settings.pythonCommand, args: [job.source] };
    case 'r':
      return { command: settings.rscriptCommand, args: [job.source] };
    case 'mermaid':
      return { command: settings.mermaidCommand, args: ['-i', job.source, '-o', job.expectedOutput] };
  }
}

function lastLines(output: string, count: number = 3): string {
  return output.trim().split('\n').slice(-count).join('\n');
}

/**
 * Run one figure source in its output directory
 *
 * @throws TimeoutError when the script runs past the timeout
 */
export async function runFigureJob(job: FigureJob, settings: FigureSettings): Promise<FigureResult> {
  await fs.mkdir(job.outputDir, { recursive: true });
  const { command, args } = figureCommand(job, settings);

  let exitCode: number;
  let stderr: string;
  try {
    const result = await runCommand(command, args, {
      cwd: job.outputDir,
      timeoutMs: settings.timeoutMs,
      operationName: `figure ${job.relative}`,
    });
    exitCode = result.exitCode;
    stderr = result.stderr;
  } catch (err) {
    if (err instanceof TimeoutError) throw err;
    return { relative: job.relative, status: 'failed', message: `Failed to run ${command}: ${errorMessage(err)}` };
  }

  if (exitCode !== 0) {
    const detail = lastLines(stderr);
    return {
      relative: job.relative,
      status: 'failed',
      message: `${command} exited with code ${exitCode}${detail ? `: ${detail}` : ''}`,
    };
  }

  if (!(await fileExists(job.expectedOutput))) {
    return {
      relative: job.relative,
      status: 'missing-output',
      message: `Script did not write ${path.basename(job.expectedOutput)}`,
    };
  }

  return { relative: job.relative, status: 'generated' };
}

/**
 * Copy a static image to the figure output directory. An SVG is used as
 * its PNG sibling, which must exist beside it.
 */
async function copyStatic(relative: string, options: FigureGeneratorOptions): Promise<FigureResult> {
  const { manuscriptDir, outputRoot, settings } = options;
  const from = path.join(manuscriptDir, settings.sourceDir, relative);
  const to = path.join(outputRoot, settings.outputDir, relative);
  await fs.mkdir(path.dirname(to), { recursive: true });
  await fs.copyFile(from, to);

  if (path.extname(relative).toLowerCase() === '.svg') {
    const png = relative.replace(/\.svg$/i, '.png');
    if (!(await fileExists(path.join(manuscriptDir, settings.sourceDir, png)))) {
      return { relative, status: 'missing-output', message: `SVG figures are included as PNG; ${png} is missing` };
    }
  }
  return { relative, status: 'copied' };
}

/**
 * Copy static images and, when `runScripts` is set, generate every
 * scripted figure
 *
 * @throws TimeoutError when any script times out
 */
export async function generateFigures(options: FigureGeneratorOptions, runScripts: boolean = true): Promise<FigureResult[]> {
  const { settings } = options;
  const { jobs, statics } = await discoverFigures(options);
  log.info(runScripts ? 'Generating figures' : 'Copying figures', {
    scripts: runScripts ? jobs.length : 0,
    images: statics.length,
  });

  const generated = runScripts
    ? await mapWithConcurrency(jobs, settings.concurrency, job => runFigureJob(job, settings))
    : [];
  const copied: FigureResult[] = [];
  for (const relative of statics) {
    copied.push(await copyStatic(relative, options));
  }

  const results = [...generated, ...copied];
  for (const result of results) {
    if (result.status === 'failed' || result.status === 'missing-output') {
      log.warn(`${result.relative}: ${result.message ?? result.status}`);
    }
  }
  return results;
}
