/**
 * Type definitions for the manuscript build module
 */

import type { ConversionWarning } from '../converter/types';

/**
 * Files a manuscript directory is made of
 */
export const MANUSCRIPT_FILES = {
  config: ['00_CONFIG.yml', '00_CONFIG.yaml'],
  main: '01_MAIN.md',
  supplementary: '02_SUPPLEMENTARY_INFO.md',
} as const;

/**
 * Options for a LaTeX compilation
 */
export interface CompileOptions {
  /** Directory containing the .tex file; all tools run here */
  workingDir: string;
  /** The .tex file name, relative to workingDir */
  texFile: string;
  /** Timeout per tool invocation in milliseconds */
  timeout?: number;
  /** LaTeX engine (default: pdflatex) */
  compiler?: string;
  /** Bibliography command (default: bibtex) */
  bibtexCommand?: string;
  /** Remove .aux, .log, .bbl etc. after a successful run */
  cleanAuxFiles?: boolean;
  /** Pass -shell-escape to the engine, as minted needs */
  shellEscape?: boolean;
}

/**
 * Result of a successful compilation
 */
export interface CompileResult {
  pdfPath: string;
  /** Combined tool output, one section per pass */
  log: string;
  /** Non-fatal problems, e.g. bibtex complaints */
  warnings: string[];
}

/**
 * Output of one tool pass
 */
export interface PassResult {
  success: boolean;
  log: string;
  errors: string[];
}

/**
 * Kinds of figure source the generator can run
 */
export type FigureKind = 'python' | 'r' | 'mermaid';

/**
 * One figure script to run
 */
export interface FigureJob {
  kind: FigureKind;
  /** Absolute path of the script */
  source: string;
  /** Script path relative to the figure source directory, with forward slashes */
  relative: string;
  /** Directory the script runs in and writes to */
  outputDir: string;
  /** The image LaTeX will include */
  expectedOutput: string;
}

export type FigureStatus = 'generated' | 'failed' | 'missing-output' | 'copied';

export interface FigureResult {
  /** Source path relative to the figure source directory */
  relative: string;
  status: FigureStatus;
  message?: string;
}

/**
 * Counts reported by validation
 */
export interface ValidationStats {
  citations: number;
  bibliographyEntries: number;
  labels: number;
  mathSpans: number;
  supplementaryNotes: number;
}

export interface ValidationReport {
  /** Problems that would break the build or the PDF */
  errors: string[];
  /** Conversion warnings and other advisories */
  warnings: ConversionWarning[];
  stats: ValidationStats;
}

/**
 * Options accepted by buildManuscript
 */
export interface BuildOptions {
  /** Run the figure scripts before converting */
  figures?: boolean;
  /** Compile the .tex to PDF (default true) */
  compile?: boolean;
  /** Fail on any recoverable warning */
  strict?: boolean;
  /** Output directory, relative to the manuscript directory or absolute */
  outputDir?: string;
}

export interface BuildResult {
  texPath: string;
  pdfPath?: string;
  warnings: ConversionWarning[];
  figures: FigureResult[];
}
