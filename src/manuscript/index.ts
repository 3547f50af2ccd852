/**
 * Manuscript build module
 *
 * Turns a manuscript directory (metadata, main text, supplementary
 * information, bibliography, figures) into a LaTeX document and a PDF:
 * - Metadata loading and validation
 * - Section extraction and template assembly
 * - Figure generation from Python, R and Mermaid sources
 * - LaTeX compilation
 * - Validation of citations, math and note numbering
 */

export * from './types';
export * from './metadata';
export * from './authors';
export * from './sections';
export * from './template';
export * from './figureGenerator';
export * from './latexCompiler';
export * from './bibliography';
export * from './validation';
export * from './builder';
