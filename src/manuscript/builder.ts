/**
 * Manuscript build
 *
 * settings -> metadata -> figures -> conversion -> template -> .tex -> PDF
 *
 * Every build owns its BuildContext, so builds of different manuscripts
 * can run side by side.
 */

import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import { convertDocument, createBuildContext, finalizeBuild, formatWarning } from '../converter';
import type { BuildContext, ConversionOptions, ConversionWarning } from '../converter';
import { loadSettings } from '../cli/settings';
import type { TexloomSettings } from '../cli/settings';
import { extractFrontMatter, loadMetadata } from './metadata';
import { convertSections } from './sections';
import type { SectionContent } from './sections';
import { buildTemplateData, loadTemplate, renderManuscript } from './template';
import { generateFigures } from './figureGenerator';
import { compileManuscript } from './latexCompiler';
import { MANUSCRIPT_FILES } from './types';
import type { BuildOptions, BuildResult, FigureResult } from './types';
import { MissingInputError, StrictModeError } from '../utils/errors';
import { manuscriptLogger } from '../utils/logger';

const log = manuscriptLogger.child('Build');

export interface ManuscriptSources {
  main: string;
  /** Supplementary information, when the file exists */
  supplementary?: string;
}

export interface ConvertedManuscript {
  sections: SectionContent;
  supplementary: string;
}

/**
 * Read 01_MAIN.md and, if present, 02_SUPPLEMENTARY_INFO.md
 *
 * @throws MissingInputError when the main text is absent
 */
export async function readSources(manuscriptDir: string): Promise<ManuscriptSources> {
  const mainPath = path.join(manuscriptDir, MANUSCRIPT_FILES.main);
  if (!existsSync(mainPath)) {
    throw new MissingInputError(mainPath, 'Main text');
  }

  const sources: ManuscriptSources = { main: await fs.readFile(mainPath, 'utf-8') };
  const supplementaryPath = path.join(manuscriptDir, MANUSCRIPT_FILES.supplementary);
  if (existsSync(supplementaryPath)) {
    sources.supplementary = await fs.readFile(supplementaryPath, 'utf-8');
  }
  return sources;
}

/**
 * Converter options from settings. With an output directory, emitted
 * figure paths are checked against it.
 */
export function conversionOptionsFor(settings: TexloomSettings, outputRoot?: string): Partial<ConversionOptions> {
  const options: Partial<ConversionOptions> = {
    figureSourceDir: settings.figures.sourceDir,
    figureOutputDir: settings.figures.outputDir,
    figureFormat: settings.figures.format,
    minted: settings.latex.minted,
    noteReferenceCommand: settings.build.noteReferenceCommand,
  };
  if (outputRoot !== undefined) {
    options.assetExists = figurePath => existsSync(path.join(outputRoot, figurePath));
  }
  return options;
}

/**
 * Convert the main text section by section and the supplementary
 * information as one document, all in one build
 */
export function convertSources(sources: ManuscriptSources, build: BuildContext): ConvertedManuscript {
  const sections = convertSections(sources.main, build, MANUSCRIPT_FILES.main);

  let supplementary = '';
  if (sources.supplementary !== undefined) {
    const frontMatter = extractFrontMatter(sources.supplementary);
    const body = frontMatter ? frontMatter.body : sources.supplementary;
    if (body.trim()) {
      supplementary = convertDocument(body, build, {
        supplementary: true,
        documentName: MANUSCRIPT_FILES.supplementary,
        firstLine: frontMatter ? frontMatter.bodyLine : 1,
        headingShift: 1,
      }).trim();
    }
  }

  return { sections, supplementary };
}

function figureWarning(result: FigureResult, settings: TexloomSettings): ConversionWarning {
  return {
    severity: 'recoverable',
    category: 'figure-generation',
    message: result.message ?? `Figure ${result.relative} was not produced`,
    location: { snippet: result.relative, document: settings.figures.sourceDir },
  };
}

/**
 * Build a manuscript directory into `<outputDir>/<dirname>.tex` and,
 * unless disabled, compile it
 *
 * @throws MissingInputError when 01_MAIN.md or the metadata is missing
 * @throws MetadataError when the metadata is invalid
 * @throws StrictModeError in strict mode when any recoverable warning was raised
 * @throws CompilationError or TimeoutError from the toolchain
 */
export async function buildManuscript(
  manuscriptDir: string,
  options: BuildOptions = {},
  settings: TexloomSettings = loadSettings(manuscriptDir)
): Promise<BuildResult> {
  const dir = path.resolve(manuscriptDir);
  const metadata = await loadMetadata(dir);
  const sources = await readSources(dir);

  const outputRoot = path.resolve(dir, options.outputDir ?? settings.build.outputDir);
  await fs.mkdir(outputRoot, { recursive: true });
  log.info('Building manuscript', { dir, outputRoot });

  const figures = await generateFigures(
    { manuscriptDir: dir, outputRoot, settings: settings.figures },
    options.figures ?? false
  );

  const build = createBuildContext(conversionOptionsFor(settings, outputRoot));
  for (const result of figures) {
    if (result.status === 'failed' || result.status === 'missing-output') {
      build.warnings.add(figureWarning(result, settings));
    }
  }

  const converted = convertSources(sources, build);
  const warnings = finalizeBuild(build);

  const strict = options.strict ?? settings.build.strict;
  const recoverable = warnings.filter(w => w.severity === 'recoverable');
  if (strict && recoverable.length > 0) {
    for (const warning of recoverable) {
      log.warn(formatWarning(warning));
    }
    throw new StrictModeError(recoverable.length);
  }

  const bibFile = `${metadata.bibliography}.bib`;
  const bibPath = path.join(dir, bibFile);
  if (existsSync(bibPath) && path.resolve(outputRoot) !== dir) {
    await fs.copyFile(bibPath, path.join(outputRoot, bibFile));
  }

  const template = await loadTemplate();
  const tex = renderManuscript(
    template,
    buildTemplateData(metadata, converted.sections, {
      minted: settings.latex.minted,
      supplementary: converted.supplementary,
    })
  );

  const texFile = `${path.basename(dir)}.tex`;
  const texPath = path.join(outputRoot, texFile);
  await fs.writeFile(texPath, tex, 'utf-8');
  log.info('Wrote LaTeX', { texPath, warnings: warnings.length });

  const result: BuildResult = { texPath, warnings, figures };
  if (options.compile ?? true) {
    const compiled = await compileManuscript({
      workingDir: outputRoot,
      texFile,
      timeout: settings.latex.timeoutMs,
      compiler: settings.latex.compiler,
      bibtexCommand: settings.latex.bibtexCommand,
      cleanAuxFiles: settings.latex.cleanAuxFiles,
      shellEscape: settings.latex.minted,
    });
    result.pdfPath = compiled.pdfPath;
  }
  return result;
}
