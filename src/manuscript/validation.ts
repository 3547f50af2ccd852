/**
 * Manuscript validation
 *
 * Converts the manuscript without writing anything and checks what the
 * converter cannot: citation keys against the bibliography, balance of
 * braces and \left/\right inside math, and the numbering of
 * supplementary notes.
 */

import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import { ContentProtector, createBuildContext, finalizeBuild } from '../converter';
import type { ConversionWarning } from '../converter';
import type { TexloomSettings } from '../cli/settings';
import { conversionOptionsFor, convertSources, readSources } from './builder';
import { parseBibTeX } from './bibliography';
import { extractFrontMatter, loadMetadata } from './metadata';
import { MANUSCRIPT_FILES } from './types';
import type { ValidationReport } from './types';
import { manuscriptLogger } from '../utils/logger';

const log = manuscriptLogger.child('Validate');

const NOTE_HEADING = /^#{1,6}[ \t]+Supplementary\s+Note\s+(\d+)\b/i;

export interface MathIssue {
  line: number;
  message: string;
  snippet: string;
}

/**
 * Brace balance of one math span; escaped braces do not count
 */
export function checkMathBalance(math: string): string | undefined {
  let depth = 0;
  for (let i = 0; i < math.length; i++) {
    const ch = math[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth < 0) return 'closing brace without an opening brace';
    }
  }
  if (depth > 0) return 'unclosed brace';

  const lefts = (math.match(/\\left(?![A-Za-z])/g) ?? []).length;
  const rights = (math.match(/\\right(?![A-Za-z])/g) ?? []).length;
  if (lefts !== rights) return `${lefts} \\left against ${rights} \\right`;
  return undefined;
}

/**
 * Find math spans in a Markdown document and check each one
 */
export function checkMath(markdown: string): { spans: number; issues: MathIssue[] } {
  const frontMatter = extractFrontMatter(markdown);
  const body = frontMatter ? frontMatter.body : markdown.replace(/\r\n?/g, '\n');
  const offset = frontMatter ? frontMatter.bodyLine - 1 : 0;

  const protector = new ContentProtector();
  protector.protect(body);
  const spans = [...protector.spansOfKind('display-math'), ...protector.spansOfKind('inline-math')];

  // Repeats of the same span are found one after another
  const searchFrom = new Map<string, number>();
  const issues: MathIssue[] = [];
  for (const span of spans) {
    const message = checkMathBalance(span.original);
    if (!message) continue;
    const index = body.indexOf(span.original, searchFrom.get(span.original) ?? 0);
    if (index >= 0) {
      searchFrom.set(span.original, index + span.original.length);
    }
    issues.push({
      line: body.slice(0, Math.max(0, index)).split('\n').length + offset,
      message,
      snippet: span.original.length > 60 ? `${span.original.slice(0, 57)}...` : span.original,
    });
  }
  return { spans: spans.length, issues: issues.sort((a, b) => a.line - b.line) };
}

/**
 * Numbers of `Supplementary Note N` headings, in document order, and a
 * warning for each that breaks the 1, 2, 3... sequence
 */
export function checkNoteNumbering(markdown: string, documentName: string): { count: number; warnings: ConversionWarning[] } {
  const warnings: ConversionWarning[] = [];
  let expected = 1;
  let count = 0;

  markdown.split(/\r?\n/).forEach((line, index) => {
    const match = NOTE_HEADING.exec(line);
    if (!match) return;
    count++;
    const found = Number(match[1]);
    if (found !== expected) {
      warnings.push({
        severity: 'advisory',
        category: 'note-numbering',
        message: `Supplementary Note ${found} appears where note ${expected} was expected`,
        location: { line: index + 1, snippet: line.trim(), document: documentName },
        suggestion: 'Notes are numbered automatically; the number in the heading can be dropped',
      });
    }
    expected = found + 1;
  });

  return { count, warnings };
}

/**
 * Validate a manuscript directory
 *
 * @throws MissingInputError or MetadataError when the manuscript cannot be read
 */
export async function validateManuscript(manuscriptDir: string, settings: TexloomSettings): Promise<ValidationReport> {
  const dir = path.resolve(manuscriptDir);
  const metadata = await loadMetadata(dir);
  const sources = await readSources(dir);

  const build = createBuildContext(conversionOptionsFor(settings));
  convertSources(sources, build);
  const warnings = finalizeBuild(build);
  const errors: string[] = [];

  // Citations against the bibliography
  const bibFile = `${metadata.bibliography}.bib`;
  const bibPath = path.join(dir, bibFile);
  let bibliographyEntries = 0;
  if (existsSync(bibPath)) {
    const parsed = parseBibTeX(await fs.readFile(bibPath, 'utf-8'));
    bibliographyEntries = parsed.entries.length;
    for (const error of parsed.errors) {
      errors.push(`${bibFile}:${error.line}: ${error.message}`);
    }
    const keys = new Set(parsed.entries.map(entry => entry.key));
    for (const key of build.citations) {
      if (!keys.has(key)) {
        errors.push(`Citation key '${key}' is not in ${bibFile}`);
      }
    }
  } else if (build.citations.size > 0) {
    errors.push(`Bibliography ${bibFile} not found but ${build.citations.size} key(s) are cited`);
  }

  // Math
  let mathSpans = 0;
  const documents: [string, string | undefined][] = [
    [MANUSCRIPT_FILES.main, sources.main],
    [MANUSCRIPT_FILES.supplementary, sources.supplementary],
  ];
  for (const [name, text] of documents) {
    if (text === undefined) continue;
    const math = checkMath(text);
    mathSpans += math.spans;
    for (const issue of math.issues) {
      errors.push(`${name}:${issue.line}: ${issue.message} in ${issue.snippet}`);
    }
  }

  // Explicitly numbered supplementary notes
  if (sources.supplementary !== undefined) {
    warnings.push(...checkNoteNumbering(sources.supplementary, MANUSCRIPT_FILES.supplementary).warnings);
  }
  const labels = build.labels.all();

  const report: ValidationReport = {
    errors,
    warnings,
    stats: {
      citations: build.citations.size,
      bibliographyEntries,
      labels: labels.length,
      mathSpans,
      supplementaryNotes: labels.filter(label => label.namespace === 'snote').length,
    },
  };
  log.info('Validation finished', { errors: errors.length, warnings: warnings.length });
  return report;
}
