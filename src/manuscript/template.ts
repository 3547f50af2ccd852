/**
 * Template assembly
 *
 * Renders templates/article.tex.hbs with Handlebars. The template gets
 * finished LaTeX for every block; only raw metadata strings go through
 * the `latex` helper.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as Handlebars from 'handlebars';
import { format, isValid, parseISO } from 'date-fns';
import {
  leadAuthor,
  renderAuthorsAndAffiliations,
  renderBibliography,
  renderCorrespondingAuthors,
  renderExtendedAuthorInfo,
  renderKeywords,
} from './authors';
import { MissingInputError } from '../utils/errors';
import { escapeLatex } from '../utils/escapeUtils';
import type { ManuscriptMetadata, TitleInfo } from './metadata';
import type { SectionContent } from './sections';

export const DEFAULT_TEMPLATE_PATH = path.join(__dirname, '..', '..', 'templates', 'article.tex.hbs');

/**
 * Everything the article template reads
 */
export interface TemplateData {
  title: TitleInfo;
  leadAuthor: string;
  date: string;
  authorsAndAffiliations: string;
  correspondingAuthors: string;
  extendedAuthorInfo: string;
  keywords: string;
  bibliography: string;
  useLineNumbers: boolean;
  minted: boolean;
  sections: SectionContent;
  /** Converted supplementary information, empty when there is none */
  supplementary: string;
}

// =============================================================================
// Handlebars Setup
// =============================================================================

function createHandlebarsInstance(): typeof Handlebars {
  const hbs = Handlebars.create();

  // Escape for LaTeX: {{latex value}}
  hbs.registerHelper('latex', (text: unknown) => {
    if (text === undefined || text === null) return '';
    return new hbs.SafeString(escapeLatex(String(text)));
  });

  return hbs;
}

const handlebars = createHandlebarsInstance();

export function compileTemplate(templateSource: string): Handlebars.TemplateDelegate<TemplateData> {
  return handlebars.compile<TemplateData>(templateSource, {
    strict: false,
    noEscape: true,
  });
}

/**
 * Read and compile a template file
 *
 * @throws MissingInputError when the file does not exist
 */
export async function loadTemplate(
  templatePath: string = DEFAULT_TEMPLATE_PATH
): Promise<Handlebars.TemplateDelegate<TemplateData>> {
  let source: string;
  try {
    source = await fs.readFile(templatePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new MissingInputError(templatePath, 'Template');
    }
    throw err;
  }
  return compileTemplate(source);
}

// =============================================================================
// Template data
// =============================================================================

/**
 * ISO dates are written out ("15 March 2024"); other values are used as
 * given, and no date at all becomes \today.
 */
export function formatManuscriptDate(date: string | undefined): string {
  if (date === undefined || !date.trim()) return '\\today';
  if (/^\d{4}-\d{2}-\d{2}$/.test(date.trim())) {
    const parsed = parseISO(date.trim());
    if (isValid(parsed)) {
      return format(parsed, 'd MMMM yyyy');
    }
  }
  return escapeLatex(date.trim());
}

export interface TemplateDataOptions {
  minted: boolean;
  supplementary?: string;
}

export function buildTemplateData(
  metadata: ManuscriptMetadata,
  sections: SectionContent,
  options: TemplateDataOptions
): TemplateData {
  return {
    title: metadata.title,
    leadAuthor: leadAuthor(metadata),
    date: formatManuscriptDate(metadata.date),
    authorsAndAffiliations: renderAuthorsAndAffiliations(metadata),
    correspondingAuthors: renderCorrespondingAuthors(metadata),
    extendedAuthorInfo: renderExtendedAuthorInfo(metadata),
    keywords: renderKeywords(metadata),
    bibliography: renderBibliography(metadata),
    useLineNumbers: metadata.useLineNumbers,
    minted: options.minted,
    sections,
    supplementary: options.supplementary ?? '',
  };
}

export function renderManuscript(template: Handlebars.TemplateDelegate<TemplateData>, data: TemplateData): string {
  return template(data);
}
