/**
 * Section extraction
 *
 * The main text is cut at its level-2 headings. Each section lands in a
 * template slot chosen from its title; sections without a slot of their
 * own are appended to the main text under a \section heading.
 */

import { convertDocument } from '../converter';
import type { BuildContext } from '../converter';
import { extractFrontMatter } from './metadata';
import { normalizeLineEndings } from '../utils/escapeUtils';

export type TemplateSlot =
  | 'abstract'
  | 'main'
  | 'methods'
  | 'data_availability'
  | 'code_availability'
  | 'author_contributions'
  | 'acknowledgements';

export const TEMPLATE_SLOTS: readonly TemplateSlot[] = [
  'abstract',
  'main',
  'methods',
  'data_availability',
  'code_availability',
  'author_contributions',
  'acknowledgements',
];

export type SectionContent = Record<TemplateSlot, string>;

export interface ManuscriptSection {
  /** Heading text without its attribute block; undefined for text before the first heading */
  title?: string;
  /** Slot key, or a snake_case key for sections without a slot */
  key: string;
  slot: TemplateSlot;
  /** Whether the heading line is part of the body and becomes a \section */
  keepHeading: boolean;
  body: string;
  /** Line of the source file on which the body starts */
  firstLine: number;
}

const SECTION_HEADING = /^##[ \t]+(.+?)[ \t]*$/;

const TRAILING_ATTRIBUTES = /[ \t]*\{[^{}]*\}$/;

const FENCE = /^[ \t]{0,3}(`{3,}|~{3,})/;

/**
 * Map a section title to its key: a template slot, or the title in
 * snake_case
 */
export function sectionKey(title: string): string {
  const lower = title.toLowerCase();
  if (lower.includes('abstract')) return 'abstract';
  if (lower.includes('main') || lower.includes('introduction') || lower.includes('result')) return 'main';
  if (lower.includes('method')) return 'methods';
  if (lower.includes('data availability') || lower.includes('data access')) return 'data_availability';
  if (lower.includes('code availability') || lower.includes('code access')) return 'code_availability';
  if (lower.includes('contribution')) return 'author_contributions';
  if (lower.includes('acknowledge')) return 'acknowledgements';
  return lower.trim().replace(/[\s-]+/g, '_');
}

function isTemplateSlot(key: string): key is TemplateSlot {
  return TEMPLATE_SLOTS.some(slot => slot === key);
}

/**
 * Split the main text into sections. Front matter is skipped; `##` lines
 * inside code fences do not start a section.
 */
export function splitSections(markdown: string): ManuscriptSection[] {
  const source = normalizeLineEndings(markdown);
  const frontMatter = extractFrontMatter(source);
  const text = frontMatter ? frontMatter.body : source;
  const offset = frontMatter ? frontMatter.bodyLine : 1;

  const sections: ManuscriptSection[] = [];
  let current: ManuscriptSection = { key: 'main', slot: 'main', keepHeading: false, body: '', firstLine: offset };
  let lines: string[] = [];
  let fence: string | undefined;

  const close = (): void => {
    current.body = lines.join('\n');
    if (current.title !== undefined || current.body.trim()) {
      sections.push(current);
    }
  };

  text.split('\n').forEach((line, index) => {
    const fenceMatch = FENCE.exec(line);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (fence === undefined) {
        fence = marker;
      } else if (marker[0] === fence[0] && marker.length >= fence.length) {
        fence = undefined;
      }
    }

    const heading = fence === undefined ? SECTION_HEADING.exec(line) : null;
    if (!heading) {
      lines.push(line);
      return;
    }

    close();
    const title = heading[1].replace(TRAILING_ATTRIBUTES, '');
    const key = sectionKey(title);
    const slot = isTemplateSlot(key) ? key : 'main';
    // Headings of sections folded into main stay, except "Main text" itself
    const keepHeading = slot === 'main' && !title.toLowerCase().includes('main');
    const lineNumber = offset + index;

    current = { title, key, slot, keepHeading, body: '', firstLine: keepHeading ? lineNumber : lineNumber + 1 };
    lines = keepHeading ? [line] : [];
  });
  close();

  return sections;
}

function emptyContent(): SectionContent {
  return {
    abstract: '',
    main: '',
    methods: '',
    data_availability: '',
    code_availability: '',
    author_contributions: '',
    acknowledgements: '',
  };
}

/**
 * Convert every section of the main text in one build and collect the
 * LaTeX per template slot. `##` headings kept in the body render as
 * \section.
 */
export function convertSections(markdown: string, build: BuildContext, documentName: string): SectionContent {
  const content = emptyContent();

  for (const section of splitSections(markdown)) {
    if (!section.body.trim()) continue;
    const latex = convertDocument(section.body, build, {
      documentName,
      firstLine: section.firstLine,
      headingShift: 1,
    }).trim();
    content[section.slot] = content[section.slot] ? `${content[section.slot]}\n\n${latex}` : latex;
  }

  return content;
}
