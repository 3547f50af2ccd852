/**
 * Manuscript metadata
 *
 * Metadata lives in 00_CONFIG.yml (or .yaml) beside the main text, or in
 * a `---` front matter block at the top of 01_MAIN.md. It is parsed with
 * `yaml` and checked with a zod schema, then normalized into
 * ManuscriptMetadata so the rest of the build never sees raw YAML shapes.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { MANUSCRIPT_FILES } from './types';
import { MetadataError, MissingInputError, errorMessage } from '../utils/errors';
import { normalizeLineEndings } from '../utils/escapeUtils';
import { manuscriptLogger } from '../utils/logger';

const log = manuscriptLogger.child('Metadata');

export const DEFAULT_BIBLIOGRAPHY = '03_REFERENCES';

const SHORT_TITLE_LENGTH = 50;

// =============================================================================
// Normalized types
// =============================================================================

export interface Author {
  name: string;
  /** Affiliation short names, in the order given */
  affiliations: string[];
  correspondingAuthor: boolean;
  coFirstAuthor: boolean;
  email?: string;
  orcid?: string;
  x?: string;
  twitter?: string;
  bluesky?: string;
  linkedin?: string;
}

export interface Affiliation {
  shortname: string;
  fullName: string;
  location?: string;
}

export interface TitleInfo {
  long: string;
  short: string;
  leadAuthor?: string;
}

export interface ManuscriptMetadata {
  title: TitleInfo;
  date?: string;
  authors: Author[];
  affiliations: Affiliation[];
  keywords: string[];
  /** Bibliography file name, without the .bib extension */
  bibliography: string;
  useLineNumbers: boolean;
  /** File the metadata was read from */
  source: string;
}

// =============================================================================
// Schema
// =============================================================================

/** `true`, `"true"` and `"True"` all switch a flag on */
const flag = z
  .union([z.boolean(), z.string()])
  .transform(value => (typeof value === 'boolean' ? value : value.trim().toLowerCase() === 'true'));

const text = z.union([z.string(), z.number()]).transform(value => String(value));

const stringList = z
  .union([text, z.array(text)])
  .transform(value => (Array.isArray(value) ? value : [value]));

const authorObjectSchema = z.object({
  name: z.string().min(1),
  affiliations: stringList.optional(),
  corresponding_author: flag.optional(),
  co_first_author: flag.optional(),
  email: z.string().optional(),
  orcid: text.optional(),
  x: z.string().optional(),
  twitter: z.string().optional(),
  bluesky: z.string().optional(),
  linkedin: z.string().optional(),
});

const authorSchema = z.union([z.string().min(1), authorObjectSchema]);

const affiliationSchema = z.object({
  shortname: text,
  full_name: z.string().optional(),
  location: z.string().optional(),
});

const titleObjectSchema = z.object({
  long: z.string().optional(),
  short: z.string().optional(),
  lead_author: z.string().optional(),
});

const metadataSchema = z.object({
  title: z.union([z.string(), titleObjectSchema, z.array(titleObjectSchema)]).optional(),
  date: text.optional(),
  authors: z.array(authorSchema).optional(),
  affiliations: z.array(affiliationSchema).optional(),
  keywords: z
    .union([z.string(), z.array(text)])
    .transform(value => (Array.isArray(value) ? value : value.split(',')))
    .optional(),
  bibliography: z.string().optional(),
  use_line_numbers: flag.optional(),
});

type RawMetadata = z.infer<typeof metadataSchema>;
type RawAuthor = z.infer<typeof authorSchema>;
type RawTitle = z.infer<typeof titleObjectSchema>;

// =============================================================================
// Normalization
// =============================================================================

/**
 * Cut a title to the short-title length, marking the cut with "..."
 */
export function shortenTitle(title: string): string {
  return title.length > SHORT_TITLE_LENGTH ? `${title.slice(0, SHORT_TITLE_LENGTH)}...` : title;
}

function normalizeTitle(raw: RawMetadata['title']): TitleInfo {
  if (raw === undefined) {
    return { long: 'Untitled Article', short: 'Untitled' };
  }
  if (typeof raw === 'string') {
    return { long: raw, short: shortenTitle(raw) };
  }

  // A list of objects reads like one object; the first value of each key wins
  const parts: RawTitle[] = Array.isArray(raw) ? raw : [raw];
  const long = parts.find(p => p.long !== undefined)?.long;
  const short = parts.find(p => p.short !== undefined)?.short;
  const leadAuthor = parts.find(p => p.lead_author !== undefined)?.lead_author;

  const title: TitleInfo = {
    long: long ?? short ?? 'Untitled Article',
    short: short ?? (long !== undefined ? shortenTitle(long) : 'Untitled'),
  };
  if (leadAuthor) {
    title.leadAuthor = leadAuthor;
  }
  return title;
}

function normalizeAuthor(raw: RawAuthor): Author {
  if (typeof raw === 'string') {
    return { name: raw, affiliations: [], correspondingAuthor: false, coFirstAuthor: false };
  }

  const author: Author = {
    name: raw.name,
    affiliations: raw.affiliations ?? [],
    correspondingAuthor: raw.corresponding_author ?? false,
    coFirstAuthor: raw.co_first_author ?? false,
  };
  for (const key of ['email', 'orcid', 'x', 'twitter', 'bluesky', 'linkedin'] as const) {
    const value = raw[key]?.trim();
    if (value) {
      author[key] = value;
    }
  }
  return author;
}

function normalizeMetadata(raw: RawMetadata, source: string): ManuscriptMetadata {
  const metadata: ManuscriptMetadata = {
    title: normalizeTitle(raw.title),
    authors: (raw.authors ?? []).map(normalizeAuthor),
    affiliations: (raw.affiliations ?? []).map(a => {
      const affiliation: Affiliation = { shortname: a.shortname, fullName: a.full_name ?? a.shortname };
      if (a.location) {
        affiliation.location = a.location;
      }
      return affiliation;
    }),
    keywords: (raw.keywords ?? []).map(k => k.trim()).filter(k => k.length > 0),
    bibliography: (raw.bibliography ?? DEFAULT_BIBLIOGRAPHY).replace(/\.bib$/i, ''),
    useLineNumbers: raw.use_line_numbers ?? false,
    source,
  };
  if (raw.date !== undefined) {
    metadata.date = raw.date;
  }
  return metadata;
}

// =============================================================================
// Parsing
// =============================================================================

export interface FrontMatter {
  /** YAML between the fences */
  yaml: string;
  /** Text after the closing fence */
  body: string;
  /** Line of the source on which the body starts */
  bodyLine: number;
}

const FRONT_MATTER = /^---[ \t]*\n([\s\S]*?)\n---[ \t]*(?:\n|$)/;

/**
 * Split a `---` front matter block from the top of a Markdown file
 */
export function extractFrontMatter(markdown: string): FrontMatter | undefined {
  const source = normalizeLineEndings(markdown);
  const match = FRONT_MATTER.exec(source);
  if (!match) return undefined;

  const consumed = match[0].endsWith('\n') ? match[0] : `${match[0]}\n`;
  return {
    yaml: match[1],
    body: source.slice(match[0].length),
    bodyLine: consumed.split('\n').length,
  };
}

/**
 * Parse and validate metadata YAML
 *
 * @throws MetadataError when the YAML is malformed or fails the schema
 */
export function parseMetadata(yamlText: string, source: string): ManuscriptMetadata {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (err) {
    throw new MetadataError(`Cannot parse metadata in ${source}`, [errorMessage(err)]);
  }

  const parsed = metadataSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new MetadataError(
      `Invalid metadata in ${source}`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return normalizeMetadata(parsed.data, source);
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }
}

/**
 * Load metadata for a manuscript directory: the config file if there is
 * one, else the front matter of the main text.
 *
 * @throws MissingInputError when neither exists
 * @throws MetadataError when the metadata is invalid
 */
export async function loadMetadata(manuscriptDir: string): Promise<ManuscriptMetadata> {
  for (const name of MANUSCRIPT_FILES.config) {
    const configPath = path.join(manuscriptDir, name);
    const content = await readIfExists(configPath);
    if (content !== undefined) {
      log.debug('Reading metadata', { file: configPath });
      return parseMetadata(content, name);
    }
  }

  const mainPath = path.join(manuscriptDir, MANUSCRIPT_FILES.main);
  const main = await readIfExists(mainPath);
  const frontMatter = main !== undefined ? extractFrontMatter(main) : undefined;
  if (frontMatter) {
    log.debug('Reading metadata from front matter', { file: mainPath });
    return parseMetadata(frontMatter.yaml, MANUSCRIPT_FILES.main);
  }

  throw new MissingInputError(path.join(manuscriptDir, MANUSCRIPT_FILES.config[0]), 'Metadata file');
}
