/**
 * Front matter blocks generated from metadata: authors and affiliations,
 * corresponding authors, extended author information, keywords and the
 * bibliography command. Every metadata string is LaTeX-escaped here.
 */

import { escapeLatex } from '../utils/escapeUtils';
import type { Author, ManuscriptMetadata } from './metadata';

/**
 * `\author[1,2,*,\Letter]{Name}` lines followed by `\affil[n]{...}` lines.
 * Affiliations are numbered in order of first use by an author.
 */
export function renderAuthorsAndAffiliations(metadata: ManuscriptMetadata): string {
  const { authors, affiliations } = metadata;
  if (authors.length === 0) return '';

  const numbers = new Map<string, number>();
  for (const author of authors) {
    for (const shortname of author.affiliations) {
      if (!numbers.has(shortname)) {
        numbers.set(shortname, numbers.size + 1);
      }
    }
  }

  const authorLines = authors.map(author => {
    const markers: string[] = author.affiliations
      .map(shortname => numbers.get(shortname) ?? 0)
      .filter((n, i, all) => n > 0 && all.indexOf(n) === i)
      .sort((a, b) => a - b)
      .map(String);
    if (author.coFirstAuthor) markers.push('*');
    if (author.correspondingAuthor) markers.push('\\Letter');

    const name = escapeLatex(author.name);
    return markers.length > 0 ? `\\author[${markers.join(',')}]{${name}}` : `\\author{${name}}`;
  });

  const affiliationLines = [...numbers].map(([shortname, n]) => {
    const details = affiliations.find(a => a.shortname === shortname);
    const full = details
      ? [details.fullName, details.location].filter(Boolean).join(', ')
      : shortname;
    return `\\affil[${n}]{${escapeLatex(full)}}`;
  });

  if (authors.some(a => a.coFirstAuthor)) {
    affiliationLines.push('\\affil[*]{Equally contributed authors}');
  }

  return [...authorLines, ...affiliationLines].join('\n');
}

/**
 * "Jane Q. Doe" -> "J. Q. Doe"
 */
export function abbreviateName(name: string): string {
  const parts = name.trim().split(/\s+/);
  if (parts.length < 2) return name.trim();
  const initials = parts.slice(0, -1).map(part => `${part[0].toUpperCase()}.`);
  return [...initials, parts[parts.length - 1]].join(' ');
}

/**
 * `corrauthor` environment listing corresponding authors and their e-mail
 */
export function renderCorrespondingAuthors(metadata: ManuscriptMetadata): string {
  const entries = metadata.authors
    .filter(author => author.correspondingAuthor)
    .map(author => {
      const who = `(${escapeLatex(abbreviateName(author.name))})`;
      if (!author.email) return who;
      return `${who} ${escapeLatex(author.email).replace(/@/g, '\\at ')}`;
    });

  if (entries.length === 0) return '';
  return `\\begin{corrauthor}\n${entries.join(';\n')}\n\\end{corrauthor}`;
}

/**
 * Strip a profile URL prefix and any @ from a handle
 */
function cleanHandle(handle: string, host: RegExp): string {
  return escapeLatex(handle.replace(host, '').replace(/@/g, '').replace(/\/+$/, ''));
}

function socialIcons(author: Author): string[] {
  const icons: string[] = [];
  if (author.x) {
    icons.push(`\\xicon{${cleanHandle(author.x, /^https?:\/\/(www\.)?x\.com\//)}}`);
  } else if (author.twitter) {
    icons.push(`\\twittericon{${cleanHandle(author.twitter, /^https?:\/\/(www\.)?twitter\.com\//)}}`);
  }
  if (author.bluesky) {
    icons.push(`\\blueskyicon{${cleanHandle(author.bluesky, /^https?:\/\/bsky\.app\/profile\//)}}`);
  }
  if (author.linkedin) {
    icons.push(`\\linkedinicon{${cleanHandle(author.linkedin, /^https?:\/\/(www\.)?linkedin\.com\/in\//)}}`);
  }
  return icons;
}

/**
 * Itemized author list with ORCID and social media icons
 */
export function renderExtendedAuthorInfo(metadata: ManuscriptMetadata): string {
  if (metadata.authors.length === 0) return '';

  const items = metadata.authors.map(author => {
    let item = `\\item ${escapeLatex(author.name)}:`;
    if (author.orcid) {
      const orcid = author.orcid.replace(/^https?:\/\/orcid\.org\//, '');
      item += `\n\\orcidicon{${escapeLatex(orcid)}};`;
    }
    const icons = socialIcons(author);
    if (icons.length > 0) {
      item += `\n${icons.join(';\n')}`;
    }
    return item;
  });

  return `\\begin{itemize}\n\\setlength\\itemsep{-0.5em}\n\n${items.join('\n\n')}\n\n\\end{itemize}`;
}

export function renderKeywords(metadata: ManuscriptMetadata): string {
  if (metadata.keywords.length === 0) return '';
  return `\\begin{keywords}\n${metadata.keywords.map(escapeLatex).join(' | ')}\n\\end{keywords}`;
}

export function renderBibliography(metadata: ManuscriptMetadata): string {
  return `\\bibliography{${metadata.bibliography}}`;
}

/**
 * Running-head author: the title's lead_author, else the first author's
 * last name
 */
export function leadAuthor(metadata: ManuscriptMetadata): string {
  if (metadata.title.leadAuthor) {
    return escapeLatex(metadata.title.leadAuthor);
  }
  const first = metadata.authors[0];
  if (!first) return 'Unknown';
  const parts = first.name.trim().split(/\s+/);
  return escapeLatex(parts[parts.length - 1]);
}
