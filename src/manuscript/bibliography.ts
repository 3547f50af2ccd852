/**
 * BibTeX key extraction
 *
 * Validation needs the keys and types of a .bib file; field values are
 * parsed far enough to skip nested braces and quoted strings.
 */

export interface BibEntry {
  key: string;
  /** article, book, inproceedings, etc. */
  type: string;
  fields: Record<string, string>;
}

export interface BibParseResult {
  entries: BibEntry[];
  errors: { line: number; message: string }[];
}

const SKIPPED_TYPES = ['string', 'preamble', 'comment'];

/**
 * Parse BibTeX content into entries
 */
export function parseBibTeX(content: string): BibParseResult {
  const entries: BibEntry[] = [];
  const errors: { line: number; message: string }[] = [];

  // Comment lines start with %
  const cleaned = content
    .split('\n')
    .map(line => (line.trim().startsWith('%') ? '' : line))
    .join('\n');

  const entryStart = /@(\w+)\s*([{(])/g;
  let match: RegExpExecArray | null;

  while ((match = entryStart.exec(cleaned)) !== null) {
    const type = match[1].toLowerCase();
    const bodyStart = match.index + match[0].length;
    const bodyEnd = findClosing(cleaned, bodyStart, match[2] === '{' ? '{' : '(', match[2] === '{' ? '}' : ')');
    const line = cleaned.slice(0, match.index).split('\n').length;

    if (bodyEnd < 0) {
      errors.push({ line, message: `Unterminated @${type} entry` });
      break;
    }
    entryStart.lastIndex = bodyEnd + 1;
    if (SKIPPED_TYPES.includes(type)) continue;

    const body = cleaned.slice(bodyStart, bodyEnd);
    const comma = body.indexOf(',');
    const key = (comma >= 0 ? body.slice(0, comma) : body).trim();
    if (!key || /\s/.test(key)) {
      errors.push({ line, message: `@${type} entry without a valid key` });
      continue;
    }

    entries.push({ key, type, fields: comma >= 0 ? parseFields(body.slice(comma + 1)) : {} });
  }

  return { entries, errors };
}

/**
 * Index of the bracket closing the one just before `start`, or -1
 */
function findClosing(str: string, start: number, open: string, close: string): number {
  let depth = 1;
  for (let i = start; i < str.length; i++) {
    const ch = str[i];
    if (ch === '\\') {
      i++;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Parse `name = value` assignments from an entry body
 */
function parseFields(fieldsStr: string): Record<string, string> {
  const fields: Record<string, string> = {};
  const fieldStart = /(\w[\w-]*)\s*=\s*/g;
  let match: RegExpExecArray | null;

  while ((match = fieldStart.exec(fieldsStr)) !== null) {
    const valueStart = match.index + match[0].length;
    const value = extractFieldValue(fieldsStr, valueStart);
    if (value === null) continue;
    fields[match[1].toLowerCase()] = value.text.replace(/\s+/g, ' ').trim();
    fieldStart.lastIndex = value.end;
  }
  return fields;
}

/**
 * A braced, quoted or bare value starting at `start`
 */
function extractFieldValue(str: string, start: number): { text: string; end: number } | null {
  const first = str[start];
  if (first === '{') {
    const end = findClosing(str, start + 1, '{', '}');
    return end < 0 ? null : { text: str.slice(start + 1, end), end: end + 1 };
  }
  if (first === '"') {
    let i = start + 1;
    while (i < str.length && str[i] !== '"') {
      if (str[i] === '\\') i++;
      i++;
    }
    return i < str.length ? { text: str.slice(start + 1, i), end: i + 1 } : null;
  }
  const bare = /^[^,}\n]+/.exec(str.slice(start));
  return bare ? { text: bare[0], end: start + bare[0].length } : null;
}
