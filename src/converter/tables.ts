/**
 * Table converter
 *
 * GitHub pipe tables with a caption either before the table
 *
 *     Table 1: Sample counts {#table:counts}
 *
 * or after it, optionally separated by one blank line
 *
 *     **Table 1: Sample counts** {#table:counts}
 *     {#table:counts rotate=90} **Sample counts**
 *
 * `Table*` marks a table spanning both columns. The rendered float is
 * protected; cells and captions are converted here because the inline
 * stages never see them. Body cells under a "Markdown Element" header are
 * shown as written.
 */

import { parseAttributes, option } from './attributes';
import { declareLabel } from './context';
import { parseLabelId } from './labelRegistry';
import { convertCaption } from './captions';
import { convertInlineFormatting } from './inlineFormatting';
import { convertLinks } from './links';
import { convertCitations } from './citations';
import { convertCrossReferences } from './crossReferences';
import { convertSpecialCharacters } from './specialCharacters';
import { dropComments } from './comments';
import { isBlank } from './textUtils';
import { inlineCodeBody } from './protector';
import { escapeLatex } from '../utils/escapeUtils';
import { warn } from './warnings';
import type { AttributeBlock, ColumnAlignment, DocumentContext, LabelNamespace, TableElement } from './types';

const TABLE_LINE = /^[ \t]*\|/;

const SEPARATOR_CELL = /^:?-+:?$/;

const TABLE_PREFIX = /^Table(\*)?(?:[ \t]+[A-Za-z]?\d+[A-Za-z]?)?[ \t]*[:.][ \t]*/;

const LEADING_ATTRIBUTES = /^\{([^{}]*)\}[ \t]*/;
const TRAILING_ATTRIBUTES = /[ \t]*\{([^{}]*)\}$/;

const LITERAL_COLUMN = /^markdown\s+element$/i;

interface ParsedCaption {
    caption: string;
    wide: boolean;
    attributes: AttributeBlock;
}

/** Sentinel for a caption line whose attribute block is malformed */
type CaptionParse = ParsedCaption | 'malformed' | undefined;

export function convertTables(text: string, ctx: DocumentContext): string {
    const lines = text.split('\n');
    const out: string[] = [];
    let i = 0;

    while (i < lines.length) {
        if (!TABLE_LINE.test(lines[i])) {
            out.push(lines[i]);
            i++;
            continue;
        }

        let end = i;
        while (end < lines.length && TABLE_LINE.test(lines[end])) {
            end++;
        }
        const block = lines.slice(i, end);

        const table = parseTableBlock(block, ctx);
        if (!table) {
            out.push(...block);
            i = end;
            continue;
        }

        // Caption after the table wins over one before it
        let consumedAfter = 0;
        let caption = captionAfter(lines, end, ctx);
        if (caption) {
            consumedAfter = caption.consumed;
        } else {
            const before = captionBefore(out, ctx);
            if (before) {
                out.splice(before.index, out.length - before.index);
                caption = { ...before, consumed: 0 };
            }
        }

        if (caption) {
            table.caption = caption.caption;
            table.wide = caption.wide;
            table.attributes = caption.attributes;
        }

        const snippet = lines.slice(i, end + consumedAfter).join('\n');
        if (table.attributes.id) {
            const parsed = parseLabelId(table.attributes.id);
            const fallback: LabelNamespace = ctx.supplementary ? 'stable' : 'table';
            table.label = declareLabel(ctx, parsed?.namespace ?? fallback, parsed?.key ?? table.attributes.id, snippet);
        }

        const leading = /^[ \t]*/.exec(lines[i]);
        out.push(`${leading ? leading[0] : ''}${ctx.protector.protectRaw(renderTable(table, ctx))}`);
        i = end + consumedAfter;
    }

    return out.join('\n');
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Split a row on unescaped pipes, dropping the outer ones
 */
export function splitRow(line: string): string[] {
    let row = line.trim();
    if (row.startsWith('|')) row = row.slice(1);
    if (row.endsWith('|') && !row.endsWith('\\|')) row = row.slice(0, -1);
    return row.split(/(?<!\\)\|/).map(cell => cell.trim().replace(/\\\|/g, '|'));
}

export function parseAlignment(cell: string): ColumnAlignment {
    const left = cell.startsWith(':');
    const right = cell.endsWith(':');
    if (left && right) return 'c';
    if (right) return 'r';
    return 'l';
}

function parseTableBlock(block: string[], ctx: DocumentContext): TableElement | undefined {
    if (block.length < 2) return undefined;

    const header = splitRow(block[0]);
    const separator = splitRow(block[1]);
    const separatorValid = separator.every(cell => SEPARATOR_CELL.test(cell.replace(/\s+/g, '')));

    if (!separatorValid) {
        warn(ctx, 'recoverable', 'malformed-table', 'Pipe table has no valid separator row; left as text', block.join('\n'),
            'Add a |---|---| row below the header');
        return undefined;
    }
    if (separator.length !== header.length) {
        warn(ctx, 'recoverable', 'malformed-table',
            `Table header has ${header.length} columns but the separator row has ${separator.length}; left as text`,
            block.join('\n'));
        return undefined;
    }

    let mismatched = false;
    const rows = block.slice(2).map(line => {
        const cells = splitRow(line);
        if (cells.length !== header.length) {
            mismatched = true;
        }
        const fitted = cells.slice(0, header.length);
        while (fitted.length < header.length) fitted.push('');
        return fitted;
    });

    if (mismatched) {
        warn(ctx, 'recoverable', 'table-column-mismatch',
            `Table rows do not all have ${header.length} cells; short rows were padded and long rows truncated`,
            block.join('\n'));
    }

    return {
        header,
        alignments: separator.map(cell => parseAlignment(cell.replace(/\s+/g, ''))),
        rows,
        caption: '',
        attributes: { classes: [], options: {} },
        wide: false,
    };
}

/**
 * Recognise a caption line. Without `Table N:` the line must carry an
 * attribute block with a table id. A caption after a table must be bold
 * or carry attributes, so a plain `Table 2:` line introduces the next table.
 */
export function parseCaptionLine(line: string, requireMarkup: boolean = false): CaptionParse {
    let body = line.trim();
    let attributeText: string | undefined;

    const lead = LEADING_ATTRIBUTES.exec(body);
    const trail = TRAILING_ATTRIBUTES.exec(body);
    if (lead) {
        attributeText = lead[1];
        body = body.slice(lead[0].length);
    } else if (trail) {
        attributeText = trail[1];
        body = body.slice(0, trail.index);
    }

    let inner = body;
    let rest = '';
    const bold = /^\*\*(.+?)\*\*(?!\*)(.*)$/.exec(body);
    if (bold) {
        inner = bold[1];
        rest = bold[2];
    }

    const prefix = TABLE_PREFIX.exec(inner);
    let attributes: AttributeBlock = { classes: [], options: {} };
    if (attributeText !== undefined) {
        const parsed = parseAttributes(attributeText);
        if (!parsed) return prefix ? 'malformed' : undefined;
        attributes = parsed;
    }

    const hasTableId = attributes.id !== undefined && /^s?table:/.test(attributes.id);
    if (!prefix && !hasTableId) return undefined;
    if (requireMarkup && !bold && attributeText === undefined) return undefined;

    const strippedInner = prefix ? inner.slice(prefix[0].length) : inner;
    const caption = bold && !prefix
        ? `**${strippedInner}**${rest}`.trim()
        : `${strippedInner}${rest}`.trim();

    return {
        caption,
        wide: prefix?.[1] === '*',
        attributes,
    };
}

function captionAfter(lines: string[], end: number, ctx: DocumentContext): (ParsedCaption & { consumed: number }) | undefined {
    let index = end;
    if (index < lines.length && isBlank(lines[index])) index++;
    if (index >= lines.length || isBlank(lines[index])) return undefined;

    const parsed = parseCaptionLine(lines[index], true);
    if (parsed === 'malformed') {
        warn(ctx, 'recoverable', 'malformed-attributes', 'Table caption attribute block could not be parsed', lines[index],
            'Write attributes as {#table:key rotate=90}');
        return undefined;
    }
    if (!parsed) return undefined;

    // A caption directly above another table belongs to that table
    let next = index + 1;
    if (next < lines.length && isBlank(lines[next])) next++;
    if (next < lines.length && TABLE_LINE.test(lines[next])) return undefined;

    return { ...parsed, consumed: index - end + 1 };
}

function captionBefore(out: string[], ctx: DocumentContext): (ParsedCaption & { index: number }) | undefined {
    let index = out.length - 1;
    if (index >= 0 && isBlank(out[index])) index--;
    if (index < 0 || isBlank(out[index])) return undefined;

    const parsed = parseCaptionLine(out[index]);
    if (parsed === 'malformed') {
        warn(ctx, 'recoverable', 'malformed-attributes', 'Table caption attribute block could not be parsed', out[index]);
        return undefined;
    }
    if (!parsed) return undefined;
    return { ...parsed, index };
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Comments dropped, references and citations next, then escaping outside
 * the commands they produced, then emphasis
 */
export function convertTableCell(cell: string, ctx: DocumentContext): string {
    let result = convertLinks(dropComments(cell, ctx), ctx);
    result = convertCitations(result, ctx);
    result = convertCrossReferences(result, ctx);
    result = convertSpecialCharacters(result);
    return convertInlineFormatting(result);
}

/**
 * A cell shown as written: code spans lose their backticks, everything
 * else is escaped and set in typewriter type
 */
export function literalTableCell(cell: string, ctx: DocumentContext): string {
    const source = ctx.protector.restore(dropComments(cell, ctx), {
        'inline-code': span => inlineCodeBody(span.original),
    });
    return `\\texttt{${escapeLatex(source)}}`;
}

function isLiteralColumn(header: string): boolean {
    return LITERAL_COLUMN.test(header.replace(/\*/g, '').trim());
}

function tableEnvironment(table: TableElement, ctx: DocumentContext): { env: string; position: string; rotateBox?: string } {
    const angle = option(table.attributes, 'rotate', 'angle');
    const override = option(table.attributes, 'tex_position', 'position');
    const star = table.wide ? '*' : '';

    if (ctx.supplementary) {
        const env = angle ? `sidewaystable${star}` : `stable${star}`;
        return { env, position: override ?? 'ht' };
    }
    const result: { env: string; position: string; rotateBox?: string } = {
        env: `table${star}`,
        position: override ?? (table.wide ? '!ht' : 'ht'),
    };
    if (angle) {
        result.rotateBox = angle;
    }
    return result;
}

export function renderTable(table: TableElement, ctx: DocumentContext): string {
    const { env, position, rotateBox } = tableEnvironment(table, ctx);
    const literal = table.header.map(isLiteralColumn);
    const headerRow = `${table.header.map(cell => convertTableCell(cell, ctx)).join(' & ')} \\\\`;
    const row = (cells: string[]): string => {
        const rendered = cells.map((cell, column) =>
            literal[column] ? literalTableCell(cell, ctx) : convertTableCell(cell, ctx));
        return `${rendered.join(' & ')} \\\\`;
    };

    const lines = [`\\begin{${env}}[${position}]`, '\\centering'];
    if (rotateBox) {
        lines.push(`\\rotatebox{${rotateBox}}{%`);
    }
    lines.push(
        `\\begin{tabular}{${table.alignments.join('')}}`,
        '\\toprule',
        headerRow,
        '\\midrule',
        ...table.rows.map(row),
        '\\bottomrule',
        '\\end{tabular}'
    );
    if (rotateBox) {
        lines.push('}%');
    }
    if (table.caption) {
        lines.push(`\\caption{${convertCaption(table.caption, ctx)}}`);
    }
    if (table.label) {
        lines.push(`\\label{${table.label.target}}`);
    }
    lines.push(`\\end{${env}}`);
    return lines.join('\n');
}
