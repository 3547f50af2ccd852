/**
 * Heading converter
 *
 * ATX headings become sectioning commands. A trailing attribute block is
 * stripped from the title and its id declared as a label. In supplementary
 * documents the headings one level below a "Supplementary Notes" heading
 * are numbered notes with automatic `snote:` labels.
 */

import { parseAttributes } from './attributes';
import { declareLabel } from './context';
import { parseLabelId } from './labelRegistry';
import { warn } from './warnings';
import { slugify } from '../utils/escapeUtils';
import type { DocumentContext, LabelNamespace } from './types';

/** Sectioning command per heading level */
export const LATEX_SECTIONS = ['section', 'subsection', 'subsubsection', 'paragraph', 'subparagraph'];

const HEADING = /^(#{1,5})[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;

const TRAILING_ATTRIBUTES = /[ \t]*\{([^{}]*)\}$/;

const NOTES_SECTION = /^supplementary\s+notes?$/i;

const NOTE_PREFIX = /^supplementary\s+note\s+\d+\s*[:.]\s*/i;

interface HeadingState {
    /** Level of the open "Supplementary Notes" heading, 0 when none */
    notesLevel: number;
    noteCount: number;
}

export function convertHeaders(text: string, ctx: DocumentContext): string {
    const state: HeadingState = { notesLevel: 0, noteCount: 0 };
    return text
        .split('\n')
        .map(line => convertHeadingLine(line, ctx, state))
        .join('\n');
}

function convertHeadingLine(line: string, ctx: DocumentContext, state: HeadingState): string {
    const match = HEADING.exec(line);
    if (!match) return line;

    const level = match[1].length;
    let title = match[2];
    let id: string | undefined;

    const attrs = TRAILING_ATTRIBUTES.exec(title);
    if (attrs) {
        const block = parseAttributes(attrs[1]);
        if (block) {
            id = block.id;
            title = title.slice(0, attrs.index).trimEnd();
        } else {
            warn(ctx, 'recoverable', 'malformed-attributes', 'Heading attribute block could not be parsed', line,
                'Use {#sec:key} after the heading text');
        }
    }

    if (state.notesLevel > 0 && level <= state.notesLevel) {
        state.notesLevel = 0;
    }

    if (ctx.supplementary && state.notesLevel > 0 && level === state.notesLevel + 1) {
        return renderNote(title, id, ctx, state, line);
    }

    if (ctx.supplementary && NOTES_SECTION.test(title)) {
        state.notesLevel = level;
    }

    const command = `\\${sectionCommand(level, ctx)}{${title}}`;
    if (!id) return command;

    const parsed = parseLabelId(id);
    const namespace: LabelNamespace = parsed?.namespace ?? 'sec';
    const key = parsed?.key ?? id;
    const label = declareLabel(ctx, namespace, key, line);
    return `${command}\\label{${label.target}}`;
}

function sectionCommand(level: number, ctx: DocumentContext): string {
    return LATEX_SECTIONS[Math.max(0, level - 1 - ctx.headingShift)];
}

/**
 * `Supplementary Note N: Title` at the level of the notes heading itself
 */
function renderNote(
    rawTitle: string,
    id: string | undefined,
    ctx: DocumentContext,
    state: HeadingState,
    line: string
): string {
    const title = rawTitle.replace(NOTE_PREFIX, '');
    state.noteCount++;

    const parsed = id ? parseLabelId(id) : undefined;
    const key = parsed?.key ?? id ?? slugify(title);
    const label = declareLabel(ctx, 'snote', key, line);
    const command = sectionCommand(state.notesLevel, ctx);
    return `\\${command}{Supplementary Note ${state.noteCount}: ${title}}\\label{${label.target}}`;
}
