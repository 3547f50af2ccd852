/**
 * Attribute block parsing
 *
 * Figures, tables, headings and equations accept a trailing block such as
 *
 *     {#fig:overview .wide width="0.8" tex_position=t}
 */

import type { AttributeBlock } from './types';

/** Source of a braced attribute block; group 1 is the inner text */
export const ATTRIBUTE_BLOCK = String.raw`\{((?:[#.]|[\w-]+\s*=)[^{}\n]*)\}`;

const ATTRIBUTE_ITEM = /\s*(?:#([^\s},]+)|\.([\w-]+)|([\w-]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'},]+)))/y;

/**
 * Parse the inside of an attribute block.
 * Returns undefined when the text is not a well-formed block (an
 * unclosed quote, stray characters); callers then leave the source alone.
 */
export function parseAttributes(inner: string): AttributeBlock | undefined {
    const block: AttributeBlock = { classes: [], options: {} };
    const trimmed = inner.trim();
    if (!trimmed) return block;

    let position = 0;
    ATTRIBUTE_ITEM.lastIndex = 0;
    while (position < trimmed.length) {
        ATTRIBUTE_ITEM.lastIndex = position;
        const match = ATTRIBUTE_ITEM.exec(trimmed);
        if (!match) return undefined;

        const [, id, cls, key, doubleQuoted, singleQuoted, bare] = match;
        if (id !== undefined) {
            block.id = id;
        } else if (cls !== undefined) {
            block.classes.push(cls);
        } else if (key !== undefined) {
            block.options[key] = doubleQuoted ?? singleQuoted ?? bare ?? '';
        }
        position = ATTRIBUTE_ITEM.lastIndex;

        // Items are separated by whitespace or commas
        const separator = /^[\s,]*/.exec(trimmed.slice(position));
        const skip = separator ? separator[0].length : 0;
        if (skip === 0 && position < trimmed.length) return undefined;
        position += skip;
    }
    return block;
}

/**
 * First of several option names that is set
 */
export function option(block: AttributeBlock, ...names: string[]): string | undefined {
    for (const name of names) {
        const value = block.options[name];
        if (value !== undefined && value !== '') return value;
    }
    return undefined;
}
