/**
 * Caption conversion
 *
 * Figure and table captions are rendered inside protected floats, so they
 * run through the inline chain on their own. Comments are dropped and
 * special characters escaped, as the COMMENTS and ESCAPING stages never
 * see the inside of a float.
 */

import { dropComments } from './comments';
import { convertInlineFormatting } from './inlineFormatting';
import { convertLinks } from './links';
import { convertCitations } from './citations';
import { convertCrossReferences } from './crossReferences';
import { convertSpecialCharacters } from './specialCharacters';
import type { DocumentContext } from './types';

export function convertCaption(caption: string, ctx: DocumentContext): string {
    let result = convertInlineFormatting(dropComments(caption, ctx));
    result = convertLinks(result, ctx);
    result = convertCitations(result, ctx);
    result = convertCrossReferences(result, ctx);
    return convertSpecialCharacters(result);
}
