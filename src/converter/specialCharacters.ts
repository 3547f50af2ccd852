/**
 * LaTeX special characters in running text
 *
 * `& % _ # $` still in the text once every element converter has run are
 * user content and get a backslash. Label, citation and URL arguments are
 * shielded, and a character that is already escaped is left alone.
 */

import { escapeLatexText } from '../utils/escapeUtils';
import { PASSIVE_SEGMENTS, withShielded } from './textUtils';

export function convertSpecialCharacters(text: string): string {
    return withShielded(text, PASSIVE_SEGMENTS, escapeLatexText);
}
