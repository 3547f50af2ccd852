/**
 * Tests for escaping LaTeX special characters in running text
 */

import { describe, it, expect } from 'vitest';
import { convertMarkdown } from '../pipeline';
import { convertSpecialCharacters } from '../specialCharacters';

describe('special characters', () => {
    it('escapes & % _ # in prose', () => {
        expect(convertMarkdown('We improved 50% of cases & saw 01_MAIN.md files #1.').latex)
            .toBe('We improved 50\\% of cases \\& saw 01\\_MAIN.md files \\#1.');
    });

    it('escapes a dollar sign that opens no math', () => {
        expect(convertMarkdown('It costs $5.').latex).toBe('It costs \\$5.');
    });

    it('leaves escaped characters alone', () => {
        expect(convertMarkdown('Cost \\$5 and 10\\%').latex).toBe('Cost \\$5 and 10\\%');
    });

    it('leaves math and code to their own rendering', () => {
        expect(convertMarkdown('Let $a_b$ and `x_y` hold').latex).toBe('Let $a_b$ and \\texttt{x\\_y} hold');
    });

    it('does not touch citation keys, labels or URLs', () => {
        expect(convertMarkdown('[@smith_2020] and @fig:my_plot and [docs](https://x.org/a_b#c)').latex).toBe(
            '\\cite{smith_2020} and \\ref{fig:my_plot} and \\href{https://x.org/a_b\\#c}{docs}'
        );
    });

    it('escapes heading titles but not their labels', () => {
        expect(convertMarkdown('## Q&A {#sec:q_and_a}').latex).toBe('\\subsection{Q\\&A}\\label{sec:q_and_a}');
    });

    it('does not touch the argument of the note reference command', () => {
        expect(convertMarkdown('See {@snote:data_fit}.', { noteReferenceCommand: 'nameref' }).latex)
            .toBe('See \\nameref{snote:data_fit}.');
    });

    it('changes nothing on a second run', () => {
        const once = convertSpecialCharacters('a_b & c \\% d');
        expect(once).toBe('a\\_b \\& c \\% d');
        expect(convertSpecialCharacters(once)).toBe(once);
    });
});
