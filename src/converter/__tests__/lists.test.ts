/**
 * Tests for the list converter
 */

import { describe, it, expect } from 'vitest';
import { convertMarkdown } from '../pipeline';

describe('lists', () => {
    it('converts nested bullet lists', () => {
        expect(convertMarkdown('- one\n- two\n  - nested\n- three').latex).toBe([
            '\\begin{itemize}',
            '  \\item one',
            '  \\item two',
            '  \\begin{itemize}',
            '    \\item nested',
            '  \\end{itemize}',
            '  \\item three',
            '\\end{itemize}',
        ].join('\n'));
    });

    it('converts numbered lists to enumerate', () => {
        expect(convertMarkdown('1. a\n2. b').latex).toBe('\\begin{enumerate}\n  \\item a\n  \\item b\n\\end{enumerate}');
    });

    it('ends a list at a blank line', () => {
        expect(convertMarkdown('- a\n\n- b').latex)
            .toBe('\\begin{itemize}\n  \\item a\n\\end{itemize}\n\n\\begin{itemize}\n  \\item b\n\\end{itemize}');
    });

    it('joins continuation lines to the item', () => {
        expect(convertMarkdown('- first\n  continued').latex).toBe('\\begin{itemize}\n  \\item first continued\n\\end{itemize}');
    });

    it('formats emphasis inside items', () => {
        expect(convertMarkdown('* **key** point').latex).toBe('\\begin{itemize}\n  \\item \\textbf{key} point\n\\end{itemize}');
    });
});
