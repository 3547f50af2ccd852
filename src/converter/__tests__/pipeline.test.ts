/**
 * Tests for the conversion pipeline as a whole
 */

import { describe, it, expect } from 'vitest';
import {
    STAGES,
    convertDocument,
    convertMarkdown,
    finalizeBuild,
    runStage,
} from '../pipeline';
import { createBuildContext, createDocumentContext } from '../context';
import { formatWarning } from '../warnings';
import { ProtectorCollisionError } from '../../utils/errors';

const DOCUMENT = [
    '## Methods {#sec:methods}',
    '',
    'We used **Python** and *R* (see @fig:plot and [@smith2020]).',
    '',
    '![Results of $x^2$](FIGURES/plot.py){#fig:plot width="80%"}',
    '',
    '| Key | Value |',
    '|-----|-------|',
    '| a | `x|y` |',
    '',
    '**Table 1: Values** {#table:values}',
    '',
    '- item with H~2~O',
    '- item with <https://example.org>',
    '',
    '```python',
    'print("**not bold** @not_a_cite")',
    '```',
    '',
    '<!-- reviewer note -->',
    '<newpage>',
].join('\n');

describe('pipeline', () => {
    it('runs the stages in order', () => {
        expect(STAGES.map(s => s.name)).toEqual([
            'PROTECT',
            'HEADERS',
            'EQUATIONS',
            'FIGURES',
            'TABLES',
            'INLINE_FORMATTING',
            'LISTS',
            'LINKS',
            'CITATIONS',
            'CROSS_REFS',
            'ESCAPING',
            'PAGE_BREAKS',
            'COMMENTS',
            'RESTORE',
        ]);
    });

    it('converts a complete document', () => {
        const { latex, warnings, citations } = convertMarkdown(DOCUMENT);
        expect(latex).toContain('\\subsection{Methods}\\label{sec:methods}');
        expect(latex).toContain('We used \\textbf{Python} and \\textit{R} (see \\ref{fig:plot} and \\cite{smith2020}).');
        expect(latex).toContain('\\includegraphics[width=0.8\\linewidth]{Figures/plot/plot.png}');
        expect(latex).toContain('\\caption{Results of $x^2$}');
        expect(latex).toContain('a & \\texttt{x|y} \\\\');
        expect(latex).toContain('\\caption{Values}');
        expect(latex).toContain('  \\item item with H\\textsubscript{2}O');
        expect(latex).toContain('  \\item item with \\url{https://example.org}');
        expect(latex).toContain('\\begin{verbatim}\nprint("**not bold** @not_a_cite")\n\\end{verbatim}');
        expect(latex).toContain('% reviewer note\n\\newpage');
        expect(citations).toEqual(['smith2020']);
        expect(warnings).toEqual([]);
    });

    it('is deterministic', () => {
        expect(convertMarkdown(DOCUMENT).latex).toBe(convertMarkdown(DOCUMENT).latex);
    });

    it('renders code with minted when enabled', () => {
        const { latex } = convertMarkdown('```python\nx = 1\n```', { minted: true });
        expect(latex).toBe('\\begin{minted}{python}\nx = 1\n\\end{minted}');
    });

    it('normalizes CRLF line endings', () => {
        expect(convertMarkdown('# Title\r\n\r\n*text*').latex).toBe('\\section{Title}\n\n\\textit{text}');
    });

    describe('stage idempotence', () => {
        it('changes nothing when a stage runs on its own output', () => {
            const ctx = createDocumentContext(DOCUMENT, createBuildContext());
            let text = DOCUMENT;
            for (const stage of STAGES) {
                const once = runStage(stage.name, text, ctx);
                expect(runStage(stage.name, once, ctx)).toBe(once);
                text = once;
            }
            expect(ctx.protector.hasTokens(text)).toBe(false);
        });
    });

    describe('non-interference', () => {
        const withCode = (code: string): string => `Intro *x*.\n\n\`\`\`\n${code}\n\`\`\`\n\nEnd **y**.`;
        const outside = (latex: string): string => latex.replace(/\\begin\{verbatim\}[\s\S]*?\\end\{verbatim\}/, '');

        it('keeps output outside a code block independent of its content', () => {
            const plain = convertMarkdown(withCode('code'));
            const noisy = convertMarkdown(withCode('code $ * | ** _ # @key [@a] <!-- -->'));
            expect(outside(noisy.latex)).toBe(outside(plain.latex));
            expect(noisy.citations).toEqual([]);
        });

        it('reproduces code verbatim', () => {
            const code = 'a **b** $c$ @d <newpage>';
            expect(convertMarkdown(withCode(code)).latex).toContain(`\\begin{verbatim}\n${code}\n\\end{verbatim}`);
        });
    });

    describe('unterminated code fence', () => {
        it('converts the rest of the document and warns once', () => {
            const { latex, warnings } = convertMarkdown('Intro **bold**\n\n```python\nx = 1\n\nMore *text*.');
            expect(latex).toBe('Intro \\textbf{bold}\n\n% ```python\nx = 1\n\nMore \\textit{text}.');
            expect(warnings).toHaveLength(1);
            expect(warnings[0].category).toBe('unterminated-code-fence');
            expect(warnings[0].location?.line).toBe(3);
        });

        it('reports lines of the enclosing file when given the first line', () => {
            const { warnings } = convertMarkdown('Intro\n\n```python\nx = 1', { firstLine: 12 });
            expect(warnings[0].location?.line).toBe(14);
        });
    });

    it('offsets reference locations by the first line', () => {
        const { warnings } = convertMarkdown('Text\nSee @fig:gone.', { firstLine: 5, documentName: '01_MAIN.md' });
        expect(warnings[0].location).toEqual({ snippet: '@fig:gone', line: 6, document: '01_MAIN.md' });
    });

    it('rejects input containing the placeholder sentinel', () => {
        expect(() => convertMarkdown('text \uE000 more')).toThrow(ProtectorCollisionError);
    });

    describe('builds with several documents', () => {
        it('resolves references across documents before warning', () => {
            const build = createBuildContext();
            convertDocument('See @sfig:extra.', build, { documentName: 'main' });
            convertDocument('![Extra](FIGURES/e.png){#sfig:extra}', build, { documentName: 'supp', supplementary: true });
            expect(finalizeBuild(build)).toEqual([]);
        });

        it('reports unresolved references only once per build', () => {
            const build = createBuildContext();
            convertDocument('@fig:missing', build, { documentName: '02_MAIN' });
            expect(finalizeBuild(build)).toHaveLength(1);
            const warnings = finalizeBuild(build);
            expect(warnings).toHaveLength(1);
            expect(formatWarning(warnings[0])).toBe(
                "02_MAIN:1: recoverable [unresolved-reference] Reference to undeclared label 'fig:missing' " +
                '(Declare {#fig:missing} on the figure, table, equation or heading)'
            );
        });

        it('shares nothing between builds', () => {
            convertMarkdown('![A](FIGURES/a.png){#fig:a}');
            expect(convertMarkdown('@fig:a').warnings).toHaveLength(1);
        });
    });
});
