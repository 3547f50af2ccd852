/**
 * Tests for the figure converter
 */

import { describe, it, expect } from 'vitest';
import { convertMarkdown } from '../pipeline';
import { resolveFigurePath, resolveWidth } from '../figures';
import { createBuildContext, createDocumentContext } from '../context';

describe('figures', () => {
    it('renders an attributed figure as a labelled float', () => {
        const result = convertMarkdown('![A cat](FIGURES/cat.svg){#fig:cat}');
        expect(result.latex).toBe([
            '\\begin{figure}[ht]',
            '\\centering',
            '\\includegraphics{Figures/cat.png}',
            '\\caption{A cat}',
            '\\label{fig:cat}',
            '\\end{figure}',
        ].join('\n'));
        expect(result.labels).toEqual([{ namespace: 'fig', key: 'cat', target: 'fig:cat' }]);
        expect(result.warnings).toEqual([]);
    });

    it('drops a comment from the caption', () => {
        const { latex } = convertMarkdown('![A <!-- hidden --> cat](FIGURES/cat.png){#fig:c}');
        expect(latex).toContain('\\caption{A cat}\n\\label{fig:c}');
    });

    it('escapes special characters in the caption', () => {
        const { latex } = convertMarkdown('![Yield & 95% range of run_2, see @fig:y](FIGURES/y.png){#fig:y}');
        expect(latex).toContain('\\caption{Yield \\& 95\\% range of run\\_2, see \\ref{fig:y}}');
    });

    it('applies width and position options', () => {
        const { latex } = convertMarkdown('![Plot](FIGURES/plot.py){#fig:plot width="0.5" tex_position="t"}');
        expect(latex).toContain('\\begin{figure}[t]');
        expect(latex).toContain('\\includegraphics[width=0.5\\linewidth]{Figures/plot/plot.png}');
    });

    it('uses figure* for wide figures', () => {
        const { latex } = convertMarkdown('![Wide](FIGURES/w.png){#fig:w .wide}');
        expect(latex).toContain('\\begin{figure*}[ht]');
        expect(latex).toContain('\\end{figure*}');
    });

    it('reads the two-line form with a formatted caption', () => {
        const result = convertMarkdown(
            '![](FIGURES/flow.mmd)\n{#fig:flow} **Workflow** overview with @smith2020.\n\nNext paragraph.'
        );
        expect(result.latex).toContain('\\includegraphics{Figures/flow/flow.png}');
        expect(result.latex).toContain('\\caption{\\textbf{Workflow} overview with \\cite{smith2020}.}');
        expect(result.latex).toContain('\\label{fig:flow}');
        expect(result.latex.endsWith('\\end{figure}\n\nNext paragraph.')).toBe(true);
        expect(result.citations).toEqual(['smith2020']);
    });

    it('keeps math in captions', () => {
        const { latex } = convertMarkdown('![Growth of $x^2$](FIGURES/g.png){#fig:g}');
        expect(latex).toContain('\\caption{Growth of $x^2$}');
    });

    it('renders an unlabelled figure without a label', () => {
        const { latex, warnings } = convertMarkdown('![Chart](FIGURES/chart.png)');
        expect(latex).not.toContain('\\label');
        expect(warnings).toEqual([]);
    });

    it('warns about a figure without caption', () => {
        const { latex, warnings } = convertMarkdown('![](FIGURES/x.png)');
        expect(latex).not.toContain('\\caption');
        expect(warnings).toHaveLength(1);
        expect(warnings[0].severity).toBe('advisory');
        expect(warnings[0].category).toBe('missing-caption');
    });

    it('reports a duplicate label once and keeps one declaration', () => {
        const { warnings, labels } = convertMarkdown('![A](FIGURES/a.png){#fig:a}\n\n![B](FIGURES/b.png){#fig:a}');
        expect(warnings.map(w => w.category)).toEqual(['duplicate-label']);
        expect(labels).toHaveLength(1);
    });

    it('adds a page break after supplementary figures', () => {
        const { latex } = convertMarkdown('![S](FIGURES/s.png){#sfig:s}', { supplementary: true });
        expect(latex.endsWith('\\end{figure}\n\\newpage')).toBe(true);
        expect(latex).toContain('\\label{sfig:s}');
    });

    it('defaults to sfig: in supplementary documents', () => {
        const { labels } = convertMarkdown('![S](FIGURES/s.png){#extra}', { supplementary: true });
        expect(labels.map(l => l.target)).toEqual(['sfig:extra']);
    });

    it('warns when the asset is missing', () => {
        const { warnings } = convertMarkdown('![A](FIGURES/a.png)', { assetExists: () => false });
        expect(warnings.map(w => w.category)).toEqual(['missing-figure']);
    });

    it('leaves a figure with a malformed attribute block untouched', () => {
        const source = '![A](FIGURES/a.png){width="0.5}';
        const { latex, warnings } = convertMarkdown(source);
        expect(latex).toBe(source);
        expect(warnings.map(w => w.category)).toEqual(['malformed-attributes']);
    });
});

describe('resolveFigurePath', () => {
    const ctx = createDocumentContext('', createBuildContext({ figureFormat: 'pdf' }));

    it('maps scripts to their generated image', () => {
        expect(resolveFigurePath('FIGURES/sub/model.R', ctx)).toBe('Figures/sub/model/model.pdf');
    });

    it('leaves paths outside the source directory alone apart from SVG', () => {
        expect(resolveFigurePath('images/logo.svg', ctx)).toBe('images/logo.png');
        expect(resolveFigurePath('images/logo.jpg', ctx)).toBe('images/logo.jpg');
    });
});

describe('resolveWidth', () => {
    it('converts fractions and percentages to \\linewidth', () => {
        expect(resolveWidth('80%')).toBe('0.8\\linewidth');
        expect(resolveWidth('0.5')).toBe('0.5\\linewidth');
        expect(resolveWidth('100%')).toBe('\\linewidth');
        expect(resolveWidth('1')).toBe('\\linewidth');
    });

    it('passes absolute lengths through', () => {
        expect(resolveWidth('5cm')).toBe('5cm');
    });
});
