/**
 * Figure converter
 *
 * Three Markdown shapes are recognised. They are tried in the order of
 * FIGURE_PATTERNS and the first one that matches an occurrence wins:
 *
 *     ![](FIGURES/plot.py)                    two-line form, caption after
 *     {#fig:plot width="0.8"} **Caption** ...  the attribute block
 *
 *     ![Caption](FIGURES/plot.svg){#fig:plot}  attributed form
 *
 *     ![Caption](FIGURES/plot.png)             simple form
 *
 * Each occurrence is rendered to a complete float and the float is
 * protected, so later stages never see its LaTeX.
 */

import * as path from 'path';
import { parseAttributes, option } from './attributes';
import { declareLabel } from './context';
import { parseLabelId } from './labelRegistry';
import { convertCaption } from './captions';
import { replaceMatches } from './textUtils';
import { warn } from './warnings';
import type { AttributeBlock, DocumentContext, FigureElement, LabelNamespace } from './types';

/** Figure sources that are scripts; the generator writes `<base>/<base>.<format>` */
export const FIGURE_SCRIPT_EXTENSIONS = ['.py', '.r', '.mmd'];

interface FigureMatch {
    source: string;
    caption: string;
    attributes?: string;
}

interface FigurePattern {
    name: string;
    pattern: RegExp;
    extract: (match: RegExpExecArray) => FigureMatch;
}

const PATH = String.raw`([^()\s]+)`;

export const FIGURE_PATTERNS: FigurePattern[] = [
    {
        name: 'two-line',
        pattern: new RegExp(
            String.raw`^[ \t]*!\[\]\(${PATH}\)[ \t]*\n(?:[ \t]*\n)?[ \t]*\{([^{}\n]*)\}[ \t]*((?:[^\n]|\n(?![ \t]*$))*)`,
            'gm'
        ),
        extract: m => ({ source: m[1], attributes: m[2], caption: m[3].trim() }),
    },
    {
        name: 'attributed',
        pattern: new RegExp(String.raw`!\[((?:[^\[\]]|\[[^\[\]]*\])*)\]\(${PATH}\)\{([^{}\n]*)\}`, 'g'),
        extract: m => ({ caption: m[1].trim(), source: m[2], attributes: m[3] }),
    },
    {
        name: 'simple',
        pattern: new RegExp(String.raw`!\[((?:[^\[\]]|\[[^\[\]]*\])*)\]\(${PATH}\)(?!\{)`, 'g'),
        extract: m => ({ caption: m[1].trim(), source: m[2] }),
    },
];

export function convertFigures(text: string, ctx: DocumentContext): string {
    let result = text;
    for (const figurePattern of FIGURE_PATTERNS) {
        result = replaceMatches(result, figurePattern.pattern, match => convertOccurrence(match, figurePattern, ctx));
    }
    return result;
}

function convertOccurrence(match: RegExpExecArray, figurePattern: FigurePattern, ctx: DocumentContext): string {
    const found = figurePattern.extract(match);
    let attributes: AttributeBlock = { classes: [], options: {} };

    if (found.attributes !== undefined) {
        const parsed = parseAttributes(found.attributes);
        if (!parsed) {
            warn(ctx, 'recoverable', 'malformed-attributes',
                `Figure attribute block could not be parsed (${figurePattern.name} form)`, match[0],
                'Write attributes as {#fig:key width="0.8" tex_position="t"}');
            return match[0];
        }
        attributes = parsed;
    }

    const figure: FigureElement = {
        source: found.source,
        path: resolveFigurePath(found.source, ctx),
        caption: found.caption,
        attributes,
    };

    if (attributes.id) {
        const parsedId = parseLabelId(attributes.id);
        const fallback: LabelNamespace = ctx.supplementary ? 'sfig' : 'fig';
        figure.label = declareLabel(ctx, parsedId?.namespace ?? fallback, parsedId?.key ?? attributes.id, match[0]);
    }

    if (!figure.caption) {
        warn(ctx, 'advisory', 'missing-caption', `Figure '${figure.source}' has no caption`, match[0]);
    }

    const assetExists = ctx.build.options.assetExists;
    if (assetExists && !assetExists(figure.path)) {
        warn(ctx, 'advisory', 'missing-figure', `Figure file '${figure.path}' does not exist yet`, match[0],
            'Run the figure generator or check the path');
    }

    const leading = /^[ \t]*/.exec(match[0]);
    return `${leading ? leading[0] : ''}${ctx.protector.protectRaw(renderFigure(figure, ctx))}`;
}

/**
 * Map a Markdown figure path to the path LaTeX includes.
 * `FIGURES/` becomes the output directory, SVG becomes PNG and figure
 * scripts point at the image the generator writes for them.
 */
export function resolveFigurePath(source: string, ctx: DocumentContext): string {
    const { figureSourceDir, figureOutputDir, figureFormat } = ctx.build.options;
    const prefix = `${figureSourceDir}/`;
    if (!source.startsWith(prefix)) {
        return source.replace(/\.svg$/i, '.png');
    }

    const relative = source.slice(prefix.length);
    const ext = path.posix.extname(relative);
    if (FIGURE_SCRIPT_EXTENSIONS.includes(ext.toLowerCase())) {
        const dir = path.posix.dirname(relative);
        const base = path.posix.basename(relative, ext);
        const generated = path.posix.join(dir, base, `${base}.${figureFormat}`);
        return `${figureOutputDir}/${generated}`;
    }
    return `${figureOutputDir}/${relative.replace(/\.svg$/i, '.png')}`;
}

/**
 * Width option: a bare fraction scales \linewidth, a percentage is
 * converted to a fraction, anything else is an absolute length
 */
export function resolveWidth(value: string): string {
    const trimmed = value.trim();
    const percent = /^(\d+(?:\.\d+)?)%$/.exec(trimmed);
    if (percent) {
        const fraction = Number(percent[1]) / 100;
        return fraction === 1 ? '\\linewidth' : `${Number(fraction.toFixed(4))}\\linewidth`;
    }
    if (/^\d*\.?\d+$/.test(trimmed)) {
        return Number(trimmed) === 1 ? '\\linewidth' : `${trimmed}\\linewidth`;
    }
    return trimmed;
}

export function renderFigure(figure: FigureElement, ctx: DocumentContext): string {
    const attrs = figure.attributes;
    const position = option(attrs, 'tex_position', 'position') ?? 'ht';
    const wide = attrs.classes.includes('wide') || option(attrs, 'span', 'width_mode') === 'full';
    const env = wide ? 'figure*' : 'figure';

    const graphicsOptions: string[] = [];
    const width = option(attrs, 'width');
    if (width) {
        graphicsOptions.push(`width=${resolveWidth(width)}`);
    }
    const angle = option(attrs, 'rotate', 'angle');
    if (angle) {
        graphicsOptions.push(`angle=${angle}`);
    }
    const graphicsArgs = graphicsOptions.length > 0 ? `[${graphicsOptions.join(',')}]` : '';

    const lines = [
        `\\begin{${env}}[${position}]`,
        '\\centering',
        `\\includegraphics${graphicsArgs}{${figure.path}}`,
    ];
    if (figure.caption) {
        lines.push(`\\caption{${convertCaption(figure.caption, ctx)}}`);
    }
    if (figure.label) {
        lines.push(`\\label{${figure.label.target}}`);
    }
    lines.push(`\\end{${env}}`);
    if (ctx.supplementary) {
        lines.push('\\newpage');
    }
    return lines.join('\n');
}
