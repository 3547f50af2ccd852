/**
 * CLI Settings - Read texloom.json for build operations
 *
 * The file is looked up in the manuscript directory and then in each
 * parent directory, so one texloom.json can serve several manuscripts.
 * Values found there are merged over the defaults below.
 */

import * as fs from 'fs';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { z } from 'zod';
import { SettingsError } from '../utils/errors';
import { LogLevel, parseLogLevel } from '../utils/logger';

export const CONFIG_FILENAME = 'texloom.json';

/**
 * Figure generation settings (figures.*)
 */
export interface FigureSettings {
    sourceDir: string;
    outputDir: string;
    format: string;
    exclude: string[];
    timeoutMs: number;
    concurrency: number;
    pythonCommand: string;
    rscriptCommand: string;
    mermaidCommand: string;
}

/**
 * LaTeX toolchain settings (latex.*)
 */
export interface LatexSettings {
    compiler: string;
    bibtexCommand: string;
    timeoutMs: number;
    cleanAuxFiles: boolean;
    minted: boolean;
}

/**
 * Build settings (build.*)
 */
export interface BuildSettings {
    outputDir: string;
    strict: boolean;
    noteReferenceCommand: string;
}

/**
 * All texloom settings
 */
export interface TexloomSettings {
    figures: FigureSettings;
    latex: LatexSettings;
    build: BuildSettings;
    logLevel: LogLevel;
    /** The texloom.json that was read, if any */
    configPath?: string;
}

const figureSchema = z.object({
    sourceDir: z.string(),
    outputDir: z.string(),
    format: z.enum(['png', 'pdf', 'svg', 'jpg']),
    exclude: z.array(z.string()),
    timeoutMs: z.number().int().positive(),
    concurrency: z.number().int().positive(),
    pythonCommand: z.string(),
    rscriptCommand: z.string(),
    mermaidCommand: z.string(),
}).partial();

const latexSchema = z.object({
    compiler: z.string(),
    bibtexCommand: z.string(),
    timeoutMs: z.number().int().positive(),
    cleanAuxFiles: z.boolean(),
    minted: z.boolean(),
}).partial();

const buildSchema = z.object({
    outputDir: z.string(),
    strict: z.boolean(),
    noteReferenceCommand: z.string().regex(/^[A-Za-z]+$/, 'must be a command name without backslash'),
}).partial();

const settingsFileSchema = z.object({
    figures: figureSchema.optional(),
    latex: latexSchema.optional(),
    build: buildSchema.optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

/**
 * Default settings when no texloom.json is found
 */
export function defaultSettings(): TexloomSettings {
    return {
        figures: {
            sourceDir: 'FIGURES',
            outputDir: 'Figures',
            format: 'png',
            exclude: [],
            timeoutMs: 120000,
            concurrency: 4,
            pythonCommand: 'python3',
            rscriptCommand: 'Rscript',
            mermaidCommand: 'mmdc',
        },
        latex: {
            compiler: 'pdflatex',
            bibtexCommand: 'bibtex',
            timeoutMs: 120000,
            cleanAuxFiles: true,
            minted: false,
        },
        build: {
            outputDir: 'output',
            strict: false,
            noteReferenceCommand: 'ref',
        },
        logLevel: parseLogLevel(process.env.TEXLOOM_LOG_LEVEL),
    };
}

/**
 * Find texloom.json in `startDir` or the nearest parent that has one
 */
export function findConfig(startDir: string): string | undefined {
    let dir = path.resolve(startDir);
    for (;;) {
        const candidate = path.join(dir, CONFIG_FILENAME);
        if (fs.existsSync(candidate)) {
            return candidate;
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return undefined;
        }
        dir = parent;
    }
}

/**
 * Parse texloom.json content. Whole-line `//` and block comments are
 * allowed; a `//` inside a string value is kept.
 *
 * @throws SettingsError on invalid JSON or mistyped values
 */
export function parseSettingsFile(content: string, configPath: string): SettingsFile {
    const jsonContent = content
        .replace(/\/\*[\s\S]*?\*\//g, '')
        .replace(/^\s*\/\/.*$/gm, '');

    let raw: unknown;
    try {
        raw = jsonContent.trim() ? JSON.parse(jsonContent) : {};
    } catch (err) {
        throw new SettingsError(configPath, [err instanceof Error ? err.message : String(err)]);
    }

    const parsed = settingsFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new SettingsError(
            configPath,
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

/**
 * Merge a parsed settings file over the defaults
 */
export function mergeSettings(base: TexloomSettings, file: SettingsFile): TexloomSettings {
    return {
        figures: { ...base.figures, ...file.figures },
        latex: { ...base.latex, ...file.latex },
        build: { ...base.build, ...file.build },
        logLevel: file.logLevel ? parseLogLevel(file.logLevel) : base.logLevel,
        ...(base.configPath ? { configPath: base.configPath } : {}),
    };
}

/**
 * Load settings for a manuscript directory
 */
export function loadSettings(manuscriptDir: string): TexloomSettings {
    const settings = defaultSettings();
    const configPath = findConfig(manuscriptDir);
    if (!configPath) {
        return settings;
    }

    const file = parseSettingsFile(fs.readFileSync(configPath, 'utf-8'), configPath);
    return { ...mergeSettings(settings, file), configPath };
}

/**
 * Expand ~ to home directory in path
 */
export function expandPath(p: string): string {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    if (p.startsWith('~')) {
        return p.replace(/^~/, home);
    }
    return p;
}

/**
 * Check if a file path should be excluded based on patterns.
 * Glob patterns are matched with minimatch against the base name as well
 * as the whole path; other patterns are path prefixes.
 */
export function shouldExclude(filePath: string, excludePatterns: string[]): boolean {
    for (const pattern of excludePatterns) {
        const expandedPattern = expandPath(pattern);

        if (/[*?[{]/.test(pattern)) {
            if (minimatch(filePath, expandedPattern, { matchBase: true })) {
                return true;
            }
        } else if (filePath === expandedPattern || filePath.startsWith(expandedPattern + path.sep)) {
            return true;
        }
    }
    return false;
}
