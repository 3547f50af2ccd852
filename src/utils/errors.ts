/**
 * Fatal build errors
 *
 * Anything recoverable is reported as a ConversionWarning instead;
 * these abort a build and make the CLI exit non-zero.
 */

/**
 * A required manuscript file or directory is absent
 */
export class MissingInputError extends Error {
    public readonly filePath: string;

    constructor(filePath: string, what: string = 'Input file') {
        super(`${what} not found: ${filePath}`);
        this.name = 'MissingInputError';
        this.filePath = filePath;
    }
}

/**
 * The metadata file cannot be parsed or fails validation
 */
export class MetadataError extends Error {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'MetadataError';
        this.issues = issues;
    }
}

/**
 * The input already contains the placeholder sentinel, so protected
 * spans could not be told apart from document text
 */
export class ProtectorCollisionError extends Error {
    public readonly offset: number;

    constructor(offset: number) {
        super(`Input contains a reserved placeholder character at offset ${offset}`);
        this.name = 'ProtectorCollisionError';
        this.offset = offset;
    }
}

/**
 * texloom.json cannot be parsed or holds values of the wrong type
 */
export class SettingsError extends Error {
    public readonly configPath: string;

    constructor(configPath: string, issues: string[]) {
        super(`Invalid settings in ${configPath}:\n  - ${issues.join('\n  - ')}`);
        this.name = 'SettingsError';
        this.configPath = configPath;
    }
}

/**
 * The LaTeX toolchain failed to produce a PDF
 */
export class CompilationError extends Error {
    public readonly errors: string[];
    public readonly log: string;

    constructor(texFile: string, errors: string[], log: string = '') {
        super(`Compilation of ${texFile} failed${errors.length > 0 ? `:\n  ${errors.join('\n  ')}` : ''}`);
        this.name = 'CompilationError';
        this.errors = errors;
        this.log = log;
    }
}

/**
 * Strict mode turned recoverable warnings into a failed build
 */
export class StrictModeError extends Error {
    public readonly warningCount: number;

    constructor(warningCount: number) {
        super(`Strict mode: build produced ${warningCount} warning${warningCount === 1 ? '' : 's'}`);
        this.name = 'StrictModeError';
        this.warningCount = warningCount;
    }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
