/**
 * Command-line argument parsing
 */

export interface ParsedArgs {
    command: string;
    args: string[];
    flags: Record<string, string | boolean>;
}

/** Flags that never take a value, so a following path stays positional */
const BOOLEAN_FLAGS = new Set(['figures', 'no-compile', 'strict', 'supplementary', 'minted', 'help', 'verbose', 'quiet']);

/**
 * Parse command-line arguments into structured format
 */
export function parseArgs(argv: string[]): ParsedArgs {
    const flags: Record<string, string | boolean> = {};
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg.startsWith('--')) {
            const eq = arg.indexOf('=');
            if (eq > 2) {
                flags[arg.slice(2, eq)] = arg.slice(eq + 1);
                continue;
            }
            const key = arg.slice(2);
            const next = argv[i + 1];
            if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
                flags[key] = next;
                i++;
            } else {
                flags[key] = true;
            }
        } else if (arg.startsWith('-') && arg.length > 1) {
            flags[arg.slice(1)] = true;
        } else {
            positional.push(arg);
        }
    }

    return {
        command: positional[0] || 'help',
        args: positional.slice(1),
        flags,
    };
}

export function stringFlag(args: ParsedArgs, name: string): string | undefined {
    const value = args.flags[name];
    return typeof value === 'string' ? value : undefined;
}

export function booleanFlag(args: ParsedArgs, name: string): boolean {
    return args.flags[name] === true || args.flags[name] === 'true';
}
