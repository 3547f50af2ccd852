/**
 * Centralized Logging System
 *
 * Provides structured logging with:
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - Console output on stderr, so stdout stays free for converted LaTeX
 * - Optional rotating file logs
 * - Module-scoped loggers
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4
}

/**
 * Map string config values to LogLevel
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    'debug': LogLevel.DEBUG,
    'info': LogLevel.INFO,
    'warn': LogLevel.WARN,
    'error': LogLevel.ERROR,
    'silent': LogLevel.SILENT
};

/**
 * Parse a level name, falling back to INFO for unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    if (!value) return LogLevel.INFO;
    return LOG_LEVEL_MAP[value.toLowerCase()] ?? LogLevel.INFO;
}

/**
 * Rotating file handler
 *
 * Writes logs to a file and rotates when it exceeds maxBytes.
 * Keeps up to backupCount rotated files (texloom.log.1, texloom.log.2, etc.)
 * Writes are synchronous so a CLI run never exits with buffered entries.
 */
export class RotatingFileHandler {
    private logPath: string;
    private currentSize: number = 0;

    constructor(
        private storageDir: string,
        filename: string = 'texloom.log',
        private maxBytes: number = 1024 * 1024,
        private backupCount: number = 3
    ) {
        this.logPath = path.join(storageDir, filename);
        fs.mkdirSync(this.storageDir, { recursive: true });
        if (fs.existsSync(this.logPath)) {
            this.currentSize = fs.statSync(this.logPath).size;
        }
    }

    /**
     * Write a log entry, rotating if necessary
     */
    write(message: string): void {
        const entry = message + '\n';
        const entrySize = Buffer.byteLength(entry, 'utf8');

        if (this.currentSize + entrySize > this.maxBytes) {
            this.rotate();
        }

        fs.appendFileSync(this.logPath, entry, 'utf8');
        this.currentSize += entrySize;
    }

    /**
     * texloom.log -> texloom.log.1 -> texloom.log.2 -> ... -> deleted
     */
    private rotate(): void {
        const oldestBackup = `${this.logPath}.${this.backupCount}`;
        if (fs.existsSync(oldestBackup)) {
            fs.unlinkSync(oldestBackup);
        }

        for (let i = this.backupCount - 1; i >= 1; i--) {
            const src = `${this.logPath}.${i}`;
            if (fs.existsSync(src)) {
                fs.renameSync(src, `${this.logPath}.${i + 1}`);
            }
        }

        if (fs.existsSync(this.logPath)) {
            fs.renameSync(this.logPath, `${this.logPath}.1`);
        }
        this.currentSize = 0;
    }
}

export interface LoggingOptions {
    level?: LogLevel;
    /** Directory for rotating log files; no file output when omitted */
    logDir?: string;
    maxBytes?: number;
    backupCount?: number;
}

/**
 * Global logging state
 */
export class LoggingService {
    private fileHandler: RotatingFileHandler | null = null;
    private configuredLevel: LogLevel = parseLogLevel(process.env.TEXLOOM_LOG_LEVEL);

    /**
     * Apply level and file output settings
     */
    configure(options: LoggingOptions): void {
        if (options.level !== undefined) {
            this.configuredLevel = options.level;
        }
        if (options.logDir) {
            this.fileHandler = new RotatingFileHandler(
                options.logDir,
                'texloom.log',
                options.maxBytes,
                options.backupCount
            );
            this.log(LogLevel.DEBUG, 'Logger', 'Log files location', { path: options.logDir });
        }
    }

    /**
     * Check if a log level should be output
     */
    shouldLog(level: LogLevel): boolean {
        return level >= this.configuredLevel && level !== LogLevel.SILENT;
    }

    private formatMessage(level: LogLevel, module: string, message: string, data?: object): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5);
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        return `[${timestamp}] [${levelStr}] [${module}] ${message}${dataStr}`;
    }

    log(level: LogLevel, module: string, message: string, data?: object): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const formatted = this.formatMessage(level, module, message, data);
        this.fileHandler?.write(formatted);
        console.error(formatted);
    }

    /**
     * Log an error; the stack follows at DEBUG level
     */
    logError(module: string, message: string, error?: Error, data?: object): void {
        this.log(LogLevel.ERROR, module, message, data);

        if (error?.stack && this.shouldLog(LogLevel.DEBUG)) {
            const stackLine = `  Stack: ${error.stack}`;
            this.fileHandler?.write(stackLine);
            console.error(stackLine);
        }
    }
}

// Global singleton instance
const loggingService = new LoggingService();

/**
 * Configure the logging service - call once from the CLI entry point
 */
export function initializeLogging(options: LoggingOptions): void {
    loggingService.configure(options);
}

/**
 * Module-scoped logger for convenient logging
 */
export class Logger {
    constructor(private module: string) {}

    /**
     * Log a debug message (only when log level is DEBUG)
     */
    debug(message: string, data?: object): void {
        loggingService.log(LogLevel.DEBUG, this.module, message, data);
    }

    info(message: string, data?: object): void {
        loggingService.log(LogLevel.INFO, this.module, message, data);
    }

    warn(message: string, data?: object): void {
        loggingService.log(LogLevel.WARN, this.module, message, data);
    }

    /**
     * Log an error message with optional Error object
     */
    error(message: string, error?: Error, data?: object): void {
        loggingService.logError(this.module, message, error, data);
    }

    /**
     * Create a child logger with a sub-module name
     */
    child(subModule: string): Logger {
        return new Logger(`${this.module}:${subModule}`);
    }
}

/**
 * Create a logger for a module
 */
export function createLogger(module: string): Logger {
    return new Logger(module);
}

// Pre-created loggers for common modules
export const converterLogger = createLogger('Converter');
export const manuscriptLogger = createLogger('Manuscript');
export const cliLogger = createLogger('CLI');
