/**
 * Resilience Utilities
 *
 * Timeout handling and bounded concurrency for async operations.
 * Used for the external tools (figure scripts, LaTeX) a build drives.
 */

import { createLogger } from './logger';

const log = createLogger('Resilience');

/**
 * Options for timeout behavior
 */
export interface TimeoutOptions {
    /** Timeout in milliseconds */
    timeoutMs: number;
    /** Operation name for error message */
    operationName?: string;
    /** Called once when the timeout fires, e.g. to kill a child process */
    onTimeout?: () => void;
}

/**
 * Error thrown when operation times out
 */
export class TimeoutError extends Error {
    public readonly operationName: string;
    public readonly timeoutMs: number;

    constructor(operationName: string, timeoutMs: number) {
        super(`Operation '${operationName}' timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
        this.operationName = operationName;
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Execute a function with a timeout
 *
 * @throws TimeoutError if operation exceeds timeout
 *
 * @example
 * ```typescript
 * const result = await withTimeout(
 *     () => runScript('plot.py'),
 *     { timeoutMs: 30000, operationName: 'plot.py' }
 * );
 * ```
 */
export async function withTimeout<T>(
    fn: () => Promise<T>,
    options: TimeoutOptions
): Promise<T> {
    const { timeoutMs, operationName = 'operation', onTimeout } = options;

    return new Promise<T>((resolve, reject) => {
        let settled = false;

        const timeoutId = setTimeout(() => {
            if (!settled) {
                settled = true;
                log.warn(`${operationName} timed out after ${timeoutMs}ms`);
                onTimeout?.();
                reject(new TimeoutError(operationName, timeoutMs));
            }
        }, timeoutMs);

        fn()
            .then(result => {
                if (!settled) {
                    settled = true;
                    clearTimeout(timeoutId);
                    resolve(result);
                }
            })
            .catch((error: unknown) => {
                if (!settled) {
                    settled = true;
                    clearTimeout(timeoutId);
                    reject(error);
                }
            });
    });
}

/**
 * Map over items with at most `limit` operations in flight.
 * Results keep the order of the input. The first rejection rejects the
 * whole call once the in-flight operations have settled.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let next = 0;
    const failures: unknown[] = [];

    const worker = async (): Promise<void> => {
        while (next < items.length && failures.length === 0) {
            const index = next++;
            try {
                results[index] = await fn(items[index], index);
            } catch (error) {
                failures.push(error);
            }
        }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.max(1, Math.min(limit, items.length)); i++) {
        workers.push(worker());
    }
    await Promise.all(workers);

    if (failures.length > 0) {
        throw failures[0];
    }
    return results;
}
