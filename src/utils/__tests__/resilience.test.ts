/**
 * Tests for resilience utilities (timeout, bounded concurrency)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Mock the logger
vi.mock('../logger', () => ({
    createLogger: () => ({
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    })
}));

import { withTimeout, mapWithConcurrency, TimeoutError } from '../resilience';

describe('withTimeout', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should return the result when the operation finishes in time', async () => {
        const result = await withTimeout(() => Promise.resolve('done'), { timeoutMs: 1000 });
        expect(result).toBe('done');
    });

    it('should reject with TimeoutError and call onTimeout once', async () => {
        const onTimeout = vi.fn();
        const pending = withTimeout(() => new Promise<string>(() => undefined), {
            timeoutMs: 1000,
            operationName: 'plot.py',
            onTimeout
        });
        const assertion = expect(pending).rejects.toThrow("Operation 'plot.py' timed out after 1000ms");

        await vi.advanceTimersByTimeAsync(1000);
        await assertion;
        expect(onTimeout).toHaveBeenCalledTimes(1);
    });

    it('should pass through errors from the operation', async () => {
        const failing = withTimeout(() => Promise.reject(new Error('boom')), { timeoutMs: 1000 });
        await expect(failing).rejects.toThrow('boom');
    });

    it('should expose the operation on the error', () => {
        const error = new TimeoutError('pdflatex', 500);
        expect(error.name).toBe('TimeoutError');
        expect(error.operationName).toBe('pdflatex');
        expect(error.timeoutMs).toBe(500);
    });
});

describe('mapWithConcurrency', () => {
    it('should keep input order in the results', async () => {
        const delays = [30, 10, 20];
        const results = await mapWithConcurrency(delays, 2, delay =>
            new Promise<number>(resolve => setTimeout(() => resolve(delay), delay))
        );
        expect(results).toEqual([30, 10, 20]);
    });

    it('should never run more than the limit at once', async () => {
        let active = 0;
        let peak = 0;
        await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
            active++;
            peak = Math.max(peak, active);
            await new Promise(resolve => setTimeout(resolve, 5));
            active--;
        });
        expect(peak).toBe(2);
    });

    it('should reject with the first failure', async () => {
        const run = mapWithConcurrency(['a', 'b', 'c'], 1, async item => {
            if (item === 'b') throw new Error('failed b');
            return item;
        });
        await expect(run).rejects.toThrow('failed b');
    });

    it('should handle an empty list', async () => {
        expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
    });
});
