/**
 * Retry and Polling Helper Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { pollUntil, sleep, withRetry } from '../src/utils/reliability.js';

describe('Reliability helpers', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    describe('withRetry', () => {
        it('should return the first successful result', async () => {
            const fn = vi.fn().mockResolvedValue('done');
            await expect(withRetry(fn, { maxAttempts: 3, delayMs: 0 })).resolves.toBe('done');
            expect(fn).toHaveBeenCalledTimes(1);
            expect(fn).toHaveBeenCalledWith(1);
        });

        it('should retry until success within the bound', async () => {
            const fn = vi.fn()
                .mockRejectedValueOnce(new Error('network down'))
                .mockRejectedValueOnce(new Error('network down'))
                .mockResolvedValueOnce('done');
            const onRetry = vi.fn();

            await expect(withRetry(fn, { maxAttempts: 3, delayMs: 0, onRetry })).resolves.toBe('done');
            expect(fn).toHaveBeenCalledTimes(3);
            expect(onRetry).toHaveBeenCalledTimes(2);
            expect(onRetry).toHaveBeenLastCalledWith(expect.any(Error), 2);
        });

        it('should rethrow the last error once attempts are exhausted', async () => {
            const fn = vi.fn()
                .mockRejectedValueOnce(new Error('first'))
                .mockRejectedValueOnce(new Error('second'));

            await expect(withRetry(fn, { maxAttempts: 2, delayMs: 0 })).rejects.toThrow('second');
            expect(fn).toHaveBeenCalledTimes(2);
        });

        it('should stop immediately when retryOn rejects the error', async () => {
            const fn = vi.fn().mockRejectedValue(new Error('forbidden'));
            await expect(withRetry(fn, { maxAttempts: 5, delayMs: 0, retryOn: () => false }))
                .rejects.toThrow('forbidden');
            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should wait the same fixed delay between every attempt', async () => {
            vi.useFakeTimers();
            const fn = vi.fn()
                .mockRejectedValueOnce(new Error('a'))
                .mockRejectedValueOnce(new Error('b'))
                .mockResolvedValueOnce('done');

            const pending = withRetry(fn, { maxAttempts: 3, delayMs: 1000 });

            await vi.advanceTimersByTimeAsync(999);
            expect(fn).toHaveBeenCalledTimes(1);
            await vi.advanceTimersByTimeAsync(1);
            expect(fn).toHaveBeenCalledTimes(2);
            await vi.advanceTimersByTimeAsync(1000);
            expect(fn).toHaveBeenCalledTimes(3);
            await expect(pending).resolves.toBe('done');
        });

        it('should refuse a zero attempt budget', async () => {
            await expect(withRetry(async () => 'x', { maxAttempts: 0, delayMs: 0 }))
                .rejects.toThrow(RangeError);
        });
    });

    describe('pollUntil', () => {
        it('should return the first non-null value with its attempt number', async () => {
            const probe = vi.fn()
                .mockResolvedValueOnce(null)
                .mockResolvedValueOnce(null)
                .mockResolvedValueOnce('found');

            await expect(pollUntil(probe, { maxAttempts: 5, intervalMs: 0 }))
                .resolves.toEqual({ value: 'found', attempts: 3 });
            expect(probe).toHaveBeenCalledTimes(3);
        });

        it('should give up after maxAttempts probes', async () => {
            const probe = vi.fn().mockResolvedValue(null);
            await expect(pollUntil(probe, { maxAttempts: 4, intervalMs: 0 }))
                .resolves.toEqual({ value: null, attempts: 4 });
            expect(probe).toHaveBeenCalledTimes(4);
        });

        it('should propagate probe errors without further attempts', async () => {
            const probe = vi.fn().mockRejectedValue(new Error('access denied'));
            await expect(pollUntil(probe, { maxAttempts: 4, intervalMs: 0 })).rejects.toThrow('access denied');
            expect(probe).toHaveBeenCalledTimes(1);
        });

        it('should wait the initial delay, then the interval between probes only', async () => {
            vi.useFakeTimers();
            const probe = vi.fn().mockResolvedValue(null);

            const pending = pollUntil(probe, { maxAttempts: 3, intervalMs: 500, initialDelayMs: 2000 });

            await vi.advanceTimersByTimeAsync(1999);
            expect(probe).not.toHaveBeenCalled();
            await vi.advanceTimersByTimeAsync(1);
            expect(probe).toHaveBeenCalledTimes(1);
            await vi.advanceTimersByTimeAsync(500);
            expect(probe).toHaveBeenCalledTimes(2);
            await vi.advanceTimersByTimeAsync(500);
            expect(probe).toHaveBeenCalledTimes(3);

            // no trailing sleep after the last probe
            await expect(pending).resolves.toEqual({ value: null, attempts: 3 });
            expect(vi.getTimerCount()).toBe(0);
        });
    });

    describe('sleep', () => {
        it('should resolve immediately for non-positive durations', async () => {
            vi.useFakeTimers();
            await expect(sleep(0)).resolves.toBeUndefined();
            expect(vi.getTimerCount()).toBe(0);
        });
    });
});
