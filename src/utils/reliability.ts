/**
 * Reliability Utilities
 *
 * - Bounded retry with a fixed delay between attempts
 * - Bounded polling at a fixed interval
 *
 * Neither helper backs off.
 */

import { serviceLogger } from './logger.js';

// ============================================
// Types
// ============================================

export interface RetryOptions {
    maxAttempts: number;
    delayMs: number;
    retryOn?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number) => void;
}

export interface PollOptions {
    maxAttempts: number;
    intervalMs: number;
    initialDelayMs?: number;
}

export interface PollResult<T> {
    value: T | null;
    attempts: number;
}

export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise(resolve => setTimeout(resolve, ms));
}

// ============================================
// Retry
// ============================================

/**
 * Execute a function up to `maxAttempts` times, waiting `delayMs` between tries.
 * Errors rejected by `retryOn` are rethrown immediately.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const { maxAttempts, delayMs, retryOn = () => true, onRetry } = options;

    if (maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
    }

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;

            if (attempt >= maxAttempts || !retryOn(error)) {
                throw error;
            }

            onRetry?.(error, attempt);
            serviceLogger.debug({
                attempt,
                maxAttempts,
                delayMs,
            }, 'Retrying after error');

            await sleep(delayMs);
        }
    }

    throw lastError;
}

// ============================================
// Polling
// ============================================

/**
 * Call `probe` until it yields a non-null value or `maxAttempts` probes have run.
 * No sleep follows the final probe. Errors thrown by `probe` propagate.
 */
export async function pollUntil<T>(
    probe: (attempt: number) => Promise<T | null>,
    options: PollOptions
): Promise<PollResult<T>> {
    const { maxAttempts, intervalMs, initialDelayMs = 0 } = options;

    if (maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
    }

    await sleep(initialDelayMs);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const value = await probe(attempt);
        if (value !== null) {
            return { value, attempts: attempt };
        }
        if (attempt < maxAttempts) {
            await sleep(intervalMs);
        }
    }

    return { value: null, attempts: maxAttempts };
}
