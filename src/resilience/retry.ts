/**
 * ================================================================================
 * RETRY ENGINE - Exponential Backoff with Classification
 * ================================================================================
 *
 * Attempt k (1-indexed) waits min(maxDelay, baseDelay · multiplier^(k−1)),
 * with ±25% uniform jitter when enabled. Only errors matching a retryable
 * pattern (or classified Throttled / ServiceUnavailable) are retried.
 */

import { errorCode, errorKind, errorMessage, RetryExhaustedError } from '../utils/errors';
import { SleepFn, sleep as defaultSleep, throwIfAborted } from './clock';

export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
    jitter: boolean;
    retryableErrors: string[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 30_000,
    multiplier: 2,
    jitter: true,
    retryableErrors: [
        'Throttling',
        'ThrottlingException',
        'RequestLimitExceeded',
        'ServiceUnavailable',
        'RequestTimeout',
        'RequestTimeoutException'
    ]
};

export interface RetryInfo {
    attempt: number;
    delayMs: number;
    error: unknown;
}

export interface RetryOptions {
    signal?: AbortSignal;
    sleep?: SleepFn;
    random?: () => number;
    onRetry?: (info: RetryInfo) => void;
    label?: string;
}

/**
 * Backoff delay before the retry that follows attempt `attempt`, without jitter.
 */
export function backoffDelay(config: RetryConfig, attempt: number): number {
    return Math.min(config.maxDelayMs, config.baseDelayMs * Math.pow(config.multiplier, attempt - 1));
}

export function applyJitter(delayMs: number, random: () => number = Math.random): number {
    const spread = delayMs / 4;
    return Math.max(0, delayMs + (random() * 2 - 1) * spread);
}

export function isRetryableError(err: unknown, config: RetryConfig = DEFAULT_RETRY_CONFIG): boolean {
    const kind = errorKind(err);
    if (kind === 'Cancelled' || kind === 'CircuitOpen') return false;
    if (kind === 'Throttled' || kind === 'ServiceUnavailable') return true;

    const haystacks = [errorMessage(err), errorCode(err) ?? ''];
    return config.retryableErrors.some((pattern) => haystacks.some((text) => text.includes(pattern)));
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or runs out
 * of attempts. Exhaustion throws RetryExhaustedError wrapping the last error.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG,
    options: RetryOptions = {}
): Promise<T> {
    const sleep = options.sleep ?? defaultSleep;
    const random = options.random ?? Math.random;
    const maxAttempts = Math.max(1, config.maxAttempts);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        throwIfAborted(options.signal);
        try {
            return await fn(attempt);
        } catch (err) {
            lastError = err;
            if (!isRetryableError(err, config)) {
                throw err;
            }
            if (attempt === maxAttempts) {
                break;
            }

            let delayMs = backoffDelay(config, attempt);
            if (config.jitter) {
                delayMs = applyJitter(delayMs, random);
            }
            options.onRetry?.({ attempt, delayMs, error: err });
            await sleep(delayMs, options.signal);
        }
    }

    throw new RetryExhaustedError(maxAttempts, lastError);
}
