/**
 * ================================================================================
 * RATE LIMITER - Token Bucket
 * ================================================================================
 *
 * `burst` tokens of capacity, refilled continuously at `rate` tokens/second.
 * Refill happens lazily on every operation from the injected clock.
 *
 * //? Granted tokens in any window Δ never exceed burst + Δ·rate
 */

import { RateLimitError } from '../utils/errors';
import { Clock, SleepFn, sleep as defaultSleep, systemClock, throwIfAborted } from './clock';

export interface RateLimiterConfig {
    rate: number;     // tokens per second
    burst: number;    // bucket capacity
}

export const DEFAULT_RATE_LIMIT: RateLimiterConfig = {
    rate: 10,
    burst: 20
};

export class RateLimiter {
    private tokens: number;
    private lastRefill: number;
    private readonly rate: number;
    private readonly burst: number;

    constructor(
        config: RateLimiterConfig = DEFAULT_RATE_LIMIT,
        private readonly clock: Clock = systemClock,
        private readonly sleep: SleepFn = defaultSleep
    ) {
        if (config.rate <= 0 || config.burst <= 0) {
            throw new RangeError('rate limiter rate and burst must be positive');
        }
        this.rate = config.rate;
        this.burst = config.burst;
        this.tokens = config.burst;
        this.lastRefill = clock.now();
    }

    private refill(): void {
        const now = this.clock.now();
        const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.burst, this.tokens + elapsedSeconds * this.rate);
        this.lastRefill = now;
    }

    /**
     * Wait until `n` tokens are available, then take them.
     * Rejects only when `signal` aborts.
     */
    async acquire(n = 1, signal?: AbortSignal): Promise<void> {
        for (;;) {
            throwIfAborted(signal);
            this.refill();
            if (this.tokens >= n) {
                this.tokens -= n;
                return;
            }
            const waitMs = ((n - this.tokens) / this.rate) * 1000;
            await this.sleep(waitMs, signal);
        }
    }

    /**
     * Take `n` tokens now or throw a RateLimitError carrying the wait time.
     */
    tryAcquire(n = 1): void {
        this.refill();
        if (this.tokens >= n) {
            this.tokens -= n;
            return;
        }
        const waitMs = ((n - this.tokens) / this.rate) * 1000;
        throw new RateLimitError(waitMs, `insufficient tokens: have ${this.tokens.toFixed(2)}, need ${n.toFixed(2)}`);
    }

    available(): number {
        this.refill();
        return this.tokens;
    }
}
