import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from './rateLimiter';
import { ManualClock } from './clock';
import { RateLimitError } from '../utils/errors';

describe('RateLimiter', () => {
    it('should grant the burst immediately and then report the wait time', () => {
        const clock = new ManualClock(1_000);
        const limiter = new RateLimiter({ rate: 10, burst: 2 }, clock);

        limiter.tryAcquire(1);
        limiter.tryAcquire(1);

        let caught: unknown;
        try {
            limiter.tryAcquire(1);
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(RateLimitError);
        const rateErr = caught as RateLimitError;
        expect(rateErr.waitMs).toBeCloseTo(100, 5);
        expect(rateErr.reason).toBe('insufficient tokens: have 0.00, need 1.00');
        expect(rateErr.kind).toBe('Throttled');
    });

    it('should refill tokens with elapsed time without exceeding the burst', () => {
        const clock = new ManualClock(0);
        const limiter = new RateLimiter({ rate: 10, burst: 2 }, clock);

        limiter.tryAcquire(2);
        clock.advance(50);
        expect(limiter.available()).toBeCloseTo(0.5, 5);

        clock.advance(10_000);
        expect(limiter.available()).toBe(2);
    });

    it('should never grant more than burst + elapsed * rate tokens', () => {
        const clock = new ManualClock(0);
        const limiter = new RateLimiter({ rate: 5, burst: 3 }, clock);
        let granted = 0;

        for (let step = 0; step < 100; step++) {
            try {
                limiter.tryAcquire(1);
                granted++;
            } catch {
                // refused
            }
            clock.advance(20);
        }

        // 100 steps of 20ms = 2s window
        expect(granted).toBeLessThanOrEqual(3 + 2 * 5);
    });

    it('should wait in acquire until enough tokens have been refilled', async () => {
        const clock = new ManualClock(0);
        const sleep = vi.fn(async (ms: number) => {
            clock.advance(ms);
        });
        const limiter = new RateLimiter({ rate: 10, burst: 1 }, clock, sleep);

        await limiter.acquire(1);
        await limiter.acquire(1);

        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep.mock.calls[0][0]).toBeCloseTo(100, 5);
    });

    it('should reject acquire with Cancelled when the signal is aborted', async () => {
        const clock = new ManualClock(0);
        const limiter = new RateLimiter({ rate: 1, burst: 1 }, clock);
        const controller = new AbortController();
        limiter.tryAcquire(1);
        controller.abort();

        await expect(limiter.acquire(1, controller.signal)).rejects.toMatchObject({ kind: 'Cancelled' });
    });
});
