import { describe, it, expect } from 'vitest';
import { CircuitBreaker } from './circuitBreaker';
import { ManualClock } from './clock';
import { CircuitOpenError } from '../utils/errors';

function breaker(clock: ManualClock): CircuitBreaker {
    return new CircuitBreaker({ failureThreshold: 3, resetTimeoutMs: 1_000, halfOpenMaxCalls: 2 }, clock);
}

describe('CircuitBreaker', () => {
    it('should open after the failure threshold is reached', () => {
        const clock = new ManualClock(0);
        const cb = breaker(clock);

        cb.recordFailure();
        cb.recordFailure();
        expect(cb.state).toBe('closed');
        cb.recordFailure();
        expect(cb.state).toBe('open');
        expect(() => cb.allow()).toThrow('circuit breaker is open');
    });

    it('should reset the failure count on success while closed', () => {
        const cb = breaker(new ManualClock(0));

        cb.recordFailure();
        cb.recordFailure();
        cb.recordSuccess();
        cb.recordFailure();
        cb.recordFailure();

        expect(cb.state).toBe('closed');
        expect(cb.metrics().failureCount).toBe(2);
    });

    it('should report the remaining wait in the open error', () => {
        const clock = new ManualClock(10_000);
        const cb = breaker(clock);
        cb.recordFailure();
        cb.recordFailure();
        cb.recordFailure();
        clock.advance(400);

        let caught: unknown;
        try {
            cb.allow();
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(CircuitOpenError);
        expect((caught as CircuitOpenError).retryAfterMs).toBe(600);
    });

    it('should move to half_open after the reset timeout and close after enough successes', () => {
        const clock = new ManualClock(0);
        const cb = breaker(clock);
        cb.recordFailure();
        cb.recordFailure();
        cb.recordFailure();

        clock.advance(1_001);
        cb.allow();
        expect(cb.state).toBe('half_open');
        cb.recordSuccess();
        cb.allow();
        cb.recordSuccess();

        expect(cb.state).toBe('closed');
        expect(cb.metrics()).toEqual({
            state: 'closed',
            failureCount: 0,
            successCount: 0,
            halfOpenCalls: 0,
            lastFailureAt: 0
        });
    });

    it('should limit concurrent trial calls in half_open', () => {
        const clock = new ManualClock(0);
        const cb = breaker(clock);
        cb.recordFailure();
        cb.recordFailure();
        cb.recordFailure();
        clock.advance(2_000);

        cb.allow();
        cb.allow();
        expect(() => cb.allow()).toThrow('circuit breaker half-open limit exceeded');
    });

    it('should re-open on any failure in half_open', () => {
        const clock = new ManualClock(0);
        const cb = breaker(clock);
        cb.recordFailure();
        cb.recordFailure();
        cb.recordFailure();
        clock.advance(1_500);
        cb.allow();

        cb.recordFailure();

        expect(cb.state).toBe('open');
        expect(cb.metrics().lastFailureAt).toBe(1_500);
    });

    it('should notify state change listeners', () => {
        const clock = new ManualClock(0);
        const cb = breaker(clock);
        const transitions: string[] = [];
        cb.onStateChange((from, to) => transitions.push(`${from}->${to}`));

        cb.recordFailure();
        cb.recordFailure();
        cb.recordFailure();
        clock.advance(1_001);
        cb.allow();

        expect(transitions).toEqual(['closed->open', 'open->half_open']);
    });

    it('should record outcomes through execute', async () => {
        const cb = breaker(new ManualClock(0));

        await expect(cb.execute(async () => 'ok')).resolves.toBe('ok');
        await expect(cb.execute(async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(cb.metrics().failureCount).toBe(1);
    });
});
