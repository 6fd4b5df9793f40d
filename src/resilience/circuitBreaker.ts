/**
 * ================================================================================
 * CIRCUIT BREAKER - Three-State Fault Isolation
 * ================================================================================
 *
 * STATES:
 * • closed    - calls pass; `failureThreshold` consecutive failures open it
 * • open      - calls fail fast until `resetTimeoutMs` has passed since the
 *               last failure, then the breaker moves to half_open
 * • half_open - at most `halfOpenMaxCalls` trial calls; that many successes
 *               close it, any failure re-opens it
 *
 * //! One breaker per pooled client, never global
 */

import { CircuitOpenError } from '../utils/errors';
import { Clock, systemClock } from './clock';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
    failureThreshold: number;
    resetTimeoutMs: number;
    halfOpenMaxCalls: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
    failureThreshold: 5,
    resetTimeoutMs: 60_000,
    halfOpenMaxCalls: 3
};

export interface CircuitBreakerMetrics {
    state: CircuitState;
    failureCount: number;
    successCount: number;
    halfOpenCalls: number;
    lastFailureAt: number | null;
}

export type StateChangeListener = (from: CircuitState, to: CircuitState) => void;

export class CircuitBreaker {
    private currentState: CircuitState = 'closed';
    private failureCount = 0;
    private successCount = 0;
    private halfOpenCalls = 0;
    private lastFailureAt: number | null = null;
    private listeners: StateChangeListener[] = [];

    constructor(
        private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
        private readonly clock: Clock = systemClock
    ) {}

    get state(): CircuitState {
        return this.currentState;
    }

    onStateChange(listener: StateChangeListener): void {
        this.listeners.push(listener);
    }

    private transition(to: CircuitState): void {
        const from = this.currentState;
        if (from === to) return;
        this.currentState = to;
        for (const listener of this.listeners) {
            listener(from, to);
        }
    }

    /**
     * Ask permission for one call. Throws CircuitOpenError when refused.
     */
    allow(): void {
        for (;;) {
            switch (this.currentState) {
                case 'closed':
                    return;

                case 'open': {
                    const since = this.clock.now() - (this.lastFailureAt ?? 0);
                    if (since > this.config.resetTimeoutMs) {
                        this.halfOpenCalls = 0;
                        this.successCount = 0;
                        this.transition('half_open');
                        continue;
                    }
                    throw new CircuitOpenError('circuit breaker is open', this.config.resetTimeoutMs - since);
                }

                case 'half_open':
                    if (this.halfOpenCalls >= this.config.halfOpenMaxCalls) {
                        throw new CircuitOpenError('circuit breaker half-open limit exceeded', 0);
                    }
                    this.halfOpenCalls++;
                    return;
            }
        }
    }

    recordSuccess(): void {
        if (this.currentState === 'half_open') {
            this.successCount++;
            if (this.successCount >= this.config.halfOpenMaxCalls) {
                this.failureCount = 0;
                this.successCount = 0;
                this.halfOpenCalls = 0;
                this.transition('closed');
            }
            return;
        }
        this.failureCount = 0;
    }

    recordFailure(): void {
        if (this.currentState === 'half_open') {
            this.lastFailureAt = this.clock.now();
            this.transition('open');
            return;
        }

        this.failureCount++;
        if (this.currentState === 'closed' && this.failureCount >= this.config.failureThreshold) {
            this.lastFailureAt = this.clock.now();
            this.transition('open');
        }
    }

    /**
     * allow → fn → record outcome.
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        this.allow();
        try {
            const result = await fn();
            this.recordSuccess();
            return result;
        } catch (err) {
            this.recordFailure();
            throw err;
        }
    }

    metrics(): CircuitBreakerMetrics {
        return {
            state: this.currentState,
            failureCount: this.failureCount,
            successCount: this.successCount,
            halfOpenCalls: this.halfOpenCalls,
            lastFailureAt: this.lastFailureAt
        };
    }
}
