/**
 * ================================================================================
 * PERFORMANCE METRICS - AWS Call Accounting
 * ================================================================================
 *
 * Per-operation counters (calls, successes, failures, retries), latency
 * summary and histogram, cache hit/miss counters, a memory gauge and the
 * circuit state seen by each operation.
 *
 * //! Disabled instances (metrics gate off) do nothing at all
 * //? Built once at startup and passed down; tests build a fresh instance
 */

import { Clock, systemClock } from '../resilience/clock';
import { CircuitState } from '../resilience/circuitBreaker';
import { errorMessage } from '../utils/errors';

/**
 * Upper bounds in milliseconds; the last bucket is unbounded.
 */
export const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 75, 100, 250, 500, 750, 1000, 2500, 5000, 7500, 10000, Infinity];

export interface ApiMetricsSummary {
    calls: number;
    successes: number;
    failures: number;
    retries: number;
    totalMs: number;
    avgMs: number;
    minMs: number;
    maxMs: number;
    lastCallAt: number | null;
    lastError: string;
    circuitOpen: boolean;
    /** Cumulative counts per bucket of LATENCY_BUCKETS_MS. */
    histogram: number[];
}

export interface MetricsSummary {
    totalCalls: number;
    totalSuccesses: number;
    totalFailures: number;
    totalRetries: number;
    totalMs: number;
    avgMs: number;
    successRate: number;
    cacheHits: number;
    cacheMisses: number;
    cacheHitRate: number;
    memoryUsageBytes: number;
    lastResetAt: number;
    operations: Record<string, ApiMetricsSummary>;
}

function emptyApiMetrics(): ApiMetricsSummary {
    return {
        calls: 0,
        successes: 0,
        failures: 0,
        retries: 0,
        totalMs: 0,
        avgMs: 0,
        minMs: 0,
        maxMs: 0,
        lastCallAt: null,
        lastError: '',
        circuitOpen: false,
        histogram: LATENCY_BUCKETS_MS.map(() => 0)
    };
}

export class PerformanceMetrics {
    private operations = new Map<string, ApiMetricsSummary>();
    private totals = { calls: 0, successes: 0, failures: 0, retries: 0, totalMs: 0 };
    private cacheHits = 0;
    private cacheMisses = 0;
    private memoryUsageBytes = 0;
    private lastResetAt: number;

    constructor(
        readonly enabled: boolean,
        private readonly clock: Clock = systemClock
    ) {
        this.lastResetAt = clock.now();
    }

    private entry(operation: string): ApiMetricsSummary {
        let metrics = this.operations.get(operation);
        if (!metrics) {
            metrics = emptyApiMetrics();
            this.operations.set(operation, metrics);
        }
        return metrics;
    }

    recordApiCall(operation: string, durationMs: number, error?: unknown, retries = 0): void {
        if (!this.enabled) return;

        const metrics = this.entry(operation);
        metrics.minMs = metrics.calls === 0 ? durationMs : Math.min(metrics.minMs, durationMs);
        metrics.maxMs = metrics.calls === 0 ? durationMs : Math.max(metrics.maxMs, durationMs);
        metrics.calls++;
        metrics.totalMs += durationMs;
        metrics.avgMs = metrics.totalMs / metrics.calls;
        metrics.lastCallAt = this.clock.now();
        metrics.retries += Math.max(0, retries);
        LATENCY_BUCKETS_MS.forEach((bound, index) => {
            if (durationMs <= bound) {
                metrics.histogram[index]++;
            }
        });

        if (error === undefined) {
            metrics.successes++;
            metrics.lastError = '';
            this.totals.successes++;
        } else {
            metrics.failures++;
            metrics.lastError = errorMessage(error);
            this.totals.failures++;
        }

        this.totals.calls++;
        this.totals.totalMs += durationMs;
        this.totals.retries += Math.max(0, retries);
    }

    /**
     * Time `fn` and record it under `operation`.
     */
    async instrument<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        if (!this.enabled) return fn();

        const started = this.clock.now();
        try {
            const result = await fn();
            this.recordApiCall(operation, this.clock.now() - started);
            return result;
        } catch (err) {
            this.recordApiCall(operation, this.clock.now() - started, err);
            throw err;
        }
    }

    recordCacheHit(): void {
        if (this.enabled) this.cacheHits++;
    }

    recordCacheMiss(): void {
        if (this.enabled) this.cacheMisses++;
    }

    recordMemoryUsage(bytes: number): void {
        if (this.enabled) this.memoryUsageBytes = bytes;
    }

    setCircuitState(operation: string, state: CircuitState): void {
        if (!this.enabled) return;
        this.entry(operation).circuitOpen = state === 'open';
    }

    apiMetrics(operation: string): ApiMetricsSummary | undefined {
        if (!this.enabled) return undefined;
        const metrics = this.operations.get(operation);
        return metrics ? { ...metrics, histogram: [...metrics.histogram] } : undefined;
    }

    summary(): MetricsSummary {
        const cacheAccesses = this.cacheHits + this.cacheMisses;
        const operations: Record<string, ApiMetricsSummary> = {};
        if (this.enabled) {
            for (const [name, metrics] of this.operations) {
                operations[name] = { ...metrics, histogram: [...metrics.histogram] };
            }
        }

        return {
            totalCalls: this.totals.calls,
            totalSuccesses: this.totals.successes,
            totalFailures: this.totals.failures,
            totalRetries: this.totals.retries,
            totalMs: this.totals.totalMs,
            avgMs: this.totals.calls > 0 ? this.totals.totalMs / this.totals.calls : 0,
            successRate: this.totals.calls > 0 ? (this.totals.successes / this.totals.calls) * 100 : 0,
            cacheHits: this.cacheHits,
            cacheMisses: this.cacheMisses,
            cacheHitRate: cacheAccesses > 0 ? (this.cacheHits / cacheAccesses) * 100 : 0,
            memoryUsageBytes: this.memoryUsageBytes,
            lastResetAt: this.lastResetAt,
            operations
        };
    }

    reset(): void {
        if (!this.enabled) return;
        this.operations.clear();
        this.totals = { calls: 0, successes: 0, failures: 0, retries: 0, totalMs: 0 };
        this.cacheHits = 0;
        this.cacheMisses = 0;
        this.memoryUsageBytes = 0;
        this.lastResetAt = this.clock.now();
    }
}
