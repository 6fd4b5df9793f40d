import { Logger } from '../utils/logger';
import { PerformanceMetrics } from './performanceMetrics';

export const DEFAULT_COLLECT_INTERVAL_MS = 60_000;

/**
 * Periodically logs the metrics summary as an info-level METRICS step; the
 * per-operation breakdown goes to debug.
 */
export class MetricsCollector {
    private timer: NodeJS.Timeout | null = null;

    constructor(
        private readonly metrics: PerformanceMetrics,
        private readonly logger: Logger,
        private readonly intervalMs: number = DEFAULT_COLLECT_INTERVAL_MS
    ) {}

    start(): void {
        if (!this.metrics.enabled || this.timer) return;

        this.logger.debug('Starting metrics collector', { intervalMs: this.intervalMs });
        this.timer = setInterval(() => this.logSummary(), this.intervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            this.logger.debug('Stopped metrics collector');
        }
    }

    isRunning(): boolean {
        return this.timer !== null;
    }

    logSummary(): void {
        if (!this.metrics.enabled) return;

        const summary = this.metrics.summary();
        this.logger.step('METRICS', 'Performance metrics summary', {
            totalCalls: summary.totalCalls,
            successes: summary.totalSuccesses,
            failures: summary.totalFailures,
            retries: summary.totalRetries,
            successRate: Number(summary.successRate.toFixed(2)),
            avgMs: Math.round(summary.avgMs),
            cacheHits: summary.cacheHits,
            cacheMisses: summary.cacheMisses,
            cacheHitRate: Number(summary.cacheHitRate.toFixed(2)),
            memoryUsageMb: Math.round(summary.memoryUsageBytes / (1024 * 1024))
        });

        for (const [operation, op] of Object.entries(summary.operations)) {
            this.logger.debug('API operation', {
                operation,
                calls: op.calls,
                failures: op.failures,
                avgMs: Math.round(op.avgMs),
                minMs: op.minMs,
                maxMs: op.maxMs
            });
        }
    }
}
