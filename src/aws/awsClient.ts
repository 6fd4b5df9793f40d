import { AppConfig } from '../config/types';
import { PerformanceMetrics } from '../metrics/performanceMetrics';
import { CircuitBreaker, CircuitBreakerConfig, DEFAULT_CIRCUIT_BREAKER_CONFIG } from '../resilience/circuitBreaker';
import { abortable, Clock, SleepFn, sleep as defaultSleep, systemClock } from '../resilience/clock';
import { RateLimiter } from '../resilience/rateLimiter';
import { DEFAULT_RETRY_CONFIG, RetryConfig, withRetry } from '../resilience/retry';
import { isCancelled } from '../utils/errors';
import { Logger } from '../utils/logger';
import { AwsClients } from './clients';

export interface AwsClientOptions {
    limiter: RateLimiter;
    metrics: PerformanceMetrics;
    logger: Logger;
    loadConfig: () => Promise<AppConfig>;
    breakerConfig?: CircuitBreakerConfig;
    retryConfig?: RetryConfig;
    clock?: Clock;
    sleep?: SleepFn;
}

export interface CallOptions {
    signal?: AbortSignal;
    /** Skip the retry engine (mutations the operator confirmed once). */
    noRetry?: boolean;
}

/**
 * Service handles for one (region, profile) plus the circuit breaker,
 * the shared rate limiter and the lazily loaded application config.
 */
export class AwsClient {
    readonly breaker: CircuitBreaker;
    readonly limiter: RateLimiter;
    readonly metrics: PerformanceMetrics;
    readonly logger: Logger;
    private readonly retryConfig: RetryConfig;
    private readonly clock: Clock;
    private readonly sleep: SleepFn;
    private readonly loadConfig: () => Promise<AppConfig>;
    private config: Promise<AppConfig> | null = null;
    private breakerOperation: string | null = null;

    constructor(readonly services: AwsClients, options: AwsClientOptions) {
        this.limiter = options.limiter;
        this.metrics = options.metrics;
        this.logger = options.logger;
        this.loadConfig = options.loadConfig;
        this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
        this.clock = options.clock ?? systemClock;
        this.sleep = options.sleep ?? defaultSleep;
        this.breaker = new CircuitBreaker(options.breakerConfig ?? DEFAULT_CIRCUIT_BREAKER_CONFIG, this.clock);

        const key = `${services.region}:${services.profile}`;
        this.breaker.onStateChange((from, to) => {
            this.logger.warn(`Circuit breaker ${from} -> ${to}`, { client: key, operation: this.breakerOperation });
            if (this.breakerOperation !== null) {
                this.metrics.setCircuitState(this.breakerOperation, to);
            }
        });
    }

    get region(): string {
        return this.services.region;
    }

    get profile(): string {
        return this.services.profile;
    }

    /**
     * Application config, loaded once on first use.
     */
    getConfig(): Promise<AppConfig> {
        if (!this.config) {
            this.config = this.loadConfig();
        }
        return this.config;
    }

    /**
     * Run one AWS call through breaker, rate limiter, retry engine and metrics.
     * Cancellation is not counted against the breaker.
     */
    async call<T>(operation: string, fn: () => Promise<T>, options: CallOptions = {}): Promise<T> {
        const { signal } = options;
        this.withBreaker(operation, () => this.breaker.allow());

        const started = this.clock.now();
        let retries = 0;
        try {
            const attempt = async () => {
                await this.limiter.acquire(1, signal);
                return abortable(fn(), signal);
            };
            const result = options.noRetry
                ? await attempt()
                : await withRetry(attempt, this.retryConfig, {
                    signal,
                    sleep: this.sleep,
                    onRetry: ({ attempt: n, delayMs, error }) => {
                        retries++;
                        this.logger.debug(`Retrying ${operation}`, { attempt: n, delayMs: Math.round(delayMs), error: String(error) });
                    }
                });
            this.withBreaker(operation, () => this.breaker.recordSuccess());
            this.metrics.recordApiCall(operation, this.clock.now() - started, undefined, retries);
            return result;
        } catch (err) {
            if (!isCancelled(err)) {
                this.withBreaker(operation, () => this.breaker.recordFailure());
            }
            this.metrics.recordApiCall(operation, this.clock.now() - started, err, retries);
            throw err;
        }
    }

    //? Breaker transitions fire synchronously, so they are attributed to this operation
    private withBreaker(operation: string, step: () => void): void {
        this.breakerOperation = operation;
        try {
            step();
        } finally {
            this.breakerOperation = null;
        }
    }

    destroy(): void {
        this.services.destroy();
    }
}
