/**
 * ================================================================================
 * CLIENT POOL - Pooled AWS Clients per (region, profile)
 * ================================================================================
 *
 * Hands out one AwsClient per `region:profile` key, evicting the least
 * recently used entry at capacity and sweeping idle entries on an interval.
 *
 * //! size never exceeds maxPoolSize
 * //? Each pooled client owns its circuit breaker; the rate limiter is shared
 */

import { ConfigManager } from '../config/configManager';
import { AppConfig } from '../config/types';
import { PerformanceMetrics } from '../metrics/performanceMetrics';
import { CircuitBreakerConfig } from '../resilience/circuitBreaker';
import { Clock, SleepFn, systemClock } from '../resilience/clock';
import { DEFAULT_RATE_LIMIT, RateLimiter, RateLimiterConfig } from '../resilience/rateLimiter';
import { RetryConfig } from '../resilience/retry';
import { Logger } from '../utils/logger';
import { AwsClient } from './awsClient';
import { AwsClientsFactory, createAwsClients, resolveRegionProfile } from './clients';

const DEFAULT_MAX_POOL_SIZE = 50;
const DEFAULT_CLIENT_TTL = 30 * 60 * 1000;          // 30 minutes
const DEFAULT_CLEANUP_INTERVAL = 5 * 60 * 1000;     // 5 minutes

export interface ClientPoolConfig {
    maxPoolSize?: number;
    clientTtlMs?: number;
    cleanupIntervalMs?: number;
    rateLimit?: RateLimiterConfig;
    breaker?: CircuitBreakerConfig;
    retry?: RetryConfig;
}

export interface ClientPoolDeps {
    logger: Logger;
    metrics: PerformanceMetrics;
    factory?: AwsClientsFactory;
    clock?: Clock;
    sleep?: SleepFn;
    loadConfig?: (configPath?: string) => Promise<AppConfig>;
}

export interface ClientPoolStats {
    size: number;
    hits: number;
    misses: number;
    evictions: number;
    creations: number;
    hitRate: number;
}

interface PoolEntry {
    client: AwsClient;
    createdAt: number;
    lastAccess: number;
}

export class ClientPool {
    private entries = new Map<string, PoolEntry>();
    private cleanupTimer: NodeJS.Timeout | null = null;
    private counters = { hits: 0, misses: 0, evictions: 0, creations: 0 };
    private readonly maxPoolSize: number;
    private readonly clientTtlMs: number;
    private readonly cleanupIntervalMs: number;
    private readonly limiter: RateLimiter;
    private readonly factory: AwsClientsFactory;
    private readonly clock: Clock;
    private readonly logger: Logger;
    private readonly loadConfig: (configPath?: string) => Promise<AppConfig>;

    constructor(private readonly config: ClientPoolConfig, private readonly deps: ClientPoolDeps) {
        this.maxPoolSize = Math.max(1, config.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE);
        this.clientTtlMs = config.clientTtlMs ?? DEFAULT_CLIENT_TTL;
        this.cleanupIntervalMs = config.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL;
        this.factory = deps.factory ?? createAwsClients;
        this.clock = deps.clock ?? systemClock;
        this.logger = deps.logger.child('client-pool');
        this.limiter = new RateLimiter(config.rateLimit ?? DEFAULT_RATE_LIMIT, this.clock, deps.sleep);
        this.loadConfig = deps.loadConfig ?? ((configPath) => new ConfigManager(configPath).load());
    }

    /**
     * Get the pooled client for (region, profile), creating it on a miss.
     */
    getOrCreate(region?: string, profile?: string, configPath?: string): AwsClient {
        const resolved = resolveRegionProfile(region, profile);
        const key = `${resolved.region}:${resolved.profile}`;
        const now = this.clock.now();

        const cached = this.entries.get(key);
        if (cached) {
            cached.lastAccess = now;
            this.counters.hits++;
            return cached.client;
        }

        this.counters.misses++;
        if (this.entries.size >= this.maxPoolSize) {
            this.evictLeastRecentlyUsed();
        }

        const client = new AwsClient(this.factory(resolved.region, resolved.profile), {
            limiter: this.limiter,
            metrics: this.deps.metrics,
            logger: this.deps.logger.child('aws'),
            loadConfig: () => this.loadConfig(configPath),
            breakerConfig: this.config.breaker,
            retryConfig: this.config.retry,
            clock: this.clock,
            sleep: this.deps.sleep
        });
        this.entries.set(key, { client, createdAt: now, lastAccess: now });
        this.counters.creations++;
        this.logger.debug('Created AWS client', { key, size: this.entries.size });
        return client;
    }

    private evictLeastRecentlyUsed(): void {
        let lruKey: string | null = null;
        let lruTime = Infinity;

        for (const [key, entry] of this.entries) {
            if (entry.lastAccess < lruTime) {
                lruTime = entry.lastAccess;
                lruKey = key;
            }
        }

        if (lruKey !== null) {
            this.remove(lruKey);
            this.logger.debug('Evicted least recently used client', { key: lruKey });
        }
    }

    private remove(key: string): void {
        const entry = this.entries.get(key);
        if (!entry) return;
        this.entries.delete(key);
        entry.client.destroy();
        this.counters.evictions++;
    }

    /**
     * Remove every client idle for longer than the TTL. Returns the number removed.
     */
    cleanup(): number {
        const now = this.clock.now();
        let removed = 0;
        for (const [key, entry] of [...this.entries]) {
            if (now - entry.lastAccess > this.clientTtlMs) {
                this.remove(key);
                removed++;
            }
        }
        if (removed > 0) {
            this.logger.debug('Cleaned up idle clients', { removed, size: this.entries.size });
        }
        return removed;
    }

    /**
     * Start the periodic idle sweep.
     */
    start(): void {
        if (this.cleanupTimer) return;
        this.cleanupTimer = setInterval(() => this.cleanup(), this.cleanupIntervalMs);
        this.cleanupTimer.unref();
    }

    /**
     * Stop the sweep and destroy every client. Safe to call twice.
     */
    close(): void {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = null;
        }
        for (const entry of this.entries.values()) {
            entry.client.destroy();
        }
        this.entries.clear();
    }

    stats(): ClientPoolStats {
        const lookups = this.counters.hits + this.counters.misses;
        return {
            size: this.entries.size,
            ...this.counters,
            hitRate: lookups > 0 ? (this.counters.hits / lookups) * 100 : 0
        };
    }
}
