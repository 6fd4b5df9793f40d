/**
 * ================================================================================
 * RESOURCE CACHE - On-disk TTL Cache
 * ================================================================================
 *
 * One JSON file per key in the cache directory, named by the SHA-256 of the
 * key. Writes go to `<name>.tmp`, are fsynced, then renamed into place.
 *
 * FILE BODY:
 *   { region, query, created_at_unix, ttl_seconds, payload }
 *
 * //! get() never throws: unreadable, oversized or malformed files read as absent
 * //! and are removed on the next cleanup()
 * //? Directory mode 0700, file mode 0600
 */

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { PerformanceMetrics } from '../metrics/performanceMetrics';
import { Clock, systemClock } from '../resilience/clock';
import { Logger } from '../utils/logger';

export const DEFAULT_MAX_FILE_BYTES = 10 * 1024 * 1024;

const entrySchema = z.object({
    region: z.string(),
    query: z.string(),
    created_at_unix: z.number(),
    ttl_seconds: z.number().nonnegative(),
    payload: z.unknown()
});

export type CacheEntry = z.infer<typeof entrySchema>;

export interface CacheLookup {
    value: unknown;
    present: boolean;
}

export interface CacheStats {
    totalFiles: number;
    expiredFiles: number;
    totalBytes: number;
}

export interface ResourceCacheOptions {
    dir: string;
    ttlMs: number;
    maxFileBytes?: number;
}

export interface ResourceCacheDeps {
    logger: Logger;
    clock?: Clock;
    metrics?: PerformanceMetrics;
}

const sha256 = (text: string): string => createHash('sha256').update(text).digest('hex');

/**
 * Cache key for an instance query in a region.
 */
export function cacheKey(region: string, query: unknown): string {
    return `instances_${region}_${sha256(JSON.stringify(query) ?? '').slice(0, 16)}`;
}

export function cacheFileName(key: string): string {
    return `${sha256(key)}.json`;
}

type ReadResult =
    | { status: 'missing' }
    | { status: 'corrupt'; reason: string }
    | { status: 'ok'; entry: CacheEntry };

export class ResourceCache {
    private readonly dir: string;
    private readonly ttlMs: number;
    private readonly maxFileBytes: number;
    private readonly clock: Clock;
    private readonly logger: Logger;
    private readonly metrics?: PerformanceMetrics;
    private readonly pendingRemoval = new Set<string>();

    constructor(options: ResourceCacheOptions, deps: ResourceCacheDeps) {
        this.dir = options.dir;
        this.ttlMs = options.ttlMs;
        this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
        this.clock = deps.clock ?? systemClock;
        this.logger = deps.logger.child('cache');
        this.metrics = deps.metrics;
    }

    getDir(): string {
        return this.dir;
    }

    private filePath(key: string): string {
        return path.join(this.dir, cacheFileName(key));
    }

    private isExpired(entry: CacheEntry): boolean {
        const ageMs = this.clock.now() - entry.created_at_unix * 1000;
        return ageMs >= entry.ttl_seconds * 1000;
    }

    private async readEntry(file: string): Promise<ReadResult> {
        let raw: string;
        try {
            const stat = await fs.stat(file);
            if (stat.size > this.maxFileBytes) {
                return { status: 'corrupt', reason: `file too large (${stat.size} bytes)` };
            }
            raw = await fs.readFile(file, 'utf-8');
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT') {
                return { status: 'missing' };
            }
            return { status: 'corrupt', reason: String(err) };
        }

        let document: unknown;
        try {
            document = JSON.parse(raw);
        } catch {
            return { status: 'corrupt', reason: 'invalid JSON' };
        }

        const parsed = entrySchema.safeParse(document);
        return parsed.success
            ? { status: 'ok', entry: parsed.data }
            : { status: 'corrupt', reason: 'unexpected entry shape' };
    }

    async get(key: string): Promise<CacheLookup> {
        const file = this.filePath(key);
        const result = await this.readEntry(file);

        if (result.status === 'ok' && !this.isExpired(result.entry)) {
            this.metrics?.recordCacheHit();
            return { value: result.entry.payload, present: true };
        }

        this.metrics?.recordCacheMiss();
        if (result.status === 'corrupt') {
            this.logger.debug('Ignoring unreadable cache file', { file, reason: result.reason });
            this.pendingRemoval.add(file);
        } else if (result.status === 'ok') {
            await this.removeFile(file);
        }
        return { value: undefined, present: false };
    }

    async set(key: string, value: unknown, region: string, query: unknown): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });

        const entry: CacheEntry = {
            region,
            query: typeof query === 'string' ? query : JSON.stringify(query) ?? '',
            created_at_unix: this.clock.now() / 1000,
            ttl_seconds: this.ttlMs / 1000,
            payload: value
        };

        const file = this.filePath(key);
        const tmp = `${file}.tmp`;
        const handle = await fs.open(tmp, 'w', 0o600);
        try {
            await handle.writeFile(JSON.stringify(entry));
            await handle.sync();
        } finally {
            await handle.close();
        }
        await fs.rename(tmp, file);
        this.pendingRemoval.delete(file);
    }

    async delete(key: string): Promise<void> {
        await this.removeFile(this.filePath(key));
    }

    private async removeFile(file: string): Promise<boolean> {
        try {
            await fs.unlink(file);
            return true;
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT') return false;
            throw err;
        }
    }

    private async listFiles(): Promise<string[]> {
        try {
            return await fs.readdir(this.dir);
        } catch (err) {
            if (isErrnoException(err) && err.code === 'ENOENT') return [];
            throw err;
        }
    }

    /**
     * Remove every cache file, including stray temporaries. Returns the number removed.
     */
    async clear(): Promise<number> {
        let removed = 0;
        for (const name of await this.listFiles()) {
            if (name.endsWith('.json') || name.endsWith('.tmp')) {
                if (await this.removeFile(path.join(this.dir, name))) removed++;
            }
        }
        this.pendingRemoval.clear();
        return removed;
    }

    /**
     * Remove expired, corrupt and previously flagged files. Returns the number removed.
     */
    async cleanup(): Promise<number> {
        let removed = 0;
        for (const name of await this.listFiles()) {
            if (!name.endsWith('.json')) continue;
            const file = path.join(this.dir, name);

            let stale = this.pendingRemoval.has(file);
            if (!stale) {
                const result = await this.readEntry(file);
                stale = result.status === 'corrupt' || (result.status === 'ok' && this.isExpired(result.entry));
            }
            if (stale && await this.removeFile(file)) {
                removed++;
            }
        }
        this.pendingRemoval.clear();

        if (removed > 0) {
            this.logger.debug('Cache cleanup removed files', { removed });
        }
        return removed;
    }

    async stats(): Promise<CacheStats> {
        const stats: CacheStats = { totalFiles: 0, expiredFiles: 0, totalBytes: 0 };
        for (const name of await this.listFiles()) {
            if (!name.endsWith('.json')) continue;
            const file = path.join(this.dir, name);
            try {
                const stat = await fs.stat(file);
                stats.totalFiles++;
                stats.totalBytes += stat.size;
            } catch (err) {
                if (isErrnoException(err) && err.code === 'ENOENT') continue;
                throw err;
            }
            const result = await this.readEntry(file);
            if (result.status !== 'ok' || this.isExpired(result.entry)) {
                stats.expiredFiles++;
            }
        }
        return stats;
    }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
