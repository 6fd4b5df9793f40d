import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PerformanceMetrics } from '../metrics/performanceMetrics';
import { ManualClock } from '../resilience/clock';
import { silentLogger } from '../testing/fakeAws';
import { cacheFileName, cacheKey, ResourceCache } from './resourceCache';

const TTL_MS = 5 * 60 * 1000;

describe('ResourceCache', () => {
    let dir: string;
    let clock: ManualClock;
    let cache: ResourceCache;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ssm-ops-cache-'));
        clock = new ManualClock(1_700_000_000_000);
        cache = new ResourceCache({ dir, ttlMs: TTL_MS }, { logger: silentLogger(), clock });
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('should return a stored value before the ttl elapses', async () => {
        await cache.set('k1', [{ id: 1 }], 'us-east-1', { filters: [] });
        clock.advance(TTL_MS - 1);

        await expect(cache.get('k1')).resolves.toEqual({ value: [{ id: 1 }], present: true });
    });

    it('should treat an expired entry as absent and delete it', async () => {
        await cache.set('k1', 'v', 'us-east-1', 'q');
        clock.advance(TTL_MS);

        await expect(cache.get('k1')).resolves.toEqual({ value: undefined, present: false });
        await expect(fs.readdir(dir)).resolves.toEqual([]);
    });

    it('should keep sub-second precision for the write time and the ttl', async () => {
        const precise = new ManualClock(1_000_900);
        const shortLived = new ResourceCache({ dir, ttlMs: 1_500 }, { logger: silentLogger(), clock: precise });
        const minute = new ResourceCache({ dir, ttlMs: 60_000 }, { logger: silentLogger(), clock: precise });

        await minute.set('long', 'v', 'us-east-1', 'q');
        await shortLived.set('short', 'v', 'us-east-1', 'q');
        precise.advance(1_100);
        await expect(shortLived.get('short')).resolves.toEqual({ value: 'v', present: true });

        precise.advance(500);
        await expect(shortLived.get('short')).resolves.toEqual({ value: undefined, present: false });

        precise.advance(57_600);
        await expect(minute.get('long')).resolves.toEqual({ value: 'v', present: true });
    });

    it('should report a missing key as absent', async () => {
        await expect(cache.get('nope')).resolves.toEqual({ value: undefined, present: false });
    });

    it('should read a truncated file as absent and remove it on cleanup', async () => {
        await fs.writeFile(path.join(dir, cacheFileName('broken')), '{"region":"us-east-1","query":');

        await expect(cache.get('broken')).resolves.toEqual({ value: undefined, present: false });
        await expect(cache.cleanup()).resolves.toBe(1);
        await expect(fs.readdir(dir)).resolves.toEqual([]);
    });

    it('should treat a file with the wrong shape as absent', async () => {
        await fs.writeFile(path.join(dir, cacheFileName('odd')), JSON.stringify({ hello: 'world' }));

        await expect(cache.get('odd')).resolves.toMatchObject({ present: false });
    });

    it('should treat files over the size limit as absent', async () => {
        const small = new ResourceCache({ dir, ttlMs: TTL_MS, maxFileBytes: 64 }, { logger: silentLogger(), clock });
        await small.set('big', 'x'.repeat(200), 'us-east-1', 'q');

        await expect(small.get('big')).resolves.toMatchObject({ present: false });
    });

    it('should write files with owner-only permissions and leave no temporaries', async () => {
        await cache.set('k1', 'v', 'us-east-1', 'q');

        const names = await fs.readdir(dir);
        expect(names).toEqual([cacheFileName('k1')]);
        const stat = await fs.stat(path.join(dir, names[0]));
        expect(stat.mode & 0o777).toBe(0o600);
    });

    it('should remove only expired and corrupt files on cleanup', async () => {
        await cache.set('old', 'v', 'us-east-1', 'q');
        clock.advance(TTL_MS / 2);
        await cache.set('fresh', 'v', 'us-east-1', 'q');
        clock.advance(TTL_MS / 2);
        await fs.writeFile(path.join(dir, cacheFileName('junk')), 'not json');

        await expect(cache.cleanup()).resolves.toBe(2);
        await expect(cache.get('fresh')).resolves.toMatchObject({ present: true });
    });

    it('should clear json files and stray temporaries', async () => {
        await cache.set('a', 1, 'us-east-1', 'q');
        await cache.set('b', 2, 'us-east-1', 'q');
        await fs.writeFile(path.join(dir, 'leftover.json.tmp'), '{}');

        await expect(cache.clear()).resolves.toBe(3);
        await expect(fs.readdir(dir)).resolves.toEqual([]);
    });

    it('should delete a single key', async () => {
        await cache.set('a', 1, 'us-east-1', 'q');
        await cache.delete('a');
        await cache.delete('a');

        await expect(cache.get('a')).resolves.toMatchObject({ present: false });
    });

    it('should count files and expired files in stats', async () => {
        await cache.set('a', 1, 'us-east-1', 'q');
        clock.advance(TTL_MS);
        await cache.set('b', 2, 'us-east-1', 'q');

        const stats = await cache.stats();
        expect(stats.totalFiles).toBe(2);
        expect(stats.expiredFiles).toBe(1);
        expect(stats.totalBytes).toBeGreaterThan(0);
    });

    it('should report empty stats for a missing directory', async () => {
        const missing = new ResourceCache({ dir: path.join(dir, 'absent'), ttlMs: TTL_MS }, { logger: silentLogger(), clock });
        await expect(missing.stats()).resolves.toEqual({ totalFiles: 0, expiredFiles: 0, totalBytes: 0 });
    });

    it('should record hits and misses', async () => {
        const metrics = new PerformanceMetrics(true);
        const counted = new ResourceCache({ dir, ttlMs: TTL_MS }, { logger: silentLogger(), clock, metrics });
        await counted.set('a', 1, 'us-east-1', 'q');

        await counted.get('a');
        await counted.get('b');

        expect(metrics.summary()).toMatchObject({ cacheHits: 1, cacheMisses: 1, cacheHitRate: 50 });
    });
});

describe('cacheKey', () => {
    it('should be stable for equal queries and differ across regions', () => {
        const query = { filters: ['tag:Env=prod'] };
        expect(cacheKey('us-east-1', query)).toBe(cacheKey('us-east-1', { filters: ['tag:Env=prod'] }));
        expect(cacheKey('us-east-1', query)).not.toBe(cacheKey('us-west-2', query));
        expect(cacheKey('us-east-1', query)).toMatch(/^instances_us-east-1_[0-9a-f]{16}$/);
    });
});
