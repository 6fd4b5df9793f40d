import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Instance as Ec2Instance } from '@aws-sdk/client-ec2';
import { cacheKey, ResourceCache } from '../../cache/resourceCache';
import { ManualClock } from '../../resilience/clock';
import { ec2Instance, fakeAwsClient, fakeDescribeInstances, silentLogger } from '../../testing/fakeAws';
import { CachedInstanceLoader, LiveInstanceLoader, ProvidedLoader } from './loaders';

const RUNNING = [{ name: 'instance-state-name', values: ['running'] }];

describe('CachedInstanceLoader', () => {
    let dir: string;
    let cache: ResourceCache;
    let fleet: Ec2Instance[];

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ssm-ops-loader-'));
        cache = new ResourceCache({ dir, ttlMs: 5 * 60 * 1000 }, { logger: silentLogger(), clock: new ManualClock(1_700_000_000_000) });
        fleet = [ec2Instance({ id: 'i-0000000000000001a', name: 'web-1', privateIp: '10.0.0.1' })];
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    const setup = (backgroundRefresh = false) => {
        const describeInstances = vi.fn(fakeDescribeInstances(fleet));
        const client = fakeAwsClient({ ec2: { describeInstances } });
        const loader = new CachedInstanceLoader(
            new LiveInstanceLoader(client, RUNNING),
            cache,
            { region: 'us-east-1', backgroundRefresh },
            silentLogger()
        );
        return { loader, describeInstances };
    };

    it('should load live on a miss and serve the cache afterwards', async () => {
        const { loader, describeInstances } = setup();

        const first = await loader.load();
        const second = await loader.load();

        expect(first.map((i) => i.instanceId)).toEqual(['i-0000000000000001a']);
        expect(second).toEqual(first);
        expect(describeInstances).toHaveBeenCalledTimes(1);
    });

    it('should refresh the entry in the background on a hit', async () => {
        await setup().loader.load();
        fleet.push(ec2Instance({ id: 'i-0000000000000002b', name: 'web-2' }));

        const { loader, describeInstances } = setup(true);
        const served = await loader.load();
        await loader.close();

        expect(served.map((i) => i.instanceId)).toEqual(['i-0000000000000001a']);
        expect(describeInstances).toHaveBeenCalledTimes(1);

        const { loader: next } = setup();
        expect((await next.load()).map((i) => i.instanceId)).toEqual(['i-0000000000000001a', 'i-0000000000000002b']);
    });

    it('should ignore a cached payload of the wrong shape', async () => {
        await cache.set(cacheKey('us-east-1', RUNNING), [{ bogus: true }], 'us-east-1', RUNNING);
        const { loader, describeInstances } = setup();

        await expect(loader.load()).resolves.toHaveLength(1);
        expect(describeInstances).toHaveBeenCalledTimes(1);
    });

    it('should restore launch times from the cache', async () => {
        fleet[0] = { ...fleet[0], LaunchTime: new Date('2024-03-01T10:00:00Z') };
        await setup().loader.load();

        const [cached] = await setup().loader.load();

        expect(cached.launchTime).toEqual(new Date('2024-03-01T10:00:00Z'));
    });

    it('should still return instances when the cache cannot be written', async () => {
        const blocker = path.join(dir, 'not-a-dir');
        await fs.writeFile(blocker, 'x');
        cache = new ResourceCache({ dir: blocker, ttlMs: 60_000 }, { logger: silentLogger() });

        await expect(setup().loader.load()).resolves.toHaveLength(1);
    });
});

describe('ProvidedLoader', () => {
    it('should hand out a copy of its items', async () => {
        const items = ['a', 'b'];
        const loaded = await new ProvidedLoader(items).load();

        loaded.push('c');
        expect(items).toEqual(['a', 'b']);
    });
});
