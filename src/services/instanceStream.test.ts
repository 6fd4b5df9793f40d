import { describe, expect, it, vi } from 'vitest';
import type { DescribeInstancesCommandInput } from '@aws-sdk/client-ec2';
import { PerformanceMetrics } from '../metrics/performanceMetrics';
import { ec2Instance, fakeAwsClient, fakeDescribeInstances } from '../testing/fakeAws';
import { MemoryLimitError } from '../utils/errors';
import { findInstancesStreaming, InstanceStream, toInstance } from './instanceStream';

const fleet = Array.from({ length: 25 }, (_, i) => ec2Instance({
    id: `i-${String(i).padStart(10, '0')}`,
    name: `node-${i}`,
    state: i % 5 === 0 ? 'stopped' : 'running',
    privateIp: `10.0.0.${i}`
}));

describe('toInstance', () => {
    it('should convert tags, addresses and security groups', () => {
        const instance = toInstance({
            ...ec2Instance({ id: 'i-0123456789', name: 'web', privateIp: '10.0.0.5', publicIp: '3.4.5.6', tags: { Env: 'prod' } }),
            IamInstanceProfile: { Arn: 'arn:aws:iam::123456789012:instance-profile/web' }
        });

        expect(instance).toMatchObject({
            instanceId: 'i-0123456789',
            name: 'web',
            state: 'running',
            instanceType: 't3.micro',
            privateIp: '10.0.0.5',
            publicIp: '3.4.5.6',
            availabilityZone: 'us-east-1a',
            tags: { Name: 'web', Env: 'prod' },
            instanceProfile: 'arn:aws:iam::123456789012:instance-profile/web',
            securityGroups: ['sg-0123']
        });
    });

    it('should leave the name empty for untagged instances', () => {
        expect(toInstance(ec2Instance({ id: 'i-0123456789' })).name).toBe('');
    });
});

describe('InstanceStream', () => {
    it('should hand every page to the callback in order', async () => {
        const describeInstances = vi.fn(fakeDescribeInstances(fleet, 10));
        const client = fakeAwsClient({ ec2: { describeInstances } });
        const stream = new InstanceStream(client, [], { pageSize: 10 });
        const sizes: number[] = [];

        await stream.forEach((chunk) => {
            sizes.push(chunk.length);
        });

        expect(sizes).toEqual([10, 10, 5]);
        expect(describeInstances).toHaveBeenCalledTimes(3);
        expect(describeInstances.mock.calls[1][0]).toEqual({ Filters: [], MaxResults: 10, NextToken: '10' });
    });

    it('should never return more than maxInstances', async () => {
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet, 10) } });
        const stream = new InstanceStream(client, [], { pageSize: 10, maxInstances: 12 });

        const instances = await stream.collect();

        expect(instances).toHaveLength(12);
        expect(instances[11].instanceId).toBe('i-0000000011');
    });

    it('should pass server-side filters', async () => {
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet) } });
        const stream = new InstanceStream(client, [{ name: 'instance-state-name', values: ['stopped'] }]);

        await expect(stream.count()).resolves.toBe(5);
    });

    it('should stop collecting before the memory limit is crossed', async () => {
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet, 10) } });
        const stream = new InstanceStream(client, [], { pageSize: 10, memoryLimitBytes: 15 * 1024 });

        const error = await stream.collect().catch((err: unknown) => err);

        expect(error).toBeInstanceOf(MemoryLimitError);
        expect(error).toMatchObject({ message: 'memory limit exceeded: would use 20480 bytes, limit is 15360 bytes' });
    });

    it('should filter client-side', async () => {
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet, 10) } });
        const stream = new InstanceStream(client, []);

        const matches = await stream.filter((instance) => instance.name.endsWith('3'));

        expect(matches.map((i) => i.name)).toEqual(['node-3', 'node-13', 'node-23']);
    });

    it('should stop when the signal aborts', async () => {
        const controller = new AbortController();
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet, 10) } });
        const stream = new InstanceStream(client, [], { pageSize: 10 });
        const seen: number[] = [];

        const result = stream.forEach((chunk) => {
            seen.push(chunk.length);
            controller.abort();
        }, controller.signal);

        await expect(result).rejects.toMatchObject({ kind: 'Cancelled' });
        expect(seen).toEqual([10]);
    });

    it('should record API calls in metrics', async () => {
        const metrics = new PerformanceMetrics(true);
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet, 10) } }, { metrics });

        await new InstanceStream(client, [], { pageSize: 10 }).count();

        expect(metrics.apiMetrics('DescribeInstances')?.calls).toBe(3);
    });
});

describe('findInstancesStreaming', () => {
    const addressed = [
        ec2Instance({ id: 'i-00000000a1', name: 'private-box', privateIp: '10.0.0.5' }),
        ec2Instance({ id: 'i-00000000a2', name: 'public-box', privateIp: '10.0.0.6', publicIp: '3.4.5.6' })
    ];

    it('should fall back to the public address when nothing matches privately', async () => {
        const describeInstances = vi.fn(fakeDescribeInstances(addressed));
        const client = fakeAwsClient({ ec2: { describeInstances } });

        const instances = await findInstancesStreaming(client, '3.4.5.6');

        expect(instances.map((i) => i.instanceId)).toEqual(['i-00000000a2']);
        const filterNames = describeInstances.mock.calls.map(([input]: [DescribeInstancesCommandInput]) => input.Filters?.[0]?.Name);
        expect(filterNames).toEqual(['private-ip-address', 'ip-address']);
    });

    it('should not search publicly when the private search fails', async () => {
        const describeInstances = vi.fn(async (): Promise<never> => {
            throw new Error('UnauthorizedOperation: denied');
        });
        const client = fakeAwsClient({ ec2: { describeInstances } });

        await expect(findInstancesStreaming(client, '3.4.5.6')).rejects.toThrow('UnauthorizedOperation: denied');
        expect(describeInstances).toHaveBeenCalledTimes(1);
    });

    it('should match the short DNS form against the regional form', async () => {
        const fleetWithDns = [ec2Instance({ id: 'i-00000000b1', privateDns: 'ip-10-0-0-7.us-west-2.compute.internal' })];
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleetWithDns) } });

        const instances = await findInstancesStreaming(client, 'ip-10-0-0-7.ec2.internal');

        expect(instances.map((i) => i.instanceId)).toEqual(['i-00000000b1']);
    });

    it('should only return running instances unless asked for all states', async () => {
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet) } });

        await expect(findInstancesStreaming(client, 'node-5')).resolves.toEqual([]);
        const all = await findInstancesStreaming(client, 'node-5', { includeAllStates: true });
        expect(all.map((i) => i.state)).toEqual(['stopped']);
    });
});
