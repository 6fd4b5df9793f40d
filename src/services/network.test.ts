import { describe, expect, it, vi } from 'vitest';
import type { DescribeSubnetsCommandInput, DescribeSubnetsCommandOutput, InstanceNetworkInterface } from '@aws-sdk/client-ec2';
import { ec2Instance, fakeAwsClient, fakeDescribeInstances } from '../testing/fakeAws';
import { buildInterfaceFilters, NetworkService } from './network';

const eni = (id: string, subnet: string, card: number, device: number): InstanceNetworkInterface => ({
    NetworkInterfaceId: id,
    SubnetId: subnet,
    PrivateIpAddress: `10.0.${card}.${device + 10}`,
    MacAddress: `0a:00:00:00:0${card}:0${device}`,
    Groups: [{ GroupId: 'sg-0123' }],
    Attachment: { NetworkCardIndex: card, DeviceIndex: device }
});

const describeSubnets = () => vi.fn(async (input: DescribeSubnetsCommandInput): Promise<DescribeSubnetsCommandOutput> => {
    if (input.SubnetIds?.[0] === 'subnet-b') throw new Error('subnet lookup failed');
    return { $metadata: {}, Subnets: [{ SubnetId: 'subnet-a', CidrBlock: '10.0.0.0/24' }] };
});

describe('NetworkService', () => {
    it('should name interfaces in card and device order and look subnets up once', async () => {
        const fleet = [{
            ...ec2Instance({ id: 'i-0123456789abcdef0', name: 'node-1', privateDns: 'ip-10-0-0-5.ec2.internal' }),
            NetworkInterfaces: [eni('eni-2', 'subnet-a', 0, 1), eni('eni-3', 'subnet-b', 1, 0), eni('eni-1', 'subnet-a', 0, 0)]
        }];
        const subnets = describeSubnets();
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet), describeSubnets: subnets } });

        const [result] = await new NetworkService(client).getInstanceInterfaces(buildInterfaceFilters({}));

        expect(result).toMatchObject({ instanceId: 'i-0123456789abcdef0', instanceName: 'node-1', dnsName: 'ip-10-0-0-5.ec2.internal' });
        expect(result.interfaces.map((i) => [i.interfaceName, i.interfaceId, i.subnetCidr])).toEqual([
            ['ens5', 'eni-1', '10.0.0.0/24'],
            ['ens6', 'eni-2', '10.0.0.0/24'],
            ['ens7', 'eni-3', 'N/A']
        ]);
        expect(subnets).toHaveBeenCalledTimes(2);
    });

    it('should fill in N/A for untagged instances without a DNS name', async () => {
        const fleet = [ec2Instance({ id: 'i-0fedcba9876543210' })];
        const client = fakeAwsClient({ ec2: { describeInstances: fakeDescribeInstances(fleet) } });

        await expect(new NetworkService(client).getInstanceInterfaces(buildInterfaceFilters({}))).resolves.toEqual([
            { instanceId: 'i-0fedcba9876543210', instanceName: 'N/A', dnsName: 'N/A', interfaces: [] }
        ]);
    });
});

describe('buildInterfaceFilters', () => {
    it('should default to running instances only', () => {
        expect(buildInterfaceFilters({})).toEqual([{ name: 'instance-state-name', values: ['running'] }]);
    });

    it('should expand node names to both DNS forms and keep tag filters', () => {
        expect(buildInterfaceFilters({
            nodeNames: ['ip-10-0-0-5.ec2.internal'],
            tags: [{ name: 'tag:Env', values: ['prod'] }],
            showAll: true
        })).toEqual([
            { name: 'instance-state-name', values: ['pending', 'running', 'stopping', 'stopped'] },
            { name: 'private-dns-name', values: ['ip-10-0-0-5.ec2.internal', 'ip-10-0-0-5.*.compute.internal'] },
            { name: 'tag:Env', values: ['prod'] }
        ]);
    });

    it('should filter by instance ids', () => {
        expect(buildInterfaceFilters({ instanceIds: ['i-0123456789abcdef0'] })[1]).toEqual({ name: 'instance-id', values: ['i-0123456789abcdef0'] });
    });
});
