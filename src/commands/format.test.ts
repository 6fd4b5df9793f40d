import { describe, expect, it } from 'vitest';
import { AutoScalingGroup, Cluster, InstanceInterfaces } from '../types';
import {
    formatAsgTable,
    formatBytes,
    formatCacheStats,
    formatClusterDescription,
    formatHealthReport,
    formatInstanceTable,
    formatInterfaces,
    formatScalingPlan
} from './format';

const cluster: Cluster = {
    name: 'prod',
    status: 'ACTIVE',
    version: '1.29',
    vpc: {
        vpcId: 'vpc-1',
        subnetIds: ['subnet-a', 'subnet-b', 'subnet-c', 'subnet-d', 'subnet-e'],
        securityGroupIds: ['sg-1'],
        endpointPublicAccess: true,
        endpointPrivateAccess: false,
        publicAccessCidrs: []
    },
    logging: [{ type: 'api', enabled: true }],
    nodeGroups: [{
        clusterName: 'prod',
        name: 'workers',
        status: 'ACTIVE',
        instanceTypes: ['m5.large'],
        scaling: { min: 1, max: 5, desired: 3 },
        currentSize: 2,
        taints: [],
        labels: {},
        subnets: [],
        tags: {}
    }],
    fargateProfiles: [],
    encryptionResources: [],
    tags: { team: 'core' }
};

describe('formatInstanceTable', () => {
    it('should underline the header', () => {
        const lines = formatInstanceTable([], ['instance-id', 'state']);

        expect(lines).toEqual(['INSTANCE ID         | STATE', '-'.repeat(27)]);
    });
});

describe('formatInterfaces', () => {
    const entry: InstanceInterfaces = {
        instanceId: 'i-0123456789abcdef0',
        instanceName: 'web-1',
        dnsName: 'ip-10-0-1-5.ec2.internal',
        interfaces: [{
            interfaceName: 'ens5',
            interfaceId: 'eni-1',
            privateIp: '10.0.1.5',
            subnetId: 'subnet-1',
            subnetCidr: '10.0.1.0/24',
            securityGroups: ['sg-1', 'sg-2'],
            macAddress: '0a:00:00:00:00:01',
            deviceIndex: 0,
            networkCardIndex: 0
        }]
    };

    it('should print one row per interface', () => {
        expect(formatInterfaces(entry)).toEqual([
            'Instance: i-0123456789abcdef0 | DNS Name: ip-10-0-1-5.ec2.internal | Instance Name: web-1',
            'Interface | Subnet ID                 | CIDR               | SG ID',
            '-'.repeat(86),
            'ens5      | subnet-1                  | 10.0.1.0/24        | sg-1, sg-2'
        ]);
    });

    it('should say when an instance has no interfaces', () => {
        expect(formatInterfaces({ ...entry, interfaces: [] })[3]).toBe('No network interfaces found');
    });
});

describe('formatClusterDescription', () => {
    const lines = formatClusterDescription(cluster);

    it('should shorten long id lists', () => {
        expect(lines).toContain('  Subnets:             5');
        expect(lines).toContain('    • subnet-c');
        expect(lines).not.toContain('    • subnet-d');
        expect(lines).toContain('    • ... and 2 more');
    });

    it('should list node groups with their sizes', () => {
        expect(lines).toContain('    • workers (ACTIVE) - 2/3 nodes');
        expect(lines).toContain('  Fargate Profiles:    0');
    });

    it('should include logging and tags but skip empty sections', () => {
        expect(lines).toContain('  • api: enabled');
        expect(lines).toContain('  team: core');
        expect(lines).not.toContain('Encryption:');
        expect(lines).not.toContain('Identity Provider:');
    });
});

describe('formatAsgTable', () => {
    it('should show the scaling triple and current size', () => {
        const asg: AutoScalingGroup = {
            name: 'web-asg',
            scaling: { min: 1, max: 4, desired: 2 },
            currentSize: 2,
            status: 'Active',
            availabilityZones: [],
            subnets: [],
            loadBalancerNames: [],
            targetGroupArns: [],
            instances: [],
            tags: {}
        };

        const lines = formatAsgTable([asg]);

        expect(lines[2]).toBe(`${'web-asg'.padEnd(50)} | ${'1/2/4'.padEnd(15)} | 2       | Active`);
    });
});

describe('formatScalingPlan', () => {
    it('should show the current and the new triple', () => {
        expect(formatScalingPlan({ min: 1, max: 4, desired: 2 }, { min: 1, max: 6, desired: 5 }, 2, 'desired capacity')).toEqual([
            'Current configuration:',
            '  Min Size:          1',
            '  Max Size:          4',
            '  Desired capacity:  2',
            '  Current Size:      2',
            '',
            'New configuration:',
            '  Min Size:          1',
            '  Max Size:          6',
            '  Desired capacity:  5'
        ]);
    });
});

describe('formatBytes', () => {
    it('should pick a unit', () => {
        expect(formatBytes(512)).toBe('512 B');
        expect(formatBytes(1536)).toBe('1.5 KiB');
        expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MiB');
    });
});

describe('formatCacheStats', () => {
    it('should print counts and size', () => {
        expect(formatCacheStats('/tmp/cache', { totalFiles: 2, expiredFiles: 1, totalBytes: 2048 })).toEqual([
            'Cache directory: /tmp/cache',
            '  Files:   2',
            '  Expired: 1',
            '  Size:    2.0 KiB'
        ]);
    });
});

describe('formatHealthReport', () => {
    it('should mark each check', () => {
        const lines = formatHealthReport({
            status: 'degraded',
            timestamp: new Date(0),
            checks: [{ name: 'session-plugin', status: 'degraded', message: 'not found', durationMs: 3 }]
        });

        expect(lines).toEqual([
            'Overall: degraded',
            '  ⚠ session-plugin degraded  not found (3ms)'
        ]);
    });
});
