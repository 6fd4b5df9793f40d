import { describe, expect, it, vi } from 'vitest';
import type {
    AutoScalingGroup as SdkAutoScalingGroup,
    DescribeAutoScalingGroupsCommandInput,
    DescribeAutoScalingGroupsCommandOutput,
    UpdateAutoScalingGroupCommandInput,
    UpdateAutoScalingGroupCommandOutput
} from '@aws-sdk/client-auto-scaling';
import { fakeAwsClient } from '../testing/fakeAws';
import { AutoScalingService, toAutoScalingGroup } from './autoscaling';

const group = (name: string, extra: Partial<SdkAutoScalingGroup> = {}): SdkAutoScalingGroup => ({
    AutoScalingGroupName: name,
    MinSize: 1,
    MaxSize: 5,
    DesiredCapacity: 2,
    DefaultCooldown: 300,
    HealthCheckType: 'EC2',
    AvailabilityZones: ['us-east-1a', 'us-east-1b'],
    CreatedTime: new Date('2024-01-01T00:00:00Z'),
    ...extra
});

const describeGroups = (groups: SdkAutoScalingGroup[]) =>
    vi.fn(async (input: DescribeAutoScalingGroupsCommandInput): Promise<DescribeAutoScalingGroupsCommandOutput> => {
        const names = input.AutoScalingGroupNames;
        return { $metadata: {}, AutoScalingGroups: names ? groups.filter((g) => names.includes(g.AutoScalingGroupName ?? '')) : groups };
    });

const updateGroup = () => vi.fn(async (_input: UpdateAutoScalingGroupCommandInput): Promise<UpdateAutoScalingGroupCommandOutput> => ({ $metadata: {} }));

describe('AutoScalingService', () => {
    it('should reject a negative min without updating', async () => {
        const update = updateGroup();
        const client = fakeAwsClient({ autoScaling: { describeAutoScalingGroups: describeGroups([group('web-asg')]), updateAutoScalingGroup: update } });

        await expect(new AutoScalingService(client).updateCapacity('web-asg', { min: -1, desired: 2 }))
            .rejects.toMatchObject({ kind: 'Validation', message: 'min size cannot be negative' });
        expect(update).not.toHaveBeenCalled();
    });

    it('should keep current bounds when only desired changes', async () => {
        const update = updateGroup();
        const client = fakeAwsClient({ autoScaling: { describeAutoScalingGroups: describeGroups([group('web-asg')]), updateAutoScalingGroup: update } });

        await expect(new AutoScalingService(client).updateCapacity('web-asg', { desired: 4 })).resolves.toEqual({ min: 1, max: 5, desired: 4 });
        expect(update).toHaveBeenCalledWith({ AutoScalingGroupName: 'web-asg', MinSize: 1, MaxSize: 5, DesiredCapacity: 4 });
    });

    it('should reject desired above the new max', async () => {
        const client = fakeAwsClient({ autoScaling: { describeAutoScalingGroups: describeGroups([group('web-asg')]) } });

        await expect(new AutoScalingService(client).updateCapacity('web-asg', { max: 3, desired: 4 }))
            .rejects.toThrow('desired capacity (4) must be between min size (1) and max size (3)');
    });

    it('should report a missing group as not found', async () => {
        const client = fakeAwsClient({ autoScaling: { describeAutoScalingGroups: describeGroups([]) } });

        await expect(new AutoScalingService(client).describeGroup('ghost')).rejects.toMatchObject({
            kind: 'NotFound',
            message: 'Auto Scaling Group ghost not found'
        });
    });

    it('should page through groups and sort them by name', async () => {
        const describe = vi.fn(async (input: DescribeAutoScalingGroupsCommandInput): Promise<DescribeAutoScalingGroupsCommandOutput> =>
            input.NextToken === 'page-2'
                ? { $metadata: {}, AutoScalingGroups: [group('api-asg')] }
                : { $metadata: {}, AutoScalingGroups: [group('web-asg')], NextToken: 'page-2' });
        const client = fakeAwsClient({ autoScaling: { describeAutoScalingGroups: describe } });

        const groups = await new AutoScalingService(client).listGroups();

        expect(groups.map((g) => g.name)).toEqual(['api-asg', 'web-asg']);
        expect(describe).toHaveBeenCalledTimes(2);
    });
});

describe('toAutoScalingGroup', () => {
    it('should split subnets and read the mixed-instances launch template', () => {
        const converted = toAutoScalingGroup(group('web-asg', {
            VPCZoneIdentifier: 'subnet-a, subnet-b',
            MixedInstancesPolicy: {
                LaunchTemplate: { LaunchTemplateSpecification: { LaunchTemplateId: 'lt-1', LaunchTemplateName: 'web', Version: '$Latest' } }
            },
            Instances: [{
                InstanceId: 'i-0123456789abcdef0',
                AvailabilityZone: 'us-east-1a',
                LifecycleState: 'InService',
                HealthStatus: 'Healthy',
                ProtectedFromScaleIn: false
            }],
            Tags: [{ Key: 'team', Value: 'ops' }]
        }));

        expect(converted.subnets).toEqual(['subnet-a', 'subnet-b']);
        expect(converted.launchTemplate).toEqual({ id: 'lt-1', name: 'web', version: '$Latest' });
        expect(converted.currentSize).toBe(1);
        expect(converted.instances[0]).toMatchObject({ lifecycleState: 'InService', healthStatus: 'Healthy' });
        expect(converted.tags).toEqual({ team: 'ops' });
        expect(converted.status).toBe('Active');
    });
});
