/**
 * ================================================================================
 * AUTO SCALING SERVICE - List, Describe and Resize Auto Scaling Groups
 * ================================================================================
 *
 * //! Capacity updates are validated against the merged triple before any call
 */

import type { AutoScalingGroup as SdkAutoScalingGroup } from '@aws-sdk/client-auto-scaling';
import { AwsClient } from '../aws/awsClient';
import { AsgInstance, AutoScalingGroup, LaunchTemplateRef, ScalingTriple, ScalingUpdate } from '../types';
import { AppError } from '../utils/errors';
import { resolveScaling } from '../utils/validation';

export function toAutoScalingGroup(asg: SdkAutoScalingGroup): AutoScalingGroup {
    const instances: AsgInstance[] = (asg.Instances ?? []).map((inst) => ({
        instanceId: inst.InstanceId ?? '',
        availabilityZone: inst.AvailabilityZone,
        lifecycleState: inst.LifecycleState ?? 'Unknown',
        healthStatus: inst.HealthStatus ?? 'Unknown',
        instanceType: inst.InstanceType
    }));

    const tags: Record<string, string> = {};
    for (const tag of asg.Tags ?? []) {
        if (tag.Key) tags[tag.Key] = tag.Value ?? '';
    }

    return {
        name: asg.AutoScalingGroupName ?? '',
        arn: asg.AutoScalingGroupARN,
        scaling: {
            min: asg.MinSize ?? 0,
            max: asg.MaxSize ?? 0,
            desired: asg.DesiredCapacity ?? 0
        },
        currentSize: instances.length,
        status: asg.Status ?? 'Active',
        healthCheckType: asg.HealthCheckType,
        healthCheckGracePeriod: asg.HealthCheckGracePeriod,
        availabilityZones: asg.AvailabilityZones ?? [],
        subnets: (asg.VPCZoneIdentifier ?? '').split(',').map((s) => s.trim()).filter(Boolean),
        launchTemplate: launchTemplateOf(asg),
        launchConfigurationName: asg.LaunchConfigurationName,
        loadBalancerNames: asg.LoadBalancerNames ?? [],
        targetGroupArns: asg.TargetGroupARNs ?? [],
        instances,
        tags,
        createdAt: asg.CreatedTime
    };
}

function launchTemplateOf(asg: SdkAutoScalingGroup): LaunchTemplateRef | undefined {
    const spec = asg.LaunchTemplate ?? asg.MixedInstancesPolicy?.LaunchTemplate?.LaunchTemplateSpecification;
    if (!spec) return undefined;
    return { id: spec.LaunchTemplateId, name: spec.LaunchTemplateName, version: spec.Version };
}

export class AutoScalingService {
    constructor(private readonly client: AwsClient) {}

    async listGroups(signal?: AbortSignal): Promise<AutoScalingGroup[]> {
        const { autoScaling } = this.client.services;
        const groups: AutoScalingGroup[] = [];
        let nextToken: string | undefined;

        do {
            const page = await this.client.call('DescribeAutoScalingGroups',
                () => autoScaling.describeAutoScalingGroups({ NextToken: nextToken }), { signal });
            groups.push(...(page.AutoScalingGroups ?? []).map(toAutoScalingGroup));
            nextToken = page.NextToken;
        } while (nextToken);

        return groups.sort((a, b) => a.name.localeCompare(b.name));
    }

    async describeGroup(name: string, signal?: AbortSignal): Promise<AutoScalingGroup> {
        const { autoScaling } = this.client.services;
        const output = await this.client.call('DescribeAutoScalingGroups',
            () => autoScaling.describeAutoScalingGroups({ AutoScalingGroupNames: [name] }), { signal });

        const found = output.AutoScalingGroups?.[0];
        if (!found) {
            throw new AppError('NotFound', `Auto Scaling Group ${name} not found`);
        }
        return toAutoScalingGroup(found);
    }

    /**
     * Resize a group. Bounds left out of `update` keep their current values.
     */
    async updateCapacity(name: string, update: ScalingUpdate, signal?: AbortSignal): Promise<ScalingTriple> {
        const current = await this.describeGroup(name, signal);
        const next = resolveScaling(current.scaling, update);

        await this.client.call('UpdateAutoScalingGroup', () => this.client.services.autoScaling.updateAutoScalingGroup({
            AutoScalingGroupName: name,
            MinSize: next.min,
            MaxSize: next.max,
            DesiredCapacity: next.desired
        }), { signal });

        this.client.logger.step('ASG_SCALE', `Updated ${name}: min=${next.min} max=${next.max} desired=${next.desired}`, {
            previous: current.scaling
        });
        return next;
    }
}
