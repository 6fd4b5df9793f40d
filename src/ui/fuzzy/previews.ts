/**
 * ================================================================================
 * PREVIEWS - Detail Panes for Picker Items
 * ================================================================================
 *
 * Plain text; the finder colours the title line.
 */

import { AutoScalingGroup, Cluster, ClusterSummary, Instance, LaunchTemplateVersion, NodeGroup } from '../../types';
import { formatUptime } from '../../utils/validation';
import { formatVersionForDisplay } from '../../services/launchTemplates';

function title(text: string): string[] {
    return [text, '='.repeat(text.length)];
}

function field(label: string, value: string | number | undefined): string | null {
    if (value === undefined || value === '') return null;
    return `  ${`${label}:`.padEnd(16)}${value}`;
}

function section(name: string, lines: (string | null)[]): string[] {
    const present = lines.filter((line): line is string => line !== null);
    return present.length > 0 ? ['', `${name}:`, ...present] : [];
}

const isoMinute = (date: Date): string => date.toISOString().slice(0, 16).replace('T', ' ');

export function instancePreview(instance: Instance, now: Date = new Date()): string {
    const tags = Object.entries(instance.tags)
        .filter(([key]) => key !== 'Name')
        .sort(([a], [b]) => a.localeCompare(b));

    return [
        ...title('Instance Details'),
        '',
        'Basic Info:',
        field('Name', instance.name || '(no name tag)'),
        field('Instance ID', instance.instanceId),
        field('State', instance.state),
        field('Instance Type', instance.instanceType),
        field('Availability', instance.availabilityZone),
        field('Launch Time', instance.launchTime ? isoMinute(instance.launchTime) : undefined),
        field('Uptime', instance.launchTime ? formatUptime(instance.launchTime, now) : undefined),
        ...section('Network', [
            field('Private IP', instance.privateIp),
            field('Public IP', instance.publicIp),
            field('Private DNS', instance.privateDns),
            field('Public DNS', instance.publicDns)
        ]),
        ...section('Security', [
            field('Profile', instance.instanceProfile),
            ...instance.securityGroups.map((sg) => `    • ${sg}`)
        ]),
        ...section('Tags', tags.map(([key, value]) => `  ${key}=${value}`))
    ].filter((line): line is string => line !== null).join('\n');
}

export function clusterPreview(cluster: Cluster | ClusterSummary): string {
    const lines: (string | null)[] = [
        ...title('Cluster Details'),
        '',
        field('Name', cluster.name),
        field('Status', cluster.status),
        field('Version', cluster.version),
        field('ARN', cluster.arn)
    ];
    if ('vpc' in cluster) {
        lines.push(
            field('Endpoint', cluster.endpoint),
            field('Platform', cluster.platformVersion),
            ...section('Networking', [
                field('VPC', cluster.vpc.vpcId),
                field('Subnets', cluster.vpc.subnetIds.length),
                field('Public API', cluster.vpc.endpointPublicAccess ? 'enabled' : 'disabled'),
                field('Private API', cluster.vpc.endpointPrivateAccess ? 'enabled' : 'disabled')
            ]),
            ...section('Compute', [
                field('Node Groups', cluster.nodeGroups.length),
                field('Fargate', cluster.fargateProfiles.length)
            ])
        );
    }
    return lines.filter((line): line is string => line !== null).join('\n');
}

export function nodeGroupPreview(nodeGroup: NodeGroup): string {
    const lt = nodeGroup.launchTemplate;
    return [
        ...title('Node Group Details'),
        '',
        field('Name', nodeGroup.name),
        field('Cluster', nodeGroup.clusterName),
        field('Status', nodeGroup.status),
        field('Version', nodeGroup.version),
        field('Capacity', nodeGroup.capacityType),
        field('Types', nodeGroup.instanceTypes.join(', ')),
        ...section('Scaling', [
            field('Min', nodeGroup.scaling.min),
            field('Max', nodeGroup.scaling.max),
            field('Desired', nodeGroup.scaling.desired)
        ]),
        ...section('Launch Template', lt ? [field('Name', lt.name), field('ID', lt.id), field('Version', lt.version)] : []),
        ...section('Taints', nodeGroup.taints.map((t) => `  ${t.key}${t.value ? `=${t.value}` : ''}:${t.effect}`))
    ].filter((line): line is string => line !== null).join('\n');
}

export function asgPreview(asg: AutoScalingGroup): string {
    const healthy = asg.instances.filter((i) => i.healthStatus === 'Healthy').length;
    const lt = asg.launchTemplate;
    return [
        ...title('Auto Scaling Group Details'),
        '',
        field('Name', asg.name),
        field('Status', asg.status),
        field('Health Check', asg.healthCheckType),
        ...section('Capacity', [
            field('Min', asg.scaling.min),
            field('Max', asg.scaling.max),
            field('Desired', asg.scaling.desired),
            field('Current', asg.currentSize),
            field('Healthy', `${healthy}/${asg.instances.length}`)
        ]),
        ...section('Launch', [
            field('Template', lt ? `${lt.name ?? lt.id ?? ''} (${lt.version ?? '$Default'})` : undefined),
            field('Config', asg.launchConfigurationName)
        ]),
        ...section('Zones', asg.availabilityZones.map((az) => `  ${az}`))
    ].filter((line): line is string => line !== null).join('\n');
}

export function launchTemplateVersionPreview(version: LaunchTemplateVersion): string {
    return [
        ...title('Launch Template Version'),
        '',
        field('Template', version.templateName ?? version.templateId),
        field('Version', formatVersionForDisplay(version)),
        field('Created', version.createdAt ? isoMinute(version.createdAt) : undefined),
        field('Created By', version.createdBy),
        field('Instance Type', version.instanceType),
        field('Image', version.imageId)
    ].filter((line): line is string => line !== null).join('\n');
}
