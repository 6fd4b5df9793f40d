/**
 * ================================================================================
 * OUTPUT FORMATTING - Plain-Text Views for Command Output
 * ================================================================================
 *
 * Pure functions returning lines; commands print them with console.log.
 * JSON output (-o json) bypasses these entirely.
 */

import { CacheStats } from '../cache/resourceCache';
import { InstanceColumn } from '../config/types';
import { HealthReport, HealthStatus } from '../services/health';
import { AutoScalingGroup, Cluster, Instance, InstanceInterfaces, ScalingTriple } from '../types';
import { formatHeaderRow, formatInstanceRow } from '../ui/fuzzy/columns';
import { fitWidth } from '../utils/validation';

/**
 * ================================================================================
 * INSTANCES
 * ================================================================================
 */

export function formatInstanceTable(instances: Instance[], columns: InstanceColumn[]): string[] {
    const header = formatHeaderRow(columns);
    return [header, '-'.repeat(header.length), ...instances.map((instance) => formatInstanceRow(instance, columns))];
}

export function formatInterfaces(entry: InstanceInterfaces): string[] {
    const lines = [
        `Instance: ${entry.instanceId} | DNS Name: ${entry.dnsName} | Instance Name: ${entry.instanceName}`,
        `${'Interface'.padEnd(10)}| ${'Subnet ID'.padEnd(26)}| ${'CIDR'.padEnd(19)}| SG ID`,
        '-'.repeat(86)
    ];
    if (entry.interfaces.length === 0) {
        return [...lines, 'No network interfaces found'];
    }
    for (const iface of entry.interfaces) {
        lines.push(`${iface.interfaceName.padEnd(10)}| ${iface.subnetId.padEnd(26)}| ${iface.subnetCidr.padEnd(19)}| ${iface.securityGroups.join(', ')}`);
    }
    return lines;
}

/**
 * ================================================================================
 * EKS
 * ================================================================================
 */

const SHOWN_IDS = 3;

function idList(ids: string[]): string[] {
    const lines = ids.slice(0, SHOWN_IDS).map((id) => `    • ${id}`);
    if (ids.length > SHOWN_IDS) {
        lines.push(`    • ... and ${ids.length - SHOWN_IDS} more`);
    }
    return lines;
}

const row = (label: string, value: string | number | boolean | undefined): string =>
    `  ${`${label}:`.padEnd(21)}${value ?? ''}`;

const timestamp = (date: Date | undefined): string =>
    date ? date.toISOString().slice(0, 19).replace('T', ' ') : '';

export function formatClusterDescription(cluster: Cluster): string[] {
    const separator = '═'.repeat(80);
    const lines = [
        separator,
        `EKS Cluster: ${cluster.name}`,
        separator,
        '',
        'Basic Information:',
        row('Status', cluster.status),
        row('Version', cluster.version),
        row('Platform Version', cluster.platformVersion),
        row('Created', timestamp(cluster.createdAt)),
        row('ARN', cluster.arn),
        row('Role ARN', cluster.roleArn),
        '',
        'API Server:',
        row('Endpoint', cluster.endpoint),
        '',
        'Networking:',
        row('VPC ID', cluster.vpc.vpcId),
        row('Subnets', cluster.vpc.subnetIds.length),
        ...idList(cluster.vpc.subnetIds),
        row('Security Groups', cluster.vpc.securityGroupIds.length),
        ...idList(cluster.vpc.securityGroupIds),
        row('Private Access', cluster.vpc.endpointPrivateAccess),
        row('Public Access', cluster.vpc.endpointPublicAccess)
    ];
    if (cluster.vpc.publicAccessCidrs.length > 0) {
        lines.push(row('Public CIDRs', cluster.vpc.publicAccessCidrs.join(', ')));
    }

    lines.push('', 'Compute Resources:', row('Node Groups', cluster.nodeGroups.length));
    for (const ng of cluster.nodeGroups) {
        lines.push(`    • ${ng.name} (${ng.status}) - ${ng.currentSize}/${ng.scaling.desired} nodes`);
    }
    lines.push(row('Fargate Profiles', cluster.fargateProfiles.length));
    for (const profile of cluster.fargateProfiles) {
        lines.push(`    • ${profile.name} (${profile.status})`);
    }

    if (cluster.logging.length > 0) {
        lines.push('', 'Logging:', ...cluster.logging.map((log) => `  • ${log.type}: ${log.enabled ? 'enabled' : 'disabled'}`));
    }
    if (cluster.encryptionResources.length > 0) {
        lines.push('', 'Encryption:', `  Resources: ${cluster.encryptionResources.join(', ')}`);
    }
    if (cluster.oidcIssuer) {
        lines.push('', 'Identity Provider:', `  OIDC Issuer: ${cluster.oidcIssuer}`);
    }
    const tags = Object.entries(cluster.tags).sort(([a], [b]) => a.localeCompare(b));
    if (tags.length > 0) {
        lines.push('', 'Tags:', ...tags.map(([key, value]) => `  ${key}: ${value}`));
    }
    lines.push(separator);
    return lines;
}

/**
 * ================================================================================
 * SCALING
 * ================================================================================
 */

export function formatAsgTable(groups: AutoScalingGroup[]): string[] {
    const header = `${fitWidth('NAME', 50)} | ${fitWidth('MIN/DESIRED/MAX', 15)} | ${fitWidth('CURRENT', 7)} | STATUS`;
    return [
        header,
        '-'.repeat(header.length),
        ...groups.map((asg) => {
            const triple = `${asg.scaling.min}/${asg.scaling.desired}/${asg.scaling.max}`;
            return `${fitWidth(asg.name, 50)} | ${fitWidth(triple, 15)} | ${fitWidth(String(asg.currentSize), 7)} | ${asg.status}`;
        })
    ];
}

export function formatScalingPlan(current: ScalingTriple, next: ScalingTriple, currentSize: number, desiredLabel: string): string[] {
    const label = desiredLabel.charAt(0).toUpperCase() + desiredLabel.slice(1);
    const block = (triple: ScalingTriple): string[] => [
        `  ${'Min Size:'.padEnd(19)}${triple.min}`,
        `  ${'Max Size:'.padEnd(19)}${triple.max}`,
        `  ${`${label}:`.padEnd(19)}${triple.desired}`
    ];
    return [
        'Current configuration:',
        ...block(current),
        `  ${'Current Size:'.padEnd(19)}${currentSize}`,
        '',
        'New configuration:',
        ...block(next)
    ];
}

/**
 * ================================================================================
 * CACHE AND HEALTH
 * ================================================================================
 */

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export function formatCacheStats(dir: string, stats: CacheStats): string[] {
    return [
        `Cache directory: ${dir}`,
        `  Files:   ${stats.totalFiles}`,
        `  Expired: ${stats.expiredFiles}`,
        `  Size:    ${formatBytes(stats.totalBytes)}`
    ];
}

const STATUS_MARKS: Record<HealthStatus, string> = {
    healthy: '✓',
    degraded: '⚠',
    unhealthy: '✗'
};

export function formatHealthReport(report: HealthReport): string[] {
    return [
        `Overall: ${report.status}`,
        ...report.checks.map((check) =>
            `  ${STATUS_MARKS[check.status]} ${check.name.padEnd(15)}${check.status.padEnd(10)}${check.message} (${check.durationMs}ms)`)
    ];
}
