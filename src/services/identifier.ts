/**
 * ================================================================================
 * IDENTIFIER RESOLVER - Free-form Instance Identifiers
 * ================================================================================
 *
 * Classifies operator input by the first matching rule:
 *   1. `i-` prefix, length ≥ 10   → instance id
 *   2. `Key:Value`, both non-empty → tag
 *   3. IPv4 / IPv6                → ip
 *   4. dotted, cloud DNS suffix or ≥ 2 dots → dns
 *   5. anything else              → Name tag
 *
 * parseIdentifier is total: every string classifies.
 */

import { isIP } from 'net';
import { ResourceFilter } from '../types';
import { AppError } from '../utils/errors';

export type IdentifierKind = 'instance_id' | 'tag' | 'ip' | 'dns' | 'name';

export type ParsedIdentifier =
    | { kind: 'tag'; value: string; tagKey: string; tagValue: string }
    | { kind: Exclude<IdentifierKind, 'tag'>; value: string };

const CLOUD_DNS_MARKERS = ['compute.amazonaws.com', 'compute.internal', '.ec2.internal'];

export function isInstanceId(s: string): boolean {
    return s.startsWith('i-') && s.length >= 10;
}

export function isIpAddress(s: string): boolean {
    return isIP(s) !== 0;
}

export function isDnsName(s: string): boolean {
    if (!s.includes('.') || isIpAddress(s)) return false;
    if (CLOUD_DNS_MARKERS.some((marker) => s.includes(marker))) return true;
    return s.split('.').length - 1 >= 2;
}

export function parseIdentifier(input: string): ParsedIdentifier {
    const value = input.trim();

    if (isInstanceId(value)) {
        return { kind: 'instance_id', value };
    }

    const colon = value.indexOf(':');
    if (colon >= 0) {
        const tagKey = value.slice(0, colon).trim();
        const tagValue = value.slice(colon + 1).trim();
        if (tagKey && tagValue) {
            return { kind: 'tag', value, tagKey, tagValue };
        }
    }

    if (isIpAddress(value)) {
        return { kind: 'ip', value };
    }
    if (isDnsName(value)) {
        return { kind: 'dns', value };
    }
    return { kind: 'name', value };
}

export function describeIdentifierType(kind: IdentifierKind): string {
    switch (kind) {
        case 'instance_id':
            return 'instance ID';
        case 'tag':
            return 'tag';
        case 'ip':
            return 'IP address';
        case 'dns':
            return 'DNS name';
        case 'name':
            return 'instance name';
    }
}

/**
 * Both canonical forms of an EC2 private DNS name.
 *
 * `ip-10-0-0-5.ec2.internal` also matches `ip-10-0-0-5.*.compute.internal`,
 * and `ip-10-0-0-5.us-west-2.compute.internal` also matches `ip-10-0-0-5.ec2.internal`.
 */
export function dnsAlternates(name: string): string[] {
    if (name.includes('.ec2.internal')) {
        const base = name.replace('.ec2.internal', '');
        return [name, `${base}.*.compute.internal`];
    }
    if (name.includes('.compute.internal')) {
        const base = name.split('.')[0];
        return [name, `${base}.ec2.internal`];
    }
    return [name];
}

/**
 * Server-side filters for the private lookup of an identifier.
 */
export function buildFilters(identifier: ParsedIdentifier): ResourceFilter[] {
    switch (identifier.kind) {
        case 'instance_id':
            return [{ name: 'instance-id', values: [identifier.value] }];
        case 'tag':
            return [{ name: `tag:${identifier.tagKey}`, values: [identifier.tagValue] }];
        case 'ip':
            return [{ name: 'private-ip-address', values: [identifier.value] }];
        case 'dns':
            return [{ name: 'private-dns-name', values: dnsAlternates(identifier.value) }];
        case 'name':
            return [{ name: 'tag:Name', values: [identifier.value] }];
    }
}

/**
 * Filters for the public fallback; empty for kinds without one.
 */
export function buildPublicFilters(identifier: ParsedIdentifier): ResourceFilter[] {
    switch (identifier.kind) {
        case 'ip':
            return [{ name: 'ip-address', values: [identifier.value] }];
        case 'dns':
            return [{ name: 'dns-name', values: [identifier.value] }];
        default:
            return [];
    }
}

export const RUNNING_STATE_FILTER: ResourceFilter = { name: 'instance-state-name', values: ['running'] };

export const NON_TERMINATED_STATE_FILTER: ResourceFilter = {
    name: 'instance-state-name',
    values: ['pending', 'running', 'stopping', 'stopped']
};

export function stateFilter(allStates: boolean): ResourceFilter {
    return allStates ? NON_TERMINATED_STATE_FILTER : RUNNING_STATE_FILTER;
}

/**
 * Parse `Key=Value` (or `Key:Value`) tag filter arguments.
 */
export function parseTagFilters(args: string[]): ResourceFilter[] {
    const filters: ResourceFilter[] = [];
    for (const arg of args) {
        const match = /^([^=:]+)[=:](.*)$/.exec(arg);
        if (!match || !match[1].trim() || !match[2].trim()) {
            throw new AppError('Validation', `invalid tag filter "${arg}": expected Key=Value`);
        }
        filters.push({ name: `tag:${match[1].trim()}`, values: [match[2].trim()] });
    }
    return filters;
}
