/**
 * ================================================================================
 * INSTANCE STREAM - Paginated DescribeInstances
 * ================================================================================
 *
 * Walks DescribeInstances page by page through the client's breaker, rate
 * limiter and retry engine, handing each converted chunk to a callback.
 *
 * //! total never exceeds maxInstances; collect() and filter() stop with
 * //! MemoryLimitError before crossing memoryLimitBytes (~1 KiB per instance)
 */

import type { Filter, Instance as Ec2Instance, Reservation } from '@aws-sdk/client-ec2';
import { AwsClient } from '../aws/awsClient';
import { throwIfAborted } from '../resilience/clock';
import { Instance, ResourceFilter } from '../types';
import { MemoryLimitError } from '../utils/errors';
import {
    buildFilters,
    buildPublicFilters,
    describeIdentifierType,
    parseIdentifier,
    stateFilter
} from './identifier';

export const BYTES_PER_INSTANCE = 1024;

export interface InstanceStreamConfig {
    pageSize: number;
    maxInstances: number;
    memoryLimitBytes: number;   // 0 disables the cap
}

export const DEFAULT_STREAM_CONFIG: InstanceStreamConfig = {
    pageSize: 100,
    maxInstances: 10_000,
    memoryLimitBytes: 50 * 1024 * 1024
};

export function toSdkFilters(filters: ResourceFilter[]): Filter[] {
    return filters.map((f) => ({ Name: f.name, Values: f.values }));
}

/**
 * Convert an EC2 instance description into the Instance snapshot.
 */
export function toInstance(inst: Ec2Instance): Instance {
    const tags: Record<string, string> = {};
    for (const tag of inst.Tags ?? []) {
        if (tag.Key !== undefined) {
            tags[tag.Key] = tag.Value ?? '';
        }
    }

    return {
        instanceId: inst.InstanceId ?? '',
        name: tags.Name ?? '',
        state: inst.State?.Name ?? 'unknown',
        instanceType: inst.InstanceType ?? '',
        privateIp: inst.PrivateIpAddress || undefined,
        publicIp: inst.PublicIpAddress || undefined,
        privateDns: inst.PrivateDnsName || undefined,
        publicDns: inst.PublicDnsName || undefined,
        availabilityZone: inst.Placement?.AvailabilityZone,
        tags,
        launchTime: inst.LaunchTime,
        instanceProfile: inst.IamInstanceProfile?.Arn,
        securityGroups: (inst.SecurityGroups ?? []).flatMap((g) => (g.GroupId ? [g.GroupId] : []))
    };
}

export class InstanceStream {
    private readonly config: InstanceStreamConfig;

    constructor(
        private readonly client: AwsClient,
        private readonly filters: ResourceFilter[],
        config: Partial<InstanceStreamConfig> = {}
    ) {
        this.config = { ...DEFAULT_STREAM_CONFIG, ...config };
    }

    /**
     * Call `fn` with each page of instances, serially.
     */
    async forEach(fn: (chunk: Instance[]) => void | Promise<void>, signal?: AbortSignal): Promise<void> {
        const logger = this.client.logger;
        let nextToken: string | undefined;
        let total = 0;

        logger.debug('Starting instance stream', { pageSize: this.config.pageSize, maxInstances: this.config.maxInstances });

        for (;;) {
            throwIfAborted(signal);
            if (total >= this.config.maxInstances) {
                logger.warn(`Reached maximum instance limit (${this.config.maxInstances})`);
                break;
            }

            const token = nextToken;
            const page = await this.client.call(
                'DescribeInstances',
                () => this.client.services.ec2.describeInstances({
                    Filters: toSdkFilters(this.filters),
                    MaxResults: this.config.pageSize,
                    NextToken: token
                }),
                { signal }
            );

            const chunk = this.convert(page.Reservations ?? [], this.config.maxInstances - total);
            total += chunk.length;
            nextToken = page.NextToken;

            if (chunk.length > 0) {
                await fn(chunk);
            }
            if (!nextToken || total >= this.config.maxInstances) {
                break;
            }
        }

        logger.debug('Instance stream completed', { total });
    }

    private convert(reservations: Reservation[], room: number): Instance[] {
        const out: Instance[] = [];
        for (const reservation of reservations) {
            for (const inst of reservation.Instances ?? []) {
                if (out.length >= room) return out;
                out.push(toInstance(inst));
            }
        }
        return out;
    }

    private checkMemory(wouldHold: number): void {
        const limit = this.config.memoryLimitBytes;
        const wouldUse = wouldHold * BYTES_PER_INSTANCE;
        if (limit > 0 && wouldUse > limit) {
            throw new MemoryLimitError(wouldUse, limit);
        }
    }

    async collect(signal?: AbortSignal): Promise<Instance[]> {
        const all: Instance[] = [];
        await this.forEach((chunk) => {
            this.checkMemory(all.length + chunk.length);
            all.push(...chunk);
            this.client.metrics.recordMemoryUsage(all.length * BYTES_PER_INSTANCE);
        }, signal);
        return all;
    }

    async count(signal?: AbortSignal): Promise<number> {
        let count = 0;
        await this.forEach((chunk) => {
            count += chunk.length;
        }, signal);
        return count;
    }

    async filter(predicate: (instance: Instance) => boolean, signal?: AbortSignal): Promise<Instance[]> {
        const matches: Instance[] = [];
        await this.forEach((chunk) => {
            for (const instance of chunk) {
                if (predicate(instance)) {
                    this.checkMemory(matches.length + 1);
                    matches.push(instance);
                }
            }
        }, signal);
        return matches;
    }
}

export interface FindOptions {
    includeAllStates?: boolean;
    stream?: Partial<InstanceStreamConfig>;
    signal?: AbortSignal;
}

/**
 * Look an identifier up through the stream. IP and DNS identifiers with no
 * private match are retried against the public address and name; a failed
 * private search is surfaced as is.
 */
export async function findInstancesStreaming(client: AwsClient, identifier: string, options: FindOptions = {}): Promise<Instance[]> {
    const parsed = parseIdentifier(identifier);
    const state = stateFilter(options.includeAllStates ?? false);

    client.logger.debug('Finding instances', { identifier: parsed.value, type: describeIdentifierType(parsed.kind) });

    const privateStream = new InstanceStream(client, [...buildFilters(parsed), state], options.stream);
    const instances = await privateStream.collect(options.signal);

    const publicFilters = buildPublicFilters(parsed);
    if (instances.length === 0 && publicFilters.length > 0) {
        const publicStream = new InstanceStream(client, [...publicFilters, state], options.stream);
        return publicStream.collect(options.signal);
    }
    return instances;
}
