/**
 * ================================================================================
 * LOADERS - Item Sources for the Finder
 * ================================================================================
 *
 * A Loader produces the full item list once per picker run. Instance loaders
 * read through the stream, optionally behind the on-disk cache; the other
 * loaders wrap one service call each.
 */

import { z } from 'zod';
import { AwsClient } from '../../aws/awsClient';
import { cacheKey, ResourceCache } from '../../cache/resourceCache';
import { AutoScalingService } from '../../services/autoscaling';
import { EksService } from '../../services/eks';
import { InstanceStream, InstanceStreamConfig } from '../../services/instanceStream';
import { LaunchTemplateService } from '../../services/launchTemplates';
import { AutoScalingGroup, ClusterSummary, Instance, LaunchTemplateVersion, NodeGroup, ResourceFilter } from '../../types';
import { errorMessage } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export interface Loader<T> {
    load(signal?: AbortSignal): Promise<T[]>;
    /**
     * Wait for any work the loader left running.
     */
    close?(): Promise<void>;
}

/**
 * ================================================================================
 * INSTANCES
 * ================================================================================
 */

export class LiveInstanceLoader implements Loader<Instance> {
    constructor(
        private readonly client: AwsClient,
        readonly filters: ResourceFilter[],
        private readonly streamConfig: Partial<InstanceStreamConfig> = {}
    ) {}

    load(signal?: AbortSignal): Promise<Instance[]> {
        return new InstanceStream(this.client, this.filters, this.streamConfig).collect(signal);
    }
}

//? Cached payloads are plain JSON; launchTime comes back as an ISO string
const cachedInstanceSchema = z.object({
    instanceId: z.string(),
    name: z.string(),
    state: z.string(),
    instanceType: z.string(),
    privateIp: z.string().optional(),
    publicIp: z.string().optional(),
    privateDns: z.string().optional(),
    publicDns: z.string().optional(),
    availabilityZone: z.string().optional(),
    tags: z.record(z.string()),
    launchTime: z.coerce.date().optional(),
    instanceProfile: z.string().optional(),
    securityGroups: z.array(z.string())
});

const cachedInstancesSchema = z.array(cachedInstanceSchema);

export interface CachedLoaderOptions {
    region: string;
    backgroundRefresh?: boolean;
}

/**
 * Serves a fresh cache entry immediately; otherwise loads live and stores the
 * result. With backgroundRefresh a cache hit also starts a live reload that
 * rewrites the entry for the next run; close() waits for it.
 */
export class CachedInstanceLoader implements Loader<Instance> {
    private readonly key: string;
    private readonly pending = new Set<Promise<void>>();
    private readonly logger: Logger;

    constructor(
        private readonly live: LiveInstanceLoader,
        private readonly cache: ResourceCache,
        private readonly options: CachedLoaderOptions,
        logger: Logger
    ) {
        this.key = cacheKey(options.region, live.filters);
        this.logger = logger.child('picker-cache');
    }

    async load(signal?: AbortSignal): Promise<Instance[]> {
        const cached = await this.readCache();
        if (cached) {
            this.logger.debug('Using cached instances', { count: cached.length });
            if (this.options.backgroundRefresh) {
                this.track(this.refresh(signal));
            }
            return cached;
        }

        const instances = await this.live.load(signal);
        await this.store(instances);
        return instances;
    }

    async close(): Promise<void> {
        await Promise.all([...this.pending]);
    }

    private async readCache(): Promise<Instance[] | null> {
        const lookup = await this.cache.get(this.key);
        if (!lookup.present) return null;

        const parsed = cachedInstancesSchema.safeParse(lookup.value);
        if (!parsed.success) {
            this.logger.debug('Discarding cached instances with unexpected shape');
            return null;
        }
        return parsed.data;
    }

    private async store(instances: Instance[]): Promise<void> {
        try {
            await this.cache.set(this.key, instances, this.options.region, this.live.filters);
        } catch (err) {
            this.logger.warn('Failed to write instance cache', { error: errorMessage(err) });
        }
    }

    private async refresh(signal?: AbortSignal): Promise<void> {
        try {
            await this.store(await this.live.load(signal));
        } catch (err) {
            this.logger.debug('Background refresh failed', { error: errorMessage(err) });
        }
    }

    private track(work: Promise<void>): void {
        this.pending.add(work);
        void work.finally(() => this.pending.delete(work));
    }
}

export class ProvidedLoader<T> implements Loader<T> {
    constructor(private readonly items: T[]) {}

    async load(): Promise<T[]> {
        return [...this.items];
    }
}

/**
 * ================================================================================
 * EKS, ASG AND LAUNCH TEMPLATES
 * ================================================================================
 */

export class ClusterLoader implements Loader<ClusterSummary> {
    constructor(private readonly eks: EksService) {}

    load(signal?: AbortSignal): Promise<ClusterSummary[]> {
        return this.eks.listClusterSummaries(signal);
    }
}

export class NodeGroupLoader implements Loader<NodeGroup> {
    constructor(private readonly eks: EksService, private readonly clusterName: string) {}

    load(signal?: AbortSignal): Promise<NodeGroup[]> {
        return this.eks.describeNodeGroups(this.clusterName, signal);
    }
}

export class AsgLoader implements Loader<AutoScalingGroup> {
    constructor(private readonly service: AutoScalingService) {}

    load(signal?: AbortSignal): Promise<AutoScalingGroup[]> {
        return this.service.listGroups(signal);
    }
}

export class LaunchTemplateVersionLoader implements Loader<LaunchTemplateVersion> {
    constructor(private readonly service: LaunchTemplateService, private readonly templateId: string) {}

    load(signal?: AbortSignal): Promise<LaunchTemplateVersion[]> {
        return this.service.listVersions(this.templateId, signal);
    }
}
