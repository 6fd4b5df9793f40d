/**
 * ================================================================================
 * RESOURCE SELECTION - Identifier Resolution with Picker Fallback
 * ================================================================================
 *
 * Commands that act on one resource accept an optional name or identifier:
 * • absent     - the fuzzy picker opens over every candidate
 * • ambiguous  - the picker opens over the matches
 * • unique     - used directly
 *
 * //? A cancelled picker raises Cancelled, printed as "cancelled"
 */

import { AutoScalingService } from '../services/autoscaling';
import { EksService } from '../services/eks';
import { stateFilter } from '../services/identifier';
import { InstanceService } from '../services/instances';
import { AutoScalingGroup, ClusterSummary, Instance, NodeGroup, ResourceFilter } from '../types';
import { InstancePickerOptions, pickInstances } from '../ui/fuzzy/finder';
import { AsgLoader, CachedInstanceLoader, ClusterLoader, LiveInstanceLoader, Loader, NodeGroupLoader, ProvidedLoader } from '../ui/fuzzy/loaders';
import { asgSource, clusterSource, FinderSource, nodeGroupSource } from '../ui/fuzzy/sources';
import { AmbiguousIdentifierError, AppError, cancelledError } from '../utils/errors';
import { validateInstanceId } from '../utils/validation';
import { AppContext } from './context';

export interface InstanceSelectOptions {
    favorites?: boolean;
    multi?: boolean;
    prompt?: string;
}

export function pickerOptions(ctx: AppContext, options: InstanceSelectOptions = {}): InstancePickerOptions {
    return {
        columns: ctx.options.columns,
        weights: ctx.config.interactive.weights,
        maxItems: ctx.config.interactive.max_instances,
        noColor: ctx.options.noColor,
        width: ctx.options.width,
        multi: options.multi ?? ctx.options.multi,
        favorites: options.favorites,
        prompt: options.prompt,
        signal: ctx.signal
    };
}

/**
 * Loader over instances matching `filters`, through the cache when it is enabled.
 */
export function instanceLoader(ctx: AppContext, filters: ResourceFilter[]): Loader<Instance> {
    const live = new LiveInstanceLoader(ctx.client(), filters, ctx.streamConfig());
    const cache = ctx.cache();
    if (!cache) return live;
    return new CachedInstanceLoader(live, cache, { region: ctx.options.region, backgroundRefresh: true }, ctx.logger);
}

function requireSelection<T>(selected: T[]): T[] {
    if (selected.length === 0) {
        throw cancelledError('no selection made');
    }
    return selected;
}

/**
 * Pick one or more running instances (all non-terminated with allStates).
 */
export async function pickInstancesInteractively(ctx: AppContext, options: InstanceSelectOptions & { allStates?: boolean; tagFilters?: ResourceFilter[] } = {}): Promise<Instance[]> {
    const filters = [...(options.tagFilters ?? []), stateFilter(options.allStates ?? false)];
    const selected = await pickInstances(ctx.finder(), instanceLoader(ctx, filters), pickerOptions(ctx, options), ctx.logger);
    return requireSelection(selected);
}

/**
 * Resolve an identifier to one instance, preferring running instances and
 * falling back to every non-terminated one.
 */
export async function resolveInstance(ctx: AppContext, identifier: string | undefined, options: InstanceSelectOptions = {}): Promise<Instance> {
    if (!identifier) {
        const [first] = await pickInstancesInteractively(ctx, { ...options, multi: false });
        return first;
    }

    const trimmed = identifier.trim();
    if (ctx.gates.isEnabled('validation') && trimmed.startsWith('i-')) {
        validateInstanceId(trimmed);
    }

    const service = new InstanceService(ctx.client(), ctx.streamConfig());
    try {
        return await resolveWithFallback(service, trimmed, ctx.signal);
    } catch (err) {
        if (!(err instanceof AmbiguousIdentifierError) || !err.allowInteractive) {
            throw err;
        }
        ctx.logger.info(`${err.instances.length} instances match "${trimmed}", choose one`);
        const picked = await pickInstances(ctx.finder(), new ProvidedLoader(err.instances), pickerOptions(ctx, { ...options, multi: false }), ctx.logger);
        return requireSelection(picked)[0];
    }
}

async function resolveWithFallback(service: InstanceService, identifier: string, signal: AbortSignal): Promise<Instance> {
    try {
        return await service.resolveSingleInstance(identifier, { signal });
    } catch (err) {
        if (err instanceof AppError && err.kind === 'NotFound') {
            return service.resolveSingleInstance(identifier, { allStates: true, signal });
        }
        throw err;
    }
}

/**
 * ================================================================================
 * EKS AND AUTO SCALING
 * ================================================================================
 */

export async function pickOne<T>(ctx: AppContext, loader: Loader<T>, source: FinderSource<T>, prompt: string): Promise<T> {
    const selected = await ctx.finder().run(loader, source, {
        prompt,
        noColor: ctx.options.noColor,
        width: ctx.options.width,
        preview: true,
        signal: ctx.signal
    });
    return requireSelection(selected)[0];
}

export async function selectClusterName(ctx: AppContext, eks: EksService, name: string | undefined): Promise<string> {
    if (name) return name;
    const cluster: ClusterSummary = await pickOne(ctx, new ClusterLoader(eks), clusterSource(), 'cluster >');
    return cluster.name;
}

export async function selectNodeGroup(ctx: AppContext, eks: EksService, clusterName: string, name: string | undefined): Promise<NodeGroup> {
    if (name) {
        return eks.describeNodeGroup(clusterName, name, ctx.signal);
    }
    return pickOne(ctx, new NodeGroupLoader(eks, clusterName), nodeGroupSource(), 'node group >');
}

export async function selectAsg(ctx: AppContext, service: AutoScalingService, name: string | undefined): Promise<AutoScalingGroup> {
    if (name) {
        return service.describeGroup(name, ctx.signal);
    }
    return pickOne(ctx, new AsgLoader(service), asgSource(), 'asg >');
}
