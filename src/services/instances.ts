import { AwsClient } from '../aws/awsClient';
import { Instance, ResourceFilter } from '../types';
import { AmbiguousIdentifierError, AppError } from '../utils/errors';
import { describeIdentifierType, parseIdentifier, stateFilter } from './identifier';
import { findInstancesStreaming, InstanceStream, InstanceStreamConfig } from './instanceStream';

export interface ListOptions {
    tagFilters?: ResourceFilter[];
    allStates?: boolean;
    signal?: AbortSignal;
}

export interface ResolveOptions {
    allStates?: boolean;
    signal?: AbortSignal;
}

/**
 * Instance discovery for one pooled client.
 */
export class InstanceService {
    constructor(
        private readonly client: AwsClient,
        private readonly streamConfig: Partial<InstanceStreamConfig> = {}
    ) {}

    async listInstances(options: ListOptions = {}): Promise<Instance[]> {
        const filters = [...(options.tagFilters ?? []), stateFilter(options.allStates ?? false)];
        const stream = new InstanceStream(this.client, filters, this.streamConfig);
        return stream.collect(options.signal);
    }

    async findInstances(identifier: string, options: ResolveOptions = {}): Promise<Instance[]> {
        return findInstancesStreaming(this.client, identifier, {
            includeAllStates: options.allStates,
            stream: this.streamConfig,
            signal: options.signal
        });
    }

    /**
     * Resolve an identifier to exactly one instance.
     *
     * //? Several matches raise AmbiguousIdentifierError; the CLI offers a picker over them
     */
    async resolveSingleInstance(identifier: string, options: ResolveOptions = {}): Promise<Instance> {
        const parsed = parseIdentifier(identifier);
        if (!parsed.value) {
            throw new AppError('Validation', 'instance identifier cannot be empty');
        }

        const instances = await this.findInstances(identifier, options);
        if (instances.length === 0) {
            throw new AppError('NotFound', `no instances found matching ${describeIdentifierType(parsed.kind)}: ${parsed.value}`);
        }
        if (instances.length > 1) {
            throw new AmbiguousIdentifierError(parsed.value, instances, true);
        }
        return instances[0];
    }
}
