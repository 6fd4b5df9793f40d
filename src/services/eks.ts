/**
 * ================================================================================
 * EKS SERVICE - Clusters, Node Groups and Fargate Profiles
 * ================================================================================
 *
 * Read-side lookups for the cluster tree plus the two node-group mutations the
 * CLI offers: scaling and launch-template version rollout.
 *
 * //? describeCluster tolerates node group / fargate listing failures; the
 * //? cluster is still returned and a warning is logged
 */

import type {
    Cluster as SdkCluster,
    FargateProfile as SdkFargateProfile,
    Nodegroup as SdkNodegroup
} from '@aws-sdk/client-eks';
import { AwsClient } from '../aws/awsClient';
import { Cluster, ClusterSummary, FargateProfile, NodeGroup, ScalingTriple, ScalingUpdate } from '../types';
import { AppError, errorMessage } from '../utils/errors';
import { resolveScaling } from '../utils/validation';

/**
 * ================================================================
 * CONVERSION
 * ================================================================
 */

export function toCluster(cluster: SdkCluster): Cluster {
    const vpc = cluster.resourcesVpcConfig;
    return {
        name: cluster.name ?? '',
        arn: cluster.arn,
        status: cluster.status ?? 'UNKNOWN',
        version: cluster.version,
        platformVersion: cluster.platformVersion,
        endpoint: cluster.endpoint,
        roleArn: cluster.roleArn,
        vpc: {
            vpcId: vpc?.vpcId,
            subnetIds: vpc?.subnetIds ?? [],
            securityGroupIds: vpc?.securityGroupIds ?? [],
            clusterSecurityGroupId: vpc?.clusterSecurityGroupId,
            endpointPublicAccess: vpc?.endpointPublicAccess ?? false,
            endpointPrivateAccess: vpc?.endpointPrivateAccess ?? false,
            publicAccessCidrs: vpc?.publicAccessCidrs ?? []
        },
        logging: (cluster.logging?.clusterLogging ?? []).flatMap((setup) =>
            (setup.types ?? []).map((type) => ({ type, enabled: setup.enabled ?? false }))),
        nodeGroups: [],
        fargateProfiles: [],
        encryptionResources: (cluster.encryptionConfig ?? []).flatMap((config) => config.resources ?? []),
        oidcIssuer: cluster.identity?.oidc?.issuer,
        createdAt: cluster.createdAt,
        tags: cluster.tags ?? {}
    };
}

export function toNodeGroup(ng: SdkNodegroup): NodeGroup {
    const scaling: ScalingTriple = {
        min: ng.scalingConfig?.minSize ?? 0,
        max: ng.scalingConfig?.maxSize ?? 0,
        desired: ng.scalingConfig?.desiredSize ?? 0
    };
    return {
        clusterName: ng.clusterName ?? '',
        name: ng.nodegroupName ?? '',
        arn: ng.nodegroupArn,
        status: ng.status ?? 'UNKNOWN',
        version: ng.version,
        releaseVersion: ng.releaseVersion,
        instanceTypes: ng.instanceTypes ?? [],
        capacityType: ng.capacityType,
        amiType: ng.amiType,
        diskSize: ng.diskSize,
        scaling,
        //? EKS reports no live count; the desired size stands in for it
        currentSize: scaling.desired,
        launchTemplate: ng.launchTemplate
            ? { id: ng.launchTemplate.id, name: ng.launchTemplate.name, version: ng.launchTemplate.version }
            : undefined,
        taints: (ng.taints ?? []).map((t) => ({ key: t.key ?? '', value: t.value, effect: t.effect ?? '' })),
        labels: ng.labels ?? {},
        subnets: ng.subnets ?? [],
        tags: ng.tags ?? {},
        createdAt: ng.createdAt
    };
}

export function toFargateProfile(profile: SdkFargateProfile): FargateProfile {
    return {
        name: profile.fargateProfileName ?? '',
        arn: profile.fargateProfileArn,
        status: profile.status ?? 'UNKNOWN',
        podExecutionRoleArn: profile.podExecutionRoleArn,
        subnets: profile.subnets ?? [],
        selectors: (profile.selectors ?? []).map((s) => ({ namespace: s.namespace, labels: s.labels ?? {} })),
        createdAt: profile.createdAt
    };
}

/**
 * ================================================================
 * SERVICE
 * ================================================================
 */

export class EksService {
    constructor(private readonly client: AwsClient) {}

    async listClusters(signal?: AbortSignal): Promise<string[]> {
        const names: string[] = [];
        let nextToken: string | undefined;
        do {
            const page = await this.client.call('ListClusters',
                () => this.client.services.eks.listClusters({ nextToken }), { signal });
            names.push(...(page.clusters ?? []));
            nextToken = page.nextToken;
        } while (nextToken);
        return names.sort();
    }

    /**
     * Cluster rows for list views, one DescribeCluster per name.
     */
    async listClusterSummaries(signal?: AbortSignal): Promise<ClusterSummary[]> {
        const names = await this.listClusters(signal);
        return Promise.all(names.map(async (name) => {
            const cluster = await this.describeClusterBasic(name, signal);
            return { name: cluster.name, status: cluster.status, version: cluster.version, arn: cluster.arn };
        }));
    }

    async describeClusterBasic(name: string, signal?: AbortSignal): Promise<Cluster> {
        const output = await this.client.call('DescribeCluster',
            () => this.client.services.eks.describeCluster({ name }), { signal });
        if (!output.cluster) {
            throw new AppError('NotFound', `cluster ${name} not found`);
        }
        return toCluster(output.cluster);
    }

    /**
     * The cluster with its node groups and Fargate profiles.
     */
    async describeCluster(name: string, signal?: AbortSignal): Promise<Cluster> {
        const cluster = await this.describeClusterBasic(name, signal);

        const [nodeGroups, fargateProfiles] = await Promise.all([
            this.describeNodeGroups(name, signal).catch((err: unknown) => {
                this.client.logger.warn(`Failed to fetch node groups for cluster ${name}: ${errorMessage(err)}`);
                return [];
            }),
            this.describeFargateProfiles(name, signal).catch((err: unknown) => {
                this.client.logger.warn(`Failed to fetch Fargate profiles for cluster ${name}: ${errorMessage(err)}`);
                return [];
            })
        ]);

        return { ...cluster, nodeGroups, fargateProfiles };
    }

    async listNodeGroups(clusterName: string, signal?: AbortSignal): Promise<string[]> {
        const names: string[] = [];
        let nextToken: string | undefined;
        do {
            const page = await this.client.call('ListNodegroups',
                () => this.client.services.eks.listNodegroups({ clusterName, nextToken }), { signal });
            names.push(...(page.nodegroups ?? []));
            nextToken = page.nextToken;
        } while (nextToken);
        return names.sort();
    }

    async describeNodeGroup(clusterName: string, nodeGroupName: string, signal?: AbortSignal): Promise<NodeGroup> {
        const output = await this.client.call('DescribeNodegroup',
            () => this.client.services.eks.describeNodegroup({ clusterName, nodegroupName: nodeGroupName }), { signal });
        if (!output.nodegroup) {
            throw new AppError('NotFound', `node group ${nodeGroupName} not found`);
        }
        return toNodeGroup(output.nodegroup);
    }

    async describeNodeGroups(clusterName: string, signal?: AbortSignal): Promise<NodeGroup[]> {
        const names = await this.listNodeGroups(clusterName, signal);
        return Promise.all(names.map((name) => this.describeNodeGroup(clusterName, name, signal)));
    }

    async describeFargateProfiles(clusterName: string, signal?: AbortSignal): Promise<FargateProfile[]> {
        const { eks } = this.client.services;
        const names: string[] = [];
        let nextToken: string | undefined;
        do {
            const page = await this.client.call('ListFargateProfiles',
                () => eks.listFargateProfiles({ clusterName, nextToken }), { signal });
            names.push(...(page.fargateProfileNames ?? []));
            nextToken = page.nextToken;
        } while (nextToken);

        return Promise.all(names.map(async (fargateProfileName) => {
            const output = await this.client.call('DescribeFargateProfile',
                () => eks.describeFargateProfile({ clusterName, fargateProfileName }), { signal });
            if (!output.fargateProfile) {
                throw new AppError('NotFound', `Fargate profile ${fargateProfileName} not found`);
            }
            return toFargateProfile(output.fargateProfile);
        }));
    }

    /**
     * Resize a node group. Bounds left out of `update` keep their current values.
     */
    async updateNodeGroupScaling(clusterName: string, nodeGroupName: string, update: ScalingUpdate, signal?: AbortSignal): Promise<ScalingTriple> {
        const current = await this.describeNodeGroup(clusterName, nodeGroupName, signal);
        const next = resolveScaling(current.scaling, update, { desired: 'desired size' });

        await this.client.call('UpdateNodegroupConfig', () => this.client.services.eks.updateNodegroupConfig({
            clusterName,
            nodegroupName: nodeGroupName,
            scalingConfig: { minSize: next.min, maxSize: next.max, desiredSize: next.desired }
        }), { signal });

        this.client.logger.step('NODEGROUP_SCALE', `Updated ${clusterName}/${nodeGroupName}: min=${next.min} max=${next.max} desired=${next.desired}`);
        return next;
    }

    /**
     * Roll a node group to another version of its launch template.
     * Returns the EKS update id.
     */
    async updateNodeGroupLaunchTemplate(clusterName: string, nodeGroupName: string, version: string, signal?: AbortSignal): Promise<string> {
        if (!version.trim()) {
            throw new AppError('Validation', 'launch template version cannot be empty');
        }

        const nodeGroup = await this.describeNodeGroup(clusterName, nodeGroupName, signal);
        const templateId = nodeGroup.launchTemplate?.id;
        if (!templateId) {
            throw new AppError('Validation', `node group ${nodeGroupName} does not use a launch template`);
        }

        const output = await this.client.call('UpdateNodegroupVersion', () => this.client.services.eks.updateNodegroupVersion({
            clusterName,
            nodegroupName: nodeGroupName,
            launchTemplate: { id: templateId, version }
        }), { signal, noRetry: true });

        const updateId = output.update?.id ?? '';
        this.client.logger.step('NODEGROUP_UPDATE', `Rolling ${clusterName}/${nodeGroupName} to launch template version ${version}`, { updateId });
        return updateId;
    }
}
