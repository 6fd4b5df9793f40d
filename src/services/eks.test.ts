import { describe, expect, it, vi } from 'vitest';
import type {
    DescribeClusterCommandOutput,
    DescribeNodegroupCommandInput,
    DescribeNodegroupCommandOutput,
    ListFargateProfilesCommandOutput,
    ListNodegroupsCommandInput,
    ListNodegroupsCommandOutput,
    Nodegroup,
    UpdateNodegroupConfigCommandInput,
    UpdateNodegroupConfigCommandOutput,
    UpdateNodegroupVersionCommandInput,
    UpdateNodegroupVersionCommandOutput
} from '@aws-sdk/client-eks';
import { fakeAwsClient } from '../testing/fakeAws';
import { EksService } from './eks';

const nodegroup = (name: string, extra: Partial<Nodegroup> = {}): Nodegroup => ({
    clusterName: 'prod',
    nodegroupName: name,
    status: 'ACTIVE',
    scalingConfig: { minSize: 1, maxSize: 4, desiredSize: 2 },
    instanceTypes: ['m5.large'],
    ...extra
});

const describeNodegroup = (groups: Nodegroup[]) =>
    vi.fn(async (input: DescribeNodegroupCommandInput): Promise<DescribeNodegroupCommandOutput> => ({
        $metadata: {},
        nodegroup: groups.find((g) => g.nodegroupName === input.nodegroupName)
    }));

describe('EksService', () => {
    it('should validate scaling with the node group wording', async () => {
        const client = fakeAwsClient({ eks: { describeNodegroup: describeNodegroup([nodegroup('workers')]) } });

        await expect(new EksService(client).updateNodeGroupScaling('prod', 'workers', { desired: 9 }))
            .rejects.toThrow('desired size (9) must be between min size (1) and max size (4)');
    });

    it('should send the merged scaling config', async () => {
        const update = vi.fn(async (_input: UpdateNodegroupConfigCommandInput): Promise<UpdateNodegroupConfigCommandOutput> => ({ $metadata: {} }));
        const client = fakeAwsClient({ eks: { describeNodegroup: describeNodegroup([nodegroup('workers')]), updateNodegroupConfig: update } });

        await expect(new EksService(client).updateNodeGroupScaling('prod', 'workers', { max: 6, desired: 5 }))
            .resolves.toEqual({ min: 1, max: 6, desired: 5 });
        expect(update).toHaveBeenCalledWith({
            clusterName: 'prod',
            nodegroupName: 'workers',
            scalingConfig: { minSize: 1, maxSize: 6, desiredSize: 5 }
        });
    });

    it('should refuse a launch template update for a node group without one', async () => {
        const client = fakeAwsClient({ eks: { describeNodegroup: describeNodegroup([nodegroup('workers')]) } });

        await expect(new EksService(client).updateNodeGroupLaunchTemplate('prod', 'workers', '3'))
            .rejects.toMatchObject({ kind: 'Validation', message: 'node group workers does not use a launch template' });
    });

    it('should roll the node group to the requested template version', async () => {
        const update = vi.fn(async (_input: UpdateNodegroupVersionCommandInput): Promise<UpdateNodegroupVersionCommandOutput> => ({
            $metadata: {},
            update: { id: 'upd-1' }
        }));
        const groups = [nodegroup('workers', { launchTemplate: { id: 'lt-0abc', name: 'workers-lt', version: '2' } })];
        const client = fakeAwsClient({ eks: { describeNodegroup: describeNodegroup(groups), updateNodegroupVersion: update } });

        await expect(new EksService(client).updateNodeGroupLaunchTemplate('prod', 'workers', '3')).resolves.toBe('upd-1');
        expect(update).toHaveBeenCalledWith({ clusterName: 'prod', nodegroupName: 'workers', launchTemplate: { id: 'lt-0abc', version: '3' } });
    });

    it('should describe a cluster with its node groups even when fargate listing fails', async () => {
        const listNodegroups = vi.fn(async (_input: ListNodegroupsCommandInput): Promise<ListNodegroupsCommandOutput> => ({
            $metadata: {},
            nodegroups: ['workers', 'system']
        }));
        const listFargateProfiles = vi.fn(async (): Promise<ListFargateProfilesCommandOutput> => {
            throw Object.assign(new Error('denied'), { name: 'AccessDeniedException' });
        });
        const client = fakeAwsClient({
            eks: {
                describeCluster: async (): Promise<DescribeClusterCommandOutput> => ({
                    $metadata: {},
                    cluster: { name: 'prod', status: 'ACTIVE', version: '1.29', resourcesVpcConfig: { subnetIds: ['subnet-a'], endpointPublicAccess: true } }
                }),
                listNodegroups,
                describeNodegroup: describeNodegroup([nodegroup('workers'), nodegroup('system')]),
                listFargateProfiles
            }
        });

        const cluster = await new EksService(client).describeCluster('prod');

        expect(cluster.nodeGroups.map((ng) => ng.name)).toEqual(['system', 'workers']);
        expect(cluster.fargateProfiles).toEqual([]);
        expect(cluster.vpc).toMatchObject({ subnetIds: ['subnet-a'], endpointPublicAccess: true, endpointPrivateAccess: false });
    });

    it('should report a missing cluster as not found', async () => {
        const client = fakeAwsClient({ eks: { describeCluster: async (): Promise<DescribeClusterCommandOutput> => ({ $metadata: {} }) } });

        await expect(new EksService(client).describeClusterBasic('ghost')).rejects.toMatchObject({ kind: 'NotFound', message: 'cluster ghost not found' });
    });
});
