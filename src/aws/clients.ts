/**
 * ================================================================================
 * AWS CLIENTS - Service Handles per (region, profile)
 * ================================================================================
 *
 * Each AWS service is reached through a small capability interface naming
 * the calls this tool makes. The default implementations wrap AWS SDK v3
 * clients; tests hand in plain objects instead.
 *
 * SERVICES:
 * • EC2         - DescribeInstances, DescribeSubnets, DescribeLaunchTemplateVersions
 * • SSM         - StartSession, TerminateSession, SendCommand, GetCommandInvocation
 * • Auto Scaling - DescribeAutoScalingGroups, UpdateAutoScalingGroup
 * • EKS         - clusters, node groups, Fargate profiles
 * • STS         - GetCallerIdentity (health checks)
 *
 * //? Profiles are resolved with fromIni; without one the default chain applies
 */

import {
    EC2Client,
    DescribeInstancesCommand,
    DescribeInstancesCommandInput,
    DescribeInstancesCommandOutput,
    DescribeSubnetsCommand,
    DescribeSubnetsCommandInput,
    DescribeSubnetsCommandOutput,
    DescribeLaunchTemplateVersionsCommand,
    DescribeLaunchTemplateVersionsCommandInput,
    DescribeLaunchTemplateVersionsCommandOutput
} from '@aws-sdk/client-ec2';
import {
    SSMClient,
    StartSessionCommand,
    StartSessionCommandInput,
    StartSessionCommandOutput,
    TerminateSessionCommand,
    TerminateSessionCommandInput,
    TerminateSessionCommandOutput,
    SendCommandCommand,
    SendCommandCommandInput,
    SendCommandCommandOutput,
    GetCommandInvocationCommand,
    GetCommandInvocationCommandInput,
    GetCommandInvocationCommandOutput
} from '@aws-sdk/client-ssm';
import {
    AutoScalingClient,
    DescribeAutoScalingGroupsCommand,
    DescribeAutoScalingGroupsCommandInput,
    DescribeAutoScalingGroupsCommandOutput,
    UpdateAutoScalingGroupCommand,
    UpdateAutoScalingGroupCommandInput,
    UpdateAutoScalingGroupCommandOutput
} from '@aws-sdk/client-auto-scaling';
import {
    EKSClient,
    ListClustersCommand,
    ListClustersCommandInput,
    ListClustersCommandOutput,
    DescribeClusterCommand,
    DescribeClusterCommandInput,
    DescribeClusterCommandOutput,
    ListNodegroupsCommand,
    ListNodegroupsCommandInput,
    ListNodegroupsCommandOutput,
    DescribeNodegroupCommand,
    DescribeNodegroupCommandInput,
    DescribeNodegroupCommandOutput,
    UpdateNodegroupConfigCommand,
    UpdateNodegroupConfigCommandInput,
    UpdateNodegroupConfigCommandOutput,
    UpdateNodegroupVersionCommand,
    UpdateNodegroupVersionCommandInput,
    UpdateNodegroupVersionCommandOutput,
    ListFargateProfilesCommand,
    ListFargateProfilesCommandInput,
    ListFargateProfilesCommandOutput,
    DescribeFargateProfileCommand,
    DescribeFargateProfileCommandInput,
    DescribeFargateProfileCommandOutput
} from '@aws-sdk/client-eks';
import {
    STSClient,
    GetCallerIdentityCommand,
    GetCallerIdentityCommandOutput
} from '@aws-sdk/client-sts';
import { fromIni } from '@aws-sdk/credential-providers';

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_PROFILE = 'default';

export interface Ec2Api {
    describeInstances(input: DescribeInstancesCommandInput): Promise<DescribeInstancesCommandOutput>;
    describeSubnets(input: DescribeSubnetsCommandInput): Promise<DescribeSubnetsCommandOutput>;
    describeLaunchTemplateVersions(input: DescribeLaunchTemplateVersionsCommandInput): Promise<DescribeLaunchTemplateVersionsCommandOutput>;
}

export interface SsmApi {
    startSession(input: StartSessionCommandInput): Promise<StartSessionCommandOutput>;
    terminateSession(input: TerminateSessionCommandInput): Promise<TerminateSessionCommandOutput>;
    sendCommand(input: SendCommandCommandInput): Promise<SendCommandCommandOutput>;
    getCommandInvocation(input: GetCommandInvocationCommandInput): Promise<GetCommandInvocationCommandOutput>;
}

export interface AutoScalingApi {
    describeAutoScalingGroups(input: DescribeAutoScalingGroupsCommandInput): Promise<DescribeAutoScalingGroupsCommandOutput>;
    updateAutoScalingGroup(input: UpdateAutoScalingGroupCommandInput): Promise<UpdateAutoScalingGroupCommandOutput>;
}

export interface EksApi {
    listClusters(input: ListClustersCommandInput): Promise<ListClustersCommandOutput>;
    describeCluster(input: DescribeClusterCommandInput): Promise<DescribeClusterCommandOutput>;
    listNodegroups(input: ListNodegroupsCommandInput): Promise<ListNodegroupsCommandOutput>;
    describeNodegroup(input: DescribeNodegroupCommandInput): Promise<DescribeNodegroupCommandOutput>;
    updateNodegroupConfig(input: UpdateNodegroupConfigCommandInput): Promise<UpdateNodegroupConfigCommandOutput>;
    updateNodegroupVersion(input: UpdateNodegroupVersionCommandInput): Promise<UpdateNodegroupVersionCommandOutput>;
    listFargateProfiles(input: ListFargateProfilesCommandInput): Promise<ListFargateProfilesCommandOutput>;
    describeFargateProfile(input: DescribeFargateProfileCommandInput): Promise<DescribeFargateProfileCommandOutput>;
}

export interface StsApi {
    getCallerIdentity(): Promise<GetCallerIdentityCommandOutput>;
}

/**
 * Every service handle for one (region, profile) pair.
 */
export interface AwsClients {
    region: string;
    profile: string;
    ec2: Ec2Api;
    ssm: SsmApi;
    autoScaling: AutoScalingApi;
    eks: EksApi;
    sts: StsApi;
    destroy(): void;
}

export type AwsClientsFactory = (region: string, profile: string) => AwsClients;

/**
 * Region and profile after flag → config → environment fallback.
 */
export function resolveRegionProfile(region?: string, profile?: string): { region: string; profile: string } {
    return {
        region: region || process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || DEFAULT_REGION,
        profile: profile || process.env.AWS_PROFILE || DEFAULT_PROFILE
    };
}

/**
 * ================================================================================
 * SDK-BACKED CLIENTS
 * ================================================================================
 */

export function createEC2Client(region: string, profile: string): EC2Client {
    return new EC2Client({ region, credentials: credentialsFor(profile) });
}

export function createSSMClient(region: string, profile: string): SSMClient {
    return new SSMClient({ region, credentials: credentialsFor(profile) });
}

export function createAutoScalingClient(region: string, profile: string): AutoScalingClient {
    return new AutoScalingClient({ region, credentials: credentialsFor(profile) });
}

export function createEKSClient(region: string, profile: string): EKSClient {
    return new EKSClient({ region, credentials: credentialsFor(profile) });
}

export function createSTSClient(region: string, profile: string): STSClient {
    return new STSClient({ region, credentials: credentialsFor(profile) });
}

function credentialsFor(profile: string) {
    // the default chain covers env credentials, SSO and instance roles
    return profile === DEFAULT_PROFILE && !process.env.AWS_PROFILE ? undefined : fromIni({ profile });
}

export const createAwsClients: AwsClientsFactory = (region, profile) => {
    const ec2 = createEC2Client(region, profile);
    const ssm = createSSMClient(region, profile);
    const autoScaling = createAutoScalingClient(region, profile);
    const eks = createEKSClient(region, profile);
    const sts = createSTSClient(region, profile);

    return {
        region,
        profile,
        ec2: {
            describeInstances: (input) => ec2.send(new DescribeInstancesCommand(input)),
            describeSubnets: (input) => ec2.send(new DescribeSubnetsCommand(input)),
            describeLaunchTemplateVersions: (input) => ec2.send(new DescribeLaunchTemplateVersionsCommand(input))
        },
        ssm: {
            startSession: (input) => ssm.send(new StartSessionCommand(input)),
            terminateSession: (input) => ssm.send(new TerminateSessionCommand(input)),
            sendCommand: (input) => ssm.send(new SendCommandCommand(input)),
            getCommandInvocation: (input) => ssm.send(new GetCommandInvocationCommand(input))
        },
        autoScaling: {
            describeAutoScalingGroups: (input) => autoScaling.send(new DescribeAutoScalingGroupsCommand(input)),
            updateAutoScalingGroup: (input) => autoScaling.send(new UpdateAutoScalingGroupCommand(input))
        },
        eks: {
            listClusters: (input) => eks.send(new ListClustersCommand(input)),
            describeCluster: (input) => eks.send(new DescribeClusterCommand(input)),
            listNodegroups: (input) => eks.send(new ListNodegroupsCommand(input)),
            describeNodegroup: (input) => eks.send(new DescribeNodegroupCommand(input)),
            updateNodegroupConfig: (input) => eks.send(new UpdateNodegroupConfigCommand(input)),
            updateNodegroupVersion: (input) => eks.send(new UpdateNodegroupVersionCommand(input)),
            listFargateProfiles: (input) => eks.send(new ListFargateProfilesCommand(input)),
            describeFargateProfile: (input) => eks.send(new DescribeFargateProfileCommand(input))
        },
        sts: {
            getCallerIdentity: () => sts.send(new GetCallerIdentityCommand({}))
        },
        destroy: () => {
            ec2.destroy();
            ssm.destroy();
            autoScaling.destroy();
            eks.destroy();
            sts.destroy();
        }
    };
};
