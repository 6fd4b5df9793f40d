/**
 * ================================================================================
 * TYPE DEFINITIONS - Core Data Structures
 * ================================================================================
 *
 * Central model types shared by services, the picker and the TUI. Each model
 * is an immutable snapshot converted from an AWS SDK response; a new snapshot
 * is fetched on every list.
 *
 * KEY INTERFACES:
 * • Instance - EC2 instance snapshot
 * • Cluster / NodeGroup / FargateProfile - EKS tree (no cycles)
 * • AutoScalingGroup - ASG with its scaling triple and members
 * • ScalingTriple - {min, max, desired} with 0 ≤ min ≤ desired ≤ max
 */

/**
 * ================================================================================
 * INSTANCE REPRESENTATION
 * ================================================================================
 */

export type InstanceState = 'pending' | 'running' | 'shutting-down' | 'stopping' | 'stopped' | 'terminated';

export interface Instance {
    instanceId: string;
    name: string;                          // "Name" tag, empty when untagged
    state: InstanceState | string;
    instanceType: string;
    privateIp?: string;
    publicIp?: string;
    privateDns?: string;
    publicDns?: string;
    availabilityZone?: string;
    tags: Record<string, string>;
    launchTime?: Date;
    instanceProfile?: string;
    securityGroups: string[];
}

/**
 * A single server-side filter for DescribeInstances / DescribeSubnets.
 */
export interface ResourceFilter {
    name: string;
    values: string[];
}

/**
 * ================================================================================
 * NETWORK INTERFACES
 * ================================================================================
 */

export interface NetworkInterface {
    interfaceName: string;                 // ens5, ens6, ... in device order
    interfaceId: string;
    privateIp: string;
    subnetId: string;
    subnetCidr: string;
    securityGroups: string[];
    macAddress: string;
    deviceIndex: number;
    networkCardIndex: number;
}

export interface InstanceInterfaces {
    instanceId: string;
    instanceName: string;
    dnsName: string;
    interfaces: NetworkInterface[];
}

/**
 * ================================================================================
 * SCALING
 * ================================================================================
 */

export interface ScalingTriple {
    min: number;
    max: number;
    desired: number;
}

/**
 * Partial update; absent bounds fall back to the resource's current values.
 */
export interface ScalingUpdate {
    min?: number;
    max?: number;
    desired: number;
}

export interface LaunchTemplateRef {
    id?: string;
    name?: string;
    version?: string;
}

/**
 * ================================================================================
 * EKS
 * ================================================================================
 */

export interface ClusterVpcConfig {
    vpcId?: string;
    subnetIds: string[];
    securityGroupIds: string[];
    clusterSecurityGroupId?: string;
    endpointPublicAccess: boolean;
    endpointPrivateAccess: boolean;
    publicAccessCidrs: string[];
}

export interface ClusterLogging {
    type: string;
    enabled: boolean;
}

export interface NodeGroupTaint {
    key: string;
    value?: string;
    effect: string;
}

export interface NodeGroup {
    clusterName: string;
    name: string;
    arn?: string;
    status: string;
    version?: string;
    releaseVersion?: string;
    instanceTypes: string[];
    capacityType?: string;
    amiType?: string;
    diskSize?: number;
    scaling: ScalingTriple;
    currentSize: number;
    launchTemplate?: LaunchTemplateRef;
    taints: NodeGroupTaint[];
    labels: Record<string, string>;
    subnets: string[];
    tags: Record<string, string>;
    createdAt?: Date;
}

export interface FargateProfile {
    name: string;
    arn?: string;
    status: string;
    podExecutionRoleArn?: string;
    subnets: string[];
    selectors: { namespace?: string; labels: Record<string, string> }[];
    createdAt?: Date;
}

export interface Cluster {
    name: string;
    arn?: string;
    status: string;
    version?: string;
    platformVersion?: string;
    endpoint?: string;
    roleArn?: string;
    vpc: ClusterVpcConfig;
    logging: ClusterLogging[];
    nodeGroups: NodeGroup[];
    fargateProfiles: FargateProfile[];
    encryptionResources: string[];
    oidcIssuer?: string;
    createdAt?: Date;
    tags: Record<string, string>;
}

/**
 * Lightweight cluster row used by list views.
 */
export interface ClusterSummary {
    name: string;
    status: string;
    version?: string;
    arn?: string;
}

/**
 * ================================================================================
 * AUTO SCALING
 * ================================================================================
 */

export interface AsgInstance {
    instanceId: string;
    availabilityZone?: string;
    lifecycleState: string;
    healthStatus: string;
    instanceType?: string;
}

export interface AutoScalingGroup {
    name: string;
    arn?: string;
    scaling: ScalingTriple;
    currentSize: number;
    status: string;
    healthCheckType?: string;
    healthCheckGracePeriod?: number;
    availabilityZones: string[];
    subnets: string[];
    launchTemplate?: LaunchTemplateRef;
    launchConfigurationName?: string;
    loadBalancerNames: string[];
    targetGroupArns: string[];
    instances: AsgInstance[];
    tags: Record<string, string>;
    createdAt?: Date;
}

export interface LaunchTemplateVersion {
    templateId: string;
    templateName?: string;
    versionNumber: number;
    description?: string;
    isDefault: boolean;
    createdAt?: Date;
    createdBy?: string;
    instanceType?: string;
    imageId?: string;
}

/**
 * ================================================================================
 * SESSIONS
 * ================================================================================
 */

export interface SessionRecord {
    sessionId: string;
    streamUrl: string;
    token: string;
    targetId: string;
    openedAt: Date;
}

export interface PortForwardPorts {
    remotePort: number;
    localPort: number;
}
