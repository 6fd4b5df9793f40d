/**
 * ================================================================================
 * NETWORK SERVICE - Instance Network Interfaces
 * ================================================================================
 *
 * Lists the ENIs of matching instances with the Linux names they get on Nitro
 * hosts: ens5, ens6, ... in (network card, device index) order.
 *
 * //? Subnet CIDRs are looked up once per subnet; a failed lookup shows "N/A"
 */

import type { Instance as Ec2Instance, InstanceNetworkInterface } from '@aws-sdk/client-ec2';
import { AwsClient } from '../aws/awsClient';
import { InstanceInterfaces, NetworkInterface, ResourceFilter } from '../types';
import { errorMessage } from '../utils/errors';
import { dnsAlternates, stateFilter } from './identifier';
import { toSdkFilters } from './instanceStream';

export const NOT_AVAILABLE = 'N/A';
const FIRST_ENS_INDEX = 5;

export interface InterfaceQuery {
    nodeNames?: string[];
    instanceIds?: string[];
    tags?: ResourceFilter[];
    showAll?: boolean;
}

/**
 * DescribeInstances filters for an interface listing.
 */
export function buildInterfaceFilters(query: InterfaceQuery): ResourceFilter[] {
    const filters: ResourceFilter[] = [stateFilter(query.showAll ?? false)];

    if (query.nodeNames?.length) {
        filters.push({ name: 'private-dns-name', values: query.nodeNames.flatMap(dnsAlternates) });
    }
    if (query.instanceIds?.length) {
        filters.push({ name: 'instance-id', values: query.instanceIds });
    }
    filters.push(...(query.tags ?? []));
    return filters;
}

function attachmentOrder(iface: InstanceNetworkInterface): [number, number] {
    return [iface.Attachment?.NetworkCardIndex ?? 0, iface.Attachment?.DeviceIndex ?? 0];
}

export function sortInterfaces(interfaces: InstanceNetworkInterface[]): InstanceNetworkInterface[] {
    return [...interfaces].sort((a, b) => {
        const [cardA, deviceA] = attachmentOrder(a);
        const [cardB, deviceB] = attachmentOrder(b);
        return cardA !== cardB ? cardA - cardB : deviceA - deviceB;
    });
}

export class NetworkService {
    private readonly subnetCidrs = new Map<string, Promise<string>>();

    constructor(private readonly client: AwsClient) {}

    async getInstanceInterfaces(filters: ResourceFilter[], signal?: AbortSignal): Promise<InstanceInterfaces[]> {
        const instances = await this.describe(filters, signal);
        const results: InstanceInterfaces[] = [];

        for (const inst of instances) {
            if (inst.State?.Name === 'terminated') continue;
            results.push(await this.interfacesOf(inst, signal));
        }
        return results;
    }

    private async describe(filters: ResourceFilter[], signal?: AbortSignal): Promise<Ec2Instance[]> {
        const out: Ec2Instance[] = [];
        let nextToken: string | undefined;
        do {
            const token = nextToken;
            const page = await this.client.call('DescribeInstances', () => this.client.services.ec2.describeInstances({
                Filters: toSdkFilters(filters),
                NextToken: token
            }), { signal });
            for (const reservation of page.Reservations ?? []) {
                out.push(...(reservation.Instances ?? []));
            }
            nextToken = page.NextToken;
        } while (nextToken);
        return out;
    }

    private async interfacesOf(inst: Ec2Instance, signal?: AbortSignal): Promise<InstanceInterfaces> {
        const interfaces: NetworkInterface[] = [];
        let ens = FIRST_ENS_INDEX;

        for (const iface of sortInterfaces(inst.NetworkInterfaces ?? [])) {
            const [networkCardIndex, deviceIndex] = attachmentOrder(iface);
            const subnetId = iface.SubnetId || NOT_AVAILABLE;
            interfaces.push({
                interfaceName: `ens${ens++}`,
                interfaceId: iface.NetworkInterfaceId ?? NOT_AVAILABLE,
                privateIp: iface.PrivateIpAddress ?? NOT_AVAILABLE,
                subnetId,
                subnetCidr: subnetId === NOT_AVAILABLE ? NOT_AVAILABLE : await this.subnetCidr(subnetId, signal),
                securityGroups: (iface.Groups ?? []).flatMap((g) => (g.GroupId ? [g.GroupId] : [])),
                macAddress: iface.MacAddress ?? NOT_AVAILABLE,
                deviceIndex,
                networkCardIndex
            });
        }

        const name = inst.Tags?.find((t) => t.Key === 'Name')?.Value;
        return {
            instanceId: inst.InstanceId ?? '',
            instanceName: name || NOT_AVAILABLE,
            dnsName: inst.PrivateDnsName || NOT_AVAILABLE,
            interfaces
        };
    }

    private subnetCidr(subnetId: string, signal?: AbortSignal): Promise<string> {
        let cidr = this.subnetCidrs.get(subnetId);
        if (!cidr) {
            cidr = this.client.call('DescribeSubnets',
                () => this.client.services.ec2.describeSubnets({ SubnetIds: [subnetId] }), { signal })
                .then((output) => output.Subnets?.[0]?.CidrBlock ?? NOT_AVAILABLE)
                .catch((err: unknown) => {
                    this.client.logger.debug(`Subnet lookup failed for ${subnetId}`, { error: errorMessage(err) });
                    return NOT_AVAILABLE;
                });
            this.subnetCidrs.set(subnetId, cidr);
        }
        return cidr;
    }
}
