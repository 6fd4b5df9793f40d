/**
 * ================================================================================
 * INTERFACES COMMAND - Multi-NIC Listing
 * ================================================================================
 *
 * Shows every network interface of the matching instances, named ens5, ens6, ...
 * in (network card, device index) order, with subnet, CIDR and security groups.
 *
 * SELECTION (combinable):
 * • [identifier]          - resolved like `session` (picker when ambiguous)
 * • -n, --node-name       - private DNS names, with the regional alternates
 * • --instance-id         - explicit ids
 * • -t Key:Value          - tags
 * • none of the above     - picker
 */

import { Command } from 'commander';
import { parseTagFilters } from '../services/identifier';
import { buildInterfaceFilters, NetworkService } from '../services/network';
import { validateInstanceId } from '../utils/validation';
import { runAction } from './context';
import { formatInterfaces } from './format';
import { resolveInstance } from './select';

interface InterfacesOptions {
    nodeName: string[];
    instanceId: string[];
    tag: string[];
    all?: boolean;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export const interfacesCommand = new Command('interfaces')
    .description('List the network interfaces of instances')
    .argument('[identifier]', 'instance ID, name, tag, IP or DNS name')
    .option('-n, --node-name <dns>', 'private DNS name of a node (repeatable)', collect, [])
    .option('--instance-id <id>', 'instance ID (repeatable)', collect, [])
    .option('-t, --tag <Key:Value>', 'filter by tag (repeatable)', collect, [])
    .option('--all', 'include stopped and pending instances')
    .action(async (identifier: string | undefined, options: InterfacesOptions, command: Command) => {
        await runAction(command, 'interfaces', async (ctx) => {
            const instanceIds = [...options.instanceId];
            if (ctx.gates.isEnabled('validation')) {
                instanceIds.forEach(validateInstanceId);
            }

            const selected = options.nodeName.length > 0 || instanceIds.length > 0 || options.tag.length > 0;
            if (identifier || !selected) {
                const instance = await resolveInstance(ctx, identifier);
                instanceIds.push(instance.instanceId);
            }

            const filters = buildInterfaceFilters({
                nodeNames: options.nodeName,
                instanceIds,
                tags: parseTagFilters(options.tag),
                showAll: options.all
            });

            const network = new NetworkService(ctx.client());
            const results = await network.getInstanceInterfaces(filters, ctx.signal);

            if (ctx.options.json) {
                console.log(JSON.stringify(results, null, 2));
                return;
            }
            if (results.length === 0) {
                ctx.logger.info('No instances found matching the criteria.');
                return;
            }
            for (const entry of results) {
                console.log('');
                formatInterfaces(entry).forEach((line) => console.log(line));
            }
            console.log(`\nTotal instances displayed: ${results.length}`);
        });
    });
