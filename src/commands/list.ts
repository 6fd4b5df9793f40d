/**
 * ================================================================================
 * LIST COMMAND - Instance Discovery and Status Display
 * ================================================================================
 *
 * Streams DescribeInstances pages and prints one row per instance in the
 * configured columns (--columns or default.columns), or JSON with -o json.
 *
 * FILTERING:
 * • -t Key=Value (repeatable) - tag filters, ANDed
 * • running instances only unless -a/--all
 *
 * //! PERFORMANCE: capped by interactive.max_instances and the stream memory limit
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { parseTagFilters } from '../services/identifier';
import { InstanceService } from '../services/instances';
import { runAction } from './context';
import { formatInstanceTable } from './format';

interface ListOptions {
    tag: string[];
    all?: boolean;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export const listCommand = new Command('list')
    .description('List EC2 instances')
    .option('-t, --tag <Key=Value>', 'filter by tag (repeatable)', collect, [])
    .option('-a, --all', 'include stopped and pending instances')
    .action(async (options: ListOptions, command: Command) => {
        await runAction(command, 'list', async (ctx) => {
            const tagFilters = parseTagFilters(options.tag);
            const service = new InstanceService(ctx.client(), ctx.streamConfig());

            const spinner = ctx.logger.spinner('Fetching instances');
            const timer = ctx.logger.timer('list instances');
            const instances = await service
                .listInstances({ tagFilters, allStates: options.all, signal: ctx.signal })
                .finally(() => spinner.stop());
            timer.end();

            if (ctx.options.json) {
                console.log(JSON.stringify(instances, null, 2));
                return;
            }
            if (instances.length === 0) {
                ctx.logger.info('No instances found matching the criteria.');
                return;
            }

            const [header, rule, ...rows] = formatInstanceTable(instances, ctx.options.columns);
            console.log(chalk.bold(header));
            console.log(rule);
            rows.forEach((row, i) => {
                const state = instances[i].state;
                //? Color-coded state: running plain, stopped yellow, others dim
                console.log(state === 'running' ? row : state === 'stopped' ? chalk.yellow(row) : chalk.dim(row));
            });
            ctx.logger.success(`Listed ${instances.length} instances`);
        });
    });
