/**
 * ================================================================================
 * ASG COMMANDS - Auto Scaling Group Listing and Scaling
 * ================================================================================
 *
 * asg list                 every group with its min/desired/max and current size
 * asg scale [name]         resize a group; bounds left out keep their values
 *
 * VALIDATION (before any API call):
 * • min size cannot be negative
 * • max size cannot be less than min size
 * • desired capacity must be between min and max
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { AutoScalingService } from '../services/autoscaling';
import { ScalingTriple } from '../types';
import { questionnaire, ScalingFlags } from '../utils/questionaire';
import { resolveScaling } from '../utils/validation';
import { AppContext, runAction } from './context';
import { formatAsgTable, formatScalingPlan } from './format';
import { selectAsg } from './select';

interface AsgScaleOptions extends ScalingFlags {
    skipConfirm?: boolean;
}

/**
 * Apply a triple already validated elsewhere (the TUI scale prompt).
 */
export async function scaleAsg(ctx: AppContext, name: string, target: ScalingTriple): Promise<void> {
    const service = new AutoScalingService(ctx.client());
    await service.updateCapacity(name, target, ctx.signal);
    ctx.logger.success(`Scaling initiated for Auto Scaling Group ${name}`);
}

const listGroupsCommand = new Command('list')
    .description('List Auto Scaling Groups')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'asg list', async (ctx) => {
            const service = new AutoScalingService(ctx.client());
            const spinner = ctx.logger.spinner('Fetching Auto Scaling Groups');
            const groups = await service.listGroups(ctx.signal).finally(() => spinner.stop());

            if (ctx.options.json) {
                console.log(JSON.stringify(groups, null, 2));
                return;
            }
            if (groups.length === 0) {
                ctx.logger.info('No Auto Scaling Groups found.');
                return;
            }
            const [header, ...rest] = formatAsgTable(groups);
            console.log(chalk.bold(header));
            rest.forEach((line) => console.log(line));
        });
    });

const scaleGroupCommand = new Command('scale')
    .description('Scale an Auto Scaling Group')
    .argument('[name]', 'group name; picker when omitted')
    .option('--min <n>', 'minimum size')
    .option('--max <n>', 'maximum size')
    .option('--desired <n>', 'desired capacity; prompted when omitted')
    .option('--skip-confirm', 'do not ask for confirmation')
    .action(async (name: string | undefined, options: AsgScaleOptions, command: Command) => {
        await runAction(command, 'asg scale', async (ctx) => {
            const service = new AutoScalingService(ctx.client());
            const asg = await selectAsg(ctx, service, name);

            const update = await questionnaire.promptForScaling('desired capacity', asg.scaling, options);
            const next = resolveScaling(asg.scaling, update);

            console.log(`\nAuto Scaling Group: ${asg.name}\n`);
            formatScalingPlan(asg.scaling, next, asg.currentSize, 'desired capacity').forEach((line) => console.log(line));
            console.log('');

            if (!(await questionnaire.confirm('Do you want to proceed with scaling?', options.skipConfirm))) {
                ctx.logger.info('Scaling cancelled');
                return;
            }

            await service.updateCapacity(asg.name, update, ctx.signal);
            ctx.logger.success(`Scaling initiated for Auto Scaling Group ${asg.name}`);
            console.log(chalk.gray('Note: The scaling operation may take several minutes to complete.'));
        });
    });

export const asgCommand = new Command('asg')
    .description('List and scale Auto Scaling Groups')
    .addCommand(listGroupsCommand)
    .addCommand(scaleGroupCommand);
