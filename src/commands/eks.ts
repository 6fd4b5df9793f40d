/**
 * ================================================================================
 * EKS COMMANDS - Cluster Description and Node Group Operations
 * ================================================================================
 *
 * eks [cluster]                           describe a cluster (picker when omitted)
 * eks nodegroup scale [cluster]           resize a managed node group
 * eks nodegroup update-lt [cluster]       roll a node group to a launch template version
 *
 * //! Mutations print the before/after plan and ask for confirmation
 * //? --skip-confirm is required when stdin is not a terminal
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { EksService } from '../services/eks';
import { LaunchTemplateService } from '../services/launchTemplates';
import { LaunchTemplateVersionLoader } from '../ui/fuzzy/loaders';
import { launchTemplateVersionSource } from '../ui/fuzzy/sources';
import { AppError } from '../utils/errors';
import { questionnaire, ScalingFlags } from '../utils/questionaire';
import { resolveScaling } from '../utils/validation';
import { AppContext, runAction } from './context';
import { formatClusterDescription, formatScalingPlan } from './format';
import { pickOne, selectClusterName, selectNodeGroup } from './select';

interface NodeGroupScaleOptions extends ScalingFlags {
    nodegroup?: string;
    skipConfirm?: boolean;
}

interface NodeGroupUpdateOptions {
    nodegroup?: string;
    version?: string;
    skipConfirm?: boolean;
}

/**
 * Describe one cluster with its node groups and Fargate profiles.
 */
export async function describeCluster(ctx: AppContext, name: string | undefined): Promise<void> {
    const eks = new EksService(ctx.client());
    const clusterName = await selectClusterName(ctx, eks, name);

    const spinner = ctx.logger.spinner(`Describing cluster ${clusterName}`);
    const cluster = await eks.describeCluster(clusterName, ctx.signal).finally(() => spinner.stop());

    if (ctx.options.json) {
        console.log(JSON.stringify(cluster, null, 2));
        return;
    }
    formatClusterDescription(cluster).forEach((line) => console.log(line));
}

async function selectVersion(ctx: AppContext, templateId: string, version: string | undefined): Promise<string> {
    if (version) return version;
    const loader = new LaunchTemplateVersionLoader(new LaunchTemplateService(ctx.client()), templateId);
    const picked = await pickOne(ctx, loader, launchTemplateVersionSource(), 'version >');
    return String(picked.versionNumber);
}

/**
 * ================================================================================
 * NODEGROUP SUBCOMMANDS
 * ================================================================================
 */

const scaleCommand = new Command('scale')
    .description('Scale an EKS managed node group')
    .argument('[cluster]', 'cluster name; picker when omitted')
    .option('--nodegroup <name>', 'node group name; picker when omitted')
    .option('--min <n>', 'minimum size')
    .option('--max <n>', 'maximum size')
    .option('--desired <n>', 'desired size; prompted when omitted')
    .option('--skip-confirm', 'do not ask for confirmation')
    .action(async (cluster: string | undefined, options: NodeGroupScaleOptions, command: Command) => {
        await runAction(command, 'eks nodegroup scale', async (ctx) => {
            const eks = new EksService(ctx.client());
            const clusterName = await selectClusterName(ctx, eks, cluster);
            const nodeGroup = await selectNodeGroup(ctx, eks, clusterName, options.nodegroup);

            const update = await questionnaire.promptForScaling('desired size', nodeGroup.scaling, options);
            const next = resolveScaling(nodeGroup.scaling, update, { desired: 'desired size' });

            console.log(`\nCluster:    ${clusterName}\nNode Group: ${nodeGroup.name}\n`);
            formatScalingPlan(nodeGroup.scaling, next, nodeGroup.currentSize, 'desired size').forEach((line) => console.log(line));
            console.log('');

            if (!(await questionnaire.confirm('Do you want to proceed with scaling?', options.skipConfirm))) {
                ctx.logger.info('Scaling cancelled');
                return;
            }

            await eks.updateNodeGroupScaling(clusterName, nodeGroup.name, update, ctx.signal);
            ctx.logger.success(`Scaling initiated for node group ${nodeGroup.name}`);
            console.log(chalk.gray('Note: The scaling operation may take several minutes to complete.'));
        });
    });

const updateLaunchTemplateCommand = new Command('update-lt')
    .description('Update the launch template version of an EKS node group')
    .argument('[cluster]', 'cluster name; picker when omitted')
    .option('--nodegroup <name>', 'node group name; picker when omitted')
    .option('--version <version>', 'launch template version; picker when omitted')
    .option('--skip-confirm', 'do not ask for confirmation')
    .action(async (cluster: string | undefined, options: NodeGroupUpdateOptions, command: Command) => {
        await runAction(command, 'eks nodegroup update-lt', async (ctx) => {
            const eks = new EksService(ctx.client());
            const clusterName = await selectClusterName(ctx, eks, cluster);
            const nodeGroup = await selectNodeGroup(ctx, eks, clusterName, options.nodegroup);

            const template = nodeGroup.launchTemplate;
            if (!template?.id) {
                throw new AppError('Validation', `node group ${nodeGroup.name} does not use a launch template`);
            }
            const version = await selectVersion(ctx, template.id, options.version);

            console.log([
                '',
                `Cluster:                  ${clusterName}`,
                `Node Group:               ${nodeGroup.name}`,
                '',
                'Current Configuration:',
                `  Launch Template:        ${template.name ?? ''} (${template.id})`,
                `  Current Version:        ${template.version ?? ''}`,
                '',
                'Target Configuration:',
                `  New Version:            ${version}`,
                ''
            ].join('\n'));

            if (!(await questionnaire.confirm('Are you sure you want to update the launch template version?', options.skipConfirm))) {
                ctx.logger.info('Operation cancelled');
                return;
            }

            const updateId = await eks.updateNodeGroupLaunchTemplate(clusterName, nodeGroup.name, version, ctx.signal);
            ctx.logger.success(`Launch template update started for ${nodeGroup.name}${updateId ? ` (update ${updateId})` : ''}`);
        });
    });

/**
 * ================================================================================
 * EKS COMMAND DEFINITION
 * ================================================================================
 */
export const eksCommand = new Command('eks')
    .description('Describe EKS clusters and manage node groups')
    .argument('[cluster]', 'cluster name; picker when omitted')
    .action(async (cluster: string | undefined, _options: unknown, command: Command) => {
        await runAction(command, 'eks', (ctx) => describeCluster(ctx, cluster));
    })
    .addCommand(new Command('nodegroup')
        .description('Manage EKS managed node groups')
        .addCommand(scaleCommand)
        .addCommand(updateLaunchTemplateCommand));
