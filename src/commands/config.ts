/**
 * ================================================================================
 * CONFIG COMMAND - Config File Management
 * ================================================================================
 *
 * config init     write a default ~/.aws-ssm/config.yaml when none exists
 * config show     print the effective config (file merged with defaults) as YAML
 * config path     print the config file path
 */

import { Command } from 'commander';
import YAML from 'yaml';
import { runAction } from './context';

const initCommand = new Command('init')
    .description('Write a default config file')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'config init', async (ctx) => {
            const path = ctx.configManager.getConfigPath();
            if (await ctx.configManager.init()) {
                ctx.logger.success(`Wrote default config to ${path}`);
            } else {
                ctx.logger.info(`Config file already exists: ${path}`);
            }
        });
    });

const showCommand = new Command('show')
    .description('Print the effective configuration')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'config show', async (ctx) => {
            const effective = {
                ...ctx.config,
                default: { ...ctx.config.default, region: ctx.options.region, profile: ctx.options.profile }
            };
            console.log(ctx.options.json ? JSON.stringify(effective, null, 2) : YAML.stringify(effective).trimEnd());
        });
    });

const pathCommand = new Command('path')
    .description('Print the config file path')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'config path', async (ctx) => {
            console.log(ctx.configManager.getConfigPath());
        });
    });

export const configCommand = new Command('config')
    .description('Manage the ssm-ops config file')
    .addCommand(initCommand)
    .addCommand(showCommand)
    .addCommand(pathCommand);
