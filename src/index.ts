#!/usr/bin/env node

/**
 * ================================================================================
 * SSM-OPS CLI - Entry Point
 * ================================================================================
 *
 * Operator tool for EC2 instances reached through SSM, EKS node groups and
 * Auto Scaling Groups. Global options apply to every subcommand and are read
 * through `optsWithGlobals()` in the command context.
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import { asgCommand } from './commands/asg';
import { cacheCommand } from './commands/cache';
import { configCommand } from './commands/config';
import { installSignalHandlers } from './commands/context';
import { eksCommand } from './commands/eks';
import { featuresCommand, healthCommand } from './commands/health';
import { interfacesCommand } from './commands/interfaces';
import { listCommand } from './commands/list';
import { portForwardCommand, sessionCommand } from './commands/session';
import { tuiCommand } from './commands/tui';
import { getLogger } from './utils/logger';

dotenv.config();

const program = new Command('ssm-ops')
    .version('1.0.0')
    .description('Operator CLI for EC2 instances over SSM, EKS node groups and Auto Scaling Groups')
    .option('-r, --region <region>', 'AWS region (default from config, then us-east-1)')
    .option('-p, --profile <profile>', 'AWS profile (default from config, then "default")')
    .option('--config <path>', 'config file (default ~/.aws-ssm/config.yaml)')
    .option('-v, --verbose', 'enable debug logging')
    .option('--no-color', 'disable colors in the interactive finder')
    .option('--width <n>', 'finder width in columns (0 = terminal width)')
    .option('--columns <list>', 'finder columns, comma separated (name,instance-id,private-ip,public-ip,state,type,az)')
    .option('-i, --interactive', 'allow selecting several instances where a command supports it')
    .option('-o, --output <format>', 'output format (json)');

program
    .addCommand(listCommand)
    .addCommand(sessionCommand)
    .addCommand(portForwardCommand)
    .addCommand(interfacesCommand)
    .addCommand(eksCommand)
    .addCommand(asgCommand)
    .addCommand(tuiCommand)
    .addCommand(cacheCommand)
    .addCommand(configCommand)
    .addCommand(featuresCommand)
    .addCommand(healthCommand);

installSignalHandlers(getLogger());

void program.parseAsync(process.argv);
