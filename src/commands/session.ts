/**
 * ================================================================================
 * SESSION COMMANDS - Shells, Remote Commands and Port Forwarding
 * ================================================================================
 *
 * session [identifier] [command]
 * • no command  - interactive SSM shell (native transport, --plugin for the plugin)
 * • command     - AWS-RunShellScript through SendCommand, output printed to stdout
 * • -i          - pick several instances and run the command on each
 *
 * port-forward [identifier] -R <remote> [-L <local>]
 *
 * IDENTIFIERS:
 * • i-0abc123...          instance ID
 * • web-1                 Name tag (exact match)
 * • Env=prod / Env:prod   tag
 * • 10.0.1.5              private or public IP
 * • ip-10-0-1-5...        private or public DNS name
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { CommandService } from '../services/command';
import { SessionMode, SessionOrchestrator } from '../services/session';
import { Instance } from '../types';
import { AppError, errorMessage } from '../utils/errors';
import { parseCount, validateCommand, validatePort } from '../utils/validation';
import { AppContext, runAction } from './context';
import { pickInstancesInteractively, resolveInstance } from './select';

interface SessionOptions {
    plugin?: boolean;
    favorites?: boolean;
    timeout?: string;
}

interface PortForwardOptions {
    remote: string;
    local?: string;
    plugin?: boolean;
    favorites?: boolean;
}

function sessionMode(plugin: boolean | undefined): SessionMode {
    return plugin ? 'plugin' : 'native';
}

function describeInstance(instance: Instance): string {
    return instance.name ? `${instance.name} (${instance.instanceId})` : instance.instanceId;
}

function parseTimeoutMs(value: string | undefined): number | undefined {
    const seconds = parseCount(value, 'timeout');
    if (seconds === undefined) return undefined;
    if (seconds <= 0) {
        throw new AppError('Validation', `invalid timeout: ${value}`);
    }
    return seconds * 1000;
}

/**
 * ================================================================================
 * REMOTE COMMAND EXECUTION
 * ================================================================================
 */

async function runRemoteCommand(ctx: AppContext, targets: Instance[], remoteCommand: string, timeoutMs: number | undefined): Promise<void> {
    if (ctx.gates.isEnabled('validation')) {
        validateCommand(remoteCommand);
    } else if (!remoteCommand.trim()) {
        throw new AppError('Validation', 'command cannot be empty');
    }

    const service = new CommandService(ctx.client());
    const results: { instanceId: string; name: string; output?: string; error?: string }[] = [];
    let failed = 0;

    for (const instance of targets) {
        const spinner = ctx.logger.spinner(`Running command on ${describeInstance(instance)}`);
        try {
            const output = await service.execute(instance.instanceId, remoteCommand, { timeoutMs, signal: ctx.signal });
            spinner.stop();
            results.push({ instanceId: instance.instanceId, name: instance.name, output });
            if (!ctx.options.json) {
                if (targets.length > 1) {
                    console.log(chalk.bold(`==> ${describeInstance(instance)} <==`));
                }
                console.log(output);
            }
        } catch (error) {
            spinner.fail();
            //? A single target reports through the command's error path
            if (targets.length === 1) throw error;
            failed++;
            const message = errorMessage(error);
            results.push({ instanceId: instance.instanceId, name: instance.name, error: message });
            ctx.logger.error(`${describeInstance(instance)}: ${message}`);
            if (ctx.signal.aborted) throw error;
        }
    }

    if (ctx.options.json) {
        console.log(JSON.stringify(results, null, 2));
    }
    if (failed > 0) {
        throw new AppError('Internal', `command failed on ${failed} of ${targets.length} instances`);
    }
}

/**
 * ================================================================================
 * SESSION COMMAND DEFINITION
 * ================================================================================
 */
export const sessionCommand = new Command('session')
    .description('Open an SSM shell on an instance, or run a command on it')
    .argument('[identifier]', 'instance ID, name, tag (Key=Value), IP or DNS name; picker when omitted')
    .argument('[command]', 'shell command to run instead of opening a shell')
    .option('--plugin', 'use session-manager-plugin for the shell')
    .option('--favorites', 'only offer instances tagged ssm-ops:favorite=true in the picker')
    .option('--timeout <seconds>', 'remote command timeout (10-600, default 120)')
    .action(async (identifier: string | undefined, remoteCommand: string | undefined, options: SessionOptions, command: Command) => {
        await runAction(command, 'session', async (ctx) => {
            if (remoteCommand !== undefined) {
                const timeoutMs = parseTimeoutMs(options.timeout);
                const targets = !identifier && ctx.options.multi
                    ? await pickInstancesInteractively(ctx, { favorites: options.favorites, multi: true })
                    : [await resolveInstance(ctx, identifier, { favorites: options.favorites })];
                await runRemoteCommand(ctx, targets, remoteCommand, timeoutMs);
                return;
            }

            const instance = await resolveInstance(ctx, identifier, { favorites: options.favorites });
            ctx.logger.info(`Starting session with ${describeInstance(instance)}`);
            const orchestrator = new SessionOrchestrator(ctx.client());
            await orchestrator.startShell(instance.instanceId, { mode: sessionMode(options.plugin), signal: ctx.signal });
            ctx.logger.success(`Session with ${instance.instanceId} ended`);
        });
    });

/**
 * ================================================================================
 * PORT-FORWARD COMMAND DEFINITION
 * ================================================================================
 *
 * //? The local port defaults to the remote one
 */
export const portForwardCommand = new Command('port-forward')
    .description('Forward a local port to a port on an instance')
    .argument('[identifier]', 'instance ID, name, tag, IP or DNS name; picker when omitted')
    .requiredOption('-R, --remote <port>', 'port on the instance')
    .option('-L, --local <port>', 'local port (defaults to the remote port)')
    .option('--plugin', 'require session-manager-plugin')
    .option('--favorites', 'only offer instances tagged ssm-ops:favorite=true in the picker')
    .action(async (identifier: string | undefined, options: PortForwardOptions, command: Command) => {
        await runAction(command, 'port-forward', async (ctx) => {
            const remotePort = validatePort(options.remote, 'remote port');
            const localPort = validatePort(options.local ?? options.remote, 'local port');

            const instance = await resolveInstance(ctx, identifier, { favorites: options.favorites });
            ctx.logger.info(`Forwarding localhost:${localPort} -> ${describeInstance(instance)}:${remotePort}`);
            const orchestrator = new SessionOrchestrator(ctx.client());
            await orchestrator.startPortForward(instance.instanceId, {
                remotePort,
                localPort,
                mode: sessionMode(options.plugin),
                signal: ctx.signal
            });
            ctx.logger.success('Port forwarding session ended');
        });
    });
