/**
 * ================================================================================
 * TUI COMMAND - Full-Screen Browser
 * ================================================================================
 *
 * Runs the TUI on the alternate screen, then carries out what the user chose
 * once the terminal is restored:
 * • session         - SSM shell on the instance
 * • describeCluster - `eks <cluster>` output
 * • scaleAsg        - the triple entered in the scale prompt
 */

import { Command } from 'commander';
import { AutoScalingService } from '../services/autoscaling';
import { EksService } from '../services/eks';
import { InstanceService } from '../services/instances';
import { SessionOrchestrator } from '../services/session';
import { serviceFetcher, TuiDriver } from '../tui/driver';
import { Intent } from '../tui/types';
import { AppError } from '../utils/errors';
import { scaleAsg } from './asg';
import { AppContext, runAction } from './context';
import { describeCluster } from './eks';

async function executeIntent(ctx: AppContext, intent: Intent): Promise<void> {
    ctx.logger.debug('Executing TUI intent', { intent: intent.kind });
    switch (intent.kind) {
        case 'session':
            ctx.logger.info(`Starting session with ${intent.instanceId}`);
            await new SessionOrchestrator(ctx.client()).startShell(intent.instanceId, { signal: ctx.signal });
            ctx.logger.success(`Session with ${intent.instanceId} ended`);
            return;
        case 'describeCluster':
            await describeCluster(ctx, intent.clusterName);
            return;
        case 'scaleAsg':
            await scaleAsg(ctx, intent.name, { min: intent.min, max: intent.max, desired: intent.desired });
            return;
    }
}

export const tuiCommand = new Command('tui')
    .description('Browse instances, EKS clusters and Auto Scaling Groups in a full-screen UI')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'tui', async (ctx) => {
            if (!process.stdin.isTTY || !process.stdout.isTTY) {
                throw new AppError('Validation', 'the TUI needs an interactive terminal');
            }

            const client = ctx.client();
            const driver = new TuiDriver({
                fetcher: serviceFetcher({
                    instances: new InstanceService(client, ctx.streamConfig()),
                    eks: new EksService(client),
                    autoScaling: new AutoScalingService(client)
                }),
                logger: ctx.logger,
                noColor: ctx.options.noColor
            });

            const intent = await driver.run(ctx.signal);
            if (intent) {
                await executeIntent(ctx, intent);
            }
        });
    });
