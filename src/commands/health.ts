/**
 * ================================================================================
 * HEALTH AND FEATURES COMMANDS
 * ================================================================================
 *
 * features   print the feature gates (AWS_SSM_FEATURE_* variables)
 * health     credentials, session plugin, cache directory and config checks;
 *            exits non-zero when the overall status is unhealthy
 *
 * //! health refuses to run while the healthChecks gate is off
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { HealthService, HealthStatus } from '../services/health';
import { AppError } from '../utils/errors';
import { runAction } from './context';
import { formatHealthReport } from './format';

const STATUS_COLORS: Record<HealthStatus, chalk.Chalk> = {
    healthy: chalk.green,
    degraded: chalk.yellow,
    unhealthy: chalk.red
};

export const featuresCommand = new Command('features')
    .description('Show the feature gates')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'features', async (ctx) => {
            console.log(ctx.gates.summary());
        });
    });

export const healthCommand = new Command('health')
    .description('Check credentials, the session plugin, the cache directory and the config file')
    .action(async (_options: unknown, command: Command) => {
        await runAction(command, 'health', async (ctx) => {
            if (!ctx.gates.isEnabled('healthChecks')) {
                throw new AppError('Validation', 'health checks are disabled (AWS_SSM_FEATURE_HEALTH_CHECKS)');
            }

            const service = new HealthService({
                client: ctx.client(),
                cacheDir: ctx.config.cache.cache_dir,
                loadConfig: () => ctx.configManager.load()
            });
            const report = await service.run(ctx.signal);

            if (ctx.options.json) {
                console.log(JSON.stringify(report, null, 2));
            } else {
                const [overall, ...checks] = formatHealthReport(report);
                console.log(STATUS_COLORS[report.status](overall));
                checks.forEach((line) => console.log(line));
            }
            if (report.status === 'unhealthy') {
                process.exitCode = 1;
            }
        });
    });
