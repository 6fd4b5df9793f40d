/**
 * ================================================================================
 * COMMAND CONTEXT - Per-Invocation Wiring for CLI Commands
 * ================================================================================
 *
 * Every command action builds one AppContext from the global options:
 * • logger - the process logger, verbose when -v is given
 * • gates - feature gates from AWS_SSM_FEATURE_* variables
 * • config - ~/.aws-ssm/config.yaml (or --config), validated with zod
 * • pool - pooled AWS clients keyed by region and profile
 * • metrics - API call metrics, collected while the command runs
 * • signal - aborted on SIGINT/SIGTERM
 *
 * //! close() must run once per context; it stops the collector and destroys clients
 */

import { Command } from 'commander';
import { AwsClient } from '../aws/awsClient';
import { ClientPool } from '../aws/clientPool';
import { resolveRegionProfile } from '../aws/clients';
import { ResourceCache } from '../cache/resourceCache';
import { ConfigManager } from '../config/configManager';
import { FeatureGates } from '../config/features';
import { AppConfig, INSTANCE_COLUMNS, InstanceColumn } from '../config/types';
import { MetricsCollector } from '../metrics/collector';
import { PerformanceMetrics } from '../metrics/performanceMetrics';
import { InstanceStreamConfig } from '../services/instanceStream';
import { Finder } from '../ui/fuzzy/finder';
import { AppError, summarizeError } from '../utils/errors';
import { foregroundHeld } from '../utils/foreground';
import { getLogger, Logger } from '../utils/logger';
import { validateRegion } from '../utils/validation';

/**
 * Options registered on the root program.
 */
export interface GlobalOptions {
    region?: string;
    profile?: string;
    config?: string;
    verbose?: boolean;
    color?: boolean;
    width?: string;
    columns?: string;
    interactive?: boolean;
    output?: string;
}

/**
 * Global options merged with the config file.
 */
export interface ResolvedOptions {
    region: string;
    profile: string;
    columns: InstanceColumn[];
    width: number;
    noColor: boolean;
    multi: boolean;
    json: boolean;
}

export interface AppContext {
    logger: Logger;
    gates: FeatureGates;
    configManager: ConfigManager;
    config: AppConfig;
    metrics: PerformanceMetrics;
    pool: ClientPool;
    options: ResolvedOptions;
    signal: AbortSignal;
    client(): AwsClient;
    streamConfig(): Partial<InstanceStreamConfig>;
    cache(): ResourceCache | null;
    finder(): Finder;
    close(): void;
}

/**
 * ================================================================================
 * SHUTDOWN SIGNAL
 * ================================================================================
 */

const shutdown = new AbortController();

/**
 * The first SIGINT/SIGTERM aborts in-flight work; a second one exits.
 *
 * While a session holds the foreground, SIGINT is the remote side's and is
 * ignored here, and SIGTERM only aborts, so the session is always terminated
 * before the process ends.
 */
export function createSignalHandler(
    logger: Logger,
    exit: (code: number) => void = (code) => process.exit(code),
    controller: AbortController = shutdown
): (name: NodeJS.Signals) => void {
    return (name) => {
        if (foregroundHeld()) {
            if (name === 'SIGINT') {
                logger.debug('SIGINT left to the foreground session');
                return;
            }
            logger.debug(`Received ${name}, ending the foreground session`);
            controller.abort();
            return;
        }
        if (controller.signal.aborted) {
            exit(130);
            return;
        }
        logger.debug(`Received ${name}, cancelling`);
        controller.abort();
    };
}

export function installSignalHandlers(logger: Logger = getLogger()): void {
    const onSignal = createSignalHandler(logger);
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

export function shutdownSignal(): AbortSignal {
    return shutdown.signal;
}

/**
 * ================================================================================
 * OPTION PARSING
 * ================================================================================
 */

export function parseColumns(value: string): InstanceColumn[] {
    const columns: InstanceColumn[] = [];
    for (const name of value.split(',').map((c) => c.trim()).filter(Boolean)) {
        const column = INSTANCE_COLUMNS.find((c) => c === name);
        if (!column) {
            throw new AppError('Validation', `unknown column "${name}" (supported: ${INSTANCE_COLUMNS.join(', ')})`);
        }
        columns.push(column);
    }
    if (columns.length === 0) {
        throw new AppError('Validation', 'at least one column is required');
    }
    return columns;
}

export function parseWidth(value: string): number {
    const width = Number(value);
    if (!Number.isInteger(width) || width < 0) {
        throw new AppError('Validation', `invalid width: ${value}`);
    }
    return width;
}

/**
 * Flags win over the config file; region and profile then fall back to the environment.
 */
export function resolveOptions(global: GlobalOptions, config: AppConfig, gates: FeatureGates): ResolvedOptions {
    const { region, profile } = resolveRegionProfile(
        global.region ?? config.default.region,
        global.profile ?? config.default.profile
    );
    if (gates.isEnabled('validation')) {
        validateRegion(region);
    }

    if (global.output !== undefined && global.output !== 'json') {
        throw new AppError('Validation', `unsupported output format: ${global.output} (supported: json)`);
    }

    return {
        region,
        profile,
        columns: global.columns ? parseColumns(global.columns) : config.default.columns,
        width: global.width !== undefined ? parseWidth(global.width) : config.interactive.width,
        noColor: global.color === false || config.interactive.no_color,
        multi: global.interactive ?? false,
        json: global.output === 'json'
    };
}

/**
 * ================================================================================
 * CONTEXT
 * ================================================================================
 */

export async function createContext(command: Command): Promise<AppContext> {
    const global: GlobalOptions = command.optsWithGlobals();
    const logger = getLogger();
    if (global.verbose) {
        logger.setVerbose(true);
    }

    const gates = FeatureGates.fromEnvironment();
    const restrictPath = gates.isEnabled('security');
    const configManager = new ConfigManager(global.config, undefined, restrictPath);
    const config = await configManager.load();
    const options = resolveOptions(global, config, gates);

    const metrics = new PerformanceMetrics(gates.isEnabled('metrics'));
    const collector = new MetricsCollector(metrics, logger.child('metrics'));
    const pool = new ClientPool({}, {
        logger,
        metrics,
        loadConfig: async () => config
    });
    collector.start();

    let cache: ResourceCache | null | undefined;
    let finder: Finder | undefined;

    return {
        logger,
        gates,
        configManager,
        config,
        metrics,
        pool,
        options,
        signal: shutdown.signal,
        client: () => pool.getOrCreate(options.region, options.profile, global.config),
        streamConfig: () => ({ maxInstances: config.interactive.max_instances }),
        cache: () => {
            if (cache === undefined) {
                cache = config.cache.enabled
                    ? new ResourceCache(
                        { dir: config.cache.cache_dir, ttlMs: config.cache.ttl_minutes * 60 * 1000 },
                        { logger, metrics })
                    : null;
            }
            return cache;
        },
        finder: () => {
            if (!finder) {
                finder = new Finder({ logger });
            }
            return finder;
        },
        close: () => {
            collector.stop();
            if (logger.isVerbose()) {
                collector.logSummary();
            }
            pool.close();
        }
    };
}

/**
 * One-line error for the operator; the full chain goes to the debug log.
 */
export function reportError(logger: Logger, error: unknown): void {
    const summary = summarizeError(error);
    if (summary === 'cancelled') {
        console.error('cancelled');
        logger.debug('Command cancelled');
        return;
    }
    logger.error(summary, error instanceof Error ? error : undefined);
}

/**
 * Run a command action with a context, reporting failures and setting the exit code.
 */
export async function runAction(command: Command, name: string, action: (ctx: AppContext) => Promise<void>): Promise<void> {
    const logger = getLogger();
    let ctx: AppContext | undefined;
    try {
        ctx = await createContext(command);
        logger.startExecution(name);
        await action(ctx);
    } catch (error) {
        reportError(logger, error);
        process.exitCode = 1;
    } finally {
        ctx?.close();
    }
}
