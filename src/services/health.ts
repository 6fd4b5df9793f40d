/**
 * ================================================================================
 * HEALTH SERVICE - Environment Checks for `ssm-ops health`
 * ================================================================================
 *
 * CHECKS:
 * • credentials - STS GetCallerIdentity with the active profile
 * • session-plugin - session-manager-plugin on PATH
 * • cache-dir - cache directory can be created and written
 * • config - config file parses against the schema
 *
 * The overall status is the worst of the individual ones.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AwsClient } from '../aws/awsClient';
import { AppConfig } from '../config/types';
import { Clock, systemClock } from '../resilience/clock';
import { errorMessage } from '../utils/errors';
import { WhichFn, which as defaultWhich } from '../utils/which';
import { PLUGIN_BINARY } from './session';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckItem {
    name: string;
    status: HealthStatus;
    message: string;
    durationMs: number;
}

export interface HealthReport {
    status: HealthStatus;
    checks: HealthCheckItem[];
    timestamp: Date;
}

export interface HealthServiceDeps {
    client: AwsClient;
    cacheDir: string;
    loadConfig: () => Promise<AppConfig>;
    which?: WhichFn;
    clock?: Clock;
}

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

export function worstStatus(statuses: HealthStatus[]): HealthStatus {
    return statuses.reduce<HealthStatus>((worst, s) => (SEVERITY[s] > SEVERITY[worst] ? s : worst), 'healthy');
}

type CheckOutcome = { status: HealthStatus; message: string };

export class HealthService {
    private readonly which: WhichFn;
    private readonly clock: Clock;

    constructor(private readonly deps: HealthServiceDeps) {
        this.which = deps.which ?? defaultWhich;
        this.clock = deps.clock ?? systemClock;
    }

    async run(signal?: AbortSignal): Promise<HealthReport> {
        const checks = await Promise.all([
            this.check('credentials', () => this.checkCredentials(signal)),
            this.check('session-plugin', () => this.checkPlugin()),
            this.check('cache-dir', () => this.checkCacheDir()),
            this.check('config', () => this.checkConfig())
        ]);

        return {
            status: worstStatus(checks.map((c) => c.status)),
            checks,
            timestamp: new Date(this.clock.now())
        };
    }

    private async check(name: string, fn: () => Promise<CheckOutcome>): Promise<HealthCheckItem> {
        const started = this.clock.now();
        const outcome = await fn();
        return { name, ...outcome, durationMs: this.clock.now() - started };
    }

    private async checkCredentials(signal?: AbortSignal): Promise<CheckOutcome> {
        const { client } = this.deps;
        try {
            const identity = await client.call('GetCallerIdentity', () => client.services.sts.getCallerIdentity(), { signal });
            return { status: 'healthy', message: `account ${identity.Account ?? 'unknown'} as ${identity.Arn ?? 'unknown'}` };
        } catch (err) {
            return { status: 'unhealthy', message: `credentials check failed: ${errorMessage(err)}` };
        }
    }

    private async checkPlugin(): Promise<CheckOutcome> {
        const found = await this.which(PLUGIN_BINARY);
        return found
            ? { status: 'healthy', message: found }
            : { status: 'degraded', message: `${PLUGIN_BINARY} not found in PATH` };
    }

    private async checkCacheDir(): Promise<CheckOutcome> {
        const { cacheDir } = this.deps;
        const probe = path.join(cacheDir, `.health-${process.pid}.tmp`);
        try {
            await fs.mkdir(cacheDir, { recursive: true, mode: 0o700 });
            await fs.writeFile(probe, 'ok', { mode: 0o600 });
            await fs.rm(probe, { force: true });
            return { status: 'healthy', message: cacheDir };
        } catch (err) {
            return { status: 'degraded', message: `cache directory not writable: ${errorMessage(err)}` };
        }
    }

    private async checkConfig(): Promise<CheckOutcome> {
        try {
            await this.deps.loadConfig();
            return { status: 'healthy', message: 'config loaded' };
        } catch (err) {
            return { status: 'unhealthy', message: errorMessage(err) };
        }
    }
}
