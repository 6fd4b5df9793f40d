/**
 * ================================================================================
 * COMMAND SERVICE - Run Shell Commands Through SSM
 * ================================================================================
 *
 * SendCommand (AWS-RunShellScript), then poll GetCommandInvocation until the
 * invocation reaches a final status or the deadline passes.
 *
 * POLLING:
 * • First poll after 500ms, doubling up to 5s between polls
 * • InvocationDoesNotExist right after the send means "not registered yet"
 * • Throttling and service errors while polling are treated as pending
 */

import type { GetCommandInvocationCommandOutput } from '@aws-sdk/client-ssm';
import { AwsClient } from '../aws/awsClient';
import { Clock, SleepFn, sleep as defaultSleep, systemClock, throwIfAborted } from '../resilience/clock';
import { AppError, cancelledError, errorCode, errorKind } from '../utils/errors';

export const RUN_SHELL_DOCUMENT = 'AWS-RunShellScript';
export const COMMAND_COMMENT = 'Executed via ssm-ops CLI';

export const DEFAULT_COMMAND_TIMEOUT_MS = 2 * 60 * 1000;
export const MIN_COMMAND_TIMEOUT_MS = 10 * 1000;
export const MAX_COMMAND_TIMEOUT_MS = 10 * 60 * 1000;

const INITIAL_POLL_MS = 500;
const MAX_POLL_MS = 5000;

//? SendCommand rejects TimeoutSeconds below 30
const MIN_SSM_TIMEOUT_SECONDS = 30;

const PENDING_STATUSES = new Set(['Pending', 'InProgress', 'Delayed']);

export interface ExecuteOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

export interface CommandServiceDeps {
    clock?: Clock;
    sleep?: SleepFn;
}

export function clampTimeout(timeoutMs: number | undefined): number {
    const value = timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    return Math.min(MAX_COMMAND_TIMEOUT_MS, Math.max(MIN_COMMAND_TIMEOUT_MS, value));
}

/**
 * Join stdout and stderr, marking stderr with a "[STDERR]" header line.
 */
export function formatCommandOutput(stdout: string, stderr: string): string {
    if (!stderr) return stdout;
    if (!stdout) return `[STDERR]\n${stderr}`;
    return `${stdout}\n[STDERR]\n${stderr}`;
}

export class CommandService {
    private readonly clock: Clock;
    private readonly sleep: SleepFn;

    constructor(private readonly client: AwsClient, deps: CommandServiceDeps = {}) {
        this.clock = deps.clock ?? systemClock;
        this.sleep = deps.sleep ?? defaultSleep;
    }

    /**
     * Run `command` on `instanceId` and return its formatted output.
     */
    async execute(instanceId: string, command: string, options: ExecuteOptions = {}): Promise<string> {
        const { signal } = options;
        const timeoutMs = clampTimeout(options.timeoutMs);
        const deadline = this.clock.now() + timeoutMs;
        const { logger, services } = this.client;

        const sent = await this.client.call('SendCommand', () => services.ssm.sendCommand({
            DocumentName: RUN_SHELL_DOCUMENT,
            InstanceIds: [instanceId],
            Parameters: { commands: [command] },
            Comment: COMMAND_COMMENT,
            TimeoutSeconds: Math.max(MIN_SSM_TIMEOUT_SECONDS, Math.ceil(timeoutMs / 1000))
        }), { signal, noRetry: true });

        const commandId = sent.Command?.CommandId;
        if (!commandId) {
            throw new AppError('Internal', 'SendCommand returned no command id');
        }
        logger.step('COMMAND_SENT', `Command ${commandId} sent to ${instanceId}`, { timeoutMs });

        return this.poll(instanceId, commandId, deadline, timeoutMs, signal);
    }

    private async poll(instanceId: string, commandId: string, deadline: number, timeoutMs: number, signal?: AbortSignal): Promise<string> {
        const { breaker, limiter, metrics, services, logger } = this.client;
        let delay = INITIAL_POLL_MS;
        let reachedOnce = false;

        for (;;) {
            throwIfAborted(signal);
            const remaining = deadline - this.clock.now();
            if (remaining <= 0) {
                throw new AppError('Timeout', `command timed out after ${Math.round(timeoutMs / 1000)}s waiting for ${commandId}`);
            }
            await this.sleep(Math.min(delay, remaining), signal);
            delay = Math.min(delay * 2, MAX_POLL_MS);

            await limiter.acquire(1, signal);
            let invocation: GetCommandInvocationCommandOutput;
            try {
                invocation = await metrics.instrument('GetCommandInvocation', () =>
                    services.ssm.getCommandInvocation({ CommandId: commandId, InstanceId: instanceId }));
            } catch (err) {
                if (isNotYetAvailable(err)) {
                    logger.debug('Command invocation not available yet', { commandId, error: errorCode(err) });
                    continue;
                }
                throw err;
            }

            if (!reachedOnce) {
                breaker.recordSuccess();
                reachedOnce = true;
            }

            const status = invocation.Status ?? 'Pending';
            if (PENDING_STATUSES.has(status)) continue;
            return interpretStatus(status, invocation);
        }
    }
}

function isNotYetAvailable(err: unknown): boolean {
    if (errorCode(err) === 'InvocationDoesNotExist') return true;
    const kind = errorKind(err);
    return kind === 'Throttled' || kind === 'ServiceUnavailable';
}

function interpretStatus(status: string, invocation: GetCommandInvocationCommandOutput): string {
    const stdout = invocation.StandardOutputContent ?? '';
    const stderr = invocation.StandardErrorContent ?? '';

    switch (status) {
        case 'Success':
            return formatCommandOutput(stdout, stderr);
        case 'Failed':
            throw new AppError('Internal', `command failed: ${stderr || invocation.StatusDetails || status}`);
        case 'Cancelled':
            throw cancelledError('command was cancelled');
        case 'TimedOut':
            throw new AppError('Timeout', 'command timed out');
        default:
            throw new AppError('Internal', `unknown command status: ${status}`);
    }
}
