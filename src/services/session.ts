/**
 * ================================================================================
 * SESSION ORCHESTRATOR - SSM Shell and Port-Forward Sessions
 * ================================================================================
 *
 * StartSession → hand the session to a transport → TerminateSession.
 *
 * MODES:
 * • native - the session credentials go to an injected transport; the default
 *            one drives the data channel through session-manager-plugin
 * • plugin - session-manager-plugin must be on PATH before the session opens
 *
 * Either mode checks for the plugin binary first when its transport is the plugin.
 *
 * //! Every opened session is terminated exactly once, on every exit path
 * //! StartSession is not raced against the signal; a session that opens after
 * //! an abort is terminated before Cancelled is raised
 * //! Termination failures are logged and swallowed
 */

import type { StartSessionCommandInput } from '@aws-sdk/client-ssm';
import execa from 'execa';
import { AwsClient } from '../aws/awsClient';
import { PortForwardPorts, SessionRecord } from '../types';
import { AppError, cancelledError, errorMessage } from '../utils/errors';
import { holdForeground } from '../utils/foreground';
import { validatePort, validateRegion } from '../utils/validation';
import { which as defaultWhich, WhichFn } from '../utils/which';

export const PLUGIN_BINARY = 'session-manager-plugin';
export const PORT_FORWARD_DOCUMENT = 'AWS-StartPortForwardingSession';

const PLUGIN_INSTALL_HINT = [
    `${PLUGIN_BINARY} not found in PATH`,
    '',
    'Sessions need the Session Manager plugin. To install it, see:',
    'https://docs.aws.amazon.com/systems-manager/latest/userguide/session-manager-working-with-install-plugin.html'
].join('\n');

export type SessionMode = 'native' | 'plugin';

export interface SessionContext {
    session: SessionRecord;
    region: string;
    profile: string;
    endpoint: string;
    signal?: AbortSignal;
}

/**
 * Carries the data channel of an opened session.
 */
export interface SessionTransport {
    shell(ctx: SessionContext): Promise<void>;
    portForward(ctx: SessionContext, ports: PortForwardPorts): Promise<void>;
}

/**
 * ================================================================================
 * PLUGIN PROCESS
 * ================================================================================
 */

export type ProcessRunner = (file: string, args: string[], options: { signal?: AbortSignal }) => Promise<number>;

export class SessionProcessError extends AppError {
    readonly exitCode: number;

    constructor(exitCode: number) {
        super('Internal', `${PLUGIN_BINARY} exited with code ${exitCode}`);
        this.name = 'SessionProcessError';
        this.exitCode = exitCode;
    }
}

/**
 * Run a child with the terminal attached. Ctrl-C reaches it through the
 * terminal's process group; an abort of `signal` is forwarded as SIGTERM.
 */
export const runProcess: ProcessRunner = async (file, args, { signal }) => {
    const child = execa(file, args, { stdio: 'inherit', reject: false });
    const forward = () => {
        child.kill('SIGTERM');
    };

    signal?.addEventListener('abort', forward, { once: true });
    try {
        const result = await child;
        return Number.isInteger(result.exitCode) ? result.exitCode : 127;
    } finally {
        signal?.removeEventListener('abort', forward);
    }
};

export function sessionEndpoint(region: string): string {
    return `https://ssm.${region}.amazonaws.com`;
}

/**
 * Argv for session-manager-plugin:
 * [sessionJson, region, "StartSession", "", paramsJson, endpoint]
 */
export function buildPluginArgs(ctx: SessionContext, ports?: PortForwardPorts): string[] {
    validateRegion(ctx.region);

    const sessionJson = JSON.stringify({
        SessionId: ctx.session.sessionId,
        StreamUrl: ctx.session.streamUrl,
        TokenValue: ctx.session.token
    });
    const params = ports
        ? {
            Target: ctx.session.targetId,
            DocumentName: PORT_FORWARD_DOCUMENT,
            Parameters: {
                portNumber: [String(ports.remotePort)],
                localPortNumber: [String(ports.localPort)]
            }
        }
        : { Target: ctx.session.targetId };

    return [sessionJson, ctx.region, 'StartSession', '', JSON.stringify(params), ctx.endpoint];
}

export class PluginTransport implements SessionTransport {
    constructor(
        private readonly runner: ProcessRunner = runProcess,
        readonly binary: string = PLUGIN_BINARY
    ) {}

    async shell(ctx: SessionContext): Promise<void> {
        await this.run(buildPluginArgs(ctx), ctx.signal);
    }

    async portForward(ctx: SessionContext, ports: PortForwardPorts): Promise<void> {
        await this.run(buildPluginArgs(ctx, ports), ctx.signal);
    }

    private async run(args: string[], signal?: AbortSignal): Promise<void> {
        const exitCode = await this.runner(this.binary, args, { signal });
        if (exitCode !== 0) {
            throw new SessionProcessError(exitCode);
        }
    }
}

/**
 * ================================================================================
 * ORCHESTRATOR
 * ================================================================================
 */

export interface SessionOrchestratorDeps {
    transports?: Partial<Record<SessionMode, SessionTransport>>;
    which?: WhichFn;
    /** Observes every termination attempt, successful or not. */
    onTerminate?: (sessionId: string) => void;
}

export interface ShellOptions {
    mode?: SessionMode;
    signal?: AbortSignal;
}

export interface PortForwardOptions extends ShellOptions {
    remotePort: number;
    localPort: number;
}

export class SessionOrchestrator {
    private readonly transports: Record<SessionMode, SessionTransport>;
    private readonly which: WhichFn;
    private readonly onTerminate?: (sessionId: string) => void;

    constructor(private readonly client: AwsClient, deps: SessionOrchestratorDeps = {}) {
        const plugin = deps.transports?.plugin ?? new PluginTransport();
        this.transports = { plugin, native: deps.transports?.native ?? plugin };
        this.which = deps.which ?? defaultWhich;
        this.onTerminate = deps.onTerminate;
    }

    async startShell(target: string, options: ShellOptions = {}): Promise<void> {
        const mode = options.mode ?? 'native';
        await this.withSession({ Target: target }, mode, options.signal, (transport, ctx) => transport.shell(ctx));
    }

    async startPortForward(target: string, options: PortForwardOptions): Promise<void> {
        const ports: PortForwardPorts = {
            remotePort: validatePort(options.remotePort, 'remote port'),
            localPort: validatePort(options.localPort, 'local port')
        };
        const input: StartSessionCommandInput = {
            Target: target,
            DocumentName: PORT_FORWARD_DOCUMENT,
            Parameters: {
                portNumber: [String(ports.remotePort)],
                localPortNumber: [String(ports.localPort)]
            }
        };
        await this.withSession(input, options.mode ?? 'native', options.signal, (transport, ctx) => transport.portForward(ctx, ports));
    }

    private async withSession(
        input: StartSessionCommandInput,
        mode: SessionMode,
        signal: AbortSignal | undefined,
        use: (transport: SessionTransport, ctx: SessionContext) => Promise<void>
    ): Promise<void> {
        const { region, profile, logger } = this.client;
        validateRegion(region);

        const transport = this.transports[mode];
        const binary = transport instanceof PluginTransport ? transport.binary : mode === 'plugin' ? PLUGIN_BINARY : null;
        if (binary !== null && (await this.which(binary)) === null) {
            throw new AppError('PluginMissing', PLUGIN_INSTALL_HINT);
        }

        if (signal?.aborted) {
            throw cancelledError();
        }
        const started = await this.client.call('StartSession', () => this.client.services.ssm.startSession(input));
        if (!started.SessionId) {
            throw new AppError('Internal', 'StartSession returned no session id');
        }

        const session: SessionRecord = {
            sessionId: started.SessionId,
            streamUrl: started.StreamUrl ?? '',
            token: started.TokenValue ?? '',
            targetId: input.Target ?? '',
            openedAt: new Date()
        };
        logger.step('SESSION_START', `Session ${session.sessionId} opened to ${session.targetId}`, { mode, region });

        const release = holdForeground();
        try {
            if (signal?.aborted) {
                throw cancelledError();
            }
            await use(transport, { session, region, profile, endpoint: sessionEndpoint(region), signal });
        } finally {
            await this.terminate(session.sessionId);
            release();
        }
    }

    private async terminate(sessionId: string): Promise<void> {
        const { logger, metrics, services } = this.client;
        try {
            await metrics.instrument('TerminateSession', () => services.ssm.terminateSession({ SessionId: sessionId }));
            logger.step('SESSION_END', `Session ${sessionId} terminated`);
        } catch (err) {
            logger.warn(`Failed to terminate session ${sessionId}: ${errorMessage(err)}`);
        } finally {
            this.onTerminate?.(sessionId);
        }
    }
}
