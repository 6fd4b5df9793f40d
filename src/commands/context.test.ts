import { describe, expect, it, vi } from 'vitest';
import type { StartSessionCommandOutput, TerminateSessionCommandOutput } from '@aws-sdk/client-ssm';
import { SessionOrchestrator, SessionTransport } from '../services/session';
import { fakeAwsClient, silentLogger } from '../testing/fakeAws';
import { createSignalHandler, parseColumns, parseWidth } from './context';

describe('createSignalHandler', () => {
    it('should abort on the first signal and exit on the second', () => {
        const exit = vi.fn();
        const controller = new AbortController();
        const onSignal = createSignalHandler(silentLogger(), exit, controller);

        onSignal('SIGINT');
        expect(controller.signal.aborted).toBe(true);
        expect(exit).not.toHaveBeenCalled();

        onSignal('SIGINT');
        expect(exit).toHaveBeenCalledWith(130);
    });

    it('should leave Ctrl-C to a running shell and terminate it before exiting', async () => {
        const exit = vi.fn();
        const controller = new AbortController();
        const onSignal = createSignalHandler(silentLogger(), exit, controller);

        const start = vi.fn(async (): Promise<StartSessionCommandOutput> => ({ $metadata: {}, SessionId: 'sess-fg', StreamUrl: 'wss://stream', TokenValue: 'test-token' }));
        const terminate = vi.fn(async (): Promise<TerminateSessionCommandOutput> => ({ $metadata: {}, SessionId: 'sess-fg' }));
        const client = fakeAwsClient({ ssm: { startSession: start, terminateSession: terminate } });

        let endShell = () => {};
        let shellStarted = () => {};
        const started = new Promise<void>((resolve) => {
            shellStarted = () => resolve();
        });
        const transport: SessionTransport = {
            shell: () => new Promise<void>((resolve) => {
                endShell = () => resolve();
                shellStarted();
            }),
            portForward: async () => {}
        };
        const running = new SessionOrchestrator(client, { transports: { native: transport } })
            .startShell('i-0123456789abcdef0', { signal: controller.signal });
        await started;

        onSignal('SIGINT');
        onSignal('SIGINT');
        expect(exit).not.toHaveBeenCalled();
        expect(controller.signal.aborted).toBe(false);
        expect(terminate).not.toHaveBeenCalled();

        endShell();
        await running;
        expect(terminate).toHaveBeenCalledWith({ SessionId: 'sess-fg' });

        onSignal('SIGINT');
        expect(controller.signal.aborted).toBe(true);
        expect(exit).not.toHaveBeenCalled();
    });

    it('should abort the foreground session on SIGTERM without exiting', async () => {
        const exit = vi.fn();
        const controller = new AbortController();
        const onSignal = createSignalHandler(silentLogger(), exit, controller);

        const start = vi.fn(async (): Promise<StartSessionCommandOutput> => ({ $metadata: {}, SessionId: 'sess-term' }));
        const terminate = vi.fn(async (): Promise<TerminateSessionCommandOutput> => ({ $metadata: {} }));
        const client = fakeAwsClient({ ssm: { startSession: start, terminateSession: terminate } });

        let shellStarted = () => {};
        const started = new Promise<void>((resolve) => {
            shellStarted = () => resolve();
        });
        const transport: SessionTransport = {
            shell: (ctx) => new Promise<void>((resolve) => {
                ctx.signal?.addEventListener('abort', () => resolve(), { once: true });
                shellStarted();
            }),
            portForward: async () => {}
        };
        const running = new SessionOrchestrator(client, { transports: { native: transport } })
            .startShell('i-0123456789abcdef0', { signal: controller.signal });
        await started;

        onSignal('SIGTERM');
        onSignal('SIGTERM');
        await running;

        expect(exit).not.toHaveBeenCalled();
        expect(terminate).toHaveBeenCalledTimes(1);
    });
});

describe('option parsing', () => {
    it('should parse a column list', () => {
        expect(parseColumns('name, state')).toEqual(['name', 'state']);
    });

    it('should reject an unknown column', () => {
        expect(() => parseColumns('name,owner')).toThrow(/^unknown column "owner"/);
    });

    it('should reject a negative width', () => {
        expect(() => parseWidth('-1')).toThrow('invalid width: -1');
    });
});
