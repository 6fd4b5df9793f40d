/**
 * ================================================================================
 * TUI DRIVER - Terminal, Timers and Fetches
 * ================================================================================
 *
 * Runs the reducer against a real terminal:
 * • alternate screen + hidden cursor while running, restored on exit
 * • readline keypress events in raw mode become `key` events
 * • output resize becomes `resize`, a 1s interval becomes `tick`
 * • `fetch` commands run as tracked promises that post `fetched` events;
 *   on exit they are aborted and awaited before the intent is returned
 */

import chalk from 'chalk';
import * as readline from 'readline';
import { AutoScalingService } from '../services/autoscaling';
import { EksService } from '../services/eks';
import { InstanceService } from '../services/instances';
import { Clock, systemClock } from '../resilience/clock';
import { FinderInput, FinderOutput } from '../ui/fuzzy/finder';
import { errorMessage, isCancelled } from '../utils/errors';
import { Logger } from '../utils/logger';
import { initialState, reduce } from './reducer';
import { renderFrame } from './render';
import { FetchData, FetchRequest, Intent, TuiCommand, TuiEvent, TuiKey, TuiState } from './types';

export type Fetcher = (request: FetchRequest, signal: AbortSignal) => Promise<FetchData>;

export interface TuiServices {
    instances: InstanceService;
    eks: EksService;
    autoScaling: AutoScalingService;
}

export function serviceFetcher(services: TuiServices): Fetcher {
    return async (request, signal) => {
        switch (request.resource) {
            case 'instances':
                return { resource: 'instances', items: await services.instances.listInstances({ signal }) };
            case 'clusters':
                return { resource: 'clusters', items: await services.eks.listClusterSummaries(signal) };
            case 'nodeGroups':
                return {
                    resource: 'nodeGroups',
                    clusterName: request.clusterName,
                    items: await services.eks.describeNodeGroups(request.clusterName, signal)
                };
            case 'asgs':
                return { resource: 'asgs', items: await services.autoScaling.listGroups(signal) };
        }
    };
}

export interface TuiDriverOptions {
    fetcher: Fetcher;
    logger: Logger;
    input?: FinderInput;
    output?: FinderOutput;
    noColor?: boolean;
    clock?: Clock;
    tickMs?: number;
}

const ENTER_ALT_SCREEN = '\x1b[?1049h\x1b[?25l';
const LEAVE_ALT_SCREEN = '\x1b[?25h\x1b[?1049l';
const CLEAR = '\x1b[H\x1b[2J';

export class TuiDriver {
    private readonly input: FinderInput;
    private readonly output: FinderOutput;
    private readonly clock: Clock;
    private readonly inflight = new Map<number, { controller: AbortController; done: Promise<void> }>();

    constructor(private readonly options: TuiDriverOptions) {
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Run until the user quits or `signal` aborts. Resolves with the recorded intent.
     */
    run(signal?: AbortSignal): Promise<Intent | null> {
        const { logger } = this.options;
        const painter = this.options.noColor ? new chalk.Instance({ level: 0 }) : chalk;
        let state: TuiState = initialState(this.output.columns ?? 80, this.output.rows ?? 24, this.clock.now());
        let closed = false;

        return new Promise<Intent | null>((resolve) => {
            const draw = (): void => {
                this.output.write(CLEAR + renderFrame(state, painter).join('\n'));
            };

            const dispatch = (event: TuiEvent): void => {
                if (closed) return;
                const [next, command] = reduce(state, event);
                state = next;
                this.execute(command, dispatch, close);
                if (!closed) draw();
            };

            const onKey = (_text: string | undefined, key: TuiKey | undefined): void => {
                dispatch({ type: 'key', key: key ?? {} });
            };
            const onResize = (): void => {
                dispatch({ type: 'resize', width: this.output.columns ?? 80, height: this.output.rows ?? 24 });
            };
            const onAbort = (): void => close();

            const timer = setInterval(() => dispatch({ type: 'tick', now: this.clock.now() }), this.options.tickMs ?? 1000);
            timer.unref();

            const close = (): void => {
                if (closed) return;
                closed = true;
                clearInterval(timer);
                this.input.removeListener('keypress', onKey);
                this.output.removeListener('resize', onResize);
                signal?.removeEventListener('abort', onAbort);
                if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(false);
                this.input.pause();
                this.output.write(LEAVE_ALT_SCREEN);
                logger.setQuiet(false);

                const pending = [...this.inflight.values()];
                for (const fetch of pending) fetch.controller.abort();
                void Promise.all(pending.map((fetch) => fetch.done)).then(() => resolve(state.intent));
            };

            logger.setQuiet(true);
            this.output.write(ENTER_ALT_SCREEN);
            readline.emitKeypressEvents(this.input);
            if (this.input.isTTY && this.input.setRawMode) this.input.setRawMode(true);
            this.input.on('keypress', onKey);
            this.output.on('resize', onResize);
            signal?.addEventListener('abort', onAbort, { once: true });
            this.input.resume();

            if (signal?.aborted) {
                close();
                return;
            }
            draw();
        });
    }

    private execute(command: TuiCommand, dispatch: (event: TuiEvent) => void, close: () => void): void {
        switch (command.type) {
            case 'none':
                return;
            case 'quit':
                close();
                return;
            case 'fetch':
                this.startFetch(command.id, command.request, dispatch);
                return;
        }
    }

    private startFetch(id: number, request: FetchRequest, dispatch: (event: TuiEvent) => void): void {
        const controller = new AbortController();
        const done = this.options.fetcher(request, controller.signal).then(
            (data) => dispatch({ type: 'fetched', id, data }),
            (err: unknown) => {
                if (isCancelled(err) && controller.signal.aborted) return;
                this.options.logger.debug('TUI fetch failed', { resource: request.resource, error: errorMessage(err) });
                dispatch({ type: 'fetched', id, error: errorMessage(err) });
            }
        ).finally(() => this.inflight.delete(id));
        this.inflight.set(id, { controller, done });
    }
}
