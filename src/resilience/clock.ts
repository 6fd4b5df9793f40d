import { cancelledError } from '../utils/errors';

/**
 * Time source in epoch milliseconds. Injected wherever time decides behaviour.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now()
};

/**
 * Hand-driven clock for tests.
 */
export class ManualClock implements Clock {
    private current: number;

    constructor(start = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    advance(ms: number): void {
        this.current += ms;
    }

    set(ms: number): void {
        this.current = ms;
    }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms`, or reject with a Cancelled error when `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) => new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
        reject(cancelledError());
        return;
    }

    const onAbort = () => {
        clearTimeout(timer);
        reject(cancelledError());
    };
    const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
});

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw cancelledError();
    }
}

/**
 * Settle with `promise`, or reject Cancelled as soon as `signal` aborts.
 * //? The underlying request keeps running; its result is discarded
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) return Promise.reject(cancelledError());

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(cancelledError());
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            }
        );
    });
}
