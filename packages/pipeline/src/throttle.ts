/**
 * Throttle
 *
 * Fixed pause after each successful call to a quota-limited endpoint. The
 * default of 13s keeps a 5 calls/minute quota with a little margin.
 */

export const DEFAULT_THROTTLE_MS = 13_000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout-based sleep that rejects with the signal's reason on abort.
 */
export const sleep: Sleep = (ms, signal) => new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
        reject(signal.reason);
        return;
    }
    const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
    };
    const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
});

export interface Throttle {
    /** Block after a call that consumed quota */
    wait(signal?: AbortSignal): Promise<void>;
}

export class IntervalThrottle implements Throttle {
    readonly intervalMs: number;
    private sleepFn: Sleep;

    constructor(intervalMs: number = DEFAULT_THROTTLE_MS, sleepFn: Sleep = sleep) {
        if (!Number.isFinite(intervalMs) || intervalMs < 0) {
            throw new RangeError(`Throttle interval must be a non-negative number, got ${intervalMs}`);
        }
        this.intervalMs = intervalMs;
        this.sleepFn = sleepFn;
    }

    async wait(signal?: AbortSignal): Promise<void> {
        if (this.intervalMs === 0) {
            signal?.throwIfAborted();
            return;
        }
        await this.sleepFn(this.intervalMs, signal);
    }
}
