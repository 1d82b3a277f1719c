/**
 * fetch with a bounded retry budget
 *
 * Retries network failures and 429/5xx responses with exponential backoff.
 * Any other response is returned to the caller as-is. An aborted caller
 * signal ends the loop immediately; a per-attempt timeout does not.
 */

import { setTimeout as delay } from 'node:timers/promises';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface RetryOptions {
    /** Retries after the first attempt (default 3) */
    retries?: number;
    /** First backoff in ms, doubled per retry (default 1000) */
    backoffMs?: number;
    /** Per-attempt timeout in ms */
    timeoutMs?: number;
    fetchFn?: FetchFn;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    /** Caller cancellation, combined with the per-attempt timeout */
    signal?: AbortSignal;
}

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

const defaultSleep = (ms: number, signal?: AbortSignal) => delay(ms, undefined, { signal });

function attemptSignal(timeoutMs: number | undefined, signal: AbortSignal | undefined): AbortSignal | undefined {
    const timeout = timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined;
    if (timeout && signal) {
        return AbortSignal.any([timeout, signal]);
    }
    return timeout ?? signal;
}

export async function fetchWithRetry(url: string, options: RetryOptions = {}): Promise<Response> {
    const retries = options.retries ?? 3;
    const backoffMs = options.backoffMs ?? 1000;
    const fetchFn = options.fetchFn ?? fetch;
    const sleep = options.sleep ?? defaultSleep;
    const { signal } = options;

    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt++) {
        if (attempt > 0) {
            await sleep(backoffMs * 2 ** (attempt - 1), signal);
        }
        signal?.throwIfAborted();

        let response: Response;
        try {
            response = await fetchFn(url, {
                method: 'GET',
                signal: attemptSignal(options.timeoutMs, signal),
            });
        } catch (error) {
            if (signal?.aborted) {
                throw error;
            }
            lastError = error;
            console.warn(`[fetchWithRetry] Request failed on attempt ${attempt + 1}/${retries + 1}:`, error);
            continue;
        }

        if (!RETRY_STATUSES.has(response.status)) {
            return response;
        }

        // Release the connection before the next attempt
        await response.body?.cancel();
        lastError = new Error(`HTTP ${response.status}`);
        console.warn(`[fetchWithRetry] ${response.status} on attempt ${attempt + 1}/${retries + 1}`);
    }

    throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
