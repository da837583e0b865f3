/**
 * Rate-limit pauses between browser actions
 * Sleep and randomness are injected so tests run with zero delay.
 */

import type { DelayRange } from '../config.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait ms milliseconds. Resolves early (never rejects) when signal aborts;
 * callers check signal.aborted afterwards.
 */
export const sleep: Sleep = (ms, signal) => new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
        resolve();
        return;
    }

    const onAbort = () => {
        clearTimeout(timer);
        resolve();
    };
    const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
});

export const NO_DELAY: DelayRange = { minMs: 0, maxMs: 0 };

export function pickDelay(range: DelayRange, random: () => number = Math.random): number {
    return Math.round(range.minMs + random() * (range.maxMs - range.minMs));
}

export interface DelayOptions {
    sleep?: Sleep;
    random?: () => number;
    signal?: AbortSignal;
}

export async function randomDelay(range: DelayRange, options: DelayOptions = {}): Promise<number> {
    const ms = pickDelay(range, options.random);
    await (options.sleep ?? sleep)(ms, options.signal);
    return ms;
}
