import type { BackoffConfig } from '../config/env';

/**
 * Exponential backoff: base × 2^attempt, capped at max, plus up to jitterMs of
 * random spread. `attempt` counts from 0.
 */
export const backoffDelay = (attempt: number, policy: BackoffConfig, random: () => number = Math.random): number => {
    const exponential = policy.baseMs * Math.pow(2, Math.max(0, attempt));
    const capped = Math.min(exponential, policy.maxMs);
    return capped + random() * policy.jitterMs;
};

export class AbortError extends Error {
    constructor(message = 'Aborted') {
        super(message);
        this.name = 'AbortError';
    }
}

/**
 * Sleep helper that wakes early (rejecting with AbortError) when the signal fires.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortError());
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new AbortError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
