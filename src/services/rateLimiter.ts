import type { RateLimitConfig } from '../config/env';
import { AbortError } from '../utils/backoff';

interface Waiter {
    weight: number;
    resolve: () => void;
    reject: (error: Error) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

/**
 * Token bucket gating requests to the venue.
 *
 * Refill is continuous: tokens accrue in proportion to elapsed time. Callers
 * that cannot be served immediately queue up and are woken by a single timer
 * in arrival order, so a steady stream of small requests cannot starve a
 * larger one that arrived first.
 */
export class RateLimiter {
    private readonly capacity: number;
    private readonly refillPerSecond: number;
    private readonly now: () => number;
    private tokens: number;
    private lastRefill: number;
    private waiters: Waiter[] = [];
    private timer: NodeJS.Timeout | null = null;

    constructor(config: RateLimitConfig, now: () => number = Date.now) {
        if (config.capacity <= 0 || config.refillPerSecond <= 0) {
            throw new RangeError('Rate limit capacity and refill rate must be positive');
        }
        this.capacity = config.capacity;
        this.refillPerSecond = config.refillPerSecond;
        this.now = now;
        this.tokens = config.capacity;
        this.lastRefill = now();
    }

    /**
     * Wait until `weight` tokens are available, then take them.
     */
    acquire(weight = 1, signal?: AbortSignal): Promise<void> {
        if (weight <= 0) return Promise.resolve();
        if (weight > this.capacity) {
            return Promise.reject(new RangeError(`Weight ${weight} exceeds bucket capacity ${this.capacity}`));
        }
        if (signal?.aborted) return Promise.reject(new AbortError());

        this.refill();
        if (this.waiters.length === 0 && this.tokens >= weight) {
            this.tokens -= weight;
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = { weight, resolve, reject, signal };
            if (signal) {
                waiter.onAbort = () => this.abandon(waiter);
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }
            this.waiters.push(waiter);
            this.schedule();
        });
    }

    getAvailableTokens(): number {
        this.refill();
        return this.tokens;
    }

    getCapacity(): number {
        return this.capacity;
    }

    get pending(): number {
        return this.waiters.length;
    }

    /**
     * Reject every queued caller and stop the wake-up timer.
     */
    close(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            this.detach(waiter);
            waiter.reject(new AbortError('Rate limiter closed'));
        }
    }

    private refill(): void {
        const now = this.now();
        const elapsed = now - this.lastRefill;
        if (elapsed > 0) {
            this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.refillPerSecond) / 1000);
            this.lastRefill = now;
        }
    }

    private schedule(): void {
        if (this.timer || this.waiters.length === 0) return;

        const head = this.waiters[0];
        this.refill();
        const deficit = head.weight - this.tokens;
        const waitMs = deficit <= 0 ? 0 : Math.ceil((deficit * 1000) / this.refillPerSecond);

        this.timer = setTimeout(() => {
            this.timer = null;
            this.drain();
        }, waitMs);
    }

    private drain(): void {
        this.refill();
        while (this.waiters.length > 0 && this.tokens >= this.waiters[0].weight) {
            const waiter = this.waiters.shift();
            if (!waiter) break;
            this.tokens -= waiter.weight;
            this.detach(waiter);
            waiter.resolve();
        }
        this.schedule();
    }

    private abandon(waiter: Waiter): void {
        const index = this.waiters.indexOf(waiter);
        if (index === -1) return;
        this.waiters.splice(index, 1);
        waiter.reject(new AbortError());

        // The head may have changed; re-arm for the new one.
        if (index === 0 && this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.schedule();
    }

    private detach(waiter: Waiter): void {
        if (waiter.signal && waiter.onAbort) {
            waiter.signal.removeEventListener('abort', waiter.onAbort);
        }
    }
}
