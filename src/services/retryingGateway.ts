import axios from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import type { GatewayConfig } from '../config/env';
import { AbortError, backoffDelay, sleep } from '../utils/backoff';
import { GatewayError, describeError } from '../utils/errors';
import Logger, { Log } from '../utils/logger';
import { RateLimiter } from './rateLimiter';

/**
 * One logical venue call. `execute` performs a single attempt and must honour
 * the signal it is given; the gateway owns retries, timeouts and validation.
 */
export interface GatewayRequest<T> {
    name: string;
    execute: (signal: AbortSignal) => Promise<unknown>;
    schema: ZodType<T, ZodTypeDef, unknown>;
    /** Rate limiter tokens per attempt (default 1). */
    weight?: number;
    signal?: AbortSignal;
    /** Override the configured attempt cap for this call. */
    maxAttempts?: number;
}

export interface GatewayOptions {
    logger?: Log;
    random?: () => number;
}

/**
 * Map whatever an attempt threw onto the gateway taxonomy.
 */
export function classifyError(error: unknown): GatewayError {
    if (error instanceof GatewayError) return error;

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 429) {
            return new GatewayError('RateLimited', `Rate limited: ${error.message}`, {
                status,
                retryAfterMs: parseRetryAfter(error.response?.headers?.['retry-after']),
                cause: error,
            });
        }
        if (status !== undefined && status >= 500) {
            return new GatewayError('ServerError', `Server error: ${error.message}`, { status, cause: error });
        }
        if (status !== undefined && status >= 400) {
            return new GatewayError('ClientError', `Request rejected: ${error.message}`, { status, cause: error });
        }
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return new GatewayError('Timeout', `Request timed out: ${error.message}`, { cause: error });
        }
        return new GatewayError('NetworkError', `Network failure: ${error.message}`, { cause: error });
    }

    return new GatewayError('NetworkError', describeError(error), { cause: error });
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
    if (typeof value !== 'string' && typeof value !== 'number') return undefined;
    const seconds = Number(value);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const date = Date.parse(String(value));
    return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Rate-limited, retrying access to the venue.
 *
 * Every attempt takes limiter capacity first and runs under its own timeout.
 * Transient failures back off exponentially with jitter; client errors and
 * schema violations surface on the first attempt. `shutdown()` cancels every
 * call in flight.
 */
export class RetryingGateway {
    private readonly limiter: RateLimiter;
    private readonly config: GatewayConfig;
    private readonly logger: Log;
    private readonly random: () => number;
    private readonly shutdownController = new AbortController();

    constructor(limiter: RateLimiter, config: GatewayConfig, options: GatewayOptions = {}) {
        this.limiter = limiter;
        this.config = config;
        this.logger = options.logger ?? Logger;
        this.random = options.random ?? Math.random;
    }

    async call<T>(request: GatewayRequest<T>): Promise<T> {
        const maxAttempts = Math.max(1, request.maxAttempts ?? this.config.maxAttempts);
        const cancel = linkSignals(this.shutdownController.signal, request.signal);

        try {
            for (let attempt = 0; ; attempt++) {
                this.throwIfCancelled(cancel.signal, request.name, attempt);

                try {
                    await this.limiter.acquire(request.weight ?? 1, cancel.signal);
                } catch (error) {
                    // Weight above capacity surfaces as-is.
                    if (error instanceof RangeError) throw error;
                    throw this.cancelled(request.name, attempt + 1);
                }

                let failure: GatewayError;
                try {
                    const raw = await this.attempt(request, cancel.signal);
                    return this.validate(request, raw);
                } catch (error) {
                    if (error instanceof AbortError || cancel.signal.aborted) {
                        throw this.cancelled(request.name, attempt + 1);
                    }
                    failure = classifyError(error);
                }

                failure.attempts = attempt + 1;
                if (!failure.retryable || attempt + 1 >= maxAttempts) {
                    this.logger.warning(`${request.name} failed after ${attempt + 1} attempt(s): ${describeError(failure)}`);
                    throw failure;
                }

                let delay = backoffDelay(attempt, this.config, this.random);
                if (failure.kind === 'RateLimited' && failure.retryAfterMs !== undefined) {
                    delay = Math.max(delay, failure.retryAfterMs);
                }
                this.logger.debug(
                    `${request.name}: ${failure.kind} on attempt ${attempt + 1}/${maxAttempts}, retrying in ${Math.round(delay)}ms`
                );

                try {
                    await sleep(delay, cancel.signal);
                } catch {
                    throw this.cancelled(request.name, attempt + 1);
                }
            }
        } finally {
            cancel.dispose();
        }
    }

    /**
     * Abort every in-flight and future call with a Cancelled error.
     */
    shutdown(): void {
        this.shutdownController.abort();
    }

    get isShutdown(): boolean {
        return this.shutdownController.signal.aborted;
    }

    private async attempt<T>(request: GatewayRequest<T>, callerSignal: AbortSignal): Promise<unknown> {
        const attemptController = new AbortController();
        const link = linkSignals(callerSignal);
        const forward = (): void => attemptController.abort();
        link.signal.addEventListener('abort', forward, { once: true });

        let timedOut = false;
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                timedOut = true;
                attemptController.abort();
                reject(new GatewayError('Timeout', `${request.name} timed out after ${this.config.timeoutMs}ms`));
            }, this.config.timeoutMs);
        });

        try {
            return await Promise.race([request.execute(attemptController.signal), timeout]);
        } catch (error) {
            if (timedOut) {
                throw new GatewayError('Timeout', `${request.name} timed out after ${this.config.timeoutMs}ms`, { cause: error });
            }
            throw error;
        } finally {
            clearTimeout(timer);
            link.signal.removeEventListener('abort', forward);
            link.dispose();
        }
    }

    private validate<T>(request: GatewayRequest<T>, raw: unknown): T {
        const parsed = request.schema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .slice(0, 3)
                .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
                .join('; ');
            throw new GatewayError('ClientError', `${request.name} returned an unexpected payload: ${issues}`, {
                subtype: 'SchemaViolation',
            });
        }
        return parsed.data;
    }

    private throwIfCancelled(signal: AbortSignal, name: string, attempts: number): void {
        if (signal.aborted) throw this.cancelled(name, attempts);
    }

    private cancelled(name: string, attempts: number): GatewayError {
        const error = new GatewayError('Cancelled', `${name} cancelled`);
        error.attempts = attempts;
        return error;
    }
}

interface LinkedSignal {
    signal: AbortSignal;
    dispose: () => void;
}

/**
 * A signal that aborts when any of the given signals aborts.
 */
function linkSignals(...signals: Array<AbortSignal | undefined>): LinkedSignal {
    const controller = new AbortController();
    const cleanups: Array<() => void> = [];
    for (const signal of signals) {
        if (!signal) continue;
        if (signal.aborted) {
            controller.abort();
            break;
        }
        const onAbort = (): void => controller.abort();
        signal.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => signal.removeEventListener('abort', onAbort));
    }
    return {
        signal: controller.signal,
        dispose: () => cleanups.forEach((cleanup) => cleanup()),
    };
}
