/**
 * Error types surfaced by the gateway and the execution engine.
 */

export type GatewayErrorKind =
    | 'Timeout'
    | 'RateLimited'
    | 'ServerError'
    | 'ClientError'
    | 'NetworkError'
    | 'Cancelled';

export type ClientErrorSubtype = 'SchemaViolation' | 'VenueRejected';

export interface GatewayErrorOptions {
    status?: number;
    retryAfterMs?: number;
    subtype?: ClientErrorSubtype;
    cause?: unknown;
}

export class GatewayError extends Error {
    readonly kind: GatewayErrorKind;
    readonly status?: number;
    readonly retryAfterMs?: number;
    readonly subtype?: ClientErrorSubtype;
    /** Attempts made before this error surfaced; set by the gateway. */
    attempts = 0;

    constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'GatewayError';
        this.kind = kind;
        this.status = options.status;
        this.retryAfterMs = options.retryAfterMs;
        this.subtype = options.subtype;
    }

    get retryable(): boolean {
        return this.kind === 'NetworkError' || this.kind === 'Timeout' || this.kind === 'ServerError' || this.kind === 'RateLimited';
    }
}

export const isGatewayError = (error: unknown): error is GatewayError => error instanceof GatewayError;

export type ExecutionErrorKind =
    | 'InsufficientBalance'
    | 'InsufficientPosition'
    | 'InvalidPrice'
    | 'UnknownOrder'
    | 'TokenOutOfScope'
    | 'ModeMismatch';

export class ExecutionError extends Error {
    readonly kind: ExecutionErrorKind;

    constructor(kind: ExecutionErrorKind, message: string) {
        super(message);
        this.name = 'ExecutionError';
        this.kind = kind;
    }
}

export const isExecutionError = (error: unknown): error is ExecutionError => error instanceof ExecutionError;

/**
 * Render anything thrown as a one-line message for logs.
 */
export const describeError = (error: unknown): string => {
    if (error instanceof GatewayError) {
        const status = error.status === undefined ? '' : ` (HTTP ${error.status})`;
        return `${error.kind}${status}: ${error.message}`;
    }
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
};
