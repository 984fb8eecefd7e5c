import * as dotenv from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger';

/**
 * Runtime configuration.
 *
 * Read once at startup from the environment (and `.env`), validated with zod
 * and frozen. Every component receives the slice it needs through its
 * constructor; nothing reads process.env after this point.
 */

export type TradingMode = 'paper' | 'live';
export type ShutdownMode = 'graceful' | 'hard';

export interface RateLimitConfig {
    capacity: number;
    refillPerSecond: number;
}

export interface BackoffConfig {
    baseMs: number;
    maxMs: number;
    jitterMs: number;
}

export interface GatewayConfig extends BackoffConfig {
    maxAttempts: number;
    timeoutMs: number;
}

export interface ReconnectConfig extends BackoffConfig {
    /** Consecutive failed attempts before a channel gives up. */
    maxAttempts: number;
}

export interface StreamConfig {
    marketUrl: string;
    userUrl: string;
    pingIntervalMs: number;
    heartbeatTimeoutMs: number;
    connectTimeoutMs: number;
}

export interface PaperTradingConfig {
    initialBalance: number;
    feeRate: number;
    slippage: number;
    allowLeverage: boolean;
}

export interface VenueConfig {
    gammaUrl: string;
    clobUrl: string;
    chainId: number;
    privateKey?: string;
    funderAddress?: string;
    signatureType: number;
    apiKey?: string;
    apiSecret?: string;
    apiPassphrase?: string;
}

export interface RuntimeConfig {
    mode: TradingMode;
    rateLimit: RateLimitConfig;
    gateway: GatewayConfig;
    reconnectBackoff: ReconnectConfig;
    stream: StreamConfig;
    paperTrading: PaperTradingConfig;
    venue: VenueConfig;
    mongoUri?: string;
    port?: number;
    strategyPath?: string;
    /** Used when the strategy itself names no markets. */
    strategyMarkets: string[];
    heartbeatIntervalMs: number;
    shutdownMode: ShutdownMode;
    logLevel: LogLevel;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

const flag = z
    .string()
    .optional()
    .transform((value) => ['1', 'true', 'yes', 'on'].includes((value ?? '').toLowerCase()));

const EnvSchema = z.object({
    TRADING_MODE: z.enum(['paper', 'live']).default('paper'),

    RATE_LIMIT_CAPACITY: z.coerce.number().positive().default(50),
    RATE_LIMIT_REFILL_PER_SECOND: z.coerce.number().positive().default(5),

    GATEWAY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    RETRY_BASE_MS: z.coerce.number().nonnegative().default(500),
    RETRY_MAX_MS: z.coerce.number().nonnegative().default(8_000),
    RETRY_JITTER_MS: z.coerce.number().nonnegative().default(250),

    RECONNECT_BASE_MS: z.coerce.number().nonnegative().default(1_000),
    RECONNECT_MAX_MS: z.coerce.number().nonnegative().default(30_000),
    RECONNECT_JITTER_MS: z.coerce.number().nonnegative().default(500),
    RECONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(20),

    WS_MARKET_URL: z.string().url().default('wss://ws-subscriptions-clob.polymarket.com/ws/market'),
    WS_USER_URL: z.string().url().default('wss://ws-subscriptions-clob.polymarket.com/ws/user'),
    WS_PING_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
    WS_HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    WS_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    PAPER_INITIAL_BALANCE: z.coerce.number().nonnegative().default(10_000),
    PAPER_FEE_RATE: z.coerce.number().min(0).max(1).default(0),
    PAPER_SLIPPAGE: z.coerce.number().min(0).max(1).default(0.001),
    PAPER_ALLOW_LEVERAGE: flag,

    GAMMA_API_URL: z.string().url().default('https://gamma-api.polymarket.com'),
    CLOB_API_URL: z.string().url().default('https://clob.polymarket.com'),
    CHAIN_ID: z.coerce.number().int().default(137),
    PRIVATE_KEY: optionalString,
    PROXY_WALLET: optionalString,
    SIGNATURE_TYPE: z.coerce.number().int().min(0).max(2).default(0),
    CLOB_API_KEY: optionalString,
    CLOB_SECRET: optionalString,
    CLOB_PASSPHRASE: optionalString,

    MONGO_URI: optionalString,
    PORT: z.coerce.number().int().positive().optional(),
    STRATEGY_PATH: optionalString,
    STRATEGY_MARKETS: z
        .string()
        .optional()
        .transform((value) => (value ?? '').split(',').map((entry) => entry.trim()).filter(Boolean)),
    HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
    SHUTDOWN_MODE: z.enum(['graceful', 'hard']).default('graceful'),
    LOG_LEVEL: z.preprocess(
        (value) => (typeof value === 'string' ? value.trim().toLowerCase().replace(/^warning$/, 'warn') : value),
        z.enum(['debug', 'info', 'warn', 'error']).default('info')
    ),
});

type RawEnv = Record<string, string | undefined>;

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const child of Object.values(value)) {
        if (child && typeof child === 'object' && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

/**
 * Build the runtime configuration from an environment map. Empty strings are
 * treated as unset so a blank `.env` entry falls back to its default.
 */
export function loadConfig(env: RawEnv = process.env): Readonly<RuntimeConfig> {
    const cleaned: RawEnv = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value;
    }

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
    }
    const e = parsed.data;

    if (e.TRADING_MODE === 'live' && !e.PRIVATE_KEY) {
        throw new ConfigError('PRIVATE_KEY is required when TRADING_MODE=live');
    }
    if (e.RETRY_MAX_MS < e.RETRY_BASE_MS || e.RECONNECT_MAX_MS < e.RECONNECT_BASE_MS) {
        throw new ConfigError('Backoff maximum must not be below its base delay');
    }

    const config: RuntimeConfig = {
        mode: e.TRADING_MODE,
        rateLimit: {
            capacity: e.RATE_LIMIT_CAPACITY,
            refillPerSecond: e.RATE_LIMIT_REFILL_PER_SECOND,
        },
        gateway: {
            maxAttempts: e.GATEWAY_MAX_ATTEMPTS,
            timeoutMs: e.GATEWAY_TIMEOUT_MS,
            baseMs: e.RETRY_BASE_MS,
            maxMs: e.RETRY_MAX_MS,
            jitterMs: e.RETRY_JITTER_MS,
        },
        reconnectBackoff: {
            baseMs: e.RECONNECT_BASE_MS,
            maxMs: e.RECONNECT_MAX_MS,
            jitterMs: e.RECONNECT_JITTER_MS,
            maxAttempts: e.RECONNECT_MAX_ATTEMPTS,
        },
        stream: {
            marketUrl: e.WS_MARKET_URL,
            userUrl: e.WS_USER_URL,
            pingIntervalMs: e.WS_PING_INTERVAL_MS,
            heartbeatTimeoutMs: e.WS_HEARTBEAT_TIMEOUT_MS,
            connectTimeoutMs: e.WS_CONNECT_TIMEOUT_MS,
        },
        paperTrading: {
            initialBalance: e.PAPER_INITIAL_BALANCE,
            feeRate: e.PAPER_FEE_RATE,
            slippage: e.PAPER_SLIPPAGE,
            allowLeverage: e.PAPER_ALLOW_LEVERAGE,
        },
        venue: {
            gammaUrl: e.GAMMA_API_URL.replace(/\/+$/, ''),
            clobUrl: e.CLOB_API_URL.replace(/\/+$/, ''),
            chainId: e.CHAIN_ID,
            privateKey: e.PRIVATE_KEY,
            funderAddress: e.PROXY_WALLET,
            signatureType: e.SIGNATURE_TYPE,
            apiKey: e.CLOB_API_KEY,
            apiSecret: e.CLOB_SECRET,
            apiPassphrase: e.CLOB_PASSPHRASE,
        },
        mongoUri: e.MONGO_URI,
        port: e.PORT,
        strategyPath: e.STRATEGY_PATH,
        strategyMarkets: e.STRATEGY_MARKETS,
        heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
        shutdownMode: e.SHUTDOWN_MODE,
        logLevel: e.LOG_LEVEL,
    };

    return deepFreeze(config);
}

/**
 * Load `.env` into process.env, then build the configuration from it.
 */
export function loadConfigFromEnvironment(): Readonly<RuntimeConfig> {
    dotenv.config();
    return loadConfig(process.env);
}
