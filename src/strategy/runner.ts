/**
 * Strategy Runner
 *
 * Wires one run together: resolves the strategy's markets, restores stored
 * positions, subscribes the stream channels, drives the dispatcher and tears
 * everything down when the run ends.
 */

import type { RuntimeConfig, ShutdownMode } from '../config/env';
import { StreamManager, type ChannelStatus, type StreamManagerOptions } from '../services/streamManager';
import type { TradeStore } from '../services/tradeStore';
import type { ExecutionEngine } from '../trading/executionEngine';
import type { DispatchEvent, EngineSnapshot, Market, Trade } from '../trading/interfaces';
import { EventChannel } from '../utils/eventChannel';
import { describeError } from '../utils/errors';
import Logger, { Log } from '../utils/logger';
import { MarketDirectory, parseMarketRef, resolveMarketRef } from '../utils/marketRef';
import { Dispatcher, type DispatchSummary } from './dispatcher';
import type { TradingStrategy } from './strategy';

/** Logger with the optional console extras the default logger provides. */
export interface RunnerLog extends Log {
    trade?(mode: string, side: 'buy' | 'sell', size: number, price: number, tokenId: string, balance?: number): void;
    status?(channel: string, state: string, detail?: string): void;
    header?(title: string): void;
}

export interface StrategyRunnerOptions {
    config: Readonly<RuntimeConfig>;
    strategy: TradingStrategy;
    directory: MarketDirectory;
    engine: ExecutionEngine;
    store: TradeStore;
    stream?: Pick<StreamManagerOptions, 'socketFactory' | 'random'>;
    logger?: RunnerLog;
}

export interface RunnerSnapshot {
    running: boolean;
    strategy: string;
    mode: string;
    markets: Market[];
    channels: ChannelStatus[];
    engine: EngineSnapshot;
    updatedAt: number;
}

export class StrategyRunner {
    private readonly config: Readonly<RuntimeConfig>;
    private readonly strategy: TradingStrategy;
    private readonly directory: MarketDirectory;
    private readonly engine: ExecutionEngine;
    private readonly store: TradeStore;
    private readonly streamOptions: Pick<StreamManagerOptions, 'socketFactory' | 'random'>;
    private readonly logger: RunnerLog;

    private markets: Market[] = [];
    private channels = new Map<string, ChannelStatus>();
    private dispatcher: Dispatcher | null = null;
    private stream: StreamManager | null = null;
    private heartbeat: NodeJS.Timeout | null = null;
    private running = false;

    constructor(options: StrategyRunnerOptions) {
        this.config = options.config;
        this.strategy = options.strategy;
        this.directory = options.directory;
        this.engine = options.engine;
        this.store = options.store;
        this.streamOptions = options.stream ?? {};
        this.logger = options.logger ?? Logger;
    }

    /**
     * Resolve every market reference of the strategy (or STRATEGY_MARKETS
     * when it names none). References that fail are logged and skipped; a
     * run needs at least one open market.
     */
    async loadMarkets(signal?: AbortSignal): Promise<Market[]> {
        const references = this.strategy.markets.length > 0 ? this.strategy.markets : this.config.strategyMarkets;
        const byId = new Map<string, Market>();
        for (const reference of references) {
            try {
                const resolved = await resolveMarketRef(parseMarketRef(reference), this.directory, signal);
                for (const market of resolved) {
                    if (market.status !== 'open') {
                        this.logger.warning(`Skipping ${market.status} market "${market.question || market.slug}"`);
                        continue;
                    }
                    byId.set(market.id, market);
                }
            } catch (error) {
                this.logger.error(`Could not load market "${reference}": ${describeError(error)}`);
            }
        }
        if (byId.size === 0) {
            throw new Error(`Strategy ${this.strategy.name} has no open markets to trade`);
        }
        this.markets = [...byId.values()];
        for (const market of this.markets) {
            this.logger.info(`Trading "${market.question || market.slug}" (${market.id})`);
        }
        return this.markets;
    }

    /**
     * Run until the signal aborts or `stop()` is called.
     */
    async run(signal: AbortSignal): Promise<DispatchSummary> {
        if (this.running) throw new Error('Runner is already running');
        this.running = true;
        let unsubscribeFills: (() => void) | null = null;
        const onAbort = (): void => this.stop(this.config.shutdownMode);

        try {
            const markets = await this.loadMarkets(signal);
            this.strategy.bind?.({ engine: this.engine, markets, logger: this.logger });
            await this.restoreState(signal);

            const tokens = new Set<string>();
            for (const market of markets) {
                tokens.add(market.tokenIds.yes);
                tokens.add(market.tokenIds.no);
            }

            const channel = new EventChannel<DispatchEvent>();
            this.dispatcher = new Dispatcher(this.strategy, this.engine, channel, { logger: this.logger, tokenScope: tokens });
            this.stream = new StreamManager(this.config.stream, this.config.reconnectBackoff, (event) => channel.push(event), {
                ...this.streamOptions,
                logger: this.logger,
                auth: this.userChannelAuth(),
                onStatus: (status) => this.recordStatus(status),
            });
            this.stream.subscribe(markets);
            unsubscribeFills = this.engine.onFill((trade) => this.reportFill(trade));

            // Dispatcher first so onStart runs before the first event.
            const finished = this.dispatcher.run();
            if (signal.aborted) {
                onAbort();
            } else {
                signal.addEventListener('abort', onAbort, { once: true });
                this.stream.start();
                this.heartbeat = setInterval(() => this.logHeartbeat(), this.config.heartbeatIntervalMs);
            }
            return await finished;
        } finally {
            signal.removeEventListener('abort', onAbort);
            if (this.heartbeat) clearInterval(this.heartbeat);
            this.heartbeat = null;
            this.stream?.stop();
            unsubscribeFills?.();
            this.running = false;
            this.logger.header?.(`${this.strategy.name} run summary`);
            this.logger.info(this.summaryLine());
        }
    }

    stop(mode: ShutdownMode = this.config.shutdownMode): void {
        this.logger.info(`Stopping ${this.strategy.name} (${mode})`);
        this.stream?.stop();
        this.dispatcher?.stop(mode);
    }

    snapshot(): RunnerSnapshot {
        return {
            running: this.running,
            strategy: this.strategy.name,
            mode: this.engine.mode,
            markets: this.markets.map((market) => ({ ...market, tokenIds: { ...market.tokenIds } })),
            channels: [...this.channels.values()].map((status) => ({ ...status })),
            engine: this.engine.snapshot(),
            updatedAt: Date.now(),
        };
    }

    private async restoreState(signal: AbortSignal): Promise<void> {
        try {
            const positions = await this.store.getPositions(this.engine.mode);
            if (positions.length > 0) this.engine.restorePositions(positions);
        } catch (error) {
            this.logger.warning(`Could not restore positions: ${describeError(error)}`);
        }

        if (this.engine.mode === 'live') {
            try {
                const balance = await this.engine.refreshBalance(signal);
                this.logger.info(`Venue balance: $${balance.cash.toFixed(2)}`);
            } catch (error) {
                this.logger.warning(`Could not fetch venue balance: ${describeError(error)}`);
            }
        }
    }

    private userChannelAuth(): StreamManagerOptions['auth'] {
        if (this.engine.mode !== 'live') return undefined;
        const { apiKey, apiSecret, apiPassphrase } = this.config.venue;
        if (!apiKey || !apiSecret || !apiPassphrase) {
            this.logger.warning('CLOB API credentials not configured: live fills will not be received');
            return undefined;
        }
        return { apiKey, secret: apiSecret, passphrase: apiPassphrase };
    }

    private recordStatus(status: ChannelStatus): void {
        this.channels.set(status.channel, status);
        this.logger.status?.(status.channel, status.gaveUp ? 'gave up' : status.state, status.detail);
    }

    private reportFill(trade: Trade): void {
        const balance = this.engine.getBalance().cash;
        if (this.logger.trade) {
            this.logger.trade(trade.mode, trade.side, trade.size, trade.price, trade.tokenId, balance);
        } else {
            this.logger.success(`${trade.mode} ${trade.side} ${trade.size} @ ${trade.price} ${trade.tokenId}`);
        }
    }

    private logHeartbeat(): void {
        const stats = this.engine.getStats();
        const balance = this.engine.getBalance();
        const channels = [...this.channels.values()].map((status) => `${status.channel}=${status.state}`).join(' ');
        this.logger.info(
            `♥ ${this.strategy.name}: ${stats.totalTrades} trades, ${stats.openOrders} open, ` +
                `cash $${balance.cash.toFixed(2)}, equity $${this.engine.getEquity().toFixed(2)}, ` +
                `P&L $${(stats.realizedPnl + stats.unrealizedPnl).toFixed(2)} ${channels}`.trimEnd()
        );
    }

    private summaryLine(): string {
        const stats = this.engine.getStats();
        return (
            `Run finished: ${stats.totalTrades} trades, volume $${stats.totalVolume.toFixed(2)}, ` +
            `realized P&L $${stats.realizedPnl.toFixed(2)}, equity $${this.engine.getEquity().toFixed(2)}`
        );
    }
}
