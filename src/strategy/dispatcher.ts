/**
 * Dispatcher
 *
 * The single event loop of a run. Stream events and engine fills share one
 * ordered channel; each event is handled to completion, strategy callback
 * included, before the next one is taken. A callback that throws is logged
 * and the loop moves on.
 */

import type { ShutdownMode } from '../config/env';
import type { ExecutionEngine } from '../trading/executionEngine';
import type { DispatchEvent } from '../trading/interfaces';
import { EventChannel } from '../utils/eventChannel';
import { describeError } from '../utils/errors';
import Logger, { Log } from '../utils/logger';
import type { TradingStrategy } from './strategy';

export interface DispatcherOptions {
    logger?: Log;
    /** Tokens whose market events reach the strategy; all when omitted. */
    tokenScope?: ReadonlySet<string>;
}

export interface DispatchSummary {
    processed: number;
    failed: number;
    dropped: number;
}

type Callback = 'onStart' | 'onStop' | 'onPriceUpdate' | 'onOrderBookUpdate' | 'onFill';

const eventTimestamp = (event: DispatchEvent): number => {
    switch (event.type) {
        case 'price_update':
        case 'order_book_update':
            return event.update.timestamp;
        case 'fill_notification':
            return event.fill.timestamp;
        case 'fill':
            return event.trade.timestamp;
    }
};

const isThenable = (value: unknown): value is PromiseLike<unknown> =>
    typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';

export class Dispatcher {
    private readonly strategy: TradingStrategy;
    private readonly engine: ExecutionEngine;
    private readonly channel: EventChannel<DispatchEvent>;
    private readonly logger: Log;
    private readonly tokenScope?: ReadonlySet<string>;

    private running = false;
    private hardStop = false;
    private warnedAsync = false;
    private summary: DispatchSummary = { processed: 0, failed: 0, dropped: 0 };

    constructor(
        strategy: TradingStrategy,
        engine: ExecutionEngine,
        channel: EventChannel<DispatchEvent> = new EventChannel<DispatchEvent>(),
        options: DispatcherOptions = {}
    ) {
        this.strategy = strategy;
        this.engine = engine;
        this.channel = channel;
        this.logger = options.logger ?? Logger;
        this.tokenScope = options.tokenScope;
    }

    /** Producers (stream manager, tests) push here. */
    enqueue(event: DispatchEvent): boolean {
        return this.channel.push(event);
    }

    /**
     * Run until `stop()`. Rejects if `onStart` throws, without calling
     * `onStop`; otherwise `onStop` runs once the loop has ended.
     */
    async run(): Promise<DispatchSummary> {
        if (this.running) throw new Error('Dispatcher is already running');
        this.running = true;
        const unsubscribe = this.engine.onFill((trade) => {
            if (!this.channel.push({ type: 'fill', trade })) {
                this.logger.debug(`Fill ${trade.id} arrived after shutdown; not delivered`);
            }
        });

        let started = false;
        try {
            this.startStrategy();
            started = true;
            for (;;) {
                const event = await this.channel.next();
                if (event === undefined || this.hardStop) break;
                this.handle(event);
                this.summary.processed++;
            }
        } finally {
            unsubscribe();
            if (started) this.invoke('onStop', () => this.strategy.onStop(), 'stop', Date.now());
            this.running = false;
        }
        return { ...this.summary };
    }

    /**
     * Graceful: deliver what is already queued, plus the fills that queue
     * produces, then exit. Hard: drop it.
     */
    stop(mode: ShutdownMode = 'graceful'): void {
        if (mode === 'hard') {
            this.hardStop = true;
            this.summary.dropped += this.channel.clear();
            this.channel.close();
            return;
        }
        this.channel.seal((event) => event.type === 'fill');
    }

    get isRunning(): boolean {
        return this.running;
    }

    get pending(): number {
        return this.channel.size;
    }

    private startStrategy(): void {
        try {
            this.strategy.onStart();
        } catch (error) {
            this.logger.error(`${this.strategy.name}: onStart failed, aborting run: ${describeError(error)}`);
            throw error;
        }
    }

    private handle(event: DispatchEvent): void {
        const at = eventTimestamp(event);
        switch (event.type) {
            case 'price_update': {
                const { update } = event;
                this.guardEngine(event.type, () => this.engine.applyPriceUpdate(update));
                if (this.inScope(update.tokenId)) {
                    this.invoke('onPriceUpdate', () => this.strategy.onPriceUpdate(update), event.type, at);
                }
                return;
            }
            case 'order_book_update': {
                const { update } = event;
                const callback = this.strategy.onOrderBookUpdate;
                if (callback && this.inScope(update.tokenId)) {
                    this.invoke('onOrderBookUpdate', () => callback.call(this.strategy, update), event.type, at);
                }
                return;
            }
            case 'fill_notification': {
                const { fill } = event;
                this.guardEngine(event.type, () => this.engine.applyFillNotification(fill));
                return;
            }
            case 'fill': {
                const { trade } = event;
                this.invoke('onFill', () => this.strategy.onFill(trade), event.type, at);
                return;
            }
        }
    }

    private inScope(tokenId: string): boolean {
        return !this.tokenScope || this.tokenScope.has(tokenId);
    }

    private invoke(callback: Callback, run: () => unknown, eventType: string, at: number): void {
        try {
            const result = run();
            if (isThenable(result)) this.watchAsync(callback, result, eventType, at);
        } catch (error) {
            this.summary.failed++;
            this.logger.error(
                `${this.strategy.name}.${callback} failed on ${eventType} @ ${new Date(at).toISOString()}: ${describeError(error)}`
            );
        }
    }

    /**
     * Callbacks are not awaited; a returned promise only gets its failure logged.
     */
    private watchAsync(callback: Callback, result: PromiseLike<unknown>, eventType: string, at: number): void {
        if (!this.warnedAsync) {
            this.warnedAsync = true;
            this.logger.warning(`${this.strategy.name}.${callback} returned a promise; callbacks are not awaited`);
        }
        result.then(undefined, (error: unknown) => {
            this.summary.failed++;
            this.logger.error(
                `${this.strategy.name}.${callback} failed on ${eventType} @ ${new Date(at).toISOString()}: ${describeError(error)}`
            );
        });
    }

    private guardEngine(eventType: string, apply: () => unknown): void {
        try {
            apply();
        } catch (error) {
            this.logger.error(`Engine failed to apply ${eventType}: ${describeError(error)}`);
        }
    }
}
