/**
 * Strategy Base
 *
 * User strategies extend `Strategy` (or provide an object with the same
 * capabilities) and are driven by the dispatcher. Callbacks run one at a time
 * on the dispatch loop and are expected to return quickly: a slow callback
 * holds up every event behind it.
 *
 * Example:
 *
 *     export default class Fader extends Strategy {
 *         readonly name = 'fader';
 *         readonly markets = ['https://polymarket.com/event/some-event'];
 *
 *         onPriceUpdate(update: PriceUpdate): void {
 *             if (update.price < 0.2 && this.position(update.tokenId) === 0) {
 *                 this.buy(update.tokenId, 10, update.price);
 *             }
 *         }
 *     }
 */

import type { ExecutionEngine } from '../trading/executionEngine';
import type {
    Market,
    OrderBookUpdate,
    OrderHandle,
    OrderType,
    Position,
    PriceUpdate,
    Trade,
} from '../trading/interfaces';
import { ExecutionError } from '../utils/errors';
import Logger, { Log } from '../utils/logger';

export interface StrategyContext {
    engine: ExecutionEngine;
    markets: readonly Market[];
    logger: Log;
}

/**
 * The capability set the dispatcher relies on. Checked once at load time.
 */
export interface TradingStrategy {
    readonly name: string;
    /** Market ids, slugs, condition ids or polymarket.com URLs. */
    readonly markets: readonly string[];
    onStart(): void;
    onStop(): void;
    onPriceUpdate(update: PriceUpdate): void;
    onFill(trade: Trade): void;
    onOrderBookUpdate?(update: OrderBookUpdate): void;
    buy(tokenId: string, size: number, price: number, orderType?: OrderType): OrderHandle;
    sell(tokenId: string, size: number, price: number, orderType?: OrderType): OrderHandle;
    bind?(context: StrategyContext): void;
}

export const REQUIRED_CAPABILITIES = ['onStart', 'onStop', 'onPriceUpdate', 'onFill', 'buy', 'sell'] as const;

export abstract class Strategy implements TradingStrategy {
    abstract readonly name: string;
    abstract readonly markets: readonly string[];
    readonly description?: string;

    private context: StrategyContext | null = null;
    private tokenMarkets = new Map<string, Market>();

    /**
     * Attach the engine and the resolved markets. Called by the runner before
     * `onStart`.
     */
    bind(context: StrategyContext): void {
        this.context = context;
        this.tokenMarkets.clear();
        for (const market of context.markets) {
            this.tokenMarkets.set(market.tokenIds.yes, market);
            this.tokenMarkets.set(market.tokenIds.no, market);
        }
    }

    onStart(): void {}

    onStop(): void {}

    abstract onPriceUpdate(update: PriceUpdate): void;

    onOrderBookUpdate(_update: OrderBookUpdate): void {}

    onFill(_trade: Trade): void {}

    // ---------------------------------------------------------------
    // Trading helpers, scoped to this strategy's markets
    // ---------------------------------------------------------------

    buy(tokenId: string, size: number, price: number, orderType: OrderType = 'limit'): OrderHandle {
        return this.submit('buy', tokenId, size, price, orderType);
    }

    sell(tokenId: string, size: number, price: number, orderType: OrderType = 'limit'): OrderHandle {
        return this.submit('sell', tokenId, size, price, orderType);
    }

    cancel(orderId: string): Promise<boolean> {
        return this.requireContext().engine.cancel(orderId);
    }

    /** Cancel every open order of this strategy; returns how many were asked. */
    cancelAll(): number {
        const engine = this.requireContext().engine;
        const open = engine.getOpenOrders().filter((order) => this.tokenMarkets.has(order.tokenId));
        for (const order of open) {
            engine.cancel(order.id).catch((error: unknown) => {
                this.log(`Cancel of ${order.id} failed: ${error instanceof Error ? error.message : String(error)}`, 'warning');
            });
        }
        return open.length;
    }

    /** Net size held in a token (0 when flat). */
    position(tokenId: string): number {
        return this.requireContext().engine.getPosition(tokenId)?.netSize ?? 0;
    }

    getPosition(tokenId: string): Position | undefined {
        return this.requireContext().engine.getPosition(tokenId);
    }

    lastPrice(tokenId: string): number | undefined {
        return this.requireContext().engine.lastPrice(tokenId);
    }

    get balance(): number {
        return this.requireContext().engine.getBalance().available;
    }

    get equity(): number {
        return this.requireContext().engine.getEquity();
    }

    get tradedMarkets(): readonly Market[] {
        return this.context?.markets ?? [];
    }

    marketFor(tokenId: string): Market | undefined {
        return this.tokenMarkets.get(tokenId);
    }

    inScope(tokenId: string): boolean {
        return this.tokenMarkets.has(tokenId);
    }

    log(message: string, level: 'info' | 'success' | 'warning' | 'error' = 'info'): void {
        const logger = this.context?.logger ?? Logger;
        logger[level](`[${this.name}] ${message}`);
    }

    private submit(side: 'buy' | 'sell', tokenId: string, size: number, price: number, orderType: OrderType): OrderHandle {
        const { engine } = this.requireContext();
        const market = this.tokenMarkets.get(tokenId);
        if (!market) {
            throw new ExecutionError('TokenOutOfScope', `Token ${tokenId} is not part of ${this.name}'s markets`);
        }
        return engine.submit({ tokenId, marketId: market.id, side, size, price, orderType });
    }

    private requireContext(): StrategyContext {
        if (!this.context) {
            throw new Error(`Strategy ${this.name} is not bound to an engine yet`);
        }
        return this.context;
    }
}
