/**
 * Execution Engine
 *
 * Turns order intents into fills and owns every Order, Trade, Position and
 * the balance. Paper mode settles against an in-process ledger; live mode
 * forwards orders to the venue and applies fills as the user channel reports
 * them.
 *
 * Paper fill rule:
 * - limit: fills fully at the limit price as soon as the last known price
 *   crosses it (buy: last <= limit, sell: last >= limit), at submit time or
 *   on the first crossing price update. One fill per cross, no partial fills.
 * - market: fills immediately at price × (1 ± slippage).
 * - fee = price × size × feeRate; buys reserve notional + fee while resting.
 *
 * All state changes happen in synchronous methods. The dispatcher is the only
 * caller of `submit`, `applyPriceUpdate` and `applyFillNotification`, so they
 * never interleave with a strategy callback. The one exception is the live
 * acknowledgement continuation, which registers the venue order id; it runs
 * as its own event-loop task and cannot interleave either.
 */

import type { PaperTradingConfig } from '../config/env';
import type { OrderVenue } from '../services/venueClient';
import type { TradeStore } from '../services/tradeStore';
import { ExecutionError, GatewayError, describeError } from '../utils/errors';
import Logger, { Log } from '../utils/logger';
import type {
    BalanceSnapshot,
    EngineSnapshot,
    ExecutionStats,
    FillNotification,
    Order,
    OrderHandle,
    OrderIntent,
    OrderSide,
    Position,
    PriceUpdate,
    Trade,
    TradingMode,
} from './interfaces';
import { PositionBook } from './positionBook';

export type FillListener = (trade: Trade) => void;

export interface ExecutionEngineOptions {
    mode: TradingMode;
    paper: PaperTradingConfig;
    /** Required in live mode. */
    venue?: OrderVenue;
    store?: TradeStore;
    logger?: Log;
    now?: () => number;
    newId?: (prefix: 'ord' | 'trd') => string;
}

const EPSILON = 1e-9;
const TERMINAL = new Set(['filled', 'cancelled', 'rejected']);

export const isTerminal = (order: Pick<Order, 'status'>): boolean => TERMINAL.has(order.status);

let idCounter = 0;
const defaultId = (prefix: 'ord' | 'trd'): string =>
    `${prefix}-${Date.now().toString(36)}-${(++idCounter).toString(36)}-${Math.random().toString(36).slice(2, 8)}`;

const clampPrice = (price: number): number => Math.min(1, Math.max(0, price));

export class ExecutionEngine {
    readonly mode: TradingMode;
    private readonly paper: PaperTradingConfig;
    private readonly venue?: OrderVenue;
    private readonly store?: TradeStore;
    private readonly logger: Log;
    private readonly now: () => number;
    private readonly newId: (prefix: 'ord' | 'trd') => string;

    private orders = new Map<string, Order>();
    private trades: Trade[] = [];
    private book = new PositionBook();
    private lastPrices = new Map<string, number>();
    private listeners: FillListener[] = [];

    private cash: number;
    /** Paper buy reservations by order id. */
    private reservations = new Map<string, number>();
    private balanceUpdatedAt: number;

    private venueOrders = new Map<string, string>();
    private seenVenueFills = new Set<string>();
    /** Fills that arrived before the acknowledgement of their order. */
    private parkedFills = new Map<string, FillNotification[]>();
    private inFlightSubmits = 0;
    /** Live orders awaiting their acknowledgement, by order id. */
    private pendingSubmits = new Map<string, Promise<Readonly<Order>>>();

    constructor(options: ExecutionEngineOptions) {
        if (options.mode === 'live' && !options.venue) {
            throw new Error('Live execution requires a venue');
        }
        this.mode = options.mode;
        this.paper = options.paper;
        this.venue = options.venue;
        this.store = options.store;
        this.logger = options.logger ?? Logger;
        this.now = options.now ?? Date.now;
        this.newId = options.newId ?? defaultId;
        this.cash = options.mode === 'paper' ? options.paper.initialBalance : 0;
        this.balanceUpdatedAt = this.now();
    }

    // ------------------------------------------------------------------
    // Orders
    // ------------------------------------------------------------------

    /**
     * Validate and place an order. Throws ExecutionError before touching any
     * state; in live mode transport failures surface through `settled`.
     */
    submit(intent: OrderIntent): OrderHandle {
        this.validate(intent);
        const order = this.draft(intent);

        if (this.mode === 'paper') {
            this.placePaper(order);
            return { id: order.id, mode: order.mode, order, settled: Promise.resolve(order) };
        }

        const settled = this.placeLive(order);
        this.pendingSubmits.set(order.id, settled);
        // Strategies may never await the handle.
        settled.then(
            () => this.pendingSubmits.delete(order.id),
            (error: unknown) => {
                this.pendingSubmits.delete(order.id);
                this.logger.debug(`Order ${order.id} settled with error: ${describeError(error)}`);
            }
        );
        return { id: order.id, mode: order.mode, order, settled };
    }

    /**
     * Cancel an order. Throws UnknownOrder for ids the engine never issued;
     * resolves false for orders that are already terminal.
     *
     * A live order only registers once the venue acknowledges it. Cancelling
     * it before then waits for the acknowledgement and cancels at the venue
     * if it was accepted; a refused or failed submit resolves false.
     */
    cancel(orderId: string): Promise<boolean> {
        const order = this.orders.get(orderId);
        if (!order) {
            const inFlight = this.pendingSubmits.get(orderId);
            if (inFlight) {
                return inFlight.then(
                    () => this.cancel(orderId),
                    () => false
                );
            }
            throw new ExecutionError('UnknownOrder', `Unknown order ${orderId}`);
        }
        if (isTerminal(order)) return Promise.resolve(false);

        if (this.mode === 'paper') {
            this.release(order.id);
            this.transition(order, 'cancelled');
            this.logger.info(`Cancelled ${order.side} ${order.size} @ ${order.price} (${order.id})`);
            return Promise.resolve(true);
        }

        const venue = this.requireVenue();
        const venueOrderId = order.venueOrderId ?? '';
        return venue.cancelOrder(venueOrderId).then((cancelled) => {
            if (cancelled && !isTerminal(order)) {
                this.transition(order, 'cancelled');
            }
            return cancelled;
        });
    }

    onFill(listener: FillListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter((candidate) => candidate !== listener);
        };
    }

    // ------------------------------------------------------------------
    // Inbound events
    // ------------------------------------------------------------------

    /**
     * Mark-to-market and fill resting paper orders the new price crosses.
     */
    applyPriceUpdate(update: PriceUpdate): Trade[] {
        this.lastPrices.set(update.tokenId, update.price);
        this.book.mark(update.tokenId, update.price, update.timestamp);
        if (this.mode !== 'paper') return [];

        const fills: Trade[] = [];
        for (const order of this.orders.values()) {
            if (order.tokenId !== update.tokenId || order.status !== 'open') continue;
            if (!this.crosses(order.side, order.price, update.price)) continue;
            this.release(order.id);
            fills.push(this.fill(order, order.price, order.size - order.filledSize));
        }
        return fills;
    }

    /**
     * Match a venue fill to one of our live orders.
     */
    applyFillNotification(notification: FillNotification): Trade | undefined {
        const key = `${notification.venueTradeId}:${notification.venueOrderId}`;
        if (this.seenVenueFills.has(key)) {
            this.logger.debug(`Duplicate fill ${notification.venueTradeId} ignored`);
            return undefined;
        }

        const orderId = this.venueOrders.get(notification.venueOrderId);
        const order = orderId === undefined ? undefined : this.orders.get(orderId);
        if (!order) {
            if (this.inFlightSubmits > 0) {
                const parked = this.parkedFills.get(notification.venueOrderId) ?? [];
                parked.push(notification);
                this.parkedFills.set(notification.venueOrderId, parked);
            } else {
                this.logger.debug(`Fill for unknown venue order ${notification.venueOrderId} dropped`);
            }
            return undefined;
        }

        this.seenVenueFills.add(key);
        const remaining = order.size - order.filledSize;
        if (remaining <= EPSILON) {
            this.logger.warning(`Fill ${notification.venueTradeId} for already filled order ${order.id} dropped`);
            return undefined;
        }
        if (notification.size > remaining + EPSILON) {
            this.logger.warning(
                `Fill ${notification.venueTradeId} of ${notification.size} exceeds remaining ${remaining} on ${order.id}; clamped`
            );
        }
        return this.fill(order, notification.price, Math.min(notification.size, remaining), notification.fee, notification.timestamp);
    }

    // ------------------------------------------------------------------
    // State
    // ------------------------------------------------------------------

    restorePositions(positions: readonly Position[]): void {
        this.book.restore(positions);
        this.logger.info(`Restored ${positions.length} position(s)`);
    }

    /**
     * Pull the collateral balance from the venue (live); paper returns the
     * ledger unchanged.
     */
    async refreshBalance(signal?: AbortSignal): Promise<BalanceSnapshot> {
        if (this.mode === 'live') {
            this.cash = await this.requireVenue().getBalance(signal);
            this.balanceUpdatedAt = this.now();
        }
        return this.getBalance();
    }

    getBalance(): BalanceSnapshot {
        const reserved = this.totalReserved();
        return {
            cash: this.cash,
            reserved,
            available: this.cash - reserved,
            source: this.mode === 'paper' ? 'paper' : 'venue',
            updatedAt: this.balanceUpdatedAt,
        };
    }

    getOrder(orderId: string): Order | undefined {
        const order = this.orders.get(orderId);
        return order ? { ...order } : undefined;
    }

    getOrders(): Order[] {
        return [...this.orders.values()].map((order) => ({ ...order }));
    }

    /** Live orders still awaiting their acknowledgement are not listed. */
    getOpenOrders(): Order[] {
        return this.getOrders().filter((order) => !isTerminal(order));
    }

    getTrades(): Trade[] {
        return this.trades.map((trade) => ({ ...trade }));
    }

    getPosition(tokenId: string): Position | undefined {
        return this.book.get(tokenId);
    }

    getPositions(): Position[] {
        return this.book.all();
    }

    lastPrice(tokenId: string): number | undefined {
        return this.lastPrices.get(tokenId);
    }

    getStats(): ExecutionStats {
        let buyTrades = 0;
        let totalVolume = 0;
        let totalFees = 0;
        for (const trade of this.trades) {
            if (trade.side === 'buy') buyTrades++;
            totalVolume += trade.price * trade.size;
            totalFees += trade.fee;
        }
        return {
            totalTrades: this.trades.length,
            buyTrades,
            sellTrades: this.trades.length - buyTrades,
            totalVolume,
            totalFees,
            realizedPnl: this.book.totalRealizedPnl(),
            unrealizedPnl: this.book.totalUnrealizedPnl(),
            openOrders: this.getOpenOrders().length,
        };
    }

    /** Cash plus positions at their marks. */
    getEquity(): number {
        return this.cash + this.book.marketValue();
    }

    /**
     * Deep copy for readers outside the dispatch loop.
     */
    snapshot(): EngineSnapshot {
        return {
            mode: this.mode,
            balance: this.getBalance(),
            equity: this.getEquity(),
            orders: this.getOrders(),
            trades: this.getTrades(),
            positions: this.getPositions(),
            lastPrices: Object.fromEntries(this.lastPrices),
            stats: this.getStats(),
            takenAt: this.now(),
        };
    }

    // ------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------

    private validate(intent: OrderIntent): void {
        if (intent.mode !== undefined && intent.mode !== this.mode) {
            throw new ExecutionError('ModeMismatch', `Engine runs in ${this.mode} mode, intent asked for ${intent.mode}`);
        }
        if (!Number.isFinite(intent.price) || intent.price <= 0 || intent.price >= 1) {
            throw new ExecutionError('InvalidPrice', `Price ${intent.price} is outside (0, 1)`);
        }
        if (!Number.isFinite(intent.size) || intent.size <= 0) {
            throw new ExecutionError('InvalidPrice', `Size ${intent.size} must be positive`);
        }
        if (this.mode !== 'paper') return;

        if (intent.side === 'buy') {
            const cost = this.paperCost(intent.price * this.slippageFactor(intent), intent.size);
            const available = this.cash - this.totalReserved();
            if (!this.paper.allowLeverage && cost > available + EPSILON) {
                throw new ExecutionError(
                    'InsufficientBalance',
                    `Buy needs $${cost.toFixed(4)}, available $${available.toFixed(4)}`
                );
            }
        } else {
            const free = this.book.netSize(intent.tokenId) - this.committedSells(intent.tokenId);
            if (intent.size > free + EPSILON) {
                throw new ExecutionError('InsufficientPosition', `Sell of ${intent.size} exceeds free position ${free}`);
            }
        }
    }

    private draft(intent: OrderIntent): Order {
        const now = this.now();
        return {
            id: this.newId('ord'),
            tokenId: intent.tokenId,
            marketId: intent.marketId ?? '',
            side: intent.side,
            orderType: intent.orderType ?? 'limit',
            size: intent.size,
            price: intent.price,
            filledSize: 0,
            status: this.mode === 'paper' ? 'open' : 'pending',
            mode: this.mode,
            createdAt: now,
            updatedAt: now,
        };
    }

    private placePaper(order: Order): void {
        this.orders.set(order.id, order);
        this.persistOrder(order);

        if (order.orderType === 'market') {
            this.fill(order, clampPrice(order.price * this.slippageFactor(order)), order.size);
            return;
        }

        const last = this.lastPrices.get(order.tokenId);
        if (last !== undefined && this.crosses(order.side, order.price, last)) {
            this.fill(order, order.price, order.size);
            return;
        }
        if (order.side === 'buy') {
            this.reservations.set(order.id, this.paperCost(order.price, order.size));
        }
        this.logger.info(`Resting ${order.side} ${order.size} @ ${order.price} (${order.id})`);
    }

    private placeLive(order: Order): Promise<Readonly<Order>> {
        const venue = this.requireVenue();
        this.inFlightSubmits += 1;

        return venue
            .submitOrder({
                tokenId: order.tokenId,
                side: order.side,
                size: order.size,
                price: order.price,
                orderType: order.orderType,
            })
            .then(
                (ack) => {
                    this.orders.set(order.id, order);
                    if (!ack.accepted) {
                        order.rejectReason = ack.message ?? 'Order rejected by venue';
                        this.transition(order, 'rejected');
                        this.logger.warning(`Order ${order.id} rejected by venue: ${order.rejectReason}`);
                        this.settleSubmit();
                        return order;
                    }
                    order.venueOrderId = ack.venueOrderId;
                    this.venueOrders.set(ack.venueOrderId, order.id);
                    this.transition(order, 'open');
                    this.logger.success(`Order ${order.id} accepted as ${ack.venueOrderId}`);
                    this.replayParked(ack.venueOrderId);
                    this.settleSubmit();
                    return order;
                },
                (error: unknown) => {
                    this.settleSubmit();
                    order.rejectReason = `Submit failed: ${describeError(error)}`;
                    order.status = 'rejected';
                    order.updatedAt = this.now();
                    this.logger.error(`Order ${order.id} not placed: ${describeError(error)}`);
                    throw error instanceof GatewayError ? error : new GatewayError('NetworkError', describeError(error), { cause: error });
                }
            );
    }

    private settleSubmit(): void {
        this.inFlightSubmits = Math.max(0, this.inFlightSubmits - 1);
        if (this.inFlightSubmits === 0 && this.parkedFills.size > 0) {
            // Nothing else can claim them now.
            for (const venueOrderId of this.parkedFills.keys()) {
                this.logger.debug(`Fill for unknown venue order ${venueOrderId} dropped`);
            }
            this.parkedFills.clear();
        }
    }

    private replayParked(venueOrderId: string): void {
        const parked = this.parkedFills.get(venueOrderId);
        if (!parked) return;
        this.parkedFills.delete(venueOrderId);
        for (const notification of parked) this.applyFillNotification(notification);
    }

    private fill(order: Order, price: number, size: number, fee?: number, timestamp?: number): Trade {
        const at = timestamp ?? this.now();
        const trade: Trade = {
            id: this.newId('trd'),
            orderId: order.id,
            tokenId: order.tokenId,
            marketId: order.marketId,
            side: order.side,
            price,
            size,
            fee: fee ?? price * size * this.paper.feeRate,
            timestamp: at,
            mode: order.mode,
        };

        this.trades.push(trade);
        const notional = price * size;
        this.cash += order.side === 'buy' ? -(notional + trade.fee) : notional - trade.fee;
        this.balanceUpdatedAt = at;
        const position = this.book.apply(trade);

        order.filledSize = Math.min(order.size, order.filledSize + size);
        if (!isTerminal(order)) {
            this.transition(order, order.size - order.filledSize <= EPSILON ? 'filled' : 'partially_filled');
        } else {
            this.persistOrder(order);
        }

        this.persist('trade', this.store?.saveTrade(trade));
        this.persist('position', this.store?.upsertPosition(position, this.mode));

        for (const listener of this.listeners) {
            try {
                listener({ ...trade });
            } catch (error) {
                this.logger.error(`Fill listener failed: ${describeError(error)}`);
            }
        }
        return trade;
    }

    private transition(order: Order, status: Order['status']): void {
        if (isTerminal(order)) return;
        if (order.status === 'partially_filled' && (status === 'open' || status === 'pending')) return;
        order.status = status;
        order.updatedAt = this.now();
        this.persistOrder(order);
    }

    private crosses(side: OrderSide, limit: number, last: number): boolean {
        return side === 'buy' ? last <= limit + EPSILON : last >= limit - EPSILON;
    }

    private slippageFactor(order: Pick<Order, 'side' | 'orderType'> | OrderIntent): number {
        if ((order.orderType ?? 'limit') !== 'market') return 1;
        return order.side === 'buy' ? 1 + this.paper.slippage : 1 - this.paper.slippage;
    }

    private paperCost(price: number, size: number): number {
        return price * size * (1 + this.paper.feeRate);
    }

    private release(orderId: string): void {
        this.reservations.delete(orderId);
    }

    private totalReserved(): number {
        let total = 0;
        for (const amount of this.reservations.values()) total += amount;
        return total;
    }

    private committedSells(tokenId: string): number {
        let committed = 0;
        for (const order of this.orders.values()) {
            if (order.tokenId === tokenId && order.side === 'sell' && !isTerminal(order)) {
                committed += order.size - order.filledSize;
            }
        }
        return committed;
    }

    private requireVenue(): OrderVenue {
        if (!this.venue) throw new Error('Live execution requires a venue');
        return this.venue;
    }

    private persistOrder(order: Order): void {
        this.persist('order', this.store?.saveOrder({ ...order }));
    }

    private persist(what: string, pending: Promise<void> | undefined): void {
        if (!pending) return;
        pending.catch((error: unknown) => {
            this.logger.error(`Failed to save ${what}: ${describeError(error)}`);
        });
    }
}
