/**
 * Trading Interfaces
 *
 * Type definitions shared by the stream manager, execution engine and
 * dispatcher. Prices are probabilities in [0, 1]; sizes are outcome shares.
 */

import type { TradingMode } from '../config/env';

export type { TradingMode };

export type MarketStatus = 'open' | 'closed' | 'resolved';

/**
 * A binary market: one YES and one NO outcome token
 */
export interface Market {
    id: string;
    conditionId: string;
    slug: string;
    question: string;
    tokenIds: {
        yes: string;
        no: string;
    };
    status: MarketStatus;
}

export type BookSide = 'bid' | 'ask';

/**
 * Real-time price for one outcome token
 */
export interface PriceUpdate {
    marketId: string;
    tokenId: string;
    price: number;              // 0-1
    size: number;
    side: BookSide;
    timestamp: number;          // Unix ms
    bestBid?: number;
    bestAsk?: number;
    sequence?: number;          // Venue-provided, when present
}

export interface BookLevel {
    price: number;
    size: number;
}

/**
 * Full order book snapshot for one token
 */
export interface OrderBookUpdate {
    marketId: string;
    tokenId: string;
    bids: BookLevel[];          // Best first
    asks: BookLevel[];          // Best first
    timestamp: number;
    hash?: string;
}

/**
 * A venue report that (part of) one of our orders matched
 */
export interface FillNotification {
    venueOrderId: string;
    venueTradeId: string;
    tokenId: string;
    marketId: string;
    side: OrderSide;
    price: number;
    size: number;
    fee: number;
    timestamp: number;
}

export type OrderSide = 'buy' | 'sell';
export type OrderType = 'limit' | 'market';

export type OrderStatus =
    | 'pending'
    | 'open'
    | 'partially_filled'
    | 'filled'
    | 'cancelled'
    | 'rejected';

export interface Order {
    id: string;
    tokenId: string;
    marketId: string;
    side: OrderSide;
    orderType: OrderType;
    size: number;               // Requested
    price: number;              // Requested (limit) price
    filledSize: number;
    status: OrderStatus;
    mode: TradingMode;
    createdAt: number;
    updatedAt: number;
    venueOrderId?: string;
    rejectReason?: string;
}

/**
 * One fill. Never mutated after creation.
 */
export interface Trade {
    id: string;
    orderId: string;
    tokenId: string;
    marketId: string;
    side: OrderSide;
    price: number;
    size: number;
    fee: number;
    timestamp: number;
    mode: TradingMode;
}

export interface Position {
    tokenId: string;
    marketId: string;
    netSize: number;
    avgEntryPrice: number;
    realizedPnl: number;
    unrealizedPnl: number;
    updatedAt: number;
}

/**
 * What a strategy asks the engine to do
 */
export interface OrderIntent {
    tokenId: string;
    marketId?: string;
    side: OrderSide;
    size: number;
    price: number;
    orderType?: OrderType;
    mode?: TradingMode;
}

/**
 * Returned by submit. `order` is a live view of the engine's record (or of
 * the rejected draft when the venue never accepted it); `settled` resolves
 * once the order reached the venue (live) or immediately (paper).
 */
export interface OrderHandle {
    readonly id: string;
    readonly mode: TradingMode;
    readonly order: Readonly<Order>;
    readonly settled: Promise<Readonly<Order>>;
}

export interface BalanceSnapshot {
    cash: number;
    reserved: number;
    available: number;
    source: 'paper' | 'venue';
    updatedAt: number;
}

export interface ExecutionStats {
    totalTrades: number;
    buyTrades: number;
    sellTrades: number;
    totalVolume: number;
    totalFees: number;
    realizedPnl: number;
    unrealizedPnl: number;
    openOrders: number;
}

/**
 * Deep copy of the engine state for readers outside the dispatch loop
 */
export interface EngineSnapshot {
    mode: TradingMode;
    balance: BalanceSnapshot;
    equity: number;
    orders: Order[];
    trades: Trade[];
    positions: Position[];
    lastPrices: Record<string, number>;
    stats: ExecutionStats;
    takenAt: number;
}

/**
 * Events flowing through the dispatch channel
 */
export type DispatchEvent =
    | { type: 'price_update'; update: PriceUpdate }
    | { type: 'order_book_update'; update: OrderBookUpdate }
    | { type: 'fill_notification'; fill: FillNotification }
    | { type: 'fill'; trade: Trade };

export type StreamEvent = Exclude<DispatchEvent, { type: 'fill' }>;
