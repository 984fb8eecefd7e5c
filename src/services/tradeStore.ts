/**
 * Trade Store
 *
 * Persistence for orders, trades and positions. The engine calls the write
 * side fire-and-forget; the runner reads positions back at startup.
 */

import {
    OrderModel,
    PositionModel,
    TradeModel,
    fromOrderRecord,
    fromPositionRecord,
    fromTradeRecord,
    toOrderRecord,
    toPositionRecord,
    toTradeRecord,
    type OrderRecord,
    type PositionRecord,
    type TradeRecord,
} from '../models/tradeHistory';
import type { Order, Position, Trade, TradingMode } from '../trading/interfaces';

export interface TradeQuery {
    tokenId?: string;
    marketId?: string;
    mode?: TradingMode;
}

export interface TradeStore {
    readonly kind: 'mongo' | 'memory';
    saveTrade(trade: Trade): Promise<void>;
    saveOrder(order: Order): Promise<void>;
    upsertPosition(position: Position, mode: TradingMode): Promise<void>;
    getTrade(id: string): Promise<Trade | undefined>;
    getTrades(query?: TradeQuery): Promise<Trade[]>;
    getOrders(query?: TradeQuery): Promise<Order[]>;
    getPositions(mode: TradingMode): Promise<Position[]>;
}

const matches = (item: { tokenId: string; marketId: string; mode?: TradingMode }, query: TradeQuery): boolean =>
    (query.tokenId === undefined || item.tokenId === query.tokenId) &&
    (query.marketId === undefined || item.marketId === query.marketId) &&
    (query.mode === undefined || item.mode === query.mode);

/**
 * In-process store used for paper runs without MONGO_URI and in tests.
 */
export class MemoryTradeStore implements TradeStore {
    readonly kind = 'memory' as const;
    private trades = new Map<string, Trade>();
    private orders = new Map<string, Order>();
    private positions = new Map<string, Position>();

    async saveTrade(trade: Trade): Promise<void> {
        // Append-only: the first write wins.
        if (!this.trades.has(trade.id)) this.trades.set(trade.id, { ...trade });
    }

    async saveOrder(order: Order): Promise<void> {
        this.orders.set(order.id, { ...order });
    }

    async upsertPosition(position: Position, mode: TradingMode): Promise<void> {
        this.positions.set(`${mode}:${position.tokenId}`, { ...position });
    }

    async getTrade(id: string): Promise<Trade | undefined> {
        const trade = this.trades.get(id);
        return trade ? { ...trade } : undefined;
    }

    async getTrades(query: TradeQuery = {}): Promise<Trade[]> {
        return [...this.trades.values()]
            .filter((trade) => matches(trade, query))
            .sort((a, b) => a.timestamp - b.timestamp)
            .map((trade) => ({ ...trade }));
    }

    async getOrders(query: TradeQuery = {}): Promise<Order[]> {
        return [...this.orders.values()]
            .filter((order) => matches(order, query))
            .sort((a, b) => a.createdAt - b.createdAt)
            .map((order) => ({ ...order }));
    }

    async getPositions(mode: TradingMode): Promise<Position[]> {
        const prefix = `${mode}:`;
        return [...this.positions.entries()]
            .filter(([key]) => key.startsWith(prefix))
            .map(([, position]) => ({ ...position }));
    }
}

const toFilter = (query: TradeQuery): Partial<Record<'tokenId' | 'marketId' | 'mode', string>> => ({
    ...(query.tokenId !== undefined ? { tokenId: query.tokenId } : {}),
    ...(query.marketId !== undefined ? { marketId: query.marketId } : {}),
    ...(query.mode !== undefined ? { mode: query.mode } : {}),
});

/**
 * MongoDB-backed store. Expects `connectDB` to have run.
 */
export class MongoTradeStore implements TradeStore {
    readonly kind = 'mongo' as const;

    async saveTrade(trade: Trade): Promise<void> {
        const record = toTradeRecord(trade);
        await TradeModel.updateOne({ tradeId: record.tradeId }, { $setOnInsert: record }, { upsert: true }).exec();
    }

    async saveOrder(order: Order): Promise<void> {
        const record = toOrderRecord(order);
        await OrderModel.updateOne({ orderId: record.orderId }, { $set: record }, { upsert: true }).exec();
    }

    async upsertPosition(position: Position, mode: TradingMode): Promise<void> {
        const record = toPositionRecord(position, mode);
        await PositionModel.updateOne({ tokenId: record.tokenId, mode }, { $set: record }, { upsert: true }).exec();
    }

    async getTrade(id: string): Promise<Trade | undefined> {
        const record = await TradeModel.findOne({ tradeId: id }).lean<TradeRecord>().exec();
        return record ? fromTradeRecord(record) : undefined;
    }

    async getTrades(query: TradeQuery = {}): Promise<Trade[]> {
        const records = await TradeModel.find(toFilter(query)).sort({ timestamp: 1 }).lean<TradeRecord[]>().exec();
        return records.map(fromTradeRecord);
    }

    async getOrders(query: TradeQuery = {}): Promise<Order[]> {
        const records = await OrderModel.find(toFilter(query)).sort({ createdAt: 1 }).lean<OrderRecord[]>().exec();
        return records.map(fromOrderRecord);
    }

    async getPositions(mode: TradingMode): Promise<Position[]> {
        const records = await PositionModel.find({ mode }).lean<PositionRecord[]>().exec();
        return records.map(fromPositionRecord);
    }
}
