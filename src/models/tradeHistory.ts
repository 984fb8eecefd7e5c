import mongoose, { Schema } from 'mongoose';
import type { Order, OrderSide, OrderStatus, OrderType, Position, Trade, TradingMode } from '../trading/interfaces';

/**
 * MongoDB documents for the trade history: `trades` (append-only),
 * `orders` (latest state per order) and `positions` (one per token and mode).
 */

export interface TradeRecord {
    tradeId: string;
    orderId: string;
    tokenId: string;
    marketId: string;
    side: OrderSide;
    price: number;
    size: number;
    fee: number;
    timestamp: Date;
    mode: TradingMode;
}

export interface OrderRecord {
    orderId: string;
    tokenId: string;
    marketId: string;
    side: OrderSide;
    orderType: OrderType;
    size: number;
    price: number;
    filledSize: number;
    status: OrderStatus;
    mode: TradingMode;
    createdAt: Date;
    updatedAt: Date;
    venueOrderId?: string;
    rejectReason?: string;
}

export interface PositionRecord {
    tokenId: string;
    marketId: string;
    mode: TradingMode;
    netSize: number;
    avgEntryPrice: number;
    realizedPnl: number;
    unrealizedPnl: number;
    updatedAt: Date;
}

const SIDES: OrderSide[] = ['buy', 'sell'];
const MODES: TradingMode[] = ['paper', 'live'];

const tradeSchema = new Schema<TradeRecord>(
    {
        tradeId: { type: String, required: true, unique: true },
        orderId: { type: String, required: true, index: true },
        tokenId: { type: String, required: true, index: true },
        marketId: { type: String, required: true },
        side: { type: String, enum: SIDES, required: true },
        price: { type: Number, required: true },
        size: { type: Number, required: true },
        fee: { type: Number, default: 0 },
        timestamp: { type: Date, required: true },
        mode: { type: String, enum: MODES, required: true },
    },
    { versionKey: false }
);

const orderSchema = new Schema<OrderRecord>(
    {
        orderId: { type: String, required: true, unique: true },
        tokenId: { type: String, required: true, index: true },
        marketId: { type: String, required: true },
        side: { type: String, enum: SIDES, required: true },
        orderType: { type: String, enum: ['limit', 'market'], required: true },
        size: { type: Number, required: true },
        price: { type: Number, required: true },
        filledSize: { type: Number, default: 0 },
        status: {
            type: String,
            enum: ['pending', 'open', 'partially_filled', 'filled', 'cancelled', 'rejected'],
            required: true,
        },
        mode: { type: String, enum: MODES, required: true },
        createdAt: { type: Date, required: true },
        updatedAt: { type: Date, required: true },
        venueOrderId: { type: String, index: true },
        rejectReason: { type: String },
    },
    { versionKey: false }
);

const positionSchema = new Schema<PositionRecord>(
    {
        tokenId: { type: String, required: true },
        marketId: { type: String, required: true },
        mode: { type: String, enum: MODES, required: true },
        netSize: { type: Number, required: true },
        avgEntryPrice: { type: Number, required: true },
        realizedPnl: { type: Number, default: 0 },
        unrealizedPnl: { type: Number, default: 0 },
        updatedAt: { type: Date, required: true },
    },
    { versionKey: false }
);
positionSchema.index({ tokenId: 1, mode: 1 }, { unique: true });

export const TradeModel = mongoose.model<TradeRecord>('Trade', tradeSchema, 'trades');
export const OrderModel = mongoose.model<OrderRecord>('Order', orderSchema, 'orders');
export const PositionModel = mongoose.model<PositionRecord>('Position', positionSchema, 'positions');

// Mapping between the trading model (epoch ms) and stored documents (Date)

export const toTradeRecord = (trade: Trade): TradeRecord => ({
    tradeId: trade.id,
    orderId: trade.orderId,
    tokenId: trade.tokenId,
    marketId: trade.marketId,
    side: trade.side,
    price: trade.price,
    size: trade.size,
    fee: trade.fee,
    timestamp: new Date(trade.timestamp),
    mode: trade.mode,
});

export const fromTradeRecord = (record: TradeRecord): Trade => ({
    id: record.tradeId,
    orderId: record.orderId,
    tokenId: record.tokenId,
    marketId: record.marketId,
    side: record.side,
    price: record.price,
    size: record.size,
    fee: record.fee,
    timestamp: new Date(record.timestamp).getTime(),
    mode: record.mode,
});

export const toOrderRecord = (order: Order): OrderRecord => ({
    orderId: order.id,
    tokenId: order.tokenId,
    marketId: order.marketId,
    side: order.side,
    orderType: order.orderType,
    size: order.size,
    price: order.price,
    filledSize: order.filledSize,
    status: order.status,
    mode: order.mode,
    createdAt: new Date(order.createdAt),
    updatedAt: new Date(order.updatedAt),
    ...(order.venueOrderId ? { venueOrderId: order.venueOrderId } : {}),
    ...(order.rejectReason ? { rejectReason: order.rejectReason } : {}),
});

export const fromOrderRecord = (record: OrderRecord): Order => ({
    id: record.orderId,
    tokenId: record.tokenId,
    marketId: record.marketId,
    side: record.side,
    orderType: record.orderType,
    size: record.size,
    price: record.price,
    filledSize: record.filledSize,
    status: record.status,
    mode: record.mode,
    createdAt: new Date(record.createdAt).getTime(),
    updatedAt: new Date(record.updatedAt).getTime(),
    ...(record.venueOrderId ? { venueOrderId: record.venueOrderId } : {}),
    ...(record.rejectReason ? { rejectReason: record.rejectReason } : {}),
});

export const toPositionRecord = (position: Position, mode: TradingMode): PositionRecord => ({
    tokenId: position.tokenId,
    marketId: position.marketId,
    mode,
    netSize: position.netSize,
    avgEntryPrice: position.avgEntryPrice,
    realizedPnl: position.realizedPnl,
    unrealizedPnl: position.unrealizedPnl,
    updatedAt: new Date(position.updatedAt),
});

export const fromPositionRecord = (record: PositionRecord): Position => ({
    tokenId: record.tokenId,
    marketId: record.marketId,
    netSize: record.netSize,
    avgEntryPrice: record.avgEntryPrice,
    realizedPnl: record.realizedPnl,
    unrealizedPnl: record.unrealizedPnl,
    updatedAt: new Date(record.updatedAt).getTime(),
});
