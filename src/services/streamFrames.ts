/**
 * Stream Frame Normalization
 *
 * Turns raw market/user channel frames into typed stream events. The venue
 * batches frames into arrays and has changed the price_change layout over
 * time, so both the `price_changes[]` form and the older single-update form
 * are accepted.
 */

import type {
    BookLevel,
    BookSide,
    FillNotification,
    OrderSide,
    PriceUpdate,
    StreamEvent,
} from '../trading/interfaces';

export type ChannelName = 'market' | 'user';

/** Maps a token to the market id the rest of the runtime uses. */
export type MarketResolver = (tokenId: string, venueMarket: string) => string;

export const passThroughResolver: MarketResolver = (_tokenId, venueMarket) => venueMarket;

type Frame = Record<string, unknown>;

const isRecord = (value: unknown): value is Frame =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const str = (value: unknown): string => (typeof value === 'string' ? value : typeof value === 'number' ? String(value) : '');

const num = (value: unknown): number | undefined => {
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
};

/**
 * Venue timestamps arrive as seconds or milliseconds, usually as strings.
 */
export const toMillis = (value: unknown, fallback: number): number => {
    const parsed = num(value);
    if (parsed === undefined || parsed <= 0) return fallback;
    return parsed < 1e12 ? Math.round(parsed * 1000) : Math.round(parsed);
};

const bookSide = (value: unknown): BookSide => (str(value).toUpperCase() === 'SELL' ? 'ask' : 'bid');

const orderSide = (value: unknown): OrderSide => (str(value).toUpperCase() === 'SELL' ? 'sell' : 'buy');

const opposite = (side: OrderSide): OrderSide => (side === 'buy' ? 'sell' : 'buy');

const levels = (value: unknown): BookLevel[] => {
    if (!Array.isArray(value)) return [];
    const parsed: BookLevel[] = [];
    for (const entry of value) {
        if (!isRecord(entry)) continue;
        const price = num(entry.price);
        const size = num(entry.size);
        if (price !== undefined && size !== undefined) parsed.push({ price, size });
    }
    return parsed;
};

const priceUpdate = (
    frame: Frame,
    tokenId: string,
    venueMarket: string,
    timestamp: number,
    resolve: MarketResolver
): PriceUpdate | null => {
    const price = num(frame.price);
    if (!tokenId || price === undefined) return null;
    const update: PriceUpdate = {
        marketId: resolve(tokenId, venueMarket),
        tokenId,
        price,
        size: num(frame.size) ?? 0,
        side: bookSide(frame.side),
        timestamp,
    };
    const bestBid = num(frame.best_bid ?? frame.bid);
    const bestAsk = num(frame.best_ask ?? frame.ask);
    if (bestBid !== undefined) update.bestBid = bestBid;
    if (bestAsk !== undefined) update.bestAsk = bestAsk;
    const sequence = num(frame.sequence ?? frame.seq);
    if (sequence !== undefined) update.sequence = sequence;
    return update;
};

function marketEvents(frame: Frame, resolve: MarketResolver, now: number): StreamEvent[] {
    const venueMarket = str(frame.market);
    const timestamp = toMillis(frame.timestamp, now);

    switch (str(frame.event_type)) {
        case 'price_change': {
            const events: StreamEvent[] = [];
            if (Array.isArray(frame.price_changes)) {
                for (const change of frame.price_changes) {
                    if (!isRecord(change)) continue;
                    const update = priceUpdate(change, str(change.asset_id), venueMarket, timestamp, resolve);
                    if (update) events.push({ type: 'price_update', update });
                }
                return events;
            }
            if (Array.isArray(frame.changes)) {
                // Older layout: asset at the top level, one entry per level change.
                for (const change of frame.changes) {
                    if (!isRecord(change)) continue;
                    const update = priceUpdate(change, str(frame.asset_id), venueMarket, timestamp, resolve);
                    if (update) events.push({ type: 'price_update', update });
                }
                return events;
            }
            const update = priceUpdate(frame, str(frame.asset_id), venueMarket, timestamp, resolve);
            return update ? [{ type: 'price_update', update }] : [];
        }

        case 'last_trade_price': {
            const update = priceUpdate(frame, str(frame.asset_id), venueMarket, timestamp, resolve);
            return update ? [{ type: 'price_update', update }] : [];
        }

        case 'book': {
            const tokenId = str(frame.asset_id);
            if (!tokenId) return [];
            const bids = levels(frame.bids ?? frame.buys).sort((a, b) => b.price - a.price);
            const asks = levels(frame.asks ?? frame.sells).sort((a, b) => a.price - b.price);
            const hash = str(frame.hash);
            return [
                {
                    type: 'order_book_update',
                    update: {
                        marketId: resolve(tokenId, venueMarket),
                        tokenId,
                        bids,
                        asks,
                        timestamp,
                        ...(hash ? { hash } : {}),
                    },
                },
            ];
        }

        default:
            return [];
    }
}

/**
 * One notification per order id involved in a matched trade: the taker order
 * and every maker order. Only one of them is ours; the engine drops the rest.
 */
function userEvents(frame: Frame, resolve: MarketResolver, now: number): StreamEvent[] {
    if (str(frame.event_type) !== 'trade') return [];
    if (str(frame.status).toUpperCase() !== 'MATCHED') return [];

    const tradeId = str(frame.id);
    const tokenId = str(frame.asset_id);
    const price = num(frame.price);
    const size = num(frame.size);
    if (!tradeId || !tokenId || price === undefined || size === undefined) return [];

    const venueMarket = str(frame.market);
    const timestamp = toMillis(frame.match_time ?? frame.timestamp, now);
    const feeRate = (num(frame.fee_rate_bps) ?? 0) / 10_000;
    const takerSide = orderSide(frame.side);
    const events: StreamEvent[] = [];

    const fill = (venueOrderId: string, fillTokenId: string, side: OrderSide, fillPrice: number, fillSize: number): void => {
        const notification: FillNotification = {
            venueOrderId,
            venueTradeId: tradeId,
            tokenId: fillTokenId,
            marketId: resolve(fillTokenId, venueMarket),
            side,
            price: fillPrice,
            size: fillSize,
            fee: fillPrice * fillSize * feeRate,
            timestamp,
        };
        events.push({ type: 'fill_notification', fill: notification });
    };

    const takerOrderId = str(frame.taker_order_id);
    if (takerOrderId) fill(takerOrderId, tokenId, takerSide, price, size);

    if (Array.isArray(frame.maker_orders)) {
        for (const maker of frame.maker_orders) {
            if (!isRecord(maker)) continue;
            const makerOrderId = str(maker.order_id);
            const matched = num(maker.matched_amount);
            if (!makerOrderId || matched === undefined || matched <= 0) continue;
            const makerToken = str(maker.asset_id) || tokenId;
            // Same token: the maker took the other side. Complementary token: same side.
            const makerSide = makerToken === tokenId ? opposite(takerSide) : takerSide;
            fill(makerOrderId, makerToken, makerSide, num(maker.price) ?? price, matched);
        }
    }
    return events;
}

/**
 * Normalize one text frame. Arrays are unpacked in order; unknown event types
 * produce nothing. Throws SyntaxError on malformed JSON.
 */
export function normalizeFrame(
    channel: ChannelName,
    text: string,
    resolve: MarketResolver = passThroughResolver,
    now: number = Date.now()
): StreamEvent[] {
    const payload: unknown = JSON.parse(text);
    const frames = Array.isArray(payload) ? payload : [payload];
    const events: StreamEvent[] = [];
    for (const frame of frames) {
        if (!isRecord(frame)) continue;
        events.push(...(channel === 'market' ? marketEvents(frame, resolve, now) : userEvents(frame, resolve, now)));
    }
    return events;
}
