/**
 * Unit tests for market/user channel frame normalization
 */
import { normalizeFrame, toMillis } from '../streamFrames';

const NOW = 1_760_000_000_000;

describe('normalizeFrame', () => {
    describe('market channel', () => {
        it('should unpack every entry of a price_changes frame', () => {
            const frame = {
                event_type: 'price_change',
                market: '0xcond',
                timestamp: '1760000001000',
                price_changes: [
                    { asset_id: 'yes-token', price: '0.42', size: '100', side: 'BUY', best_bid: '0.42', best_ask: '0.44' },
                    { asset_id: 'no-token', price: '0.58', size: '50', side: 'SELL' },
                ],
            };

            const events = normalizeFrame('market', JSON.stringify(frame), undefined, NOW);

            expect(events).toEqual([
                {
                    type: 'price_update',
                    update: {
                        marketId: '0xcond',
                        tokenId: 'yes-token',
                        price: 0.42,
                        size: 100,
                        side: 'bid',
                        timestamp: 1760000001000,
                        bestBid: 0.42,
                        bestAsk: 0.44,
                    },
                },
                {
                    type: 'price_update',
                    update: {
                        marketId: '0xcond',
                        tokenId: 'no-token',
                        price: 0.58,
                        size: 50,
                        side: 'ask',
                        timestamp: 1760000001000,
                    },
                },
            ]);
        });

        it('should accept the older single-asset layout', () => {
            const frame = {
                event_type: 'price_change',
                asset_id: 'yes-token',
                market: '0xcond',
                changes: [{ price: '0.3', size: '10', side: 'BUY' }],
            };

            const [event] = normalizeFrame('market', JSON.stringify(frame), undefined, NOW);

            expect(event).toEqual({
                type: 'price_update',
                update: { marketId: '0xcond', tokenId: 'yes-token', price: 0.3, size: 10, side: 'bid', timestamp: NOW },
            });
        });

        it('should turn last_trade_price into a price update with the resolved market id', () => {
            const frame = { event_type: 'last_trade_price', asset_id: 'yes-token', market: '0xcond', price: '0.25', size: '5', side: 'SELL', timestamp: '1760000002' };

            const events = normalizeFrame('market', JSON.stringify(frame), (tokenId) => `market-of-${tokenId}`, NOW);

            expect(events).toEqual([
                {
                    type: 'price_update',
                    update: {
                        marketId: 'market-of-yes-token',
                        tokenId: 'yes-token',
                        price: 0.25,
                        size: 5,
                        side: 'ask',
                        timestamp: 1760000002000,
                    },
                },
            ]);
        });

        it('should sort book levels best first', () => {
            const frame = {
                event_type: 'book',
                asset_id: 'yes-token',
                market: '0xcond',
                hash: 'abc',
                bids: [
                    { price: '0.40', size: '10' },
                    { price: '0.45', size: '5' },
                ],
                asks: [
                    { price: '0.55', size: '7' },
                    { price: '0.50', size: '3' },
                ],
            };

            const [event] = normalizeFrame('market', JSON.stringify([frame]), undefined, NOW);

            expect(event).toEqual({
                type: 'order_book_update',
                update: {
                    marketId: '0xcond',
                    tokenId: 'yes-token',
                    bids: [
                        { price: 0.45, size: 5 },
                        { price: 0.4, size: 10 },
                    ],
                    asks: [
                        { price: 0.5, size: 3 },
                        { price: 0.55, size: 7 },
                    ],
                    timestamp: NOW,
                    hash: 'abc',
                },
            });
        });

        it('should ignore unknown event types and entries without a price', () => {
            const frames = [
                { event_type: 'tick_size_change', asset_id: 'yes-token' },
                { event_type: 'price_change', price_changes: [{ asset_id: 'yes-token', size: '1' }] },
            ];
            expect(normalizeFrame('market', JSON.stringify(frames), undefined, NOW)).toEqual([]);
        });

        it('should throw on malformed JSON', () => {
            expect(() => normalizeFrame('market', '{not json', undefined, NOW)).toThrow(SyntaxError);
        });
    });

    describe('user channel', () => {
        const trade = {
            event_type: 'trade',
            id: 'trade-1',
            status: 'MATCHED',
            asset_id: 'yes-token',
            market: '0xcond',
            side: 'BUY',
            price: '0.5',
            size: '20',
            fee_rate_bps: '0',
            match_time: '1760000003',
            taker_order_id: 'taker-1',
            maker_orders: [
                { order_id: 'maker-1', asset_id: 'yes-token', matched_amount: '15', price: '0.5' },
                { order_id: 'maker-2', asset_id: 'no-token', matched_amount: '5', price: '0.5' },
                { order_id: 'maker-3', asset_id: 'yes-token', matched_amount: '0', price: '0.5' },
            ],
        };

        it('should report the taker and every matched maker order', () => {
            const events = normalizeFrame('user', JSON.stringify(trade), undefined, NOW);

            expect(events).toEqual([
                {
                    type: 'fill_notification',
                    fill: {
                        venueOrderId: 'taker-1',
                        venueTradeId: 'trade-1',
                        tokenId: 'yes-token',
                        marketId: '0xcond',
                        side: 'buy',
                        price: 0.5,
                        size: 20,
                        fee: 0,
                        timestamp: 1760000003000,
                    },
                },
                {
                    type: 'fill_notification',
                    fill: {
                        venueOrderId: 'maker-1',
                        venueTradeId: 'trade-1',
                        tokenId: 'yes-token',
                        marketId: '0xcond',
                        side: 'sell',
                        price: 0.5,
                        size: 15,
                        fee: 0,
                        timestamp: 1760000003000,
                    },
                },
                {
                    type: 'fill_notification',
                    fill: {
                        venueOrderId: 'maker-2',
                        venueTradeId: 'trade-1',
                        tokenId: 'no-token',
                        marketId: '0xcond',
                        side: 'buy',
                        price: 0.5,
                        size: 5,
                        fee: 0,
                        timestamp: 1760000003000,
                    },
                },
            ]);
        });

        it('should charge the fee rate in basis points', () => {
            const events = normalizeFrame('user', JSON.stringify({ ...trade, fee_rate_bps: '100' }), undefined, NOW);
            const fees = events.map((event) => (event.type === 'fill_notification' ? event.fill.fee : NaN));

            expect(fees).toHaveLength(3);
            expect(fees[0]).toBeCloseTo(0.1, 10);
            expect(fees[1]).toBeCloseTo(0.075, 10);
            expect(fees[2]).toBeCloseTo(0.025, 10);
        });

        it('should ignore trades that are not matched yet and non-trade frames', () => {
            const frames = [{ ...trade, status: 'CONFIRMED' }, { event_type: 'order', id: 'order-1' }];
            expect(normalizeFrame('user', JSON.stringify(frames), undefined, NOW)).toEqual([]);
        });
    });
});

describe('toMillis', () => {
    it('should scale second timestamps and keep millisecond ones', () => {
        expect(toMillis('1760000000', 0)).toBe(1760000000000);
        expect(toMillis(1760000000123, 0)).toBe(1760000000123);
    });

    it('should fall back for missing or invalid values', () => {
        expect(toMillis(undefined, 7)).toBe(7);
        expect(toMillis('later', 7)).toBe(7);
        expect(toMillis(0, 7)).toBe(7);
    });
});
