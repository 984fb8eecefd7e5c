/**
 * Unit tests for paper execution (fill rule, balance checks, reservations, persistence)
 */
import type { PaperTradingConfig } from '../../config/env';
import { MemoryTradeStore } from '../../services/tradeStore';
import { ExecutionError } from '../../utils/errors';
import { ExecutionEngine, ExecutionEngineOptions } from '../executionEngine';
import type { OrderIntent, PriceUpdate, Trade } from '../interfaces';
import { CapturingLog, flushPromises } from '../../__tests__/support/fakes';

const TOKEN = '1-yes';

const paper: PaperTradingConfig = {
    initialBalance: 10_000,
    feeRate: 0,
    slippage: 0,
    allowLeverage: false,
};

const price = (value: number, tokenId = TOKEN): PriceUpdate => ({
    marketId: '1',
    tokenId,
    price: value,
    size: 1,
    side: 'bid',
    timestamp: 2000,
});

const buy = (size: number, limit: number, extra: Partial<OrderIntent> = {}): OrderIntent => ({
    tokenId: TOKEN,
    marketId: '1',
    side: 'buy',
    size,
    price: limit,
    ...extra,
});

const sell = (size: number, limit: number, extra: Partial<OrderIntent> = {}): OrderIntent => ({
    ...buy(size, limit, extra),
    side: 'sell',
});

const expectExecutionError = (run: () => unknown, kind: ExecutionError['kind']): void => {
    let caught: unknown;
    try {
        run();
    } catch (error) {
        caught = error;
    }
    expect(caught).toBeInstanceOf(ExecutionError);
    expect(caught).toMatchObject({ kind });
};

describe('ExecutionEngine (paper)', () => {
    let log: CapturingLog;
    let store: MemoryTradeStore;
    let fills: Trade[];
    let engine: ExecutionEngine;

    const createEngine = (overrides: Partial<PaperTradingConfig> = {}, options: Partial<ExecutionEngineOptions> = {}): ExecutionEngine => {
        let ids = 0;
        const created = new ExecutionEngine({
            mode: 'paper',
            paper: { ...paper, ...overrides },
            store,
            logger: log,
            now: () => 1000,
            newId: (prefix) => `${prefix}-${++ids}`,
            ...options,
        });
        created.onFill((trade) => fills.push(trade));
        return created;
    };

    beforeEach(() => {
        log = new CapturingLog();
        store = new MemoryTradeStore();
        fills = [];
        engine = createEngine();
    });

    describe('limit orders', () => {
        it('should fill at the limit price when the last price already crosses it', async () => {
            engine.applyPriceUpdate(price(0.25));

            const handle = engine.submit(buy(10, 0.25));

            expect(handle.order.status).toBe('filled');
            expect(handle.order.filledSize).toBe(10);
            await expect(handle.settled).resolves.toMatchObject({ id: 'ord-1', status: 'filled' });
            expect(engine.getBalance()).toMatchObject({ cash: 9997.5, reserved: 0, available: 9997.5, source: 'paper' });
            expect(engine.getPosition(TOKEN)).toMatchObject({ netSize: 10, avgEntryPrice: 0.25 });
            expect(engine.getTrades()).toEqual([
                {
                    id: 'trd-2',
                    orderId: 'ord-1',
                    tokenId: TOKEN,
                    marketId: '1',
                    side: 'buy',
                    price: 0.25,
                    size: 10,
                    fee: 0,
                    timestamp: 1000,
                    mode: 'paper',
                },
            ]);
            expect(fills).toHaveLength(1);
        });

        it('should rest a limit order and reserve its cost', () => {
            const handle = engine.submit(buy(10, 0.2));

            expect(handle.order.status).toBe('open');
            expect(engine.getBalance()).toMatchObject({ cash: 10_000, reserved: 2, available: 9998 });
            expect(engine.getOpenOrders().map((o) => o.id)).toEqual([handle.id]);
        });

        it('should fill a resting order at its limit on the first crossing price', () => {
            const handle = engine.submit(buy(10, 0.2));

            expect(engine.applyPriceUpdate(price(0.3))).toEqual([]);
            const [trade] = engine.applyPriceUpdate(price(0.15));

            expect(trade).toMatchObject({ orderId: handle.id, price: 0.2, size: 10 });
            expect(engine.getOrder(handle.id)?.status).toBe('filled');
            expect(engine.getBalance()).toMatchObject({ cash: 9998, reserved: 0 });
            expect(engine.applyPriceUpdate(price(0.1))).toEqual([]);
        });

        it('should leave orders on other tokens alone', () => {
            engine.submit(buy(10, 0.2));

            expect(engine.applyPriceUpdate(price(0.05, '1-no'))).toEqual([]);
            expect(engine.getOpenOrders()).toHaveLength(1);
        });

        it('should realize P&L when selling back', () => {
            engine.applyPriceUpdate(price(0.25));
            engine.submit(buy(10, 0.25));
            engine.applyPriceUpdate(price(0.5));

            const handle = engine.submit(sell(10, 0.5));

            expect(handle.order.status).toBe('filled');
            expect(engine.getBalance().cash).toBe(10_002.5);
            expect(engine.getPosition(TOKEN)).toMatchObject({ netSize: 0, realizedPnl: 2.5 });
            expect(engine.getStats()).toMatchObject({
                totalTrades: 2,
                buyTrades: 1,
                sellTrades: 1,
                totalVolume: 7.5,
                realizedPnl: 2.5,
                openOrders: 0,
            });
        });
    });

    describe('market orders', () => {
        it('should fill immediately with slippage against the trader', () => {
            engine = createEngine({ slippage: 0.01 });
            engine.applyPriceUpdate(price(0.5));

            const bought = engine.submit(buy(10, 0.5, { orderType: 'market' }));
            const sold = engine.submit(sell(10, 0.5, { orderType: 'market' }));

            const [buyTrade, sellTrade] = engine.getTrades();
            expect(bought.order.status).toBe('filled');
            expect(sold.order.status).toBe('filled');
            expect(buyTrade.price).toBeCloseTo(0.505, 10);
            expect(sellTrade.price).toBeCloseTo(0.495, 10);
            expect(engine.getBalance().cash).toBeCloseTo(9999.9, 8);
        });
    });

    describe('fees', () => {
        it('should charge price × size × fee rate on each fill', () => {
            engine = createEngine({ feeRate: 0.01 });
            engine.applyPriceUpdate(price(0.5));

            engine.submit(buy(10, 0.5));

            expect(engine.getTrades()[0].fee).toBeCloseTo(0.05, 10);
            expect(engine.getBalance().cash).toBeCloseTo(9994.95, 8);
            expect(engine.getStats().totalFees).toBeCloseTo(0.05, 10);
        });
    });

    describe('validation', () => {
        it('should refuse a buy it cannot pay for without touching state', () => {
            engine = createEngine({ initialBalance: 10 });
            engine.applyPriceUpdate(price(0.5));

            expectExecutionError(() => engine.submit(buy(100, 0.5)), 'InsufficientBalance');

            expect(engine.getOrders()).toEqual([]);
            expect(engine.getTrades()).toEqual([]);
            expect(engine.getBalance()).toMatchObject({ cash: 10, reserved: 0 });
            expect(fills).toEqual([]);
        });

        it('should count reservations against the available balance', () => {
            engine = createEngine({ initialBalance: 10 });
            engine.submit(buy(30, 0.3));

            expectExecutionError(() => engine.submit(buy(10, 0.2)), 'InsufficientBalance');
            expect(engine.getOrders()).toHaveLength(1);
        });

        it('should allow an oversized buy when leverage is enabled', () => {
            engine = createEngine({ initialBalance: 10, allowLeverage: true });
            engine.applyPriceUpdate(price(0.5));

            engine.submit(buy(100, 0.5));

            expect(engine.getBalance().cash).toBe(-40);
        });

        it('should refuse to sell more than the free position', () => {
            expectExecutionError(() => engine.submit(sell(1, 0.5)), 'InsufficientPosition');

            engine.applyPriceUpdate(price(0.25));
            engine.submit(buy(10, 0.25));
            engine.submit(sell(6, 0.9));

            expectExecutionError(() => engine.submit(sell(5, 0.9)), 'InsufficientPosition');
            expect(engine.submit(sell(4, 0.9)).order.status).toBe('open');
        });

        it('should refuse prices outside (0, 1) and non-positive sizes', () => {
            expectExecutionError(() => engine.submit(buy(10, 0)), 'InvalidPrice');
            expectExecutionError(() => engine.submit(buy(10, 1)), 'InvalidPrice');
            expectExecutionError(() => engine.submit(buy(10, Number.NaN)), 'InvalidPrice');
            expectExecutionError(() => engine.submit(buy(0, 0.5)), 'InvalidPrice');
            expect(engine.getOrders()).toEqual([]);
        });

        it('should refuse an intent for the other mode', () => {
            expectExecutionError(() => engine.submit(buy(10, 0.5, { mode: 'live' })), 'ModeMismatch');
        });
    });

    describe('cancel', () => {
        it('should cancel a resting order and release its reservation', async () => {
            const handle = engine.submit(buy(10, 0.2));

            await expect(engine.cancel(handle.id)).resolves.toBe(true);

            expect(engine.getOrder(handle.id)?.status).toBe('cancelled');
            expect(engine.getBalance()).toMatchObject({ reserved: 0, available: 10_000 });
            expect(engine.applyPriceUpdate(price(0.1))).toEqual([]);
            await expect(engine.cancel(handle.id)).resolves.toBe(false);
        });

        it('should throw for an order it never registered', () => {
            expectExecutionError(() => engine.cancel('ord-404'), 'UnknownOrder');
        });
    });

    describe('state', () => {
        it('should persist orders, trades and positions', async () => {
            engine.applyPriceUpdate(price(0.25));
            engine.submit(buy(10, 0.25));
            await flushPromises();

            expect(await store.getTrades()).toHaveLength(1);
            expect(await store.getOrders()).toEqual([expect.objectContaining({ id: 'ord-1', status: 'filled', filledSize: 10 })]);
            expect(await store.getPositions('paper')).toEqual([expect.objectContaining({ tokenId: TOKEN, netSize: 10 })]);
        });

        it('should keep running when a fill listener throws', () => {
            engine.onFill(() => {
                throw new Error('listener broke');
            });
            engine.applyPriceUpdate(price(0.25));

            engine.submit(buy(10, 0.25));

            expect(fills).toHaveLength(1);
            expect(log.messages('error')).toEqual(['Fill listener failed: Error: listener broke']);
        });

        it('should value positions at the last price', () => {
            engine.applyPriceUpdate(price(0.25));
            engine.submit(buy(10, 0.25));
            engine.applyPriceUpdate(price(0.4));

            expect(engine.lastPrice(TOKEN)).toBe(0.4);
            expect(engine.getEquity()).toBeCloseTo(10_001.5, 8);
            expect(engine.getStats().unrealizedPnl).toBeCloseTo(1.5, 10);
        });

        it('should restore positions from storage', () => {
            engine.restorePositions([
                { tokenId: TOKEN, marketId: '1', netSize: 5, avgEntryPrice: 0.3, realizedPnl: 0, unrealizedPnl: 0, updatedAt: 1 },
            ]);

            expect(engine.submit(sell(5, 0.9)).order.status).toBe('open');
        });

        it('should hand out snapshots that do not alias engine state', () => {
            engine.applyPriceUpdate(price(0.25));
            engine.submit(buy(10, 0.25));

            const snapshot = engine.snapshot();
            snapshot.orders[0].status = 'cancelled';
            snapshot.positions[0].netSize = 0;

            expect(snapshot).toMatchObject({ mode: 'paper', lastPrices: { [TOKEN]: 0.25 }, takenAt: 1000 });
            expect(engine.getOrder('ord-1')?.status).toBe('filled');
            expect(engine.getPosition(TOKEN)?.netSize).toBe(10);
        });
    });
});
