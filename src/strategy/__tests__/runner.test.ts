/**
 * End-to-end tests for a paper run: market lookup, streaming prices, strategy orders and shutdown
 */
import type { RuntimeConfig } from '../../config/env';
import { MemoryTradeStore } from '../../services/tradeStore';
import { ThresholdStrategy } from '../../strategies/thresholdStrategy';
import { ExecutionEngine } from '../../trading/executionEngine';
import type { Market } from '../../trading/interfaces';
import type { MarketDirectory } from '../../utils/marketRef';
import { StrategyRunner } from '../runner';
import { CapturingLog, FakeSocketServer, market, testConfig } from '../../__tests__/support/fakes';

const settle = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const priceFrame = (price: number, tokenId = '1-yes'): string =>
    JSON.stringify({
        event_type: 'last_trade_price',
        asset_id: tokenId,
        market: '0xvenue',
        price: String(price),
        size: '1',
        side: 'BUY',
        timestamp: '1760000000000',
    });

describe('StrategyRunner', () => {
    let config: Readonly<RuntimeConfig>;
    let markets: Record<string, Market>;
    let directory: MarketDirectory;
    let store: MemoryTradeStore;
    let engine: ExecutionEngine;
    let server: FakeSocketServer;
    let log: CapturingLog;
    let controller: AbortController;

    const lookup = async (id: string): Promise<Market> => {
        const found = markets[id];
        if (!found) throw new Error(`market ${id} not found`);
        return found;
    };

    const createRunner = (strategy = new ThresholdStrategy(0.3, 0.45, 10)): StrategyRunner =>
        new StrategyRunner({
            config,
            strategy,
            directory,
            engine,
            store,
            stream: { socketFactory: server.factory, random: () => 0 },
            logger: log,
        });

    beforeEach(() => {
        config = testConfig({ STRATEGY_MARKETS: '1,2' });
        markets = { '1': market('1'), '2': market('2', { status: 'closed' }) };
        directory = {
            getEventMarkets: async () => [],
            getMarketBySlug: lookup,
            getMarketById: lookup,
            getMarketByConditionId: lookup,
        };
        store = new MemoryTradeStore();
        log = new CapturingLog();
        engine = new ExecutionEngine({ mode: 'paper', paper: config.paperTrading, store, logger: log });
        server = new FakeSocketServer();
        controller = new AbortController();
    });

    it('should trade streamed prices until aborted', async () => {
        const runner = createRunner();
        const finished = runner.run(controller.signal);
        await settle();

        const socket = server.latest(config.stream.marketUrl);
        socket.open();
        expect(socket.sent).toEqual([JSON.stringify({ assets_ids: ['1-yes', '1-no'], type: 'market' })]);

        socket.receive(priceFrame(0.25));
        await settle();
        socket.receive(priceFrame(0.5));
        await settle();

        controller.abort();
        const summary = await finished;

        expect(summary).toEqual({ processed: 4, failed: 0, dropped: 0 });
        expect(engine.getTrades().map((t) => `${t.side} ${t.size} @ ${t.price}`)).toEqual(['buy 10 @ 0.25', 'sell 10 @ 0.5']);
        expect(engine.getBalance().cash).toBe(10_002.5);
        expect(engine.getPosition('1-yes')?.realizedPnl).toBe(2.5);
        expect(socket.closed).toBe(true);
        expect(log.messages('success')).toContain('paper buy 10 @ 0.25 1-yes');
        expect(log.messages('info')).toContain('Run finished: 2 trades, volume $7.50, realized P&L $2.50, equity $10002.50');

        const snapshot = runner.snapshot();
        expect(snapshot.running).toBe(false);
        expect(snapshot.markets.map((m) => m.id)).toEqual(['1']);
        expect(snapshot.channels).toEqual([expect.objectContaining({ channel: 'market', state: 'disconnected' })]);
    });

    it('should skip markets that are not open', async () => {
        const runner = createRunner();

        const loaded = await runner.loadMarkets();

        expect(loaded.map((m) => m.id)).toEqual(['1']);
        expect(log.messages('warning')).toEqual(['Skipping closed market "Question 2?"']);
    });

    it('should fail a run with no open market', async () => {
        config = testConfig({ STRATEGY_MARKETS: '2,999' });
        const runner = createRunner();

        await expect(runner.run(controller.signal)).rejects.toThrow('Strategy threshold has no open markets to trade');
        expect(log.messages('error')).toEqual(['Could not load market "999": Error: market 999 not found']);
        expect(server.sockets).toEqual([]);
    });

    it('should restore stored positions before streaming', async () => {
        await store.upsertPosition(
            { tokenId: '1-yes', marketId: '1', netSize: 10, avgEntryPrice: 0.2, realizedPnl: 0, unrealizedPnl: 0, updatedAt: 1 },
            'paper'
        );
        const runner = createRunner();
        const finished = runner.run(controller.signal);
        await settle();

        const socket = server.latest(config.stream.marketUrl);
        socket.open();
        socket.receive(priceFrame(0.5));
        await settle();
        controller.abort();
        await finished;

        expect(engine.getTrades().map((t) => `${t.side} ${t.size} @ ${t.price}`)).toEqual(['sell 10 @ 0.5']);
        expect(engine.getPosition('1-yes')?.realizedPnl).toBeCloseTo(3, 10);
    });

    it('should end at once when the signal is already aborted', async () => {
        controller.abort();

        const summary = await createRunner().run(controller.signal);

        expect(summary).toEqual({ processed: 0, failed: 0, dropped: 0 });
        expect(server.sockets).toEqual([]);
    });

    it('should title the run summary when the logger draws headers', async () => {
        const headers: string[] = [];
        log = Object.assign(new CapturingLog(), {
            header(title: string): void {
                headers.push(title);
            },
        });
        controller.abort();

        await createRunner().run(controller.signal);

        expect(headers).toEqual(['threshold run summary']);
        expect(log.messages('info')).toContain('Run finished: 0 trades, volume $0.00, realized P&L $0.00, equity $10000.00');
    });
});
