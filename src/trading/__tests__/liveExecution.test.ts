/**
 * Unit tests for live execution: venue acknowledgements, failures and fill matching
 */
import type { PaperTradingConfig } from '../../config/env';
import { RateLimiter } from '../../services/rateLimiter';
import { RetryingGateway } from '../../services/retryingGateway';
import { VenueClient } from '../../services/venueClient';
import { GatewayError } from '../../utils/errors';
import { ExecutionEngine } from '../executionEngine';
import type { FillNotification, OrderIntent } from '../interfaces';
import { CapturingLog, FakeTransport, flushPromises, testConfig } from '../../__tests__/support/fakes';

const paper: PaperTradingConfig = { initialBalance: 0, feeRate: 0, slippage: 0, allowLeverage: false };

const intent: OrderIntent = { tokenId: '1-yes', marketId: '1', side: 'buy', size: 10, price: 0.25 };

const notification = (venueTradeId: string, size: number, venueOrderId = '0xv1'): FillNotification => ({
    venueOrderId,
    venueTradeId,
    tokenId: '1-yes',
    marketId: '1',
    side: 'buy',
    price: 0.25,
    size,
    fee: 0,
    timestamp: 5000,
});

describe('ExecutionEngine (live)', () => {
    let limiter: RateLimiter;
    let gateway: RetryingGateway;
    let transport: FakeTransport;
    let log: CapturingLog;
    let engine: ExecutionEngine;

    beforeEach(() => {
        const config = testConfig();
        log = new CapturingLog();
        limiter = new RateLimiter(config.rateLimit);
        gateway = new RetryingGateway(limiter, config.gateway, { logger: log, random: () => 0 });
        transport = new FakeTransport();
        let ids = 0;
        engine = new ExecutionEngine({
            mode: 'live',
            paper,
            venue: new VenueClient(gateway, transport),
            logger: log,
            now: () => 1000,
            newId: (prefix) => `${prefix}-${++ids}`,
        });
    });

    afterEach(() => {
        gateway.shutdown();
        limiter.close();
    });

    it('should require a venue', () => {
        expect(() => new ExecutionEngine({ mode: 'live', paper })).toThrow('Live execution requires a venue');
    });

    it('should surface a transport failure after retries without registering the order', async () => {
        transport.post.mockRejectedValue(new GatewayError('ServerError', 'unavailable', { status: 503 }));

        const handle = engine.submit(intent);
        expect(handle.order.status).toBe('pending');

        await expect(handle.settled).rejects.toMatchObject({ kind: 'ServerError', attempts: 3 });
        expect(transport.post).toHaveBeenCalledTimes(3);
        expect(engine.getOrders()).toEqual([]);
        expect(engine.getTrades()).toEqual([]);
        expect(handle.order.status).toBe('rejected');
        expect(handle.order.rejectReason).toBe('Submit failed: ServerError (HTTP 503): unavailable');
    });

    it('should register an accepted order under its venue id', async () => {
        transport.post.mockResolvedValue({ success: true, orderID: '0xv1', status: 'live' });

        const handle = engine.submit(intent);
        const order = await handle.settled;

        expect(order).toMatchObject({ id: 'ord-1', status: 'open', venueOrderId: '0xv1' });
        expect(engine.getOpenOrders().map((o) => o.id)).toEqual(['ord-1']);
        expect(transport.post.mock.calls[0][0]).toEqual({ tokenId: '1-yes', side: 'buy', size: 10, price: 0.25, orderType: 'limit' });
    });

    it('should record a venue refusal as a rejected order', async () => {
        transport.post.mockResolvedValue({ success: false, errorMsg: 'not enough balance' });

        const order = await engine.submit(intent).settled;

        expect(order).toMatchObject({ status: 'rejected', rejectReason: 'not enough balance' });
        expect(engine.getOrder('ord-1')?.status).toBe('rejected');
    });

    describe('fills', () => {
        beforeEach(async () => {
            transport.post.mockResolvedValue({ success: true, orderID: '0xv1' });
            await engine.submit(intent).settled;
        });

        it('should apply partial fills, skip duplicates and clamp oversize fills', () => {
            const first = engine.applyFillNotification(notification('t1', 4));

            expect(first).toMatchObject({ orderId: 'ord-1', size: 4, price: 0.25, timestamp: 5000, mode: 'live' });
            expect(engine.getOrder('ord-1')).toMatchObject({ status: 'partially_filled', filledSize: 4 });

            expect(engine.applyFillNotification(notification('t1', 4))).toBeUndefined();

            const second = engine.applyFillNotification(notification('t2', 10));
            expect(second?.size).toBe(6);
            expect(engine.getOrder('ord-1')).toMatchObject({ status: 'filled', filledSize: 10 });
            expect(engine.getPosition('1-yes')?.netSize).toBe(10);
            expect(engine.getTrades()).toHaveLength(2);
            expect(log.messages('warning')).toEqual(['Fill t2 of 10 exceeds remaining 6 on ord-1; clamped']);

            expect(engine.applyFillNotification(notification('t3', 1))).toBeUndefined();
            expect(engine.getTrades()).toHaveLength(2);
        });

        it('should drop fills for orders it does not know', () => {
            expect(engine.applyFillNotification(notification('t9', 1, '0xsomeone-else'))).toBeUndefined();
            expect(engine.getTrades()).toEqual([]);
        });

        it('should cancel through the venue', async () => {
            transport.cancel.mockResolvedValue({ canceled: ['0xv1'], not_canceled: {} });

            await expect(engine.cancel('ord-1')).resolves.toBe(true);

            expect(transport.cancel.mock.calls[0][0]).toBe('0xv1');
            expect(engine.getOrder('ord-1')?.status).toBe('cancelled');
        });
    });

    it('should replay a fill that arrives before the acknowledgement', async () => {
        const pending: { resolve?: (value: unknown) => void } = {};
        transport.post.mockImplementation(
            () =>
                new Promise<unknown>((resolve) => {
                    pending.resolve = resolve;
                })
        );

        const handle = engine.submit(intent);
        expect(engine.applyFillNotification(notification('t1', 10))).toBeUndefined();
        await flushPromises(10);
        expect(pending.resolve).toBeDefined();

        pending.resolve?.({ success: true, orderID: '0xv1' });
        await handle.settled;

        expect(engine.getOrder('ord-1')).toMatchObject({ status: 'filled', filledSize: 10 });
        expect(engine.getTrades()).toHaveLength(1);
    });

    it('should cancel an order once its acknowledgement arrives', async () => {
        const pending: { resolve?: (value: unknown) => void } = {};
        transport.post.mockImplementation(
            () =>
                new Promise<unknown>((resolve) => {
                    pending.resolve = resolve;
                })
        );
        transport.cancel.mockResolvedValue({ canceled: ['0xv1'], not_canceled: {} });

        const handle = engine.submit(intent);
        const cancelled = engine.cancel(handle.id);
        await flushPromises(10);
        expect(transport.cancel).not.toHaveBeenCalled();

        pending.resolve?.({ success: true, orderID: '0xv1' });

        await expect(cancelled).resolves.toBe(true);
        expect(transport.cancel.mock.calls[0][0]).toBe('0xv1');
        expect(engine.getOrder(handle.id)?.status).toBe('cancelled');
    });

    it('should resolve false when cancelling an order the venue refuses', async () => {
        transport.post.mockResolvedValue({ success: false, errorMsg: 'not enough balance' });

        const handle = engine.submit(intent);

        await expect(engine.cancel(handle.id)).resolves.toBe(false);
        expect(transport.cancel).not.toHaveBeenCalled();
    });

    it('should resolve false when cancelling an order whose submit failed', async () => {
        transport.post.mockRejectedValue(new GatewayError('ClientError', 'bad order', { status: 400 }));

        const handle = engine.submit(intent);

        await expect(engine.cancel(handle.id)).resolves.toBe(false);
        await expect(handle.settled).rejects.toMatchObject({ kind: 'ClientError' });
        expect(() => engine.cancel(handle.id)).toThrow('Unknown order ord-1');
    });

    it('should read the balance from the venue', async () => {
        transport.balance.mockResolvedValue({ balance: '1500000' });

        await expect(engine.refreshBalance()).resolves.toMatchObject({ cash: 1.5, reserved: 0, available: 1.5, source: 'venue' });
    });
});
