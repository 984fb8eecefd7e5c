/**
 * Unit tests for CLOB client result unwrapping and order placement guards
 */
import { GatewayError } from '../../utils/errors';
import { PolymarketTransport, unwrapClobResult } from '../polymarketTransport';
import { testConfig } from '../../__tests__/support/fakes';

const unwrapError = (result: unknown): GatewayError => {
    try {
        unwrapClobResult(result, 'postOrder');
    } catch (error) {
        if (error instanceof GatewayError) return error;
        throw error;
    }
    throw new Error('expected unwrapClobResult to throw');
};

describe('unwrapClobResult', () => {
    it('should pass successful payloads through', () => {
        const payload = { success: true, orderID: '0xorder' };
        expect(unwrapClobResult(payload, 'postOrder')).toBe(payload);
        expect(unwrapClobResult('ok', 'postOrder')).toBe('ok');
    });

    it('should classify error results by status', () => {
        expect(unwrapError({ error: 'slow down', status: 429 }).kind).toBe('RateLimited');
        expect(unwrapError({ error: 'upstream', status: 502 }).kind).toBe('ServerError');
        expect(unwrapError({ error: 'socket hang up' }).kind).toBe('NetworkError');
    });

    it('should report other statuses as venue rejections', () => {
        const error = unwrapError({ error: 'invalid signature', status: 400 });

        expect(error.kind).toBe('ClientError');
        expect(error.subtype).toBe('VenueRejected');
        expect(error.status).toBe(400);
        expect(error.message).toBe('postOrder: invalid signature');
        expect(error.retryable).toBe(false);
    });
});

describe('PolymarketTransport.postOrder', () => {
    const order = { tokenId: '1-yes', side: 'buy' as const, size: 10, price: 0.25, orderType: 'limit' as const };
    let transport: PolymarketTransport;

    beforeEach(() => {
        transport = new PolymarketTransport(testConfig().venue);
    });

    it('should not sign or send an order once the signal has aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(transport.postOrder(order, controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    });

    it('should need a private key to sign', async () => {
        await expect(transport.postOrder(order, new AbortController().signal)).rejects.toMatchObject({
            kind: 'ClientError',
            message: 'PRIVATE_KEY is required for order placement',
        });
    });
});
