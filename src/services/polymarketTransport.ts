/**
 * Polymarket Transport
 *
 * Raw single-attempt calls: Gamma and CLOB REST reads over axios, order
 * placement, cancellation and balance through the CLOB client. Retries,
 * rate limiting and validation happen one level up in the gateway.
 */

import axios, { AxiosInstance } from 'axios';
import { Wallet } from '@ethersproject/wallet';
import { ApiKeyCreds, AssetType, ClobClient, OrderType, Side } from '@polymarket/clob-client';
import type { VenueConfig } from '../config/env';
import { GatewayError } from '../utils/errors';
import Logger from '../utils/logger';
import type { MarketListParams, VenueOrderRequest, VenueTransport } from './venueClient';

/**
 * The CLOB client reports HTTP failures as `{ error, status }` values instead
 * of throwing. Turn those into gateway errors so they are classified and
 * retried like any other failure.
 */
export function unwrapClobResult(result: unknown, operation: string): unknown {
    if (typeof result !== 'object' || result === null || !('error' in result)) return result;
    const status = 'status' in result && typeof result.status === 'number' ? result.status : undefined;
    const message = `${operation}: ${String(result.error)}`;
    if (status === 429) return raise(new GatewayError('RateLimited', message, { status }));
    if (status !== undefined && status >= 500) return raise(new GatewayError('ServerError', message, { status }));
    if (status === undefined) return raise(new GatewayError('NetworkError', message));
    return raise(new GatewayError('ClientError', message, { status, subtype: 'VenueRejected' }));
}

const raise = (error: GatewayError): never => {
    throw error;
};

export class PolymarketTransport implements VenueTransport {
    private readonly gamma: AxiosInstance;
    private readonly clob: AxiosInstance;
    private readonly config: VenueConfig;
    private tradingClient: Promise<ClobClient> | null = null;

    constructor(config: VenueConfig) {
        this.config = config;
        this.gamma = axios.create({ baseURL: config.gammaUrl });
        this.clob = axios.create({ baseURL: config.clobUrl });
    }

    async fetchMarkets(params: MarketListParams, signal: AbortSignal): Promise<unknown> {
        const response = await this.gamma.get('/markets', { params, signal });
        return response.data;
    }

    async fetchMarketById(id: string, signal: AbortSignal): Promise<unknown> {
        const response = await this.gamma.get(`/markets/${encodeURIComponent(id)}`, { signal });
        return response.data;
    }

    async fetchMarketBySlug(slug: string, signal: AbortSignal): Promise<unknown> {
        const response = await this.gamma.get(`/markets/slug/${encodeURIComponent(slug)}`, { signal });
        return response.data;
    }

    async fetchMarketsByConditionId(conditionId: string, signal: AbortSignal): Promise<unknown> {
        const response = await this.gamma.get('/markets', { params: { condition_ids: conditionId }, signal });
        return response.data;
    }

    async fetchEventBySlug(slug: string, signal: AbortSignal): Promise<unknown> {
        const response = await this.gamma.get(`/events/slug/${encodeURIComponent(slug)}`, { signal });
        return response.data;
    }

    async fetchOrderBook(tokenId: string, signal: AbortSignal): Promise<unknown> {
        const response = await this.clob.get('/book', { params: { token_id: tokenId }, signal });
        return response.data;
    }

    /**
     * clob-client takes no signal: it is checked before signing and again
     * before the signed order is sent, never while a request is in flight.
     */
    async postOrder(order: VenueOrderRequest, signal: AbortSignal): Promise<unknown> {
        signal.throwIfAborted();
        const client = await this.getTradingClient();
        const signed = await client.createOrder({
            tokenID: order.tokenId,
            side: order.side === 'buy' ? Side.BUY : Side.SELL,
            size: order.size,
            price: order.price,
        });
        signal.throwIfAborted();
        const result: unknown = await client.postOrder(signed, order.orderType === 'market' ? OrderType.FOK : OrderType.GTC);
        return unwrapClobResult(result, 'postOrder');
    }

    async cancelOrder(venueOrderId: string, signal: AbortSignal): Promise<unknown> {
        const client = await this.getTradingClient();
        signal.throwIfAborted();
        const result: unknown = await client.cancelOrder({ orderID: venueOrderId });
        return unwrapClobResult(result, 'cancelOrder');
    }

    async fetchCollateralBalance(signal: AbortSignal): Promise<unknown> {
        const client = await this.getTradingClient();
        signal.throwIfAborted();
        const result: unknown = await client.getBalanceAllowance({ asset_type: AssetType.COLLATERAL });
        return unwrapClobResult(result, 'getBalanceAllowance');
    }

    /**
     * Authenticated CLOB client, created on first use. API credentials come
     * from the configuration or are derived from the wallet.
     */
    private getTradingClient(): Promise<ClobClient> {
        if (!this.tradingClient) {
            this.tradingClient = this.createTradingClient();
            this.tradingClient.catch(() => {
                // Let the next call try again.
                this.tradingClient = null;
            });
        }
        return this.tradingClient;
    }

    private async createTradingClient(): Promise<ClobClient> {
        const { privateKey, clobUrl, chainId, signatureType, funderAddress } = this.config;
        if (!privateKey) {
            throw new GatewayError('ClientError', 'PRIVATE_KEY is required for order placement');
        }
        const wallet = new Wallet(privateKey);

        let creds: ApiKeyCreds;
        if (this.config.apiKey && this.config.apiSecret && this.config.apiPassphrase) {
            creds = { key: this.config.apiKey, secret: this.config.apiSecret, passphrase: this.config.apiPassphrase };
        } else {
            Logger.info('Deriving CLOB API credentials from wallet');
            creds = await new ClobClient(clobUrl, chainId, wallet).createOrDeriveApiKey();
        }

        Logger.success(`CLOB client ready for ${funderAddress ?? wallet.address}`);
        return new ClobClient(clobUrl, chainId, wallet, creds, signatureType, funderAddress);
    }
}
