/**
 * Venue Client
 *
 * Typed access to the Polymarket REST surface. Each method is one gateway
 * call: the raw attempt comes from a VenueTransport, the gateway adds rate
 * limiting, retries and schema validation, and this class maps the validated
 * payload onto the trading model.
 */

import { z } from 'zod';
import type { Market, MarketStatus, OrderBookUpdate, OrderSide, OrderType, BookLevel } from '../trading/interfaces';
import { GatewayError } from '../utils/errors';
import { RetryingGateway } from './retryingGateway';

export interface MarketListParams {
    limit?: number;
    offset?: number;
    active?: boolean;
    closed?: boolean;
}

export interface VenueOrderRequest {
    tokenId: string;
    side: OrderSide;
    size: number;
    price: number;
    orderType: OrderType;
}

export interface VenueOrderAck {
    accepted: boolean;
    venueOrderId: string;
    status?: string;
    message?: string;
}

/**
 * Single-attempt calls against the venue. Implementations throw on transport
 * failure and return the decoded JSON body otherwise.
 *
 * The signal is best effort: an implementation may not be able to abort the
 * request itself. `postOrder`, `cancelOrder` and `fetchCollateralBalance` go
 * through clob-client, which takes no signal, so a timed-out or cancelled call
 * only stops being awaited while the request runs to completion. A posted
 * order can therefore still reach the venue after the gateway gave up on it.
 */
export interface VenueTransport {
    fetchMarkets(params: MarketListParams, signal: AbortSignal): Promise<unknown>;
    fetchMarketById(id: string, signal: AbortSignal): Promise<unknown>;
    fetchMarketBySlug(slug: string, signal: AbortSignal): Promise<unknown>;
    fetchMarketsByConditionId(conditionId: string, signal: AbortSignal): Promise<unknown>;
    fetchEventBySlug(slug: string, signal: AbortSignal): Promise<unknown>;
    fetchOrderBook(tokenId: string, signal: AbortSignal): Promise<unknown>;
    postOrder(order: VenueOrderRequest, signal: AbortSignal): Promise<unknown>;
    cancelOrder(venueOrderId: string, signal: AbortSignal): Promise<unknown>;
    fetchCollateralBalance(signal: AbortSignal): Promise<unknown>;
}

/**
 * The part of the venue the execution engine needs in live mode.
 */
export interface OrderVenue {
    submitOrder(order: VenueOrderRequest, signal?: AbortSignal): Promise<VenueOrderAck>;
    cancelOrder(venueOrderId: string, signal?: AbortSignal): Promise<boolean>;
    getBalance(signal?: AbortSignal): Promise<number>;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const parseJsonList = (value: string): unknown => {
    try {
        return JSON.parse(value);
    } catch {
        return undefined;
    }
};

/**
 * Gamma returns list fields either as arrays or as JSON-encoded strings.
 */
const StringListZ = z
    .union([z.array(z.union([z.string(), z.number()])), z.string()])
    .transform((value, ctx) => {
        const list = Array.isArray(value) ? value : parseJsonList(value);
        if (!Array.isArray(list)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a list or a JSON-encoded list' });
            return z.NEVER;
        }
        return list.map((item) => String(item));
    });

export const GammaMarketZ = z
    .object({
        id: z.union([z.string(), z.number()]).transform((value) => String(value)),
        conditionId: z.string().default(''),
        slug: z.string().default(''),
        question: z.string().default(''),
        clobTokenIds: StringListZ,
        outcomePrices: StringListZ.optional(),
        active: z.boolean().optional(),
        closed: z.boolean().optional(),
        umaResolutionStatus: z.string().optional(),
    })
    .passthrough()
    .refine((market) => market.clobTokenIds.length >= 2, { message: 'binary market needs two token ids' });

export type GammaMarket = z.infer<typeof GammaMarketZ>;

const GammaMarketListZ = z.array(z.unknown());

const GammaEventZ = z
    .object({
        slug: z.string().optional(),
        markets: z.array(z.unknown()).default([]),
    })
    .passthrough();

const NumericZ = z.union([z.string(), z.number()]).transform((value, ctx) => {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a number' });
        return z.NEVER;
    }
    return parsed;
});

const BookLevelZ = z.object({ price: NumericZ, size: NumericZ });

const OrderBookZ = z.object({
    market: z.string().default(''),
    asset_id: z.string(),
    hash: z.string().optional(),
    timestamp: NumericZ.optional(),
    bids: z.array(BookLevelZ).default([]),
    asks: z.array(BookLevelZ).default([]),
});

const PostOrderZ = z
    .object({
        success: z.boolean(),
        orderID: z.string().optional(),
        errorMsg: z.string().optional(),
        status: z.string().optional(),
    })
    .passthrough();

const CancelOrderZ = z
    .object({
        canceled: z.array(z.string()).default([]),
        not_canceled: z.record(z.unknown()).default({}),
    })
    .passthrough();

const BalanceZ = z
    .object({
        balance: NumericZ,
    })
    .passthrough();

/** USDC has 6 decimals on the venue's collateral endpoint. */
const COLLATERAL_DECIMALS = 1_000_000;

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

const marketStatus = (raw: GammaMarket): MarketStatus => {
    if (raw.umaResolutionStatus === 'resolved') return 'resolved';
    if (raw.closed) {
        const settled = (raw.outcomePrices ?? []).some((price) => Number(price) === 1);
        return settled ? 'resolved' : 'closed';
    }
    return raw.active === false ? 'closed' : 'open';
};

export const toMarket = (raw: GammaMarket): Market => ({
    id: raw.id,
    conditionId: raw.conditionId,
    slug: raw.slug,
    question: raw.question,
    tokenIds: {
        yes: raw.clobTokenIds[0],
        no: raw.clobTokenIds[1],
    },
    status: marketStatus(raw),
});

/**
 * Parse a list of raw markets, keeping only the well-formed binary ones.
 */
export const parseMarketList = (items: unknown[]): Market[] => {
    const markets: Market[] = [];
    for (const item of items) {
        const parsed = GammaMarketZ.safeParse(item);
        if (parsed.success) markets.push(toMarket(parsed.data));
    }
    return markets;
};

const sortLevels = (levels: BookLevel[], descending: boolean): BookLevel[] =>
    [...levels].sort((a, b) => (descending ? b.price - a.price : a.price - b.price));

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class VenueClient implements OrderVenue {
    constructor(
        private readonly gateway: RetryingGateway,
        private readonly transport: VenueTransport
    ) {}

    async listMarkets(params: MarketListParams = {}, signal?: AbortSignal): Promise<Market[]> {
        const query: MarketListParams = { active: true, closed: false, limit: 100, offset: 0, ...params };
        const items = await this.gateway.call({
            name: 'listMarkets',
            schema: GammaMarketListZ,
            signal,
            execute: (attemptSignal) => this.transport.fetchMarkets(query, attemptSignal),
        });
        return parseMarketList(items);
    }

    async getMarketById(id: string, signal?: AbortSignal): Promise<Market> {
        const raw = await this.gateway.call({
            name: `getMarket(${id})`,
            schema: GammaMarketZ,
            signal,
            execute: (attemptSignal) => this.transport.fetchMarketById(id, attemptSignal),
        });
        return toMarket(raw);
    }

    async getMarketBySlug(slug: string, signal?: AbortSignal): Promise<Market> {
        const raw = await this.gateway.call({
            name: `getMarketBySlug(${slug})`,
            schema: GammaMarketZ,
            signal,
            execute: (attemptSignal) => this.transport.fetchMarketBySlug(slug, attemptSignal),
        });
        return toMarket(raw);
    }

    async getMarketByConditionId(conditionId: string, signal?: AbortSignal): Promise<Market> {
        const items = await this.gateway.call({
            name: `getMarketByCondition(${conditionId})`,
            schema: GammaMarketListZ,
            signal,
            execute: (attemptSignal) => this.transport.fetchMarketsByConditionId(conditionId, attemptSignal),
        });
        const market = parseMarketList(items).find((candidate) => candidate.conditionId === conditionId);
        if (!market) {
            throw new GatewayError('ClientError', `No binary market with condition id ${conditionId}`, { status: 404 });
        }
        return market;
    }

    /**
     * All binary markets of an event, in the order the venue lists them.
     */
    async getEventMarkets(eventSlug: string, signal?: AbortSignal): Promise<Market[]> {
        const event = await this.gateway.call({
            name: `getEvent(${eventSlug})`,
            schema: GammaEventZ,
            signal,
            execute: (attemptSignal) => this.transport.fetchEventBySlug(eventSlug, attemptSignal),
        });
        return parseMarketList(event.markets);
    }

    async getOrderBook(tokenId: string, signal?: AbortSignal): Promise<OrderBookUpdate> {
        const book = await this.gateway.call({
            name: `getOrderBook(${tokenId.slice(0, 10)})`,
            schema: OrderBookZ,
            signal,
            execute: (attemptSignal) => this.transport.fetchOrderBook(tokenId, attemptSignal),
        });
        return {
            marketId: book.market,
            tokenId: book.asset_id,
            bids: sortLevels(book.bids, true),
            asks: sortLevels(book.asks, false),
            timestamp: book.timestamp ?? Date.now(),
            hash: book.hash,
        };
    }

    async submitOrder(order: VenueOrderRequest, signal?: AbortSignal): Promise<VenueOrderAck> {
        const response = await this.gateway.call({
            name: `submitOrder(${order.side} ${order.size}@${order.price})`,
            schema: PostOrderZ,
            signal,
            execute: (attemptSignal) => this.transport.postOrder(order, attemptSignal),
        });
        const accepted = response.success && Boolean(response.orderID);
        return {
            accepted,
            venueOrderId: response.orderID ?? '',
            status: response.status,
            message: response.errorMsg || (accepted ? undefined : 'Order rejected by venue'),
        };
    }

    async cancelOrder(venueOrderId: string, signal?: AbortSignal): Promise<boolean> {
        const response = await this.gateway.call({
            name: `cancelOrder(${venueOrderId.slice(0, 10)})`,
            schema: CancelOrderZ,
            signal,
            execute: (attemptSignal) => this.transport.cancelOrder(venueOrderId, attemptSignal),
        });
        return response.canceled.includes(venueOrderId);
    }

    async getBalance(signal?: AbortSignal): Promise<number> {
        const response = await this.gateway.call({
            name: 'getBalance',
            schema: BalanceZ,
            signal,
            execute: (attemptSignal) => this.transport.fetchCollateralBalance(attemptSignal),
        });
        return response.balance / COLLATERAL_DECIMALS;
    }
}
