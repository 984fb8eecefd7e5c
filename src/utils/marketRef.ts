import type { Market } from '../trading/interfaces';

/**
 * How a strategy names a market:
 *  - https://polymarket.com/event/<event-slug>[/<market-slug>][?tid=…]
 *  - https://polymarket.com/market/<market-slug>
 *  - a 0x condition id, a numeric market id or a bare market slug
 */
export type MarketRef =
    | { kind: 'event'; slug: string; marketSlug?: string }
    | { kind: 'market'; slug: string }
    | { kind: 'id'; id: string }
    | { kind: 'condition'; conditionId: string };

export interface MarketDirectory {
    getEventMarkets(eventSlug: string, signal?: AbortSignal): Promise<Market[]>;
    getMarketBySlug(slug: string, signal?: AbortSignal): Promise<Market>;
    getMarketById(id: string, signal?: AbortSignal): Promise<Market>;
    getMarketByConditionId(conditionId: string, signal?: AbortSignal): Promise<Market>;
}

const CONDITION_ID = /^0x[0-9a-fA-F]{64}$/;
const NUMERIC_ID = /^\d+$/;
const SLUG = /^[a-z0-9]+(?:-[a-z0-9]+)*$/i;

export function parseMarketRef(input: string): MarketRef {
    const value = input.trim();

    if (/^https?:\/\//i.test(value)) {
        const url = new URL(value);
        if (!/(^|\.)polymarket\.com$/i.test(url.hostname)) {
            throw new Error(`Not a Polymarket URL: ${value}`);
        }
        const parts = url.pathname.split('/').filter(Boolean);
        if (parts[0] === 'event' && parts[1]) {
            return parts[2] ? { kind: 'event', slug: parts[1], marketSlug: parts[2] } : { kind: 'event', slug: parts[1] };
        }
        if (parts[0] === 'market' && parts[1]) {
            return { kind: 'market', slug: parts[1] };
        }
        throw new Error(`Unsupported Polymarket URL: ${value}`);
    }

    if (CONDITION_ID.test(value)) return { kind: 'condition', conditionId: value };
    if (NUMERIC_ID.test(value)) return { kind: 'id', id: value };
    if (SLUG.test(value)) return { kind: 'market', slug: value };
    throw new Error(`Unrecognised market reference: "${input}"`);
}

/**
 * Look up the markets a reference names. An event URL without a market slug
 * expands to every binary market of the event.
 */
export async function resolveMarketRef(ref: MarketRef, directory: MarketDirectory, signal?: AbortSignal): Promise<Market[]> {
    switch (ref.kind) {
        case 'event': {
            const markets = await directory.getEventMarkets(ref.slug, signal);
            if (!ref.marketSlug) return markets;
            const selected = markets.filter((market) => market.slug === ref.marketSlug);
            if (selected.length === 0) {
                throw new Error(`Event ${ref.slug} has no market ${ref.marketSlug}`);
            }
            return selected;
        }
        case 'market':
            return [await directory.getMarketBySlug(ref.slug, signal)];
        case 'id':
            return [await directory.getMarketById(ref.id, signal)];
        case 'condition':
            return [await directory.getMarketByConditionId(ref.conditionId, signal)];
    }
}
