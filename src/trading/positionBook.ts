/**
 * Position Book
 *
 * Per-token net position, average entry price and P&L, rebuilt from the
 * trade stream. Long and short sizes use the same weighted-average rule; a
 * trade that crosses zero realizes the closed part and opens the remainder at
 * the trade price.
 */

import type { Position, Trade } from './interfaces';

/** Sizes below this are treated as flat. */
const SIZE_EPSILON = 1e-9;

const createEmptyPosition = (tokenId: string, marketId: string, now: number): Position => ({
    tokenId,
    marketId,
    netSize: 0,
    avgEntryPrice: 0,
    realizedPnl: 0,
    unrealizedPnl: 0,
    updatedAt: now,
});

export class PositionBook {
    private positions = new Map<string, Position>();
    private marks = new Map<string, number>();

    /**
     * Apply one fill and return the updated position.
     */
    apply(trade: Trade): Position {
        const position =
            this.positions.get(trade.tokenId) ?? createEmptyPosition(trade.tokenId, trade.marketId, trade.timestamp);
        const signed = trade.side === 'buy' ? trade.size : -trade.size;
        const previous = position.netSize;
        const next = previous + signed;

        if (previous === 0 || Math.sign(previous) === Math.sign(signed)) {
            // Opening or adding
            const cost = Math.abs(previous) * position.avgEntryPrice + trade.size * trade.price;
            position.avgEntryPrice = cost / Math.abs(next);
        } else {
            // Reducing, closing or flipping
            const closed = Math.min(Math.abs(previous), trade.size);
            const direction = previous > 0 ? 1 : -1;
            position.realizedPnl += (trade.price - position.avgEntryPrice) * closed * direction;
            if (Math.abs(next) < SIZE_EPSILON) {
                position.avgEntryPrice = 0;
            } else if (Math.sign(next) !== Math.sign(previous)) {
                position.avgEntryPrice = trade.price;
            }
        }

        position.netSize = Math.abs(next) < SIZE_EPSILON ? 0 : next;
        position.updatedAt = trade.timestamp;
        this.positions.set(trade.tokenId, position);
        this.remark(position);
        return { ...position };
    }

    /**
     * Mark a token to the latest price. Returns the updated position, if any.
     */
    mark(tokenId: string, price: number, timestamp: number = Date.now()): Position | undefined {
        this.marks.set(tokenId, price);
        const position = this.positions.get(tokenId);
        if (!position) return undefined;
        this.remark(position);
        position.updatedAt = timestamp;
        return { ...position };
    }

    /**
     * Replace the book with persisted positions (engine start).
     */
    restore(positions: readonly Position[]): void {
        this.positions.clear();
        for (const position of positions) {
            this.positions.set(position.tokenId, { ...position });
        }
    }

    get(tokenId: string): Position | undefined {
        const position = this.positions.get(tokenId);
        return position ? { ...position } : undefined;
    }

    netSize(tokenId: string): number {
        return this.positions.get(tokenId)?.netSize ?? 0;
    }

    all(): Position[] {
        return [...this.positions.values()].map((position) => ({ ...position }));
    }

    /** Value of every position at its mark (or entry price when unmarked). */
    marketValue(): number {
        let value = 0;
        for (const position of this.positions.values()) {
            value += position.netSize * (this.marks.get(position.tokenId) ?? position.avgEntryPrice);
        }
        return value;
    }

    totalRealizedPnl(): number {
        let total = 0;
        for (const position of this.positions.values()) total += position.realizedPnl;
        return total;
    }

    totalUnrealizedPnl(): number {
        let total = 0;
        for (const position of this.positions.values()) total += position.unrealizedPnl;
        return total;
    }

    private remark(position: Position): void {
        const mark = this.marks.get(position.tokenId);
        position.unrealizedPnl =
            mark === undefined || position.netSize === 0 ? 0 : (mark - position.avgEntryPrice) * position.netSize;
    }
}
