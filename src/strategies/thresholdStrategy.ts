/**
 * Threshold Strategy
 *
 * Example strategy: buys the YES token when it trades at or below `buyBelow`
 * and sells the whole position once it reaches `sellAbove`. Markets come from
 * STRATEGY_MARKETS.
 */

import { Strategy } from '../strategy/strategy';
import type { OrderHandle, PriceUpdate, Trade } from '../trading/interfaces';
import { isExecutionError } from '../utils/errors';

export class ThresholdStrategy extends Strategy {
    readonly name = 'threshold';
    readonly description = 'Buy YES cheap, sell it back dear';
    readonly markets: string[] = [];

    readonly buyBelow: number;
    readonly sellAbove: number;
    readonly orderSize: number;

    private pendingOrders = new Set<string>();

    constructor(buyBelow = 0.3, sellAbove = 0.45, orderSize = 10) {
        super();
        this.buyBelow = buyBelow;
        this.sellAbove = sellAbove;
        this.orderSize = orderSize;
    }

    onStart(): void {
        this.log(`Buying below ${this.buyBelow}, selling above ${this.sellAbove}, size ${this.orderSize}`);
    }

    onStop(): void {
        this.log(`Stopped with equity $${this.equity.toFixed(2)}`);
    }

    onPriceUpdate(update: PriceUpdate): void {
        const market = this.marketFor(update.tokenId);
        if (!market || market.tokenIds.yes !== update.tokenId) return;
        if (this.pendingOrders.size > 0) return;

        const held = this.position(update.tokenId);
        try {
            if (held === 0 && update.price <= this.buyBelow) {
                this.track(this.buy(update.tokenId, this.orderSize, update.price));
            } else if (held > 0 && update.price >= this.sellAbove) {
                this.track(this.sell(update.tokenId, held, update.price));
            }
        } catch (error) {
            if (!isExecutionError(error)) throw error;
            this.log(`Order refused: ${error.message}`, 'warning');
        }
    }

    onFill(trade: Trade): void {
        this.pendingOrders.delete(trade.orderId);
        this.log(`${trade.side} ${trade.size} @ ${trade.price.toFixed(3)}`, 'success');
    }

    private track(handle: OrderHandle): void {
        if (handle.order.status === 'filled') return;
        this.pendingOrders.add(handle.id);
        // A live order the venue never took will not fill.
        handle.settled.then(
            (order) => {
                if (order.status === 'rejected') this.pendingOrders.delete(order.id);
            },
            () => this.pendingOrders.delete(handle.id)
        );
    }
}

export default ThresholdStrategy;
