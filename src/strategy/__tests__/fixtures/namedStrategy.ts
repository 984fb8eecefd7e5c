import type { PriceUpdate } from '../../../trading/interfaces';
import { Strategy } from '../../strategy';

export const DEFAULT_SIZE = 5;

export class NamedExportStrategy extends Strategy {
    readonly name = 'named-export';
    readonly markets = ['market-1', 'market-2'];

    onPriceUpdate(_update: PriceUpdate): void {}
}
