import * as fs from 'fs';
import * as path from 'path';
import { REQUIRED_CAPABILITIES, TradingStrategy } from './strategy';

export class StrategyLoadError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StrategyLoadError';
    }
}

type Candidate = Record<string, unknown>;

const isRecord = (value: unknown): value is Candidate =>
    (typeof value === 'object' || typeof value === 'function') && value !== null;

/**
 * Capabilities the value lacks, in a fixed order. Empty means usable.
 */
export function missingCapabilities(value: unknown): string[] {
    if (!isRecord(value)) return ['name', 'markets', ...REQUIRED_CAPABILITIES];
    const missing: string[] = [];
    if (typeof value.name !== 'string' || value.name.trim() === '') missing.push('name');
    if (!Array.isArray(value.markets) || !value.markets.every((entry) => typeof entry === 'string')) {
        missing.push('markets');
    }
    for (const capability of REQUIRED_CAPABILITIES) {
        if (typeof value[capability] !== 'function') missing.push(capability);
    }
    return missing;
}

export const isTradingStrategy = (value: unknown): value is TradingStrategy => missingCapabilities(value).length === 0;

/**
 * Turn a module export into a strategy instance: classes are constructed
 * with no arguments, objects are used as they are.
 */
export function instantiate(exported: unknown, source: string): TradingStrategy {
    let candidate: unknown = exported;
    if (typeof exported === 'function') {
        try {
            candidate = Reflect.construct(exported, []);
        } catch (error) {
            throw new StrategyLoadError(`Could not construct strategy from ${source}`, { cause: error });
        }
    }
    const missing = missingCapabilities(candidate);
    if (missing.length > 0) {
        throw new StrategyLoadError(`Strategy in ${source} is missing: ${missing.join(', ')}`);
    }
    if (!isTradingStrategy(candidate)) {
        throw new StrategyLoadError(`Strategy in ${source} is not usable`);
    }
    return candidate;
}

/**
 * Pick the export to load: `default` first, then the first export that looks
 * like a strategy class or object.
 */
function pickExport(moduleExports: unknown): unknown {
    if (!isRecord(moduleExports)) return moduleExports;
    if (moduleExports.default !== undefined) return moduleExports.default;
    for (const value of Object.values(moduleExports)) {
        if (typeof value === 'function' && isRecord(value.prototype) && typeof value.prototype.onPriceUpdate === 'function') {
            return value;
        }
        if (isTradingStrategy(value)) return value;
    }
    return undefined;
}

/**
 * Load and validate a strategy module. Relative paths resolve against the
 * working directory.
 */
export async function loadStrategy(modulePath: string): Promise<TradingStrategy> {
    const resolved = path.resolve(process.cwd(), modulePath);
    if (!fs.existsSync(resolved)) {
        throw new StrategyLoadError(`Strategy file not found: ${resolved}`);
    }

    let moduleExports: unknown;
    try {
        moduleExports = await import(resolved);
    } catch (error) {
        throw new StrategyLoadError(`Failed to import ${resolved}: ${error instanceof Error ? error.message : String(error)}`, {
            cause: error,
        });
    }

    const exported = pickExport(moduleExports);
    if (exported === undefined) {
        throw new StrategyLoadError(`No strategy export found in ${resolved}`);
    }
    return instantiate(exported, resolved);
}
