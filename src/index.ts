import connectDB, { closeDB } from './config/db';
import { ConfigError, loadConfigFromEnvironment, RuntimeConfig } from './config/env';
import startAppServer, { AppServerHandle } from './server/appServer';
import { PolymarketTransport } from './services/polymarketTransport';
import { RateLimiter } from './services/rateLimiter';
import { RetryingGateway } from './services/retryingGateway';
import { MemoryTradeStore, MongoTradeStore, TradeStore } from './services/tradeStore';
import { VenueClient } from './services/venueClient';
import { loadStrategy } from './strategy/loader';
import { StrategyRunner } from './strategy/runner';
import { ExecutionEngine } from './trading/executionEngine';
import { describeError } from './utils/errors';
import Logger from './utils/logger';

const DEFAULT_STRATEGY = 'dist/strategies/thresholdStrategy.js';

const shutdownController = new AbortController();
let isShuttingDown = false;

const requestShutdown = (signal: string): void => {
    if (isShuttingDown) {
        Logger.warning('Shutdown already in progress, forcing exit...');
        process.exit(1);
    }
    isShuttingDown = true;
    Logger.separator();
    Logger.info(`Received ${signal}, shutting down...`);
    shutdownController.abort();
};

process.on('unhandledRejection', (reason: unknown) => {
    Logger.error(`Unhandled rejection: ${describeError(reason)}`);
});

process.on('uncaughtException', (error: Error) => {
    Logger.error(`Uncaught exception: ${error.message}`);
    process.exitCode = 1;
    requestShutdown('uncaughtException');
});

process.on('SIGTERM', () => requestShutdown('SIGTERM'));
process.on('SIGINT', () => requestShutdown('SIGINT'));

const openStore = async (config: Readonly<RuntimeConfig>): Promise<TradeStore> => {
    if (!config.mongoUri) {
        Logger.info('MONGO_URI not set: trade history kept in memory for this run');
        return new MemoryTradeStore();
    }
    await connectDB(config.mongoUri);
    return new MongoTradeStore();
};

export const main = async (): Promise<void> => {
    let server: AppServerHandle | null = null;
    let gateway: RetryingGateway | null = null;
    let limiter: RateLimiter | null = null;

    try {
        const config = loadConfigFromEnvironment();
        Logger.setLevel(config.logLevel);
        const strategy = await loadStrategy(config.strategyPath ?? DEFAULT_STRATEGY);

        limiter = new RateLimiter(config.rateLimit);
        gateway = new RetryingGateway(limiter, config.gateway);
        const venue = new VenueClient(gateway, new PolymarketTransport(config.venue));
        const store = await openStore(config);
        const engine = new ExecutionEngine({
            mode: config.mode,
            paper: config.paperTrading,
            venue: config.mode === 'live' ? venue : undefined,
            store,
        });

        const runner = new StrategyRunner({ config, strategy, directory: venue, engine, store });
        shutdownController.signal.addEventListener('abort', () => gateway?.shutdown(), { once: true });

        if (config.port !== undefined) {
            server = await startAppServer(config.port, () => runner.snapshot());
        }

        Logger.startup(config.mode, strategy.name, strategy.markets.length || config.strategyMarkets.length);
        const summary = await runner.run(shutdownController.signal);
        Logger.success(
            `Dispatcher processed ${summary.processed} events (${summary.failed} callback failures, ${summary.dropped} dropped)`
        );
    } catch (error) {
        if (error instanceof ConfigError) {
            Logger.error(error.message);
        } else {
            Logger.error(`Fatal error: ${describeError(error)}`);
        }
        process.exitCode = 1;
    } finally {
        gateway?.shutdown();
        limiter?.close();
        if (server) {
            await server.stop().catch((error: unknown) => Logger.warning(`Status API close failed: ${describeError(error)}`));
        }
        await closeDB().catch((error: unknown) => Logger.warning(`MongoDB close failed: ${describeError(error)}`));
        Logger.success('Shutdown complete');
    }
};

if (require.main === module) {
    main().catch((error: unknown) => {
        Logger.error(`Fatal error: ${describeError(error)}`);
        process.exit(1);
    });
}
