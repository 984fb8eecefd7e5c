import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal logging surface handed to components, so tests can capture lines
 * instead of writing to the console.
 */
export interface Log {
    debug(message: string): void;
    info(message: string): void;
    success(message: string): void;
    warning(message: string): void;
    error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let minimumLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);

function parseLevel(value: string | undefined): LogLevel {
    switch ((value ?? '').toLowerCase()) {
        case 'debug':
            return 'debug';
        case 'warn':
        case 'warning':
            return 'warn';
        case 'error':
            return 'error';
        default:
            return 'info';
    }
}

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];

const timestamp = (): string => chalk.gray(new Date().toISOString().slice(11, 23));

const formatMoney = (value: number): string => `$${value.toFixed(2)}`;

const Logger = {
    setLevel(level: LogLevel): void {
        minimumLevel = level;
    },

    debug(message: string): void {
        if (!enabled('debug')) return;
        console.log(`${timestamp()} ${chalk.gray('·')} ${chalk.gray(message)}`);
    },

    info(message: string): void {
        if (!enabled('info')) return;
        console.log(`${timestamp()} ${chalk.blue('ℹ')} ${message}`);
    },

    success(message: string): void {
        if (!enabled('info')) return;
        console.log(`${timestamp()} ${chalk.green('✓')} ${chalk.green(message)}`);
    },

    warning(message: string): void {
        if (!enabled('warn')) return;
        console.warn(`${timestamp()} ${chalk.yellow('⚠')} ${chalk.yellow(message)}`);
    },

    error(message: string): void {
        if (!enabled('error')) return;
        console.error(`${timestamp()} ${chalk.red('✗')} ${chalk.red(message)}`);
    },

    separator(): void {
        if (!enabled('info')) return;
        console.log(chalk.gray('─'.repeat(70)));
    },

    header(title: string): void {
        if (!enabled('info')) return;
        console.log('');
        console.log(chalk.cyan.bold(`  ${title}`));
        console.log(chalk.gray('═'.repeat(70)));
    },

    /**
     * One line per fill, green for buys and red for sells.
     */
    trade(mode: string, side: 'buy' | 'sell', size: number, price: number, tokenId: string, balance?: number): void {
        if (!enabled('info')) return;
        const sideLabel = side === 'buy' ? chalk.green.bold('BUY ') : chalk.red.bold('SELL');
        const token = tokenId.length > 14 ? `${tokenId.slice(0, 6)}…${tokenId.slice(-6)}` : tokenId;
        const tail = balance === undefined ? '' : chalk.gray(` (balance ${formatMoney(balance)})`);
        console.log(
            `${timestamp()} ${chalk.magenta(`[${mode.toUpperCase()}]`)} ${sideLabel} ${size.toFixed(2)} @ ${price.toFixed(4)} ${chalk.gray(token)}${tail}`
        );
    },

    status(channel: string, state: string, detail?: string): void {
        if (!enabled('info')) return;
        const colour = state === 'streaming' ? chalk.green : state === 'disconnected' ? chalk.yellow : chalk.cyan;
        console.log(`${timestamp()} ${chalk.blue('⇄')} ${channel}: ${colour(state)}${detail ? chalk.gray(` ${detail}`) : ''}`);
    },

    startup(mode: string, strategyName: string, markets: number): void {
        console.log('');
        console.log(chalk.cyan.bold('  CLOB TRADER'));
        console.log(chalk.gray('═'.repeat(70)));
        console.log(`  ${chalk.gray('Mode:')}      ${mode === 'live' ? chalk.red.bold('LIVE') : chalk.green.bold('PAPER')}`);
        console.log(`  ${chalk.gray('Strategy:')}  ${chalk.white(strategyName)}`);
        console.log(`  ${chalk.gray('Markets:')}   ${markets}`);
        console.log(chalk.gray('═'.repeat(70)));
        console.log('');
    },
};

export default Logger;
