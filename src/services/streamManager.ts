/**
 * Stream Manager
 *
 * One persistent WebSocket per channel (market, user). Each channel walks
 * disconnected → connecting → subscribed → streaming and back to disconnected
 * on failure, then reconnects with exponential backoff and jitter. The
 * channels reconnect independently; a channel that keeps failing gives up and
 * reports it without taking the process down.
 */

import WebSocket from 'ws';
import type { ReconnectConfig, StreamConfig } from '../config/env';
import type { Market, StreamEvent } from '../trading/interfaces';
import { backoffDelay } from '../utils/backoff';
import { describeError } from '../utils/errors';
import Logger, { Log } from '../utils/logger';
import { ChannelName, MarketResolver, normalizeFrame } from './streamFrames';

export type { ChannelName };

export type ChannelState = 'disconnected' | 'connecting' | 'subscribed' | 'streaming';

export interface ChannelStatus {
    channel: ChannelName;
    state: ChannelState;
    /** Consecutive failed connections since the channel last streamed. */
    failures: number;
    gaveUp: boolean;
    detail?: string;
    at: number;
}

export interface SocketHandlers {
    onOpen(): void;
    onMessage(text: string): void;
    onClose(code: number, reason: string): void;
    onError(error: Error): void;
}

export interface StreamSocket {
    send(data: string): void;
    close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => StreamSocket;

export interface UserChannelAuth {
    apiKey: string;
    secret: string;
    passphrase: string;
}

export interface StreamManagerOptions {
    socketFactory?: SocketFactory;
    logger?: Log;
    random?: () => number;
    /** Enables the user channel. */
    auth?: UserChannelAuth;
    onStatus?: (status: ChannelStatus) => void;
}

const rawToText = (data: WebSocket.RawData): string => {
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    return Buffer.from(data).toString('utf8');
};

/**
 * Socket factory on top of the `ws` package.
 */
export const wsSocketFactory: SocketFactory = (url, handlers) => {
    const socket = new WebSocket(url);
    socket.on('open', () => handlers.onOpen());
    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        if (!isBinary) handlers.onMessage(rawToText(data));
    });
    socket.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString('utf8')));
    socket.on('error', (error: Error) => handlers.onError(error));
    return {
        send: (data: string) => socket.send(data),
        close: () => socket.terminate(),
    };
};

interface Channel {
    name: ChannelName;
    url: string;
    state: ChannelState;
    socket: StreamSocket | null;
    /** Bumped whenever a socket is retired so its late callbacks are ignored. */
    generation: number;
    failures: number;
    gaveUp: boolean;
    connectTimer: NodeJS.Timeout | null;
    pingTimer: NodeJS.Timeout | null;
    watchdogTimer: NodeJS.Timeout | null;
    reconnectTimer: NodeJS.Timeout | null;
}

export class StreamManager {
    private readonly stream: StreamConfig;
    private readonly reconnect: ReconnectConfig;
    private readonly sink: (event: StreamEvent) => void;
    private readonly socketFactory: SocketFactory;
    private readonly logger: Log;
    private readonly random: () => number;
    private readonly auth?: UserChannelAuth;
    private readonly onStatus?: (status: ChannelStatus) => void;

    private readonly channels: Record<ChannelName, Channel>;
    private readonly tokenMarkets = new Map<string, string>();
    private readonly conditionIds = new Set<string>();
    private running = false;

    constructor(
        stream: StreamConfig,
        reconnect: ReconnectConfig,
        sink: (event: StreamEvent) => void,
        options: StreamManagerOptions = {}
    ) {
        this.stream = stream;
        this.reconnect = reconnect;
        this.sink = sink;
        this.socketFactory = options.socketFactory ?? wsSocketFactory;
        this.logger = options.logger ?? Logger;
        this.random = options.random ?? Math.random;
        this.auth = options.auth;
        this.onStatus = options.onStatus;
        this.channels = {
            market: this.createChannel('market', stream.marketUrl),
            user: this.createChannel('user', stream.userUrl),
        };
    }

    /**
     * Track the outcome tokens (market channel) and condition ids (user
     * channel) of the given markets. Connected channels re-send their
     * subscription.
     */
    subscribe(markets: readonly Market[]): void {
        for (const market of markets) {
            this.tokenMarkets.set(market.tokenIds.yes, market.id);
            this.tokenMarkets.set(market.tokenIds.no, market.id);
            if (market.conditionId) this.conditionIds.add(market.conditionId);
        }
        for (const channel of this.activeChannels()) {
            if (channel.socket && (channel.state === 'subscribed' || channel.state === 'streaming')) {
                this.sendSubscription(channel);
            }
        }
    }

    /**
     * Open every enabled channel. Aborting the signal stops the manager.
     */
    start(signal?: AbortSignal): void {
        if (this.running) return;
        this.running = true;
        signal?.addEventListener('abort', () => this.stop(), { once: true });
        if (!this.auth) {
            this.logger.info('User channel disabled: no API credentials configured');
        }
        for (const channel of this.activeChannels()) {
            channel.failures = 0;
            channel.gaveUp = false;
            this.connect(channel);
        }
    }

    stop(): void {
        if (!this.running) return;
        this.running = false;
        for (const channel of this.activeChannels()) {
            this.retire(channel);
            if (channel.state !== 'disconnected') this.transition(channel, 'disconnected', 'stopped');
        }
    }

    getStatus(): ChannelStatus[] {
        return this.activeChannels().map((channel) => this.statusOf(channel));
    }

    get isRunning(): boolean {
        return this.running;
    }

    private createChannel(name: ChannelName, url: string): Channel {
        return {
            name,
            url,
            state: 'disconnected',
            socket: null,
            generation: 0,
            failures: 0,
            gaveUp: false,
            connectTimer: null,
            pingTimer: null,
            watchdogTimer: null,
            reconnectTimer: null,
        };
    }

    private activeChannels(): Channel[] {
        return this.auth ? [this.channels.market, this.channels.user] : [this.channels.market];
    }

    private readonly resolveMarket: MarketResolver = (tokenId, venueMarket) =>
        this.tokenMarkets.get(tokenId) ?? venueMarket;

    private connect(channel: Channel): void {
        channel.reconnectTimer = null;
        if (!this.running) return;

        const generation = ++channel.generation;
        const current = (): boolean => this.running && channel.generation === generation;
        this.transition(channel, 'connecting', channel.failures > 0 ? `attempt ${channel.failures + 1}` : undefined);

        channel.connectTimer = setTimeout(() => {
            if (current()) this.fail(channel, `connect timed out after ${this.stream.connectTimeoutMs}ms`);
        }, this.stream.connectTimeoutMs);

        try {
            channel.socket = this.socketFactory(channel.url, {
                onOpen: () => {
                    if (current()) this.handleOpen(channel);
                },
                onMessage: (text) => {
                    if (current()) this.handleMessage(channel, text);
                },
                onClose: (code, reason) => {
                    if (current()) this.fail(channel, `closed (${code}${reason ? ` ${reason}` : ''})`);
                },
                onError: (error) => {
                    if (current()) this.fail(channel, describeError(error));
                },
            });
        } catch (error) {
            this.fail(channel, describeError(error));
        }
    }

    private handleOpen(channel: Channel): void {
        this.clearTimer(channel, 'connectTimer');
        if (!this.sendSubscription(channel)) return;
        this.transition(channel, 'subscribed');

        channel.pingTimer = setInterval(() => {
            try {
                channel.socket?.send('PING');
            } catch (error) {
                this.fail(channel, `keepalive failed: ${describeError(error)}`);
            }
        }, this.stream.pingIntervalMs);
        this.armWatchdog(channel);
    }

    private handleMessage(channel: Channel, text: string): void {
        this.armWatchdog(channel);
        const trimmed = text.trim();
        if (trimmed === '' || trimmed.toUpperCase() === 'PONG') return;

        let events: StreamEvent[];
        try {
            events = normalizeFrame(channel.name, trimmed, this.resolveMarket);
        } catch (error) {
            this.logger.warning(`${channel.name} channel: dropped malformed frame (${describeError(error)}): ${trimmed.slice(0, 120)}`);
            return;
        }

        if (channel.state === 'subscribed') {
            channel.failures = 0;
            this.transition(channel, 'streaming');
        }
        for (const event of events) this.sink(event);
    }

    private sendSubscription(channel: Channel): boolean {
        const message =
            channel.name === 'market'
                ? { assets_ids: [...this.tokenMarkets.keys()], type: 'market' }
                : { auth: this.auth, markets: [...this.conditionIds], type: 'user' };
        try {
            channel.socket?.send(JSON.stringify(message));
            return true;
        } catch (error) {
            this.fail(channel, `subscribe failed: ${describeError(error)}`);
            return false;
        }
    }

    private armWatchdog(channel: Channel): void {
        this.clearTimer(channel, 'watchdogTimer');
        channel.watchdogTimer = setTimeout(() => {
            this.fail(channel, `no frame for ${this.stream.heartbeatTimeoutMs}ms`);
        }, this.stream.heartbeatTimeoutMs);
    }

    private fail(channel: Channel, reason: string): void {
        this.retire(channel);
        this.transition(channel, 'disconnected', reason);
        if (!this.running) return;

        channel.failures += 1;
        if (channel.failures >= this.reconnect.maxAttempts) {
            channel.gaveUp = true;
            this.logger.error(`${channel.name} channel gave up after ${channel.failures} consecutive failures: ${reason}`);
            this.emitStatus(channel, reason);
            return;
        }

        const delay = backoffDelay(channel.failures - 1, this.reconnect, this.random);
        this.logger.warning(`${channel.name} channel ${reason}; reconnecting in ${Math.round(delay)}ms`);
        channel.reconnectTimer = setTimeout(() => this.connect(channel), delay);
    }

    /**
     * Close the current socket and stop its timers. Late callbacks from it are
     * ignored from here on.
     */
    private retire(channel: Channel): void {
        channel.generation += 1;
        this.clearTimer(channel, 'connectTimer');
        this.clearTimer(channel, 'watchdogTimer');
        this.clearTimer(channel, 'reconnectTimer');
        if (channel.pingTimer) {
            clearInterval(channel.pingTimer);
            channel.pingTimer = null;
        }
        const socket = channel.socket;
        channel.socket = null;
        if (socket) {
            try {
                socket.close();
            } catch (error) {
                this.logger.debug(`${channel.name} channel: close failed (${describeError(error)})`);
            }
        }
    }

    private clearTimer(channel: Channel, key: 'connectTimer' | 'watchdogTimer' | 'reconnectTimer'): void {
        const timer = channel[key];
        if (timer) {
            clearTimeout(timer);
            channel[key] = null;
        }
    }

    private transition(channel: Channel, state: ChannelState, detail?: string): void {
        channel.state = state;
        this.logger.debug(`${channel.name} channel → ${state}${detail ? ` (${detail})` : ''}`);
        this.emitStatus(channel, detail);
    }

    private statusOf(channel: Channel, detail?: string): ChannelStatus {
        return {
            channel: channel.name,
            state: channel.state,
            failures: channel.failures,
            gaveUp: channel.gaveUp,
            ...(detail ? { detail } : {}),
            at: Date.now(),
        };
    }

    private emitStatus(channel: Channel, detail?: string): void {
        if (!this.onStatus) return;
        try {
            this.onStatus(this.statusOf(channel, detail));
        } catch (error) {
            this.logger.error(`Stream status listener failed: ${describeError(error)}`);
        }
    }
}
