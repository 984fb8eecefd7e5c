import cors from 'cors';
import express from 'express';
import type { RunnerSnapshot } from '../strategy/runner';
import Logger from '../utils/logger';

export interface AppServerHandle {
    port: number;
    stop: () => Promise<void>;
}

/**
 * Read-only status API. Every response is built from a fresh snapshot, never
 * from the engine's live state.
 */
export const createApp = (getSnapshot: () => RunnerSnapshot): express.Express => {
    const app = express();
    app.use(cors());

    app.get('/', (_req, res) => {
        res.json({
            message: 'CLOB trader status API',
            endpoints: ['/health', '/state'],
        });
    });

    app.get('/health', (_req, res) => {
        const snapshot = getSnapshot();
        res.json({
            ok: snapshot.running && snapshot.channels.every((channel) => !channel.gaveUp),
            mode: snapshot.mode,
            channels: snapshot.channels.map(({ channel, state, gaveUp }) => ({ channel, state, gaveUp })),
            updatedAt: snapshot.updatedAt,
        });
    });

    app.get('/state', (_req, res) => {
        res.json(getSnapshot());
    });

    return app;
};

export const startAppServer = async (port: number, getSnapshot: () => RunnerSnapshot): Promise<AppServerHandle> => {
    const app = createApp(getSnapshot);

    return await new Promise<AppServerHandle>((resolve, reject) => {
        const server = app.listen(port, () => {
            const address = server.address();
            const boundPort = typeof address === 'object' && address !== null ? address.port : port;
            Logger.success(`Status API listening on port ${boundPort}`);
            resolve({
                port: boundPort,
                stop: () =>
                    new Promise<void>((resolveClose, rejectClose) => {
                        server.close((error) => {
                            if (error) {
                                rejectClose(error);
                            } else {
                                resolveClose();
                            }
                        });
                    }),
            });
        });
        server.on('error', reject);
    });
};

export default startAppServer;
