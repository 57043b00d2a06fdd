/**
 * HTTP server lifecycle: prepares the scratch directory, serves the app on
 * @hono/node-server and closes cleanly on SIGINT/SIGTERM.
 */

import { serve } from '@hono/node-server';
import * as Logging from '@/logging';
import * as Pipeline from '@/pipeline';
import type { Config } from '@/config';
import type { Services } from '@/services';
import { createApp } from './app';

export interface ServerHandle {
    close(): Promise<void>;
}

export const startServer = async (config: Config, services: Services): Promise<ServerHandle> => {
    const logger = Logging.getLogger();

    await services.scratch.ensure();
    await services.scratch.sweep();

    const pipeline = Pipeline.create({
        summaryMaxLength: config.summaryMaxLength,
        itemTimeoutMs: config.itemTimeoutMs,
    }, services);
    const app = createApp(pipeline, { scratch: services.scratch, maxUploadSize: config.maxUploadSize });

    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
        logger.info('Listening on http://%s:%d', config.host, info.port);
    });

    const close = () => new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });

    const shutdown = (signal: string) => {
        logger.info('Received %s, shutting down', signal);
        void close().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error('Error while shutting down: %s', error);
                process.exit(1);
            },
        );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    return { close };
};
