import type { Server } from 'http';
import type Redis from 'ioredis';
import type { LeasingEventBus } from '../events/eventBus';
import { errorMessage } from './errors';
import { logger } from './logger';

export interface ShutdownDeps {
    httpServer?: Server;
    redis: Redis | null;
    bus?: LeasingEventBus;
    /** Run in order after the HTTP server stops accepting connections. */
    cleanupFns?: Array<() => Promise<void>>;
}

function closeServer(server: Server): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

export function registerShutdownHandlers(deps: ShutdownDeps, timeoutMs = 10_000): void {
    let shuttingDown = false;

    async function shutdown(signal: string): Promise<void> {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.warn('GracefulShutdown', `Received ${signal} — shutting down…`);

        const timer = setTimeout(() => {
            logger.error('GracefulShutdown', 'Forced exit — shutdown took too long');
            process.exit(1);
        }, timeoutMs);
        timer.unref();

        try {
            if (deps.httpServer) {
                await closeServer(deps.httpServer);
                logger.success('GracefulShutdown', 'HTTP server closed');
            }

            for (const fn of deps.cleanupFns ?? []) {
                await fn();
            }

            if (deps.redis) {
                await deps.redis.quit();
                logger.success('GracefulShutdown', 'Redis disconnected');
            }

            deps.bus?.removeAllListeners();

            clearTimeout(timer);
            logger.success('GracefulShutdown', 'Shutdown complete');
            process.exit(0);
        } catch (err) {
            logger.error('GracefulShutdown', `Error during shutdown: ${errorMessage(err)}`);
            process.exit(1);
        }
    }

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('unhandledRejection', (reason) => {
        logger.error('Process', 'Unhandled Promise Rejection', reason);
    });

    process.on('uncaughtException', (err) => {
        logger.error('Process', 'Uncaught Exception', err);
        process.exit(1);
    });
}
