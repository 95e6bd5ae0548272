/**
 * src/server.ts
 *
 * Entry point.
 *
 * BOOT ORDER:
 *   1. Parse & validate env vars (exits on invalid config)
 *   2. Build the container: store, locks, sink, calendar, services
 *   3. Register event bus listeners
 *   4. Start listening on PORT
 *   5. Start the followup worker and the daily metrics job
 *   6. Register SIGINT / SIGTERM handlers
 */

import { loadEnv } from './config/env';
import { createApp } from './app';
import { createContainer } from './container';
import { registerListeners } from './events/listeners';
import { registerShutdownHandlers } from './utils/gracefulShutdown';
import { logger } from './utils/logger';

const env = loadEnv();
const container = createContainer(env);

registerListeners(container.bus);

const app = createApp(container);

const server = app.listen(env.PORT, () => {
    logger.success('Server', `Leasing core running on port ${env.PORT} (${env.NODE_ENV})`);
    logger.info('Server', `Health check: http://localhost:${env.PORT}/health`);
    logger.info('Server', `Inbound events: POST http://localhost:${env.PORT}/events`);
});

container.followupWorker.start();
container.metricsJob.start();

registerShutdownHandlers({
    httpServer: server,
    redis: container.redis,
    bus: container.bus,
    cleanupFns: [
        async () => {
            container.metricsJob.stop();
            await container.followupWorker.stop();
        },
    ],
});
