/**
 * src/app.ts
 *
 * Express application factory. Kept apart from server.ts so tests can run
 * supertest against `createApp(container)` without binding a port.
 */

import express from 'express';
import type { Container } from './container';
import { errorHandler } from './middleware/errorHandler';
import { appointmentsRouter } from './routes/appointments';
import { eventsRouter } from './routes/events';
import { healthRouter } from './routes/health';
import { metricsRouter } from './routes/metrics';
import { webhooksRouter } from './routes/webhooks';

export function createApp(container: Container): express.Application {
    const app = express();

    // ── Core Middleware ──────────────────────────────────────────
    app.use(express.json({ limit: '10kb' }));

    // ── Routes ───────────────────────────────────────────────────
    app.use('/health', healthRouter(container));
    app.use('/events', eventsRouter(container));
    app.use('/appointments', appointmentsRouter(container));
    app.use('/webhooks', webhooksRouter(container));
    app.use('/metrics', metricsRouter(container));

    app.use((_req, res) => {
        res.status(404).json({ error: 'Route not found' });
    });

    // ── Global Error Handler ─────────────────────────────────────
    // must stay last: Express spots error handlers by their four parameters
    app.use(errorHandler);

    return app;
}
