import { Router } from 'express';
import type { Container } from '../container';
import { asyncHandler } from '../utils/asyncHandler';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

type Check = 'ok' | 'error' | 'skipped';

export function healthRouter(container: Container): Router {
    const router = Router();

    router.get(
        '/',
        asyncHandler(async (_req, res) => {
            const checks: Record<string, Check> = {};

            try {
                await container.store.ping();
                checks.database = 'ok';
            } catch (err) {
                logger.warn('Health', `DB check failed: ${errorMessage(err)}`);
                checks.database = 'error';
            }

            if (container.redis) {
                try {
                    await container.redis.ping();
                    checks.redis = 'ok';
                } catch {
                    logger.warn('Health', 'Redis ping failed');
                    checks.redis = 'error';
                }
            } else {
                checks.redis = 'skipped';
            }

            const healthy = Object.values(checks).every((v) => v !== 'error');

            res.status(healthy ? 200 : 503).json({
                status: healthy ? 'ok' : 'degraded',
                service: 'leasing-qualification-core',
                timestamp: new Date().toISOString(),
                uptime: Math.floor(process.uptime()),
                checks,
                workers: {
                    followups: container.followupWorker.status(),
                },
            });
        })
    );

    return router;
}
