import { Router } from 'express';
import { z } from 'zod';
import type { Container } from '../container';
import { requireCapability } from '../middleware/capability';
import { validate } from '../middleware/validate';
import { isIsoDate } from '../utils/time';

const SummaryQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(90).default(7),
});

const RollupBodySchema = z.object({
    date: z.string().refine(isIsoDate, 'date must be YYYY-MM-DD').optional(),
});

export function metricsRouter(container: Container): Router {
    const router = Router();
    const { metrics, auth } = container;

    router.get(
        '/',
        requireCapability(auth, 'metrics:read'),
        validate(
            SummaryQuerySchema,
            async (query, _req, res) => {
                res.json(await metrics.summary(query.days));
            },
            'query'
        )
    );

    router.post(
        '/rollup',
        requireCapability(auth, 'metrics:write'),
        validate(RollupBodySchema, async (body, _req, res) => {
            res.json(await metrics.rollup(body.date));
        })
    );

    return router;
}
