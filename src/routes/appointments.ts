import { Router } from 'express';
import { z } from 'zod';
import type { Container } from '../container';
import { requireCapability } from '../middleware/capability';
import { validate } from '../middleware/validate';
import { asyncHandler } from '../utils/asyncHandler';

const IdParamSchema = z.coerce.number().int().positive();

const RescheduleBodySchema = z.object({
    slot: z.string().datetime({ offset: true }),
    duration_minutes: z.number().int().positive().max(240).optional(),
});

const OutcomeBodySchema = z.object({
    outcome: z.enum(['completed', 'no_show']),
});

export function appointmentsRouter(container: Container): Router {
    const router = Router();
    const { appointments } = container;

    router.use(requireCapability(container.auth, 'appointments:write'));

    router.post(
        '/:id/cancel',
        asyncHandler<{ id: string }>(async (req, res) => {
            const id = IdParamSchema.parse(req.params.id);
            res.json(await appointments.cancel(id));
        })
    );

    router.post(
        '/:id/reschedule',
        validate(RescheduleBodySchema, async (body, req, res) => {
            const id = IdParamSchema.parse(req.params.id);
            res.json(await appointments.reschedule(id, body.slot, body.duration_minutes));
        })
    );

    router.post(
        '/:id/outcome',
        validate(OutcomeBodySchema, async (body, req, res) => {
            const id = IdParamSchema.parse(req.params.id);
            res.json(await appointments.recordOutcome(id, body.outcome));
        })
    );

    return router;
}
