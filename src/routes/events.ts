/**
 * src/routes/events.ts
 *
 * POST /events — one classified inbound message for a lead.
 * An invalid transition is an expected outcome and answers 409 with the
 * lead's unchanged stage; the lead is not modified.
 */

import { Router } from 'express';
import { z } from 'zod';
import type { Container } from '../container';
import { InboundEventSchema } from '../leasing/leadEvents';
import { requireCapability } from '../middleware/capability';
import { validate } from '../middleware/validate';
import { logger } from '../utils/logger';

const EventBodySchema = z.object({
    phone: z
        .string()
        .trim()
        .regex(/^\+?[0-9]{7,15}$/, 'phone must be 7-15 digits with an optional leading +'),
    name: z.string().trim().max(120).optional(),
    email: z.string().trim().email().optional(),
    source: z.string().trim().min(1).max(40).optional(),
    event: InboundEventSchema,
});

export function eventsRouter(container: Container): Router {
    const router = Router();

    router.post(
        '/',
        requireCapability(container.auth, 'events:ingest'),
        validate(EventBodySchema, async (body, _req, res) => {
            logger.info('POST /events', `phone=${body.phone} | event=${body.event.type}`);

            const result = await container.leads.handleInbound(body);

            if (!result.ok) {
                res.status(409).json({
                    error: 'invalid_transition',
                    reason: result.reason,
                    stage: result.stage,
                    message: result.message,
                    lead_id: result.lead_id,
                });
                return;
            }

            res.json({
                lead_id: result.lead_id,
                stage: result.stage,
                replies: result.replies,
                ...(result.appointment_id !== undefined && { appointment_id: result.appointment_id }),
                ...(result.undelivered && { undelivered: result.undelivered }),
            });
        })
    );

    return router;
}
