import { Router } from 'express';
import { z } from 'zod';
import type { Container } from '../container';
import { requireWebhookSecret } from '../middleware/capability';
import { validate } from '../middleware/validate';

const CalendarNotificationSchema = z.object({
    kind: z.enum(['completed', 'no_show', 'canceled']),
    external_event_id: z.string().min(1),
});

export function webhooksRouter(container: Container): Router {
    const router = Router();

    // unknown event ids are acknowledged too, so the calendar stops retrying
    router.post(
        '/calendar',
        requireWebhookSecret(container.auth),
        validate(CalendarNotificationSchema, async (body, _req, res) => {
            const appointment = await container.appointments.handleCalendarNotification(body);
            res.status(202).json({
                accepted: true,
                appointment_id: appointment?.id ?? null,
                status: appointment?.status ?? null,
            });
        })
    );

    return router;
}
