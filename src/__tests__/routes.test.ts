import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { createHarness, TEST_KEYS, type TestHarness } from './support/testContainer';

const PHONE = '+972501234567';
const ADMIN = { 'x-api-key': TEST_KEYS.adminKey };
const INGEST = { 'x-api-key': TEST_KEYS.ingestKey };

function setup(): { h: TestHarness; app: ReturnType<typeof createApp> } {
    const h = createHarness();
    return { h, app: createApp(h.container) };
}

async function bookTour(h: TestHarness): Promise<number> {
    const lead = await h.store.leads.create({ phone_number: PHONE, name: 'Dana' }, h.clock.now());
    const appointment = await h.container.appointments.propose({
        lead,
        unitId: 1,
        slot: '2026-07-05T11:00:00+03:00',
    });
    return appointment.id;
}

describe('GET /health', () => {
    it('reports the store and worker state', async () => {
        const { app } = setup();

        const res = await request(app).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
        expect(res.body.checks).toEqual({ database: 'ok', redis: 'skipped' });
        expect(res.body.workers.followups.running).toBe(false);
    });
});

describe('POST /events', () => {
    it('requires an API key', async () => {
        const { app } = setup();

        const res = await request(app).post('/events').send({ phone: PHONE, event: { type: 'start' } });

        expect(res.status).toBe(401);
        expect(res.body).toEqual({ error: 'Missing x-api-key header' });
    });

    it('rejects an unknown API key', async () => {
        const { app } = setup();

        const res = await request(app)
            .post('/events')
            .set('x-api-key', 'not-a-key')
            .send({ phone: PHONE, event: { type: 'start' } });

        expect(res.status).toBe(403);
        expect(res.body).toEqual({ error: 'API key lacks capability "events:ingest"' });
    });

    it('validates the body', async () => {
        const { app } = setup();

        const res = await request(app).post('/events').set(INGEST).send({ phone: 'abc', event: { type: 'start' } });

        expect(res.status).toBe(400);
        expect(res.body.error).toBe('Validation failed');
        expect(res.body.details).toEqual([
            { field: 'phone', message: 'phone must be 7-15 digits with an optional leading +' },
        ]);
    });

    it('advances the lead and returns its replies', async () => {
        const { app } = setup();

        const res = await request(app).post('/events').set(INGEST).send({ phone: PHONE, name: 'Dana', event: { type: 'start' } });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            lead_id: 1,
            stage: 'gate_question_payslips',
            replies: [
                'Hi Dana! Thanks for reaching out. A few quick questions first.\n' +
                    'Do you have your three most recent payslips available? (yes/no)',
            ],
        });
    });

    it('answers 409 for an invalid transition', async () => {
        const { app } = setup();
        await request(app).post('/events').set(INGEST).send({ phone: PHONE, event: { type: 'start' } });

        const res = await request(app)
            .post('/events')
            .set(INGEST)
            .send({ phone: PHONE, event: { type: 'gate_answer', gate: 'deposit', answer: true } });

        expect(res.status).toBe(409);
        expect(res.body).toEqual({
            error: 'invalid_transition',
            reason: 'not_active',
            stage: 'gate_question_payslips',
            message: 'Expected an answer for gate "payslips", got "deposit"',
            lead_id: 1,
        });
    });

    it('answers 429 while the lead is locked', async () => {
        const h = createHarness({ lockWaitMs: 0 });
        await h.locks.tryAcquire(`lead:${PHONE}`, 15);

        const res = await request(createApp(h.container)).post('/events').set(INGEST).send({ phone: PHONE, event: { type: 'start' } });

        expect(res.status).toBe(429);
    });
});

describe('/appointments', () => {
    it('is closed to the ingest key', async () => {
        const { app } = setup();

        const res = await request(app).post('/appointments/1/cancel').set(INGEST);

        expect(res.status).toBe(403);
    });

    it('cancels an appointment', async () => {
        const { h, app } = setup();
        const id = await bookTour(h);

        const res = await request(app).post(`/appointments/${id}/cancel`).set(ADMIN);

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('canceled');
        expect(h.calendar.canceled).toEqual(['evt-1']);
    });

    it('answers 404 for an unknown appointment and 400 for a malformed id', async () => {
        const { app } = setup();

        const missing = await request(app).post('/appointments/99/cancel').set(ADMIN);
        expect(missing.status).toBe(404);
        expect(missing.body).toEqual({ error: 'Appointment 99 not found' });

        const malformed = await request(app).post('/appointments/abc/cancel').set(ADMIN);
        expect(malformed.status).toBe(400);
        expect(malformed.body.error).toBe('Validation failed');
    });

    it('records an outcome and refuses to cancel afterwards', async () => {
        const { h, app } = setup();
        const id = await bookTour(h);

        const outcome = await request(app).post(`/appointments/${id}/outcome`).set(ADMIN).send({ outcome: 'completed' });
        expect(outcome.status).toBe(200);
        expect(outcome.body.status).toBe('completed');

        const cancel = await request(app).post(`/appointments/${id}/cancel`).set(ADMIN);
        expect(cancel.status).toBe(409);
        expect(cancel.body).toEqual({ error: `Appointment ${id} is already completed`, code: 'not_active' });
    });

    it('reschedules an appointment', async () => {
        const { h, app } = setup();
        const id = await bookTour(h);

        const res = await request(app)
            .post(`/appointments/${id}/reschedule`)
            .set(ADMIN)
            .send({ slot: '2026-07-06T10:00:00+03:00', duration_minutes: 45 });

        expect(res.status).toBe(200);
        expect(res.body.scheduled_time).toBe('2026-07-06T07:00:00.000Z');
        expect(res.body.duration_minutes).toBe(45);
    });
});

describe('POST /webhooks/calendar', () => {
    it('requires the shared secret', async () => {
        const { app } = setup();

        const res = await request(app)
            .post('/webhooks/calendar')
            .set('x-webhook-secret', 'wrong-secret')
            .send({ kind: 'completed', external_event_id: 'evt-1' });

        expect(res.status).toBe(401);
        expect(res.body).toEqual({ error: 'Invalid webhook secret' });
    });

    it('is unavailable until a secret is configured', async () => {
        const h = createHarness();
        const app = createApp({ ...h.container, auth: { adminKey: TEST_KEYS.adminKey } });

        const res = await request(app).post('/webhooks/calendar').send({ kind: 'completed', external_event_id: 'evt-1' });

        expect(res.status).toBe(503);
    });

    it('applies a notification for a known event', async () => {
        const { h, app } = setup();
        const id = await bookTour(h);

        const res = await request(app)
            .post('/webhooks/calendar')
            .set('x-webhook-secret', TEST_KEYS.webhookSecret)
            .send({ kind: 'no_show', external_event_id: 'evt-1' });

        expect(res.status).toBe(202);
        expect(res.body).toEqual({ accepted: true, appointment_id: id, status: 'no_show' });
    });

    it('acknowledges an unknown event', async () => {
        const { app } = setup();

        const res = await request(app)
            .post('/webhooks/calendar')
            .set('x-webhook-secret', TEST_KEYS.webhookSecret)
            .send({ kind: 'canceled', external_event_id: 'evt-404' });

        expect(res.status).toBe(202);
        expect(res.body).toEqual({ accepted: true, appointment_id: null, status: null });
    });
});

describe('/metrics', () => {
    it('rolls up and summarises', async () => {
        const { app } = setup();
        await request(app).post('/events').set(INGEST).send({ phone: PHONE, event: { type: 'start' } });

        const rollup = await request(app).post('/metrics/rollup').set(ADMIN).send({ date: '2026-06-30' });
        expect(rollup.status).toBe(200);
        expect(rollup.body).toEqual({
            date: '2026-06-30',
            total_inquiries: 0,
            qualified_leads: 0,
            tours_scheduled: 0,
            tours_completed: 0,
            conversion_rate_qualified: 0,
            conversion_rate_tours: 0,
        });

        const summary = await request(app).get('/metrics?days=3').set(ADMIN);
        expect(summary.status).toBe(200);
        expect(summary.body.from).toBe('2026-06-29');
        expect(summary.body.to).toBe('2026-07-01');
        expect(summary.body.days).toHaveLength(1);
    });

    it('validates the query and the date', async () => {
        const { app } = setup();

        expect((await request(app).get('/metrics?days=0').set(ADMIN)).status).toBe(400);
        expect((await request(app).get('/metrics?days=91').set(ADMIN)).status).toBe(400);
        expect((await request(app).post('/metrics/rollup').set(ADMIN).send({ date: '2026-02-30' })).status).toBe(400);
    });

    it('is closed to the ingest key', async () => {
        const { app } = setup();

        expect((await request(app).get('/metrics').set(INGEST)).status).toBe(403);
    });
});

it('answers 404 for unknown routes', async () => {
    const { app } = setup();

    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Route not found' });
});
