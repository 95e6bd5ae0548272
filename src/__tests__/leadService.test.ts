import { describe, expect, it } from 'vitest';
import type { InboundEvent } from '../leasing/leadEvents';
import type { ProfileField } from '../leasing/types';
import type { InboundRequest, InboundResult } from '../services/leadService';
import { LockBusyError } from '../utils/errors';
import { createHarness, type TestHarness } from './support/testContainer';

const PHONE = '+972501234567';
const SKIP_REST: ProfileField[] = [
    'has_parking',
    'preferred_area',
    'preferred_floor_min',
    'preferred_floor_max',
    'needs_furnished',
    'pet_owner',
];

const GREETING =
    'Hi Dana! Thanks for reaching out. A few quick questions first.\n' +
    'Do you have your three most recent payslips available? (yes/no)';

function send(h: TestHarness, event: InboundEvent, extra: Partial<InboundRequest> = {}): Promise<InboundResult> {
    return h.container.leads.handleInbound({ phone: PHONE, name: 'Dana', ...extra, event });
}

async function qualify(h: TestHarness, profile: { rooms: number; budget: number }, moveIn = '2026-07-10') {
    await send(h, { type: 'start' });
    await send(h, { type: 'gate_answer', gate: 'payslips', answer: true });
    await send(h, { type: 'gate_answer', gate: 'deposit', answer: true });
    await send(h, { type: 'gate_answer', gate: 'move_in_date', answer: moveIn });
    return send(h, { type: 'profile_update', fields: profile, skip: SKIP_REST });
}

describe('LeadService.handleInbound', () => {
    it('creates the lead on first contact and asks the first gate question', async () => {
        const h = createHarness();

        const result = await send(h, { type: 'start' }, { source: 'facebook' });

        expect(result).toEqual({ ok: true, lead_id: 1, stage: 'gate_question_payslips', replies: [GREETING] });
        expect(await h.store.leads.findByPhone(PHONE)).toMatchObject({ name: 'Dana', source: 'facebook' });
        expect(h.sink.messages).toEqual([{ phone: PHONE, content: GREETING, idempotency_key: 'reply:2' }]);

        const log = await h.store.conversations.listForLead(1, 10);
        expect(log.map((m) => [m.message_type, m.content, m.metadata])).toEqual([
            ['user', 'start', { event: 'start', from_stage: 'new', to_stage: 'gate_question_payslips' }],
            ['bot', GREETING, null],
        ]);
    });

    it('retries a reply the sink could not deliver for now', async () => {
        const h = createHarness();
        h.sink.script({ status: 'transient_failure', error: 'rate limited' });

        const result = await send(h, { type: 'start' });

        expect(result).toEqual({ ok: true, lead_id: 1, stage: 'gate_question_payslips', replies: [GREETING] });
        expect(h.sink.messages).toEqual([
            { phone: PHONE, content: GREETING, idempotency_key: 'reply:2' },
            { phone: PHONE, content: GREETING, idempotency_key: 'reply:2' },
        ]);
    });

    it('records a reply that stays undelivered and reports it', async () => {
        const h = createHarness({ followupMaxAttempts: 2 });
        h.sink.script(
            { status: 'transient_failure', error: 'rate limited' },
            { status: 'transient_failure', error: 'rate limited' }
        );

        const result = await send(h, { type: 'start' });

        expect(result).toEqual({
            ok: true,
            lead_id: 1,
            stage: 'gate_question_payslips',
            replies: [GREETING],
            undelivered: [GREETING],
        });
        expect(h.sink.messages).toHaveLength(2);

        const log = await h.store.conversations.listForLead(1, 10);
        expect(log.map((m) => [m.message_type, m.content, m.metadata])).toEqual([
            ['user', 'start', { event: 'start', from_stage: 'new', to_stage: 'gate_question_payslips' }],
            ['bot', GREETING, null],
            [
                'bot',
                'Reply 2 not delivered',
                { delivery: 'transient_failure', reply_id: 2, attempts: 2, error: 'rate limited' },
            ],
        ]);
    });

    it('does not retry a permanent delivery failure', async () => {
        const h = createHarness();
        h.sink.script({ status: 'permanent_failure', error: 'unreachable number' });

        const result = await send(h, { type: 'start' });

        expect(result.ok && result.undelivered).toEqual([GREETING]);
        expect(h.sink.messages).toHaveLength(1);
    });

    it('greets a lead without a name', async () => {
        const h = createHarness();

        const result = await send(h, { type: 'start' }, { name: undefined });

        expect(result.ok && result.replies[0]).toBe(
            'Hi! Thanks for reaching out. A few quick questions first.\n' +
                'Do you have your three most recent payslips available? (yes/no)'
        );
    });

    it('runs a lead from first contact to a booked tour', async () => {
        const h = createHarness();

        await send(h, { type: 'start' });
        const deposit = await send(h, { type: 'gate_answer', gate: 'payslips', answer: true });
        expect(deposit.ok && deposit.replies).toEqual(['Are you able to pay a security deposit of two months’ rent? (yes/no)']);

        await send(h, { type: 'gate_answer', gate: 'deposit', answer: true });
        const profile = await send(h, { type: 'gate_answer', gate: 'move_in_date', answer: '2026-07-10' });
        expect(profile).toEqual({
            ok: true,
            lead_id: 1,
            stage: 'collecting_profile',
            replies: ['How many rooms are you looking for?'],
        });

        const matches = await send(h, { type: 'profile_update', fields: { rooms: 2, budget: 8000 }, skip: SKIP_REST });
        expect(matches.ok && matches.stage).toBe('qualified');
        expect(matches.ok && matches.replies).toEqual([
            'Here are the apartments that fit what you are looking for:\n' +
                '1. Dizengoff Residences A1: 3 rooms, 7,500/month (floor 2, parking, from 2026-07-01)\n' +
                '2. Dizengoff Residences B1: 2 rooms, 6,200/month (floor 1, from 2026-07-01)\n' +
                'Reply with the one you would like to tour.',
        ]);

        const booked = await send(h, { type: 'select_unit', unit_id: 1, slot: '2026-07-05T11:00:00+03:00' });
        expect(booked).toEqual({
            ok: true,
            lead_id: 1,
            stage: 'tour_scheduled',
            replies: ['Your tour is booked for 2026-07-05 11:00. We will send you reminders before the visit.'],
            appointment_id: 1,
        });

        expect(await h.store.followups.list({ leadId: 1, messageType: 'abandoned_lead_nudge', status: 'pending' })).toEqual(
            []
        );
        expect(await h.store.followups.list({ appointmentId: 1, status: 'pending' })).toHaveLength(3);
        expect(h.sink.messages).toHaveLength(6);
    });

    it('answers show_matches again once qualified', async () => {
        const h = createHarness();
        await qualify(h, { rooms: 2, budget: 6500 });

        const result = await send(h, { type: 'command', command: 'show_matches' });

        expect(result.ok && result.stage).toBe('qualified');
        expect(result.ok && result.replies).toEqual([
            'Here are the apartments that fit what you are looking for:\n' +
                '1. Dizengoff Residences B1: 2 rooms, 6,200/month (floor 1, from 2026-07-01)\n' +
                'Reply with the one you would like to tour.',
        ]);
    });

    it('returns a typed rejection and leaves the lead untouched', async () => {
        const h = createHarness();
        await send(h, { type: 'start' });

        const result = await send(h, { type: 'profile_update', fields: { rooms: 2 }, skip: [] });

        expect(result).toEqual({
            ok: false,
            lead_id: 1,
            stage: 'gate_question_payslips',
            reason: 'not_active',
            message: 'Profile updates are not accepted in stage "gate_question_payslips"',
        });
        expect((await h.store.leads.findById(1))?.rooms).toBeNull();
        expect(h.sink.messages).toHaveLength(1);

        const log = await h.store.conversations.listForLead(1, 10);
        expect(log[log.length - 1].metadata).toEqual({
            event: 'profile_update',
            rejected: 'not_active',
            stage: 'gate_question_payslips',
        });
    });

    it('ends the funnel on a failed gate and drops the nudge', async () => {
        const h = createHarness();
        await send(h, { type: 'start' });

        const result = await send(h, { type: 'gate_answer', gate: 'payslips', answer: false });

        expect(result).toEqual({
            ok: true,
            lead_id: 1,
            stage: 'gate_failed',
            replies: ['Thank you for your answers. Unfortunately we cannot move forward with your application at this time.'],
        });
        expect(await h.store.followups.list({ leadId: 1, status: 'pending' })).toEqual([]);

        const again = await send(h, { type: 'start' });
        expect(!again.ok && again.reason).toBe('terminal_stage');
    });

    it('moves a lead with no affordable unit to no_fit', async () => {
        const h = createHarness();

        const result = await qualify(h, { rooms: 2, budget: 6000 });

        expect(result.ok && result.stage).toBe('no_fit');
        expect(result.ok && result.replies).toEqual([
            'We currently have no apartments that match your budget and requirements. We will let you know when something opens up.',
        ]);
    });

    it('moves a lead whose units free up later to future_fit', async () => {
        const h = createHarness();

        const result = await qualify(h, { rooms: 4, budget: 10000 }, '2026-07-05');

        expect(result.ok && result.stage).toBe('future_fit');
        expect(result.ok && result.replies).toEqual([
            'Apartments matching your needs become available from 2026-07-08. We will contact you closer to that date.',
        ]);
    });

    it('returns the lead to qualified when the calendar refuses the booking', async () => {
        const h = createHarness();
        await qualify(h, { rooms: 2, budget: 8000 });
        h.calendar.mode = 'fail';

        const result = await send(h, { type: 'select_unit', unit_id: 1, slot: '2026-07-05T11:00:00+03:00' });

        expect(result).toEqual({
            ok: true,
            lead_id: 1,
            stage: 'qualified',
            replies: ['We could not book that tour slot. Please pick another unit or time.'],
        });
        expect(await h.store.appointments.findActiveForLead(1)).toBeNull();
    });

    it('gives up when another request holds the lead', async () => {
        const h = createHarness({ lockWaitMs: 0 });
        await h.locks.tryAcquire(`lead:${PHONE}`, 15);

        await expect(send(h, { type: 'start' })).rejects.toBeInstanceOf(LockBusyError);
        expect(await h.store.leads.findByPhone(PHONE)).toBeNull();
    });
});
