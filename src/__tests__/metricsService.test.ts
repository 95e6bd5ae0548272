import { describe, expect, it } from 'vitest';
import type { MetricsRolledUpEvent } from '../events/eventBus';
import { rate } from '../services/metricsService';
import { createHarness, TEST_NOW, type TestHarness } from './support/testContainer';

describe('rate', () => {
    it('is a percentage rounded to two decimals', () => {
        expect(rate(1, 3)).toBe(33.33);
        expect(rate(2, 3)).toBe(66.67);
        expect(rate(3, 3)).toBe(100);
    });

    it('is zero when the denominator is zero', () => {
        expect(rate(0, 0)).toBe(0);
        expect(rate(5, 0)).toBe(0);
    });
});

/**
 * Local day 2026-07-01 (Asia/Jerusalem) gets two inquiries, one of which
 * qualifies and completes a tour; 2026-06-30 gets one inquiry.
 */
async function seedActivity(h: TestHarness): Promise<void> {
    const { leads, conversations, appointments } = h.store;

    const early = await leads.create({ phone_number: '+972500000001', name: 'A' }, new Date('2026-06-30T22:30:00Z'));
    await leads.create({ phone_number: '+972500000002', name: 'B' }, new Date(TEST_NOW));
    const yesterday = await leads.create({ phone_number: '+972500000003', name: 'C' }, new Date('2026-06-30T20:00:00Z'));

    await conversations.append(
        {
            lead_id: early.id,
            message_type: 'user',
            content: 'profile_update rooms=3',
            metadata: { event: 'profile_update', from_stage: 'collecting_profile', to_stage: 'qualified' },
        },
        new Date(TEST_NOW)
    );
    // re-entering qualified from qualified does not count twice
    await conversations.append(
        {
            lead_id: early.id,
            message_type: 'user',
            content: 'command show_matches',
            metadata: { event: 'command', from_stage: 'qualified', to_stage: 'qualified' },
        },
        new Date(TEST_NOW)
    );

    // a failed booking sends a lead back to qualified; that is not a new qualification
    await conversations.append(
        {
            lead_id: yesterday.id,
            message_type: 'bot',
            content: 'booking_failed calendar_failed',
            metadata: { event: 'booking_failed', from_stage: 'scheduling_in_progress', to_stage: 'qualified' },
        },
        new Date(TEST_NOW)
    );

    const tour = await appointments.create(
        {
            lead_id: early.id,
            unit_id: 1,
            scheduled_time: '2026-07-01T06:00:00.000Z',
            duration_minutes: 30,
            attendee_name: 'A',
            attendee_email: null,
            location: null,
        },
        new Date(TEST_NOW)
    );
    await appointments.update(tour.id, { status: 'completed', updated_at: TEST_NOW });
}

describe('MetricsService', () => {
    it('rolls up a local day', async () => {
        const h = createHarness();
        await seedActivity(h);
        h.clock.advance(60 * 60_000);

        const metric = await h.container.metrics.rollup('2026-07-01');

        expect(metric).toEqual({
            date: '2026-07-01',
            total_inquiries: 2,
            qualified_leads: 1,
            tours_scheduled: 1,
            tours_completed: 1,
            conversion_rate_qualified: 50,
            conversion_rate_tours: 100,
        });
    });

    it('replaces the row when re-run for the same day', async () => {
        const h = createHarness();
        const rolled: MetricsRolledUpEvent[] = [];
        h.container.bus.on('metrics:rolled_up', (e) => rolled.push(e));
        await seedActivity(h);
        h.clock.advance(60 * 60_000);

        const first = await h.container.metrics.rollup();
        const second = await h.container.metrics.rollup();

        expect(second).toEqual(first);
        expect(await h.store.metrics.listBetween('2026-07-01', '2026-07-01')).toEqual([first]);
        expect(rolled).toHaveLength(2);
        expect(rolled[0]).toEqual({ date: '2026-07-01', totalInquiries: 2, qualifiedLeads: 1 });
    });

    it('only counts activity up to now for the current day', async () => {
        const h = createHarness();
        await seedActivity(h);

        // clock still at TEST_NOW: lead B and the qualification happen at the bound itself
        const metric = await h.container.metrics.rollup('2026-07-01');

        expect(metric.total_inquiries).toBe(1);
        expect(metric.qualified_leads).toBe(0);
    });

    it('summarises stored days newest first', async () => {
        const h = createHarness();
        await seedActivity(h);
        h.clock.advance(60 * 60_000);
        await h.container.metrics.rollup('2026-06-30');
        await h.container.metrics.rollup('2026-07-01');

        const summary = await h.container.metrics.summary(7);

        expect(summary.from).toBe('2026-06-25');
        expect(summary.to).toBe('2026-07-01');
        expect(summary.days.map((d) => [d.date, d.total_inquiries])).toEqual([
            ['2026-07-01', 2],
            ['2026-06-30', 1],
        ]);
        expect(summary.totals).toEqual({
            total_inquiries: 3,
            qualified_leads: 1,
            tours_scheduled: 1,
            tours_completed: 1,
            conversion_rate_qualified: 33.33,
            conversion_rate_tours: 100,
        });
    });
});
