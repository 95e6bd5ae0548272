/**
 * src/leasing/leadEvents.ts
 *
 * Structured events that drive a lead through the funnel. Inbound events
 * arrive already classified by the messaging layer; internal events are
 * produced by LeadService after it runs a side effect (matching, booking).
 */

import { z } from 'zod';
import { ProfileFieldSchema, ProfileFieldsSchema } from './profileCollector';

const GateAnswerSchema = z.discriminatedUnion('gate', [
    z.object({ type: z.literal('gate_answer'), gate: z.literal('payslips'), answer: z.boolean() }),
    z.object({ type: z.literal('gate_answer'), gate: z.literal('deposit'), answer: z.boolean() }),
    z.object({ type: z.literal('gate_answer'), gate: z.literal('move_in_date'), answer: z.string().min(1) }),
]);

export const InboundEventSchema = z.union([
    z.object({ type: z.literal('start') }),
    GateAnswerSchema,
    z.object({
        type: z.literal('profile_update'),
        fields: ProfileFieldsSchema.default({}),
        skip: z.array(ProfileFieldSchema).default([]),
    }),
    z.object({ type: z.literal('command'), command: z.literal('show_matches') }),
    z.object({
        type: z.literal('select_unit'),
        unit_id: z.number().int().positive(),
        slot: z.string().datetime({ offset: true }),
        duration_minutes: z.number().int().positive().max(240).optional(),
    }),
]);

export type InboundEvent = z.infer<typeof InboundEventSchema>;

export type InternalEvent =
    | { type: 'match_result'; outcome: 'matched'; unit_ids: number[] }
    | { type: 'match_result'; outcome: 'no_fit'; binding: 'budget' | 'criteria' }
    | { type: 'match_result'; outcome: 'future_fit'; earliest_available_from: string | null }
    // scheduled_time is the local wall-clock rendering shown to the lead
    | { type: 'booking_confirmed'; appointment_id: number; scheduled_time: string }
    | { type: 'booking_failed'; reason: string };

export type LeadEvent = InboundEvent | InternalEvent;

export function isInternalEvent(event: LeadEvent): event is InternalEvent {
    return event.type === 'match_result' || event.type === 'booking_confirmed' || event.type === 'booking_failed';
}

/** One-line rendering of an event for the conversation log. */
export function describeEvent(event: LeadEvent): string {
    switch (event.type) {
        case 'start':
            return 'start';
        case 'gate_answer':
            return `gate_answer ${event.gate}=${String(event.answer)}`;
        case 'profile_update': {
            const fields = Object.entries(event.fields).map(([k, v]) => `${k}=${String(v)}`);
            const skipped = event.skip.map((f) => `${f}=skipped`);
            return `profile_update ${[...fields, ...skipped].join(' ')}`.trim();
        }
        case 'command':
            return `command ${event.command}`;
        case 'select_unit':
            return `select_unit unit=${event.unit_id} slot=${event.slot}`;
        case 'match_result':
            return `match_result ${event.outcome}`;
        case 'booking_confirmed':
            return `booking_confirmed appointment=${event.appointment_id}`;
        case 'booking_failed':
            return `booking_failed ${event.reason}`;
    }
}
