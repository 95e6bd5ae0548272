import { describe, expect, it } from 'vitest';
import { advance, canTransition, TRANSITIONS, type StageContext } from '../leasing/stageMachine';
import { LEAD_STAGES, TERMINAL_STAGES } from '../leasing/types';
import { makeLead, TEST_TODAY } from './support/testContainer';

const ctx: StageContext = { today: TEST_TODAY, maxMoveInDays: 60 };

describe('advance', () => {
    it('starts a new lead at the payslips gate', () => {
        const result = advance(makeLead(), { type: 'start' }, ctx);

        expect(result).toEqual({
            ok: true,
            from: 'new',
            next: 'gate_question_payslips',
            patch: { stage: 'gate_question_payslips' },
            effects: [{ kind: 'ask_gate', gate: 'payslips' }, { kind: 'schedule_nudge' }],
        });
    });

    it('refuses a second start', () => {
        const result = advance(makeLead({ stage: 'gate_question_deposit' }), { type: 'start' }, ctx);

        expect(result).toEqual({
            ok: false,
            reason: 'not_active',
            stage: 'gate_question_deposit',
            event: 'start',
            message: 'Lead already started (stage "gate_question_deposit")',
        });
    });

    it('walks through the three gates', () => {
        const payslips = advance(
            makeLead({ stage: 'gate_question_payslips' }),
            { type: 'gate_answer', gate: 'payslips', answer: true },
            ctx
        );
        expect(payslips.ok && payslips.next).toBe('gate_question_deposit');
        expect(payslips.ok && payslips.patch).toEqual({ has_payslips: true, stage: 'gate_question_deposit' });

        const deposit = advance(
            makeLead({ stage: 'gate_question_deposit' }),
            { type: 'gate_answer', gate: 'deposit', answer: true },
            ctx
        );
        expect(deposit.ok && deposit.next).toBe('gate_question_move_date');

        const moveIn = advance(
            makeLead({ stage: 'gate_question_move_date' }),
            { type: 'gate_answer', gate: 'move_in_date', answer: '2026-07-10' },
            ctx
        );
        expect(moveIn.ok && moveIn.next).toBe('collecting_profile');
        expect(moveIn.ok && moveIn.effects[0]).toEqual({
            kind: 'request_profile',
            missing: [
                'rooms',
                'budget',
                'has_parking',
                'preferred_area',
                'preferred_floor_min',
                'preferred_floor_max',
                'needs_furnished',
                'pet_owner',
            ],
        });
    });

    it('fails the funnel on a negative gate answer', () => {
        const result = advance(
            makeLead({ stage: 'gate_question_deposit' }),
            { type: 'gate_answer', gate: 'deposit', answer: false },
            ctx
        );

        expect(result.ok && result.next).toBe('gate_failed');
        expect(result.ok && result.effects).toEqual([
            { kind: 'notify', template: 'gate_failed' },
            { kind: 'cancel_nudges' },
        ]);
    });

    it('rejects an answer for a gate that is not active', () => {
        const result = advance(
            makeLead({ stage: 'gate_question_payslips' }),
            { type: 'gate_answer', gate: 'deposit', answer: true },
            ctx
        );

        expect(result.ok).toBe(false);
        expect(!result.ok && result.message).toBe('Expected an answer for gate "payslips", got "deposit"');
    });

    it('accepts a move-in date exactly MAX_MOVE_IN_DAYS away and fails one beyond', () => {
        const lead = makeLead({ stage: 'gate_question_move_date' });

        const edge = advance(lead, { type: 'gate_answer', gate: 'move_in_date', answer: '2026-08-30' }, ctx);
        expect(edge.ok && edge.next).toBe('collecting_profile');

        const late = advance(lead, { type: 'gate_answer', gate: 'move_in_date', answer: '2026-08-31' }, ctx);
        expect(late.ok && late.next).toBe('gate_failed');
        expect(late.ok && late.patch).toEqual({ move_in_date: '2026-08-31', stage: 'gate_failed' });
    });

    it('rejects a malformed move-in date without touching the lead', () => {
        const result = advance(
            makeLead({ stage: 'gate_question_move_date' }),
            { type: 'gate_answer', gate: 'move_in_date', answer: '2026-02-30' },
            ctx
        );

        expect(result).toEqual({
            ok: false,
            reason: 'malformed',
            stage: 'gate_question_move_date',
            event: 'gate_answer move_in_date=2026-02-30',
            message: 'Move-in date "2026-02-30" is not a YYYY-MM-DD date',
        });
    });

    it('stays in collecting_profile until every field is answered or skipped', () => {
        const lead = makeLead({ stage: 'collecting_profile' });

        const partial = advance(lead, { type: 'profile_update', fields: { rooms: 3 }, skip: [] }, ctx);
        expect(partial.ok && partial.next).toBe('collecting_profile');
        expect(partial.ok && partial.effects[0]).toEqual({
            kind: 'request_profile',
            missing: [
                'budget',
                'has_parking',
                'preferred_area',
                'preferred_floor_min',
                'preferred_floor_max',
                'needs_furnished',
                'pet_owner',
            ],
        });

        const complete = advance(
            lead,
            {
                type: 'profile_update',
                fields: { rooms: 3, budget: 8000 },
                skip: ['has_parking', 'preferred_area', 'preferred_floor_min', 'preferred_floor_max', 'needs_furnished', 'pet_owner'],
            },
            ctx
        );
        expect(complete.ok && complete.next).toBe('qualified');
        expect(complete.ok && complete.effects).toEqual([{ kind: 'match_units' }, { kind: 'schedule_nudge' }]);
    });

    it('maps match results to qualified, no_fit and future_fit', () => {
        const lead = makeLead({ stage: 'qualified' });

        const matched = advance(lead, { type: 'match_result', outcome: 'matched', unit_ids: [3, 1] }, ctx);
        expect(matched.ok && matched.next).toBe('qualified');
        expect(matched.ok && matched.effects[0]).toEqual({ kind: 'present_matches', unit_ids: [3, 1] });

        const noFit = advance(lead, { type: 'match_result', outcome: 'no_fit', binding: 'budget' }, ctx);
        expect(noFit.ok && noFit.next).toBe('no_fit');

        const later = advance(
            lead,
            { type: 'match_result', outcome: 'future_fit', earliest_available_from: '2026-07-15' },
            ctx
        );
        expect(later.ok && later.effects[0]).toEqual({ kind: 'notify', template: 'future_fit', detail: '2026-07-15' });
    });

    it('books a tour from qualified and returns to qualified when booking fails', () => {
        const select = advance(
            makeLead({ stage: 'qualified' }),
            { type: 'select_unit', unit_id: 3, slot: '2026-07-05T11:00:00+03:00' },
            ctx
        );
        expect(select.ok && select.next).toBe('scheduling_in_progress');
        expect(select.ok && select.effects).toEqual([
            { kind: 'book_tour', unit_id: 3, slot: '2026-07-05T11:00:00+03:00' },
        ]);

        const failed = advance(
            makeLead({ stage: 'scheduling_in_progress' }),
            { type: 'booking_failed', reason: 'calendar_timeout' },
            ctx
        );
        expect(failed.ok && failed.next).toBe('qualified');

        const confirmed = advance(
            makeLead({ stage: 'scheduling_in_progress' }),
            { type: 'booking_confirmed', appointment_id: 7, scheduled_time: '2026-07-05 11:00' },
            ctx
        );
        expect(confirmed.ok && confirmed.next).toBe('tour_scheduled');
    });

    it('refuses every event once a lead is terminal', () => {
        for (const stage of TERMINAL_STAGES) {
            const result = advance(makeLead({ stage }), { type: 'command', command: 'show_matches' }, ctx);
            expect(result.ok).toBe(false);
            expect(!result.ok && result.reason).toBe('terminal_stage');
        }
    });
});

describe('transition table', () => {
    it('has no outgoing edges from terminal stages', () => {
        for (const stage of TERMINAL_STAGES) expect(TRANSITIONS[stage]).toEqual([]);
    });

    it('covers every stage', () => {
        expect(Object.keys(TRANSITIONS).sort()).toEqual([...LEAD_STAGES].sort());
    });

    it('does not allow skipping gates', () => {
        expect(canTransition('new', 'collecting_profile')).toBe(false);
        expect(canTransition('gate_question_payslips', 'gate_question_move_date')).toBe(false);
        expect(canTransition('qualified', 'tour_scheduled')).toBe(false);
    });
});
