/**
 * src/leasing/stageMachine.ts
 *
 * Lead qualification state machine.
 *
 * `advance()` is a pure function: it receives the lead by value plus an event
 * and returns either the next stage with a field patch and a list of side
 * effects for the caller to execute, or a typed InvalidTransition. It never
 * performs I/O, so every path through the funnel can be tested in isolation.
 *
 *   new → gate_question_payslips → gate_question_deposit → gate_question_move_date
 *       → collecting_profile → qualified → scheduling_in_progress → tour_scheduled
 *
 * with gate_failed / no_fit / future_fit as absorbing side states.
 */

import { InvariantViolationError } from '../utils/errors';
import { daysBetween, isIsoDate } from '../utils/time';
import { applyProfileUpdate, missingProfileFields, profileOf } from './profileCollector';
import { describeEvent, type LeadEvent } from './leadEvents';
import type { NoticeTemplate } from './messages';
import { LEAD_STAGES, isTerminalStage } from './types';
import type { Lead, LeadPatch, LeadStage, ProfileField } from './types';

export type GateName = 'payslips' | 'deposit' | 'move_in_date';

export const TRANSITIONS: Record<LeadStage, readonly LeadStage[]> = {
    new: ['gate_question_payslips'],
    gate_question_payslips: ['gate_question_deposit', 'gate_failed'],
    gate_question_deposit: ['gate_question_move_date', 'gate_failed'],
    gate_question_move_date: ['collecting_profile', 'gate_failed'],
    collecting_profile: ['collecting_profile', 'qualified'],
    qualified: ['qualified', 'scheduling_in_progress', 'no_fit', 'future_fit'],
    scheduling_in_progress: ['tour_scheduled', 'qualified'],
    tour_scheduled: [],
    gate_failed: [],
    no_fit: [],
    future_fit: [],
};

const ACTIVE_GATE: Partial<Record<LeadStage, GateName>> = {
    gate_question_payslips: 'payslips',
    gate_question_deposit: 'deposit',
    gate_question_move_date: 'move_in_date',
};

export type SideEffect =
    | { kind: 'ask_gate'; gate: GateName }
    | { kind: 'request_profile'; missing: ProfileField[] }
    | { kind: 'match_units' }
    | { kind: 'present_matches'; unit_ids: number[] }
    | { kind: 'book_tour'; unit_id: number; slot: string; duration_minutes?: number }
    | { kind: 'notify'; template: NoticeTemplate; detail?: string }
    | { kind: 'schedule_nudge' }
    | { kind: 'cancel_nudges' };

export interface Transition {
    ok: true;
    from: LeadStage;
    next: LeadStage;
    patch: LeadPatch;
    effects: SideEffect[];
}

export type InvalidTransitionReason = 'terminal_stage' | 'not_active' | 'malformed';

export interface InvalidTransition {
    ok: false;
    reason: InvalidTransitionReason;
    stage: LeadStage;
    event: string;
    message: string;
}

export type TransitionResult = Transition | InvalidTransition;

export interface StageContext {
    /** Local date (YYYY-MM-DD) the event is evaluated on. */
    today: string;
    maxMoveInDays: number;
}

export function isLeadStage(value: string): value is LeadStage {
    return LEAD_STAGES.some((stage) => stage === value);
}

export function canTransition(from: LeadStage, to: LeadStage): boolean {
    return TRANSITIONS[from].includes(to);
}

function reject(lead: Lead, event: LeadEvent, reason: InvalidTransitionReason, message: string): InvalidTransition {
    return { ok: false, reason, stage: lead.stage, event: describeEvent(event), message };
}

function accept(lead: Lead, next: LeadStage, patch: LeadPatch, effects: SideEffect[]): Transition {
    if (!isLeadStage(next)) {
        throw new InvariantViolationError(`Stage "${String(next)}" is not a lead stage`);
    }
    if (!canTransition(lead.stage, next)) {
        throw new InvariantViolationError(`Illegal transition: ${lead.stage} → ${next} (lead=${lead.id})`);
    }
    return { ok: true, from: lead.stage, next, patch: { ...patch, stage: next }, effects };
}

function failGate(lead: Lead, patch: LeadPatch): Transition {
    return accept(lead, 'gate_failed', patch, [{ kind: 'notify', template: 'gate_failed' }, { kind: 'cancel_nudges' }]);
}

function answerGate(lead: Lead, event: Extract<LeadEvent, { type: 'gate_answer' }>, ctx: StageContext): TransitionResult {
    const active = ACTIVE_GATE[lead.stage];
    if (active !== event.gate) {
        return reject(
            lead,
            event,
            'not_active',
            active ? `Expected an answer for gate "${active}", got "${event.gate}"` : `No gate is active in stage "${lead.stage}"`
        );
    }

    switch (event.gate) {
        case 'payslips': {
            const patch: LeadPatch = { has_payslips: event.answer };
            if (!event.answer) return failGate(lead, patch);
            return accept(lead, 'gate_question_deposit', patch, [
                { kind: 'ask_gate', gate: 'deposit' },
                { kind: 'schedule_nudge' },
            ]);
        }
        case 'deposit': {
            const patch: LeadPatch = { can_pay_deposit: event.answer };
            if (!event.answer) return failGate(lead, patch);
            return accept(lead, 'gate_question_move_date', patch, [
                { kind: 'ask_gate', gate: 'move_in_date' },
                { kind: 'schedule_nudge' },
            ]);
        }
        case 'move_in_date': {
            const date = event.answer.trim();
            if (!isIsoDate(date)) {
                return reject(lead, event, 'malformed', `Move-in date "${event.answer}" is not a YYYY-MM-DD date`);
            }
            const patch: LeadPatch = { move_in_date: date };
            if (daysBetween(ctx.today, date) > ctx.maxMoveInDays) return failGate(lead, patch);
            return accept(lead, 'collecting_profile', patch, [
                { kind: 'request_profile', missing: missingProfileFields(profileOf(lead), lead.skipped_profile_fields) },
                { kind: 'schedule_nudge' },
            ]);
        }
    }
}

function applyMatchResult(lead: Lead, event: Extract<LeadEvent, { type: 'match_result' }>): Transition {
    switch (event.outcome) {
        case 'matched':
            return accept(lead, 'qualified', {}, [
                { kind: 'present_matches', unit_ids: event.unit_ids },
                { kind: 'schedule_nudge' },
            ]);
        case 'no_fit':
            return accept(lead, 'no_fit', {}, [{ kind: 'notify', template: 'no_fit' }, { kind: 'cancel_nudges' }]);
        case 'future_fit':
            return accept(lead, 'future_fit', {}, [
                {
                    kind: 'notify',
                    template: 'future_fit',
                    ...(event.earliest_available_from !== null && { detail: event.earliest_available_from }),
                },
                { kind: 'cancel_nudges' },
            ]);
    }
}

/** Computes the transition for `event` without touching any state. */
export function advance(lead: Lead, event: LeadEvent, ctx: StageContext): TransitionResult {
    if (isTerminalStage(lead.stage)) {
        return reject(lead, event, 'terminal_stage', `Lead is in terminal stage "${lead.stage}"`);
    }

    switch (event.type) {
        case 'start':
            if (lead.stage !== 'new') {
                return reject(lead, event, 'not_active', `Lead already started (stage "${lead.stage}")`);
            }
            return accept(lead, 'gate_question_payslips', {}, [
                { kind: 'ask_gate', gate: 'payslips' },
                { kind: 'schedule_nudge' },
            ]);

        case 'gate_answer':
            return answerGate(lead, event, ctx);

        case 'profile_update': {
            if (lead.stage !== 'collecting_profile') {
                return reject(lead, event, 'not_active', `Profile updates are not accepted in stage "${lead.stage}"`);
            }
            const result = applyProfileUpdate(lead, event.fields, event.skip);
            if (!result.ok) return reject(lead, event, 'malformed', result.message);

            if (result.missing.length === 0) {
                return accept(lead, 'qualified', result.patch, [{ kind: 'match_units' }, { kind: 'schedule_nudge' }]);
            }
            return accept(lead, 'collecting_profile', result.patch, [
                { kind: 'request_profile', missing: result.missing },
                { kind: 'schedule_nudge' },
            ]);
        }

        case 'command':
            if (lead.stage !== 'qualified') {
                return reject(lead, event, 'not_active', `"${event.command}" is only available once qualified`);
            }
            return accept(lead, 'qualified', {}, [{ kind: 'match_units' }]);

        case 'select_unit':
            if (lead.stage !== 'qualified') {
                return reject(lead, event, 'not_active', `Units can only be selected once qualified (stage "${lead.stage}")`);
            }
            return accept(lead, 'scheduling_in_progress', {}, [
                {
                    kind: 'book_tour',
                    unit_id: event.unit_id,
                    slot: event.slot,
                    ...(event.duration_minutes !== undefined && { duration_minutes: event.duration_minutes }),
                },
            ]);

        case 'match_result':
            if (lead.stage !== 'qualified') {
                return reject(lead, event, 'not_active', `Match results only apply to qualified leads`);
            }
            return applyMatchResult(lead, event);

        case 'booking_confirmed':
            if (lead.stage !== 'scheduling_in_progress') {
                return reject(lead, event, 'not_active', `No booking is in progress`);
            }
            return accept(lead, 'tour_scheduled', {}, [
                { kind: 'notify', template: 'tour_confirmed', detail: event.scheduled_time },
                { kind: 'cancel_nudges' },
            ]);

        case 'booking_failed':
            if (lead.stage !== 'scheduling_in_progress') {
                return reject(lead, event, 'not_active', `No booking is in progress`);
            }
            return accept(lead, 'qualified', {}, [{ kind: 'notify', template: 'booking_failed' }, { kind: 'schedule_nudge' }]);
    }
}
