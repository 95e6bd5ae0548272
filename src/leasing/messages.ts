/**
 * src/leasing/messages.ts
 *
 * Outbound message copy. Kept in one place so wording changes never touch
 * flow logic.
 */

import type { GateName } from './stageMachine';
import type { FollowupMessageType, Lead, ProfileField, UnitWithProperty } from './types';

const GATE_QUESTIONS: Record<GateName, string> = {
    payslips: 'Do you have your three most recent payslips available? (yes/no)',
    deposit: 'Are you able to pay a security deposit of two months’ rent? (yes/no)',
    move_in_date: 'When would you like to move in? Please reply with a date (YYYY-MM-DD).',
};

const PROFILE_QUESTIONS: Record<ProfileField, string> = {
    rooms: 'How many rooms are you looking for?',
    budget: 'What is your monthly budget?',
    has_parking: 'Do you need a parking spot?',
    preferred_area: 'Which area or project are you interested in?',
    preferred_floor_min: 'What is the lowest floor you would consider?',
    preferred_floor_max: 'What is the highest floor you would consider?',
    needs_furnished: 'Do you need the apartment furnished?',
    pet_owner: 'Will any pets be living with you?',
};

export type NoticeTemplate =
    | 'gate_failed'
    | 'no_fit'
    | 'future_fit'
    | 'tour_confirmed'
    | 'booking_failed';

// leads that arrive without a profile name are stored with an empty one
function named(prefix: string, name: string): string {
    return name.trim() ? `${prefix} ${name.trim()}` : prefix;
}

function addressed(name: string): string {
    return name.trim() ? `, ${name.trim()}` : '';
}

export function gateQuestion(gate: GateName, lead: Pick<Lead, 'name'>): string {
    if (gate === 'payslips') {
        return `${named('Hi', lead.name)}! Thanks for reaching out. A few quick questions first.\n${GATE_QUESTIONS.payslips}`;
    }
    return GATE_QUESTIONS[gate];
}

export function profileQuestion(field: ProfileField): string {
    return PROFILE_QUESTIONS[field];
}

export function formatUnit(unit: UnitWithProperty): string {
    const extras = [
        unit.floor !== null ? `floor ${unit.floor}` : null,
        unit.has_parking ? 'parking' : null,
        unit.furnished ? 'furnished' : null,
        unit.available_from ? `from ${unit.available_from}` : 'available now',
    ].filter((part): part is string => part !== null);

    return `${unit.property.name} ${unit.unit_number}: ${unit.rooms} rooms, ${unit.price.toLocaleString('en-US')}/month (${extras.join(', ')})`;
}

export function matchesMessage(units: readonly UnitWithProperty[]): string {
    const lines = units.map((unit, i) => `${i + 1}. ${formatUnit(unit)}`);
    return ['Here are the apartments that fit what you are looking for:', ...lines, 'Reply with the one you would like to tour.'].join(
        '\n'
    );
}

export function noticeMessage(template: NoticeTemplate, detail?: string): string {
    switch (template) {
        case 'gate_failed':
            return 'Thank you for your answers. Unfortunately we cannot move forward with your application at this time.';
        case 'no_fit':
            return 'We currently have no apartments that match your budget and requirements. We will let you know when something opens up.';
        case 'future_fit':
            return detail
                ? `Apartments matching your needs become available from ${detail}. We will contact you closer to that date.`
                : 'Apartments matching your needs become available later than your move-in date. We will contact you closer to that time.';
        case 'tour_confirmed':
            return detail ? `Your tour is booked for ${detail}. We will send you reminders before the visit.` : 'Your tour is booked.';
        case 'booking_failed':
            return 'We could not book that tour slot. Please pick another unit or time.';
    }
}

export function followupMessage(type: FollowupMessageType, lead: Pick<Lead, 'name' | 'rooms' | 'budget'>, when?: string): string {
    switch (type) {
        case 'evening_before_reminder':
            return `${named('Hi', lead.name)}! Just a reminder that your apartment tour is tomorrow at ${when ?? 'the scheduled time'}.`;
        case 'morning_of_reminder':
            return `${named('Good morning', lead.name)}! Your apartment tour is today at ${when ?? 'the scheduled time'}.`;
        case 'three_hours_before_reminder':
            return `See you soon! Your tour starts in 3 hours, at ${when ?? 'the scheduled time'}.`;
        case 'abandoned_lead_nudge':
            return lead.rooms !== null && lead.budget !== null
                ? `${named('Hi', lead.name)}, we started looking for a ${lead.rooms}-room apartment within ${lead.budget.toLocaleString('en-US')}/month for you. Want to pick up where we left off?`
                : `${named('Hi', lead.name)}, we started looking for an apartment for you. Want to pick up where we left off?`;
        case 'follow_up_after_tour':
            return `Thanks for visiting today${addressed(lead.name)}! Would you like to move forward with an application?`;
        case 'no_show_follow_up':
            return `We missed you at the tour${addressed(lead.name)}. Would you like to book another time?`;
    }
}
