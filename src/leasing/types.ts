/**
 * src/leasing/types.ts
 *
 * Domain records and closed enumerations for the leasing funnel.
 *
 * Field names mirror the column names in db/schema.sql so rows can be read
 * straight into these shapes after validation (see db/rows.ts).
 */

export const LEAD_STAGES = [
    'new',
    'gate_question_payslips',
    'gate_question_deposit',
    'gate_question_move_date',
    'collecting_profile',
    'qualified',
    'scheduling_in_progress',
    'tour_scheduled',
    'gate_failed',
    'no_fit',
    'future_fit',
] as const;

export type LeadStage = (typeof LEAD_STAGES)[number];

export const TERMINAL_STAGES: ReadonlySet<LeadStage> = new Set<LeadStage>([
    'gate_failed',
    'no_fit',
    'future_fit',
    'tour_scheduled',
]);

export function isTerminalStage(stage: LeadStage): boolean {
    return TERMINAL_STAGES.has(stage);
}

export const UNIT_STATUSES = ['available', 'hold', 'rented'] as const;
export type UnitStatus = (typeof UNIT_STATUSES)[number];

export const APPOINTMENT_STATUSES = ['scheduled', 'completed', 'canceled', 'no_show'] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export type TourOutcome = Extract<AppointmentStatus, 'completed' | 'no_show'>;

export const FOLLOWUP_STATUSES = ['pending', 'sent', 'failed', 'canceled'] as const;
export type FollowupStatus = (typeof FOLLOWUP_STATUSES)[number];

export const FOLLOWUP_MESSAGE_TYPES = [
    'evening_before_reminder',
    'morning_of_reminder',
    'three_hours_before_reminder',
    'abandoned_lead_nudge',
    'follow_up_after_tour',
    'no_show_follow_up',
] as const;
export type FollowupMessageType = (typeof FOLLOWUP_MESSAGE_TYPES)[number];

export type ReminderType = Extract<
    FollowupMessageType,
    'evening_before_reminder' | 'morning_of_reminder' | 'three_hours_before_reminder'
>;

export const MESSAGE_DIRECTIONS = ['user', 'bot'] as const;
export type MessageDirection = (typeof MESSAGE_DIRECTIONS)[number];

export const PROFILE_FIELDS = [
    'rooms',
    'budget',
    'has_parking',
    'preferred_area',
    'preferred_floor_min',
    'preferred_floor_max',
    'needs_furnished',
    'pet_owner',
] as const;
export type ProfileField = (typeof PROFILE_FIELDS)[number];

export interface LeadProfile {
    rooms: number | null;
    budget: number | null;
    has_parking: boolean | null;
    preferred_area: string | null;
    preferred_floor_min: number | null;
    preferred_floor_max: number | null;
    needs_furnished: boolean | null;
    pet_owner: boolean | null;
}

export interface LeadGates {
    has_payslips: boolean | null;
    can_pay_deposit: boolean | null;
    /** ISO date (YYYY-MM-DD) once answered. */
    move_in_date: string | null;
}

export interface Lead extends LeadProfile, LeadGates {
    id: number;
    phone_number: string;
    name: string;
    email: string | null;
    stage: LeadStage;
    skipped_profile_fields: ProfileField[];
    source: string;
    created_at: string;
    updated_at: string;
    last_interaction: string;
}

/** Mutable part of a lead, as written back after a transition. */
export type LeadPatch = Partial<
    LeadProfile &
        LeadGates & {
            stage: LeadStage;
            email: string | null;
            skipped_profile_fields: ProfileField[];
            updated_at: string;
            last_interaction: string;
        }
>;

export interface Property {
    id: number;
    name: string;
    address: string;
}

export interface Unit {
    id: number;
    property_id: number;
    unit_number: string;
    rooms: number;
    floor: number | null;
    price: number;
    has_parking: boolean;
    furnished: boolean;
    pet_friendly: boolean;
    status: UnitStatus;
    /** ISO date (YYYY-MM-DD); null means available now. */
    available_from: string | null;
}

export interface UnitWithProperty extends Unit {
    property: Property;
}

export interface Appointment {
    id: number;
    lead_id: number;
    unit_id: number | null;
    calendar_event_id: string | null;
    scheduled_time: string;
    duration_minutes: number;
    attendee_name: string | null;
    attendee_email: string | null;
    location: string | null;
    status: AppointmentStatus;
    notes: string | null;
    created_at: string;
    updated_at: string;
}

export interface ConversationMessage {
    id: number;
    lead_id: number;
    message_type: MessageDirection;
    content: string;
    timestamp: string;
    metadata: Record<string, unknown> | null;
}

export interface FollowupTask {
    id: number;
    lead_id: number;
    appointment_id: number | null;
    message_type: FollowupMessageType;
    content: string;
    send_at: string;
    status: FollowupStatus;
    attempts: number;
    sent_at: string | null;
    error_message: string | null;
    created_at: string;
}

export interface DailyMetric {
    date: string;
    total_inquiries: number;
    qualified_leads: number;
    tours_scheduled: number;
    tours_completed: number;
    conversion_rate_qualified: number;
    conversion_rate_tours: number;
}
