/**
 * src/db/rows.ts
 *
 * Zod schemas for rows coming back from PostgREST. Every Supabase read goes
 * through one of these so a drifted column fails loudly instead of leaking
 * an unexpected shape into the state machine.
 */

import { z } from 'zod';
import {
    APPOINTMENT_STATUSES,
    FOLLOWUP_MESSAGE_TYPES,
    FOLLOWUP_STATUSES,
    LEAD_STAGES,
    MESSAGE_DIRECTIONS,
    PROFILE_FIELDS,
    UNIT_STATUSES,
} from '../leasing/types';
import type {
    Appointment,
    ConversationMessage,
    DailyMetric,
    FollowupTask,
    Lead,
    UnitWithProperty,
} from '../leasing/types';

// numeric columns come back as strings when they exceed JS precision
const numeric = z.coerce.number();
const nullableNumeric = z.union([numeric, z.null()]);

export const LeadRowSchema = z.object({
    id: z.number().int(),
    phone_number: z.string(),
    name: z.string(),
    email: z.string().nullable(),
    stage: z.enum(LEAD_STAGES),
    has_payslips: z.boolean().nullable(),
    can_pay_deposit: z.boolean().nullable(),
    move_in_date: z.string().nullable(),
    rooms: z.number().int().nullable(),
    budget: nullableNumeric,
    has_parking: z.boolean().nullable(),
    preferred_area: z.string().nullable(),
    preferred_floor_min: z.number().int().nullable(),
    preferred_floor_max: z.number().int().nullable(),
    needs_furnished: z.boolean().nullable(),
    pet_owner: z.boolean().nullable(),
    skipped_profile_fields: z.array(z.enum(PROFILE_FIELDS)).nullable().transform((v) => v ?? []),
    source: z.string(),
    created_at: z.string(),
    updated_at: z.string(),
    last_interaction: z.string(),
}) satisfies z.ZodType<Lead, z.ZodTypeDef, unknown>;

export const PropertyRowSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    address: z.string(),
});

export const UnitRowSchema = z.object({
    id: z.number().int(),
    property_id: z.number().int(),
    unit_number: z.string(),
    rooms: z.number().int(),
    floor: z.number().int().nullable(),
    price: numeric,
    has_parking: z.boolean(),
    furnished: z.boolean(),
    pet_friendly: z.boolean(),
    status: z.enum(UNIT_STATUSES),
    available_from: z.string().nullable(),
    property: PropertyRowSchema,
}) satisfies z.ZodType<UnitWithProperty, z.ZodTypeDef, unknown>;

export const AppointmentRowSchema = z.object({
    id: z.number().int(),
    lead_id: z.number().int(),
    unit_id: z.number().int().nullable(),
    calendar_event_id: z.string().nullable(),
    scheduled_time: z.string(),
    duration_minutes: z.number().int(),
    attendee_name: z.string().nullable(),
    attendee_email: z.string().nullable(),
    location: z.string().nullable(),
    status: z.enum(APPOINTMENT_STATUSES),
    notes: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
}) satisfies z.ZodType<Appointment, z.ZodTypeDef, unknown>;

export const FollowupRowSchema = z.object({
    id: z.number().int(),
    lead_id: z.number().int(),
    appointment_id: z.number().int().nullable(),
    message_type: z.enum(FOLLOWUP_MESSAGE_TYPES),
    content: z.string(),
    send_at: z.string(),
    status: z.enum(FOLLOWUP_STATUSES),
    attempts: z.number().int(),
    sent_at: z.string().nullable(),
    error_message: z.string().nullable(),
    created_at: z.string(),
}) satisfies z.ZodType<FollowupTask, z.ZodTypeDef, unknown>;

export const ConversationRowSchema = z.object({
    id: z.number().int(),
    lead_id: z.number().int(),
    message_type: z.enum(MESSAGE_DIRECTIONS),
    content: z.string(),
    timestamp: z.string(),
    metadata: z.record(z.unknown()).nullable(),
}) satisfies z.ZodType<ConversationMessage, z.ZodTypeDef, unknown>;

export const DailyMetricRowSchema = z.object({
    date: z.string(),
    total_inquiries: z.number().int(),
    qualified_leads: z.number().int(),
    tours_scheduled: z.number().int(),
    tours_completed: z.number().int(),
    conversion_rate_qualified: numeric,
    conversion_rate_tours: numeric,
}) satisfies z.ZodType<DailyMetric, z.ZodTypeDef, unknown>;

export const LEAD_COLUMNS = Object.keys(LeadRowSchema.shape).join(', ');
export const APPOINTMENT_COLUMNS = Object.keys(AppointmentRowSchema.shape).join(', ');
export const FOLLOWUP_COLUMNS = Object.keys(FollowupRowSchema.shape).join(', ');
export const CONVERSATION_COLUMNS = Object.keys(ConversationRowSchema.shape).join(', ');
export const METRIC_COLUMNS = Object.keys(DailyMetricRowSchema.shape).join(', ');
export const UNIT_COLUMNS =
    'id, property_id, unit_number, rooms, floor, price, has_parking, furnished, pet_friendly, status, available_from, property:properties!inner(id, name, address)';

export function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, table: string): T {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
        const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
        throw new Error(`Unexpected ${table} row shape: ${issues}`);
    }
    return parsed.data;
}

export function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown, table: string): T[] {
    if (!Array.isArray(rows)) throw new Error(`Expected an array of ${table} rows`);
    return rows.map((row) => parseRow(schema, row, table));
}
