/**
 * src/db/repositories.ts
 *
 * Persistence seams of the leasing core, one repository per table.
 *
 * Two implementations exist: Supabase (db/supabase) for deployments and an
 * in-process store (db/memory) for local runs and tests. Services only ever
 * see these interfaces.
 */

import type {
    Appointment,
    AppointmentStatus,
    ConversationMessage,
    DailyMetric,
    FollowupMessageType,
    FollowupStatus,
    FollowupTask,
    Lead,
    LeadPatch,
    LeadStage,
    MessageDirection,
    UnitWithProperty,
} from '../leasing/types';

export interface NewLead {
    phone_number: string;
    name: string;
    email?: string | null;
    source?: string;
}

export interface LeadRepository {
    findByPhone(phone: string): Promise<Lead | null>;
    findById(id: number): Promise<Lead | null>;
    create(input: NewLead, now: Date): Promise<Lead>;
    update(id: number, patch: LeadPatch): Promise<Lead>;
    countCreatedBetween(start: Date, end: Date): Promise<number>;
}

export interface UnitRepository {
    listAvailable(): Promise<UnitWithProperty[]>;
    findById(id: number): Promise<UnitWithProperty | null>;
}

export interface NewAppointment {
    lead_id: number;
    unit_id: number | null;
    scheduled_time: string;
    duration_minutes: number;
    attendee_name: string | null;
    attendee_email: string | null;
    location: string | null;
}

export type AppointmentPatch = Partial<
    Pick<Appointment, 'calendar_event_id' | 'status' | 'notes' | 'scheduled_time' | 'duration_minutes'>
> & { updated_at: string };

export interface AppointmentRepository {
    /** Inserts the pending record: status scheduled, no calendar event yet. */
    create(input: NewAppointment, now: Date): Promise<Appointment>;
    findById(id: number): Promise<Appointment | null>;
    findByCalendarEventId(eventId: string): Promise<Appointment | null>;
    findActiveForLead(leadId: number): Promise<Appointment | null>;
    listScheduledForUnit(unitId: number): Promise<Appointment[]>;
    update(id: number, patch: AppointmentPatch): Promise<Appointment>;
    /** Applies `patch` only while the appointment still has `expected` status. Returns null otherwise. */
    updateIfStatus(id: number, expected: AppointmentStatus, patch: AppointmentPatch): Promise<Appointment | null>;
    delete(id: number): Promise<void>;
    countCreatedBetween(start: Date, end: Date): Promise<number>;
    countWithStatusScheduledBetween(status: AppointmentStatus, start: Date, end: Date): Promise<number>;
}

export interface NewFollowup {
    lead_id: number;
    appointment_id: number | null;
    message_type: FollowupMessageType;
    content: string;
    send_at: string;
}

export type FollowupPatch = Partial<Pick<FollowupTask, 'status' | 'attempts' | 'sent_at' | 'error_message' | 'send_at'>>;

export interface FollowupFilter {
    leadId?: number;
    /** `null` matches tasks that belong to no appointment. */
    appointmentId?: number | null;
    messageType?: FollowupMessageType;
    status?: FollowupStatus;
}

export interface FollowupRepository {
    /** Inserts all rows in one statement; either all are stored or none. */
    insertMany(rows: NewFollowup[], now: Date): Promise<FollowupTask[]>;
    findById(id: number): Promise<FollowupTask | null>;
    list(filter: FollowupFilter): Promise<FollowupTask[]>;
    listDue(now: Date, limit: number): Promise<FollowupTask[]>;
    /** Applies `patch` only while the task still has `expected` status. Returns null otherwise. */
    updateIfStatus(id: number, expected: FollowupStatus, patch: FollowupPatch): Promise<FollowupTask | null>;
    /** Cancels every pending task matching the filter, returning how many changed. */
    cancelPending(filter: Omit<FollowupFilter, 'status'>): Promise<number>;
}

export interface NewConversationMessage {
    lead_id: number;
    message_type: MessageDirection;
    content: string;
    metadata?: Record<string, unknown> | null;
}

export interface ConversationRepository {
    append(entry: NewConversationMessage, now: Date): Promise<ConversationMessage>;
    listForLead(leadId: number, limit: number): Promise<ConversationMessage[]>;
    /** Distinct leads with a logged transition into `stage` within [start, end). */
    /** Distinct leads with a logged `from → to` transition in [start, end). */
    countLeadsTransitioned(from: LeadStage, to: LeadStage, start: Date, end: Date): Promise<number>;
}

export interface MetricsRepository {
    upsert(metric: DailyMetric, now: Date): Promise<DailyMetric>;
    listBetween(fromDate: string, toDate: string): Promise<DailyMetric[]>;
}

export interface LeasingStore {
    leads: LeadRepository;
    units: UnitRepository;
    appointments: AppointmentRepository;
    followups: FollowupRepository;
    conversations: ConversationRepository;
    metrics: MetricsRepository;
    /** Cheap round trip used by the readiness check. */
    ping(): Promise<void>;
}
