/**
 * src/db/supabase/supabaseStore.ts
 *
 * PostgREST implementation of the repositories, on the service-role client.
 *
 * Conditional writes (`updateIfStatus`, `cancelPending`) put the expected
 * status in the WHERE clause so a concurrent worker can never overwrite a
 * task it lost the race for. Uniqueness is left to the partial indexes in
 * db/schema.sql.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { NotFoundError } from '../../utils/errors';
import type {
    Appointment,
    AppointmentStatus,
    ConversationMessage,
    DailyMetric,
    FollowupStatus,
    FollowupTask,
    Lead,
    LeadPatch,
    LeadStage,
    UnitWithProperty,
} from '../../leasing/types';
import type {
    AppointmentPatch,
    AppointmentRepository,
    ConversationRepository,
    FollowupFilter,
    FollowupPatch,
    FollowupRepository,
    LeadRepository,
    LeasingStore,
    MetricsRepository,
    NewAppointment,
    NewConversationMessage,
    NewFollowup,
    NewLead,
    UnitRepository,
} from '../repositories';
import {
    APPOINTMENT_COLUMNS,
    AppointmentRowSchema,
    CONVERSATION_COLUMNS,
    ConversationRowSchema,
    DailyMetricRowSchema,
    FOLLOWUP_COLUMNS,
    FollowupRowSchema,
    LEAD_COLUMNS,
    LeadRowSchema,
    METRIC_COLUMNS,
    UNIT_COLUMNS,
    UnitRowSchema,
    parseRow,
    parseRows,
} from '../rows';

interface PostgrestFailure {
    message: string;
}

function fail(action: string, error: PostgrestFailure): never {
    throw new Error(`Failed to ${action}: ${error.message}`);
}

function requireCount(action: string, count: number | null): number {
    if (count === null) throw new Error(`Failed to ${action}: no count returned`);
    return count;
}

export class SupabaseLeadRepository implements LeadRepository {
    constructor(private readonly db: SupabaseClient) {}

    async findByPhone(phone: string): Promise<Lead | null> {
        const { data, error } = await this.db.from('leads').select(LEAD_COLUMNS).eq('phone_number', phone).maybeSingle();
        if (error) fail('fetch lead', error);
        return data ? parseRow(LeadRowSchema, data, 'leads') : null;
    }

    async findById(id: number): Promise<Lead | null> {
        const { data, error } = await this.db.from('leads').select(LEAD_COLUMNS).eq('id', id).maybeSingle();
        if (error) fail('fetch lead', error);
        return data ? parseRow(LeadRowSchema, data, 'leads') : null;
    }

    async create(input: NewLead, now: Date): Promise<Lead> {
        const ts = now.toISOString();
        const { data, error } = await this.db
            .from('leads')
            .insert({
                phone_number: input.phone_number,
                name: input.name,
                email: input.email ?? null,
                source: input.source ?? 'whatsapp',
                stage: 'new',
                created_at: ts,
                updated_at: ts,
                last_interaction: ts,
            })
            .select(LEAD_COLUMNS)
            .single();
        if (error) fail('create lead', error);
        return parseRow(LeadRowSchema, data, 'leads');
    }

    async update(id: number, patch: LeadPatch): Promise<Lead> {
        const { data, error } = await this.db.from('leads').update(patch).eq('id', id).select(LEAD_COLUMNS).maybeSingle();
        if (error) fail('update lead', error);
        if (!data) throw new NotFoundError(`Lead ${id} not found`);
        return parseRow(LeadRowSchema, data, 'leads');
    }

    async countCreatedBetween(start: Date, end: Date): Promise<number> {
        const { count, error } = await this.db
            .from('leads')
            .select('id', { count: 'exact', head: true })
            .gte('created_at', start.toISOString())
            .lt('created_at', end.toISOString());
        if (error) fail('count leads', error);
        return requireCount('count leads', count);
    }
}

export class SupabaseUnitRepository implements UnitRepository {
    constructor(private readonly db: SupabaseClient) {}

    async listAvailable(): Promise<UnitWithProperty[]> {
        const { data, error } = await this.db
            .from('units')
            .select(UNIT_COLUMNS)
            .eq('status', 'available')
            .order('id', { ascending: true });
        if (error) fail('list units', error);
        return parseRows(UnitRowSchema, data, 'units');
    }

    async findById(id: number): Promise<UnitWithProperty | null> {
        const { data, error } = await this.db.from('units').select(UNIT_COLUMNS).eq('id', id).maybeSingle();
        if (error) fail('fetch unit', error);
        return data ? parseRow(UnitRowSchema, data, 'units') : null;
    }
}

export class SupabaseAppointmentRepository implements AppointmentRepository {
    constructor(private readonly db: SupabaseClient) {}

    async create(input: NewAppointment, now: Date): Promise<Appointment> {
        const ts = now.toISOString();
        const { data, error } = await this.db
            .from('appointments')
            .insert({ ...input, status: 'scheduled', created_at: ts, updated_at: ts })
            .select(APPOINTMENT_COLUMNS)
            .single();
        if (error) fail('create appointment', error);
        return parseRow(AppointmentRowSchema, data, 'appointments');
    }

    async findById(id: number): Promise<Appointment | null> {
        const { data, error } = await this.db.from('appointments').select(APPOINTMENT_COLUMNS).eq('id', id).maybeSingle();
        if (error) fail('fetch appointment', error);
        return data ? parseRow(AppointmentRowSchema, data, 'appointments') : null;
    }

    async findByCalendarEventId(eventId: string): Promise<Appointment | null> {
        const { data, error } = await this.db
            .from('appointments')
            .select(APPOINTMENT_COLUMNS)
            .eq('calendar_event_id', eventId)
            .maybeSingle();
        if (error) fail('fetch appointment', error);
        return data ? parseRow(AppointmentRowSchema, data, 'appointments') : null;
    }

    async findActiveForLead(leadId: number): Promise<Appointment | null> {
        const { data, error } = await this.db
            .from('appointments')
            .select(APPOINTMENT_COLUMNS)
            .eq('lead_id', leadId)
            .eq('status', 'scheduled')
            .maybeSingle();
        if (error) fail('fetch active appointment', error);
        return data ? parseRow(AppointmentRowSchema, data, 'appointments') : null;
    }

    async listScheduledForUnit(unitId: number): Promise<Appointment[]> {
        const { data, error } = await this.db
            .from('appointments')
            .select(APPOINTMENT_COLUMNS)
            .eq('unit_id', unitId)
            .eq('status', 'scheduled');
        if (error) fail('list unit appointments', error);
        return parseRows(AppointmentRowSchema, data, 'appointments');
    }

    async update(id: number, patch: AppointmentPatch): Promise<Appointment> {
        const { data, error } = await this.db
            .from('appointments')
            .update(patch)
            .eq('id', id)
            .select(APPOINTMENT_COLUMNS)
            .maybeSingle();
        if (error) fail('update appointment', error);
        if (!data) throw new NotFoundError(`Appointment ${id} not found`);
        return parseRow(AppointmentRowSchema, data, 'appointments');
    }

    async updateIfStatus(id: number, expected: AppointmentStatus, patch: AppointmentPatch): Promise<Appointment | null> {
        const { data, error } = await this.db
            .from('appointments')
            .update(patch)
            .eq('id', id)
            .eq('status', expected)
            .select(APPOINTMENT_COLUMNS)
            .maybeSingle();
        if (error) fail('update appointment', error);
        return data ? parseRow(AppointmentRowSchema, data, 'appointments') : null;
    }

    async delete(id: number): Promise<void> {
        const { error } = await this.db.from('appointments').delete().eq('id', id);
        if (error) fail('delete appointment', error);
    }

    async countCreatedBetween(start: Date, end: Date): Promise<number> {
        const { count, error } = await this.db
            .from('appointments')
            .select('id', { count: 'exact', head: true })
            .gte('created_at', start.toISOString())
            .lt('created_at', end.toISOString());
        if (error) fail('count appointments', error);
        return requireCount('count appointments', count);
    }

    async countWithStatusScheduledBetween(status: AppointmentStatus, start: Date, end: Date): Promise<number> {
        const { count, error } = await this.db
            .from('appointments')
            .select('id', { count: 'exact', head: true })
            .eq('status', status)
            .gte('scheduled_time', start.toISOString())
            .lt('scheduled_time', end.toISOString());
        if (error) fail('count appointments', error);
        return requireCount('count appointments', count);
    }
}

export class SupabaseFollowupRepository implements FollowupRepository {
    constructor(private readonly db: SupabaseClient) {}

    async insertMany(rows: NewFollowup[], now: Date): Promise<FollowupTask[]> {
        if (rows.length === 0) return [];
        const ts = now.toISOString();
        const { data, error } = await this.db
            .from('followups')
            .insert(rows.map((row) => ({ ...row, status: 'pending', attempts: 0, created_at: ts })))
            .select(FOLLOWUP_COLUMNS);
        if (error) fail('insert followups', error);
        return parseRows(FollowupRowSchema, data, 'followups');
    }

    async findById(id: number): Promise<FollowupTask | null> {
        const { data, error } = await this.db.from('followups').select(FOLLOWUP_COLUMNS).eq('id', id).maybeSingle();
        if (error) fail('fetch followup', error);
        return data ? parseRow(FollowupRowSchema, data, 'followups') : null;
    }

    async list(filter: FollowupFilter): Promise<FollowupTask[]> {
        let query = this.db.from('followups').select(FOLLOWUP_COLUMNS);
        if (filter.leadId !== undefined) query = query.eq('lead_id', filter.leadId);
        if (filter.appointmentId === null) query = query.is('appointment_id', null);
        else if (filter.appointmentId !== undefined) query = query.eq('appointment_id', filter.appointmentId);
        if (filter.messageType !== undefined) query = query.eq('message_type', filter.messageType);
        if (filter.status !== undefined) query = query.eq('status', filter.status);

        const { data, error } = await query.order('id', { ascending: true });
        if (error) fail('list followups', error);
        return parseRows(FollowupRowSchema, data, 'followups');
    }

    async listDue(now: Date, limit: number): Promise<FollowupTask[]> {
        const { data, error } = await this.db
            .from('followups')
            .select(FOLLOWUP_COLUMNS)
            .eq('status', 'pending')
            .lte('send_at', now.toISOString())
            .order('send_at', { ascending: true })
            .order('id', { ascending: true })
            .limit(limit);
        if (error) fail('list due followups', error);
        return parseRows(FollowupRowSchema, data, 'followups');
    }

    async updateIfStatus(id: number, expected: FollowupStatus, patch: FollowupPatch): Promise<FollowupTask | null> {
        const { data, error } = await this.db
            .from('followups')
            .update(patch)
            .eq('id', id)
            .eq('status', expected)
            .select(FOLLOWUP_COLUMNS)
            .maybeSingle();
        if (error) fail('update followup', error);
        return data ? parseRow(FollowupRowSchema, data, 'followups') : null;
    }

    async cancelPending(filter: Omit<FollowupFilter, 'status'>): Promise<number> {
        let query = this.db.from('followups').update({ status: 'canceled' }).eq('status', 'pending');
        if (filter.leadId !== undefined) query = query.eq('lead_id', filter.leadId);
        if (filter.appointmentId === null) query = query.is('appointment_id', null);
        else if (filter.appointmentId !== undefined) query = query.eq('appointment_id', filter.appointmentId);
        if (filter.messageType !== undefined) query = query.eq('message_type', filter.messageType);

        const { data, error } = await query.select('id');
        if (error) fail('cancel followups', error);
        return Array.isArray(data) ? data.length : 0;
    }
}

export class SupabaseConversationRepository implements ConversationRepository {
    constructor(private readonly db: SupabaseClient) {}

    async append(entry: NewConversationMessage, now: Date): Promise<ConversationMessage> {
        const { data, error } = await this.db
            .from('conversation_log')
            .insert({ ...entry, metadata: entry.metadata ?? null, timestamp: now.toISOString() })
            .select(CONVERSATION_COLUMNS)
            .single();
        if (error) fail('append conversation', error);
        return parseRow(ConversationRowSchema, data, 'conversation_log');
    }

    async listForLead(leadId: number, limit: number): Promise<ConversationMessage[]> {
        const { data, error } = await this.db
            .from('conversation_log')
            .select(CONVERSATION_COLUMNS)
            .eq('lead_id', leadId)
            .order('id', { ascending: false })
            .limit(limit);
        if (error) fail('list conversation', error);
        return parseRows(ConversationRowSchema, data, 'conversation_log').reverse();
    }

    async countLeadsTransitioned(from: LeadStage, to: LeadStage, start: Date, end: Date): Promise<number> {
        const { data, error } = await this.db
            .from('conversation_log')
            .select(CONVERSATION_COLUMNS)
            .eq('metadata->>from_stage', from)
            .eq('metadata->>to_stage', to)
            .gte('timestamp', start.toISOString())
            .lt('timestamp', end.toISOString());
        if (error) fail('count stage transitions', error);

        return new Set(parseRows(ConversationRowSchema, data, 'conversation_log').map((row) => row.lead_id)).size;
    }
}

export class SupabaseMetricsRepository implements MetricsRepository {
    constructor(private readonly db: SupabaseClient) {}

    async upsert(metric: DailyMetric, now: Date): Promise<DailyMetric> {
        const { data, error } = await this.db
            .from('metrics_daily')
            .upsert({ ...metric, created_at: now.toISOString() }, { onConflict: 'date' })
            .select(METRIC_COLUMNS)
            .single();
        if (error) fail('upsert daily metrics', error);
        return parseRow(DailyMetricRowSchema, data, 'metrics_daily');
    }

    async listBetween(fromDate: string, toDate: string): Promise<DailyMetric[]> {
        const { data, error } = await this.db
            .from('metrics_daily')
            .select(METRIC_COLUMNS)
            .gte('date', fromDate)
            .lte('date', toDate)
            .order('date', { ascending: false });
        if (error) fail('list daily metrics', error);
        return parseRows(DailyMetricRowSchema, data, 'metrics_daily');
    }
}

export class SupabaseStore implements LeasingStore {
    readonly leads: SupabaseLeadRepository;
    readonly units: SupabaseUnitRepository;
    readonly appointments: SupabaseAppointmentRepository;
    readonly followups: SupabaseFollowupRepository;
    readonly conversations: SupabaseConversationRepository;
    readonly metrics: SupabaseMetricsRepository;

    constructor(private readonly db: SupabaseClient) {
        this.leads = new SupabaseLeadRepository(db);
        this.units = new SupabaseUnitRepository(db);
        this.appointments = new SupabaseAppointmentRepository(db);
        this.followups = new SupabaseFollowupRepository(db);
        this.conversations = new SupabaseConversationRepository(db);
        this.metrics = new SupabaseMetricsRepository(db);
    }

    async ping(): Promise<void> {
        const { error } = await this.db.from('leads').select('id').limit(1);
        if (error) fail('reach database', error);
    }
}
