/**
 * src/db/memory/memoryStore.ts
 *
 * In-process LeasingStore. Backs local runs with STORE_DRIVER=memory and the
 * whole test suite. Enforces the same uniqueness rules as the partial
 * indexes in db/schema.sql so both drivers reject the same writes.
 *
 * Records are copied on the way in and out; callers never hold a live
 * reference into the maps.
 */

import { InvariantViolationError, NotFoundError } from '../../utils/errors';
import type {
    Appointment,
    AppointmentStatus,
    ConversationMessage,
    DailyMetric,
    FollowupTask,
    Lead,
    LeadPatch,
    LeadStage,
    Property,
    Unit,
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

function within(iso: string, start: Date, end: Date): boolean {
    const t = Date.parse(iso);
    return t >= start.getTime() && t < end.getTime();
}

class Table<T extends { id: number }> {
    private rows = new Map<number, T>();
    private seq = 0;

    nextId(): number {
        this.seq += 1;
        return this.seq;
    }

    put(row: T): T {
        this.seq = Math.max(this.seq, row.id);
        this.rows.set(row.id, structuredClone(row));
        return structuredClone(row);
    }

    get(id: number): T | null {
        const row = this.rows.get(id);
        return row ? structuredClone(row) : null;
    }

    remove(id: number): void {
        this.rows.delete(id);
    }

    all(): T[] {
        return Array.from(this.rows.values(), (row) => structuredClone(row));
    }
}

export class MemoryLeadRepository implements LeadRepository {
    private table = new Table<Lead>();

    async findByPhone(phone: string): Promise<Lead | null> {
        return this.table.all().find((l) => l.phone_number === phone) ?? null;
    }

    async findById(id: number): Promise<Lead | null> {
        return this.table.get(id);
    }

    async create(input: NewLead, now: Date): Promise<Lead> {
        if (await this.findByPhone(input.phone_number)) {
            throw new InvariantViolationError(`Lead with phone ${input.phone_number} already exists`);
        }
        const ts = now.toISOString();
        return this.table.put({
            id: this.table.nextId(),
            phone_number: input.phone_number,
            name: input.name,
            email: input.email ?? null,
            stage: 'new',
            has_payslips: null,
            can_pay_deposit: null,
            move_in_date: null,
            rooms: null,
            budget: null,
            has_parking: null,
            preferred_area: null,
            preferred_floor_min: null,
            preferred_floor_max: null,
            needs_furnished: null,
            pet_owner: null,
            skipped_profile_fields: [],
            source: input.source ?? 'whatsapp',
            created_at: ts,
            updated_at: ts,
            last_interaction: ts,
        });
    }

    async update(id: number, patch: LeadPatch): Promise<Lead> {
        const current = this.table.get(id);
        if (!current) throw new NotFoundError(`Lead ${id} not found`);
        return this.table.put({ ...current, ...patch });
    }

    async countCreatedBetween(start: Date, end: Date): Promise<number> {
        return this.table.all().filter((l) => within(l.created_at, start, end)).length;
    }
}

export class MemoryUnitRepository implements UnitRepository {
    private properties = new Map<number, Property>();
    private units = new Map<number, Unit>();

    addProperty(property: Property): void {
        this.properties.set(property.id, { ...property });
    }

    addUnit(unit: Unit): void {
        if (!this.properties.has(unit.property_id)) {
            throw new InvariantViolationError(`Unit ${unit.unit_number} references unknown property ${unit.property_id}`);
        }
        const clash = Array.from(this.units.values()).some(
            (u) => u.id !== unit.id && u.property_id === unit.property_id && u.unit_number === unit.unit_number
        );
        if (clash) {
            throw new InvariantViolationError(`Unit ${unit.unit_number} already exists in property ${unit.property_id}`);
        }
        this.units.set(unit.id, { ...unit });
    }

    /** Catalog-side status change (hold/rent); the leasing core never calls this. */
    setStatus(unitId: number, status: Unit['status']): void {
        const unit = this.units.get(unitId);
        if (!unit) throw new NotFoundError(`Unit ${unitId} not found`);
        this.units.set(unitId, { ...unit, status });
    }

    private withProperty(unit: Unit): UnitWithProperty | null {
        const property = this.properties.get(unit.property_id);
        return property ? { ...unit, property: { ...property } } : null;
    }

    async listAvailable(): Promise<UnitWithProperty[]> {
        return Array.from(this.units.values())
            .filter((u) => u.status === 'available')
            .map((u) => this.withProperty(u))
            .filter((u): u is UnitWithProperty => u !== null)
            .sort((a, b) => a.id - b.id);
    }

    async findById(id: number): Promise<UnitWithProperty | null> {
        const unit = this.units.get(id);
        return unit ? this.withProperty(unit) : null;
    }
}

export class MemoryAppointmentRepository implements AppointmentRepository {
    private table = new Table<Appointment>();

    async create(input: NewAppointment, now: Date): Promise<Appointment> {
        if (await this.findActiveForLead(input.lead_id)) {
            throw new InvariantViolationError(`Lead ${input.lead_id} already has a scheduled appointment`);
        }
        const ts = now.toISOString();
        return this.table.put({
            id: this.table.nextId(),
            ...input,
            calendar_event_id: null,
            status: 'scheduled',
            notes: null,
            created_at: ts,
            updated_at: ts,
        });
    }

    async findById(id: number): Promise<Appointment | null> {
        return this.table.get(id);
    }

    async findByCalendarEventId(eventId: string): Promise<Appointment | null> {
        return this.table.all().find((a) => a.calendar_event_id === eventId) ?? null;
    }

    async findActiveForLead(leadId: number): Promise<Appointment | null> {
        return this.table.all().find((a) => a.lead_id === leadId && a.status === 'scheduled') ?? null;
    }

    async listScheduledForUnit(unitId: number): Promise<Appointment[]> {
        return this.table.all().filter((a) => a.unit_id === unitId && a.status === 'scheduled');
    }

    async update(id: number, patch: AppointmentPatch): Promise<Appointment> {
        const current = this.table.get(id);
        if (!current) throw new NotFoundError(`Appointment ${id} not found`);

        const eventId = patch.calendar_event_id;
        if (eventId) {
            const owner = await this.findByCalendarEventId(eventId);
            if (owner && owner.id !== id) {
                throw new InvariantViolationError(`Calendar event ${eventId} is already linked to appointment ${owner.id}`);
            }
        }
        return this.table.put({ ...current, ...patch });
    }

    async updateIfStatus(id: number, expected: AppointmentStatus, patch: AppointmentPatch): Promise<Appointment | null> {
        const current = this.table.get(id);
        if (!current || current.status !== expected) return null;
        return this.update(id, patch);
    }

    async delete(id: number): Promise<void> {
        this.table.remove(id);
    }

    async countCreatedBetween(start: Date, end: Date): Promise<number> {
        return this.table.all().filter((a) => within(a.created_at, start, end)).length;
    }

    async countWithStatusScheduledBetween(status: AppointmentStatus, start: Date, end: Date): Promise<number> {
        return this.table.all().filter((a) => a.status === status && within(a.scheduled_time, start, end)).length;
    }
}

function matchesFilter(task: FollowupTask, filter: FollowupFilter): boolean {
    return (
        (filter.leadId === undefined || task.lead_id === filter.leadId) &&
        (filter.appointmentId === undefined || task.appointment_id === filter.appointmentId) &&
        (filter.messageType === undefined || task.message_type === filter.messageType) &&
        (filter.status === undefined || task.status === filter.status)
    );
}

export class MemoryFollowupRepository implements FollowupRepository {
    private table = new Table<FollowupTask>();

    async insertMany(rows: NewFollowup[], now: Date): Promise<FollowupTask[]> {
        const pending = this.table.all().filter((t) => t.status === 'pending');
        const keys = new Set(pending.map((t) => `${t.lead_id}:${t.appointment_id}:${t.message_type}`));
        for (const row of rows) {
            const key = `${row.lead_id}:${row.appointment_id}:${row.message_type}`;
            if (keys.has(key)) {
                throw new InvariantViolationError(`A pending ${row.message_type} task already exists for lead ${row.lead_id}`);
            }
            keys.add(key);
        }

        const ts = now.toISOString();
        return rows.map((row) =>
            this.table.put({
                id: this.table.nextId(),
                ...row,
                status: 'pending',
                attempts: 0,
                sent_at: null,
                error_message: null,
                created_at: ts,
            })
        );
    }

    async findById(id: number): Promise<FollowupTask | null> {
        return this.table.get(id);
    }

    async list(filter: FollowupFilter): Promise<FollowupTask[]> {
        return this.table.all().filter((t) => matchesFilter(t, filter));
    }

    async listDue(now: Date, limit: number): Promise<FollowupTask[]> {
        return this.table
            .all()
            .filter((t) => t.status === 'pending' && Date.parse(t.send_at) <= now.getTime())
            .sort((a, b) => Date.parse(a.send_at) - Date.parse(b.send_at) || a.id - b.id)
            .slice(0, limit);
    }

    async updateIfStatus(id: number, expected: FollowupTask['status'], patch: FollowupPatch): Promise<FollowupTask | null> {
        const current = this.table.get(id);
        if (!current || current.status !== expected) return null;
        return this.table.put({ ...current, ...patch });
    }

    async cancelPending(filter: Omit<FollowupFilter, 'status'>): Promise<number> {
        const targets = await this.list({ ...filter, status: 'pending' });
        for (const task of targets) this.table.put({ ...task, status: 'canceled' });
        return targets.length;
    }
}

export class MemoryConversationRepository implements ConversationRepository {
    private table = new Table<ConversationMessage>();

    async append(entry: NewConversationMessage, now: Date): Promise<ConversationMessage> {
        return this.table.put({
            id: this.table.nextId(),
            lead_id: entry.lead_id,
            message_type: entry.message_type,
            content: entry.content,
            metadata: entry.metadata ?? null,
            timestamp: now.toISOString(),
        });
    }

    async listForLead(leadId: number, limit: number): Promise<ConversationMessage[]> {
        return this.table
            .all()
            .filter((m) => m.lead_id === leadId)
            .sort((a, b) => a.id - b.id)
            .slice(-limit);
    }

    async countLeadsTransitioned(from: LeadStage, to: LeadStage, start: Date, end: Date): Promise<number> {
        const leads = new Set<number>();
        for (const m of this.table.all()) {
            if (!m.metadata || !within(m.timestamp, start, end)) continue;
            if (m.metadata.from_stage === from && m.metadata.to_stage === to) leads.add(m.lead_id);
        }
        return leads.size;
    }
}

export class MemoryMetricsRepository implements MetricsRepository {
    private rows = new Map<string, DailyMetric>();

    async upsert(metric: DailyMetric): Promise<DailyMetric> {
        this.rows.set(metric.date, { ...metric });
        return { ...metric };
    }

    async listBetween(fromDate: string, toDate: string): Promise<DailyMetric[]> {
        return Array.from(this.rows.values())
            .filter((m) => m.date >= fromDate && m.date <= toDate)
            .sort((a, b) => b.date.localeCompare(a.date))
            .map((m) => ({ ...m }));
    }
}

export class MemoryStore implements LeasingStore {
    readonly leads = new MemoryLeadRepository();
    readonly units = new MemoryUnitRepository();
    readonly appointments = new MemoryAppointmentRepository();
    readonly followups = new MemoryFollowupRepository();
    readonly conversations = new MemoryConversationRepository();
    readonly metrics = new MemoryMetricsRepository();

    async ping(): Promise<void> {
        // always reachable
    }
}
