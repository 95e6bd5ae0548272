/**
 * src/services/appointmentService.ts
 *
 * Tour booking against the external calendar.
 *
 * propose() keeps local and external state reconciled:
 *   1. under `unit:<id>`: availability + overlap check
 *   2. cancel the lead's current appointment (one active per lead)
 *   3. insert the pending row (scheduled, no calendar_event_id)
 *   4. book on the calendar, bounded by CALENDAR_TIMEOUT_MS
 *   5. store the external id and plan reminders
 * A failure in 4 deletes the row; a failure in 5 deletes it and then cancels
 * the external event, logging an event the calendar would not remove.
 *
 * cancel / reschedule / recordOutcome / calendar notifications run under the
 * same `lead:<phone>` lock as inbound events and act on a fresh read of the
 * appointment. Status changes are conditional on the row still being
 * `scheduled`.
 */

import type { LeasingSettings } from '../config/settings';
import type { LeasingStore } from '../db/repositories';
import type { LeasingEventBus, TourStatusChangedEvent } from '../events/eventBus';
import type { BookingConfirmation, BookingRequest, CalendarClient } from '../integrations/calendarClient';
import type { Appointment, Lead, TourOutcome, UnitWithProperty } from '../leasing/types';
import { NotFoundError, SchedulingError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { FollowupService } from './followupService';
import { withLock, type LockService } from './lockService';

const MINUTE_MS = 60_000;

export interface ProposeInput {
    lead: Lead;
    unitId: number | null;
    /** ISO-8601 instant with offset. */
    slot: string;
    durationMinutes?: number;
}

export type CalendarNotificationKind = 'completed' | 'no_show' | 'canceled';

export interface CalendarNotification {
    kind: CalendarNotificationKind;
    external_event_id: string;
}

export interface AppointmentServiceDeps {
    store: LeasingStore;
    calendar: CalendarClient;
    locks: LockService;
    followups: FollowupService;
    bus: LeasingEventBus;
    settings: LeasingSettings;
    now: () => Date;
}

function overlaps(a: Appointment, start: number, end: number): boolean {
    const aStart = Date.parse(a.scheduled_time);
    const aEnd = aStart + a.duration_minutes * MINUTE_MS;
    return aStart < end && start < aEnd;
}

function tourLocation(unit: UnitWithProperty | null): string | null {
    return unit ? `${unit.property.name} ${unit.unit_number}, ${unit.property.address}` : null;
}

export class AppointmentService {
    constructor(private readonly deps: AppointmentServiceDeps) {}

    async propose(input: ProposeInput): Promise<Appointment> {
        const { unitId } = input;
        if (unitId === null) return this.book(input, null);

        const { settings, locks } = this.deps;
        return withLock(locks, `unit:${unitId}`, () => this.bookUnit(input, unitId), {
            ttlSeconds: settings.lockTtlSeconds,
            waitMs: settings.lockWaitMs,
        });
    }

    private async bookUnit(input: ProposeInput, unitId: number): Promise<Appointment> {
        const { store } = this.deps;
        const duration = input.durationMinutes ?? this.deps.settings.defaultTourMinutes;

        const unit = await store.units.findById(unitId);
        if (!unit) throw new SchedulingError('unit_not_found', `Unit ${unitId} does not exist`);
        if (unit.status !== 'available') {
            throw new SchedulingError('unit_unavailable', `Unit ${unit.unit_number} is ${unit.status}`);
        }

        const start = Date.parse(input.slot);
        const end = start + duration * MINUTE_MS;
        const clash = (await store.appointments.listScheduledForUnit(unitId)).find(
            (a) => a.lead_id !== input.lead.id && overlaps(a, start, end)
        );
        if (clash) {
            throw new SchedulingError(
                'unit_double_booked',
                `Unit ${unit.unit_number} already has a tour at ${clash.scheduled_time}`
            );
        }

        return this.book(input, unit);
    }

    private async book(input: ProposeInput, unit: UnitWithProperty | null): Promise<Appointment> {
        const { store, followups, bus } = this.deps;
        const { lead } = input;
        const duration = input.durationMinutes ?? this.deps.settings.defaultTourMinutes;
        const scheduledTime = new Date(input.slot).toISOString();

        const active = await store.appointments.findActiveForLead(lead.id);
        if (active) await this.cancelAppointment(active, { external: true, via: 'reschedule' });

        const pending = await store.appointments.create(
            {
                lead_id: lead.id,
                unit_id: unit?.id ?? null,
                scheduled_time: scheduledTime,
                duration_minutes: duration,
                attendee_name: lead.name,
                attendee_email: lead.email,
                location: tourLocation(unit),
            },
            this.deps.now()
        );

        const request: BookingRequest = {
            start: scheduledTime,
            duration_minutes: duration,
            attendee: { name: lead.name, phone: lead.phone_number, email: lead.email },
            location: pending.location,
        };
        const { calendar, settings } = this.deps;
        let confirmation: BookingConfirmation;
        try {
            confirmation = await this.callCalendar(
                'booking',
                (signal) => calendar.book(request, signal),
                // a late confirmation would leave an orphan event behind
                (late) => calendar.cancel(late.external_event_id, AbortSignal.timeout(settings.calendarTimeoutMs))
            );
        } catch (err) {
            await store.appointments.delete(pending.id);
            logger.warn('Appointments', `Booking for lead=${lead.id} failed, pending row removed: ${errorMessage(err)}`);
            throw err;
        }

        try {
            const confirmed = await store.appointments.update(pending.id, {
                calendar_event_id: confirmation.external_event_id,
                updated_at: this.deps.now().toISOString(),
            });
            await followups.schedule(lead, confirmed);

            bus.emit('tour:booked', {
                appointmentId: confirmed.id,
                leadId: lead.id,
                unitId: confirmed.unit_id,
                scheduledTime: confirmed.scheduled_time,
                calendarEventId: confirmation.external_event_id,
            });
            return confirmed;
        } catch (err) {
            logger.error('Appointments', `Finalising appointment=${pending.id} failed, rolling back: ${errorMessage(err)}`);
            await this.rollback(pending.id, confirmation.external_event_id).catch((rollbackErr: unknown) =>
                logger.error('Appointments', `Rollback of appointment=${pending.id} incomplete: ${errorMessage(rollbackErr)}`)
            );
            throw new SchedulingError('followups_failed', `Could not finalise the tour booking: ${errorMessage(err)}`);
        }
    }

    private async rollback(appointmentId: number, externalEventId: string): Promise<void> {
        const { calendar, followups, store } = this.deps;
        try {
            await followups.cancelForAppointment(appointmentId);
        } finally {
            await store.appointments.delete(appointmentId);
        }

        try {
            await this.callCalendar('cancel', (signal) => calendar.cancel(externalEventId, signal));
        } catch (err) {
            logger.error(
                'Appointments',
                `Calendar event ${externalEventId} of rolled back appointment=${appointmentId} is still booked: ${errorMessage(err)}`
            );
        }
    }

    /** Runs one calendar call, aborting it after CALENDAR_TIMEOUT_MS. */
    private async callCalendar<T>(
        what: string,
        call: (signal: AbortSignal) => Promise<T>,
        onLate?: (late: T) => Promise<void>
    ): Promise<T> {
        const { settings } = this.deps;
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const pending = call(controller.signal);
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                void pending
                    .then((late) => onLate?.(late))
                    .catch((err: unknown) => logger.debug('Appointments', `Late calendar ${what} settled: ${errorMessage(err)}`));
                reject(new SchedulingError('calendar_timeout', `Calendar did not answer within ${settings.calendarTimeoutMs}ms`));
            }, settings.calendarTimeoutMs);
        });

        try {
            return await Promise.race([pending, timeout]);
        } catch (err) {
            if (err instanceof SchedulingError) throw err;
            throw new SchedulingError('calendar_failed', `Calendar ${what} failed: ${errorMessage(err)}`);
        } finally {
            clearTimeout(timer);
        }
    }

    /** Serialises a mutation with everything else touching the lead, on a fresh read. */
    private async underLeadLock<T>(
        appointmentId: number,
        fn: (appointment: Appointment, lead: Lead) => Promise<T>
    ): Promise<T> {
        const { locks, settings } = this.deps;
        const { lead_id } = await this.requireAppointment(appointmentId);
        const { phone_number } = await this.requireLead(lead_id);

        return withLock(
            locks,
            `lead:${phone_number}`,
            async () => {
                const appointment = await this.requireAppointment(appointmentId);
                return fn(appointment, await this.requireLead(appointment.lead_id));
            },
            { ttlSeconds: settings.lockTtlSeconds, waitMs: settings.lockWaitMs }
        );
    }

    private async requireLead(id: number): Promise<Lead> {
        const lead = await this.deps.store.leads.findById(id);
        if (!lead) throw new NotFoundError(`Lead ${id} not found`);
        return lead;
    }

    /** The appointment left `scheduled` between the read and the write. */
    private async changedUnderneath(appointmentId: number): Promise<SchedulingError> {
        const current = await this.deps.store.appointments.findById(appointmentId);
        return new SchedulingError('not_active', `Appointment ${appointmentId} is already ${current?.status ?? 'deleted'}`);
    }

    async requireAppointment(id: number): Promise<Appointment> {
        const appointment = await this.deps.store.appointments.findById(id);
        if (!appointment) throw new NotFoundError(`Appointment ${id} not found`);
        return appointment;
    }

    /** Idempotent: canceling a canceled appointment returns it unchanged. */
    async cancel(appointmentId: number): Promise<Appointment> {
        return this.underLeadLock(appointmentId, (appointment) =>
            this.cancelAppointment(appointment, { external: true, via: 'api' })
        );
    }

    private async cancelAppointment(
        appointment: Appointment,
        options: { external: boolean; via: TourStatusChangedEvent['via'] }
    ): Promise<Appointment> {
        const { calendar, store, followups, bus } = this.deps;
        switch (appointment.status) {
            case 'canceled':
                return appointment;
            case 'completed':
            case 'no_show':
                throw new SchedulingError('not_active', `Appointment ${appointment.id} is already ${appointment.status}`);
            case 'scheduled':
                break;
        }

        const eventId = appointment.calendar_event_id;
        if (options.external && eventId) {
            await this.callCalendar('cancel', (signal) => calendar.cancel(eventId, signal));
        }
        const canceled = await store.appointments.updateIfStatus(appointment.id, 'scheduled', {
            status: 'canceled',
            updated_at: this.deps.now().toISOString(),
        });
        if (!canceled) throw await this.changedUnderneath(appointment.id);
        await followups.cancelForAppointment(appointment.id);

        bus.emit('tour:status', {
            appointmentId: canceled.id,
            leadId: canceled.lead_id,
            status: 'canceled',
            via: options.via,
        });
        return canceled;
    }

    /** Moves an active tour to a new slot on the same unit. */
    async reschedule(appointmentId: number, slot: string, durationMinutes?: number): Promise<Appointment> {
        return this.underLeadLock(appointmentId, (appointment, lead) => {
            if (appointment.status !== 'scheduled') {
                throw new SchedulingError('not_active', `Appointment ${appointment.id} is ${appointment.status}`);
            }
            return this.propose({
                lead,
                unitId: appointment.unit_id,
                slot,
                durationMinutes: durationMinutes ?? appointment.duration_minutes,
            });
        });
    }

    async recordOutcome(appointmentId: number, outcome: TourOutcome): Promise<Appointment> {
        return this.underLeadLock(appointmentId, (appointment, lead) => this.applyOutcome(appointment, lead, outcome, 'api'));
    }

    private async applyOutcome(
        appointment: Appointment,
        lead: Lead,
        outcome: TourOutcome,
        via: TourStatusChangedEvent['via']
    ): Promise<Appointment> {
        const { store, followups, bus } = this.deps;
        if (appointment.status === outcome) return appointment;
        if (appointment.status !== 'scheduled') {
            throw new SchedulingError('not_active', `Appointment ${appointment.id} is ${appointment.status}`);
        }

        const updated = await store.appointments.updateIfStatus(appointment.id, 'scheduled', {
            status: outcome,
            updated_at: this.deps.now().toISOString(),
        });
        if (!updated) throw await this.changedUnderneath(appointment.id);
        await followups.cancelForAppointment(appointment.id);

        if (outcome === 'completed') await followups.scheduleAfterTour(lead, updated);
        else await followups.scheduleNoShow(lead, updated);

        bus.emit('tour:status', { appointmentId: updated.id, leadId: lead.id, status: outcome, via });
        return updated;
    }

    /**
     * Applies a completion / no-show / cancellation reported by the calendar.
     * Never touches the lead's stage.
     */
    async handleCalendarNotification(notification: CalendarNotification): Promise<Appointment | null> {
        const known = await this.deps.store.appointments.findByCalendarEventId(notification.external_event_id);
        if (!known) {
            logger.warn('Appointments', `Calendar notification for unknown event ${notification.external_event_id} ignored`);
            return null;
        }

        return this.underLeadLock(known.id, async (appointment, lead) => {
            if (appointment.status !== 'scheduled' && appointment.status !== notification.kind) {
                logger.warn(
                    'Appointments',
                    `Ignoring ${notification.kind} for appointment=${appointment.id}: already ${appointment.status}`
                );
                return appointment;
            }

            switch (notification.kind) {
                case 'canceled':
                    return this.cancelAppointment(appointment, { external: false, via: 'calendar' });
                case 'completed':
                case 'no_show':
                    return this.applyOutcome(appointment, lead, notification.kind, 'calendar');
            }
        });
    }
}
