/**
 * src/services/followupService.ts
 *
 * Plans, cancels and delivers time-triggered messages: tour reminders, the
 * abandoned-lead nudge, and post-tour / no-show follow-ups.
 *
 * DELIVERY CONTRACT:
 *   at-least-once. A task is claimed through the lock service, re-read, and
 *   sent with its own id as idempotency key, so two workers polling the same
 *   table never both deliver it. Every status write is conditional on the
 *   task still being `pending`; a task canceled mid-send stays canceled.
 */

import type { LeasingSettings } from '../config/settings';
import type { FollowupRepository, LeasingStore, NewFollowup } from '../db/repositories';
import type { LeasingEventBus } from '../events/eventBus';
import type { OutboundSink } from '../integrations/outboundSink';
import { followupMessage } from '../leasing/messages';
import { isTerminalStage } from '../leasing/types';
import type { Appointment, FollowupMessageType, FollowupTask, Lead, ReminderType } from '../leasing/types';
import { atLocalHour, localDate, localTime, shiftDate } from '../utils/time';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { LockService } from './lockService';

const HOUR_MS = 60 * 60_000;
const MINUTE_MS = 60_000;

export interface PlannedReminder {
    message_type: ReminderType;
    send_at: Date;
}

type ReminderSettings = Pick<LeasingSettings, 'timezone' | 'eveningReminderHour' | 'morningReminderHour'>;

/**
 * Reminder times for a tour. Only instants strictly after `now` are
 * returned, so a tour booked for the same evening gets just the reminders
 * that can still go out.
 */
export function planReminders(scheduledTime: Date, settings: ReminderSettings, now: Date): PlannedReminder[] {
    const tourDay = localDate(scheduledTime, settings.timezone);

    const candidates: PlannedReminder[] = [
        {
            message_type: 'evening_before_reminder',
            send_at: atLocalHour(shiftDate(tourDay, -1), settings.eveningReminderHour, settings.timezone),
        },
        {
            message_type: 'morning_of_reminder',
            send_at: atLocalHour(tourDay, settings.morningReminderHour, settings.timezone),
        },
        {
            message_type: 'three_hours_before_reminder',
            send_at: new Date(scheduledTime.getTime() - 3 * HOUR_MS),
        },
    ];

    return candidates.filter(
        (r) =>
            r.send_at.getTime() > now.getTime() &&
            (r.message_type !== 'morning_of_reminder' || r.send_at.getTime() < scheduledTime.getTime())
    );
}

export interface DispatchSummary {
    due: number;
    sent: number;
    retried: number;
    failed: number;
    canceled: number;
    skipped: number;
}

type DispatchOutcome = Exclude<keyof DispatchSummary, 'due'>;

export interface FollowupServiceDeps {
    store: LeasingStore;
    sink: OutboundSink;
    locks: LockService;
    bus: LeasingEventBus;
    settings: LeasingSettings;
    now: () => Date;
}

export class FollowupService {
    private readonly followups: FollowupRepository;

    constructor(private readonly deps: FollowupServiceDeps) {
        this.followups = deps.store.followups;
    }

    /** Inserts the reminders of `appointment` that are not already pending, in one write. */
    async schedule(lead: Lead, appointment: Appointment): Promise<FollowupTask[]> {
        const { settings } = this.deps;
        const now = this.deps.now();
        const tour = new Date(appointment.scheduled_time);
        const when = localTime(tour, settings.timezone);

        const pending = await this.followups.list({
            leadId: lead.id,
            appointmentId: appointment.id,
            status: 'pending',
        });
        const existing = new Set<FollowupMessageType>(pending.map((t) => t.message_type));

        const rows: NewFollowup[] = planReminders(tour, settings, now)
            .filter((r) => !existing.has(r.message_type))
            .map((r) => ({
                lead_id: lead.id,
                appointment_id: appointment.id,
                message_type: r.message_type,
                content: followupMessage(r.message_type, lead, when),
                send_at: r.send_at.toISOString(),
            }));

        if (rows.length === 0) return [];

        const created = await this.followups.insertMany(rows, now);
        logger.info(
            'Followups',
            `Scheduled ${created.length} reminder(s) for appointment=${appointment.id}: ` +
                created.map((t) => `${t.message_type}@${t.send_at}`).join(', ')
        );
        return created;
    }

    async cancelForAppointment(appointmentId: number): Promise<number> {
        const count = await this.followups.cancelPending({ appointmentId });
        if (count > 0) logger.info('Followups', `Canceled ${count} pending task(s) for appointment=${appointmentId}`);
        return count;
    }

    /** Replaces the lead's pending nudge with one due ABANDONED_LEAD_HOURS after its last interaction. */
    async scheduleNudge(lead: Lead): Promise<FollowupTask> {
        await this.cancelNudges(lead.id);
        const sendAt = new Date(Date.parse(lead.last_interaction) + this.deps.settings.abandonedLeadHours * HOUR_MS);

        const [task] = await this.followups.insertMany(
            [
                {
                    lead_id: lead.id,
                    appointment_id: null,
                    message_type: 'abandoned_lead_nudge',
                    content: followupMessage('abandoned_lead_nudge', lead),
                    send_at: sendAt.toISOString(),
                },
            ],
            this.deps.now()
        );
        logger.debug('Followups', `Nudge for lead=${lead.id} due at ${task.send_at}`);
        return task;
    }

    async cancelNudges(leadId: number): Promise<number> {
        return this.followups.cancelPending({ leadId, appointmentId: null, messageType: 'abandoned_lead_nudge' });
    }

    async scheduleAfterTour(lead: Lead, appointment: Appointment): Promise<FollowupTask> {
        const end = Date.parse(appointment.scheduled_time) + appointment.duration_minutes * MINUTE_MS;
        return this.scheduleSingle(
            lead,
            appointment,
            'follow_up_after_tour',
            new Date(end + this.deps.settings.followUpAfterTourHours * HOUR_MS)
        );
    }

    async scheduleNoShow(lead: Lead, appointment: Appointment): Promise<FollowupTask> {
        const now = this.deps.now();
        return this.scheduleSingle(
            lead,
            appointment,
            'no_show_follow_up',
            new Date(now.getTime() + this.deps.settings.noShowFollowUpMinutes * MINUTE_MS)
        );
    }

    private async scheduleSingle(
        lead: Lead,
        appointment: Appointment,
        type: FollowupMessageType,
        sendAt: Date
    ): Promise<FollowupTask> {
        const [pending] = await this.followups.list({
            leadId: lead.id,
            appointmentId: appointment.id,
            messageType: type,
            status: 'pending',
        });
        if (pending) return pending;

        const [task] = await this.followups.insertMany(
            [
                {
                    lead_id: lead.id,
                    appointment_id: appointment.id,
                    message_type: type,
                    content: followupMessage(type, lead),
                    send_at: sendAt.toISOString(),
                },
            ],
            this.deps.now()
        );
        logger.info('Followups', `Scheduled ${type} for appointment=${appointment.id} at ${task.send_at}`);
        return task;
    }

    /** One polling pass: delivers up to FOLLOWUP_BATCH_SIZE due tasks. */
    async dispatchDue(now: Date = this.deps.now()): Promise<DispatchSummary> {
        const due = await this.followups.listDue(now, this.deps.settings.followupBatchSize);
        const summary: DispatchSummary = { due: due.length, sent: 0, retried: 0, failed: 0, canceled: 0, skipped: 0 };

        for (const task of due) {
            try {
                summary[await this.dispatchOne(task.id, now)] += 1;
            } catch (err) {
                // leave the task pending; the next pass picks it up again
                summary.skipped += 1;
                logger.error('Followups', `Dispatch of followup=${task.id} errored: ${errorMessage(err)}`);
            }
        }

        if (due.length > 0) logger.worker('Followups', `Dispatch pass complete`, summary);
        return summary;
    }

    private async dispatchOne(taskId: number, now: Date): Promise<DispatchOutcome> {
        const { locks, settings } = this.deps;
        const key = `followup:${taskId}`;

        const token = await locks.tryAcquire(key, settings.lockTtlSeconds);
        if (token === null) {
            logger.debug('Followups', `followup=${taskId} claimed by another worker`);
            return 'skipped';
        }

        try {
            const task = await this.followups.findById(taskId);
            if (!task || task.status !== 'pending' || Date.parse(task.send_at) > now.getTime()) return 'skipped';

            const lead = await this.deps.store.leads.findById(task.lead_id);
            if (!lead) return this.cancelTask(task, 'lead no longer exists');

            if (task.message_type === 'abandoned_lead_nudge') {
                if (isTerminalStage(lead.stage)) return this.cancelTask(task, `lead reached ${lead.stage}`);
                if (Date.parse(lead.last_interaction) > Date.parse(task.created_at)) {
                    return this.cancelTask(task, 'lead interacted after the nudge was planned');
                }
            }

            return await this.deliver(task, lead, now);
        } finally {
            await locks.release(key, token);
        }
    }

    private async cancelTask(task: FollowupTask, why: string): Promise<DispatchOutcome> {
        const updated = await this.followups.updateIfStatus(task.id, 'pending', { status: 'canceled' });
        if (!updated) return 'skipped';
        logger.info('Followups', `Canceled ${task.message_type} followup=${task.id}: ${why}`);
        return 'canceled';
    }

    private async deliver(task: FollowupTask, lead: Lead, now: Date): Promise<DispatchOutcome> {
        const { settings, bus } = this.deps;
        const attempts = task.attempts + 1;

        const result = await this.deps.sink.send({
            phone: lead.phone_number,
            content: task.content,
            idempotency_key: `followup:${task.id}`,
        });

        switch (result.status) {
            case 'sent': {
                const updated = await this.followups.updateIfStatus(task.id, 'pending', {
                    status: 'sent',
                    sent_at: now.toISOString(),
                    attempts,
                    error_message: null,
                });
                if (!updated) return 'skipped';
                bus.emit('followup:sent', {
                    followupId: task.id,
                    leadId: lead.id,
                    messageType: task.message_type,
                    attempts,
                });
                return 'sent';
            }

            case 'transient_failure': {
                const error = result.error ?? 'transient delivery failure';
                if (attempts >= settings.followupMaxAttempts) return this.fail(task, attempts, error);

                const backoff = settings.followupRetryBackoffMs * 2 ** (attempts - 1);
                const updated = await this.followups.updateIfStatus(task.id, 'pending', {
                    attempts,
                    error_message: error,
                    ...(backoff > 0 && { send_at: new Date(now.getTime() + backoff).toISOString() }),
                });
                if (!updated) return 'skipped';
                logger.warn('Followups', `followup=${task.id} attempt ${attempts} failed, will retry: ${error}`);
                return 'retried';
            }

            case 'permanent_failure':
                return this.fail(task, attempts, result.error ?? 'permanent delivery failure');
        }
    }

    private async fail(task: FollowupTask, attempts: number, error: string): Promise<DispatchOutcome> {
        const updated = await this.followups.updateIfStatus(task.id, 'pending', {
            status: 'failed',
            attempts,
            error_message: error,
        });
        if (!updated) return 'skipped';
        this.deps.bus.emit('followup:failed', {
            followupId: task.id,
            leadId: task.lead_id,
            messageType: task.message_type,
            attempts,
            error,
        });
        return 'failed';
    }
}
