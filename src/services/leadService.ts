/**
 * src/services/leadService.ts
 *
 * Runs one inbound event through the funnel.
 *
 * FLOW (inside the `lead:<phone>` lock):
 *   1. look the lead up by phone, creating it on first contact
 *   2. advance() → typed rejection, or next stage + patch + side effects
 *   3. persist the patch (touching updated_at / last_interaction) and log
 *      the transition to conversation_log
 *   4. execute the side effects; matching and booking produce internal
 *      events that go back through advance() in the same call
 *   5. deliver the collected replies through the outbound sink, retrying
 *      transient failures; a reply that still fails is logged to
 *      conversation_log with its delivery status and reported back
 */

import type { LeasingSettings } from '../config/settings';
import type { LeasingStore } from '../db/repositories';
import type { LeasingEventBus } from '../events/eventBus';
import type { DeliveryResult, OutboundMessage, OutboundSink } from '../integrations/outboundSink';
import { describeEvent, isInternalEvent, type InboundEvent, type InternalEvent, type LeadEvent } from '../leasing/leadEvents';
import { gateQuestion, matchesMessage, noticeMessage, profileQuestion } from '../leasing/messages';
import { toMatchProfile } from '../leasing/profileCollector';
import { advance, type InvalidTransitionReason, type SideEffect } from '../leasing/stageMachine';
import type { Lead, LeadStage, UnitWithProperty } from '../leasing/types';
import { matchUnits } from '../leasing/unitMatcher';
import { InvariantViolationError, LockBusyError, SchedulingError, errorMessage } from '../utils/errors';
import { formatLocalDateTime, localDate, sleep } from '../utils/time';
import { logger } from '../utils/logger';
import type { AppointmentService } from './appointmentService';
import type { FollowupService } from './followupService';
import { withLock, type LockService } from './lockService';

export interface InboundRequest {
    phone: string;
    name?: string;
    email?: string;
    source?: string;
    event: InboundEvent;
}

export type InboundResult =
    | {
          ok: true;
          lead_id: number;
          stage: LeadStage;
          replies: string[];
          appointment_id?: number;
          /** Replies the sink could not deliver; absent when all went out. */
          undelivered?: string[];
      }
    | { ok: false; lead_id: number; stage: LeadStage; reason: InvalidTransitionReason; message: string };

export interface LeadServiceDeps {
    store: LeasingStore;
    sink: OutboundSink;
    locks: LockService;
    followups: FollowupService;
    appointments: AppointmentService;
    bus: LeasingEventBus;
    settings: LeasingSettings;
    now: () => Date;
}

/** Mutable state of one handleInbound call. */
interface Turn {
    lead: Lead;
    replies: string[];
    /** Units from the last matching run, for presenting them by id. */
    snapshot: Map<number, UnitWithProperty>;
    appointmentId?: number;
}

export class LeadService {
    constructor(private readonly deps: LeadServiceDeps) {}

    async handleInbound(request: InboundRequest): Promise<InboundResult> {
        const { settings, locks } = this.deps;
        return withLock(locks, `lead:${request.phone}`, () => this.process(request), {
            ttlSeconds: settings.lockTtlSeconds,
            waitMs: settings.lockWaitMs,
        });
    }

    private async resolveLead(request: InboundRequest): Promise<Lead> {
        const { store, bus } = this.deps;
        const existing = await store.leads.findByPhone(request.phone);
        if (existing) return existing;

        const lead = await store.leads.create(
            {
                phone_number: request.phone,
                name: request.name?.trim() ?? '',
                email: request.email ?? null,
                source: request.source,
            },
            this.deps.now()
        );
        bus.emit('lead:created', { leadId: lead.id, phone: lead.phone_number, source: lead.source });
        return lead;
    }

    private async process(request: InboundRequest): Promise<InboundResult> {
        const turn: Turn = { lead: await this.resolveLead(request), replies: [], snapshot: new Map() };
        const queue: LeadEvent[] = [request.event];

        for (let event = queue.shift(); event !== undefined; event = queue.shift()) {
            const rejection = await this.apply(turn, event, queue);
            if (!rejection) continue;

            if (isInternalEvent(event)) {
                throw new InvariantViolationError(
                    `Internal event ${describeEvent(event)} rejected for lead=${turn.lead.id}: ${rejection.message}`
                );
            }
            return { ok: false, lead_id: turn.lead.id, stage: turn.lead.stage, ...rejection };
        }

        const undelivered = await this.deliverReplies(turn);
        return {
            ok: true,
            lead_id: turn.lead.id,
            stage: turn.lead.stage,
            replies: turn.replies,
            ...(turn.appointmentId !== undefined && { appointment_id: turn.appointmentId }),
            ...(undelivered.length > 0 && { undelivered }),
        };
    }

    /** Applies one event; returns the rejection when the machine refuses it. */
    private async apply(
        turn: Turn,
        event: LeadEvent,
        queue: LeadEvent[]
    ): Promise<{ reason: InvalidTransitionReason; message: string } | null> {
        const { store, bus, settings } = this.deps;
        const now = this.deps.now();
        const direction = isInternalEvent(event) ? 'bot' : 'user';

        const result = advance(turn.lead, event, {
            today: localDate(now, settings.timezone),
            maxMoveInDays: settings.maxMoveInDays,
        });

        if (!result.ok) {
            await store.conversations.append(
                {
                    lead_id: turn.lead.id,
                    message_type: direction,
                    content: result.event,
                    metadata: { event: event.type, rejected: result.reason, stage: result.stage },
                },
                now
            );
            bus.emit('lead:rejected', {
                leadId: turn.lead.id,
                event: result.event,
                stage: result.stage,
                reason: result.reason,
            });
            return { reason: result.reason, message: result.message };
        }

        const ts = now.toISOString();
        turn.lead = await store.leads.update(turn.lead.id, { ...result.patch, updated_at: ts, last_interaction: ts });
        await store.conversations.append(
            {
                lead_id: turn.lead.id,
                message_type: direction,
                content: describeEvent(event),
                metadata: { event: event.type, from_stage: result.from, to_stage: result.next },
            },
            now
        );
        bus.emit('lead:transitioned', {
            leadId: turn.lead.id,
            event: describeEvent(event),
            from: result.from,
            to: result.next,
        });

        for (const effect of result.effects) {
            const followUp = await this.runEffect(turn, effect);
            if (followUp) queue.push(followUp);
        }
        return null;
    }

    private async runEffect(turn: Turn, effect: SideEffect): Promise<InternalEvent | null> {
        const { followups } = this.deps;

        switch (effect.kind) {
            case 'ask_gate':
                turn.replies.push(gateQuestion(effect.gate, turn.lead));
                return null;

            case 'request_profile': {
                const [next] = effect.missing;
                if (next !== undefined) turn.replies.push(profileQuestion(next));
                return null;
            }

            case 'match_units':
                return this.match(turn);

            case 'present_matches': {
                const units = effect.unit_ids
                    .map((id) => turn.snapshot.get(id))
                    .filter((u): u is UnitWithProperty => u !== undefined);
                turn.replies.push(matchesMessage(units));
                return null;
            }

            case 'book_tour':
                return this.bookTour(turn, effect);

            case 'notify':
                turn.replies.push(noticeMessage(effect.template, effect.detail));
                return null;

            case 'schedule_nudge':
                await followups.scheduleNudge(turn.lead);
                return null;

            case 'cancel_nudges':
                await followups.cancelNudges(turn.lead.id);
                return null;
        }
    }

    private async match(turn: Turn): Promise<InternalEvent> {
        const { store, settings } = this.deps;
        const units = await store.units.listAvailable();
        const outcome = matchUnits(toMatchProfile(turn.lead), units, { roomsPolicy: settings.roomsPolicy });

        logger.info('Leads', `Matching for lead=${turn.lead.id} over ${units.length} unit(s) → ${outcome.kind}`);

        switch (outcome.kind) {
            case 'matched': {
                const shown = outcome.units.slice(0, settings.maxRecommendations);
                turn.snapshot = new Map(shown.map((u) => [u.id, u]));
                return { type: 'match_result', outcome: 'matched', unit_ids: shown.map((u) => u.id) };
            }
            case 'future_fit':
                return { type: 'match_result', outcome: 'future_fit', earliest_available_from: outcome.earliestAvailableFrom };
            case 'no_fit':
                return { type: 'match_result', outcome: 'no_fit', binding: outcome.binding };
        }
    }

    private async bookTour(turn: Turn, effect: Extract<SideEffect, { kind: 'book_tour' }>): Promise<InternalEvent> {
        try {
            const appointment = await this.deps.appointments.propose({
                lead: turn.lead,
                unitId: effect.unit_id,
                slot: effect.slot,
                durationMinutes: effect.duration_minutes,
            });
            turn.appointmentId = appointment.id;
            return {
                type: 'booking_confirmed',
                appointment_id: appointment.id,
                scheduled_time: formatLocalDateTime(new Date(appointment.scheduled_time), this.deps.settings.timezone),
            };
        } catch (err) {
            if (err instanceof SchedulingError) return { type: 'booking_failed', reason: err.code };
            if (err instanceof LockBusyError) return { type: 'booking_failed', reason: 'unit_busy' };
            logger.error('Leads', `Booking for lead=${turn.lead.id} errored: ${errorMessage(err)}`);
            return { type: 'booking_failed', reason: 'internal_error' };
        }
    }

    /** Returns the replies that could not be delivered. */
    private async deliverReplies(turn: Turn): Promise<string[]> {
        const { store } = this.deps;
        const undelivered: string[] = [];

        for (const content of turn.replies) {
            const entry = await store.conversations.append(
                { lead_id: turn.lead.id, message_type: 'bot', content },
                this.deps.now()
            );
            const { result, attempts } = await this.deliver({
                phone: turn.lead.phone_number,
                content,
                idempotency_key: `reply:${entry.id}`,
            });
            if (result.status === 'sent') continue;

            undelivered.push(content);
            await store.conversations.append(
                {
                    lead_id: turn.lead.id,
                    message_type: 'bot',
                    content: `Reply ${entry.id} not delivered`,
                    metadata: { delivery: result.status, reply_id: entry.id, attempts, error: result.error ?? null },
                },
                this.deps.now()
            );
            logger.warn(
                'Leads',
                `Reply ${entry.id} to lead=${turn.lead.id} not delivered after ${attempts} attempt(s) (${result.status}): ${result.error ?? ''}`
            );
        }
        return undelivered;
    }

    private async deliver(message: OutboundMessage): Promise<{ result: DeliveryResult; attempts: number }> {
        const { sink, settings } = this.deps;
        for (let attempts = 1; ; attempts++) {
            const result = await sink.send(message);
            if (result.status !== 'transient_failure' || attempts >= settings.followupMaxAttempts) {
                return { result, attempts };
            }
            await sleep(settings.followupRetryBackoffMs * 2 ** (attempts - 1));
        }
    }
}
