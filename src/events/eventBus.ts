/**
 * src/events/eventBus.ts
 *
 * EventEmitter-based domain event bus.
 *
 * Services emit after a write has been committed; listeners only observe
 * (logging, analytics hooks) and never feed back into the funnel. A listener
 * that throws is logged and does not affect the emitting request.
 */

import { EventEmitter } from 'events';
import type { AppointmentStatus, FollowupMessageType, LeadStage } from '../leasing/types';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface LeadCreatedEvent {
    leadId: number;
    phone: string;
    source: string;
}

export interface LeadTransitionedEvent {
    leadId: number;
    event: string;
    from: LeadStage;
    to: LeadStage;
}

export interface LeadRejectedEvent {
    leadId: number;
    event: string;
    stage: LeadStage;
    reason: string;
}

export interface TourBookedEvent {
    appointmentId: number;
    leadId: number;
    unitId: number | null;
    scheduledTime: string;
    calendarEventId: string;
}

export interface TourStatusChangedEvent {
    appointmentId: number;
    leadId: number;
    status: AppointmentStatus;
    via: 'api' | 'calendar' | 'reschedule';
}

export interface FollowupDeliveredEvent {
    followupId: number;
    leadId: number;
    messageType: FollowupMessageType;
    attempts: number;
}

export interface FollowupFailedEvent extends FollowupDeliveredEvent {
    error: string;
}

export interface MetricsRolledUpEvent {
    date: string;
    totalInquiries: number;
    qualifiedLeads: number;
}

export interface LeasingEventMap {
    'lead:created': LeadCreatedEvent;
    'lead:transitioned': LeadTransitionedEvent;
    'lead:rejected': LeadRejectedEvent;
    'tour:booked': TourBookedEvent;
    'tour:status': TourStatusChangedEvent;
    'followup:sent': FollowupDeliveredEvent;
    'followup:failed': FollowupFailedEvent;
    'metrics:rolled_up': MetricsRolledUpEvent;
}

export type LeasingEventName = keyof LeasingEventMap;

export class LeasingEventBus {
    private readonly emitter = new EventEmitter();

    constructor() {
        this.emitter.setMaxListeners(20);
    }

    emit<K extends LeasingEventName>(name: K, payload: LeasingEventMap[K]): void {
        this.emitter.emit(name, payload);
    }

    on<K extends LeasingEventName>(name: K, listener: (payload: LeasingEventMap[K]) => void): void {
        this.emitter.on(name, (payload: LeasingEventMap[K]) => {
            try {
                listener(payload);
            } catch (err) {
                logger.error('EventBus', `Listener for ${name} failed: ${errorMessage(err)}`);
            }
        });
    }

    listenerCount(name: LeasingEventName): number {
        return this.emitter.listenerCount(name);
    }

    removeAllListeners(): void {
        this.emitter.removeAllListeners();
    }
}
