import { logger } from '../utils/logger';
import type { LeasingEventBus } from './eventBus';

function registerFunnelListeners(bus: LeasingEventBus): void {
    bus.on('lead:created', (event) => {
        logger.event('lead:created', `lead=${event.leadId} | phone=${event.phone} | source=${event.source}`);
    });

    bus.on('lead:transitioned', (event) => {
        logger.event('lead:transitioned', `lead=${event.leadId} | ${event.from} → ${event.to} | ${event.event}`);
    });

    bus.on('lead:rejected', (event) => {
        logger.warn(
            'lead:rejected',
            `lead=${event.leadId} | stage=${event.stage} | reason=${event.reason} | ${event.event}`
        );
    });
}

function registerSchedulingListeners(bus: LeasingEventBus): void {
    bus.on('tour:booked', (event) => {
        logger.event(
            'tour:booked',
            `appointment=${event.appointmentId} | lead=${event.leadId} | unit=${event.unitId ?? 'n/a'} | ` +
                `at=${event.scheduledTime} | calendar=${event.calendarEventId}`
        );
    });

    bus.on('tour:status', (event) => {
        logger.event('tour:status', `appointment=${event.appointmentId} | lead=${event.leadId} | ${event.status} via ${event.via}`);
    });
}

function registerWorkerListeners(bus: LeasingEventBus): void {
    bus.on('followup:sent', (event) => {
        logger.worker(
            'followup:sent',
            `followup=${event.followupId} | lead=${event.leadId} | ${event.messageType} | attempt ${event.attempts}`
        );
    });

    bus.on('followup:failed', (event) => {
        logger.error(
            'followup:failed',
            `followup=${event.followupId} | lead=${event.leadId} | ${event.messageType} | ` +
                `after ${event.attempts} attempt(s) | error=${event.error}`
        );
    });

    bus.on('metrics:rolled_up', (event) => {
        logger.worker(
            'metrics:rolled_up',
            `date=${event.date} | inquiries=${event.totalInquiries} | qualified=${event.qualifiedLeads}`
        );
    });
}

export function registerListeners(bus: LeasingEventBus): void {
    registerFunnelListeners(bus);
    registerSchedulingListeners(bus);
    registerWorkerListeners(bus);
    logger.success('Listeners', 'All event listeners registered');
}
