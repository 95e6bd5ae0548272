/**
 * src/integrations/calendarClient.ts
 *
 * External tour calendar. Both calls must settle within the caller's signal;
 * the scheduler aborts them after CALENDAR_TIMEOUT_MS. An aborted `book()`
 * means the slot is not booked.
 */

import { randomUUID } from 'crypto';
import axios, { isAxiosError, isCancel } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';

export interface Attendee {
    name: string;
    phone: string;
    email: string | null;
}

export interface BookingRequest {
    start: string;
    duration_minutes: number;
    attendee: Attendee;
    location: string | null;
}

export interface BookingConfirmation {
    external_event_id: string;
}

export interface CalendarClient {
    book(request: BookingRequest, signal: AbortSignal): Promise<BookingConfirmation>;
    cancel(externalEventId: string, signal: AbortSignal): Promise<void>;
}

export class CalendarAbortedError extends Error {
    constructor() {
        super('Calendar request aborted');
        this.name = 'CalendarAbortedError';
    }
}

const CreatedEventSchema = z.object({ id: z.union([z.string(), z.number()]).transform(String) });

export class HttpCalendarClient implements CalendarClient {
    constructor(
        private readonly baseUrl: string,
        private readonly token?: string
    ) {}

    private headers(): Record<string, string> {
        return this.token ? { Authorization: `Bearer ${this.token}` } : {};
    }

    async book(request: BookingRequest, signal: AbortSignal): Promise<BookingConfirmation> {
        try {
            const response = await axios.post(
                `${this.baseUrl}/events`,
                {
                    start: request.start,
                    duration_minutes: request.duration_minutes,
                    location: request.location,
                    attendee: request.attendee,
                },
                { headers: this.headers(), signal }
            );
            const created = CreatedEventSchema.parse(response.data);
            return { external_event_id: created.id };
        } catch (err) {
            if (isCancel(err) || signal.aborted) throw new CalendarAbortedError();
            throw err;
        }
    }

    async cancel(externalEventId: string, signal: AbortSignal): Promise<void> {
        try {
            await axios.delete(`${this.baseUrl}/events/${encodeURIComponent(externalEventId)}`, {
                headers: this.headers(),
                signal,
            });
        } catch (err) {
            if (isCancel(err) || signal.aborted) throw new CalendarAbortedError();
            // already gone on the calendar side
            if (isAxiosError(err) && err.response?.status === 404) {
                logger.debug('Calendar', `Event ${externalEventId} was already removed`);
                return;
            }
            throw err;
        }
    }
}

export class MockCalendarClient implements CalendarClient {
    async book(request: BookingRequest, signal: AbortSignal): Promise<BookingConfirmation> {
        if (signal.aborted) throw new CalendarAbortedError();
        const id = `mock-${randomUUID()}`;
        logger.info('Calendar', `[MOCK] Booked ${request.start} for ${request.attendee.name} → ${id}`);
        return { external_event_id: id };
    }

    async cancel(externalEventId: string, signal: AbortSignal): Promise<void> {
        if (signal.aborted) throw new CalendarAbortedError();
        logger.info('Calendar', `[MOCK] Canceled ${externalEventId}`);
    }
}
