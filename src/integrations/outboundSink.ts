/**
 * src/integrations/outboundSink.ts
 *
 * Outbound message delivery. The followup dispatcher and LeadService only
 * see `OutboundSink`; the WhatsApp transport (Twilio) is one implementation,
 * the mock used in development another.
 */

import twilio from 'twilio';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export type DeliveryStatus = 'sent' | 'transient_failure' | 'permanent_failure';

export interface OutboundMessage {
    phone: string;
    content: string;
    /** Stable per logical message; a repeated key must not produce a second delivery. */
    idempotency_key: string;
}

export interface DeliveryResult {
    status: DeliveryStatus;
    error?: string;
}

export interface OutboundSink {
    send(message: OutboundMessage): Promise<DeliveryResult>;
}

/** The part of the Twilio client used here. */
export interface MessageCreator {
    messages: {
        create(params: { to: string; from: string; body: string }): Promise<{ sid: string }>;
    };
}

/** Remembers recently delivered keys so a retried dispatch is answered without resending. */
class DeliveredKeys {
    private keys = new Map<string, number>();

    constructor(private readonly capacity = 5_000) {}

    has(key: string): boolean {
        return this.keys.has(key);
    }

    add(key: string): void {
        this.keys.set(key, Date.now());
        if (this.keys.size > this.capacity) {
            const oldest = this.keys.keys().next();
            if (!oldest.done) this.keys.delete(oldest.value);
        }
    }
}

// 4xx from Twilio means the request itself is wrong; 429 is throttling
export function classifyTwilioError(err: unknown): DeliveryStatus {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
        if (err.status === 429) return 'transient_failure';
        if (err.status >= 400 && err.status < 500) return 'permanent_failure';
    }
    return 'transient_failure';
}

function asWhatsApp(phone: string): string {
    return phone.startsWith('whatsapp:') ? phone : `whatsapp:${phone}`;
}

export class TwilioWhatsAppSink implements OutboundSink {
    private delivered = new DeliveredKeys();

    constructor(
        private readonly client: MessageCreator,
        private readonly from: string
    ) {}

    static fromCredentials(accountSid: string, authToken: string, from: string): TwilioWhatsAppSink {
        return new TwilioWhatsAppSink(twilio(accountSid, authToken), from);
    }

    async send(message: OutboundMessage): Promise<DeliveryResult> {
        if (this.delivered.has(message.idempotency_key)) {
            logger.debug('WhatsApp', `Skipping already delivered message key=${message.idempotency_key}`);
            return { status: 'sent' };
        }

        try {
            const result = await this.client.messages.create({
                to: asWhatsApp(message.phone),
                from: asWhatsApp(this.from),
                body: message.content,
            });
            this.delivered.add(message.idempotency_key);
            logger.info('WhatsApp', `Sent to ${message.phone} | sid=${result.sid} | key=${message.idempotency_key}`);
            return { status: 'sent' };
        } catch (err) {
            const status = classifyTwilioError(err);
            logger.warn('WhatsApp', `Send to ${message.phone} failed (${status}): ${errorMessage(err)}`);
            return { status, error: errorMessage(err) };
        }
    }
}

export class MockSink implements OutboundSink {
    async send(message: OutboundMessage): Promise<DeliveryResult> {
        logger.info('WhatsApp', `[MOCK] → ${message.phone} | key=${message.idempotency_key}`, message.content);
        return { status: 'sent' };
    }
}
