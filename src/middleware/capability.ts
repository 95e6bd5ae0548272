/**
 * src/middleware/capability.ts
 *
 * API-key authorization at the HTTP boundary. The key in `x-api-key` is
 * resolved to a set of capabilities; the leasing core itself never sees it.
 *
 *   INGEST_API_KEY → events:ingest
 *   ADMIN_API_KEY  → every capability
 */

import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';

export const CAPABILITIES = ['events:ingest', 'appointments:write', 'metrics:read', 'metrics:write'] as const;
export type Capability = (typeof CAPABILITIES)[number];

export interface AccessKeys {
    ingestKey?: string;
    adminKey?: string;
    webhookSecret?: string;
}

declare global {
    namespace Express {
        interface Request {
            capabilities?: ReadonlySet<Capability>;
        }
    }
}

export function sameSecret(given: string, expected: string): boolean {
    const a = Buffer.from(given);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

export function capabilitiesFor(apiKey: string | undefined, keys: AccessKeys): ReadonlySet<Capability> {
    if (!apiKey) return new Set();
    if (keys.adminKey && sameSecret(apiKey, keys.adminKey)) return new Set(CAPABILITIES);
    if (keys.ingestKey && sameSecret(apiKey, keys.ingestKey)) return new Set<Capability>(['events:ingest']);
    return new Set();
}

export function requireCapability(keys: AccessKeys, capability: Capability) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const apiKey = req.header('x-api-key');
        if (!apiKey) {
            res.status(401).json({ error: 'Missing x-api-key header' });
            return;
        }

        const granted = capabilitiesFor(apiKey, keys);
        if (!granted.has(capability)) {
            logger.warn('Capability', `Denied ${capability} for ${req.method} ${req.originalUrl}`);
            res.status(403).json({ error: `API key lacks capability "${capability}"` });
            return;
        }

        req.capabilities = granted;
        next();
    };
}

/** Shared-secret check for inbound calendar notifications. */
export function requireWebhookSecret(keys: AccessKeys) {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!keys.webhookSecret) {
            res.status(503).json({ error: 'Calendar webhook is not configured' });
            return;
        }
        const given = req.header('x-webhook-secret');
        if (!given || !sameSecret(given, keys.webhookSecret)) {
            logger.warn('Capability', 'Rejected calendar webhook with a bad secret');
            res.status(401).json({ error: 'Invalid webhook secret' });
            return;
        }
        next();
    };
}
