/**
 * src/container.ts
 *
 * Wires the leasing services together. `assemble()` takes already-built
 * collaborators (tests pass in-process ones); `createContainer()` picks them
 * from the validated env.
 */

import type Redis from 'ioredis';
import { createDbClient } from './config/db';
import type { Env } from './config/env';
import { createRedisClient } from './config/redis';
import { settingsFromEnv, type LeasingSettings } from './config/settings';
import { MemoryStore } from './db/memory/memoryStore';
import { loadCatalogFile, seedCatalog } from './db/memory/seedCatalog';
import type { LeasingStore } from './db/repositories';
import { SupabaseStore } from './db/supabase/supabaseStore';
import { LeasingEventBus } from './events/eventBus';
import { HttpCalendarClient, MockCalendarClient, type CalendarClient } from './integrations/calendarClient';
import { MockSink, TwilioWhatsAppSink, type OutboundSink } from './integrations/outboundSink';
import type { AccessKeys } from './middleware/capability';
import { AppointmentService } from './services/appointmentService';
import { FollowupService } from './services/followupService';
import { LeadService } from './services/leadService';
import { InProcessLockService, RedisLockService, type LockService } from './services/lockService';
import { MetricsService } from './services/metricsService';
import { logger } from './utils/logger';
import { localDate } from './utils/time';
import { FollowupWorker } from './worker/followupWorker';
import { MetricsJob } from './worker/metricsJob';

export interface ContainerParts {
    settings: LeasingSettings;
    store: LeasingStore;
    locks: LockService;
    sink: OutboundSink;
    calendar: CalendarClient;
    auth: AccessKeys;
    redis?: Redis;
    now?: () => Date;
}

export interface Container {
    settings: LeasingSettings;
    store: LeasingStore;
    bus: LeasingEventBus;
    auth: AccessKeys;
    redis: Redis | null;
    followups: FollowupService;
    appointments: AppointmentService;
    leads: LeadService;
    metrics: MetricsService;
    followupWorker: FollowupWorker;
    metricsJob: MetricsJob;
}

export function assemble(parts: ContainerParts): Container {
    const { settings, store, locks, sink, calendar } = parts;
    const now = parts.now ?? (() => new Date());
    const bus = new LeasingEventBus();

    const followups = new FollowupService({ store, sink, locks, bus, settings, now });
    const appointments = new AppointmentService({ store, calendar, locks, followups, bus, settings, now });
    const leads = new LeadService({ store, sink, locks, followups, appointments, bus, settings, now });
    const metrics = new MetricsService({ store, bus, settings, now });

    return {
        settings,
        store,
        bus,
        auth: parts.auth,
        redis: parts.redis ?? null,
        followups,
        appointments,
        leads,
        metrics,
        followupWorker: new FollowupWorker(followups, settings.followupPollIntervalMs, now),
        metricsJob: new MetricsJob(metrics, settings.metricsRollupTime, settings.timezone, now),
    };
}

function storeFromEnv(env: Env, settings: LeasingSettings): LeasingStore {
    if (env.STORE_DRIVER === 'supabase' && env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY) {
        return new SupabaseStore(createDbClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY));
    }

    const store = new MemoryStore();
    seedCatalog(store.units, loadCatalogFile(), localDate(new Date(), settings.timezone));
    logger.warn('Container', 'Using the in-memory store with the sample catalog — data is lost on restart');
    return store;
}

function sinkFromEnv(env: Env): OutboundSink {
    if (env.SMS_MODE === 'live' && env.TWILIO_ACCOUNT_SID && env.TWILIO_AUTH_TOKEN && env.TWILIO_WHATSAPP_FROM) {
        return TwilioWhatsAppSink.fromCredentials(env.TWILIO_ACCOUNT_SID, env.TWILIO_AUTH_TOKEN, env.TWILIO_WHATSAPP_FROM);
    }
    return new MockSink();
}

function calendarFromEnv(env: Env): CalendarClient {
    if (env.CALENDAR_MODE === 'live' && env.CALENDAR_API_URL) {
        return new HttpCalendarClient(env.CALENDAR_API_URL, env.CALENDAR_API_TOKEN);
    }
    return new MockCalendarClient();
}

export function createContainer(env: Env): Container {
    const settings = settingsFromEnv(env);
    const redis = env.REDIS_URL ? createRedisClient(env.REDIS_URL) : undefined;
    if (!redis) logger.warn('Container', 'REDIS_URL not set — locks are in-process only');

    return assemble({
        settings,
        store: storeFromEnv(env, settings),
        locks: redis ? new RedisLockService(redis) : new InProcessLockService(),
        sink: sinkFromEnv(env),
        calendar: calendarFromEnv(env),
        auth: {
            ingestKey: env.INGEST_API_KEY,
            adminKey: env.ADMIN_API_KEY,
            webhookSecret: env.CALENDAR_WEBHOOK_SECRET,
        },
        redis,
    });
}
