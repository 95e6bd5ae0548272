import type { Env } from './env';

export type RoomsMatchPolicy = 'at_least' | 'exact';

/** Operational knobs consumed by the leasing core. Built from env at boot. */
export interface LeasingSettings {
    timezone: string;
    maxMoveInDays: number;
    maxRecommendations: number;
    roomsPolicy: RoomsMatchPolicy;

    eveningReminderHour: number;
    morningReminderHour: number;
    abandonedLeadHours: number;
    followUpAfterTourHours: number;
    noShowFollowUpMinutes: number;

    followupMaxAttempts: number;
    followupRetryBackoffMs: number;
    followupBatchSize: number;
    followupPollIntervalMs: number;

    defaultTourMinutes: number;
    calendarTimeoutMs: number;

    lockTtlSeconds: number;
    lockWaitMs: number;

    /** Local HH:MM at which the daily rollup runs. */
    metricsRollupTime: string;
}

export const DEFAULT_SETTINGS: LeasingSettings = {
    timezone: 'Asia/Jerusalem',
    maxMoveInDays: 60,
    maxRecommendations: 3,
    roomsPolicy: 'at_least',

    eveningReminderHour: 19,
    morningReminderHour: 9,
    abandonedLeadHours: 4,
    followUpAfterTourHours: 2,
    noShowFollowUpMinutes: 30,

    followupMaxAttempts: 3,
    followupRetryBackoffMs: 0,
    followupBatchSize: 50,
    followupPollIntervalMs: 5 * 60_000,

    defaultTourMinutes: 30,
    calendarTimeoutMs: 10_000,

    lockTtlSeconds: 45,
    lockWaitMs: 5_000,

    metricsRollupTime: '23:55',
};

export function settingsFromEnv(env: Env): LeasingSettings {
    return {
        timezone: env.TIMEZONE,
        maxMoveInDays: env.MAX_MOVE_IN_DAYS,
        maxRecommendations: env.MAX_PROPERTY_RECOMMENDATIONS,
        roomsPolicy: env.ROOMS_MATCH_POLICY,

        eveningReminderHour: env.EVENING_REMINDER_HOUR,
        morningReminderHour: env.MORNING_REMINDER_HOUR,
        abandonedLeadHours: env.ABANDONED_LEAD_HOURS,
        followUpAfterTourHours: env.FOLLOW_UP_AFTER_TOUR_HOURS,
        noShowFollowUpMinutes: env.NO_SHOW_FOLLOW_UP_MINUTES,

        followupMaxAttempts: env.FOLLOWUP_MAX_ATTEMPTS,
        followupRetryBackoffMs: env.FOLLOWUP_RETRY_BACKOFF_MS,
        followupBatchSize: env.FOLLOWUP_BATCH_SIZE,
        followupPollIntervalMs: env.FOLLOWUP_POLL_INTERVAL_MS,

        defaultTourMinutes: env.DEFAULT_TOUR_MINUTES,
        calendarTimeoutMs: env.CALENDAR_TIMEOUT_MS,

        lockTtlSeconds: env.LOCK_TTL_SECONDS,
        lockWaitMs: env.LOCK_WAIT_MS,

        metricsRollupTime: env.METRICS_ROLLUP_TIME,
    };
}
