import { z } from 'zod';
import dotenv from 'dotenv';

const int = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z
    .object({
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
        PORT: z.string().default('3000').transform(Number),
        LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

        STORE_DRIVER: z.enum(['supabase', 'memory']).default('supabase'),
        SUPABASE_URL: z.string().url('SUPABASE_URL must be a valid URL').optional(),
        SUPABASE_SERVICE_ROLE_KEY: z.string().min(10, 'SUPABASE_SERVICE_ROLE_KEY is too short').optional(),
        REDIS_URL: z.string().url('REDIS_URL must be a valid Redis URL').optional(),

        TIMEZONE: z.string().default('Asia/Jerusalem'),
        MAX_MOVE_IN_DAYS: int(60),
        MAX_PROPERTY_RECOMMENDATIONS: z.coerce.number().int().positive().default(3),
        ROOMS_MATCH_POLICY: z.enum(['at_least', 'exact']).default('at_least'),

        EVENING_REMINDER_HOUR: z.coerce.number().int().min(0).max(23).default(19),
        MORNING_REMINDER_HOUR: z.coerce.number().int().min(0).max(23).default(9),
        ABANDONED_LEAD_HOURS: int(4),
        FOLLOW_UP_AFTER_TOUR_HOURS: int(2),
        NO_SHOW_FOLLOW_UP_MINUTES: int(30),

        FOLLOWUP_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
        FOLLOWUP_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
        FOLLOWUP_RETRY_BACKOFF_MS: int(0),
        FOLLOWUP_BATCH_SIZE: z.coerce.number().int().positive().default(50),
        METRICS_ROLLUP_TIME: z
            .string()
            .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'METRICS_ROLLUP_TIME must be HH:MM')
            .default('23:55'),

        DEFAULT_TOUR_MINUTES: z.coerce.number().int().positive().default(30),
        CALENDAR_MODE: z.enum(['live', 'mock']).default('mock'),
        CALENDAR_API_URL: z.string().url().optional(),
        CALENDAR_API_TOKEN: z.string().optional(),
        CALENDAR_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
        CALENDAR_WEBHOOK_SECRET: z.string().min(8, 'CALENDAR_WEBHOOK_SECRET is too short').optional(),

        SMS_MODE: z.enum(['live', 'mock']).default('mock'),
        TWILIO_ACCOUNT_SID: z.string().optional(),
        TWILIO_AUTH_TOKEN: z.string().optional(),
        TWILIO_WHATSAPP_FROM: z.string().optional(),

        INGEST_API_KEY: z.string().min(8, 'INGEST_API_KEY is too short').optional(),
        ADMIN_API_KEY: z.string().min(8, 'ADMIN_API_KEY is too short').optional(),

        LOCK_TTL_SECONDS: z.coerce.number().int().positive().default(45),
        LOCK_WAIT_MS: int(5_000),
    })
    .superRefine((env, ctx) => {
        if (env.STORE_DRIVER === 'supabase' && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['SUPABASE_URL'],
                message: 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when STORE_DRIVER=supabase',
            });
        }
        if (env.CALENDAR_MODE === 'live' && !env.CALENDAR_API_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['CALENDAR_API_URL'],
                message: 'CALENDAR_API_URL is required when CALENDAR_MODE=live',
            });
        }
        // a booking holds the lead lock across a prior cancel, the unit lock wait, the booking and a rollback cancel
        const longestLockedPath = env.CALENDAR_TIMEOUT_MS * 3 + env.LOCK_WAIT_MS;
        if (env.LOCK_TTL_SECONDS * 1000 <= longestLockedPath) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['LOCK_TTL_SECONDS'],
                message: `LOCK_TTL_SECONDS must exceed ${longestLockedPath / 1000}s (3 × CALENDAR_TIMEOUT_MS + LOCK_WAIT_MS)`,
            });
        }
        if (env.SMS_MODE === 'live' && (!env.TWILIO_ACCOUNT_SID || !env.TWILIO_AUTH_TOKEN || !env.TWILIO_WHATSAPP_FROM)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['TWILIO_ACCOUNT_SID'],
                message: 'Twilio credentials and TWILIO_WHATSAPP_FROM are required when SMS_MODE=live',
            });
        }
    });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
    return envSchema.parse(source);
}

export function loadEnv(): Env {
    dotenv.config();

    const parsed = envSchema.safeParse(process.env);

    if (!parsed.success) {
        console.error('❌  Invalid environment variables:\n', parsed.error.format());
        process.exit(1);
    }

    return parsed.data;
}
