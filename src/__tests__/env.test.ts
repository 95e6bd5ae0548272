import { describe, expect, it } from 'vitest';
import { parseEnv } from '../config/env';
import { DEFAULT_SETTINGS, settingsFromEnv } from '../config/settings';
import { LeadRowSchema, parseRow } from '../db/rows';

describe('parseEnv', () => {
    it('fills every default for the memory driver', () => {
        const env = parseEnv({ STORE_DRIVER: 'memory' });

        expect(env.PORT).toBe(3000);
        expect(env.CALENDAR_MODE).toBe('mock');
        expect(env.SMS_MODE).toBe('mock');
        expect(settingsFromEnv(env)).toEqual(DEFAULT_SETTINGS);
    });

    it('coerces numeric knobs from strings', () => {
        const env = parseEnv({ STORE_DRIVER: 'memory', MAX_MOVE_IN_DAYS: '45', ROOMS_MATCH_POLICY: 'exact' });
        const settings = settingsFromEnv(env);

        expect(settings.maxMoveInDays).toBe(45);
        expect(settings.roomsPolicy).toBe('exact');
    });

    it('requires Supabase credentials for the supabase driver', () => {
        expect(() => parseEnv({ STORE_DRIVER: 'supabase' })).toThrow(
            'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required when STORE_DRIVER=supabase'
        );
    });

    it('requires the lock TTL to outlast the longest calendar round trips', () => {
        expect(() => parseEnv({ STORE_DRIVER: 'memory', LOCK_TTL_SECONDS: '20' })).toThrow(
            'LOCK_TTL_SECONDS must exceed 35s (3 × CALENDAR_TIMEOUT_MS + LOCK_WAIT_MS)'
        );
        expect(parseEnv({ STORE_DRIVER: 'memory', LOCK_TTL_SECONDS: '20', CALENDAR_TIMEOUT_MS: '4000' }).LOCK_TTL_SECONDS).toBe(20);
    });

    it('rejects a malformed rollup time', () => {
        expect(() => parseEnv({ STORE_DRIVER: 'memory', METRICS_ROLLUP_TIME: '24:00' })).toThrow(
            'METRICS_ROLLUP_TIME must be HH:MM'
        );
    });
});

describe('parseRow', () => {
    const row = {
        id: 7,
        phone_number: '+972501234567',
        name: 'Dana',
        email: null,
        stage: 'collecting_profile',
        has_payslips: true,
        can_pay_deposit: true,
        move_in_date: '2026-07-20',
        rooms: null,
        budget: '6500.00',
        has_parking: null,
        preferred_area: null,
        preferred_floor_min: null,
        preferred_floor_max: null,
        needs_furnished: null,
        pet_owner: null,
        skipped_profile_fields: null,
        source: 'whatsapp',
        created_at: '2026-07-01T09:00:00.000Z',
        updated_at: '2026-07-01T09:00:00.000Z',
        last_interaction: '2026-07-01T09:00:00.000Z',
    };

    it('coerces numeric strings and defaults skipped fields', () => {
        const lead = parseRow(LeadRowSchema, row, 'leads');

        expect(lead.budget).toBe(6500);
        expect(lead.skipped_profile_fields).toEqual([]);
    });

    it('names the table and the drifted column', () => {
        expect(() => parseRow(LeadRowSchema, { ...row, stage: 'archived' }, 'leads')).toThrow(
            /^Unexpected leads row shape: stage: /
        );
    });
});
