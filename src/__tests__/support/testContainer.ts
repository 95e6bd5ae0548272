import { assemble, type Container } from '../../container';
import { DEFAULT_SETTINGS, type LeasingSettings } from '../../config/settings';
import { MemoryStore } from '../../db/memory/memoryStore';
import { loadCatalogFile, seedCatalog } from '../../db/memory/seedCatalog';
import type { Lead } from '../../leasing/types';
import { InProcessLockService } from '../../services/lockService';
import { ManualClock, RecordingSink, ScriptedCalendar } from './fakes';

/** 12:00 in Tel Aviv (UTC+3 in summer). */
export const TEST_NOW = '2026-07-01T09:00:00.000Z';
export const TEST_TODAY = '2026-07-01';

export const TEST_KEYS = {
    ingestKey: 'test-ingest-key',
    adminKey: 'test-admin-key',
    webhookSecret: 'test-webhook-secret',
};

export interface TestHarness {
    container: Container;
    store: MemoryStore;
    sink: RecordingSink;
    calendar: ScriptedCalendar;
    locks: InProcessLockService;
    clock: ManualClock;
}

export function createHarness(overrides: Partial<LeasingSettings> = {}): TestHarness {
    const clock = new ManualClock(TEST_NOW);
    const store = new MemoryStore();
    seedCatalog(store.units, loadCatalogFile(), TEST_TODAY);

    const sink = new RecordingSink();
    const calendar = new ScriptedCalendar();
    const locks = new InProcessLockService(() => clock.now().getTime());

    const container = assemble({
        settings: { ...DEFAULT_SETTINGS, ...overrides },
        store,
        locks,
        sink,
        calendar,
        auth: TEST_KEYS,
        now: clock.now,
    });

    return { container, store, sink, calendar, locks, clock };
}

export function makeLead(overrides: Partial<Lead> = {}): Lead {
    return {
        id: 1,
        phone_number: '+972501234567',
        name: 'Dana',
        email: null,
        stage: 'new',
        has_payslips: null,
        can_pay_deposit: null,
        move_in_date: null,
        rooms: null,
        budget: null,
        has_parking: null,
        preferred_area: null,
        preferred_floor_min: null,
        preferred_floor_max: null,
        needs_furnished: null,
        pet_owner: null,
        skipped_profile_fields: [],
        source: 'whatsapp',
        created_at: TEST_NOW,
        updated_at: TEST_NOW,
        last_interaction: TEST_NOW,
        ...overrides,
    };
}
