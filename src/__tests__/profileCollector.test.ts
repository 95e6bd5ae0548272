import { describe, expect, it } from 'vitest';
import { applyProfileUpdate, missingProfileFields, profileOf } from '../leasing/profileCollector';
import { makeLead } from './support/testContainer';

describe('missingProfileFields', () => {
    it('lists unanswered fields in asking order, leaving out skipped ones', () => {
        const lead = makeLead({ rooms: 3, budget: 7000 });

        expect(missingProfileFields(profileOf(lead), ['preferred_area', 'pet_owner'])).toEqual([
            'has_parking',
            'preferred_floor_min',
            'preferred_floor_max',
            'needs_furnished',
        ]);
    });

    it('treats false as an answer', () => {
        const lead = makeLead({
            rooms: 2,
            budget: 6000,
            has_parking: false,
            preferred_area: 'Florentin',
            preferred_floor_min: 0,
            preferred_floor_max: 5,
            needs_furnished: false,
            pet_owner: false,
        });

        expect(missingProfileFields(profileOf(lead), [])).toEqual([]);
    });
});

describe('applyProfileUpdate', () => {
    it('merges answers and keeps the skip list in field order', () => {
        const lead = makeLead({ stage: 'collecting_profile', skipped_profile_fields: ['pet_owner'] });

        const result = applyProfileUpdate(lead, { rooms: 2, has_parking: true }, ['preferred_area']);

        expect(result).toEqual({
            ok: true,
            patch: { rooms: 2, has_parking: true, skipped_profile_fields: ['preferred_area', 'pet_owner'] },
            missing: ['budget', 'preferred_floor_min', 'preferred_floor_max', 'needs_furnished'],
        });
    });

    it('takes an answered field off the skip list', () => {
        const lead = makeLead({ skipped_profile_fields: ['budget', 'pet_owner'] });

        const result = applyProfileUpdate(lead, { budget: 9000 });

        expect(result.ok && result.patch.skipped_profile_fields).toEqual(['pet_owner']);
    });

    it('rejects a field that is both answered and skipped', () => {
        expect(applyProfileUpdate(makeLead(), { rooms: 2 }, ['rooms'])).toEqual({
            ok: false,
            message: 'Fields both answered and skipped: rooms',
        });
    });

    it('rejects an inverted floor range, including one built across updates', () => {
        const lead = makeLead({ preferred_floor_max: 2 });

        expect(applyProfileUpdate(lead, { preferred_floor_min: 5 })).toEqual({
            ok: false,
            message: 'preferred_floor_min must not exceed preferred_floor_max',
        });
    });

    it('rejects non-positive rooms', () => {
        const result = applyProfileUpdate(makeLead(), { rooms: 0 });

        expect(result.ok).toBe(false);
    });
});
