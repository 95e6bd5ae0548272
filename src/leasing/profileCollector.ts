/**
 * src/leasing/profileCollector.ts
 *
 * Accumulates the preference data used for unit matching. Pure: takes the
 * current lead by value and returns a patch, never writes anything itself.
 */

import { z } from 'zod';
import { PROFILE_FIELDS } from './types';
import type { Lead, LeadPatch, LeadProfile, ProfileField } from './types';

export const ProfileFieldSchema = z.enum(PROFILE_FIELDS);

export const ProfileFieldsSchema = z
    .object({
        rooms: z.number().int().positive(),
        budget: z.number().positive(),
        has_parking: z.boolean(),
        preferred_area: z.string().trim().min(1),
        preferred_floor_min: z.number().int(),
        preferred_floor_max: z.number().int(),
        needs_furnished: z.boolean(),
        pet_owner: z.boolean(),
    })
    .partial()
    .strict();

export type ProfileFields = z.infer<typeof ProfileFieldsSchema>;

export interface MatchProfile extends LeadProfile {
    move_in_date: string | null;
}

export type ProfileUpdateResult =
    | { ok: true; patch: LeadPatch; missing: ProfileField[] }
    | { ok: false; message: string };

export function profileOf(lead: Lead): LeadProfile {
    return {
        rooms: lead.rooms,
        budget: lead.budget,
        has_parking: lead.has_parking,
        preferred_area: lead.preferred_area,
        preferred_floor_min: lead.preferred_floor_min,
        preferred_floor_max: lead.preferred_floor_max,
        needs_furnished: lead.needs_furnished,
        pet_owner: lead.pet_owner,
    };
}

/** Profile fields still neither answered nor skipped, in the order we ask for them. */
export function missingProfileFields(
    profile: LeadProfile,
    skipped: readonly ProfileField[]
): ProfileField[] {
    return PROFILE_FIELDS.filter((field) => profile[field] === null && !skipped.includes(field));
}

export function applyProfileUpdate(
    lead: Lead,
    fields: ProfileFields,
    skip: readonly ProfileField[] = []
): ProfileUpdateResult {
    const parsed = ProfileFieldsSchema.safeParse(fields);
    if (!parsed.success) {
        return { ok: false, message: parsed.error.errors.map((e) => e.message).join('; ') };
    }

    const answered = Object.keys(parsed.data).filter((key): key is ProfileField =>
        ProfileFieldSchema.safeParse(key).success
    );
    const conflicting = skip.filter((field) => answered.includes(field));
    if (conflicting.length > 0) {
        return { ok: false, message: `Fields both answered and skipped: ${conflicting.join(', ')}` };
    }

    const next: LeadProfile = { ...profileOf(lead), ...parsed.data };

    if (
        next.preferred_floor_min !== null &&
        next.preferred_floor_max !== null &&
        next.preferred_floor_min > next.preferred_floor_max
    ) {
        return { ok: false, message: 'preferred_floor_min must not exceed preferred_floor_max' };
    }

    // answering a previously skipped field takes it off the skip list
    const skipped = Array.from(
        new Set([...lead.skipped_profile_fields.filter((f) => !answered.includes(f)), ...skip])
    ).sort((a, b) => PROFILE_FIELDS.indexOf(a) - PROFILE_FIELDS.indexOf(b));

    return {
        ok: true,
        patch: { ...parsed.data, skipped_profile_fields: skipped },
        missing: missingProfileFields(next, skipped),
    };
}

export function toMatchProfile(lead: Lead): MatchProfile {
    return { ...profileOf(lead), move_in_date: lead.move_in_date };
}
