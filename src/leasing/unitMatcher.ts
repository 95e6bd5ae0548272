/**
 * src/leasing/unitMatcher.ts
 *
 * Ranks a snapshot of units against a lead's profile.
 *
 * The outcome distinguishes two kinds of "nothing fits": `future_fit` when the
 * only thing in the way is that units free up after the desired move-in date,
 * and `no_fit` otherwise. They drive different re-engagement content, so the
 * split is part of the contract.
 */

import type { RoomsMatchPolicy } from '../config/settings';
import type { MatchProfile } from './profileCollector';
import type { UnitWithProperty } from './types';

export interface MatchOptions {
    roomsPolicy: RoomsMatchPolicy;
}

export type MatchOutcome =
    | { kind: 'matched'; units: UnitWithProperty[] }
    | { kind: 'future_fit'; earliestAvailableFrom: string | null }
    | { kind: 'no_fit'; binding: 'budget' | 'criteria' };

type Check = 'status' | 'rooms' | 'price' | 'parking' | 'floor' | 'furnished' | 'pets' | 'area' | 'available_from';

const ALL_CHECKS: readonly Check[] = [
    'status',
    'rooms',
    'price',
    'parking',
    'floor',
    'furnished',
    'pets',
    'area',
    'available_from',
];

function normalize(text: string): string {
    return text.toLowerCase().replace(/[\s\-_]/g, '');
}

function passes(check: Check, unit: UnitWithProperty, profile: MatchProfile, options: MatchOptions): boolean {
    switch (check) {
        case 'status':
            return unit.status === 'available';
        case 'rooms':
            if (profile.rooms === null) return true;
            return options.roomsPolicy === 'exact' ? unit.rooms === profile.rooms : unit.rooms >= profile.rooms;
        case 'price':
            return profile.budget === null || unit.price <= profile.budget;
        case 'parking':
            return profile.has_parking !== true || unit.has_parking;
        case 'floor':
            if (profile.preferred_floor_min === null || profile.preferred_floor_max === null) return true;
            return (
                unit.floor !== null &&
                unit.floor >= profile.preferred_floor_min &&
                unit.floor <= profile.preferred_floor_max
            );
        case 'furnished':
            return profile.needs_furnished !== true || unit.furnished;
        case 'pets':
            return profile.pet_owner !== true || unit.pet_friendly;
        case 'area': {
            if (!profile.preferred_area) return true;
            const wanted = normalize(profile.preferred_area);
            return normalize(unit.property.name).includes(wanted) || normalize(unit.property.address).includes(wanted);
        }
        case 'available_from':
            if (unit.available_from === null || profile.move_in_date === null) return true;
            return unit.available_from <= profile.move_in_date;
    }
}

function filterUnits(
    units: readonly UnitWithProperty[],
    profile: MatchProfile,
    options: MatchOptions,
    relaxed?: Check
): UnitWithProperty[] {
    const checks = ALL_CHECKS.filter((c) => c !== relaxed);
    return units.filter((unit) => checks.every((c) => passes(c, unit, profile, options)));
}

function compareUnits(profile: MatchProfile) {
    return (a: UnitWithProperty, b: UnitWithProperty): number => {
        const distance = (u: UnitWithProperty) =>
            profile.budget === null ? u.price : Math.abs(u.price - profile.budget);
        const byDistance = distance(a) - distance(b);
        if (byDistance !== 0) return byDistance;

        // null availability means "now" and sorts first
        const fromA = a.available_from ?? '';
        const fromB = b.available_from ?? '';
        if (fromA !== fromB) return fromA < fromB ? -1 : 1;

        return a.id - b.id;
    };
}

/** Eligible units in rank order. Never mutates the snapshot. */
export function rankUnits(
    profile: MatchProfile,
    units: readonly UnitWithProperty[],
    options: MatchOptions
): UnitWithProperty[] {
    return filterUnits(units, profile, options).sort(compareUnits(profile));
}

export function matchUnits(
    profile: MatchProfile,
    units: readonly UnitWithProperty[],
    options: MatchOptions
): MatchOutcome {
    const ranked = rankUnits(profile, units, options);
    if (ranked.length > 0) return { kind: 'matched', units: ranked };

    const laterOnly = filterUnits(units, profile, options, 'available_from');
    if (laterOnly.length > 0) {
        const earliest = laterOnly
            .map((u) => u.available_from)
            .filter((d): d is string => d !== null)
            .sort()[0];
        return { kind: 'future_fit', earliestAvailableFrom: earliest ?? null };
    }

    const overBudgetOnly = filterUnits(units, profile, options, 'price');
    return { kind: 'no_fit', binding: overBudgetOnly.length > 0 ? 'budget' : 'criteria' };
}
