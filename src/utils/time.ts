/**
 * src/utils/time.ts
 *
 * Wall-clock helpers for a named IANA time zone, built on Intl.
 *
 * Reminder hours ("19:00 the evening before") and metric days are defined in
 * the operator's local time, while every timestamp we store is a UTC instant.
 */

import { addDays, parseISO } from 'date-fns';

export interface WallClock {
    year: number;
    month: number; // 1-12
    day: number;
    hour: number;
    minute: number;
    second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let fmt = formatters.get(timeZone);
    if (!fmt) {
        fmt = new Intl.DateTimeFormat('en-US', {
            timeZone,
            hourCycle: 'h23',
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
        });
        formatters.set(timeZone, fmt);
    }
    return fmt;
}

export function toWallClock(instant: Date, timeZone: string): WallClock {
    const parts = formatterFor(timeZone).formatToParts(instant);
    const pick = (type: Intl.DateTimeFormatPartTypes): number =>
        Number(parts.find((p) => p.type === type)?.value ?? 0);

    return {
        year: pick('year'),
        month: pick('month'),
        day: pick('day'),
        hour: pick('hour'),
        minute: pick('minute'),
        second: pick('second'),
    };
}

/** Offset of `timeZone` from UTC at `instant`, in milliseconds (east positive). */
export function zoneOffsetMs(instant: Date, timeZone: string): number {
    const wall = toWallClock(instant, timeZone);
    const asUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
    const truncated = instant.getTime() - instant.getUTCMilliseconds();
    return asUtc - truncated;
}

/** The UTC instant at which the clocks in `timeZone` show `wall`. */
export function fromWallClock(wall: Omit<WallClock, 'second'> & { second?: number }, timeZone: string): Date {
    const guess = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second ?? 0);
    const firstPass = guess - zoneOffsetMs(new Date(guess), timeZone);
    // second pass settles instants whose offset differs from the guess (DST edges)
    return new Date(guess - zoneOffsetMs(new Date(firstPass), timeZone));
}

/** Local calendar date (YYYY-MM-DD) of an instant. */
export function localDate(instant: Date, timeZone: string): string {
    const { year, month, day } = toWallClock(instant, timeZone);
    return `${year}-${pad(month)}-${pad(day)}`;
}

/** Local HH:MM of an instant. */
export function localTime(instant: Date, timeZone: string): string {
    const { hour, minute } = toWallClock(instant, timeZone);
    return `${pad(hour)}:${pad(minute)}`;
}

export function formatLocalDateTime(instant: Date, timeZone: string): string {
    return `${localDate(instant, timeZone)} ${localTime(instant, timeZone)}`;
}

export function shiftDate(isoDate: string, days: number): string {
    const shifted = addDays(parseISO(`${isoDate}T00:00:00Z`), days);
    return shifted.toISOString().slice(0, 10);
}

/** Instant `hour`:00 local time on the local date `isoDate`. */
export function atLocalHour(isoDate: string, hour: number, timeZone: string, minute = 0): Date {
    const [year, month, day] = isoDate.split('-').map(Number);
    return fromWallClock({ year, month, day, hour, minute }, timeZone);
}

/** [start, end) of the local day `isoDate` as UTC instants. */
export function localDayBounds(isoDate: string, timeZone: string): { start: Date; end: Date } {
    return {
        start: atLocalHour(isoDate, 0, timeZone),
        end: atLocalHour(shiftDate(isoDate, 1), 0, timeZone),
    };
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
    if (!ISO_DATE.test(value)) return false;
    const parsed = parseISO(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/** Whole days from local date `from` to local date `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
    const ms = parseISO(`${to}T00:00:00Z`).getTime() - parseISO(`${from}T00:00:00Z`).getTime();
    return Math.round(ms / 86_400_000);
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function pad(n: number): string {
    return String(n).padStart(2, '0');
}
