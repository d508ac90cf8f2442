import type { DateFormat, ZonedTimestamp } from '../types.js';

// ============ Formatting ============

const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Format a Date in UTC.
 *
 * 'date' gives `YYYY-MM-DDTHH:MM:SSZ`, 'timestamp' keeps milliseconds
 * (`YYYY-MM-DDTHH:MM:SS.mmmZ`).
 */
export function formatDate(date: Date, format: DateFormat = 'timestamp'): string {
    const iso = date.toISOString();
    return format === 'date' ? `${iso.slice(0, 19)}Z` : iso;
}

/**
 * Format a zoned timestamp as wall-clock time in its own offset,
 * e.g. `2024-03-01T14:30:00.000+02:00`.
 */
export function formatZoned(value: ZonedTimestamp): string {
    const local = new Date(value.instant.getTime() + value.offsetMinutes * 60_000);
    const sign = value.offsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(value.offsetMinutes);
    return `${local.toISOString().slice(0, 23)}${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
}

export function isZonedTimestamp(value: unknown): value is ZonedTimestamp {
    return (
        typeof value === 'object' &&
        value !== null &&
        'instant' in value &&
        value.instant instanceof Date &&
        'offsetMinutes' in value &&
        typeof value.offsetMinutes === 'number'
    );
}

// ============ Parsing ============

const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|([+-])(\d{2}):(\d{2}))$/;

/**
 * Parse `YYYY-MM-DDTHH:MM:SS[.fraction](Z|±HH:MM)`.
 * Returns null when the text does not match or names an impossible date.
 * Fractions beyond milliseconds are truncated.
 */
export function parseIsoTimestamp(text: string): ZonedTimestamp | null {
    const match = ISO_TIMESTAMP.exec(text);
    if (!match) return null;

    const [, y, mo, d, h, mi, s, fraction, zone, sign, zh, zm] = match;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);
    const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

    if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
        return null;
    }

    // setUTCFullYear keeps years 0-99 as given; Date.UTC would map them to 19xx
    const wall = new Date(0);
    wall.setUTCFullYear(year, month - 1, day);
    wall.setUTCHours(hour, minute, second, millis);
    // 31 April rolls over into May
    if (wall.getUTCDate() !== day || wall.getUTCMonth() !== month - 1) {
        return null;
    }

    let offsetMinutes = 0;
    if (zone !== 'Z') {
        const hours = Number(zh);
        const minutes = Number(zm);
        if (hours > 23 || minutes > 59) return null;
        offsetMinutes = (sign === '-' ? -1 : 1) * (hours * 60 + minutes);
    }

    return {
        instant: new Date(wall.getTime() - offsetMinutes * 60_000),
        offsetMinutes,
    };
}
