const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const CALENDAR_DATE_TIME_PREFIX = /^(\d{4}-\d{2}-\d{2})T/;
const DISPLAY_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const MS_PER_DAY = 86_400_000;

export const WEEKDAYS = [
    'sunday',
    'monday',
    'tuesday',
    'wednesday',
    'thursday',
    'friday',
    'saturday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

function toUtcMs(year: number, month: number, day: number): number | null {
    const ms = Date.UTC(year, month - 1, day);
    const date = new Date(ms);

    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day
    ) {
        return null;
    }

    return ms;
}

function fromUtcMs(ms: number): string {
    return new Date(ms).toISOString().slice(0, 10);
}

function calendarDateToMs(date: string): number {
    const match = CALENDAR_DATE.exec(date);

    if (!match) {
        throw new Error(`invalid calendar date: ${date}`);
    }

    const ms = toUtcMs(Number(match[1]), Number(match[2]), Number(match[3]));

    if (ms === null) {
        throw new Error(`invalid calendar date: ${date}`);
    }

    return ms;
}

export function isCalendarDate(value: string): boolean {
    const match = CALENDAR_DATE.exec(value);

    if (!match) {
        return false;
    }

    return toUtcMs(
        Number(match[1]),
        Number(match[2]),
        Number(match[3]),
    ) !== null;
}

/**
 * Accepts `YYYY-MM-DD`, an ISO timestamp (date part only) or the
 * day-first display form `DD/MM/YYYY`. Returns null for anything else.
 */
export function parseCalendarDate(raw: string): string | null {
    const trimmed = raw.trim();

    if (isCalendarDate(trimmed)) {
        return trimmed;
    }

    const timestampMatch = CALENDAR_DATE_TIME_PREFIX.exec(trimmed);

    if (timestampMatch && isCalendarDate(timestampMatch[1])) {
        return timestampMatch[1];
    }

    const displayMatch = DISPLAY_DATE.exec(trimmed);

    if (!displayMatch) {
        return null;
    }

    const ms = toUtcMs(
        Number(displayMatch[3]),
        Number(displayMatch[2]),
        Number(displayMatch[1]),
    );

    return ms === null ? null : fromUtcMs(ms);
}

export function toCalendarDate(instant: Date): string {
    return instant.toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
    return fromUtcMs(calendarDateToMs(date) + days * MS_PER_DAY);
}

export function compareDates(left: string, right: string): number {
    if (left < right) {
        return -1;
    }

    return left > right ? 1 : 0;
}

export function daysBetween(start: string, end: string): number {
    return Math.round(
        (calendarDateToMs(end) - calendarDateToMs(start)) / MS_PER_DAY,
    );
}

export function weekdayOf(date: string): Weekday {
    return WEEKDAYS[new Date(calendarDateToMs(date)).getUTCDay()];
}

export function weekdayIndex(day: Weekday): number {
    return WEEKDAYS.indexOf(day);
}

export function eachDateInRange(start: string, end: string): string[] {
    const out: string[] = [];
    const endMs = calendarDateToMs(end);

    for (
        let cursor = calendarDateToMs(start);
        cursor <= endMs;
        cursor += MS_PER_DAY
    ) {
        out.push(fromUtcMs(cursor));
    }

    return out;
}

export function isDateInRange(
    date: string,
    start: string | null,
    end: string | null,
): boolean {
    if (start !== null && date < start) {
        return false;
    }

    if (end !== null && date > end) {
        return false;
    }

    return true;
}

export function normalizeWeekdayToken(token: unknown): Weekday | null {
    if (typeof token === 'number') {
        if (Number.isInteger(token) && token >= 0 && token <= 6) {
            return WEEKDAYS[token];
        }

        return null;
    }

    if (typeof token !== 'string') {
        return null;
    }

    const normalized = token.trim().toLowerCase();

    if (/^[0-6]$/.test(normalized)) {
        return WEEKDAYS[Number(normalized)];
    }

    for (const day of WEEKDAYS) {
        if (normalized === day || normalized === day.slice(0, 3)) {
            return day;
        }
    }

    return null;
}

export function sortWeekdays(days: readonly Weekday[]): Weekday[] {
    return Array.from(new Set(days)).sort((left, right) => {
        return weekdayIndex(left) - weekdayIndex(right);
    });
}

export function sortUniqueDates(dates: readonly string[]): string[] {
    return Array.from(new Set(dates)).sort(compareDates);
}
