import { z } from 'zod';
import {
    isCalendarDate,
    normalizeWeekdayToken,
    parseCalendarDate,
    sortUniqueDates,
    sortWeekdays,
    Weekday,
    WEEKDAYS,
} from './calendar';

export const CalendarDateSchema = z.string().refine(isCalendarDate, {
    message: 'must be a calendar date (YYYY-MM-DD)',
});

const WeekdaySchema = z.enum(WEEKDAYS);

export const AvailabilityRecordSchema = z
    .object({
        item_id: z.string().min(1),
        start_date: CalendarDateSchema.nullable(),
        end_date: CalendarDateSchema.nullable(),
        weekdays: z.array(WeekdaySchema),
        specific_dates: z.array(CalendarDateSchema),
        exclusion_dates: z.array(CalendarDateSchema),
    })
    .strict();

export interface AvailabilityRecord {
    item_id: string;
    start_date: string | null;
    end_date: string | null;
    weekdays: Weekday[];
    specific_dates: string[];
    exclusion_dates: string[];
}

/**
 * Normalized change set. An absent field leaves the stored value untouched;
 * `reset` clears the whole record and excludes every other field.
 */
export const ChangeSetSchema = z
    .object({
        start_date: CalendarDateSchema.optional(),
        end_date: CalendarDateSchema.optional(),
        weekdays: z.array(WeekdaySchema).min(1).optional(),
        specific_dates: z.array(CalendarDateSchema).min(1).optional(),
        exclusion_dates: z.array(CalendarDateSchema).min(1).optional(),
        reset: z.boolean(),
    })
    .strict();

export type ChangeSet = z.infer<typeof ChangeSetSchema>;

const ListInputSchema = z
    .union([
        z.array(z.union([z.string(), z.number()])),
        z.string(),
    ])
    .nullable()
    .optional();

const DateInputSchema = z.string().nullable().optional();

export const ChangeSetInputSchema = z
    .object({
        start_date: DateInputSchema,
        end_date: DateInputSchema,
        weekdays: ListInputSchema,
        specific_dates: ListInputSchema,
        exclusion_dates: ListInputSchema,
        specific: ListInputSchema,
        exclusions: ListInputSchema,
        reset: z.boolean().optional(),
    })
    .strict();

export type ChangeSetInput = z.infer<typeof ChangeSetInputSchema>;

export const MERGE_RULES = [
    'invalid_field',
    'reset_with_fields',
    'specific_exclusion_overlap',
    'start_after_end',
    'date_outside_range',
    'no_weekday_in_range',
    'invalid_preview_window',
] as const;

export type MergeRule = (typeof MERGE_RULES)[number];

export interface MergeViolation {
    rule: MergeRule;
    message: string;
    field?: string;
    dates?: string[];
}

export type MergeConflictType =
    | 'exclusion_outside_range'
    | 'specific_outside_range'
    | 'specific_and_excluded'
    | 'merge_rejected';

export interface MergeConflict {
    type: MergeConflictType;
    severity: 'warning' | 'error';
    message: string;
    dates: string[];
}

export type NormalizeChangeSetResult =
    | {
        ok: true;
        change: ChangeSet;
    }
    | {
        ok: false;
        violation: MergeViolation;
    };

export function createEmptyAvailabilityRecord(
    itemId: string,
): AvailabilityRecord {
    return {
        item_id: itemId,
        start_date: null,
        end_date: null,
        weekdays: [],
        specific_dates: [],
        exclusion_dates: [],
    };
}

export function cloneAvailabilityRecord(
    record: AvailabilityRecord,
): AvailabilityRecord {
    return {
        ...record,
        weekdays: [...record.weekdays],
        specific_dates: [...record.specific_dates],
        exclusion_dates: [...record.exclusion_dates],
    };
}

export function isAvailabilityRecordEmpty(
    record: AvailabilityRecord,
): boolean {
    return (
        record.start_date === null &&
        record.end_date === null &&
        record.weekdays.length === 0 &&
        record.specific_dates.length === 0 &&
        record.exclusion_dates.length === 0
    );
}

export function parseAvailabilityRecord(raw: unknown): AvailabilityRecord {
    const parsed = AvailabilityRecordSchema.safeParse(raw);

    if (!parsed.success) {
        throw new Error(
            'invalid persisted availability record: ' +
            (parsed.error.issues[0]?.message || 'unknown issue'),
        );
    }

    return {
        ...parsed.data,
        weekdays: sortWeekdays(parsed.data.weekdays),
        specific_dates: sortUniqueDates(parsed.data.specific_dates),
        exclusion_dates: sortUniqueDates(parsed.data.exclusion_dates),
    };
}

function invalidField(field: string, message: string): NormalizeChangeSetResult {
    return {
        ok: false,
        violation: {
            rule: 'invalid_field',
            field,
            message: `${field} ${message}`,
        },
    };
}

function toTokens(
    raw: Array<string | number> | string | null | undefined,
): Array<string | number> {
    if (raw === null || raw === undefined) {
        return [];
    }

    const values: Array<string | number> = typeof raw === 'string'
        ? raw.split(',')
        : raw;

    return values.filter((value) => {
        return typeof value === 'number' || value.trim() !== '';
    });
}

function normalizeDateList(
    field: string,
    tokens: Array<string | number>,
): { ok: true; dates: string[] } | { ok: false; invalid: string } {
    const dates: string[] = [];

    for (const token of tokens) {
        const parsed = typeof token === 'string'
            ? parseCalendarDate(token)
            : null;

        if (!parsed) {
            return {
                ok: false,
                invalid: `${field} contains an invalid date: ${String(token)}`,
            };
        }

        dates.push(parsed);
    }

    return {
        ok: true,
        dates: sortUniqueDates(dates),
    };
}

export function countChangeSetFields(change: ChangeSet): number {
    let count = 0;

    if (change.start_date !== undefined) {
        count += 1;
    }

    if (change.end_date !== undefined) {
        count += 1;
    }

    if (change.weekdays !== undefined) {
        count += 1;
    }

    if (change.specific_dates !== undefined) {
        count += 1;
    }

    if (change.exclusion_dates !== undefined) {
        count += 1;
    }

    return count;
}

/**
 * Turns operator form input into a typed change set. Blank strings, nulls
 * and empty lists become absent fields; comma separated strings are split.
 */
export function normalizeChangeSetInput(
    raw: unknown,
): NormalizeChangeSetResult {
    const parsed = ChangeSetInputSchema.safeParse(raw ?? {});

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue?.path.join('.') || 'changes';

        return {
            ok: false,
            violation: {
                rule: 'invalid_field',
                field,
                message: `${field}: ${issue?.message || 'invalid change set'}`,
            },
        };
    }

    const input = parsed.data;
    const change: ChangeSet = {
        reset: input.reset === true,
    };

    for (const field of ['start_date', 'end_date'] as const) {
        const value = input[field];

        if (value === null || value === undefined || value.trim() === '') {
            continue;
        }

        const date = parseCalendarDate(value);

        if (!date) {
            return invalidField(
                field,
                'must be a calendar date (YYYY-MM-DD or DD/MM/YYYY)',
            );
        }

        change[field] = date;
    }

    const weekdayTokens = toTokens(input.weekdays);

    if (weekdayTokens.length > 0) {
        const weekdays: Weekday[] = [];

        for (const token of weekdayTokens) {
            const weekday = normalizeWeekdayToken(token);

            if (!weekday) {
                return invalidField(
                    'weekdays',
                    `contains an invalid weekday: ${String(token)}`,
                );
            }

            weekdays.push(weekday);
        }

        change.weekdays = sortWeekdays(weekdays);
    }

    const dateFields = [
        ['specific_dates', input.specific_dates, input.specific],
        ['exclusion_dates', input.exclusion_dates, input.exclusions],
    ] as const;

    for (const [field, primary, alias] of dateFields) {
        const tokens = [...toTokens(primary), ...toTokens(alias)];

        if (tokens.length === 0) {
            continue;
        }

        const normalized = normalizeDateList(field, tokens);

        if (!normalized.ok) {
            return {
                ok: false,
                violation: {
                    rule: 'invalid_field',
                    field,
                    message: normalized.invalid,
                },
            };
        }

        change[field] = normalized.dates;
    }

    if (change.reset && countChangeSetFields(change) > 0) {
        return {
            ok: false,
            violation: {
                rule: 'reset_with_fields',
                field: 'reset',
                message: 'reset cannot be combined with other fields',
            },
        };
    }

    return {
        ok: true,
        change,
    };
}
