import { MAX_PREVIEW_WINDOW_DAYS } from '../constants';
import {
    addDays,
    daysBetween,
    eachDateInRange,
    isCalendarDate,
    isDateInRange,
    sortUniqueDates,
    weekdayOf,
    Weekday,
} from './calendar';
import {
    AvailabilityRecord,
    ChangeSet,
    cloneAvailabilityRecord,
    countChangeSetFields,
    createEmptyAvailabilityRecord,
    isAvailabilityRecordEmpty,
    MergeConflict,
    MergeViolation,
} from './models';

export type MergeResult =
    | {
        ok: true;
        record: AvailabilityRecord;
        conflicts: MergeConflict[];
    }
    | {
        ok: false;
        violation: MergeViolation;
        conflicts: MergeConflict[];
    };

export interface PreviewMergeSuccess {
    ok: true;
    existing_count: number;
    new_count: number;
    added: string[];
    removed: string[];
    unchanged: string[];
    conflicts: MergeConflict[];
    summary: string;
}

export interface PreviewMergeFailure {
    ok: false;
    violation: MergeViolation;
}

export type PreviewMergeResult = PreviewMergeSuccess | PreviewMergeFailure;

export interface AvailabilityDisplay {
    start_date: string | null;
    end_date: string | null;
    weekdays: string[];
    specific_dates: string[];
    exclusion_dates: string[];
    is_empty: boolean;
    summary: string;
}

const RESET_WITH_FIELDS: MergeViolation = {
    rule: 'reset_with_fields',
    field: 'reset',
    message: 'reset cannot be combined with other fields',
};

function intersectDates(
    left: readonly string[],
    right: readonly string[],
): string[] {
    const rightSet = new Set(right);

    return sortUniqueDates(left.filter((date) => rightSet.has(date)));
}

function describeRange(start: string | null, end: string | null): string {
    if (start !== null && end !== null) {
        return `${start}..${end}`;
    }

    if (start !== null) {
        return `from ${start}`;
    }

    if (end !== null) {
        return `until ${end}`;
    }

    return 'any date';
}

function hasWeekdayInRange(
    start: string,
    end: string,
    weekdays: readonly Weekday[],
): boolean {
    const selected = new Set(weekdays);
    const span = Math.min(daysBetween(start, end), 6);

    for (let offset = 0; offset <= span; offset += 1) {
        if (selected.has(weekdayOf(addDays(start, offset)))) {
            return true;
        }
    }

    return false;
}

export function isChangeSetEmpty(change: ChangeSet): boolean {
    return !change.reset && countChangeSetFields(change) === 0;
}

/**
 * Checks the cross-field invariants of a merged record. Rules run in a
 * fixed order and the first violation wins.
 */
export function validateAvailabilityRecord(
    record: AvailabilityRecord,
): MergeViolation | null {
    const overlap = intersectDates(
        record.specific_dates,
        record.exclusion_dates,
    );

    if (overlap.length > 0) {
        return {
            rule: 'specific_exclusion_overlap',
            message:
                'dates cannot be both specific and excluded: ' +
                overlap.join(', '),
            dates: overlap,
        };
    }

    const start = record.start_date;
    const end = record.end_date;

    if (start === null || end === null) {
        return null;
    }

    if (start > end) {
        return {
            rule: 'start_after_end',
            message: `start_date ${start} must not be after end_date ${end}`,
            dates: [start, end],
        };
    }

    const outside = sortUniqueDates([
        ...record.specific_dates,
        ...record.exclusion_dates,
    ].filter((date) => !isDateInRange(date, start, end)));

    if (outside.length > 0) {
        return {
            rule: 'date_outside_range',
            message:
                `dates fall outside ${start}..${end}: ` +
                outside.join(', '),
            dates: outside,
        };
    }

    if (
        record.weekdays.length > 0 &&
        !hasWeekdayInRange(start, end, record.weekdays)
    ) {
        return {
            rule: 'no_weekday_in_range',
            message:
                `no selected weekday falls within ${start}..${end}`,
        };
    }

    return null;
}

function collectAddedOutsideRange(
    existingDates: readonly string[],
    requestedDates: readonly string[] | undefined,
    merged: AvailabilityRecord,
): string[] {
    if (!requestedDates) {
        return [];
    }

    const existingSet = new Set(existingDates);

    return requestedDates.filter((date) => {
        return !existingSet.has(date) &&
            !isDateInRange(date, merged.start_date, merged.end_date);
    });
}

// With both bounds set, out-of-range dates are a hard violation instead.
function collectRangeConflicts(
    existing: AvailabilityRecord,
    merged: AvailabilityRecord,
    change: ChangeSet,
): MergeConflict[] {
    const halfOpen = (merged.start_date === null) !==
        (merged.end_date === null);

    if (!halfOpen) {
        return [];
    }

    const range = describeRange(merged.start_date, merged.end_date);
    const conflicts: MergeConflict[] = [];
    const exclusions = collectAddedOutsideRange(
        existing.exclusion_dates,
        change.exclusion_dates,
        merged,
    );

    if (exclusions.length > 0) {
        conflicts.push({
            type: 'exclusion_outside_range',
            severity: 'warning',
            message:
                `exclusion dates outside availability range (${range}): ` +
                exclusions.join(', '),
            dates: exclusions,
        });
    }

    const specific = collectAddedOutsideRange(
        existing.specific_dates,
        change.specific_dates,
        merged,
    );

    if (specific.length > 0) {
        conflicts.push({
            type: 'specific_outside_range',
            severity: 'warning',
            message:
                `specific dates outside availability range (${range}): ` +
                specific.join(', '),
            dates: specific,
        });
    }

    return conflicts;
}

export function mergeAvailability(
    existing: AvailabilityRecord,
    change: ChangeSet,
): MergeResult {
    const fieldCount = countChangeSetFields(change);

    if (change.reset) {
        if (fieldCount > 0) {
            return {
                ok: false,
                violation: RESET_WITH_FIELDS,
                conflicts: [],
            };
        }

        return {
            ok: true,
            record: createEmptyAvailabilityRecord(existing.item_id),
            conflicts: [],
        };
    }

    if (fieldCount === 0) {
        return {
            ok: true,
            record: cloneAvailabilityRecord(existing),
            conflicts: [],
        };
    }

    const merged = cloneAvailabilityRecord(existing);

    if (change.start_date !== undefined) {
        merged.start_date = change.start_date;
    }

    if (change.end_date !== undefined) {
        merged.end_date = change.end_date;
    }

    if (change.weekdays !== undefined) {
        merged.weekdays = [...change.weekdays];
    }

    if (change.specific_dates !== undefined) {
        merged.specific_dates = sortUniqueDates([
            ...existing.specific_dates,
            ...change.specific_dates,
        ]);
    }

    if (change.exclusion_dates !== undefined) {
        merged.exclusion_dates = sortUniqueDates([
            ...existing.exclusion_dates,
            ...change.exclusion_dates,
        ]);
    }

    const conflicts = collectRangeConflicts(existing, merged, change);
    const violation = validateAvailabilityRecord(merged);

    if (violation) {
        return {
            ok: false,
            violation,
            conflicts,
        };
    }

    return {
        ok: true,
        record: merged,
        conflicts,
    };
}

/**
 * Rejects change sets that cannot merge into any record: reset combined
 * with fields, or fields contradicting each other on their own.
 */
export function validateChangeSet(change: ChangeSet): MergeViolation | null {
    const result = mergeAvailability(
        createEmptyAvailabilityRecord('change-set'),
        change,
    );

    return result.ok ? null : result.violation;
}

export function analyzeChange(
    existing: AvailabilityRecord,
    change: ChangeSet,
): MergeConflict[] {
    const result = mergeAvailability(existing, change);
    const conflicts = [...result.conflicts];

    if (!change.reset) {
        const overlap = intersectDates(
            [...existing.specific_dates, ...(change.specific_dates || [])],
            [...existing.exclusion_dates, ...(change.exclusion_dates || [])],
        );

        if (overlap.length > 0) {
            conflicts.push({
                type: 'specific_and_excluded',
                severity: 'warning',
                message:
                    `${overlap.length} date(s) are both specific and ` +
                    'excluded (treated as excluded)',
                dates: overlap,
            });
        }
    }

    if (!result.ok) {
        conflicts.push({
            type: 'merge_rejected',
            severity: 'error',
            message: result.violation.message,
            dates: result.violation.dates || [],
        });
    }

    return conflicts;
}

export function availabilityRecordsEqual(
    left: AvailabilityRecord,
    right: AvailabilityRecord,
): boolean {
    const sameList = (
        a: readonly string[],
        b: readonly string[],
    ): boolean => {
        return a.length === b.length &&
            a.every((value, index) => value === b[index]);
    };

    return (
        left.item_id === right.item_id &&
        left.start_date === right.start_date &&
        left.end_date === right.end_date &&
        sameList(left.weekdays, right.weekdays) &&
        sameList(left.specific_dates, right.specific_dates) &&
        sameList(left.exclusion_dates, right.exclusion_dates)
    );
}

export function hasEffectiveChange(
    existing: AvailabilityRecord,
    change: ChangeSet,
): boolean {
    if (isChangeSetEmpty(change)) {
        return false;
    }

    const result = mergeAvailability(existing, change);

    if (!result.ok) {
        return true;
    }

    return !availabilityRecordsEqual(existing, result.record);
}

/**
 * Exclusions win over everything, specific dates win over bounds and
 * weekdays, and a record without rules is available on every date.
 */
export function isDateAvailable(
    record: AvailabilityRecord,
    date: string,
): boolean {
    if (record.exclusion_dates.includes(date)) {
        return false;
    }

    if (record.specific_dates.includes(date)) {
        return true;
    }

    if (!isDateInRange(date, record.start_date, record.end_date)) {
        return false;
    }

    if (record.weekdays.length === 0) {
        return true;
    }

    return record.weekdays.includes(weekdayOf(date));
}

export function expandAvailableDates(
    record: AvailabilityRecord,
    windowStart: string,
    windowEnd: string,
): string[] {
    return eachDateInRange(windowStart, windowEnd).filter((date) => {
        return isDateAvailable(record, date);
    });
}

function validatePreviewWindow(
    windowStart: string,
    windowEnd: string,
): MergeViolation | null {
    if (!isCalendarDate(windowStart) || !isCalendarDate(windowEnd)) {
        return {
            rule: 'invalid_preview_window',
            message: 'preview window bounds must be calendar dates',
        };
    }

    if (windowStart > windowEnd) {
        return {
            rule: 'invalid_preview_window',
            message: 'preview window start must not be after its end',
            dates: [windowStart, windowEnd],
        };
    }

    if (daysBetween(windowStart, windowEnd) > MAX_PREVIEW_WINDOW_DAYS) {
        return {
            rule: 'invalid_preview_window',
            message:
                `preview window must not exceed ${MAX_PREVIEW_WINDOW_DAYS} ` +
                'days',
            dates: [windowStart, windowEnd],
        };
    }

    return null;
}

export function previewMerge(
    existing: AvailabilityRecord,
    change: ChangeSet,
    windowStart: string,
    windowEnd: string,
): PreviewMergeResult {
    const windowViolation = validatePreviewWindow(windowStart, windowEnd);

    if (windowViolation) {
        return {
            ok: false,
            violation: windowViolation,
        };
    }

    const result = mergeAvailability(existing, change);

    if (!result.ok) {
        return {
            ok: false,
            violation: result.violation,
        };
    }

    const before = expandAvailableDates(existing, windowStart, windowEnd);
    const after = expandAvailableDates(result.record, windowStart, windowEnd);
    const beforeSet = new Set(before);
    const afterSet = new Set(after);
    const added = after.filter((date) => !beforeSet.has(date));
    const removed = before.filter((date) => !afterSet.has(date));
    const unchanged = after.filter((date) => beforeSet.has(date));

    return {
        ok: true,
        existing_count: before.length,
        new_count: after.length,
        added,
        removed,
        unchanged,
        conflicts: result.conflicts,
        summary:
            `${after.length} dates total: ${added.length} added, ` +
            `${removed.length} removed, ${unchanged.length} unchanged`,
    };
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}

export function describeAvailability(
    record: AvailabilityRecord,
): AvailabilityDisplay {
    const weekdays = record.weekdays.map(capitalize);
    const parts = [
        describeRange(record.start_date, record.end_date),
        weekdays.length > 0 ? `on ${weekdays.join(', ')}` : 'every weekday',
        `${record.specific_dates.length} specific`,
        `${record.exclusion_dates.length} excluded`,
    ];

    return {
        start_date: record.start_date,
        end_date: record.end_date,
        weekdays,
        specific_dates: [...record.specific_dates],
        exclusion_dates: [...record.exclusion_dates],
        is_empty: isAvailabilityRecordEmpty(record),
        summary: parts.join('; '),
    };
}
