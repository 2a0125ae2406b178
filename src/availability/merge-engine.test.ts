import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import {
    analyzeChange,
    availabilityRecordsEqual,
    describeAvailability,
    expandAvailableDates,
    hasEffectiveChange,
    isChangeSetEmpty,
    isDateAvailable,
    mergeAvailability,
    previewMerge,
    validateChangeSet,
} from './merge-engine';
import {
    AvailabilityRecord,
    ChangeSet,
    createEmptyAvailabilityRecord,
} from './models';

function buildRecord(
    overrides: Partial<AvailabilityRecord> = {},
): AvailabilityRecord {
    return {
        ...createEmptyAvailabilityRecord('item-1'),
        ...overrides,
    };
}

function change(overrides: Partial<ChangeSet> = {}): ChangeSet {
    return {
        reset: false,
        ...overrides,
    };
}

function mergedRecord(
    existing: AvailabilityRecord,
    changeSet: ChangeSet,
): AvailabilityRecord {
    const result = mergeAvailability(existing, changeSet);

    if (!result.ok) {
        assert.fail(`unexpected violation: ${result.violation.message}`);
    }

    return result.record;
}

const SUMMER_SEASON = buildRecord({
    start_date: '2026-03-01',
    end_date: '2026-08-31',
    weekdays: ['monday', 'friday'],
    specific_dates: ['2026-07-14'],
    exclusion_dates: ['2026-08-15'],
});

describe('mergeAvailability field semantics', () => {
    test('an empty change set returns the existing record', () => {
        const result = mergeAvailability(SUMMER_SEASON, change());

        assert.equal(result.ok, true);

        if (result.ok) {
            assert.deepEqual(result.record, SUMMER_SEASON);
            assert.deepEqual(result.conflicts, []);
        }
    });

    test('an empty change set skips validation of legacy records', () => {
        const legacy = buildRecord({
            start_date: '2026-09-01',
            end_date: '2026-08-01',
        });
        const result = mergeAvailability(legacy, change());

        assert.equal(result.ok, true);
    });

    test('reset clears every field', () => {
        const merged = mergedRecord(SUMMER_SEASON, change({ reset: true }));

        assert.deepEqual(merged, createEmptyAvailabilityRecord('item-1'));
    });

    test('specific dates are unioned and sorted', () => {
        const merged = mergedRecord(
            buildRecord({ specific_dates: ['2026-07-14'] }),
            change({ specific_dates: ['2026-12-25'] }),
        );

        assert.deepEqual(merged.specific_dates, ['2026-07-14', '2026-12-25']);
    });

    test('exclusion dates are unioned without duplicates', () => {
        const merged = mergedRecord(
            SUMMER_SEASON,
            change({ exclusion_dates: ['2026-08-15', '2026-04-06'] }),
        );

        assert.deepEqual(merged.exclusion_dates, ['2026-04-06', '2026-08-15']);
    });

    test('weekdays replace the existing set entirely', () => {
        const merged = mergedRecord(
            SUMMER_SEASON,
            change({ weekdays: ['saturday'] }),
        );

        assert.deepEqual(merged.weekdays, ['saturday']);
    });

    test('absent bounds are kept', () => {
        const merged = mergedRecord(
            SUMMER_SEASON,
            change({ end_date: '2026-09-30' }),
        );

        assert.equal(merged.start_date, '2026-03-01');
        assert.equal(merged.end_date, '2026-09-30');
        assert.deepEqual(merged.specific_dates, ['2026-07-14']);
    });

    test('specific dates only grow across merges', () => {
        const additions = [
            ['2026-05-01'],
            ['2026-03-02', '2026-07-14'],
            ['2026-08-31'],
        ];
        let current = SUMMER_SEASON;

        for (const dates of additions) {
            const next = mergedRecord(current, change({ specific_dates: dates }));

            for (const date of current.specific_dates) {
                assert.ok(next.specific_dates.includes(date));
            }

            current = next;
        }

        assert.deepEqual(current.specific_dates, [
            '2026-03-02',
            '2026-05-01',
            '2026-07-14',
            '2026-08-31',
        ]);
    });
});

describe('mergeAvailability validation', () => {
    test('rejects exclusions outside the bound range', () => {
        const result = mergeAvailability(
            buildRecord({ start_date: '2026-03-01', end_date: '2026-08-31' }),
            change({ exclusion_dates: ['2027-01-01'] }),
        );

        assert.equal(result.ok, false);

        if (!result.ok) {
            assert.equal(result.violation.rule, 'date_outside_range');
            assert.equal(
                result.violation.message,
                'dates fall outside 2026-03-01..2026-08-31: 2027-01-01',
            );
            assert.deepEqual(result.violation.dates, ['2027-01-01']);
        }
    });

    test('rejects a date both specific and excluded', () => {
        const result = mergeAvailability(
            buildRecord({ specific_dates: ['2026-07-14'] }),
            change({ exclusion_dates: ['2026-07-14'] }),
        );

        assert.equal(result.ok, false);

        if (!result.ok) {
            assert.equal(result.violation.rule, 'specific_exclusion_overlap');
            assert.deepEqual(result.violation.dates, ['2026-07-14']);
        }
    });

    test('rejects a start after the end', () => {
        const result = mergeAvailability(
            buildRecord({ end_date: '2026-03-01' }),
            change({ start_date: '2026-04-01' }),
        );

        assert.equal(result.ok, false);

        if (!result.ok) {
            assert.equal(result.violation.rule, 'start_after_end');
            assert.equal(
                result.violation.message,
                'start_date 2026-04-01 must not be after end_date 2026-03-01',
            );
        }
    });

    test('rejects weekdays that never occur inside the range', () => {
        const existing = buildRecord({
            start_date: '2026-10-19',
            end_date: '2026-10-20',
        });
        const rejected = mergeAvailability(
            existing,
            change({ weekdays: ['saturday'] }),
        );

        assert.equal(rejected.ok, false);

        if (!rejected.ok) {
            assert.equal(rejected.violation.rule, 'no_weekday_in_range');
        }

        const accepted = mergeAvailability(
            existing,
            change({ weekdays: ['tuesday'] }),
        );

        assert.equal(accepted.ok, true);
    });

    test('warns about new dates outside a half-open range', () => {
        const result = mergeAvailability(
            buildRecord({ start_date: '2026-03-01' }),
            change({ exclusion_dates: ['2026-01-15', '2026-04-06'] }),
        );

        assert.equal(result.ok, true);
        assert.deepEqual(result.conflicts, [
            {
                type: 'exclusion_outside_range',
                severity: 'warning',
                message:
                    'exclusion dates outside availability range ' +
                    '(from 2026-03-01): 2026-01-15',
                dates: ['2026-01-15'],
            },
        ]);
    });

    test('never leaves a date both specific and excluded', () => {
        const changes: ChangeSet[] = [
            change({ specific_dates: ['2026-08-15'] }),
            change({ exclusion_dates: ['2026-07-14'] }),
            change({ specific_dates: ['2026-05-01'] }),
            change({ exclusion_dates: ['2026-05-02'] }),
        ];

        for (const changeSet of changes) {
            const result = mergeAvailability(SUMMER_SEASON, changeSet);

            if (result.ok) {
                const excluded = new Set(result.record.exclusion_dates);

                assert.equal(
                    result.record.specific_dates.some((date) =>
                        excluded.has(date)
                    ),
                    false,
                );
            }
        }
    });
});

describe('validateChangeSet', () => {
    test('rejects contradictory bounds within the change set', () => {
        const violation = validateChangeSet(change({
            start_date: '2026-05-01',
            end_date: '2026-04-01',
        }));

        assert.equal(violation?.rule, 'start_after_end');
    });

    test('rejects reset combined with fields', () => {
        const violation = validateChangeSet(change({
            reset: true,
            weekdays: ['monday'],
        }));

        assert.equal(violation?.rule, 'reset_with_fields');
    });

    test('accepts a consistent change set', () => {
        assert.equal(
            validateChangeSet(change({ weekdays: ['monday'] })),
            null,
        );
    });

    test('isChangeSetEmpty only holds without fields and reset', () => {
        assert.equal(isChangeSetEmpty(change()), true);
        assert.equal(isChangeSetEmpty(change({ reset: true })), false);
        assert.equal(
            isChangeSetEmpty(change({ end_date: '2026-12-31' })),
            false,
        );
    });
});

describe('analyzeChange', () => {
    test('reports dates marked both ways and the rejection', () => {
        const conflicts = analyzeChange(
            buildRecord({ specific_dates: ['2026-07-14'] }),
            change({ exclusion_dates: ['2026-07-14'] }),
        );

        assert.deepEqual(conflicts.map((conflict) => conflict.type), [
            'specific_and_excluded',
            'merge_rejected',
        ]);
        assert.equal(
            conflicts[0].message,
            '1 date(s) are both specific and excluded (treated as excluded)',
        );
        assert.equal(conflicts[1].severity, 'error');
    });

    test('returns nothing for a clean change', () => {
        assert.deepEqual(
            analyzeChange(SUMMER_SEASON, change({ weekdays: ['monday'] })),
            [],
        );
    });
});

describe('date expansion and preview', () => {
    const WEEK = buildRecord({
        start_date: '2026-10-19',
        end_date: '2026-10-25',
        weekdays: ['saturday', 'sunday'],
        specific_dates: ['2026-10-20'],
        exclusion_dates: ['2026-10-25'],
    });

    test('exclusions override specific dates, bounds and weekdays', () => {
        assert.equal(isDateAvailable(WEEK, '2026-10-24'), true);
        assert.equal(isDateAvailable(WEEK, '2026-10-25'), false);
        assert.equal(isDateAvailable(WEEK, '2026-10-20'), true);
        assert.equal(isDateAvailable(WEEK, '2026-10-21'), false);
        assert.equal(isDateAvailable(WEEK, '2026-11-01'), false);
    });

    test('expandAvailableDates lists available dates in the window', () => {
        assert.deepEqual(
            expandAvailableDates(WEEK, '2026-10-18', '2026-10-26'),
            ['2026-10-20', '2026-10-24'],
        );
    });

    test('previewMerge diffs narrowed weekdays', () => {
        const preview = previewMerge(
            createEmptyAvailabilityRecord('item-1'),
            change({ weekdays: ['saturday', 'sunday'] }),
            '2026-10-19',
            '2026-10-25',
        );

        assert.equal(preview.ok, true);

        if (preview.ok) {
            assert.deepEqual(preview.added, []);
            assert.deepEqual(preview.removed, [
                '2026-10-19',
                '2026-10-20',
                '2026-10-21',
                '2026-10-22',
                '2026-10-23',
            ]);
            assert.deepEqual(preview.unchanged, ['2026-10-24', '2026-10-25']);
            assert.equal(
                preview.summary,
                '2 dates total: 0 added, 5 removed, 2 unchanged',
            );
        }
    });

    test('previewMerge reports added specific dates', () => {
        const preview = previewMerge(
            buildRecord({ weekdays: ['monday'] }),
            change({ specific_dates: ['2026-10-22'] }),
            '2026-10-19',
            '2026-10-25',
        );

        assert.equal(preview.ok, true);

        if (preview.ok) {
            assert.deepEqual(preview.added, ['2026-10-22']);
            assert.deepEqual(preview.unchanged, ['2026-10-19']);
            assert.equal(preview.existing_count, 1);
            assert.equal(preview.new_count, 2);
        }
    });

    test('previewMerge rejects reversed windows', () => {
        const preview = previewMerge(
            WEEK,
            change({ weekdays: ['saturday'] }),
            '2026-10-25',
            '2026-10-19',
        );

        assert.equal(preview.ok, false);

        if (!preview.ok) {
            assert.equal(preview.violation.rule, 'invalid_preview_window');
        }
    });
});

describe('effective changes and display', () => {
    test('re-applying the same change is not effective', () => {
        const changeSet = change({ specific_dates: ['2026-07-14'] });

        assert.equal(hasEffectiveChange(SUMMER_SEASON, changeSet), false);
        assert.equal(
            hasEffectiveChange(
                SUMMER_SEASON,
                change({ specific_dates: ['2026-07-15'] }),
            ),
            true,
        );
    });

    test('availabilityRecordsEqual compares every field', () => {
        assert.equal(
            availabilityRecordsEqual(SUMMER_SEASON, { ...SUMMER_SEASON }),
            true,
        );
        assert.equal(
            availabilityRecordsEqual(
                SUMMER_SEASON,
                { ...SUMMER_SEASON, weekdays: ['monday'] },
            ),
            false,
        );
    });

    test('describeAvailability summarises the rules', () => {
        const display = describeAvailability(SUMMER_SEASON);

        assert.deepEqual(display.weekdays, ['Monday', 'Friday']);
        assert.equal(display.is_empty, false);
        assert.equal(
            display.summary,
            '2026-03-01..2026-08-31; on Monday, Friday; 1 specific; 1 excluded',
        );
    });

    test('describeAvailability of an empty record', () => {
        assert.equal(
            describeAvailability(createEmptyAvailabilityRecord('item-2'))
                .summary,
            'any date; every weekday; 0 specific; 0 excluded',
        );
    });
});
