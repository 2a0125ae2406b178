import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import {
    createEmptyAvailabilityRecord,
    isAvailabilityRecordEmpty,
    normalizeChangeSetInput,
    parseAvailabilityRecord,
} from './models';

describe('normalizeChangeSetInput', () => {
    test('treats blank strings, nulls and empty lists as absent', () => {
        const result = normalizeChangeSetInput({
            start_date: '  ',
            end_date: null,
            weekdays: [],
            specific_dates: '',
            exclusion_dates: [''],
        });

        assert.equal(result.ok, true);

        if (result.ok) {
            assert.deepEqual(result.change, {
                reset: false,
            });
        }
    });

    test('normalizes dates, weekdays and legacy aliases', () => {
        const result = normalizeChangeSetInput({
            start_date: '01/03/2026',
            end_date: '2026-08-31',
            weekdays: 'sat, 1 ,Monday',
            specific: ['2026-07-14'],
            specific_dates: '2026-06-01,2026-07-14',
            exclusions: ['15/08/2026'],
        });

        assert.equal(result.ok, true);

        if (result.ok) {
            assert.deepEqual(result.change, {
                reset: false,
                start_date: '2026-03-01',
                end_date: '2026-08-31',
                weekdays: ['monday', 'saturday'],
                specific_dates: ['2026-06-01', '2026-07-14'],
                exclusion_dates: ['2026-08-15'],
            });
        }
    });

    test('accepts numeric weekday lists', () => {
        const result = normalizeChangeSetInput({
            weekdays: [0, 6],
        });

        assert.equal(result.ok, true);

        if (result.ok) {
            assert.deepEqual(result.change.weekdays, ['sunday', 'saturday']);
        }
    });

    test('names the field carrying an invalid date', () => {
        const result = normalizeChangeSetInput({
            exclusion_dates: ['2026-13-01'],
        });

        assert.equal(result.ok, false);

        if (!result.ok) {
            assert.equal(result.violation.rule, 'invalid_field');
            assert.equal(result.violation.field, 'exclusion_dates');
            assert.equal(
                result.violation.message,
                'exclusion_dates contains an invalid date: 2026-13-01',
            );
        }
    });

    test('rejects unknown weekday tokens', () => {
        const result = normalizeChangeSetInput({
            weekdays: ['funday'],
        });

        assert.equal(result.ok, false);

        if (!result.ok) {
            assert.equal(
                result.violation.message,
                'weekdays contains an invalid weekday: funday',
            );
        }
    });

    test('rejects unknown fields', () => {
        const result = normalizeChangeSetInput({
            price: 10,
        });

        assert.equal(result.ok, false);

        if (!result.ok) {
            assert.equal(result.violation.rule, 'invalid_field');
        }
    });

    test('rejects reset combined with other fields', () => {
        const result = normalizeChangeSetInput({
            reset: true,
            weekdays: ['monday'],
        });

        assert.equal(result.ok, false);

        if (!result.ok) {
            assert.equal(result.violation.rule, 'reset_with_fields');
        }
    });

    test('accepts a bare reset', () => {
        const result = normalizeChangeSetInput({
            reset: true,
            start_date: '',
        });

        assert.equal(result.ok, true);

        if (result.ok) {
            assert.deepEqual(result.change, {
                reset: true,
            });
        }
    });
});

describe('availability records', () => {
    test('empty record has no rules', () => {
        const record = createEmptyAvailabilityRecord('item-1');

        assert.equal(isAvailabilityRecordEmpty(record), true);
        assert.equal(record.item_id, 'item-1');
    });

    test('parseAvailabilityRecord sorts persisted lists', () => {
        const record = parseAvailabilityRecord({
            item_id: 'item-1',
            start_date: null,
            end_date: '2026-12-31',
            weekdays: ['friday', 'monday'],
            specific_dates: ['2026-12-25', '2026-07-14'],
            exclusion_dates: [],
        });

        assert.deepEqual(record.weekdays, ['monday', 'friday']);
        assert.deepEqual(record.specific_dates, ['2026-07-14', '2026-12-25']);
        assert.equal(isAvailabilityRecordEmpty(record), false);
    });

    test('parseAvailabilityRecord rejects malformed payloads', () => {
        assert.throws(() => {
            parseAvailabilityRecord({
                item_id: 'item-1',
                start_date: '2026-02-30',
                end_date: null,
                weekdays: [],
                specific_dates: [],
                exclusion_dates: [],
            });
        }, /invalid persisted availability record/);
    });
});
