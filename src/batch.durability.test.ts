import assert from 'node:assert/strict';
import { test } from 'node:test';
import { Pool } from 'pg';
import { newDb } from 'pg-mem';
import { BatchOrchestrator } from './batch/batch-orchestrator';
import { PostgresCheckpointStore } from './checkpoints/checkpoint-store';
import { PostgresItemAvailabilityStore } from './items/item-store';
import {
    buildItemIds,
    ClockAdvancingEventSink,
    createTestClock,
    TestClock,
} from './test-helpers';

type Fixture = {
    items: PostgresItemAvailabilityStore;
    checkpoints: PostgresCheckpointStore;
    orchestrator: BatchOrchestrator;
    events: ClockAdvancingEventSink;
};

function createSharedPool(): Pool {
    const db = newDb();

    db.public.none('CREATE SCHEMA IF NOT EXISTS bulk_availability');

    const pgAdapter = db.adapters.createPg();
    const pool: Pool = new pgAdapter.Pool();

    return pool;
}

function createFixture(pool: Pool, clock: TestClock): Fixture {
    const items = new PostgresItemAvailabilityStore('postgres://unused', {
        pool,
    });
    const checkpoints = new PostgresCheckpointStore('postgres://unused', {
        pool,
        now: clock.now,
    });
    const events = new ClockAdvancingEventSink(clock, 13_000);
    const orchestrator = new BatchOrchestrator(
        items,
        checkpoints,
        {
            chunkSize: 2,
        },
        clock.now,
        events,
    );

    return {
        items,
        checkpoints,
        orchestrator,
        events,
    };
}

test('an interrupted batch resumes from a fresh process on the same database', async () => {
    const pool = createSharedPool();
    const clock = createTestClock();
    const itemIds = buildItemIds(6);
    const first = createFixture(pool, clock);

    await first.items.registerItems(itemIds);

    const started = await first.orchestrator.start({
        item_ids: itemIds,
        changes: {
            specific_dates: ['2026-12-25'],
        },
        operation_id: 'bop_durable',
    });

    assert.equal(started.statusCode, 202);

    const second = createFixture(pool, clock);
    const progress = await second.orchestrator.getProgress('bop_durable');

    assert.equal(progress.success, true);

    if (progress.success) {
        assert.equal(progress.result.processed, 4);
        assert.equal(progress.result.remaining, 2);
        assert.equal(progress.result.can_resume, true);
    }

    const resumed = await second.orchestrator.resume('bop_durable');

    assert.equal(resumed.success, true);

    if (resumed.success) {
        assert.equal(resumed.statusCode, 200);
        assert.equal(resumed.result.is_resume, true);
        assert.equal(resumed.result.success_count, 6);
        assert.equal(resumed.result.applied_count, 6);
        assert.equal(resumed.result.chunk_count, 3);
    }

    assert.deepEqual(second.events.eventTypes(), [
        'batch_resumed',
        'chunk_completed',
        'batch_completed',
    ]);

    for (const itemId of itemIds) {
        const record = await second.items.getAvailability(itemId);

        assert.deepEqual(record.specific_dates, ['2026-12-25']);
    }

    assert.equal(
        await second.checkpoints.get('batch:resume:bop_durable'),
        null,
    );
});

test('re-running a completed change against stored rows writes nothing new', async () => {
    const pool = createSharedPool();
    const clock = createTestClock();
    const fixture = createFixture(pool, clock);

    await fixture.items.registerItems(['item-001', 'item-002']);

    const request = {
        item_ids: ['item-001', 'item-002'],
        changes: {
            weekdays: ['saturday', 'sunday'],
        },
    };
    const first = await fixture.orchestrator.start(request);

    clock.advance(60_000);

    const second = await fixture.orchestrator.start(request);

    assert.equal(first.success && first.result.applied_count, 2);
    assert.equal(second.success && second.result.unchanged_count, 2);
    assert.equal(second.success && second.result.applied_count, 0);
});
