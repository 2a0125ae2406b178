import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { newDb } from 'pg-mem';
import {
    AvailabilityRecord,
    createEmptyAvailabilityRecord,
} from '../availability/models';
import {
    CachedItemAvailabilityStore,
    InMemoryItemAvailabilityStore,
    ItemNotFoundError,
    PostgresItemAvailabilityStore,
    StorageUnavailableError,
} from './item-store';

function seasonRecord(itemId: string): AvailabilityRecord {
    return {
        item_id: itemId,
        start_date: '2026-03-01',
        end_date: '2026-08-31',
        weekdays: ['monday', 'friday'],
        specific_dates: ['2026-07-14'],
        exclusion_dates: [],
    };
}

function buildPostgresStore(): {
    db: ReturnType<typeof newDb>;
    store: PostgresItemAvailabilityStore;
} {
    const db = newDb();

    db.public.none('CREATE SCHEMA IF NOT EXISTS bulk_availability');

    const pgAdapter = db.adapters.createPg();
    const store = new PostgresItemAvailabilityStore('postgres://unused', {
        pool: new pgAdapter.Pool(),
    });

    return {
        db,
        store,
    };
}

describe('InMemoryItemAvailabilityStore', () => {
    test('returns an empty record for a known item without rules', async () => {
        const store = new InMemoryItemAvailabilityStore(['item-1']);

        assert.deepEqual(
            await store.getAvailability('item-1'),
            createEmptyAvailabilityRecord('item-1'),
        );
    });

    test('throws ItemNotFoundError for unknown items', async () => {
        const store = new InMemoryItemAvailabilityStore();

        await assert.rejects(
            store.getAvailability('missing'),
            (error: unknown) => {
                return error instanceof ItemNotFoundError &&
                    error.itemId === 'missing' &&
                    error.retryable === false;
            },
        );
        await assert.rejects(
            store.saveAvailability('missing', seasonRecord('missing')),
            ItemNotFoundError,
        );
    });

    test('stores copies of saved records', async () => {
        const store = new InMemoryItemAvailabilityStore(['item-1']);
        const record = seasonRecord('item-1');

        await store.saveAvailability('item-1', record);
        record.weekdays.push('sunday');

        const stored = await store.getAvailability('item-1');

        assert.deepEqual(stored.weekdays, ['monday', 'friday']);
    });

    test('rejects records saved under another item id', async () => {
        const store = new InMemoryItemAvailabilityStore(['item-1']);

        await assert.rejects(
            store.saveAvailability('item-1', seasonRecord('item-2')),
            /cannot be saved under item-1/,
        );
    });
});

describe('PostgresItemAvailabilityStore', () => {
    test('round-trips availability records', async () => {
        const { store } = buildPostgresStore();

        try {
            await store.registerItems(['item-1', 'item-2']);
            await store.saveAvailability('item-1', seasonRecord('item-1'));

            assert.deepEqual(
                await store.getAvailability('item-1'),
                seasonRecord('item-1'),
            );
            assert.deepEqual(
                await store.getAvailability('item-2'),
                createEmptyAvailabilityRecord('item-2'),
            );
        } finally {
            await store.close();
        }
    });

    test('overwrites the previous record on save', async () => {
        const { store } = buildPostgresStore();

        try {
            await store.registerItems(['item-1']);
            await store.saveAvailability('item-1', seasonRecord('item-1'));
            await store.saveAvailability('item-1', {
                ...seasonRecord('item-1'),
                weekdays: ['saturday'],
            });

            const stored = await store.getAvailability('item-1');

            assert.deepEqual(stored.weekdays, ['saturday']);
        } finally {
            await store.close();
        }
    });

    test('registering an item twice keeps a single row', async () => {
        const { db, store } = buildPostgresStore();

        try {
            await store.registerItems(['item-1', 'item-1']);
            await store.registerItems(['item-1']);

            const rows = db.public.many(
                'SELECT item_id FROM bulk_availability.catalog_items',
            );

            assert.equal(rows.length, 1);
        } finally {
            await store.close();
        }
    });

    test('unknown items are not found on read and write', async () => {
        const { store } = buildPostgresStore();

        try {
            await assert.rejects(
                store.getAvailability('missing'),
                ItemNotFoundError,
            );
            await assert.rejects(
                store.saveAvailability('missing', seasonRecord('missing')),
                ItemNotFoundError,
            );
        } finally {
            await store.close();
        }
    });

    test('database failures surface as StorageUnavailableError', async () => {
        const { db, store } = buildPostgresStore();

        try {
            await store.registerItems(['item-1']);
            db.public.none('DROP TABLE bulk_availability.item_availability');

            await assert.rejects(
                store.getAvailability('item-1'),
                StorageUnavailableError,
            );
        } finally {
            await store.close();
        }
    });

    test('rejects invalid schema names', () => {
        const db = newDb();
        const pgAdapter = db.adapters.createPg();

        assert.throws(() => {
            return new PostgresItemAvailabilityStore('postgres://unused', {
                pool: new pgAdapter.Pool(),
                schemaName: 'bulk-availability',
            });
        }, /schema name must match/);
    });
});

describe('CachedItemAvailabilityStore', () => {
    class CountingStore extends InMemoryItemAvailabilityStore {
        reads = 0;

        invalidations: string[] = [];

        async getAvailability(itemId: string): Promise<AvailabilityRecord> {
            this.reads += 1;

            return super.getAvailability(itemId);
        }

        async invalidateCache(itemId?: string): Promise<void> {
            if (itemId) {
                this.invalidations.push(itemId);
            }
        }
    }

    test('serves repeated reads from the cache until expiry', async () => {
        let nowMs = Date.parse('2026-10-19T10:00:00.000Z');
        const inner = new CountingStore(['item-1']);
        const cached = new CachedItemAvailabilityStore(inner, {
            ttlSeconds: 60,
            now: () => new Date(nowMs),
        });

        await cached.getAvailability('item-1');
        await cached.getAvailability('item-1');
        assert.equal(inner.reads, 1);
        assert.equal(cached.getCacheSize(), 1);

        nowMs += 60_000;
        await cached.getAvailability('item-1');
        assert.equal(inner.reads, 2);
    });

    test('invalidation evicts the entry and forwards', async () => {
        const inner = new CountingStore(['item-1']);
        const cached = new CachedItemAvailabilityStore(inner, {
            ttlSeconds: 60,
        });

        await cached.getAvailability('item-1');
        await inner.saveAvailability('item-1', seasonRecord('item-1'));
        await cached.invalidateCache('item-1');

        const record = await cached.getAvailability('item-1');

        assert.deepEqual(record, seasonRecord('item-1'));
        assert.deepEqual(inner.invalidations, ['item-1']);
        assert.equal(inner.reads, 2);
    });

    test('a zero ttl disables caching', async () => {
        const inner = new CountingStore(['item-1']);
        const cached = new CachedItemAvailabilityStore(inner, {
            ttlSeconds: 0,
        });

        await cached.getAvailability('item-1');
        await cached.getAvailability('item-1');
        assert.equal(inner.reads, 2);
        assert.equal(cached.getCacheSize(), 0);
    });

    test('not-found items are not cached', async () => {
        const inner = new CountingStore();
        const cached = new CachedItemAvailabilityStore(inner, {
            ttlSeconds: 60,
        });

        await assert.rejects(cached.getAvailability('missing'));
        await assert.rejects(cached.getAvailability('missing'));
        assert.equal(inner.reads, 2);
    });

    test('rejects negative ttl values', () => {
        assert.throws(() => {
            return new CachedItemAvailabilityStore(
                new InMemoryItemAvailabilityStore(),
                {
                    ttlSeconds: -1,
                },
            );
        }, /ttlSeconds must be a non-negative integer/);
    });
});
