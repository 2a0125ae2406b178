import type { Pool, PoolClient } from 'pg';
import {
    AvailabilityRecord,
    cloneAvailabilityRecord,
    createEmptyAvailabilityRecord,
    parseAvailabilityRecord,
} from '../availability/models';
import {
    DEFAULT_SCHEMA_NAME,
    PostgresStoreOptions,
    qualifyTable,
    resolvePool,
} from '../state/postgres-pool';

export interface ItemAvailabilityStore {
    getAvailability(itemId: string): Promise<AvailabilityRecord>;
    saveAvailability(itemId: string, record: AvailabilityRecord): Promise<void>;
    invalidateCache(itemId: string): Promise<void>;
}

export class ItemNotFoundError extends Error {
    readonly retryable = false;

    constructor(public readonly itemId: string) {
        super(`item ${itemId} does not exist`);
        this.name = 'ItemNotFoundError';
    }
}

export class StorageUnavailableError extends Error {
    readonly retryable = true;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageUnavailableError';
    }
}

function assertRecordOwner(itemId: string, record: AvailabilityRecord): void {
    if (record.item_id !== itemId) {
        throw new Error(
            `availability record for ${record.item_id} cannot be saved ` +
            `under ${itemId}`,
        );
    }
}

export class InMemoryItemAvailabilityStore implements ItemAvailabilityStore {
    private readonly itemIds = new Set<string>();

    private readonly records = new Map<string, AvailabilityRecord>();

    constructor(itemIds: Iterable<string> = []) {
        for (const itemId of itemIds) {
            this.itemIds.add(itemId);
        }
    }

    addItem(itemId: string, record?: AvailabilityRecord): void {
        this.itemIds.add(itemId);

        if (record) {
            assertRecordOwner(itemId, record);
            this.records.set(itemId, cloneAvailabilityRecord(record));
        }
    }

    async getAvailability(itemId: string): Promise<AvailabilityRecord> {
        if (!this.itemIds.has(itemId)) {
            throw new ItemNotFoundError(itemId);
        }

        const record = this.records.get(itemId);

        return record
            ? cloneAvailabilityRecord(record)
            : createEmptyAvailabilityRecord(itemId);
    }

    async saveAvailability(
        itemId: string,
        record: AvailabilityRecord,
    ): Promise<void> {
        if (!this.itemIds.has(itemId)) {
            throw new ItemNotFoundError(itemId);
        }

        assertRecordOwner(itemId, record);
        this.records.set(itemId, cloneAvailabilityRecord(record));
    }

    async invalidateCache(): Promise<void> {
        // nothing cached
    }
}

interface AvailabilityRow {
    item_id: string;
    record_json: unknown;
}

export class PostgresItemAvailabilityStore implements ItemAvailabilityStore {
    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private readonly itemsTable: string;

    private readonly availabilityTable: string;

    private initializationPromise: Promise<void> | null = null;

    constructor(pgUrl: string, options: PostgresStoreOptions = {}) {
        const schemaName = options.schemaName || DEFAULT_SCHEMA_NAME;
        const resolved = resolvePool(pgUrl, options);

        this.pool = resolved.pool;
        this.ownsPool = resolved.ownsPool;
        this.itemsTable = qualifyTable(schemaName, 'catalog_items');
        this.availabilityTable = qualifyTable(
            schemaName,
            'item_availability',
        );
    }

    async close(): Promise<void> {
        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }

    async registerItems(itemIds: string[]): Promise<void> {
        await this.ensureInitialized();
        await this.withStorage('register', async () => {
            for (const itemId of itemIds) {
                await this.pool.query(
                    `INSERT INTO ${this.itemsTable} (item_id, created_at)
                    SELECT $1, now()
                    WHERE NOT EXISTS (
                        SELECT 1
                        FROM ${this.itemsTable}
                        WHERE item_id = $1
                    )`,
                    [
                        itemId,
                    ],
                );
            }
        });
    }

    async getAvailability(itemId: string): Promise<AvailabilityRecord> {
        await this.ensureInitialized();

        const rows = await this.withStorage('read', async () => {
            const result = await this.pool.query<AvailabilityRow>(
                `SELECT items.item_id, availability.record_json
                FROM ${this.itemsTable} AS items
                LEFT JOIN ${this.availabilityTable} AS availability
                    ON availability.item_id = items.item_id
                WHERE items.item_id = $1`,
                [
                    itemId,
                ],
            );

            return result.rows;
        });

        if (rows.length === 0) {
            throw new ItemNotFoundError(itemId);
        }

        const stored = rows[0].record_json;

        if (stored === null || stored === undefined) {
            return createEmptyAvailabilityRecord(itemId);
        }

        return parseAvailabilityRecord(stored);
    }

    async saveAvailability(
        itemId: string,
        record: AvailabilityRecord,
    ): Promise<void> {
        assertRecordOwner(itemId, record);
        await this.ensureInitialized();

        const exists = await this.withStorage('lookup', async () => {
            const result = await this.pool.query(
                `SELECT 1 FROM ${this.itemsTable} WHERE item_id = $1`,
                [
                    itemId,
                ],
            );

            return result.rows.length > 0;
        });

        if (!exists) {
            throw new ItemNotFoundError(itemId);
        }

        await this.withStorage('write', async () => {
            const client = await this.pool.connect();

            try {
                await client.query('BEGIN');
                await this.replaceRecord(client, itemId, record);
                await client.query('COMMIT');
            } catch (error) {
                await client.query('ROLLBACK');
                throw error;
            } finally {
                client.release();
            }
        });
    }

    async invalidateCache(): Promise<void> {
        // reads always go to the database
    }

    private async replaceRecord(
        client: PoolClient,
        itemId: string,
        record: AvailabilityRecord,
    ): Promise<void> {
        await client.query(
            `DELETE FROM ${this.availabilityTable} WHERE item_id = $1`,
            [
                itemId,
            ],
        );
        await client.query(
            `INSERT INTO ${this.availabilityTable} (
                item_id,
                record_json,
                updated_at
            ) VALUES (
                $1,
                $2::jsonb,
                now()
            )`,
            [
                itemId,
                JSON.stringify(record),
            ],
        );
    }

    private async withStorage<T>(
        operation: string,
        action: () => Promise<T>,
    ): Promise<T> {
        try {
            return await action();
        } catch (error) {
            throw new StorageUnavailableError(
                `item store ${operation} failed: ${errorMessage(error)}`,
                {
                    cause: error,
                },
            );
        }
    }

    private async ensureInitialized(): Promise<void> {
        if (!this.initializationPromise) {
            this.initializationPromise = this.initialize().catch((error) => {
                this.initializationPromise = null;
                throw new StorageUnavailableError(
                    `item store initialization failed: ${errorMessage(error)}`,
                    {
                        cause: error,
                    },
                );
            });
        }

        await this.initializationPromise;
    }

    private async initialize(): Promise<void> {
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.itemsTable} (
    item_id TEXT PRIMARY KEY,
    created_at TIMESTAMPTZ
)
`);
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.availabilityTable} (
    item_id TEXT PRIMARY KEY,
    record_json JSONB,
    updated_at TIMESTAMPTZ
)
`);
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export interface CachedItemAvailabilityStoreConfig {
    ttlSeconds: number;
    now?: () => Date;
}

interface AvailabilityCacheEntry {
    expiresAtMs: number;
    record: AvailabilityRecord;
}

function parseNonNegativeInteger(value: number, fieldName: string): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }

    return value;
}

/**
 * TTL read cache in front of another store. Misses, including not-found
 * items, are never cached.
 */
export class CachedItemAvailabilityStore implements ItemAvailabilityStore {
    private readonly cache = new Map<string, AvailabilityCacheEntry>();

    private readonly ttlMs: number;

    private readonly now: () => Date;

    constructor(
        private readonly inner: ItemAvailabilityStore,
        config: CachedItemAvailabilityStoreConfig,
    ) {
        this.ttlMs = parseNonNegativeInteger(
            config.ttlSeconds,
            'ttlSeconds',
        ) * 1000;
        this.now = config.now || (() => new Date());
    }

    async getAvailability(itemId: string): Promise<AvailabilityRecord> {
        const nowMs = this.now().getTime();
        const cached = this.cache.get(itemId);

        if (cached && cached.expiresAtMs > nowMs) {
            return cloneAvailabilityRecord(cached.record);
        }

        if (cached) {
            this.cache.delete(itemId);
        }

        const record = await this.inner.getAvailability(itemId);

        if (this.ttlMs > 0) {
            this.cache.set(itemId, {
                expiresAtMs: nowMs + this.ttlMs,
                record: cloneAvailabilityRecord(record),
            });
        }

        return record;
    }

    async saveAvailability(
        itemId: string,
        record: AvailabilityRecord,
    ): Promise<void> {
        this.cache.delete(itemId);
        await this.inner.saveAvailability(itemId, record);
    }

    async invalidateCache(itemId: string): Promise<void> {
        this.cache.delete(itemId);
        await this.inner.invalidateCache(itemId);
    }

    clearCache(): void {
        this.cache.clear();
    }

    getCacheSize(): number {
        return this.cache.size;
    }
}
