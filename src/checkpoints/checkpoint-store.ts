import type { Pool } from 'pg';
import {
    DEFAULT_SCHEMA_NAME,
    parseBigIntColumn,
    PostgresStoreOptions,
    qualifyTable,
    resolvePool,
} from '../state/postgres-pool';

/**
 * Expiring key-value store for batch checkpoints. Values are JSON
 * documents; `get` yields null once the TTL has passed.
 */
export interface CheckpointStore {
    put(key: string, value: unknown, ttlSeconds: number): Promise<void>;
    get(key: string): Promise<unknown>;
    delete(key: string): Promise<boolean>;
}

function validateKey(raw: string): string {
    const trimmed = String(raw || '').trim();

    if (trimmed.length === 0) {
        throw new Error('checkpoint key is required');
    }

    return trimmed;
}

function validateTtlSeconds(ttlSeconds: number): number {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
        throw new Error('checkpoint ttlSeconds must be a positive integer');
    }

    return ttlSeconds;
}

function serializeValue(value: unknown): string {
    const serialized = JSON.stringify(value);

    if (serialized === undefined) {
        throw new Error('checkpoint value must be JSON serializable');
    }

    return serialized;
}

interface InMemoryCheckpointEntry {
    expiresAtMs: number;
    valueJson: string;
}

export class InMemoryCheckpointStore implements CheckpointStore {
    private readonly entries = new Map<string, InMemoryCheckpointEntry>();

    constructor(
        private readonly now: () => Date = () => new Date(),
    ) {}

    async put(key: string, value: unknown, ttlSeconds: number): Promise<void> {
        const ttl = validateTtlSeconds(ttlSeconds);

        this.entries.set(validateKey(key), {
            expiresAtMs: this.now().getTime() + ttl * 1000,
            valueJson: serializeValue(value),
        });
    }

    async get(key: string): Promise<unknown> {
        const normalizedKey = validateKey(key);
        const entry = this.entries.get(normalizedKey);

        if (!entry) {
            return null;
        }

        if (entry.expiresAtMs <= this.now().getTime()) {
            this.entries.delete(normalizedKey);

            return null;
        }

        const value: unknown = JSON.parse(entry.valueJson);

        return value;
    }

    async delete(key: string): Promise<boolean> {
        return this.entries.delete(validateKey(key));
    }

    async purgeExpired(): Promise<number> {
        const nowMs = this.now().getTime();
        let purged = 0;

        for (const [key, entry] of this.entries) {
            if (entry.expiresAtMs <= nowMs) {
                this.entries.delete(key);
                purged += 1;
            }
        }

        return purged;
    }

    keys(): string[] {
        return Array.from(this.entries.keys()).sort();
    }
}

export interface PostgresCheckpointStoreOptions extends PostgresStoreOptions {
    tableName?: string;
    now?: () => Date;
}

interface CheckpointRow {
    value_json: unknown;
    expires_at_ms: number | string;
}

const DEFAULT_TABLE_NAME = 'batch_checkpoints';

export class PostgresCheckpointStore implements CheckpointStore {
    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private readonly tableQualified: string;

    private readonly now: () => Date;

    private initializationPromise: Promise<void> | null = null;

    constructor(pgUrl: string, options: PostgresCheckpointStoreOptions = {}) {
        const resolved = resolvePool(pgUrl, options);

        this.tableQualified = qualifyTable(
            options.schemaName || DEFAULT_SCHEMA_NAME,
            options.tableName || DEFAULT_TABLE_NAME,
        );
        this.pool = resolved.pool;
        this.ownsPool = resolved.ownsPool;
        this.now = options.now || (() => new Date());
    }

    async close(): Promise<void> {
        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }

    async put(key: string, value: unknown, ttlSeconds: number): Promise<void> {
        const normalizedKey = validateKey(key);
        const ttl = validateTtlSeconds(ttlSeconds);
        const valueJson = serializeValue(value);

        await this.ensureInitialized();

        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            await client.query(
                `DELETE FROM ${this.tableQualified} WHERE checkpoint_key = $1`,
                [
                    normalizedKey,
                ],
            );
            await client.query(
                `INSERT INTO ${this.tableQualified} (
                    checkpoint_key,
                    value_json,
                    expires_at_ms,
                    updated_at
                ) VALUES (
                    $1,
                    $2::jsonb,
                    $3::bigint,
                    now()
                )`,
                [
                    normalizedKey,
                    valueJson,
                    this.now().getTime() + ttl * 1000,
                ],
            );
            await client.query('COMMIT');
        } catch (error) {
            await client.query('ROLLBACK');
            throw error;
        } finally {
            client.release();
        }
    }

    async get(key: string): Promise<unknown> {
        const normalizedKey = validateKey(key);

        await this.ensureInitialized();

        const result = await this.pool.query<CheckpointRow>(
            `SELECT value_json, expires_at_ms
            FROM ${this.tableQualified}
            WHERE checkpoint_key = $1`,
            [
                normalizedKey,
            ],
        );

        if (result.rows.length === 0) {
            return null;
        }

        const row = result.rows[0];
        const expiresAtMs = parseBigIntColumn(
            row.expires_at_ms,
            'checkpoint expiry',
        );

        if (expiresAtMs <= this.now().getTime()) {
            return null;
        }

        return row.value_json;
    }

    async delete(key: string): Promise<boolean> {
        const normalizedKey = validateKey(key);

        await this.ensureInitialized();

        const result = await this.pool.query(
            `DELETE FROM ${this.tableQualified}
            WHERE checkpoint_key = $1
            RETURNING checkpoint_key`,
            [
                normalizedKey,
            ],
        );

        return result.rows.length > 0;
    }

    async purgeExpired(): Promise<number> {
        await this.ensureInitialized();

        const result = await this.pool.query(
            `DELETE FROM ${this.tableQualified}
            WHERE expires_at_ms <= $1::bigint
            RETURNING checkpoint_key`,
            [
                this.now().getTime(),
            ],
        );

        return result.rows.length;
    }

    private async ensureInitialized(): Promise<void> {
        if (!this.initializationPromise) {
            this.initializationPromise = this.initialize().catch((error) => {
                this.initializationPromise = null;
                throw error;
            });
        }

        await this.initializationPromise;
    }

    private async initialize(): Promise<void> {
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.tableQualified} (
    checkpoint_key TEXT PRIMARY KEY,
    value_json JSONB,
    expires_at_ms BIGINT,
    updated_at TIMESTAMPTZ
)
`);
    }
}
