import { Pool, type PoolConfig } from 'pg';

export const DEFAULT_SCHEMA_NAME = 'bulk_availability';

export interface PostgresStoreOptions {
    pool?: Pool;
    poolConfig?: Omit<PoolConfig, 'connectionString'>;
    schemaName?: string;
}

export interface ResolvedPool {
    pool: Pool;
    ownsPool: boolean;
}

export function validateSqlIdentifier(
    value: string,
    fieldName: string,
): string {
    const trimmed = String(value || '').trim();

    if (trimmed.length === 0) {
        throw new Error(`${fieldName} is required`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new Error(
            `${fieldName} must match [A-Za-z_][A-Za-z0-9_]*`,
        );
    }

    return trimmed;
}

export function qualifyTable(schemaName: string, tableName: string): string {
    const schema = validateSqlIdentifier(schemaName, 'schema name');
    const table = validateSqlIdentifier(tableName, 'table name');

    return `"${schema}"."${table}"`;
}

/**
 * Uses the injected pool when given; otherwise opens one the caller owns
 * and must end through its `close()`.
 */
export function resolvePool(
    pgUrl: string,
    options: PostgresStoreOptions,
): ResolvedPool {
    if (options.pool) {
        return {
            pool: options.pool,
            ownsPool: false,
        };
    }

    const connectionString = String(pgUrl || '').trim();

    if (connectionString.length === 0) {
        throw new Error('BAS_PG_URL is required');
    }

    return {
        pool: new Pool({
            allowExitOnIdle: true,
            connectionString,
            idleTimeoutMillis:
                options.poolConfig?.idleTimeoutMillis || 30000,
            max: options.poolConfig?.max || 10,
            ...options.poolConfig,
        }),
        ownsPool: true,
    };
}

export function parseBigIntColumn(
    raw: number | string,
    fieldName: string,
): number {
    if (typeof raw === 'number') {
        return raw;
    }

    const parsed = Number(raw);

    if (!Number.isFinite(parsed)) {
        throw new Error(`invalid ${fieldName}`);
    }

    return parsed;
}
