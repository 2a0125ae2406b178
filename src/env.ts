import {
    DEFAULT_CHUNK_SIZE,
    DEFAULT_ITEM_CACHE_TTL_SECONDS,
    DEFAULT_MAX_ITEMS,
    DEFAULT_PREVIEW_SAMPLE_SIZE,
    DEFAULT_PREVIEW_WINDOW_DAYS,
    DEFAULT_PROGRESS_TTL_SECONDS,
    DEFAULT_RESUME_TTL_SECONDS,
    DEFAULT_RETENTION_SECONDS,
    DEFAULT_SAFETY_MARGIN_SECONDS,
    DEFAULT_TIME_BUDGET_SECONDS,
} from './constants';
import { DEFAULT_SCHEMA_NAME } from './state/postgres-pool';

export interface BulkAvailabilityEnv {
    port: number;
    apiToken: string;
    pgUrl: string;
    pgSchema: string;
    maxJsonBodyBytes: number;
    chunkSize: number;
    maxItems: number;
    timeBudgetSeconds: number;
    safetyMarginSeconds: number;
    resumeTtlSeconds: number;
    progressTtlSeconds: number;
    retentionSeconds: number;
    previewSampleSize: number;
    previewWindowDays: number;
    itemCacheTtlSeconds: number;
}

function parseNonNegativeInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const parsed = Number(raw);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }

    return parsed;
}

function parseStrictPositiveInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    const parsed = parseNonNegativeInteger(raw, fieldName, defaultValue);

    if (parsed <= 0) {
        throw new Error(`${fieldName} must be greater than zero`);
    }

    return parsed;
}

function parseOptionalString(raw: string | undefined): string | undefined {
    if (!raw) {
        return undefined;
    }

    const trimmed = raw.trim();

    return trimmed ? trimmed : undefined;
}

function parseRequiredString(
    raw: string | undefined,
    fieldName: string,
): string {
    const parsed = parseOptionalString(raw);

    if (!parsed) {
        throw new Error(`${fieldName} is required`);
    }

    return parsed;
}

export function parseBulkAvailabilityEnv(
    env: NodeJS.ProcessEnv,
): BulkAvailabilityEnv {
    const timeBudgetSeconds = parseStrictPositiveInteger(
        env.BAS_TIME_BUDGET_SECONDS,
        'BAS_TIME_BUDGET_SECONDS',
        DEFAULT_TIME_BUDGET_SECONDS,
    );
    const safetyMarginSeconds = parseNonNegativeInteger(
        env.BAS_SAFETY_MARGIN_SECONDS,
        'BAS_SAFETY_MARGIN_SECONDS',
        DEFAULT_SAFETY_MARGIN_SECONDS,
    );

    if (safetyMarginSeconds >= timeBudgetSeconds) {
        throw new Error(
            'BAS_SAFETY_MARGIN_SECONDS must be less than ' +
            'BAS_TIME_BUDGET_SECONDS',
        );
    }

    return {
        port: parseNonNegativeInteger(env.PORT, 'PORT', 3200),
        apiToken: parseRequiredString(env.BAS_API_TOKEN, 'BAS_API_TOKEN'),
        pgUrl: parseRequiredString(env.BAS_PG_URL, 'BAS_PG_URL'),
        pgSchema: parseOptionalString(env.BAS_PG_SCHEMA) ||
            DEFAULT_SCHEMA_NAME,
        maxJsonBodyBytes: parseStrictPositiveInteger(
            env.BAS_MAX_JSON_BODY_BYTES,
            'BAS_MAX_JSON_BODY_BYTES',
            1048576,
        ),
        chunkSize: parseStrictPositiveInteger(
            env.BAS_CHUNK_SIZE,
            'BAS_CHUNK_SIZE',
            DEFAULT_CHUNK_SIZE,
        ),
        maxItems: parseStrictPositiveInteger(
            env.BAS_MAX_ITEMS,
            'BAS_MAX_ITEMS',
            DEFAULT_MAX_ITEMS,
        ),
        timeBudgetSeconds,
        safetyMarginSeconds,
        resumeTtlSeconds: parseStrictPositiveInteger(
            env.BAS_RESUME_TTL_SECONDS,
            'BAS_RESUME_TTL_SECONDS',
            DEFAULT_RESUME_TTL_SECONDS,
        ),
        progressTtlSeconds: parseStrictPositiveInteger(
            env.BAS_PROGRESS_TTL_SECONDS,
            'BAS_PROGRESS_TTL_SECONDS',
            DEFAULT_PROGRESS_TTL_SECONDS,
        ),
        retentionSeconds: parseStrictPositiveInteger(
            env.BAS_RETENTION_SECONDS,
            'BAS_RETENTION_SECONDS',
            DEFAULT_RETENTION_SECONDS,
        ),
        previewSampleSize: parseStrictPositiveInteger(
            env.BAS_PREVIEW_SAMPLE_SIZE,
            'BAS_PREVIEW_SAMPLE_SIZE',
            DEFAULT_PREVIEW_SAMPLE_SIZE,
        ),
        previewWindowDays: parseStrictPositiveInteger(
            env.BAS_PREVIEW_WINDOW_DAYS,
            'BAS_PREVIEW_WINDOW_DAYS',
            DEFAULT_PREVIEW_WINDOW_DAYS,
        ),
        itemCacheTtlSeconds: parseNonNegativeInteger(
            env.BAS_ITEM_CACHE_TTL_SECONDS,
            'BAS_ITEM_CACHE_TTL_SECONDS',
            DEFAULT_ITEM_CACHE_TTL_SECONDS,
        ),
    };
}
