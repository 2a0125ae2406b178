export const BATCH_CHECKPOINT_SCHEMA_VERSION =
    'availability.batch.checkpoint.v1';

export const DEFAULT_CHUNK_SIZE = 50;
export const DEFAULT_MAX_ITEMS = 1000;
export const DEFAULT_TIME_BUDGET_SECONDS = 30;
export const DEFAULT_SAFETY_MARGIN_SECONDS = 5;

export const DEFAULT_RESUME_TTL_SECONDS = 60 * 60;
export const DEFAULT_PROGRESS_TTL_SECONDS = 10 * 60;
export const DEFAULT_RETENTION_SECONDS = 24 * 60 * 60;

export const DEFAULT_ITEM_CACHE_TTL_SECONDS = 60;

export const MAX_BATCH_WARNINGS = 50;

export const DEFAULT_PREVIEW_SAMPLE_SIZE = 10;
export const DEFAULT_PREVIEW_WINDOW_DAYS = 30;
export const MAX_PREVIEW_WINDOW_DAYS = 366;

export const RESUME_CHECKPOINT_KEY_PREFIX = 'batch:resume:';
export const PROGRESS_CHECKPOINT_KEY_PREFIX = 'batch:progress:';

export const OPERATION_ID_PREFIX = 'bop_';

export const BATCH_ERROR_CODES = [
    'validation_error',
    'empty_item_list',
    'empty_change_set',
    'too_many_items',
    'cannot_resume',
    'already_completed',
    'not_found',
    'batch_failed',
] as const;

export type BatchErrorCode = (typeof BATCH_ERROR_CODES)[number];

export const ITEM_FAILURE_CODES = [
    'item_not_found',
    'validation_error',
    'storage_failure',
    'item_error',
] as const;

export type ItemFailureCode = (typeof ITEM_FAILURE_CODES)[number];
