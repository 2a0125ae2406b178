import { createHash } from 'node:crypto';
import { z } from 'zod';
import {
    AvailabilityDisplay,
    PreviewMergeSuccess,
} from '../availability/merge-engine';
import {
    ChangeSet,
    ChangeSetSchema,
    MergeConflict,
    MergeViolation,
} from '../availability/models';
import {
    BATCH_CHECKPOINT_SCHEMA_VERSION,
    BatchErrorCode,
    ITEM_FAILURE_CODES,
    OPERATION_ID_PREFIX,
    PROGRESS_CHECKPOINT_KEY_PREFIX,
    RESUME_CHECKPOINT_KEY_PREFIX,
} from '../constants';

const ISO_WITH_MILLIS = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

const IsoTimestampSchema = z.string().regex(ISO_WITH_MILLIS, {
    message: 'must be an ISO timestamp with milliseconds',
});

export const ItemIdSchema = z
    .union([
        z.string().trim().min(1).max(191),
        z.number().int().nonnegative(),
    ])
    .transform((value) => String(value));

export const OperationIdSchema = z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]{1,128}$/, {
        message: 'operation_id must be 1-128 characters of [A-Za-z0-9_-]',
    });

export const StartBatchRequestSchema = z
    .object({
        item_ids: z.array(ItemIdSchema).default([]),
        changes: z.unknown(),
        operation_id: OperationIdSchema.optional(),
        requested_by: z.string().trim().min(1).max(191).optional(),
    })
    .strict();

export const PreviewRequestSchema = z
    .object({
        item_ids: z.array(ItemIdSchema).default([]),
        changes: z.unknown(),
        sample_size: z.number().int().positive().max(20).optional(),
        window_start: z.string().optional(),
        window_end: z.string().optional(),
    })
    .strict();

const ItemFailureCodeSchema = z.enum(ITEM_FAILURE_CODES);

export const ItemFailureSchema = z
    .object({
        item_id: z.string().min(1),
        code: ItemFailureCodeSchema,
        message: z.string(),
    })
    .strict();

export type ItemFailure = z.infer<typeof ItemFailureSchema>;

/**
 * Full resume state, persisted under the resume checkpoint key after
 * every chunk.
 */
export const BatchOperationStateSchema = z
    .object({
        schema_version: z.literal(BATCH_CHECKPOINT_SCHEMA_VERSION),
        operation_id: z.string().min(1),
        all_item_ids: z.array(z.string().min(1)).min(1),
        processed_ids: z.array(z.string().min(1)),
        failed: z.array(ItemFailureSchema),
        change_set: ChangeSetSchema,
        requested_by: z.string().nullable(),
        started_at: IsoTimestampSchema,
        last_checkpoint_at: IsoTimestampSchema,
        current_chunk_index: z.number().int().nonnegative(),
        applied_count: z.number().int().nonnegative(),
        unchanged_count: z.number().int().nonnegative(),
        warnings: z.array(z.string()),
        omitted_warning_count: z.number().int().nonnegative().default(0),
    })
    .strict()
    .superRefine((state, ctx) => {
        const targets = new Set(state.all_item_ids);

        if (targets.size !== state.all_item_ids.length) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'all_item_ids must not contain duplicates',
                path: ['all_item_ids'],
            });
        }

        const processed = new Set(state.processed_ids);

        if (processed.size !== state.processed_ids.length) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'processed_ids must not contain duplicates',
                path: ['processed_ids'],
            });
        }

        for (const itemId of state.processed_ids) {
            if (!targets.has(itemId)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `processed item ${itemId} is not a target`,
                    path: ['processed_ids'],
                });
            }
        }

        const failedIds = new Set<string>();

        for (const failure of state.failed) {
            const itemId = failure.item_id;

            if (failedIds.has(itemId)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `item ${itemId} failed more than once`,
                    path: ['failed'],
                });
            }

            failedIds.add(itemId);

            if (!targets.has(itemId)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `failed item ${itemId} is not a target`,
                    path: ['failed'],
                });
            }

            if (processed.has(itemId)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `item ${itemId} is both processed and failed`,
                    path: ['failed'],
                });
            }
        }
    });

export type BatchOperationState = z.infer<typeof BatchOperationStateSchema>;

/**
 * Short-lived snapshot polled by progress requests.
 */
export const BatchProgressSnapshotSchema = z
    .object({
        schema_version: z.literal(BATCH_CHECKPOINT_SCHEMA_VERSION),
        operation_id: z.string().min(1),
        total: z.number().int().nonnegative(),
        processed: z.number().int().nonnegative(),
        failed: z.number().int().nonnegative(),
        current_chunk_index: z.number().int().nonnegative(),
        started_at: IsoTimestampSchema,
        updated_at: IsoTimestampSchema,
    })
    .strict();

export type BatchProgressSnapshot = z.infer<typeof BatchProgressSnapshotSchema>;

export interface BatchResult {
    operation_id: string;
    status: 'completed' | 'interrupted';
    total_items: number;
    success_count: number;
    failed_count: number;
    applied_count: number;
    unchanged_count: number;
    errors: ItemFailure[];
    warnings: string[];
    is_complete: boolean;
    is_resume: boolean;
    processing_time_seconds: number;
    chunk_count: number;
}

export interface BatchProgress {
    operation_id: string;
    total: number;
    processed: number;
    failed: number;
    remaining: number;
    percent_complete: number;
    estimated_seconds_remaining: number;
    current_chunk_index: number;
    can_resume: boolean;
    started_at: string;
    updated_at: string;
}

export interface CancelBatchResult {
    operation_id: string;
    cancelled: true;
    had_checkpoint: boolean;
    processed_count: number;
    warnings: string[];
}

export interface BatchLimits {
    chunk_size: number;
    max_items: number;
    time_budget_seconds: number;
    safety_margin_seconds: number;
    resume_ttl_seconds: number;
    progress_ttl_seconds: number;
    retention_seconds: number;
    preview_sample_size: number;
    preview_window_days: number;
}

export type ItemPreview =
    | {
        item_id: string;
        existing: AvailabilityDisplay;
        conflicts: MergeConflict[];
        preview: Omit<PreviewMergeSuccess, 'ok' | 'conflicts'> | null;
    }
    | {
        item_id: string;
        error: string;
    };

export interface PreviewSummary {
    sample_size: number;
    total_items: number;
    total_conflicts: number;
    total_warnings: number;
    has_errors: boolean;
    window_start: string;
    window_end: string;
}

export interface PreviewResult {
    items: ItemPreview[];
    summary: PreviewSummary;
}

export interface BatchFailure {
    success: false;
    statusCode: number;
    error: BatchErrorCode;
    message: string;
    operation_id?: string;
    processed_count?: number;
    violation?: MergeViolation;
}

export type RunBatchResult =
    | {
        success: true;
        statusCode: number;
        result: BatchResult;
    }
    | BatchFailure;

export type CancelBatchResponse =
    | {
        success: true;
        statusCode: number;
        result: CancelBatchResult;
    }
    | BatchFailure;

export type ProgressResponse =
    | {
        success: true;
        statusCode: number;
        result: BatchProgress;
    }
    | BatchFailure;

export type PreviewResponse =
    | {
        success: true;
        statusCode: number;
        result: PreviewResult;
    }
    | BatchFailure;

export type BatchEventType =
    | 'batch_started'
    | 'batch_resumed'
    | 'chunk_completed'
    | 'item_failed'
    | 'batch_interrupted'
    | 'batch_completed'
    | 'batch_cancelled'
    | 'batch_failed';

export interface BatchOperationEvent {
    event_id: string;
    event_type: BatchEventType;
    operation_id: string;
    created_at: string;
    details: Record<string, unknown>;
}

export function normalizeIsoWithMillis(date: Date): string {
    const value = date.toISOString();

    if (!ISO_WITH_MILLIS.test(value)) {
        throw new Error('timestamp must be ISO with milliseconds');
    }

    return value;
}

function canonicalize(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(canonicalize);
    }

    if (value !== null && typeof value === 'object') {
        const sorted: Record<string, unknown> = {};

        for (const key of Object.keys(value).sort()) {
            const entry: unknown = Reflect.get(value, key);

            if (entry !== undefined) {
                sorted[key] = canonicalize(entry);
            }
        }

        return sorted;
    }

    return value;
}

/**
 * JSON with object keys sorted recursively and undefined members dropped.
 */
export function canonicalJsonStringify(value: unknown): string {
    return JSON.stringify(canonicalize(value));
}

export function deriveOperationId(input: {
    itemIds: string[];
    changeSet: ChangeSet;
    requestedBy: string | null;
    createdAt: string;
}): string {
    const checksum = createHash('sha256')
        .update(canonicalJsonStringify({
            item_ids: [...input.itemIds].sort(),
            change_set: input.changeSet,
            requested_by: input.requestedBy,
            created_at: input.createdAt,
        }), 'utf8')
        .digest('hex');

    return `${OPERATION_ID_PREFIX}${checksum.slice(0, 32)}`;
}

export function uniqueItemIds(itemIds: string[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];

    for (const itemId of itemIds) {
        if (!seen.has(itemId)) {
            seen.add(itemId);
            out.push(itemId);
        }
    }

    return out;
}

export function remainingItemIds(state: BatchOperationState): string[] {
    const done = new Set(state.processed_ids);

    for (const failure of state.failed) {
        done.add(failure.item_id);
    }

    return state.all_item_ids.filter((itemId) => !done.has(itemId));
}

export function chunkItemIds(itemIds: string[], chunkSize: number): string[][] {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new Error('chunkSize must be a positive integer');
    }

    const out: string[][] = [];

    for (let index = 0; index < itemIds.length; index += chunkSize) {
        out.push(itemIds.slice(index, index + chunkSize));
    }

    return out;
}

export function resumeCheckpointKey(operationId: string): string {
    return `${RESUME_CHECKPOINT_KEY_PREFIX}${operationId}`;
}

export function progressCheckpointKey(operationId: string): string {
    return `${PROGRESS_CHECKPOINT_KEY_PREFIX}${operationId}`;
}
