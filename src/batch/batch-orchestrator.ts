import { randomUUID } from 'node:crypto';
import {
    addDays,
    daysBetween,
    parseCalendarDate,
    toCalendarDate,
} from '../availability/calendar';
import {
    analyzeChange,
    describeAvailability,
    isChangeSetEmpty,
    previewMerge,
    validateChangeSet,
} from '../availability/merge-engine';
import {
    ChangeSet,
    MergeViolation,
    normalizeChangeSetInput,
} from '../availability/models';
import {
    BATCH_CHECKPOINT_SCHEMA_VERSION,
    BatchErrorCode,
    DEFAULT_CHUNK_SIZE,
    DEFAULT_MAX_ITEMS,
    DEFAULT_PREVIEW_SAMPLE_SIZE,
    DEFAULT_PREVIEW_WINDOW_DAYS,
    DEFAULT_PROGRESS_TTL_SECONDS,
    DEFAULT_RESUME_TTL_SECONDS,
    DEFAULT_RETENTION_SECONDS,
    DEFAULT_SAFETY_MARGIN_SECONDS,
    DEFAULT_TIME_BUDGET_SECONDS,
    MAX_BATCH_WARNINGS,
    MAX_PREVIEW_WINDOW_DAYS,
} from '../constants';
import { CheckpointStore } from '../checkpoints/checkpoint-store';
import { ItemAvailabilityStore } from '../items/item-store';
import { ChunkExecutor, ChunkApplyResult } from './chunk-executor';
import { BatchEventSink, ConsoleBatchEventSink } from './events';
import {
    BatchEventType,
    BatchFailure,
    BatchLimits,
    BatchOperationState,
    BatchOperationStateSchema,
    BatchProgress,
    BatchProgressSnapshot,
    BatchProgressSnapshotSchema,
    BatchResult,
    CancelBatchResponse,
    chunkItemIds,
    deriveOperationId,
    ItemFailure,
    ItemPreview,
    normalizeIsoWithMillis,
    OperationIdSchema,
    PreviewRequestSchema,
    PreviewResponse,
    progressCheckpointKey,
    ProgressResponse,
    remainingItemIds,
    resumeCheckpointKey,
    RunBatchResult,
    StartBatchRequestSchema,
    uniqueItemIds,
} from './models';

export interface BatchOrchestratorConfig {
    chunkSize: number;
    maxItems: number;
    timeBudgetSeconds: number;
    safetyMarginSeconds: number;
    resumeTtlSeconds: number;
    progressTtlSeconds: number;
    retentionSeconds: number;
    previewSampleSize: number;
    previewWindowDays: number;
}

export const DEFAULT_BATCH_ORCHESTRATOR_CONFIG: BatchOrchestratorConfig = {
    chunkSize: DEFAULT_CHUNK_SIZE,
    maxItems: DEFAULT_MAX_ITEMS,
    timeBudgetSeconds: DEFAULT_TIME_BUDGET_SECONDS,
    safetyMarginSeconds: DEFAULT_SAFETY_MARGIN_SECONDS,
    resumeTtlSeconds: DEFAULT_RESUME_TTL_SECONDS,
    progressTtlSeconds: DEFAULT_PROGRESS_TTL_SECONDS,
    retentionSeconds: DEFAULT_RETENTION_SECONDS,
    previewSampleSize: DEFAULT_PREVIEW_SAMPLE_SIZE,
    previewWindowDays: DEFAULT_PREVIEW_WINDOW_DAYS,
};

type ResumeLookup =
    | {
        status: 'missing';
    }
    | {
        status: 'invalid';
        message: string;
    }
    | {
        status: 'stale';
        state: BatchOperationState;
    }
    | {
        status: 'found';
        state: BatchOperationState;
    };

function buildFailure(
    statusCode: number,
    error: BatchErrorCode,
    message: string,
    extra: Partial<Pick<
        BatchFailure,
        'operation_id' | 'processed_count' | 'violation'
    >> = {},
): BatchFailure {
    return {
        success: false,
        statusCode,
        error,
        message,
        ...extra,
    };
}

function validationFailure(violation: MergeViolation): BatchFailure {
    return buildFailure(400, 'validation_error', violation.message, {
        violation,
    });
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function assertPositiveInteger(value: number, fieldName: string): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${fieldName} must be a positive integer`);
    }

    return value;
}

function resolveConfig(
    overrides: Partial<BatchOrchestratorConfig>,
): BatchOrchestratorConfig {
    const config: BatchOrchestratorConfig = {
        ...DEFAULT_BATCH_ORCHESTRATOR_CONFIG,
        ...overrides,
    };

    assertPositiveInteger(config.chunkSize, 'chunkSize');
    assertPositiveInteger(config.maxItems, 'maxItems');
    assertPositiveInteger(config.timeBudgetSeconds, 'timeBudgetSeconds');
    assertPositiveInteger(config.resumeTtlSeconds, 'resumeTtlSeconds');
    assertPositiveInteger(config.progressTtlSeconds, 'progressTtlSeconds');
    assertPositiveInteger(config.retentionSeconds, 'retentionSeconds');
    assertPositiveInteger(config.previewSampleSize, 'previewSampleSize');
    assertPositiveInteger(config.previewWindowDays, 'previewWindowDays');

    if (
        !Number.isInteger(config.safetyMarginSeconds) ||
        config.safetyMarginSeconds < 0 ||
        config.safetyMarginSeconds >= config.timeBudgetSeconds
    ) {
        throw new Error(
            'safetyMarginSeconds must be a non-negative integer below ' +
            'timeBudgetSeconds',
        );
    }

    if (config.previewWindowDays > MAX_PREVIEW_WINDOW_DAYS) {
        throw new Error(
            `previewWindowDays must not exceed ${MAX_PREVIEW_WINDOW_DAYS}`,
        );
    }

    return config;
}

function roundTo(value: number, digits: number): number {
    const factor = 10 ** digits;

    return Math.round(value * factor) / factor;
}

function orderedFailures(state: BatchOperationState): ItemFailure[] {
    const byItemId = new Map<string, ItemFailure>();

    for (const failure of state.failed) {
        byItemId.set(failure.item_id, failure);
    }

    const failures: ItemFailure[] = [];

    for (const itemId of state.all_item_ids) {
        const failure = byItemId.get(itemId);

        if (failure) {
            failures.push(failure);
        }
    }

    return failures;
}

/**
 * Drives a bulk availability change across many items in fixed-size
 * chunks. Each invocation stops before its time budget runs out and
 * leaves a checkpoint that a later `resume` continues from.
 */
export class BatchOrchestrator {
    private readonly config: BatchOrchestratorConfig;

    private readonly executor: ChunkExecutor;

    constructor(
        private readonly itemStore: ItemAvailabilityStore,
        private readonly checkpointStore: CheckpointStore,
        config: Partial<BatchOrchestratorConfig> = {},
        private readonly now: () => Date = () => new Date(),
        private readonly eventSink: BatchEventSink =
            new ConsoleBatchEventSink(),
    ) {
        this.config = resolveConfig(config);
        this.executor = new ChunkExecutor(itemStore);
    }

    getLimits(): BatchLimits {
        return {
            chunk_size: this.config.chunkSize,
            max_items: this.config.maxItems,
            time_budget_seconds: this.config.timeBudgetSeconds,
            safety_margin_seconds: this.config.safetyMarginSeconds,
            resume_ttl_seconds: this.config.resumeTtlSeconds,
            progress_ttl_seconds: this.config.progressTtlSeconds,
            retention_seconds: this.config.retentionSeconds,
            preview_sample_size: this.config.previewSampleSize,
            preview_window_days: this.config.previewWindowDays,
        };
    }

    async start(requestBody: unknown): Promise<RunBatchResult> {
        const invocationStartMs = this.now().getTime();
        const parsed = StartBatchRequestSchema.safeParse(requestBody);

        if (!parsed.success) {
            return buildFailure(
                400,
                'validation_error',
                parsed.error.issues[0]?.message || 'Invalid request',
            );
        }

        const request = parsed.data;
        const itemIds = uniqueItemIds(request.item_ids);

        if (itemIds.length === 0) {
            return buildFailure(
                400,
                'empty_item_list',
                'item_ids must contain at least one item',
            );
        }

        if (itemIds.length > this.config.maxItems) {
            return buildFailure(
                413,
                'too_many_items',
                `item_ids must not exceed ${this.config.maxItems} items ` +
                `(received ${itemIds.length})`,
            );
        }

        const normalized = normalizeChangeSetInput(request.changes);

        if (!normalized.ok) {
            return validationFailure(normalized.violation);
        }

        const changeSet = normalized.change;

        if (isChangeSetEmpty(changeSet)) {
            return buildFailure(
                400,
                'empty_change_set',
                'changes must set at least one field or reset',
            );
        }

        const violation = validateChangeSet(changeSet);

        if (violation) {
            return validationFailure(violation);
        }

        const requestedBy = request.requested_by || null;
        const startedAt = normalizeIsoWithMillis(
            new Date(invocationStartMs),
        );
        const operationId = request.operation_id || deriveOperationId({
            itemIds,
            changeSet,
            requestedBy,
            createdAt: startedAt,
        });
        const warnings: string[] = [];
        let lookup: ResumeLookup;

        try {
            lookup = await this.lookupResumeState(operationId);
        } catch (error) {
            return this.storageFailure(operationId, 0, error);
        }

        if (lookup.status === 'found') {
            this.emit('batch_resumed', operationId, {
                remaining_count: remainingItemIds(lookup.state).length,
                trigger: 'start',
            });

            return this.runLoop(lookup.state, true, invocationStartMs, []);
        }

        if (lookup.status !== 'missing') {
            warnings.push(
                `discarded unusable checkpoint for operation ${operationId}`,
            );
        }

        const state: BatchOperationState = {
            schema_version: BATCH_CHECKPOINT_SCHEMA_VERSION,
            operation_id: operationId,
            all_item_ids: itemIds,
            processed_ids: [],
            failed: [],
            change_set: changeSet,
            requested_by: requestedBy,
            started_at: startedAt,
            last_checkpoint_at: startedAt,
            current_chunk_index: 0,
            applied_count: 0,
            unchanged_count: 0,
            warnings,
            omitted_warning_count: 0,
        };

        try {
            await this.writeCheckpoint(state);
        } catch (error) {
            return this.storageFailure(operationId, 0, error);
        }

        this.emit('batch_started', operationId, {
            total_items: itemIds.length,
            chunk_size: this.config.chunkSize,
            requested_by: requestedBy,
            change_set: changeSet,
        });

        return this.runLoop(state, false, invocationStartMs, []);
    }

    async resume(rawOperationId: unknown): Promise<RunBatchResult> {
        const invocationStartMs = this.now().getTime();
        const parsedId = OperationIdSchema.safeParse(rawOperationId);

        if (!parsedId.success) {
            return buildFailure(
                400,
                'validation_error',
                parsedId.error.issues[0]?.message || 'Invalid operation_id',
            );
        }

        const operationId = parsedId.data;
        let lookup: ResumeLookup;

        try {
            lookup = await this.lookupResumeState(operationId);

            if (lookup.status === 'invalid' || lookup.status === 'stale') {
                await this.deleteCheckpoints(operationId);
            }
        } catch (error) {
            return this.storageFailure(operationId, 0, error);
        }

        if (lookup.status === 'missing') {
            return buildFailure(
                409,
                'cannot_resume',
                `no resumable checkpoint exists for operation ${operationId}`,
                {
                    operation_id: operationId,
                },
            );
        }

        if (lookup.status === 'invalid') {
            return buildFailure(
                409,
                'cannot_resume',
                `checkpoint for operation ${operationId} is malformed ` +
                `(${lookup.message}); start the operation again`,
                {
                    operation_id: operationId,
                },
            );
        }

        if (lookup.status === 'stale') {
            return buildFailure(
                409,
                'cannot_resume',
                `checkpoint for operation ${operationId} is older than ` +
                `${this.config.retentionSeconds} seconds; start the ` +
                'operation again',
                {
                    operation_id: operationId,
                    processed_count: lookup.state.processed_ids.length,
                },
            );
        }

        const state = lookup.state;

        if (remainingItemIds(state).length === 0) {
            try {
                await this.deleteCheckpoints(operationId);
            } catch (error) {
                return this.storageFailure(
                    operationId,
                    state.processed_ids.length,
                    error,
                );
            }

            return buildFailure(
                409,
                'already_completed',
                `operation ${operationId} has no remaining items`,
                {
                    operation_id: operationId,
                    processed_count: state.processed_ids.length,
                },
            );
        }

        this.emit('batch_resumed', operationId, {
            remaining_count: remainingItemIds(state).length,
            trigger: 'resume',
        });

        return this.runLoop(state, true, invocationStartMs, []);
    }

    async cancel(rawOperationId: unknown): Promise<CancelBatchResponse> {
        const parsedId = OperationIdSchema.safeParse(rawOperationId);

        if (!parsedId.success) {
            return buildFailure(
                400,
                'validation_error',
                parsedId.error.issues[0]?.message || 'Invalid operation_id',
            );
        }

        const operationId = parsedId.data;
        let processedCount = 0;
        let hadCheckpoint = false;

        try {
            const lookup = await this.lookupResumeState(operationId);

            if (lookup.status === 'found' || lookup.status === 'stale') {
                processedCount = lookup.state.processed_ids.length;
            } else {
                const snapshot = await this.readProgressSnapshot(operationId);

                processedCount = snapshot ? snapshot.processed : 0;
            }

            hadCheckpoint = await this.deleteCheckpoints(operationId);
        } catch (error) {
            return this.storageFailure(operationId, processedCount, error);
        }

        this.emit('batch_cancelled', operationId, {
            had_checkpoint: hadCheckpoint,
            processed_count: processedCount,
        });

        return {
            success: true,
            statusCode: 200,
            result: {
                operation_id: operationId,
                cancelled: true,
                had_checkpoint: hadCheckpoint,
                processed_count: processedCount,
                warnings: [
                    `operation ${operationId} cancelled; ${processedCount} ` +
                    'item(s) already updated keep their changes ' +
                    '(cancellation does not roll back)',
                ],
            },
        };
    }

    async getProgress(rawOperationId: unknown): Promise<ProgressResponse> {
        const parsedId = OperationIdSchema.safeParse(rawOperationId);

        if (!parsedId.success) {
            return buildFailure(
                400,
                'validation_error',
                parsedId.error.issues[0]?.message || 'Invalid operation_id',
            );
        }

        const operationId = parsedId.data;
        let lookup: ResumeLookup;
        let snapshot: BatchProgressSnapshot | null;

        try {
            lookup = await this.lookupResumeState(operationId);
            snapshot = await this.readProgressSnapshot(operationId);
        } catch (error) {
            return buildFailure(
                503,
                'batch_failed',
                `progress for operation ${operationId} is unavailable: ` +
                errorMessage(error),
                {
                    operation_id: operationId,
                },
            );
        }

        if (!snapshot && (
            lookup.status === 'found' || lookup.status === 'stale'
        )) {
            snapshot = this.buildProgressSnapshot(lookup.state);
        }

        if (!snapshot) {
            return buildFailure(
                404,
                'not_found',
                `no progress recorded for operation ${operationId}`,
            );
        }

        return {
            success: true,
            statusCode: 200,
            result: this.describeProgress(
                snapshot,
                lookup.status === 'found',
            ),
        };
    }

    private describeProgress(
        snapshot: BatchProgressSnapshot,
        resumable: boolean,
    ): BatchProgress {
        const done = snapshot.processed + snapshot.failed;
        const remaining = Math.max(0, snapshot.total - done);
        const elapsedSeconds = Math.max(
            0,
            (this.now().getTime() - Date.parse(snapshot.started_at)) / 1000,
        );
        const estimate = done > 0
            ? Math.max(0, Math.round(elapsedSeconds / done * remaining))
            : 0;

        return {
            operation_id: snapshot.operation_id,
            total: snapshot.total,
            processed: snapshot.processed,
            failed: snapshot.failed,
            remaining,
            percent_complete: snapshot.total > 0
                ? roundTo(done / snapshot.total * 100, 1)
                : 0,
            estimated_seconds_remaining: estimate,
            current_chunk_index: snapshot.current_chunk_index,
            can_resume: resumable && remaining > 0,
            started_at: snapshot.started_at,
            updated_at: snapshot.updated_at,
        };
    }

    async preview(requestBody: unknown): Promise<PreviewResponse> {
        const parsed = PreviewRequestSchema.safeParse(requestBody);

        if (!parsed.success) {
            return buildFailure(
                400,
                'validation_error',
                parsed.error.issues[0]?.message || 'Invalid request',
            );
        }

        const request = parsed.data;
        const itemIds = uniqueItemIds(request.item_ids);

        if (itemIds.length === 0) {
            return buildFailure(
                400,
                'empty_item_list',
                'item_ids must contain at least one item',
            );
        }

        const normalized = normalizeChangeSetInput(request.changes);

        if (!normalized.ok) {
            return validationFailure(normalized.violation);
        }

        if (isChangeSetEmpty(normalized.change)) {
            return buildFailure(
                400,
                'empty_change_set',
                'changes must set at least one field or reset',
            );
        }

        const window = this.resolvePreviewWindow(
            request.window_start,
            request.window_end,
        );

        if (!window.ok) {
            return validationFailure(window.violation);
        }

        const sampleIds = itemIds.slice(
            0,
            request.sample_size || this.config.previewSampleSize,
        );
        const items: ItemPreview[] = [];
        let totalConflicts = 0;
        let totalWarnings = 0;
        let hasItemErrors = false;

        for (const itemId of sampleIds) {
            const itemPreview = await this.previewItem(
                itemId,
                normalized.change,
                window.start,
                window.end,
            );

            if ('error' in itemPreview) {
                hasItemErrors = true;
            } else {
                for (const conflict of itemPreview.conflicts) {
                    if (conflict.severity === 'error') {
                        totalConflicts += 1;
                    } else {
                        totalWarnings += 1;
                    }
                }
            }

            items.push(itemPreview);
        }

        return {
            success: true,
            statusCode: 200,
            result: {
                items,
                summary: {
                    sample_size: sampleIds.length,
                    total_items: itemIds.length,
                    total_conflicts: totalConflicts,
                    total_warnings: totalWarnings,
                    has_errors: totalConflicts > 0 || hasItemErrors,
                    window_start: window.start,
                    window_end: window.end,
                },
            },
        };
    }

    private async previewItem(
        itemId: string,
        changeSet: ChangeSet,
        windowStart: string,
        windowEnd: string,
    ): Promise<ItemPreview> {
        try {
            const existing = await this.itemStore.getAvailability(itemId);
            const diff = previewMerge(
                existing,
                changeSet,
                windowStart,
                windowEnd,
            );

            return {
                item_id: itemId,
                existing: describeAvailability(existing),
                conflicts: analyzeChange(existing, changeSet),
                preview: diff.ok
                    ? {
                        existing_count: diff.existing_count,
                        new_count: diff.new_count,
                        added: diff.added,
                        removed: diff.removed,
                        unchanged: diff.unchanged,
                        summary: diff.summary,
                    }
                    : null,
            };
        } catch (error) {
            return {
                item_id: itemId,
                error: errorMessage(error),
            };
        }
    }

    private resolvePreviewWindow(
        rawStart: string | undefined,
        rawEnd: string | undefined,
    ):
        | { ok: true; start: string; end: string }
        | { ok: false; violation: MergeViolation } {
        const start = rawStart === undefined
            ? toCalendarDate(this.now())
            : parseCalendarDate(rawStart);

        if (!start) {
            return {
                ok: false,
                violation: {
                    rule: 'invalid_preview_window',
                    field: 'window_start',
                    message: 'window_start must be a calendar date',
                },
            };
        }

        const end = rawEnd === undefined
            ? addDays(start, this.config.previewWindowDays)
            : parseCalendarDate(rawEnd);

        if (!end) {
            return {
                ok: false,
                violation: {
                    rule: 'invalid_preview_window',
                    field: 'window_end',
                    message: 'window_end must be a calendar date',
                },
            };
        }

        if (start > end) {
            return {
                ok: false,
                violation: {
                    rule: 'invalid_preview_window',
                    field: 'window_start',
                    message: 'window_start must not be after window_end',
                    dates: [start, end],
                },
            };
        }

        if (daysBetween(start, end) > MAX_PREVIEW_WINDOW_DAYS) {
            return {
                ok: false,
                violation: {
                    rule: 'invalid_preview_window',
                    field: 'window_end',
                    message:
                        'preview window must not exceed ' +
                        `${MAX_PREVIEW_WINDOW_DAYS} days`,
                    dates: [start, end],
                },
            };
        }

        return {
            ok: true,
            start,
            end,
        };
    }

    private async runLoop(
        state: BatchOperationState,
        isResume: boolean,
        invocationStartMs: number,
        invocationWarnings: string[],
    ): Promise<RunBatchResult> {
        const operationId = state.operation_id;
        const workingBudgetMs = (
            this.config.timeBudgetSeconds - this.config.safetyMarginSeconds
        ) * 1000;
        let remaining = remainingItemIds(state);

        while (remaining.length > 0) {
            if (this.now().getTime() - invocationStartMs >= workingBudgetMs) {
                break;
            }

            const [chunk] = chunkItemIds(remaining, this.config.chunkSize);

            for (const itemId of chunk) {
                const outcome = await this.executor.apply(
                    itemId,
                    state.change_set,
                );

                if (!outcome.ok && outcome.code === 'storage_failure') {
                    return this.abortOnStorageFailure(state, outcome.message);
                }

                this.foldOutcome(state, outcome);
            }

            state.current_chunk_index += 1;
            remaining = remainingItemIds(state);

            try {
                await this.writeCheckpoint(state);
            } catch (error) {
                return this.storageFailure(
                    operationId,
                    state.processed_ids.length,
                    error,
                );
            }

            this.emit('chunk_completed', operationId, {
                chunk_index: state.current_chunk_index,
                chunk_size: chunk.length,
                processed_count: state.processed_ids.length,
                failed_count: state.failed.length,
                remaining_count: remaining.length,
            });
        }

        if (remaining.length > 0) {
            try {
                await this.writeCheckpoint(state);
            } catch (error) {
                return this.storageFailure(
                    operationId,
                    state.processed_ids.length,
                    error,
                );
            }

            this.emit('batch_interrupted', operationId, {
                processed_count: state.processed_ids.length,
                remaining_count: remaining.length,
            });

            return {
                success: true,
                statusCode: 202,
                result: this.buildResult(
                    state,
                    'interrupted',
                    isResume,
                    invocationStartMs,
                    [
                        ...invocationWarnings,
                        `time budget reached with ${remaining.length} ` +
                        `item(s) remaining; resume operation ${operationId} ` +
                        'to continue',
                    ],
                ),
            };
        }

        const completionWarnings = [...invocationWarnings];

        try {
            await this.deleteCheckpoints(operationId);
        } catch (error) {
            console.error('bulk-availability checkpoint cleanup failed', {
                operation_id: operationId,
                error: errorMessage(error),
            });
            completionWarnings.push(
                `checkpoint for operation ${operationId} could not be ` +
                'removed and will expire on its own',
            );
        }

        this.emit('batch_completed', operationId, {
            total_items: state.all_item_ids.length,
            processed_count: state.processed_ids.length,
            failed_count: state.failed.length,
            applied_count: state.applied_count,
            unchanged_count: state.unchanged_count,
            chunk_count: state.current_chunk_index,
        });

        return {
            success: true,
            statusCode: 200,
            result: this.buildResult(
                state,
                'completed',
                isResume,
                invocationStartMs,
                completionWarnings,
            ),
        };
    }

    private foldOutcome(
        state: BatchOperationState,
        outcome: ChunkApplyResult,
    ): void {
        if (!outcome.ok) {
            state.failed.push({
                item_id: outcome.item_id,
                code: outcome.code,
                message: outcome.message,
            });
            this.emit('item_failed', state.operation_id, {
                item_id: outcome.item_id,
                code: outcome.code,
                message: outcome.message,
            });

            return;
        }

        state.processed_ids.push(outcome.item_id);

        if (outcome.applied) {
            state.applied_count += 1;
        } else {
            state.unchanged_count += 1;
        }

        for (const conflict of outcome.conflicts) {
            this.recordWarning(
                state,
                `${outcome.item_id}: ${conflict.message}`,
            );
        }

        for (const warning of outcome.warnings) {
            this.recordWarning(state, `${outcome.item_id}: ${warning}`);
        }
    }

    private recordWarning(state: BatchOperationState, warning: string): void {
        if (state.warnings.length < MAX_BATCH_WARNINGS) {
            state.warnings.push(warning);
        } else {
            state.omitted_warning_count += 1;
        }
    }

    private async abortOnStorageFailure(
        state: BatchOperationState,
        reason: string,
    ): Promise<BatchFailure> {
        try {
            await this.writeCheckpoint(state);
        } catch (error) {
            console.error('bulk-availability checkpoint after failure lost', {
                operation_id: state.operation_id,
                error: errorMessage(error),
            });
        }

        return this.storageFailure(
            state.operation_id,
            state.processed_ids.length,
            new Error(reason),
        );
    }

    private storageFailure(
        operationId: string,
        processedCount: number,
        error: unknown,
    ): BatchFailure {
        const reason = errorMessage(error);

        this.emit('batch_failed', operationId, {
            processed_count: processedCount,
            reason,
        });

        return buildFailure(
            503,
            'batch_failed',
            `operation ${operationId} stopped after ${processedCount} ` +
            `processed item(s): ${reason}; resume to continue`,
            {
                operation_id: operationId,
                processed_count: processedCount,
            },
        );
    }

    private buildResult(
        state: BatchOperationState,
        status: BatchResult['status'],
        isResume: boolean,
        invocationStartMs: number,
        invocationWarnings: string[],
    ): BatchResult {
        const failures = orderedFailures(state);
        const warnings = [...state.warnings];

        if (state.omitted_warning_count > 0) {
            warnings.push(
                `${state.omitted_warning_count} more item warning(s) ` +
                'not shown',
            );
        }

        return {
            operation_id: state.operation_id,
            status,
            total_items: state.all_item_ids.length,
            success_count: state.processed_ids.length,
            failed_count: failures.length,
            applied_count: state.applied_count,
            unchanged_count: state.unchanged_count,
            errors: failures,
            warnings: [...warnings, ...invocationWarnings],
            is_complete: status === 'completed',
            is_resume: isResume,
            processing_time_seconds: roundTo(
                (this.now().getTime() - invocationStartMs) / 1000,
                2,
            ),
            chunk_count: state.current_chunk_index,
        };
    }

    private buildProgressSnapshot(
        state: BatchOperationState,
    ): BatchProgressSnapshot {
        return {
            schema_version: BATCH_CHECKPOINT_SCHEMA_VERSION,
            operation_id: state.operation_id,
            total: state.all_item_ids.length,
            processed: state.processed_ids.length,
            failed: state.failed.length,
            current_chunk_index: state.current_chunk_index,
            started_at: state.started_at,
            updated_at: state.last_checkpoint_at,
        };
    }

    private async writeCheckpoint(state: BatchOperationState): Promise<void> {
        state.last_checkpoint_at = normalizeIsoWithMillis(this.now());

        await this.checkpointStore.put(
            resumeCheckpointKey(state.operation_id),
            state,
            this.config.resumeTtlSeconds,
        );
        await this.checkpointStore.put(
            progressCheckpointKey(state.operation_id),
            this.buildProgressSnapshot(state),
            this.config.progressTtlSeconds,
        );
    }

    private async deleteCheckpoints(operationId: string): Promise<boolean> {
        const resumeDeleted = await this.checkpointStore.delete(
            resumeCheckpointKey(operationId),
        );
        const progressDeleted = await this.checkpointStore.delete(
            progressCheckpointKey(operationId),
        );

        return resumeDeleted || progressDeleted;
    }

    private async readProgressSnapshot(
        operationId: string,
    ): Promise<BatchProgressSnapshot | null> {
        const raw = await this.checkpointStore.get(
            progressCheckpointKey(operationId),
        );

        if (raw === null || raw === undefined) {
            return null;
        }

        const parsed = BatchProgressSnapshotSchema.safeParse(raw);

        if (!parsed.success || parsed.data.operation_id !== operationId) {
            return null;
        }

        return parsed.data;
    }

    private async lookupResumeState(operationId: string): Promise<ResumeLookup> {
        const raw = await this.checkpointStore.get(
            resumeCheckpointKey(operationId),
        );

        if (raw === null || raw === undefined) {
            return {
                status: 'missing',
            };
        }

        const parsed = BatchOperationStateSchema.safeParse(raw);

        if (!parsed.success) {
            return {
                status: 'invalid',
                message: parsed.error.issues[0]?.message ||
                    'invalid checkpoint',
            };
        }

        if (parsed.data.operation_id !== operationId) {
            return {
                status: 'invalid',
                message: 'checkpoint belongs to another operation',
            };
        }

        const ageMs = this.now().getTime() -
            Date.parse(parsed.data.started_at);

        if (ageMs > this.config.retentionSeconds * 1000) {
            return {
                status: 'stale',
                state: parsed.data,
            };
        }

        return {
            status: 'found',
            state: parsed.data,
        };
    }

    private emit(
        eventType: BatchEventType,
        operationId: string,
        details: Record<string, unknown>,
    ): void {
        this.eventSink.emit({
            event_id: `evt_${randomUUID()}`,
            event_type: eventType,
            operation_id: operationId,
            created_at: normalizeIsoWithMillis(this.now()),
            details,
        });
    }
}
