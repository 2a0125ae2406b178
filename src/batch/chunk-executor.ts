import {
    availabilityRecordsEqual,
    mergeAvailability,
} from '../availability/merge-engine';
import {
    AvailabilityRecord,
    ChangeSet,
    MergeConflict,
} from '../availability/models';
import { ItemFailureCode } from '../constants';
import {
    ItemAvailabilityStore,
    ItemNotFoundError,
    StorageUnavailableError,
} from '../items/item-store';

export type ChunkApplyResult =
    | {
        ok: true;
        item_id: string;
        applied: boolean;
        conflicts: MergeConflict[];
        warnings: string[];
    }
    | {
        ok: false;
        item_id: string;
        code: ItemFailureCode;
        message: string;
    };

function classifyFailure(itemId: string, error: unknown): ChunkApplyResult {
    if (error instanceof ItemNotFoundError) {
        return {
            ok: false,
            item_id: itemId,
            code: 'item_not_found',
            message: error.message,
        };
    }

    if (error instanceof StorageUnavailableError) {
        return {
            ok: false,
            item_id: itemId,
            code: 'storage_failure',
            message: error.message,
        };
    }

    return {
        ok: false,
        item_id: itemId,
        code: 'item_error',
        message: error instanceof Error ? error.message : String(error),
    };
}

/**
 * Applies one change set to one item. Every outcome comes back as a
 * result; store errors are classified, never rethrown.
 */
export class ChunkExecutor {
    constructor(
        private readonly itemStore: ItemAvailabilityStore,
    ) {}

    async apply(itemId: string, changeSet: ChangeSet): Promise<ChunkApplyResult> {
        let existing: AvailabilityRecord;

        try {
            existing = await this.itemStore.getAvailability(itemId);
        } catch (error) {
            return classifyFailure(itemId, error);
        }

        const merged = mergeAvailability(existing, changeSet);

        if (!merged.ok) {
            return {
                ok: false,
                item_id: itemId,
                code: 'validation_error',
                message: merged.violation.message,
            };
        }

        if (availabilityRecordsEqual(existing, merged.record)) {
            return {
                ok: true,
                item_id: itemId,
                applied: false,
                conflicts: [],
                warnings: [],
            };
        }

        try {
            await this.itemStore.saveAvailability(itemId, merged.record);
        } catch (error) {
            return classifyFailure(itemId, error);
        }

        const warnings: string[] = [];

        // the write stands; a stale cache entry expires with its TTL
        try {
            await this.itemStore.invalidateCache(itemId);
        } catch (error) {
            const reason = error instanceof Error
                ? error.message
                : String(error);

            console.error('bulk-availability cache invalidation failed', {
                item_id: itemId,
                error: reason,
            });
            warnings.push(`cache invalidation failed: ${reason}`);
        }

        return {
            ok: true,
            item_id: itemId,
            applied: true,
            conflicts: merged.conflicts,
            warnings,
        };
    }
}
