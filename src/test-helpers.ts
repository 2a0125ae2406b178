import { AvailabilityRecord } from './availability/models';
import { BatchOperationEvent } from './batch/models';
import { RecordingBatchEventSink } from './batch/events';
import { InMemoryItemAvailabilityStore } from './items/item-store';

export const TEST_API_TOKEN = 'test-secret';

export const TEST_START_ISO = '2026-10-19T10:00:00.000Z';

export interface TestClock {
    now: () => Date;
    advance: (ms: number) => void;
}

export function createTestClock(startIso = TEST_START_ISO): TestClock {
    let nowMs = Date.parse(startIso);

    return {
        now: () => new Date(nowMs),
        advance: (ms: number) => {
            nowMs += ms;
        },
    };
}

export function buildItemIds(count: number, prefix = 'item'): string[] {
    return Array.from({ length: count }, (_, index) => {
        return `${prefix}-${String(index + 1).padStart(3, '0')}`;
    });
}

/**
 * In-memory item store that records writes and can fail them on demand.
 */
export class TrackingItemStore extends InMemoryItemAvailabilityStore {
    saves: string[] = [];

    invalidations: string[] = [];

    failingItemIds = new Set<string>();

    failure: Error | null = null;

    invalidationFailure: Error | null = null;

    async saveAvailability(
        itemId: string,
        record: AvailabilityRecord,
    ): Promise<void> {
        if (this.failure && this.failingItemIds.has(itemId)) {
            throw this.failure;
        }

        this.saves.push(itemId);
        await super.saveAvailability(itemId, record);
    }

    async invalidateCache(itemId?: string): Promise<void> {
        if (this.invalidationFailure) {
            throw this.invalidationFailure;
        }

        if (itemId) {
            this.invalidations.push(itemId);
        }
    }
}

/**
 * Records events and moves the test clock forward after every completed
 * chunk, simulating slow chunks against the time budget.
 */
export class ClockAdvancingEventSink extends RecordingBatchEventSink {
    constructor(
        private readonly clock: TestClock,
        private readonly msPerChunk: number,
    ) {
        super();
    }

    emit(event: BatchOperationEvent): void {
        super.emit(event);

        if (event.event_type === 'chunk_completed') {
            this.clock.advance(this.msPerChunk);
        }
    }
}
