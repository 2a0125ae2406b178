import { BatchEventType, BatchOperationEvent } from './models';

export interface BatchEventSink {
    emit(event: BatchOperationEvent): void;
}

const ERROR_EVENT_TYPES: ReadonlySet<BatchEventType> = new Set<BatchEventType>([
    'item_failed',
    'batch_failed',
]);

export class ConsoleBatchEventSink implements BatchEventSink {
    emit(event: BatchOperationEvent): void {
        const fields = {
            event_id: event.event_id,
            event_type: event.event_type,
            operation_id: event.operation_id,
            created_at: event.created_at,
            ...event.details,
        };

        if (ERROR_EVENT_TYPES.has(event.event_type)) {
            console.error('bulk-availability batch event', fields);

            return;
        }

        console.log('bulk-availability batch event', fields);
    }
}

export class RecordingBatchEventSink implements BatchEventSink {
    readonly events: BatchOperationEvent[] = [];

    emit(event: BatchOperationEvent): void {
        this.events.push(event);
    }

    ofType(eventType: BatchEventType): BatchOperationEvent[] {
        return this.events.filter((event) => event.event_type === eventType);
    }

    eventTypes(): BatchEventType[] {
        return this.events.map((event) => event.event_type);
    }
}
