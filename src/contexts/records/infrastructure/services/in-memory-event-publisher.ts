import type { RecordsDomainEvent, RecordsEventType } from '../../domain/events/domain-events';
import type { IEventPublisher } from '../../application/ports/ports';

export interface PublishedBatch {
  readonly events: RecordsDomainEvent[];
  readonly publishedAt: Date;
}

/**
 * インメモリのイベント発行者
 *
 * 発行されたイベントをバッチ単位で保持する。返す配列はコピー
 */
export class InMemoryEventPublisher implements IEventPublisher {
  private batches: PublishedBatch[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  publish(events: readonly RecordsDomainEvent[]): void {
    this.batches.push({ events: [...events], publishedAt: this.clock() });
  }

  getPublishedEvents(): PublishedBatch[] {
    return [...this.batches];
  }

  getAllEvents(): RecordsDomainEvent[] {
    return this.batches.flatMap(batch => batch.events);
  }

  getEventsByType<T extends RecordsEventType>(
    eventType: T
  ): Array<Extract<RecordsDomainEvent, { eventType: T }>> {
    return this.getAllEvents().filter(
      (event): event is Extract<RecordsDomainEvent, { eventType: T }> => event.eventType === eventType
    );
  }

  getLastEventBatch(): PublishedBatch | null {
    return this.batches[this.batches.length - 1] ?? null;
  }

  clear(): void {
    this.batches = [];
  }
}
