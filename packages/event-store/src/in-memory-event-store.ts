import { abortReason, KeyedLock, type DomainEvent } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { applyFilter } from './filter.js';
import type { AppendError, EventFilter, EventStore, EventStoreOperationOptions, ReadError } from './port.js';
import { checkBatchVersions } from './version-guard.js';

/**
 * Process-local event store. Events live for the lifetime of the instance.
 */
export class InMemoryEventStore implements EventStore {
  private readonly streams = new Map<string, DomainEvent[]>();
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger | undefined } = {}) {
    this.logger = options.logger ?? getLogger('InMemoryEventStore');
  }

  append(event: DomainEvent, options?: EventStoreOperationOptions): Promise<Result<void, AppendError>> {
    return this.appendMany([event], options);
  }

  appendMany(events: readonly DomainEvent[], options?: EventStoreOperationOptions): Promise<Result<void, AppendError>> {
    if (options?.signal?.aborted) {
      return Promise.resolve(err(abortReason(options.signal)));
    }
    if (events.length === 0) {
      return Promise.resolve(ok());
    }

    return this.lock.runExclusiveMany(
      events.map((event) => event.aggregateId),
      (): Result<void, AppendError> => {
        const current = new Map<string, number>();
        for (const event of events) {
          current.set(event.aggregateId, this.currentVersion(event.aggregateId));
        }

        const check = checkBatchVersions(events, current);
        if (check.isErr()) {
          this.logger.warn(
            {
              aggregateId: check.error.aggregateId,
              expectedVersion: check.error.expectedVersion,
              actualVersion: check.error.actualVersion,
            },
            'Rejected out-of-sequence event'
          );
          return err(check.error);
        }

        for (const event of events) {
          const stream = this.streams.get(event.aggregateId) ?? [];
          stream.push(event);
          this.streams.set(event.aggregateId, stream);
        }
        return ok();
      }
    );
  }

  getEvents(filter: EventFilter = {}, options?: EventStoreOperationOptions): Promise<Result<DomainEvent[], ReadError>> {
    if (options?.signal?.aborted) {
      return Promise.resolve(err(abortReason(options.signal)));
    }

    const source =
      filter.aggregateId !== undefined ? (this.streams.get(filter.aggregateId) ?? []) : [...this.streams.values()].flat();
    return Promise.resolve(ok(applyFilter(source, filter)));
  }

  getCurrentVersion(aggregateId: string): Promise<Result<number, ReadError>> {
    return Promise.resolve(ok(this.currentVersion(aggregateId)));
  }

  /** Drop every stored event. */
  clear(): void {
    this.streams.clear();
  }

  private currentVersion(aggregateId: string): number {
    return this.streams.get(aggregateId)?.at(-1)?.version ?? 0;
  }
}
