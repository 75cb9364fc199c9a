import type {
  CancelledError,
  ConcurrencyConflictError,
  DomainEvent,
  PersistenceError,
  ValidationError,
} from '@eventide/core';
import type { Result } from 'neverthrow';

export interface EventStoreOperationOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Query over stored events. All supplied fields must match.
 */
export interface EventFilter {
  aggregateId?: string | undefined;
  aggregateType?: string | undefined;
  eventType?: string | undefined;
  /** Inclusive lower bound on version. */
  sinceVersion?: number | undefined;
  /** Inclusive lower bound on event timestamp. */
  sinceTimestamp?: Date | undefined;
  limit?: number | undefined;
}

export type AppendError = ConcurrencyConflictError | PersistenceError | CancelledError;
export type ReadError = PersistenceError | ValidationError | CancelledError;

/**
 * Append-only event persistence with optimistic concurrency.
 *
 * The first event of an aggregate must carry version 1 and every later event
 * exactly the current maximum plus one; anything else fails with a
 * ConcurrencyConflictError and nothing is written.
 */
export interface EventStore {
  append(event: DomainEvent, options?: EventStoreOperationOptions): Promise<Result<void, AppendError>>;

  /**
   * Append events in order. Versions for the whole batch are checked before
   * anything is written; a conflict writes nothing. The relational store
   * commits the batch in one transaction, the file store writes each
   * aggregate's events in a single append, stopping at the first failed
   * stream.
   */
  appendMany(events: readonly DomainEvent[], options?: EventStoreOperationOptions): Promise<Result<void, AppendError>>;

  /**
   * Matching events ordered by version, then timestamp, truncated to `limit`.
   */
  getEvents(filter?: EventFilter, options?: EventStoreOperationOptions): Promise<Result<DomainEvent[], ReadError>>;

  /** Highest stored version for the aggregate, 0 when it has no events. */
  getCurrentVersion(aggregateId: string, options?: EventStoreOperationOptions): Promise<Result<number, ReadError>>;
}
