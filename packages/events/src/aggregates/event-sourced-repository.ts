import type { DomainEvent, ValidationError } from '@eventide/core';
import type { AppendError, EventStore, EventStoreOperationOptions, ReadError } from '@eventide/event-store';
import { getLogger, type Logger } from '@eventide/logger';
import type { SnapshotError, SnapshotFactory, SnapshotStore, SnapshotStrategy } from '@eventide/snapshots';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { EventMetadata } from '../handlers/event-handler.js';
import type { EventPublisher } from '../publisher/event-publisher.js';

import type { AggregateRoot } from './aggregate-root.js';

/**
 * Creates empty aggregates of one type and restores them from snapshots.
 */
export interface AggregateFactory<T extends AggregateRoot> extends SnapshotFactory<T> {
  create(id: string): T;
}

export interface SnapshotSettings {
  store: SnapshotStore;
  strategy: SnapshotStrategy;
}

export interface EventSourcedRepositoryOptions<T extends AggregateRoot> {
  factory: AggregateFactory<T>;
  store: EventStore;
  publisher: EventPublisher;
  snapshots?: SnapshotSettings | undefined;
  logger?: Logger | undefined;
}

export type LoadError = ReadError | SnapshotError | ValidationError;

/**
 * Loads aggregates from the latest snapshot plus the events stored after it,
 * and saves them by committing their uncommitted events.
 */
export class EventSourcedRepository<T extends AggregateRoot> {
  private readonly factory: AggregateFactory<T>;
  private readonly store: EventStore;
  private readonly publisher: EventPublisher;
  private readonly snapshots: SnapshotSettings | undefined;
  private readonly logger: Logger;
  /** Events applied since the last snapshot, per aggregate id. */
  private readonly sinceSnapshot = new Map<string, number>();

  constructor(options: EventSourcedRepositoryOptions<T>) {
    this.factory = options.factory;
    this.store = options.store;
    this.publisher = options.publisher;
    this.snapshots = options.snapshots;
    this.logger = options.logger ?? getLogger(`EventSourcedRepository:${options.factory.aggregateType}`);
  }

  /** `ok(undefined)` when the aggregate has neither a snapshot nor events. */
  async load(id: string, options: EventStoreOperationOptions = {}): Promise<Result<T | undefined, LoadError>> {
    let restored: T | undefined;
    if (this.snapshots) {
      const snapshot = await this.snapshots.store.getSnapshot(id, this.factory, options);
      if (snapshot.isErr()) {
        return err(snapshot.error);
      }
      restored = snapshot.value;
    }

    const aggregate = restored ?? this.factory.create(id);
    const tail = await this.store.getEvents({ aggregateId: id, sinceVersion: aggregate.version + 1 }, options);
    if (tail.isErr()) {
      return err(tail.error);
    }
    if (!restored && tail.value.length === 0) {
      return ok(undefined);
    }

    const replayed = aggregate.loadFromHistory(tail.value);
    if (replayed.isErr()) {
      return err(replayed.error);
    }
    this.sinceSnapshot.set(id, tail.value.length);
    this.logger.debug(
      { aggregateId: id, fromSnapshot: restored !== undefined, replayed: tail.value.length, version: aggregate.version },
      'Aggregate loaded'
    );
    return ok(aggregate);
  }

  /**
   * Store and dispatch the aggregate's uncommitted events, then snapshot it if
   * the strategy asks for one.
   *
   * On a concurrency conflict nothing is stored and the aggregate's queued
   * events are gone: reload it and apply the command again.
   */
  async save(
    aggregate: T,
    metadata: EventMetadata = {},
    options: EventStoreOperationOptions = {}
  ): Promise<Result<DomainEvent[], AppendError>> {
    const events = aggregate.pullUncommittedEvents();
    if (events.length === 0) {
      return ok([]);
    }

    const committed = await this.publisher.commit(events, metadata, options);
    if (committed.isErr()) {
      return err(committed.error);
    }

    const count = (this.sinceSnapshot.get(aggregate.id) ?? 0) + events.length;
    this.sinceSnapshot.set(aggregate.id, count);
    await this.maybeSnapshot(aggregate, count, options.signal);
    return ok(events);
  }

  /**
   * Snapshot failures are logged only: the events are already stored, and a
   * missing snapshot just means a longer replay.
   */
  private async maybeSnapshot(aggregate: T, eventCount: number, signal: AbortSignal | undefined): Promise<void> {
    if (!this.snapshots) return;

    const decision = await this.snapshots.strategy.shouldSnapshot(aggregate.id, eventCount, signal);
    if (decision.isErr()) {
      this.logger.warn({ aggregateId: aggregate.id, error: decision.error }, 'Snapshot decision failed');
      return;
    }
    if (!decision.value) return;

    const saved = await this.snapshots.store.saveSnapshot(aggregate, { signal });
    if (saved.isErr()) {
      this.logger.warn({ aggregateId: aggregate.id, version: aggregate.version, error: saved.error }, 'Snapshot not saved');
      return;
    }
    this.sinceSnapshot.set(aggregate.id, 0);
  }
}
