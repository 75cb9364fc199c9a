import type { DomainEvent } from '@eventide/core';
import type { AppendError, EventStore } from '@eventide/event-store';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { EventBus, PublishOptions, PublishOutcome } from '../bus/event-bus.js';
import type { EventMetadata } from '../handlers/event-handler.js';

export interface EventPublisherOptions {
  bus: EventBus;
  /** Without a store, events are only dispatched. */
  store?: EventStore | undefined;
  logger?: Logger | undefined;
}

/** Result for one event of a batch. */
export interface EventPublishReport {
  event: DomainEvent;
  result: Result<PublishOutcome, AppendError>;
}

/**
 * Persists events, then dispatches them on the bus. An event that could not
 * be stored is never dispatched.
 *
 * Events can also be buffered with `add` and sent together with
 * `publishPending`, typically once a unit of work has finished.
 */
export class EventPublisher {
  private readonly bus: EventBus;
  private readonly store: EventStore | undefined;
  private readonly logger: Logger;
  private pending: DomainEvent[] = [];

  constructor(options: EventPublisherOptions) {
    this.bus = options.bus;
    this.store = options.store;
    this.logger = options.logger ?? getLogger('EventPublisher');
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  add(event: DomainEvent): void {
    this.pending.push(event);
  }

  addMany(events: readonly DomainEvent[]): void {
    this.pending.push(...events);
  }

  /**
   * Persist every buffered event in order, then dispatch the ones that were
   * stored, in the same order. The buffer is emptied before anything runs, so
   * events added by handlers wait for the next call.
   */
  async publishPending(
    metadata: EventMetadata = {},
    options: PublishOptions = {}
  ): Promise<Result<EventPublishReport[], never>> {
    const batch = this.pending;
    this.pending = [];
    if (batch.length === 0) {
      return ok([]);
    }

    const persisted: { event: DomainEvent; stored: Result<void, AppendError> }[] = [];
    for (const event of batch) {
      persisted.push({ event, stored: await this.persist(event, options) });
    }

    const reports: EventPublishReport[] = [];
    for (const { event, stored } of persisted) {
      if (stored.isErr()) {
        reports.push({ event, result: err(stored.error) });
        continue;
      }
      reports.push({ event, result: await this.dispatch(event, metadata, options) });
    }

    this.logSummary('Published pending events', reports);
    return ok(reports);
  }

  /** Persist then dispatch one event. */
  async publish(
    event: DomainEvent,
    metadata: EventMetadata = {},
    options: PublishOptions = {}
  ): Promise<Result<PublishOutcome, AppendError>> {
    const stored = await this.persist(event, options);
    if (stored.isErr()) {
      return err(stored.error);
    }
    return this.dispatch(event, metadata, options);
  }

  /**
   * Persist-then-dispatch each event in order. A failure affects only its own
   * event; later events are still attempted.
   */
  async publishMany(
    events: readonly DomainEvent[],
    metadata: EventMetadata = {},
    options: PublishOptions = {}
  ): Promise<Result<EventPublishReport[], never>> {
    const reports: EventPublishReport[] = [];
    for (const event of events) {
      reports.push({ event, result: await this.publish(event, metadata, options) });
    }
    this.logSummary('Published events', reports);
    return ok(reports);
  }

  /**
   * Store all events in one all-or-nothing append, then dispatch them. Used
   * when the events belong to one change of an aggregate.
   */
  async commit(
    events: readonly DomainEvent[],
    metadata: EventMetadata = {},
    options: PublishOptions = {}
  ): Promise<Result<PublishOutcome[], AppendError>> {
    if (this.store) {
      const stored = await this.store.appendMany(events, { signal: options.signal });
      if (stored.isErr()) {
        this.logger.warn({ error: stored.error, count: events.length }, 'Failed to store events; nothing dispatched');
        return err(stored.error);
      }
    }
    const outcomes: PublishOutcome[] = [];
    for (const event of events) {
      const dispatched = await this.bus.publish(event, metadata, options);
      if (dispatched.isOk()) {
        outcomes.push(dispatched.value);
      }
    }
    return ok(outcomes);
  }

  private async persist(event: DomainEvent, options: PublishOptions): Promise<Result<void, AppendError>> {
    if (!this.store) {
      return ok();
    }
    const stored = await this.store.append(event, { signal: options.signal });
    if (stored.isErr()) {
      this.logger.warn(
        { error: stored.error, eventId: event.eventId, eventType: event.eventType, aggregateId: event.aggregateId },
        'Failed to store event; not dispatched'
      );
    }
    return stored;
  }

  private async dispatch(
    event: DomainEvent,
    metadata: EventMetadata,
    options: PublishOptions
  ): Promise<Result<PublishOutcome, AppendError>> {
    const dispatched = await this.bus.publish(event, metadata, options);
    return dispatched.isOk() ? ok(dispatched.value) : err(dispatched.error);
  }

  private logSummary(message: string, reports: readonly EventPublishReport[]): void {
    const failed = reports.filter((report) => report.result.isErr()).length;
    this.logger.debug({ total: reports.length, failed }, message);
  }
}
