import { ValidationError, type DomainEvent } from '@eventide/core';
import type { Snapshottable } from '@eventide/snapshots';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

/**
 * Base class for event-sourced aggregates.
 *
 * State changes go through `raise`, which positions the event at the next
 * version, applies it, and queues it for the repository to store.
 */
export abstract class AggregateRoot implements Snapshottable {
  abstract readonly aggregateType: string;
  private currentVersion: number;
  private uncommitted: DomainEvent[] = [];

  protected constructor(
    readonly id: string,
    version = 0
  ) {
    this.currentVersion = version;
  }

  get version(): number {
    return this.currentVersion;
  }

  get uncommittedEvents(): readonly DomainEvent[] {
    return this.uncommitted;
  }

  /**
   * Replay stored events. They must continue this aggregate's version
   * sequence without gaps.
   */
  loadFromHistory(events: readonly DomainEvent[]): Result<void, ValidationError> {
    for (const event of events) {
      if (event.aggregateId !== this.id) {
        return err(new ValidationError(`Event ${event.eventId} belongs to ${event.aggregateId}, not ${this.id}`));
      }
      if (event.version !== this.currentVersion + 1) {
        return err(
          new ValidationError(
            `Event ${event.eventId} has version ${event.version}, expected ${this.currentVersion + 1} for ${this.id}`
          )
        );
      }
      this.apply(event);
      this.currentVersion = event.version;
    }
    return ok();
  }

  /** Hand the queued events to the caller and forget them. */
  pullUncommittedEvents(): DomainEvent[] {
    const events = this.uncommitted;
    this.uncommitted = [];
    return events;
  }

  abstract toSnapshot(): unknown;

  protected abstract apply(event: DomainEvent): void;

  protected raise(event: DomainEvent): void {
    if (event.aggregateId !== this.id) {
      throw new Error(`Cannot raise ${event.eventType} for ${event.aggregateId} on aggregate ${this.id}`);
    }
    const positioned = event.withVersion(this.currentVersion + 1);
    this.apply(positioned);
    this.currentVersion = positioned.version;
    this.uncommitted.push(positioned);
  }
}
