import { v4 as uuidv4 } from 'uuid';

import type { EventRecord } from './event-record.js';

export interface DomainEventInit<TPayload> {
  aggregateId: string;
  aggregateType?: string | undefined;
  version?: number | undefined;
  payload: TPayload;
  eventId?: string | undefined;
  eventType?: string | undefined;
  timestamp?: Date | undefined;
  correlationId?: string | undefined;
  causationId?: string | undefined;
  topic?: string | undefined;
}

export interface EventMetadataPatch {
  correlationId?: string | undefined;
  causationId?: string | undefined;
  topic?: string | undefined;
}

/**
 * Immutable fact about an aggregate.
 *
 * Concrete events extend this class and narrow the payload type:
 *
 * ```ts
 * class OrderPlaced extends DomainEvent<{ total: number }> {}
 * const event = new OrderPlaced({ aggregateId: 'order-1', aggregateType: 'Order', version: 1, payload: { total: 5 } });
 * ```
 *
 * `eventType` defaults to the concrete class name, which is also the name the
 * EventTypeRegistry uses when decoding stored records.
 */
export class DomainEvent<TPayload = unknown> {
  readonly eventId: string;
  readonly eventType: string;
  readonly timestamp: Date;
  readonly aggregateId: string;
  readonly aggregateType: string;
  readonly version: number;
  readonly correlationId: string | undefined;
  readonly causationId: string | undefined;
  readonly topic: string | undefined;
  readonly payload: TPayload;

  constructor(init: DomainEventInit<TPayload>) {
    this.eventId = init.eventId ?? uuidv4();
    this.eventType = init.eventType ?? new.target.name;
    this.timestamp = init.timestamp ?? new Date();
    this.aggregateId = init.aggregateId;
    this.aggregateType = init.aggregateType ?? 'unknown';
    this.version = init.version ?? 1;
    this.correlationId = init.correlationId;
    this.causationId = init.causationId;
    this.topic = init.topic;
    this.payload = init.payload;
  }

  /**
   * Copy of this event (same class, same id) with the given metadata replaced.
   */
  withMetadata(patch: EventMetadataPatch): this {
    const copy: this = Object.assign(Object.create(Object.getPrototypeOf(this)), this, pickDefined(patch));
    return copy;
  }

  /**
   * Copy of this event positioned at `version` of `aggregateId`. Used by
   * aggregates that raise events before they know their stream position.
   */
  withVersion(version: number): this {
    const copy: this = Object.assign(Object.create(Object.getPrototypeOf(this)), this, { version });
    return copy;
  }

  toRecord(): EventRecord {
    return {
      eventId: this.eventId,
      eventType: this.eventType,
      timestamp: this.timestamp.toISOString(),
      aggregateId: this.aggregateId,
      aggregateType: this.aggregateType,
      version: this.version,
      ...(this.correlationId !== undefined ? { correlationId: this.correlationId } : {}),
      ...(this.causationId !== undefined ? { causationId: this.causationId } : {}),
      ...(this.topic !== undefined ? { topic: this.topic } : {}),
      payload: this.payload,
    };
  }
}

function pickDefined(patch: EventMetadataPatch): EventMetadataPatch {
  const picked: EventMetadataPatch = {};
  if (patch.correlationId !== undefined) picked.correlationId = patch.correlationId;
  if (patch.causationId !== undefined) picked.causationId = patch.causationId;
  if (patch.topic !== undefined) picked.topic = patch.topic;
  return picked;
}

/** Any event class, whatever its constructor parameters. Used for `instanceof` filters. */
export type EventClass<TEvent extends DomainEvent = DomainEvent> = abstract new (...args: never[]) => TEvent;
