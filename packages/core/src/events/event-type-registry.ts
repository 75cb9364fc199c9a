import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import { ValidationError } from '../errors/index.js';

import { DomainEvent, type DomainEventInit } from './domain-event.js';
import { EventRecordSchema, type EventRecord } from './event-record.js';

type EventFactory<TPayload> = (init: DomainEventInit<TPayload>) => DomainEvent<TPayload>;

interface RegisteredEventType {
  decode(record: EventRecord): Result<DomainEvent, ValidationError>;
}

/**
 * Maps stored event type names back to event classes so records read from a
 * store come back as instances of the class that produced them (and therefore
 * match `instanceof` subscriptions). Payloads are validated with zod on the way in.
 *
 * Unregistered types decode to a plain DomainEvent with the raw payload.
 */
export class EventTypeRegistry {
  private readonly types = new Map<string, RegisteredEventType>();

  /**
   * Register an event class under its class name.
   */
  register<TPayload>(
    eventClass: new (init: DomainEventInit<TPayload>) => DomainEvent<TPayload>,
    payloadSchema: z.ZodType<TPayload, z.ZodTypeDef, unknown>
  ): this {
    return this.registerType(eventClass.name, payloadSchema, (init) => new eventClass(init));
  }

  registerType<TPayload>(
    eventType: string,
    payloadSchema: z.ZodType<TPayload, z.ZodTypeDef, unknown>,
    create: EventFactory<TPayload>
  ): this {
    this.types.set(eventType, {
      decode: (record) => {
        const payload = payloadSchema.safeParse(record.payload);
        if (!payload.success) {
          const issues = payload.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
          return err(new ValidationError(`Invalid payload for ${eventType} (${record.eventId}): ${issues}`));
        }
        return ok(create({ ...recordToInit(record), payload: payload.data }));
      },
    });
    return this;
  }

  has(eventType: string): boolean {
    return this.types.has(eventType);
  }

  /**
   * Rebuild an event from its stored form. Accepts unvalidated input.
   */
  decode(input: unknown): Result<DomainEvent, ValidationError> {
    const parsed = EventRecordSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(new ValidationError(`Invalid event record: ${issues}`));
    }

    const record = parsed.data;
    const registered = this.types.get(record.eventType);
    if (!registered) {
      return ok(new DomainEvent({ ...recordToInit(record), payload: record.payload }));
    }
    return registered.decode(record);
  }
}

function recordToInit(record: EventRecord): Omit<DomainEventInit<unknown>, 'payload'> {
  return {
    eventId: record.eventId,
    eventType: record.eventType,
    timestamp: new Date(record.timestamp),
    aggregateId: record.aggregateId,
    aggregateType: record.aggregateType,
    version: record.version,
    correlationId: record.correlationId,
    causationId: record.causationId,
    topic: record.topic,
  };
}
