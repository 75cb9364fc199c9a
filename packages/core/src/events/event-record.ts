import { createHash } from 'node:crypto';

import { z } from 'zod';

/**
 * JSON form of a DomainEvent as written by the file and relational stores.
 */
export const EventRecordSchema = z.object({
  eventId: z.string().min(1),
  eventType: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  aggregateId: z.string().min(1),
  aggregateType: z.string(),
  version: z.number().int().positive(),
  correlationId: z.string().optional(),
  causationId: z.string().optional(),
  topic: z.string().optional(),
  payload: z.unknown(),
});

export type EventRecord = z.infer<typeof EventRecordSchema>;

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth and undefined members dropped.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * SHA-256 over the canonical JSON of a record. Stored alongside each event so
 * tampering with a persisted row can be detected.
 */
export function computeEventHash(record: EventRecord): string {
  return createHash('sha256').update(canonicalJson(record)).digest('hex');
}
