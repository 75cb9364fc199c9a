import type { DomainEvent } from '@eventide/core';
import type { Result } from 'neverthrow';
import { z } from 'zod';

export const DEFAULT_NOTIFICATION_CHANNEL = 'domain_events';

/**
 * Envelope sent after an event is committed. Advisory only: several commits
 * may collapse into one wake-up, so receivers re-query the store for rows they
 * have not processed instead of trusting the body.
 */
export const EventNotificationSchema = z.object({
  event_id: z.string(),
  event_type: z.string(),
  aggregate_id: z.string(),
  aggregate_type: z.string(),
  timestamp: z.string(),
  version: z.number().int(),
});

export type EventNotification = z.infer<typeof EventNotificationSchema>;

export type NotificationListener = (notification: EventNotification) => void;

export type Unlisten = () => Promise<void>;

export interface ChangeNotifier {
  notify(notification: EventNotification): Promise<Result<void, Error>>;
  listen(listener: NotificationListener): Promise<Result<Unlisten, Error>>;
}

export function toNotification(event: DomainEvent): EventNotification {
  return {
    event_id: event.eventId,
    event_type: event.eventType,
    aggregate_id: event.aggregateId,
    aggregate_type: event.aggregateType,
    timestamp: event.timestamp.toISOString(),
    version: event.version,
  };
}
