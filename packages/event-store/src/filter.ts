import type { DomainEvent } from '@eventide/core';

import type { EventFilter } from './port.js';

export function matchesFilter(event: DomainEvent, filter: EventFilter): boolean {
  if (filter.aggregateId !== undefined && event.aggregateId !== filter.aggregateId) return false;
  if (filter.aggregateType !== undefined && event.aggregateType !== filter.aggregateType) return false;
  if (filter.eventType !== undefined && event.eventType !== filter.eventType) return false;
  if (filter.sinceVersion !== undefined && event.version < filter.sinceVersion) return false;
  if (filter.sinceTimestamp !== undefined && event.timestamp.getTime() < filter.sinceTimestamp.getTime()) return false;
  return true;
}

export function compareEvents(a: DomainEvent, b: DomainEvent): number {
  return a.version - b.version || a.timestamp.getTime() - b.timestamp.getTime();
}

/**
 * Filter, order and truncate an in-memory list of events.
 */
export function applyFilter(events: Iterable<DomainEvent>, filter: EventFilter = {}): DomainEvent[] {
  const matched = [...events].filter((event) => matchesFilter(event, filter)).sort(compareEvents);
  return filter.limit !== undefined ? matched.slice(0, Math.max(0, filter.limit)) : matched;
}
