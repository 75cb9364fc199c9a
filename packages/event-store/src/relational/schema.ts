import type { Generated, Insertable, Selectable } from 'kysely';

/**
 * `domain_events`: one row per event.
 *
 * `payload` holds the JSON event record (metadata included) so a row can be
 * decoded without the other columns; the columns exist for filtering.
 * `position` is a store-wide insertion counter used by listeners to find rows
 * they have not processed yet.
 */
export interface DomainEventsTable {
  position: Generated<number>;
  event_id: string;
  aggregate_id: string;
  aggregate_type: string;
  event_type: string;
  version: number;
  payload: string;
  /** ISO-8601 UTC timestamp of the event */
  created_at: string;
  event_hash: string;
}

export interface EventListenerCheckpointsTable {
  listener_name: string;
  last_position: number;
  updated_at: string;
}

export interface EventStoreDatabase {
  domain_events: DomainEventsTable;
  event_listener_checkpoints: EventListenerCheckpointsTable;
}

export type DomainEventRow = Selectable<DomainEventsTable>;
export type NewDomainEventRow = Insertable<DomainEventsTable>;
