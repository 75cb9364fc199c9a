export type { AppendError, EventFilter, EventStore, EventStoreOperationOptions, ReadError } from './port.js';
export { checkBatchVersions, checkNextVersion } from './version-guard.js';
export { applyFilter, compareEvents, matchesFilter } from './filter.js';
export { InMemoryEventStore } from './in-memory-event-store.js';
export { FileEventStore, type FileEventStoreOptions } from './file-event-store.js';

export {
  DEFAULT_NOTIFICATION_CHANNEL,
  EventNotificationSchema,
  toNotification,
  type ChangeNotifier,
  type EventNotification,
  type NotificationListener,
  type Unlisten,
} from './notifications/change-notifier.js';
export { InProcessChangeNotifier } from './notifications/in-process-notifier.js';
export {
  PgChangeNotifier,
  type PgChangeNotifierOptions,
  type PgListenClient,
  type PgNotificationMessage,
  type PgNotificationPool,
} from './notifications/pg-notifier.js';

export type { DomainEventRow, EventStoreDatabase, NewDomainEventRow } from './relational/schema.js';
export { createEventStoreMigrations, EVENT_STORE_MIGRATION_TABLE } from './relational/migrations.js';
export { InMemoryCheckpointStore, RelationalCheckpointStore, type CheckpointStore } from './relational/checkpoint-store.js';
export {
  APPEND_ADVISORY_LOCK_KEY,
  RelationalEventStore,
  type IntegrityViolation,
  type RelationalEventStoreOptions,
} from './relational/relational-event-store.js';
export {
  RelationalEventListener,
  type PositionedEvent,
  type PositionedEventHandler,
  type PositionedEventSource,
  type RelationalEventListenerOptions,
} from './relational/relational-event-listener.js';
