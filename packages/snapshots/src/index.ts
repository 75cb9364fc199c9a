export {
  SnapshotRecordSchema,
  type SnapshotError,
  type SnapshotFactory,
  type SnapshotOperationOptions,
  type SnapshotRecord,
  type SnapshotStore,
  type Snapshottable,
} from './types.js';
export {
  CompositeSnapshotStrategy,
  EventCountSnapshotStrategy,
  EventCountStrategyOptionsSchema,
  TimeBasedSnapshotStrategy,
  TimeBasedStrategyOptionsSchema,
  type SnapshotStrategy,
  type TimeBasedStrategyOptions,
} from './strategies/snapshot-strategy.js';
export { BaseSnapshotStore } from './stores/base-snapshot-store.js';
export { InMemorySnapshotStore } from './stores/in-memory-snapshot-store.js';
export { FileSystemSnapshotStore, type FileSystemSnapshotStoreOptions } from './stores/file-system-snapshot-store.js';
export type { AggregateSnapshotRow, AggregateSnapshotsTable, SnapshotDatabase } from './relational/schema.js';
export { SNAPSHOT_MIGRATION_TABLE, snapshotMigrations } from './relational/migrations.js';
export { RelationalSnapshotStore, type RelationalSnapshotStoreOptions } from './relational/relational-snapshot-store.js';
