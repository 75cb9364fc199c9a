import type { Insertable, Selectable } from 'kysely';

/**
 * `aggregate_snapshots`: latest snapshot per aggregate, state as JSON text.
 */
export interface AggregateSnapshotsTable {
  aggregate_id: string;
  aggregate_type: string;
  version: number;
  state: string;
  created_at: string;
}

export interface SnapshotDatabase {
  aggregate_snapshots: AggregateSnapshotsTable;
}

export type AggregateSnapshotRow = Selectable<AggregateSnapshotsTable>;
export type NewAggregateSnapshotRow = Insertable<AggregateSnapshotsTable>;
