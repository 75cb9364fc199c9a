import type { CancelledError, PersistenceError, ValidationError } from '@eventide/core';
import type { Result } from 'neverthrow';
import { z } from 'zod';

/**
 * Stored form of a snapshot. `aggregateType` doubles as the type tag checked on
 * read; `state` is whatever the aggregate's toSnapshot() returned.
 */
export const SnapshotRecordSchema = z.object({
  aggregateId: z.string().min(1),
  aggregateType: z.string().min(1),
  version: z.number().int().nonnegative(),
  timestamp: z.string().datetime({ offset: true }),
  state: z.unknown(),
});

export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>;

/**
 * An aggregate that can be captured in a snapshot. `toSnapshot()` must return
 * JSON-safe data.
 */
export interface Snapshottable {
  readonly id: string;
  readonly version: number;
  readonly aggregateType: string;
  toSnapshot(): unknown;
}

/**
 * Rebuilds one aggregate type from its snapshot record.
 */
export interface SnapshotFactory<T> {
  readonly aggregateType: string;
  fromSnapshot(record: SnapshotRecord): Result<T, ValidationError>;
}

export interface SnapshotOperationOptions {
  signal?: AbortSignal | undefined;
}

export type SnapshotError = PersistenceError | ValidationError | CancelledError;

/**
 * Keeps at most one snapshot per aggregate id; saving replaces the previous one.
 */
export interface SnapshotStore {
  saveSnapshot(aggregate: Snapshottable, options?: SnapshotOperationOptions): Promise<Result<void, SnapshotError>>;

  /**
   * Restore the aggregate from its snapshot. A snapshot recorded under a
   * different aggregate type counts as absent.
   */
  getSnapshot<T>(
    aggregateId: string,
    factory: SnapshotFactory<T>,
    options?: SnapshotOperationOptions
  ): Promise<Result<T | undefined, SnapshotError>>;

  getSnapshotRecord(
    aggregateId: string,
    options?: SnapshotOperationOptions
  ): Promise<Result<SnapshotRecord | undefined, SnapshotError>>;

  /** Succeeds whether or not a snapshot existed. */
  deleteSnapshot(aggregateId: string, options?: SnapshotOperationOptions): Promise<Result<void, SnapshotError>>;
}
