import { abortReason } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { SnapshotError, SnapshotOperationOptions, SnapshotRecord } from '../types.js';

import { BaseSnapshotStore } from './base-snapshot-store.js';

/**
 * Snapshots held for the lifetime of the instance. Records are cloned on the
 * way in and out so callers cannot alter stored state.
 */
export class InMemorySnapshotStore extends BaseSnapshotStore {
  private readonly records = new Map<string, SnapshotRecord>();

  constructor(options: { logger?: Logger | undefined; now?: (() => Date) | undefined } = {}) {
    super(options.logger ?? getLogger('InMemorySnapshotStore'), options.now ?? (() => new Date()));
  }

  getSnapshotRecord(
    aggregateId: string,
    options?: SnapshotOperationOptions
  ): Promise<Result<SnapshotRecord | undefined, SnapshotError>> {
    if (options?.signal?.aborted) {
      return Promise.resolve(err(abortReason(options.signal)));
    }
    const record = this.records.get(aggregateId);
    return Promise.resolve(ok(record ? structuredClone(record) : undefined));
  }

  deleteSnapshot(aggregateId: string, options?: SnapshotOperationOptions): Promise<Result<void, SnapshotError>> {
    if (options?.signal?.aborted) {
      return Promise.resolve(err(abortReason(options.signal)));
    }
    this.records.delete(aggregateId);
    return Promise.resolve(ok());
  }

  get size(): number {
    return this.records.size;
  }

  protected writeRecord(record: SnapshotRecord): Promise<Result<void, SnapshotError>> {
    this.records.set(record.aggregateId, structuredClone(record));
    return Promise.resolve(ok());
  }
}
