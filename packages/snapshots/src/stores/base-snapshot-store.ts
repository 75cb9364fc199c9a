import { abortReason, ValidationError } from '@eventide/core';
import type { Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type {
  SnapshotError,
  SnapshotFactory,
  SnapshotOperationOptions,
  SnapshotRecord,
  SnapshotStore,
  Snapshottable,
} from '../types.js';

/**
 * Type checking and restore logic shared by every snapshot store. Subclasses
 * only move records in and out of their medium.
 */
export abstract class BaseSnapshotStore implements SnapshotStore {
  protected constructor(
    protected readonly logger: Logger,
    private readonly now: () => Date
  ) {}

  protected abstract writeRecord(
    record: SnapshotRecord,
    options?: SnapshotOperationOptions
  ): Promise<Result<void, SnapshotError>>;

  abstract getSnapshotRecord(
    aggregateId: string,
    options?: SnapshotOperationOptions
  ): Promise<Result<SnapshotRecord | undefined, SnapshotError>>;

  abstract deleteSnapshot(
    aggregateId: string,
    options?: SnapshotOperationOptions
  ): Promise<Result<void, SnapshotError>>;

  async saveSnapshot(
    aggregate: Snapshottable,
    options?: SnapshotOperationOptions
  ): Promise<Result<void, SnapshotError>> {
    if (options?.signal?.aborted) {
      return err(abortReason(options.signal));
    }
    if (!aggregate.id) {
      return err(new ValidationError('Cannot snapshot an aggregate without an id'));
    }

    const record: SnapshotRecord = {
      aggregateId: aggregate.id,
      aggregateType: aggregate.aggregateType,
      version: aggregate.version,
      timestamp: this.now().toISOString(),
      state: aggregate.toSnapshot(),
    };

    const written = await this.writeRecord(record, options);
    if (written.isOk()) {
      this.logger.debug(
        { aggregateId: record.aggregateId, aggregateType: record.aggregateType, version: record.version },
        'Saved snapshot'
      );
    }
    return written;
  }

  async getSnapshot<T>(
    aggregateId: string,
    factory: SnapshotFactory<T>,
    options?: SnapshotOperationOptions
  ): Promise<Result<T | undefined, SnapshotError>> {
    const found = await this.getSnapshotRecord(aggregateId, options);
    if (found.isErr()) {
      return err(found.error);
    }

    const record = found.value;
    if (!record) {
      this.logger.debug({ aggregateId }, 'No snapshot found');
      return ok(undefined);
    }
    if (record.aggregateType !== factory.aggregateType) {
      this.logger.warn(
        { aggregateId, storedType: record.aggregateType, requestedType: factory.aggregateType },
        'Snapshot type mismatch'
      );
      return ok(undefined);
    }

    const restored = factory.fromSnapshot(record);
    if (restored.isErr()) {
      this.logger.error({ error: restored.error, aggregateId }, 'Failed to restore aggregate from snapshot');
      return err(restored.error);
    }
    return ok(restored.value);
  }
}
