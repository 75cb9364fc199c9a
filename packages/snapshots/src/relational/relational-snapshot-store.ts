import { abortReason, getErrorMessage, PersistenceError, raceAgainstSignal, ValidationError } from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { SnapshotRecordSchema, type SnapshotError, type SnapshotOperationOptions, type SnapshotRecord } from '../types.js';
import { BaseSnapshotStore } from '../stores/base-snapshot-store.js';

import type { AggregateSnapshotRow, SnapshotDatabase } from './schema.js';

export interface RelationalSnapshotStoreOptions {
  db: Kysely<SnapshotDatabase>;
  logger?: Logger | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Snapshots in `aggregate_snapshots`, one row per aggregate, upserted on save.
 */
export class RelationalSnapshotStore extends BaseSnapshotStore {
  private readonly db: Kysely<SnapshotDatabase>;

  constructor(options: RelationalSnapshotStoreOptions) {
    super(options.logger ?? getLogger('RelationalSnapshotStore'), options.now ?? (() => new Date()));
    this.db = options.db;
  }

  async getSnapshotRecord(
    aggregateId: string,
    options?: SnapshotOperationOptions
  ): Promise<Result<SnapshotRecord | undefined, SnapshotError>> {
    const signal = options?.signal;
    if (signal?.aborted) {
      return err(abortReason(signal));
    }

    let row: AggregateSnapshotRow | undefined;
    try {
      const query = this.db
        .selectFrom('aggregate_snapshots')
        .selectAll()
        .where('aggregate_id', '=', aggregateId)
        .executeTakeFirst();
      row = signal ? await raceAgainstSignal(query, signal) : await query;
    } catch (error) {
      if (signal?.aborted) return err(abortReason(signal));
      this.logger.error({ error, aggregateId }, 'Failed to read snapshot');
      return err(new PersistenceError(`Failed to read snapshot for ${aggregateId}: ${getErrorMessage(error)}`, { cause: error }));
    }

    if (!row) {
      return ok(undefined);
    }
    const record = toRecord(row);
    return record.isOk() ? ok(record.value) : err(record.error);
  }

  async deleteSnapshot(aggregateId: string, options?: SnapshotOperationOptions): Promise<Result<void, SnapshotError>> {
    if (options?.signal?.aborted) {
      return err(abortReason(options.signal));
    }
    try {
      await this.db.deleteFrom('aggregate_snapshots').where('aggregate_id', '=', aggregateId).execute();
      return ok();
    } catch (error) {
      this.logger.error({ error, aggregateId }, 'Failed to delete snapshot');
      return err(new PersistenceError(`Failed to delete snapshot for ${aggregateId}: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  protected async writeRecord(record: SnapshotRecord): Promise<Result<void, SnapshotError>> {
    const row = {
      aggregate_id: record.aggregateId,
      aggregate_type: record.aggregateType,
      version: record.version,
      state: JSON.stringify(record.state),
      created_at: record.timestamp,
    };

    try {
      await this.db
        .insertInto('aggregate_snapshots')
        .values(row)
        .onConflict((oc) =>
          oc.column('aggregate_id').doUpdateSet({
            aggregate_type: row.aggregate_type,
            version: row.version,
            state: row.state,
            created_at: row.created_at,
          })
        )
        .execute();
      return ok();
    } catch (error) {
      this.logger.error({ error, aggregateId: record.aggregateId }, 'Failed to write snapshot');
      return err(
        new PersistenceError(`Failed to write snapshot for ${record.aggregateId}: ${getErrorMessage(error)}`, {
          cause: error,
        })
      );
    }
  }
}

function toRecord(row: AggregateSnapshotRow): Result<SnapshotRecord, ValidationError> {
  let state: unknown;
  try {
    state = JSON.parse(row.state);
  } catch (error) {
    return err(new ValidationError(`Snapshot for ${row.aggregate_id} is not valid JSON: ${getErrorMessage(error)}`));
  }

  const parsed = SnapshotRecordSchema.safeParse({
    aggregateId: row.aggregate_id,
    aggregateType: row.aggregate_type,
    version: Number(row.version),
    timestamp: row.created_at,
    state,
  });
  if (!parsed.success) {
    return err(new ValidationError(`Snapshot for ${row.aggregate_id} is malformed: ${parsed.error.message}`));
  }
  return ok(parsed.data);
}
