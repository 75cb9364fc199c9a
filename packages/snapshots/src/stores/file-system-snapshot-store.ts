import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  abortReason,
  getErrorMessage,
  isMissingFileError,
  PersistenceError,
  toSafeFileName,
  ValidationError,
} from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';

import { SnapshotRecordSchema, type SnapshotError, type SnapshotOperationOptions, type SnapshotRecord } from '../types.js';

import { BaseSnapshotStore } from './base-snapshot-store.js';

export interface FileSystemSnapshotStoreOptions {
  directory: string;
  logger?: Logger | undefined;
  now?: (() => Date) | undefined;
}

/**
 * One `<aggregate id>.json` file per aggregate. Writes go to a temporary file
 * that is renamed over the target, so readers never see a half-written file.
 */
export class FileSystemSnapshotStore extends BaseSnapshotStore {
  private readonly directory: string;

  constructor(options: FileSystemSnapshotStoreOptions) {
    super(options.logger ?? getLogger('FileSystemSnapshotStore'), options.now ?? (() => new Date()));
    this.directory = options.directory;
  }

  async getSnapshotRecord(
    aggregateId: string,
    options?: SnapshotOperationOptions
  ): Promise<Result<SnapshotRecord | undefined, SnapshotError>> {
    const signal = options?.signal;
    if (signal?.aborted) {
      return err(abortReason(signal));
    }

    let content: string;
    try {
      content = await fs.readFile(this.snapshotPath(aggregateId), { encoding: 'utf8', signal });
    } catch (error) {
      if (signal?.aborted) return err(abortReason(signal));
      if (isMissingFileError(error)) return ok(undefined);
      this.logger.error({ error, aggregateId }, 'Failed to read snapshot');
      return err(new PersistenceError(`Failed to read snapshot for ${aggregateId}: ${getErrorMessage(error)}`, { cause: error }));
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return err(new ValidationError(`Snapshot file for ${aggregateId} is not valid JSON: ${getErrorMessage(error)}`));
    }
    const parsed = SnapshotRecordSchema.safeParse(json);
    if (!parsed.success) {
      return err(new ValidationError(`Snapshot file for ${aggregateId} is malformed: ${parsed.error.message}`));
    }
    return ok(parsed.data);
  }

  async deleteSnapshot(aggregateId: string, options?: SnapshotOperationOptions): Promise<Result<void, SnapshotError>> {
    if (options?.signal?.aborted) {
      return err(abortReason(options.signal));
    }
    try {
      await fs.rm(this.snapshotPath(aggregateId), { force: true });
      return ok();
    } catch (error) {
      this.logger.error({ error, aggregateId }, 'Failed to delete snapshot');
      return err(new PersistenceError(`Failed to delete snapshot for ${aggregateId}: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  protected async writeRecord(
    record: SnapshotRecord,
    options?: SnapshotOperationOptions
  ): Promise<Result<void, SnapshotError>> {
    const signal = options?.signal;
    const target = this.snapshotPath(record.aggregateId);
    const temp = `${target}.${uuidv4()}.tmp`;

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(record), { encoding: 'utf8', signal });
      await fs.rename(temp, target);
      return ok();
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn({ error: cleanupError, temp }, 'Failed to remove temporary snapshot file');
      });
      if (signal?.aborted) return err(abortReason(signal));
      this.logger.error({ error, aggregateId: record.aggregateId }, 'Failed to write snapshot');
      return err(
        new PersistenceError(`Failed to write snapshot for ${record.aggregateId}: ${getErrorMessage(error)}`, {
          cause: error,
        })
      );
    }
  }

  private snapshotPath(aggregateId: string): string {
    return path.join(this.directory, `${toSafeFileName(aggregateId)}.json`);
  }
}
