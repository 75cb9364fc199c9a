import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  abortReason,
  computeEventHash,
  EventRecordSchema,
  EventTypeRegistry,
  fromSafeFileName,
  isMissingFileError,
  getErrorMessage,
  KeyedLock,
  PersistenceError,
  toSafeFileName,
  ValidationError,
  type DomainEvent,
} from '@eventide/core';
import { getLogger, type Logger } from '@eventide/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { applyFilter } from './filter.js';
import type { AppendError, EventFilter, EventStore, EventStoreOperationOptions, ReadError } from './port.js';
import { checkBatchVersions } from './version-guard.js';

const STREAM_EXTENSION = '.jsonl';

const StoredLineSchema = EventRecordSchema.extend({ hash: z.string() });

export interface FileEventStoreOptions {
  directory: string;
  registry?: EventTypeRegistry | undefined;
  logger?: Logger | undefined;
}

/**
 * Event store backed by one JSON-lines file per aggregate. Each line holds the
 * event record plus its content hash. Survives restarts: versions are read
 * back from disk the first time an aggregate is touched.
 */
export class FileEventStore implements EventStore {
  private readonly directory: string;
  private readonly registry: EventTypeRegistry;
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();
  private readonly versions = new Map<string, number>();

  constructor(options: FileEventStoreOptions) {
    this.directory = options.directory;
    this.registry = options.registry ?? new EventTypeRegistry();
    this.logger = options.logger ?? getLogger('FileEventStore');
  }

  append(event: DomainEvent, options?: EventStoreOperationOptions): Promise<Result<void, AppendError>> {
    return this.appendMany([event], options);
  }

  async appendMany(
    events: readonly DomainEvent[],
    options?: EventStoreOperationOptions
  ): Promise<Result<void, AppendError>> {
    if (options?.signal?.aborted) {
      return err(abortReason(options.signal));
    }
    if (events.length === 0) {
      return ok();
    }

    return this.lock.runExclusiveMany(
      events.map((event) => event.aggregateId),
      async (): Promise<Result<void, AppendError>> => {
        const current = new Map<string, number>();
        for (const event of events) {
          const version = await this.loadVersion(event.aggregateId);
          if (version.isErr()) {
            return err(new PersistenceError(version.error.message, { cause: version.error }));
          }
          current.set(event.aggregateId, version.value);
        }

        const check = checkBatchVersions(events, current);
        if (check.isErr()) {
          return err(check.error);
        }

        try {
          await fs.mkdir(this.directory, { recursive: true });
          // One append per aggregate stream
          const lines = new Map<string, string[]>();
          for (const event of events) {
            const record = event.toRecord();
            const stream = lines.get(event.aggregateId) ?? [];
            stream.push(JSON.stringify({ ...record, hash: computeEventHash(record) }));
            lines.set(event.aggregateId, stream);
          }
          for (const [aggregateId, stream] of lines) {
            await fs.appendFile(this.streamPath(aggregateId), `${stream.join('\n')}\n`, 'utf8');
          }
          for (const event of events) {
            this.versions.set(event.aggregateId, event.version);
          }
          return ok();
        } catch (error) {
          this.logger.error({ error, directory: this.directory }, 'Failed to append events');
          // Partially written batches are re-read from disk on next access
          for (const event of events) {
            this.versions.delete(event.aggregateId);
          }
          return err(new PersistenceError(`Failed to append events: ${getErrorMessage(error)}`, { cause: error }));
        }
      }
    );
  }

  async getEvents(
    filter: EventFilter = {},
    options?: EventStoreOperationOptions
  ): Promise<Result<DomainEvent[], ReadError>> {
    if (options?.signal?.aborted) {
      return err(abortReason(options.signal));
    }

    const aggregateIds: Result<string[], PersistenceError> =
      filter.aggregateId !== undefined ? ok([filter.aggregateId]) : await this.listAggregateIds();
    if (aggregateIds.isErr()) {
      return err(aggregateIds.error);
    }

    const collected: DomainEvent[] = [];
    for (const aggregateId of aggregateIds.value) {
      if (options?.signal?.aborted) {
        return err(abortReason(options.signal));
      }
      const stream = await this.readStream(aggregateId);
      if (stream.isErr()) {
        return err(stream.error);
      }
      collected.push(...stream.value);
    }

    return ok(applyFilter(collected, filter));
  }

  async getCurrentVersion(aggregateId: string): Promise<Result<number, ReadError>> {
    return this.loadVersion(aggregateId);
  }

  private streamPath(aggregateId: string): string {
    return path.join(this.directory, `${toSafeFileName(aggregateId)}${STREAM_EXTENSION}`);
  }

  private async loadVersion(aggregateId: string): Promise<Result<number, ReadError>> {
    const cached = this.versions.get(aggregateId);
    if (cached !== undefined) {
      return ok(cached);
    }

    const stream = await this.readStream(aggregateId);
    if (stream.isErr()) {
      return err(stream.error);
    }
    const version = stream.value.reduce((max, event) => Math.max(max, event.version), 0);
    this.versions.set(aggregateId, version);
    return ok(version);
  }

  private async listAggregateIds(): Promise<Result<string[], PersistenceError>> {
    try {
      const entries = await fs.readdir(this.directory);
      return ok(
        entries
          .filter((name) => name.endsWith(STREAM_EXTENSION))
          .map((name) => fromSafeFileName(name.slice(0, -STREAM_EXTENSION.length)))
      );
    } catch (error) {
      if (isMissingFileError(error)) {
        return ok([]);
      }
      return err(new PersistenceError(`Failed to list event streams: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  private async readStream(aggregateId: string): Promise<Result<DomainEvent[], ReadError>> {
    let content: string;
    try {
      content = await fs.readFile(this.streamPath(aggregateId), 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return ok([]);
      }
      return err(new PersistenceError(`Failed to read events for ${aggregateId}: ${getErrorMessage(error)}`, { cause: error }));
    }

    const events: DomainEvent[] = [];
    const lines = content.split('\n').filter((line) => line.trim().length > 0);
    for (const [index, line] of lines.entries()) {
      const parsed = this.parseLine(line);
      if (parsed.isErr()) {
        return err(new ValidationError(`${aggregateId} line ${index + 1}: ${parsed.error.message}`));
      }
      events.push(parsed.value);
    }
    return ok(events);
  }

  private parseLine(line: string): Result<DomainEvent, ValidationError> {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      return err(new ValidationError(`Malformed JSON: ${getErrorMessage(error)}`));
    }

    const stored = StoredLineSchema.safeParse(json);
    if (!stored.success) {
      return err(new ValidationError(stored.error.issues.map((issue) => issue.message).join('; ')));
    }

    const { hash, ...record } = stored.data;
    if (computeEventHash(record) !== hash) {
      this.logger.warn({ eventId: record.eventId, aggregateId: record.aggregateId }, 'Event hash mismatch');
    }
    return this.registry.decode(record);
  }
}
