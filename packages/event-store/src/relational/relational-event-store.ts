import {
  abortReason,
  computeEventHash,
  ConcurrencyConflictError,
  EventRecordSchema,
  EventTypeRegistry,
  getErrorMessage,
  KeyedLock,
  PersistenceError,
  raceAgainstSignal,
  ValidationError,
  type DomainEvent,
  type EventRecord,
} from '@eventide/core';
import { isUniqueViolation, type SqlDialect } from '@eventide/database';
import { getLogger, type Logger } from '@eventide/logger';
import { sql, type Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { toNotification, type ChangeNotifier } from '../notifications/change-notifier.js';
import type { AppendError, EventFilter, EventStore, EventStoreOperationOptions, ReadError } from '../port.js';
import { checkNextVersion } from '../version-guard.js';

import type { PositionedEvent, PositionedEventSource } from './relational-event-listener.js';
import type { DomainEventRow, EventStoreDatabase, NewDomainEventRow } from './schema.js';

export interface RelationalEventStoreOptions {
  db: Kysely<EventStoreDatabase>;
  /** Default: 'sqlite'. */
  dialect?: SqlDialect | undefined;
  registry?: EventTypeRegistry | undefined;
  /** Receives one advisory envelope per committed event. */
  notifier?: ChangeNotifier | undefined;
  logger?: Logger | undefined;
}

export interface IntegrityViolation {
  eventId: string;
  aggregateId: string;
  version: number;
  reason: 'hash_mismatch' | 'undecodable';
}

/**
 * Transaction-scoped advisory lock taken before every PostgreSQL append, so
 * `position` values commit in the order they were drawn and a listener
 * paging by position never passes a row that is still uncommitted.
 */
export const APPEND_ADVISORY_LOCK_KEY = 7_461_021;

/** Thrown inside a transaction to roll it back with a typed failure. */
class RollbackWith extends Error {
  constructor(readonly failure: ConcurrencyConflictError) {
    super(failure.message);
  }
}

/**
 * Event store over the `domain_events` table (SQLite or PostgreSQL via kysely).
 *
 * A batch is version-checked and inserted in one transaction; the unique
 * (aggregate_id, version) index catches writers in other processes that raced
 * past the check. Notifications go out only after commit.
 */
export class RelationalEventStore implements EventStore, PositionedEventSource {
  private readonly db: Kysely<EventStoreDatabase>;
  private readonly dialect: SqlDialect;
  private readonly registry: EventTypeRegistry;
  private readonly notifier: ChangeNotifier | undefined;
  private readonly logger: Logger;
  private readonly lock = new KeyedLock();

  constructor(options: RelationalEventStoreOptions) {
    this.db = options.db;
    this.dialect = options.dialect ?? 'sqlite';
    this.registry = options.registry ?? new EventTypeRegistry();
    this.notifier = options.notifier;
    this.logger = options.logger ?? getLogger('RelationalEventStore');
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

    const result = await this.lock.runExclusiveMany(
      events.map((event) => event.aggregateId),
      () => this.insertBatch(events)
    );
    if (result.isErr()) {
      return err(result.error);
    }

    await this.notifyCommitted(events);
    return ok();
  }

  async getEvents(
    filter: EventFilter = {},
    options?: EventStoreOperationOptions
  ): Promise<Result<DomainEvent[], ReadError>> {
    if (options?.signal?.aborted) {
      return err(abortReason(options.signal));
    }

    let query = this.db.selectFrom('domain_events').selectAll();
    if (filter.aggregateId !== undefined) query = query.where('aggregate_id', '=', filter.aggregateId);
    if (filter.aggregateType !== undefined) query = query.where('aggregate_type', '=', filter.aggregateType);
    if (filter.eventType !== undefined) query = query.where('event_type', '=', filter.eventType);
    if (filter.sinceVersion !== undefined) query = query.where('version', '>=', filter.sinceVersion);
    if (filter.sinceTimestamp !== undefined) {
      query = query.where('created_at', '>=', filter.sinceTimestamp.toISOString());
    }
    query = query.orderBy('version', 'asc').orderBy('created_at', 'asc').orderBy('position', 'asc');
    if (filter.limit !== undefined) query = query.limit(Math.max(0, filter.limit));

    let rows: DomainEventRow[];
    try {
      const execution = query.execute();
      rows = options?.signal ? await raceAgainstSignal(execution, options.signal) : await execution;
    } catch (error) {
      if (options?.signal?.aborted) {
        return err(abortReason(options.signal));
      }
      this.logger.error({ error, filter }, 'Failed to read events');
      return err(new PersistenceError(`Failed to read events: ${getErrorMessage(error)}`, { cause: error }));
    }

    return this.decodeRows(rows);
  }

  async getCurrentVersion(
    aggregateId: string,
    options?: EventStoreOperationOptions
  ): Promise<Result<number, ReadError>> {
    if (options?.signal?.aborted) {
      return err(abortReason(options.signal));
    }
    try {
      return ok(await this.readCurrentVersion(this.db, aggregateId));
    } catch (error) {
      return err(new PersistenceError(`Failed to read version: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  /**
   * Rows stored after `afterPosition`, in insertion order, with their positions.
   */
  async getEventsAfterPosition(
    afterPosition: number,
    limit: number
  ): Promise<Result<PositionedEvent[], ReadError>> {
    let rows: DomainEventRow[];
    try {
      rows = await this.db
        .selectFrom('domain_events')
        .selectAll()
        .where('position', '>', afterPosition)
        .orderBy('position', 'asc')
        .limit(limit)
        .execute();
    } catch (error) {
      return err(new PersistenceError(`Failed to read events: ${getErrorMessage(error)}`, { cause: error }));
    }

    const positioned: PositionedEvent[] = [];
    for (const row of rows) {
      const decoded = this.decodeRow(row);
      if (decoded.isErr()) {
        return err(decoded.error);
      }
      positioned.push({ position: Number(row.position), event: decoded.value });
    }
    return ok(positioned);
  }

  /**
   * Recompute the hash of every stored event (optionally one aggregate) and
   * report rows whose content no longer matches.
   */
  async verifyIntegrity(aggregateId?: string): Promise<Result<IntegrityViolation[], PersistenceError>> {
    let rows: DomainEventRow[];
    try {
      let query = this.db.selectFrom('domain_events').selectAll().orderBy('position', 'asc');
      if (aggregateId !== undefined) query = query.where('aggregate_id', '=', aggregateId);
      rows = await query.execute();
    } catch (error) {
      return err(new PersistenceError(`Failed to read events: ${getErrorMessage(error)}`, { cause: error }));
    }

    const violations: IntegrityViolation[] = [];
    for (const row of rows) {
      const base = { eventId: row.event_id, aggregateId: row.aggregate_id, version: row.version };
      const record = parseRecord(row.payload);
      if (!record) {
        violations.push({ ...base, reason: 'undecodable' });
      } else if (computeEventHash(record) !== row.event_hash) {
        violations.push({ ...base, reason: 'hash_mismatch' });
      }
    }
    return ok(violations);
  }

  private async insertBatch(events: readonly DomainEvent[]): Promise<Result<void, AppendError>> {
    const progress: { current?: DomainEvent; expectedVersion: number } = { expectedVersion: 0 };

    try {
      await this.db.transaction().execute(async (trx) => {
        if (this.dialect === 'postgres') {
          await sql`select pg_advisory_xact_lock(${APPEND_ADVISORY_LOCK_KEY})`.execute(trx);
        }
        const versions = new Map<string, number>();
        for (const event of events) {
          progress.current = event;
          const currentVersion = versions.get(event.aggregateId) ?? (await this.readCurrentVersion(trx, event.aggregateId));
          progress.expectedVersion = currentVersion + 1;

          const check = checkNextVersion(event, currentVersion);
          if (check.isErr()) {
            throw new RollbackWith(check.error);
          }

          await trx.insertInto('domain_events').values(toRow(event)).execute();
          versions.set(event.aggregateId, event.version);
        }
      });
      return ok();
    } catch (error) {
      if (error instanceof RollbackWith) {
        this.logger.warn(
          {
            aggregateId: error.failure.aggregateId,
            expectedVersion: error.failure.expectedVersion,
            actualVersion: error.failure.actualVersion,
          },
          'Rejected out-of-sequence event'
        );
        return err(error.failure);
      }
      const current = progress.current;
      if (current && isUniqueViolation(error)) {
        this.logger.warn({ aggregateId: current.aggregateId, version: current.version }, 'Concurrent append detected');
        return err(new ConcurrencyConflictError(current.aggregateId, progress.expectedVersion, current.version));
      }
      this.logger.error({ error }, 'Failed to append events');
      return err(new PersistenceError(`Failed to append events: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  private async readCurrentVersion(db: Kysely<EventStoreDatabase>, aggregateId: string): Promise<number> {
    const row = await db
      .selectFrom('domain_events')
      .select((eb) => eb.fn.max('version').as('max_version'))
      .where('aggregate_id', '=', aggregateId)
      .executeTakeFirst();
    return Number(row?.max_version ?? 0);
  }

  private async notifyCommitted(events: readonly DomainEvent[]): Promise<void> {
    if (!this.notifier) return;
    for (const event of events) {
      const sent = await this.notifier.notify(toNotification(event));
      if (sent.isErr()) {
        // Listeners also poll, so a lost notification only delays delivery
        this.logger.warn({ error: sent.error, eventId: event.eventId }, 'Change notification not sent');
      }
    }
  }

  private decodeRows(rows: DomainEventRow[]): Result<DomainEvent[], ReadError> {
    const events: DomainEvent[] = [];
    for (const row of rows) {
      const decoded = this.decodeRow(row);
      if (decoded.isErr()) {
        return err(decoded.error);
      }
      events.push(decoded.value);
    }
    return ok(events);
  }

  private decodeRow(row: DomainEventRow): Result<DomainEvent, ValidationError> {
    let record: unknown;
    try {
      record = JSON.parse(row.payload);
    } catch (error) {
      return err(new ValidationError(`Stored event ${row.event_id} is not valid JSON: ${getErrorMessage(error)}`));
    }
    return this.registry.decode(record);
  }
}

function parseRecord(payload: string): EventRecord | undefined {
  try {
    const parsed = EventRecordSchema.safeParse(JSON.parse(payload));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function toRow(event: DomainEvent): NewDomainEventRow {
  const record = event.toRecord();
  return {
    event_id: event.eventId,
    aggregate_id: event.aggregateId,
    aggregate_type: event.aggregateType,
    event_type: event.eventType,
    version: event.version,
    payload: JSON.stringify(record),
    created_at: record.timestamp,
    event_hash: computeEventHash(record),
  };
}
