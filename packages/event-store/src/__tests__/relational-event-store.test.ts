import { CancelledError, ConcurrencyConflictError } from '@eventide/core';
import { closeDatabase } from '@eventide/database';
import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from 'kysely';
import { err, ok } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { ChangeNotifier, EventNotification } from '../notifications/change-notifier.js';
import { InProcessChangeNotifier } from '../notifications/in-process-notifier.js';
import { APPEND_ADVISORY_LOCK_KEY, RelationalEventStore } from '../relational/relational-event-store.js';
import type { EventStoreDatabase } from '../relational/schema.js';

import { AccountOpened, createRegistry, createTestEventStoreDatabase, deposited, FundsDeposited, opened } from './fixtures.js';

describe('RelationalEventStore', () => {
  let db: Kysely<EventStoreDatabase>;
  let store: RelationalEventStore;

  beforeEach(async () => {
    db = await createTestEventStoreDatabase();
    store = new RelationalEventStore({ db, registry: createRegistry() });
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  it('stores events and reads them back as registered classes', async () => {
    await store.appendMany([opened('acc-1'), deposited('acc-1', 2, 40)]);

    const events = (await store.getEvents({ aggregateId: 'acc-1' }))._unsafeUnwrap();

    expect(events).toHaveLength(2);
    expect(events[0]).toBeInstanceOf(AccountOpened);
    expect(events[1]).toBeInstanceOf(FundsDeposited);
    expect(events[1]?.payload).toEqual({ amount: 40 });
    expect((await store.getCurrentVersion('acc-1'))._unsafeUnwrap()).toBe(2);
    expect((await store.getCurrentVersion('acc-9'))._unsafeUnwrap()).toBe(0);
  });

  it('keeps metadata through a round trip', async () => {
    const event = opened('acc-1').withMetadata({ correlationId: 'corr-1', topic: 'accounts.opened' });
    await store.append(event);

    const [stored] = (await store.getEvents())._unsafeUnwrap();

    expect(stored?.eventId).toBe(event.eventId);
    expect(stored?.correlationId).toBe('corr-1');
    expect(stored?.topic).toBe('accounts.opened');
    expect(stored?.timestamp.toISOString()).toBe(event.timestamp.toISOString());
  });

  it('rejects out-of-sequence versions', async () => {
    await store.append(opened('acc-1'));

    const result = await store.append(deposited('acc-1', 3));

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ConcurrencyConflictError);
    expect(error).toMatchObject({ aggregateId: 'acc-1', expectedVersion: 2, actualVersion: 3 });
  });

  it('detects a conflicting writer that uses another store instance', async () => {
    const other = new RelationalEventStore({ db, registry: createRegistry() });
    await store.append(opened('acc-1'));

    const results = await Promise.all([store.append(deposited('acc-1', 2)), other.append(deposited('acc-1', 2))]);

    expect(results.filter((result) => result.isOk())).toHaveLength(1);
    expect(results.find((result) => result.isErr())?._unsafeUnwrapErr()).toBeInstanceOf(ConcurrencyConflictError);
  });

  it('rolls back the whole batch when one event conflicts', async () => {
    const result = await store.appendMany([opened('acc-1'), opened('acc-2'), deposited('acc-1', 3)]);

    expect(result.isErr()).toBe(true);
    const count = await db.selectFrom('domain_events').select((eb) => eb.fn.countAll().as('n')).executeTakeFirstOrThrow();
    expect(Number(count.n)).toBe(0);
  });

  it('applies filters in SQL', async () => {
    await store.appendMany([
      opened('acc-1', 1, new Date('2024-05-01T08:00:00.000Z')),
      deposited('acc-1', 2, 5, new Date('2024-05-02T08:00:00.000Z')),
      opened('acc-2', 1, new Date('2024-05-03T08:00:00.000Z')),
    ]);

    const deposits = (await store.getEvents({ eventType: 'FundsDeposited' }))._unsafeUnwrap();
    const recent = (await store.getEvents({ sinceTimestamp: new Date('2024-05-02T08:00:00.000Z') }))._unsafeUnwrap();
    const firstOnly = (await store.getEvents({ limit: 1 }))._unsafeUnwrap();

    expect(deposits.map((event) => event.version)).toEqual([2]);
    expect(recent.map((event) => event.aggregateId)).toEqual(['acc-2', 'acc-1']);
    expect(firstOnly.map((event) => event.aggregateId)).toEqual(['acc-1']);
  });

  it('returns events after a position in insertion order', async () => {
    await store.appendMany([opened('acc-1'), opened('acc-2'), deposited('acc-1', 2)]);

    const after = (await store.getEventsAfterPosition(1, 10))._unsafeUnwrap();

    expect(after.map(({ position, event }) => `${position}:${event.aggregateId}@${event.version}`)).toEqual([
      '2:acc-2@1',
      '3:acc-1@2',
    ]);
  });

  it('reports rows whose stored content was altered', async () => {
    const first = opened('acc-1');
    await store.appendMany([first, deposited('acc-1', 2)]);
    const row = await db.selectFrom('domain_events').select('payload').where('event_id', '=', first.eventId).executeTakeFirstOrThrow();
    await db
      .updateTable('domain_events')
      .set({ payload: row.payload.replace('alice', 'mallory') })
      .where('event_id', '=', first.eventId)
      .execute();

    const violations = (await store.verifyIntegrity())._unsafeUnwrap();

    expect(violations).toEqual([
      { eventId: first.eventId, aggregateId: 'acc-1', version: 1, reason: 'hash_mismatch' },
    ]);
    expect((await store.verifyIntegrity('acc-2'))._unsafeUnwrap()).toEqual([]);
  });

  it('returns a cancelled error for an aborted read', async () => {
    const result = await store.getEvents({}, { signal: AbortSignal.abort() });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(CancelledError);
  });

  describe('change notifications', () => {
    it('notifies once per committed event after the commit', async () => {
      const notifier = new InProcessChangeNotifier();
      const received: EventNotification[] = [];
      (await notifier.listen((notification) => received.push(notification)))._unsafeUnwrap();
      const notifying = new RelationalEventStore({ db, registry: createRegistry(), notifier });

      await notifying.appendMany([opened('acc-1'), deposited('acc-1', 2)]);

      await vi.waitFor(() => expect(received).toHaveLength(2));
      expect(received.map((notification) => [notification.event_type, notification.version])).toEqual([
        ['AccountOpened', 1],
        ['FundsDeposited', 2],
      ]);
      expect(received[0]?.aggregate_type).toBe('Account');
    });

    it('sends nothing for a rejected batch', async () => {
      const notify = vi.fn<ChangeNotifier['notify']>(() => Promise.resolve(ok()));
      const notifier: ChangeNotifier = { notify, listen: () => Promise.resolve(ok(() => Promise.resolve())) };
      const notifying = new RelationalEventStore({ db, notifier });

      await notifying.append(deposited('acc-1', 2));

      expect(notify).not.toHaveBeenCalled();
    });

    it('still succeeds when a notification cannot be sent', async () => {
      const notifier: ChangeNotifier = {
        notify: () => Promise.resolve(err(new Error('channel down'))),
        listen: () => Promise.resolve(ok(() => Promise.resolve())),
      };
      const notifying = new RelationalEventStore({ db, notifier });

      const result = await notifying.append(opened('acc-1'));

      expect(result.isOk()).toBe(true);
      expect((await notifying.getCurrentVersion('acc-1'))._unsafeUnwrap()).toBe(1);
    });
  });

  describe('on PostgreSQL', () => {
    function recordingPostgres(): { db: Kysely<EventStoreDatabase>; queries: string[]; parameters: unknown[][] } {
      const queries: string[] = [];
      const parameters: unknown[][] = [];
      const pg = new Kysely<EventStoreDatabase>({
        dialect: {
          createAdapter: () => new PostgresAdapter(),
          createDriver: () => new DummyDriver(),
          createIntrospector: (instance) => new PostgresIntrospector(instance),
          createQueryCompiler: () => new PostgresQueryCompiler(),
        },
        log: (event) => {
          if (event.level === 'query') {
            queries.push(event.query.sql);
            parameters.push([...event.query.parameters]);
          }
        },
      });
      return { db: pg, queries, parameters };
    }

    it('serialises appends with an advisory lock before inserting', async () => {
      const { db: pg, queries, parameters } = recordingPostgres();
      const postgresStore = new RelationalEventStore({ db: pg, dialect: 'postgres', registry: createRegistry() });

      const result = await postgresStore.appendMany([opened('acc-1'), deposited('acc-1', 2)]);

      expect(result.isOk()).toBe(true);
      expect(queries).toHaveLength(4);
      expect(queries[0]).toBe('select pg_advisory_xact_lock($1)');
      expect(parameters[0]).toEqual([APPEND_ADVISORY_LOCK_KEY]);
      expect(queries.filter((query) => query.startsWith('insert into "domain_events"'))).toHaveLength(2);
      await pg.destroy();
    });

    it('takes no advisory lock for the default dialect', async () => {
      const { db: pg, queries } = recordingPostgres();
      const defaultStore = new RelationalEventStore({ db: pg, registry: createRegistry() });

      await defaultStore.append(opened('acc-1'));

      expect(queries).toHaveLength(2);
      expect(queries.some((query) => query.includes('pg_advisory_xact_lock'))).toBe(false);
      await pg.destroy();
    });
  });
});
