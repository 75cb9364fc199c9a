import { DomainEvent, EventTypeRegistry } from '@eventide/core';
import { createSqliteDatabase, runMigrations } from '@eventide/database';
import type { Kysely } from 'kysely';
import { z } from 'zod';

import { createEventStoreMigrations, EVENT_STORE_MIGRATION_TABLE } from '../relational/migrations.js';
import type { EventStoreDatabase } from '../relational/schema.js';

export class AccountOpened extends DomainEvent<{ owner: string }> {}
export class FundsDeposited extends DomainEvent<{ amount: number }> {}

export function opened(aggregateId: string, version = 1, timestamp?: Date): AccountOpened {
  return new AccountOpened({
    aggregateId,
    aggregateType: 'Account',
    version,
    payload: { owner: 'alice' },
    ...(timestamp ? { timestamp } : {}),
  });
}

export function deposited(aggregateId: string, version: number, amount = 10, timestamp?: Date): FundsDeposited {
  return new FundsDeposited({
    aggregateId,
    aggregateType: 'Account',
    version,
    payload: { amount },
    ...(timestamp ? { timestamp } : {}),
  });
}

export function createRegistry(): EventTypeRegistry {
  return new EventTypeRegistry()
    .register(AccountOpened, z.object({ owner: z.string() }))
    .register(FundsDeposited, z.object({ amount: z.number() }));
}

export async function createTestEventStoreDatabase(): Promise<Kysely<EventStoreDatabase>> {
  const db = createSqliteDatabase<EventStoreDatabase>(':memory:')._unsafeUnwrap();
  const migrated = await runMigrations(db, createEventStoreMigrations('sqlite'), {
    migrationTableName: EVENT_STORE_MIGRATION_TABLE,
  });
  migrated._unsafeUnwrap();
  return db;
}
