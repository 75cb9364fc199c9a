import type { SqlDialect } from '@eventide/database';
import type { Kysely, Migration } from 'kysely';

export const EVENT_STORE_MIGRATION_TABLE = 'event_store_migrations';

/**
 * Schema for the relational event store. SQLite and PostgreSQL differ only in
 * how `position` is generated.
 */
export function createEventStoreMigrations(dialect: SqlDialect): Record<string, Migration> {
  return {
    '001_domain_events': {
      async up(db: Kysely<unknown>): Promise<void> {
        const table = db.schema.createTable('domain_events').ifNotExists();
        const withIdentity =
          dialect === 'postgres'
            ? table
                .addColumn('event_id', 'text', (col) => col.primaryKey())
                .addColumn('position', 'serial', (col) => col.notNull().unique())
            : table
                .addColumn('position', 'integer', (col) => col.primaryKey().autoIncrement())
                .addColumn('event_id', 'text', (col) => col.notNull().unique());

        await withIdentity
          .addColumn('aggregate_id', 'text', (col) => col.notNull())
          .addColumn('aggregate_type', 'text', (col) => col.notNull())
          .addColumn('event_type', 'text', (col) => col.notNull())
          .addColumn('version', 'integer', (col) => col.notNull())
          .addColumn('payload', 'text', (col) => col.notNull())
          .addColumn('created_at', 'text', (col) => col.notNull())
          .addColumn('event_hash', 'text', (col) => col.notNull())
          .execute();

        await db.schema
          .createIndex('ux_domain_events_aggregate_version')
          .ifNotExists()
          .on('domain_events')
          .columns(['aggregate_id', 'version'])
          .unique()
          .execute();

        await db.schema
          .createIndex('ix_domain_events_event_type')
          .ifNotExists()
          .on('domain_events')
          .column('event_type')
          .execute();

        await db.schema
          .createIndex('ix_domain_events_aggregate_type')
          .ifNotExists()
          .on('domain_events')
          .column('aggregate_type')
          .execute();
      },
      async down(db: Kysely<unknown>): Promise<void> {
        await db.schema.dropTable('domain_events').ifExists().execute();
      },
    },
    '002_event_listener_checkpoints': {
      async up(db: Kysely<unknown>): Promise<void> {
        await db.schema
          .createTable('event_listener_checkpoints')
          .ifNotExists()
          .addColumn('listener_name', 'text', (col) => col.primaryKey())
          .addColumn('last_position', 'integer', (col) => col.notNull())
          .addColumn('updated_at', 'text', (col) => col.notNull())
          .execute();
      },
      async down(db: Kysely<unknown>): Promise<void> {
        await db.schema.dropTable('event_listener_checkpoints').ifExists().execute();
      },
    },
  };
}
