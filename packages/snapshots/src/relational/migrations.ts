import type { Kysely, Migration } from 'kysely';

export const SNAPSHOT_MIGRATION_TABLE = 'snapshot_migrations';

export const snapshotMigrations: Record<string, Migration> = {
  '001_aggregate_snapshots': {
    async up(db: Kysely<unknown>): Promise<void> {
      await db.schema
        .createTable('aggregate_snapshots')
        .ifNotExists()
        .addColumn('aggregate_id', 'text', (col) => col.primaryKey())
        .addColumn('aggregate_type', 'text', (col) => col.notNull())
        .addColumn('version', 'integer', (col) => col.notNull())
        .addColumn('state', 'text', (col) => col.notNull())
        .addColumn('created_at', 'text', (col) => col.notNull())
        .execute();
    },
    async down(db: Kysely<unknown>): Promise<void> {
      await db.schema.dropTable('aggregate_snapshots').ifExists().execute();
    },
  },
};
