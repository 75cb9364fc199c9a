import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@eventide/core';
import { getLogger } from '@eventide/logger';
import Database from 'better-sqlite3';
import { Kysely, PostgresDialect, SqliteDialect, type KyselyPlugin } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';
import pg from 'pg';

const logger = getLogger('Database');

export type SqlDialect = 'sqlite' | 'postgres';

export interface CreateDatabaseOptions {
  plugins?: KyselyPlugin[] | undefined;
}

function applyPlugins<T>(db: Kysely<T>, plugins: KyselyPlugin[] | undefined): Kysely<T> {
  let kysely = db;
  for (const plugin of plugins ?? []) {
    kysely = kysely.withPlugin(plugin);
  }
  return kysely;
}

/**
 * Create and configure a SQLite-backed Kysely database instance.
 * `:memory:` gives a private in-process database (used throughout the tests).
 */
export function createSqliteDatabase<T>(dbPath: string, options?: CreateDatabaseOptions): Result<Kysely<T>, Error> {
  try {
    const dataDir = path.dirname(dbPath);
    if (dbPath !== ':memory:' && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma('foreign_keys = ON');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');
    sqliteDb.pragma('busy_timeout = 5000');

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(applyPlugins(new Kysely<T>({ dialect: new SqliteDialect({ database: sqliteDb }) }), options?.plugins));
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}

export interface PostgresConnectionOptions extends CreateDatabaseOptions {
  /** Reuse an existing pool (shared with a PgChangeNotifier, for example). */
  pool?: pg.Pool | undefined;
  connectionString?: string | undefined;
  maxConnections?: number | undefined;
  ssl?: boolean | undefined;
}

/**
 * Create a pg connection pool. Connections are checked out per query or
 * transaction and returned immediately after.
 */
export function createPostgresPool(options: PostgresConnectionOptions): pg.Pool {
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? 10,
    ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
  });
  pool.on('error', (error) => logger.error({ error }, 'Idle PostgreSQL client error'));
  return pool;
}

export function createPostgresDatabase<T>(options: PostgresConnectionOptions): Result<Kysely<T>, Error> {
  try {
    const pool = options.pool ?? createPostgresPool(options);
    logger.debug('Created PostgreSQL database pool');
    return ok(applyPlugins(new Kysely<T>({ dialect: new PostgresDialect({ pool }) }), options.plugins));
  } catch (error) {
    logger.error({ error }, 'Error creating PostgreSQL database');
    return wrapError(error, 'Failed to create PostgreSQL database');
  }
}
