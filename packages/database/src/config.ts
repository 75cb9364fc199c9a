import * as path from 'node:path';

import type { Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';
import { z } from 'zod';

import { createPostgresDatabase, createSqliteDatabase, type SqlDialect } from './database.js';

export const databaseEnvSchema = z
  .object({
    EVENTIDE_DB_DIALECT: z.enum(['sqlite', 'postgres']).default('sqlite'),
    EVENTIDE_SQLITE_PATH: z.string().trim().min(1).optional(),
    EVENTIDE_DATA_DIR: z.string().trim().min(1).optional(),
    EVENTIDE_DB_URL: z.string().trim().min(1).optional(),
    EVENTIDE_DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    EVENTIDE_DB_SSL: z
      .string()
      .default('false')
      .transform((val: string) => val === 'true'),
  })
  .refine((env) => env.EVENTIDE_DB_DIALECT !== 'postgres' || env.EVENTIDE_DB_URL !== undefined, {
    message: 'EVENTIDE_DB_URL is required when EVENTIDE_DB_DIALECT is postgres',
    path: ['EVENTIDE_DB_URL'],
  });

export type DatabaseConfig =
  | { dialect: 'sqlite'; path: string }
  | { dialect: 'postgres'; connectionString: string; maxConnections: number; ssl: boolean };

/**
 * Read database settings from EVENTIDE_DB_* variables.
 *
 * The SQLite file defaults to `<EVENTIDE_DATA_DIR or cwd/data>/events.db`.
 *
 * @throws Error if validation fails
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const result = databaseEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Database environment validation failed:\n${errors}`);
  }
  const parsed = result.data;

  if (parsed.EVENTIDE_DB_DIALECT === 'postgres' && parsed.EVENTIDE_DB_URL !== undefined) {
    return {
      dialect: 'postgres',
      connectionString: parsed.EVENTIDE_DB_URL,
      maxConnections: parsed.EVENTIDE_DB_POOL_MAX,
      ssl: parsed.EVENTIDE_DB_SSL,
    };
  }

  const dataDir = parsed.EVENTIDE_DATA_DIR ?? path.join(process.cwd(), 'data');
  return { dialect: 'sqlite', path: parsed.EVENTIDE_SQLITE_PATH ?? path.join(dataDir, 'events.db') };
}

export function createDatabase<T>(config: DatabaseConfig): Result<{ db: Kysely<T>; dialect: SqlDialect }, Error> {
  switch (config.dialect) {
    case 'sqlite':
      return createSqliteDatabase<T>(config.path).map((db) => ({ db, dialect: 'sqlite' as const }));
    case 'postgres':
      return createPostgresDatabase<T>({
        connectionString: config.connectionString,
        maxConnections: config.maxConnections,
        ssl: config.ssl,
      }).map((db) => ({ db, dialect: 'postgres' as const }));
    default:
      return err(new Error('Unsupported database dialect'));
  }
}
