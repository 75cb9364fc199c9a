import { isErrorWithMessage, wrapError } from '@eventide/core';
import { getLogger } from '@eventide/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('Migrations');

/**
 * Run all pending migrations from a programmatic migration record keyed by
 * migration name (e.g. '001_event_store'). Names sort lexically.
 *
 * Each package passes its own `migrationTableName`: kysely treats a migration
 * recorded in the table but missing from the record as corruption.
 */
export async function runMigrations(
  // eslint-disable-next-line @typescript-eslint/no-explicit-any -- Kysely is invariant; generic param allows any schema
  db: Kysely<any>,
  migrations: Record<string, Migration>,
  options?: { migrationTableName?: string | undefined }
): Promise<Result<void, Error>> {
  try {
    logger.debug(`Running migrations (${Object.keys(migrations).length} registered)`);

    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
      ...(options?.migrationTableName ? { migrationTableName: options.migrationTableName } : {}),
    });

    const { error, results } = await migrator.migrateToLatest();

    for (const result of results ?? []) {
      if (result.status === 'Success') {
        logger.debug(`Migration "${result.migrationName}" executed successfully`);
      } else if (result.status === 'Error') {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new Error(isErrorWithMessage(error) ? error.message : 'Unknown migration error'));
    }

    return ok();
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
