export {
  createPostgresDatabase,
  createPostgresPool,
  createSqliteDatabase,
  type CreateDatabaseOptions,
  type PostgresConnectionOptions,
  type SqlDialect,
} from './database.js';
export { createDatabase, databaseEnvSchema, loadDatabaseConfig, type DatabaseConfig } from './config.js';
export { runMigrations } from './migrations.js';
export { closeDatabase } from './close.js';
export { isUniqueViolation } from './errors.js';
