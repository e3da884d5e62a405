/**
 * @tokenguard/database
 *
 * Token storage schema, SQLite connection factory and migrations.
 */

export * from './schema.js';
export { createDatabase } from './client.js';
export type {
  TokenDatabase,
  TokenDatabaseExecutor,
  DatabaseHandle,
  DatabaseOptions,
} from './client.js';
export { runMigrations, migrations, MigrationRunner } from './migrations/index.js';
export type { Migration, MigrationResult } from './migrations/index.js';
