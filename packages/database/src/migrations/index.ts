/**
 * Migration System Exports
 */

import type Database from 'better-sqlite3';
import { MigrationRunner } from './runner.js';
import type { Migration, MigrationResult } from './types.js';

import { migration as v001VendorTokens } from './versions/v001-vendor-tokens.js';

/**
 * All registered migrations in order
 */
export const migrations: Migration[] = [v001VendorTokens];

/**
 * Run all pending migrations on the database
 */
export function runMigrations(db: Database.Database): MigrationResult {
  return new MigrationRunner(db, migrations).run();
}

export { MigrationRunner };
export type { Migration, MigrationResult };
