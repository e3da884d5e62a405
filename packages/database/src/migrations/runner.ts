/**
 * Migration Runner
 *
 * Tracks applied migrations in the schema_version table and runs pending
 * ones in version order, each inside its own transaction.
 */

import type Database from 'better-sqlite3';
import type { Migration, MigrationResult } from './types.js';

export class MigrationRunner {
  private readonly migrations: Migration[];

  constructor(
    private readonly db: Database.Database,
    migrations: Migration[]
  ) {
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
  }

  /**
   * Run all pending migrations
   */
  run(): MigrationResult {
    this.ensureVersionTable();

    const fromVersion = this.getCurrentVersion();
    const applied: number[] = [];

    for (const migration of this.migrations) {
      if (migration.version <= fromVersion) {
        continue;
      }

      this.db.transaction(() => {
        migration.up(this.db);
        this.recordMigration(migration);
      })();
      applied.push(migration.version);
    }

    return {
      fromVersion,
      toVersion: this.getCurrentVersion(),
      applied,
      migrated: applied.length > 0,
    };
  }

  /**
   * Highest applied version, 0 for a fresh database
   */
  getCurrentVersion(): number {
    this.ensureVersionTable();
    const row: unknown = this.db.prepare('SELECT MAX(version) AS version FROM schema_version').get();
    if (row && typeof row === 'object' && 'version' in row && typeof row.version === 'number') {
      return row.version;
    }
    return 0;
  }

  /**
   * Migrations that haven't been applied yet
   */
  getPendingMigrations(): Migration[] {
    const currentVersion = this.getCurrentVersion();
    return this.migrations.filter((m) => m.version > currentVersion);
  }

  private ensureVersionTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL,
        description TEXT
      )
    `);
  }

  private recordMigration(migration: Migration): void {
    this.db
      .prepare(
        `INSERT INTO schema_version (version, applied_at, description)
         VALUES (?, datetime('now'), ?)`
      )
      .run(migration.version, migration.description);
  }
}
