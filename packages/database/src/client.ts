import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import * as schema from './schema.js';
import { runMigrations } from './migrations/index.js';

export type TokenDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Anything queries can run against: the database itself or an open transaction
 */
export type TokenDatabaseExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface DatabaseOptions {
  /** File path, or ":memory:" for an in-process database */
  url?: string;
  /** Apply pending migrations on open (default: true) */
  migrate?: boolean;
}

export interface DatabaseHandle {
  db: TokenDatabase;
  sqlite: Database.Database;
  close: () => void;
}

/**
 * Open the token database and bring its schema up to date
 */
export function createDatabase(options: DatabaseOptions = {}): DatabaseHandle {
  const url = options.url ?? process.env.DATABASE_URL ?? 'tokens.db';
  const sqlite = new Database(url);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  // Wait on a locked database instead of failing straight away
  sqlite.pragma('busy_timeout = 5000');

  if (options.migrate ?? true) {
    runMigrations(sqlite);
  }

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
