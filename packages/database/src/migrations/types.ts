/**
 * Types for the database migration system.
 */

import type Database from 'better-sqlite3';

/**
 * A database migration
 */
export interface Migration {
  /** Unique version number (must be sequential) */
  version: number;
  /** Human-readable description */
  description: string;
  up: (db: Database.Database) => void;
}

/**
 * Result of running migrations
 */
export interface MigrationResult {
  /** Schema version before migrations ran */
  fromVersion: number;
  /** Schema version after migrations ran */
  toVersion: number;
  /** Versions applied in this run */
  applied: number[];
  migrated: boolean;
}
