/**
 * Initial Schema Migration
 *
 * Creates the vendor_tokens table and its indexes.
 */

import type { Migration } from '../types.js';

export const migration: Migration = {
  version: 1,
  description: 'Create vendor_tokens table',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS vendor_tokens (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        token_value     TEXT NOT NULL UNIQUE,
        token_type      TEXT NOT NULL,
        entity_id       INTEGER NOT NULL,
        entity_type     TEXT NOT NULL,
        vendor_scope    TEXT,
        school_year     TEXT NOT NULL,
        salt            TEXT NOT NULL,
        checksum        TEXT NOT NULL,
        status          TEXT NOT NULL DEFAULT 'ACTIVE',
        created_at      INTEGER NOT NULL,
        updated_at      INTEGER NOT NULL,
        expires_at      INTEGER,
        last_used_at    INTEGER,
        rotation_count  INTEGER NOT NULL DEFAULT 0,
        usage_count     INTEGER NOT NULL DEFAULT 0,
        replaced_by_id  INTEGER,
        created_by      TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_vendor_tokens_entity ON vendor_tokens(entity_type, entity_id);
      CREATE INDEX IF NOT EXISTS idx_vendor_tokens_status ON vendor_tokens(status);
      CREATE INDEX IF NOT EXISTS idx_vendor_tokens_vendor ON vendor_tokens(vendor_scope, status);
      CREATE INDEX IF NOT EXISTS idx_vendor_tokens_school_year ON vendor_tokens(school_year);
      CREATE INDEX IF NOT EXISTS idx_vendor_tokens_expires ON vendor_tokens(expires_at);
      CREATE INDEX IF NOT EXISTS idx_vendor_tokens_type_status ON vendor_tokens(token_type, status);

      -- At most one ACTIVE token per entity and scope; NULL scope is its own slot
      CREATE UNIQUE INDEX IF NOT EXISTS idx_vendor_tokens_one_active
        ON vendor_tokens(entity_type, entity_id, ifnull(vendor_scope, ''))
        WHERE status = 'ACTIVE';
    `);
  },
};
