import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { TOKEN_STATUSES, TOKEN_TYPES } from '@tokenguard/types';

/**
 * Vendor tokens - opaque stand-ins for SIS identifiers
 *
 * Each row maps one token value to the real entity it represents.
 * Used for:
 * - Tokenizing identifiers before they are sent to an LMS vendor (egress)
 * - Resolving tokens back to entity IDs when vendor data comes in (ingress)
 *
 * The partial unique index that keeps a single ACTIVE row per
 * (entity_type, entity_id, vendor_scope) is declared in migration v001;
 * it indexes an expression, which the table builder does not model.
 */
export const vendorTokens = sqliteTable('vendor_tokens', {
  id: integer('id').primaryKey({ autoIncrement: true }),

  // Token value sent to vendors (STU_H7K2P9M3_X8)
  tokenValue: text('token_value').notNull().unique(),

  tokenType: text('token_type', { enum: TOKEN_TYPES }).notNull(),

  // Real entity reference in the SIS
  entityId: integer('entity_id').notNull(),

  // Denormalized from token type for queries
  entityType: text('entity_type').notNull(),

  // Null = universal token, usable with every vendor
  vendorScope: text('vendor_scope'),

  // e.g. "2025-2026"
  schoolYear: text('school_year').notNull(),

  // Random hex, kept for audit only
  salt: text('salt').notNull(),

  checksum: text('checksum').notNull(),

  status: text('status', { enum: TOKEN_STATUSES }).notNull().default('ACTIVE'),

  // Timestamps
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  expiresAt: integer('expires_at', { mode: 'timestamp_ms' }),
  lastUsedAt: integer('last_used_at', { mode: 'timestamp_ms' }),

  // Rotation and usage tracking
  rotationCount: integer('rotation_count').notNull().default(0),
  usageCount: integer('usage_count').notNull().default(0),
  replacedById: integer('replaced_by_id'),

  createdBy: text('created_by'),
}, (table) => ({
  entityIdx: index('idx_vendor_tokens_entity').on(table.entityType, table.entityId),
  statusIdx: index('idx_vendor_tokens_status').on(table.status),
  vendorIdx: index('idx_vendor_tokens_vendor').on(table.vendorScope, table.status),
  schoolYearIdx: index('idx_vendor_tokens_school_year').on(table.schoolYear),
  expiresIdx: index('idx_vendor_tokens_expires').on(table.expiresAt),
  typeStatusIdx: index('idx_vendor_tokens_type_status').on(table.tokenType, table.status),
}));

// Types for TypeScript
export type VendorToken = typeof vendorTokens.$inferSelect;
export type NewVendorToken = typeof vendorTokens.$inferInsert;
