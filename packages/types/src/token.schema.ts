/**
 * Token request and response schemas
 * Used for input validation in the core services and for the
 * remote-authority wire format
 */

import { z } from 'zod';
import { TOKEN_STATUSES, TOKEN_TYPES } from './token-kinds.js';

export const TokenTypeSchema = z.enum(TOKEN_TYPES);
export const TokenStatusSchema = z.enum(TOKEN_STATUSES);

/**
 * Vendor scope: 1-30 characters once trimmed.
 * Missing or blank input becomes null (the universal scope), so an empty
 * string can never stand in for "no scope".
 */
export const VendorScopeSchema = z
  .string()
  .trim()
  .max(30, 'Vendor scope must be 30 characters or less')
  .nullish()
  .transform((scope) => (scope ? scope : null));

export const EntityIdSchema = z
  .number()
  .int('Entity ID must be an integer')
  .positive('Entity ID must be positive')
  .max(Number.MAX_SAFE_INTEGER);

const ActorSchema = z
  .string()
  .trim()
  .max(100, 'Actor must be 100 characters or less')
  .nullish()
  .transform((actor) => (actor ? actor : null));

/**
 * Request schema for tokenizing a single entity
 * - vendorScope: optional, null creates a universal token
 * - createdBy: optional audit label
 */
export const TokenRequestSchema = z.object({
  tokenType: TokenTypeSchema,
  entityId: EntityIdSchema,
  vendorScope: VendorScopeSchema,
  createdBy: ActorSchema,
});

/**
 * Request schema for tokenizing many entities of one type
 */
export const BulkTokenRequestSchema = z.object({
  tokenType: TokenTypeSchema,
  entityIds: z.array(EntityIdSchema).min(1, 'At least one entity ID is required'),
  vendorScope: VendorScopeSchema,
  createdBy: ActorSchema,
});

export const ResolveTokenRequestSchema = z.object({
  tokenValue: z.string().min(1, 'Token value is required'),
  expectedType: TokenTypeSchema.optional(),
});

export const BulkResolveRequestSchema = z.object({
  tokenValues: z.array(z.string()),
});

export const RotateTokenRequestSchema = z.object({
  rotatedBy: ActorSchema,
});

export const RevokeTokenRequestSchema = z.object({
  revokedBy: ActorSchema,
});

/**
 * Token view shared by every authority
 * Timestamps are ISO 8601 strings
 */
export const TokenViewSchema = z.object({
  tokenValue: z.string(),
  tokenType: TokenTypeSchema,
  entityId: EntityIdSchema,
  entityType: z.string(),
  vendorScope: z.string().nullable(),
  schoolYear: z.string().regex(/^\d{4}-\d{4}$/, 'School year must look like YYYY-YYYY'),
  status: TokenStatusSchema,
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime().nullable(),
  lastUsedAt: z.string().datetime().nullable(),
  rotationCount: z.number().int().nonnegative(),
  usageCount: z.number().int().nonnegative(),
});

/**
 * Token view tagged with the authority that produced it
 */
export const TokenResponseSchema = TokenViewSchema.extend({
  source: z.enum(['local', 'remote']),
});

export type TokenRequest = z.infer<typeof TokenRequestSchema>;
export type BulkTokenRequest = z.infer<typeof BulkTokenRequestSchema>;
export type ResolveTokenRequest = z.infer<typeof ResolveTokenRequestSchema>;
export type BulkResolveRequest = z.infer<typeof BulkResolveRequestSchema>;
export type RotateTokenRequest = z.infer<typeof RotateTokenRequestSchema>;
export type RevokeTokenRequest = z.infer<typeof RevokeTokenRequestSchema>;
export type TokenView = z.infer<typeof TokenViewSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
