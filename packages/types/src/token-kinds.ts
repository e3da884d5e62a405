/**
 * Token type and status definitions
 *
 * Token types map one-to-one onto the three-letter prefix carried by every
 * token value (STU_..., TCH_..., and so on).
 *
 * This file lives in @tokenguard/types (not @tokenguard/core) so the database
 * schema and the wire schemas can share it without circular dependencies.
 */

export const TOKEN_TYPES = ['STUDENT', 'TEACHER', 'COURSE', 'SECTION', 'ASSIGNMENT'] as const;

export type TokenType = (typeof TOKEN_TYPES)[number];

/**
 * Prefix used in the token value for each token type
 */
export const TOKEN_PREFIXES = {
  STUDENT: 'STU',
  TEACHER: 'TCH',
  COURSE: 'CRS',
  SECTION: 'SEC',
  ASSIGNMENT: 'ASN',
} as const satisfies Record<TokenType, string>;

/**
 * ACTIVE is the only non-terminal status. A row never leaves
 * EXPIRED, REVOKED or ROTATED; the entity continues under a new row.
 */
export const TOKEN_STATUSES = ['ACTIVE', 'EXPIRED', 'REVOKED', 'ROTATED'] as const;

export type TokenStatus = (typeof TOKEN_STATUSES)[number];
