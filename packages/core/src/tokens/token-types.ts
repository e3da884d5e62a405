/**
 * Token Domain Types
 *
 * Parameters, results and the response view used by the tokens domain
 */

import type { VendorToken } from '@tokenguard/database';
import type { TokenStatus, TokenType, TokenView } from '@tokenguard/types';
import type { z } from 'zod';
import { InvalidTokenRequestError } from './token-errors.js';

export interface GenerateTokenParams {
  tokenType: TokenType;
  entityId: number;
  vendorScope?: string | null;
  createdBy?: string | null;
}

export interface GenerateTokensBulkParams {
  tokenType: TokenType;
  entityIds: number[];
  vendorScope?: string | null;
  createdBy?: string | null;
}

export type ValidationFailureReason =
  | 'invalid_format'
  | 'unknown_type'
  | 'not_found'
  | 'inactive'
  | 'expired';

/**
 * Outcome of a non-throwing token check
 */
export type ValidationResult =
  | {
      valid: true;
      tokenType: TokenType;
      entityId: number;
      vendorScope: string | null;
      expiresAt: Date | null;
    }
  | {
      valid: false;
      reason: ValidationFailureReason;
      message: string;
    };

export interface UsageStatistics {
  totalUsage: number;
  activeTokens: number;
  lastUsedAt: Date | null;
}

export interface TokenStatistics {
  byStatus: Record<TokenStatus, number>;
  activeByType: Record<TokenType, number>;
  totalTokens: number;
  totalUsage: number;
  lastUsedAt: Date | null;
  expiringWithin30Days: number;
}

export interface RotationResult {
  previous: VendorToken;
  current: VendorToken;
}

/**
 * Entity type stored alongside each row; mirrors the token type name
 */
export function entityTypeFor(tokenType: TokenType): string {
  return tokenType;
}

/**
 * Map a stored row to the view handed to callers (no salt, no internal ids)
 */
export function mapToTokenView(token: VendorToken): TokenView {
  return {
    tokenValue: token.tokenValue,
    tokenType: token.tokenType,
    entityId: token.entityId,
    entityType: token.entityType,
    vendorScope: token.vendorScope,
    schoolYear: token.schoolYear,
    status: token.status,
    createdAt: token.createdAt.toISOString(),
    expiresAt: token.expiresAt?.toISOString() ?? null,
    lastUsedAt: token.lastUsedAt?.toISOString() ?? null,
    rotationCount: token.rotationCount,
    usageCount: token.usageCount,
  };
}

/**
 * Validate request parameters against a zod schema
 *
 * @throws {InvalidTokenRequestError} Listing every issue
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidTokenRequestError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}
