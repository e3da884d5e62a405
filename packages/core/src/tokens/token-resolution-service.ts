/**
 * Token Resolution Service
 *
 * Maps token values received from vendors back to SIS entity IDs.
 * Checks run cheapest first: codec (no store access), lookup, status,
 * expiry, then the caller's expected type.
 */

import type { VendorToken } from '@tokenguard/database';
import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import { VendorScopeSchema, type TokenType } from '@tokenguard/types';
import type { TokenCodec } from './token-codec.js';
import {
  InvalidTokenFormatError,
  TokenError,
  TokenExpiredError,
  TokenInactiveError,
  TokenNotFoundError,
  TokenTypeMismatchError,
  UnknownTokenTypeError,
} from './token-errors.js';
import type { ResolutionFailureReason, TokenEventPublisher } from './token-events.js';
import type { TokenStore } from './token-repository.js';
import { entityTypeFor, parseRequest, type ValidationResult } from './token-types.js';

function failureReason(error: unknown): ResolutionFailureReason | null {
  if (error instanceof InvalidTokenFormatError) return 'invalid_format';
  if (error instanceof UnknownTokenTypeError) return 'unknown_type';
  if (error instanceof TokenNotFoundError) return 'not_found';
  if (error instanceof TokenInactiveError) return 'inactive';
  if (error instanceof TokenExpiredError) return 'expired';
  if (error instanceof TokenTypeMismatchError) return 'type_mismatch';
  return null;
}

export class TokenResolutionService {
  private readonly logger: Logger;

  constructor(
    private tokenRepo: TokenStore,
    private codec: TokenCodec,
    private tokenEvents: TokenEventPublisher,
    logger: Logger = defaultLogger
  ) {
    this.logger = logger.child({ module: 'token-resolution' });
  }

  /**
   * Entity ID behind a token value
   *
   * Records the usage on success.
   *
   * @throws {InvalidTokenFormatError} If the value is malformed or its checksum is wrong
   * @throws {UnknownTokenTypeError} If the prefix is not a known token type
   * @throws {TokenNotFoundError} If no token has this value
   * @throws {TokenInactiveError} If the token was rotated, revoked or swept
   * @throws {TokenExpiredError} If the token is ACTIVE but past its expiry
   * @throws {TokenTypeMismatchError} If the token is not of the expected type
   */
  async resolveToEntityId(tokenValue: string, expectedType?: TokenType): Promise<number> {
    const token = await this.resolveToken(tokenValue, expectedType);
    return token.entityId;
  }

  /**
   * Same checks as resolveToEntityId; returns the whole row
   */
  async resolveToken(tokenValue: string, expectedType?: TokenType): Promise<VendorToken> {
    const now = new Date();

    let used: VendorToken;
    try {
      const token = await this.checkToken(tokenValue, now, expectedType);
      used = await this.recordUsage(token, now, expectedType);
    } catch (error) {
      const reason = failureReason(error);
      if (reason) {
        this.tokenEvents.emit({
          type: 'token.resolution_failed',
          metadata: { tokenValue, reason },
        });
      }
      throw error;
    }

    this.tokenEvents.emit({
      type: 'token.resolved',
      metadata: {
        tokenId: used.id,
        tokenValue: used.tokenValue,
        tokenType: used.tokenType,
        entityId: used.entityId,
      },
    });
    return used;
  }

  /**
   * Check a token without recording usage or throwing
   */
  async validateToken(tokenValue: string): Promise<ValidationResult> {
    try {
      const token = await this.checkToken(tokenValue, new Date());
      return {
        valid: true,
        tokenType: token.tokenType,
        entityId: token.entityId,
        vendorScope: token.vendorScope,
        expiresAt: token.expiresAt,
      };
    } catch (error) {
      const reason = failureReason(error);
      if (!reason || reason === 'type_mismatch' || !(error instanceof TokenError)) {
        throw error;
      }
      return { valid: false, reason, message: error.message };
    }
  }

  /**
   * ACTIVE token for the entity and exact scope; no side effects
   */
  async findTokenForEntity(
    tokenType: TokenType,
    entityId: number,
    vendorScope: string | null = null
  ): Promise<VendorToken | null> {
    const scope = parseRequest(VendorScopeSchema, vendorScope);
    return this.tokenRepo.findActiveForEntity(entityTypeFor(tokenType), entityId, scope);
  }

  async hasToken(
    tokenType: TokenType,
    entityId: number,
    vendorScope: string | null = null
  ): Promise<boolean> {
    return (await this.findTokenForEntity(tokenType, entityId, vendorScope)) !== null;
  }

  /**
   * Resolve many values; those that fail are left out of the result
   *
   * Every element counts as a use, repeats included.
   */
  async resolveTokensBulk(tokenValues: string[]): Promise<Map<string, number>> {
    const resolved = new Map<string, number>();

    for (const tokenValue of tokenValues) {
      try {
        resolved.set(tokenValue, await this.resolveToEntityId(tokenValue));
      } catch (error) {
        if (!(error instanceof TokenError)) {
          throw error;
        }
        this.logger.debug({ tokenValue, err: error }, 'Skipping unresolvable token');
      }
    }

    return resolved;
  }

  /**
   * The store only counts a use while the row is still ACTIVE and
   * unexpired; when it refuses, the row changed after the check and is
   * checked again so the caller sees why.
   */
  private async recordUsage(
    token: VendorToken,
    now: Date,
    expectedType?: TokenType
  ): Promise<VendorToken> {
    const used = await this.tokenRepo.recordUsage(token.id, now);
    if (used) {
      return used;
    }
    await this.checkToken(token.tokenValue, now, expectedType);
    throw new TokenNotFoundError(token.tokenValue);
  }

  private async checkToken(
    tokenValue: string,
    now: Date,
    expectedType?: TokenType
  ): Promise<VendorToken> {
    this.codec.validate(tokenValue);

    const token = await this.tokenRepo.findByValue(tokenValue);
    if (!token) {
      throw new TokenNotFoundError(tokenValue);
    }

    if (token.status !== 'ACTIVE') {
      throw new TokenInactiveError(tokenValue, token.status);
    }

    if (token.expiresAt && token.expiresAt.getTime() <= now.getTime()) {
      throw new TokenExpiredError(tokenValue, token.expiresAt);
    }

    if (expectedType && token.tokenType !== expectedType) {
      throw new TokenTypeMismatchError(expectedType, token.tokenType);
    }

    return token;
  }
}
