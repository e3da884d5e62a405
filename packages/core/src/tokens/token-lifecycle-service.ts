/**
 * Token Lifecycle Service
 *
 * Business logic for issuing, rotating, revoking and sweeping tokens.
 * Owns the state machine: ACTIVE -> ROTATED | REVOKED | EXPIRED, all
 * three terminal. Rotation issues a new row rather than reviving an old one.
 */

import type { VendorToken } from '@tokenguard/database';
import { logger as defaultLogger, type Logger } from '@tokenguard/observability';
import {
  BulkTokenRequestSchema,
  TokenRequestSchema,
  type TokenStatus,
  type TokenType,
} from '@tokenguard/types';
import { DEFAULT_TOKEN_SETTINGS, type TokenSettings } from '../config.js';
import { generateSalt, type TokenCodec } from './token-codec.js';
import {
  DuplicateTokenError,
  InvalidTokenStateError,
  TokenGenerationExhaustedError,
  TokenNotFoundError,
} from './token-errors.js';
import type { TokenEventPublisher } from './token-events.js';
import type { CreateTokenData, TokenStore } from './token-repository.js';
import {
  entityTypeFor,
  parseRequest,
  type GenerateTokenParams,
  type GenerateTokensBulkParams,
  type TokenStatistics,
} from './token-types.js';

export const MAX_GENERATION_ATTEMPTS = 100;

const DAY_MS = 24 * 60 * 60 * 1000;

export type LifecycleSettings = Pick<TokenSettings, 'expirationDays' | 'rotationMonth'>;

/**
 * School year a date falls in, e.g. "2025-2026"
 *
 * Dates before the rotation month (1-12, UTC) belong to the year that
 * started the previous calendar year.
 */
export function computeSchoolYear(date: Date, rotationMonth: number): string {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;
  return month < rotationMonth ? `${year - 1}-${year}` : `${year}-${year + 1}`;
}

export class TokenLifecycleService {
  private readonly logger: Logger;

  constructor(
    private tokenRepo: TokenStore,
    private codec: TokenCodec,
    private tokenEvents: TokenEventPublisher,
    private settings: LifecycleSettings = DEFAULT_TOKEN_SETTINGS,
    logger: Logger = defaultLogger
  ) {
    this.logger = logger.child({ module: 'token-lifecycle' });
  }

  /**
   * Issue a token for an entity, or return its ACTIVE one
   *
   * A vendor scope of null (or blank) asks for the universal token.
   *
   * @throws {InvalidTokenRequestError} If the parameters are out of range
   * @throws {TokenGenerationExhaustedError} If every attempt collided
   */
  async generateToken(params: GenerateTokenParams): Promise<VendorToken> {
    const request = parseRequest(TokenRequestSchema, params);
    const entityType = entityTypeFor(request.tokenType);

    const existing = await this.tokenRepo.findActiveForEntity(
      entityType,
      request.entityId,
      request.vendorScope
    );
    if (existing) {
      return existing;
    }

    let lastCollision: DuplicateTokenError | undefined;
    for (let attempt = 1; attempt <= MAX_GENERATION_ATTEMPTS; attempt++) {
      const data = this.buildTokenData({
        tokenType: request.tokenType,
        entityType,
        entityId: request.entityId,
        vendorScope: request.vendorScope,
        createdBy: request.createdBy,
        rotationCount: 0,
        now: new Date(),
      });

      try {
        const { token, created } = await this.tokenRepo.createActive(data);
        if (created) {
          this.logger.info(
            { tokenValue: token.tokenValue, tokenType: token.tokenType, vendorScope: token.vendorScope },
            'Generated token'
          );
          this.tokenEvents.emit({
            type: 'token.generated',
            metadata: {
              tokenId: token.id,
              tokenValue: token.tokenValue,
              tokenType: token.tokenType,
              entityId: token.entityId,
              vendorScope: token.vendorScope,
              createdBy: token.createdBy,
            },
          });
        }
        return token;
      } catch (error) {
        if (!(error instanceof DuplicateTokenError)) {
          throw error;
        }
        lastCollision = error;
        this.logger.debug({ attempt }, 'Token value collision, retrying');
      }
    }

    throw this.exhausted(request.tokenType, request.entityId, lastCollision);
  }

  /**
   * Existing ACTIVE token for the entity and scope, otherwise a new one
   */
  async getOrCreateToken(params: GenerateTokenParams): Promise<VendorToken> {
    return this.generateToken(params);
  }

  /**
   * Tokenize many entities of one type, one at a time
   *
   * Not atomic: each token commits on its own, and the first failure stops
   * the run with the earlier tokens left in place.
   */
  async generateTokensBulk(params: GenerateTokensBulkParams): Promise<VendorToken[]> {
    const request = parseRequest(BulkTokenRequestSchema, params);

    const tokens: VendorToken[] = [];
    for (const entityId of request.entityIds) {
      tokens.push(
        await this.getOrCreateToken({
          tokenType: request.tokenType,
          entityId,
          vendorScope: request.vendorScope,
          createdBy: request.createdBy,
        })
      );
    }

    this.logger.info(
      { tokenType: request.tokenType, count: tokens.length, vendorScope: request.vendorScope },
      'Bulk token generation complete'
    );
    return tokens;
  }

  /**
   * Replace an ACTIVE token with a fresh one for the same entity and scope
   *
   * @returns The new ACTIVE token
   * @throws {InvalidTokenStateError} If the token is not ACTIVE
   * @throws {TokenGenerationExhaustedError} If every attempt collided
   */
  async rotateToken(oldToken: VendorToken, rotatedBy: string | null = null): Promise<VendorToken> {
    if (oldToken.status !== 'ACTIVE') {
      throw new InvalidTokenStateError(oldToken.tokenValue, 'rotate', oldToken.status);
    }

    let lastCollision: DuplicateTokenError | undefined;
    for (let attempt = 1; attempt <= MAX_GENERATION_ATTEMPTS; attempt++) {
      const now = new Date();
      const data = this.buildTokenData({
        tokenType: oldToken.tokenType,
        entityType: oldToken.entityType,
        entityId: oldToken.entityId,
        vendorScope: oldToken.vendorScope,
        createdBy: rotatedBy,
        rotationCount: oldToken.rotationCount + 1,
        now,
      });

      try {
        const { previous, current } = await this.tokenRepo.rotate(oldToken.id, data, now);
        this.logger.info(
          { previousTokenValue: previous.tokenValue, tokenValue: current.tokenValue },
          'Rotated token'
        );
        this.tokenEvents.emit({
          type: 'token.rotated',
          metadata: {
            previousTokenId: previous.id,
            previousTokenValue: previous.tokenValue,
            tokenId: current.id,
            tokenValue: current.tokenValue,
            tokenType: current.tokenType,
            entityId: current.entityId,
            rotationCount: current.rotationCount,
            rotatedBy,
          },
        });
        return current;
      } catch (error) {
        if (!(error instanceof DuplicateTokenError)) {
          throw error;
        }
        lastCollision = error;
        this.logger.debug({ attempt }, 'Token value collision during rotation, retrying');
      }
    }

    throw this.exhausted(oldToken.tokenType, oldToken.entityId, lastCollision);
  }

  /**
   * @throws {TokenNotFoundError} If no token has this value
   */
  async rotateTokenByValue(tokenValue: string, rotatedBy: string | null = null): Promise<VendorToken> {
    return this.rotateToken(await this.requireToken(tokenValue), rotatedBy);
  }

  /**
   * Permanently retire an ACTIVE token
   *
   * @throws {InvalidTokenStateError} If the token is not ACTIVE
   */
  async revokeToken(token: VendorToken, revokedBy: string | null = null): Promise<VendorToken> {
    if (token.status !== 'ACTIVE') {
      throw new InvalidTokenStateError(token.tokenValue, 'revoke', token.status);
    }

    const revoked = await this.tokenRepo.revoke(token.id, new Date());

    this.logger.info({ tokenValue: revoked.tokenValue, revokedBy }, 'Revoked token');
    this.tokenEvents.emit({
      type: 'token.revoked',
      metadata: {
        tokenId: revoked.id,
        tokenValue: revoked.tokenValue,
        tokenType: revoked.tokenType,
        entityId: revoked.entityId,
        revokedBy,
      },
    });
    return revoked;
  }

  /**
   * @throws {TokenNotFoundError} If no token has this value
   */
  async revokeTokenByValue(tokenValue: string, revokedBy: string | null = null): Promise<VendorToken> {
    return this.revokeToken(await this.requireToken(tokenValue), revokedBy);
  }

  /**
   * Mark ACTIVE tokens past their expiry as EXPIRED
   *
   * @returns Number of tokens expired
   */
  async expireOldTokens(now: Date = new Date()): Promise<number> {
    const count = await this.tokenRepo.expireOldTokens(now);
    if (count > 0) {
      this.logger.info({ count }, 'Expired old tokens');
      this.tokenEvents.emit({
        type: 'tokens.expired',
        metadata: { count, asOf: now.toISOString() },
      });
    }
    return count;
  }

  /**
   * Delete ROTATED and REVOKED tokens last changed before the cutoff
   *
   * @returns Number of tokens deleted
   */
  async cleanupOldTokens(cutoff: Date): Promise<number> {
    const count = await this.tokenRepo.cleanupOldTokens(cutoff);
    if (count > 0) {
      this.logger.info({ count, cutoff: cutoff.toISOString() }, 'Cleaned up old tokens');
      this.tokenEvents.emit({
        type: 'tokens.cleaned_up',
        metadata: { count, cutoff: cutoff.toISOString() },
      });
    }
    return count;
  }

  async countByStatus(): Promise<Record<TokenStatus, number>> {
    return this.tokenRepo.countByStatus();
  }

  /**
   * ACTIVE tokens per type
   */
  async countByType(): Promise<Record<TokenType, number>> {
    return this.tokenRepo.countActiveByType();
  }

  async findExpiringBefore(date: Date): Promise<VendorToken[]> {
    return this.tokenRepo.findExpiringBefore(date);
  }

  /**
   * ACTIVE tokens expiring within the next `warningDays` days
   */
  async findTokensNeedingRotation(warningDays = 30): Promise<VendorToken[]> {
    const now = new Date();
    return this.tokenRepo.findNeedingRotation(now, new Date(now.getTime() + warningDays * DAY_MS));
  }

  async getStatistics(): Promise<TokenStatistics> {
    const [byStatus, activeByType, totalTokens, usage, expiringSoon] = await Promise.all([
      this.tokenRepo.countByStatus(),
      this.tokenRepo.countActiveByType(),
      this.tokenRepo.countAll(),
      this.tokenRepo.getUsageStatistics(),
      this.findTokensNeedingRotation(30),
    ]);

    return {
      byStatus,
      activeByType,
      totalTokens,
      totalUsage: usage.totalUsage,
      lastUsedAt: usage.lastUsedAt,
      expiringWithin30Days: expiringSoon.length,
    };
  }

  private async requireToken(tokenValue: string): Promise<VendorToken> {
    const token = await this.tokenRepo.findByValue(tokenValue);
    if (!token) {
      throw new TokenNotFoundError(tokenValue);
    }
    return token;
  }

  private buildTokenData(input: {
    tokenType: TokenType;
    entityType: string;
    entityId: number;
    vendorScope: string | null;
    createdBy: string | null;
    rotationCount: number;
    now: Date;
  }): CreateTokenData {
    const tokenValue = this.codec.generateTokenValue(input.tokenType);
    const { checksum } = this.codec.parse(tokenValue);

    return {
      tokenValue,
      tokenType: input.tokenType,
      entityId: input.entityId,
      entityType: input.entityType,
      vendorScope: input.vendorScope,
      schoolYear: computeSchoolYear(input.now, this.settings.rotationMonth),
      salt: generateSalt(),
      checksum,
      createdAt: input.now,
      expiresAt: new Date(input.now.getTime() + this.settings.expirationDays * DAY_MS),
      rotationCount: input.rotationCount,
      createdBy: input.createdBy,
    };
  }

  private exhausted(
    tokenType: TokenType,
    entityId: number,
    cause: DuplicateTokenError | undefined
  ): TokenGenerationExhaustedError {
    const error = new TokenGenerationExhaustedError(MAX_GENERATION_ATTEMPTS, { cause });
    this.logger.fatal({ err: error, tokenType, entityId }, 'Token generation exhausted');
    return error;
  }
}
