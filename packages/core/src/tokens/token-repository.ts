/**
 * Token Repository
 *
 * Data access layer for vendor tokens
 * Pure drizzle operations with no business logic
 */

import {
  and,
  asc,
  count,
  desc,
  eq,
  gt,
  gte,
  inArray,
  isNotNull,
  isNull,
  lt,
  lte,
  or,
  sql,
} from 'drizzle-orm';
import {
  vendorTokens,
  type TokenDatabaseExecutor,
  type VendorToken,
} from '@tokenguard/database';
import type { TokenStatus, TokenType } from '@tokenguard/types';
import {
  ActiveTokenConflictError,
  DuplicateTokenError,
  InvalidTokenStateError,
  TokenNotFoundError,
} from './token-errors.js';
import type { RotationResult, UsageStatistics } from './token-types.js';

const ONE_ACTIVE_INDEX = 'idx_vendor_tokens_one_active';
const TOKEN_VALUE_COLUMN = 'vendor_tokens.token_value';

export interface CreateTokenData {
  tokenValue: string;
  tokenType: TokenType;
  entityId: number;
  entityType: string;
  vendorScope: string | null;
  schoolYear: string;
  salt: string;
  checksum: string;
  expiresAt: Date | null;
  createdAt: Date;
  rotationCount?: number;
  createdBy?: string | null;
}

export interface CreateActiveResult {
  token: VendorToken;
  created: boolean;
}

/**
 * Message of the first UNIQUE violation in the error's cause chain
 */
function uniqueViolationMessage(error: unknown): string | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current.message.includes('UNIQUE constraint failed')) {
      return current.message;
    }
    current = current.cause;
  }
  return null;
}

function scopeCondition(vendorScope: string | null) {
  return vendorScope === null
    ? isNull(vendorTokens.vendorScope)
    : eq(vendorTokens.vendorScope, vendorScope);
}

export class TokenRepository {
  constructor(private db: TokenDatabaseExecutor) {}

  /**
   * Insert a token row as ACTIVE
   *
   * @throws {DuplicateTokenError} If the token value is taken
   * @throws {ActiveTokenConflictError} If the entity already has an ACTIVE token for the scope
   */
  async create(data: CreateTokenData): Promise<VendorToken> {
    try {
      return this.db.insert(vendorTokens).values(this.toInsert(data)).returning().get();
    } catch (error) {
      throw this.translateInsertError(error, data);
    }
  }

  /**
   * Return the entity's ACTIVE token for the scope, or insert one
   *
   * Check and insert run in one immediate transaction, which holds the
   * write lock, so no other writer can slip in between them.
   *
   * @throws {DuplicateTokenError} If the token value is taken
   * @throws {ActiveTokenConflictError} If a write outside this repository broke the one-active rule
   */
  async createActive(data: CreateTokenData): Promise<CreateActiveResult> {
    try {
      return this.db.transaction(
        (tx) => {
          const existing = tx
            .select()
            .from(vendorTokens)
            .where(this.activeForEntityCondition(data.entityType, data.entityId, data.vendorScope))
            .get();
          if (existing) {
            return { token: existing, created: false };
          }

          const token = tx.insert(vendorTokens).values(this.toInsert(data)).returning().get();
          return { token, created: true };
        },
        { behavior: 'immediate' }
      );
    } catch (error) {
      throw this.translateInsertError(error, data);
    }
  }

  async findById(id: number): Promise<VendorToken | null> {
    return this.db.select().from(vendorTokens).where(eq(vendorTokens.id, id)).get() ?? null;
  }

  async findByValue(tokenValue: string): Promise<VendorToken | null> {
    return (
      this.db.select().from(vendorTokens).where(eq(vendorTokens.tokenValue, tokenValue)).get() ??
      null
    );
  }

  async existsByValue(tokenValue: string): Promise<boolean> {
    const row = this.db
      .select({ id: vendorTokens.id })
      .from(vendorTokens)
      .where(eq(vendorTokens.tokenValue, tokenValue))
      .get();
    return row !== undefined;
  }

  /**
   * ACTIVE token for the exact scope; null finds the universal token
   */
  async findActiveForEntity(
    entityType: string,
    entityId: number,
    vendorScope: string | null
  ): Promise<VendorToken | null> {
    return (
      this.db
        .select()
        .from(vendorTokens)
        .where(this.activeForEntityCondition(entityType, entityId, vendorScope))
        .get() ?? null
    );
  }

  /**
   * Every token the entity ever had, newest first
   */
  async findAllForEntity(entityType: string, entityId: number): Promise<VendorToken[]> {
    return this.db
      .select()
      .from(vendorTokens)
      .where(and(eq(vendorTokens.entityType, entityType), eq(vendorTokens.entityId, entityId)))
      .orderBy(desc(vendorTokens.createdAt), desc(vendorTokens.id))
      .all();
  }

  async findByVendorScopeAndStatus(
    vendorScope: string | null,
    status: TokenStatus
  ): Promise<VendorToken[]> {
    return this.db
      .select()
      .from(vendorTokens)
      .where(and(scopeCondition(vendorScope), eq(vendorTokens.status, status)))
      .orderBy(asc(vendorTokens.id))
      .all();
  }

  async findByTypeAndStatus(tokenType: TokenType, status: TokenStatus): Promise<VendorToken[]> {
    return this.db
      .select()
      .from(vendorTokens)
      .where(and(eq(vendorTokens.tokenType, tokenType), eq(vendorTokens.status, status)))
      .orderBy(asc(vendorTokens.id))
      .all();
  }

  async findActiveForEntities(
    entityType: string,
    entityIds: number[],
    vendorScope: string | null
  ): Promise<VendorToken[]> {
    if (entityIds.length === 0) {
      return [];
    }

    return this.db
      .select()
      .from(vendorTokens)
      .where(
        and(
          eq(vendorTokens.entityType, entityType),
          inArray(vendorTokens.entityId, entityIds),
          scopeCondition(vendorScope),
          eq(vendorTokens.status, 'ACTIVE')
        )
      )
      .orderBy(asc(vendorTokens.entityId))
      .all();
  }

  async findActiveBySchoolYear(schoolYear: string): Promise<VendorToken[]> {
    return this.db
      .select()
      .from(vendorTokens)
      .where(and(eq(vendorTokens.schoolYear, schoolYear), eq(vendorTokens.status, 'ACTIVE')))
      .orderBy(asc(vendorTokens.id))
      .all();
  }

  /**
   * Row count per status; statuses with no rows report 0
   */
  async countByStatus(): Promise<Record<TokenStatus, number>> {
    const rows = this.db
      .select({ status: vendorTokens.status, total: count() })
      .from(vendorTokens)
      .groupBy(vendorTokens.status)
      .all();

    const counts: Record<TokenStatus, number> = { ACTIVE: 0, EXPIRED: 0, REVOKED: 0, ROTATED: 0 };
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }

  /**
   * ACTIVE row count per token type; types with no rows report 0
   */
  async countActiveByType(): Promise<Record<TokenType, number>> {
    const rows = this.db
      .select({ tokenType: vendorTokens.tokenType, total: count() })
      .from(vendorTokens)
      .where(eq(vendorTokens.status, 'ACTIVE'))
      .groupBy(vendorTokens.tokenType)
      .all();

    const counts: Record<TokenType, number> = {
      STUDENT: 0,
      TEACHER: 0,
      COURSE: 0,
      SECTION: 0,
      ASSIGNMENT: 0,
    };
    for (const row of rows) {
      counts[row.tokenType] = row.total;
    }
    return counts;
  }

  async countAll(): Promise<number> {
    const row = this.db.select({ total: count() }).from(vendorTokens).get();
    return row?.total ?? 0;
  }

  /**
   * ACTIVE rows whose expiry is at or before the given date
   */
  async findExpiringBefore(date: Date): Promise<VendorToken[]> {
    return this.db
      .select()
      .from(vendorTokens)
      .where(
        and(
          eq(vendorTokens.status, 'ACTIVE'),
          isNotNull(vendorTokens.expiresAt),
          lte(vendorTokens.expiresAt, date)
        )
      )
      .orderBy(asc(vendorTokens.expiresAt))
      .all();
  }

  /**
   * ACTIVE rows expiring between now and the warning date (inclusive)
   */
  async findNeedingRotation(now: Date, warningDate: Date): Promise<VendorToken[]> {
    return this.db
      .select()
      .from(vendorTokens)
      .where(
        and(
          eq(vendorTokens.status, 'ACTIVE'),
          isNotNull(vendorTokens.expiresAt),
          gte(vendorTokens.expiresAt, now),
          lte(vendorTokens.expiresAt, warningDate)
        )
      )
      .orderBy(asc(vendorTokens.expiresAt))
      .all();
  }

  async findMostUsed(limit: number): Promise<VendorToken[]> {
    return this.db
      .select()
      .from(vendorTokens)
      .orderBy(desc(vendorTokens.usageCount), asc(vendorTokens.id))
      .limit(limit)
      .all();
  }

  async getUsageStatistics(): Promise<UsageStatistics> {
    const totals = this.db
      .select({
        totalUsage: sql<number>`coalesce(sum(${vendorTokens.usageCount}), 0)`.mapWith(Number),
        activeTokens:
          sql<number>`coalesce(sum(case when ${vendorTokens.status} = 'ACTIVE' then 1 else 0 end), 0)`.mapWith(
            Number
          ),
      })
      .from(vendorTokens)
      .get();

    const lastUsed = this.db
      .select({ lastUsedAt: vendorTokens.lastUsedAt })
      .from(vendorTokens)
      .where(isNotNull(vendorTokens.lastUsedAt))
      .orderBy(desc(vendorTokens.lastUsedAt))
      .limit(1)
      .get();

    return {
      totalUsage: totals?.totalUsage ?? 0,
      activeTokens: totals?.activeTokens ?? 0,
      lastUsedAt: lastUsed?.lastUsedAt ?? null,
    };
  }

  /**
   * Replace an ACTIVE token in one transaction
   *
   * The old row flips to ROTATED first so the new ACTIVE row never
   * collides with it on the one-active index.
   *
   * @throws {InvalidTokenStateError} If the old row is no longer ACTIVE
   * @throws {TokenNotFoundError} If the old row does not exist
   * @throws {DuplicateTokenError} If the new value is taken; nothing is changed
   */
  async rotate(oldId: number, newData: CreateTokenData, rotatedAt: Date): Promise<RotationResult> {
    try {
      return this.db.transaction(
        (tx) => {
          const flipped = tx
            .update(vendorTokens)
            .set({ status: 'ROTATED', updatedAt: rotatedAt })
            .where(and(eq(vendorTokens.id, oldId), eq(vendorTokens.status, 'ACTIVE')))
            .returning({ id: vendorTokens.id })
            .get();

          if (!flipped) {
            const current = tx.select().from(vendorTokens).where(eq(vendorTokens.id, oldId)).get();
            if (!current) {
              throw new TokenNotFoundError(`#${oldId}`);
            }
            throw new InvalidTokenStateError(current.tokenValue, 'rotate', current.status);
          }

          const current = tx.insert(vendorTokens).values(this.toInsert(newData)).returning().get();

          const previous = tx
            .update(vendorTokens)
            .set({ replacedById: current.id, updatedAt: rotatedAt })
            .where(eq(vendorTokens.id, oldId))
            .returning()
            .get();

          if (!previous) {
            throw new TokenNotFoundError(`#${oldId}`);
          }

          return { previous, current };
        },
        { behavior: 'immediate' }
      );
    } catch (error) {
      throw this.translateInsertError(error, newData);
    }
  }

  /**
   * ACTIVE -> REVOKED
   *
   * @throws {InvalidTokenStateError} If the row is not ACTIVE
   * @throws {TokenNotFoundError} If the row does not exist
   */
  async revoke(id: number, revokedAt: Date): Promise<VendorToken> {
    const revoked = this.db
      .update(vendorTokens)
      .set({ status: 'REVOKED', updatedAt: revokedAt })
      .where(and(eq(vendorTokens.id, id), eq(vendorTokens.status, 'ACTIVE')))
      .returning()
      .get();

    if (revoked) {
      return revoked;
    }

    const current = await this.findById(id);
    if (!current) {
      throw new TokenNotFoundError(`#${id}`);
    }
    throw new InvalidTokenStateError(current.tokenValue, 'revoke', current.status);
  }

  /**
   * Bump the usage counter of a row that is still ACTIVE and unexpired at
   * `usedAt`; returns null when the row is gone or no longer usable
   */
  async recordUsage(id: number, usedAt: Date): Promise<VendorToken | null> {
    return (
      this.db
        .update(vendorTokens)
        .set({
          usageCount: sql`${vendorTokens.usageCount} + 1`,
          lastUsedAt: usedAt,
          updatedAt: usedAt,
        })
        .where(
          and(
            eq(vendorTokens.id, id),
            eq(vendorTokens.status, 'ACTIVE'),
            or(isNull(vendorTokens.expiresAt), gt(vendorTokens.expiresAt, usedAt))
          )
        )
        .returning()
        .get() ?? null
    );
  }

  /**
   * Mark every ACTIVE row with `expiresAt <= now` as EXPIRED
   *
   * @returns Number of rows changed
   */
  async expireOldTokens(now: Date): Promise<number> {
    const result = this.db
      .update(vendorTokens)
      .set({ status: 'EXPIRED', updatedAt: now })
      .where(
        and(
          eq(vendorTokens.status, 'ACTIVE'),
          isNotNull(vendorTokens.expiresAt),
          lte(vendorTokens.expiresAt, now)
        )
      )
      .run();
    return result.changes;
  }

  /**
   * Delete ROTATED and REVOKED rows last touched before the cutoff
   *
   * @returns Number of rows deleted
   */
  async cleanupOldTokens(cutoff: Date): Promise<number> {
    const result = this.db
      .delete(vendorTokens)
      .where(
        and(
          inArray(vendorTokens.status, ['ROTATED', 'REVOKED']),
          lt(vendorTokens.updatedAt, cutoff)
        )
      )
      .run();
    return result.changes;
  }

  private activeForEntityCondition(entityType: string, entityId: number, vendorScope: string | null) {
    return and(
      eq(vendorTokens.entityType, entityType),
      eq(vendorTokens.entityId, entityId),
      scopeCondition(vendorScope),
      eq(vendorTokens.status, 'ACTIVE')
    );
  }

  private toInsert(data: CreateTokenData) {
    return {
      tokenValue: data.tokenValue,
      tokenType: data.tokenType,
      entityId: data.entityId,
      entityType: data.entityType,
      vendorScope: data.vendorScope,
      schoolYear: data.schoolYear,
      salt: data.salt,
      checksum: data.checksum,
      status: 'ACTIVE' as const,
      createdAt: data.createdAt,
      updatedAt: data.createdAt,
      expiresAt: data.expiresAt,
      rotationCount: data.rotationCount ?? 0,
      usageCount: 0,
      createdBy: data.createdBy ?? null,
    };
  }

  private translateInsertError(error: unknown, data: CreateTokenData): unknown {
    const message = uniqueViolationMessage(error);
    if (message?.includes(TOKEN_VALUE_COLUMN)) {
      return new DuplicateTokenError(data.tokenValue, { cause: error });
    }
    if (message?.includes(ONE_ACTIVE_INDEX)) {
      return new ActiveTokenConflictError(data.entityType, data.entityId, data.vendorScope, {
        cause: error,
      });
    }
    return error;
  }
}

/**
 * Public surface of the repository; services depend on this so tests can
 * hand in vi.fn() doubles
 */
export type TokenStore = {
  [K in keyof TokenRepository]: TokenRepository[K];
};
