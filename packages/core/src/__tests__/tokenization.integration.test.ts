/**
 * Tokenization Integration Tests
 *
 * Lifecycle and resolution services over a real in-memory store
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { createDatabase, vendorTokens, type DatabaseHandle } from '@tokenguard/database';
import { TokenCodec } from '../tokens/token-codec.js';
import {
  InvalidTokenStateError,
  TokenExpiredError,
  TokenInactiveError,
} from '../tokens/token-errors.js';
import type { TokenEventPublisher } from '../tokens/token-events.js';
import { TokenLifecycleService } from '../tokens/token-lifecycle-service.js';
import { TokenRepository } from '../tokens/token-repository.js';
import { TokenResolutionService } from '../tokens/token-resolution-service.js';

const TOKEN_PATTERN = /^STU_[A-HJ-NP-Z2-9]{8}_[A-HJ-NP-Z2-9]{2}$/;

describe('tokenization', () => {
  let handle: DatabaseHandle;
  let repository: TokenRepository;
  let codec: TokenCodec;
  let tokenEvents: TokenEventPublisher;
  let lifecycle: TokenLifecycleService;
  let resolution: TokenResolutionService;

  beforeEach(() => {
    handle = createDatabase({ url: ':memory:' });
    repository = new TokenRepository(handle.db);
    codec = new TokenCodec();
    tokenEvents = { emit: vi.fn() };
    lifecycle = new TokenLifecycleService(repository, codec, tokenEvents);
    resolution = new TokenResolutionService(repository, codec, tokenEvents);
  });

  afterEach(() => {
    handle.close();
  });

  async function setExpiry(id: number, expiresAt: Date): Promise<void> {
    await handle.db.update(vendorTokens).set({ expiresAt }).where(eq(vendorTokens.id, id));
  }

  it('should issue a well-formed student token and resolve it back', async () => {
    const token = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 42 });

    expect(token.tokenValue).toMatch(TOKEN_PATTERN);
    expect(token.status).toBe('ACTIVE');
    expect(token.vendorScope).toBeNull();
    expect(codec.isValidChecksum(token.tokenValue)).toBe(true);
    expect(codec.validate(token.tokenValue)).toBe('STUDENT');

    expect(await resolution.resolveToEntityId(token.tokenValue)).toBe(42);
    expect(await resolution.resolveToEntityId(token.tokenValue, 'STUDENT')).toBe(42);
  });

  it('should return the same token on repeated generation', async () => {
    const first = await lifecycle.getOrCreateToken({ tokenType: 'TEACHER', entityId: 7 });
    const second = await lifecycle.getOrCreateToken({ tokenType: 'TEACHER', entityId: 7 });
    const third = await lifecycle.generateToken({ tokenType: 'TEACHER', entityId: 7 });

    expect(second.tokenValue).toBe(first.tokenValue);
    expect(third.tokenValue).toBe(first.tokenValue);
    expect(await repository.countAll()).toBe(1);
  });

  it('should keep one ACTIVE token per entity and scope', async () => {
    const universal = await lifecycle.generateToken({ tokenType: 'COURSE', entityId: 5 });
    const canvas = await lifecycle.generateToken({
      tokenType: 'COURSE',
      entityId: 5,
      vendorScope: 'CANVAS',
    });
    const canvasAgain = await lifecycle.generateToken({
      tokenType: 'COURSE',
      entityId: 5,
      vendorScope: 'CANVAS',
    });

    expect(canvas.tokenValue).not.toBe(universal.tokenValue);
    expect(canvasAgain.tokenValue).toBe(canvas.tokenValue);

    const rows = await repository.findAllForEntity('COURSE', 5);
    expect(rows.filter((row) => row.status === 'ACTIVE')).toHaveLength(2);
  });

  it('should rotate a token into a fresh value and retire the old one', async () => {
    const original = await lifecycle.generateToken({ tokenType: 'SECTION', entityId: 9 });

    const rotated = await lifecycle.rotateToken(original, 'admin');

    expect(rotated.tokenValue).not.toBe(original.tokenValue);
    expect(rotated.entityId).toBe(9);
    expect(rotated.rotationCount).toBe(1);
    expect(rotated.status).toBe('ACTIVE');

    const previous = await repository.findById(original.id);
    expect(previous?.status).toBe('ROTATED');
    expect(previous?.replacedById).toBe(rotated.id);

    await expect(resolution.resolveToEntityId(original.tokenValue)).rejects.toThrow(
      TokenInactiveError
    );
    expect(await resolution.resolveToEntityId(rotated.tokenValue)).toBe(9);
  });

  it('should refuse to rotate a token that is no longer ACTIVE', async () => {
    const original = await lifecycle.generateToken({ tokenType: 'SECTION', entityId: 9 });
    await lifecycle.rotateToken(original);

    await expect(lifecycle.rotateTokenByValue(original.tokenValue)).rejects.toThrow(
      InvalidTokenStateError
    );
  });

  it('should refuse to resolve a revoked token', async () => {
    const token = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 42 });

    await lifecycle.revokeToken(token, 'admin');

    await expect(resolution.resolveToEntityId(token.tokenValue)).rejects.toThrow(
      TokenInactiveError
    );
    await expect(resolution.resolveToEntityId(token.tokenValue)).rejects.toThrow(
      `Token is revoked: ${token.tokenValue}`
    );
  });

  it('should issue a new token after the old one was revoked', async () => {
    const token = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 42 });
    await lifecycle.revokeTokenByValue(token.tokenValue);

    const replacement = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 42 });

    expect(replacement.tokenValue).not.toBe(token.tokenValue);
    expect(replacement.rotationCount).toBe(0);
  });

  it('should refuse a token past its expiry before any sweep runs', async () => {
    const token = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 42 });
    await setExpiry(token.id, new Date(Date.now() - 60_000));

    await expect(resolution.resolveToEntityId(token.tokenValue)).rejects.toThrow(
      TokenExpiredError
    );
    expect((await repository.findById(token.id))?.status).toBe('ACTIVE');
  });

  it('should count every successful resolution, bulk elements included', async () => {
    const first = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 1 });
    const second = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 2 });

    await resolution.resolveToEntityId(first.tokenValue);
    const resolved = await resolution.resolveTokensBulk([
      first.tokenValue,
      second.tokenValue,
      'STU_ABCDEFGH_59',
    ]);

    expect(resolved.get(first.tokenValue)).toBe(1);
    expect(resolved.get(second.tokenValue)).toBe(2);
    expect(resolved.has('STU_ABCDEFGH_59')).toBe(false);

    const firstRow = await repository.findById(first.id);
    const secondRow = await repository.findById(second.id);
    expect(firstRow?.usageCount).toBe(2);
    expect(firstRow?.lastUsedAt).toBeInstanceOf(Date);
    expect(secondRow?.usageCount).toBe(1);
  });

  it('should not count failed resolutions', async () => {
    const token = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 3 });

    await expect(resolution.resolveToEntityId(token.tokenValue, 'TEACHER')).rejects.toThrow(
      'Token type mismatch: expected TEACHER, got STUDENT'
    );

    expect((await repository.findById(token.id))?.usageCount).toBe(0);
  });

  it('should expire only ACTIVE tokens past their expiry', async () => {
    const stale = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 1 });
    const fresh = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 2 });
    const revoked = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 3 });
    await lifecycle.revokeToken(revoked);

    const past = new Date(Date.now() - 60_000);
    await setExpiry(stale.id, past);
    await setExpiry(revoked.id, past);

    expect(await lifecycle.expireOldTokens()).toBe(1);

    expect((await repository.findById(stale.id))?.status).toBe('EXPIRED');
    expect((await repository.findById(fresh.id))?.status).toBe('ACTIVE');
    expect((await repository.findById(revoked.id))?.status).toBe('REVOKED');
    expect(tokenEvents.emit).toHaveBeenCalledWith({
      type: 'tokens.expired',
      metadata: { count: 1, asOf: expect.any(String) },
    });
  });

  it('should report statistics across statuses and types', async () => {
    const student = await lifecycle.generateToken({ tokenType: 'STUDENT', entityId: 1 });
    await lifecycle.generateToken({ tokenType: 'TEACHER', entityId: 1 });
    await lifecycle.rotateToken(student);

    const stats = await lifecycle.getStatistics();

    expect(stats.totalTokens).toBe(3);
    expect(stats.byStatus).toEqual({ ACTIVE: 2, ROTATED: 1, REVOKED: 0, EXPIRED: 0 });
    expect(stats.activeByType).toEqual({
      STUDENT: 1,
      TEACHER: 1,
      COURSE: 0,
      SECTION: 0,
      ASSIGNMENT: 0,
    });
    expect(stats.totalUsage).toBe(0);
    expect(stats.expiringWithin30Days).toBe(0);
  });
});
