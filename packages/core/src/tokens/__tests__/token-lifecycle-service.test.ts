/**
 * Token Lifecycle Service Unit Tests
 *
 * Tests business logic with a mocked repository
 * No database access - pure unit tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TokenCodec } from '../token-codec.js';
import {
  DuplicateTokenError,
  InvalidTokenRequestError,
  InvalidTokenStateError,
  TokenGenerationExhaustedError,
  TokenNotFoundError,
} from '../token-errors.js';
import type { CreateTokenData, TokenStore } from '../token-repository.js';
import {
  MAX_GENERATION_ATTEMPTS,
  TokenLifecycleService,
  computeSchoolYear,
} from '../token-lifecycle-service.js';
import { buildToken, createMockTokenStore } from './token-fixtures.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function tokenFromData(data: CreateTokenData, id = 10) {
  return buildToken({
    id,
    tokenValue: data.tokenValue,
    tokenType: data.tokenType,
    entityId: data.entityId,
    entityType: data.entityType,
    vendorScope: data.vendorScope,
    schoolYear: data.schoolYear,
    salt: data.salt,
    checksum: data.checksum,
    createdAt: data.createdAt,
    updatedAt: data.createdAt,
    expiresAt: data.expiresAt,
    rotationCount: data.rotationCount ?? 0,
    createdBy: data.createdBy ?? null,
  });
}

describe('TokenLifecycleService', () => {
  let tokenRepo: TokenStore;
  let tokenEvents: { emit: ReturnType<typeof vi.fn> };
  let service: TokenLifecycleService;
  const codec = new TokenCodec();

  beforeEach(() => {
    tokenRepo = createMockTokenStore();
    tokenEvents = { emit: vi.fn() };
    service = new TokenLifecycleService(tokenRepo, codec, tokenEvents, {
      expirationDays: 365,
      rotationMonth: 8,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('generateToken', () => {
    it('should return the existing ACTIVE token without creating one', async () => {
      const existing = buildToken();
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(existing);

      const token = await service.generateToken({ tokenType: 'STUDENT', entityId: 1001 });

      expect(token).toBe(existing);
      expect(tokenRepo.findActiveForEntity).toHaveBeenCalledWith('STUDENT', 1001, null);
      expect(tokenRepo.createActive).not.toHaveBeenCalled();
      expect(tokenEvents.emit).not.toHaveBeenCalled();
    });

    it('should create a new token with derived fields', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2025-09-15T10:00:00.000Z'));
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(null);
      vi.mocked(tokenRepo.createActive).mockImplementation(async (data) => ({
        token: tokenFromData(data),
        created: true,
      }));

      const token = await service.generateToken({
        tokenType: 'TEACHER',
        entityId: 42,
        vendorScope: 'CANVAS',
        createdBy: 'sync-job',
      });

      const [data] = vi.mocked(tokenRepo.createActive).mock.calls[0] ?? [];
      expect(data?.tokenValue).toMatch(/^TCH_[A-HJ-NP-Z2-9]{8}_[A-HJ-NP-Z2-9]{2}$/);
      expect(data?.checksum).toBe(data?.tokenValue.slice(-2));
      expect(data?.salt).toMatch(/^[0-9a-f]{64}$/);
      expect(data?.entityType).toBe('TEACHER');
      expect(data?.vendorScope).toBe('CANVAS');
      expect(data?.schoolYear).toBe('2025-2026');
      expect(data?.createdAt).toEqual(new Date('2025-09-15T10:00:00.000Z'));
      expect(data?.expiresAt).toEqual(new Date('2026-09-15T10:00:00.000Z'));
      expect(data?.rotationCount).toBe(0);
      expect(data?.createdBy).toBe('sync-job');
      expect(codec.isValidChecksum(token.tokenValue)).toBe(true);
      expect(tokenEvents.emit).toHaveBeenCalledWith({
        type: 'token.generated',
        metadata: {
          tokenId: 10,
          tokenValue: token.tokenValue,
          tokenType: 'TEACHER',
          entityId: 42,
          vendorScope: 'CANVAS',
          createdBy: 'sync-job',
        },
      });
    });

    it('should treat a blank vendor scope as universal', async () => {
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(buildToken());

      await service.generateToken({ tokenType: 'STUDENT', entityId: 1001, vendorScope: '   ' });

      expect(tokenRepo.findActiveForEntity).toHaveBeenCalledWith('STUDENT', 1001, null);
    });

    it('should not emit when another writer created the token first', async () => {
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(null);
      vi.mocked(tokenRepo.createActive).mockResolvedValue({ token: buildToken(), created: false });

      const token = await service.generateToken({ tokenType: 'STUDENT', entityId: 1001 });

      expect(token.tokenValue).toBe('STU_H7K2P9M3_5A');
      expect(tokenEvents.emit).not.toHaveBeenCalled();
    });

    it('should retry with a fresh value after a collision', async () => {
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(null);
      vi.mocked(tokenRepo.createActive)
        .mockRejectedValueOnce(new DuplicateTokenError('STU_COLLIDE2_AA'))
        .mockRejectedValueOnce(new DuplicateTokenError('STU_COLLIDE3_AA'))
        .mockImplementation(async (data) => ({ token: tokenFromData(data), created: true }));

      await service.generateToken({ tokenType: 'STUDENT', entityId: 1001 });

      expect(tokenRepo.createActive).toHaveBeenCalledTimes(3);
      expect(tokenEvents.emit).toHaveBeenCalledTimes(1);
    });

    it('should give up after the maximum number of attempts', async () => {
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(null);
      vi.mocked(tokenRepo.createActive).mockRejectedValue(new DuplicateTokenError('STU_COLLIDE2_AA'));

      const attempt = service.generateToken({ tokenType: 'STUDENT', entityId: 1001 });

      await expect(attempt).rejects.toThrow(TokenGenerationExhaustedError);
      await expect(attempt).rejects.toThrow('Failed to generate unique token after 100 attempts');
      expect(tokenRepo.createActive).toHaveBeenCalledTimes(MAX_GENERATION_ATTEMPTS);
      expect(tokenEvents.emit).not.toHaveBeenCalled();
    });

    it('should not retry errors other than collisions', async () => {
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(null);
      vi.mocked(tokenRepo.createActive).mockRejectedValue(new Error('database is locked'));

      await expect(
        service.generateToken({ tokenType: 'STUDENT', entityId: 1001 })
      ).rejects.toThrow('database is locked');
      expect(tokenRepo.createActive).toHaveBeenCalledTimes(1);
    });

    it('should reject out-of-range parameters', async () => {
      await expect(service.generateToken({ tokenType: 'STUDENT', entityId: 0 })).rejects.toThrow(
        InvalidTokenRequestError
      );
      await expect(
        service.generateToken({ tokenType: 'STUDENT', entityId: 1, vendorScope: 'X'.repeat(31) })
      ).rejects.toThrow('vendorScope: Vendor scope must be 30 characters or less');
      expect(tokenRepo.findActiveForEntity).not.toHaveBeenCalled();
    });
  });

  describe('generateTokensBulk', () => {
    it('should tokenize each entity in order', async () => {
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(null);
      let nextId = 100;
      vi.mocked(tokenRepo.createActive).mockImplementation(async (data) => ({
        token: tokenFromData(data, nextId++),
        created: true,
      }));

      const tokens = await service.generateTokensBulk({
        tokenType: 'COURSE',
        entityIds: [7, 8, 9],
        vendorScope: 'GOOGLE',
      });

      expect(tokens.map((token) => token.entityId)).toEqual([7, 8, 9]);
      expect(tokens.every((token) => token.vendorScope === 'GOOGLE')).toBe(true);
    });

    it('should stop at the first failure', async () => {
      vi.mocked(tokenRepo.findActiveForEntity).mockResolvedValue(null);
      vi.mocked(tokenRepo.createActive)
        .mockImplementationOnce(async (data) => ({ token: tokenFromData(data), created: true }))
        .mockRejectedValueOnce(new Error('disk full'));

      await expect(
        service.generateTokensBulk({ tokenType: 'STUDENT', entityIds: [1, 2, 3] })
      ).rejects.toThrow('disk full');
      expect(tokenRepo.createActive).toHaveBeenCalledTimes(2);
    });

    it('should reject an empty entity list', async () => {
      await expect(
        service.generateTokensBulk({ tokenType: 'STUDENT', entityIds: [] })
      ).rejects.toThrow('entityIds: At least one entity ID is required');
    });
  });

  describe('rotateToken', () => {
    it('should refuse tokens that are not ACTIVE', async () => {
      const revoked = buildToken({ status: 'REVOKED' });

      await expect(service.rotateToken(revoked)).rejects.toThrow(InvalidTokenStateError);
      await expect(service.rotateToken(revoked)).rejects.toThrow(
        'Cannot rotate token STU_H7K2P9M3_5A with status REVOKED'
      );
      expect(tokenRepo.rotate).not.toHaveBeenCalled();
    });

    it('should issue a replacement for the same entity and scope', async () => {
      const old = buildToken({ id: 5, vendorScope: 'CANVAS', rotationCount: 2 });
      vi.mocked(tokenRepo.rotate).mockImplementation(async (oldId, data) => ({
        previous: buildToken({ id: oldId, status: 'ROTATED', replacedById: 6 }),
        current: tokenFromData(data, 6),
      }));

      const current = await service.rotateToken(old, 'admin');

      const [oldId, data] = vi.mocked(tokenRepo.rotate).mock.calls[0] ?? [];
      expect(oldId).toBe(5);
      expect(data?.vendorScope).toBe('CANVAS');
      expect(data?.entityId).toBe(1001);
      expect(data?.rotationCount).toBe(3);
      expect(data?.tokenValue).not.toBe(old.tokenValue);
      expect(current.id).toBe(6);
      expect(current.rotationCount).toBe(3);
      expect(tokenEvents.emit).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'token.rotated',
          metadata: expect.objectContaining({
            previousTokenId: 5,
            tokenId: 6,
            rotationCount: 3,
            rotatedBy: 'admin',
          }),
        })
      );
    });

    it('should retry rotation collisions', async () => {
      vi.mocked(tokenRepo.rotate)
        .mockRejectedValueOnce(new DuplicateTokenError('STU_COLLIDE2_AA'))
        .mockImplementation(async (oldId, data) => ({
          previous: buildToken({ id: oldId, status: 'ROTATED' }),
          current: tokenFromData(data, 2),
        }));

      await service.rotateToken(buildToken());

      expect(tokenRepo.rotate).toHaveBeenCalledTimes(2);
    });

    it('should look tokens up by value', async () => {
      vi.mocked(tokenRepo.findByValue).mockResolvedValue(null);

      await expect(service.rotateTokenByValue('STU_H7K2P9M3_5A')).rejects.toThrow(
        TokenNotFoundError
      );
    });
  });

  describe('revokeToken', () => {
    it('should revoke an ACTIVE token and emit an event', async () => {
      const token = buildToken({ id: 3 });
      vi.mocked(tokenRepo.revoke).mockResolvedValue(buildToken({ id: 3, status: 'REVOKED' }));

      const revoked = await service.revokeToken(token, 'admin');

      expect(revoked.status).toBe('REVOKED');
      expect(tokenRepo.revoke).toHaveBeenCalledWith(3, expect.any(Date));
      expect(tokenEvents.emit).toHaveBeenCalledWith({
        type: 'token.revoked',
        metadata: {
          tokenId: 3,
          tokenValue: 'STU_H7K2P9M3_5A',
          tokenType: 'STUDENT',
          entityId: 1001,
          revokedBy: 'admin',
        },
      });
    });

    it('should refuse to revoke a rotated token', async () => {
      await expect(service.revokeToken(buildToken({ status: 'ROTATED' }))).rejects.toThrow(
        InvalidTokenStateError
      );
      expect(tokenRepo.revoke).not.toHaveBeenCalled();
    });

    it('should revoke by value', async () => {
      vi.mocked(tokenRepo.findByValue).mockResolvedValue(buildToken({ id: 8 }));
      vi.mocked(tokenRepo.revoke).mockResolvedValue(buildToken({ id: 8, status: 'REVOKED' }));

      const revoked = await service.revokeTokenByValue('STU_H7K2P9M3_5A');

      expect(revoked.id).toBe(8);
    });
  });

  describe('sweeps', () => {
    it('should only emit when tokens expired', async () => {
      vi.mocked(tokenRepo.expireOldTokens).mockResolvedValueOnce(0).mockResolvedValueOnce(3);
      const now = new Date('2026-01-01T00:00:00.000Z');

      expect(await service.expireOldTokens(now)).toBe(0);
      expect(tokenEvents.emit).not.toHaveBeenCalled();

      expect(await service.expireOldTokens(now)).toBe(3);
      expect(tokenEvents.emit).toHaveBeenCalledWith({
        type: 'tokens.expired',
        metadata: { count: 3, asOf: '2026-01-01T00:00:00.000Z' },
      });
    });

    it('should report cleaned up tokens', async () => {
      vi.mocked(tokenRepo.cleanupOldTokens).mockResolvedValue(2);
      const cutoff = new Date('2025-01-01T00:00:00.000Z');

      expect(await service.cleanupOldTokens(cutoff)).toBe(2);
      expect(tokenRepo.cleanupOldTokens).toHaveBeenCalledWith(cutoff);
      expect(tokenEvents.emit).toHaveBeenCalledWith({
        type: 'tokens.cleaned_up',
        metadata: { count: 2, cutoff: '2025-01-01T00:00:00.000Z' },
      });
    });
  });

  describe('administrative reads', () => {
    it('should look ahead by the warning window', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2025-10-01T00:00:00.000Z'));
      vi.mocked(tokenRepo.findNeedingRotation).mockResolvedValue([]);

      await service.findTokensNeedingRotation(14);

      expect(tokenRepo.findNeedingRotation).toHaveBeenCalledWith(
        new Date('2025-10-01T00:00:00.000Z'),
        new Date(new Date('2025-10-01T00:00:00.000Z').getTime() + 14 * DAY_MS)
      );
    });

    it('should combine store counts into statistics', async () => {
      vi.mocked(tokenRepo.countByStatus).mockResolvedValue({
        ACTIVE: 4,
        EXPIRED: 1,
        REVOKED: 2,
        ROTATED: 3,
      });
      vi.mocked(tokenRepo.countActiveByType).mockResolvedValue({
        STUDENT: 3,
        TEACHER: 1,
        COURSE: 0,
        SECTION: 0,
        ASSIGNMENT: 0,
      });
      vi.mocked(tokenRepo.countAll).mockResolvedValue(10);
      vi.mocked(tokenRepo.getUsageStatistics).mockResolvedValue({
        totalUsage: 25,
        activeTokens: 4,
        lastUsedAt: new Date('2025-10-02T00:00:00.000Z'),
      });
      vi.mocked(tokenRepo.findNeedingRotation).mockResolvedValue([buildToken()]);

      const stats = await service.getStatistics();

      expect(stats).toEqual({
        byStatus: { ACTIVE: 4, EXPIRED: 1, REVOKED: 2, ROTATED: 3 },
        activeByType: { STUDENT: 3, TEACHER: 1, COURSE: 0, SECTION: 0, ASSIGNMENT: 0 },
        totalTokens: 10,
        totalUsage: 25,
        lastUsedAt: new Date('2025-10-02T00:00:00.000Z'),
        expiringWithin30Days: 1,
      });
    });

    it('should pass counts through', async () => {
      vi.mocked(tokenRepo.countActiveByType).mockResolvedValue({
        STUDENT: 1,
        TEACHER: 0,
        COURSE: 0,
        SECTION: 0,
        ASSIGNMENT: 0,
      });

      expect((await service.countByType()).STUDENT).toBe(1);
    });
  });
});

describe('computeSchoolYear', () => {
  it.each([
    ['2025-08-01T00:00:00.000Z', 8, '2025-2026'],
    ['2025-07-31T23:59:59.999Z', 8, '2024-2025'],
    ['2026-01-15T12:00:00.000Z', 8, '2025-2026'],
    ['2025-12-31T23:59:59.999Z', 8, '2025-2026'],
    ['2025-01-01T00:00:00.000Z', 1, '2025-2026'],
    ['2025-11-30T00:00:00.000Z', 12, '2024-2025'],
    ['2025-12-01T00:00:00.000Z', 12, '2025-2026'],
  ])('should place %s in the right year for rotation month %i', (iso, month, expected) => {
    expect(computeSchoolYear(new Date(iso), month)).toBe(expected);
  });
});
