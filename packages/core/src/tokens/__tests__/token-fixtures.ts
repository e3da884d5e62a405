import { vi } from 'vitest';
import type { VendorToken } from '@tokenguard/database';
import type { TokenStore } from '../token-repository.js';

export function buildToken(overrides: Partial<VendorToken> = {}): VendorToken {
  return {
    id: 1,
    tokenValue: 'STU_H7K2P9M3_5A',
    tokenType: 'STUDENT',
    entityId: 1001,
    entityType: 'STUDENT',
    vendorScope: null,
    schoolYear: '2025-2026',
    salt: 'a'.repeat(64),
    checksum: '5A',
    status: 'ACTIVE',
    createdAt: new Date('2025-09-01T00:00:00.000Z'),
    updatedAt: new Date('2025-09-01T00:00:00.000Z'),
    expiresAt: new Date('2026-09-01T00:00:00.000Z'),
    lastUsedAt: null,
    rotationCount: 0,
    usageCount: 0,
    replacedById: null,
    createdBy: null,
    ...overrides,
  };
}

/**
 * Repository double with every method stubbed
 */
export function createMockTokenStore(): TokenStore {
  return {
    create: vi.fn(),
    createActive: vi.fn(),
    findById: vi.fn(),
    findByValue: vi.fn(),
    existsByValue: vi.fn(),
    findActiveForEntity: vi.fn(),
    findAllForEntity: vi.fn(),
    findByVendorScopeAndStatus: vi.fn(),
    findByTypeAndStatus: vi.fn(),
    findActiveForEntities: vi.fn(),
    findActiveBySchoolYear: vi.fn(),
    countByStatus: vi.fn(),
    countActiveByType: vi.fn(),
    countAll: vi.fn(),
    findExpiringBefore: vi.fn(),
    findNeedingRotation: vi.fn(),
    findMostUsed: vi.fn(),
    getUsageStatistics: vi.fn(),
    rotate: vi.fn(),
    revoke: vi.fn(),
    recordUsage: vi.fn(),
    expireOldTokens: vi.fn(),
    cleanupOldTokens: vi.fn(),
  };
}
