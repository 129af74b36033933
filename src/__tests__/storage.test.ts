import { describe, it, expect, beforeEach } from 'vitest';
import {
  MemoryClientStorage,
  MemoryRefreshTokenStorage,
  MemoryRevokedTokenStorage,
} from '../storage/memory/index.js';
import type { RefreshToken } from '../types/token.js';
import type { OAuthClient } from '../types/client.js';

function refreshToken(overrides: Partial<RefreshToken> = {}): RefreshToken {
  return {
    id: 'rt-1',
    tokenHash: 'hash-1',
    clientId: 'client-1',
    userId: 'user-1',
    scopes: ['api:read'],
    accessTokenId: 'jti-1',
    accessTokenExpiresAt: new Date('2025-01-01T01:00:00Z'),
    familyId: 'family-1',
    issuedAt: new Date('2025-01-01T00:00:00Z'),
    expiresAt: new Date('2025-01-31T00:00:00Z'),
    ...overrides,
  };
}

describe('Memory storage', () => {
  let storage: MemoryRefreshTokenStorage;

  beforeEach(async () => {
    storage = new MemoryRefreshTokenStorage();
    await storage.insert(refreshToken());
  });

  it('finds records by id and by hash', async () => {
    expect((await storage.findById('rt-1'))?.tokenHash).toBe('hash-1');
    expect((await storage.findByTokenHash('hash-1'))?.id).toBe('rt-1');
    expect(await storage.findByTokenHash('hash-2')).toBeNull();
  });

  it('rejects duplicate ids and hashes', async () => {
    await expect(storage.insert(refreshToken())).rejects.toThrow('Duplicate record: rt-1');
    await expect(storage.insert(refreshToken({ id: 'rt-2' }))).rejects.toThrow('Duplicate record: rt-2');
  });

  it('returns copies', async () => {
    const found = await storage.findById('rt-1');
    if (found) {
      found.clientId = 'mutated';
    }
    expect((await storage.findById('rt-1'))?.clientId).toBe('client-1');
  });

  describe('updateIf', () => {
    it('applies the change when the expected fields match', async () => {
      const revokedAt = new Date('2025-01-02T00:00:00Z');

      expect(
        await storage.updateIf('rt-1', { revokedAt: undefined }, { revokedAt, revocationReason: 'rotated' })
      ).toBe(true);

      const updated = await storage.findById('rt-1');
      expect(updated?.revokedAt).toEqual(revokedAt);
      expect(updated?.revocationReason).toBe('rotated');
    });

    it('leaves the record alone when a field differs', async () => {
      const first = new Date('2025-01-02T00:00:00Z');
      await storage.updateIf('rt-1', { revokedAt: undefined }, { revokedAt: first });

      expect(
        await storage.updateIf('rt-1', { revokedAt: undefined }, { revokedAt: new Date('2025-01-03T00:00:00Z') })
      ).toBe(false);
      expect((await storage.findById('rt-1'))?.revokedAt).toEqual(first);
    });

    it('returns false for unknown ids', async () => {
      expect(await storage.updateIf('missing', {}, { clientId: 'x' })).toBe(false);
    });

    it('admits exactly one of many concurrent callers', async () => {
      const results = await Promise.all(
        Array.from({ length: 10 }, (_, index) =>
          storage.updateIf('rt-1', { revokedAt: undefined }, { revokedAt: new Date(index) })
        )
      );

      expect(results.filter(Boolean)).toHaveLength(1);
    });
  });

  it('groups refresh tokens by family', async () => {
    await storage.insert(refreshToken({ id: 'rt-2', tokenHash: 'hash-2', parentTokenId: 'rt-1' }));
    await storage.insert(refreshToken({ id: 'rt-3', tokenHash: 'hash-3', familyId: 'family-2' }));

    const family = await storage.findByFamily('family-1');
    expect(family.map((token) => token.id).sort()).toEqual(['rt-1', 'rt-2']);
    expect(await storage.findByFamily('family-3')).toEqual([]);
  });

  it('tracks revoked access tokens by jti', async () => {
    const revoked = new MemoryRevokedTokenStorage();

    await revoked.revoke({
      tokenId: 'jti-1',
      tokenType: 'access_token',
      expiresAt: new Date('2025-01-01T01:00:00Z'),
      revokedAt: new Date('2025-01-01T00:30:00Z'),
    });

    expect(await revoked.isRevoked('jti-1')).toBe(true);
    expect(await revoked.isRevoked('jti-2')).toBe(false);
  });
});

describe('Memory client storage', () => {
  const client: OAuthClient = {
    clientId: 'client-1',
    clientType: 'public',
    name: 'First',
    redirectUris: [],
    allowedGrants: ['password'],
    allowedScopes: [],
    defaultScopes: [],
    revoked: false,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    updatedAt: new Date('2025-01-01T00:00:00Z'),
  };

  it('reports a taken client_id instead of overwriting it', async () => {
    const storage = new MemoryClientStorage();

    expect(await storage.insert(client)).toBe(true);
    expect(await storage.insert({ ...client, name: 'Second' })).toBe(false);
    expect((await storage.findById('client-1'))?.name).toBe('First');
  });
});
