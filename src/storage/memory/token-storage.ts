import type { RefreshToken, RevokedToken } from '../../types/token.js';
import type { IRefreshTokenStorage, IRevokedTokenStorage } from '../interfaces/token-storage.js';
import { MemorySingleUseStore } from './single-use-store.js';

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage
  extends MemorySingleUseStore<RefreshToken>
  implements IRefreshTokenStorage
{
  private familyIndex = new Map<string, Set<string>>(); // familyId -> Set<id>

  override async insert(record: RefreshToken): Promise<void> {
    await super.insert(record);

    const family = this.familyIndex.get(record.familyId) ?? new Set<string>();
    family.add(record.id);
    this.familyIndex.set(record.familyId, family);
  }

  async findByFamily(familyId: string): Promise<RefreshToken[]> {
    const ids = this.familyIndex.get(familyId);
    if (!ids) return [];

    const tokens: RefreshToken[] = [];
    for (const id of ids) {
      const token = this.records.get(id);
      if (token) {
        tokens.push({ ...token });
      }
    }
    return tokens;
  }
}

/**
 * In-memory revoked token storage implementation
 * For tracking revoked JWTs
 */
export class MemoryRevokedTokenStorage implements IRevokedTokenStorage {
  private revokedTokens = new Map<string, RevokedToken>(); // jti -> record

  async revoke(record: RevokedToken): Promise<void> {
    if (!this.revokedTokens.has(record.tokenId)) {
      this.revokedTokens.set(record.tokenId, { ...record });
    }
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    return this.revokedTokens.has(tokenId);
  }
}
