import type { RefreshToken, RevokedToken } from '../../types/token.js';
import type { ISingleUseStore } from './single-use-store.js';

/**
 * Storage interface for refresh tokens
 */
export interface IRefreshTokenStorage extends ISingleUseStore<RefreshToken> {
  /**
   * All tokens descending from one grant (for replay handling)
   */
  findByFamily(familyId: string): Promise<RefreshToken[]>;
}

/**
 * Storage interface for JWT revocation tracking
 * Used for access tokens since they're stateless JWTs
 */
export interface IRevokedTokenStorage {
  /**
   * Mark a JWT as revoked until its own expiry
   */
  revoke(record: RevokedToken): Promise<void>;

  /**
   * Check if a JWT has been revoked
   */
  isRevoked(tokenId: string): Promise<boolean>;
}
