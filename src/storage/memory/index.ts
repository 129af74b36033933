import type { IStorage } from '../interfaces/index.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryRefreshTokenStorage, MemoryRevokedTokenStorage } from './token-storage.js';
import { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
import { MemoryPersonalAccessTokenStorage } from './personal-access-token-storage.js';

export { MemorySingleUseStore } from './single-use-store.js';
export { MemoryClientStorage } from './client-storage.js';
export { MemoryRefreshTokenStorage, MemoryRevokedTokenStorage } from './token-storage.js';
export { MemoryAuthorizationCodeStorage } from './authorization-code-storage.js';
export { MemoryPersonalAccessTokenStorage } from './personal-access-token-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  return {
    clients: new MemoryClientStorage(),
    authorizationCodes: new MemoryAuthorizationCodeStorage(),
    refreshTokens: new MemoryRefreshTokenStorage(),
    revokedTokens: new MemoryRevokedTokenStorage(),
    personalAccessTokens: new MemoryPersonalAccessTokenStorage(),
  };
}
