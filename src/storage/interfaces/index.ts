export * from './single-use-store.js';
export * from './client-storage.js';
export * from './token-storage.js';
export * from './authorization-code-storage.js';
export * from './personal-access-token-storage.js';
export * from './user-storage.js';

import type { IClientStorage } from './client-storage.js';
import type { IRefreshTokenStorage, IRevokedTokenStorage } from './token-storage.js';
import type { IAuthorizationCodeStorage } from './authorization-code-storage.js';
import type { IPersonalAccessTokenStorage } from './personal-access-token-storage.js';

/**
 * Complete storage interface for the OAuth server
 */
export interface IStorage {
  clients: IClientStorage;
  authorizationCodes: IAuthorizationCodeStorage;
  refreshTokens: IRefreshTokenStorage;
  revokedTokens: IRevokedTokenStorage;
  personalAccessTokens: IPersonalAccessTokenStorage;
}
