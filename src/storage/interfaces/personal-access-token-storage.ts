import type { PersonalAccessToken } from '../../types/token.js';
import type { ISingleUseStore } from './single-use-store.js';

/**
 * Storage interface for personal access tokens
 */
export interface IPersonalAccessTokenStorage extends ISingleUseStore<PersonalAccessToken> {
  listByUser(userId: string): Promise<PersonalAccessToken[]>;
}
