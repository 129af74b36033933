import type { PersonalAccessToken } from '../../types/token.js';
import type { IPersonalAccessTokenStorage } from '../interfaces/personal-access-token-storage.js';
import { MemorySingleUseStore } from './single-use-store.js';

/**
 * In-memory personal access token storage implementation
 */
export class MemoryPersonalAccessTokenStorage
  extends MemorySingleUseStore<PersonalAccessToken>
  implements IPersonalAccessTokenStorage
{
  async listByUser(userId: string): Promise<PersonalAccessToken[]> {
    return Array.from(this.records.values())
      .filter((token) => token.userId === userId)
      .map((token) => ({ ...token }));
  }
}
