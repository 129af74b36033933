import type { AuthorizationCode } from '../../types/token.js';
import type { IAuthorizationCodeStorage } from '../interfaces/authorization-code-storage.js';
import { MemorySingleUseStore } from './single-use-store.js';

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthorizationCodeStorage
  extends MemorySingleUseStore<AuthorizationCode>
  implements IAuthorizationCodeStorage {}
