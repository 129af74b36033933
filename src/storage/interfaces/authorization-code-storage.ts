import type { AuthorizationCode } from '../../types/token.js';
import type { ISingleUseStore } from './single-use-store.js';

/**
 * Storage interface for authorization codes
 */
export type IAuthorizationCodeStorage = ISingleUseStore<AuthorizationCode>;
