import type { IUserCredentialsVerifier } from '../../storage/interfaces/index.js';
import type { ScopeManager } from '../../services/scope-service.js';
import type { TokenService } from '../../services/token-service.js';
import type { GrantHandler } from '../token-request.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { assertGrantAllowed, parseTokenParams, passwordParamsSchema } from '../token-request.js';
import { GRANT_TYPE_PASSWORD } from '../../config/constants.js';

export interface PasswordHandlerOptions {
  scopes: ScopeManager;
  tokens: TokenService;
  verifier?: IUserCredentialsVerifier;
}

/**
 * Handle resource owner password credentials token request
 *
 * RFC 6749 Section 4.3. Only available when a credentials verifier is configured.
 */
export function createPasswordHandler(options: PasswordHandlerOptions): GrantHandler {
  const { scopes, tokens, verifier } = options;

  return async (client, params) => {
    if (!verifier) {
      throw OAuthError.unsupportedGrantType('Password grant is not enabled');
    }

    assertGrantAllowed(client, GRANT_TYPE_PASSWORD);

    const { username, password, scope } = parseTokenParams(passwordParamsSchema, params);

    const requested = scopes.parseScopes(scope);
    const granted =
      requested.length > 0 ? scopes.validate(requested, client.allowedScopes) : [...client.defaultScopes];

    const user = await verifier.verifyCredentials(username, password);
    if (!user) {
      throw OAuthError.invalidGrant('Invalid resource owner credentials');
    }

    return tokens.issueTokenPair({ client, userId: user.id, scopes: granted });
  };
}
