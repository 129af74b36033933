import type { ScopeManager } from '../../services/scope-service.js';
import type { TokenService } from '../../services/token-service.js';
import type { GrantHandler } from '../token-request.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { assertGrantAllowed, clientCredentialsParamsSchema, parseTokenParams } from '../token-request.js';
import { GRANT_TYPE_CLIENT_CREDENTIALS } from '../../config/constants.js';

export interface ClientCredentialsHandlerOptions {
  scopes: ScopeManager;
  tokens: TokenService;
}

/**
 * Handle client credentials token request
 *
 * RFC 6749 Section 4.4
 */
export function createClientCredentialsHandler(options: ClientCredentialsHandlerOptions): GrantHandler {
  const { scopes, tokens } = options;

  return async (client, params) => {
    // Client credentials only for confidential clients
    if (client.clientType !== 'confidential') {
      throw OAuthError.unauthorizedClient(
        'Client credentials grant requires a confidential client'
      );
    }

    assertGrantAllowed(client, GRANT_TYPE_CLIENT_CREDENTIALS);

    const { scope } = parseTokenParams(clientCredentialsParamsSchema, params);
    const requested = scopes.parseScopes(scope);
    const granted =
      requested.length > 0 ? scopes.validate(requested, client.allowedScopes) : [...client.defaultScopes];

    // No user, so no refresh token (RFC 6749 Section 4.4.3)
    return tokens.issueTokenPair({ client, scopes: granted });
  };
}
