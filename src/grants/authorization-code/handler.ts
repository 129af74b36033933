import type { AuthorizationCodeService } from '../../services/authorization-code-service.js';
import type { GrantHandler } from '../token-request.js';
import { assertGrantAllowed, authorizationCodeParamsSchema, parseTokenParams } from '../token-request.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

export interface AuthorizationCodeHandlerOptions {
  authorizationCodes: AuthorizationCodeService;
}

/**
 * Handle authorization code token request
 *
 * RFC 6749 Section 4.1.3, with PKCE verification (RFC 7636 Section 4.6)
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions): GrantHandler {
  const { authorizationCodes } = options;

  return async (client, params) => {
    assertGrantAllowed(client, GRANT_TYPE_AUTHORIZATION_CODE);

    const { code, redirect_uri, code_verifier } = parseTokenParams(
      authorizationCodeParamsSchema,
      params
    );

    return authorizationCodes.exchange(client, {
      code,
      redirectUri: redirect_uri,
      codeVerifier: code_verifier,
    });
  };
}
