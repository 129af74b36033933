import type { Context } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenRequestParams } from '../../types/oauth.js';
import type { IUserAuthenticator } from '../../storage/interfaces/index.js';
import type { AuthorizationServer } from '../../server.js';
import { OAuthError, isOAuthError } from '../../errors/oauth-error.js';
import { readFormParams } from '../../middleware/client-authenticator.js';
import { RESPONSE_TYPE_CODE } from '../../config/constants.js';

export interface AuthorizeHandlerOptions {
  server: AuthorizationServer;
  userAuthenticator: IUserAuthenticator;
}

/**
 * Handle the authorization endpoint (GET/POST /authorize)
 *
 * This implements the authorization request flow:
 * 1. Validate client_id and redirect_uri (errors here are never redirected)
 * 2. Authenticate the user (redirect to login if needed)
 * 3. Issue an authorization code
 * 4. Redirect to client with code, state and iss
 *
 * Consent screens belong to the user authenticator.
 */
export function createAuthorizeHandler(options: AuthorizeHandlerOptions) {
  const { server, userAuthenticator } = options;

  return async (c: Context<{ Variables: OAuthVariables }>) => {
    // Extract parameters (from query for GET, from body for POST)
    const params: TokenRequestParams =
      c.req.method === 'GET' ? c.req.query() : await readFormParams(c);

    const clientId = params['client_id'];
    const redirectUri = params['redirect_uri'];
    const state = params['state'];

    if (!clientId) {
      throw OAuthError.invalidRequest('Missing client_id parameter');
    }

    const client = await server.findClient(clientId);
    if (!client || client.revoked) {
      throw OAuthError.invalidClient('Unknown client_id');
    }

    if (!redirectUri) {
      throw OAuthError.invalidRequest('Missing redirect_uri parameter');
    }

    if (!client.redirectUris.includes(redirectUri)) {
      // Don't redirect on invalid redirect_uri - security risk
      throw OAuthError.invalidRequest('Invalid redirect_uri');
    }

    // Helper to redirect with error
    const redirectWithError = (error: OAuthError) => {
      const url = new URL(redirectUri);
      url.searchParams.set('error', error.code);
      url.searchParams.set('error_description', error.description);
      if (state) {
        url.searchParams.set('state', state);
      }
      // RFC 9207: identify the issuer in authorization responses
      url.searchParams.set('iss', server.config.issuer);
      return c.redirect(url.toString());
    };

    if (params['response_type'] !== RESPONSE_TYPE_CODE) {
      return redirectWithError(
        OAuthError.unsupportedResponseType('Only "code" response type is supported', state)
      );
    }

    const authResult = await userAuthenticator.authenticate(c);
    if (!authResult.authenticated) {
      return c.redirect(authResult.redirectTo);
    }

    let code: string;
    try {
      ({ code } = await server.authorize({
        clientId,
        userId: authResult.user.id,
        redirectUri,
        scope: params['scope'],
        codeChallenge: params['code_challenge'],
        codeChallengeMethod: params['code_challenge_method'],
      }));
    } catch (error) {
      if (isOAuthError(error)) {
        return redirectWithError(error);
      }
      throw error;
    }

    // Redirect to client with authorization code
    const url = new URL(redirectUri);
    url.searchParams.set('code', code);
    if (state) {
      url.searchParams.set('state', state);
    }
    url.searchParams.set('iss', server.config.issuer);

    return c.redirect(url.toString());
  };
}
