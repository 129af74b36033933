import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../server.js';
import {
  clientAuthenticator,
  getAuthenticatedClient,
  readFormParams,
} from '../../middleware/client-authenticator.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  server: AuthorizationServer;
  rateLimiter?: MiddlewareHandler;
}

/**
 * Create token endpoint routes
 *
 * RFC 6749 Section 3.2
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { server, rateLimiter } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  if (rateLimiter) {
    router.use('*', rateLimiter);
  }

  // POST /token
  router.post(
    '/',
    // Public clients authenticate by client_id (authorization code with PKCE, refresh)
    clientAuthenticator({ server, allowPublicClients: true }),
    async (c) => {
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const { client } = getAuthenticatedClient(c);
      const params = await readFormParams(c);

      const response = await server.grant(client, params);
      return c.json(response);
    }
  );

  return router;
}
