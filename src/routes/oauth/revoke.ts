import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../server.js';
import { clientAuthenticator, getAuthenticatedClient } from '../../middleware/client-authenticator.js';
import { tokenRequestSchema, invalidRequestHook } from './token-request-schema.js';

export interface RevokeRouteOptions {
  server: AuthorizationServer;
  rateLimiter?: MiddlewareHandler;
}

/**
 * Create token revocation endpoint routes
 *
 * RFC 7009
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { server, rateLimiter } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  if (rateLimiter) {
    router.use('*', rateLimiter);
  }

  // POST /revoke
  router.post(
    '/',
    clientAuthenticator({ server, allowPublicClients: true }),
    zValidator('form', tokenRequestSchema, invalidRequestHook),
    async (c) => {
      const { client } = getAuthenticatedClient(c);
      const { token, token_type_hint } = c.req.valid('form');

      // RFC 7009 Section 2.2: 200 whether or not the token was known
      await server.revoke(token, { hint: token_type_hint, clientId: client.clientId });

      return c.body(null, 200);
    }
  );

  return router;
}
