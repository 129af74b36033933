import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../server.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { tokenRequestSchema, invalidRequestHook } from './token-request-schema.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../../config/constants.js';

export interface IntrospectRouteOptions {
  server: AuthorizationServer;
  rateLimiter?: MiddlewareHandler;
}

/**
 * Create token introspection endpoint routes
 *
 * RFC 7662
 */
export function createIntrospectRoutes(options: IntrospectRouteOptions) {
  const { server, rateLimiter } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  if (rateLimiter) {
    router.use('*', rateLimiter);
  }

  // POST /introspect
  router.post(
    '/',
    // Require client authentication for introspection
    clientAuthenticator({ server, allowPublicClients: false }),
    zValidator('form', tokenRequestSchema, invalidRequestHook),
    async (c) => {
      const { token, token_type_hint } = c.req.valid('form');

      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      return c.json(await server.introspect(token, token_type_hint));
    }
  );

  return router;
}
