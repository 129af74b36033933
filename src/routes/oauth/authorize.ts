import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { IUserAuthenticator } from '../../storage/interfaces/index.js';
import type { AuthorizationServer } from '../../server.js';
import { createAuthorizeHandler } from '../../grants/authorization-code/authorize.js';

export interface AuthorizeRouteOptions {
  server: AuthorizationServer;
  userAuthenticator: IUserAuthenticator;
}

/**
 * Create authorization endpoint routes
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const router = new Hono<{ Variables: OAuthVariables }>();

  const authorizeHandler = createAuthorizeHandler(options);

  // GET /authorize - Initial authorization request
  router.get('/', authorizeHandler);

  // POST /authorize - Form submission (login redirect back)
  router.post('/', authorizeHandler);

  return router;
}
