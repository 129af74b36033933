import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';
import type { OAuthVariables } from './types/hono.js';
import type { IUserAuthenticator } from './storage/interfaces/index.js';
import type { AuthorizationServer } from './server.js';
import { createErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import {
  createAuthorizeRoutes,
  createTokenRoutes,
  createRevokeRoutes,
  createIntrospectRoutes,
} from './routes/oauth/index.js';
import { createMetadataRoutes } from './routes/discovery/metadata.js';

export interface OAuth2ServerOptions {
  server: AuthorizationServer;
  /** Enables GET/POST /authorize */
  userAuthenticator?: IUserAuthenticator;
  baseUrl?: string;
  /**
   * Middleware run in front of the token, introspection and revocation endpoints
   */
  rateLimiter?: MiddlewareHandler;
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Create the OAuth 2.0 Authorization Server application
 */
export function createOAuth2Server(options: OAuth2ServerOptions): Hono<{ Variables: OAuthVariables }> {
  const {
    server,
    userAuthenticator,
    baseUrl = 'http://localhost:3000',
    rateLimiter,
    enableCors = true,
    enableLogging = true,
  } = options;

  const app = new Hono<{ Variables: OAuthVariables }>();

  // Global error handler
  app.onError(createErrorHandler(server.logger));

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(server.logger));
  }

  // CORS (needed for token endpoint from SPAs)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  app.get('/health', (c) => c.json({ status: 'ok' }));

  // OAuth endpoints
  if (userAuthenticator) {
    app.route('/authorize', createAuthorizeRoutes({ server, userAuthenticator }));
  }

  app.route('/token', createTokenRoutes({ server, rateLimiter }));
  app.route('/introspect', createIntrospectRoutes({ server, rateLimiter }));
  app.route('/revoke', createRevokeRoutes({ server, rateLimiter }));

  // Discovery
  app.route('/.well-known/oauth-authorization-server', createMetadataRoutes({ server, baseUrl }));

  return app;
}
