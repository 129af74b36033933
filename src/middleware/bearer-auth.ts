import type { MiddlewareHandler } from 'hono';
import type { OAuthContext, OAuthVariables } from '../types/hono.js';
import type { AuthorizationServer } from '../server.js';
import type { BearerPrincipal } from '../services/introspection-service.js';
import { OAuthError } from '../errors/oauth-error.js';
import { HEADER_AUTHORIZATION } from '../config/constants.js';

export interface BearerAuthOptions {
  server: AuthorizationServer;
  requiredScopes?: string[];
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  const match = /^Bearer\s+(\S+)$/i.exec(authHeader);
  return match?.[1] ?? null;
}

/**
 * Middleware to validate bearer tokens (JWT access tokens or personal access tokens)
 *
 * Sets `principal` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { server, requiredScopes = [] } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    if (!authHeader) {
      throw OAuthError.invalidToken('Missing authorization header');
    }

    const token = extractBearerToken(authHeader);
    if (!token) {
      throw OAuthError.invalidToken('Invalid authorization header format');
    }

    const principal = await server.validateBearer(token, requiredScopes);
    c.set('principal', principal);

    await next();
  };
}

/**
 * Create bearer auth middleware with specific required scopes
 */
export function requireScopes(
  server: AuthorizationServer,
  ...scopes: string[]
): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return bearerAuth({ server, requiredScopes: scopes });
}

/**
 * The principal set by {@link bearerAuth}
 */
export function getPrincipal(c: Pick<OAuthContext, 'get'>): BearerPrincipal {
  const principal = c.get('principal');
  if (!principal) {
    throw OAuthError.invalidToken();
  }
  return principal;
}
