import type { Context, MiddlewareHandler } from 'hono';
import type { OAuthContext, OAuthVariables } from '../types/hono.js';
import type { AuthenticatedClient, ClientAuthMethod } from '../types/client.js';
import type { ClientCredentials, TokenRequestParams } from '../types/oauth.js';
import type { AuthorizationServer } from '../server.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_NONE,
  CLIENT_AUTH_POST,
  HEADER_AUTHORIZATION,
} from '../config/constants.js';

export interface ClientAuthenticatorOptions {
  server: AuthorizationServer;
  allowPublicClients?: boolean; // Allow clients authenticating by client_id alone
}

/**
 * Read a form-encoded request body as string parameters. File fields are dropped.
 */
export async function readFormParams(c: Context): Promise<TokenRequestParams> {
  const body = await c.req.parseBody();
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }
  return params;
}

/**
 * Extract client credentials from Basic auth header (RFC 6749 Section 2.3.1)
 */
export function extractBasicAuth(authHeader: string): Required<ClientCredentials> | null {
  if (!authHeader.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1)),
    };
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }
}

/**
 * Middleware to authenticate OAuth clients
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in POST body
 * - none: Public clients identified by client_id
 *
 * Sets `client` in context variables on success
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { server, allowPublicClients = true } = options;

  return async (c, next) => {
    const body = await readFormParams(c);
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    let credentials: ClientCredentials | null = null;
    let authMethod: ClientAuthMethod = CLIENT_AUTH_NONE;

    if (authHeader) {
      const basic = extractBasicAuth(authHeader);
      if (!basic) {
        throw OAuthError.invalidClient('Malformed Basic authorization header');
      }

      // Only one authentication method per request (RFC 6749 Section 2.3)
      if (body['client_secret'] !== undefined) {
        throw OAuthError.invalidRequest('Multiple client authentication methods used');
      }
      if (body['client_id'] !== undefined && body['client_id'] !== basic.clientId) {
        throw OAuthError.invalidRequest('client_id does not match the authenticated client');
      }

      credentials = basic;
      authMethod = CLIENT_AUTH_BASIC;
    } else {
      const clientId = body['client_id'];
      const clientSecret = body['client_secret'];
      if (clientId) {
        credentials = { clientId, clientSecret };
        authMethod = clientSecret === undefined ? CLIENT_AUTH_NONE : CLIENT_AUTH_POST;
      }
    }

    if (!credentials) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    if (authMethod === CLIENT_AUTH_NONE && !allowPublicClients) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const client = await server.authenticateClient(credentials);

    const authenticatedClient: AuthenticatedClient = { client, authMethod };
    c.set('client', authenticatedClient);

    await next();
  };
}

/**
 * The client set by {@link clientAuthenticator}
 */
export function getAuthenticatedClient(c: Pick<OAuthContext, 'get'>): AuthenticatedClient {
  const client = c.get('client');
  if (!client) {
    throw OAuthError.invalidClient('Client authentication required');
  }
  return client;
}
