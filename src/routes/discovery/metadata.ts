import { Hono } from 'hono';
import type { OAuthVariables } from '../../types/hono.js';
import type { AuthorizationServer } from '../../server.js';

export interface MetadataRouteOptions {
  server: AuthorizationServer;
  baseUrl: string;
}

/**
 * OAuth 2.0 Authorization Server Metadata
 *
 * RFC 8414 Section 3
 */
export function createMetadataRoutes(options: MetadataRouteOptions) {
  const { server, baseUrl } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  router.get('/', (c) => {
    c.header('Cache-Control', 'public, max-age=3600');
    return c.json(server.metadata(baseUrl));
  });

  return router;
}
